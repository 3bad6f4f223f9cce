import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";

import { PortingService } from "../src/PortingService.js";
import type { PortingServiceOverrides } from "../src/PortingService.js";
import { parseConfig } from "../src/config.js";
import { ConfigError, MalformedGraphError, RunInProgressError, UnknownUnitError } from "../src/core/errors.js";
import { InMemoryCheckpointRepository } from "../src/infrastructure/memory/InMemoryCheckpointRepository.js";
import { FakeBackend, FakeValidator, PASS, StaticSources, compileFailure, fixedClock, noSleep } from "./fakes.js";

const FACTS = [
  { name: "A", kind: "function", location: { file: "lib.c", line: 1 }, dependencies: ["B", "size_t"] },
  { name: "B", kind: "function", location: { file: "lib.c", line: 5 } },
  { name: "X", kind: "function", location: { file: "lib.c", line: 9 }, dependencies: ["Y"] },
  { name: "Y", kind: "struct", location: { file: "lib.c", line: 14 }, dependencies: ["X"] },
];

describe("PortingService", () => {
  let dir: string;
  let services: PortingService[];

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "porter-service-"));
    writeFileSync(join(dir, "facts.json"), JSON.stringify(FACTS));
    services = [];
  });

  afterEach(async () => {
    for (const service of services) await service.dispose();
    rmSync(dir, { recursive: true, force: true });
  });

  function createService(raw: Record<string, unknown> = {}, overrides: PortingServiceOverrides = {}): PortingService {
    const config = parseConfig(raw, { baseDir: dir });
    if (!config.ok) throw config.error;
    const service = new PortingService(config.value, {
      backend: new FakeBackend(),
      createValidator: () => new FakeValidator(),
      repository: new InMemoryCheckpointRepository(),
      sources: new StaticSources(),
      sleep: noSleep,
      clock: fixedClock(),
      ...overrides,
    });
    services.push(service);
    return service;
  }

  async function finish(service: PortingService) {
    const started = service.start();
    if (!started.ok) throw started.error;
    const result = await service.waitForRun();
    if (!result?.ok) throw new Error("run did not finish");
    return result.value;
  }

  it("plans the processing order", () => {
    const plan = createService().plan();
    expect(plan.ok).toBe(true);
    if (!plan.ok) return;
    expect(plan.value).toMatchObject({ symbolCount: 4, unitCount: 3, cycleCount: 1 });
    expect(plan.value.units.map((u) => u.id)).toEqual(["B", "A", "cycle:X+Y"]);
    expect(plan.value.units[1].externalDependencies).toEqual(["size_t"]);
  });

  it("reports a malformed facts file", () => {
    writeFileSync(join(dir, "facts.json"), JSON.stringify([{ ...FACTS[0], dependencies: ["ghost"] }]));
    const plan = createService().plan();
    expect(!plan.ok && plan.error).toBeInstanceOf(MalformedGraphError);
  });

  it("runs in the background and keeps the summary", async () => {
    const service = createService();
    const summary = await finish(service);

    expect(summary.counts).toEqual({ verified: 3, failed: 0, blocked: 0, pending: 0 });
    expect(service.lastSummary()).toBe(summary);
    expect(service.isRunning).toBe(false);
    expect(existsSync(join(dir, ".portwright", "porter.lock"))).toBe(false);
    expect(service.progress()).toEqual({
      runId: summary.runId,
      running: false,
      total: 3,
      counts: { verified: 3, failed: 0, blocked: 0, pending: 0 },
      active: [],
    });
  });

  it("shows live progress while a run is active", async () => {
    const service = createService();
    const started = service.start();
    expect(started.ok && started.value.total).toBe(3);

    expect(service.progress()).toMatchObject({
      running: true,
      total: 3,
      counts: { verified: 0, failed: 0, blocked: 0, pending: 3 },
      active: ["B"],
    });
    await service.waitForRun();
  });

  it("allows one run at a time", async () => {
    const service = createService();
    const first = service.start();
    const second = service.start();
    expect(first.ok).toBe(true);
    expect(!second.ok && second.error).toBeInstanceOf(RunInProgressError);
    expect(service.resetUnit("B").ok).toBe(false);
    await service.waitForRun();
  });

  it("refuses to start while another process holds the lock", () => {
    mkdirSync(join(dir, ".portwright"), { recursive: true });
    writeFileSync(join(dir, ".portwright", "porter.lock"), String(process.ppid));
    const started = createService().start();
    expect(!started.ok && started.error).toBeInstanceOf(RunInProgressError);
  });

  it("looks units up by id or member symbol", async () => {
    const service = createService();
    await finish(service);

    const status = service.status("Y");
    expect(status.ok).toBe(true);
    if (!status.ok) return;
    expect(status.value).toMatchObject({
      unitId: "cycle:X+Y",
      symbols: ["X", "Y"],
      status: "verified",
      blockedBy: null,
      record: { status: "verified", attempt: 1 },
    });

    const unknown = service.status("Z");
    expect(!unknown.ok && unknown.error).toBeInstanceOf(UnknownUnitError);
  });

  it("derives blocked units and resets a failed one", async () => {
    const service = createService(
      { retry: { maxAttempts: 1 } },
      { createValidator: () => new FakeValidator((unit) => (unit.id === "B" ? compileFailure() : PASS)) }
    );
    const summary = await finish(service);
    expect(summary.counts).toEqual({ verified: 1, failed: 1, blocked: 1, pending: 0 });

    const blocked = service.status("A");
    expect(blocked.ok && [blocked.value.status, blocked.value.blockedBy]).toEqual(["blocked", "B"]);

    const reset = service.resetUnit("B");
    expect(reset.ok && [reset.value.status, reset.value.attempt]).toEqual(["unstarted", 0]);
    const after = service.status("A");
    expect(after.ok && after.value.status).toBe("unstarted");
  });

  it("has nothing to cancel when idle", () => {
    expect(createService().cancel()).toBe(false);
  });

  it("needs a generation command unless a backend is supplied", () => {
    const started = createService({}, { backend: undefined }).start();
    expect(!started.ok && started.error).toBeInstanceOf(ConfigError);
    expect(!started.ok && started.error.message).toBe("No generation command configured (generation.command)");
  });
});
