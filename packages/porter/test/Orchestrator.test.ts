import { setTimeout as delay } from "node:timers/promises";
import { describe, it, expect } from "vitest";

import { Orchestrator } from "../src/core/services/Orchestrator.js";
import type { OrchestratorDeps, ProgressEvent, RunOptions } from "../src/core/services/Orchestrator.js";
import { CheckpointStore } from "../src/core/services/CheckpointStore.js";
import { DefaultRetryPolicy } from "../src/core/services/RetryPolicy.js";
import { SymbolGraph } from "../src/core/graph/SymbolGraph.js";
import { CancellationSource } from "../src/core/CancellationToken.js";
import { StorageError } from "../src/core/errors.js";
import type { CheckpointRecord, ParsedFact, RunSummary } from "../src/core/model.js";
import type { CheckpointRepository } from "../src/core/ports/CheckpointRepository.js";
import { InMemoryCheckpointRepository } from "../src/infrastructure/memory/InMemoryCheckpointRepository.js";
import { Err } from "@portwright/core";
import {
  FailingRepository,
  FakeBackend,
  FakeValidator,
  FingerprintArtifactStore,
  PASS,
  StaticSources,
  artifactsFor,
  compileFailure,
  fact,
  fixedClock,
  noSleep,
} from "./fakes.js";

const chain = [fact("A", ["B"]), fact("B", ["C"]), fact("C")];

function graphOf(facts: ParsedFact[]): SymbolGraph {
  const result = SymbolGraph.build(facts);
  if (!result.ok) throw result.error;
  return result.value;
}

interface Setup {
  facts?: ParsedFact[];
  repository?: CheckpointRepository;
  maxAttempts?: number;
  backend?: FakeBackend;
  validator?: FakeValidator;
  deps?: Partial<OrchestratorDeps>;
}

function setup(options: Setup = {}) {
  const graph = graphOf(options.facts ?? chain);
  const repository = options.repository ?? new InMemoryCheckpointRepository();
  const maxAttempts = options.maxAttempts ?? 10;
  const store = new CheckpointStore(repository, { maxAttempts, clock: fixedClock() });
  const backend = options.backend ?? new FakeBackend();
  const validator = options.validator ?? new FakeValidator();
  const artifacts = new FingerprintArtifactStore();
  const orchestrator = new Orchestrator({
    backend,
    validator,
    policy: new DefaultRetryPolicy({ maxAttempts }),
    sources: new StaticSources(),
    artifacts,
    sleep: noSleep,
    clock: fixedClock(),
    ...options.deps,
  });

  const run = async (runOptions: Partial<RunOptions> = {}): Promise<RunSummary> => {
    const result = await orchestrator.run(graph, store, { concurrencyLimit: 1, runId: "test-run", ...runOptions });
    if (!result.ok) throw result.error;
    return result.value;
  };

  return { graph, repository, store, backend, validator, artifacts, orchestrator, run };
}

function seed(repository: CheckpointRepository, record: Partial<CheckpointRecord> & { unitId: string }): void {
  repository.save({
    symbols: [record.unitId],
    status: "unstarted",
    attempt: 0,
    artifacts: [],
    lastError: null,
    updatedAt: "2024-01-01T00:00:00.000Z",
    ...record,
  });
}

describe("Orchestrator", () => {
  it("ports every unit in dependency order", async () => {
    const { run, backend } = setup();
    const summary = await run();

    expect(backend.order()).toEqual(["C", "B", "A"]);
    expect(backend.callsFor("A")[0].dependencies).toEqual(["B"]);
    expect(summary).toMatchObject({
      runId: "test-run",
      interrupted: false,
      counts: { verified: 3, failed: 0, blocked: 0, pending: 0 },
      failures: [],
    });
    expect(summary.units.map((u) => [u.unitId, u.status, u.attempts])).toEqual([
      ["C", "verified", 1],
      ["B", "verified", 1],
      ["A", "verified", 1],
    ]);
  });

  it("starts a dependent only after its dependency is verified", async () => {
    const validator = new FakeValidator((unit, attempt) => (unit.id === "B" && attempt <= 2 ? compileFailure() : PASS));
    const { run, backend, repository } = setup({ validator });
    await run();

    expect(backend.order()).toEqual(["C", "B", "B", "B", "A"]);
    expect(repository.get("B")).toMatchObject({ status: "verified", attempt: 3, lastError: null });
  });

  it("blocks the dependents of a failed unit", async () => {
    const validator = new FakeValidator((unit) => (unit.id === "C" ? compileFailure() : PASS));
    const { run, backend, repository } = setup({ validator, maxAttempts: 2 });
    const summary = await run();

    expect(backend.order()).toEqual(["C", "C"]);
    expect(repository.get("B")).toBeNull();
    expect(repository.get("A")).toBeNull();
    expect(summary.counts).toEqual({ verified: 0, failed: 1, blocked: 2, pending: 0 });
    expect(summary.failures).toEqual([
      {
        unitId: "C",
        status: "failed",
        diagnostic: "Gave up after 2 attempt(s). The isolated compile failed with 1 error(s).",
      },
      { unitId: "B", status: "blocked", diagnostic: "Blocked: dependency C failed", blockedBy: "C" },
      { unitId: "A", status: "blocked", diagnostic: "Blocked: dependency C failed", blockedBy: "C" },
    ]);
  });

  it("ports a cycle as one unit", async () => {
    const { run, backend } = setup({ facts: [fact("X", ["Y"]), fact("Y", ["X"]), fact("W", ["X"])] });
    const summary = await run();

    expect(backend.calls[0]).toMatchObject({ unitId: "cycle:X+Y", symbols: ["X", "Y"] });
    expect(backend.callsFor("W")[0].dependencies).toEqual(["cycle:X+Y"]);
    expect(summary.units.map((u) => u.unitId)).toEqual(["cycle:X+Y", "W"]);
  });

  it("never exceeds the concurrency limit or runs ahead of dependencies", async () => {
    const facts = [
      fact("L0"),
      fact("L1"),
      fact("L2"),
      fact("L3"),
      fact("L4"),
      fact("M", ["L0", "L1"]),
      fact("T", ["M", "L4"]),
    ];
    let active = 0;
    let peak = 0;
    const violations: string[] = [];
    const repository = new InMemoryCheckpointRepository();

    const backend = new FakeBackend(async (unit, context) => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
      return { kind: "artifacts", artifacts: artifactsFor(unit, context.attempt) };
    });
    backend.onCall = (unit) => {
      for (const dep of unit.dependencies) {
        if (repository.get(dep)?.status !== "verified") violations.push(`${unit.id} before ${dep}`);
      }
    };
    const { run } = setup({ facts, repository, backend });
    const summary = await run({ concurrencyLimit: 3 });

    expect(peak).toBe(3);
    expect(violations).toEqual([]);
    expect(summary.counts.verified).toBe(7);
  });

  it("revalidates after runner errors with growing backoff", async () => {
    const sleeps: number[] = [];
    const validator = new FakeValidator((unit, _attempt, call) =>
      unit.id === "C" && call <= 2 ? { kind: "runner-error", cause: "exit 127" } : PASS
    );
    const { run, backend } = setup({
      validator,
      deps: {
        sleep: async (ms) => {
          sleeps.push(ms);
        },
      },
    });
    const summary = await run();

    expect(sleeps).toEqual([1000, 2000]);
    expect(backend.callsFor("C")).toHaveLength(1);
    expect(summary.counts.verified).toBe(3);
  });

  it("retries a failed unit from its recorded attempt", async () => {
    const repository = new InMemoryCheckpointRepository();
    seed(repository, { unitId: "C", status: "failed", attempt: 2, lastError: "old error" });
    const { run, backend, repository: repo } = setup({ repository, maxAttempts: 3 });
    await run();

    const [call] = backend.callsFor("C");
    expect(call.attempt).toBe(3);
    expect(call.feedback).toEqual({ kind: "resumed", summary: "old error", diagnostics: [] });
    expect(repo.get("C")).toMatchObject({ status: "verified", attempt: 3 });
  });

  it("leaves an exhausted unit failed and its dependents blocked", async () => {
    const repository = new InMemoryCheckpointRepository();
    seed(repository, { unitId: "C", status: "failed", attempt: 3, lastError: "still broken" });
    const { run, backend } = setup({ repository, maxAttempts: 3 });
    const summary = await run();

    expect(backend.calls).toHaveLength(0);
    expect(summary.counts).toEqual({ verified: 0, failed: 1, blocked: 2, pending: 0 });
    expect(summary.failures[0]).toEqual({ unitId: "C", status: "failed", diagnostic: "still broken" });
  });

  it("reloads verified artifacts recorded by an earlier run", async () => {
    const repository = new InMemoryCheckpointRepository();
    seed(repository, {
      unitId: "C",
      status: "verified",
      attempt: 1,
      artifacts: [
        { role: "bindings", path: "bindings/C.rs", fingerprint: "f1" },
        { role: "implementation", path: "src/C.rs", fingerprint: "f2" },
      ],
    });
    const { run, backend, artifacts } = setup({ repository });
    const summary = await run();

    expect(backend.order()).toEqual(["B", "A"]);
    expect(artifacts.reads).toEqual([["bindings/C.rs", "src/C.rs"]]);
    expect(summary.counts.verified).toBe(3);
  });

  it("fails a unit whose source cannot be read", async () => {
    const { run, repository, backend } = setup({
      deps: {
        sources: {
          read: (symbol) => (symbol.name === "B" ? Err(new Error("no such file")) : new StaticSources().read(symbol)),
        },
      },
    });
    const summary = await run();

    expect(backend.order()).toEqual(["C"]);
    expect(repository.get("B")).toMatchObject({
      status: "failed",
      attempt: 0,
      lastError: "Source of B is unavailable: no such file",
    });
    expect(summary.counts).toEqual({ verified: 1, failed: 1, blocked: 1, pending: 0 });
  });

  it("stops at the first storage error and reports it", async () => {
    const repository = new FailingRepository(2);
    const { orchestrator, graph, store, backend } = setup({ repository, facts: [fact("A"), fact("B")] });
    const result = await orchestrator.run(graph, store, { concurrencyLimit: 1 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(StorageError);
    expect(result.error.message).toBe("Checkpoint write failed: disk full");
    expect(backend.order()).toEqual(["A"]);
  });

  it("rethrows an unexpected error once in-flight work has drained", async () => {
    const validator = new FakeValidator(() => {
      throw new Error("validator bug");
    });
    const { orchestrator, graph, store } = setup({ validator });
    await expect(orchestrator.run(graph, store, { concurrencyLimit: 2 })).rejects.toThrow("validator bug");
  });

  it("dispatches nothing when cancelled before starting", async () => {
    const cancel = new CancellationSource();
    cancel.cancel("operator");
    const { run, backend } = setup();
    const summary = await run({ token: cancel.token });

    expect(backend.calls).toHaveLength(0);
    expect(summary.interrupted).toBe(true);
    expect(summary.counts).toEqual({ verified: 0, failed: 0, blocked: 0, pending: 3 });
  });

  it("reports progress up to the total", async () => {
    const events: ProgressEvent[] = [];
    const { run } = setup();
    await run({ onProgress: (event) => events.push(event) });

    expect(events[0]).toEqual({ unitId: "C", status: "generating", attempt: 1, settled: 0, total: 3 });
    expect(events.at(-1)).toEqual({ unitId: "A", status: "verified", attempt: 1, settled: 3, total: 3 });
  });

  describe("resume", () => {
    const facts = [fact("P"), fact("Q", ["P"]), fact("R"), fact("S", ["R"])];
    const verdict = (unitId: string, attempt: number) =>
      (unitId === "P" && attempt === 1) || unitId === "R" ? compileFailure() : PASS;

    async function uninterrupted(): Promise<RunSummary> {
      const { run } = setup({
        facts,
        maxAttempts: 2,
        validator: new FakeValidator((unit, attempt) => verdict(unit.id, attempt)),
      });
      return run();
    }

    async function interruptedAt(k: number): Promise<RunSummary> {
      const repository = new InMemoryCheckpointRepository();
      const cancel = new CancellationSource();
      let seen = 0;
      const first = setup({
        facts,
        repository,
        maxAttempts: 2,
        validator: new FakeValidator((unit, attempt) => verdict(unit.id, attempt)),
      });
      await first.run({
        token: cancel.token,
        onProgress: () => {
          seen++;
          if (seen === k) cancel.cancel("test interrupt");
        },
      });

      const second = setup({
        facts,
        repository,
        maxAttempts: 2,
        validator: new FakeValidator((unit, attempt) => verdict(unit.id, attempt)),
      });
      return second.run();
    }

    it("reaches the same final state wherever the run was interrupted", async () => {
      const reference = await uninterrupted();
      expect(reference.counts).toEqual({ verified: 2, failed: 1, blocked: 1, pending: 0 });

      for (let k = 1; k <= 17; k++) {
        const resumed = await interruptedAt(k);
        expect(resumed.interrupted).toBe(false);
        expect(resumed.counts).toEqual(reference.counts);
        expect(resumed.units).toEqual(reference.units);
        expect(resumed.failures).toEqual(reference.failures);
      }
    });
  });
});
