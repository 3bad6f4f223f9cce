import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@portwright/core";

import { PortingService } from "../src/PortingService.js";
import { parseConfig } from "../src/config.js";
import { registerAllTools } from "../src/tools/index.js";
import { InMemoryCheckpointRepository } from "../src/infrastructure/memory/InMemoryCheckpointRepository.js";
import { FakeBackend, FakeValidator, StaticSources, fixedClock, noSleep } from "./fakes.js";

const FACTS = [
  { name: "A", kind: "function", location: { file: "lib.c", line: 1 }, dependencies: ["B"] },
  { name: "B", kind: "function", location: { file: "lib.c", line: 5 } },
  { name: "X", kind: "function", location: { file: "lib.c", line: 9 }, dependencies: ["Y"] },
  { name: "Y", kind: "struct", location: { file: "lib.c", line: 14 }, dependencies: ["X"] },
];

describe("porter tools", () => {
  let dir: string;
  let service: PortingService;
  let client: Client;
  let server: McpServer;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), "porter-tools-"));
    writeFileSync(join(dir, "facts.json"), JSON.stringify(FACTS));
    const config = parseConfig({}, { baseDir: dir });
    if (!config.ok) throw config.error;
    service = new PortingService(config.value, {
      backend: new FakeBackend(),
      createValidator: () => new FakeValidator(),
      repository: new InMemoryCheckpointRepository(),
      sources: new StaticSources(),
      sleep: noSleep,
      clock: fixedClock(),
    });

    server = new McpServer({ name: "porter-test", version: "0.0.0" });
    registerAllTools(server, service);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "porter-test-client", version: "0.0.0" });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    await service.dispose();
    rmSync(dir, { recursive: true, force: true });
  });

  async function call(name: string, args: Record<string, unknown> = {}) {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const first = result.content[0];
    return {
      isError: result.isError ?? false,
      text: first?.type === "text" ? first.text : "",
      data: result.structuredContent ?? {},
    };
  }

  it("registers every tool", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "port_cancel",
      "port_plan",
      "port_progress",
      "port_reset_unit",
      "port_start",
      "port_status",
      "port_summary",
    ]);
  });

  it("plans the order", async () => {
    const plan = await call("port_plan");
    expect(plan.text).toBe(
      ["4 symbols in 3 units (1 cycles)", "", "1. B (function)", "2. A (function)", "3. cycle:X+Y [cycle of 2: X, Y]"].join("\n")
    );
    expect(plan.data).toMatchObject({ success: true, order: ["B", "A", "cycle:X+Y"] });
  });

  it("runs to completion and summarizes", async () => {
    expect((await call("port_summary")).text).toBe("No run has finished yet.");

    const started = await call("port_start", { wait: true });
    expect(started.isError).toBe(false);
    expect(started.data).toMatchObject({ success: true, total: 3, summary: { counts: { verified: 3, failed: 0 } } });

    const summary = await call("port_summary");
    expect(summary.text.split("\n")[1]).toBe("verified 3, failed 0, blocked 0, pending 0");
  });

  it("answers status queries and unknown units", async () => {
    await call("port_start", { wait: true });

    const status = await call("port_status", { unit: "X" });
    expect(status.text.split("\n")[0]).toBe("cycle:X+Y: verified");

    const unknown = await call("port_status", { unit: "nope" });
    expect(unknown).toEqual({
      isError: true,
      text: "Error: Unknown unit: nope",
      data: { success: false, error: "Unknown unit: nope", code: "UNKNOWN_UNIT" },
    });
  });
});
