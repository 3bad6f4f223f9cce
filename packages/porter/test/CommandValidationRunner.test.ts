import { setTimeout as delay } from "node:timers/promises";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";

import { Ok } from "@portwright/core";
import { CommandValidationRunner } from "../src/infrastructure/validation/CommandValidationRunner.js";
import type { ValidationSteps } from "../src/infrastructure/validation/CommandValidationRunner.js";
import { ArtifactWorkspace } from "../src/infrastructure/workspace/ArtifactWorkspace.js";
import { SymbolGraph } from "../src/core/graph/SymbolGraph.js";
import type { ProcessingUnit } from "../src/core/model.js";
import type { CommandExecutor } from "../src/core/ports/CommandExecutor.js";
import { FakeExecutor, artifactsFor, fact } from "./fakes.js";
import type { ExecutorScript } from "./fakes.js";

const steps: ValidationSteps = {
  isolatedCompile: { command: "cc-check {implementation}", timeoutMs: 5000 },
  linkedCompile: { command: "cargo build", timeoutMs: 5000 },
  differentialTest: { command: "cargo test {unit}", timeoutMs: 5000 },
};

const graph = SymbolGraph.build([fact("A"), fact("B", ["A"])]);
if (!graph.ok) throw graph.error;
const symbolGraph = graph.value;

function unit(id: string): ProcessingUnit {
  const found = symbolGraph.unit(id);
  if (!found) throw new Error(`no unit ${id}`);
  return found;
}

describe("CommandValidationRunner", () => {
  let dir: string;
  let workspace: ArtifactWorkspace;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "porter-validate-"));
    workspace = new ArtifactWorkspace({ projectDir: dir });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function runner(script?: ExecutorScript, hasDependents = (id: string) => symbolGraph.hasDependents(id)) {
    const executor = new FakeExecutor(script);
    const validator = new CommandValidationRunner(steps, workspace, executor, {
      hasDependents,
      env: { CARGO_TERM_COLOR: "never" },
    });
    return { executor, validator };
  }

  it("runs every step and commits the artifacts on pass", async () => {
    const { executor, validator } = runner();
    const verdict = await validator.validate(unit("A"), artifactsFor(unit("A"), 1));

    expect(verdict).toEqual({ kind: "pass" });
    expect(executor.commands()).toEqual(["cc-check src/A.rs", "cargo build", "cargo test A"]);
    expect(executor.requests[0]).toMatchObject({ cwd: dir, timeoutMs: 5000, env: { CARGO_TERM_COLOR: "never" } });
    expect(readFileSync(join(dir, "src/A.rs"), "utf-8")).toBe("// impl A attempt 1");
    expect(workspace.ownerOf("src/A.rs")).toBe("A");
  });

  it("skips the linked compile for a unit without dependents", async () => {
    const { executor, validator } = runner();
    await validator.validate(unit("B"), artifactsFor(unit("B"), 1));
    expect(executor.commands()).toEqual(["cc-check src/B.rs", "cargo test B"]);
  });

  it("stops at a failed compile and rolls the artifacts back", async () => {
    const { executor, validator } = runner(() => ({
      exitCode: 1,
      stderr: "error[E0308]: mismatched types\n --> src/A.rs:2:3",
    }));
    const verdict = await validator.validate(unit("A"), artifactsFor(unit("A"), 1));

    expect(verdict).toEqual({
      kind: "compile-failure",
      step: "isolated",
      diagnostics: [{ severity: "error", message: "mismatched types", code: "E0308", file: "src/A.rs", line: 2, column: 3 }],
      output: "error[E0308]: mismatched types\n --> src/A.rs:2:3",
    });
    expect(executor.commands()).toEqual(["cc-check src/A.rs"]);
    expect(existsSync(join(dir, "src/A.rs"))).toBe(false);
    expect(workspace.ownerOf("src/A.rs")).toBeUndefined();
  });

  it("reports a failing differential test as a behavioral mismatch", async () => {
    const { validator } = runner((request) =>
      request.command.startsWith("cargo test") ? { exitCode: 101, stdout: "assertion failed: left == right" } : {}
    );
    const verdict = await validator.validate(unit("A"), artifactsFor(unit("A"), 1));
    expect(verdict).toEqual({ kind: "behavioral-mismatch", diffSummary: "assertion failed: left == right" });
  });

  it("treats a missing command as a runner error", async () => {
    const { validator } = runner(() => ({ exitCode: 127, stderr: "sh: cc-check: command not found" }));
    const verdict = await validator.validate(unit("A"), artifactsFor(unit("A"), 1));
    expect(verdict).toEqual({
      kind: "runner-error",
      cause: "isolated compile command could not run (exit 127): sh: cc-check: command not found",
    });
  });

  it("treats a timeout as a runner error", async () => {
    const { validator } = runner(() => ({ exitCode: null, signal: "SIGKILL", timedOut: true }));
    const verdict = await validator.validate(unit("A"), artifactsFor(unit("A"), 1));
    expect(verdict).toEqual({ kind: "runner-error", cause: "isolated compile timed out after 5000ms" });
  });

  it("treats a spawn failure as a runner error", async () => {
    const { validator } = runner(() => new Error("spawn /bin/sh ENOENT"));
    const verdict = await validator.validate(unit("A"), artifactsFor(unit("A"), 1));
    expect(verdict).toEqual({ kind: "runner-error", cause: "could not start isolated compile: spawn /bin/sh ENOENT" });
  });

  it("treats a rejected path as a runner error without running anything", async () => {
    const { executor, validator } = runner();
    const artifacts = { ...artifactsFor(unit("A"), 1), bindings: { path: "../escape.rs", content: "x" } };
    const verdict = await validator.validate(unit("A"), artifacts);

    expect(verdict).toEqual({
      kind: "runner-error",
      cause: "workspace write failed: Cannot stage A: bindings: ../escape.rs escapes the project directory",
    });
    expect(executor.requests).toHaveLength(0);
  });

  it("runs one validation at a time", async () => {
    let active = 0;
    let peak = 0;
    const executor: CommandExecutor = {
      run: async () => {
        active++;
        peak = Math.max(peak, active);
        await delay(5);
        active--;
        return Ok({ exitCode: 0, signal: null, stdout: "", stderr: "", timedOut: false, aborted: false, durationMs: 5 });
      },
    };
    const validator = new CommandValidationRunner(steps, workspace, executor);

    const verdicts = await Promise.all([
      validator.validate(unit("A"), artifactsFor(unit("A"), 1)),
      validator.validate(unit("B"), artifactsFor(unit("B"), 1)),
    ]);
    expect(verdicts).toEqual([{ kind: "pass" }, { kind: "pass" }]);
    expect(peak).toBe(1);
  });
});
