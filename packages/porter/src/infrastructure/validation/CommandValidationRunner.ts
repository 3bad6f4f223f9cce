/**
 * Validates artifacts by running the project's own compile and test
 * commands in the target project directory.
 *
 * Steps run in order and stop at the first failure: isolated compile,
 * linked compile (when configured and the unit has dependents), then the
 * differential test (when configured and generated). Validations share the
 * project directory, so they are serialized; generation is not.
 */

import { toError } from "@portwright/core";

import type { ArtifactSet, ProcessingUnit, Verdict } from "../../core/model.js";
import type { CommandExecutor, CommandOutput } from "../../core/ports/CommandExecutor.js";
import type { ValidationRunner } from "../../core/ports/ValidationRunner.js";
import { AsyncLock } from "../../core/AsyncLock.js";
import type { ArtifactWorkspace } from "../workspace/ArtifactWorkspace.js";
import { processOutput } from "./cleanOutput.js";
import { parseDiagnostics } from "./DiagnosticParser.js";
import { expandCommand } from "./commandTemplate.js";

export interface CommandStep {
  command: string;
  timeoutMs: number;
}

export interface ValidationSteps {
  isolatedCompile: CommandStep;
  linkedCompile?: CommandStep;
  differentialTest?: CommandStep;
}

export interface CommandValidationOptions {
  /** Whether other units depend on this one; decides the linked compile */
  hasDependents?: (unitId: string) => boolean;
  env?: Record<string, string>;
}

/** Shell exit codes for "found but not executable" and "not found" */
const UNRUNNABLE_EXIT_CODES = new Set([126, 127]);

type StepKind = "isolated" | "linked" | "test";

const STEP_LABELS: Record<StepKind, string> = {
  isolated: "isolated compile",
  linked: "linked compile",
  test: "differential test",
};

export class CommandValidationRunner implements ValidationRunner {
  private readonly lock = new AsyncLock();

  constructor(
    private readonly steps: ValidationSteps,
    private readonly workspace: ArtifactWorkspace,
    private readonly executor: CommandExecutor,
    private readonly options: CommandValidationOptions = {}
  ) {}

  validate(unit: ProcessingUnit, artifacts: ArtifactSet): Promise<Verdict> {
    return this.lock.runExclusive(() => this.validateExclusive(unit, artifacts));
  }

  private async validateExclusive(unit: ProcessingUnit, artifacts: ArtifactSet): Promise<Verdict> {
    const staged = this.workspace.stage(unit.id, artifacts);
    if (!staged.ok) {
      return { kind: "runner-error", cause: `workspace write failed: ${staged.error.message}` };
    }

    let verdict: Verdict;
    try {
      verdict = await this.runSteps(unit, artifacts);
    } catch (e) {
      verdict = { kind: "runner-error", cause: toError(e).message };
    }

    if (verdict.kind === "pass") {
      staged.value.commit();
      return verdict;
    }

    const rolledBack = staged.value.rollback();
    if (!rolledBack.ok) {
      console.error(`[porter] ${unit.id}: ${rolledBack.error.message}`);
      return { kind: "runner-error", cause: `${verdict.kind} left a dirty workspace: ${rolledBack.error.message}` };
    }
    return verdict;
  }

  private async runSteps(unit: ProcessingUnit, artifacts: ArtifactSet): Promise<Verdict> {
    const isolated = await this.runStep("isolated", this.steps.isolatedCompile, unit, artifacts);
    if (isolated) return isolated;

    const linked = this.steps.linkedCompile;
    const hasDependents = this.options.hasDependents?.(unit.id) ?? true;
    if (linked && hasDependents) {
      const failure = await this.runStep("linked", linked, unit, artifacts);
      if (failure) return failure;
    }

    const test = this.steps.differentialTest;
    if (test && artifacts.differentialTest) {
      const failure = await this.runStep("test", test, unit, artifacts);
      if (failure) return failure;
    }

    return { kind: "pass" };
  }

  /**
   * Run one step. Returns the failing verdict, or null when it passed.
   */
  private async runStep(
    kind: StepKind,
    step: CommandStep,
    unit: ProcessingUnit,
    artifacts: ArtifactSet
  ): Promise<Verdict | null> {
    const label = STEP_LABELS[kind];
    const command = expandCommand(step.command, unit, this.workspace.projectDir, artifacts);
    const result = await this.executor.run({
      command,
      cwd: this.workspace.projectDir,
      timeoutMs: step.timeoutMs,
      env: this.options.env,
    });

    if (!result.ok) {
      return { kind: "runner-error", cause: `could not start ${label}: ${result.error.message}` };
    }

    const output = result.value;
    const infrastructure = infrastructureFailure(label, step, output);
    if (infrastructure) return infrastructure;
    if (output.exitCode === 0) return null;

    const combined = combineOutput(output);
    if (kind === "test") {
      return { kind: "behavioral-mismatch", diffSummary: processOutput(combined, "tail") };
    }
    const cleaned = processOutput(combined, "head");
    return { kind: "compile-failure", step: kind, diagnostics: parseDiagnostics(cleaned), output: cleaned };
  }
}

function infrastructureFailure(label: string, step: CommandStep, output: CommandOutput): Verdict | null {
  if (output.timedOut) {
    return { kind: "runner-error", cause: `${label} timed out after ${step.timeoutMs}ms` };
  }
  if (output.exitCode === null) {
    return { kind: "runner-error", cause: `${label} was killed by ${output.signal ?? "a signal"}` };
  }
  if (UNRUNNABLE_EXIT_CODES.has(output.exitCode)) {
    const detail = processOutput(combineOutput(output), "tail", 2000);
    return {
      kind: "runner-error",
      cause: `${label} command could not run (exit ${output.exitCode})${detail ? `: ${detail}` : ""}`,
    };
  }
  return null;
}

function combineOutput(output: CommandOutput): string {
  if (output.stdout && output.stderr) return `${output.stdout}\n${output.stderr}`;
  return output.stdout || output.stderr;
}
