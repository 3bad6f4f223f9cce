/**
 * Generation through an external command.
 *
 * The request is written to the command's stdin as JSON; the command prints
 * one JSON response on stdout. stderr is only used for error messages.
 */

import type { Feedback, ProcessingUnit } from "../../core/model.js";
import type { CommandExecutor } from "../../core/ports/CommandExecutor.js";
import type { GenerationBackend, GenerationContext, GenerationOutcome } from "../../core/ports/GenerationBackend.js";
import { GenerationResponseSchema } from "../../core/schemas.js";
import { formatFeedback } from "../../core/feedback.js";
import { processOutput } from "../validation/cleanOutput.js";
import { expandCommand } from "../validation/commandTemplate.js";

export interface GenerationCommandConfig {
  command: string;
  timeoutMs: number;
  /** Working directory of the command */
  cwd: string;
  env?: Record<string, string>;
}

export interface GenerationRequest {
  unit: {
    id: string;
    isCycle: boolean;
    requiresDifferentialTest: boolean;
    externalDependencies: readonly string[];
    symbols: {
      name: string;
      kind: string;
      file: string;
      line: number;
      isStatic: boolean;
      dependencies: readonly string[];
      source: string;
    }[];
  };
  attempt: number;
  dependencies: GenerationContext["dependencies"];
  feedback: string | null;
}

export function buildGenerationRequest(
  unit: ProcessingUnit,
  context: GenerationContext,
  feedback: Feedback | null
): GenerationRequest {
  const sourceOf = new Map(context.sources.map((s) => [s.symbol.name, s.text]));
  return {
    unit: {
      id: unit.id,
      isCycle: unit.isCycle,
      requiresDifferentialTest: unit.requiresDifferentialTest,
      externalDependencies: unit.externalDependencies,
      symbols: unit.symbols.map((s) => ({
        name: s.name,
        kind: s.kind,
        file: s.location.file,
        line: s.location.line,
        isStatic: s.isStatic,
        dependencies: s.dependencies,
        source: sourceOf.get(s.name) ?? "",
      })),
    },
    attempt: context.attempt,
    dependencies: context.dependencies,
    feedback: feedback ? formatFeedback(feedback) : null,
  };
}

export class CommandGenerationBackend implements GenerationBackend {
  readonly name = "command";

  constructor(
    private readonly config: GenerationCommandConfig,
    private readonly executor: CommandExecutor
  ) {}

  async generate(unit: ProcessingUnit, context: GenerationContext, feedback: Feedback | null): Promise<GenerationOutcome> {
    const request = buildGenerationRequest(unit, context, feedback);
    const result = await this.executor.run({
      command: expandCommand(this.config.command, unit, this.config.cwd),
      cwd: this.config.cwd,
      timeoutMs: this.config.timeoutMs,
      input: JSON.stringify(request),
      env: this.config.env,
      signal: context.signal,
    });

    if (!result.ok) {
      throw new Error(`could not start generation command: ${result.error.message}`);
    }
    const output = result.value;
    if (output.aborted) {
      throw new Error("generation command aborted");
    }
    if (output.timedOut) {
      throw new Error(`generation command timed out after ${this.config.timeoutMs}ms`);
    }
    if (output.exitCode !== 0) {
      const stderr = processOutput(output.stderr, "tail", 2000);
      throw new Error(`generation command exited with ${output.exitCode ?? output.signal}${stderr ? `: ${stderr}` : ""}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(output.stdout);
    } catch (e) {
      throw new Error("generation command did not print valid JSON", { cause: e });
    }

    const response = GenerationResponseSchema.safeParse(parsed);
    if (!response.success) {
      const issues = response.error.issues.map((i) => `${i.path.map(String).join(".") || "(root)"}: ${i.message}`);
      throw new Error(`unexpected generation response: ${issues.join("; ")}`);
    }

    if (response.data.status === "refused") {
      return { kind: "refused", reason: response.data.reason };
    }
    return { kind: "artifacts", artifacts: response.data.artifacts };
  }
}
