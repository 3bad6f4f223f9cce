/**
 * Retry policy: maps every attempt outcome to exactly one transition.
 *
 * Defects (compile failures, behavioral mismatches, incomplete generations)
 * go back to generation with feedback and count against `maxAttempts`.
 * Runner errors revalidate the same artifacts without feedback and count
 * against the separate `maxRunnerRetries` budget.
 */

import type { Feedback, GenerationIncomplete, Verdict } from "../model.js";

export type AttemptOutcome = { kind: "verdict"; verdict: Verdict } | GenerationIncomplete;

export interface RetryState {
  /** Generation attempts started, including the current one */
  attempt: number;
  /** Runner-error revalidations already spent by this task */
  runnerRetries: number;
}

export type Transition =
  | { to: "verified" }
  | { to: "generating"; feedback: Feedback }
  | { to: "validating"; delayMs: number }
  | { to: "failed"; reason: string };

export interface RetryPolicy {
  readonly maxAttempts: number;
  decide(outcome: AttemptOutcome, state: RetryState): Transition;
}

export interface RetryConfig {
  maxAttempts: number;
  maxRunnerRetries: number;
  runnerBackoffMs: number;
  maxBackoffMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 10,
  maxRunnerRetries: 2,
  runnerBackoffMs: 1000,
  maxBackoffMs: 30_000,
};

/** Longest raw output carried in feedback when no diagnostic could be parsed */
const MAX_OUTPUT_IN_FEEDBACK = 4000;

export class DefaultRetryPolicy implements RetryPolicy {
  private readonly config: RetryConfig;

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    if (this.config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be at least 1, got ${this.config.maxAttempts}`);
    }
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  get maxRunnerRetries(): number {
    return this.config.maxRunnerRetries;
  }

  decide(outcome: AttemptOutcome, state: RetryState): Transition {
    if (outcome.kind === "verdict" && outcome.verdict.kind === "pass") {
      return { to: "verified" };
    }

    if (outcome.kind === "verdict" && outcome.verdict.kind === "runner-error") {
      if (state.runnerRetries < this.config.maxRunnerRetries) {
        return { to: "validating", delayMs: this.backoff(state.runnerRetries) };
      }
      return {
        to: "failed",
        reason: `Validation infrastructure error after ${state.runnerRetries + 1} tries: ${outcome.verdict.cause}`,
      };
    }

    const feedback = outcome.kind === "verdict" ? defectFeedback(outcome.verdict) : incompleteFeedback(outcome);
    if (state.attempt < this.config.maxAttempts) {
      return { to: "generating", feedback };
    }
    return {
      to: "failed",
      reason: `Gave up after ${state.attempt} attempt(s). ${feedback.summary}`,
    };
  }

  backoff(retry: number): number {
    return Math.min(this.config.runnerBackoffMs * 2 ** retry, this.config.maxBackoffMs);
  }
}

export function defectFeedback(verdict: Verdict): Feedback {
  switch (verdict.kind) {
    case "compile-failure": {
      const errors = verdict.diagnostics.filter((d) => d.severity === "error").length;
      if (verdict.diagnostics.length === 0) {
        return {
          kind: "compile-failure",
          summary: `The ${verdict.step} compile failed:\n${tail(verdict.output, MAX_OUTPUT_IN_FEEDBACK)}`,
          diagnostics: [],
        };
      }
      return {
        kind: "compile-failure",
        summary: `The ${verdict.step} compile failed with ${errors} error(s).`,
        diagnostics: verdict.diagnostics,
      };
    }
    case "behavioral-mismatch":
      return {
        kind: "behavioral-mismatch",
        summary: `The differential test found a behavioral mismatch:\n${verdict.diffSummary}`,
        diagnostics: [],
      };
    case "pass":
    case "runner-error":
      return { kind: "compile-failure", summary: `Unexpected ${verdict.kind} verdict`, diagnostics: [] };
  }
}

export function incompleteFeedback(outcome: GenerationIncomplete): Feedback {
  const missing = outcome.missing.length > 0 ? ` Missing: ${outcome.missing.join(", ")}.` : "";
  return {
    kind: "generation-incomplete",
    summary: `Generation was incomplete: ${outcome.reason}.${missing}`,
    diagnostics: [],
  };
}

function tail(text: string, max: number): string {
  return text.length <= max ? text : `...${text.slice(text.length - max)}`;
}
