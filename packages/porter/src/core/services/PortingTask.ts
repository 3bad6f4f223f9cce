/**
 * PortingTask - the generate/validate/retry state machine for one unit.
 *
 * Every transition is written to the checkpoint store before the task
 * moves on, so an interrupted task always leaves a record it can resume
 * from. Cancellation is only observed at boundaries: before a generation
 * call, when a generation returns, and around runner-error backoff. A
 * running validation is allowed to finish.
 */

import { setTimeout as sleepFor } from "node:timers/promises";

import type { Result } from "@portwright/core";
import { Ok, Err, toError } from "@portwright/core";

import type {
  ArtifactFingerprint,
  ArtifactRole,
  ArtifactSet,
  CheckpointRecord,
  Feedback,
  GenerationIncomplete,
  PortingStatus,
  ProcessingUnit,
  Verdict,
} from "../model.js";
import type { CancellationToken } from "../CancellationToken.js";
import type { StorageError } from "../errors.js";
import type {
  DependencyArtifacts,
  GenerationBackend,
  PartialArtifactSet,
  SymbolSource,
} from "../ports/GenerationBackend.js";
import type { ValidationRunner } from "../ports/ValidationRunner.js";
import type { ArtifactGuard } from "../ports/ArtifactGuard.js";
import type { CheckpointStore } from "./CheckpointStore.js";
import type { RetryPolicy, RetryState, Transition } from "./RetryPolicy.js";
import { fingerprintArtifacts, sameFingerprints } from "../fingerprint.js";
import { summarizeFeedback } from "../feedback.js";

export interface PortingTaskDeps {
  store: CheckpointStore;
  backend: GenerationBackend;
  validator: ValidationRunner;
  policy: RetryPolicy;
  /** Rejects artifact paths the unit may not write */
  guard?: ArtifactGuard;
  sleep?: (ms: number) => Promise<void>;
}

export interface PortingTaskOptions {
  unit: ProcessingUnit;
  /** Attempts already spent on this unit */
  attemptsUsed: number;
  /** Feedback carried into the first generation of this run */
  feedback: Feedback | null;
  sources: SymbolSource[];
  dependencies: DependencyArtifacts[];
  /** Reports whether a unit is verified; checked before generation starts */
  isVerified: (unitId: string) => boolean;
  token: CancellationToken;
  generationTimeoutMs: number;
  /** Units containing a function must come with a differential test */
  requireDifferentialTest?: boolean;
  /** Called after every persisted transition */
  onTransition?: (record: CheckpointRecord) => void;
}

export type TaskResult =
  | { kind: "verified"; record: CheckpointRecord; artifacts: ArtifactSet }
  | { kind: "failed"; record: CheckpointRecord }
  | { kind: "interrupted"; record: CheckpointRecord | null };

type Generated = { kind: "complete"; artifacts: ArtifactSet } | GenerationIncomplete;

interface DefectMemory {
  attempt: number;
  fingerprints: ArtifactFingerprint[];
  verdict: Verdict;
}

export class PortingTask {
  private readonly sleep: (ms: number) => Promise<void>;
  private attempt: number;
  private runnerRetries = 0;
  private lastRecord: CheckpointRecord | null = null;

  constructor(
    private readonly deps: PortingTaskDeps,
    private readonly options: PortingTaskOptions
  ) {
    this.sleep = deps.sleep ?? ((ms) => sleepFor(ms));
    this.attempt = options.attemptsUsed;
  }

  get unitId(): string {
    return this.options.unit.id;
  }

  async run(): Promise<Result<TaskResult, StorageError>> {
    const { unit, token } = this.options;
    const { policy } = this.deps;

    const notVerified = unit.dependencies.filter((dep) => !this.options.isVerified(dep));
    if (notVerified.length > 0) {
      throw new Error(`${unit.id} dispatched before its dependencies were verified: ${notVerified.join(", ")}`);
    }

    if (token.isCancellationRequested) {
      return Ok({ kind: "interrupted", record: this.lastRecord });
    }

    if (this.attempt >= policy.maxAttempts) {
      const reason = `No attempts left (${this.attempt}/${policy.maxAttempts})`;
      return this.fail([], this.options.feedback ? summarizeFeedback(this.options.feedback) : reason);
    }

    let feedback = this.options.feedback;
    this.attempt++;
    const started = this.persist("generating", [], feedback ? summarizeFeedback(feedback) : null);
    if (!started.ok) return started;

    let previousDefect: DefectMemory | null = null;

    for (;;) {
      const generated = await this.generate(feedback);
      // The record still says generating, so a resume repeats this attempt
      if (token.isCancellationRequested) {
        return Ok({ kind: "interrupted", record: this.lastRecord });
      }

      let transition: Transition;
      let fingerprints: ArtifactFingerprint[] = [];
      let artifacts: ArtifactSet | null = null;

      if (generated.kind === "generation-incomplete") {
        log(`${unit.id}: attempt ${this.attempt} incomplete: ${generated.reason}`);
        transition = policy.decide(generated, this.retryState());
      } else {
        artifacts = generated.artifacts;
        fingerprints = fingerprintArtifacts(artifacts);

        if (previousDefect && sameFingerprints(previousDefect.fingerprints, fingerprints)) {
          log(`${unit.id}: attempt ${this.attempt} produced unchanged output, reusing previous verdict`);
          transition = unchanged(policy.decide({ kind: "verdict", verdict: previousDefect.verdict }, this.retryState()), previousDefect.attempt);
        } else {
          const validated = await this.validate(artifacts, fingerprints, feedback);
          if (!validated.ok) return validated;
          if (validated.value.kind === "interrupted") {
            return Ok({ kind: "interrupted", record: this.lastRecord });
          }
          const { verdict } = validated.value;
          transition = validated.value.transition;
          if (verdict.kind === "compile-failure" || verdict.kind === "behavioral-mismatch") {
            previousDefect = { attempt: this.attempt, fingerprints, verdict };
          }
        }
      }

      switch (transition.to) {
        case "verified": {
          if (!artifacts) return this.fail(fingerprints, "Verified without artifacts");
          const done = this.persist("verified", fingerprints, null);
          if (!done.ok) return done;
          return Ok({ kind: "verified", record: done.value, artifacts });
        }
        case "failed":
          return this.fail(fingerprints, transition.reason);
        case "validating":
          // Only produced for runner errors, which validate() consumes itself
          return this.fail(fingerprints, "Unexpected revalidation outside validation");
        case "generating": {
          feedback = transition.feedback;
          this.attempt++;
          this.runnerRetries = 0;
          const next = this.persist("generating", [], summarizeFeedback(feedback));
          if (!next.ok) return next;
          if (token.isCancellationRequested) {
            return Ok({ kind: "interrupted", record: this.lastRecord });
          }
          log(`${unit.id}: retrying (attempt ${this.attempt}/${policy.maxAttempts}) after ${feedback.kind}`);
          break;
        }
      }
    }
  }

  private retryState(): RetryState {
    return { attempt: this.attempt, runnerRetries: this.runnerRetries };
  }

  /**
   * Validate one artifact set, revalidating on runner errors while the
   * infrastructure budget lasts.
   */
  private async validate(
    artifacts: ArtifactSet,
    fingerprints: ArtifactFingerprint[],
    feedback: Feedback | null
  ): Promise<
    Result<{ kind: "decided"; verdict: Verdict; transition: Transition } | { kind: "interrupted" }, StorageError>
  > {
    const { unit, token } = this.options;
    const recorded = this.persist("validating", fingerprints, feedback ? summarizeFeedback(feedback) : null);
    if (!recorded.ok) return recorded;

    for (;;) {
      const verdict = await this.deps.validator.validate(unit, artifacts);
      const transition = this.deps.policy.decide({ kind: "verdict", verdict }, this.retryState());
      if (transition.to !== "validating") {
        return Ok({ kind: "decided", verdict, transition });
      }

      this.runnerRetries++;
      const cause = verdict.kind === "runner-error" ? verdict.cause : verdict.kind;
      log(`${unit.id}: runner error (${cause}), revalidating in ${transition.delayMs}ms`);
      if (token.isCancellationRequested) {
        return Ok({ kind: "interrupted" });
      }
      await this.sleep(transition.delayMs);
      if (token.isCancellationRequested) {
        return Ok({ kind: "interrupted" });
      }
    }
  }

  /**
   * Ask the backend for artifacts. Refusals, throws, timeouts and missing
   * artifacts all come back as an incomplete generation.
   */
  private async generate(feedback: Feedback | null): Promise<Generated> {
    const { unit, token, sources, dependencies, generationTimeoutMs } = this.options;
    const abandon = new AbortController();
    const context = { attempt: this.attempt, sources, dependencies, token, signal: abandon.signal };

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => {
        abandon.abort();
        resolve("timeout");
      }, generationTimeoutMs);
    });

    try {
      const outcome = await Promise.race([this.deps.backend.generate(unit, context, feedback), timeout]);
      if (outcome === "timeout") {
        return { kind: "generation-incomplete", reason: `generation timed out after ${generationTimeoutMs}ms`, missing: [] };
      }
      if (outcome.kind === "refused") {
        return { kind: "generation-incomplete", reason: `backend refused: ${outcome.reason}`, missing: [] };
      }
      const generated = completeArtifactSet(outcome.artifacts, this.requiredRoles());
      if (generated.kind !== "complete" || !this.deps.guard) return generated;
      const problems = this.deps.guard.check(unit.id, generated.artifacts);
      if (problems.length > 0) {
        return { kind: "generation-incomplete", reason: `artifact paths rejected: ${problems.join("; ")}`, missing: [] };
      }
      return generated;
    } catch (e) {
      return { kind: "generation-incomplete", reason: `backend error: ${toError(e).message}`, missing: [] };
    } finally {
      clearTimeout(timer);
    }
  }

  private requiredRoles(): ArtifactRole[] {
    const roles: ArtifactRole[] = ["bindings", "implementation"];
    if (this.options.unit.requiresDifferentialTest && this.options.requireDifferentialTest !== false) {
      roles.push("differentialTest");
    }
    return roles;
  }

  private fail(fingerprints: ArtifactFingerprint[], reason: string): Result<TaskResult, StorageError> {
    const recorded = this.persist("failed", fingerprints, reason);
    if (!recorded.ok) return recorded;
    log(`${this.options.unit.id}: failed after ${this.attempt} attempt(s)`);
    return Ok({ kind: "failed", record: recorded.value });
  }

  private persist(
    status: PortingStatus,
    fingerprints: readonly ArtifactFingerprint[],
    error: string | null
  ): Result<CheckpointRecord, StorageError> {
    const result = this.deps.store.record(this.options.unit, status, this.attempt, fingerprints, error);
    if (!result.ok) return Err(result.error);
    this.lastRecord = result.value;
    this.options.onTransition?.(result.value);
    return result;
  }
}

/**
 * Check that every required artifact is present and non-empty.
 */
export function completeArtifactSet(partial: PartialArtifactSet, required: readonly ArtifactRole[]): Generated {
  const missing = required.filter((role) => {
    const artifact = partial[role];
    return !artifact || artifact.path.trim() === "" || artifact.content.trim() === "";
  });
  const { bindings, implementation, differentialTest } = partial;
  if (missing.length > 0 || !bindings || !implementation) {
    return {
      kind: "generation-incomplete",
      reason: `response is missing ${missing.join(", ")}`,
      missing,
    };
  }
  return {
    kind: "complete",
    artifacts: differentialTest ? { bindings, implementation, differentialTest } : { bindings, implementation },
  };
}

function unchanged(transition: Transition, previousAttempt: number): Transition {
  if (transition.to !== "generating") return transition;
  return {
    to: "generating",
    feedback: {
      kind: "unchanged-output",
      summary: `The output is identical to attempt ${previousAttempt}, which was rejected. ${transition.feedback.summary}`,
      diagnostics: transition.feedback.diagnostics,
    },
  };
}

function log(message: string): void {
  console.error(`[porter] ${message}`);
}
