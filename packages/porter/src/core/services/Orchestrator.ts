/**
 * Orchestrator - walks the graph in dependency order and drives one
 * PortingTask per ready unit, up to the concurrency limit.
 *
 * It is the only coordinator: readiness, blocking and the run summary are
 * decided here. Durable state goes through the checkpoint store only.
 */

import { nanoid } from "nanoid";

import type { Result } from "@portwright/core";
import { Ok, Err, toError } from "@portwright/core";

import type {
  ArtifactSet,
  CheckpointRecord,
  FailureEntry,
  ProcessingUnit,
  RunCounts,
  RunSummary,
  UnitOutcome,
  UnitStatus,
} from "../model.js";
import type { CancellationToken } from "../CancellationToken.js";
import { NEVER_CANCELLED } from "../CancellationToken.js";
import type { PortingError, StorageError } from "../errors.js";
import type { SymbolGraph } from "../graph/SymbolGraph.js";
import type { ArtifactStore } from "../ports/ArtifactStore.js";
import type { ArtifactGuard } from "../ports/ArtifactGuard.js";
import type { DependencyArtifacts, GenerationBackend, SymbolSource } from "../ports/GenerationBackend.js";
import type { SourceProvider } from "../ports/SourceProvider.js";
import type { ValidationRunner } from "../ports/ValidationRunner.js";
import type { CheckpointStore, ResumePlan } from "./CheckpointStore.js";
import type { RetryPolicy } from "./RetryPolicy.js";
import type { TaskResult } from "./PortingTask.js";
import { PortingTask } from "./PortingTask.js";

export interface OrchestratorDeps {
  backend: GenerationBackend;
  validator: ValidationRunner;
  policy: RetryPolicy;
  sources: SourceProvider;
  /** Reloads verified artifacts recorded by an earlier run */
  artifacts: ArtifactStore;
  guard?: ArtifactGuard;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
}

export interface ProgressEvent {
  unitId: string;
  status: UnitStatus;
  attempt: number;
  /** Units settled so far in this run, skipped ones included */
  settled: number;
  total: number;
}

export interface RunOptions {
  concurrencyLimit: number;
  token?: CancellationToken;
  runId?: string;
  generationTimeoutMs?: number;
  requireDifferentialTest?: boolean;
  onProgress?: (event: ProgressEvent) => void;
}

export const DEFAULT_GENERATION_TIMEOUT_MS = 10 * 60 * 1000;

type Settled = "verified" | "failed" | "blocked";

type Emit = (unitId: string, status: UnitStatus, attempt: number) => void;

/**
 * Mutable bookkeeping of one run. Never persisted.
 */
class RunState {
  readonly status = new Map<string, UnitStatus>();
  readonly blockedBy = new Map<string, string>();
  readonly plans = new Map<string, ResumePlan>();
  readonly verifiedArtifacts = new Map<string, ArtifactSet>();
  readonly inFlight = new Map<string, Promise<void>>();
  settled = 0;
  storageError: StorageError | null = null;
  fatal: Error | null = null;

  isVerified(unitId: string): boolean {
    return this.status.get(unitId) === "verified";
  }

  isSettled(unitId: string): boolean {
    const status = this.status.get(unitId);
    return status === "verified" || status === "failed" || status === "blocked";
  }
}

export class Orchestrator {
  private readonly clock: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async run(graph: SymbolGraph, store: CheckpointStore, options: RunOptions): Promise<Result<RunSummary, PortingError>> {
    const token = options.token ?? NEVER_CANCELLED;
    const limit = Math.max(1, Math.floor(options.concurrencyLimit));
    const runId = options.runId ?? nanoid(12);
    const startedAt = this.clock().toISOString();
    const order = graph.order();

    const loaded = store.load();
    if (!loaded.ok) return Err(loaded.error);
    this.deps.guard?.adopt(store.all());

    const state = new RunState();
    for (const unit of order) {
      const plan = store.resumePlan(unit.id);
      state.plans.set(unit.id, plan);
      state.status.set(unit.id, plan.action === "skip" ? "verified" : plan.action === "exhausted" ? "failed" : "unstarted");
    }
    for (const unit of order) {
      if (state.status.get(unit.id) !== "failed") continue;
      for (const blocked of this.block(graph, state, unit.id)) state.status.set(blocked, "blocked");
    }

    const resumed = order.filter((u) => state.isSettled(u.id)).length;
    state.settled = resumed;
    log(`Run ${runId}: ${order.length} unit(s), ${resumed} already settled, concurrency ${limit}`);

    const emit: Emit = (unitId, status, attempt) => {
      options.onProgress?.({ unitId, status, attempt, settled: state.settled, total: order.length });
    };

    for (;;) {
      if (!state.storageError && !state.fatal && !token.isCancellationRequested) {
        for (const unit of order) {
          if (state.inFlight.size >= limit) break;
          if (this.isReady(unit, state)) {
            this.dispatch(unit, graph, store, state, options, token, emit);
          }
        }
      }
      if (state.inFlight.size === 0) break;
      await Promise.race(state.inFlight.values());
    }

    if (state.fatal) throw state.fatal;
    if (state.storageError) {
      log(`Run ${runId} aborted: ${state.storageError.message}`);
      return Err(state.storageError);
    }

    const summary = this.summarize(runId, startedAt, order, store, state, token.isCancellationRequested);
    log(
      `Run ${runId} ${summary.interrupted ? "interrupted" : "finished"}: ` +
        `${summary.counts.verified} verified, ${summary.counts.failed} failed, ` +
        `${summary.counts.blocked} blocked, ${summary.counts.pending} pending`
    );
    return Ok(summary);
  }

  private isReady(unit: ProcessingUnit, state: RunState): boolean {
    if (state.inFlight.has(unit.id) || state.isSettled(unit.id)) return false;
    return unit.dependencies.every((dep) => state.isVerified(dep));
  }

  private dispatch(
    unit: ProcessingUnit,
    graph: SymbolGraph,
    store: CheckpointStore,
    state: RunState,
    options: RunOptions,
    token: CancellationToken,
    emit: Emit
  ): void {
    const plan = state.plans.get(unit.id) ?? store.resumePlan(unit.id);
    const attemptsUsed = plan.action === "retry" || plan.action === "restart" ? plan.attemptsUsed : 0;
    const feedback = plan.action === "retry" || plan.action === "restart" ? plan.feedback : null;

    const work = async (): Promise<Result<TaskResult, StorageError>> => {
      const inputs = this.gatherInputs(unit, store, state);
      if (!inputs.ok) {
        const recorded = store.record(unit, "failed", attemptsUsed, [], inputs.error);
        if (!recorded.ok) return recorded;
        return Ok({ kind: "failed", record: recorded.value });
      }

      const task = new PortingTask(
        {
          store,
          backend: this.deps.backend,
          validator: this.deps.validator,
          policy: this.deps.policy,
          guard: this.deps.guard,
          sleep: this.deps.sleep,
        },
        {
          unit,
          attemptsUsed,
          feedback,
          sources: inputs.value.sources,
          dependencies: inputs.value.dependencies,
          isVerified: (id) => state.isVerified(id),
          token,
          generationTimeoutMs: options.generationTimeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS,
          requireDifferentialTest: options.requireDifferentialTest,
          onTransition: (record) => {
            state.status.set(unit.id, record.status);
            emit(unit.id, record.status, record.attempt);
          },
        }
      );
      return task.run();
    };

    const promise = work()
      .then((result) => this.complete(unit, result, graph, state, emit))
      .catch((error: unknown) => {
        state.fatal ??= toError(error);
      })
      .finally(() => {
        state.inFlight.delete(unit.id);
      });
    state.inFlight.set(unit.id, promise);
  }

  /**
   * Source text of every member and the verified artifacts of every
   * dependency. Artifacts from earlier runs are read back from disk.
   */
  private gatherInputs(
    unit: ProcessingUnit,
    store: CheckpointStore,
    state: RunState
  ): Result<{ sources: SymbolSource[]; dependencies: DependencyArtifacts[] }, string> {
    const sources: SymbolSource[] = [];
    for (const symbol of unit.symbols) {
      const text = this.deps.sources.read(symbol);
      if (!text.ok) {
        return Err(`Source of ${symbol.name} is unavailable: ${text.error.message}`);
      }
      sources.push({ symbol, text: text.value });
    }

    const dependencies: DependencyArtifacts[] = [];
    for (const dep of unit.dependencies) {
      let artifacts = state.verifiedArtifacts.get(dep);
      if (!artifacts) {
        const record = store.get(dep);
        const reloaded = this.deps.artifacts.read(record?.artifacts ?? []);
        if (!reloaded.ok) {
          return Err(`Verified artifacts of ${dep} are unavailable: ${reloaded.error.message}`);
        }
        artifacts = reloaded.value;
        state.verifiedArtifacts.set(dep, artifacts);
      }
      dependencies.push({ unitId: dep, artifacts });
    }

    return Ok({ sources, dependencies });
  }

  private complete(
    unit: ProcessingUnit,
    result: Result<TaskResult, StorageError>,
    graph: SymbolGraph,
    state: RunState,
    emit: Emit
  ): void {
    if (!result.ok) {
      state.storageError ??= result.error;
      return;
    }

    const outcome = result.value;
    switch (outcome.kind) {
      case "verified":
        state.verifiedArtifacts.set(unit.id, outcome.artifacts);
        this.settle(unit.id, "verified", state, outcome.record.attempt, emit);
        break;
      case "failed": {
        this.settle(unit.id, "failed", state, outcome.record.attempt, emit);
        for (const blocked of this.block(graph, state, unit.id)) {
          this.settle(blocked, "blocked", state, 0, emit);
        }
        break;
      }
      case "interrupted":
        log(`${unit.id} stopped at ${outcome.record?.status ?? "dispatch"} (interrupted)`);
        break;
    }
  }

  private settle(
    unitId: string,
    status: Settled,
    state: RunState,
    attempt: number,
    emit: Emit
  ): void {
    state.status.set(unitId, status);
    state.settled++;
    log(`[${state.settled}/${state.status.size}] ${unitId} -> ${status}`);
    emit(unitId, status, attempt);
  }

  /**
   * Record the failed unit as the block reason of every unsettled
   * transitive dependent and return those dependents.
   */
  private block(graph: SymbolGraph, state: RunState, failedId: string): string[] {
    const newlyBlocked: string[] = [];
    for (const dependent of graph.transitiveDependents(failedId)) {
      if (state.isSettled(dependent)) continue;
      state.blockedBy.set(dependent, failedId);
      newlyBlocked.push(dependent);
    }
    return newlyBlocked;
  }

  private summarize(
    runId: string,
    startedAt: string,
    order: readonly ProcessingUnit[],
    store: CheckpointStore,
    state: RunState,
    interrupted: boolean
  ): RunSummary {
    const counts: RunCounts = { verified: 0, failed: 0, blocked: 0, pending: 0 };
    const units: UnitOutcome[] = [];
    const failures: FailureEntry[] = [];

    for (const unit of order) {
      const record: CheckpointRecord | null = store.get(unit.id);
      const live = state.status.get(unit.id) ?? "unstarted";
      const status: UnitStatus = live === "verified" || live === "failed" || live === "blocked" ? live : (record?.status ?? "unstarted");

      switch (status) {
        case "verified":
          counts.verified++;
          break;
        case "failed":
          counts.failed++;
          break;
        case "blocked":
          counts.blocked++;
          break;
        default:
          counts.pending++;
      }

      const blockedBy = state.blockedBy.get(unit.id);
      const lastError = status === "blocked" ? `Blocked: dependency ${blockedBy ?? "unknown"} failed` : (record?.lastError ?? null);
      units.push({
        unitId: unit.id,
        symbols: unit.symbols.map((s) => s.name),
        status,
        attempts: record?.attempt ?? 0,
        lastError,
      });

      if (status === "failed") {
        failures.push({ unitId: unit.id, status, diagnostic: record?.lastError ?? "unknown failure" });
      } else if (status === "blocked") {
        failures.push({ unitId: unit.id, status, diagnostic: lastError ?? "", blockedBy });
      }
    }

    return {
      runId,
      startedAt,
      finishedAt: this.clock().toISOString(),
      interrupted,
      counts,
      units,
      failures,
    };
  }
}

function log(message: string): void {
  console.error(`[porter] ${message}`);
}
