/**
 * PortingService - operator facade over the engine.
 *
 * Owns the configuration, the checkpoint store and at most one background
 * run. The MCP tools and the server talk to this class only.
 */

import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { nanoid } from "nanoid";

import type { Result } from "@portwright/core";
import { Ok, Err, toError } from "@portwright/core";

import type { CheckpointRecord, ProcessingUnit, RunCounts, RunSummary, UnitStatus } from "./core/model.js";
import { CancellationSource } from "./core/CancellationToken.js";
import { ConfigError, RunInProgressError, StorageError, UnknownUnitError } from "./core/errors.js";
import type { MalformedGraphError, PortingError } from "./core/errors.js";
import { SymbolGraph } from "./core/graph/SymbolGraph.js";
import type { CheckpointRepository } from "./core/ports/CheckpointRepository.js";
import type { CommandExecutor } from "./core/ports/CommandExecutor.js";
import type { GenerationBackend } from "./core/ports/GenerationBackend.js";
import type { SourceProvider } from "./core/ports/SourceProvider.js";
import type { ValidationRunner } from "./core/ports/ValidationRunner.js";
import { CheckpointStore } from "./core/services/CheckpointStore.js";
import { Orchestrator } from "./core/services/Orchestrator.js";
import type { ProgressEvent } from "./core/services/Orchestrator.js";
import { DefaultRetryPolicy } from "./core/services/RetryPolicy.js";
import { deriveStatuses } from "./core/services/unitStatus.js";
import type { DerivedStatus } from "./core/services/unitStatus.js";
import type { PortwrightConfig } from "./config.js";
import { LockManager } from "./LockManager.js";
import { loadBuiltinTypes, loadFacts } from "./infrastructure/facts/FactsLoader.js";
import { CommandGenerationBackend } from "./infrastructure/generation/CommandGenerationBackend.js";
import { JsonCheckpointRepository } from "./infrastructure/json/JsonCheckpointRepository.js";
import { NodeCommandExecutor } from "./infrastructure/runner/NodeCommandExecutor.js";
import { FileSourceProvider } from "./infrastructure/source/FileSourceProvider.js";
import { SQLiteCheckpointRepository } from "./infrastructure/sqlite/SQLiteCheckpointRepository.js";
import { CommandValidationRunner } from "./infrastructure/validation/CommandValidationRunner.js";
import { ArtifactWorkspace } from "./infrastructure/workspace/ArtifactWorkspace.js";

export interface ValidatorContext {
  graph: SymbolGraph;
  workspace: ArtifactWorkspace;
  config: PortwrightConfig;
}

/**
 * Collaborators that replace the configured ones, mostly for tests.
 */
export interface PortingServiceOverrides {
  backend?: GenerationBackend;
  createValidator?: (context: ValidatorContext) => ValidationRunner;
  executor?: CommandExecutor;
  repository?: CheckpointRepository;
  sources?: SourceProvider;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
}

export interface PlanResult {
  symbolCount: number;
  unitCount: number;
  cycleCount: number;
  units: ProcessingUnit[];
}

export interface UnitStatusReport {
  unitId: string;
  symbols: string[];
  status: UnitStatus;
  dependencies: string[];
  blockedBy: string | null;
  record: CheckpointRecord | null;
}

export interface ProgressReport {
  runId: string | null;
  running: boolean;
  total: number;
  counts: RunCounts;
  /** Units currently generating or validating */
  active: string[];
}

interface ActiveRun {
  runId: string;
  startedAt: string;
  cancellation: CancellationSource;
  live: Map<string, UnitStatus>;
  promise: Promise<Result<RunSummary, Error>>;
}

const LOCK_FILE = "porter.lock";

export class PortingService {
  private store: CheckpointStore | null = null;
  private graph: SymbolGraph | null = null;
  private active: ActiveRun | null = null;
  private summary: RunSummary | null = null;
  private lastError: Error | null = null;
  private readonly lock: LockManager;
  private readonly policy: DefaultRetryPolicy;
  private readonly clock: () => Date;

  constructor(
    readonly config: PortwrightConfig,
    private readonly overrides: PortingServiceOverrides = {}
  ) {
    this.lock = new LockManager(join(config.dataDir, LOCK_FILE));
    this.policy = new DefaultRetryPolicy(config.retry);
    this.clock = overrides.clock ?? (() => new Date());
  }

  /**
   * Load the facts, build the graph and return the processing order.
   */
  plan(): Result<PlanResult, MalformedGraphError | ConfigError> {
    const built = this.buildGraph();
    if (!built.ok) return built;
    const graph = built.value;
    const units = [...graph.order()];
    return Ok({
      symbolCount: graph.symbolCount,
      unitCount: graph.unitCount,
      cycleCount: units.filter((u) => u.isCycle).length,
      units,
    });
  }

  /**
   * Start or resume a run in the background.
   */
  start(): Result<{ runId: string; total: number }, PortingError | Error> {
    if (this.active) return Err(new RunInProgressError(this.active.runId));

    const built = this.buildGraph();
    if (!built.ok) return built;
    const graph = built.value;

    const store = this.openStore();
    if (!store.ok) return store;

    const workspace = new ArtifactWorkspace({
      projectDir: this.config.projectDir,
      writableRoots: this.config.writableRoots,
    });
    const collaborators = this.collaborators(graph, workspace);
    if (!collaborators.ok) return collaborators;

    const locked = this.lock.acquire();
    if (!locked.ok) return locked;

    const runId = nanoid(12);
    const cancellation = new CancellationSource();
    const live = new Map<string, UnitStatus>();
    const orchestrator = new Orchestrator({
      backend: collaborators.value.backend,
      validator: collaborators.value.validator,
      policy: this.policy,
      sources: this.overrides.sources ?? new FileSourceProvider(this.config.sourceDir),
      artifacts: workspace,
      guard: workspace,
      sleep: this.overrides.sleep,
      clock: this.clock,
    });

    const promise = orchestrator
      .run(graph, store.value, {
        concurrencyLimit: this.config.concurrency,
        token: cancellation.token,
        runId,
        generationTimeoutMs: this.config.generation?.timeoutMs,
        requireDifferentialTest: this.config.validation ? this.config.validation.differentialTest !== undefined : true,
        onProgress: (event: ProgressEvent) => {
          live.set(event.unitId, event.status);
        },
      })
      .then((result): Result<RunSummary, Error> => result)
      .catch((error: unknown): Result<RunSummary, Error> => Err(toError(error)))
      .then((result) => {
        if (result.ok) {
          this.summary = result.value;
          this.lastError = null;
        } else {
          this.lastError = result.error;
          console.error(`[porter] Run ${runId} failed: ${result.error.message}`);
        }
        this.active = null;
        this.lock.release();
        return result;
      });

    this.active = { runId, startedAt: this.clock().toISOString(), cancellation, live, promise };
    return Ok({ runId, total: graph.unitCount });
  }

  /**
   * Status of one unit, looked up by unit id or by member symbol name.
   */
  status(unitOrSymbol: string): Result<UnitStatusReport, PortingError> {
    const graph = this.graph ? Ok(this.graph) : this.buildGraph();
    if (!graph.ok) return graph;
    const unit = graph.value.unit(unitOrSymbol) ?? graph.value.unitOf(unitOrSymbol);
    if (!unit) return Err(new UnknownUnitError(unitOrSymbol));

    const store = this.openStore();
    if (!store.ok) return store;
    if (!this.active) {
      const loaded = store.value.load();
      if (!loaded.ok) return loaded;
    }

    const derived = deriveStatuses(graph.value, (id) => store.value.get(id)).get(unit.id);
    const live = this.active?.live.get(unit.id);
    return Ok({
      unitId: unit.id,
      symbols: unit.symbols.map((s) => s.name),
      status: live ?? derived?.status ?? "unstarted",
      dependencies: [...unit.dependencies],
      blockedBy: derived?.blockedBy ?? null,
      record: store.value.get(unit.id),
    });
  }

  progress(): ProgressReport {
    const counts: RunCounts = { verified: 0, failed: 0, blocked: 0, pending: 0 };
    if (!this.active || !this.graph) {
      const last = this.summary;
      return {
        runId: last?.runId ?? null,
        running: false,
        total: last ? last.units.length : 0,
        counts: last ? { ...last.counts } : counts,
        active: [],
      };
    }

    const graph = this.graph;
    const store = this.store;
    const derived = store ? deriveStatuses(graph, (id) => store.get(id)) : new Map<string, DerivedStatus>();
    const active: string[] = [];
    for (const unit of graph.order()) {
      const status: UnitStatus = this.active.live.get(unit.id) ?? derived.get(unit.id)?.status ?? "unstarted";
      if (status === "verified") counts.verified++;
      else if (status === "failed") counts.failed++;
      else if (status === "blocked") counts.blocked++;
      else counts.pending++;
      if (status === "generating" || status === "validating") active.push(unit.id);
    }
    return { runId: this.active.runId, running: true, total: graph.unitCount, counts, active };
  }

  /**
   * Ask the current run to stop at its next checkpoint boundary.
   */
  cancel(reason = "cancelled by operator"): boolean {
    if (!this.active) return false;
    this.active.cancellation.cancel(reason);
    console.error(`[porter] Cancellation requested for run ${this.active.runId}: ${reason}`);
    return true;
  }

  lastSummary(): RunSummary | null {
    return this.summary;
  }

  lastRunError(): Error | null {
    return this.lastError;
  }

  get isRunning(): boolean {
    return this.active !== null;
  }

  /**
   * Resolves when the current run ends; null when nothing is running.
   */
  async waitForRun(): Promise<Result<RunSummary, Error> | null> {
    return this.active ? this.active.promise : null;
  }

  /**
   * Force a unit back to `unstarted`. Not allowed while a run is active.
   */
  resetUnit(unitId: string): Result<CheckpointRecord, PortingError> {
    if (this.active) return Err(new RunInProgressError(this.active.runId));
    const store = this.openStore();
    if (!store.ok) return store;
    const loaded = store.value.load();
    if (!loaded.ok) return loaded;

    const graph = this.graph ? Ok(this.graph) : this.buildGraph();
    const unit = graph.ok ? (graph.value.unit(unitId) ?? graph.value.unitOf(unitId)) : undefined;
    const id = unit?.id ?? unitId;
    if (!unit && !store.value.get(id)) return Err(new UnknownUnitError(unitId));
    return store.value.reset(id);
  }

  /**
   * Cancel the current run, wait for it to reach a checkpoint boundary and
   * release every resource.
   */
  async dispose(): Promise<void> {
    if (this.active) {
      this.cancel("shutting down");
      await this.active.promise;
    }
    this.lock.release();
    this.store?.close();
    this.store = null;
  }

  private buildGraph(): Result<SymbolGraph, MalformedGraphError | ConfigError> {
    const facts = loadFacts(this.config.factsFile);
    if (!facts.ok) return facts;
    const externals = [...loadBuiltinTypes(), ...this.config.externals, ...facts.value.externals];
    const graph = SymbolGraph.build(facts.value.facts, { externals });
    if (graph.ok) {
      // The graph of a running run stays in place until it ends
      if (!this.active) this.graph = graph.value;
    }
    return graph;
  }

  private openStore(): Result<CheckpointStore, StorageError> {
    if (this.store) return Ok(this.store);
    try {
      mkdirSync(this.config.dataDir, { recursive: true });
      const repository =
        this.overrides.repository ??
        (this.config.checkpoint.backend === "sqlite"
          ? new SQLiteCheckpointRepository(join(this.config.dataDir, "checkpoints.db"))
          : new JsonCheckpointRepository(join(this.config.dataDir, "checkpoints")));
      this.store = new CheckpointStore(repository, { maxAttempts: this.policy.maxAttempts, clock: this.clock });
      return Ok(this.store);
    } catch (e) {
      return Err(new StorageError("open", e));
    }
  }

  private collaborators(
    graph: SymbolGraph,
    workspace: ArtifactWorkspace
  ): Result<{ backend: GenerationBackend; validator: ValidationRunner }, ConfigError> {
    const executor = this.overrides.executor ?? new NodeCommandExecutor();

    let backend = this.overrides.backend;
    if (!backend) {
      if (!this.config.generation) {
        return Err(new ConfigError("No generation command configured (generation.command)"));
      }
      backend = new CommandGenerationBackend(
        { command: this.config.generation.command, timeoutMs: this.config.generation.timeoutMs, cwd: this.config.projectDir },
        executor
      );
    }

    let validator: ValidationRunner;
    if (this.overrides.createValidator) {
      validator = this.overrides.createValidator({ graph, workspace, config: this.config });
    } else if (this.config.validation) {
      validator = new CommandValidationRunner(this.config.validation, workspace, executor, {
        hasDependents: (unitId) => graph.hasDependents(unitId),
      });
    } else {
      return Err(new ConfigError("No validation commands configured (validation.isolatedCompile)"));
    }

    return Ok({ backend, validator });
  }
}
