/**
 * CheckpointStore - the single writer of durable porting state.
 *
 * Keeps an in-memory view of every record and writes through to the
 * repository on each transition. Nothing else persists run state.
 */

import type { Result } from "@portwright/core";
import { Ok, Err, tryCatch } from "@portwright/core";

import type {
  ArtifactFingerprint,
  CheckpointRecord,
  Feedback,
  PortingStatus,
  ProcessingUnit,
} from "../model.js";
import type { CheckpointRepository } from "../ports/CheckpointRepository.js";
import { StorageError } from "../errors.js";

export type Clock = () => Date;

export interface CheckpointStoreOptions {
  /** Attempt budget used to decide whether a failed unit is retried */
  maxAttempts: number;
  clock?: Clock;
}

/**
 * What a run does with a unit, given its stored record.
 */
export type ResumePlan =
  | { action: "start"; attemptsUsed: 0; feedback: null }
  | { action: "skip"; record: CheckpointRecord }
  | { action: "retry"; attemptsUsed: number; feedback: Feedback | null; record: CheckpointRecord }
  | { action: "restart"; attemptsUsed: number; feedback: Feedback | null; record: CheckpointRecord }
  | { action: "exhausted"; record: CheckpointRecord };

export class CheckpointStore {
  private readonly records = new Map<string, CheckpointRecord>();
  private readonly clock: Clock;
  private loaded = false;

  constructor(
    private readonly repository: CheckpointRepository,
    private readonly options: CheckpointStoreOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  get maxAttempts(): number {
    return this.options.maxAttempts;
  }

  /**
   * Read every record from the repository. Empty on a first run.
   */
  load(): Result<ReadonlyMap<string, CheckpointRecord>, StorageError> {
    const result = tryCatch(() => this.repository.loadAll());
    if (!result.ok) {
      return Err(new StorageError("load", result.error));
    }
    this.records.clear();
    for (const record of result.value) {
      this.records.set(record.unitId, record);
    }
    this.loaded = true;
    return Ok(this.records);
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  /**
   * Durably upsert the record for a unit.
   */
  record(
    unit: ProcessingUnit,
    status: PortingStatus,
    attempt: number,
    artifacts: readonly ArtifactFingerprint[],
    error: string | null
  ): Result<CheckpointRecord, StorageError> {
    return this.write({
      unitId: unit.id,
      symbols: unit.symbols.map((s) => s.name),
      status,
      attempt,
      artifacts: [...artifacts],
      lastError: error,
      updatedAt: this.clock().toISOString(),
    });
  }

  get(unitId: string): CheckpointRecord | null {
    return this.records.get(unitId) ?? null;
  }

  all(): CheckpointRecord[] {
    return [...this.records.values()];
  }

  /**
   * False only for a unit that failed with no attempts left.
   */
  isResumable(unitId: string): boolean {
    return this.resumePlan(unitId).action !== "exhausted";
  }

  resumePlan(unitId: string): ResumePlan {
    const record = this.records.get(unitId);
    if (!record) {
      return { action: "start", attemptsUsed: 0, feedback: null };
    }

    switch (record.status) {
      case "unstarted":
        return { action: "start", attemptsUsed: 0, feedback: null };
      case "verified":
        return { action: "skip", record };
      case "failed":
        if (record.attempt < this.options.maxAttempts) {
          return { action: "retry", attemptsUsed: record.attempt, feedback: resumedFeedback(record), record };
        }
        return { action: "exhausted", record };
      case "generating":
      case "validating":
        // The interrupted attempt is redone, not counted twice
        return {
          action: "restart",
          attemptsUsed: Math.max(0, record.attempt - 1),
          feedback: resumedFeedback(record),
          record,
        };
    }
  }

  /**
   * Operator action: put a unit back to `unstarted`.
   */
  reset(unitId: string): Result<CheckpointRecord, StorageError> {
    const existing = this.records.get(unitId);
    return this.write({
      unitId,
      symbols: existing?.symbols ?? [],
      status: "unstarted",
      attempt: 0,
      artifacts: [],
      lastError: null,
      updatedAt: this.clock().toISOString(),
    });
  }

  close(): void {
    this.repository.close();
  }

  private write(record: CheckpointRecord): Result<CheckpointRecord, StorageError> {
    const result = tryCatch(() => this.repository.save(record));
    if (!result.ok) {
      return Err(new StorageError("write", result.error));
    }
    this.records.set(record.unitId, record);
    return Ok(record);
  }
}

function resumedFeedback(record: CheckpointRecord): Feedback | null {
  if (!record.lastError) return null;
  return { kind: "resumed", summary: record.lastError, diagnostics: [] };
}
