import type { CheckpointRecord } from "../model.js";

/**
 * Durable storage for checkpoint records, one per unit.
 *
 * Implementations throw on I/O failure; the checkpoint store turns that
 * into a StorageError. `save` must be atomic: after a crash the previous
 * record or the new one is visible, never a mix.
 */
export interface CheckpointRepository {
  loadAll(): CheckpointRecord[];
  get(unitId: string): CheckpointRecord | null;
  save(record: CheckpointRecord): void;
  close(): void;
}
