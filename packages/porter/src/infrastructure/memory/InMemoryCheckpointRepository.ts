import type { CheckpointRecord } from "../../core/model.js";
import type { CheckpointRepository } from "../../core/ports/CheckpointRepository.js";

function copy(record: CheckpointRecord): CheckpointRecord {
  return { ...record, symbols: [...record.symbols], artifacts: record.artifacts.map((a) => ({ ...a })) };
}

export class InMemoryCheckpointRepository implements CheckpointRepository {
  private readonly records = new Map<string, CheckpointRecord>();

  /** Every save, in order */
  readonly history: CheckpointRecord[] = [];

  loadAll(): CheckpointRecord[] {
    return Array.from(this.records.values()).map(copy);
  }

  get(unitId: string): CheckpointRecord | null {
    const record = this.records.get(unitId);
    return record ? copy(record) : null;
  }

  save(record: CheckpointRecord): void {
    this.records.set(record.unitId, copy(record));
    this.history.push(copy(record));
  }

  close(): void {}

  clear(): void {
    this.records.clear();
    this.history.length = 0;
  }
}
