/**
 * SQLite persistence for checkpoint records.
 * One row per unit; every save is a single upsert statement.
 *
 * Use ":memory:" for testing, file path for production.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";

import type { CheckpointRecord } from "../../core/model.js";
import type { CheckpointRepository } from "../../core/ports/CheckpointRepository.js";
import { CheckpointRecordSchema } from "../../core/schemas.js";

const SCHEMA_FILE = fileURLToPath(new URL("../../../schema/checkpoints.sql", import.meta.url));

/** Row shape from SQLite */
interface CheckpointRow {
  unit_id: string;
  symbols: string;
  status: string;
  attempt: number;
  artifacts: string;
  last_error: string | null;
  updated_at: string;
}

export class SQLiteCheckpointRepository implements CheckpointRepository {
  private readonly db: Database.Database;
  private readonly stmtUpsert: Database.Statement;
  private readonly stmtGet: Database.Statement<[string], CheckpointRow>;
  private readonly stmtAll: Database.Statement<[], CheckpointRow>;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = FULL"); // A record must survive a crash once save returns
    this.db.exec(readFileSync(SCHEMA_FILE, "utf8"));

    this.stmtUpsert = this.db.prepare(`
      INSERT INTO checkpoints (unit_id, symbols, status, attempt, artifacts, last_error, updated_at)
      VALUES (@unitId, @symbols, @status, @attempt, @artifacts, @lastError, @updatedAt)
      ON CONFLICT(unit_id) DO UPDATE SET
        symbols = excluded.symbols,
        status = excluded.status,
        attempt = excluded.attempt,
        artifacts = excluded.artifacts,
        last_error = excluded.last_error,
        updated_at = excluded.updated_at
    `);
    this.stmtGet = this.db.prepare<[string], CheckpointRow>(`SELECT * FROM checkpoints WHERE unit_id = ?`);
    this.stmtAll = this.db.prepare<[], CheckpointRow>(`SELECT * FROM checkpoints ORDER BY unit_id`);
  }

  loadAll(): CheckpointRecord[] {
    return this.stmtAll.all().map(rowToRecord);
  }

  get(unitId: string): CheckpointRecord | null {
    const row = this.stmtGet.get(unitId);
    return row ? rowToRecord(row) : null;
  }

  save(record: CheckpointRecord): void {
    this.stmtUpsert.run({
      unitId: record.unitId,
      symbols: JSON.stringify(record.symbols),
      status: record.status,
      attempt: record.attempt,
      artifacts: JSON.stringify(record.artifacts),
      lastError: record.lastError,
      updatedAt: record.updatedAt,
    });
  }

  close(): void {
    this.db.close();
  }
}

function rowToRecord(row: CheckpointRow): CheckpointRecord {
  return CheckpointRecordSchema.parse({
    unitId: row.unit_id,
    symbols: JSON.parse(row.symbols),
    status: row.status,
    attempt: row.attempt,
    artifacts: JSON.parse(row.artifacts),
    lastError: row.last_error,
    updatedAt: row.updated_at,
  });
}
