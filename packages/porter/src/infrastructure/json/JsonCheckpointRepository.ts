/**
 * One JSON file per unit under the checkpoint directory.
 *
 * Records are plain, pretty-printed JSON so an operator can inspect them or
 * edit a status by hand between runs. Writes go through a temp file that is
 * fsynced and renamed over the target.
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readdirSync,
  readFileSync,
  renameSync,
  unlinkSync,
  writeSync,
} from "node:fs";
import { createHash } from "node:crypto";
import { join } from "node:path";

import type { CheckpointRecord } from "../../core/model.js";
import type { CheckpointRepository } from "../../core/ports/CheckpointRepository.js";
import { CheckpointRecordSchema } from "../../core/schemas.js";

const RECORD_SUFFIX = ".json";
const TMP_SUFFIX = ".tmp";

/** Longest encoded id used verbatim; file systems cap names at 255 bytes */
const MAX_READABLE_NAME = 120;
const HASHED_PREFIX_LENGTH = 60;

/**
 * Short ids map to their URI encoding. Long ones (large cycles) keep a
 * readable prefix followed by a sha256 of the full id; the id itself is
 * stored inside the record.
 */
export function recordFileName(unitId: string): string {
  const encoded = encodeURIComponent(unitId);
  if (encoded.length <= MAX_READABLE_NAME) return encoded + RECORD_SUFFIX;
  const digest = createHash("sha256").update(unitId).digest("hex");
  return `${encoded.slice(0, HASHED_PREFIX_LENGTH)}~${digest}${RECORD_SUFFIX}`;
}

export class JsonCheckpointRepository implements CheckpointRepository {
  constructor(private readonly dir: string) {
    mkdirSync(dir, { recursive: true });
  }

  /**
   * Read every record. Leftover temp files from an interrupted write are
   * removed; an unreadable record fails the whole load.
   */
  loadAll(): CheckpointRecord[] {
    const records: CheckpointRecord[] = [];
    for (const entry of readdirSync(this.dir).sort()) {
      if (entry.endsWith(TMP_SUFFIX)) {
        unlinkSync(join(this.dir, entry));
        continue;
      }
      if (!entry.endsWith(RECORD_SUFFIX)) continue;
      records.push(this.readFile(join(this.dir, entry)));
    }
    return records;
  }

  get(unitId: string): CheckpointRecord | null {
    const file = join(this.dir, recordFileName(unitId));
    if (!existsSync(file)) return null;
    const record = this.readFile(file);
    if (record.unitId !== unitId) {
      throw new Error(`${file} holds the record of ${record.unitId}, expected ${unitId}`);
    }
    return record;
  }

  save(record: CheckpointRecord): void {
    const target = join(this.dir, recordFileName(record.unitId));
    const tmp = target + "." + process.pid + TMP_SUFFIX;
    const data = JSON.stringify(record, null, 2) + "\n";

    const fd = openSync(tmp, "w");
    try {
      writeSync(fd, data);
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tmp, target); // Atomic on POSIX
  }

  close(): void {}

  private readFile(file: string): CheckpointRecord {
    const raw = readFileSync(file, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new Error(`${file} is not valid JSON`, { cause: e });
    }
    const result = CheckpointRecordSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(`${file} is not a checkpoint record: ${result.error.issues.map((i) => i.message).join("; ")}`);
    }
    return result.data;
  }
}
