/**
 * Lock manager for single-run guarantee.
 * Uses PID-based lock file with liveness checks so two processes never
 * run against the same checkpoints.
 */

import { readFileSync, unlinkSync, writeFileSync } from "node:fs";

import type { Result } from "@portwright/core";
import { Ok, Err, toError, tryCatch } from "@portwright/core";

import { RunInProgressError } from "./core/errors.js";

/**
 * Check if a PID is alive (exists as a process).
 */
export function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0); // Signal 0 = check existence
    return true;
  } catch (e) {
    // EPERM: the process exists but belongs to someone else
    return e instanceof Error && "code" in e && e.code === "EPERM";
  }
}

export class LockManager {
  private held = false;

  constructor(private readonly lockFile: string) {}

  get isHeld(): boolean {
    return this.held;
  }

  /**
   * Acquire the lock. A lock left by a dead process is taken over.
   */
  acquire(): Result<void, RunInProgressError | Error> {
    if (this.held) return Ok(undefined);
    try {
      writeFileSync(this.lockFile, String(process.pid), { flag: "wx" });
      this.held = true;
      return Ok(undefined);
    } catch (e) {
      if (!(e instanceof Error && "code" in e && e.code === "EEXIST")) {
        return Err(toError(e));
      }
    }

    const owner = tryCatch(() => Number.parseInt(readFileSync(this.lockFile, "utf-8"), 10));
    const ownerPid = owner.ok ? owner.value : Number.NaN;
    if (Number.isInteger(ownerPid) && ownerPid !== process.pid && isPidAlive(ownerPid)) {
      return Err(new RunInProgressError(`pid ${ownerPid}`));
    }

    // Owner dead or lock unreadable, take over
    try {
      writeFileSync(this.lockFile, String(process.pid));
      this.held = true;
      return Ok(undefined);
    } catch (e) {
      return Err(toError(e));
    }
  }

  release(): void {
    if (!this.held) return;
    this.held = false;
    try {
      unlinkSync(this.lockFile);
    } catch (e) {
      console.error(`[porter] Could not remove lock file ${this.lockFile}:`, toError(e).message);
    }
  }
}
