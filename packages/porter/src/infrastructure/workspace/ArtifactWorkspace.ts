/**
 * The target project directory as seen by validation.
 *
 * Artifacts are staged in place, then committed when they pass or rolled
 * back to the previous file content when they do not, so later units only
 * ever compile against verified code. Each path belongs to the unit that
 * committed it.
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname, isAbsolute, relative, resolve, sep } from "node:path";

import type { Result } from "@portwright/core";
import { Ok, Err, toError } from "@portwright/core";

import type { Artifact, ArtifactFingerprint, ArtifactRole, ArtifactSet, CheckpointRecord } from "../../core/model.js";
import { ARTIFACT_ROLES } from "../../core/model.js";
import type { ArtifactGuard } from "../../core/ports/ArtifactGuard.js";
import type { ArtifactStore } from "../../core/ports/ArtifactStore.js";
import { fingerprintArtifact } from "../../core/fingerprint.js";

export interface WorkspaceOptions {
  projectDir: string;
  /** Directories, relative to the project, that artifacts may be written to. Empty allows the whole project. */
  writableRoots?: string[];
}

interface Snapshot {
  absolute: string;
  /** null when the file did not exist before staging */
  previous: string | null;
}

export interface StagedArtifacts {
  readonly unitId: string;
  readonly paths: readonly string[];
  commit(): void;
  rollback(): Result<void, Error>;
}

export class ArtifactWorkspace implements ArtifactStore, ArtifactGuard {
  readonly projectDir: string;
  private readonly roots: string[];
  private readonly owners = new Map<string, string>();
  private readonly staged = new Map<string, string>();

  constructor(options: WorkspaceOptions) {
    this.projectDir = resolve(options.projectDir);
    this.roots = (options.writableRoots ?? []).map((root) => resolve(this.projectDir, root));
  }

  check(unitId: string, artifacts: ArtifactSet): string[] {
    const problems: string[] = [];
    const seen = new Set<string>();
    for (const [role, artifact] of entries(artifacts)) {
      const located = this.locate(artifact.path);
      if (!located.ok) {
        problems.push(`${role}: ${located.error}`);
        continue;
      }
      const key = this.keyOf(located.value);
      if (seen.has(key)) {
        problems.push(`${role}: ${artifact.path} is used by more than one artifact`);
        continue;
      }
      seen.add(key);
      const owner = this.owners.get(key) ?? this.staged.get(key);
      if (owner !== undefined && owner !== unitId) {
        problems.push(`${role}: ${artifact.path} belongs to ${owner}`);
      }
    }
    return problems;
  }

  adopt(records: readonly CheckpointRecord[]): void {
    for (const record of records) {
      if (record.status !== "verified") continue;
      for (const artifact of record.artifacts) {
        const located = this.locate(artifact.path);
        if (located.ok) this.owners.set(this.keyOf(located.value), record.unitId);
      }
    }
  }

  ownerOf(path: string): string | undefined {
    const located = this.locate(path);
    return located.ok ? this.owners.get(this.keyOf(located.value)) : undefined;
  }

  /**
   * Write the artifacts into the project, remembering what they replace.
   * A failed write restores whatever was already written.
   */
  stage(unitId: string, artifacts: ArtifactSet): Result<StagedArtifacts, Error> {
    const problems = this.check(unitId, artifacts);
    if (problems.length > 0) {
      return Err(new Error(`Cannot stage ${unitId}: ${problems.join("; ")}`));
    }

    const snapshots: Snapshot[] = [];
    const keys: string[] = [];
    try {
      for (const [, artifact] of entries(artifacts)) {
        const located = this.locate(artifact.path);
        if (!located.ok) throw new Error(located.error);
        const absolute = located.value;
        snapshots.push({ absolute, previous: existsSync(absolute) ? readFileSync(absolute, "utf-8") : null });
        mkdirSync(dirname(absolute), { recursive: true });
        writeFileSync(absolute, artifact.content);
        const key = this.keyOf(absolute);
        this.staged.set(key, unitId);
        keys.push(key);
      }
    } catch (e) {
      const restored = restore(snapshots);
      this.release(keys);
      const error = toError(e);
      return Err(restored.ok ? error : new Error(`${error.message}; rollback also failed: ${restored.error.message}`));
    }

    let settled = false;
    return Ok({
      unitId,
      paths: keys,
      commit: () => {
        if (settled) return;
        settled = true;
        for (const key of keys) this.owners.set(key, unitId);
        this.release(keys);
      },
      rollback: () => {
        if (settled) return Ok(undefined);
        settled = true;
        const restored = restore(snapshots);
        this.release(keys);
        return restored;
      },
    });
  }

  /**
   * Read committed artifacts back. A file edited since it was verified is
   * returned as it is now, with a warning.
   */
  read(fingerprints: readonly ArtifactFingerprint[]): Result<ArtifactSet, Error> {
    const found: Partial<Record<ArtifactRole, Artifact>> = {};
    for (const entry of fingerprints) {
      const located = this.locate(entry.path);
      if (!located.ok) return Err(new Error(located.error));
      if (!existsSync(located.value)) {
        return Err(new Error(`${entry.path} no longer exists`));
      }
      const content = readFileSync(located.value, "utf-8");
      if (fingerprintArtifact(entry.role, entry.path, content) !== entry.fingerprint) {
        console.error(`[porter] ${entry.path} changed since it was verified; using the current content`);
      }
      found[entry.role] = { path: entry.path, content };
    }

    const { bindings, implementation, differentialTest } = found;
    if (!bindings || !implementation) {
      return Err(new Error("checkpoint lists no bindings or implementation artifact"));
    }
    return Ok(differentialTest ? { bindings, implementation, differentialTest } : { bindings, implementation });
  }

  private locate(path: string): Result<string, string> {
    if (path.trim() === "") return Err("empty path");
    if (isAbsolute(path)) return Err(`${path} must be relative to the project`);
    const absolute = resolve(this.projectDir, path);
    if (!isInside(this.projectDir, absolute)) {
      return Err(`${path} escapes the project directory`);
    }
    if (this.roots.length > 0 && !this.roots.some((root) => isInside(root, absolute))) {
      return Err(`${path} is outside the writable roots`);
    }
    return Ok(absolute);
  }

  private keyOf(absolute: string): string {
    return relative(this.projectDir, absolute).split(sep).join("/");
  }

  private release(keys: readonly string[]): void {
    for (const key of keys) this.staged.delete(key);
  }
}

function entries(artifacts: ArtifactSet): [ArtifactRole, Artifact][] {
  const result: [ArtifactRole, Artifact][] = [];
  for (const role of ARTIFACT_ROLES) {
    const artifact = artifacts[role];
    if (artifact) result.push([role, artifact]);
  }
  return result;
}

function isInside(root: string, target: string): boolean {
  const rel = relative(root, target);
  return rel === "" || (rel !== ".." && !rel.startsWith(".." + sep) && !isAbsolute(rel));
}

/**
 * Put files back as they were, newest first.
 */
function restore(snapshots: readonly Snapshot[]): Result<void, Error> {
  const failures: string[] = [];
  for (const snapshot of [...snapshots].reverse()) {
    try {
      if (snapshot.previous === null) {
        rmSync(snapshot.absolute, { force: true });
      } else {
        writeFileSync(snapshot.absolute, snapshot.previous);
      }
    } catch (e) {
      failures.push(`${snapshot.absolute}: ${toError(e).message}`);
    }
  }
  return failures.length > 0 ? Err(new Error(`rollback failed for ${failures.join(", ")}`)) : Ok(undefined);
}
