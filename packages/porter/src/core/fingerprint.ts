import { createHash } from "node:crypto";

import type { ArtifactFingerprint, ArtifactRole, ArtifactSet } from "./model.js";
import { ARTIFACT_ROLES } from "./model.js";

export function fingerprintArtifact(role: ArtifactRole, path: string, content: string): string {
  return createHash("sha256")
    .update(role)
    .update("\0")
    .update(path)
    .update("\0")
    .update(content)
    .digest("hex");
}

/**
 * Fingerprints of every artifact present in the set, in role order.
 */
export function fingerprintArtifacts(artifacts: ArtifactSet): ArtifactFingerprint[] {
  const result: ArtifactFingerprint[] = [];
  for (const role of ARTIFACT_ROLES) {
    const artifact = artifacts[role];
    if (!artifact) continue;
    result.push({ role, path: artifact.path, fingerprint: fingerprintArtifact(role, artifact.path, artifact.content) });
  }
  return result;
}

export function sameFingerprints(a: readonly ArtifactFingerprint[], b: readonly ArtifactFingerprint[]): boolean {
  if (a.length === 0 || a.length !== b.length) return false;
  return a.every(
    (entry, i) => entry.role === b[i]?.role && entry.path === b[i]?.path && entry.fingerprint === b[i]?.fingerprint
  );
}
