import type { Result } from "@portwright/core";
import type { ArtifactFingerprint, ArtifactSet } from "../model.js";

/**
 * Read access to artifacts that were committed to the target project.
 */
export interface ArtifactStore {
  read(fingerprints: readonly ArtifactFingerprint[]): Result<ArtifactSet, Error>;
}
