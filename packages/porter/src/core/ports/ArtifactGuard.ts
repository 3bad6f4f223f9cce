import type { ArtifactSet, CheckpointRecord } from "../model.js";

/**
 * Decides whether a unit may write its artifacts where it asks to.
 */
export interface ArtifactGuard {
  /** Problems with the requested paths; empty when the set may be staged */
  check(unitId: string, artifacts: ArtifactSet): string[];
  /** Record the paths owned by units verified in earlier runs */
  adopt(records: readonly CheckpointRecord[]): void;
}
