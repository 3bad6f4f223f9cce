import type { ArtifactSet, ProcessingUnit, Verdict } from "../model.js";

/**
 * Validates a unit's artifacts. Never throws: infrastructure trouble is a
 * `runner-error` verdict.
 */
export interface ValidationRunner {
  validate(unit: ProcessingUnit, artifacts: ArtifactSet): Promise<Verdict>;
}
