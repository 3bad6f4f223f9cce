import type { Artifact, ArtifactRole, ArtifactSet, Feedback, PortSymbol, ProcessingUnit } from "../model.js";
import type { CancellationToken } from "../CancellationToken.js";

export interface SymbolSource {
  symbol: PortSymbol;
  text: string;
}

export interface DependencyArtifacts {
  unitId: string;
  artifacts: ArtifactSet;
}

export interface GenerationContext {
  /** 1-based attempt number this call belongs to */
  attempt: number;
  sources: SymbolSource[];
  /** Verified artifacts of every unit this one depends on */
  dependencies: DependencyArtifacts[];
  token: CancellationToken;
  /** Aborted once the task stops waiting for this call, e.g. on its generation timeout */
  signal: AbortSignal;
}

export type PartialArtifactSet = Partial<Record<ArtifactRole, Artifact>>;

export type GenerationOutcome =
  | { kind: "artifacts"; artifacts: PartialArtifactSet }
  | { kind: "refused"; reason: string };

/**
 * The code-generation collaborator. One call produces one artifact set
 * covering every symbol of the unit.
 */
export interface GenerationBackend {
  readonly name: string;
  generate(unit: ProcessingUnit, context: GenerationContext, feedback: Feedback | null): Promise<GenerationOutcome>;
}
