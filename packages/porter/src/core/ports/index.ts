export type { CheckpointRepository } from "./CheckpointRepository.js";
export type {
  GenerationBackend,
  GenerationContext,
  GenerationOutcome,
  PartialArtifactSet,
  SymbolSource,
  DependencyArtifacts,
} from "./GenerationBackend.js";
export type { ValidationRunner } from "./ValidationRunner.js";
export type { CommandExecutor, CommandRequest, CommandOutput } from "./CommandExecutor.js";
export type { SourceProvider } from "./SourceProvider.js";
export type { ArtifactStore } from "./ArtifactStore.js";
export type { ArtifactGuard } from "./ArtifactGuard.js";
