// Core domain
export * from "./core/model.js";
export * from "./core/errors.js";
export * from "./core/ports/index.js";
export { CancellationSource, NEVER_CANCELLED, type CancellationToken } from "./core/CancellationToken.js";
export { AsyncLock } from "./core/AsyncLock.js";
export { fingerprintArtifact, fingerprintArtifacts, sameFingerprints } from "./core/fingerprint.js";
export { formatFeedback, formatDiagnostic, summarizeFeedback } from "./core/feedback.js";
export { SymbolGraph, cycleIdFor, type GraphOptions } from "./core/graph/SymbolGraph.js";
export { stronglyConnectedComponents } from "./core/graph/scc.js";

// Services
export { CheckpointStore, type ResumePlan, type CheckpointStoreOptions } from "./core/services/CheckpointStore.js";
export {
  DefaultRetryPolicy,
  DEFAULT_RETRY_CONFIG,
  type RetryPolicy,
  type RetryConfig,
  type RetryState,
  type Transition,
  type AttemptOutcome,
} from "./core/services/RetryPolicy.js";
export { PortingTask, completeArtifactSet, type TaskResult, type PortingTaskOptions } from "./core/services/PortingTask.js";
export { Orchestrator, type OrchestratorDeps, type RunOptions, type ProgressEvent } from "./core/services/Orchestrator.js";
export { deriveStatuses, type DerivedStatus } from "./core/services/unitStatus.js";

// Infrastructure
export { JsonCheckpointRepository } from "./infrastructure/json/JsonCheckpointRepository.js";
export { SQLiteCheckpointRepository } from "./infrastructure/sqlite/SQLiteCheckpointRepository.js";
export { InMemoryCheckpointRepository } from "./infrastructure/memory/InMemoryCheckpointRepository.js";
export { NodeCommandExecutor } from "./infrastructure/runner/NodeCommandExecutor.js";
export { CommandValidationRunner, type ValidationSteps, type CommandStep } from "./infrastructure/validation/CommandValidationRunner.js";
export { parseDiagnostics } from "./infrastructure/validation/DiagnosticParser.js";
export { cleanOutput, compactOutput, truncateOutput, processOutput } from "./infrastructure/validation/cleanOutput.js";
export { ArtifactWorkspace, type StagedArtifacts } from "./infrastructure/workspace/ArtifactWorkspace.js";
export { CommandGenerationBackend, buildGenerationRequest } from "./infrastructure/generation/CommandGenerationBackend.js";
export { loadFacts, parseFacts, loadBuiltinTypes } from "./infrastructure/facts/FactsLoader.js";
export { FileSourceProvider } from "./infrastructure/source/FileSourceProvider.js";

// Facade, config and server
export { PortingService, type PortingServiceOverrides } from "./PortingService.js";
export { loadConfig, parseConfig, findConfigFile, CONFIG_FILE_NAME, type PortwrightConfig } from "./config.js";
export { registerAllTools } from "./tools/index.js";
export { createPortingService, main, SERVER_NAME, SERVER_VERSION } from "./server.js";
