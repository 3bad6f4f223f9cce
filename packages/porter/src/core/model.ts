/**
 * Core domain model for the porter.
 *
 * Design principles:
 * - The symbol graph is built once per run and never mutated
 * - The checkpoint store is the only durable state
 * - Every transition of a unit is persisted before the next step starts
 * - Defects and infrastructure errors are distinct values, never exceptions
 */

export type SymbolKind = "function" | "struct" | "enum" | "typedef" | "macro-constant";

export interface SourceLocation {
  /** File path relative to the source project */
  file: string;
  /** 1-indexed first line of the definition */
  line: number;
  /** 1-indexed last line of the definition, when the analyzer knows it */
  endLine?: number;
}

/**
 * One record from the source analyzer.
 */
export interface ParsedFact {
  name: string;
  kind: SymbolKind;
  location: SourceLocation;
  isCycle: boolean;
  isStatic: boolean;
  dependencies: string[];
}

/**
 * A unit of translation, resolved against the rest of the graph.
 */
export interface PortSymbol {
  readonly name: string;
  readonly kind: SymbolKind;
  readonly location: SourceLocation;
  /** Resolved dependencies, in analyzer order, without self edges */
  readonly dependencies: readonly string[];
  readonly isStatic: boolean;
  /** Shared by every member of a mutual-dependency cycle */
  readonly cycleId: string | null;
  /** Position of the fact in the analyzer output */
  readonly sourceOrder: number;
  /** The analyzer listed the symbol among its own dependencies */
  readonly selfReferential: boolean;
}

/**
 * A single symbol or a collapsed cycle: the granule the orchestrator schedules.
 */
export interface ProcessingUnit {
  readonly id: string;
  /** Members in source order */
  readonly symbols: readonly PortSymbol[];
  /** Ids of the units this one depends on */
  readonly dependencies: readonly string[];
  /** Declared external names referenced by any member */
  readonly externalDependencies: readonly string[];
  readonly sourceOrder: number;
  readonly isCycle: boolean;
  /** Units containing a function get a differential test */
  readonly requiresDifferentialTest: boolean;
}

/**
 * Persisted status of a unit.
 *
 * - unstarted: nothing attempted (or reset by an operator)
 * - generating: an attempt was started; its artifacts are not durable
 * - validating: the attempt's artifacts were produced and are being checked
 * - verified: artifacts passed every validation step
 * - failed: retry budget exhausted
 */
export type PortingStatus = "unstarted" | "generating" | "validating" | "verified" | "failed";

/** Derived, never persisted: a dependency failed terminally. */
export type UnitStatus = PortingStatus | "blocked";

export type ArtifactRole = "bindings" | "implementation" | "differentialTest";

export const ARTIFACT_ROLES: readonly ArtifactRole[] = [
  "bindings",
  "implementation",
  "differentialTest",
];

export interface Artifact {
  /** Path relative to the target project directory */
  path: string;
  content: string;
}

/**
 * Generated outputs for one unit.
 */
export interface ArtifactSet {
  bindings: Artifact;
  implementation: Artifact;
  differentialTest?: Artifact;
}

export interface ArtifactFingerprint {
  role: ArtifactRole;
  path: string;
  /** sha256 of role, path and content */
  fingerprint: string;
}

/**
 * Durable per-unit snapshot. One record per unit, keyed by unit id.
 */
export interface CheckpointRecord {
  unitId: string;
  symbols: string[];
  status: PortingStatus;
  /** Generation attempts started so far */
  attempt: number;
  artifacts: ArtifactFingerprint[];
  /** Last diagnostic, also the feedback for the next attempt */
  lastError: string | null;
  /** ISO timestamp of the last write */
  updatedAt: string;
}

export type DiagnosticSeverity = "error" | "warning" | "note";

/**
 * One compiler message, located when the compiler says where.
 */
export interface Diagnostic {
  severity: DiagnosticSeverity;
  message: string;
  code?: string;
  file?: string;
  line?: number;
  column?: number;
}

/**
 * Outcome of validating an artifact set.
 */
export type Verdict =
  | { kind: "pass" }
  | { kind: "compile-failure"; step: "isolated" | "linked"; diagnostics: Diagnostic[]; output: string }
  | { kind: "behavioral-mismatch"; diffSummary: string }
  | { kind: "runner-error"; cause: string };

/**
 * The generation backend did not produce a usable artifact set.
 */
export interface GenerationIncomplete {
  kind: "generation-incomplete";
  reason: string;
  missing: ArtifactRole[];
}

export type FeedbackKind =
  | "compile-failure"
  | "behavioral-mismatch"
  | "generation-incomplete"
  | "unchanged-output"
  | "resumed";

/**
 * What went wrong in the previous attempt, handed to the next one.
 */
export interface Feedback {
  kind: FeedbackKind;
  summary: string;
  diagnostics: Diagnostic[];
}

export interface UnitOutcome {
  unitId: string;
  symbols: string[];
  status: UnitStatus;
  attempts: number;
  lastError: string | null;
}

export interface FailureEntry {
  unitId: string;
  status: "failed" | "blocked";
  diagnostic: string;
  /** The failed unit that blocks this one */
  blockedBy?: string;
}

export interface RunCounts {
  verified: number;
  failed: number;
  blocked: number;
  /** Not terminal: never reached, or stopped by an interrupt */
  pending: number;
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  interrupted: boolean;
  counts: RunCounts;
  /** Every unit, in processing order */
  units: UnitOutcome[];
  /** Failed and blocked units, in processing order */
  failures: FailureEntry[];
}

/** Names of the analyzer's built-in types, treated as external. */
export const BUILTIN_TYPES_FILE = "builtin-types.json";
