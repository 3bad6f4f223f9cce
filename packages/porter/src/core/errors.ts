/**
 * Errors that abort a run or an operator request.
 *
 * Defect verdicts, runner errors and incomplete generations are not here:
 * those are values the porting task handles itself.
 */

export type PortingErrorCode =
  | "MALFORMED_GRAPH"
  | "STORAGE_ERROR"
  | "CONFIG_ERROR"
  | "RUN_IN_PROGRESS"
  | "UNKNOWN_UNIT";

export class PortingError extends Error {
  constructor(
    readonly code: PortingErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The parsed facts do not form a valid graph.
 * Every problem found is listed, not only the first.
 */
export class MalformedGraphError extends PortingError {
  constructor(readonly problems: string[]) {
    super(
      "MALFORMED_GRAPH",
      problems.length === 1
        ? `Malformed graph: ${problems[0]}`
        : `Malformed graph (${problems.length} problems):\n- ${problems.join("\n- ")}`
    );
  }
}

/**
 * Durable state could not be read or written.
 */
export class StorageError extends PortingError {
  constructor(
    readonly operation: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("STORAGE_ERROR", `Checkpoint ${operation} failed: ${detail}`, { cause });
  }
}

export class ConfigError extends PortingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_ERROR", message, options);
  }
}

export class RunInProgressError extends PortingError {
  constructor(readonly runId: string) {
    super("RUN_IN_PROGRESS", `A run is already in progress (${runId})`);
  }
}

export class UnknownUnitError extends PortingError {
  constructor(readonly unitId: string) {
    super("UNKNOWN_UNIT", `Unknown unit: ${unitId}`);
  }
}
