import type { Result } from "@portwright/core";

export interface CommandRequest {
  /** Shell command line */
  command: string;
  cwd: string;
  timeoutMs: number;
  /** Written to stdin, then stdin is closed */
  input?: string;
  env?: Record<string, string>;
  /** Aborting kills the command's process group, as a timeout does */
  signal?: AbortSignal;
}

export interface CommandOutput {
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** Stopped through `signal` */
  aborted: boolean;
  durationMs: number;
}

/**
 * Runs external commands. Err only when the process could not be started.
 */
export interface CommandExecutor {
  run(request: CommandRequest): Promise<Result<CommandOutput, Error>>;
}
