import { spawn } from "node:child_process";

import type { Result } from "@portwright/core";
import { Ok, Err, toError } from "@portwright/core";

import type { CommandExecutor, CommandOutput, CommandRequest } from "../../core/ports/CommandExecutor.js";

export interface NodeCommandExecutorOptions {
  /** Grace period between SIGTERM and SIGKILL to the process group */
  killGraceMs?: number;
  /**
   * How long to wait for the pipes to close after SIGKILL. A descendant that
   * left the process group can hold them open; the result is returned anyway.
   */
  closeWaitMs?: number;
}

/**
 * Runs shell commands with captured output and a hard timeout.
 *
 * Each command gets its own process group, so a timeout or an abort reaches
 * the compiler or test binary the shell started, not just the shell.
 */
export class NodeCommandExecutor implements CommandExecutor {
  private readonly killGraceMs: number;
  private readonly closeWaitMs: number;

  constructor(options: NodeCommandExecutorOptions = {}) {
    this.killGraceMs = options.killGraceMs ?? 2000;
    this.closeWaitMs = options.closeWaitMs ?? 1000;
  }

  run(request: CommandRequest): Promise<Result<CommandOutput, Error>> {
    if (request.signal?.aborted) {
      return Promise.resolve(Err(new Error("command aborted before it started")));
    }

    return new Promise((resolve) => {
      const startTime = Date.now();
      const proc = spawn(request.command, [], {
        cwd: request.cwd,
        shell: true,
        detached: true,
        env: {
          ...process.env,
          FORCE_COLOR: "0",
          NO_COLOR: "1",
          CI: "true",
          ...request.env,
        },
      });

      let stdout = "";
      let stderr = "";
      let timedOut = false;
      let aborted = false;
      let settled = false;
      const timers = new Set<NodeJS.Timeout>();

      const later = (ms: number, fn: () => void): void => {
        timers.add(setTimeout(fn, ms));
      };

      const settle = (result: Result<CommandOutput, Error>): void => {
        if (settled) return;
        settled = true;
        for (const timer of timers) clearTimeout(timer);
        request.signal?.removeEventListener("abort", onAbort);
        resolve(result);
      };

      const output = (exitCode: number | null, signal: string | null): CommandOutput => ({
        exitCode,
        signal,
        stdout,
        stderr,
        timedOut,
        aborted,
        durationMs: Date.now() - startTime,
      });

      const signalGroup = (signal: NodeJS.Signals): void => {
        if (proc.pid === undefined) return;
        try {
          process.kill(-proc.pid, signal);
        } catch (error: unknown) {
          // ESRCH: every process in the group has already exited
          if (!(error instanceof Error && "code" in error && error.code === "ESRCH")) {
            stderr += `[kill] ${toError(error).message}\n`;
            proc.kill(signal);
          }
        }
      };

      const stop = (): void => {
        signalGroup("SIGTERM");
        later(this.killGraceMs, () => {
          signalGroup("SIGKILL");
          later(this.closeWaitMs, () => settle(Ok(output(null, "SIGKILL"))));
        });
      };

      const onAbort = (): void => {
        if (timedOut || aborted) return;
        aborted = true;
        stop();
      };
      request.signal?.addEventListener("abort", onAbort, { once: true });

      later(request.timeoutMs, () => {
        if (aborted) return;
        timedOut = true;
        stop();
      });

      proc.stdout.on("data", (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      // A command that exits without reading its input closes the pipe early
      proc.stdin.on("error", (error: Error) => {
        stderr += `[stdin] ${error.message}\n`;
      });

      proc.on("error", (error) => settle(Err(error)));

      proc.on("close", (code, signal) => settle(Ok(output(code, signal))));

      if (request.input !== undefined) {
        proc.stdin.end(request.input);
      } else {
        proc.stdin.end();
      }
    });
  }
}
