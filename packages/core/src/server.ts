/**
 * stdio MCP server bootstrap.
 *
 * stdout belongs to the transport, so everything here logs to stderr.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

export interface ServerOptions<S> {
  name: string;
  version: string;
  createServices: () => S;
  registerTools: (server: McpServer, services: S) => void;
  /**
   * Runs once on SIGINT or SIGTERM. Long-running work (a porting run) should
   * stop at its next checkpoint here; the process exits when this settles
   * or after `shutdownTimeoutMs`, whichever comes first.
   */
  onShutdown?: (services: S) => Promise<void>;
  shutdownTimeoutMs?: number;
}

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 60_000;

export async function startServer<S>(options: ServerOptions<S>): Promise<McpServer> {
  const { name, version, createServices, registerTools, onShutdown } = options;
  const services = createServices();

  const server = new McpServer({ name, version });
  registerTools(server, services);

  let stopping = false;
  const stop = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) return;
    stopping = true;
    console.error(`[${name}] ${signal} received, shutting down`);

    const timeoutMs = options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    });

    let code = 0;
    try {
      const outcome = await Promise.race([onShutdown?.(services).then(() => "done" as const), deadline]);
      if (outcome === "timeout") {
        console.error(`[${name}] Shutdown hook still running after ${timeoutMs}ms, exiting anyway`);
        code = 1;
      }
      await server.close();
    } catch (error: unknown) {
      console.error(`[${name}] Shutdown failed:`, error);
      code = 1;
    } finally {
      clearTimeout(timer);
    }
    process.exit(code);
  };

  process.once("SIGTERM", (signal) => void stop(signal));
  process.once("SIGINT", (signal) => void stop(signal));

  await server.connect(new StdioServerTransport());
  console.error(`[${name}] v${version} listening on stdio`);
  return server;
}

/** Start the server and exit non-zero if startup fails. */
export function runServer<S>(options: ServerOptions<S>): void {
  startServer(options).catch((error: unknown) => {
    console.error(`[${options.name}] Failed to start:`, error);
    process.exit(1);
  });
}

export { McpServer };
