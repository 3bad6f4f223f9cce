/**
 * Porter MCP server.
 *
 * Configuration is read once at startup. On SIGINT/SIGTERM the current run
 * is cancelled and the server waits for in-flight units to reach a
 * checkpoint before it exits.
 */

import { runServer } from "@portwright/core";

import { loadConfig } from "./config.js";
import { PortingService } from "./PortingService.js";
import { registerAllTools } from "./tools/index.js";

export const SERVER_NAME = "portwright:porter";
export const SERVER_VERSION = "0.1.0";

export function createPortingService(): PortingService {
  const config = loadConfig();
  if (!config.ok) throw config.error;
  console.error(
    `[porter] ${config.value.configPath ? `Using ${config.value.configPath}` : "No config file found, using defaults"}`
  );
  return new PortingService(config.value);
}

export function main(): void {
  runServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    createServices: () => ({ porter: createPortingService() }),
    registerTools: (server, services) => registerAllTools(server, services.porter),
    onShutdown: (services) => services.porter.dispose(),
  });
}
