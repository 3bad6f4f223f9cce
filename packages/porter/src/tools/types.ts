import type { McpServer } from "@portwright/core";
import type { PortingService } from "../PortingService.js";

export interface ToolRegistrar {
  (server: McpServer, service: PortingService): void;
}
