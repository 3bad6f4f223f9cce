import type { McpServer } from "@portwright/core";
import type { PortingService } from "../PortingService.js";
import type { ToolRegistrar } from "./types.js";

import { registerPortPlan } from "./portPlan.js";
import { registerPortStart } from "./portStart.js";
import { registerPortStatus } from "./portStatus.js";
import { registerPortProgress } from "./portProgress.js";
import { registerPortCancel } from "./portCancel.js";
import { registerPortSummary } from "./portSummary.js";
import { registerPortResetUnit } from "./portResetUnit.js";

const allTools: ToolRegistrar[] = [
  registerPortPlan,
  registerPortStart,
  registerPortStatus,
  registerPortProgress,
  registerPortCancel,
  registerPortSummary,
  registerPortResetUnit,
];

export function registerAllTools(server: McpServer, service: PortingService): void {
  for (const register of allTools) {
    register(server, service);
  }
}

export type { ToolRegistrar } from "./types.js";
export * from "./schemas.js";
export { formatSummary, describeUnit } from "./format.js";
