import { successResponse } from "@portwright/core";
import type { ToolRegistrar } from "./types.js";
import { RunSummarySchema, baseOutput } from "./schemas.js";
import { formatSummary } from "./format.js";

export const registerPortSummary: ToolRegistrar = (server, service) => {
  server.registerTool(
    "port_summary",
    {
      title: "Last run summary",
      description: "Terminal status of every unit from the last finished run, with the last diagnostic of each failed or blocked unit.",
      inputSchema: {},
      outputSchema: {
        ...baseOutput,
        summary: RunSummarySchema.optional(),
      },
    },
    async () => {
      const summary = service.lastSummary();
      if (!summary) {
        const error = service.lastRunError();
        return successResponse(error ? `Last run failed: ${error.message}` : "No run has finished yet.", {});
      }
      return successResponse(formatSummary(summary), { summary });
    }
  );
};
