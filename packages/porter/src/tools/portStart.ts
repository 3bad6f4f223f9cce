import * as z from "zod/v4";
import { errorResponse, successResponse } from "@portwright/core";
import type { ToolRegistrar } from "./types.js";
import { RunSummarySchema, baseOutput } from "./schemas.js";
import { formatSummary } from "./format.js";

interface PortStartInput {
  wait?: boolean;
}

export const registerPortStart: ToolRegistrar = (server, service) => {
  server.registerTool(
    "port_start",
    {
      title: "Start or resume a porting run",
      description:
        "Start a run in the background. Verified units from earlier runs are skipped; failed units with attempts left are retried from their recorded attempt count. Only one run at a time.",
      inputSchema: {
        wait: z.boolean().optional().describe("Wait for the run to finish and return its summary"),
      },
      outputSchema: {
        ...baseOutput,
        runId: z.string().optional(),
        total: z.number().optional(),
        summary: RunSummarySchema.optional(),
      },
    },
    async (input: PortStartInput) => {
      const started = service.start();
      if (!started.ok) return errorResponse(started.error);
      const { runId, total } = started.value;

      if (!input.wait) {
        return successResponse(`Run ${runId} started over ${total} units. Use port_progress to follow it.`, {
          runId,
          total,
        });
      }

      const finished = await service.waitForRun();
      if (!finished) return errorResponse(`Run ${runId} is no longer tracked`);
      if (!finished.ok) return errorResponse(finished.error);
      return successResponse(formatSummary(finished.value), { runId, total, summary: finished.value });
    }
  );
};
