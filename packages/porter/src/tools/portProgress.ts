import * as z from "zod/v4";
import { successResponse } from "@portwright/core";
import type { ToolRegistrar } from "./types.js";
import { RunCountsSchema, baseOutput } from "./schemas.js";

export const registerPortProgress: ToolRegistrar = (server, service) => {
  server.registerTool(
    "port_progress",
    {
      title: "Run progress",
      description: "Counts for the current run, or for the last one when nothing is running.",
      inputSchema: {},
      outputSchema: {
        ...baseOutput,
        runId: z.string().nullable(),
        running: z.boolean(),
        total: z.number(),
        counts: RunCountsSchema,
        active: z.array(z.string()),
      },
    },
    async () => {
      const progress = service.progress();
      if (!progress.runId) {
        return successResponse("No run yet. Use port_start.", { ...progress });
      }
      const { counts } = progress;
      const lines = [
        `Run ${progress.runId} ${progress.running ? "running" : "ended"}: ` +
          `${counts.verified + counts.failed + counts.blocked}/${progress.total} settled`,
        `verified ${counts.verified}, failed ${counts.failed}, blocked ${counts.blocked}, pending ${counts.pending}`,
      ];
      if (progress.active.length > 0) lines.push(`in flight: ${progress.active.join(", ")}`);
      return successResponse(lines.join("\n"), { ...progress });
    }
  );
};
