import * as z from "zod/v4";
import { errorResponse, successResponse } from "@portwright/core";
import type { ToolRegistrar } from "./types.js";
import { CheckpointRecordOutputSchema, baseOutput } from "./schemas.js";

interface PortResetUnitInput {
  unit: string;
}

export const registerPortResetUnit: ToolRegistrar = (server, service) => {
  server.registerTool(
    "port_reset_unit",
    {
      title: "Reset a unit",
      description:
        "Put a unit back to unstarted with a fresh attempt budget. The next run ports it (and unblocks its dependents). Refused while a run is active.",
      inputSchema: {
        unit: z.string().describe("Unit id or symbol name"),
      },
      outputSchema: {
        ...baseOutput,
        record: CheckpointRecordOutputSchema.optional(),
      },
    },
    async (input: PortResetUnitInput) => {
      const reset = service.resetUnit(input.unit);
      if (!reset.ok) return errorResponse(reset.error);
      return successResponse(`${reset.value.unitId} reset to unstarted`, { record: reset.value });
    }
  );
};
