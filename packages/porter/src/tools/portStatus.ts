import * as z from "zod/v4";
import { errorResponse, successResponse } from "@portwright/core";
import type { ToolRegistrar } from "./types.js";
import { CheckpointRecordOutputSchema, UnitStatusSchema, baseOutput } from "./schemas.js";

interface PortStatusInput {
  unit: string;
}

export const registerPortStatus: ToolRegistrar = (server, service) => {
  server.registerTool(
    "port_status",
    {
      title: "Unit status",
      description: "Show the status, attempt count and last error of one unit. Accepts a unit id or a symbol name.",
      inputSchema: {
        unit: z.string().describe("Unit id (e.g. cycle:a+b) or symbol name"),
      },
      outputSchema: {
        ...baseOutput,
        unitId: z.string().optional(),
        symbols: z.array(z.string()).optional(),
        status: UnitStatusSchema.optional(),
        dependencies: z.array(z.string()).optional(),
        blockedBy: z.string().nullable().optional(),
        record: CheckpointRecordOutputSchema.nullable().optional(),
      },
    },
    async (input: PortStatusInput) => {
      const report = service.status(input.unit);
      if (!report.ok) return errorResponse(report.error);

      const { unitId, status, record, blockedBy } = report.value;
      const lines = [`${unitId}: ${status}`];
      if (record) lines.push(`attempt ${record.attempt}, updated ${record.updatedAt}`);
      if (blockedBy) lines.push(`blocked by ${blockedBy}`);
      if (record?.lastError) lines.push("", record.lastError);

      return successResponse(lines.join("\n"), { ...report.value });
    }
  );
};
