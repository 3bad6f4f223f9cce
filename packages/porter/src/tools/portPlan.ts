import * as z from "zod/v4";
import { errorResponse, successResponse } from "@portwright/core";
import type { ToolRegistrar } from "./types.js";
import { baseOutput } from "./schemas.js";
import { DEFAULT_PLAN_LIMIT, describeUnit } from "./format.js";

interface PortPlanInput {
  limit?: number;
}

export const registerPortPlan: ToolRegistrar = (server, service) => {
  server.registerTool(
    "port_plan",
    {
      title: "Plan porting order",
      description:
        "Load the symbol facts, collapse dependency cycles and show the order units will be ported in. Nothing is generated.",
      inputSchema: {
        limit: z.number().int().min(1).optional().describe(`Units to list (default ${DEFAULT_PLAN_LIMIT})`),
      },
      outputSchema: {
        ...baseOutput,
        symbolCount: z.number().optional(),
        unitCount: z.number().optional(),
        cycleCount: z.number().optional(),
        order: z.array(z.string()).optional(),
      },
    },
    async (input: PortPlanInput) => {
      const plan = service.plan();
      if (!plan.ok) return errorResponse(plan.error);

      const { units, symbolCount, unitCount, cycleCount } = plan.value;
      const limit = input.limit ?? DEFAULT_PLAN_LIMIT;
      const lines = [`${symbolCount} symbols in ${unitCount} units (${cycleCount} cycles)`, ""];
      units.slice(0, limit).forEach((unit, i) => lines.push(`${i + 1}. ${describeUnit(unit)}`));
      if (units.length > limit) lines.push(`... and ${units.length - limit} more`);

      return successResponse(lines.join("\n"), {
        symbolCount,
        unitCount,
        cycleCount,
        order: units.map((u) => u.id),
      });
    }
  );
};
