import * as z from "zod/v4";
import { successResponse } from "@portwright/core";
import type { ToolRegistrar } from "./types.js";
import { baseOutput } from "./schemas.js";

interface PortCancelInput {
  reason?: string;
  wait?: boolean;
}

export const registerPortCancel: ToolRegistrar = (server, service) => {
  server.registerTool(
    "port_cancel",
    {
      title: "Cancel the run",
      description:
        "Stop dispatching new units. Units in flight stop at their next checkpoint, so the run can be resumed with port_start.",
      inputSchema: {
        reason: z.string().optional(),
        wait: z.boolean().optional().describe("Wait until in-flight units have stopped"),
      },
      outputSchema: {
        ...baseOutput,
        cancelled: z.boolean(),
      },
    },
    async (input: PortCancelInput) => {
      const cancelled = service.cancel(input.reason);
      if (!cancelled) {
        return successResponse("No run in progress.", { cancelled: false });
      }
      if (input.wait) await service.waitForRun();
      return successResponse(input.wait ? "Run stopped." : "Cancellation requested.", { cancelled: true });
    }
  );
};
