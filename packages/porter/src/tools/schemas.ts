import * as z from "zod/v4";

export const UnitStatusSchema = z.enum(["unstarted", "generating", "validating", "verified", "failed", "blocked"]);

export const RunCountsSchema = z.object({
  verified: z.number(),
  failed: z.number(),
  blocked: z.number(),
  pending: z.number(),
});

export const UnitOutcomeSchema = z.object({
  unitId: z.string(),
  symbols: z.array(z.string()),
  status: UnitStatusSchema,
  attempts: z.number(),
  lastError: z.string().nullable(),
});

export const FailureEntrySchema = z.object({
  unitId: z.string(),
  status: z.enum(["failed", "blocked"]),
  diagnostic: z.string(),
  blockedBy: z.string().optional(),
});

export const RunSummarySchema = z.object({
  runId: z.string(),
  startedAt: z.string(),
  finishedAt: z.string(),
  interrupted: z.boolean(),
  counts: RunCountsSchema,
  units: z.array(UnitOutcomeSchema),
  failures: z.array(FailureEntrySchema),
});

export const CheckpointRecordOutputSchema = z.object({
  unitId: z.string(),
  symbols: z.array(z.string()),
  status: z.string(),
  attempt: z.number(),
  artifacts: z.array(z.object({ role: z.string(), path: z.string(), fingerprint: z.string() })),
  lastError: z.string().nullable(),
  updatedAt: z.string(),
});

/** Fields shared by every tool's structured output */
export const baseOutput = {
  success: z.boolean(),
  error: z.string().optional(),
  code: z.string().optional(),
};
