/**
 * Zod schemas for data that crosses a process or file boundary.
 */

import * as z from "zod/v4";

export const SymbolKindSchema = z.enum(["function", "struct", "enum", "typedef", "macro-constant"]);

export const SourceLocationSchema = z.object({
  file: z.string().min(1),
  line: z.number().int().min(1),
  endLine: z.number().int().min(1).optional(),
});

export const ParsedFactSchema = z.object({
  name: z.string().min(1),
  kind: SymbolKindSchema,
  location: SourceLocationSchema,
  isCycle: z.boolean().default(false),
  isStatic: z.boolean().default(false),
  dependencies: z.array(z.string()).default([]),
});

/** Analyzer output: a bare list, or a list with declared externals */
export const FactsFileSchema = z.union([
  z.array(ParsedFactSchema),
  z.object({
    symbols: z.array(ParsedFactSchema),
    externals: z.array(z.string()).default([]),
  }),
]);

export const PortingStatusSchema = z.enum(["unstarted", "generating", "validating", "verified", "failed"]);

export const ArtifactRoleSchema = z.enum(["bindings", "implementation", "differentialTest"]);

export const ArtifactFingerprintSchema = z.object({
  role: ArtifactRoleSchema,
  path: z.string(),
  fingerprint: z.string(),
});

export const CheckpointRecordSchema = z.object({
  unitId: z.string().min(1),
  symbols: z.array(z.string()),
  status: PortingStatusSchema,
  attempt: z.number().int().min(0),
  artifacts: z.array(ArtifactFingerprintSchema).default([]),
  lastError: z.string().nullable().default(null),
  updatedAt: z.string(),
});

export const ArtifactSchema = z.object({
  path: z.string().min(1),
  content: z.string(),
});

/**
 * What a generation command prints on stdout. Artifacts are optional here:
 * a response missing one is an incomplete generation, not a protocol error.
 */
export const GenerationResponseSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("ok"),
    artifacts: z.object({
      bindings: ArtifactSchema.optional(),
      implementation: ArtifactSchema.optional(),
      differentialTest: ArtifactSchema.optional(),
    }),
  }),
  z.object({
    status: z.literal("refused"),
    reason: z.string(),
  }),
]);

export type GenerationResponse = z.infer<typeof GenerationResponseSchema>;
