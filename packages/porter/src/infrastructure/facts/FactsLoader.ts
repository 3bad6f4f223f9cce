/**
 * Loads the source analyzer's facts file.
 */

import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import * as z from "zod/v4";

import type { Result } from "@portwright/core";
import { Ok, Err } from "@portwright/core";

import type { ParsedFact } from "../../core/model.js";
import { BUILTIN_TYPES_FILE } from "../../core/model.js";
import { ConfigError, MalformedGraphError } from "../../core/errors.js";
import { FactsFileSchema } from "../../core/schemas.js";

export interface LoadedFacts {
  facts: ParsedFact[];
  /** Externals declared in the facts file */
  externals: string[];
}

const BuiltinTypesSchema = z.object({ names: z.array(z.string()) });

const BUILTIN_TYPES_PATH = fileURLToPath(new URL(`../../../data/${BUILTIN_TYPES_FILE}`, import.meta.url));

let builtinTypes: readonly string[] | null = null;

/**
 * Names the compiler or the standard headers provide.
 */
export function loadBuiltinTypes(): readonly string[] {
  builtinTypes ??= BuiltinTypesSchema.parse(JSON.parse(readFileSync(BUILTIN_TYPES_PATH, "utf-8"))).names;
  return builtinTypes;
}

/**
 * Validate analyzer output that is already in memory.
 */
export function parseFacts(data: unknown, origin = "facts"): Result<LoadedFacts, MalformedGraphError> {
  const result = FactsFileSchema.safeParse(data);
  if (!result.success) {
    return Err(
      new MalformedGraphError(
        result.error.issues.map((issue) => `${origin} ${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
      )
    );
  }
  if (Array.isArray(result.data)) {
    return Ok({ facts: result.data, externals: [] });
  }
  return Ok({ facts: result.data.symbols, externals: result.data.externals });
}

export function loadFacts(path: string): Result<LoadedFacts, MalformedGraphError | ConfigError> {
  if (!existsSync(path)) {
    return Err(new ConfigError(`Facts file not found: ${path}`));
  }
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e) {
    return Err(new MalformedGraphError([`${path} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`]));
  }
  return parseFacts(data, path);
}
