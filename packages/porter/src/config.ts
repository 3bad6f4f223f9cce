/**
 * Configuration: `portwright.config.json`, found by searching upward from
 * the working directory, validated with zod and resolved to absolute paths.
 *
 * Environment overrides:
 * - PORTWRIGHT_CONFIG: explicit config file
 * - PORTWRIGHT_DATA_DIR: checkpoint and lock directory
 * - PORTWRIGHT_CONCURRENCY: concurrency limit
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import * as z from "zod/v4";

import type { Result } from "@portwright/core";
import { Ok, Err } from "@portwright/core";

import { ConfigError } from "./core/errors.js";
import { DEFAULT_RETRY_CONFIG } from "./core/services/RetryPolicy.js";

export const CONFIG_FILE_NAME = "portwright.config.json";

const DEFAULT_STEP_TIMEOUT_MS = 5 * 60 * 1000;
const DEFAULT_GENERATION_TIMEOUT_MS = 10 * 60 * 1000;

const CommandStepSchema = z.object({
  command: z.string().min(1),
  timeoutMs: z.number().int().positive().default(DEFAULT_STEP_TIMEOUT_MS),
});

export const ConfigFileSchema = z.object({
  /** Target project the artifacts are written into */
  projectDir: z.string().default("."),
  /** Root that fact locations are relative to */
  sourceDir: z.string().default("."),
  factsFile: z.string().default("facts.json"),
  dataDir: z.string().default(".portwright"),
  concurrency: z.number().int().min(1).default(1),
  externals: z.array(z.string()).default([]),
  writableRoots: z.array(z.string()).default([]),
  checkpoint: z
    .object({ backend: z.enum(["json", "sqlite"]).default("json") })
    .default({ backend: "json" }),
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(DEFAULT_RETRY_CONFIG.maxAttempts),
      maxRunnerRetries: z.number().int().min(0).default(DEFAULT_RETRY_CONFIG.maxRunnerRetries),
      runnerBackoffMs: z.number().int().min(0).default(DEFAULT_RETRY_CONFIG.runnerBackoffMs),
    })
    .default({
      maxAttempts: DEFAULT_RETRY_CONFIG.maxAttempts,
      maxRunnerRetries: DEFAULT_RETRY_CONFIG.maxRunnerRetries,
      runnerBackoffMs: DEFAULT_RETRY_CONFIG.runnerBackoffMs,
    }),
  generation: z
    .object({
      command: z.string().min(1),
      timeoutMs: z.number().int().positive().default(DEFAULT_GENERATION_TIMEOUT_MS),
    })
    .optional(),
  validation: z
    .object({
      isolatedCompile: CommandStepSchema,
      linkedCompile: CommandStepSchema.optional(),
      differentialTest: CommandStepSchema.optional(),
    })
    .optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Configuration with every path made absolute.
 */
export interface PortwrightConfig extends ConfigFile {
  /** The file this came from, or null when only defaults apply */
  configPath: string | null;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Search upward from `startDir` for the config file.
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  for (;;) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export function loadConfig(options: LoadConfigOptions = {}): Result<PortwrightConfig, ConfigError> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let configPath: string | null;
  if (env.PORTWRIGHT_CONFIG) {
    configPath = resolve(cwd, env.PORTWRIGHT_CONFIG);
    if (!existsSync(configPath)) {
      return Err(new ConfigError(`PORTWRIGHT_CONFIG points to a missing file: ${configPath}`));
    }
  } else {
    configPath = findConfigFile(cwd);
  }

  let raw: unknown = {};
  if (configPath) {
    try {
      raw = JSON.parse(readFileSync(configPath, "utf-8"));
    } catch (e) {
      return Err(new ConfigError(`Cannot read ${configPath}: ${e instanceof Error ? e.message : String(e)}`, { cause: e }));
    }
  }

  return parseConfig(raw, { baseDir: configPath ? dirname(configPath) : cwd, configPath, env });
}

/**
 * Validate a config object, apply environment overrides and resolve paths
 * against `baseDir`.
 */
export function parseConfig(
  raw: unknown,
  options: { baseDir: string; configPath?: string | null; env?: NodeJS.ProcessEnv }
): Result<PortwrightConfig, ConfigError> {
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.map(String).join(".") || "(root)"}: ${i.message}`);
    return Err(new ConfigError(`Invalid configuration: ${issues.join("; ")}`));
  }

  const config = parsed.data;
  const env = options.env ?? {};

  if (env.PORTWRIGHT_DATA_DIR) {
    config.dataDir = env.PORTWRIGHT_DATA_DIR;
  }
  if (env.PORTWRIGHT_CONCURRENCY) {
    const concurrency = Number(env.PORTWRIGHT_CONCURRENCY);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      return Err(new ConfigError(`PORTWRIGHT_CONCURRENCY must be a positive integer, got "${env.PORTWRIGHT_CONCURRENCY}"`));
    }
    config.concurrency = concurrency;
  }

  const base = options.baseDir;
  return Ok({
    ...config,
    projectDir: resolve(base, config.projectDir),
    sourceDir: resolve(base, config.sourceDir),
    factsFile: resolve(base, config.factsFile),
    dataDir: resolve(base, config.dataDir),
    configPath: options.configPath ?? null,
  });
}
