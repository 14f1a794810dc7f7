// src/config/config.ts
// Configuration for the marshalling engine: env, JSON/YAML file, overrides.

import * as fs from "fs";
import * as path from "path";
import * as YAML from "yaml";
import { z } from "zod";

// =========================================================================
// Configuration Types
// =========================================================================

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type MarshalConfig = {
  /** Strictness used when `parse` is called without an explicit flag */
  strict: boolean;
  /** Maximum nesting depth for serialize and parse */
  maxDepth: number;
  /** pino log level */
  logLevel: LogLevel;
};

export const DEFAULT_CONFIG: MarshalConfig = {
  strict: false,
  maxDepth: 64,
  logLevel: "warn",
};

// =========================================================================
// Schemas
// =========================================================================

// z.coerce.boolean() treats any non-empty string as true, so "false" would
// enable the flag; map the accepted spellings explicitly instead.
const envFlag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform(v => (v === undefined ? undefined : v === "true" || v === "1"));

const envSchema = z.object({
  STRICT: envFlag,
  MAX_DEPTH: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

const fileSchema = z.object({
  strict: z.boolean().optional(),
  maxDepth: z.number().int().positive().optional(),
  max_depth: z.number().int().positive().optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
  log_level: z.enum(LOG_LEVELS).optional(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
}

function compact(config: Partial<MarshalConfig>): Partial<MarshalConfig> {
  const result: Partial<MarshalConfig> = {};
  if (config.strict !== undefined) result.strict = config.strict;
  if (config.maxDepth !== undefined) result.maxDepth = config.maxDepth;
  if (config.logLevel !== undefined) result.logLevel = config.logLevel;
  return result;
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Read `${prefix}_STRICT`, `${prefix}_MAX_DEPTH` and `${prefix}_LOG_LEVEL`.
 * Only variables that are set appear in the result.
 */
export function configFromEnv(
  prefix = "MARSHAL",
  env: Record<string, string | undefined> = process.env
): Partial<MarshalConfig> {
  const rawEnv: Record<string, string | undefined> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[`${prefix}_${key}`];
    rawEnv[key] = value === "" ? undefined : value;
  }

  const parsed = envSchema.safeParse(rawEnv);
  if (!parsed.success) {
    throw new Error(`Invalid ${prefix}_* environment: ${formatIssues(parsed.error)}`);
  }

  return compact({
    strict: parsed.data.STRICT,
    maxDepth: parsed.data.MAX_DEPTH,
    logLevel: parsed.data.LOG_LEVEL,
  });
}

/**
 * Create configuration from a plain object (e.g., parsed JSON/YAML).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: unknown): Partial<MarshalConfig> {
  const parsed = fileSchema.safeParse(data ?? {});
  if (!parsed.success) {
    throw new Error(`Invalid marshal config: ${formatIssues(parsed.error)}`);
  }
  const d = parsed.data;
  return compact({
    strict: d.strict,
    maxDepth: d.maxDepth ?? d.max_depth,
    logLevel: d.logLevel ?? d.log_level,
  });
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): Partial<MarshalConfig> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    data = YAML.parse(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  return configFromObject(data);
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: Partial<MarshalConfig>[]): MarshalConfig {
  let result: MarshalConfig = { ...DEFAULT_CONFIG };
  for (const cfg of configs) {
    result = { ...result, ...compact(cfg) };
  }
  return result;
}

export const DEFAULT_CONFIG_FILES = ["marshal.config.json", "marshal.config.yaml", "marshal.config.yml"];

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: Partial<MarshalConfig>;
  env?: Record<string, string | undefined>;
  cwd?: string;
}): MarshalConfig {
  const layers: Partial<MarshalConfig>[] = [configFromEnv("MARSHAL", options?.env ?? process.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const candidate = path.join(cwd, name);
      if (fs.existsSync(candidate)) {
        layers.push(configFromFile(candidate));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}
