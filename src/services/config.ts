/**
 * Gateway configuration.
 *
 * Layers, lowest first: built-in defaults, DUCKDB_GATEWAY_* environment
 * variables, explicit overrides (CLI flags).
 */

import * as os from "os";
import * as path from "path";
import { z } from "zod";
import { LOG_LEVELS } from "./logger";

export const CACHE_MODES = ["disk", "memory", "none"] as const;

export const ENV_PREFIX = "DUCKDB_GATEWAY_";

const configSchema = z.object({
  dbPath: z.string().min(1),
  host: z.string().min(1),
  port: z.coerce.number().int().min(0).max(65535),
  maxWorkers: z.coerce.number().int().positive(),
  threads: z.coerce.number().int().positive().optional(),
  memoryLimit: z.string().min(1).optional(),
  tempDirectory: z.string().min(1).optional(),
  maxTempDirectorySize: z.string().min(1).optional(),
  cache: z.enum(CACHE_MODES),
  cacheDir: z.string().min(1),
  extensions: z.array(z.string().min(1)),
  logLevel: z.enum(LOG_LEVELS),
});

export type GatewayConfig = z.infer<typeof configSchema>;

export type ConfigOverrides = {
  [K in keyof GatewayConfig]?: GatewayConfig[K] | string;
};

export function defaultConfig(): GatewayConfig {
  return {
    dbPath: ":memory:",
    host: "127.0.0.1",
    port: 3000,
    maxWorkers: os.cpus().length || 4,
    cache: "disk",
    cacheDir: path.join(os.homedir(), ".cache", "duckdb-query-gateway"),
    extensions: [],
    logLevel: "info",
  };
}

const ENV_KEYS: Record<string, keyof GatewayConfig> = {
  DB_PATH: "dbPath",
  HOST: "host",
  PORT: "port",
  MAX_WORKERS: "maxWorkers",
  THREADS: "threads",
  MEMORY_LIMIT: "memoryLimit",
  TEMP_DIRECTORY: "tempDirectory",
  MAX_TEMP_DIRECTORY_SIZE: "maxTempDirectorySize",
  CACHE: "cache",
  CACHE_DIR: "cacheDir",
  EXTENSIONS: "extensions",
  LOG_LEVEL: "logLevel",
};

/**
 * Read DUCKDB_GATEWAY_* variables. EXTENSIONS is a comma-separated list.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const [suffix, key] of Object.entries(ENV_KEYS)) {
    const value = env[`${ENV_PREFIX}${suffix}`];
    if (value === undefined || value === "") continue;
    overrides[key] =
      key === "extensions"
        ? value.split(",").map((s) => s.trim()).filter(Boolean)
        : value;
  }
  return overrides;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Merge the layers and validate the result.
 * @throws ConfigError listing every invalid key
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): GatewayConfig {
  const merged = {
    ...defaultConfig(),
    ...stripUndefined(configFromEnv(env)),
    ...stripUndefined(overrides),
  };
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return result.data;
}

function stripUndefined(value: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(value).filter(([, v]) => v !== undefined)
  );
}
