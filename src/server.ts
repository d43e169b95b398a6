#!/usr/bin/env node
/**
 * duckdb-query-gateway CLI
 *
 *   duckdb-query-gateway [options]
 *
 * Options override DUCKDB_GATEWAY_* environment variables, which override the
 * built-in defaults.
 */

import { Command, InvalidArgumentError } from "commander";
import { QueryGateway } from "./gateway";
import { CACHE_MODES, ConfigError, ConfigOverrides, GatewayConfig, loadConfig } from "./services/config";
import { LOG_LEVELS, createLogger } from "./services/logger";

const pkg = {
  name: "duckdb-query-gateway",
  version: "0.1.0",
  description: "Serve DuckDB queries over HTTP and WebSocket with caching and cancellation",
};

function oneOf(choices: readonly string[]) {
  return (value: string): string => {
    if (!choices.includes(value)) {
      throw new InvalidArgumentError(`Expected one of: ${choices.join(", ")}`);
    }
    return value;
  };
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), ...value.split(",").map((s) => s.trim()).filter(Boolean)];
}

export type CliOptions = {
  db?: string;
  host?: string;
  port?: string;
  workers?: string;
  threads?: string;
  memoryLimit?: string;
  tempDirectory?: string;
  maxTempDirectorySize?: string;
  cache?: string;
  cacheDir?: string;
  extension?: string[];
  logLevel?: string;
};

export function createProgram(): Command {
  return new Command()
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version, "-v, --version", "Show version number")
    .option("-d, --db <path>", "database file, or :memory:")
    .option("-H, --host <host>", "interface to bind")
    .option("-p, --port <port>", "port to listen on")
    .option("-w, --workers <n>", "maximum concurrent queries (one connection each)")
    .option("--threads <n>", "DuckDB worker threads")
    .option("--memory-limit <size>", "DuckDB memory limit, e.g. 4GB")
    .option("--temp-directory <path>", "DuckDB spill directory")
    .option("--max-temp-directory-size <size>", "cap on spilled data, e.g. 20GB")
    .option("--cache <mode>", `result cache (${CACHE_MODES.join(", ")})`, oneOf(CACHE_MODES))
    .option("--cache-dir <path>", "directory for the disk cache")
    .option(
      "-e, --extension <names>",
      "extension to install and load, repeatable; name or name:community",
      collect
    )
    .option("--log-level <level>", `log level (${LOG_LEVELS.join(", ")})`, oneOf(LOG_LEVELS));
}

/** Map parsed flags to config overrides; absent flags stay undefined. */
export function toOverrides(options: CliOptions): ConfigOverrides {
  return {
    dbPath: options.db,
    host: options.host,
    port: options.port,
    maxWorkers: options.workers,
    threads: options.threads,
    memoryLimit: options.memoryLimit,
    tempDirectory: options.tempDirectory,
    maxTempDirectorySize: options.maxTempDirectorySize,
    cache: options.cache,
    cacheDir: options.cacheDir,
    extensions: options.extension,
    logLevel: options.logLevel,
  };
}

/**
 * DuckDB calls run on libuv's pool (4 threads by default); size it so every
 * worker slot can have a call in flight. Only takes effect before the pool's
 * first use.
 */
function sizeThreadPool(config: GatewayConfig): void {
  if (!process.env.UV_THREADPOOL_SIZE) {
    process.env.UV_THREADPOOL_SIZE = String(Math.min(Math.max(config.maxWorkers + 2, 4), 1024));
  }
}

async function main(): Promise<void> {
  const program = createProgram();
  program.parse();

  let config: GatewayConfig;
  try {
    config = loadConfig(toOverrides(program.opts<CliOptions>()));
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`🦆 ${err.message}`);
      process.exit(2);
    }
    throw err;
  }
  sizeThreadPool(config);

  const logger = createLogger(config.logLevel);
  const started = performance.now();
  logger.info(`Starting query gateway (database: ${config.dbPath}, workers: ${config.maxWorkers}, cache: ${config.cache})`);

  const gateway = new QueryGateway(config, {
    logger,
    onShutdown: () => process.exit(0),
  });
  await gateway.start();
  await gateway.listen();
  logger.info(`Ready in ${Math.round(performance.now() - started)} ms`);

  const stop = (signal: string) => {
    logger.info(`Received ${signal}`);
    gateway
      .shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error("Shutdown failed:", err);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error("🦆 Failed to start query gateway:", err);
    process.exit(1);
  });
}
