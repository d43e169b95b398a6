/**
 * Query Gateway
 *
 * Owns the database and wires the executor, registry, cache and dispatcher
 * to the HTTP and WebSocket adapters. Also implements the lifecycle
 * operations: close/reopen of the database and graceful shutdown.
 */

import * as fs from "fs";
import * as http from "http";
import type { AddressInfo } from "net";
import * as path from "path";
import { getRequestListener } from "@hono/node-server";
import type { Hono } from "hono";
import type { WebSocketServer } from "ws";
import {
  CommandDispatcher,
  CommandExtension,
  ProjectControl,
} from "./services/commandDispatcher";
import { GatewayConfig } from "./services/config";
import { CursorRegistry } from "./services/cursorRegistry";
import { Database, DuckDBDatabase, MEMORY_DATABASE } from "./services/duckdb";
import { ExecutionError, UnavailableError } from "./services/errors";
import { Logger, silentLogger } from "./services/logger";
import {
  FilesystemResultStore,
  MemoryResultStore,
  NoopResultStore,
  ResultCache,
  ResultStore,
} from "./services/resultCacheService";
import { TaskExecutor } from "./services/taskExecutor";
import { GatewayControl, createHttpApp } from "./transport/httpTransport";
import { attachSocketServer } from "./transport/socketTransport";

export type OpenDatabase = (dbPath: string) => Promise<Database>;

export interface GatewayOptions {
  logger?: Logger;
  extension?: CommandExtension;
  /** Defaults to DuckDB with the config's settings */
  openDatabase?: OpenDatabase;
  /** Result store; defaults to the one selected by `config.cache` */
  store?: ResultStore;
  /** Called after a shutdown requested over HTTP has completed */
  onShutdown?: () => void;
}

/** Delay between answering POST /shutdown and starting the shutdown */
const SHUTDOWN_DELAY_MS = 100;

export function createResultStore(config: GatewayConfig): ResultStore {
  switch (config.cache) {
    case "disk":
      return new FilesystemResultStore(config.cacheDir);
    case "memory":
      return new MemoryResultStore();
    case "none":
      return new NoopResultStore();
  }
}

export function duckdbOpener(config: GatewayConfig, logger: Logger): OpenDatabase {
  return (dbPath) =>
    DuckDBDatabase.open({
      path: dbPath,
      threads: config.threads,
      memoryLimit: config.memoryLimit,
      tempDirectory: config.tempDirectory,
      maxTempDirectorySize: config.maxTempDirectorySize,
      extensions: config.extensions,
      logger,
    });
}

export class QueryGateway implements GatewayControl, ProjectControl {
  readonly executor: TaskExecutor;
  readonly registry: CursorRegistry;
  readonly cache: ResultCache;
  readonly dispatcher: CommandDispatcher;
  readonly app: Hono;

  private readonly logger: Logger;
  private readonly openDatabase: OpenDatabase;
  private readonly onShutdown?: () => void;
  private database: Database | null = null;
  private dbPath: string;
  private server: http.Server | null = null;
  private sockets: WebSocketServer | null = null;
  private shuttingDown: Promise<void> | null = null;
  /** Tail of the lifecycle queue; see serialize() */
  private lifecycle: Promise<void> = Promise.resolve();

  constructor(
    readonly config: GatewayConfig,
    options: GatewayOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.openDatabase = options.openDatabase ?? duckdbOpener(config, this.logger);
    this.onShutdown = options.onShutdown;
    this.dbPath = config.dbPath;

    this.executor = new TaskExecutor(config.maxWorkers, this.logger);
    this.registry = new CursorRegistry(this.logger);
    this.cache = new ResultCache(options.store ?? createResultStore(config), this.logger);
    this.dispatcher = new CommandDispatcher({
      executor: this.executor,
      registry: this.registry,
      cache: this.cache,
      extension: options.extension,
      projects: this,
      logger: this.logger,
    });
    this.dispatcher.pause("Database is not open");

    this.app = createHttpApp({
      dispatcher: this.dispatcher,
      registry: this.registry,
      control: this,
      logger: this.logger,
    });
  }

  get databasePath(): string {
    return this.dbPath;
  }

  get isOpen(): boolean {
    return this.database !== null;
  }

  /** Open the configured database and start accepting commands. */
  start(): Promise<void> {
    return this.serialize(() => this.activate(this.dbPath));
  }

  /** Bind the HTTP and WebSocket listeners. */
  listen(port = this.config.port, host = this.config.host): Promise<AddressInfo> {
    const server = http.createServer(getRequestListener(this.app.fetch));
    this.sockets = attachSocketServer(server, {
      dispatcher: this.dispatcher,
      registry: this.registry,
      logger: this.logger,
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        const address = server.address();
        if (address === null || typeof address === "string") {
          reject(new Error(`Unexpected server address: ${String(address)}`));
          return;
        }
        this.logger.info(`Query gateway listening on http://${address.address}:${address.port}`);
        resolve(address);
      });
    });
  }

  /**
   * Stop accepting commands, interrupt and drain running work, then
   * checkpoint and close the database.
   */
  closeConnection(): Promise<void> {
    return this.serialize(async () => {
      this.assertRunning();
      await this.deactivate("Database connection is closed");
    });
  }

  /**
   * Close the current database and open `dbPath` (default: the current one).
   * If `dbPath` cannot be opened the previous database is reopened and the
   * error is rethrown.
   */
  reopen(dbPath?: string): Promise<string> {
    return this.serialize(async () => {
      this.assertRunning();
      const previous = this.dbPath;
      const target = dbPath ?? previous;
      await this.deactivate("Database connection is being reopened");
      // Cached results belong to the database they were computed on
      await this.cache.clear();
      try {
        await this.activate(target);
      } catch (err) {
        await this.restore(previous);
        throw err;
      }
      return target;
    });
  }

  /**
   * Copy the database to `targetPath` and continue on the copy. The source
   * defaults to the open database, which is checkpointed and closed before
   * the copy. On failure the previous database is reopened.
   */
  saveProjectAs(targetPath: string, sourcePath?: string): Promise<void> {
    return this.serialize(async () => {
      this.assertRunning();
      const previous = this.dbPath;
      const source = sourcePath ?? previous;
      if (source === MEMORY_DATABASE) {
        throw new ExecutionError("An in-memory database cannot be saved to a file");
      }
      if (path.resolve(source) === path.resolve(targetPath)) {
        this.logger.info("Source and target paths are the same; nothing to do");
        return;
      }

      this.logger.info(`Saving database ${source} as ${targetPath}`);
      await this.deactivate("Database is being saved to a new location");
      await this.cache.clear();
      try {
        await fs.promises.mkdir(path.dirname(path.resolve(targetPath)), { recursive: true });
        await fs.promises.copyFile(source, targetPath);
        await this.activate(targetPath);
      } catch (err) {
        await this.restore(previous);
        throw err;
      }
      this.logger.info(`Now serving ${targetPath}`);
    });
  }

  /** Answer first, shut down shortly after. */
  requestShutdown(): void {
    setTimeout(() => {
      this.shutdown()
        .then(() => this.onShutdown?.())
        .catch((err: unknown) => {
          this.logger.error("Shutdown failed:", err);
        });
    }, SHUTDOWN_DELAY_MS);
  }

  /** Graceful shutdown. Safe to call more than once. */
  shutdown(): Promise<void> {
    if (!this.shuttingDown) {
      // Stop accepting now; the close waits for lifecycle work already queued
      this.dispatcher.pause("Server is shutting down");
      this.shuttingDown = this.serialize(() => this.runShutdown());
    }
    return this.shuttingDown;
  }

  private async runShutdown(): Promise<void> {
    this.logger.info("Shutting down...");
    await this.deactivate("Server is shutting down");
    await this.closeListeners();
    this.logger.info("Shutdown complete");
  }

  /**
   * Run lifecycle operations one at a time, in call order. A failed
   * operation is reported to its own caller and does not stop the queue.
   */
  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.lifecycle.then(operation);
    this.lifecycle = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private assertRunning(): void {
    if (this.shuttingDown) {
      throw new UnavailableError();
    }
  }

  /** Reopen `dbPath` after a failed switch, so the gateway stays usable. */
  private async restore(dbPath: string): Promise<void> {
    this.logger.info(`Restoring connection to ${dbPath}`);
    try {
      await this.activate(dbPath);
    } catch (err) {
      this.logger.error(`Failed to restore database ${dbPath}:`, err);
    }
  }

  private async activate(dbPath: string): Promise<void> {
    const database = await this.openDatabase(dbPath);
    this.database = database;
    this.dbPath = dbPath;
    this.executor.open(database);
    if (!this.shuttingDown) {
      this.dispatcher.resume();
    }
  }

  private async deactivate(reason: string): Promise<void> {
    this.dispatcher.pause(reason);

    const interrupted = this.registry.interruptAll();
    if (interrupted > 0) {
      this.logger.info(`Interrupted ${interrupted} running queries`);
    }

    const database = this.database;
    if (!database) return;
    this.database = null;

    await this.executor.close();
    try {
      await database.checkpoint();
    } catch (err) {
      this.logger.warn(`Checkpoint of ${database.path} failed:`, err);
    }
    await database.close();
  }

  private async closeListeners(): Promise<void> {
    const sockets = this.sockets;
    const server = this.server;
    this.sockets = null;
    this.server = null;

    if (sockets) {
      for (const client of sockets.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve, reject) =>
        sockets.close((err) => (err ? reject(err) : resolve()))
      );
    }
    if (server) {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) =>
        server.close((err) => (err ? reject(err) : resolve()))
      );
    }
  }
}
