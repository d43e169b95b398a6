import {
  DuckDBConnection,
  DuckDBDecimalValue,
  DuckDBInstance,
  DuckDBTypeId,
  quotedIdentifier,
} from "@duckdb/node-api";
import * as fs from "fs";
import * as path from "path";
import { encodeArrow } from "./arrowEncoder";
import { arrowColumns, decodeArrowFile, toDuckDBValue } from "./arrowLoader";
import { getLoadedExtensions, loadConfiguredExtensions } from "./extensionsService";
import { Logger, silentLogger } from "./logger";

// ============================================================================
// TYPES
// ============================================================================

export type OutputFormat = "json" | "arrow";

/**
 * One engine-level handle. A cursor runs one statement at a time and can be
 * interrupted from outside while it does.
 */
export interface QueryCursor {
  /** Run for side effects only */
  execute(sql: string): Promise<void>;
  /** Run and serialize every row as a JSON array of objects (UTF-8) */
  fetchJson(sql: string): Promise<Uint8Array>;
  /** Run and serialize the result as an Arrow IPC stream */
  fetchArrow(sql: string): Promise<Uint8Array>;
  /** Create (or replace) `tableName` from the rows of an Arrow IPC file */
  loadArrowFile(tableName: string, fileName: string): Promise<void>;
  interrupt(): void;
  close(): void;
}

export interface Database {
  readonly path: string;
  openCursor(): Promise<QueryCursor>;
  checkpoint(): Promise<void>;
  close(): Promise<void>;
}

export interface DuckDBOpenOptions {
  path: string;
  threads?: number;
  memoryLimit?: string;
  tempDirectory?: string;
  maxTempDirectorySize?: string;
  /** Extension entries, e.g. "spatial" or "h3:community" */
  extensions?: readonly string[];
  logger?: Logger;
}

export const MEMORY_DATABASE = ":memory:";

// ============================================================================
// CURSOR
// ============================================================================

export class DuckDBCursor implements QueryCursor {
  constructor(private readonly connection: DuckDBConnection) {}

  async execute(sql: string): Promise<void> {
    await this.connection.run(sql);
  }

  async fetchJson(sql: string): Promise<Uint8Array> {
    const reader = await this.connection.runAndReadAll(sql);
    const columns = reader.columnNames();
    const rows = reader
      .getRowObjectsJS()
      .map((row) => serializeRow(row, columns));
    return Buffer.from(JSON.stringify(rows), "utf8");
  }

  async fetchArrow(sql: string): Promise<Uint8Array> {
    const reader = await this.connection.runAndReadAll(sql);
    const types = reader.columnTypes();
    const columns: unknown[][] = reader.getColumnsJS();

    // The JS conversion turns DECIMAL into a double; keep the exact value
    if (types.some((type) => type.typeId === DuckDBTypeId.DECIMAL)) {
      const exact = reader.getColumns();
      types.forEach((type, index) => {
        if (type.typeId === DuckDBTypeId.DECIMAL) {
          columns[index] = exact[index].map((value) =>
            value instanceof DuckDBDecimalValue ? value.value : null
          );
        }
      });
    }

    return encodeArrow({ names: reader.columnNames(), types, columns });
  }

  async loadArrowFile(tableName: string, fileName: string): Promise<void> {
    const table = decodeArrowFile(await fs.promises.readFile(fileName));
    const columns = arrowColumns(table);
    if (columns.length === 0) {
      throw new Error(`Arrow file ${fileName} has no columns`);
    }

    const definitions = columns.map((column) => `${quotedIdentifier(column.name)} ${column.type}`);
    await this.connection.run(
      `CREATE OR REPLACE TABLE ${quotedIdentifier(tableName)} (${definitions.join(", ")})`
    );

    const appender = await this.connection.createAppender(tableName);
    try {
      for (const row of table.toArray()) {
        for (const column of columns) {
          appender.appendValue(toDuckDBValue(row[column.name], column.type), column.type);
        }
        appender.endRow();
      }
      appender.flushSync();
    } finally {
      appender.closeSync();
    }
  }

  interrupt(): void {
    this.connection.interrupt();
  }

  close(): void {
    this.connection.closeSync();
  }
}

// ============================================================================
// DATABASE
// ============================================================================

/**
 * A DuckDB database file (or in-memory database) shared by every cursor.
 * Global settings and extensions are applied once through an admin
 * connection, which is also used for checkpoints.
 */
export class DuckDBDatabase implements Database {
  private closed = false;

  private constructor(
    readonly path: string,
    private readonly instance: DuckDBInstance,
    private readonly admin: DuckDBConnection,
    private readonly logger: Logger
  ) {}

  static async open(options: DuckDBOpenOptions): Promise<DuckDBDatabase> {
    const logger = options.logger ?? silentLogger;
    const started = performance.now();

    if (options.path !== MEMORY_DATABASE) {
      prepareDatabaseFile(options.path, logger);
    }

    const instanceOptions: Record<string, string> = {};
    if (options.threads !== undefined) {
      instanceOptions.threads = String(options.threads);
    }
    const instance = await DuckDBInstance.create(options.path, instanceOptions);
    const admin = await instance.connect();

    if (options.memoryLimit) {
      await admin.run(`SET memory_limit = '${escapeLiteral(options.memoryLimit)}'`);
    }
    if (options.tempDirectory) {
      fs.mkdirSync(options.tempDirectory, { recursive: true });
      await admin.run(`SET temp_directory = '${escapeLiteral(options.tempDirectory)}'`);
    }
    if (options.maxTempDirectorySize) {
      await admin.run(
        `SET max_temp_directory_size = '${escapeLiteral(options.maxTempDirectorySize)}'`
      );
    }

    const run = async (sql: string) => {
      await admin.run(sql);
    };
    await loadConfiguredExtensions(run, options.extensions ?? [], logger);

    const loaded = await getLoadedExtensions(async (sql) => {
      const reader = await admin.runAndReadAll(sql);
      return reader.getRowObjectsJS();
    });
    logger.info(
      `DuckDB opened ${options.path} in ${Math.round(performance.now() - started)} ms (extensions: ${loaded.join(", ") || "none"})`
    );

    return new DuckDBDatabase(options.path, instance, admin, logger);
  }

  async openCursor(): Promise<QueryCursor> {
    if (this.closed) {
      throw new Error(`Database ${this.path} is closed`);
    }
    const connection = await this.instance.connect();
    // JSON errors carry type and position, see parseDuckDBError
    await connection.run("SET errors_as_json = true");
    // Keep GeoParquet geometry columns as plain BLOBs; older builds lack the setting
    try {
      await connection.run("SET enable_geoparquet_conversion = false");
    } catch (err) {
      this.logger.debug(`Could not disable GeoParquet conversion: ${String(err)}`);
    }
    return new DuckDBCursor(connection);
  }

  async checkpoint(): Promise<void> {
    if (this.closed) return;
    await this.admin.run("FORCE CHECKPOINT");
    this.logger.debug(`Checkpointed ${this.path}`);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.admin.closeSync();
    this.logger.info(`DuckDB connection to ${this.path} closed`);
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

/**
 * Make sure the database directory exists and drop a zero-byte file left by
 * an earlier crash; DuckDB refuses to open one.
 */
function prepareDatabaseFile(dbPath: string, logger: Logger): void {
  const dir = path.dirname(path.resolve(dbPath));
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
    logger.info(`Created database directory: ${dir}`);
  }

  if (fs.existsSync(dbPath) && fs.statSync(dbPath).size === 0) {
    logger.warn(`Found empty database file at ${dbPath}, will create a new one`);
    fs.unlinkSync(dbPath);
  }
}

function escapeLiteral(value: string): string {
  return value.replace(/'/g, "''");
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Serialize a row to ensure all values are JSON-safe.
 */
export function serializeRow(
  row: Record<string, unknown>,
  columns: string[]
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const col of columns) {
    result[col] = serializeValue(row[col]);
  }

  return result;
}

/**
 * Serialize a single value to be JSON-safe
 */
export function serializeValue(value: unknown): unknown {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === "bigint") {
    if (value >= Number.MIN_SAFE_INTEGER && value <= Number.MAX_SAFE_INTEGER) {
      return Number(value);
    }
    return value.toString();
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  // BLOBs travel as base64 text
  if (value instanceof Uint8Array) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("base64");
  }

  if (Array.isArray(value)) {
    return value.map(serializeValue);
  }

  if (typeof value === "object") {
    const obj: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      obj[k] = serializeValue(v);
    }
    return obj;
  }

  return value;
}
