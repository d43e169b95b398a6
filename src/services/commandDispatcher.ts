/**
 * Command Dispatcher
 *
 * Decodes one command, runs it, and produces exactly one envelope for it.
 * Both transports go through here. Nothing thrown while handling a command
 * escapes dispatch(); it becomes an `{ type: "error" }` envelope instead.
 */

import { z } from "zod";
import type { OutputFormat } from "./duckdb";
import { CursorRegistry, Registration } from "./cursorRegistry";
import {
  CancelledError,
  DecodeError,
  ErrorKind,
  GatewayError,
  UnavailableError,
  toGatewayError,
} from "./errors";
import { Logger, silentLogger } from "./logger";
import { ResultCache } from "./resultCacheService";
import { TaskExecutor, WorkFn } from "./taskExecutor";

// ============================================================================
// Protocol
// ============================================================================

export type Envelope =
  | { type: "done" }
  | { type: "json"; data: Uint8Array }
  | { type: "arrow"; data: Uint8Array }
  | { type: "error"; error: string; kind: ErrorKind };

export type ErrorEnvelope = Extract<Envelope, { type: "error" }>;

/** Send capability handed to transports and extensions. */
export type Respond = (envelope: Envelope) => void | Promise<void>;

const DONE: Envelope = { type: "done" };

const rawCommandSchema = z
  .object({
    type: z.string().min(1),
    queryId: z.string().min(1).optional(),
  })
  .passthrough();

/** A command as received; only `type` and `queryId` are checked. */
export type RawCommand = z.infer<typeof rawCommandSchema>;

const sqlFields = {
  sql: z.string().min(1),
  queryId: z.string().min(1).optional(),
};

const commandSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("exec"), ...sqlFields }),
  z.object({
    type: z.literal("json"),
    ...sqlFields,
    persist: z.boolean().default(true),
  }),
  z.object({
    type: z.literal("arrow"),
    ...sqlFields,
    persist: z.boolean().default(true),
  }),
  z.object({ type: z.literal("cancel"), queryId: z.string().min(1) }),
  z.object({
    type: z.literal("insertArrowFile"),
    fileName: z.string().min(1),
    tableName: z.string().min(1),
    queryId: z.string().min(1).optional(),
  }),
  z.object({
    type: z.literal("saveProjectAs"),
    targetPath: z.string().min(1),
    sourcePath: z.string().min(1).optional(),
  }),
]);

export type Command = z.infer<typeof commandSchema>;
export type ExecCommand = Extract<Command, { type: "exec" }>;
export type JsonCommand = Extract<Command, { type: "json" }>;
export type ArrowCommand = Extract<Command, { type: "arrow" }>;
export type CancelCommand = Extract<Command, { type: "cancel" }>;
export type InsertArrowFileCommand = Extract<Command, { type: "insertArrowFile" }>;
export type SaveProjectAsCommand = Extract<Command, { type: "saveProjectAs" }>;

export const BUILTIN_COMMANDS = [
  "exec",
  "json",
  "arrow",
  "cancel",
  "insertArrowFile",
  "saveProjectAs",
] as const;

/** Switches the served database; implemented by the gateway. */
export interface ProjectControl {
  /**
   * Copy the database at `sourcePath` (default: the open one) to
   * `targetPath` and continue on the copy.
   */
  saveProjectAs(targetPath: string, sourcePath?: string): Promise<void>;
}

// ============================================================================
// Extension hook
// ============================================================================

/**
 * What an extension returns:
 * - `undefined` / `false`: not handled, built-in handling continues
 * - `true`: the extension already responded through `respond`
 * - an envelope: the dispatcher sends it
 */
export type ExtensionResult = undefined | boolean | Envelope;

export interface CommandExtension {
  handle(
    respond: Respond,
    cache: ResultCache,
    command: RawCommand,
    queryId: string | undefined
  ): ExtensionResult | Promise<ExtensionResult>;
}

// ============================================================================
// Decoding
// ============================================================================

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    )
    .join("; ");
}

/**
 * Check the command envelope: an object with a string `type`.
 * @throws DecodeError
 */
export function decodeRawCommand(raw: unknown): RawCommand {
  const result = rawCommandSchema.safeParse(raw);
  if (!result.success) {
    throw new DecodeError(`Invalid command: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function isBuiltin(type: string): type is Command["type"] {
  return BUILTIN_COMMANDS.some((name) => name === type);
}

/**
 * Decode into one of the built-in commands.
 * @throws DecodeError for unknown types and missing fields
 */
export function decodeCommand(raw: RawCommand): Command {
  if (!isBuiltin(raw.type)) {
    throw new DecodeError(`Unknown command type "${raw.type}"`);
  }
  const result = commandSchema.safeParse(raw);
  if (!result.success) {
    throw new DecodeError(`Invalid "${raw.type}" command: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function errorEnvelope(error: GatewayError): ErrorEnvelope {
  return { type: "error", error: error.message, kind: error.kind };
}

// ============================================================================
// Dispatcher
// ============================================================================

export interface DispatcherOptions {
  executor: TaskExecutor;
  registry: CursorRegistry;
  cache: ResultCache;
  extension?: CommandExtension;
  projects?: ProjectControl;
  logger?: Logger;
}

export class CommandDispatcher {
  private readonly executor: TaskExecutor;
  private readonly registry: CursorRegistry;
  private readonly cache: ResultCache;
  private readonly extension?: CommandExtension;
  private readonly projects?: ProjectControl;
  private readonly logger: Logger;
  /** Executions in progress by cache key, joined by identical requests */
  private readonly inflight = new Map<string, Promise<Uint8Array>>();
  private unavailableReason: string | null = null;

  constructor(options: DispatcherOptions) {
    this.executor = options.executor;
    this.registry = options.registry;
    this.cache = options.cache;
    this.extension = options.extension;
    this.projects = options.projects;
    this.logger = options.logger ?? silentLogger;
  }

  /** Reject everything except `cancel` until resume() is called. */
  pause(reason = "Server is shutting down"): void {
    this.unavailableReason = reason;
  }

  resume(): void {
    this.unavailableReason = null;
  }

  get accepting(): boolean {
    return this.unavailableReason === null;
  }

  /**
   * Handle one command. `respond` is called exactly once.
   * @param fallbackQueryId used when the command carries no queryId of its own
   */
  async dispatch(raw: unknown, respond: Respond, fallbackQueryId?: string): Promise<void> {
    let responded = false;
    let label = "command";

    const deliver: Respond = async (envelope) => {
      if (responded) {
        this.logger.warn(`Dropped a second response to ${label}`);
        return;
      }
      responded = true;
      try {
        await respond(envelope);
      } catch (err) {
        this.logger.error(`Failed to send response to ${label}:`, err);
      }
    };

    const started = performance.now();
    try {
      const command = decodeRawCommand(raw);
      const queryId = command.queryId ?? fallbackQueryId;
      label = queryId ? `${command.type} (query_id: ${queryId})` : command.type;
      this.logger.info(`Processing command: ${label}`);
      if (typeof command.sql === "string") {
        this.logger.debug(`SQL: ${truncate(command.sql, 200)}`);
      }

      if (this.unavailableReason && command.type !== "cancel") {
        throw new UnavailableError(this.unavailableReason);
      }

      if (this.extension) {
        const outcome = await this.extension.handle(deliver, this.cache, command, queryId);
        if (outcome === true) {
          if (!responded) {
            this.logger.warn(`Extension handled ${label} without responding`);
            await deliver(DONE);
          }
          return;
        }
        if (outcome) {
          await deliver(outcome);
          return;
        }
      }

      await deliver(await this.run(decodeCommand(command), queryId));
    } catch (err) {
      const error = toGatewayError(err);
      if (error instanceof CancelledError) {
        this.logger.info(`${label} was cancelled`);
      } else {
        this.logger.error(`Error processing ${label}: ${error.message}`);
      }
      await deliver(errorEnvelope(error));
    } finally {
      this.logger.debug(`DONE ${label} in ${Math.round(performance.now() - started)} ms`);
    }
  }

  /** dispatch() for callers that want the envelope back. */
  async execute(raw: unknown, fallbackQueryId?: string): Promise<Envelope> {
    const captured: { envelope?: Envelope } = {};
    await this.dispatch(
      raw,
      (envelope) => {
        captured.envelope = envelope;
      },
      fallbackQueryId
    );
    return captured.envelope ?? DONE;
  }

  private async run(command: Command, queryId: string | undefined): Promise<Envelope> {
    switch (command.type) {
      case "cancel": {
        // An unknown or finished query is not an error
        if (!this.registry.interrupt(command.queryId)) {
          this.logger.debug(`No running query ${command.queryId} to cancel`);
        }
        return DONE;
      }
      case "exec": {
        await this.registered(queryId, (registration) =>
          this.submit(registration, "exec", (cursor) => cursor.execute(command.sql))
        );
        return DONE;
      }
      case "json":
      case "arrow": {
        const data = await this.fetch(command.type, command.sql, command.persist, queryId);
        return { type: command.type, data };
      }
      case "insertArrowFile": {
        await this.registered(queryId, (registration) =>
          this.submit(registration, "insertArrowFile", (cursor) =>
            cursor.loadArrowFile(command.tableName, command.fileName)
          )
        );
        return DONE;
      }
      case "saveProjectAs": {
        if (!this.projects) {
          throw new UnavailableError("Saving the database is not supported by this server");
        }
        await this.projects.saveProjectAs(command.targetPath, command.sourcePath);
        return DONE;
      }
    }
  }

  /**
   * Serve from cache, or join an identical execution already in flight, or
   * execute. A successful result is written to the cache before it is
   * returned, so a later identical request finds it.
   *
   * The queryId is registered before anything else, so a live duplicate is a
   * conflict and a request that joins another execution can still be
   * cancelled on its own.
   */
  private fetch(
    format: OutputFormat,
    sql: string,
    persist: boolean,
    queryId: string | undefined
  ): Promise<Uint8Array> {
    return this.registered(queryId, async (registration) => {
      const key = this.cache.key(sql, format);

      const cached = await this.cache.get(key);
      if (cached) {
        return cached;
      }

      const pending = this.inflight.get(key);
      if (pending) {
        this.logger.debug(`Joining in-flight execution of ${key}`);
        try {
          return await follow(pending, registration?.signal);
        } catch (err) {
          // A cancelled leader leaves this request to run on its own
          if (!(err instanceof CancelledError) || registration?.interrupted) throw err;
        }
      }

      const execution = (async () => {
        const data = await this.submit(registration, format, (cursor) =>
          format === "json" ? cursor.fetchJson(sql) : cursor.fetchArrow(sql)
        );
        if (persist) {
          await this.cache.put(key, data);
        }
        return data;
      })();

      this.inflight.set(key, execution);
      try {
        return await execution;
      } finally {
        if (this.inflight.get(key) === execution) {
          this.inflight.delete(key);
        }
      }
    });
  }

  /**
   * Run `fn` with `queryId` registered (a live duplicate throws ConflictError
   * before `fn` starts), unregistering on every exit path.
   */
  private async registered<T>(
    queryId: string | undefined,
    fn: (registration: Registration | undefined) => Promise<T>
  ): Promise<T> {
    if (!queryId) {
      return fn(undefined);
    }
    const registration = this.registry.register(queryId);
    try {
      return await fn(registration);
    } finally {
      this.registry.unregister(queryId, registration);
    }
  }

  /**
   * Submit work to the executor. A registration aborts the task while it is
   * queued, is bound to the cursor once it runs, and is released before the
   * cursor goes back to the pool.
   */
  private submit<T>(
    registration: Registration | undefined,
    label: string,
    work: WorkFn<T>
  ): Promise<T> {
    if (!registration) {
      return this.executor.submit(work, { label });
    }
    const { queryId } = registration;
    return this.executor.submit(work, {
      label: `${label} ${queryId}`,
      signal: registration.signal,
      onStart: (cursor) => registration.bind(cursor),
      onFinish: () => this.registry.unregister(queryId, registration),
    });
  }
}

/** Wait for `pending`, or reject with CancelledError once `signal` aborts. */
function follow<T>(pending: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return pending;
  }
  if (signal.aborted) {
    return Promise.reject(new CancelledError());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener("abort", onAbort, { once: true });
    pending.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
