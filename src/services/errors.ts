/**
 * Gateway error kinds.
 *
 * Every failure a command can hit is one of these. The dispatcher turns them
 * into `{ type: "error" }` envelopes; transports map `status` onto HTTP.
 */

import { DuckDBError, parseDuckDBError } from "./duckdbError";

export type ErrorKind =
  | "decode"
  | "execution"
  | "cancelled"
  | "conflict"
  | "unavailable";

export abstract class GatewayError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly status: number;
}

/** Malformed command or missing fields. Never reaches the executor. */
export class DecodeError extends GatewayError {
  readonly kind = "decode";
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/** The engine reported a SQL or runtime failure. */
export class ExecutionError extends GatewayError {
  readonly kind = "execution";
  readonly status = 500;
  public readonly duckdbError?: DuckDBError;

  constructor(message: string, duckdbError?: DuckDBError) {
    super(message);
    this.name = "ExecutionError";
    this.duckdbError = duckdbError;
  }

  /**
   * Wrap an error thrown by the engine. DuckDB reports errors as JSON when
   * `errors_as_json` is set, so the message is parsed back into its parts.
   */
  static fromEngine(err: unknown, sql?: string): ExecutionError {
    const raw = err instanceof Error ? err.message : String(err);
    const parsed = parseDuckDBError(raw, sql);
    const message =
      parsed.type !== "Error" ? `${parsed.type} Error: ${parsed.message}` : parsed.message;
    return new ExecutionError(message, parsed);
  }
}

/** An execution was interrupted before it finished. */
export class CancelledError extends GatewayError {
  readonly kind = "cancelled";
  readonly status = 499;

  constructor(message = "Query was cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

/** A `queryId` is already registered to a running execution. */
export class ConflictError extends GatewayError {
  readonly kind = "conflict";
  readonly status = 409;

  constructor(public readonly queryId: string) {
    super(`Query ${queryId} is already running`);
    this.name = "ConflictError";
  }
}

/** The gateway is shutting down or switching databases. */
export class UnavailableError extends GatewayError {
  readonly kind = "unavailable";
  readonly status = 503;

  constructor(message = "Server is shutting down") {
    super(message);
    this.name = "UnavailableError";
  }
}

/**
 * Normalize anything thrown into a GatewayError.
 */
export function toGatewayError(err: unknown): GatewayError {
  if (err instanceof GatewayError) {
    return err;
  }
  return ExecutionError.fromEngine(err);
}

/**
 * True when the engine says the statement was interrupted.
 * With `errors_as_json` the exception type is "INTERRUPT"; the plain-text
 * form reads "INTERRUPT Error: Interrupted!".
 */
export function isInterruptError(err: unknown): boolean {
  const message = err instanceof Error ? err.message : String(err);
  return (
    /"exception_type"\s*:\s*"INTERRUPT"/.test(message) ||
    /^INTERRUPT Error/i.test(message) ||
    message.includes("Interrupted!")
  );
}
