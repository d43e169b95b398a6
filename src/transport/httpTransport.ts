/**
 * HTTP adapter
 *
 * Routes:
 * - GET  /?query=<command JSON>   same as POST /, for debugging from a browser
 * - POST /                        command as JSON body, one envelope back
 * - POST /cancel {queryId}        interrupt a running query
 * - POST /shutdown                graceful shutdown
 * - POST /connection {action}     release or switch the database file
 */

import { randomUUID } from "crypto";
import { Context, Hono } from "hono";
import { cors } from "hono/cors";
import { z } from "zod";
import { CommandDispatcher, Envelope } from "../services/commandDispatcher";
import { CursorRegistry } from "../services/cursorRegistry";
import { DecodeError, GatewayError, toGatewayError } from "../services/errors";
import { Logger, silentLogger } from "../services/logger";

export const QUERY_ID_HEADER = "X-Query-ID";

/** Lifecycle operations the HTTP routes can trigger. */
export interface GatewayControl {
  requestShutdown(): void;
  closeConnection(): Promise<void>;
  reopen(dbPath?: string): Promise<string>;
}

export interface HttpTransportOptions {
  dispatcher: CommandDispatcher;
  registry: CursorRegistry;
  control: GatewayControl;
  logger?: Logger;
}

const cancelBodySchema = z.object({ queryId: z.string().min(1) });

const connectionBodySchema = z.object({
  action: z.enum(["close", "reopen"]),
  dbPath: z.string().min(1).optional(),
});

/**
 * Map an envelope to an HTTP response. `queryId` is echoed in X-Query-ID.
 */
export function toHttpResponse(envelope: Envelope, queryId?: string): Response {
  const headers = new Headers();
  if (queryId) {
    headers.set(QUERY_ID_HEADER, queryId);
  }

  switch (envelope.type) {
    case "done":
      headers.set("Content-Type", "text/plain; charset=utf-8");
      return new Response("", { status: 200, headers });
    case "json":
      headers.set("Content-Type", "application/json");
      return new Response(new Uint8Array(envelope.data), { status: 200, headers });
    case "arrow":
      headers.set("Content-Type", "application/octet-stream");
      return new Response(new Uint8Array(envelope.data), { status: 200, headers });
    case "error": {
      headers.set("Content-Type", "application/json");
      const body = JSON.stringify({
        success: false,
        error: { message: envelope.error, kind: envelope.kind },
      });
      return new Response(body, { status: statusForKind(envelope.kind), headers });
    }
  }
}

function statusForKind(kind: GatewayError["kind"]): number {
  switch (kind) {
    case "decode":
      return 400;
    case "conflict":
      return 409;
    case "cancelled":
      return 499;
    case "unavailable":
      return 503;
    case "execution":
      return 500;
  }
}

function errorResponse(error: GatewayError, queryId?: string): Response {
  return toHttpResponse({ type: "error", error: error.message, kind: error.kind }, queryId);
}

/** The command's own queryId, if it carries a usable one. */
function commandQueryId(raw: unknown): string | undefined {
  if (typeof raw === "object" && raw !== null && "queryId" in raw) {
    const { queryId } = raw;
    if (typeof queryId === "string" && queryId.length > 0) {
      return queryId;
    }
  }
  return undefined;
}

async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw new DecodeError("Request body is not valid JSON");
  }
}

export function createHttpApp(options: HttpTransportOptions): Hono {
  const { dispatcher, registry, control } = options;
  const logger = options.logger ?? silentLogger;
  const app = new Hono();

  app.use(
    "*",
    cors({
      origin: "*",
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", QUERY_ID_HEADER],
      exposeHeaders: [QUERY_ID_HEADER],
    })
  );

  /**
   * Dispatch one command. The query is registered under the command's
   * queryId, else the X-Query-ID header, else a fresh UUID. If the client
   * goes away first, the query is interrupted.
   */
  const runCommand = async (c: Context, raw: unknown): Promise<Response> => {
    const queryId =
      commandQueryId(raw) ?? c.req.header(QUERY_ID_HEADER) ?? randomUUID();

    const signal = c.req.raw.signal;
    const onDisconnect = () => {
      if (registry.interrupt(queryId)) {
        logger.info(`Client disconnected, interrupted query ${queryId}`);
      }
    };
    signal.addEventListener("abort", onDisconnect, { once: true });
    try {
      const envelope = await dispatcher.execute(raw, queryId);
      return toHttpResponse(envelope, queryId);
    } finally {
      signal.removeEventListener("abort", onDisconnect);
    }
  };

  app.get("/", async (c) => {
    const query = c.req.query("query");
    if (query === undefined) {
      return c.text("Missing query parameter", 400);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(query);
    } catch {
      return c.text("Query parameter is not valid JSON", 400);
    }
    return runCommand(c, raw);
  });

  app.post("/", async (c) => {
    return runCommand(c, await readJsonBody(c));
  });

  app.post("/cancel", async (c) => {
    const parsed = cancelBodySchema.safeParse(await readJsonBody(c));
    if (!parsed.success) {
      return c.json(
        { success: false, error: { message: "queryId is required", kind: "decode" } },
        400
      );
    }
    const { queryId } = parsed.data;
    if (!registry.interrupt(queryId)) {
      return c.json(
        {
          success: false,
          error: { code: "QUERY_NOT_FOUND", message: `No running query with id ${queryId}` },
        },
        404
      );
    }
    return c.json({ success: true, message: `Query ${queryId} cancelled` });
  });

  app.post("/shutdown", (c) => {
    logger.info("Shutdown requested over HTTP");
    control.requestShutdown();
    return c.json({ success: true, message: "Server shutting down" });
  });

  app.post("/connection", async (c) => {
    const parsed = connectionBodySchema.safeParse(await readJsonBody(c));
    if (!parsed.success) {
      return c.json(
        {
          success: false,
          error: { message: 'action must be "close" or "reopen"', kind: "decode" },
        },
        400
      );
    }
    const { action, dbPath } = parsed.data;
    if (action === "close") {
      await control.closeConnection();
      return c.json({ success: true, message: "Database connection closed" });
    }
    const opened = await control.reopen(dbPath);
    return c.json({ success: true, message: `Database connection reopened at ${opened}` });
  });

  app.onError((err, c) => {
    const error = toGatewayError(err);
    if (error.kind !== "decode") {
      logger.error(`Error handling ${c.req.method} ${c.req.path}:`, err);
    }
    return errorResponse(error, c.req.header(QUERY_ID_HEADER));
  });

  return app;
}
