/**
 * WebSocket adapter
 *
 * Every text message is one command and gets exactly one frame back:
 * - json   payload as a text frame
 * - arrow  payload as a binary frame
 * - done   {"type":"done"}
 * - error  {"type":"error","error":...,"kind":...,"queryId"?:...}
 *
 * Messages are dispatched concurrently, so replies can arrive out of order;
 * clients correlate them by queryId.
 */

import { randomUUID } from "crypto";
import type { Server } from "http";
import { RawData, WebSocket, WebSocketServer } from "ws";
import { CommandDispatcher, Envelope } from "../services/commandDispatcher";
import { CursorRegistry } from "../services/cursorRegistry";
import { ErrorKind } from "../services/errors";
import { Logger, silentLogger } from "../services/logger";

export type Frame = string | Uint8Array;

export type SendFrame = (frame: Frame) => Promise<void>;

const textDecoder = new TextDecoder();

export function errorFrame(error: string, kind: ErrorKind, queryId?: string): string {
  return JSON.stringify(
    queryId === undefined ? { type: "error", error, kind } : { type: "error", error, kind, queryId }
  );
}

/** Encode an envelope as a single frame. */
export function toFrame(envelope: Envelope, queryId?: string): Frame {
  switch (envelope.type) {
    case "done":
      return JSON.stringify({ type: "done" });
    case "json":
      return textDecoder.decode(envelope.data);
    case "arrow":
      return envelope.data;
    case "error":
      return errorFrame(envelope.error, envelope.kind, queryId);
  }
}

function ownQueryId(raw: unknown): string | undefined {
  if (typeof raw === "object" && raw !== null && "queryId" in raw) {
    const { queryId } = raw;
    if (typeof queryId === "string" && queryId.length > 0) {
      return queryId;
    }
  }
  return undefined;
}

/**
 * One connected client. Transport-agnostic: frames go out through `send`.
 */
export class SocketSession {
  /** Query ids this session has in flight, interrupted on close */
  private readonly pending = new Set<string>();
  private readonly inflight = new Set<Promise<void>>();
  private closed = false;

  constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly registry: CursorRegistry,
    private readonly send: SendFrame,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Handle one incoming message. Resolves once its reply has been sent
   * (or failed to send); never rejects.
   */
  handleMessage(data: Frame, isBinary: boolean): Promise<void> {
    const task = this.process(data, isBinary).finally(() => {
      this.inflight.delete(task);
    });
    this.inflight.add(task);
    return task;
  }

  /** Interrupt everything still running for this client. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const queryId of this.pending) {
      if (this.registry.interrupt(queryId)) {
        this.logger.info(`Client disconnected, interrupted query ${queryId}`);
      }
    }
    this.pending.clear();
  }

  /** Resolves once every message received so far has been answered. */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  get pendingQueries(): number {
    return this.pending.size;
  }

  private async process(data: Frame, isBinary: boolean): Promise<void> {
    if (isBinary || typeof data !== "string") {
      await this.reply(errorFrame("Binary messages are not supported", "decode"));
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch {
      await this.reply(errorFrame("Message is not valid JSON", "decode"));
      return;
    }

    const clientQueryId = ownQueryId(raw);
    // Commands without an id still get one so a disconnect can interrupt them
    const queryId = clientQueryId ?? `ws-${randomUUID()}`;
    const tracked = !this.closed && !this.pending.has(queryId);
    if (tracked) {
      this.pending.add(queryId);
    }

    try {
      await this.dispatcher.dispatch(
        raw,
        (envelope) => this.reply(toFrame(envelope, clientQueryId)),
        queryId
      );
    } finally {
      if (tracked) {
        this.pending.delete(queryId);
      }
    }
  }

  private async reply(frame: Frame): Promise<void> {
    if (this.closed) {
      this.logger.debug("Dropping reply for a closed socket");
      return;
    }
    try {
      await this.send(frame);
    } catch (err) {
      this.logger.warn("Failed to send WebSocket frame:", err);
    }
  }
}

function rawDataToFrame(data: RawData, isBinary: boolean): Frame {
  const buffer = Array.isArray(data)
    ? Buffer.concat(data)
    : Buffer.isBuffer(data)
      ? data
      : Buffer.from(data);
  return isBinary ? new Uint8Array(buffer) : buffer.toString("utf8");
}

function sendOn(ws: WebSocket): SendFrame {
  return (frame) =>
    new Promise<void>((resolve, reject) => {
      if (ws.readyState !== WebSocket.OPEN) {
        reject(new Error("WebSocket is not open"));
        return;
      }
      ws.send(frame, { binary: typeof frame !== "string" }, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
}

export interface SocketTransportOptions {
  dispatcher: CommandDispatcher;
  registry: CursorRegistry;
  logger?: Logger;
}

/**
 * Serve the command protocol on `path` of an existing HTTP server.
 */
export function attachSocketServer(
  server: Server,
  options: SocketTransportOptions,
  path = "/"
): WebSocketServer {
  const logger = options.logger ?? silentLogger;
  const wss = new WebSocketServer({ server, path });

  wss.on("connection", (ws, request) => {
    const peer = request.socket.remoteAddress ?? "unknown";
    logger.debug(`WebSocket connected: ${peer}`);
    const session = new SocketSession(
      options.dispatcher,
      options.registry,
      sendOn(ws),
      logger
    );

    ws.on("message", (data, isBinary) => {
      session.handleMessage(rawDataToFrame(data, isBinary), isBinary).catch((err: unknown) => {
        logger.error("Unhandled WebSocket message failure:", err);
      });
    });
    ws.on("close", () => {
      logger.debug(`WebSocket disconnected: ${peer}`);
      session.close();
    });
    ws.on("error", (err) => {
      logger.warn(`WebSocket error from ${peer}:`, err);
    });
  });

  wss.on("error", (err) => {
    logger.error("WebSocket server error:", err);
  });

  return wss;
}
