/**
 * Cursor Registry
 *
 * Tracks in-flight queries by client-chosen queryId so a second request can
 * interrupt them. At most one live registration exists per queryId; a second
 * register() while the first is live throws ConflictError.
 */

import { ConflictError } from "./errors";
import { Logger, silentLogger } from "./logger";

export interface InterruptibleCursor {
  interrupt(): void;
}

/**
 * The engine clears a pending interrupt when a statement starts, so an
 * interrupt is repeated at this interval until the work settles.
 */
const REINTERRUPT_INTERVAL_MS = 25;

export class Registration {
  private readonly controller = new AbortController();
  private cursor: InterruptibleCursor | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private released = false;

  constructor(
    readonly queryId: string,
    private readonly logger: Logger
  ) {}

  /** Aborted once the query is interrupted. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get interrupted(): boolean {
    return this.controller.signal.aborted;
  }

  /** Attach the cursor the query is running on. */
  bind(cursor: InterruptibleCursor): void {
    if (this.released) return;
    this.cursor = cursor;
    if (this.interrupted) {
      this.signalEngine();
    }
  }

  interrupt(): void {
    if (this.released) return;
    if (!this.interrupted) {
      this.controller.abort();
    }
    this.signalEngine();
    if (!this.timer) {
      this.timer = setInterval(() => this.signalEngine(), REINTERRUPT_INTERVAL_MS);
      this.timer.unref();
    }
  }

  /**
   * Detach from the cursor. Called before the cursor goes back to the pool,
   * so a late interrupt cannot reach whatever runs on it next.
   */
  release(): void {
    this.released = true;
    this.cursor = null;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private signalEngine(): void {
    if (!this.cursor) return;
    try {
      this.cursor.interrupt();
    } catch (err) {
      this.logger.error(`Error interrupting query ${this.queryId}:`, err);
    }
  }
}

export class CursorRegistry {
  private readonly registrations = new Map<string, Registration>();

  constructor(private readonly logger: Logger = silentLogger) {}

  /**
   * Register an upcoming (or running) query.
   * @throws ConflictError if `queryId` is still registered
   */
  register(queryId: string, cursor?: InterruptibleCursor): Registration {
    if (this.registrations.has(queryId)) {
      throw new ConflictError(queryId);
    }
    const registration = new Registration(queryId, this.logger);
    if (cursor) {
      registration.bind(cursor);
    }
    this.registrations.set(queryId, registration);
    return registration;
  }

  /**
   * Remove a registration. When `registration` is given, only that exact
   * registration is removed; a newer one under the same id is left alone.
   */
  unregister(queryId: string, registration?: Registration): void {
    const current = this.registrations.get(queryId);
    if (!current || (registration && current !== registration)) {
      return;
    }
    current.release();
    this.registrations.delete(queryId);
  }

  /**
   * Interrupt a running query by id. Returns whether it was registered.
   */
  interrupt(queryId: string): boolean {
    const registration = this.registrations.get(queryId);
    if (!registration) {
      return false;
    }
    this.logger.info(`Interrupting query ${queryId}`);
    registration.interrupt();
    return true;
  }

  /** Interrupt everything in flight. Used on shutdown and reconnection. */
  interruptAll(): number {
    const ids = [...this.registrations.keys()];
    for (const id of ids) {
      this.interrupt(id);
    }
    return ids.length;
  }

  has(queryId: string): boolean {
    return this.registrations.has(queryId);
  }

  get size(): number {
    return this.registrations.size;
  }
}
