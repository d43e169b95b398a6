/**
 * Task Executor
 *
 * Runs database work on a bounded pool of cursors. Each worker slot owns one
 * DuckDB connection and a connection only ever runs one task at a time. The
 * engine calls themselves execute on libuv's thread pool, so callers on the
 * event loop just await the returned promise.
 *
 * When every slot is busy, submissions wait in a FIFO queue. The queue has no
 * depth limit.
 */

import type { Database, QueryCursor } from "./duckdb";
import {
  CancelledError,
  ExecutionError,
  GatewayError,
  UnavailableError,
  isInterruptError,
} from "./errors";
import { Logger, silentLogger } from "./logger";

export type WorkFn<T> = (cursor: QueryCursor) => Promise<T>;

export interface SubmitOptions {
  /** Aborting removes a queued task, and marks a running task's failure as a cancellation */
  signal?: AbortSignal;
  /** Called with the cursor right before the work runs on it */
  onStart?: (cursor: QueryCursor) => void;
  /** Called once the work settles, before its cursor goes back to the pool */
  onFinish?: () => void;
  /** Shown in log lines */
  label?: string;
}

export interface ExecutorStats {
  maxWorkers: number;
  active: number;
  queued: number;
  idle: number;
}

interface PendingTask {
  label: string;
  signal?: AbortSignal;
  /** Runs the work and settles the caller's promise; never rejects */
  execute: (cursor: QueryCursor) => Promise<void>;
  fail: (err: GatewayError) => void;
  detach: () => void;
}

export class TaskExecutor {
  private database: Database | null = null;
  private readonly queue: PendingTask[] = [];
  private readonly idle: QueryCursor[] = [];
  private active = 0;
  private drainWaiters: Array<() => void> = [];

  constructor(
    readonly maxWorkers: number,
    private readonly logger: Logger = silentLogger
  ) {
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new Error(`maxWorkers must be a positive integer, got ${maxWorkers}`);
    }
  }

  /** Start handing out cursors from `database`. */
  open(database: Database): void {
    this.database = database;
    this.logger.debug(`Executor serving ${database.path} with ${this.maxWorkers} workers`);
    this.pump();
  }

  get isOpen(): boolean {
    return this.database !== null;
  }

  /**
   * Queue `work` and resolve with its result. Errors thrown by the work
   * reject the promise as ExecutionError (or CancelledError when the engine
   * was interrupted); the pool itself keeps running.
   */
  submit<T>(work: WorkFn<T>, options: SubmitOptions = {}): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const { signal } = options;

      if (!this.database) {
        reject(new UnavailableError("Database is not open"));
        return;
      }
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }

      const task: PendingTask = {
        label: options.label ?? "task",
        signal,
        execute: async (cursor) => {
          let finished = false;
          const finish = () => {
            if (finished) return;
            finished = true;
            options.onFinish?.();
          };
          try {
            options.onStart?.(cursor);
            if (signal?.aborted) {
              throw new CancelledError();
            }
            const value = await work(cursor);
            finish();
            resolve(value);
          } catch (err) {
            finish();
            reject(toTaskError(err, signal));
          }
        },
        fail: reject,
        detach: () => {},
      };

      if (signal) {
        const onAbort = () => this.dequeue(task, new CancelledError());
        signal.addEventListener("abort", onAbort, { once: true });
        task.detach = () => signal.removeEventListener("abort", onAbort);
      }

      this.queue.push(task);
      if (this.active >= this.maxWorkers) {
        this.logger.debug(
          `All ${this.maxWorkers} workers busy, queued ${task.label} (${this.queue.length} waiting)`
        );
      }
      this.pump();
    });
  }

  stats(): ExecutorStats {
    return {
      maxWorkers: this.maxWorkers,
      active: this.active,
      queued: this.queue.length,
      idle: this.idle.length,
    };
  }

  /**
   * Stop serving: queued tasks fail with UnavailableError, running tasks are
   * awaited, then every pooled cursor is closed.
   */
  async close(): Promise<void> {
    this.database = null;

    for (const task of this.queue.splice(0)) {
      task.detach();
      task.fail(new UnavailableError());
    }

    await this.drained();

    for (const cursor of this.idle.splice(0)) {
      this.closeCursor(cursor);
    }
  }

  private dequeue(task: PendingTask, err: GatewayError): void {
    const index = this.queue.indexOf(task);
    if (index === -1) return;
    this.queue.splice(index, 1);
    task.detach();
    task.fail(err);
  }

  private pump(): void {
    while (this.database && this.active < this.maxWorkers) {
      const task = this.queue.shift();
      if (!task) return;
      task.detach();
      this.active++;
      this.runTask(task, this.database).catch((err: unknown) => {
        this.logger.error(`Executor failed while running ${task.label}:`, err);
      });
    }
  }

  private async runTask(task: PendingTask, database: Database): Promise<void> {
    let cursor: QueryCursor | undefined;
    try {
      cursor = this.idle.pop() ?? (await database.openCursor());
      await task.execute(cursor);
    } catch (err) {
      task.fail(toTaskError(err, task.signal));
    } finally {
      this.active--;
      if (cursor) {
        this.recycle(cursor, database);
      }
      if (this.active === 0) {
        for (const waiter of this.drainWaiters.splice(0)) waiter();
      }
      this.pump();
    }
  }

  /** Return a cursor to the pool, or close it if its database is gone. */
  private recycle(cursor: QueryCursor, database: Database): void {
    if (this.database === database) {
      this.idle.push(cursor);
    } else {
      this.closeCursor(cursor);
    }
  }

  private closeCursor(cursor: QueryCursor): void {
    try {
      cursor.close();
    } catch (err) {
      this.logger.warn("Error closing cursor:", err);
    }
  }

  private drained(): Promise<void> {
    if (this.active === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.drainWaiters.push(resolve));
  }
}

function toTaskError(err: unknown, signal: AbortSignal | undefined): GatewayError {
  if (err instanceof GatewayError) {
    return err;
  }
  if (signal?.aborted || isInterruptError(err)) {
    return new CancelledError();
  }
  return ExecutionError.fromEngine(err);
}
