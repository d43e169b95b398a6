/**
 * Result Cache Service
 *
 * Stores encoded query results keyed by a fingerprint of (SQL text, output
 * format), so a repeated query is answered without running it again. The
 * fingerprint does not depend on the process, so results survive restarts
 * when the filesystem store is used.
 */

import { createHash, randomUUID } from "crypto";
import * as fs from "fs/promises";
import * as path from "path";
import type { OutputFormat } from "./duckdb";
import { Logger, silentLogger } from "./logger";

// ============================================================================
// Types
// ============================================================================

export interface ResultStore {
  get(key: string): Promise<Uint8Array | undefined>;
  set(key: string, value: Uint8Array): Promise<void>;
  clear(): Promise<void>;
}

export interface CacheStats {
  hits: number;
  misses: number;
  writes: number;
}

// ============================================================================
// Fingerprint
// ============================================================================

/**
 * Deterministic cache key: sha256 of the SQL text plus the format as suffix.
 * The queryId plays no part, so identical queries from different clients
 * share one entry.
 */
export function fingerprint(sql: string, format: OutputFormat): string {
  return `${createHash("sha256").update(sql, "utf8").digest("hex")}.${format}`;
}

// ============================================================================
// Stores
// ============================================================================

/**
 * Persistent store. One file per entry, under a two-character prefix
 * directory:
 * ```
 * <dir>/results/
 * ├── ab/
 * │   └── abcd1234....json
 * ```
 */
export class FilesystemResultStore implements ResultStore {
  private readonly root: string;

  constructor(cacheDir: string) {
    this.root = path.join(cacheDir, "results");
  }

  async get(key: string): Promise<Uint8Array | undefined> {
    try {
      return await fs.readFile(this.entryPath(key));
    } catch (err) {
      if (isNotFound(err)) {
        return undefined;
      }
      throw err;
    }
  }

  async set(key: string, value: Uint8Array): Promise<void> {
    const target = this.entryPath(key);
    await fs.mkdir(path.dirname(target), { recursive: true });
    // Readers never see a partially written entry
    const temp = `${target}.${randomUUID()}.tmp`;
    await fs.writeFile(temp, value);
    await fs.rename(temp, target);
  }

  async clear(): Promise<void> {
    await fs.rm(this.root, { recursive: true, force: true });
  }

  get directory(): string {
    return this.root;
  }

  private entryPath(key: string): string {
    if (!/^[A-Za-z0-9._-]+$/.test(key)) {
      throw new Error(`Invalid cache key: ${key}`);
    }
    return path.join(this.root, key.slice(0, 2), key);
  }
}

const DEFAULT_MAX_ENTRIES = 500;

/** Bounded in-memory store; evicts the oldest entry when full. */
export class MemoryResultStore implements ResultStore {
  private readonly entries = new Map<string, { value: Uint8Array; cachedAt: number }>();

  constructor(private readonly maxEntries = DEFAULT_MAX_ENTRIES) {}

  async get(key: string): Promise<Uint8Array | undefined> {
    return this.entries.get(key)?.value;
  }

  async set(key: string, value: Uint8Array): Promise<void> {
    this.entries.delete(key);
    this.entries.set(key, { value, cachedAt: Date.now() });

    // Evict oldest entries if over limit
    if (this.entries.size > this.maxEntries) {
      let oldestKey: string | undefined;
      let oldestTime = Infinity;
      for (const [k, v] of this.entries) {
        if (v.cachedAt < oldestTime) {
          oldestTime = v.cachedAt;
          oldestKey = k;
        }
      }
      if (oldestKey !== undefined) {
        this.entries.delete(oldestKey);
      }
    }
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/** Cache disabled: every lookup misses, writes are dropped. */
export class NoopResultStore implements ResultStore {
  async get(_key: string): Promise<Uint8Array | undefined> {
    return undefined;
  }

  async set(_key: string, _value: Uint8Array): Promise<void> {}

  async clear(): Promise<void> {}
}

// ============================================================================
// Cache
// ============================================================================

/**
 * Front for a ResultStore. Store failures are logged and count as a miss
 * (on read) or a skipped write; they never fail the query.
 */
export class ResultCache {
  private readonly counters: CacheStats = { hits: 0, misses: 0, writes: 0 };

  constructor(
    private readonly store: ResultStore,
    private readonly logger: Logger = silentLogger
  ) {}

  key(sql: string, format: OutputFormat): string {
    return fingerprint(sql, format);
  }

  async get(key: string): Promise<Uint8Array | undefined> {
    let value: Uint8Array | undefined;
    try {
      value = await this.store.get(key);
    } catch (err) {
      this.logger.warn(`Cache read failed for ${key}:`, err);
    }
    if (value === undefined) {
      this.counters.misses++;
      return undefined;
    }
    this.counters.hits++;
    this.logger.debug(`Cache hit ${key}`);
    return value;
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    try {
      await this.store.set(key, value);
      this.counters.writes++;
    } catch (err) {
      this.logger.warn(`Cache write failed for ${key}:`, err);
    }
  }

  async clear(): Promise<void> {
    await this.store.clear();
    this.logger.info("Result cache cleared");
  }

  stats(): CacheStats {
    return { ...this.counters };
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
