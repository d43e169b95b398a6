/**
 * Unit tests for the command dispatcher, on an in-process fake database
 *
 * Run with: npx tsx --test src/test/commandDispatcher.test.ts
 */
import { describe, it } from "node:test";
import assert from "node:assert";
import {
  CommandDispatcher,
  CommandExtension,
  Envelope,
  ProjectControl,
} from "../services/commandDispatcher";
import { CursorRegistry } from "../services/cursorRegistry";
import { MemoryResultStore, ResultCache } from "../services/resultCacheService";
import { TaskExecutor } from "../services/taskExecutor";
import { FakeDatabase } from "./support/fakeDatabase";

interface Harness {
  dispatcher: CommandDispatcher;
  db: FakeDatabase;
  registry: CursorRegistry;
  cache: ResultCache;
  executor: TaskExecutor;
}

function setup(
  options: { maxWorkers?: number; extension?: CommandExtension; projects?: ProjectControl } = {}
): Harness {
  const db = new FakeDatabase();
  const executor = new TaskExecutor(options.maxWorkers ?? 2);
  executor.open(db);
  const registry = new CursorRegistry();
  const cache = new ResultCache(new MemoryResultStore());
  const dispatcher = new CommandDispatcher({
    executor,
    registry,
    cache,
    extension: options.extension,
    projects: options.projects,
  });
  return { dispatcher, db, registry, cache, executor };
}

function text(envelope: Envelope): string {
  if (envelope.type !== "json" && envelope.type !== "arrow") {
    assert.fail(`expected a payload, got ${JSON.stringify(envelope)}`);
  }
  return Buffer.from(envelope.data).toString("utf8");
}

function expectError(envelope: Envelope, kind: string, message: string): void {
  assert.deepStrictEqual(envelope, { type: "error", error: message, kind });
}

describe("CommandDispatcher", () => {
  describe("decoding", () => {
    it("rejects a non-object command", async () => {
      const { dispatcher } = setup();
      expectError(
        await dispatcher.execute("select 1"),
        "decode",
        "Invalid command: Expected object, received string"
      );
    });

    it("rejects a command without type", async () => {
      const { dispatcher } = setup();
      expectError(
        await dispatcher.execute({ sql: "select 1" }),
        "decode",
        "Invalid command: type: Required"
      );
    });

    it("rejects an unknown type", async () => {
      const { dispatcher, db } = setup();
      expectError(
        await dispatcher.execute({ type: "bogus", sql: "select 1" }),
        "decode",
        'Unknown command type "bogus"'
      );
      assert.strictEqual(db.calls.length, 0);
    });

    it("rejects a data command without sql", async () => {
      const { dispatcher } = setup();
      expectError(
        await dispatcher.execute({ type: "json", queryId: "q1" }),
        "decode",
        'Invalid "json" command: sql: Required'
      );
    });

    it("rejects a cancel without queryId", async () => {
      const { dispatcher } = setup();
      expectError(
        await dispatcher.execute({ type: "cancel" }),
        "decode",
        'Invalid "cancel" command: queryId: Required'
      );
    });
  });

  describe("data commands", () => {
    it("returns the JSON payload", async () => {
      const { dispatcher } = setup();
      const envelope = await dispatcher.execute({ type: "json", sql: "select 1", queryId: "q1" });
      assert.strictEqual(envelope.type, "json");
      assert.strictEqual(text(envelope), '[{"sql":"select 1"}]');
    });

    it("returns the Arrow payload", async () => {
      const { dispatcher } = setup();
      const envelope = await dispatcher.execute({ type: "arrow", sql: "select 1" });
      assert.strictEqual(envelope.type, "arrow");
      if (envelope.type !== "arrow") return;
      assert.deepStrictEqual([...envelope.data], [0xff, 0xff, 0xff, 0xff, 8]);
    });

    it("serves a repeated command from cache across queryIds", async () => {
      const { dispatcher, db, cache } = setup();
      const first = await dispatcher.execute({ type: "json", sql: "select 42", queryId: "a" });
      const second = await dispatcher.execute({ type: "json", sql: "select 42", queryId: "b" });

      assert.strictEqual(db.count("select 42"), 1);
      assert.strictEqual(text(second), text(first));
      assert.deepStrictEqual(cache.stats(), { hits: 1, misses: 1, writes: 1 });
    });

    it("caches json and arrow results separately", async () => {
      const { dispatcher, db } = setup();
      await dispatcher.execute({ type: "json", sql: "select 7" });
      await dispatcher.execute({ type: "arrow", sql: "select 7" });
      assert.strictEqual(db.count("select 7"), 2);
    });

    it("does not cache when persist is false", async () => {
      const { dispatcher, db } = setup();
      await dispatcher.execute({ type: "json", sql: "select 5", persist: false });
      await dispatcher.execute({ type: "json", sql: "select 5", persist: false });
      assert.strictEqual(db.count("select 5"), 2);
    });

    it("reports engine failures as execution errors and caches nothing", async () => {
      const { dispatcher, db, cache } = setup();
      const command = { type: "json", sql: "fail now", queryId: "q1" };
      expectError(
        await dispatcher.execute(command),
        "execution",
        'Parser Error: syntax error at or near "fail"'
      );
      await dispatcher.execute({ ...command, queryId: "q2" });
      assert.strictEqual(db.count("fail now"), 2);
      assert.strictEqual(cache.stats().writes, 0);
    });

    it("lets identical concurrent requests share one execution", async () => {
      const { dispatcher, db } = setup();
      const first = dispatcher.execute({ type: "json", sql: "block shared", queryId: "a" });
      await db.started("block shared");
      const second = dispatcher.execute({ type: "json", sql: "block shared", queryId: "b" });
      await new Promise((resolve) => setImmediate(resolve));

      db.release("block shared");
      const [a, b] = await Promise.all([first, second]);
      assert.strictEqual(text(a), text(b));
      assert.strictEqual(db.count("block shared"), 1);
    });

    it("cancels a request that joined another execution without stopping it", async () => {
      const { dispatcher, db, registry } = setup();
      const first = dispatcher.execute({ type: "json", sql: "block joined", queryId: "a" });
      await db.started("block joined");
      const second = dispatcher.execute({ type: "json", sql: "block joined", queryId: "b" });
      await new Promise((resolve) => setImmediate(resolve));
      assert.strictEqual(registry.has("b"), true);

      assert.deepStrictEqual(await dispatcher.execute({ type: "cancel", queryId: "b" }), {
        type: "done",
      });
      expectError(await second, "cancelled", "Query was cancelled");
      assert.strictEqual(registry.has("b"), false);

      db.release("block joined");
      assert.strictEqual(text(await first), '[{"sql":"block joined"}]');
      assert.strictEqual(db.count("block joined"), 1);
    });

    it("runs a joined request on its own when the first one is cancelled", async () => {
      const { dispatcher, db } = setup();
      const first = dispatcher.execute({ type: "json", sql: "block lead", queryId: "a" });
      await db.started("block lead");
      const second = dispatcher.execute({ type: "json", sql: "block lead", queryId: "b" });
      await new Promise((resolve) => setImmediate(resolve));

      await dispatcher.execute({ type: "cancel", queryId: "a" });
      expectError(await first, "cancelled", "Query was cancelled");

      await db.started("block lead");
      db.release("block lead");
      assert.strictEqual(text(await second), '[{"sql":"block lead"}]');
      assert.strictEqual(db.count("block lead"), 2);
    });
  });

  describe("exec", () => {
    it("returns done and never populates the cache", async () => {
      const { dispatcher, db, cache } = setup();
      assert.deepStrictEqual(
        await dispatcher.execute({ type: "exec", sql: "create table t (x int)" }),
        { type: "done" }
      );
      await dispatcher.execute({ type: "exec", sql: "create table t (x int)" });

      assert.strictEqual(db.count("create table t (x int)"), 2);
      assert.strictEqual(cache.stats().writes, 0);
    });
  });

  describe("cancel", () => {
    it("answers done for an unknown queryId", async () => {
      const { dispatcher } = setup();
      assert.deepStrictEqual(
        await dispatcher.execute({ type: "cancel", queryId: "nonexistent" }),
        { type: "done" }
      );
    });

    it("cancels a running query and frees its worker", async () => {
      const { dispatcher, db, registry, cache } = setup({ maxWorkers: 1 });
      const running = dispatcher.execute({ type: "json", sql: "block long", queryId: "q1" });
      await db.started("block long");
      assert.strictEqual(registry.has("q1"), true);

      assert.deepStrictEqual(await dispatcher.execute({ type: "cancel", queryId: "q1" }), {
        type: "done",
      });
      expectError(await running, "cancelled", "Query was cancelled");
      assert.strictEqual(registry.has("q1"), false);
      assert.strictEqual(cache.stats().writes, 0);

      const next = await dispatcher.execute({ type: "json", sql: "select 1", queryId: "q1" });
      assert.strictEqual(text(next), '[{"sql":"select 1"}]');
    });

    it("cancels a query still waiting for a worker", async () => {
      const { dispatcher, db } = setup({ maxWorkers: 1 });
      const busy = dispatcher.execute({ type: "exec", sql: "block busy", queryId: "busy" });
      await db.started("block busy");

      const waiting = dispatcher.execute({ type: "json", sql: "select waiting", queryId: "w" });
      await new Promise((resolve) => setImmediate(resolve));
      await dispatcher.execute({ type: "cancel", queryId: "w" });

      expectError(await waiting, "cancelled", "Query was cancelled");
      db.release("block busy");
      assert.deepStrictEqual(await busy, { type: "done" });
      assert.strictEqual(db.count("select waiting"), 0);
    });

    it("cancels a running exec", async () => {
      const { dispatcher, db } = setup();
      const running = dispatcher.execute({ type: "exec", sql: "block insert", queryId: "e1" });
      await db.started("block insert");
      await dispatcher.execute({ type: "cancel", queryId: "e1" });
      expectError(await running, "cancelled", "Query was cancelled");
    });
  });

  describe("queryId registration", () => {
    it("rejects a duplicate live queryId and leaves the first intact", async () => {
      const { dispatcher, db, registry } = setup();
      const first = dispatcher.execute({ type: "json", sql: "block one", queryId: "dup" });
      await db.started("block one");

      expectError(
        await dispatcher.execute({ type: "json", sql: "select 2", queryId: "dup" }),
        "conflict",
        "Query dup is already running"
      );
      assert.strictEqual(registry.has("dup"), true);
      assert.strictEqual(db.count("select 2"), 0);

      db.release("block one");
      assert.strictEqual(text(await first), '[{"sql":"block one"}]');
      assert.strictEqual(registry.size, 0);
    });

    it("rejects a duplicate live queryId even for identical SQL", async () => {
      const { dispatcher, db, registry } = setup();
      const first = dispatcher.execute({ type: "json", sql: "block d", queryId: "dup" });
      await db.started("block d");

      expectError(
        await dispatcher.execute({ type: "json", sql: "block d", queryId: "dup" }),
        "conflict",
        "Query dup is already running"
      );

      db.release("block d");
      assert.strictEqual(text(await first), '[{"sql":"block d"}]');
      assert.strictEqual(db.count("block d"), 1);
      assert.strictEqual(registry.size, 0);
    });

    it("registers under the fallback queryId", async () => {
      const { dispatcher, db, registry } = setup();
      const running = dispatcher.execute({ type: "exec", sql: "block fb" }, "fallback-id");
      await db.started("block fb");
      assert.strictEqual(registry.has("fallback-id"), true);
      db.release("block fb");
      await running;
      assert.strictEqual(registry.has("fallback-id"), false);
    });
  });

  describe("insertArrowFile", () => {
    it("loads the file on a worker and answers done", async () => {
      const { dispatcher, db, cache, registry } = setup();
      assert.deepStrictEqual(
        await dispatcher.execute({
          type: "insertArrowFile",
          fileName: "exports/trips.arrow",
          tableName: "trips",
          queryId: "load-1",
        }),
        { type: "done" }
      );
      assert.deepStrictEqual(db.calls, ["load trips from exports/trips.arrow"]);
      assert.strictEqual(cache.stats().writes, 0);
      assert.strictEqual(registry.size, 0);
    });

    it("requires a table name", async () => {
      const { dispatcher } = setup();
      expectError(
        await dispatcher.execute({ type: "insertArrowFile", fileName: "trips.arrow" }),
        "decode",
        'Invalid "insertArrowFile" command: tableName: Required'
      );
    });
  });

  describe("saveProjectAs", () => {
    it("hands the paths to the project control", async () => {
      const saved: Array<[string, string | undefined]> = [];
      const projects: ProjectControl = {
        saveProjectAs: async (targetPath, sourcePath) => {
          saved.push([targetPath, sourcePath]);
        },
      };
      const { dispatcher } = setup({ projects });
      assert.deepStrictEqual(
        await dispatcher.execute({ type: "saveProjectAs", targetPath: "copy.duckdb" }),
        { type: "done" }
      );
      assert.deepStrictEqual(saved, [["copy.duckdb", undefined]]);
    });

    it("reports a failed save as an execution error", async () => {
      const projects: ProjectControl = {
        saveProjectAs: async () => {
          throw new Error("ENOENT: no such file or directory");
        },
      };
      const { dispatcher } = setup({ projects });
      expectError(
        await dispatcher.execute({ type: "saveProjectAs", targetPath: "copy.duckdb" }),
        "execution",
        "ENOENT: no such file or directory"
      );
    });

    it("is unavailable without a project control", async () => {
      const { dispatcher } = setup();
      expectError(
        await dispatcher.execute({ type: "saveProjectAs", targetPath: "copy.duckdb" }),
        "unavailable",
        "Saving the database is not supported by this server"
      );
    });
  });

  describe("pause", () => {
    it("rejects everything except cancel while paused", async () => {
      const { dispatcher, db } = setup();
      dispatcher.pause();

      expectError(
        await dispatcher.execute({ type: "json", sql: "select 1" }),
        "unavailable",
        "Server is shutting down"
      );
      assert.deepStrictEqual(await dispatcher.execute({ type: "cancel", queryId: "x" }), {
        type: "done",
      });
      assert.strictEqual(db.calls.length, 0);

      dispatcher.resume();
      assert.strictEqual(dispatcher.accepting, true);
      assert.strictEqual((await dispatcher.execute({ type: "json", sql: "select 1" })).type, "json");
    });
  });

  describe("extension hook", () => {
    it("sends the envelope an extension returns", async () => {
      const extension: CommandExtension = {
        handle: (_respond, _cache, command) =>
          command.type === "ping" ? { type: "json", data: Buffer.from('"pong"') } : undefined,
      };
      const { dispatcher } = setup({ extension });
      assert.strictEqual(text(await dispatcher.execute({ type: "ping" })), '"pong"');
    });

    it("falls through to built-in handling when not handled", async () => {
      const seen: Array<string | undefined> = [];
      const extension: CommandExtension = {
        handle: (_respond, _cache, _command, queryId) => {
          seen.push(queryId);
          return false;
        },
      };
      const { dispatcher } = setup({ extension });
      const envelope = await dispatcher.execute({ type: "json", sql: "select 1", queryId: "q9" });
      assert.strictEqual(text(envelope), '[{"sql":"select 1"}]');
      assert.deepStrictEqual(seen, ["q9"]);
    });

    it("lets an extension respond on its own", async () => {
      const extension: CommandExtension = {
        handle: async (respond, cache, command) => {
          if (command.type !== "cached") return undefined;
          const hit = await cache.get(cache.key("select 42", "json"));
          await respond(hit ? { type: "json", data: hit } : { type: "done" });
          return true;
        },
      };
      const { dispatcher, db } = setup({ extension });
      await dispatcher.execute({ type: "json", sql: "select 42" });

      assert.strictEqual(
        text(await dispatcher.execute({ type: "cached" })),
        '[{"sql":"select 42"}]'
      );
      assert.strictEqual(db.count("select 42"), 1);
    });

    it("sends done when a handled extension did not respond", async () => {
      const extension: CommandExtension = { handle: () => true };
      const { dispatcher } = setup({ extension });
      assert.deepStrictEqual(await dispatcher.execute({ type: "anything" }), { type: "done" });
    });

    it("turns a throwing extension into an error envelope", async () => {
      const extension: CommandExtension = {
        handle: () => {
          throw new Error("extension exploded");
        },
      };
      const { dispatcher } = setup({ extension });
      expectError(await dispatcher.execute({ type: "json", sql: "select 1" }), "execution", "extension exploded");
    });

    it("does not consult the extension while paused", async () => {
      let calls = 0;
      const extension: CommandExtension = {
        handle: () => {
          calls++;
          return undefined;
        },
      };
      const { dispatcher } = setup({ extension });
      dispatcher.pause("Database connection is closed");
      expectError(
        await dispatcher.execute({ type: "ping" }),
        "unavailable",
        "Database connection is closed"
      );
      assert.strictEqual(calls, 0);
    });
  });

  describe("responding", () => {
    it("responds exactly once even if an extension responds twice", async () => {
      const extension: CommandExtension = {
        handle: async (respond) => {
          await respond({ type: "done" });
          await respond({ type: "done" });
          return true;
        },
      };
      const { dispatcher } = setup({ extension });
      const received: Envelope[] = [];
      await dispatcher.dispatch({ type: "twice" }, (envelope) => {
        received.push(envelope);
      });
      assert.deepStrictEqual(received, [{ type: "done" }]);
    });

    it("does not throw when the responder fails", async () => {
      const { dispatcher } = setup();
      await dispatcher.dispatch({ type: "json", sql: "select 1" }, () => {
        throw new Error("socket gone");
      });
    });
  });
});
