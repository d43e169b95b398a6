import { describe, it } from "node:test";
import assert from "node:assert";
import { CursorRegistry } from "../services/cursorRegistry";
import { ConflictError } from "../services/errors";

class CountingCursor {
  interrupts = 0;
  interrupt(): void {
    this.interrupts++;
  }
}

describe("CursorRegistry", () => {
  it("interrupt of an unknown id returns false", () => {
    const registry = new CursorRegistry();
    assert.strictEqual(registry.interrupt("nope"), false);
  });

  it("interrupts the bound cursor and aborts the signal", () => {
    const registry = new CursorRegistry();
    const cursor = new CountingCursor();
    const registration = registry.register("q1", cursor);

    assert.strictEqual(registry.interrupt("q1"), true);
    assert.strictEqual(registration.signal.aborted, true);
    assert.strictEqual(cursor.interrupts, 1);

    registry.unregister("q1", registration);
  });

  it("interrupts a cursor bound after the interrupt arrived", () => {
    const registry = new CursorRegistry();
    const registration = registry.register("q1");
    registry.interrupt("q1");

    const cursor = new CountingCursor();
    registration.bind(cursor);
    assert.strictEqual(cursor.interrupts, 1);

    registry.unregister("q1", registration);
  });

  it("rejects a duplicate live id and keeps the first registration", () => {
    const registry = new CursorRegistry();
    const first = registry.register("q1");

    assert.throws(() => registry.register("q1"), ConflictError);
    assert.strictEqual(registry.size, 1);

    registry.unregister("q1", first);
    assert.strictEqual(registry.has("q1"), false);
  });

  it("allows reuse of an id after unregister", () => {
    const registry = new CursorRegistry();
    registry.unregister("q1", registry.register("q1"));
    const again = registry.register("q1");
    assert.strictEqual(registry.has("q1"), true);
    registry.unregister("q1", again);
  });

  it("a stale unregister leaves a newer registration alone", () => {
    const registry = new CursorRegistry();
    const stale = registry.register("q1");
    registry.unregister("q1", stale);
    const fresh = registry.register("q1");

    registry.unregister("q1", stale);
    assert.strictEqual(registry.has("q1"), true);

    registry.unregister("q1", fresh);
    assert.strictEqual(registry.has("q1"), false);
  });

  it("repeats the interrupt until released", async () => {
    const registry = new CursorRegistry();
    const cursor = new CountingCursor();
    const registration = registry.register("q1", cursor);

    registry.interrupt("q1");
    await new Promise((resolve) => setTimeout(resolve, 80));
    const seen = cursor.interrupts;
    assert.ok(seen >= 2, `expected repeated interrupts, saw ${seen}`);

    registry.unregister("q1", registration);
    await new Promise((resolve) => setTimeout(resolve, 60));
    assert.strictEqual(cursor.interrupts, seen);
  });

  it("a released registration no longer reaches its cursor", () => {
    const registry = new CursorRegistry();
    const cursor = new CountingCursor();
    const registration = registry.register("q1", cursor);
    registry.unregister("q1", registration);

    registration.interrupt();
    assert.strictEqual(cursor.interrupts, 0);
  });

  it("interruptAll interrupts every registration", () => {
    const registry = new CursorRegistry();
    const a = new CountingCursor();
    const b = new CountingCursor();
    const ra = registry.register("a", a);
    const rb = registry.register("b", b);

    assert.strictEqual(registry.interruptAll(), 2);
    assert.strictEqual(a.interrupts, 1);
    assert.strictEqual(b.interrupts, 1);

    registry.unregister("a", ra);
    registry.unregister("b", rb);
  });
});
