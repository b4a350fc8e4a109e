/**
 * Tests for per-user write serialization
 */

import { describe, it, expect } from "vitest";
import { ProfileLock, getProfileLock } from "../../../src/lib/sync/profile-lock";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("ProfileLock", () => {
  it("should run tasks for the same user one at a time, in order", async () => {
    const lock = new ProfileLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive("user-1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.runExclusive("user-1", async () => {
      order.push("second");
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("should not block other users", async () => {
    const lock = new ProfileLock();
    const gate = deferred();

    const held = lock.runExclusive("user-1", () => gate.promise);
    const other = await lock.runExclusive("user-2", async () => "done");

    expect(other).toBe("done");
    expect(lock.isLocked("user-1")).toBe(true);

    gate.resolve();
    await held;
  });

  it("should not lose updates under concurrent read-modify-write", async () => {
    const lock = new ProfileLock();
    let counter = 0;

    await Promise.all(
      Array.from({ length: 20 }, () =>
        lock.runExclusive("user-1", async () => {
          const read = counter;
          await new Promise((resolve) => setTimeout(resolve, 1));
          counter = read + 1;
        })
      )
    );

    expect(counter).toBe(20);
  });

  it("should release the key after a failing task", async () => {
    const lock = new ProfileLock();

    await expect(
      lock.runExclusive("user-1", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(lock.isLocked("user-1")).toBe(false);
    expect(lock.activeKeys).toBe(0);
    await expect(lock.runExclusive("user-1", async () => 42)).resolves.toBe(42);
  });

  it("should share one lock across callers", () => {
    expect(getProfileLock()).toBe(getProfileLock());
  });
});
