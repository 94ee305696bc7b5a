/**
 * Async primitive tests
 */

import { describe, it, expect } from "vitest";
import { Mutex, ReadWriteLock } from "../async.js";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe("Mutex", () => {
  it("should run critical sections one at a time in arrival order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    await Promise.all(
      ["a", "b", "c"].map((id) =>
        mutex.runExclusive(async () => {
          events.push(`start ${id}`);
          await tick();
          events.push(`end ${id}`);
        })
      )
    );

    expect(events).toEqual(["start a", "end a", "start b", "end b", "start c", "end c"]);
    expect(mutex.isLocked).toBe(false);
  });

  it("should release after a failing section", async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(await mutex.runExclusive(() => 42)).toBe(42);
  });
});

describe("ReadWriteLock", () => {
  it("should let readers overlap", async () => {
    const lock = new ReadWriteLock();
    let peak = 0;

    await Promise.all(
      [1, 2, 3].map(() =>
        lock.withRead(async () => {
          peak = Math.max(peak, lock.activeReaders);
          await tick();
        })
      )
    );

    expect(peak).toBe(3);
    expect(lock.activeReaders).toBe(0);
  });

  it("should give writers exclusive access", async () => {
    const lock = new ReadWriteLock();
    const events: string[] = [];

    const reader = lock.withRead(async () => {
      events.push("read start");
      await tick();
      events.push("read end");
    });
    const writer = lock.withWrite(async () => {
      events.push("write start");
      await tick();
      events.push("write end");
    });
    const lateReader = lock.withRead(() => {
      events.push("late read");
    });

    await Promise.all([reader, writer, lateReader]);

    expect(events).toEqual(["read start", "read end", "write start", "write end", "late read"]);
    expect(lock.isWriting).toBe(false);
  });
});
