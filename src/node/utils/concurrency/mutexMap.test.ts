import { describe, test, expect } from "@jest/globals";
import { MutexMap } from "./mutexMap";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("MutexMap", () => {
  test("serializes operations on the same key in call order", async () => {
    const locks = new MutexMap<string>();
    const events: string[] = [];

    await Promise.all([
      locks.withLock("a", async () => {
        events.push("first:start");
        await delay(20);
        events.push("first:end");
      }),
      locks.withLock("a", async () => {
        events.push("second:start");
        await delay(1);
        events.push("second:end");
      }),
    ]);

    expect(events).toEqual(["first:start", "first:end", "second:start", "second:end"]);
    expect(locks.isLocked("a")).toBe(false);
  });

  test("does not block other keys", async () => {
    const locks = new MutexMap<string>();
    const events: string[] = [];

    await Promise.all([
      locks.withLock("a", async () => {
        await delay(20);
        events.push("a");
      }),
      locks.withLock("b", async () => {
        events.push("b");
      }),
    ]);

    expect(events).toEqual(["b", "a"]);
  });

  test("a failed operation releases the lock and fails only its caller", async () => {
    const locks = new MutexMap<string>();

    const failed = locks.withLock("a", async () => {
      throw new Error("write failed");
    });
    const next = locks.withLock("a", async () => "written");

    await expect(failed).rejects.toThrow("write failed");
    await expect(next).resolves.toBe("written");
  });

  test("drain waits for queued work", async () => {
    const locks = new MutexMap<string>();
    let done = false;
    const pending = locks.withLock("a", async () => {
      await delay(10);
      done = true;
    });

    await locks.drain("a");

    expect(done).toBe(true);
    await pending;
  });
});
