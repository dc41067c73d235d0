import { describe, it, expect } from "vitest";
import { KeyedLock } from "../../src/utils/keyedLock.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("KeyedLock", () => {
  it("runs work for the same key one at a time, in order", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run("pair", async () => {
        events.push("first:start");
        await delay(20);
        events.push("first:end");
      }),
      lock.run("pair", async () => {
        events.push("second:start");
        events.push("second:end");
      }),
    ]);

    expect(events).toEqual(["first:start", "first:end", "second:start", "second:end"]);
  });

  it("lets different keys overlap", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run("a", async () => {
        events.push("a:start");
        await delay(20);
        events.push("a:end");
      }),
      lock.run("b", async () => {
        events.push("b:start");
        events.push("b:end");
      }),
    ]);

    expect(events).toEqual(["a:start", "b:start", "b:end", "a:end"]);
  });

  it("releases the key when work throws", async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run("pair", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    await expect(lock.run("pair", async () => "next")).resolves.toBe("next");
    expect(lock.size).toBe(0);
  });
});
