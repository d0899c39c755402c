import { describe, it, expect } from "vitest";
import { KeyedLock } from "../src/utils/keyedLock.js";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe("KeyedLock", () => {
  it("runs tasks for the same key one after another", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run("BTC", async () => {
        events.push("a:start");
        await tick();
        events.push("a:end");
      }),
      lock.run("BTC", async () => {
        events.push("b:start");
        events.push("b:end");
      }),
    ]);

    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
    expect(lock.isLocked("BTC")).toBe(false);
  });

  it("lets different keys overlap", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run("BTC", async () => {
        events.push("btc:start");
        await tick();
        events.push("btc:end");
      }),
      lock.run("ETH", async () => {
        events.push("eth:start");
      }),
    ]);

    expect(events).toEqual(["btc:start", "eth:start", "btc:end"]);
  });

  it("releases the key when a task rejects", async () => {
    const lock = new KeyedLock();

    await expect(lock.run("BTC", async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(lock.run("BTC", async () => 42)).resolves.toBe(42);
    expect(lock.isLocked("BTC")).toBe(false);
  });
});
