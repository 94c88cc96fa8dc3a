import { describe, expect, it } from "vitest";
import { KeyedMutex, TimeoutError, mapPool, withTimeout } from "./concurrency";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("mapPool", () => {
  it("keeps input order and never exceeds the limit", async () => {
    let active = 0;
    let peak = 0;
    const out = await mapPool([30, 5, 20, 1, 10], 2, async (ms, i) => {
      active++;
      peak = Math.max(peak, active);
      await sleep(ms);
      active--;
      return i * 10;
    });
    expect(out).toEqual([0, 10, 20, 30, 40]);
    expect(peak).toBe(2);
  });

  it("handles an empty list", async () => {
    expect(await mapPool([], 4, async () => 1)).toEqual([]);
  });
});

describe("KeyedMutex", () => {
  it("serializes tasks that share a key", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const task = (name: string, ms: number) => async () => {
      events.push(`${name}:start`);
      await sleep(ms);
      events.push(`${name}:end`);
    };
    await Promise.all([mutex.run("doc", task("a", 20)), mutex.run("doc", task("b", 1))]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
    expect(mutex.size()).toBe(0);
  });

  it("lets different keys run side by side", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const task = (name: string, ms: number) => async () => {
      events.push(`${name}:start`);
      await sleep(ms);
      events.push(`${name}:end`);
    };
    await Promise.all([mutex.run("x", task("a", 20)), mutex.run("y", task("b", 1))]);
    expect(events).toEqual(["a:start", "b:start", "b:end", "a:end"]);
  });

  it("releases the key when a task throws", async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.run("k", async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(await mutex.run("k", async () => "next")).toBe("next");
    expect(mutex.size()).toBe(0);
  });
});

describe("withTimeout", () => {
  it("resolves with the work when it finishes first", async () => {
    expect(await withTimeout(Promise.resolve(42), 100, "Work")).toBe(42);
  });

  it("rejects with TimeoutError when the deadline passes", async () => {
    const err = await withTimeout(new Promise<never>(() => undefined), 10, "Search").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toHaveProperty("message", "Search timed out after 10 ms");
  });
});
