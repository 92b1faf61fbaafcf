import { describe, it, expect } from "vitest";

import { Mutex } from "./mutex.js";

describe("Mutex", () => {
  it("runs exclusive sections one at a time in call order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const section = (name: string) =>
      mutex.runExclusive(async () => {
        events.push(`${name}:start`);
        await Promise.resolve();
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([section("a"), section("b"), section("c")]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
    expect(mutex.locked).toBe(false);
  });

  it("releases the lock when a section throws", async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(mutex.locked).toBe(false);
    expect(await mutex.runExclusive(async () => 42)).toBe(42);
  });
});
