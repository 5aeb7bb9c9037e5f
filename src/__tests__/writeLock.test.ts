import { describe, it, expect } from "vitest";
import { WriteLock } from "../locks/writeLock.js";

describe("WriteLock", () => {
  it("runs critical sections one at a time in submission order", async () => {
    const lock = new WriteLock();
    const events: string[] = [];
    const section = (name: string, delay: number) =>
      lock.run(async () => {
        events.push(`${name}:start`);
        await new Promise((r) => setTimeout(r, delay));
        events.push(`${name}:end`);
        return name;
      });
    const results = await Promise.all([section("a", 20), section("b", 0), section("c", 5)]);
    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
    expect(lock.status()).toEqual({ pending: 0, locked: false });
  });

  it("releases the lock after a failing section", async () => {
    const lock = new WriteLock();
    const failed = lock.run(() => {
      throw new Error("nope");
    });
    const next = lock.run(() => "ok");
    await expect(failed).rejects.toThrow("nope");
    await expect(next).resolves.toBe("ok");
  });
});
