/**
 * Coverage Lock Tests
 */

import { describe, it, expect } from "vitest";
import { CoverageLock } from "../engine/coverage-lock.js";

describe("CoverageLock", () => {
  it("runs tasks one at a time in arrival order", async () => {
    const lock = new CoverageLock();
    const events: string[] = [];
    let releaseFirst: () => void = () => {};
    const firstBlocked = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = lock.runExclusive(async () => {
      events.push("first:start");
      await firstBlocked;
      events.push("first:end");
    });
    const second = lock.runExclusive(async () => {
      events.push("second:start");
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(events).toEqual(["first:start"]);
    expect(lock.isHeld).toBe(true);

    releaseFirst();
    await Promise.all([first, second]);

    expect(events).toEqual(["first:start", "first:end", "second:start"]);
    expect(lock.isHeld).toBe(false);
  });

  it("releases the lock when a task throws", async () => {
    const lock = new CoverageLock();

    await expect(
      lock.runExclusive(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(lock.isHeld).toBe(false);
    await expect(lock.runExclusive(async () => "ok")).resolves.toBe("ok");
  });
});
