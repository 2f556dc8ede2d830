import { describe, expect, it } from "vitest";
import { syncLogger } from "../utils/sync-logger";

describe("syncLogger", () => {
  it("returns a frozen summary of the run", () => {
    const ctx = syncLogger.startSync("stats_api:games");
    ctx.recordsProcessed = 4;
    ctx.recordsMatched = 2;
    ctx.recordsQueued = 1;
    ctx.recordsFailed = 1;
    syncLogger.recordError(ctx, "401: Invalid source record");

    const log = syncLogger.endSync(ctx, "stats_api");

    expect(log).toMatchObject({
      name: "stats_api:games",
      source: "stats_api",
      recordsProcessed: 4,
      recordsMatched: 2,
      recordsQueued: 1,
      recordsFailed: 1,
      errors: ["401: Invalid source record"],
    });
    expect(log.durationMs).toBeGreaterThanOrEqual(0);
    expect(Object.isFrozen(log)).toBe(true);
  });

  it("caps the error list", () => {
    const ctx = syncLogger.startSync("odds_api:games");
    for (let i = 0; i < 60; i++) syncLogger.recordError(ctx, `error ${i}`);

    const log = syncLogger.endSync(ctx, "odds_api");

    expect(log.errors).toHaveLength(50);
    expect(log.errors[49]).toBe("error 49");
  });
});
