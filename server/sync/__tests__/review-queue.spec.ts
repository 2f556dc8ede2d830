import { describe, expect, it } from "vitest";
import { ReviewStateError, ValidationError } from "../../_core/errors";
import { createTestService, gameRecord } from "./fixtures";

async function queuedNextDayGame() {
  const ctx = createTestService();
  const created = await ctx.service.resolveGame(gameRecord("stats_api", "401", "2026-01-28T03:30:00Z", "LAL", "CHI"));
  const queued = await ctx.service.resolveGame(
    gameRecord("odds_api", "evt-3", "2026-01-28T10:30:00Z", "Los Angeles Lakers", "Chicago Bulls"),
  );
  return { ...ctx, gameId: created.canonicalId, itemId: queued.reviewItemId ?? -1 };
}

describe("ReviewQueue", () => {
  it("approves against the top candidate through the normal write path", async () => {
    const { service, store, gameId, itemId } = await queuedNextDayGame();

    const item = await service.reviewQueue.approve(itemId, { reviewer: "analyst" });

    expect(item.status).toBe("approved");
    expect(item.resolvedBy).toBe("analyst");
    expect(item.resolvedCanonicalId).toBe(gameId);
    const mapping = await store.getMapping("game", "nba", "odds_api", "evt-3");
    expect(mapping).toMatchObject({ canonicalId: gameId, status: "matched", method: "manual", confidence: 0.8 });
    const game = await store.getGame(gameId ?? -1);
    expect(game?.sourceIds.odds_api).toBe("evt-3");
    expect(await service.reviewQueue.countPending()).toBe(0);
  });

  it("resolves an approved record by id afterwards", async () => {
    const { service, gameId, itemId } = await queuedNextDayGame();
    await service.reviewQueue.approve(itemId);

    const again = await service.resolveGame(
      gameRecord("odds_api", "evt-3", "2026-01-28T10:30:00Z", "Los Angeles Lakers", "Chicago Bulls"),
    );

    expect(again).toEqual({ canonicalId: gameId, confidence: 1, status: "matched", created: false, method: "exact_id" });
  });

  it("refuses to approve an item twice", async () => {
    const { service, itemId } = await queuedNextDayGame();
    await service.reviewQueue.approve(itemId);

    await expect(service.reviewQueue.approve(itemId)).rejects.toBeInstanceOf(ReviewStateError);
  });

  it("lets exactly one of a concurrent approve and reject through", async () => {
    const { service, store, itemId } = await queuedNextDayGame();

    const outcomes = await Promise.allSettled([service.reviewQueue.approve(itemId), service.reviewQueue.reject(itemId)]);

    expect(outcomes.map((o) => o.status)).toEqual(["fulfilled", "rejected"]);
    const mapping = await store.getMapping("game", "nba", "odds_api", "evt-3");
    expect(mapping?.status).toBe("matched");
  });

  it("marks a rejected record as failed so it is not matched again", async () => {
    const { service, store, itemId } = await queuedNextDayGame();

    await service.reviewQueue.reject(itemId, { note: "different game" });
    const again = await service.resolveGame(
      gameRecord("odds_api", "evt-3", "2026-01-28T10:30:00Z", "Los Angeles Lakers", "Chicago Bulls"),
    );

    expect(again).toEqual({ canonicalId: null, confidence: 0, status: "failed", created: false, method: "manual" });
    expect(await store.listGames()).toHaveLength(1);
  });

  it("keeps an item pending when approval cannot be applied", async () => {
    const { service, store } = createTestService();
    const queued = await service.resolveGame(
      gameRecord("odds_api", "evt-2", "2026-01-28T03:30:00Z", "Seattle Sonics", "Chicago Bulls"),
    );

    await expect(service.reviewQueue.approve(queued.reviewItemId ?? -1)).rejects.toBeInstanceOf(ValidationError);
    expect(await service.reviewQueue.countPending()).toBe(1);
    expect(await store.listGames()).toHaveLength(0);
  });

  it("audits the approval with the reviewer", async () => {
    const { service, store, itemId } = await queuedNextDayGame();
    await service.reviewQueue.approve(itemId, { reviewer: "analyst" });

    const entries = await store.listAudit({ entityType: "review", entityId: String(itemId) });
    expect(entries.map((e) => e.action)).toEqual(["queued", "approved"]);
    expect(entries[1].performedBy).toBe("analyst");
  });
});
