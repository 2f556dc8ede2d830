import { describe, expect, it, vi } from "vitest";
import { ConflictError } from "../../_core/errors";
import type { MemoryIdentityStore } from "../../store/memory";
import type { SourceIds } from "../types";
import { createTestService } from "./fixtures";

function insertLakersGame(store: MemoryIdentityStore, scheduledAt: string, gameDate: string, sourceIds: Partial<SourceIds>) {
  return store.insertGame({ sport: "nba", scheduledAt: new Date(scheduledAt), gameDate, homeTeam: "LAL", awayTeam: "CHI", sourceIds });
}

function insertLeBron(store: MemoryIdentityStore, team: string | null, sourceIds: Partial<SourceIds>) {
  return store.insertPlayer({
    sport: "nba",
    canonicalName: "LeBron James",
    normalizedName: "lebron james",
    nameSuffix: null,
    team,
    position: "F",
    sourceIds,
  });
}

describe("ReconciliationJob", () => {
  it("merges duplicate games and moves every reference to the survivor", async () => {
    const { service, store } = createTestService();
    const survivor = await insertLakersGame(store, "2026-01-27T09:30:00Z", "2026-01-26", { stats_api: "401" });
    const duplicate = await insertLakersGame(store, "2026-01-27T10:30:00Z", "2026-01-27", { odds_api: "evt-1" });
    await store.upsertMapping({
      kind: "game",
      sport: "nba",
      source: "odds_api",
      sourceId: "evt-1",
      canonicalId: duplicate.id,
      confidence: 1,
      method: "created",
      status: "matched",
      sourceRecordId: null,
    });
    await store.seedPrediction({ gameId: duplicate.id, market: "moneyline" });
    await store.seedPrediction({ gameId: duplicate.id, market: "spread" });
    await store.seedPrediction({ gameId: survivor.id, market: "total" });

    const report = await service.reconciliation.run();

    expect(report.duplicateGroups).toBe(1);
    expect(report.merged).toEqual([
      {
        kind: "game",
        survivorId: survivor.id,
        duplicateId: duplicate.id,
        references: { predictions: 2, stats: 0 },
        mappings: 1,
        aliases: 0,
        reviewItems: 0,
      },
    ]);
    expect(report.skipped).toEqual([]);

    const games = await store.listGames();
    expect(games).toHaveLength(1);
    expect(games[0].sourceIds).toEqual({ stats_api: "401", odds_api: "evt-1", injury_news: null });
    expect(store.listPredictions().map((p) => p.gameId)).toEqual([survivor.id, survivor.id, survivor.id]);
    const mapping = await store.getMapping("game", "nba", "odds_api", "evt-1");
    expect(mapping?.canonicalId).toBe(survivor.id);
  });

  it("records the merge in the audit log", async () => {
    const { service, store } = createTestService();
    await insertLakersGame(store, "2026-01-27T09:30:00Z", "2026-01-26", { stats_api: "401" });
    await insertLakersGame(store, "2026-01-27T10:30:00Z", "2026-01-27", { odds_api: "evt-1" });

    await service.reconciliation.run();

    const [entry] = await store.listAudit({ action: "merged" });
    expect(entry.entityType).toBe("game");
    expect(entry.entityId).toBe("1");
    expect(entry.matchDetails).toEqual({
      duplicateId: 2,
      references: { predictions: 0, stats: 0 },
      mappings: 0,
      aliases: 0,
      reviewItems: 0,
    });
  });

  it("skips a pair whose source ids disagree", async () => {
    const { service, store } = createTestService();
    await insertLakersGame(store, "2026-01-27T09:30:00Z", "2026-01-26", { stats_api: "401" });
    await insertLakersGame(store, "2026-01-27T10:30:00Z", "2026-01-27", { stats_api: "402" });

    const report = await service.reconciliation.run();

    expect(report.merged).toEqual([]);
    expect(report.skipped).toEqual([
      { kind: "game", survivorId: 1, duplicateId: 2, reason: "Cannot merge 2 into 1: conflicting source ids (stats_api)" },
    ]);
    expect(await store.listGames()).toHaveLength(2);
  });

  it("skips a merge that hits a unique conflict and carries on with the rest", async () => {
    const { service, store } = createTestService();
    await insertLakersGame(store, "2026-01-27T09:30:00Z", "2026-01-26", { stats_api: "401" });
    await insertLakersGame(store, "2026-01-27T10:30:00Z", "2026-01-27", { odds_api: "evt-1" });
    await insertLeBron(store, "LAL", { stats_api: "23" });
    await insertLeBron(store, "LAL", { injury_news: "lal:lebron-james" });
    vi.spyOn(store, "transaction").mockRejectedValueOnce(new ConflictError("player_aliases_alias_unique"));

    const report = await service.reconciliation.run();

    expect(report.skipped).toEqual([
      { kind: "game", survivorId: 1, duplicateId: 2, reason: "Unique constraint violated: player_aliases_alias_unique" },
    ]);
    expect(report.merged.map((m) => [m.kind, m.survivorId, m.duplicateId])).toEqual([["player", 1, 2]]);
    expect(await store.listGames()).toHaveLength(2);
    expect(await store.listPlayers()).toHaveLength(1);
  });

  it("leaves games further apart than the tolerance alone", async () => {
    const { service, store } = createTestService();
    await insertLakersGame(store, "2026-01-27T03:30:00Z", "2026-01-26", { stats_api: "401" });
    await insertLakersGame(store, "2026-01-28T03:30:00Z", "2026-01-27", { stats_api: "402" });

    const report = await service.reconciliation.run();

    expect(report.duplicateGroups).toBe(0);
  });

  it("writes nothing on a dry run", async () => {
    const { service, store } = createTestService();
    await insertLakersGame(store, "2026-01-27T09:30:00Z", "2026-01-26", { stats_api: "401" });
    await insertLakersGame(store, "2026-01-27T10:30:00Z", "2026-01-27", { odds_api: "evt-1" });

    const report = await service.reconciliation.run({ dryRun: true });

    expect(report.duplicateGroups).toBe(1);
    expect(report.merged).toEqual([]);
    expect(await store.listGames()).toHaveLength(2);
  });

  it("keeps the most authoritative row when configured to", async () => {
    const { service, store } = createTestService({ reconciliation: { survivorStrategy: "authority" } });
    await insertLakersGame(store, "2026-01-27T09:30:00Z", "2026-01-26", { odds_api: "evt-1" });
    const statsGame = await insertLakersGame(store, "2026-01-27T10:30:00Z", "2026-01-27", { stats_api: "401" });

    const report = await service.reconciliation.run();

    expect(report.merged.map((m) => [m.survivorId, m.duplicateId])).toEqual([[statsGame.id, 1]]);
  });

  it("merges duplicate players with their aliases and stats", async () => {
    const { service, store } = createTestService();
    const game = await insertLakersGame(store, "2026-01-27T03:30:00Z", "2026-01-26", { stats_api: "401" });
    const survivor = await insertLeBron(store, "LAL", { stats_api: "2544" });
    const duplicate = await insertLeBron(store, "LAL", { odds_api: "lbj" });
    await store.insertAlias({
      canonicalId: duplicate.id,
      aliasName: "king james",
      aliasSource: "odds_api",
      confidence: 1,
      isVerified: true,
    });
    await store.seedPlayerStat({ gameId: game.id, playerId: duplicate.id, statistics: { points: 31 } });

    const report = await service.reconciliation.run();

    expect(report.merged).toEqual([
      {
        kind: "player",
        survivorId: survivor.id,
        duplicateId: duplicate.id,
        references: { predictions: 0, stats: 1 },
        mappings: 0,
        aliases: 1,
        reviewItems: 0,
      },
    ]);
    expect(await store.listPlayers()).toHaveLength(1);
    expect(store.listPlayerStats()[0].playerId).toBe(survivor.id);
    const alias = await store.findAlias("king james", "odds_api");
    expect(alias?.canonicalId).toBe(survivor.id);
  });

  it("does not group players without a team", async () => {
    const { service, store } = createTestService();
    await insertLeBron(store, null, { stats_api: "2544" });
    await insertLeBron(store, null, { odds_api: "lbj" });

    const report = await service.reconciliation.run();

    expect(report.duplicateGroups).toBe(0);
    expect(report.playersScanned).toBe(2);
  });
});
