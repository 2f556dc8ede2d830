import { describe, expect, it } from "vitest";
import { gameDateFor } from "../game-matcher";
import { createTestService, gameRecord } from "./fixtures";

describe("gameDateFor", () => {
  it("keeps a late US tip-off on the previous calendar day", () => {
    expect(gameDateFor(new Date("2026-01-28T03:30:00Z"), 10)).toBe("2026-01-27");
  });

  it("rolls over at the configured hour", () => {
    expect(gameDateFor(new Date("2026-01-28T10:00:00Z"), 10)).toBe("2026-01-28");
    expect(gameDateFor(new Date("2026-01-28T09:59:00Z"), 10)).toBe("2026-01-27");
  });
});

describe("GameMatcher", () => {
  it("creates a canonical game for an unseen record", async () => {
    const { service, store } = createTestService();

    const result = await service.resolveGame(gameRecord("stats_api", "401", "2026-01-28T03:30:00Z", "LAL", "CHI"));

    expect(result).toEqual({ canonicalId: 1, confidence: 1, status: "matched", created: true, method: "created" });
    const [game] = await store.listGames();
    expect(game.gameDate).toBe("2026-01-27");
    expect(game.homeTeam).toBe("LAL");
    expect(game.awayTeam).toBe("CHI");
    expect(game.sourceIds).toEqual({ stats_api: "401", odds_api: null, injury_news: null });
  });

  it("is idempotent for the same source record", async () => {
    const { service, store } = createTestService();
    const record = gameRecord("stats_api", "401", "2026-01-28T03:30:00Z", "LAL", "CHI");

    const first = await service.resolveGame(record);
    const second = await service.resolveGame(record);

    expect(second).toEqual({ canonicalId: first.canonicalId, confidence: 1, status: "matched", created: false, method: "exact_id" });
    expect(await store.listGames()).toHaveLength(1);
  });

  it("attaches a second source within the kickoff window", async () => {
    const { service, store } = createTestService();
    const created = await service.resolveGame(gameRecord("stats_api", "401", "2026-01-27T19:00:00Z", "LAL", "CHI"));

    const result = await service.resolveGame(
      gameRecord("odds_api", "evt-1", "2026-01-27T19:04:00Z", "Los Angeles Lakers", "Chicago Bulls"),
    );

    expect(result).toEqual({
      canonicalId: created.canonicalId,
      confidence: 0.95,
      status: "matched",
      created: false,
      method: "time_window",
    });
    const games = await store.listGames();
    expect(games).toHaveLength(1);
    expect(games[0].sourceIds).toEqual({ stats_api: "401", odds_api: "evt-1", injury_news: null });
  });

  it("keeps resolving a re-ingested source id to the same game", async () => {
    const { service, store } = createTestService();
    const created = await service.resolveGame(gameRecord("stats_api", "401", "2026-01-27T19:00:00Z", "LAL", "CHI"));
    await service.resolveGame(gameRecord("odds_api", "evt-1", "2026-01-27T19:04:00Z", "Los Angeles Lakers", "Chicago Bulls"));

    const again = await service.resolveGame(
      gameRecord("odds_api", "evt-1", "2026-01-27T19:04:00Z", "LA Lakers", "Chicago Bulls"),
    );

    expect(again).toEqual({ canonicalId: created.canonicalId, confidence: 1, status: "matched", created: false, method: "exact_id" });
    expect(await store.listGames()).toHaveLength(1);
    const mapping = await store.getMapping("game", "nba", "odds_api", "evt-1");
    expect(mapping?.sourceRecordId).toBe(3);
  });

  it("creates exactly one game when two sources race", async () => {
    const { service, store } = createTestService();

    const results = await Promise.all([
      service.resolveGame(gameRecord("stats_api", "401", "2026-01-27T19:00:00Z", "LAL", "CHI")),
      service.resolveGame(gameRecord("odds_api", "evt-1", "2026-01-27T19:04:00Z", "Los Angeles Lakers", "Chicago Bulls")),
    ]);

    const games = await store.listGames();
    expect(games).toHaveLength(1);
    expect(games[0].sourceIds).toEqual({ stats_api: "401", odds_api: "evt-1", injury_news: null });
    expect(results.map((r) => r.canonicalId)).toEqual([games[0].id, games[0].id]);
    expect(results.map((r) => r.created).sort()).toEqual([false, true]);
  });

  it("creates one game when racing records straddle the game-day rollover", async () => {
    const { service, store } = createTestService();

    const results = await Promise.all([
      service.resolveGame(gameRecord("stats_api", "401", "2026-01-26T09:55:00Z", "LAL", "CHI")),
      service.resolveGame(gameRecord("odds_api", "evt-1", "2026-01-26T10:05:00Z", "Los Angeles Lakers", "Chicago Bulls")),
    ]);

    const games = await store.listGames();
    expect(games).toHaveLength(1);
    expect(games[0].sourceIds).toEqual({ stats_api: "401", odds_api: "evt-1", injury_news: null });
    expect(results.map((r) => r.canonicalId)).toEqual([1, 1]);
    expect(results.map((r) => r.created).sort()).toEqual([false, true]);
  });

  it("matches a misspelt team name on the same day", async () => {
    const { service } = createTestService();
    const created = await service.resolveGame(gameRecord("stats_api", "401", "2026-01-28T03:30:00Z", "LAL", "CHI"));

    const result = await service.resolveGame(
      gameRecord("odds_api", "evt-9", "2026-01-28T03:30:00Z", "Los Angeles Lakerz", "Chicago Bulls"),
    );

    expect(result).toEqual({
      canonicalId: created.canonicalId,
      confidence: 0.85,
      status: "matched",
      created: false,
      method: "fuzzy_team_name",
    });
  });

  it("queues a record whose team cannot be resolved, once", async () => {
    const { service } = createTestService();
    const record = gameRecord("odds_api", "evt-2", "2026-01-28T03:30:00Z", "Seattle Sonics", "Chicago Bulls");

    const first = await service.resolveGame(record);
    const second = await service.resolveGame(record);

    expect(first.status).toBe("manual_review");
    expect(first.canonicalId).toBeNull();
    expect(first.confidence).toBe(0);
    expect(second.reviewItemId).toBe(first.reviewItemId);
    expect(await service.reviewQueue.countPending()).toBe(1);
    const item = await service.reviewQueue.get(first.reviewItemId ?? -1);
    expect(item?.reason).toBe("unresolved_team");
  });

  it("creates a separate game for a different matchup the same night", async () => {
    const { service, store } = createTestService();
    await service.resolveGame(gameRecord("stats_api", "401", "2026-01-28T03:30:00Z", "LAL", "CHI"));

    const result = await service.resolveGame(gameRecord("stats_api", "402", "2026-01-28T03:30:00Z", "BOS", "MIA"));

    expect(result.created).toBe(true);
    expect(result.canonicalId).toBe(2);
    expect(await store.listGames()).toHaveLength(2);
  });

  it("sends the same matchup on the next game day to review", async () => {
    const { service } = createTestService();
    const created = await service.resolveGame(gameRecord("stats_api", "401", "2026-01-28T03:30:00Z", "LAL", "CHI"));

    const result = await service.resolveGame(
      gameRecord("odds_api", "evt-3", "2026-01-28T10:30:00Z", "Los Angeles Lakers", "Chicago Bulls"),
    );

    expect(result.status).toBe("manual_review");
    expect(result.confidence).toBe(0.8);
    const item = await service.reviewQueue.get(result.reviewItemId ?? -1);
    expect(item?.reason).toBe("low_confidence");
    expect(item?.candidates).toEqual([
      {
        canonicalId: created.canonicalId,
        label: "CHI @ LAL 2026-01-28T03:30:00.000Z",
        confidence: 0.8,
        tier: "MANUAL_REVIEW",
        signals: { nameSimilarity: 1, timeProximity: 0, teamMatch: true },
      },
    ]);
  });

  it("uses the wide window for sources that publish local times", async () => {
    const { service } = createTestService();
    const created = await service.resolveGame(gameRecord("stats_api", "401", "2026-01-28T03:30:00Z", "LAL", "CHI"));

    const result = await service.resolveGame(
      gameRecord("injury_news", "n-1", "2026-01-28T08:30:00Z", "Los Angeles Lakers", "Chicago Bulls"),
    );

    expect(result.method).toBe("time_window");
    expect(result.canonicalId).toBe(created.canonicalId);
  });

  it("stores the provider item beside the validated fields", async () => {
    const { service, store } = createTestService();
    const record = {
      ...gameRecord("odds_api", "evt-1", "2026-01-27T19:04:00Z", "Los Angeles Lakers", "Chicago Bulls"),
      raw: { id: "evt-1", sport_key: "basketball_nba", bookmakers: [] },
    };

    await service.resolveGame(record);

    const [stored] = store.listSourceRecords();
    expect(stored.payload).toEqual({
      fields: { awayTeam: "Chicago Bulls", homeTeam: "Los Angeles Lakers", scheduledAt: "2026-01-27T19:04:00.000Z" },
      raw: { id: "evt-1", sport_key: "basketball_nba", bookmakers: [] },
    });
  });

  it("writes an audit entry for every created game", async () => {
    const { service, store } = createTestService();
    await service.resolveGame(gameRecord("stats_api", "401", "2026-01-28T03:30:00Z", "LAL", "CHI"));

    const entries = await store.listAudit({ entityType: "game", action: "created" });
    expect(entries).toHaveLength(1);
    expect(entries[0].entityId).toBe("1");
    expect(entries[0].previousState).toBeNull();
  });
});
