import { describe, expect, it } from "vitest";
import { TransientSourceError, ValidationError } from "../../_core/errors";
import type { FetchRequest, SourceAdapter } from "../../ingestion/sources/types";
import type { RawSourceRecord } from "../record-schema";
import type { SyncJob } from "../orchestrator";
import type { SourceName, SyncDataType } from "../types";
import { createTestService } from "./fixtures";

type FetchHandler = (dataType: SyncDataType, request: FetchRequest) => Promise<RawSourceRecord[]>;

class FakeAdapter implements SourceAdapter {
  readonly dataTypes: readonly SyncDataType[] = ["games", "players"];
  calls = 0;

  constructor(
    readonly source: SourceName,
    private readonly handler: FetchHandler,
    private readonly single: RawSourceRecord | null = null,
  ) {}

  fetch(dataType: SyncDataType, request: FetchRequest): Promise<RawSourceRecord[]> {
    this.calls++;
    return this.handler(dataType, request);
  }

  async fetchOne(): Promise<RawSourceRecord | null> {
    return this.single;
  }
}

function game(source: SourceName, sourceId: string, scheduledAt: string, homeTeam: string, awayTeam: string): RawSourceRecord {
  return { kind: "game", source, sourceId, sport: "nba", fields: { scheduledAt: new Date(scheduledAt), homeTeam, awayTeam } };
}

function job(source: SourceName, timeoutMs = 5_000): SyncJob {
  return { source, dataType: "games", sports: ["nba"], schedule: "*/15 * * * *", timeoutMs };
}

const lakersBulls = game("stats_api", "401", "2026-01-28T03:30:00Z", "LAL", "CHI");
const celticsHeat = game("stats_api", "402", "2026-01-28T00:30:00Z", "BOS", "MIA");

function setup(adapters: SourceAdapter[], jobs: SyncJob[]) {
  const bySource: Partial<Record<SourceName, SourceAdapter>> = {};
  for (const adapter of adapters) bySource[adapter.source] = adapter;
  return createTestService({}, { adapters: bySource, jobs, retry: { maxAttempts: 2, baseDelayMs: 0 } });
}

describe("SyncOrchestrator", () => {
  it("fetches, resolves and returns to idle", async () => {
    const stats = new FakeAdapter("stats_api", async () => [lakersBulls, celticsHeat]);
    const { service, store } = setup([stats], [job("stats_api")]);

    const result = await service.orchestrator.runJob(job("stats_api"));

    expect(result).toMatchObject({ success: true, job: "stats_api:games", state: "idle" });
    expect(result.log?.recordsMatched).toBe(2);
    expect(await store.listGames()).toHaveLength(2);
    const meta = await store.getSyncMetadata("stats_api", "games");
    expect(meta).toMatchObject({ state: "idle", lastStatus: "success", recordsProcessed: 2, recordsMatched: 2, errorMessage: null });
  });

  it("ends in partial when a record fails validation", async () => {
    const bad = game("stats_api", "bad", "2026-01-28T03:30:00Z", "LAL", "LAL");
    const stats = new FakeAdapter("stats_api", async () => [lakersBulls, bad]);
    const { service, store } = setup([stats], [job("stats_api")]);

    const result = await service.orchestrator.runJob(job("stats_api"));

    expect(result).toMatchObject({ success: true, state: "partial" });
    expect(result.log?.recordsFailed).toBe(1);
    const meta = await store.getSyncMetadata("stats_api", "games");
    expect(meta?.lastStatus).toBe("partial");
    expect(meta?.errorMessage).toBe("stats_api/bad: Invalid source record: fields.awayTeam: homeTeam and awayTeam must differ");
  });

  it("isolates a failing source from the others", async () => {
    const stats = new FakeAdapter("stats_api", async () => [lakersBulls]);
    const odds = new FakeAdapter("odds_api", async () => {
      throw new TransientSourceError("odds_api", "HTTP 503", 503);
    });
    const { service } = setup([stats, odds], [job("stats_api"), job("odds_api")]);

    const results = await service.orchestrator.runAll();

    expect(results.map((r) => [r.job, r.success, r.state])).toEqual([
      ["stats_api:games", true, "idle"],
      ["odds_api:games", false, "failed"],
    ]);
    expect(results[1].error).toBe("[odds_api] HTTP 503");
    expect(odds.calls).toBe(2);
  });

  it("fails a job that exceeds its timeout", async () => {
    const stats = new FakeAdapter("stats_api", () => new Promise<RawSourceRecord[]>(() => undefined));
    const { service, store } = setup([stats], [job("stats_api", 20)]);

    const result = await service.orchestrator.runJob(job("stats_api", 20));

    expect(result).toMatchObject({ success: false, state: "failed", error: "Job stats_api:games timed out after 20ms" });
    expect((await store.getSyncMetadata("stats_api", "games"))?.state).toBe("failed");
    expect(service.orchestrator.isRunning(job("stats_api"))).toBe(false);
  });

  it("skips a trigger while the same job is running", async () => {
    let release: (records: RawSourceRecord[]) => void = () => undefined;
    const stats = new FakeAdapter(
      "stats_api",
      () =>
        new Promise<RawSourceRecord[]>((resolve) => {
          release = resolve;
        }),
    );
    const { service } = setup([stats], [job("stats_api")]);

    const first = service.orchestrator.runJob(job("stats_api"));
    const second = await service.orchestrator.runJob(job("stats_api"));
    await expect.poll(() => stats.calls).toBe(1);
    release([]);

    expect(second).toEqual({ success: false, job: "stats_api:games", state: "syncing", skipped: true });
    expect((await first).state).toBe("idle");
  });

  it("resets a failed job on the next trigger", async () => {
    let healthy = false;
    const stats = new FakeAdapter("stats_api", async () => {
      if (!healthy) throw new TransientSourceError("stats_api", "HTTP 502", 502);
      return [lakersBulls];
    });
    const { service, store } = setup([stats], [job("stats_api")]);
    await service.orchestrator.runJob(job("stats_api"));
    healthy = true;

    const result = await service.orchestrator.runJob(job("stats_api"));

    expect(result).toMatchObject({ success: true, state: "idle" });
    expect((await store.getSyncMetadata("stats_api", "games"))?.lastStatus).toBe("success");
  });

  it("force-resyncs one entity from its source", async () => {
    const stats = new FakeAdapter("stats_api", async () => [], lakersBulls);
    const { service } = setup([stats], [job("stats_api")]);

    const result = await service.orchestrator.resyncEntity({ source: "stats_api", kind: "game", sport: "nba", sourceId: "401" });

    expect(result).toMatchObject({ status: "matched", created: true, canonicalId: 1 });
  });

  it("reports an entity the source no longer has", async () => {
    const stats = new FakeAdapter("stats_api", async () => []);
    const { service } = setup([stats], [job("stats_api")]);

    await expect(
      service.orchestrator.resyncEntity({ source: "stats_api", kind: "game", sport: "nba", sourceId: "999" }),
    ).rejects.toThrow(new ValidationError("stats_api has no game with id 999"));
  });
});

describe("sync status", () => {
  it("is healthy before anything has run", async () => {
    const { service } = setup([], [job("stats_api")]);

    const status = await service.getSyncStatus();

    expect(status.health).toBe("healthy");
    expect(status.issues).toEqual([]);
    expect(status.jobs.map((j) => [j.source, j.dataType, j.state])).toEqual([["stats_api", "games", "idle"]]);
  });

  it("is degraded while records wait for review", async () => {
    const odds = new FakeAdapter("odds_api", async () => [
      game("odds_api", "evt-2", "2026-01-28T03:30:00Z", "Seattle Sonics", "Chicago Bulls"),
    ]);
    const { service } = setup([odds], [job("odds_api")]);
    await service.orchestrator.runJob(job("odds_api"));

    const status = await service.getSyncStatus();

    expect(status.health).toBe("degraded");
    expect(status.pendingReview).toBe(1);
    expect(status.issues).toEqual(["odds_api:games partial: 0 failed, 1 queued", "1 items awaiting review"]);
    expect(status.totals).toEqual({ recordsProcessed: 1, recordsMatched: 0, recordsQueued: 1, recordsFailed: 0 });
  });

  it("is unhealthy when a job failed", async () => {
    const stats = new FakeAdapter("stats_api", async () => {
      throw new TransientSourceError("stats_api", "HTTP 503", 503);
    });
    const { service } = setup([stats], [job("stats_api")]);
    await service.orchestrator.runJob(job("stats_api"));

    const status = await service.getSyncStatus();

    expect(status.health).toBe("unhealthy");
    expect(status.issues).toEqual(["stats_api:games failed: [stats_api] HTTP 503"]);
  });
});

describe("IdentityService.lookupBySourceId", () => {
  it("returns the canonical id for a matched source id and null otherwise", async () => {
    const stats = new FakeAdapter("stats_api", async () => [lakersBulls]);
    const { service } = setup([stats], [job("stats_api")]);
    await service.orchestrator.runJob(job("stats_api"));

    expect(await service.lookupBySourceId("nba", "game", "stats_api", "401")).toBe(1);
    expect(await service.lookupBySourceId("nba", "game", "odds_api", "evt-1")).toBeNull();
  });
});
