import { describe, expect, it } from "vitest";
import type { SourceAdapter } from "../../ingestion/sources/types";
import { createTestService } from "../../sync/__tests__/fixtures";
import type { RawSourceRecord } from "../../sync/record-schema";
import { buildSchedulerConfig, executeAllWorkers, executeScheduledWorker } from "../scheduler";

const lakersBulls: RawSourceRecord = {
  kind: "game",
  source: "stats_api",
  sourceId: "401",
  sport: "nba",
  fields: { scheduledAt: new Date("2026-01-28T03:30:00Z"), homeTeam: "LAL", awayTeam: "CHI" },
};

const statsAdapter: SourceAdapter = {
  source: "stats_api",
  dataTypes: ["games"],
  fetch: async () => [lakersBulls],
  fetchOne: async () => null,
};

function schedulerService() {
  return createTestService(
    {},
    {
      adapters: { stats_api: statsAdapter },
      jobs: [{ source: "stats_api", dataType: "games", sports: ["nba"], schedule: "*/15 * * * *", timeoutMs: 5_000 }],
    },
  ).service;
}

describe("scheduler", () => {
  it("schedules every sync job plus reconciliation", () => {
    const config = buildSchedulerConfig(schedulerService());

    expect(Object.keys(config)).toEqual(["stats_api:games", "reconciliation"]);
    expect(config["stats_api:games"].interval).toBe("*/15 * * * *");
    expect(config["stats_api:games"].description).toBe("Sync games from stats_api (nba)");
  });

  it("reports an unknown worker without throwing", async () => {
    const service = schedulerService();

    const execution = await executeScheduledWorker(service, buildSchedulerConfig(service), "nope");

    expect(execution).toMatchObject({ success: false, worker: "nope", error: "Unknown worker: nope" });
  });

  it("runs every worker once on demand", async () => {
    const service = schedulerService();

    const summary = await executeAllWorkers(service);

    expect(summary).toMatchObject({ total: 2, successful: 2, failed: 0 });
    expect(await service.store.listGames()).toHaveLength(1);
  });
});
