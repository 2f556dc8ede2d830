import { getDb } from "../db";
import { InjuryNewsAdapter } from "../ingestion/sources/injury-news";
import { OddsApiAdapter } from "../ingestion/sources/odds-api";
import { StatsApiAdapter } from "../ingestion/sources/stats-api";
import { PostgresIdentityStore } from "../store/postgres";
import { IdentityService } from "../sync/identity-service";
import { loadTeamRegistry } from "../sync/team-registry";

let _service: IdentityService | null = null;

/**
 * The process-wide IdentityService: Postgres store, team registry loaded
 * from team_mappings, and the three source adapters.
 */
export async function getIdentityService(): Promise<IdentityService> {
  if (_service) return _service;

  const db = await getDb();
  if (!db) {
    throw new Error("Database not available");
  }

  const store = new PostgresIdentityStore(db);
  const teams = await loadTeamRegistry(store);
  _service = new IdentityService({
    store,
    teams,
    adapters: {
      stats_api: new StatsApiAdapter(),
      odds_api: new OddsApiAdapter(),
      injury_news: new InjuryNewsAdapter(),
    },
  });
  return _service;
}
