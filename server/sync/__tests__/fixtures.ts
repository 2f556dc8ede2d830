import { MemoryIdentityStore } from "../../store/memory";
import { mergeMatchingConfig, type MatchingConfigOverrides } from "../config";
import { IdentityService, type IdentityServiceOptions } from "../identity-service";
import { TeamMappingRegistry, loadTeamDefinitions } from "../team-registry";
import type { GameSourceRecord, PlayerSourceRecord, SourceName } from "../types";

export const teams = new TeamMappingRegistry(loadTeamDefinitions());

export function createTestService(
  overrides: MatchingConfigOverrides = {},
  options: Partial<Omit<IdentityServiceOptions, "store" | "teams" | "config">> = {},
) {
  const store = new MemoryIdentityStore();
  const config = mergeMatchingConfig({
    ...overrides,
    games: { timeToleranceMinutes: 120, crossTimezoneToleranceMinutes: 360, ...overrides.games },
  });
  const service = new IdentityService({ store, teams, config, ...options });
  return { store, service, config };
}

export function gameRecord(
  source: SourceName,
  sourceId: string,
  scheduledAt: string,
  homeTeam: string,
  awayTeam: string,
): GameSourceRecord {
  return { kind: "game", source, sourceId, sport: "nba", fields: { scheduledAt: new Date(scheduledAt), homeTeam, awayTeam } };
}

export function playerRecord(
  source: SourceName,
  sourceId: string,
  name: string,
  team: string | null,
  position: string | null = null,
): PlayerSourceRecord {
  return { kind: "player", source, sourceId, sport: "nba", fields: { name, team, position } };
}
