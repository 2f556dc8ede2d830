import { ENV } from "../_core/env";
import type { EntityType, SourceName } from "./types";

export interface ScorerWeights {
  nameSimilarity: number;
  teamMatch: number;
  positionMatch: number;
  timeProximity: number;
}

export interface TierThresholds {
  autoAccept: number;
  manualReview: number;
}

export interface ScorerProfile {
  weights: ScorerWeights;
  thresholds: TierThresholds;
}

export interface SourceSettings {
  /** Higher wins when reconciliation picks a survivor by authority */
  authority: number;
  /** Source publishes local kickoff times; use the wide tolerance */
  crossTimezone: boolean;
}

export interface GameMatchingConfig {
  timeToleranceMinutes: number;
  crossTimezoneToleranceMinutes: number;
  maxTeamNameEditDistance: number;
  timeWindowConfidence: number;
  fuzzyTeamConfidence: number;
  /** UTC hour at which one game day rolls into the next */
  dayRolloverUtcHour: number;
}

export interface PlayerMatchingConfig {
  nameTeamConfidence: number;
}

export type SurvivorStrategy = "earliest" | "authority";

export interface MatchingConfig {
  scoring: Record<EntityType, ScorerProfile>;
  games: GameMatchingConfig;
  players: PlayerMatchingConfig;
  sources: Record<SourceName, SourceSettings>;
  reconciliation: { survivorStrategy: SurvivorStrategy };
}

export function defaultMatchingConfig(): MatchingConfig {
  return {
    scoring: {
      game: {
        weights: { nameSimilarity: 0.5, teamMatch: 0.3, positionMatch: 0, timeProximity: 0.2 },
        thresholds: { autoAccept: 0.85, manualReview: 0.7 },
      },
      player: {
        weights: { nameSimilarity: 0.8, teamMatch: 0.12, positionMatch: 0.08, timeProximity: 0 },
        thresholds: { autoAccept: 0.85, manualReview: 0.7 },
      },
    },
    games: {
      timeToleranceMinutes: ENV.GAME_TIME_TOLERANCE_MINUTES,
      crossTimezoneToleranceMinutes: ENV.GAME_CROSS_TZ_TOLERANCE_MINUTES,
      maxTeamNameEditDistance: 3,
      timeWindowConfidence: 0.95,
      fuzzyTeamConfidence: 0.85,
      dayRolloverUtcHour: 10,
    },
    players: {
      nameTeamConfidence: 0.9,
    },
    sources: {
      stats_api: { authority: 3, crossTimezone: false },
      odds_api: { authority: 2, crossTimezone: false },
      injury_news: { authority: 1, crossTimezone: true },
    },
    reconciliation: { survivorStrategy: "earliest" },
  };
}

export type MatchingConfigOverrides = {
  scoring?: Partial<Record<EntityType, Partial<ScorerProfile>>>;
  games?: Partial<GameMatchingConfig>;
  players?: Partial<PlayerMatchingConfig>;
  sources?: Partial<Record<SourceName, SourceSettings>>;
  reconciliation?: Partial<MatchingConfig["reconciliation"]>;
};

export function mergeMatchingConfig(
  overrides: MatchingConfigOverrides = {},
  base: MatchingConfig = defaultMatchingConfig(),
): MatchingConfig {
  const mergeProfile = (entity: EntityType): ScorerProfile => ({
    weights: { ...base.scoring[entity].weights, ...overrides.scoring?.[entity]?.weights },
    thresholds: { ...base.scoring[entity].thresholds, ...overrides.scoring?.[entity]?.thresholds },
  });

  const config: MatchingConfig = {
    scoring: { game: mergeProfile("game"), player: mergeProfile("player") },
    games: { ...base.games, ...overrides.games },
    players: { ...base.players, ...overrides.players },
    sources: { ...base.sources, ...overrides.sources },
    reconciliation: { ...base.reconciliation, ...overrides.reconciliation },
  };

  for (const entity of ["game", "player"] as const) {
    const { autoAccept, manualReview } = config.scoring[entity].thresholds;
    if (!(manualReview <= autoAccept) || autoAccept > 1 || manualReview < 0) {
      throw new Error(`Invalid ${entity} thresholds: manualReview ${manualReview}, autoAccept ${autoAccept}`);
    }
  }

  // Methods that accept without scoring must still clear auto-accept
  const fixed: Array<[string, number, EntityType]> = [
    ["games.timeWindowConfidence", config.games.timeWindowConfidence, "game"],
    ["games.fuzzyTeamConfidence", config.games.fuzzyTeamConfidence, "game"],
    ["players.nameTeamConfidence", config.players.nameTeamConfidence, "player"],
  ];
  for (const [name, value, entity] of fixed) {
    const { autoAccept } = config.scoring[entity].thresholds;
    if (!(value >= autoAccept && value <= 1)) {
      throw new Error(`Invalid ${name}: ${value} must be between autoAccept ${autoAccept} and 1`);
    }
  }

  return config;
}

export function toleranceMinutesFor(config: MatchingConfig, source: SourceName): number {
  return config.sources[source].crossTimezone
    ? config.games.crossTimezoneToleranceMinutes
    : config.games.timeToleranceMinutes;
}
