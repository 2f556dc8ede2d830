import type { ScorerProfile } from "./config";
import type { ConfidenceTier, EntityType, MatchMethod, MatchSignals } from "./types";

export interface ScoreResult {
  confidence: number;
  tier: ConfidenceTier;
  /** Weighted share each present signal added to the final value */
  contributions: Partial<Record<keyof MatchSignals, number>>;
}

const WEIGHTED_SIGNALS = ["nameSimilarity", "teamMatch", "positionMatch", "timeProximity"] as const;
type WeightedSignal = (typeof WEIGHTED_SIGNALS)[number];

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

function signalValue(signals: MatchSignals, key: WeightedSignal): number | null {
  const value = signals[key];
  if (value === undefined) return null;
  if (typeof value === "boolean") return value ? 1 : 0;
  return Number.isFinite(value) ? clamp01(value) : null;
}

/**
 * Combines match signals into one confidence value.
 *
 * The result is a weighted average over the signals that are present, so
 * raising any single signal can only raise the output. An exact id match
 * short-circuits to 1.0. Pure: no state beyond the injected profiles.
 */
export class ConfidenceScorer {
  constructor(private readonly profiles: Record<EntityType, ScorerProfile>) {}

  score(signals: MatchSignals, entityType: EntityType): ScoreResult {
    if (signals.exactIdMatch) {
      return { confidence: 1, tier: "AUTO_ACCEPT", contributions: { exactIdMatch: 1 } };
    }

    const { weights } = this.profiles[entityType];
    const contributions: ScoreResult["contributions"] = {};
    let weighted = 0;
    let totalWeight = 0;

    for (const key of WEIGHTED_SIGNALS) {
      const value = signalValue(signals, key);
      const weight = weights[key];
      if (value === null || weight <= 0) continue;
      weighted += value * weight;
      totalWeight += weight;
      contributions[key] = value * weight;
    }

    if (totalWeight === 0) {
      return { confidence: 0, tier: "REJECT", contributions };
    }

    for (const key of WEIGHTED_SIGNALS) {
      const share = contributions[key];
      if (share !== undefined) contributions[key] = round4(share / totalWeight);
    }

    const confidence = round4(clamp01(weighted / totalWeight));
    return { confidence, tier: this.tierFor(confidence, entityType), contributions };
  }

  tierFor(confidence: number, entityType: EntityType): ConfidenceTier {
    const { autoAccept, manualReview } = this.profiles[entityType].thresholds;
    if (confidence >= autoAccept) return "AUTO_ACCEPT";
    if (confidence >= manualReview) return "MANUAL_REVIEW";
    return "REJECT";
  }

  thresholds(entityType: EntityType): ScorerProfile["thresholds"] {
    return this.profiles[entityType].thresholds;
  }
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * Human-readable label for a mapping decision.
 */
export function getMatchMethodDescription(method: MatchMethod, confidence: number): string {
  const pct = `${Math.round(confidence * 100)}%`;
  switch (method) {
    case "exact_id":
      return "Exact source ID match";
    case "natural_key":
      return "Matched on sport, date and teams";
    case "time_window":
      return `Teams matched within the kickoff window (${pct})`;
    case "fuzzy_team_name":
      return `Fuzzy team name match (${pct})`;
    case "alias":
      return "Known alias";
    case "name_team":
      return `Exact name and team match (${pct})`;
    case "fuzzy_name":
      return `Fuzzy name match (${pct})`;
    case "created":
      return "New canonical entity";
    case "manual":
      return `Manually reviewed (${pct})`;
    case "none":
      return "No match";
  }
}
