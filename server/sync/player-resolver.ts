import { isDebug } from "../_core/env";
import { ConflictError, ValidationError } from "../_core/errors";
import { normalizeName, suffixesConflict, type NormalizedName } from "../_core/normalizers";
import { nameSimilarity } from "../_core/similarity";
import { sourceIdPatch, type IdentityStore, type IdentityStoreOps } from "../store/types";
import type { AuditLogger, MatchDetails } from "./audit-logger";
import type { ConfidenceScorer } from "./confidence-scorer";
import type { MatchingConfig } from "./config";
import { resultFromMapping } from "./mappings";
import { hashPayload, storedPayload } from "./record-schema";
import { enqueueForReview, type ApprovalOutcome, type ReviewTarget } from "./review-queue";
import type { TeamMappingRegistry } from "./team-registry";
import type {
  CanonicalPlayer,
  ConfidenceTier,
  MatchMethod,
  MatchSignals,
  PlayerContext,
  PlayerSourceRecord,
  ResolutionResult,
  ReviewQueueItem,
  ScoredCandidate,
} from "./types";

export interface PlayerResolverDeps {
  store: IdentityStore;
  teams: TeamMappingRegistry;
  scorer: ConfidenceScorer;
  audit: AuditLogger;
  config: MatchingConfig;
}

interface PlayerInput {
  record: PlayerSourceRecord;
  name: NormalizedName;
  team: string | null;
  position: string | null;
}

interface AcceptedMatch {
  player: CanonicalPlayer;
  method: MatchMethod;
  confidence: number;
  signals?: MatchSignals;
}

export function normalizePosition(raw: string | null | undefined): string | null {
  const value = raw?.trim().toUpperCase();
  return value ? value : null;
}

/**
 * "G" is compatible with "PG" and "SG", "F" with "SF"; "G-F" with either.
 * Providers disagree on granularity, so only a compatible pair counts.
 */
export function positionsCompatible(a: string, b: string): boolean {
  const tokens = (value: string) => value.split(/[-/\s]+/).filter(Boolean);
  return tokens(a).some((x) => tokens(b).some((y) => x === y || x.endsWith(y) || y.endsWith(x)));
}

export function playerSnapshot(player: CanonicalPlayer) {
  return {
    sport: player.sport,
    canonicalName: player.canonicalName,
    nameSuffix: player.nameSuffix,
    team: player.team,
    position: player.position,
    sourceIds: { ...player.sourceIds },
  };
}

function describe(record: PlayerSourceRecord): string {
  return `${record.source}/${record.sourceId} (${record.fields.name})`;
}

function keyOf(player: CanonicalPlayer): string {
  return player.nameSuffix ? `${player.normalizedName} ${player.nameSuffix}` : player.normalizedName;
}

/**
 * Resolves a player record: stored mapping, alias table, exact name on the
 * same team, then fuzzy name within the team. Only a teammate can be
 * accepted without review. Candidates whose generational
 * suffix conflicts with the input's are dropped before scoring, so a
 * "Jr." never lands on a "Sr.".
 */
export class PlayerResolver implements ReviewTarget {
  constructor(private readonly deps: PlayerResolverDeps) {}

  async resolve(record: PlayerSourceRecord, context: PlayerContext = {}): Promise<ResolutionResult> {
    const stored = await this.deps.store.saveSourceRecord(record, storedPayload(record), hashPayload(record));
    const input = this.prepare(record, context);

    try {
      return await this.resolveStored(input, stored.id);
    } catch (error) {
      if (!(error instanceof ConflictError)) throw error;
      console.log(`[player-resolver] ${error.constraint} while resolving ${describe(record)}, re-fetching`);
      return this.recoverFromConflict(input, stored.id);
    }
  }

  private prepare(record: PlayerSourceRecord, context: PlayerContext): PlayerInput {
    const name = normalizeName(record.fields.name);
    if (!name.normalized) {
      throw new ValidationError(`Player name "${record.fields.name}" is empty after normalization`, [
        { path: "fields.name", message: "empty after normalization" },
      ]);
    }
    const rawTeam = record.fields.team ?? context.team ?? null;
    return {
      record,
      name,
      team: rawTeam ? this.deps.teams.resolve(record.sport, record.source, rawTeam) : null,
      position: normalizePosition(record.fields.position ?? context.position),
    };
  }

  private async resolveStored(input: PlayerInput, sourceRecordId: number): Promise<ResolutionResult> {
    const { store, config } = this.deps;
    const { record, name, team } = input;
    const { sport, source, sourceId } = record;
    const compatible = (p: CanonicalPlayer) =>
      !suffixesConflict(name.suffix, p.nameSuffix) && (p.sourceIds[source] === null || p.sourceIds[source] === sourceId);

    // 1. Exact id
    const mapping = await store.getMapping("player", sport, source, sourceId);
    const fromMapping = await resultFromMapping(store, mapping, sourceRecordId);
    if (fromMapping) return fromMapping;

    const holder = await store.findPlayerBySourceId(sport, source, sourceId);
    if (holder) {
      return this.attach(input, sourceRecordId, { player: holder, method: "exact_id", confidence: 1 });
    }

    // 2. Alias
    const alias = await store.findAlias(name.key, source);
    if (alias) {
      const player = await store.getPlayer(alias.canonicalId);
      if (player && compatible(player)) {
        return this.attach(input, sourceRecordId, { player, method: "alias", confidence: alias.confidence });
      }
    }

    // 3. Same normalized name on the same team
    const sameName = (await store.findPlayersByName(sport, name.normalized)).filter(compatible);
    if (team) {
      let onTeam = sameName.filter((p) => p.team === team);
      if (onTeam.length > 1) onTeam = onTeam.filter((p) => p.nameSuffix === name.suffix);
      if (onTeam.length === 1) {
        return this.attach(input, sourceRecordId, {
          player: onTeam[0],
          method: "name_team",
          confidence: config.players.nameTeamConfidence,
          signals: this.signalsFor(input, onTeam[0]),
        });
      }
    }

    // 4. Fuzzy name within the team. Same-name players elsewhere are only ever review candidates.
    const roster = team ? (await store.findPlayersByTeam(sport, team)).filter(compatible) : [];
    const onRoster = new Set(roster.map((p) => p.id));
    const pool = new Map<number, CanonicalPlayer>();
    for (const player of [...roster, ...sameName]) pool.set(player.id, player);
    const candidates = this.scoreCandidates(input, [...pool.values()], onRoster);
    const autoAccept = candidates.filter((c) => c.tier === "AUTO_ACCEPT");
    const best = autoAccept[0];

    if (autoAccept.length === 1 && best) {
      const player = pool.get(best.canonicalId);
      if (player) {
        return this.attach(input, sourceRecordId, {
          player,
          method: "fuzzy_name",
          confidence: best.confidence,
          signals: best.signals,
        });
      }
    }
    if (autoAccept.length > 1) {
      return this.queue(input, sourceRecordId, candidates, "conflicting_candidates");
    }
    if (candidates.some((c) => c.tier === "MANUAL_REVIEW")) {
      return this.queue(input, sourceRecordId, candidates, "low_confidence");
    }

    return this.create(input, sourceRecordId, candidates);
  }

  private signalsFor(input: PlayerInput, player: CanonicalPlayer): MatchSignals {
    const signals: MatchSignals = { nameSimilarity: nameSimilarity(input.name.normalized, player.normalizedName) };
    if (input.team && player.team) {
      signals.teamMatch = input.team === player.team;
    }
    if (input.position && player.position && positionsCompatible(input.position, player.position)) {
      signals.positionMatch = true;
    }
    return signals;
  }

  private scoreCandidates(input: PlayerInput, players: CanonicalPlayer[], onRoster: ReadonlySet<number>): ScoredCandidate[] {
    return players
      .map((player) => {
        const signals = this.signalsFor(input, player);
        const scored = this.deps.scorer.score(signals, "player");
        const tier: ConfidenceTier = scored.tier === "AUTO_ACCEPT" && !onRoster.has(player.id) ? "MANUAL_REVIEW" : scored.tier;
        return {
          canonicalId: player.id,
          label: `${player.canonicalName}${player.team ? ` (${player.team})` : ""}`,
          confidence: scored.confidence,
          tier,
          signals,
        };
      })
      .sort((a, b) => b.confidence - a.confidence || a.canonicalId - b.canonicalId);
  }

  // --------------------------------------------------------------------------
  // Writes
  // --------------------------------------------------------------------------

  private details(record: PlayerSourceRecord, method: MatchMethod, confidence: number, extra: Partial<MatchDetails> = {}): MatchDetails {
    return { source: record.source, sourceId: record.sourceId, method, confidence, ...extra };
  }

  private async attach(input: PlayerInput, sourceRecordId: number, match: AcceptedMatch): Promise<ResolutionResult> {
    await this.deps.store.transaction((tx) => this.attachInTransaction(tx, input, sourceRecordId, match));
    if (isDebug()) {
      console.log(`[player-resolver] ${describe(input.record)} -> player ${match.player.id} via ${match.method} (${match.confidence})`);
    }
    return { canonicalId: match.player.id, confidence: match.confidence, status: "matched", created: false, method: match.method };
  }

  private async attachInTransaction(
    tx: IdentityStoreOps,
    input: PlayerInput,
    sourceRecordId: number | null,
    match: AcceptedMatch,
    performedBy?: string,
  ): Promise<void> {
    const { audit } = this.deps;
    const { record, name } = input;
    const details = this.details(record, match.method, match.confidence, match.signals ? { signals: match.signals } : {});

    const current = (await tx.getPlayer(match.player.id)) ?? match.player;
    if (current.sourceIds[record.source] === null) {
      const updated = await tx.updatePlayerSourceIds(current.id, sourceIdPatch(record.source, record.sourceId));
      await audit.updated(tx, "player", current.id, playerSnapshot(current), playerSnapshot(updated), details);
    }

    await tx.upsertMapping({
      kind: "player",
      sport: record.sport,
      source: record.source,
      sourceId: record.sourceId,
      canonicalId: current.id,
      confidence: match.confidence,
      method: match.method,
      status: "matched",
      sourceRecordId,
    });
    await audit.matched(tx, "player", current.id, details, performedBy);

    if (match.method !== "alias" && name.key !== keyOf(current)) {
      const existing = await tx.findAlias(name.key, record.source);
      if (!existing) {
        const alias = await tx.insertAlias({
          canonicalId: current.id,
          aliasName: name.key,
          aliasSource: record.source,
          confidence: match.confidence,
          isVerified: match.method === "manual",
        });
        await audit.record(tx, {
          entityType: "alias",
          entityId: String(alias.id),
          action: "created",
          newState: { canonicalId: current.id, aliasName: alias.aliasName, aliasSource: alias.aliasSource },
          matchDetails: details,
          performedBy,
        });
      }
    }
  }

  private async create(input: PlayerInput, sourceRecordId: number, candidates: ScoredCandidate[]): Promise<ResolutionResult> {
    const player = await this.deps.store.transaction((tx) => this.createInTransaction(tx, input, sourceRecordId, candidates));
    console.log(`[player-resolver] Created player ${player.id} for ${describe(input.record)}`);
    return { canonicalId: player.id, confidence: 1, status: "matched", created: true, method: "created" };
  }

  private async createInTransaction(
    tx: IdentityStoreOps,
    input: PlayerInput,
    sourceRecordId: number | null,
    candidates: ScoredCandidate[],
    performedBy?: string,
  ): Promise<CanonicalPlayer> {
    const { record, name } = input;
    const player = await tx.insertPlayer({
      sport: record.sport,
      canonicalName: record.fields.name.trim(),
      normalizedName: name.normalized,
      nameSuffix: name.suffix,
      team: input.team,
      position: input.position,
      sourceIds: sourceIdPatch(record.source, record.sourceId),
    });
    await tx.upsertMapping({
      kind: "player",
      sport: record.sport,
      source: record.source,
      sourceId: record.sourceId,
      canonicalId: player.id,
      confidence: 1,
      method: "created",
      status: "matched",
      sourceRecordId,
    });
    await this.deps.audit.record(tx, {
      entityType: "player",
      entityId: String(player.id),
      action: "created",
      previousState: null,
      newState: playerSnapshot(player),
      matchDetails: this.details(record, "created", 1, { candidates }),
      performedBy,
    });
    return player;
  }

  private async queue(
    input: PlayerInput,
    sourceRecordId: number,
    candidates: ScoredCandidate[],
    reason: string,
  ): Promise<ResolutionResult> {
    const { record } = input;
    const best = candidates[0]?.confidence ?? 0;
    const item = await this.deps.store.transaction(async (tx) => {
      await tx.upsertMapping({
        kind: "player",
        sport: record.sport,
        source: record.source,
        sourceId: record.sourceId,
        canonicalId: null,
        confidence: best,
        method: "none",
        status: "manual_review",
        sourceRecordId,
      });
      return enqueueForReview(tx, this.deps.audit, {
        kind: "player",
        sport: record.sport,
        source: record.source,
        sourceId: record.sourceId,
        sourceRecordId,
        record,
        candidates,
        reason,
      });
    });
    return { canonicalId: null, confidence: best, status: "manual_review", created: false, method: "none", reviewItemId: item.id };
  }

  private async recoverFromConflict(input: PlayerInput, sourceRecordId: number): Promise<ResolutionResult> {
    const { store } = this.deps;
    const { sport, source, sourceId } = input.record;

    const mapping = await store.getMapping("player", sport, source, sourceId);
    const fromMapping = await resultFromMapping(store, mapping, sourceRecordId);
    if (fromMapping) return fromMapping;

    const holder = await store.findPlayerBySourceId(sport, source, sourceId);
    if (holder) {
      return this.attach(input, sourceRecordId, { player: holder, method: "exact_id", confidence: 1 });
    }

    return this.resolveStored(input, sourceRecordId);
  }

  // --------------------------------------------------------------------------
  // Review approvals
  // --------------------------------------------------------------------------

  async approveInTransaction(
    tx: IdentityStoreOps,
    item: ReviewQueueItem,
    canonicalId: number | null,
    confidence: number,
    reviewer: string,
  ): Promise<ApprovalOutcome> {
    if (item.record.kind !== "player") {
      throw new ValidationError(`Review item ${item.id} does not hold a player record`);
    }
    const input = this.prepare(item.record, {});

    if (canonicalId !== null) {
      const player = await tx.getPlayer(canonicalId);
      if (!player) throw new ValidationError(`Player ${canonicalId} does not exist`);
      await this.attachInTransaction(tx, input, item.sourceRecordId, { player, method: "manual", confidence }, reviewer);
      return { canonicalId, created: false };
    }

    const player = await this.createInTransaction(tx, input, item.sourceRecordId, item.candidates, reviewer);
    return { canonicalId: player.id, created: true };
  }
}
