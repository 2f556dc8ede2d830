import { addDays, addMinutes, differenceInMinutes, subHours, subMinutes } from "date-fns";
import { isDebug } from "../_core/env";
import { ConflictError, ValidationError } from "../_core/errors";
import { sourceIdPatch, type IdentityStore, type IdentityStoreOps } from "../store/types";
import type { AuditLogger, MatchDetails } from "./audit-logger";
import type { ConfidenceScorer } from "./confidence-scorer";
import { toleranceMinutesFor, type MatchingConfig } from "./config";
import { resultFromMapping } from "./mappings";
import { hashPayload, storedPayload } from "./record-schema";
import { enqueueForReview, type ApprovalOutcome, type ReviewTarget } from "./review-queue";
import type { TeamMappingRegistry } from "./team-registry";
import type {
  CanonicalGame,
  GameSourceRecord,
  MatchMethod,
  MatchSignals,
  ResolutionResult,
  ReviewQueueItem,
  ScoredCandidate,
} from "./types";

export interface GameMatcherDeps {
  store: IdentityStore;
  teams: TeamMappingRegistry;
  scorer: ConfidenceScorer;
  audit: AuditLogger;
  config: MatchingConfig;
}

interface ResolvedTeams {
  home: string | null;
  away: string | null;
}

interface AcceptedMatch {
  game: CanonicalGame;
  method: MatchMethod;
  confidence: number;
  signals?: MatchSignals;
}

/** Calendar day (UTC) a game belongs to, with the day rolling over at rolloverUtcHour. */
export function gameDateFor(scheduledAt: Date, rolloverUtcHour: number): string {
  return subHours(scheduledAt, rolloverUtcHour).toISOString().slice(0, 10);
}

function shiftDate(gameDate: string, days: number): string {
  return addDays(new Date(`${gameDate}T00:00:00Z`), days).toISOString().slice(0, 10);
}

export function gameSnapshot(game: CanonicalGame) {
  return {
    sport: game.sport,
    scheduledAt: game.scheduledAt.toISOString(),
    gameDate: game.gameDate,
    homeTeam: game.homeTeam,
    awayTeam: game.awayTeam,
    sourceIds: { ...game.sourceIds },
  };
}

/** A game already holding another id from the same source is a different game. */
function usableFor(record: GameSourceRecord, game: CanonicalGame): boolean {
  const held = game.sourceIds[record.source];
  return held === null || held === record.sourceId;
}

function describe(record: GameSourceRecord): string {
  return `${record.source}/${record.sourceId} (${record.fields.awayTeam} @ ${record.fields.homeTeam})`;
}

/**
 * Resolves a game record to a canonical game, in priority order:
 * stored mapping, time window on resolved teams, fuzzy team names on the
 * same day, then review queue or creation. Every insert is assumed racy: a
 * unique violation means another writer created the game first, and the
 * matcher attaches to that row instead.
 */
export class GameMatcher implements ReviewTarget {
  constructor(private readonly deps: GameMatcherDeps) {}

  async resolve(record: GameSourceRecord): Promise<ResolutionResult> {
    const { store } = this.deps;
    const stored = await store.saveSourceRecord(record, storedPayload(record), hashPayload(record));

    try {
      return await this.resolveStored(record, stored.id);
    } catch (error) {
      if (!(error instanceof ConflictError)) throw error;
      console.log(`[game-matcher] ${error.constraint} while resolving ${describe(record)}, re-fetching`);
      return this.recoverFromConflict(record, stored.id);
    }
  }

  private async resolveStored(record: GameSourceRecord, sourceRecordId: number): Promise<ResolutionResult> {
    const { store, teams, config } = this.deps;
    const { sport, source, sourceId, fields } = record;

    // 1. Exact id
    const mapping = await store.getMapping("game", sport, source, sourceId);
    const fromMapping = await resultFromMapping(store, mapping, sourceRecordId);
    if (fromMapping) return fromMapping;

    const holder = await store.findGameBySourceId(sport, source, sourceId);
    if (holder) {
      return this.attach(record, sourceRecordId, { game: holder, method: "exact_id", confidence: 1 });
    }

    const resolved: ResolvedTeams = {
      home: teams.resolve(sport, source, fields.homeTeam),
      away: teams.resolve(sport, source, fields.awayTeam),
    };
    const tolerance = toleranceMinutesFor(config, source);
    const gameDate = gameDateFor(fields.scheduledAt, config.games.dayRolloverUtcHour);
    const usable = (game: CanonicalGame) => usableFor(record, game);

    // 2. Time window on resolved teams
    if (resolved.home && resolved.away) {
      const closest = await this.closestInWindow(store, record, resolved.home, resolved.away, tolerance);
      if (closest) {
        return this.attach(record, sourceRecordId, {
          game: closest,
          method: "time_window",
          confidence: config.games.timeWindowConfidence,
          signals: { teamMatch: true, timeProximity: this.timeProximity(closest, fields.scheduledAt, tolerance) },
        });
      }
    }

    // 3. Fuzzy team names on the same day
    const sameDay = (await store.findGamesOnDates(sport, [gameDate])).filter(usable);
    const fuzzy = sameDay.filter((g) => this.teamsWithinDistance(record, resolved, g));
    if (fuzzy.length === 1) {
      return this.attach(record, sourceRecordId, {
        game: fuzzy[0],
        method: "fuzzy_team_name",
        confidence: config.games.fuzzyTeamConfidence,
        signals: this.signalsFor(record, resolved, fuzzy[0], tolerance),
      });
    }

    // 4. Score what is left; anything plausible goes to a human
    const nearby = await store.findGamesScheduledBetween(
      sport,
      subMinutes(fields.scheduledAt, config.games.crossTimezoneToleranceMinutes),
      addMinutes(fields.scheduledAt, config.games.crossTimezoneToleranceMinutes),
    );
    const adjacentDays = await store.findGamesOnDates(sport, [shiftDate(gameDate, -1), shiftDate(gameDate, 1)]);
    const pool = new Map<number, CanonicalGame>();
    for (const game of [...sameDay, ...nearby, ...adjacentDays]) {
      if (usable(game)) pool.set(game.id, game);
    }
    const candidates = this.scoreCandidates(record, resolved, [...pool.values()], tolerance);
    const plausible = candidates.filter((c) => c.tier !== "REJECT");

    if (fuzzy.length > 1) {
      return this.queue(record, sourceRecordId, candidates, "conflicting_candidates");
    }
    if (!resolved.home || !resolved.away) {
      return this.queue(record, sourceRecordId, candidates, "unresolved_team");
    }
    if (plausible.length > 0) {
      return this.queue(record, sourceRecordId, candidates, "low_confidence");
    }

    return this.create(record, sourceRecordId, resolved.home, resolved.away, gameDate, candidates);
  }

  private async closestInWindow(
    ops: IdentityStoreOps,
    record: GameSourceRecord,
    home: string,
    away: string,
    tolerance: number,
  ): Promise<CanonicalGame | null> {
    const { scheduledAt } = record.fields;
    const inWindow = (
      await ops.findGamesScheduledBetween(record.sport, subMinutes(scheduledAt, tolerance), addMinutes(scheduledAt, tolerance))
    ).filter((g) => usableFor(record, g) && g.homeTeam === home && g.awayTeam === away);
    inWindow.sort((a, b) => this.minutesApart(a, scheduledAt) - this.minutesApart(b, scheduledAt));
    return inWindow[0] ?? null;
  }

  private minutesApart(game: CanonicalGame, scheduledAt: Date): number {
    return Math.abs(differenceInMinutes(game.scheduledAt, scheduledAt));
  }

  private timeProximity(game: CanonicalGame, scheduledAt: Date, tolerance: number): number {
    if (tolerance <= 0) return this.minutesApart(game, scheduledAt) === 0 ? 1 : 0;
    return Math.max(0, 1 - this.minutesApart(game, scheduledAt) / tolerance);
  }

  private teamsWithinDistance(record: GameSourceRecord, resolved: ResolvedTeams, game: CanonicalGame): boolean {
    const { teams, config } = this.deps;
    const max = config.games.maxTeamNameEditDistance;
    const side = (code: string | null, raw: string, canonical: string) =>
      code !== null ? code === canonical : teams.withinEditDistance(record.sport, canonical, raw, max);
    return (
      side(resolved.home, record.fields.homeTeam, game.homeTeam) &&
      side(resolved.away, record.fields.awayTeam, game.awayTeam)
    );
  }

  private signalsFor(record: GameSourceRecord, resolved: ResolvedTeams, game: CanonicalGame, tolerance: number): MatchSignals {
    const { teams } = this.deps;
    const sim = (code: string | null, raw: string, canonical: string) =>
      code !== null ? (code === canonical ? 1 : 0) : teams.similarityTo(record.sport, canonical, raw);

    const signals: MatchSignals = {
      nameSimilarity:
        (sim(resolved.home, record.fields.homeTeam, game.homeTeam) + sim(resolved.away, record.fields.awayTeam, game.awayTeam)) / 2,
      timeProximity: this.timeProximity(game, record.fields.scheduledAt, tolerance),
    };
    if (resolved.home && resolved.away) {
      signals.teamMatch = resolved.home === game.homeTeam && resolved.away === game.awayTeam;
    }
    return signals;
  }

  private scoreCandidates(
    record: GameSourceRecord,
    resolved: ResolvedTeams,
    games: CanonicalGame[],
    tolerance: number,
  ): ScoredCandidate[] {
    return games
      .map((game) => {
        const signals = this.signalsFor(record, resolved, game, tolerance);
        const { confidence, tier } = this.deps.scorer.score(signals, "game");
        return {
          canonicalId: game.id,
          label: `${game.awayTeam} @ ${game.homeTeam} ${game.scheduledAt.toISOString()}`,
          confidence,
          tier,
          signals,
        };
      })
      .sort((a, b) => b.confidence - a.confidence || a.canonicalId - b.canonicalId);
  }

  // --------------------------------------------------------------------------
  // Writes
  // --------------------------------------------------------------------------

  private details(record: GameSourceRecord, method: MatchMethod, confidence: number, extra: Partial<MatchDetails> = {}): MatchDetails {
    return { source: record.source, sourceId: record.sourceId, method, confidence, ...extra };
  }

  private async attach(record: GameSourceRecord, sourceRecordId: number, match: AcceptedMatch): Promise<ResolutionResult> {
    await this.deps.store.transaction((tx) => this.attachInTransaction(tx, record, sourceRecordId, match));
    if (isDebug()) {
      console.log(`[game-matcher] ${describe(record)} -> game ${match.game.id} via ${match.method} (${match.confidence})`);
    }
    return { canonicalId: match.game.id, confidence: match.confidence, status: "matched", created: false, method: match.method };
  }

  private async attachInTransaction(
    tx: IdentityStoreOps,
    record: GameSourceRecord,
    sourceRecordId: number | null,
    match: AcceptedMatch,
    performedBy?: string,
  ): Promise<void> {
    const { audit } = this.deps;
    const details = this.details(record, match.method, match.confidence, match.signals ? { signals: match.signals } : {});

    // Re-read inside the transaction: the candidate may have changed since scoring
    const current = (await tx.getGame(match.game.id)) ?? match.game;
    if (current.sourceIds[record.source] === null) {
      const updated = await tx.updateGameSourceIds(current.id, sourceIdPatch(record.source, record.sourceId));
      await audit.updated(tx, "game", current.id, gameSnapshot(current), gameSnapshot(updated), details);
    }

    await tx.upsertMapping({
      kind: "game",
      sport: record.sport,
      source: record.source,
      sourceId: record.sourceId,
      canonicalId: current.id,
      confidence: match.confidence,
      method: match.method,
      status: "matched",
      sourceRecordId,
    });
    await audit.matched(tx, "game", current.id, details, performedBy);
  }

  private async create(
    record: GameSourceRecord,
    sourceRecordId: number,
    homeTeam: string,
    awayTeam: string,
    gameDate: string,
    candidates: ScoredCandidate[],
  ): Promise<ResolutionResult> {
    const tolerance = toleranceMinutesFor(this.deps.config, record.source);
    const game = await this.deps.store.transaction(async (tx) => {
      // The natural key only catches writers on the same game day; the
      // window re-check under the matchup lock catches the rest.
      await tx.lockMatchup(record.sport, homeTeam, awayTeam);
      const rival = await this.closestInWindow(tx, record, homeTeam, awayTeam, tolerance);
      if (rival) throw new ConflictError("canonical_games_matchup_window");
      return this.createInTransaction(tx, record, sourceRecordId, homeTeam, awayTeam, gameDate, candidates);
    });
    console.log(`[game-matcher] Created game ${game.id} for ${describe(record)}`);
    return { canonicalId: game.id, confidence: 1, status: "matched", created: true, method: "created" };
  }

  private async createInTransaction(
    tx: IdentityStoreOps,
    record: GameSourceRecord,
    sourceRecordId: number | null,
    homeTeam: string,
    awayTeam: string,
    gameDate: string,
    candidates: ScoredCandidate[],
    performedBy?: string,
  ): Promise<CanonicalGame> {
    const game = await tx.insertGame({
      sport: record.sport,
      scheduledAt: record.fields.scheduledAt,
      gameDate,
      homeTeam,
      awayTeam,
      sourceIds: sourceIdPatch(record.source, record.sourceId),
    });
    await tx.upsertMapping({
      kind: "game",
      sport: record.sport,
      source: record.source,
      sourceId: record.sourceId,
      canonicalId: game.id,
      confidence: 1,
      method: "created",
      status: "matched",
      sourceRecordId,
    });
    await this.deps.audit.record(tx, {
      entityType: "game",
      entityId: String(game.id),
      action: "created",
      previousState: null,
      newState: gameSnapshot(game),
      matchDetails: this.details(record, "created", 1, { candidates }),
      performedBy,
    });
    return game;
  }

  private async queue(
    record: GameSourceRecord,
    sourceRecordId: number,
    candidates: ScoredCandidate[],
    reason: string,
  ): Promise<ResolutionResult> {
    const best = candidates[0]?.confidence ?? 0;
    const item = await this.deps.store.transaction(async (tx) => {
      await tx.upsertMapping({
        kind: "game",
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
        kind: "game",
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

  /**
   * Another writer won the insert race. Whatever row it created is now
   * visible by mapping, per-source id or natural key; attach to it.
   */
  private async recoverFromConflict(record: GameSourceRecord, sourceRecordId: number): Promise<ResolutionResult> {
    const { store, teams, config } = this.deps;
    const { sport, source, sourceId, fields } = record;

    const mapping = await store.getMapping("game", sport, source, sourceId);
    const fromMapping = await resultFromMapping(store, mapping, sourceRecordId);
    if (fromMapping) return fromMapping;

    const holder = await store.findGameBySourceId(sport, source, sourceId);
    if (holder) {
      return this.attach(record, sourceRecordId, { game: holder, method: "exact_id", confidence: 1 });
    }

    const home = teams.resolve(sport, source, fields.homeTeam);
    const away = teams.resolve(sport, source, fields.awayTeam);
    if (home && away) {
      const gameDate = gameDateFor(fields.scheduledAt, config.games.dayRolloverUtcHour);
      const existing = await store.findGameByNaturalKey(sport, gameDate, home, away);
      if (existing && (existing.sourceIds[source] === null || existing.sourceIds[source] === sourceId)) {
        return this.attach(record, sourceRecordId, { game: existing, method: "natural_key", confidence: 1 });
      }
    }

    // Nothing to attach to: start over against the current store
    return this.resolveStored(record, sourceRecordId);
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
    const record = item.record;
    if (record.kind !== "game") {
      throw new ValidationError(`Review item ${item.id} does not hold a game record`);
    }

    if (canonicalId !== null) {
      const game = await tx.getGame(canonicalId);
      if (!game) throw new ValidationError(`Game ${canonicalId} does not exist`);
      await this.attachInTransaction(tx, record, item.sourceRecordId, { game, method: "manual", confidence }, reviewer);
      return { canonicalId, created: false };
    }

    const { teams, config } = this.deps;
    const home = teams.resolve(record.sport, record.source, record.fields.homeTeam);
    const away = teams.resolve(record.sport, record.source, record.fields.awayTeam);
    if (!home || !away) {
      throw new ValidationError(`Cannot create a game for ${describe(record)}: unresolved team; approve against an existing game`);
    }
    const game = await this.createInTransaction(
      tx,
      record,
      item.sourceRecordId,
      home,
      away,
      gameDateFor(record.fields.scheduledAt, config.games.dayRolloverUtcHour),
      item.candidates,
      reviewer,
    );
    return { canonicalId: game.id, created: true };
  }
}
