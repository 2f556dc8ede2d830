import { and, asc, count, eq, gte, inArray, lt, lte, sql, type ExtractTablesWithRelations } from "drizzle-orm";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type * as schema from "../../drizzle/schema";
import {
  canonicalGames,
  canonicalPlayers,
  gameMappings,
  matchAuditLog,
  playerAliases,
  playerGameStats,
  playerMappings,
  predictions,
  reviewQueue,
  sourceRecords,
  syncMetadata,
  teamMappings,
  type CanonicalGameRow,
  type CanonicalPlayerRow,
  type GameMappingRow,
  type MatchAuditLogRow,
  type PlayerAliasRow,
  type PlayerMappingRow,
  type ReviewQueueRow,
  type SourceRecordRow,
  type SyncMetadataRow,
  type TeamMappingRow,
} from "../../drizzle/schema";
import { ConflictError, ForeignKeyError } from "../_core/errors";
import { asNameSuffix } from "../_core/normalizers";
import { parseSourceRecord } from "../sync/record-schema";
import type {
  AuditLogEntry,
  CanonicalGame,
  CanonicalPlayer,
  Mapping,
  PlayerAlias,
  RecordKind,
  ReviewQueueItem,
  ReviewStatus,
  SourceIds,
  SourceName,
  SourceRecord,
  Sport,
  StoredSourceRecord,
  SyncDataType,
  SyncMetadata,
  TeamDefinition,
} from "../sync/types";
import type {
  AuditQuery,
  IdentityStore,
  IdentityStoreOps,
  MappingInput,
  NewAuditEntry,
  NewCanonicalGame,
  NewCanonicalPlayer,
  NewPlayerAlias,
  NewReviewItem,
  ReferenceCounts,
  ReviewResolution,
  SyncMetadataUpdate,
} from "./types";

/** The pooled database or a transaction client; both expose the same query builder. */
type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema, ExtractTablesWithRelations<typeof schema>>;

// ============================================================================
// ROW MAPPING
// ============================================================================

function toGame(row: CanonicalGameRow): CanonicalGame {
  return {
    id: row.id,
    sport: row.sport,
    scheduledAt: row.scheduledAt,
    gameDate: row.gameDate,
    homeTeam: row.homeTeam,
    awayTeam: row.awayTeam,
    sourceIds: { stats_api: row.statsApiId, odds_api: row.oddsApiId, injury_news: row.newsSourceId },
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toPlayer(row: CanonicalPlayerRow): CanonicalPlayer {
  return {
    id: row.id,
    sport: row.sport,
    canonicalName: row.canonicalName,
    normalizedName: row.normalizedName,
    nameSuffix: asNameSuffix(row.nameSuffix),
    team: row.team,
    position: row.position,
    sourceIds: { stats_api: row.statsApiId, odds_api: row.oddsApiId, injury_news: row.newsSourceId },
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toMapping(kind: RecordKind, row: GameMappingRow | PlayerMappingRow): Mapping {
  return {
    id: row.id,
    kind,
    sport: row.sport,
    source: row.source,
    sourceId: row.sourceId,
    canonicalId: row.canonicalId,
    confidence: row.confidence,
    method: row.method,
    status: row.status,
    sourceRecordId: row.sourceRecordId,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toSourceRecord(row: SourceRecordRow): StoredSourceRecord {
  return { ...row };
}

function toAlias(row: PlayerAliasRow): PlayerAlias {
  return { ...row };
}

function toReviewItem(row: ReviewQueueRow): ReviewQueueItem {
  return { ...row, record: parseSourceRecord(row.record) };
}

function toAuditEntry(row: MatchAuditLogRow): AuditLogEntry {
  return { ...row };
}

function toSyncMetadata(row: SyncMetadataRow): SyncMetadata {
  return {
    source: row.source,
    dataType: row.dataType,
    state: row.state,
    lastStatus: row.lastStatus,
    recordsProcessed: row.recordsProcessed,
    recordsMatched: row.recordsMatched,
    recordsQueued: row.recordsQueued,
    recordsFailed: row.recordsFailed,
    durationMs: row.durationMs,
    errorMessage: row.errorMessage,
    lastStartedAt: row.lastStartedAt,
    lastCompletedAt: row.lastCompletedAt,
    updatedAt: row.updatedAt,
  };
}

function toTeam(row: TeamMappingRow): TeamDefinition {
  return {
    sport: row.sport,
    teamCode: row.teamCode,
    fullName: row.fullName,
    city: row.city,
    sourceKeys: row.sourceKeys,
    alternateNames: row.alternateNames,
  };
}

function sourceIdColumns(sourceIds: Partial<SourceIds>) {
  return {
    ...(sourceIds.stats_api !== undefined ? { statsApiId: sourceIds.stats_api } : {}),
    ...(sourceIds.odds_api !== undefined ? { oddsApiId: sourceIds.odds_api } : {}),
    ...(sourceIds.injury_news !== undefined ? { newsSourceId: sourceIds.injury_news } : {}),
  };
}

function gameSourceColumn(source: SourceName) {
  switch (source) {
    case "stats_api":
      return canonicalGames.statsApiId;
    case "odds_api":
      return canonicalGames.oddsApiId;
    case "injury_news":
      return canonicalGames.newsSourceId;
  }
}

function playerSourceColumn(source: SourceName) {
  switch (source) {
    case "stats_api":
      return canonicalPlayers.statsApiId;
    case "odds_api":
      return canonicalPlayers.oddsApiId;
    case "injury_news":
      return canonicalPlayers.newsSourceId;
  }
}

/**
 * Translate node-postgres constraint errors into the sync error taxonomy.
 * 23505 = unique_violation, 23503 = foreign_key_violation.
 */
export function translateDatabaseError(error: unknown): unknown {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current instanceof Error; depth++) {
    const code = "code" in current ? current.code : undefined;
    const constraint = "constraint" in current && typeof current.constraint === "string" ? current.constraint : "unknown";
    if (code === "23505") return new ConflictError(constraint, { cause: error });
    if (code === "23503") return new ForeignKeyError(constraint, { cause: error });
    current = current.cause;
  }
  return error;
}

async function guarded<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw translateDatabaseError(error);
  }
}

function firstRow<T>(rows: T[], what: string): T {
  const [row] = rows;
  if (row === undefined) throw new Error(`${what} returned no row`);
  return row;
}

/**
 * IdentityStore backed by Postgres through drizzle.
 * A transaction hands the callback a store bound to the transaction client.
 */
export class PostgresIdentityStore implements IdentityStore {
  constructor(private readonly db: Executor) {}

  transaction<T>(fn: (tx: IdentityStoreOps) => Promise<T>): Promise<T> {
    return guarded(() => this.db.transaction((tx) => fn(new PostgresIdentityStore(tx))));
  }

  // --------------------------------------------------------------------------
  // Games
  // --------------------------------------------------------------------------

  async getGame(id: number): Promise<CanonicalGame | null> {
    const [row] = await this.db.select().from(canonicalGames).where(eq(canonicalGames.id, id)).limit(1);
    return row ? toGame(row) : null;
  }

  async findGameBySourceId(sport: Sport, source: SourceName, sourceId: string): Promise<CanonicalGame | null> {
    const [row] = await this.db
      .select()
      .from(canonicalGames)
      .where(and(eq(canonicalGames.sport, sport), eq(gameSourceColumn(source), sourceId)))
      .limit(1);
    return row ? toGame(row) : null;
  }

  async findGameByNaturalKey(sport: Sport, gameDate: string, homeTeam: string, awayTeam: string): Promise<CanonicalGame | null> {
    const [row] = await this.db
      .select()
      .from(canonicalGames)
      .where(
        and(
          eq(canonicalGames.sport, sport),
          eq(canonicalGames.gameDate, gameDate),
          eq(canonicalGames.homeTeam, homeTeam),
          eq(canonicalGames.awayTeam, awayTeam),
        ),
      )
      .limit(1);
    return row ? toGame(row) : null;
  }

  async lockMatchup(sport: Sport, homeTeam: string, awayTeam: string): Promise<void> {
    // Transaction-scoped: released on commit or rollback
    await this.db.execute(sql`select pg_advisory_xact_lock(hashtext(${`${sport}:${homeTeam}:${awayTeam}`}))`);
  }

  async findGamesScheduledBetween(sport: Sport, from: Date, to: Date): Promise<CanonicalGame[]> {
    const rows = await this.db
      .select()
      .from(canonicalGames)
      .where(and(eq(canonicalGames.sport, sport), gte(canonicalGames.scheduledAt, from), lte(canonicalGames.scheduledAt, to)))
      .orderBy(asc(canonicalGames.scheduledAt), asc(canonicalGames.id));
    return rows.map(toGame);
  }

  async findGamesOnDates(sport: Sport, gameDates: string[]): Promise<CanonicalGame[]> {
    if (gameDates.length === 0) return [];
    const rows = await this.db
      .select()
      .from(canonicalGames)
      .where(and(eq(canonicalGames.sport, sport), inArray(canonicalGames.gameDate, gameDates)))
      .orderBy(asc(canonicalGames.id));
    return rows.map(toGame);
  }

  async listGames(sport?: Sport): Promise<CanonicalGame[]> {
    const rows = await this.db
      .select()
      .from(canonicalGames)
      .where(sport ? eq(canonicalGames.sport, sport) : undefined)
      .orderBy(asc(canonicalGames.id));
    return rows.map(toGame);
  }

  insertGame(game: NewCanonicalGame): Promise<CanonicalGame> {
    return guarded(async () => {
      const rows = await this.db
        .insert(canonicalGames)
        .values({
          sport: game.sport,
          scheduledAt: game.scheduledAt,
          gameDate: game.gameDate,
          homeTeam: game.homeTeam,
          awayTeam: game.awayTeam,
          ...sourceIdColumns(game.sourceIds),
        })
        .returning();
      return toGame(firstRow(rows, "insertGame"));
    });
  }

  updateGameSourceIds(id: number, sourceIds: Partial<SourceIds>): Promise<CanonicalGame> {
    return guarded(async () => {
      const rows = await this.db
        .update(canonicalGames)
        .set({ ...sourceIdColumns(sourceIds), updatedAt: new Date() })
        .where(eq(canonicalGames.id, id))
        .returning();
      return toGame(firstRow(rows, `updateGameSourceIds(${id})`));
    });
  }

  deleteGame(id: number): Promise<void> {
    return guarded(async () => {
      await this.db.delete(canonicalGames).where(eq(canonicalGames.id, id));
    });
  }

  // --------------------------------------------------------------------------
  // Players
  // --------------------------------------------------------------------------

  async getPlayer(id: number): Promise<CanonicalPlayer | null> {
    const [row] = await this.db.select().from(canonicalPlayers).where(eq(canonicalPlayers.id, id)).limit(1);
    return row ? toPlayer(row) : null;
  }

  async findPlayerBySourceId(sport: Sport, source: SourceName, sourceId: string): Promise<CanonicalPlayer | null> {
    const [row] = await this.db
      .select()
      .from(canonicalPlayers)
      .where(and(eq(canonicalPlayers.sport, sport), eq(playerSourceColumn(source), sourceId)))
      .limit(1);
    return row ? toPlayer(row) : null;
  }

  async findPlayersByName(sport: Sport, normalizedName: string): Promise<CanonicalPlayer[]> {
    const rows = await this.db
      .select()
      .from(canonicalPlayers)
      .where(and(eq(canonicalPlayers.sport, sport), eq(canonicalPlayers.normalizedName, normalizedName)))
      .orderBy(asc(canonicalPlayers.id));
    return rows.map(toPlayer);
  }

  async findPlayersByTeam(sport: Sport, team: string): Promise<CanonicalPlayer[]> {
    const rows = await this.db
      .select()
      .from(canonicalPlayers)
      .where(and(eq(canonicalPlayers.sport, sport), eq(canonicalPlayers.team, team)))
      .orderBy(asc(canonicalPlayers.id));
    return rows.map(toPlayer);
  }

  async listPlayers(sport?: Sport): Promise<CanonicalPlayer[]> {
    const rows = await this.db
      .select()
      .from(canonicalPlayers)
      .where(sport ? eq(canonicalPlayers.sport, sport) : undefined)
      .orderBy(asc(canonicalPlayers.id));
    return rows.map(toPlayer);
  }

  insertPlayer(player: NewCanonicalPlayer): Promise<CanonicalPlayer> {
    return guarded(async () => {
      const rows = await this.db
        .insert(canonicalPlayers)
        .values({
          sport: player.sport,
          canonicalName: player.canonicalName,
          normalizedName: player.normalizedName,
          nameSuffix: player.nameSuffix,
          team: player.team,
          position: player.position,
          ...sourceIdColumns(player.sourceIds),
        })
        .returning();
      return toPlayer(firstRow(rows, "insertPlayer"));
    });
  }

  updatePlayerSourceIds(id: number, sourceIds: Partial<SourceIds>): Promise<CanonicalPlayer> {
    return guarded(async () => {
      const rows = await this.db
        .update(canonicalPlayers)
        .set({ ...sourceIdColumns(sourceIds), updatedAt: new Date() })
        .where(eq(canonicalPlayers.id, id))
        .returning();
      return toPlayer(firstRow(rows, `updatePlayerSourceIds(${id})`));
    });
  }

  deletePlayer(id: number): Promise<void> {
    return guarded(async () => {
      await this.db.delete(canonicalPlayers).where(eq(canonicalPlayers.id, id));
    });
  }

  // --------------------------------------------------------------------------
  // Raw records
  // --------------------------------------------------------------------------

  async saveSourceRecord(record: SourceRecord, payload: unknown, payloadHash: string): Promise<StoredSourceRecord> {
    const inserted = await this.db
      .insert(sourceRecords)
      .values({
        source: record.source,
        kind: record.kind,
        sport: record.sport,
        sourceId: record.sourceId,
        payload,
        payloadHash,
      })
      .onConflictDoNothing({
        target: [sourceRecords.source, sourceRecords.kind, sourceRecords.sourceId, sourceRecords.payloadHash],
      })
      .returning();
    if (inserted[0]) return toSourceRecord(inserted[0]);

    const [existing] = await this.db
      .select()
      .from(sourceRecords)
      .where(
        and(
          eq(sourceRecords.source, record.source),
          eq(sourceRecords.kind, record.kind),
          eq(sourceRecords.sourceId, record.sourceId),
          eq(sourceRecords.payloadHash, payloadHash),
        ),
      )
      .limit(1);
    if (!existing) throw new Error(`Source record ${record.source}/${record.sourceId} vanished after conflict`);
    return toSourceRecord(existing);
  }

  // --------------------------------------------------------------------------
  // Mappings
  // --------------------------------------------------------------------------

  async getMapping(kind: RecordKind, sport: Sport, source: SourceName, sourceId: string): Promise<Mapping | null> {
    if (kind === "game") {
      const [row] = await this.db
        .select()
        .from(gameMappings)
        .where(and(eq(gameMappings.sport, sport), eq(gameMappings.source, source), eq(gameMappings.sourceId, sourceId)))
        .limit(1);
      return row ? toMapping(kind, row) : null;
    }
    const [row] = await this.db
      .select()
      .from(playerMappings)
      .where(and(eq(playerMappings.sport, sport), eq(playerMappings.source, source), eq(playerMappings.sourceId, sourceId)))
      .limit(1);
    return row ? toMapping(kind, row) : null;
  }

  upsertMapping(mapping: MappingInput): Promise<Mapping> {
    const values = {
      sport: mapping.sport,
      source: mapping.source,
      sourceId: mapping.sourceId,
      canonicalId: mapping.canonicalId,
      confidence: mapping.confidence,
      method: mapping.method,
      status: mapping.status,
      sourceRecordId: mapping.sourceRecordId,
    };
    const changes = {
      canonicalId: mapping.canonicalId,
      confidence: mapping.confidence,
      method: mapping.method,
      status: mapping.status,
      ...(mapping.sourceRecordId !== null ? { sourceRecordId: mapping.sourceRecordId } : {}),
      updatedAt: new Date(),
    };

    return guarded(async () => {
      if (mapping.kind === "game") {
        const rows = await this.db
          .insert(gameMappings)
          .values(values)
          .onConflictDoUpdate({ target: [gameMappings.sport, gameMappings.source, gameMappings.sourceId], set: changes })
          .returning();
        return toMapping("game", firstRow(rows, "upsertMapping"));
      }
      const rows = await this.db
        .insert(playerMappings)
        .values(values)
        .onConflictDoUpdate({ target: [playerMappings.sport, playerMappings.source, playerMappings.sourceId], set: changes })
        .returning();
      return toMapping("player", firstRow(rows, "upsertMapping"));
    });
  }

  async listMappingsBelow(kind: RecordKind, confidence: number, limit: number): Promise<Mapping[]> {
    if (kind === "game") {
      const rows = await this.db
        .select()
        .from(gameMappings)
        .where(and(eq(gameMappings.status, "matched"), lt(gameMappings.confidence, confidence)))
        .orderBy(asc(gameMappings.confidence), asc(gameMappings.id))
        .limit(limit);
      return rows.map((row) => toMapping("game", row));
    }
    const rows = await this.db
      .select()
      .from(playerMappings)
      .where(and(eq(playerMappings.status, "matched"), lt(playerMappings.confidence, confidence)))
      .orderBy(asc(playerMappings.confidence), asc(playerMappings.id))
      .limit(limit);
    return rows.map((row) => toMapping("player", row));
  }

  repointMappings(kind: RecordKind, fromId: number, toId: number): Promise<number> {
    return guarded(async () => {
      const now = new Date();
      if (kind === "game") {
        const rows = await this.db
          .update(gameMappings)
          .set({ canonicalId: toId, updatedAt: now })
          .where(eq(gameMappings.canonicalId, fromId))
          .returning({ id: gameMappings.id });
        return rows.length;
      }
      const rows = await this.db
        .update(playerMappings)
        .set({ canonicalId: toId, updatedAt: now })
        .where(eq(playerMappings.canonicalId, fromId))
        .returning({ id: playerMappings.id });
      return rows.length;
    });
  }

  // --------------------------------------------------------------------------
  // Aliases
  // --------------------------------------------------------------------------

  async findAlias(aliasName: string, aliasSource: SourceName): Promise<PlayerAlias | null> {
    const [row] = await this.db
      .select()
      .from(playerAliases)
      .where(and(eq(playerAliases.aliasName, aliasName), eq(playerAliases.aliasSource, aliasSource)))
      .limit(1);
    return row ? toAlias(row) : null;
  }

  insertAlias(alias: NewPlayerAlias): Promise<PlayerAlias> {
    return guarded(async () => {
      const rows = await this.db.insert(playerAliases).values(alias).returning();
      return toAlias(firstRow(rows, "insertAlias"));
    });
  }

  repointAliases(fromId: number, toId: number): Promise<number> {
    return guarded(async () => {
      const rows = await this.db
        .update(playerAliases)
        .set({ canonicalId: toId })
        .where(eq(playerAliases.canonicalId, fromId))
        .returning({ id: playerAliases.id });
      return rows.length;
    });
  }

  // --------------------------------------------------------------------------
  // Review queue
  // --------------------------------------------------------------------------

  insertReviewItem(item: NewReviewItem): Promise<ReviewQueueItem> {
    return guarded(async () => {
      const rows = await this.db
        .insert(reviewQueue)
        .values({
          kind: item.kind,
          sport: item.sport,
          source: item.source,
          sourceId: item.sourceId,
          sourceRecordId: item.sourceRecordId,
          record: item.record,
          candidates: item.candidates,
          reason: item.reason,
        })
        .returning();
      return toReviewItem(firstRow(rows, "insertReviewItem"));
    });
  }

  async getReviewItem(id: number): Promise<ReviewQueueItem | null> {
    const [row] = await this.db.select().from(reviewQueue).where(eq(reviewQueue.id, id)).limit(1);
    return row ? toReviewItem(row) : null;
  }

  async findPendingReviewItem(kind: RecordKind, sport: Sport, source: SourceName, sourceId: string): Promise<ReviewQueueItem | null> {
    const [row] = await this.db
      .select()
      .from(reviewQueue)
      .where(
        and(
          eq(reviewQueue.status, "pending"),
          eq(reviewQueue.kind, kind),
          eq(reviewQueue.sport, sport),
          eq(reviewQueue.source, source),
          eq(reviewQueue.sourceId, sourceId),
        ),
      )
      .limit(1);
    return row ? toReviewItem(row) : null;
  }

  async listReviewItems(status: ReviewStatus, limit: number): Promise<ReviewQueueItem[]> {
    const rows = await this.db
      .select()
      .from(reviewQueue)
      .where(eq(reviewQueue.status, status))
      .orderBy(asc(reviewQueue.id))
      .limit(limit);
    return rows.map(toReviewItem);
  }

  async countReviewItems(status: ReviewStatus): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(reviewQueue).where(eq(reviewQueue.status, status));
    return row?.value ?? 0;
  }

  async resolveReviewItem(id: number, resolution: ReviewResolution): Promise<ReviewQueueItem | null> {
    const [row] = await this.db
      .update(reviewQueue)
      .set(resolution)
      .where(and(eq(reviewQueue.id, id), eq(reviewQueue.status, "pending")))
      .returning();
    return row ? toReviewItem(row) : null;
  }

  async repointReviewItems(kind: RecordKind, fromId: number, toId: number): Promise<number> {
    const rows = await this.db.select().from(reviewQueue).where(eq(reviewQueue.kind, kind));
    let updated = 0;
    for (const row of rows) {
      const touchesCandidates = row.candidates.some((c) => c.canonicalId === fromId);
      if (!touchesCandidates && row.resolvedCanonicalId !== fromId) continue;
      await this.db
        .update(reviewQueue)
        .set({
          candidates: row.candidates.map((c) => (c.canonicalId === fromId ? { ...c, canonicalId: toId } : c)),
          resolvedCanonicalId: row.resolvedCanonicalId === fromId ? toId : row.resolvedCanonicalId,
        })
        .where(eq(reviewQueue.id, row.id));
      updated++;
    }
    return updated;
  }

  // --------------------------------------------------------------------------
  // Audit
  // --------------------------------------------------------------------------

  async appendAudit(entry: NewAuditEntry): Promise<AuditLogEntry> {
    const rows = await this.db
      .insert(matchAuditLog)
      .values({
        entityType: entry.entityType,
        entityId: entry.entityId,
        action: entry.action,
        previousState: entry.previousState ?? null,
        newState: entry.newState ?? null,
        matchDetails: entry.matchDetails ?? null,
        performedBy: entry.performedBy ?? "system",
      })
      .returning();
    return toAuditEntry(firstRow(rows, "appendAudit"));
  }

  async listAudit(query: AuditQuery = {}): Promise<AuditLogEntry[]> {
    const conditions = [
      query.entityType ? eq(matchAuditLog.entityType, query.entityType) : undefined,
      query.entityId ? eq(matchAuditLog.entityId, query.entityId) : undefined,
      query.action ? eq(matchAuditLog.action, query.action) : undefined,
    ];
    const rows = await this.db
      .select()
      .from(matchAuditLog)
      .where(and(...conditions))
      .orderBy(asc(matchAuditLog.id))
      .limit(query.limit ?? 1000);
    return rows.map(toAuditEntry);
  }

  // --------------------------------------------------------------------------
  // Sync metadata
  // --------------------------------------------------------------------------

  async getSyncMetadata(source: SourceName, dataType: SyncDataType): Promise<SyncMetadata | null> {
    const [row] = await this.db
      .select()
      .from(syncMetadata)
      .where(and(eq(syncMetadata.source, source), eq(syncMetadata.dataType, dataType)))
      .limit(1);
    return row ? toSyncMetadata(row) : null;
  }

  async upsertSyncMetadata(source: SourceName, dataType: SyncDataType, update: SyncMetadataUpdate): Promise<SyncMetadata> {
    const now = new Date();
    const rows = await this.db
      .insert(syncMetadata)
      .values({ source, dataType, ...update, updatedAt: now })
      .onConflictDoUpdate({
        target: [syncMetadata.source, syncMetadata.dataType],
        set: { ...update, updatedAt: now },
      })
      .returning();
    return toSyncMetadata(firstRow(rows, "upsertSyncMetadata"));
  }

  async listSyncMetadata(): Promise<SyncMetadata[]> {
    const rows = await this.db.select().from(syncMetadata).orderBy(asc(syncMetadata.source), asc(syncMetadata.dataType));
    return rows.map(toSyncMetadata);
  }

  // --------------------------------------------------------------------------
  // Teams
  // --------------------------------------------------------------------------

  async listTeamMappings(sport?: Sport): Promise<TeamDefinition[]> {
    const rows = await this.db
      .select()
      .from(teamMappings)
      .where(sport ? eq(teamMappings.sport, sport) : undefined)
      .orderBy(asc(teamMappings.teamCode));
    return rows.map(toTeam);
  }

  async upsertTeamMapping(team: TeamDefinition): Promise<void> {
    await this.db
      .insert(teamMappings)
      .values(team)
      .onConflictDoUpdate({
        target: [teamMappings.sport, teamMappings.teamCode],
        set: {
          fullName: team.fullName,
          city: team.city,
          sourceKeys: team.sourceKeys,
          alternateNames: team.alternateNames,
          updatedAt: new Date(),
        },
      });
  }

  // --------------------------------------------------------------------------
  // Consumer-owned references
  // --------------------------------------------------------------------------

  async countReferences(kind: RecordKind, id: number): Promise<ReferenceCounts> {
    const predictionFilter = kind === "game" ? eq(predictions.gameId, id) : eq(predictions.playerId, id);
    const statFilter = kind === "game" ? eq(playerGameStats.gameId, id) : eq(playerGameStats.playerId, id);
    const [p] = await this.db.select({ value: count() }).from(predictions).where(predictionFilter);
    const [s] = await this.db.select({ value: count() }).from(playerGameStats).where(statFilter);
    return { predictions: p?.value ?? 0, stats: s?.value ?? 0 };
  }

  repointReferences(kind: RecordKind, fromId: number, toId: number): Promise<ReferenceCounts> {
    return guarded(async () => {
      if (kind === "game") {
        const p = await this.db
          .update(predictions)
          .set({ gameId: toId })
          .where(eq(predictions.gameId, fromId))
          .returning({ id: predictions.id });
        const s = await this.db
          .update(playerGameStats)
          .set({ gameId: toId })
          .where(eq(playerGameStats.gameId, fromId))
          .returning({ id: playerGameStats.id });
        return { predictions: p.length, stats: s.length };
      }
      const p = await this.db
        .update(predictions)
        .set({ playerId: toId })
        .where(eq(predictions.playerId, fromId))
        .returning({ id: predictions.id });
      const s = await this.db
        .update(playerGameStats)
        .set({ playerId: toId })
        .where(eq(playerGameStats.playerId, fromId))
        .returning({ id: playerGameStats.id });
      return { predictions: p.length, stats: s.length };
    });
  }
}

