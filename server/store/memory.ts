import { ConflictError, ForeignKeyError } from "../_core/errors";
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

export interface MemoryPrediction {
  id: number;
  gameId: number;
  playerId: number | null;
  market: string;
}

export interface MemoryPlayerStat {
  id: number;
  gameId: number;
  playerId: number;
  statistics: Record<string, number>;
}

interface MemoryState {
  games: Map<number, CanonicalGame>;
  players: Map<number, CanonicalPlayer>;
  sourceRecords: Map<number, StoredSourceRecord>;
  mappings: Map<number, Mapping>;
  aliases: Map<number, PlayerAlias>;
  reviewItems: Map<number, ReviewQueueItem>;
  audit: AuditLogEntry[];
  syncMetadata: Map<string, SyncMetadata>;
  teams: Map<string, TeamDefinition>;
  predictions: Map<number, MemoryPrediction>;
  stats: Map<number, MemoryPlayerStat>;
  sequences: Record<string, number>;
}

function createState(): MemoryState {
  return {
    games: new Map(),
    players: new Map(),
    sourceRecords: new Map(),
    mappings: new Map(),
    aliases: new Map(),
    reviewItems: new Map(),
    audit: [],
    syncMetadata: new Map(),
    teams: new Map(),
    predictions: new Map(),
    stats: new Map(),
    sequences: {},
  };
}

function nextId(state: MemoryState, table: string): number {
  const id = (state.sequences[table] ?? 0) + 1;
  state.sequences[table] = id;
  return id;
}

const copy = <T>(value: T): T => structuredClone(value);

const emptySourceIds = (): SourceIds => ({ stats_api: null, odds_api: null, injury_news: null });

const mappingKey = (kind: RecordKind, sport: Sport, source: SourceName, sourceId: string) =>
  `${kind}:${sport}:${source}:${sourceId}`;

/**
 * Operations over one MemoryState. The store runs them against committed
 * state; a transaction runs them against a draft that is swapped in on commit.
 */
abstract class MemoryOps implements IdentityStoreOps {
  protected abstract state(): MemoryState;
  protected abstract write<T>(fn: (state: MemoryState) => T): Promise<T>;

  // --------------------------------------------------------------------------
  // Games
  // --------------------------------------------------------------------------

  async getGame(id: number): Promise<CanonicalGame | null> {
    const game = this.state().games.get(id);
    return game ? copy(game) : null;
  }

  async findGameBySourceId(sport: Sport, source: SourceName, sourceId: string): Promise<CanonicalGame | null> {
    for (const game of this.state().games.values()) {
      if (game.sport === sport && game.sourceIds[source] === sourceId) return copy(game);
    }
    return null;
  }

  async findGameByNaturalKey(sport: Sport, gameDate: string, homeTeam: string, awayTeam: string): Promise<CanonicalGame | null> {
    for (const game of this.state().games.values()) {
      if (game.sport === sport && game.gameDate === gameDate && game.homeTeam === homeTeam && game.awayTeam === awayTeam) {
        return copy(game);
      }
    }
    return null;
  }

  // Transactions already run one at a time
  async lockMatchup(): Promise<void> {}

  async findGamesScheduledBetween(sport: Sport, from: Date, to: Date): Promise<CanonicalGame[]> {
    return [...this.state().games.values()]
      .filter((g) => g.sport === sport && g.scheduledAt >= from && g.scheduledAt <= to)
      .sort((a, b) => a.scheduledAt.getTime() - b.scheduledAt.getTime() || a.id - b.id)
      .map(copy);
  }

  async findGamesOnDates(sport: Sport, gameDates: string[]): Promise<CanonicalGame[]> {
    const dates = new Set(gameDates);
    return [...this.state().games.values()]
      .filter((g) => g.sport === sport && dates.has(g.gameDate))
      .sort((a, b) => a.id - b.id)
      .map(copy);
  }

  async listGames(sport?: Sport): Promise<CanonicalGame[]> {
    return [...this.state().games.values()]
      .filter((g) => sport === undefined || g.sport === sport)
      .sort((a, b) => a.id - b.id)
      .map(copy);
  }

  insertGame(input: NewCanonicalGame): Promise<CanonicalGame> {
    return this.write((state) => {
      const now = new Date();
      const game: CanonicalGame = {
        id: 0,
        sport: input.sport,
        scheduledAt: new Date(input.scheduledAt),
        gameDate: input.gameDate,
        homeTeam: input.homeTeam,
        awayTeam: input.awayTeam,
        sourceIds: { ...emptySourceIds(), ...input.sourceIds },
        createdAt: now,
        updatedAt: now,
      };
      assertGameUnique(state, game);
      game.id = nextId(state, "games");
      state.games.set(game.id, game);
      return copy(game);
    });
  }

  updateGameSourceIds(id: number, sourceIds: Partial<SourceIds>): Promise<CanonicalGame> {
    return this.write((state) => {
      const existing = state.games.get(id);
      if (!existing) throw new Error(`Game ${id} not found`);
      const updated: CanonicalGame = {
        ...existing,
        sourceIds: { ...existing.sourceIds, ...sourceIds },
        updatedAt: new Date(),
      };
      assertGameUnique(state, updated);
      state.games.set(id, updated);
      return copy(updated);
    });
  }

  deleteGame(id: number): Promise<void> {
    return this.write((state) => {
      for (const p of state.predictions.values()) {
        if (p.gameId === id) throw new ForeignKeyError("predictions_gameId_fk");
      }
      for (const s of state.stats.values()) {
        if (s.gameId === id) throw new ForeignKeyError("player_game_stats_gameId_fk");
      }
      for (const m of state.mappings.values()) {
        if (m.kind === "game" && m.canonicalId === id) throw new ForeignKeyError("game_mappings_canonicalId_fk");
      }
      state.games.delete(id);
    });
  }

  // --------------------------------------------------------------------------
  // Players
  // --------------------------------------------------------------------------

  async getPlayer(id: number): Promise<CanonicalPlayer | null> {
    const player = this.state().players.get(id);
    return player ? copy(player) : null;
  }

  async findPlayerBySourceId(sport: Sport, source: SourceName, sourceId: string): Promise<CanonicalPlayer | null> {
    for (const player of this.state().players.values()) {
      if (player.sport === sport && player.sourceIds[source] === sourceId) return copy(player);
    }
    return null;
  }

  async findPlayersByName(sport: Sport, normalizedName: string): Promise<CanonicalPlayer[]> {
    return [...this.state().players.values()]
      .filter((p) => p.sport === sport && p.normalizedName === normalizedName)
      .sort((a, b) => a.id - b.id)
      .map(copy);
  }

  async findPlayersByTeam(sport: Sport, team: string): Promise<CanonicalPlayer[]> {
    return [...this.state().players.values()]
      .filter((p) => p.sport === sport && p.team === team)
      .sort((a, b) => a.id - b.id)
      .map(copy);
  }

  async listPlayers(sport?: Sport): Promise<CanonicalPlayer[]> {
    return [...this.state().players.values()]
      .filter((p) => sport === undefined || p.sport === sport)
      .sort((a, b) => a.id - b.id)
      .map(copy);
  }

  insertPlayer(input: NewCanonicalPlayer): Promise<CanonicalPlayer> {
    return this.write((state) => {
      const now = new Date();
      const player: CanonicalPlayer = {
        id: 0,
        sport: input.sport,
        canonicalName: input.canonicalName,
        normalizedName: input.normalizedName,
        nameSuffix: input.nameSuffix,
        team: input.team,
        position: input.position,
        sourceIds: { ...emptySourceIds(), ...input.sourceIds },
        createdAt: now,
        updatedAt: now,
      };
      assertPlayerUnique(state, player);
      player.id = nextId(state, "players");
      state.players.set(player.id, player);
      return copy(player);
    });
  }

  updatePlayerSourceIds(id: number, sourceIds: Partial<SourceIds>): Promise<CanonicalPlayer> {
    return this.write((state) => {
      const existing = state.players.get(id);
      if (!existing) throw new Error(`Player ${id} not found`);
      const updated: CanonicalPlayer = {
        ...existing,
        sourceIds: { ...existing.sourceIds, ...sourceIds },
        updatedAt: new Date(),
      };
      assertPlayerUnique(state, updated);
      state.players.set(id, updated);
      return copy(updated);
    });
  }

  deletePlayer(id: number): Promise<void> {
    return this.write((state) => {
      for (const p of state.predictions.values()) {
        if (p.playerId === id) throw new ForeignKeyError("predictions_playerId_fk");
      }
      for (const s of state.stats.values()) {
        if (s.playerId === id) throw new ForeignKeyError("player_game_stats_playerId_fk");
      }
      for (const m of state.mappings.values()) {
        if (m.kind === "player" && m.canonicalId === id) throw new ForeignKeyError("player_mappings_canonicalId_fk");
      }
      for (const a of state.aliases.values()) {
        if (a.canonicalId === id) throw new ForeignKeyError("player_aliases_canonicalId_fk");
      }
      state.players.delete(id);
    });
  }

  // --------------------------------------------------------------------------
  // Raw records
  // --------------------------------------------------------------------------

  saveSourceRecord(record: SourceRecord, payload: unknown, payloadHash: string): Promise<StoredSourceRecord> {
    return this.write((state) => {
      for (const existing of state.sourceRecords.values()) {
        if (
          existing.source === record.source &&
          existing.kind === record.kind &&
          existing.sourceId === record.sourceId &&
          existing.payloadHash === payloadHash
        ) {
          return copy(existing);
        }
      }
      const stored: StoredSourceRecord = {
        id: nextId(state, "sourceRecords"),
        source: record.source,
        kind: record.kind,
        sport: record.sport,
        sourceId: record.sourceId,
        payload: copy(payload),
        payloadHash,
        ingestedAt: new Date(),
      };
      state.sourceRecords.set(stored.id, stored);
      return copy(stored);
    });
  }

  // --------------------------------------------------------------------------
  // Mappings
  // --------------------------------------------------------------------------

  async getMapping(kind: RecordKind, sport: Sport, source: SourceName, sourceId: string): Promise<Mapping | null> {
    const key = mappingKey(kind, sport, source, sourceId);
    for (const mapping of this.state().mappings.values()) {
      if (mappingKey(mapping.kind, mapping.sport, mapping.source, mapping.sourceId) === key) return copy(mapping);
    }
    return null;
  }

  upsertMapping(input: MappingInput): Promise<Mapping> {
    return this.write((state) => {
      assertCanonicalExists(state, input.kind, input.canonicalId);
      const key = mappingKey(input.kind, input.sport, input.source, input.sourceId);
      const now = new Date();
      for (const existing of state.mappings.values()) {
        if (mappingKey(existing.kind, existing.sport, existing.source, existing.sourceId) !== key) continue;
        const updated: Mapping = {
          ...existing,
          canonicalId: input.canonicalId,
          confidence: input.confidence,
          method: input.method,
          status: input.status,
          sourceRecordId: input.sourceRecordId ?? existing.sourceRecordId,
          updatedAt: now,
        };
        state.mappings.set(existing.id, updated);
        return copy(updated);
      }
      const created: Mapping = { ...input, id: nextId(state, "mappings"), createdAt: now, updatedAt: now };
      state.mappings.set(created.id, created);
      return copy(created);
    });
  }

  async listMappingsBelow(kind: RecordKind, confidence: number, limit: number): Promise<Mapping[]> {
    return [...this.state().mappings.values()]
      .filter((m) => m.kind === kind && m.status === "matched" && m.confidence < confidence)
      .sort((a, b) => a.confidence - b.confidence || a.id - b.id)
      .slice(0, limit)
      .map(copy);
  }

  repointMappings(kind: RecordKind, fromId: number, toId: number): Promise<number> {
    return this.write((state) => {
      assertCanonicalExists(state, kind, toId);
      let count = 0;
      for (const mapping of state.mappings.values()) {
        if (mapping.kind === kind && mapping.canonicalId === fromId) {
          mapping.canonicalId = toId;
          mapping.updatedAt = new Date();
          count++;
        }
      }
      return count;
    });
  }

  // --------------------------------------------------------------------------
  // Aliases
  // --------------------------------------------------------------------------

  async findAlias(aliasName: string, aliasSource: SourceName): Promise<PlayerAlias | null> {
    for (const alias of this.state().aliases.values()) {
      if (alias.aliasName === aliasName && alias.aliasSource === aliasSource) return copy(alias);
    }
    return null;
  }

  insertAlias(input: NewPlayerAlias): Promise<PlayerAlias> {
    return this.write((state) => {
      assertCanonicalExists(state, "player", input.canonicalId);
      for (const alias of state.aliases.values()) {
        if (alias.aliasName === input.aliasName && alias.aliasSource === input.aliasSource) {
          throw new ConflictError("player_aliases_alias_unique");
        }
      }
      const alias: PlayerAlias = { ...input, id: nextId(state, "aliases"), createdAt: new Date() };
      state.aliases.set(alias.id, alias);
      return copy(alias);
    });
  }

  repointAliases(fromId: number, toId: number): Promise<number> {
    return this.write((state) => {
      assertCanonicalExists(state, "player", toId);
      let count = 0;
      for (const alias of state.aliases.values()) {
        if (alias.canonicalId === fromId) {
          alias.canonicalId = toId;
          count++;
        }
      }
      return count;
    });
  }

  // --------------------------------------------------------------------------
  // Review queue
  // --------------------------------------------------------------------------

  insertReviewItem(input: NewReviewItem): Promise<ReviewQueueItem> {
    return this.write((state) => {
      for (const item of state.reviewItems.values()) {
        if (
          item.status === "pending" &&
          item.kind === input.kind &&
          item.sport === input.sport &&
          item.source === input.source &&
          item.sourceId === input.sourceId
        ) {
          throw new ConflictError("review_queue_pending_unique");
        }
      }
      const item: ReviewQueueItem = {
        ...copy(input),
        id: nextId(state, "reviewItems"),
        status: "pending",
        resolvedBy: null,
        resolvedCanonicalId: null,
        resolvedAt: null,
        createdAt: new Date(),
      };
      state.reviewItems.set(item.id, item);
      return copy(item);
    });
  }

  async getReviewItem(id: number): Promise<ReviewQueueItem | null> {
    const item = this.state().reviewItems.get(id);
    return item ? copy(item) : null;
  }

  async findPendingReviewItem(kind: RecordKind, sport: Sport, source: SourceName, sourceId: string): Promise<ReviewQueueItem | null> {
    for (const item of this.state().reviewItems.values()) {
      if (item.status === "pending" && item.kind === kind && item.sport === sport && item.source === source && item.sourceId === sourceId) {
        return copy(item);
      }
    }
    return null;
  }

  async listReviewItems(status: ReviewStatus, limit: number): Promise<ReviewQueueItem[]> {
    return [...this.state().reviewItems.values()]
      .filter((item) => item.status === status)
      .sort((a, b) => a.id - b.id)
      .slice(0, limit)
      .map(copy);
  }

  async countReviewItems(status: ReviewStatus): Promise<number> {
    let count = 0;
    for (const item of this.state().reviewItems.values()) {
      if (item.status === status) count++;
    }
    return count;
  }

  resolveReviewItem(id: number, resolution: ReviewResolution): Promise<ReviewQueueItem | null> {
    return this.write((state) => {
      const item = state.reviewItems.get(id);
      if (!item || item.status !== "pending") return null;
      const updated: ReviewQueueItem = { ...item, ...resolution };
      state.reviewItems.set(id, updated);
      return copy(updated);
    });
  }

  repointReviewItems(kind: RecordKind, fromId: number, toId: number): Promise<number> {
    return this.write((state) => {
      let count = 0;
      for (const item of state.reviewItems.values()) {
        if (item.kind !== kind) continue;
        let touched = false;
        if (item.resolvedCanonicalId === fromId) {
          item.resolvedCanonicalId = toId;
          touched = true;
        }
        for (const candidate of item.candidates) {
          if (candidate.canonicalId === fromId) {
            candidate.canonicalId = toId;
            touched = true;
          }
        }
        if (touched) count++;
      }
      return count;
    });
  }

  // --------------------------------------------------------------------------
  // Audit
  // --------------------------------------------------------------------------

  appendAudit(entry: NewAuditEntry): Promise<AuditLogEntry> {
    return this.write((state) => {
      const row: AuditLogEntry = {
        id: nextId(state, "audit"),
        entityType: entry.entityType,
        entityId: entry.entityId,
        action: entry.action,
        previousState: copy(entry.previousState ?? null),
        newState: copy(entry.newState ?? null),
        matchDetails: copy(entry.matchDetails ?? null),
        performedBy: entry.performedBy ?? "system",
        createdAt: new Date(),
      };
      state.audit.push(row);
      return copy(row);
    });
  }

  async listAudit(query: AuditQuery = {}): Promise<AuditLogEntry[]> {
    return this.state()
      .audit.filter(
        (e) =>
          (query.entityType === undefined || e.entityType === query.entityType) &&
          (query.entityId === undefined || e.entityId === query.entityId) &&
          (query.action === undefined || e.action === query.action),
      )
      .slice(0, query.limit ?? Number.POSITIVE_INFINITY)
      .map(copy);
  }

  // --------------------------------------------------------------------------
  // Sync metadata
  // --------------------------------------------------------------------------

  async getSyncMetadata(source: SourceName, dataType: SyncDataType): Promise<SyncMetadata | null> {
    const row = this.state().syncMetadata.get(`${source}:${dataType}`);
    return row ? copy(row) : null;
  }

  upsertSyncMetadata(source: SourceName, dataType: SyncDataType, update: SyncMetadataUpdate): Promise<SyncMetadata> {
    return this.write((state) => {
      const key = `${source}:${dataType}`;
      const existing: SyncMetadata = state.syncMetadata.get(key) ?? {
        source,
        dataType,
        state: "idle",
        lastStatus: null,
        recordsProcessed: 0,
        recordsMatched: 0,
        recordsQueued: 0,
        recordsFailed: 0,
        durationMs: null,
        errorMessage: null,
        lastStartedAt: null,
        lastCompletedAt: null,
        updatedAt: new Date(),
      };
      const row: SyncMetadata = { ...existing, ...update, source, dataType, updatedAt: new Date() };
      state.syncMetadata.set(key, row);
      return copy(row);
    });
  }

  async listSyncMetadata(): Promise<SyncMetadata[]> {
    return [...this.state().syncMetadata.values()]
      .sort((a, b) => a.source.localeCompare(b.source) || a.dataType.localeCompare(b.dataType))
      .map(copy);
  }

  // --------------------------------------------------------------------------
  // Teams
  // --------------------------------------------------------------------------

  async listTeamMappings(sport?: Sport): Promise<TeamDefinition[]> {
    return [...this.state().teams.values()]
      .filter((t) => sport === undefined || t.sport === sport)
      .map(copy);
  }

  upsertTeamMapping(team: TeamDefinition): Promise<void> {
    return this.write((state) => {
      state.teams.set(`${team.sport}:${team.teamCode}`, copy(team));
    });
  }

  // --------------------------------------------------------------------------
  // Consumer-owned references
  // --------------------------------------------------------------------------

  async countReferences(kind: RecordKind, id: number): Promise<ReferenceCounts> {
    const state = this.state();
    const refersTo = (row: { gameId: number; playerId: number | null }) =>
      kind === "game" ? row.gameId === id : row.playerId === id;
    return {
      predictions: [...state.predictions.values()].filter(refersTo).length,
      stats: [...state.stats.values()].filter(refersTo).length,
    };
  }

  repointReferences(kind: RecordKind, fromId: number, toId: number): Promise<ReferenceCounts> {
    return this.write((state) => {
      assertCanonicalExists(state, kind, toId);
      const counts: ReferenceCounts = { predictions: 0, stats: 0 };
      for (const row of state.predictions.values()) {
        if (kind === "game" && row.gameId === fromId) {
          row.gameId = toId;
          counts.predictions++;
        } else if (kind === "player" && row.playerId === fromId) {
          row.playerId = toId;
          counts.predictions++;
        }
      }
      for (const row of state.stats.values()) {
        if (kind === "game" && row.gameId === fromId) {
          row.gameId = toId;
          counts.stats++;
        } else if (kind === "player" && row.playerId === fromId) {
          row.playerId = toId;
          counts.stats++;
        }
      }
      return counts;
    });
  }
}

function assertGameUnique(state: MemoryState, game: CanonicalGame): void {
  for (const other of state.games.values()) {
    if (other.id === game.id || other.sport !== game.sport) continue;
    if (other.gameDate === game.gameDate && other.homeTeam === game.homeTeam && other.awayTeam === game.awayTeam) {
      throw new ConflictError("canonical_games_natural_key");
    }
    if (game.sourceIds.stats_api !== null && other.sourceIds.stats_api === game.sourceIds.stats_api) {
      throw new ConflictError("canonical_games_stats_api_unique");
    }
    if (game.sourceIds.odds_api !== null && other.sourceIds.odds_api === game.sourceIds.odds_api) {
      throw new ConflictError("canonical_games_odds_api_unique");
    }
    if (game.sourceIds.injury_news !== null && other.sourceIds.injury_news === game.sourceIds.injury_news) {
      throw new ConflictError("canonical_games_news_source_unique");
    }
  }
}

function assertPlayerUnique(state: MemoryState, player: CanonicalPlayer): void {
  for (const other of state.players.values()) {
    if (other.id === player.id || other.sport !== player.sport) continue;
    if (player.sourceIds.stats_api !== null && other.sourceIds.stats_api === player.sourceIds.stats_api) {
      throw new ConflictError("canonical_players_stats_api_unique");
    }
    if (player.sourceIds.odds_api !== null && other.sourceIds.odds_api === player.sourceIds.odds_api) {
      throw new ConflictError("canonical_players_odds_api_unique");
    }
    if (player.sourceIds.injury_news !== null && other.sourceIds.injury_news === player.sourceIds.injury_news) {
      throw new ConflictError("canonical_players_news_source_unique");
    }
  }
}

function assertCanonicalExists(state: MemoryState, kind: RecordKind, id: number | null): void {
  if (id === null) return;
  const exists = kind === "game" ? state.games.has(id) : state.players.has(id);
  if (!exists) throw new ForeignKeyError(`${kind}_mappings_canonicalId_fk`);
}

class MemoryTransaction extends MemoryOps {
  constructor(private readonly draft: MemoryState) {
    super();
  }

  protected state(): MemoryState {
    return this.draft;
  }

  protected async write<T>(fn: (state: MemoryState) => T): Promise<T> {
    return fn(this.draft);
  }
}

/**
 * In-process IdentityStore with the same unique constraints as the
 * Postgres schema. Transactions are serialized and work on a copy of the
 * state that only replaces the committed state when the callback resolves.
 */
export class MemoryIdentityStore extends MemoryOps implements IdentityStore {
  private committed: MemoryState = createState();
  private queue: Promise<unknown> = Promise.resolve();

  protected state(): MemoryState {
    return this.committed;
  }

  protected write<T>(fn: (state: MemoryState) => T): Promise<T> {
    return this.exclusive(async () => fn(this.committed));
  }

  transaction<T>(fn: (tx: IdentityStoreOps) => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      const draft = structuredClone(this.committed);
      const result = await fn(new MemoryTransaction(draft));
      this.committed = draft;
      return result;
    });
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.queue.then(() => fn());
    this.queue = run.catch(() => undefined);
    return run;
  }

  // Test helpers for consumer-owned rows

  seedPrediction(input: { gameId: number; playerId?: number | null; market: string }): Promise<MemoryPrediction> {
    return this.write((state) => {
      assertCanonicalExists(state, "game", input.gameId);
      assertCanonicalExists(state, "player", input.playerId ?? null);
      const row: MemoryPrediction = {
        id: nextId(state, "predictions"),
        gameId: input.gameId,
        playerId: input.playerId ?? null,
        market: input.market,
      };
      state.predictions.set(row.id, row);
      return copy(row);
    });
  }

  seedPlayerStat(input: { gameId: number; playerId: number; statistics: Record<string, number> }): Promise<MemoryPlayerStat> {
    return this.write((state) => {
      assertCanonicalExists(state, "game", input.gameId);
      assertCanonicalExists(state, "player", input.playerId);
      const row: MemoryPlayerStat = { id: nextId(state, "stats"), ...input };
      state.stats.set(row.id, row);
      return copy(row);
    });
  }

  listSourceRecords(): StoredSourceRecord[] {
    return [...this.committed.sourceRecords.values()].map(copy);
  }

  listPredictions(): MemoryPrediction[] {
    return [...this.committed.predictions.values()].map(copy);
  }

  listPlayerStats(): MemoryPlayerStat[] {
    return [...this.committed.stats.values()].map(copy);
  }
}
