import type {
  AuditEntityType,
  AuditAction,
  AuditLogEntry,
  CanonicalGame,
  CanonicalPlayer,
  Mapping,
  MappingStatus,
  MatchMethod,
  PlayerAlias,
  RecordKind,
  ReviewQueueItem,
  ReviewStatus,
  ScoredCandidate,
  SourceIds,
  SourceName,
  SourceRecord,
  Sport,
  StoredSourceRecord,
  SyncDataType,
  SyncMetadata,
  TeamDefinition,
} from "../sync/types";
import type { NameSuffix } from "../_core/normalizers";

/**
 * Storage contract for the canonical store.
 *
 * Writes that hit a unique constraint reject with ConflictError; callers
 * treat that as "someone else inserted it first" and re-fetch. Anything
 * that must commit together runs inside transaction().
 */

export interface NewCanonicalGame {
  sport: Sport;
  scheduledAt: Date;
  gameDate: string;
  homeTeam: string;
  awayTeam: string;
  sourceIds: Partial<SourceIds>;
}

export interface NewCanonicalPlayer {
  sport: Sport;
  canonicalName: string;
  normalizedName: string;
  nameSuffix: NameSuffix | null;
  team: string | null;
  position: string | null;
  sourceIds: Partial<SourceIds>;
}

export interface MappingInput {
  kind: RecordKind;
  sport: Sport;
  source: SourceName;
  sourceId: string;
  canonicalId: number | null;
  confidence: number;
  method: MatchMethod;
  status: MappingStatus;
  sourceRecordId: number | null;
}

export interface NewPlayerAlias {
  canonicalId: number;
  aliasName: string;
  aliasSource: SourceName;
  confidence: number;
  isVerified: boolean;
}

export interface NewReviewItem {
  kind: RecordKind;
  sport: Sport;
  source: SourceName;
  sourceId: string;
  sourceRecordId: number | null;
  record: SourceRecord;
  candidates: ScoredCandidate[];
  reason: string;
}

export interface ReviewResolution {
  status: Exclude<ReviewStatus, "pending">;
  resolvedBy: string;
  resolvedCanonicalId: number | null;
  resolvedAt: Date;
}

export interface NewAuditEntry {
  entityType: AuditEntityType;
  entityId: string;
  action: AuditAction;
  previousState?: unknown;
  newState?: unknown;
  matchDetails?: unknown;
  performedBy?: string;
}

export interface AuditQuery {
  entityType?: AuditEntityType;
  entityId?: string;
  action?: AuditAction;
  limit?: number;
}

export type SyncMetadataUpdate = Partial<Omit<SyncMetadata, "source" | "dataType" | "updatedAt">>;

export interface ReferenceCounts {
  predictions: number;
  stats: number;
}

export interface IdentityStoreOps {
  // Games
  getGame(id: number): Promise<CanonicalGame | null>;
  findGameBySourceId(sport: Sport, source: SourceName, sourceId: string): Promise<CanonicalGame | null>;
  findGameByNaturalKey(sport: Sport, gameDate: string, homeTeam: string, awayTeam: string): Promise<CanonicalGame | null>;
  findGamesScheduledBetween(sport: Sport, from: Date, to: Date): Promise<CanonicalGame[]>;
  findGamesOnDates(sport: Sport, gameDates: string[]): Promise<CanonicalGame[]>;
  listGames(sport?: Sport): Promise<CanonicalGame[]>;
  insertGame(game: NewCanonicalGame): Promise<CanonicalGame>;
  updateGameSourceIds(id: number, sourceIds: Partial<SourceIds>): Promise<CanonicalGame>;
  deleteGame(id: number): Promise<void>;
  /** Serializes game creation for one matchup until the surrounding transaction ends. */
  lockMatchup(sport: Sport, homeTeam: string, awayTeam: string): Promise<void>;

  // Players
  getPlayer(id: number): Promise<CanonicalPlayer | null>;
  findPlayerBySourceId(sport: Sport, source: SourceName, sourceId: string): Promise<CanonicalPlayer | null>;
  findPlayersByName(sport: Sport, normalizedName: string): Promise<CanonicalPlayer[]>;
  findPlayersByTeam(sport: Sport, team: string): Promise<CanonicalPlayer[]>;
  listPlayers(sport?: Sport): Promise<CanonicalPlayer[]>;
  insertPlayer(player: NewCanonicalPlayer): Promise<CanonicalPlayer>;
  updatePlayerSourceIds(id: number, sourceIds: Partial<SourceIds>): Promise<CanonicalPlayer>;
  deletePlayer(id: number): Promise<void>;

  // Raw records
  saveSourceRecord(record: SourceRecord, payload: unknown, payloadHash: string): Promise<StoredSourceRecord>;

  // Mappings
  getMapping(kind: RecordKind, sport: Sport, source: SourceName, sourceId: string): Promise<Mapping | null>;
  upsertMapping(mapping: MappingInput): Promise<Mapping>;
  listMappingsBelow(kind: RecordKind, confidence: number, limit: number): Promise<Mapping[]>;
  repointMappings(kind: RecordKind, fromId: number, toId: number): Promise<number>;

  // Aliases
  findAlias(aliasName: string, aliasSource: SourceName): Promise<PlayerAlias | null>;
  insertAlias(alias: NewPlayerAlias): Promise<PlayerAlias>;
  repointAliases(fromId: number, toId: number): Promise<number>;

  // Review queue
  insertReviewItem(item: NewReviewItem): Promise<ReviewQueueItem>;
  getReviewItem(id: number): Promise<ReviewQueueItem | null>;
  findPendingReviewItem(kind: RecordKind, sport: Sport, source: SourceName, sourceId: string): Promise<ReviewQueueItem | null>;
  listReviewItems(status: ReviewStatus, limit: number): Promise<ReviewQueueItem[]>;
  countReviewItems(status: ReviewStatus): Promise<number>;
  /** Applies the resolution only while the item is still pending; null when the swap lost. */
  resolveReviewItem(id: number, resolution: ReviewResolution): Promise<ReviewQueueItem | null>;
  repointReviewItems(kind: RecordKind, fromId: number, toId: number): Promise<number>;

  // Audit
  appendAudit(entry: NewAuditEntry): Promise<AuditLogEntry>;
  listAudit(query?: AuditQuery): Promise<AuditLogEntry[]>;

  // Sync metadata
  getSyncMetadata(source: SourceName, dataType: SyncDataType): Promise<SyncMetadata | null>;
  upsertSyncMetadata(source: SourceName, dataType: SyncDataType, update: SyncMetadataUpdate): Promise<SyncMetadata>;
  listSyncMetadata(): Promise<SyncMetadata[]>;

  // Team registry rows
  listTeamMappings(sport?: Sport): Promise<TeamDefinition[]>;
  upsertTeamMapping(team: TeamDefinition): Promise<void>;

  // Consumer-owned references
  countReferences(kind: RecordKind, id: number): Promise<ReferenceCounts>;
  repointReferences(kind: RecordKind, fromId: number, toId: number): Promise<ReferenceCounts>;
}

export interface IdentityStore extends IdentityStoreOps {
  transaction<T>(fn: (tx: IdentityStoreOps) => Promise<T>): Promise<T>;
}

export function sourceIdPatch(source: SourceName, sourceId: string | null): Partial<SourceIds> {
  const patch: Partial<SourceIds> = {};
  patch[source] = sourceId;
  return patch;
}
