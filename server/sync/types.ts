import type { NameSuffix } from "../_core/normalizers";

export const SPORTS = ["nba", "nfl", "mlb", "nhl"] as const;
export type Sport = (typeof SPORTS)[number];

export const SOURCES = ["stats_api", "odds_api", "injury_news"] as const;
export type SourceName = (typeof SOURCES)[number];

export type RecordKind = "game" | "player";
export type EntityType = RecordKind;

export type MappingStatus = "pending" | "matched" | "failed" | "manual_review";
export type ConfidenceTier = "AUTO_ACCEPT" | "MANUAL_REVIEW" | "REJECT";

export type MatchMethod =
  | "exact_id"
  | "natural_key"
  | "time_window"
  | "fuzzy_team_name"
  | "alias"
  | "name_team"
  | "fuzzy_name"
  | "created"
  | "manual"
  | "none";

// ============================================================================
// SOURCE RECORDS (validated at the ingest boundary)
// ============================================================================

interface SourceRecordBase {
  source: SourceName;
  sourceId: string;
  sport: Sport;
  /** Provider item as fetched */
  raw?: unknown;
}

export interface GameFields {
  scheduledAt: Date;
  /** Provider's own team identifier or display name */
  homeTeam: string;
  awayTeam: string;
}

export interface PlayerFields {
  name: string;
  team: string | null;
  position: string | null;
}

export interface GameSourceRecord extends SourceRecordBase {
  kind: "game";
  fields: GameFields;
}

export interface PlayerSourceRecord extends SourceRecordBase {
  kind: "player";
  fields: PlayerFields;
}

export type SourceRecord = GameSourceRecord | PlayerSourceRecord;

/** Hints from the surrounding game record when resolving a player. */
export interface PlayerContext {
  team?: string | null;
  position?: string | null;
}

// ============================================================================
// CANONICAL ENTITIES
// ============================================================================

export type SourceIds = Record<SourceName, string | null>;

export interface CanonicalGame {
  id: number;
  sport: Sport;
  scheduledAt: Date;
  gameDate: string;
  homeTeam: string;
  awayTeam: string;
  sourceIds: SourceIds;
  createdAt: Date;
  updatedAt: Date;
}

export interface CanonicalPlayer {
  id: number;
  sport: Sport;
  canonicalName: string;
  normalizedName: string;
  nameSuffix: NameSuffix | null;
  team: string | null;
  position: string | null;
  sourceIds: SourceIds;
  createdAt: Date;
  updatedAt: Date;
}

export interface StoredSourceRecord {
  id: number;
  source: SourceName;
  kind: RecordKind;
  sport: Sport;
  sourceId: string;
  payload: unknown;
  payloadHash: string;
  ingestedAt: Date;
}

export interface Mapping {
  id: number;
  kind: RecordKind;
  sport: Sport;
  source: SourceName;
  sourceId: string;
  canonicalId: number | null;
  confidence: number;
  method: MatchMethod;
  status: MappingStatus;
  sourceRecordId: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface PlayerAlias {
  id: number;
  canonicalId: number;
  aliasName: string;
  aliasSource: SourceName;
  confidence: number;
  isVerified: boolean;
  createdAt: Date;
}

// ============================================================================
// SCORING, REVIEW & AUDIT
// ============================================================================

export interface MatchSignals {
  exactIdMatch?: boolean;
  nameSimilarity?: number;
  teamMatch?: boolean;
  positionMatch?: boolean;
  timeProximity?: number;
}

export interface ScoredCandidate {
  canonicalId: number;
  label: string;
  confidence: number;
  tier: ConfidenceTier;
  signals: MatchSignals;
}

export type ReviewStatus = "pending" | "approved" | "rejected";

export interface ReviewQueueItem {
  id: number;
  kind: RecordKind;
  sport: Sport;
  source: SourceName;
  sourceId: string;
  sourceRecordId: number | null;
  record: SourceRecord;
  candidates: ScoredCandidate[];
  reason: string;
  status: ReviewStatus;
  resolvedBy: string | null;
  resolvedCanonicalId: number | null;
  resolvedAt: Date | null;
  createdAt: Date;
}

export type AuditEntityType = "game" | "player" | "alias" | "review";
export type AuditAction =
  | "created"
  | "updated"
  | "matched"
  | "queued"
  | "approved"
  | "rejected"
  | "merged";

export interface AuditLogEntry {
  id: number;
  entityType: AuditEntityType;
  entityId: string;
  action: AuditAction;
  previousState: unknown;
  newState: unknown;
  matchDetails: unknown;
  performedBy: string;
  createdAt: Date;
}

// ============================================================================
// RESOLUTION RESULTS
// ============================================================================

export interface ResolutionResult {
  canonicalId: number | null;
  confidence: number;
  status: MappingStatus;
  created: boolean;
  method: MatchMethod;
  reviewItemId?: number;
}

// ============================================================================
// SYNC METADATA
// ============================================================================

export type SyncState = "idle" | "syncing" | "matching" | "partial" | "failed";
export type SyncRunStatus = "success" | "partial" | "failed";
export type SyncDataType = "games" | "players";

export interface SyncMetadata {
  source: SourceName;
  dataType: SyncDataType;
  state: SyncState;
  lastStatus: SyncRunStatus | null;
  recordsProcessed: number;
  recordsMatched: number;
  recordsQueued: number;
  recordsFailed: number;
  durationMs: number | null;
  errorMessage: string | null;
  lastStartedAt: Date | null;
  lastCompletedAt: Date | null;
  updatedAt: Date;
}

// ============================================================================
// TEAM REGISTRY
// ============================================================================

export interface TeamDefinition {
  sport: Sport;
  teamCode: string;
  fullName: string;
  city: string;
  /** Identifiers each provider uses for this team (abbreviations, display names) */
  sourceKeys: Partial<Record<SourceName, string[]>>;
  alternateNames: string[];
}
