import { sql } from "drizzle-orm";
import {
  pgTable,
  pgEnum,
  serial,
  text,
  timestamp,
  varchar,
  boolean,
  date,
  doublePrecision,
  jsonb,
  integer,
  index,
  unique,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import type { ScoredCandidate, SourceName } from "../server/sync/types";

/**
 * Identity Sync - Database Schema
 *
 * Canonical store for games and players ingested from several providers:
 * - Canonical games/players with one nullable id column per source
 * - Raw source records and the mapping decisions they produced
 * - Team registry, player aliases, review queue
 * - Sync job metadata and the append-only match audit log
 * - Consumer-owned rows (predictions, stats) that reconciliation re-points
 */

// ============================================================================
// ENUMS (must be defined before tables in PostgreSQL)
// ============================================================================

export const sportEnum = pgEnum("sport", ["nba", "nfl", "mlb", "nhl"]);
export const sourceEnum = pgEnum("source", ["stats_api", "odds_api", "injury_news"]);
export const recordKindEnum = pgEnum("record_kind", ["game", "player"]);
export const mappingStatusEnum = pgEnum("mapping_status", ["pending", "matched", "failed", "manual_review"]);
export const reviewStatusEnum = pgEnum("review_status", ["pending", "approved", "rejected"]);
export const syncStateEnum = pgEnum("sync_state", ["idle", "syncing", "matching", "partial", "failed"]);
export const syncStatusEnum = pgEnum("sync_status", ["success", "partial", "failed"]);
export const syncDataTypeEnum = pgEnum("sync_data_type", ["games", "players"]);
export const matchMethodEnum = pgEnum("match_method", [
  "exact_id",
  "natural_key",
  "time_window",
  "fuzzy_team_name",
  "alias",
  "name_team",
  "fuzzy_name",
  "created",
  "manual",
  "none",
]);
export const auditEntityTypeEnum = pgEnum("audit_entity_type", ["game", "player", "alias", "review"]);
export const auditActionEnum = pgEnum("audit_action", ["created", "updated", "matched", "queued", "approved", "rejected", "merged"]);

// ============================================================================
// CANONICAL ENTITIES
// ============================================================================

export const canonicalGames = pgTable("canonical_games", {
  id: serial("id").primaryKey(),
  sport: sportEnum("sport").notNull(),
  scheduledAt: timestamp("scheduledAt", { withTimezone: true }).notNull(),
  gameDate: date("gameDate", { mode: "string" }).notNull(), // natural-key day bucket
  homeTeam: varchar("homeTeam", { length: 10 }).notNull(), // canonical team code
  awayTeam: varchar("awayTeam", { length: 10 }).notNull(),
  statsApiId: varchar("statsApiId", { length: 100 }),
  oddsApiId: varchar("oddsApiId", { length: 100 }),
  newsSourceId: varchar("newsSourceId", { length: 100 }),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
  updatedAt: timestamp("updatedAt").defaultNow().notNull(),
}, (table) => ({
  naturalKey: unique("canonical_games_natural_key").on(table.sport, table.gameDate, table.homeTeam, table.awayTeam),
  statsApiIdx: uniqueIndex("canonical_games_stats_api_unique").on(table.sport, table.statsApiId).where(sql`${table.statsApiId} IS NOT NULL`),
  oddsApiIdx: uniqueIndex("canonical_games_odds_api_unique").on(table.sport, table.oddsApiId).where(sql`${table.oddsApiId} IS NOT NULL`),
  newsSourceIdx: uniqueIndex("canonical_games_news_source_unique").on(table.sport, table.newsSourceId).where(sql`${table.newsSourceId} IS NOT NULL`),
  scheduledIdx: index("canonical_games_scheduled_idx").on(table.sport, table.scheduledAt),
}));

export const canonicalPlayers = pgTable("canonical_players", {
  id: serial("id").primaryKey(),
  sport: sportEnum("sport").notNull(),
  canonicalName: varchar("canonicalName", { length: 255 }).notNull(),
  normalizedName: varchar("normalizedName", { length: 255 }).notNull(),
  nameSuffix: varchar("nameSuffix", { length: 8 }), // jr, sr, ii, iii...
  team: varchar("team", { length: 10 }),
  position: varchar("position", { length: 20 }),
  statsApiId: varchar("statsApiId", { length: 100 }),
  oddsApiId: varchar("oddsApiId", { length: 100 }),
  newsSourceId: varchar("newsSourceId", { length: 100 }),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
  updatedAt: timestamp("updatedAt").defaultNow().notNull(),
}, (table) => ({
  statsApiIdx: uniqueIndex("canonical_players_stats_api_unique").on(table.sport, table.statsApiId).where(sql`${table.statsApiId} IS NOT NULL`),
  oddsApiIdx: uniqueIndex("canonical_players_odds_api_unique").on(table.sport, table.oddsApiId).where(sql`${table.oddsApiId} IS NOT NULL`),
  newsSourceIdx: uniqueIndex("canonical_players_news_source_unique").on(table.sport, table.newsSourceId).where(sql`${table.newsSourceId} IS NOT NULL`),
  nameIdx: index("canonical_players_name_idx").on(table.sport, table.normalizedName),
  teamIdx: index("canonical_players_team_idx").on(table.sport, table.team),
}));

// ============================================================================
// RAW RECORDS & MAPPINGS
// ============================================================================

export const sourceRecords = pgTable("source_records", {
  id: serial("id").primaryKey(),
  source: sourceEnum("source").notNull(),
  kind: recordKindEnum("kind").notNull(),
  sport: sportEnum("sport").notNull(),
  sourceId: varchar("sourceId", { length: 100 }).notNull(),
  payload: jsonb("payload").notNull(), // raw fields as ingested
  payloadHash: varchar("payloadHash", { length: 64 }).notNull(),
  ingestedAt: timestamp("ingestedAt").defaultNow().notNull(),
}, (table) => ({
  payloadIdx: unique("source_records_payload_unique").on(table.source, table.kind, table.sourceId, table.payloadHash),
  sourceIdx: index("source_records_source_idx").on(table.source, table.sourceId),
}));

export const gameMappings = pgTable("game_mappings", {
  id: serial("id").primaryKey(),
  sport: sportEnum("sport").notNull(),
  source: sourceEnum("source").notNull(),
  sourceId: varchar("sourceId", { length: 100 }).notNull(),
  canonicalId: integer("canonicalId").references(() => canonicalGames.id),
  confidence: doublePrecision("confidence").notNull(),
  method: matchMethodEnum("method").notNull(),
  status: mappingStatusEnum("status").default("pending").notNull(),
  sourceRecordId: integer("sourceRecordId").references(() => sourceRecords.id),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
  updatedAt: timestamp("updatedAt").defaultNow().notNull(),
}, (table) => ({
  sourceKey: unique("game_mappings_source_unique").on(table.sport, table.source, table.sourceId),
  canonicalIdx: index("game_mappings_canonical_idx").on(table.canonicalId),
  statusIdx: index("game_mappings_status_idx").on(table.status),
}));

export const playerMappings = pgTable("player_mappings", {
  id: serial("id").primaryKey(),
  sport: sportEnum("sport").notNull(),
  source: sourceEnum("source").notNull(),
  sourceId: varchar("sourceId", { length: 100 }).notNull(),
  canonicalId: integer("canonicalId").references(() => canonicalPlayers.id),
  confidence: doublePrecision("confidence").notNull(),
  method: matchMethodEnum("method").notNull(),
  status: mappingStatusEnum("status").default("pending").notNull(),
  sourceRecordId: integer("sourceRecordId").references(() => sourceRecords.id),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
  updatedAt: timestamp("updatedAt").defaultNow().notNull(),
}, (table) => ({
  sourceKey: unique("player_mappings_source_unique").on(table.sport, table.source, table.sourceId),
  canonicalIdx: index("player_mappings_canonical_idx").on(table.canonicalId),
  statusIdx: index("player_mappings_status_idx").on(table.status),
}));

export const teamMappings = pgTable("team_mappings", {
  id: serial("id").primaryKey(),
  sport: sportEnum("sport").notNull(),
  teamCode: varchar("teamCode", { length: 10 }).notNull(),
  fullName: varchar("fullName", { length: 100 }).notNull(),
  city: varchar("city", { length: 64 }).notNull(),
  sourceKeys: jsonb("sourceKeys").$type<Partial<Record<SourceName, string[]>>>().notNull(), // { odds_api: ["Los Angeles Lakers"], ... }
  alternateNames: jsonb("alternateNames").$type<string[]>().default([]).notNull(),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
  updatedAt: timestamp("updatedAt").defaultNow().notNull(),
}, (table) => ({
  teamIdx: unique("team_mappings_team_unique").on(table.sport, table.teamCode),
}));

export const playerAliases = pgTable("player_aliases", {
  id: serial("id").primaryKey(),
  canonicalId: integer("canonicalId").notNull().references(() => canonicalPlayers.id),
  aliasName: varchar("aliasName", { length: 255 }).notNull(), // normalized key incl. suffix
  aliasSource: sourceEnum("aliasSource").notNull(),
  confidence: doublePrecision("confidence").notNull(),
  isVerified: boolean("isVerified").default(false).notNull(),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
}, (table) => ({
  aliasIdx: unique("player_aliases_alias_unique").on(table.aliasName, table.aliasSource),
  canonicalIdx: index("player_aliases_canonical_idx").on(table.canonicalId),
}));

// ============================================================================
// REVIEW QUEUE & AUDIT
// ============================================================================

export const reviewQueue = pgTable("review_queue", {
  id: serial("id").primaryKey(),
  kind: recordKindEnum("kind").notNull(),
  sport: sportEnum("sport").notNull(),
  source: sourceEnum("source").notNull(),
  sourceId: varchar("sourceId", { length: 100 }).notNull(),
  sourceRecordId: integer("sourceRecordId").references(() => sourceRecords.id),
  record: jsonb("record").notNull(), // validated source record
  candidates: jsonb("candidates").$type<ScoredCandidate[]>().notNull(),
  reason: varchar("reason", { length: 64 }).notNull(),
  status: reviewStatusEnum("status").default("pending").notNull(),
  resolvedBy: varchar("resolvedBy", { length: 64 }),
  resolvedCanonicalId: integer("resolvedCanonicalId"),
  resolvedAt: timestamp("resolvedAt"),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
}, (table) => ({
  pendingIdx: uniqueIndex("review_queue_pending_unique")
    .on(table.kind, table.sport, table.source, table.sourceId)
    .where(sql`${table.status} = 'pending'`),
  statusIdx: index("review_queue_status_idx").on(table.status, table.createdAt),
}));

export const matchAuditLog = pgTable("match_audit_log", {
  id: serial("id").primaryKey(),
  entityType: auditEntityTypeEnum("entityType").notNull(),
  entityId: varchar("entityId", { length: 64 }).notNull(),
  action: auditActionEnum("action").notNull(),
  previousState: jsonb("previousState"),
  newState: jsonb("newState"),
  matchDetails: jsonb("matchDetails"),
  performedBy: varchar("performedBy", { length: 64 }).default("system").notNull(),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
}, (table) => ({
  entityIdx: index("match_audit_log_entity_idx").on(table.entityType, table.entityId),
  createdIdx: index("match_audit_log_created_idx").on(table.createdAt),
}));

// ============================================================================
// SYNC METADATA
// ============================================================================

export const syncMetadata = pgTable("sync_metadata", {
  id: serial("id").primaryKey(),
  source: sourceEnum("source").notNull(),
  dataType: syncDataTypeEnum("dataType").notNull(),
  state: syncStateEnum("state").default("idle").notNull(),
  lastStatus: syncStatusEnum("lastStatus"),
  recordsProcessed: integer("recordsProcessed").default(0).notNull(),
  recordsMatched: integer("recordsMatched").default(0).notNull(),
  recordsQueued: integer("recordsQueued").default(0).notNull(),
  recordsFailed: integer("recordsFailed").default(0).notNull(),
  durationMs: integer("durationMs"),
  errorMessage: text("errorMessage"),
  lastStartedAt: timestamp("lastStartedAt"),
  lastCompletedAt: timestamp("lastCompletedAt"),
  updatedAt: timestamp("updatedAt").defaultNow().notNull(),
}, (table) => ({
  jobIdx: unique("sync_metadata_job_unique").on(table.source, table.dataType),
}));

// ============================================================================
// CONSUMER-OWNED REFERENCES
// ============================================================================

export const predictions = pgTable("predictions", {
  id: serial("id").primaryKey(),
  gameId: integer("gameId").notNull().references(() => canonicalGames.id, { onDelete: "restrict" }),
  playerId: integer("playerId").references(() => canonicalPlayers.id, { onDelete: "restrict" }),
  market: varchar("market", { length: 64 }).notNull(),
  payload: jsonb("payload"),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
}, (table) => ({
  gameIdx: index("predictions_game_idx").on(table.gameId),
  playerIdx: index("predictions_player_idx").on(table.playerId),
}));

export const playerGameStats = pgTable("player_game_stats", {
  id: serial("id").primaryKey(),
  gameId: integer("gameId").notNull().references(() => canonicalGames.id, { onDelete: "restrict" }),
  playerId: integer("playerId").notNull().references(() => canonicalPlayers.id, { onDelete: "restrict" }),
  statistics: jsonb("statistics").notNull(),
  createdAt: timestamp("createdAt").defaultNow().notNull(),
}, (table) => ({
  gameIdx: index("player_game_stats_game_idx").on(table.gameId),
  playerIdx: index("player_game_stats_player_idx").on(table.playerId),
}));

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type CanonicalGameRow = typeof canonicalGames.$inferSelect;
export type InsertCanonicalGame = typeof canonicalGames.$inferInsert;

export type CanonicalPlayerRow = typeof canonicalPlayers.$inferSelect;
export type InsertCanonicalPlayer = typeof canonicalPlayers.$inferInsert;

export type SourceRecordRow = typeof sourceRecords.$inferSelect;
export type InsertSourceRecord = typeof sourceRecords.$inferInsert;

export type GameMappingRow = typeof gameMappings.$inferSelect;
export type PlayerMappingRow = typeof playerMappings.$inferSelect;

export type TeamMappingRow = typeof teamMappings.$inferSelect;
export type InsertTeamMapping = typeof teamMappings.$inferInsert;

export type PlayerAliasRow = typeof playerAliases.$inferSelect;
export type ReviewQueueRow = typeof reviewQueue.$inferSelect;
export type MatchAuditLogRow = typeof matchAuditLog.$inferSelect;
export type SyncMetadataRow = typeof syncMetadata.$inferSelect;

export type PredictionRow = typeof predictions.$inferSelect;
export type PlayerGameStatRow = typeof playerGameStats.$inferSelect;
