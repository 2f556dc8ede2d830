import { differenceInMinutes } from "date-fns";
import { ForeignKeyError, MergeIntegrityError, SyncError, errorMessage } from "../_core/errors";
import type { IdentityStore, IdentityStoreOps, ReferenceCounts } from "../store/types";
import type { AuditLogger } from "./audit-logger";
import type { MatchingConfig } from "./config";
import { gameSnapshot } from "./game-matcher";
import { playerSnapshot } from "./player-resolver";
import { SOURCES, type CanonicalGame, type CanonicalPlayer, type RecordKind, type SourceIds } from "./types";

type Canonical = CanonicalGame | CanonicalPlayer;

export interface MergeRecord {
  kind: RecordKind;
  survivorId: number;
  duplicateId: number;
  references: ReferenceCounts;
  mappings: number;
  aliases: number;
  reviewItems: number;
}

export interface SkippedMerge {
  kind: RecordKind;
  survivorId: number;
  duplicateId: number;
  reason: string;
}

export interface ReconciliationReport {
  gamesScanned: number;
  playersScanned: number;
  duplicateGroups: number;
  merged: MergeRecord[];
  skipped: SkippedMerge[];
  durationMs: number;
}

export interface ReconciliationOptions {
  /** Report the duplicate groups without writing anything */
  dryRun?: boolean;
}

/** Disjoint sets over canonical ids. */
class DuplicateGroups {
  private readonly parent = new Map<number, number>();

  find(id: number): number {
    let root = id;
    while (this.parent.has(root) && this.parent.get(root) !== root) {
      root = this.parent.get(root) ?? root;
    }
    this.parent.set(id, root);
    return root;
  }

  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra !== rb) this.parent.set(Math.max(ra, rb), Math.min(ra, rb));
  }

  groups<T extends { id: number }>(rows: T[]): T[][] {
    const byRoot = new Map<number, T[]>();
    for (const row of rows) {
      const root = this.find(row.id);
      const group = byRoot.get(root) ?? [];
      group.push(row);
      byRoot.set(root, group);
    }
    return [...byRoot.values()].filter((group) => group.length > 1);
  }
}

export function conflictingSourceIds(a: SourceIds, b: SourceIds): string[] {
  return SOURCES.filter((source) => a[source] !== null && b[source] !== null && a[source] !== b[source]);
}

function sharesSourceId(a: SourceIds, b: SourceIds): boolean {
  return SOURCES.some((source) => a[source] !== null && a[source] === b[source]);
}

/** Source ids the survivor lacks and the duplicate can supply. */
function missingSourceIds(survivor: SourceIds, duplicate: SourceIds): Partial<SourceIds> {
  const patch: Partial<SourceIds> = {};
  for (const source of SOURCES) {
    if (survivor[source] === null && duplicate[source] !== null) patch[source] = duplicate[source];
  }
  return patch;
}

/**
 * Periodic sweep for residual duplicates in the canonical store.
 *
 * Games are duplicates when they share sport and team pair and their
 * kickoffs fall within the game tolerance; players when they share sport,
 * team, normalized name and suffix. Either kind is also grouped when two
 * rows carry the same per-source id. Each duplicate is merged into the
 * survivor in its own transaction, so one bad pair never blocks the rest.
 */
export class ReconciliationJob {
  constructor(
    private readonly store: IdentityStore,
    private readonly audit: AuditLogger,
    private readonly config: MatchingConfig,
  ) {}

  async run(options: ReconciliationOptions = {}): Promise<ReconciliationReport> {
    const startTime = Date.now();
    console.log(`[reconciliation] Starting sweep${options.dryRun ? " (dry run)" : ""}...`);

    const games = await this.store.listGames();
    const players = await this.store.listPlayers();
    const gameGroups = this.groupGames(games);
    const playerGroups = this.groupPlayers(players);

    const report: ReconciliationReport = {
      gamesScanned: games.length,
      playersScanned: players.length,
      duplicateGroups: gameGroups.length + playerGroups.length,
      merged: [],
      skipped: [],
      durationMs: 0,
    };

    const work: Array<[RecordKind, Canonical[]]> = [
      ...gameGroups.map((g): [RecordKind, Canonical[]] => ["game", g]),
      ...playerGroups.map((g): [RecordKind, Canonical[]] => ["player", g]),
    ];

    for (const [kind, group] of work) {
      const [survivor, ...duplicates] = this.orderBySurvivorPreference(group);
      for (const duplicate of duplicates) {
        if (options.dryRun) {
          console.log(`[reconciliation] Would merge ${kind} ${duplicate.id} into ${survivor.id}`);
          continue;
        }
        try {
          report.merged.push(await this.merge(kind, survivor.id, duplicate.id));
        } catch (error) {
          if (!(error instanceof SyncError)) throw error;
          console.warn(`[reconciliation] Skipped: ${error.message}`);
          report.skipped.push({ kind, survivorId: survivor.id, duplicateId: duplicate.id, reason: error.message });
        }
      }
    }

    report.durationMs = Date.now() - startTime;
    console.log(
      `[reconciliation] Sweep finished in ${report.durationMs}ms: ${report.duplicateGroups} groups, ` +
        `${report.merged.length} merged, ${report.skipped.length} skipped`,
    );
    return report;
  }

  groupGames(games: CanonicalGame[]): CanonicalGame[][] {
    const sets = new DuplicateGroups();
    const tolerance = this.config.games.timeToleranceMinutes;
    const byMatchup = new Map<string, CanonicalGame[]>();

    for (const game of games) {
      const key = `${game.sport}:${game.homeTeam}:${game.awayTeam}`;
      const bucket = byMatchup.get(key) ?? [];
      bucket.push(game);
      byMatchup.set(key, bucket);
    }

    for (const bucket of byMatchup.values()) {
      bucket.sort((a, b) => a.scheduledAt.getTime() - b.scheduledAt.getTime());
      for (let i = 1; i < bucket.length; i++) {
        const prev = bucket[i - 1];
        const next = bucket[i];
        if (Math.abs(differenceInMinutes(next.scheduledAt, prev.scheduledAt)) <= tolerance) {
          sets.union(prev.id, next.id);
        }
      }
    }

    this.unionSharedSourceIds(sets, games);
    return sets.groups(games);
  }

  groupPlayers(players: CanonicalPlayer[]): CanonicalPlayer[][] {
    const sets = new DuplicateGroups();
    const byIdentity = new Map<string, CanonicalPlayer>();

    for (const player of players) {
      if (player.team === null) continue;
      const key = `${player.sport}:${player.team}:${player.normalizedName}:${player.nameSuffix ?? ""}`;
      const first = byIdentity.get(key);
      if (!first) {
        byIdentity.set(key, player);
      } else if (conflictingSourceIds(first.sourceIds, player.sourceIds).length === 0) {
        sets.union(first.id, player.id);
      }
    }

    this.unionSharedSourceIds(sets, players);
    return sets.groups(players);
  }

  private unionSharedSourceIds(sets: DuplicateGroups, rows: Canonical[]): void {
    for (let i = 0; i < rows.length; i++) {
      for (let j = i + 1; j < rows.length; j++) {
        if (rows[i].sport === rows[j].sport && sharesSourceId(rows[i].sourceIds, rows[j].sourceIds)) {
          sets.union(rows[i].id, rows[j].id);
        }
      }
    }
  }

  private authorityOf(row: Canonical): number {
    return SOURCES.reduce(
      (best, source) => (row.sourceIds[source] !== null ? Math.max(best, this.config.sources[source].authority) : best),
      0,
    );
  }

  /** Survivor first. */
  orderBySurvivorPreference<T extends Canonical>(group: T[]): [T, ...T[]] {
    const earliest = (a: T, b: T) => a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id;
    const compare =
      this.config.reconciliation.survivorStrategy === "authority"
        ? (a: T, b: T) => this.authorityOf(b) - this.authorityOf(a) || earliest(a, b)
        : earliest;
    const [first, ...rest] = [...group].sort(compare);
    return [first, ...rest];
  }

  /** Merge one duplicate into the survivor. All writes commit together or not at all. */
  async merge(kind: RecordKind, survivorId: number, duplicateId: number): Promise<MergeRecord> {
    try {
      const record = await this.store.transaction((tx) =>
        kind === "game" ? this.mergeGames(tx, survivorId, duplicateId) : this.mergePlayers(tx, survivorId, duplicateId),
      );
      console.log(`[reconciliation] Merged ${kind} ${duplicateId} into ${survivorId}`);
      return record;
    } catch (error) {
      if (error instanceof ForeignKeyError) {
        throw new MergeIntegrityError(survivorId, duplicateId, errorMessage(error));
      }
      throw error;
    }
  }

  private async mergeGames(tx: IdentityStoreOps, survivorId: number, duplicateId: number): Promise<MergeRecord> {
    const survivor = await tx.getGame(survivorId);
    const duplicate = await tx.getGame(duplicateId);
    if (!survivor || !duplicate) {
      throw new MergeIntegrityError(survivorId, duplicateId, "one side no longer exists");
    }
    this.assertMergeable(survivor, duplicate);

    const moved = await this.repoint(tx, "game", survivorId, duplicateId);
    await tx.deleteGame(duplicateId);

    const patch = missingSourceIds(survivor.sourceIds, duplicate.sourceIds);
    const merged = Object.keys(patch).length > 0 ? await tx.updateGameSourceIds(survivorId, patch) : survivor;

    await this.audit.record(tx, {
      entityType: "game",
      entityId: String(survivorId),
      action: "merged",
      previousState: { survivor: gameSnapshot(survivor), duplicate: { id: duplicateId, ...gameSnapshot(duplicate) } },
      newState: gameSnapshot(merged),
      matchDetails: { duplicateId, ...moved },
    });
    return { kind: "game", survivorId, duplicateId, ...moved };
  }

  private async mergePlayers(tx: IdentityStoreOps, survivorId: number, duplicateId: number): Promise<MergeRecord> {
    const survivor = await tx.getPlayer(survivorId);
    const duplicate = await tx.getPlayer(duplicateId);
    if (!survivor || !duplicate) {
      throw new MergeIntegrityError(survivorId, duplicateId, "one side no longer exists");
    }
    this.assertMergeable(survivor, duplicate);

    const moved = await this.repoint(tx, "player", survivorId, duplicateId);
    await tx.deletePlayer(duplicateId);

    const patch = missingSourceIds(survivor.sourceIds, duplicate.sourceIds);
    const merged = Object.keys(patch).length > 0 ? await tx.updatePlayerSourceIds(survivorId, patch) : survivor;

    await this.audit.record(tx, {
      entityType: "player",
      entityId: String(survivorId),
      action: "merged",
      previousState: { survivor: playerSnapshot(survivor), duplicate: { id: duplicateId, ...playerSnapshot(duplicate) } },
      newState: playerSnapshot(merged),
      matchDetails: { duplicateId, ...moved },
    });
    return { kind: "player", survivorId, duplicateId, ...moved };
  }

  private assertMergeable(survivor: Canonical, duplicate: Canonical): void {
    const conflicts = conflictingSourceIds(survivor.sourceIds, duplicate.sourceIds);
    if (conflicts.length > 0) {
      throw new MergeIntegrityError(survivor.id, duplicate.id, `conflicting source ids (${conflicts.join(", ")})`);
    }
  }

  private async repoint(
    tx: IdentityStoreOps,
    kind: RecordKind,
    survivorId: number,
    duplicateId: number,
  ): Promise<Omit<MergeRecord, "kind" | "survivorId" | "duplicateId">> {
    const references = await tx.repointReferences(kind, duplicateId, survivorId);
    const mappings = await tx.repointMappings(kind, duplicateId, survivorId);
    const aliases = kind === "player" ? await tx.repointAliases(duplicateId, survivorId) : 0;
    const reviewItems = await tx.repointReviewItems(kind, duplicateId, survivorId);

    const remaining = await tx.countReferences(kind, duplicateId);
    if (remaining.predictions > 0 || remaining.stats > 0) {
      throw new MergeIntegrityError(
        survivorId,
        duplicateId,
        `${remaining.predictions} predictions and ${remaining.stats} stats still reference the duplicate`,
      );
    }
    return { references, mappings, aliases, reviewItems };
  }
}
