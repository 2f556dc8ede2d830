import type { SourceAdapter } from "../ingestion/sources/types";
import type { IdentityStore } from "../store/types";
import { AuditLogger } from "./audit-logger";
import { ConfidenceScorer } from "./confidence-scorer";
import { defaultMatchingConfig, type MatchingConfig } from "./config";
import { GameMatcher } from "./game-matcher";
import { SyncOrchestrator, type SyncJob, type SyncStatus } from "./orchestrator";
import { PlayerResolver } from "./player-resolver";
import { ReconciliationJob } from "./reconciliation";
import { ReviewQueue } from "./review-queue";
import type { TeamMappingRegistry } from "./team-registry";
import type {
  GameSourceRecord,
  PlayerContext,
  PlayerSourceRecord,
  RecordKind,
  ResolutionResult,
  SourceName,
  Sport,
} from "./types";

export interface IdentityServiceOptions {
  store: IdentityStore;
  teams: TeamMappingRegistry;
  config?: MatchingConfig;
  adapters?: Partial<Record<SourceName, SourceAdapter>>;
  jobs?: SyncJob[];
  retry?: { maxAttempts: number; baseDelayMs: number };
  /** Recorded as performedBy on automated audit entries */
  actor?: string;
}

/**
 * Entry point for consumers: resolve records, look up canonical ids, work
 * the review queue and read sync health. Wires every component against
 * one store and one configuration.
 */
export class IdentityService {
  readonly config: MatchingConfig;
  readonly audit: AuditLogger;
  readonly scorer: ConfidenceScorer;
  readonly games: GameMatcher;
  readonly players: PlayerResolver;
  readonly reviewQueue: ReviewQueue;
  readonly orchestrator: SyncOrchestrator;
  readonly reconciliation: ReconciliationJob;

  constructor(private readonly options: IdentityServiceOptions) {
    const { store, teams } = options;
    this.config = options.config ?? defaultMatchingConfig();
    this.audit = new AuditLogger(options.actor);
    this.scorer = new ConfidenceScorer(this.config.scoring);

    const deps = { store, teams, scorer: this.scorer, audit: this.audit, config: this.config };
    this.games = new GameMatcher(deps);
    this.players = new PlayerResolver(deps);
    this.reviewQueue = new ReviewQueue(store, this.audit, { game: this.games, player: this.players });
    this.orchestrator = new SyncOrchestrator({
      store,
      adapters: options.adapters ?? {},
      games: this.games,
      players: this.players,
      config: this.config,
      jobs: options.jobs,
      retry: options.retry,
    });
    this.reconciliation = new ReconciliationJob(store, this.audit, this.config);
  }

  get store(): IdentityStore {
    return this.options.store;
  }

  resolveGame(record: GameSourceRecord): Promise<ResolutionResult> {
    return this.games.resolve(record);
  }

  resolvePlayer(record: PlayerSourceRecord, context?: PlayerContext): Promise<ResolutionResult> {
    return this.players.resolve(record, context);
  }

  /** Canonical id a source id is matched to, or null. */
  async lookupBySourceId(sport: Sport, kind: RecordKind, source: SourceName, sourceId: string): Promise<number | null> {
    const { store } = this.options;
    const mapping = await store.getMapping(kind, sport, source, sourceId);
    if (mapping?.status === "matched" && mapping.canonicalId !== null) return mapping.canonicalId;
    if (mapping) return null;

    const holder =
      kind === "game"
        ? await store.findGameBySourceId(sport, source, sourceId)
        : await store.findPlayerBySourceId(sport, source, sourceId);
    return holder?.id ?? null;
  }

  getSyncStatus(): Promise<SyncStatus> {
    return this.orchestrator.getSyncStatus();
  }
}
