import { ENV, isDebug } from "../_core/env";
import { JobTimeoutError, ValidationError, errorMessage } from "../_core/errors";
import type { SourceAdapter } from "../ingestion/sources/types";
import { withRetry } from "../ingestion/utils/retry";
import { syncLogger, type SyncContext, type SyncLog } from "../ingestion/utils/sync-logger";
import type { IdentityStore, SyncMetadataUpdate } from "../store/types";
import type { MatchingConfig } from "./config";
import type { GameMatcher } from "./game-matcher";
import type { PlayerResolver } from "./player-resolver";
import { parseSourceRecord, type RawSourceRecord } from "./record-schema";
import { SyncStateMachine, isTerminal } from "./state-machine";
import type {
  Mapping,
  RecordKind,
  ResolutionResult,
  SourceName,
  SourceRecord,
  Sport,
  SyncDataType,
  SyncMetadata,
  SyncState,
} from "./types";

export interface SyncJob {
  source: SourceName;
  dataType: SyncDataType;
  sports: Sport[];
  /** node-cron expression */
  schedule: string;
  timeoutMs: number;
}

export function jobKey(job: Pick<SyncJob, "source" | "dataType">): string {
  return `${job.source}:${job.dataType}`;
}

export function defaultSyncJobs(timeoutMs: number = ENV.SYNC_TIMEOUT_MS): SyncJob[] {
  return [
    { source: "stats_api", dataType: "games", sports: ["nba"], schedule: "*/15 * * * *", timeoutMs },
    { source: "odds_api", dataType: "games", sports: ["nba"], schedule: "*/30 * * * *", timeoutMs },
    { source: "stats_api", dataType: "players", sports: ["nba"], schedule: "0 */6 * * *", timeoutMs },
    { source: "injury_news", dataType: "players", sports: ["nba"], schedule: "0 */2 * * *", timeoutMs },
  ];
}

export interface JobRunResult {
  success: boolean;
  job: string;
  state: SyncState;
  skipped?: boolean;
  log?: SyncLog;
  error?: string;
}

export interface ResyncRequest {
  source: SourceName;
  kind: RecordKind;
  sport: Sport;
  sourceId: string;
}

export type SyncHealth = "healthy" | "degraded" | "unhealthy";

export interface SyncStatus {
  health: SyncHealth;
  jobs: SyncMetadata[];
  pendingReview: number;
  lowConfidenceMappings: Mapping[];
  issues: string[];
  totals: {
    recordsProcessed: number;
    recordsMatched: number;
    recordsQueued: number;
    recordsFailed: number;
  };
}

export interface SyncOrchestratorDeps {
  store: IdentityStore;
  adapters: Partial<Record<SourceName, SourceAdapter>>;
  games: GameMatcher;
  players: PlayerResolver;
  config: MatchingConfig;
  jobs?: SyncJob[];
  retry?: { maxAttempts: number; baseDelayMs: number };
}

/** Rejects with the signal's reason as soon as it aborts, whether or not the work notices. */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

function defaultMetadata(job: Pick<SyncJob, "source" | "dataType">): SyncMetadata {
  return {
    source: job.source,
    dataType: job.dataType,
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
    updatedAt: new Date(0),
  };
}

/**
 * Runs one sync job per (source, data type): fetch through the source
 * adapter, then resolve every record. Jobs are independent; a failing or
 * slow job never blocks another. Each state change is written to
 * sync_metadata as it happens.
 */
export class SyncOrchestrator {
  readonly jobs: SyncJob[];
  private readonly running = new Set<string>();

  constructor(private readonly deps: SyncOrchestratorDeps) {
    this.jobs = deps.jobs ?? defaultSyncJobs();
  }

  isRunning(job: Pick<SyncJob, "source" | "dataType">): boolean {
    return this.running.has(jobKey(job));
  }

  async runJob(job: SyncJob): Promise<JobRunResult> {
    const key = jobKey(job);
    if (this.running.has(key)) {
      console.log(`[sync-orchestrator] ${key} is already running, skipping trigger`);
      return { success: false, job: key, state: "syncing", skipped: true };
    }
    this.running.add(key);

    const context = syncLogger.startSync(key);
    let machine: SyncStateMachine;
    try {
      machine = await this.prepareMachine(job, context);
    } catch (error) {
      this.running.delete(key);
      throw error;
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new JobTimeoutError(key, job.timeoutMs)), job.timeoutMs);

    try {
      await this.persist(job, { lastStartedAt: context.startedAt, errorMessage: null });
      await machine.send("trigger");

      const raw = await this.fetchAll(job, controller.signal);
      await machine.send("fetched");

      for (const record of raw) {
        if (controller.signal.aborted) throw controller.signal.reason;
        await this.processRecord(record, context, controller.signal);
      }

      const outcome = context.recordsFailed > 0 || context.recordsQueued > 0 ? "partial" : "done";
      await machine.send(outcome);
      const log = syncLogger.endSync(context, job.source);
      await this.persist(job, {
        lastStatus: outcome === "partial" ? "partial" : "success",
        durationMs: log.durationMs,
        lastCompletedAt: log.completedAt,
        errorMessage: log.errors.length > 0 ? log.errors.slice(0, 5).join("; ") : null,
      });
      return { success: true, job: key, state: machine.state, log };
    } catch (error) {
      const message = errorMessage(error);
      syncLogger.recordError(context, `Fatal error: ${message}`);
      console.error(`[sync-orchestrator] ${key} failed:`, error);

      if (machine.state === "syncing" || machine.state === "matching") {
        await machine.send("error");
      }
      const log = syncLogger.endSync(context, job.source);
      await this.persist(job, {
        lastStatus: "failed",
        durationMs: log.durationMs,
        lastCompletedAt: log.completedAt,
        errorMessage: message,
      });
      return { success: false, job: key, state: machine.state, log, error: message };
    } finally {
      clearTimeout(timer);
      this.running.delete(key);
    }
  }

  /** Run every configured job concurrently; one job's failure does not affect the others. */
  async runAll(): Promise<JobRunResult[]> {
    const results = await Promise.allSettled(this.jobs.map((job) => this.runJob(job)));
    return results.map((r, i): JobRunResult =>
      r.status === "fulfilled"
        ? r.value
        : { success: false, job: jobKey(this.jobs[i]), state: "failed", error: errorMessage(r.reason) },
    );
  }

  /**
   * Starts from the persisted state. A terminal state from the last run is
   * reset; a run that died mid-flight is failed first, then reset.
   */
  private async prepareMachine(job: SyncJob, context: SyncContext): Promise<SyncStateMachine> {
    const current = await this.deps.store.getSyncMetadata(job.source, job.dataType);
    const machine = new SyncStateMachine(current?.state ?? "idle", async (from, to) => {
      if (isDebug()) {
        console.log(`[sync-orchestrator] ${jobKey(job)}: ${from} -> ${to}`);
      }
      await this.persist(job, {
        state: to,
        recordsProcessed: context.recordsProcessed,
        recordsMatched: context.recordsMatched,
        recordsQueued: context.recordsQueued,
        recordsFailed: context.recordsFailed,
      });
    });

    if (machine.state === "syncing" || machine.state === "matching") {
      console.warn(`[sync-orchestrator] ${jobKey(job)} was left in ${machine.state}, marking failed`);
      await machine.send("error");
    }
    if (isTerminal(machine.state)) {
      await machine.send("reset");
    }
    return machine;
  }

  private persist(job: SyncJob, update: SyncMetadataUpdate): Promise<SyncMetadata> {
    return this.deps.store.upsertSyncMetadata(job.source, job.dataType, update);
  }

  private adapterFor(source: SourceName): SourceAdapter {
    const adapter = this.deps.adapters[source];
    if (!adapter) throw new Error(`No adapter registered for ${source}`);
    return adapter;
  }

  private retrying<T>(label: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const retry = this.deps.retry ?? { maxAttempts: ENV.SYNC_MAX_RETRIES, baseDelayMs: ENV.SYNC_RETRY_BASE_MS };
    return withRetry(fn, { ...retry, signal, label });
  }

  private async fetchAll(job: SyncJob, signal: AbortSignal): Promise<RawSourceRecord[]> {
    const adapter = this.adapterFor(job.source);
    const records: RawSourceRecord[] = [];
    for (const sport of job.sports) {
      const batch = await raceAbort(
        this.retrying(jobKey(job), () => adapter.fetch(job.dataType, { sport, signal }), signal),
        signal,
      );
      records.push(...batch);
    }
    return records;
  }

  private async processRecord(raw: RawSourceRecord, context: SyncContext, signal: AbortSignal): Promise<void> {
    context.recordsProcessed++;
    try {
      const result = await raceAbort(this.resolve(parseSourceRecord(raw)), signal);
      if (result.status === "matched") context.recordsMatched++;
      else if (result.status === "manual_review") context.recordsQueued++;
    } catch (error) {
      if (signal.aborted && error === signal.reason) throw error;
      context.recordsFailed++;
      const label = `${raw.source}/${String(raw.sourceId)}`;
      syncLogger.recordError(context, `${label}: ${errorMessage(error)}`);
      if (!(error instanceof ValidationError)) {
        console.error(`[sync-orchestrator] Error resolving ${label}:`, error);
      }
    }
  }

  private resolve(record: SourceRecord): Promise<ResolutionResult> {
    return record.kind === "game" ? this.deps.games.resolve(record) : this.deps.players.resolve(record);
  }

  /** Validate and resolve one caller-supplied record, outside any scheduled run. */
  resyncRecord(raw: unknown): Promise<ResolutionResult> {
    return this.resolve(parseSourceRecord(raw));
  }

  /** Force-resync one entity: fetch it from its source and run it through the pipeline now. */
  async resyncEntity(request: ResyncRequest): Promise<ResolutionResult> {
    const { source, kind, sport, sourceId } = request;
    const adapter = this.adapterFor(source);
    const raw = await this.retrying(`resync:${source}`, () => adapter.fetchOne(kind, sport, sourceId));
    if (!raw) {
      throw new ValidationError(`${source} has no ${kind} with id ${sourceId}`);
    }
    const result = await this.resyncRecord(raw);
    console.log(`[sync-orchestrator] Resynced ${source}/${sourceId}: ${result.status} -> ${result.canonicalId ?? "none"}`);
    return result;
  }

  async getSyncStatus(): Promise<SyncStatus> {
    const { store, config } = this.deps;
    const stored = new Map((await store.listSyncMetadata()).map((m) => [jobKey(m), m]));
    const jobs = this.jobs.map((job) => stored.get(jobKey(job)) ?? defaultMetadata(job));
    const pendingReview = await store.countReviewItems("pending");
    const lowConfidenceMappings = [
      ...(await store.listMappingsBelow("game", config.scoring.game.thresholds.autoAccept, 50)),
      ...(await store.listMappingsBelow("player", config.scoring.player.thresholds.autoAccept, 50)),
    ];

    const issues: string[] = [];
    for (const job of jobs) {
      if (job.state === "failed" || job.lastStatus === "failed") {
        issues.push(`${jobKey(job)} failed: ${job.errorMessage ?? "unknown error"}`);
      } else if (job.lastStatus === "partial") {
        issues.push(`${jobKey(job)} partial: ${job.recordsFailed} failed, ${job.recordsQueued} queued`);
      }
    }
    if (pendingReview > 0) issues.push(`${pendingReview} items awaiting review`);
    if (lowConfidenceMappings.length > 0) {
      issues.push(`${lowConfidenceMappings.length} matched mappings below auto-accept confidence`);
    }

    const failed = jobs.filter((j) => j.state === "failed" || j.lastStatus === "failed").length;
    const health: SyncHealth = failed > 0 ? "unhealthy" : issues.length > 0 ? "degraded" : "healthy";

    const totals = jobs.reduce(
      (acc, j) => ({
        recordsProcessed: acc.recordsProcessed + j.recordsProcessed,
        recordsMatched: acc.recordsMatched + j.recordsMatched,
        recordsQueued: acc.recordsQueued + j.recordsQueued,
        recordsFailed: acc.recordsFailed + j.recordsFailed,
      }),
      { recordsProcessed: 0, recordsMatched: 0, recordsQueued: 0, recordsFailed: 0 },
    );

    return { health, jobs, pendingReview, lowConfidenceMappings, issues, totals };
  }
}
