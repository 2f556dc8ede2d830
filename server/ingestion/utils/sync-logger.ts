/**
 * Per-run counters for sync jobs.
 *
 * A worker calls startSync() when it begins, bumps the counters as it goes and
 * calls endSync() once, which prints and returns an immutable summary.
 */

export interface SyncContext {
  name: string;
  startedAt: Date;
  recordsProcessed: number;
  recordsMatched: number;
  recordsQueued: number;
  recordsFailed: number;
  errors: string[];
}

export interface SyncLog {
  name: string;
  source: string;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  recordsProcessed: number;
  recordsMatched: number;
  recordsQueued: number;
  recordsFailed: number;
  errors: readonly string[];
}

// Keep the error list readable in logs and sync_metadata
const MAX_ERRORS = 50;

export const syncLogger = {
  startSync(name: string): SyncContext {
    console.log(`[sync-logger] ${name} started`);
    return {
      name,
      startedAt: new Date(),
      recordsProcessed: 0,
      recordsMatched: 0,
      recordsQueued: 0,
      recordsFailed: 0,
      errors: [],
    };
  },

  recordError(context: SyncContext, message: string): void {
    if (context.errors.length < MAX_ERRORS) {
      context.errors.push(message);
    }
  },

  endSync(context: SyncContext, source: string): SyncLog {
    const completedAt = new Date();
    const log: SyncLog = Object.freeze({
      name: context.name,
      source,
      startedAt: context.startedAt,
      completedAt,
      durationMs: completedAt.getTime() - context.startedAt.getTime(),
      recordsProcessed: context.recordsProcessed,
      recordsMatched: context.recordsMatched,
      recordsQueued: context.recordsQueued,
      recordsFailed: context.recordsFailed,
      errors: Object.freeze([...context.errors]),
    });
    console.log(
      `[sync-logger] ${context.name} (${source}) finished in ${log.durationMs}ms: ` +
        `${log.recordsProcessed} processed, ${log.recordsMatched} matched, ` +
        `${log.recordsQueued} queued, ${log.recordsFailed} failed`,
    );
    return log;
  },
};
