/**
 * Scheduler for automated sync execution
 *
 * One cron entry per (source, data type) job plus the reconciliation sweep.
 * Each tick runs independently; a failing job is logged and reported, never thrown.
 */

import cron, { type ScheduledTask } from "node-cron";
import { ENV, isDebug } from "../_core/env";
import { errorMessage } from "../_core/errors";
import type { IdentityService } from "../sync/identity-service";
import { jobKey } from "../sync/orchestrator";
import { getIdentityService } from "./runtime";

export interface ScheduledWorker {
  interval: string;
  description: string;
  run: (service: IdentityService) => Promise<{ success: boolean; error?: string }>;
}

export interface WorkerExecution {
  success: boolean;
  worker: string;
  duration: number;
  result?: { success: boolean; error?: string };
  error?: string;
}

/**
 * Scheduler configuration, keyed by worker name ("stats_api:games", ...,
 * "reconciliation").
 */
export function buildSchedulerConfig(service: IdentityService): Record<string, ScheduledWorker> {
  const config: Record<string, ScheduledWorker> = {};

  for (const job of service.orchestrator.jobs) {
    config[jobKey(job)] = {
      interval: job.schedule,
      description: `Sync ${job.dataType} from ${job.source} (${job.sports.join(", ")})`,
      run: (s) => s.orchestrator.runJob(job),
    };
  }

  config.reconciliation = {
    interval: ENV.RECONCILIATION_CRON,
    description: "Merge residual duplicate games and players",
    run: async (s) => {
      const report = await s.reconciliation.run();
      return { success: report.skipped.length === 0 };
    },
  };

  return config;
}

/**
 * Execute one scheduled worker with timing and error capture.
 */
export async function executeScheduledWorker(
  service: IdentityService,
  config: Record<string, ScheduledWorker>,
  workerName: string,
): Promise<WorkerExecution> {
  const startTime = Date.now();
  console.log(`[scheduler] Executing worker: ${workerName}`);

  try {
    const worker = config[workerName];
    if (!worker) {
      throw new Error(`Unknown worker: ${workerName}`);
    }

    const result = await worker.run(service);
    const duration = Date.now() - startTime;
    console.log(`[scheduler] Worker ${workerName} completed in ${duration}ms:`, { success: result.success, error: result.error });

    return { success: result.success, worker: workerName, duration, result };
  } catch (error) {
    const duration = Date.now() - startTime;
    const errorMsg = errorMessage(error);
    console.error(`[scheduler] Worker ${workerName} failed after ${duration}ms:`, error);
    return { success: false, worker: workerName, duration, error: errorMsg };
  }
}

/**
 * Execute all workers (for manual trigger or initialization)
 */
export async function executeAllWorkers(service: IdentityService, config = buildSchedulerConfig(service)) {
  console.log("[scheduler] Executing all workers...");

  const names = Object.keys(config);
  const results = await Promise.allSettled(names.map((name) => executeScheduledWorker(service, config, name)));

  const summary = {
    total: results.length,
    successful: results.filter((r) => r.status === "fulfilled" && r.value.success).length,
    failed: results.filter((r) => r.status === "rejected" || (r.status === "fulfilled" && !r.value.success)).length,
    results: results.map((r, i) =>
      r.status === "fulfilled" ? r.value : { success: false, worker: names[i], error: errorMessage(r.reason) },
    ),
  };

  console.log("[scheduler] All workers completed:", { total: summary.total, successful: summary.successful, failed: summary.failed });
  return summary;
}

/**
 * Initialize and start the scheduler
 */
export async function startScheduler(service?: IdentityService): Promise<ScheduledTask[]> {
  console.log("[scheduler] Starting scheduler...");
  const resolved = service ?? (await getIdentityService());
  const config = buildSchedulerConfig(resolved);

  const tasks = Object.entries(config).map(([name, worker]) => {
    if (!cron.validate(worker.interval)) {
      throw new Error(`Invalid cron expression for ${name}: ${worker.interval}`);
    }
    console.log(`[scheduler] Scheduling ${name} worker: ${worker.description} (${worker.interval})`);

    return cron.schedule(worker.interval, async () => {
      if (isDebug()) console.log(`[scheduler] Triggering scheduled worker: ${name}`);
      await executeScheduledWorker(resolved, config, name);
    });
  });

  console.log("[scheduler] Scheduler started successfully.");
  return tasks;
}
