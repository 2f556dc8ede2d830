import "dotenv/config";
import { closeDb } from "../server/db";
import { executeAllWorkers, startScheduler } from "../server/workers/scheduler";
import { getIdentityService } from "../server/workers/runtime";

async function main() {
  const service = await getIdentityService();

  if (process.argv.includes("--once")) {
    const summary = await executeAllWorkers(service);
    await closeDb();
    process.exit(summary.failed > 0 ? 1 : 0);
  }

  const tasks = await startScheduler(service);

  const shutdown = async () => {
    console.log("[scheduler] Shutting down...");
    for (const task of tasks) task.stop();
    await closeDb();
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((error) => {
  console.error("[scheduler] Fatal error:", error);
  process.exit(1);
});
