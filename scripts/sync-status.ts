import "dotenv/config";
import { closeDb } from "../server/db";
import { getMatchMethodDescription } from "../server/sync/confidence-scorer";
import { jobKey } from "../server/sync/orchestrator";
import { getIdentityService } from "../server/workers/runtime";

async function main() {
  const service = await getIdentityService();
  const status = await service.getSyncStatus();

  console.log(`=== Sync status: ${status.health.toUpperCase()} ===`);
  for (const job of status.jobs) {
    console.log(
      `${jobKey(job).padEnd(22)} ${job.state.padEnd(9)} last=${job.lastStatus ?? "-"} ` +
        `processed=${job.recordsProcessed} matched=${job.recordsMatched} queued=${job.recordsQueued} failed=${job.recordsFailed} ` +
        `duration=${job.durationMs ?? "-"}ms`,
    );
  }

  console.log(`\npending review: ${status.pendingReview}`);
  if (status.lowConfidenceMappings.length > 0) {
    console.log("\nLow-confidence mappings:");
    for (const mapping of status.lowConfidenceMappings) {
      console.log(
        `  ${mapping.kind} ${mapping.source}/${mapping.sourceId} -> ${mapping.canonicalId}: ` +
          getMatchMethodDescription(mapping.method, mapping.confidence),
      );
    }
  }
  if (status.issues.length > 0) {
    console.log("\nIssues:");
    for (const issue of status.issues) console.log(`  - ${issue}`);
  }

  await closeDb();
}

main().catch(console.error);
