import "dotenv/config";
import { closeDb } from "../server/db";
import { getIdentityService } from "../server/workers/runtime";

async function main() {
  const dryRun = process.argv.includes("--dry-run");
  const service = await getIdentityService();
  const report = await service.reconciliation.run({ dryRun });

  console.log("=== Reconciliation report ===");
  console.log(`games scanned:   ${report.gamesScanned}`);
  console.log(`players scanned: ${report.playersScanned}`);
  console.log(`duplicate groups: ${report.duplicateGroups}`);
  for (const merge of report.merged) {
    console.log(
      `merged ${merge.kind} ${merge.duplicateId} -> ${merge.survivorId} ` +
        `(${merge.references.predictions} predictions, ${merge.references.stats} stats, ${merge.mappings} mappings)`,
    );
  }
  for (const skip of report.skipped) {
    console.log(`skipped ${skip.kind} ${skip.duplicateId} -> ${skip.survivorId}: ${skip.reason}`);
  }

  await closeDb();
}

main().catch((error) => {
  console.error("Reconciliation failed:", error);
  process.exit(1);
});
