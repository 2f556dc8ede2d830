import "dotenv/config";
import { closeDb } from "../server/db";
import { getMatchMethodDescription } from "../server/sync/confidence-scorer";
import { getIdentityService } from "../server/workers/runtime";

/**
 * Usage:
 *   tsx scripts/review-queue.ts list [limit]
 *   tsx scripts/review-queue.ts approve <itemId> [canonicalId] [reviewer]
 *   tsx scripts/review-queue.ts reject <itemId> [reviewer] [note]
 */
async function main() {
  const [command = "list", ...args] = process.argv.slice(2);
  const service = await getIdentityService();
  const queue = service.reviewQueue;

  switch (command) {
    case "list": {
      const items = await queue.listPending(Number(args[0] ?? 50));
      console.log(`=== ${items.length} pending review items ===`);
      for (const item of items) {
        console.log(`\n#${item.id} ${item.kind} ${item.source}/${item.sourceId} (${item.reason})`);
        console.log(`  record: ${JSON.stringify(item.record.fields)}`);
        for (const candidate of item.candidates) {
          console.log(
            `  -> ${candidate.canonicalId} ${candidate.label}: ${candidate.confidence} [${candidate.tier}] ${JSON.stringify(candidate.signals)}`,
          );
        }
      }
      break;
    }
    case "approve": {
      const itemId = Number(args[0]);
      const canonicalId = args[1] ? Number(args[1]) : undefined;
      const item = await queue.approve(itemId, { canonicalId, reviewer: args[2] });
      console.log(`Approved #${item.id} -> ${item.resolvedCanonicalId} (${getMatchMethodDescription("manual", 1)})`);
      break;
    }
    case "reject": {
      const item = await queue.reject(Number(args[0]), { reviewer: args[1], note: args[2] });
      console.log(`Rejected #${item.id}`);
      break;
    }
    default:
      console.error(`Unknown command: ${command}`);
      process.exitCode = 1;
  }

  await closeDb();
}

main().catch((error) => {
  console.error("Review command failed:", error);
  process.exit(1);
});
