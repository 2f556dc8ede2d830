import "dotenv/config";
import { SOURCES, SPORTS } from "../server/sync/types";
import { closeDb } from "../server/db";
import { getIdentityService } from "../server/workers/runtime";

/**
 * Usage: tsx scripts/force-resync.ts <source> <game|player> <sourceId> [sport]
 */
async function main() {
  const [source, kind, sourceId, sport = "nba"] = process.argv.slice(2);

  const validSource = SOURCES.find((s) => s === source);
  const validSport = SPORTS.find((s) => s === sport);
  if (!validSource || (kind !== "game" && kind !== "player") || !sourceId || !validSport) {
    console.error("Usage: force-resync <source> <game|player> <sourceId> [sport]");
    console.error(`  sources: ${SOURCES.join(", ")}`);
    process.exit(1);
  }

  const service = await getIdentityService();
  const result = await service.orchestrator.resyncEntity({ source: validSource, kind, sport: validSport, sourceId });
  console.log(JSON.stringify(result, null, 2));
  await closeDb();
}

main().catch((error) => {
  console.error("Resync failed:", error);
  process.exit(1);
});
