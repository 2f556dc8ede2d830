import "dotenv/config";
import { closeDb, getDb } from "../server/db";
import { PostgresIdentityStore } from "../server/store/postgres";
import { loadTeamDefinitions } from "../server/sync/team-registry";

async function main() {
  const db = await getDb();
  if (!db) {
    console.error("Failed to connect to database");
    process.exit(1);
  }

  const store = new PostgresIdentityStore(db);
  const teams = loadTeamDefinitions(process.argv[2] ?? undefined);
  console.log(`Seeding ${teams.length} team mappings...`);

  for (const team of teams) {
    await store.upsertTeamMapping(team);
  }

  console.log("Team mappings seeded.");
  await closeDb();
}

main().catch(console.error);
