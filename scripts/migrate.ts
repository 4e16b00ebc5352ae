import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  closeDb,
  createDb,
  resolveMigrationUrl,
  rollbackMigrations,
  runMigrations
} from "@threadline/db";

const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");
dotenv.config({ path: path.join(repoRoot, ".env") });

// npm run migrate            apply pending migrations
// npm run migrate -- rollback revert the last batch
const command = process.argv[2] ?? "latest";

const main = async () => {
  if (command !== "latest" && command !== "rollback") {
    throw new Error(`unknown_migration_command:${command}`);
  }
  const db = createDb(resolveMigrationUrl(process.env), { poolMax: 1 });
  try {
    if (command === "rollback") {
      const { batch, reverted } = await rollbackMigrations(db);
      console.log(JSON.stringify({ event: "migrations.rolled_back", batch, reverted }));
    } else {
      const { batch, applied } = await runMigrations(db);
      console.log(JSON.stringify({ event: "migrations.applied", batch, applied }));
    }
  } finally {
    await closeDb(db);
  }
};

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(JSON.stringify({ event: "migrations.failed", error: message }));
  process.exit(1);
});
