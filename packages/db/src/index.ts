import knex, { Knex } from "knex";
import { createRequire } from "node:module";
import path from "node:path";
import { fileURLToPath } from "node:url";
import * as contentGraphSchema from "../migrations/001_content_graph.js";

export { resolveMigrationUrl } from "./migrationTarget.js";

export type DbClient = Knex;

const migrationsDir = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
  "migrations"
);

// Applied in order when building an in-memory database.
const schemaMigrations = [contentGraphSchema];

const requireCjs = createRequire(import.meta.url);

export const createDb = (connectionString: string, options: { poolMax?: number } = {}) =>
  knex({
    client: "pg",
    connection: connectionString,
    pool: { min: 0, max: options.poolMax ?? 10 }
  });

// In-process Postgres emulation for tests. One pooled connection, so transactions
// queue behind each other instead of interleaving on the shared engine.
export const createMemoryDb = async (): Promise<DbClient> => {
  const pgMem: typeof import("pg-mem") = requireCjs("pg-mem");
  const engine = pgMem.newDb();
  const db: DbClient = engine.adapters.createKnex(0, { pool: { min: 1, max: 1 } });
  for (const migration of schemaMigrations) {
    await migration.up(db);
  }
  return db;
};

export const runMigrations = async (db: DbClient) => {
  const [batch, applied]: [number, string[]] = await db.migrate.latest({
    directory: migrationsDir,
    loadExtensions: [".ts", ".js"]
  });
  return { batch, applied };
};

export const rollbackMigrations = async (db: DbClient) => {
  const [batch, reverted]: [number, string[]] = await db.migrate.rollback({
    directory: migrationsDir,
    loadExtensions: [".ts", ".js"]
  });
  return { batch, reverted };
};

export const closeDb = async (db: DbClient) => {
  await db.destroy();
};
