import { createDb, runMigrations, DbClient } from "@threadline/db";
import { config } from "./config.js";
import { log } from "./log.js";

let db: DbClient | null = null;
let ready: Promise<DbClient> | null = null;

export const getDb = async () => {
  if (db) {
    return db;
  }
  if (!ready) {
    ready = (async () => {
      const client = createDb(config.DATABASE_URL, { poolMax: config.DB_POOL_MAX });
      if (config.AUTO_MIGRATE) {
        await runMigrations(client);
        log.info("db.migrated");
      }
      db = client;
      return client;
    })();
  }
  return ready;
};

export const isDbReady = () => Boolean(db);
