import { test } from "node:test";
import assert from "node:assert/strict";
import { loadConfig } from "./config.js";

test("loadConfig applies defaults and enables migrations outside production", () => {
  const loaded = loadConfig({});
  assert.equal(loaded.NODE_ENV, "development");
  assert.equal(loaded.AUTO_MIGRATE, true);
  assert.equal(loaded.DB_POOL_MAX, 10);
  assert.equal(loaded.DEFAULT_PAGE_SIZE, 10);
  assert.equal(loaded.MAX_PAGE_SIZE, 50);
  assert.equal(loaded.LOG_LEVEL, "info");
});

test("loadConfig parses numeric settings and falls back on garbage", () => {
  const loaded = loadConfig({ DB_POOL_MAX: "4", DEFAULT_PAGE_SIZE: "abc", MAX_PAGE_SIZE: "20" });
  assert.equal(loaded.DB_POOL_MAX, 4);
  assert.equal(loaded.DEFAULT_PAGE_SIZE, 10);
  assert.equal(loaded.MAX_PAGE_SIZE, 20);
});

test("loadConfig refuses auto migration in production", () => {
  assert.throws(
    () => loadConfig({ NODE_ENV: "production", AUTO_MIGRATE: "true" }),
    /auto_migrate_not_allowed_in_production/
  );
  assert.equal(loadConfig({ NODE_ENV: "production" }).AUTO_MIGRATE, false);
});

test("loadConfig rejects a default page size above the maximum", () => {
  assert.throws(
    () => loadConfig({ DEFAULT_PAGE_SIZE: "30", MAX_PAGE_SIZE: "20" }),
    /default_page_size_exceeds_max_page_size/
  );
});
