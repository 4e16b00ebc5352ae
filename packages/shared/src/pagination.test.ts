import { test } from "node:test";
import assert from "node:assert/strict";
import { normalizePage } from "./pagination.js";

const limits = { defaultPageSize: 10, maxPageSize: 50 };

test("normalizePage applies defaults when nothing is requested", () => {
  assert.deepEqual(normalizePage(undefined, limits), { page: 1, pageSize: 10, offset: 0 });
});

test("normalizePage coerces a page below one to the first page", () => {
  assert.deepEqual(normalizePage({ page: 0, pageSize: 5 }, limits), {
    page: 1,
    pageSize: 5,
    offset: 0
  });
  assert.equal(normalizePage({ page: -3 }, limits).page, 1);
});

test("normalizePage clamps oversized pages and falls back on invalid sizes", () => {
  assert.equal(normalizePage({ pageSize: 500 }, limits).pageSize, 50);
  assert.equal(normalizePage({ pageSize: 0 }, limits).pageSize, 10);
  assert.equal(normalizePage({ pageSize: 2.5 }, limits).pageSize, 10);
});

test("normalizePage computes the row offset", () => {
  assert.deepEqual(normalizePage({ page: 3, pageSize: 20 }, limits), {
    page: 3,
    pageSize: 20,
    offset: 40
  });
});
