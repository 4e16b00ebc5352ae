import { closeDb, createMemoryDb, type DbClient } from "@threadline/db";
import { createContentGraph } from "./index.js";
import { readCount, type CommentRow, type PostRow } from "./rows.js";

// Well-formed but never generated.
export const ABSENT_ID = "00000000-0000-4000-8000-000000000000";

// Each call advances one second, so creation order is always strictly increasing.
export const createStepClock = (start = Date.parse("2026-01-01T00:00:00.000Z")) => {
  let tick = 0;
  return () => new Date(start + 1000 * tick++);
};

export const setupGraph = async () => {
  const db = await createMemoryDb();
  const graph = createContentGraph({
    db,
    clock: createStepClock(),
    limits: { defaultPageSize: 10, maxPageSize: 50 }
  });
  return { db, ...graph };
};

export type TestGraph = Awaited<ReturnType<typeof setupGraph>>;

export const withGraph = async (run: (graph: TestGraph) => Promise<void>) => {
  const graph = await setupGraph();
  try {
    await run(graph);
  } finally {
    await closeDb(graph.db);
  }
};

// Every statement matching the pattern fails until the returned release is called.
export const blockStatements = (db: DbClient, pattern: RegExp) => {
  const listener = (query: { sql: string }) => {
    if (pattern.test(query.sql)) {
      throw new Error(`statement_blocked:${pattern.source}`);
    }
  };
  db.on("query", listener);
  return () => {
    db.removeListener("query", listener);
  };
};

export const addProfile = async (db: DbClient, userId: string, nickname: string) => {
  await db("user_profiles").insert({ user_id: userId, nickname, avatar_url: null });
};

export const readPost = async (db: DbClient, postId: string) =>
  db<PostRow>("posts").where({ post_id: postId }).first();

export const readComment = async (db: DbClient, commentId: string) =>
  db<CommentRow>("comments").where({ comment_id: commentId }).first();

export const countRows = async (
  db: DbClient,
  table: string,
  where: Record<string, string | number> = {}
) => {
  const [row] = await db(table).where(where).count({ total: "*" });
  return readCount(row);
};
