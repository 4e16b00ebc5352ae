import { randomUUID } from "node:crypto";
import type { Knex } from "knex";
import type { DbClient } from "@threadline/db";
import { ContentGraphError, type ErrorCode } from "@threadline/shared";
import { adjustCommentLikeCount, adjustPostLikeCount } from "./counters.js";
import { runInTransaction, runQuery } from "./transaction.js";
import type { Clock } from "./types.js";
import { requireUuid } from "./validation.js";

type LedgerKind = {
  name: "post" | "comment";
  table: "post_likes" | "comment_likes";
  targetTable: "posts" | "comments";
  targetColumn: "post_id" | "comment_id";
  notFound: Extract<ErrorCode, "post_not_found" | "comment_not_found">;
  adjustLikeCount: (executor: DbClient, targetId: string, delta: 1 | -1) => Promise<number>;
};

const POST_LEDGER: LedgerKind = {
  name: "post",
  table: "post_likes",
  targetTable: "posts",
  targetColumn: "post_id",
  notFound: "post_not_found",
  adjustLikeCount: adjustPostLikeCount
};

const COMMENT_LEDGER: LedgerKind = {
  name: "comment",
  table: "comment_likes",
  targetTable: "comments",
  targetColumn: "comment_id",
  notFound: "comment_not_found",
  adjustLikeCount: adjustCommentLikeCount
};

export type LikeLedger = {
  like: (targetId: string, userId: string) => Promise<void>;
  unlike: (targetId: string, userId: string) => Promise<void>;
  likedTargets: (
    executor: DbClient,
    targetIds: string[],
    viewerId: string | undefined
  ) => Promise<Set<string>>;
  deleteForTargets: (executor: DbClient, targets: string[] | Knex.QueryBuilder) => Promise<number>;
};

const createLikeLedger = (kind: LedgerKind, db: DbClient, clock: Clock): LikeLedger => {
  const assertTargetExists = async (operation: string, targetId: string) => {
    requireUuid(targetId, kind.notFound);
    const target = await runQuery(operation, () =>
      db(kind.targetTable).where(kind.targetColumn, targetId).first(kind.targetColumn)
    );
    if (!target) {
      throw new ContentGraphError({ code: kind.notFound });
    }
  };

  const like = async (targetId: string, userId: string) => {
    const operation = `${kind.name}.like`;
    await assertTargetExists(operation, targetId);
    await runInTransaction(
      db,
      operation,
      async (trx) => {
        const existing = await trx(kind.table)
          .where(kind.targetColumn, targetId)
          .andWhere("user_id", userId)
          .first("like_id");
        if (existing) {
          throw new ContentGraphError({ code: "already_liked" });
        }
        await trx(kind.table).insert({
          like_id: randomUUID(),
          [kind.targetColumn]: targetId,
          user_id: userId,
          created_at: clock().toISOString()
        });
        await kind.adjustLikeCount(trx, targetId, 1);
      },
      // Two concurrent likes can both pass the check; the unique index rejects the loser.
      { onUniqueViolation: "already_liked" }
    );
  };

  const unlike = async (targetId: string, userId: string) => {
    const operation = `${kind.name}.unlike`;
    await assertTargetExists(operation, targetId);
    await runInTransaction(db, operation, async (trx) => {
      // The delete is the existence check, so two racing unlikes cannot both decrement.
      const removed = await trx(kind.table)
        .where(kind.targetColumn, targetId)
        .andWhere("user_id", userId)
        .del();
      if (removed === 0) {
        throw new ContentGraphError({ code: "not_liked" });
      }
      await kind.adjustLikeCount(trx, targetId, -1);
    });
  };

  const likedTargets = async (
    executor: DbClient,
    targetIds: string[],
    viewerId: string | undefined
  ) => {
    if (!viewerId || !targetIds.length) {
      return new Set<string>();
    }
    const rows: Array<Record<string, unknown>> = await executor(kind.table)
      .whereIn(kind.targetColumn, [...new Set(targetIds)])
      .andWhere("user_id", viewerId)
      .select(kind.targetColumn);
    const liked = new Set<string>();
    for (const row of rows) {
      const targetId = row[kind.targetColumn];
      if (typeof targetId === "string") {
        liked.add(targetId);
      }
    }
    return liked;
  };

  const deleteForTargets = async (executor: DbClient, targets: string[] | Knex.QueryBuilder) => {
    if (!Array.isArray(targets)) {
      return executor(kind.table).whereIn(kind.targetColumn, targets).del();
    }
    if (!targets.length) {
      return 0;
    }
    return executor(kind.table).whereIn(kind.targetColumn, targets).del();
  };

  return { like, unlike, likedTargets, deleteForTargets };
};

export const createPostLikeLedger = (db: DbClient, clock: Clock) =>
  createLikeLedger(POST_LEDGER, db, clock);

export const createCommentLikeLedger = (db: DbClient, clock: Clock) =>
  createLikeLedger(COMMENT_LEDGER, db, clock);
