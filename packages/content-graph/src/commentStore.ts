import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { DbClient } from "@threadline/db";
import { ContentGraphError, normalizePage, type Page, type PageQuery } from "@threadline/shared";
import { loadAuthors } from "./authors.js";
import { adjustCommentReplyCount, adjustPostCommentCount } from "./counters.js";
import { createCommentLikeLedger } from "./likeLedger.js";
import { log } from "./log.js";
import { readCount, toComment, type CommentRow } from "./rows.js";
import { assembleReplies, collectSubtree, indexReplies, type ReplyIndex } from "./replyTree.js";
import { runInTransaction, runQuery } from "./transaction.js";
import { ContentSchema, IdSchema, isUuid, parseInput, requireUuid } from "./validation.js";
import {
  MAX_COMMENT_LEVEL,
  type Clock,
  type Comment,
  type CommentDeletion
} from "./types.js";

const CreateCommentSchema = z.object({
  postId: IdSchema,
  authorId: IdSchema,
  content: ContentSchema,
  parentId: IdSchema.nullish()
});

export type CreateCommentInput = z.input<typeof CreateCommentSchema>;

export type PageLimits = {
  defaultPageSize: number;
  maxPageSize: number;
};

export type CommentStore = {
  create: (input: CreateCommentInput) => Promise<string>;
  getById: (commentId: string, viewerId?: string) => Promise<Comment>;
  listComments: (postId: string, query?: PageQuery, viewerId?: string) => Promise<Page<Comment>>;
  delete: (commentId: string) => Promise<CommentDeletion>;
  deleteAllForPost: (postId: string, executor: DbClient) => Promise<CommentDeletion>;
  like: (commentId: string, userId: string) => Promise<void>;
  unlike: (commentId: string, userId: string) => Promise<void>;
};

export const createCommentStore = (deps: {
  db: DbClient;
  clock: Clock;
  limits: PageLimits;
}): CommentStore => {
  const { db, clock, limits } = deps;
  const ledger = createCommentLikeLedger(db, clock);

  const loadReplyIndex = async (postId: string) => {
    const rows = await db<CommentRow>("comments")
      .where({ post_id: postId })
      .andWhere("level", ">", 0)
      .orderBy([
        { column: "created_at", order: "asc" },
        { column: "comment_id", order: "asc" }
      ]);
    return indexReplies(rows);
  };

  // Top-level rows come back with their whole reply tree; liked flags and
  // authors are loaded once for every row involved.
  const hydrate = async (roots: CommentRow[], index: ReplyIndex, viewerId?: string) => {
    const involved = [...roots];
    for (const root of roots) {
      involved.push(...collectSubtree(index, root.comment_id));
    }
    const [liked, authors] = await Promise.all([
      ledger.likedTargets(
        db,
        involved.map((row) => row.comment_id),
        viewerId
      ),
      loadAuthors(
        db,
        involved.map((row) => row.author_id)
      )
    ]);
    const toNode = (row: CommentRow) =>
      toComment(row, {
        liked: liked.has(row.comment_id),
        author: authors.get(row.author_id) ?? null
      });
    return roots.map((root) => ({
      ...toNode(root),
      replies: assembleReplies(index, root.comment_id, toNode)
    }));
  };

  const create = async (input: CreateCommentInput) => {
    const { postId, authorId, content, parentId } = parseInput(CreateCommentSchema, input);
    requireUuid(postId, "post_not_found");
    if (parentId) {
      requireUuid(parentId, "parent_not_found");
    }
    const commentId = randomUUID();
    await runInTransaction(db, "comment.create", async (trx) => {
      const post = await trx("posts").where({ post_id: postId }).first("post_id");
      if (!post) {
        throw new ContentGraphError({ code: "post_not_found" });
      }
      let level = 0;
      if (parentId) {
        const parent = await trx<CommentRow>("comments").where({ comment_id: parentId }).first();
        if (!parent || parent.post_id !== postId) {
          throw new ContentGraphError({ code: "parent_not_found" });
        }
        level = parent.level + 1;
        if (level > MAX_COMMENT_LEVEL) {
          throw new ContentGraphError({
            code: "max_nesting_exceeded",
            details: `parent_level:${parent.level}`
          });
        }
        await adjustCommentReplyCount(trx, parentId, 1);
      }
      const now = clock().toISOString();
      const row: CommentRow = {
        comment_id: commentId,
        post_id: postId,
        author_id: authorId,
        parent_id: parentId ?? null,
        content,
        like_count: 0,
        reply_count: 0,
        level,
        created_at: now,
        updated_at: now
      };
      await trx("comments").insert(row);
      await adjustPostCommentCount(trx, postId, 1);
    });
    return commentId;
  };

  const getById = async (commentId: string, viewerId?: string) =>
    runQuery("comment.get", async () => {
      requireUuid(commentId, "comment_not_found");
      const row = await db<CommentRow>("comments").where({ comment_id: commentId }).first();
      if (!row) {
        throw new ContentGraphError({ code: "comment_not_found" });
      }
      if (row.level > 0) {
        const [liked, authors] = await Promise.all([
          ledger.likedTargets(db, [row.comment_id], viewerId),
          loadAuthors(db, [row.author_id])
        ]);
        return toComment(row, {
          liked: liked.has(row.comment_id),
          author: authors.get(row.author_id) ?? null
        });
      }
      const index = await loadReplyIndex(row.post_id);
      const [comment] = await hydrate([row], index, viewerId);
      return comment;
    });

  // Nested replies are never paginated: every reply under a listed comment is returned.
  const listComments = async (postId: string, query?: PageQuery, viewerId?: string) =>
    runQuery("comment.list", async () => {
      const { page, pageSize, offset } = normalizePage(query, limits);
      if (!isUuid(postId)) {
        return { items: [], total: 0, page, pageSize };
      }
      const topLevel = db<CommentRow>("comments").where({ post_id: postId, level: 0 });
      const [countRow] = await topLevel.clone().count({ total: "*" });
      const roots = await topLevel
        .clone()
        .orderBy([
          { column: "created_at", order: "desc" },
          { column: "comment_id", order: "desc" }
        ])
        .offset(offset)
        .limit(pageSize);
      const index = roots.length ? await loadReplyIndex(postId) : new Map<string, CommentRow[]>();
      return {
        items: await hydrate(roots, index, viewerId),
        total: readCount(countRow),
        page,
        pageSize
      };
    });

  const remove = async (commentId: string) => {
    requireUuid(commentId, "comment_not_found");
    const result = await runInTransaction(db, "comment.delete", async (trx) => {
      const row = await trx<CommentRow>("comments").where({ comment_id: commentId }).first();
      if (!row) {
        throw new ContentGraphError({ code: "comment_not_found" });
      }
      const { post_id: postId, parent_id: parentId } = row;

      // Work list, one query per level below the comment.
      const levels: string[][] = [];
      let frontier = [commentId];
      while (frontier.length && levels.length < MAX_COMMENT_LEVEL) {
        const children: Array<Pick<CommentRow, "comment_id">> = await trx("comments")
          .whereIn("parent_id", frontier)
          .select("comment_id");
        frontier = children.map((child) => child.comment_id);
        if (frontier.length) {
          levels.push(frontier);
        }
      }
      const descendants = levels.flat();

      const removedLikes = await ledger.deleteForTargets(trx, [commentId, ...descendants]);
      for (const ids of [...levels].reverse()) {
        await trx("comments").whereIn("comment_id", ids).del();
      }
      await trx("comments").where({ comment_id: commentId }).del();
      if (parentId) {
        await adjustCommentReplyCount(trx, parentId, -1);
      }
      await adjustPostCommentCount(trx, postId, -(1 + descendants.length));
      return { postId, removedComments: 1 + descendants.length, removedLikes };
    });
    log.info("comment.deleted", {
      commentId,
      postId: result.postId,
      removedComments: result.removedComments,
      removedLikes: result.removedLikes
    });
    return { removedComments: result.removedComments, removedLikes: result.removedLikes };
  };

  // Runs on the caller's transaction; the post row and its comment_count go with it.
  const deleteAllForPost = async (postId: string, executor: DbClient) => {
    const removedLikes = await ledger.deleteForTargets(
      executor,
      executor("comments").select("comment_id").where({ post_id: postId })
    );
    let removedComments = 0;
    for (let level = MAX_COMMENT_LEVEL; level >= 0; level -= 1) {
      removedComments += await executor("comments").where({ post_id: postId, level }).del();
    }
    return { removedComments, removedLikes };
  };

  return {
    create,
    getById,
    listComments,
    delete: remove,
    deleteAllForPost,
    like: ledger.like,
    unlike: ledger.unlike
  };
};
