import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { DbClient } from "@threadline/db";
import { ContentGraphError, normalizePage, type Page, type PageQuery } from "@threadline/shared";
import { loadAuthors } from "./authors.js";
import type { CommentStore, PageLimits } from "./commentStore.js";
import { bumpPostViewCount } from "./counters.js";
import { createPostLikeLedger } from "./likeLedger.js";
import { log } from "./log.js";
import { readCount, toPost, toPostImage, type PostImageRow, type PostRow } from "./rows.js";
import { runInTransaction, runQuery } from "./transaction.js";
import type { Clock, Post, PostImage } from "./types.js";
import { ContentSchema, IdSchema, parseInput, requireUuid } from "./validation.js";

const CreatePostSchema = z.object({
  authorId: IdSchema,
  content: ContentSchema,
  images: z.array(z.string().min(1)).default([])
});

export type CreatePostInput = z.input<typeof CreatePostSchema>;

export type ListPostsQuery = PageQuery & {
  authorId?: string;
};

export type PostDeletion = {
  removedImages: number;
  removedLikes: number;
  removedComments: number;
  removedCommentLikes: number;
};

export type PostStore = {
  create: (input: CreatePostInput) => Promise<string>;
  getById: (postId: string, viewerId?: string) => Promise<Post>;
  list: (query?: ListPostsQuery, viewerId?: string) => Promise<Page<Post>>;
  update: (postId: string, content: string) => Promise<void>;
  delete: (postId: string) => Promise<PostDeletion>;
  like: (postId: string, userId: string) => Promise<void>;
  unlike: (postId: string, userId: string) => Promise<void>;
};

export const createPostStore = (deps: {
  db: DbClient;
  clock: Clock;
  limits: PageLimits;
  comments: CommentStore;
}): PostStore => {
  const { db, clock, limits, comments } = deps;
  const ledger = createPostLikeLedger(db, clock);

  const loadImages = async (postIds: string[]): Promise<PostImageRow[]> => {
    if (!postIds.length) {
      return [];
    }
    return db<PostImageRow>("post_images")
      .whereIn("post_id", postIds)
      .orderBy([
        { column: "display_order", order: "asc" },
        { column: "image_id", order: "asc" }
      ]);
  };

  // One query per concern for the whole page, never one per post.
  const hydrate = async (rows: PostRow[], viewerId?: string) => {
    const postIds = rows.map((row) => row.post_id);
    const [imageRows, liked, authors] = await Promise.all([
      loadImages(postIds),
      ledger.likedTargets(db, postIds, viewerId),
      loadAuthors(
        db,
        rows.map((row) => row.author_id)
      )
    ]);
    const images = new Map<string, PostImage[]>();
    for (const imageRow of imageRows) {
      const list = images.get(imageRow.post_id) ?? [];
      list.push(toPostImage(imageRow));
      images.set(imageRow.post_id, list);
    }
    return rows.map((row) =>
      toPost(row, {
        images: images.get(row.post_id) ?? [],
        liked: liked.has(row.post_id),
        author: authors.get(row.author_id) ?? null
      })
    );
  };

  const create = async (input: CreatePostInput) => {
    const { authorId, content, images } = parseInput(CreatePostSchema, input);
    const postId = randomUUID();
    const now = clock().toISOString();
    await runInTransaction(db, "post.create", async (trx) => {
      const row: PostRow = {
        post_id: postId,
        author_id: authorId,
        content,
        view_count: 0,
        like_count: 0,
        comment_count: 0,
        created_at: now,
        updated_at: now
      };
      await trx("posts").insert(row);
      if (images.length) {
        await trx("post_images").insert(
          images.map(
            (imagePath, displayOrder): PostImageRow => ({
              image_id: randomUUID(),
              post_id: postId,
              image_path: imagePath,
              display_order: displayOrder,
              created_at: now
            })
          )
        );
      }
    });
    return postId;
  };

  const getById = async (postId: string, viewerId?: string) => {
    requireUuid(postId, "post_not_found");
    const post = await runQuery("post.get", async () => {
      const row = await db<PostRow>("posts").where({ post_id: postId }).first();
      if (!row) {
        throw new ContentGraphError({ code: "post_not_found" });
      }
      const [hydrated] = await hydrate([row], viewerId);
      return hydrated;
    });
    // Views may be lost under concurrent reads; a failed bump never fails the read.
    try {
      await bumpPostViewCount(db, postId);
    } catch (error) {
      log.warn("post.view_count_failed", { postId, error });
    }
    return post;
  };

  const list = async (query: ListPostsQuery = {}, viewerId?: string) =>
    runQuery("post.list", async () => {
      const { page, pageSize, offset } = normalizePage(query, limits);
      const scoped = db<PostRow>("posts").modify((builder) => {
        if (query.authorId) {
          builder.where({ author_id: query.authorId });
        }
      });
      const [countRow] = await scoped.clone().count({ total: "*" });
      const rows = await scoped
        .clone()
        .orderBy([
          { column: "created_at", order: "desc" },
          { column: "post_id", order: "desc" }
        ])
        .offset(offset)
        .limit(pageSize);
      return {
        items: await hydrate(rows, viewerId),
        total: readCount(countRow),
        page,
        pageSize
      };
    });

  const update = async (postId: string, content: string) => {
    requireUuid(postId, "post_not_found");
    const next = parseInput(ContentSchema, content);
    const updated = await runQuery("post.update", async () =>
      db("posts")
        .where({ post_id: postId })
        .update({ content: next, updated_at: clock().toISOString() })
    );
    if (updated === 0) {
      throw new ContentGraphError({ code: "post_not_found" });
    }
  };

  const remove = async (postId: string) => {
    requireUuid(postId, "post_not_found");
    const result = await runInTransaction(db, "post.delete", async (trx) => {
      const row = await trx("posts").where({ post_id: postId }).first("post_id");
      if (!row) {
        throw new ContentGraphError({ code: "post_not_found" });
      }
      const removedImages = await trx("post_images").where({ post_id: postId }).del();
      const removedLikes = await ledger.deleteForTargets(trx, [postId]);
      const cascade = await comments.deleteAllForPost(postId, trx);
      await trx("posts").where({ post_id: postId }).del();
      return {
        removedImages,
        removedLikes,
        removedComments: cascade.removedComments,
        removedCommentLikes: cascade.removedLikes
      };
    });
    log.info("post.deleted", { postId, ...result });
    return result;
  };

  return {
    create,
    getById,
    list,
    update,
    delete: remove,
    like: ledger.like,
    unlike: ledger.unlike
  };
};
