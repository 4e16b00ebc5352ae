import type { DbClient } from "@threadline/db";
import { config } from "./config.js";
import { createCommentStore, type CommentStore, type PageLimits } from "./commentStore.js";
import { createPostStore, type PostStore } from "./postStore.js";
import type { Clock } from "./types.js";

export type ContentGraph = {
  posts: PostStore;
  comments: CommentStore;
};

export type ContentGraphOptions = {
  db: DbClient;
  clock?: Clock;
  limits?: Partial<PageLimits>;
};

export const createContentGraph = (options: ContentGraphOptions): ContentGraph => {
  const clock = options.clock ?? (() => new Date());
  const limits: PageLimits = {
    defaultPageSize: options.limits?.defaultPageSize ?? config.DEFAULT_PAGE_SIZE,
    maxPageSize: options.limits?.maxPageSize ?? config.MAX_PAGE_SIZE
  };
  const comments = createCommentStore({ db: options.db, clock, limits });
  const posts = createPostStore({ db: options.db, clock, limits, comments });
  return { posts, comments };
};

export { getDb, isDbReady } from "./db.js";
export { config, loadConfig } from "./config.js";
export type { ContentGraphConfig } from "./config.js";
export type { CommentStore, CreateCommentInput, PageLimits } from "./commentStore.js";
export type {
  CreatePostInput,
  ListPostsQuery,
  PostDeletion,
  PostStore
} from "./postStore.js";
export { MAX_COMMENT_LEVEL } from "./types.js";
export type {
  AuthorInfo,
  Clock,
  Comment,
  CommentDeletion,
  Post,
  PostImage
} from "./types.js";
