import type { Comment, Post, PostImage } from "./types.js";

// Written as ISO text, read back as Date.
export type StoredTimestamp = string | Date;

export type PostRow = {
  post_id: string;
  author_id: string;
  content: string;
  view_count: number;
  like_count: number;
  comment_count: number;
  created_at: StoredTimestamp;
  updated_at: StoredTimestamp;
};

export type PostImageRow = {
  image_id: string;
  post_id: string;
  image_path: string;
  display_order: number;
  created_at: StoredTimestamp;
};

export type CommentRow = {
  comment_id: string;
  post_id: string;
  author_id: string;
  parent_id: string | null;
  content: string;
  like_count: number;
  reply_count: number;
  level: number;
  created_at: StoredTimestamp;
  updated_at: StoredTimestamp;
};

export type UserProfileRow = {
  user_id: string;
  nickname: string;
  avatar_url: string | null;
};

export const toIso = (value: StoredTimestamp) => new Date(value).toISOString();

// Postgres returns bigint aggregates as strings.
export const readCount = (row: unknown) => {
  if (typeof row === "object" && row !== null && "total" in row) {
    const total = Number(row.total);
    return Number.isNaN(total) ? 0 : total;
  }
  return 0;
};

export const toPostImage = (row: PostImageRow): PostImage => ({
  imageId: row.image_id,
  imagePath: row.image_path,
  displayOrder: row.display_order
});

export const toPost = (
  row: PostRow,
  extras: Pick<Post, "images" | "liked" | "author">
): Post => ({
  postId: row.post_id,
  authorId: row.author_id,
  content: row.content,
  viewCount: row.view_count,
  likeCount: row.like_count,
  commentCount: row.comment_count,
  createdAt: toIso(row.created_at),
  updatedAt: toIso(row.updated_at),
  ...extras
});

export const toComment = (row: CommentRow, extras: Pick<Comment, "liked" | "author">): Comment => ({
  commentId: row.comment_id,
  postId: row.post_id,
  authorId: row.author_id,
  parentId: row.parent_id,
  content: row.content,
  likeCount: row.like_count,
  replyCount: row.reply_count,
  level: row.level,
  createdAt: toIso(row.created_at),
  updatedAt: toIso(row.updated_at),
  ...extras
});
