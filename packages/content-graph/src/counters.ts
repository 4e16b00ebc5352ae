import type { DbClient } from "@threadline/db";

// Relative updates only: the store applies the delta, never a value read earlier.

export const adjustPostLikeCount = async (executor: DbClient, postId: string, delta: 1 | -1) =>
  executor("posts").where({ post_id: postId }).increment("like_count", delta);

export const adjustPostCommentCount = async (executor: DbClient, postId: string, delta: number) =>
  executor("posts").where({ post_id: postId }).increment("comment_count", delta);

export const bumpPostViewCount = async (executor: DbClient, postId: string) =>
  executor("posts").where({ post_id: postId }).increment("view_count", 1);

export const adjustCommentLikeCount = async (
  executor: DbClient,
  commentId: string,
  delta: 1 | -1
) => executor("comments").where({ comment_id: commentId }).increment("like_count", delta);

export const adjustCommentReplyCount = async (
  executor: DbClient,
  commentId: string,
  delta: 1 | -1
) => executor("comments").where({ comment_id: commentId }).increment("reply_count", delta);
