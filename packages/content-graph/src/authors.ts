import type { DbClient } from "@threadline/db";
import type { UserProfileRow } from "./rows.js";
import type { AuthorInfo } from "./types.js";

export const loadAuthors = async (executor: DbClient, userIds: string[]) => {
  const authors = new Map<string, AuthorInfo>();
  const unique = [...new Set(userIds)];
  if (!unique.length) {
    return authors;
  }
  const rows = await executor<UserProfileRow>("user_profiles")
    .whereIn("user_id", unique)
    .select("user_id", "nickname", "avatar_url");
  for (const row of rows) {
    authors.set(row.user_id, {
      userId: row.user_id,
      nickname: row.nickname,
      avatarUrl: row.avatar_url ?? null
    });
  }
  return authors;
};
