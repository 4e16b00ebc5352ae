import type { CommentRow } from "./rows.js";
import { MAX_COMMENT_LEVEL, type Comment } from "./types.js";

export type ReplyIndex = Map<string, CommentRow[]>;

// Rows must arrive oldest first; each child list keeps that order.
export const indexReplies = (rows: CommentRow[]): ReplyIndex => {
  const index: ReplyIndex = new Map();
  for (const row of rows) {
    if (!row.parent_id) continue;
    const siblings = index.get(row.parent_id);
    if (siblings) {
      siblings.push(row);
    } else {
      index.set(row.parent_id, [row]);
    }
  }
  return index;
};

export const collectSubtree = (index: ReplyIndex, rootId: string): CommentRow[] => {
  const collected: CommentRow[] = [];
  let frontier = [rootId];
  for (let depth = 0; depth <= MAX_COMMENT_LEVEL && frontier.length; depth += 1) {
    const next: string[] = [];
    for (const parentId of frontier) {
      for (const child of index.get(parentId) ?? []) {
        collected.push(child);
        next.push(child.comment_id);
      }
    }
    frontier = next;
  }
  return collected;
};

export const assembleReplies = (
  index: ReplyIndex,
  parentId: string,
  toNode: (row: CommentRow) => Comment,
  depth = 1
): Comment[] => {
  if (depth > MAX_COMMENT_LEVEL) {
    return [];
  }
  return (index.get(parentId) ?? []).map((row) => ({
    ...toNode(row),
    replies: assembleReplies(index, row.comment_id, toNode, depth + 1)
  }));
};
