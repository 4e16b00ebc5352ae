import { test } from "node:test";
import assert from "node:assert/strict";
import { isContentGraphError } from "@threadline/shared";
import {
  ABSENT_ID,
  addProfile,
  blockStatements,
  countRows,
  readPost,
  withGraph
} from "./testing.js";

test("create stores the post with zero counters and ordered images", async () => {
  await withGraph(async ({ db, posts }) => {
    const postId = await posts.create({
      authorId: "author-1",
      content: "hello",
      images: ["uploads/c.png", "uploads/a.png", "uploads/b.png"]
    });

    const row = await readPost(db, postId);
    assert.equal(row?.view_count, 0);
    assert.equal(row?.like_count, 0);
    assert.equal(row?.comment_count, 0);

    const post = await posts.getById(postId);
    assert.deepEqual(
      post.images.map((image) => [image.imagePath, image.displayOrder]),
      [
        ["uploads/c.png", 0],
        ["uploads/a.png", 1],
        ["uploads/b.png", 2]
      ]
    );
    assert.equal(post.createdAt, "2026-01-01T00:00:00.000Z");
  });
});

test("create rejects blank content and persists nothing", async () => {
  await withGraph(async ({ db, posts }) => {
    await assert.rejects(posts.create({ authorId: "author-1", content: "  " }), (error) =>
      isContentGraphError(error, "invalid_request")
    );
    await assert.rejects(
      posts.create({ authorId: "author-1", content: "ok", images: [""] }),
      (error) => isContentGraphError(error, "invalid_request")
    );
    assert.equal(await countRows(db, "posts"), 0);
    assert.equal(await countRows(db, "post_images"), 0);
  });
});

test("getById hydrates liked flag and author, then counts the view", async () => {
  await withGraph(async ({ db, posts }) => {
    await addProfile(db, "author-1", "Grace");
    const postId = await posts.create({ authorId: "author-1", content: "hello" });
    await posts.like(postId, "viewer");

    const first = await posts.getById(postId, "viewer");
    assert.equal(first.liked, true);
    assert.equal(first.likeCount, 1);
    assert.deepEqual(first.author, { userId: "author-1", nickname: "Grace", avatarUrl: null });
    assert.equal(first.viewCount, 0);

    const second = await posts.getById(postId, "someone-else");
    assert.equal(second.liked, false);
    assert.equal(second.viewCount, 1);

    const anonymous = await posts.getById(postId);
    assert.equal(anonymous.liked, false);
    assert.equal((await readPost(db, postId))?.view_count, 3);

    await assert.rejects(posts.getById("missing"), (error) =>
      isContentGraphError(error, "post_not_found")
    );
  });
});

test("list pages posts newest first and filters by author", async () => {
  await withGraph(async ({ posts }) => {
    const a1 = await posts.create({ authorId: "author-a", content: "a1", images: ["x.png"] });
    const b1 = await posts.create({ authorId: "author-b", content: "b1" });
    const a2 = await posts.create({ authorId: "author-a", content: "a2" });
    await posts.like(a1, "viewer");

    const all = await posts.list({ page: 1, pageSize: 2 }, "viewer");
    assert.equal(all.total, 3);
    assert.deepEqual(
      all.items.map((post) => post.postId),
      [a2, b1]
    );

    const rest = await posts.list({ page: 2, pageSize: 2 }, "viewer");
    assert.deepEqual(
      rest.items.map((post) => post.postId),
      [a1]
    );
    assert.equal(rest.items[0]?.liked, true);
    assert.deepEqual(
      rest.items[0]?.images.map((image) => image.imagePath),
      ["x.png"]
    );

    const byAuthor = await posts.list({ authorId: "author-a" });
    assert.equal(byAuthor.total, 2);
    assert.equal(byAuthor.pageSize, 10);
    assert.deepEqual(
      byAuthor.items.map((post) => post.postId),
      [a2, a1]
    );
  });
});

test("update replaces content and bumps updated_at only", async () => {
  await withGraph(async ({ posts }) => {
    const postId = await posts.create({ authorId: "author-1", content: "draft" });
    await posts.update(postId, "final");

    const post = await posts.getById(postId);
    assert.equal(post.content, "final");
    assert.equal(post.createdAt, "2026-01-01T00:00:00.000Z");
    assert.equal(post.updatedAt, "2026-01-01T00:00:01.000Z");

    await assert.rejects(posts.update("missing", "text"), (error) =>
      isContentGraphError(error, "post_not_found")
    );
  });
});

test("delete cascades images, likes, comments and comment likes", async () => {
  await withGraph(async ({ db, posts, comments }) => {
    const postId = await posts.create({
      authorId: "author-1",
      content: "doomed",
      images: ["one.png", "two.png"]
    });
    const survivor = await posts.create({ authorId: "author-1", content: "stays" });
    await posts.like(postId, "user-1");
    await posts.like(postId, "user-2");
    const root = await comments.create({ postId, authorId: "u", content: "root" });
    const reply = await comments.create({ postId, authorId: "u", content: "reply", parentId: root });
    await comments.create({ postId, authorId: "u", content: "nested", parentId: reply });
    await comments.like(reply, "user-1");
    const kept = await comments.create({ postId: survivor, authorId: "u", content: "kept" });
    await comments.like(kept, "user-1");

    const deletion = await posts.delete(postId);
    assert.deepEqual(deletion, {
      removedImages: 2,
      removedLikes: 2,
      removedComments: 3,
      removedCommentLikes: 1
    });
    assert.equal(await readPost(db, postId), undefined);
    assert.equal(await countRows(db, "post_images"), 0);
    assert.equal(await countRows(db, "post_likes"), 0);
    assert.equal(await countRows(db, "comments"), 1);
    assert.equal(await countRows(db, "comment_likes"), 1);
    assert.equal((await readPost(db, survivor))?.comment_count, 1);

    await assert.rejects(posts.delete(postId), (error) =>
      isContentGraphError(error, "post_not_found")
    );
  });
});

test("a failing post delete leaves every dependent row in place", async () => {
  await withGraph(async ({ db, posts, comments }) => {
    const postId = await posts.create({ authorId: "author-1", content: "post", images: ["a.png"] });
    await posts.like(postId, "user-1");
    const commentId = await comments.create({ postId, authorId: "u", content: "c" });
    await comments.like(commentId, "user-1");
    const release = blockStatements(db, /^delete from "posts" /);

    await assert.rejects(
      posts.delete(postId),
      (error) => isContentGraphError(error, "store_failure") && error.details === "post.delete"
    );
    release();
    assert.equal(await countRows(db, "post_images"), 1);
    assert.equal(await countRows(db, "post_likes"), 1);
    assert.equal(await countRows(db, "comments"), 1);
    assert.equal(await countRows(db, "comment_likes"), 1);
    assert.equal((await readPost(db, postId))?.comment_count, 1);
  });
});

test("a failed view count bump still returns the post", async () => {
  await withGraph(async ({ db, posts }) => {
    await addProfile(db, "author-1", "Grace");
    const postId = await posts.create({ authorId: "author-1", content: "hello", images: ["a.png"] });
    await posts.like(postId, "viewer");
    const release = blockStatements(db, /^update "posts" set "view_count"/);

    const post = await posts.getById(postId, "viewer");
    release();
    assert.equal(post.content, "hello");
    assert.equal(post.liked, true);
    assert.equal(post.viewCount, 0);
    assert.equal(post.author?.nickname, "Grace");
    assert.deepEqual(
      post.images.map((image) => image.imagePath),
      ["a.png"]
    );
    assert.equal((await readPost(db, postId))?.view_count, 0);

    await posts.getById(postId);
    assert.equal((await readPost(db, postId))?.view_count, 1);
  });
});

test("post ids that are malformed or absent report post_not_found", async () => {
  await withGraph(async ({ db, posts }) => {
    for (const postId of ["not-a-uuid", ABSENT_ID]) {
      const notFound = (error: unknown) => isContentGraphError(error, "post_not_found");
      await assert.rejects(posts.getById(postId), notFound);
      await assert.rejects(posts.update(postId, "text"), notFound);
      await assert.rejects(posts.delete(postId), notFound);
      await assert.rejects(posts.like(postId, "user-1"), notFound);
      await assert.rejects(posts.unlike(postId, "user-1"), notFound);
    }
    assert.equal(await countRows(db, "post_likes"), 0);
  });
});
