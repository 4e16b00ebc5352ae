import { Knex } from "knex";

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable("user_profiles", (table) => {
    table.text("user_id").primary();
    table.text("nickname").notNullable();
    table.text("avatar_url");
    table.timestamp("created_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
    table.timestamp("updated_at", { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable("posts", (table) => {
    table.uuid("post_id").primary();
    table.text("author_id").notNullable();
    table.text("content").notNullable();
    table.integer("view_count").notNullable().defaultTo(0);
    table.integer("like_count").notNullable().defaultTo(0);
    table.integer("comment_count").notNullable().defaultTo(0);
    table.timestamp("created_at", { useTz: true }).notNullable();
    table.timestamp("updated_at", { useTz: true }).notNullable();
    table.index(["author_id"], "posts_author_idx");
    table.index(["created_at"], "posts_created_idx");
  });

  await knex.schema.createTable("post_images", (table) => {
    table.uuid("image_id").primary();
    table.uuid("post_id").notNullable().references("post_id").inTable("posts");
    table.text("image_path").notNullable();
    table.integer("display_order").notNullable().defaultTo(0);
    table.timestamp("created_at", { useTz: true }).notNullable();
    table.index(["post_id", "display_order"], "post_images_post_order_idx");
  });

  await knex.schema.createTable("comments", (table) => {
    table.uuid("comment_id").primary();
    table.uuid("post_id").notNullable().references("post_id").inTable("posts");
    table.text("author_id").notNullable();
    table.uuid("parent_id").references("comment_id").inTable("comments");
    table.text("content").notNullable();
    table.integer("like_count").notNullable().defaultTo(0);
    table.integer("reply_count").notNullable().defaultTo(0);
    table.integer("level").notNullable().defaultTo(0);
    table.timestamp("created_at", { useTz: true }).notNullable();
    table.timestamp("updated_at", { useTz: true }).notNullable();
    table.index(["post_id", "level", "created_at"], "comments_post_level_created_idx");
    table.index(["parent_id"], "comments_parent_idx");
    table.index(["author_id"], "comments_author_idx");
  });

  await knex.schema.createTable("post_likes", (table) => {
    table.uuid("like_id").primary();
    table.uuid("post_id").notNullable().references("post_id").inTable("posts");
    table.text("user_id").notNullable();
    table.timestamp("created_at", { useTz: true }).notNullable();
    table.unique(["post_id", "user_id"], { indexName: "post_likes_post_user_uniq" });
    table.index(["user_id"], "post_likes_user_idx");
  });

  await knex.schema.createTable("comment_likes", (table) => {
    table.uuid("like_id").primary();
    table.uuid("comment_id").notNullable().references("comment_id").inTable("comments");
    table.text("user_id").notNullable();
    table.timestamp("created_at", { useTz: true }).notNullable();
    table.unique(["comment_id", "user_id"], { indexName: "comment_likes_comment_user_uniq" });
    table.index(["user_id"], "comment_likes_user_idx");
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists("comment_likes");
  await knex.schema.dropTableIfExists("post_likes");
  await knex.schema.dropTableIfExists("comments");
  await knex.schema.dropTableIfExists("post_images");
  await knex.schema.dropTableIfExists("posts");
  await knex.schema.dropTableIfExists("user_profiles");
}
