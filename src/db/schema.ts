import { index, integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ---------- Tables ----------

export const categories = sqliteTable("categories", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull().unique(),
  createdAt: integer("created_at", { mode: "timestamp" })
    .notNull()
    .default(sql`(unixepoch())`),
});

export const feeds = sqliteTable(
  "feeds",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    url: text("url").notNull().unique(),
    title: text("title"),
    categoryId: integer("category_id").references(() => categories.id, {
      onDelete: "set null",
    }),
    lastSyncedAt: integer("last_synced_at", { mode: "timestamp" }),
    lastError: text("last_error"),
    createdAt: integer("created_at", { mode: "timestamp" })
      .notNull()
      .default(sql`(unixepoch())`),
  },
  (table) => ({
    categoryIdIdx: index("feeds_category_id_idx").on(table.categoryId),
  }),
);

export const articles = sqliteTable(
  "articles",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    feedId: integer("feed_id")
      .notNull()
      .references(() => feeds.id, { onDelete: "cascade" }),
    canonicalKey: text("canonical_key").notNull(),
    title: text("title").notNull(),
    link: text("link"),
    publishedAt: integer("published_at", { mode: "timestamp" }).notNull(),
    content: text("content").notNull(),
    fullContent: text("full_content"),
    isRead: integer("is_read", { mode: "boolean" }).notNull().default(false),
    isSaved: integer("is_saved", { mode: "boolean" }).notNull().default(false),
    firstSeenAt: integer("first_seen_at", { mode: "timestamp" }).notNull(),
    updatedAt: integer("updated_at", { mode: "timestamp" }),
  },
  (table) => ({
    feedKeyIdx: uniqueIndex("articles_feed_id_canonical_key_idx").on(
      table.feedId,
      table.canonicalKey,
    ),
    isReadIdx: index("articles_is_read_idx").on(table.isRead),
    isSavedIdx: index("articles_is_saved_idx").on(table.isSaved),
    publishedAtIdx: index("articles_published_at_idx").on(table.publishedAt),
  }),
);

export const settings = sqliteTable("settings", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
});

export type Feed = typeof feeds.$inferSelect;
export type Category = typeof categories.$inferSelect;
export type Article = typeof articles.$inferSelect;
