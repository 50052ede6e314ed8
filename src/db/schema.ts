import { index, integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ---------- Tables ----------

export const feeds = sqliteTable("feeds", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  url: text("url").notNull().unique(),
  community: text("community").notNull(),
  account: text("account").notNull().default("default"),
  enabled: integer("enabled", { mode: "boolean" }).notNull().default(true),
  createdAt: integer("created_at", { mode: "timestamp" })
    .notNull()
    .default(sql`(unixepoch())`),
});

export const pollStates = sqliteTable("poll_states", {
  feedId: integer("feed_id")
    .primaryKey()
    .references(() => feeds.id, { onDelete: "cascade" }),
  intervalMs: integer("interval_ms").notNull(),
  lastPolledAt: integer("last_polled_at", { mode: "timestamp_ms" }),
  lastSuccessAt: integer("last_success_at", { mode: "timestamp_ms" }),
  consecutiveNoChange: integer("consecutive_no_change").notNull().default(0),
  consecutiveErrors: integer("consecutive_errors").notNull().default(0),
  lastError: text("last_error"),
  lastErrorKind: text("last_error_kind", { enum: ["transient", "permanent"] }),
});

export const fetchValidators = sqliteTable("fetch_validators", {
  feedId: integer("feed_id")
    .primaryKey()
    .references(() => feeds.id, { onDelete: "cascade" }),
  etag: text("etag"),
  lastModified: text("last_modified"),
  updatedAt: integer("updated_at", { mode: "timestamp_ms" }).notNull(),
});

export const seenArticles = sqliteTable(
  "seen_articles",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    feedId: integer("feed_id")
      .notNull()
      .references(() => feeds.id, { onDelete: "cascade" }),
    identityKey: text("identity_key").notNull(),
    disposition: text("disposition", { enum: ["accepted", "filtered"] }).notNull(),
    title: text("title"),
    link: text("link"),
    firstSeenAt: integer("first_seen_at", { mode: "timestamp_ms" }).notNull(),
    // Whether the key was in the feed's most recently parsed content.
    listed: integer("listed", { mode: "boolean" }).notNull().default(true),
  },
  (table) => ({
    feedKeyIdx: uniqueIndex("seen_articles_feed_key_idx").on(
      table.feedId,
      table.identityKey,
    ),
    firstSeenIdx: index("seen_articles_first_seen_idx").on(table.firstSeenAt),
  }),
);

export type Feed = typeof feeds.$inferSelect;
export type PollStateRow = typeof pollStates.$inferSelect;
export type SeenArticle = typeof seenArticles.$inferSelect;
