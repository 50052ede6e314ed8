import type { Logger } from "pino";
import type { AppDatabase } from "./db";
import type { AppConfig } from "./config";
import { feeds } from "./db/schema";

/**
 * Seeds feeds from configuration into the database on first start.
 *
 * Skipped entirely when the feeds table already has rows, so the database
 * stays the source of truth once feeds are managed through the API.
 *
 * @returns Number of feeds inserted.
 */
export function seedDatabase(
  db: AppDatabase,
  config: AppConfig,
  logger: Logger,
): number {
  const existingFeeds = db.select({ id: feeds.id }).from(feeds).all();

  if (existingFeeds.length > 0) {
    logger.info(
      { existingCount: existingFeeds.length },
      "feeds already exist, skipping seed",
    );
    return 0;
  }

  logger.info({ feedCount: config.feeds.length }, "seeding feeds from config");

  let inserted = 0;
  for (const feed of config.feeds) {
    const result = db
      .insert(feeds)
      .values({
        url: feed.url,
        community: feed.community,
        account: feed.account,
        enabled: feed.enabled,
      })
      .onConflictDoNothing({ target: feeds.url })
      .run();
    inserted += result.changes;
  }

  return inserted;
}
