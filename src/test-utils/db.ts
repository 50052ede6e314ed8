import pino from "pino";
import { createDatabase } from "../db";
import type { AppDatabase } from "../db";
import { parseConfig } from "../config";
import type { AppConfig } from "../config";
import { feeds, seenArticles } from "../db/schema";
import { createCallerFactory } from "../api/trpc";
import { appRouter } from "../api/router";

/**
 * Creates an in-memory SQLite test database with the schema applied.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  return db;
}

let feedCounter = 0;

/**
 * Seeds a test feed with optional field overrides.
 * Each call gets a distinct URL unless one is given.
 * @returns The ID of the inserted feed.
 */
export function seedTestFeed(
  db: AppDatabase,
  overrides?: Partial<typeof feeds.$inferInsert>,
): number {
  feedCounter++;
  const result = db
    .insert(feeds)
    .values({
      url: `https://feeds.example.com/test-${feedCounter}.xml`,
      community: "technology",
      account: "default",
      ...overrides,
    })
    .returning({ id: feeds.id })
    .get();

  return result.id;
}

/**
 * Seeds a ledger row directly, bypassing the poll cycle.
 */
export function seedSeenArticle(
  db: AppDatabase,
  feedId: number,
  overrides?: Partial<typeof seenArticles.$inferInsert>,
): number {
  const result = db
    .insert(seenArticles)
    .values({
      feedId,
      identityKey: `key-${Math.random()}`,
      disposition: "accepted",
      title: "Seen Article",
      link: "https://example.com/seen",
      firstSeenAt: new Date("2026-01-01T00:00:00Z"),
      ...overrides,
    })
    .returning({ id: seenArticles.id })
    .get();

  return result.id;
}

/**
 * Builds an AppConfig from the schema defaults plus the minimum required
 * fields, so tests pick up the same defaults as production.
 */
export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  const base = parseConfig(
    {
      lemmy: {
        server: "lemmy.example.org",
        accounts: {
          default: { username: "relaybot", passwordEnv: "TEST_LEMMY_PASSWORD" },
        },
      },
    },
    "test config",
  );
  return { ...base, ...overrides };
}

/**
 * Creates a typed tRPC caller for testing router procedures directly.
 */
export function createTestCaller(
  db: AppDatabase,
  configOverrides?: Partial<AppConfig>,
  clock: () => Date = () => new Date(),
) {
  const createCaller = createCallerFactory(appRouter);
  const config = createTestConfig(configOverrides);
  const logger = pino({ level: "silent" });

  return createCaller({ db, config, logger, clock });
}
