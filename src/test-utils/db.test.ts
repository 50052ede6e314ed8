import { describe, it, expect } from "vitest";
import { eq } from "drizzle-orm";
import {
  createTestCaller,
  createTestConfig,
  createTestDatabase,
  seedSeenArticle,
  seedTestFeed,
} from "./db";
import { feeds, seenArticles } from "../db/schema";

describe("Test Database Utilities", () => {
  it("should create an empty in-memory database", () => {
    const db = createTestDatabase();
    expect(db.select().from(feeds).all()).toEqual([]);
  });

  it("should seed feeds with distinct urls", () => {
    const db = createTestDatabase();
    const first = seedTestFeed(db);
    const second = seedTestFeed(db);

    const urls = db.select({ url: feeds.url }).from(feeds).all();
    expect(first).not.toBe(second);
    expect(new Set(urls.map((u) => u.url)).size).toBe(2);
  });

  it("should seed a feed with overrides", () => {
    const db = createTestDatabase();
    const feedId = seedTestFeed(db, {
      url: "https://custom.example.com/rss",
      community: "science",
    });

    const feed = db.select().from(feeds).where(eq(feeds.id, feedId)).get();
    expect(feed?.url).toBe("https://custom.example.com/rss");
    expect(feed?.community).toBe("science");
    expect(feed?.enabled).toBe(true);
  });

  it("should seed ledger rows", () => {
    const db = createTestDatabase();
    const feedId = seedTestFeed(db);
    seedSeenArticle(db, feedId, { identityKey: "k" });

    const row = db.select().from(seenArticles).get();
    expect(row?.identityKey).toBe("k");
    expect(row?.firstSeenAt).toEqual(new Date("2026-01-01T00:00:00Z"));
  });

  it("should build a config with production defaults", () => {
    const config = createTestConfig();
    expect(config.polling.minIntervalMinutes).toBe(5);
    expect(config.dedup.retentionDays).toBe(30);
    expect(config.feeds).toEqual([]);
  });

  it("should create a working tRPC caller", async () => {
    const db = createTestDatabase();
    const caller = createTestCaller(db);

    await expect(caller.feeds.list()).resolves.toEqual([]);
  });
});
