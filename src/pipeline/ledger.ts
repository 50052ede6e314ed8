import { createHash } from "node:crypto";
import { and, count, eq, inArray, lt } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { seenArticles } from "../db/schema";
import type { FeedEntry } from "./types";

export type SeenDisposition = "accepted" | "filtered";

export type SeenDetails = {
  readonly disposition: SeenDisposition;
  readonly title: string | null;
  readonly link: string | null;
};

function present(value: string | null): value is string {
  return value !== null && value.trim().length > 0;
}

/**
 * Derives the stable identity of a feed entry, in order of preference:
 * 1. the entry's explicit id (RSS guid / Atom id)
 * 2. its link
 * 3. `sha256:` + SHA-256 of title and publish time
 */
export function identityKey(
  entry: Pick<FeedEntry, "guid" | "link" | "title" | "publishedAt">,
): string {
  if (present(entry.guid)) return entry.guid.trim();
  if (present(entry.link)) return entry.link.trim();

  const digest = createHash("sha256")
    .update(`${entry.title ?? ""}\n${entry.publishedAt?.toISOString() ?? ""}`)
    .digest("hex");
  return `sha256:${digest}`;
}

export function isNew(
  db: AppDatabase,
  feedId: number,
  key: string,
): boolean {
  const existing = db
    .select({ id: seenArticles.id })
    .from(seenArticles)
    .where(
      and(eq(seenArticles.feedId, feedId), eq(seenArticles.identityKey, key)),
    )
    .get();

  return existing === undefined;
}

/**
 * Records that an article has been evaluated. Idempotent: marking the same
 * key twice keeps the first record.
 * @returns true if a new record was written.
 */
export function markSeen(
  db: AppDatabase,
  feedId: number,
  key: string,
  seenAt: Date,
  details: SeenDetails,
): boolean {
  const result = db
    .insert(seenArticles)
    .values({
      feedId,
      identityKey: key,
      disposition: details.disposition,
      title: details.title,
      link: details.link,
      firstSeenAt: seenAt,
    })
    .onConflictDoNothing({
      target: [seenArticles.feedId, seenArticles.identityKey],
    })
    .run();

  return result.changes > 0;
}

// Keeps each statement well under SQLite's bound-variable limit.
const LISTED_BATCH_SIZE = 500;

/**
 * Flags exactly the given keys as present in the feed's latest parsed
 * content. The flag is stored with the ledger row, so it survives restarts
 * and feeds that are disabled for a while.
 */
export function markListed(
  db: AppDatabase,
  feedId: number,
  keys: ReadonlySet<string>,
): void {
  const all = [...keys];

  db.transaction((tx) => {
    tx.update(seenArticles)
      .set({ listed: false })
      .where(eq(seenArticles.feedId, feedId))
      .run();

    for (let i = 0; i < all.length; i += LISTED_BATCH_SIZE) {
      tx.update(seenArticles)
        .set({ listed: true })
        .where(
          and(
            eq(seenArticles.feedId, feedId),
            inArray(seenArticles.identityKey, all.slice(i, i + LISTED_BATCH_SIZE)),
          ),
        )
        .run();
    }
  });
}

/**
 * Deletes ledger rows first seen before `before`, except rows still listed
 * in their feed's latest content.
 * @returns Number of rows removed.
 */
export function pruneSeen(db: AppDatabase, before: Date): number {
  const result = db
    .delete(seenArticles)
    .where(
      and(
        lt(seenArticles.firstSeenAt, before),
        eq(seenArticles.listed, false),
      ),
    )
    .run();

  return result.changes;
}

export function countSeen(db: AppDatabase, feedId?: number): number {
  const row = db
    .select({ total: count() })
    .from(seenArticles)
    .where(feedId === undefined ? undefined : eq(seenArticles.feedId, feedId))
    .get();

  return row?.total ?? 0;
}
