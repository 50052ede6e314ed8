import { eq } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { fetchValidators } from "../db/schema";
import type { FetchValidators } from "./types";

export const NO_VALIDATORS: FetchValidators = { etag: null, lastModified: null };

export function validatorsFor(db: AppDatabase, feedId: number): FetchValidators {
  const row = db
    .select({
      etag: fetchValidators.etag,
      lastModified: fetchValidators.lastModified,
    })
    .from(fetchValidators)
    .where(eq(fetchValidators.feedId, feedId))
    .get();

  return row ?? NO_VALIDATORS;
}

/**
 * Stores the validators returned by a full (non-304) fetch. The stored pair
 * is always replaced, including with nulls when the server stopped sending
 * them; callers must not invoke this for "not modified" responses.
 */
export function recordFetch(
  db: AppDatabase,
  feedId: number,
  validators: FetchValidators,
  now: Date = new Date(),
): void {
  const values = {
    etag: validators.etag,
    lastModified: validators.lastModified,
    updatedAt: now,
  };

  db.insert(fetchValidators)
    .values({ feedId, ...values })
    .onConflictDoUpdate({ target: fetchValidators.feedId, set: values })
    .run();
}
