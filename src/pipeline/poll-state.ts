import { eq } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { pollStates } from "../db/schema";
import type { Feed } from "../db/schema";
import { applyOutcome, initialPollState, isDue } from "./backoff";
import type { BackoffSettings } from "./backoff";
import type { PollOutcome, PollState } from "./types";

/**
 * Loads a feed's scheduling state, or the initial state when the feed has
 * never been polled. The initial state is not persisted until the first
 * outcome is recorded.
 */
export function pollStateFor(
  db: AppDatabase,
  feedId: number,
  settings: BackoffSettings,
): PollState {
  const row = db
    .select()
    .from(pollStates)
    .where(eq(pollStates.feedId, feedId))
    .get();

  if (!row) return initialPollState(settings);

  return {
    intervalMs: row.intervalMs,
    lastPolledAt: row.lastPolledAt,
    lastSuccessAt: row.lastSuccessAt,
    consecutiveNoChange: row.consecutiveNoChange,
    consecutiveErrors: row.consecutiveErrors,
    lastError: row.lastError,
    lastErrorKind: row.lastErrorKind,
  };
}

export function isFeedDue(
  db: AppDatabase,
  feed: Pick<Feed, "id" | "enabled">,
  now: Date,
  settings: BackoffSettings,
): boolean {
  if (!feed.enabled) return false;
  return isDue(pollStateFor(db, feed.id, settings), now);
}

/**
 * Records a poll outcome and persists the adjusted state.
 * @returns The feed's new polling interval in milliseconds.
 */
export function recordOutcome(
  db: AppDatabase,
  feedId: number,
  outcome: PollOutcome,
  now: Date,
  settings: BackoffSettings,
): number {
  const next = applyOutcome(
    pollStateFor(db, feedId, settings),
    outcome,
    now,
    settings,
  );

  db.insert(pollStates)
    .values({ feedId, ...next })
    .onConflictDoUpdate({
      target: pollStates.feedId,
      set: { ...next },
    })
    .run();

  return next.intervalMs;
}
