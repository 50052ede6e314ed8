// pattern: Imperative Shell
import { eq } from "drizzle-orm";
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import { feeds } from "../db/schema";
import type { Feed } from "../db/schema";
import type { PublishPostFn } from "../publish/lemmy";
import { backoffSettingsFromConfig } from "./backoff";
import type { BackoffSettings } from "./backoff";
import { compileFilterRules, findRejection } from "./filter";
import type { FilterRules } from "./filter";
import { normalizeTitle, trimHeadline } from "./headline";
import { identityKey, isNew, markListed, markSeen, pruneSeen } from "./ledger";
import { isFeedDue, recordOutcome } from "./poll-state";
import { recordFetch, validatorsFor } from "./validators";
import type { CycleReport, FeedEntry, FetchFeedFn, PollOutcome } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

export type PollCycleDeps = {
  readonly db: AppDatabase;
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly fetchFeed: FetchFeedFn;
  readonly publish: PublishPostFn;
  readonly clock?: () => Date;
};

export type PollCycle = {
  /** Polls every due feed once and returns what happened. */
  readonly run: () => Promise<CycleReport>;
};

type FeedTally = {
  accepted: number;
  filtered: number;
  duplicates: number;
  stale: number;
  postFailures: number;
  fetchError: boolean;
};

function emptyTally(): FeedTally {
  return {
    accepted: 0,
    filtered: 0,
    duplicates: 0,
    stale: 0,
    postFailures: 0,
    fetchError: false,
  };
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

/**
 * Orders entries for posting: oldest publish time first, entries without a
 * publish time last. Feeds list newest first, so ties and undated entries
 * come out in reverse feed order.
 */
export function orderOldestFirst(
  entries: ReadonlyArray<FeedEntry>,
): Array<FeedEntry> {
  return [...entries].reverse().sort((a, b) => {
    const at = a.publishedAt?.getTime() ?? Number.POSITIVE_INFINITY;
    const bt = b.publishedAt?.getTime() ?? Number.POSITIVE_INFINITY;
    if (at === bt) return 0;
    return at < bt ? -1 : 1;
  });
}

/**
 * Limits the due set to `perHostLimit` feeds per host; the rest stay due and
 * are picked up by a later tick.
 */
export function limitPerHost(
  due: ReadonlyArray<Feed>,
  perHostLimit: number,
): { readonly selected: Array<Feed>; readonly deferred: Array<Feed> } {
  const perHost = new Map<string, number>();
  const selected: Array<Feed> = [];
  const deferred: Array<Feed> = [];

  for (const feed of due) {
    const host = hostOf(feed.url);
    const taken = perHost.get(host) ?? 0;
    if (taken >= perHostLimit) {
      deferred.push(feed);
      continue;
    }
    perHost.set(host, taken + 1);
    selected.push(feed);
  }

  return { selected, deferred };
}

/**
 * Creates the poll cycle. The returned object remembers the feeds currently
 * being processed, so overlapping runs never touch the same feed concurrently.
 */
export function createPollCycle(deps: PollCycleDeps): PollCycle {
  const { db, config, logger, fetchFeed, publish } = deps;
  const clock = deps.clock ?? (() => new Date());
  const settings: BackoffSettings = backoffSettingsFromConfig(config.polling);

  const inFlight = new Set<number>();

  async function processEntries(
    feed: Feed,
    entries: ReadonlyArray<FeedEntry>,
    rules: FilterRules,
    now: Date,
    tally: FeedTally,
  ): Promise<void> {
    const oldestAllowed = now.getTime() - config.dedup.maxArticleAgeDays * DAY_MS;
    const keys = new Set<string>();

    for (const entry of orderOldestFirst(entries)) {
      const key = identityKey(entry);
      keys.add(key);

      if (!isNew(db, feed.id, key)) {
        tally.duplicates++;
        continue;
      }

      if (entry.publishedAt && entry.publishedAt.getTime() < oldestAllowed) {
        tally.stale++;
        continue;
      }

      // Filters see the full title; only the posted headline is trimmed.
      const normalized = normalizeTitle(entry.title ?? "") || (entry.link ?? "");
      const headline = trimHeadline(normalized);
      const rejection =
        normalized.length === 0
          ? { scope: "global" as const, pattern: "(empty title)" }
          : findRejection(normalized, feed.community, rules);

      if (rejection) {
        markSeen(db, feed.id, key, now, {
          disposition: "filtered",
          title: headline,
          link: entry.link,
        });
        tally.filtered++;
        logger.info(
          { feedId: feed.id, title: headline, ...rejection },
          "entry filtered",
        );
        continue;
      }

      // Recorded before posting: a failed post is never retried.
      markSeen(db, feed.id, key, now, {
        disposition: "accepted",
        title: headline,
        link: entry.link,
      });
      tally.accepted++;

      const result = await publish({
        community: feed.community,
        account: feed.account,
        title: headline,
        url: entry.link,
        body: entry.link ? null : entry.summary,
      });

      if (!result.success) {
        tally.postFailures++;
        logger.error(
          { feedId: feed.id, title: headline, error: result.error },
          "post failed, article will not be retried",
        );
      }
    }

    markListed(db, feed.id, keys);
  }

  async function processFeed(
    feed: Feed,
    rules: FilterRules,
  ): Promise<FeedTally> {
    const tally = emptyTally();
    const validators = validatorsFor(db, feed.id);
    const result = await fetchFeed(feed.url, validators);
    const now = clock();

    let outcome: PollOutcome;
    switch (result.status) {
      case "error": {
        tally.fetchError = true;
        outcome = { kind: "fetch_error", failure: result.failure };
        const fields = {
          feedId: feed.id,
          feedUrl: feed.url,
          error: result.failure.message,
          statusCode: result.failure.statusCode,
        };
        if (result.failure.kind === "permanent") {
          logger.error(fields, "feed fetch failed permanently, needs attention");
        } else {
          logger.warn(fields, "feed fetch failed, will retry when due");
        }
        break;
      }
      case "not_modified":
        outcome = { kind: "not_modified" };
        break;
      case "parsed":
        recordFetch(db, feed.id, result.validators, now);
        await processEntries(feed, result.entries, rules, now, tally);
        outcome =
          tally.accepted > 0
            ? { kind: "new_items", count: tally.accepted }
            : { kind: "no_change" };
        break;
    }

    const intervalMs = recordOutcome(db, feed.id, outcome, now, settings);
    logger.info(
      {
        feedId: feed.id,
        feedUrl: feed.url,
        outcome: outcome.kind,
        accepted: tally.accepted,
        filtered: tally.filtered,
        duplicates: tally.duplicates,
        nextIntervalMinutes: Math.round(intervalMs / 60000),
      },
      "feed polled",
    );

    return tally;
  }

  async function run(): Promise<CycleReport> {
    const started = clock();
    const rules = compileFilterRules(config.filters);

    const enabledFeeds = db
      .select()
      .from(feeds)
      .where(eq(feeds.enabled, true))
      .all();

    const due = enabledFeeds.filter(
      (feed) => !inFlight.has(feed.id) && isFeedDue(db, feed, started, settings),
    );
    const { selected, deferred } = limitPerHost(due, config.polling.perHostLimit);

    logger.info(
      { due: due.length, selected: selected.length, deferred: deferred.length },
      "poll cycle starting",
    );

    for (const feed of selected) inFlight.add(feed.id);

    const limit = pLimit(config.polling.maxConcurrency);
    const totals = emptyTally();
    let fetchErrors = 0;
    let polled = 0;

    const tasks = selected.map((feed) =>
      limit(async () => {
        try {
          const tally = await processFeed(feed, rules);
          polled++;
          totals.accepted += tally.accepted;
          totals.filtered += tally.filtered;
          totals.duplicates += tally.duplicates;
          totals.stale += tally.stale;
          totals.postFailures += tally.postFailures;
          if (tally.fetchError) fetchErrors++;
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          logger.error(
            { feedId: feed.id, feedUrl: feed.url, error: message },
            "unexpected error during feed processing",
          );
        } finally {
          inFlight.delete(feed.id);
        }
      }),
    );

    await Promise.all(tasks);

    let pruned = 0;
    try {
      const cutoff = new Date(clock().getTime() - config.dedup.retentionDays * DAY_MS);
      pruned = pruneSeen(db, cutoff);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "ledger prune failed");
    }

    const report: CycleReport = {
      dueCount: due.length,
      polledCount: polled,
      deferredCount: deferred.length,
      acceptedCount: totals.accepted,
      filteredCount: totals.filtered,
      duplicateCount: totals.duplicates,
      staleCount: totals.stale,
      postFailureCount: totals.postFailures,
      fetchErrorCount: fetchErrors,
      prunedCount: pruned,
    };

    logger.info(report, "poll cycle complete");
    return report;
  }

  return { run };
}
