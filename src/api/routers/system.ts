// pattern: Imperative Shell
import { router, publicProcedure } from "../trpc";
import { feeds, pollStates } from "../../db/schema";
import { asc, count, desc, eq, gt, max } from "drizzle-orm";
import { countSeen } from "../../pipeline/ledger";
import { backoffSettingsFromConfig } from "../../pipeline/backoff";
import { pollStateFor } from "../../pipeline/poll-state";

export const systemRouter = router({
  status: publicProcedure.query(({ ctx }) => {
    const feedCount =
      ctx.db.select({ total: count() }).from(feeds).get()?.total ?? 0;

    const enabledFeedCount =
      ctx.db
        .select({ total: count() })
        .from(feeds)
        .where(eq(feeds.enabled, true))
        .get()?.total ?? 0;

    const lastPollTime =
      ctx.db
        .select({ lastPolledAt: max(pollStates.lastPolledAt) })
        .from(pollStates)
        .get()?.lastPolledAt ?? null;

    // Feeds currently failing, worst first, for operator alerting.
    const failingFeeds = ctx.db
      .select({
        feedId: feeds.id,
        url: feeds.url,
        community: feeds.community,
        consecutiveErrors: pollStates.consecutiveErrors,
        lastError: pollStates.lastError,
        lastErrorKind: pollStates.lastErrorKind,
      })
      .from(pollStates)
      .innerJoin(feeds, eq(feeds.id, pollStates.feedId))
      .where(gt(pollStates.consecutiveErrors, 0))
      .orderBy(desc(pollStates.consecutiveErrors), asc(feeds.id))
      .all();

    return {
      tickSchedule: ctx.config.schedule.tick,
      feedCount,
      enabledFeedCount,
      seenArticleCount: countSeen(ctx.db),
      lastPollTime,
      failingFeeds,
    };
  }),

  pollStates: publicProcedure.query(({ ctx }) => {
    const settings = backoffSettingsFromConfig(ctx.config.polling);
    const now = ctx.clock();

    return ctx.db
      .select()
      .from(feeds)
      .orderBy(asc(feeds.id))
      .all()
      .map((feed) => {
        const state = pollStateFor(ctx.db, feed.id, settings);
        const nextDueAt =
          state.lastPolledAt === null
            ? now
            : new Date(state.lastPolledAt.getTime() + state.intervalMs);

        return {
          feedId: feed.id,
          url: feed.url,
          enabled: feed.enabled,
          intervalMinutes: state.intervalMs / 60000,
          lastPolledAt: state.lastPolledAt,
          lastSuccessAt: state.lastSuccessAt,
          nextDueAt,
          consecutiveNoChange: state.consecutiveNoChange,
          consecutiveErrors: state.consecutiveErrors,
        };
      });
  }),
});
