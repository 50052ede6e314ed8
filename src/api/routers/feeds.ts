// pattern: Imperative Shell
import { z } from "zod";
import { TRPCError } from "@trpc/server";
import { eq } from "drizzle-orm";
import { router, publicProcedure } from "../trpc";
import {
  feeds,
  fetchValidators,
  pollStates,
  seenArticles,
} from "../../db/schema";
import type { AppDatabase } from "../../db";

function requireFeed(db: AppDatabase, id: number) {
  const feed = db.select().from(feeds).where(eq(feeds.id, id)).get();
  if (!feed) {
    throw new TRPCError({ code: "NOT_FOUND", message: `feed ${id} not found` });
  }
  return feed;
}

function assertUrlFree(db: AppDatabase, url: string, exceptId?: number): void {
  const existing = db
    .select({ id: feeds.id })
    .from(feeds)
    .where(eq(feeds.url, url))
    .get();
  if (existing && existing.id !== exceptId) {
    throw new TRPCError({
      code: "CONFLICT",
      message: `feed ${url} is already registered`,
    });
  }
}

/**
 * Feed management. The poll cycle re-reads this table on every tick, so
 * changes take effect on the next tick.
 */
export const feedsRouter = router({
  list: publicProcedure.query(({ ctx }) => {
    return ctx.db.select().from(feeds).all();
  }),

  getById: publicProcedure
    .input(z.object({ id: z.number().int() }))
    .query(({ ctx, input }) => {
      return (
        ctx.db.select().from(feeds).where(eq(feeds.id, input.id)).get() ?? null
      );
    }),

  create: publicProcedure
    .input(
      z.object({
        url: z.string().url(),
        community: z.string().min(1),
        account: z.string().min(1).optional(),
        enabled: z.boolean().optional(),
      }),
    )
    .mutation(({ ctx, input }) => {
      assertUrlFree(ctx.db, input.url);
      const created = ctx.db.insert(feeds).values(input).returning().get();
      ctx.logger.info(
        { feedId: created.id, feedUrl: created.url, community: created.community },
        "feed created",
      );
      return created;
    }),

  /**
   * Updates a feed in place. Pointing a feed at another community replaces
   * its destination; its poll state and ledger carry over. A new url drops
   * the stored fetch validators, which belong to the old resource.
   */
  update: publicProcedure
    .input(
      z.object({
        id: z.number().int(),
        url: z.string().url().optional(),
        community: z.string().min(1).optional(),
        account: z.string().min(1).optional(),
        enabled: z.boolean().optional(),
      }),
    )
    .mutation(({ ctx, input }) => {
      const { id, ...updates } = input;
      const current = requireFeed(ctx.db, id);
      if (updates.url !== undefined) {
        assertUrlFree(ctx.db, updates.url, id);
      }

      if (Object.keys(updates).length === 0) {
        return current;
      }

      const urlChanged = updates.url !== undefined && updates.url !== current.url;

      return ctx.db.transaction((tx) => {
        if (urlChanged) {
          tx.delete(fetchValidators).where(eq(fetchValidators.feedId, id)).run();
        }
        return tx
          .update(feeds)
          .set(updates)
          .where(eq(feeds.id, id))
          .returning()
          .get();
      });
    }),

  /**
   * Deletes a feed together with its poll state, fetch validators and
   * ledger rows, in one transaction.
   */
  delete: publicProcedure
    .input(z.object({ id: z.number().int() }))
    .mutation(({ ctx, input }) => {
      requireFeed(ctx.db, input.id);

      const removedArticles = ctx.db.transaction((tx) => {
        const removed = tx
          .delete(seenArticles)
          .where(eq(seenArticles.feedId, input.id))
          .run().changes;
        tx.delete(fetchValidators).where(eq(fetchValidators.feedId, input.id)).run();
        tx.delete(pollStates).where(eq(pollStates.feedId, input.id)).run();
        tx.delete(feeds).where(eq(feeds.id, input.id)).run();
        return removed;
      });

      ctx.logger.info(
        { feedId: input.id, removedArticles },
        "feed deleted",
      );
      return { success: true, removedArticles };
    }),
});
