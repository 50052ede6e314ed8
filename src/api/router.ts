// pattern: Imperative Shell
import { router } from "./trpc";
import { feedsRouter } from "./routers/feeds";
import { systemRouter } from "./routers/system";

/**
 * Root tRPC router: feed management and scheduler status.
 */
export const appRouter = router({
  feeds: feedsRouter,
  system: systemRouter,
});

export type AppRouter = typeof appRouter;
