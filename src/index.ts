import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createDatabase } from "./db";
import { seedDatabase } from "./seed";
import { createFeedFetcher, createPollCycle } from "./pipeline";
import { createLemmyPublisher } from "./publish/lemmy";
import { createCycleScheduler } from "./scheduler";
import { createApiServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";
const DATABASE_URL = process.env["DATABASE_URL"] ?? "./data/feed-relay.db";
const PORT = parseInt(process.env["PORT"] ?? "3000", 10);

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("feed-relay starting");

  let config: AppConfig;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    {
      server: config.lemmy.server,
      accounts: Object.keys(config.lemmy.accounts),
      tick: config.schedule.tick,
    },
    "config loaded",
  );

  const { db, close: closeDb } = createDatabase(resolve(DATABASE_URL));
  logger.info("database schema ready");

  seedDatabase(db, config, logger);

  const cycle = createPollCycle({
    db,
    config,
    logger,
    fetchFeed: createFeedFetcher(
      {
        timeoutMs: config.polling.requestTimeoutMs,
        userAgent: config.polling.userAgent,
      },
      logger,
    ),
    publish: createLemmyPublisher(config.lemmy, logger),
  });

  const scheduler = createCycleScheduler(cycle, config, logger);
  logger.info({ schedule: config.schedule.tick }, "tick scheduler started");

  const app = createApiServer({ db, config, logger, clock: () => new Date() });
  const server = app.listen(PORT, () => {
    logger.info({ port: PORT }, "api server listening");
  });

  registerShutdownHandlers({
    schedulers: [scheduler],
    closeServer: () => server.close(),
    closeDb,
    logger,
  });

  // First cycle runs now rather than waiting for the first tick.
  await cycle.run();
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
