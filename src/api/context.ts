// pattern: Functional Core
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import type { Logger } from "pino";

/**
 * tRPC context passed to all procedures: the database holding feeds and
 * their polling state, the loaded configuration, the logger, and the clock
 * used when reporting when feeds are next due.
 */
export type AppContext = {
  readonly db: AppDatabase;
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly clock: () => Date;
};
