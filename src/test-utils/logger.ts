import { Writable } from "node:stream";
import type { Logger } from "pino";
import { createLogger } from "../logger";

/**
 * A service-configured logger whose JSON lines are collected in memory.
 */
export function createCapturingLogger(level = "info"): {
  logger: Logger;
  lines: Array<Record<string, unknown>>;
} {
  const lines: Array<Record<string, unknown>> = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      lines.push(JSON.parse(chunk.toString()));
      callback();
    },
  });

  return { logger: createLogger(level, stream), lines };
}
