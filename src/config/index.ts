import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema } from "./schema";
import type { AppConfig } from "./schema";

/**
 * Validates an already-parsed config document.
 * @param source - Label used in error messages (usually the file path).
 */
export function parseConfig(document: unknown, source: string): AppConfig {
  const result = appConfigSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid configuration in ${source}:\n${issues}`);
  }

  return result.data;
}

export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  return parseConfig(parsed, configPath);
}

export type { AppConfig, PollingConfig, FilterConfig } from "./schema";
