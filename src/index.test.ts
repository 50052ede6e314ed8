import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync, mkdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import cron from "node-cron";
import pino from "pino";
import { loadConfig, parseConfig } from "./config";
import { seedDatabase } from "./seed";
import { createTestDatabase } from "./test-utils/db";
import { createCapturingLogger } from "./test-utils/logger";
import { feeds } from "./db/schema";

/**
 * Startup wiring: configuration loading and validation, structured logging,
 * and seeding from the loaded config, without starting the server.
 */

const VALID_YAML = `
lemmy:
  server: lemmy.example.org
  accounts:
    default:
      username: relaybot
      passwordEnv: LEMMY_PASSWORD
feeds:
  - url: https://feeds.example.com/tech.xml
    community: technology
  - url: https://feeds.example.com/science.xml
    community: science
    account: default
    enabled: false
filters:
  global:
    - "Sponsored"
  communities:
    technology:
      - "Podcast"
polling:
  minIntervalMinutes: 10
`;

describe("entry point and integration", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = join(tmpdir(), `feed-relay-test-${Date.now()}-${Math.random()}`);
    mkdirSync(tmpDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(name: string, yaml: string): string {
    const path = join(tmpDir, name);
    writeFileSync(path, yaml);
    return path;
  }

  describe("configuration loading", () => {
    it("should load a valid config and fill in defaults", () => {
      const config = loadConfig(writeConfig("valid.yaml", VALID_YAML));

      expect(config.lemmy.server).toBe("lemmy.example.org");
      expect(config.feeds).toEqual([
        {
          url: "https://feeds.example.com/tech.xml",
          community: "technology",
          account: "default",
          enabled: true,
        },
        {
          url: "https://feeds.example.com/science.xml",
          community: "science",
          account: "default",
          enabled: false,
        },
      ]);
      expect(config.filters).toEqual({
        global: ["Sponsored"],
        communities: { technology: ["Podcast"] },
      });
      expect(config.polling.minIntervalMinutes).toBe(10);
      expect(config.polling.maxIntervalMinutes).toBe(1440);
      expect(config.schedule.tick).toBe("*/5 * * * *");
      expect(config.dedup).toEqual({ retentionDays: 30, maxArticleAgeDays: 3 });
    });

    it("should load the example config shipped with the project", () => {
      const config = loadConfig(
        fileURLToPath(new URL("../config.example.yaml", import.meta.url)),
      );

      expect(config.feeds).toHaveLength(2);
      expect(config.filters.global).toHaveLength(13);
      expect(Object.keys(config.lemmy.accounts)).toEqual(["default", "paywall"]);
    });

    it("should throw when the lemmy section is missing", () => {
      const path = writeConfig("no-lemmy.yaml", "feeds: []\n");

      expect(() => loadConfig(path)).toThrow(
        `invalid configuration in ${path}:\n  - lemmy: Required`,
      );
    });

    it("should reject an invalid filter pattern", () => {
      expect(() =>
        parseConfig(
          {
            lemmy: { server: "lemmy.example.org", accounts: {} },
            filters: { global: ["(unclosed"] },
          },
          "inline",
        ),
      ).toThrow(
        "invalid configuration in inline:\n  - filters.global.0: must be a valid regular expression",
      );
    });

    it("should reject a minimum interval above the maximum", () => {
      expect(() =>
        parseConfig(
          {
            lemmy: { server: "lemmy.example.org", accounts: {} },
            polling: { minIntervalMinutes: 60, maxIntervalMinutes: 30 },
          },
          "inline",
        ),
      ).toThrow("polling.minIntervalMinutes: minIntervalMinutes must not exceed maxIntervalMinutes");
    });

    it("should reject a retention shorter than the maximum article age", () => {
      expect(() =>
        parseConfig(
          {
            lemmy: { server: "lemmy.example.org", accounts: {} },
            dedup: { retentionDays: 2, maxArticleAgeDays: 3 },
          },
          "inline",
        ),
      ).toThrow("dedup.retentionDays: retentionDays must exceed maxArticleAgeDays");
    });

    it("should reject a feed without a valid url", () => {
      expect(() =>
        parseConfig(
          {
            lemmy: { server: "lemmy.example.org", accounts: {} },
            feeds: [{ url: "not a url", community: "technology" }],
          },
          "inline",
        ),
      ).toThrow("feeds.0.url: Invalid url");
    });

    it("should throw when the file does not exist", () => {
      const path = join(tmpDir, "missing.yaml");
      expect(() => loadConfig(path)).toThrow(`failed to read config file at ${path}`);
    });

    it("should throw on malformed YAML", () => {
      const path = writeConfig("broken.yaml", "lemmy: [unclosed\n");
      expect(() => loadConfig(path)).toThrow(`failed to parse YAML in ${path}`);
    });

    it("should expose a tick expression node-cron accepts", () => {
      const config = loadConfig(writeConfig("valid.yaml", VALID_YAML));
      expect(cron.validate(config.schedule.tick)).toBe(true);
    });
  });

  describe("seeding from loaded config", () => {
    it("should seed the configured feeds into the database", () => {
      const config = loadConfig(writeConfig("valid.yaml", VALID_YAML));
      const db = createTestDatabase();

      const inserted = seedDatabase(db, config, pino({ level: "silent" }));

      expect(inserted).toBe(2);
      const rows = db.select({ url: feeds.url, enabled: feeds.enabled }).from(feeds).all();
      expect(rows).toEqual([
        { url: "https://feeds.example.com/tech.xml", enabled: true },
        { url: "https://feeds.example.com/science.xml", enabled: false },
      ]);
    });
  });

  describe("structured logging", () => {
    it("should write JSON lines with name, string level, ISO time and message", () => {
      const { logger, lines } = createCapturingLogger();

      logger.info({ feedCount: 5 }, "seeding feeds from config");

      expect(lines).toHaveLength(1);
      const line = lines[0];
      expect(line).toEqual(
        expect.objectContaining({
          name: "feed-relay",
          level: "info",
          msg: "seeding feeds from config",
          feedCount: 5,
        }),
      );
      expect(String(line?.["time"])).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });

    it("should drop messages below the configured level", () => {
      const { logger, lines } = createCapturingLogger("warn");

      logger.info("not written");
      logger.warn("written");

      expect(lines.map((line) => line["msg"])).toEqual(["written"]);
    });
  });
});
