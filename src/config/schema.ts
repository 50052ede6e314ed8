import { z } from "zod";

const patternSchema = z.string().min(1).refine(
  (pattern) => {
    try {
      new RegExp(pattern);
      return true;
    } catch {
      return false;
    }
  },
  { message: "must be a valid regular expression" },
);

const accountConfigSchema = z.object({
  username: z.string().min(1),
  passwordEnv: z.string().min(1),
});

const feedConfigSchema = z.object({
  url: z.string().url(),
  community: z.string().min(1),
  account: z.string().min(1).default("default"),
  enabled: z.boolean().default(true),
});

const pollingConfigSchema = z
  .object({
    minIntervalMinutes: z.number().positive().default(5),
    maxIntervalMinutes: z.number().positive().default(24 * 60),
    defaultIntervalMinutes: z.number().positive().default(120),
    shrinkFactor: z.number().gt(1).default(2),
    growthStep: z.number().positive().default(0.25),
    maxGrowthMultiplier: z.number().gt(1).default(2),
    maxConcurrency: z.number().int().positive().default(4),
    perHostLimit: z.number().int().positive().default(1),
    requestTimeoutMs: z.number().int().positive().default(30000),
    userAgent: z.string().min(1).default("feed-relay/0.1 (+RSS to Lemmy)"),
  })
  .refine((p) => p.minIntervalMinutes <= p.maxIntervalMinutes, {
    message: "minIntervalMinutes must not exceed maxIntervalMinutes",
    path: ["minIntervalMinutes"],
  });

export const appConfigSchema = z.object({
  lemmy: z.object({
    server: z.string().min(1),
    accounts: z.record(z.string(), accountConfigSchema),
  }),
  feeds: z.array(feedConfigSchema).default([]),
  schedule: z
    .object({
      tick: z.string().min(1).default("*/5 * * * *"),
    })
    .default({}),
  polling: pollingConfigSchema.default({}),
  dedup: z
    .object({
      retentionDays: z.number().positive().default(30),
      maxArticleAgeDays: z.number().positive().default(3),
    })
    .refine((d) => d.retentionDays > d.maxArticleAgeDays, {
      message: "retentionDays must exceed maxArticleAgeDays",
      path: ["retentionDays"],
    })
    .default({}),
  filters: z
    .object({
      global: z.array(patternSchema).default([]),
      communities: z.record(z.string(), z.array(patternSchema)).default({}),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type PollingConfig = AppConfig["polling"];
export type FilterConfig = AppConfig["filters"];
