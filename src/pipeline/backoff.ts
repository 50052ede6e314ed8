// pattern: Functional Core
import type { PollingConfig } from "../config";
import type { PollOutcome, PollState } from "./types";

const MINUTE_MS = 60 * 1000;

export type BackoffSettings = {
  readonly minIntervalMs: number;
  readonly maxIntervalMs: number;
  readonly defaultIntervalMs: number;
  readonly shrinkFactor: number;
  readonly growthStep: number;
  readonly maxGrowthMultiplier: number;
};

export const DEFAULT_BACKOFF_SETTINGS: BackoffSettings = {
  minIntervalMs: 5 * MINUTE_MS,
  maxIntervalMs: 24 * 60 * MINUTE_MS,
  defaultIntervalMs: 120 * MINUTE_MS,
  shrinkFactor: 2,
  growthStep: 0.25,
  maxGrowthMultiplier: 2,
};

export function backoffSettingsFromConfig(
  polling: PollingConfig,
): BackoffSettings {
  return {
    minIntervalMs: polling.minIntervalMinutes * MINUTE_MS,
    maxIntervalMs: polling.maxIntervalMinutes * MINUTE_MS,
    defaultIntervalMs: polling.defaultIntervalMinutes * MINUTE_MS,
    shrinkFactor: polling.shrinkFactor,
    growthStep: polling.growthStep,
    maxGrowthMultiplier: polling.maxGrowthMultiplier,
  };
}

export function clampInterval(
  intervalMs: number,
  settings: BackoffSettings,
): number {
  return Math.min(
    settings.maxIntervalMs,
    Math.max(settings.minIntervalMs, Math.round(intervalMs)),
  );
}

/** State of a feed that has never been polled. */
export function initialPollState(settings: BackoffSettings): PollState {
  return {
    intervalMs: clampInterval(settings.defaultIntervalMs, settings),
    lastPolledAt: null,
    lastSuccessAt: null,
    consecutiveNoChange: 0,
    consecutiveErrors: 0,
    lastError: null,
    lastErrorKind: null,
  };
}

/**
 * A feed is due when it has never been polled or when at least one full
 * interval has elapsed since the last poll.
 */
export function isDue(state: PollState, now: Date): boolean {
  if (state.lastPolledAt === null) return true;
  return now.getTime() - state.lastPolledAt.getTime() >= state.intervalMs;
}

/**
 * Growth multiplier after `quietCount` consecutive polls with nothing new.
 * Ramps linearly from `1 + growthStep` up to `maxGrowthMultiplier`, so a feed
 * that just went quiet backs off gently and a long-quiet feed backs off fast.
 */
export function growthMultiplier(
  quietCount: number,
  settings: BackoffSettings,
): number {
  return Math.min(
    settings.maxGrowthMultiplier,
    1 + settings.growthStep * quietCount,
  );
}

/**
 * Applies one poll outcome to a feed's state.
 *
 * - `new_items`: interval divided by `shrinkFactor`, quiet counter reset
 * - `no_change` / `not_modified`: quiet counter incremented, interval grown
 * - `fetch_error`: interval and quiet counter untouched, error counter incremented
 *
 * The result is always clamped to [minIntervalMs, maxIntervalMs].
 */
export function applyOutcome(
  state: PollState,
  outcome: PollOutcome,
  now: Date,
  settings: BackoffSettings,
): PollState {
  switch (outcome.kind) {
    case "new_items":
      return {
        ...state,
        intervalMs: clampInterval(state.intervalMs / settings.shrinkFactor, settings),
        lastPolledAt: now,
        lastSuccessAt: now,
        consecutiveNoChange: 0,
        consecutiveErrors: 0,
      };
    case "no_change":
    case "not_modified": {
      const quiet = state.consecutiveNoChange + 1;
      return {
        ...state,
        intervalMs: clampInterval(
          state.intervalMs * growthMultiplier(quiet, settings),
          settings,
        ),
        lastPolledAt: now,
        lastSuccessAt: now,
        consecutiveNoChange: quiet,
        consecutiveErrors: 0,
      };
    }
    case "fetch_error":
      return {
        ...state,
        intervalMs: clampInterval(state.intervalMs, settings),
        lastPolledAt: now,
        consecutiveErrors: state.consecutiveErrors + 1,
        lastError: outcome.failure.message,
        lastErrorKind: outcome.failure.kind,
      };
  }
}
