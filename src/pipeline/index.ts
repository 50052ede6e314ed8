export { createPollCycle, orderOldestFirst, limitPerHost } from "./cycle";
export { fetchFeed, createFeedFetcher, parseFeedXml } from "./fetcher";
export { isFeedDue, pollStateFor, recordOutcome } from "./poll-state";
export { validatorsFor, recordFetch } from "./validators";
export { identityKey, isNew, markSeen, markListed, pruneSeen, countSeen } from "./ledger";
export { compileFilterRules, findRejection, isAllowed } from "./filter";
export { normalizeTitle, trimHeadline } from "./headline";
export type {
  FeedEntry,
  FeedFetchResult,
  FetchFailure,
  FetchFeedFn,
  FetchValidators,
  PollOutcome,
  PollState,
  CycleReport,
} from "./types";
export type { PollCycle, PollCycleDeps } from "./cycle";
export type { FilterRules, FilterRejection } from "./filter";
export type { BackoffSettings } from "./backoff";
