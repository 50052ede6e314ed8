export type FeedEntry = {
  readonly guid: string | null;
  readonly link: string | null;
  readonly title: string | null;
  readonly publishedAt: Date | null;
  readonly summary: string | null;
};

/**
 * Last-known conditional-fetch validators. `null` means the server did not
 * supply one, so no conditional header is sent for it.
 */
export type FetchValidators = {
  readonly etag: string | null;
  readonly lastModified: string | null;
};

export type FetchFailureKind = "transient" | "permanent";

export type FetchFailure = {
  readonly kind: FetchFailureKind;
  readonly message: string;
  readonly statusCode?: number;
};

export type FeedFetchResult =
  | { readonly status: "not_modified" }
  | {
      readonly status: "parsed";
      readonly entries: ReadonlyArray<FeedEntry>;
      readonly validators: FetchValidators;
    }
  | { readonly status: "error"; readonly failure: FetchFailure };

export type FetchFeedFn = (
  url: string,
  validators: FetchValidators,
) => Promise<FeedFetchResult>;

export type PollOutcome =
  | { readonly kind: "new_items"; readonly count: number }
  | { readonly kind: "no_change" }
  | { readonly kind: "not_modified" }
  | { readonly kind: "fetch_error"; readonly failure: FetchFailure };

export type PollState = {
  readonly intervalMs: number;
  readonly lastPolledAt: Date | null;
  readonly lastSuccessAt: Date | null;
  readonly consecutiveNoChange: number;
  readonly consecutiveErrors: number;
  readonly lastError: string | null;
  readonly lastErrorKind: FetchFailureKind | null;
};

export type CycleReport = {
  readonly dueCount: number;
  readonly polledCount: number;
  readonly deferredCount: number;
  readonly acceptedCount: number;
  readonly filteredCount: number;
  readonly duplicateCount: number;
  readonly staleCount: number;
  readonly postFailureCount: number;
  readonly fetchErrorCount: number;
  readonly prunedCount: number;
};
