// pattern: Imperative Shell
import Parser from "rss-parser";
import type { Logger } from "pino";
import type {
  FeedEntry,
  FeedFetchResult,
  FetchFailure,
  FetchFeedFn,
  FetchValidators,
} from "./types";

type CustomItem = {
  id?: string;
};

export type FetchFeedOptions = {
  readonly timeoutMs: number;
  readonly userAgent: string;
};

let parserInstance: Parser<Record<string, unknown>, CustomItem> | null = null;

export function createParser(): Parser<Record<string, unknown>, CustomItem> {
  return new Parser<Record<string, unknown>, CustomItem>();
}

function getParserInstance(): Parser<Record<string, unknown>, CustomItem> {
  if (!parserInstance) {
    parserInstance = createParser();
  }
  return parserInstance;
}

function parseDate(value: string | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function nonEmpty(value: string | undefined): string | null {
  return value && value.trim().length > 0 ? value : null;
}

/**
 * Classifies an HTTP status that is neither success nor 304.
 * 408, 429 and 5xx are worth retrying on the next due cycle; any other
 * client error (404, 410, 401, ...) needs operator attention.
 */
export function classifyStatus(status: number): FetchFailure["kind"] {
  if (status === 408 || status === 429 || status >= 500) return "transient";
  return "permanent";
}

export async function parseFeedXml(xml: string): Promise<ReadonlyArray<FeedEntry>> {
  const feed = await getParserInstance().parseString(xml);

  return feed.items.map((item) => ({
    guid: nonEmpty(item.guid) ?? nonEmpty(item.id),
    link: nonEmpty(item.link),
    title: nonEmpty(item.title),
    publishedAt: parseDate(item.isoDate) ?? parseDate(item.pubDate),
    summary: nonEmpty(item.contentSnippet) ?? nonEmpty(item.summary),
  }));
}

/**
 * Performs a conditional GET for one feed and parses the body.
 * Never throws: every failure comes back as an `error` result.
 */
export async function fetchFeed(
  url: string,
  validators: FetchValidators,
  options: FetchFeedOptions,
  logger: Logger,
): Promise<FeedFetchResult> {
  const headers: Record<string, string> = {
    "User-Agent": options.userAgent,
    Accept: "application/rss+xml, application/atom+xml, application/xml, text/xml, */*",
  };
  if (validators.etag !== null) {
    headers["If-None-Match"] = validators.etag;
  }
  if (validators.lastModified !== null) {
    headers["If-Modified-Since"] = validators.lastModified;
  }

  let response: Response;
  try {
    response = await fetch(url, {
      signal: AbortSignal.timeout(options.timeoutMs),
      headers,
    });
  } catch (err) {
    const timedOut = err instanceof Error && err.name === "TimeoutError";
    const message = timedOut
      ? `request timed out after ${options.timeoutMs}ms`
      : err instanceof Error
        ? err.message
        : String(err);
    logger.debug({ feedUrl: url, error: message }, "feed request failed");
    return { status: "error", failure: { kind: "transient", message } };
  }

  if (response.status === 304) {
    return { status: "not_modified" };
  }

  if (!response.ok) {
    return {
      status: "error",
      failure: {
        kind: classifyStatus(response.status),
        message: `HTTP ${response.status}: ${response.statusText}`,
        statusCode: response.status,
      },
    };
  }

  let body: string;
  try {
    body = await response.text();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { status: "error", failure: { kind: "transient", message } };
  }

  let entries: ReadonlyArray<FeedEntry>;
  try {
    entries = await parseFeedXml(body);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      status: "error",
      failure: { kind: "permanent", message: `unparseable feed: ${message}` },
    };
  }

  return {
    status: "parsed",
    entries,
    validators: {
      etag: response.headers.get("etag"),
      lastModified: response.headers.get("last-modified"),
    },
  };
}

/** Binds request options and logger so the poll cycle sees a plain `FetchFeedFn`. */
export function createFeedFetcher(
  options: FetchFeedOptions,
  logger: Logger,
): FetchFeedFn {
  return (url, validators) => fetchFeed(url, validators, options, logger);
}
