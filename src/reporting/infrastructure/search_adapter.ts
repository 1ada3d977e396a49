/**
 * Web search adapter backed by the Tavily REST API.
 */
import type { Logger } from "pino";
import type { ResponseCache } from "../../cache/response_cache";
import { getLogger } from "../../util/logger";
import { errorMessage } from "../../util/result";
import { SourceUnavailable } from "../domain/errors";
import type { NormalizedResult, SearchItem, SearchResult } from "../domain/types";
import type { FetchOptions, SearchAdapter, SearchParams } from "./contracts";
import {
  HttpStatusError,
  isTransient,
  RetryExhaustedError,
  sleep,
  withRetry,
  type Sleep,
} from "./retry";
import { searchResultSchema, tavilyResponseSchema } from "./schemas";

export const SEARCH_SOURCE = "search";
const SOURCE_LABEL = "Web search";
const DEFAULT_BASE_URL = "https://api.tavily.com";
const DEFAULT_MAX_RESULTS = 5;
const QUERY_BATCH_SIZE = 3;

export interface TavilySearchAdapterOptions {
  apiKey: string;
  cache: ResponseCache;
  fetchFn?: typeof fetch;
  baseUrl?: string;
  retryDelayMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

export function defaultQueries(ticker: string, companyName?: string): string[] {
  const name = companyName?.trim() || ticker;
  const subject = name === ticker ? ticker : `${name} (${ticker})`;
  return [
    `${subject} latest quarterly earnings results`,
    `${subject} analyst outlook and price target`,
    `${subject} competitors and market share`,
    `${subject} growth strategy and new products`,
    `${subject} key risks and challenges`,
  ];
}

/**
 * Merges per-query results in query order, dropping repeated URLs and titles.
 */
export function mergeSearchItems(batches: SearchItem[][]): SearchItem[] {
  const seenUrls = new Set<string>();
  const seenTitles = new Set<string>();
  const merged: SearchItem[] = [];
  for (const items of batches) {
    for (const item of items) {
      const url = item.url.trim();
      const title = item.title.trim().toLowerCase();
      if (!url || seenUrls.has(url)) continue;
      if (title && seenTitles.has(title)) continue;
      seenUrls.add(url);
      if (title) seenTitles.add(title);
      merged.push(item);
    }
  }
  return merged;
}

type QueryFailure = { query: string; ok: false; error: string };
type QueryOutcome = { query: string; ok: true; items: SearchItem[] } | QueryFailure;

export function createTavilySearchAdapter(
  options: TavilySearchAdapterOptions
): SearchAdapter {
  const fetchFn = options.fetchFn ?? fetch;
  const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
  const retryDelayMs = options.retryDelayMs ?? 500;
  const wait = options.sleep ?? sleep;
  const log = options.logger ?? getLogger("search-adapter");
  const { cache } = options;

  async function callTavily(
    query: string,
    maxResults: number,
    signal?: AbortSignal
  ): Promise<SearchItem[]> {
    const response = await fetchFn(`${baseUrl}/search`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${options.apiKey}`,
      },
      body: JSON.stringify({
        query,
        search_depth: "advanced",
        max_results: maxResults,
        include_answer: false,
      }),
      signal,
    });
    if (!response.ok) {
      throw new HttpStatusError(
        response.status,
        `Tavily responded ${response.status} ${response.statusText}`.trim()
      );
    }
    const parsed = tavilyResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new SyntaxError(`Unexpected Tavily payload: ${parsed.error.message}`);
    }
    return parsed.data.results.map((r) => ({
      title: r.title,
      url: r.url,
      snippet: r.content,
      ...(r.published_date ? { publishedAt: r.published_date } : {}),
    }));
  }

  async function runQuery(
    query: string,
    maxResults: number,
    signal?: AbortSignal
  ): Promise<QueryOutcome> {
    try {
      const items = await withRetry(() => callTavily(query, maxResults, signal), {
        attempts: 2,
        baseDelayMs: retryDelayMs,
        sleep: wait,
        signal,
        shouldRetry: (error) => isTransient(error),
        onRetry: (error) =>
          log.warn({ query, error: errorMessage(error) }, "Search query failed; retrying"),
      });
      return { query, ok: true, items };
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      log.warn({ query, error: errorMessage(cause) }, "Search query failed");
      return { query, ok: false, error: errorMessage(cause) };
    }
  }

  return {
    source: SEARCH_SOURCE,
    async fetch(
      ticker: string,
      params: Partial<SearchParams> = {},
      fetchOptions: FetchOptions = {}
    ): Promise<NormalizedResult<SearchResult>> {
      const queries = params.queries?.length
        ? params.queries
        : defaultQueries(ticker, params.companyName);
      const maxResults = params.maxResults ?? DEFAULT_MAX_RESULTS;
      const key = cache.key(ticker, SEARCH_SOURCE, { queries, maxResults });

      const cached = searchResultSchema.safeParse(await cache.get(key));
      if (cached.success) {
        log.debug({ ticker, fingerprint: key.fingerprint }, "Search cache hit");
        return { status: "ok", data: cached.data };
      }

      const outcomes: QueryOutcome[] = [];
      for (let i = 0; i < queries.length; i += QUERY_BATCH_SIZE) {
        const batch = queries.slice(i, i + QUERY_BATCH_SIZE);
        outcomes.push(
          ...(await Promise.all(
            batch.map((q) => runQuery(q, maxResults, fetchOptions.signal))
          ))
        );
      }

      const failed = outcomes.filter((o): o is QueryFailure => !o.ok);
      const items = mergeSearchItems(
        outcomes.map((o) => (o.ok ? o.items : []))
      );
      const data: SearchResult = { queries, items };

      if (failed.length === outcomes.length) {
        const reason = failed[0]?.error ?? "no queries were run";
        const error = new SourceUnavailable(SOURCE_LABEL, reason);
        return { status: "unavailable", notice: error.message, error };
      }
      if (failed.length > 0) {
        return {
          status: "degraded",
          data,
          notice: `${SOURCE_LABEL} partially unavailable: ${failed.length} of ${outcomes.length} queries failed`,
        };
      }

      await cache.put(key, data);
      log.info({ ticker, queries: queries.length, items: items.length }, "Search completed");
      return { status: "ok", data };
    },
  };
}
