import { createHash } from "crypto";
import type { Logger } from "pino";
import { getLogger } from "../util/logger";
import { errorMessage } from "../util/result";
import type { CacheStats, CacheStore } from "./cache_store";

export const DEFAULT_CACHE_NAMESPACE = "equity-report:v1";
export const DEFAULT_CACHE_TTL_SECONDS = 3600;

export interface CacheKey {
  fingerprint: string;
  ticker: string;
  source: string;
}

export interface ResponseCacheOptions {
  store: CacheStore;
  ttlSeconds?: number;
  namespace?: string;
  now?: () => number;
  logger?: Logger;
}

/**
 * JSON with object keys sorted at every depth; arrays keep their order.
 */
export function stableJson(value: unknown): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value) ?? "null";
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableJson(item)).join(",")}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${stableJson(v)}`);
  return `{${entries.join(",")}}`;
}

/**
 * Read-through cache for provider responses.
 *
 * Fails open: store errors are logged and behave like a miss.
 */
export class ResponseCache {
  private readonly store: CacheStore;
  private readonly ttlSeconds: number;
  private readonly namespace: string;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(options: ResponseCacheOptions) {
    this.store = options.store;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
    this.namespace = options.namespace ?? DEFAULT_CACHE_NAMESPACE;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? getLogger("cache");
  }

  fingerprint(ticker: string, source: string, params: unknown): string {
    const digest = createHash("sha256").update(stableJson(params)).digest("hex");
    return `${this.namespace}:${source}:${ticker.toUpperCase()}:${digest}`;
  }

  key(ticker: string, source: string, params: unknown): CacheKey {
    return {
      fingerprint: this.fingerprint(ticker, source, params),
      ticker: ticker.toUpperCase(),
      source,
    };
  }

  async get(key: CacheKey): Promise<unknown | undefined> {
    try {
      const record = await this.store.read(key.fingerprint);
      if (!record) return undefined;
      if (this.now() >= record.createdAt + record.ttlSeconds * 1000) {
        this.log.debug({ fingerprint: key.fingerprint }, "Cache entry expired");
        await this.evict(key.fingerprint);
        return undefined;
      }
      return record.payload;
    } catch (error) {
      this.log.warn(
        { fingerprint: key.fingerprint, error: errorMessage(error) },
        "Cache read failed; treating as miss"
      );
      return undefined;
    }
  }

  async put(key: CacheKey, payload: unknown, ttlSeconds?: number): Promise<void> {
    try {
      await this.store.write({
        fingerprint: key.fingerprint,
        ticker: key.ticker,
        source: key.source,
        payload,
        createdAt: this.now(),
        ttlSeconds: ttlSeconds ?? this.ttlSeconds,
      });
    } catch (error) {
      this.log.warn(
        { fingerprint: key.fingerprint, error: errorMessage(error) },
        "Cache write failed; continuing without cache"
      );
    }
  }

  /** Removes every cached response for one ticker. */
  async clear(ticker: string): Promise<number> {
    const symbol = ticker.toUpperCase();
    try {
      const removed = await this.store.removeTicker(symbol);
      this.log.info({ ticker: symbol, removed }, "Cleared cached responses");
      return removed;
    } catch (error) {
      this.log.warn(
        { ticker: symbol, error: errorMessage(error) },
        "Cache clear failed"
      );
      return 0;
    }
  }

  /** Removes every cached response. */
  async clearAll(): Promise<number> {
    try {
      const removed = await this.store.removeAll();
      this.log.info({ removed }, "Cleared all cached responses");
      return removed;
    } catch (error) {
      this.log.warn({ error: errorMessage(error) }, "Cache clear failed");
      return 0;
    }
  }

  /** Entry counts per source and per ticker. Store errors propagate. */
  async stats(): Promise<CacheStats> {
    return this.store.stats();
  }

  private async evict(fingerprint: string): Promise<void> {
    try {
      await this.store.remove(fingerprint);
    } catch (error) {
      this.log.warn({ fingerprint, error: errorMessage(error) }, "Cache eviction failed");
    }
  }
}
