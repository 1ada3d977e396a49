import NodeCache from "node-cache";

/**
 * One cached provider response. `payload` is plain JSON.
 */
export interface CacheRecord {
  fingerprint: string;
  ticker: string;
  source: string;
  payload: unknown;
  createdAt: number; // epoch ms
  ttlSeconds: number;
}

export interface CacheStats {
  total: number;
  bySource: Record<string, number>;
  byTicker: Record<string, number>;
}

export function emptyStats(): CacheStats {
  return { total: 0, bySource: {}, byTicker: {} };
}

export function countRecord(stats: CacheStats, entry: { ticker: string; source: string }): void {
  stats.total += 1;
  stats.bySource[entry.source] = (stats.bySource[entry.source] ?? 0) + 1;
  stats.byTicker[entry.ticker] = (stats.byTicker[entry.ticker] ?? 0) + 1;
}

/**
 * Persistence behind ResponseCache. Expiry is decided by the caller from
 * `createdAt` + `ttlSeconds`; stores may also evict on their own.
 */
export interface CacheStore {
  read(fingerprint: string): Promise<CacheRecord | undefined>;
  write(record: CacheRecord): Promise<void>;
  remove(fingerprint: string): Promise<void>;
  /** Deletes every record of one ticker and returns how many were removed. */
  removeTicker(ticker: string): Promise<number>;
  /** Deletes every cached record and returns how many were removed. */
  removeAll(): Promise<number>;
  stats(): Promise<CacheStats>;
}

export class MemoryCacheStore implements CacheStore {
  private readonly cache: NodeCache;

  constructor() {
    // No background timer: expired keys are dropped lazily on access
    this.cache = new NodeCache({ stdTTL: 0, checkperiod: 0, useClones: false });
  }

  async read(fingerprint: string): Promise<CacheRecord | undefined> {
    return this.cache.get<CacheRecord>(fingerprint);
  }

  async write(record: CacheRecord): Promise<void> {
    this.cache.set(record.fingerprint, record, record.ttlSeconds);
  }

  async remove(fingerprint: string): Promise<void> {
    this.cache.del(fingerprint);
  }

  async removeTicker(ticker: string): Promise<number> {
    const keys = this.cache
      .keys()
      .filter((key) => this.cache.get<CacheRecord>(key)?.ticker === ticker);
    return this.cache.del(keys);
  }

  async removeAll(): Promise<number> {
    const count = this.cache.keys().length;
    this.cache.flushAll();
    return count;
  }

  async stats(): Promise<CacheStats> {
    const stats = emptyStats();
    for (const key of this.cache.keys()) {
      // get() drops keys whose own TTL has lapsed
      const record = this.cache.get<CacheRecord>(key);
      if (record) countRecord(stats, record);
    }
    return stats;
  }

  size(): number {
    return this.cache.keys().length;
  }
}
