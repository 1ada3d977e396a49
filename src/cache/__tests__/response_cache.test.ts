import { MemoryCacheStore, type CacheStore } from "../cache_store";
import { ResponseCache, stableJson } from "../response_cache";

function createClock(start = 1_700_000_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe("stableJson", () => {
  test("sorts keys at every depth and keeps array order", () => {
    expect(stableJson({ b: 1, a: { d: [3, 1], c: "x" } })).toBe(
      '{"a":{"c":"x","d":[3,1]},"b":1}'
    );
  });

  test("drops undefined properties", () => {
    expect(stableJson({ a: undefined, b: null })).toBe('{"b":null}');
  });
});

describe("ResponseCache", () => {
  test("fingerprint is deterministic and independent of key order", () => {
    const cache = new ResponseCache({ store: new MemoryCacheStore() });
    const a = cache.fingerprint("aapl", "search", { q: ["x"], n: 5 });
    const b = cache.fingerprint("AAPL", "search", { n: 5, q: ["x"] });
    expect(a).toBe(b);
    expect(a).toMatch(/^equity-report:v1:search:AAPL:[0-9a-f]{64}$/);
    expect(cache.fingerprint("AAPL", "financial", { n: 5, q: ["x"] })).not.toBe(a);
  });

  test("returns the payload within ttl and nothing after", async () => {
    const clock = createClock();
    const cache = new ResponseCache({
      store: new MemoryCacheStore(),
      ttlSeconds: 60,
      now: clock.now,
    });
    const key = cache.key("MSFT", "search", { q: 1 });
    await cache.put(key, { items: [1, 2] });

    clock.advance(59_999);
    expect(await cache.get(key)).toEqual({ items: [1, 2] });

    clock.advance(1);
    expect(await cache.get(key)).toBeUndefined();
  });

  test("drops an expired record from the store on read", async () => {
    const clock = createClock();
    const store = new MemoryCacheStore();
    const cache = new ResponseCache({ store, ttlSeconds: 3600, now: clock.now });
    const stale = cache.key("MSFT", "search", { q: 1 });
    await cache.put(stale, "old", 60);
    await cache.put(cache.key("MSFT", "search", { q: 2 }), "fresh");

    clock.advance(60_000);
    expect(await cache.get(stale)).toBeUndefined();
    expect(store.size()).toBe(1);
    await expect(store.read(stale.fingerprint)).resolves.toBeUndefined();
  });

  test("per-entry ttl overrides the default", async () => {
    const clock = createClock();
    const cache = new ResponseCache({
      store: new MemoryCacheStore(),
      ttlSeconds: 3600,
      now: clock.now,
    });
    const key = cache.key("MSFT", "financial", {});
    await cache.put(key, "short", 1);
    clock.advance(1000);
    expect(await cache.get(key)).toBeUndefined();
  });

  test("later writes win", async () => {
    const cache = new ResponseCache({ store: new MemoryCacheStore() });
    const key = cache.key("NVDA", "search", {});
    await cache.put(key, "first");
    await cache.put(key, "second");
    expect(await cache.get(key)).toBe("second");
  });

  test("clear removes only the given ticker", async () => {
    const store = new MemoryCacheStore();
    const cache = new ResponseCache({ store });
    const aapl = cache.key("AAPL", "search", {});
    const msft = cache.key("MSFT", "search", {});
    await cache.put(aapl, 1);
    await cache.put(cache.key("AAPL", "financial", {}), 2);
    await cache.put(msft, 3);

    expect(await cache.clear("aapl")).toBe(2);
    expect(await cache.get(aapl)).toBeUndefined();
    expect(await cache.get(msft)).toBe(3);
    expect(store.size()).toBe(1);
  });

  test("store failures are treated as misses", async () => {
    const broken: CacheStore = {
      read: jest.fn().mockRejectedValue(new Error("connection refused")),
      write: jest.fn().mockRejectedValue(new Error("connection refused")),
      remove: jest.fn().mockRejectedValue(new Error("connection refused")),
      removeTicker: jest.fn().mockRejectedValue(new Error("connection refused")),
      removeAll: jest.fn().mockRejectedValue(new Error("connection refused")),
      stats: jest.fn().mockRejectedValue(new Error("connection refused")),
    };
    const cache = new ResponseCache({ store: broken });
    const key = cache.key("AAPL", "search", {});

    await expect(cache.put(key, "x")).resolves.toBeUndefined();
    await expect(cache.get(key)).resolves.toBeUndefined();
    await expect(cache.clear("AAPL")).resolves.toBe(0);
    await expect(cache.clearAll()).resolves.toBe(0);
    await expect(cache.stats()).rejects.toThrow("connection refused");
  });

  test("an expired record whose removal fails still reads as a miss", async () => {
    const clock = createClock();
    const store: CacheStore = {
      read: jest.fn().mockResolvedValue({
        fingerprint: "f",
        ticker: "AAPL",
        source: "search",
        payload: "old",
        createdAt: clock.now() - 10_000,
        ttlSeconds: 5,
      }),
      write: jest.fn(),
      remove: jest.fn().mockRejectedValue(new Error("throttled")),
      removeTicker: jest.fn(),
      removeAll: jest.fn(),
      stats: jest.fn(),
    };
    const cache = new ResponseCache({ store, now: clock.now });

    await expect(cache.get(cache.key("AAPL", "search", {}))).resolves.toBeUndefined();
    expect(store.remove).toHaveBeenCalledTimes(1);
  });

  test("clearAll empties the store and stats count what remains", async () => {
    const store = new MemoryCacheStore();
    const cache = new ResponseCache({ store });
    await cache.put(cache.key("AAPL", "search", { q: 1 }), 1);
    await cache.put(cache.key("AAPL", "financial", {}), 2);
    await cache.put(cache.key("0700.hk", "search", { q: 1 }), 3);

    await expect(cache.stats()).resolves.toEqual({
      total: 3,
      bySource: { search: 2, financial: 1 },
      byTicker: { AAPL: 2, "0700.HK": 1 },
    });
    await expect(cache.clearAll()).resolves.toBe(3);
    await expect(cache.stats()).resolves.toEqual({ total: 0, bySource: {}, byTicker: {} });
    expect(store.size()).toBe(0);
  });
});
