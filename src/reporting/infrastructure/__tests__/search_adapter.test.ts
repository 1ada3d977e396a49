import { MemoryCacheStore } from "../../../cache/cache_store";
import { ResponseCache } from "../../../cache/response_cache";
import {
  createTavilySearchAdapter,
  defaultQueries,
  mergeSearchItems,
} from "../search_adapter";

function jsonResponse(status: number, body: unknown, statusText = "") {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    json: async () => body,
  } as unknown as Response;
}

function tavily(results: Array<{ title: string; url: string; content?: string }>) {
  return {
    results: results.map((r) => ({ content: "", ...r, score: 0.9 })),
  };
}

function setup(fetchFn: jest.Mock) {
  const cache = new ResponseCache({ store: new MemoryCacheStore() });
  const sleep = jest.fn(async (_ms: number) => undefined);
  const adapter = createTavilySearchAdapter({
    apiKey: "test-secret",
    cache,
    fetchFn,
    sleep,
  });
  return { adapter, sleep };
}

function requestBody(fetchFn: jest.Mock, call: number): Record<string, unknown> {
  return JSON.parse(fetchFn.mock.calls[call][1].body);
}

describe("defaultQueries", () => {
  test("names the company and ticker", () => {
    const queries = defaultQueries("AAPL", "Apple Inc.");
    expect(queries).toHaveLength(5);
    expect(queries[0]).toBe("Apple Inc. (AAPL) latest quarterly earnings results");
  });

  test("falls back to the ticker alone", () => {
    expect(defaultQueries("MSFT")[4]).toBe("MSFT key risks and challenges");
  });
});

describe("mergeSearchItems", () => {
  test("keeps first occurrence across url and case-insensitive title", () => {
    const merged = mergeSearchItems([
      [
        { title: "Q3 Results", url: "https://a.example/1", snippet: "a" },
        { title: "Outlook", url: "https://a.example/2", snippet: "b" },
      ],
      [
        { title: "q3 results", url: "https://b.example/1", snippet: "c" },
        { title: "Other", url: "https://a.example/2", snippet: "d" },
        { title: "New", url: "https://b.example/3", snippet: "e" },
      ],
    ]);
    expect(merged.map((i) => i.url)).toEqual([
      "https://a.example/1",
      "https://a.example/2",
      "https://b.example/3",
    ]);
  });
});

describe("createTavilySearchAdapter", () => {
  test("runs each query as an advanced search and caches the merged result", async () => {
    const fetchFn = jest
      .fn()
      .mockResolvedValueOnce(
        jsonResponse(200, tavily([{ title: "One", url: "https://x.example/1", content: "alpha" }]))
      )
      .mockResolvedValueOnce(
        jsonResponse(
          200,
          tavily([
            { title: "ONE", url: "https://y.example/1" },
            { title: "Two", url: "https://x.example/2", content: "beta" },
          ])
        )
      );
    const { adapter } = setup(fetchFn);

    const first = await adapter.fetch("AAPL", { queries: ["q1", "q2"], maxResults: 3 });

    expect(first).toEqual({
      status: "ok",
      data: {
        queries: ["q1", "q2"],
        items: [
          { title: "One", url: "https://x.example/1", snippet: "alpha" },
          { title: "Two", url: "https://x.example/2", snippet: "beta" },
        ],
      },
    });
    expect(fetchFn.mock.calls[0][0]).toBe("https://api.tavily.com/search");
    expect(fetchFn.mock.calls[0][1].headers.Authorization).toBe("Bearer test-secret");
    expect(requestBody(fetchFn, 0)).toEqual({
      query: "q1",
      search_depth: "advanced",
      max_results: 3,
      include_answer: false,
    });

    const second = await adapter.fetch("AAPL", { queries: ["q1", "q2"], maxResults: 3 });
    expect(second).toEqual(first);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  test("uses the default queries when none are given", async () => {
    const fetchFn = jest.fn().mockImplementation(async () => jsonResponse(200, tavily([])));
    const { adapter } = setup(fetchFn);

    const result = await adapter.fetch("NVDA");

    expect(fetchFn).toHaveBeenCalledTimes(5);
    expect(result.status).toBe("ok");
    expect(requestBody(fetchFn, 4).query).toBe("NVDA key risks and challenges");
  });

  test("reports degraded data when some queries fail and skips the cache", async () => {
    const fetchFn = jest
      .fn()
      .mockResolvedValueOnce(jsonResponse(200, tavily([{ title: "A", url: "https://a.example" }])))
      .mockResolvedValueOnce(jsonResponse(400, {}, "Bad Request"))
      .mockResolvedValueOnce(jsonResponse(200, tavily([{ title: "A", url: "https://a.example" }])))
      .mockResolvedValueOnce(jsonResponse(400, {}, "Bad Request"));
    const { adapter, sleep } = setup(fetchFn);

    const result = await adapter.fetch("AAPL", { queries: ["good", "bad"] });

    expect(result).toEqual({
      status: "degraded",
      data: {
        queries: ["good", "bad"],
        items: [{ title: "A", url: "https://a.example", snippet: "" }],
      },
      notice: "Web search partially unavailable: 1 of 2 queries failed",
    });
    expect(sleep).not.toHaveBeenCalled();

    await adapter.fetch("AAPL", { queries: ["good", "bad"] });
    expect(fetchFn).toHaveBeenCalledTimes(4);
  });

  test("retries transient failures once and then reports unavailable", async () => {
    const fetchFn = jest
      .fn()
      .mockImplementation(async () => jsonResponse(503, {}, "Service Unavailable"));
    const { adapter, sleep } = setup(fetchFn);

    const result = await adapter.fetch("AAPL", { queries: ["only"] });

    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(500);
    expect(result.status).toBe("unavailable");
    expect(result.status === "unavailable" && result.notice).toBe(
      "Web search unavailable: Tavily responded 503 Service Unavailable"
    );
  });

  test("treats network errors as transient", async () => {
    const fetchFn = jest
      .fn()
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(jsonResponse(200, tavily([])));
    const { adapter } = setup(fetchFn);

    const result = await adapter.fetch("AAPL", { queries: ["q"] });

    expect(result.status).toBe("ok");
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });
});
