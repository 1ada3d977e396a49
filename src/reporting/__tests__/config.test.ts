import path from "path";
import { loadAppConfig } from "../config";
import { ConfigurationError } from "../domain/errors";

const KEYS = [
  "LLM_PROVIDER",
  "LLM_MODEL",
  "LLM_API_KEY",
  "TAVILY_API_KEY",
  "CACHE_URL",
  "CACHE_TTL_SECONDS",
  "OUTPUT_DIR",
  "SECTION_CONCURRENCY",
  "LLM_TIMEOUT_MS",
  "LLM_MAX_ATTEMPTS",
  "PIPELINE_TIMEOUT_MS",
  "PORT",
  "LANGFUSE_PUBLIC_KEY",
  "LANGFUSE_SECRET_KEY",
  "LANGFUSE_HOST",
];

describe("loadAppConfig", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv, APP_STAGE: "dev" };
    for (const key of KEYS) {
      delete process.env[key];
      delete process.env[`${key}__dev`];
    }
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("lists every missing required variable", () => {
    process.env.TAVILY_API_KEY = "test-tavily";
    expect(() => loadAppConfig()).toThrow(
      "Missing required environment variables: LLM_API_KEY, CACHE_URL"
    );
    expect(() => loadAppConfig()).toThrow(ConfigurationError);
  });

  it("applies defaults", () => {
    process.env.LLM_API_KEY = "test-key";
    process.env.TAVILY_API_KEY = "test-tavily";
    process.env.CACHE_URL = "memory://";

    const cfg = loadAppConfig();

    expect(cfg.ai.provider).toBe("google");
    expect(cfg.ai.apiKey).toBe("test-key");
    expect(cfg.ai.timeoutMs).toBe(60000);
    expect(cfg.ai.maxAttempts).toBe(3);
    expect(cfg.cacheTtlSeconds).toBe(3600);
    expect(cfg.outputDir).toBe(path.resolve("./generated_reports"));
    expect(cfg.sectionConcurrency).toBe(3);
    expect(cfg.pipelineTimeoutMs).toBe(900000);
    expect(cfg.port).toBe(3000);
    expect(cfg.ai.langfuse).toBeUndefined();
  });

  it("carries Langfuse keys on the AI settings", () => {
    process.env.LLM_API_KEY = "test-key";
    process.env.TAVILY_API_KEY = "test-tavily";
    process.env.CACHE_URL = "memory://";
    process.env.LANGFUSE_PUBLIC_KEY = "pk-test";
    process.env.LANGFUSE_SECRET_KEY = "test-secret";
    expect(loadAppConfig().ai.langfuse).toEqual({
      publicKey: "pk-test",
      secretKey: "test-secret",
      baseUrl: undefined,
    });
  });

  it("prefers stage-specific values", () => {
    process.env.LLM_API_KEY = "test-key";
    process.env.LLM_API_KEY__dev = "test-dev-key";
    process.env.TAVILY_API_KEY = "test-tavily";
    process.env.CACHE_URL = "memory://";
    expect(loadAppConfig().ai.apiKey).toBe("test-dev-key");
  });

  it("rejects non-positive concurrency", () => {
    process.env.LLM_API_KEY = "test-key";
    process.env.TAVILY_API_KEY = "test-tavily";
    process.env.CACHE_URL = "memory://";
    process.env.SECTION_CONCURRENCY = "0";
    expect(() => loadAppConfig()).toThrow(
      "SECTION_CONCURRENCY must be a positive number, got 0"
    );
  });
});
