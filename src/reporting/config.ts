import path from "path";
import { loadAiConfig, type AiConfig } from "../ai/config";
import { getNumber, getString } from "../util/env";
import { ConfigurationError } from "./domain/errors";

export interface AppConfig {
  ai: AiConfig & { apiKey: string };
  tavilyApiKey: string;
  cacheUrl: string;
  cacheTtlSeconds: number;
  outputDir: string;
  sectionConcurrency: number;
  pipelineTimeoutMs: number;
  port: number;
}

function positive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number, got ${value}`, {
      name,
    });
  }
  return value;
}

/**
 * Reads every setting once. All missing required variables are reported together.
 */
export function loadAppConfig(): AppConfig {
  const ai = loadAiConfig();
  const tavilyApiKey = getString("TAVILY_API_KEY");
  const cacheUrl = getString("CACHE_URL");

  const missing = [
    ai.apiKey ? undefined : "LLM_API_KEY",
    tavilyApiKey ? undefined : "TAVILY_API_KEY",
    cacheUrl ? undefined : "CACHE_URL",
  ].filter((name): name is string => name !== undefined);

  if (!ai.apiKey || !tavilyApiKey || !cacheUrl) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(", ")}`,
      { missing }
    );
  }

  return {
    ai: {
      ...ai,
      apiKey: ai.apiKey,
      timeoutMs: positive("LLM_TIMEOUT_MS", ai.timeoutMs),
      maxAttempts: Math.floor(positive("LLM_MAX_ATTEMPTS", ai.maxAttempts)),
    },
    tavilyApiKey,
    cacheUrl,
    cacheTtlSeconds: positive("CACHE_TTL_SECONDS", getNumber("CACHE_TTL_SECONDS", 3600)),
    outputDir: path.resolve(getString("OUTPUT_DIR", "./generated_reports")),
    sectionConcurrency: Math.floor(
      positive("SECTION_CONCURRENCY", getNumber("SECTION_CONCURRENCY", 3))
    ),
    pipelineTimeoutMs: positive(
      "PIPELINE_TIMEOUT_MS",
      getNumber("PIPELINE_TIMEOUT_MS", 900_000)
    ),
    port: getNumber("PORT", 3000),
  };
}
