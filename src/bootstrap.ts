/**
 * Composition root: builds every collaborator once from an AppConfig.
 */
import { createAiClient } from "./ai/client";
import { createLangfuseTracer, type Tracer } from "./ai/telemetry/langfuse";
import { createCacheStore } from "./cache/create_cache_store";
import { ResponseCache } from "./cache/response_cache";
import type { AppConfig } from "./reporting/config";
import type { ReportPipelineDependencies } from "./reporting/application/generate_investment_report";
import { createFinancialAdapter } from "./reporting/infrastructure/financial_adapter";
import { createLlmClient } from "./reporting/infrastructure/llm_client";
import { createTavilySearchAdapter } from "./reporting/infrastructure/search_adapter";
import { createYahooFinanceClient } from "./reporting/infrastructure/yahoo_finance_client";
import { createFileArtifactWriter } from "./reporting/rendering/artifact_writer";
import { createPdfRenderer } from "./reporting/rendering/pdf_renderer";

export interface AppServices {
  config: AppConfig;
  cache: ResponseCache;
  tracer: Tracer;
  pipeline: ReportPipelineDependencies;
}

export function createServices(config: AppConfig): AppServices {
  const cache = new ResponseCache({
    store: createCacheStore(config.cacheUrl),
    ttlSeconds: config.cacheTtlSeconds,
  });
  const tracer = createLangfuseTracer(config.ai.langfuse);

  return {
    config,
    cache,
    tracer,
    pipeline: {
      search: createTavilySearchAdapter({ apiKey: config.tavilyApiKey, cache }),
      financial: createFinancialAdapter({ client: createYahooFinanceClient(), cache }),
      llm: createLlmClient({
        ai: createAiClient(config.ai, tracer),
        timeoutMs: config.ai.timeoutMs,
        maxAttempts: config.ai.maxAttempts,
      }),
      renderer: createPdfRenderer(),
      writer: createFileArtifactWriter(),
      outputDir: config.outputDir,
      sectionConcurrency: config.sectionConcurrency,
      pipelineTimeoutMs: config.pipelineTimeoutMs,
    },
  };
}
