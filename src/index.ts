export { createServices, type AppServices } from "./bootstrap";
export { loadAppConfig, type AppConfig } from "./reporting/config";
export {
  generateInvestmentReport,
  type GenerateInvestmentReportInput,
  type GenerateInvestmentReportOutput,
  type ProgressEvent,
  type ProgressStage,
  type ReportPipelineDependencies,
} from "./reporting/application/generate_investment_report";
export { assembleReport, toMarkdown } from "./reporting/application/report_assembler";
export { buildSectionPrompt, buildSources } from "./reporting/application/prompt_assembler";
export * from "./reporting/domain/errors";
export * from "./reporting/domain/sections";
export type * from "./reporting/domain/types";
export type * from "./reporting/infrastructure/contracts";
export { createTavilySearchAdapter } from "./reporting/infrastructure/search_adapter";
export {
  createFinancialAdapter,
  type MarketDataClient,
} from "./reporting/infrastructure/financial_adapter";
export { createLlmClient } from "./reporting/infrastructure/llm_client";
export { createPdfRenderer } from "./reporting/rendering/pdf_renderer";
export { artifactTarget, createFileArtifactWriter } from "./reporting/rendering/artifact_writer";
export { ResponseCache } from "./cache/response_cache";
export { MemoryCacheStore, type CacheStore, type CacheRecord } from "./cache/cache_store";
export { DynamoCacheStore } from "./cache/dynamo_cache_store";
export { createCacheStore } from "./cache/create_cache_store";
export { parseTicker } from "./market/ticker";
export { PRESET_TICKERS } from "./market/tickers";
