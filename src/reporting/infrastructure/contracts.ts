import type { Result } from "../../util/result";
import type {
  FinancialSnapshot,
  NormalizedResult,
  Report,
  SearchResult,
  SectionPrompt,
} from "../domain/types";

export interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * A remote data source behind the cache. Provider failures come back as
 * `unavailable` or `degraded`, never as exceptions.
 */
export interface DataSourceAdapter<TParams, TData> {
  readonly source: string;
  fetch(
    ticker: string,
    params?: Partial<TParams>,
    options?: FetchOptions
  ): Promise<NormalizedResult<TData>>;
}

export interface SearchParams {
  queries: string[];
  maxResults: number;
  companyName: string;
}

export interface FinancialParams {
  historyDays: number;
}

export type SearchAdapter = DataSourceAdapter<SearchParams, SearchResult>;
export type FinancialAdapter = DataSourceAdapter<FinancialParams, FinancialSnapshot>;

export interface LlmGenerateOptions {
  signal?: AbortSignal;
}

/** Attempts made, reported with both outcomes. */
export interface LlmCallMeta {
  attempts: number;
}

export interface LlmClient {
  generate(
    prompt: SectionPrompt,
    options?: LlmGenerateOptions
  ): Promise<Result<string, LlmCallMeta>>;
}

export interface DocumentRenderer {
  render(report: Report, markdown: string): Promise<Uint8Array>;
}

export interface ArtifactTarget {
  pdfPath: string;
  markdownPath: string;
}

export interface ArtifactWriter {
  write(
    target: ArtifactTarget,
    artifacts: { pdfBytes: Uint8Array; markdown: string },
    options?: FetchOptions
  ): Promise<void>;
}
