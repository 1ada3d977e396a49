/**
 * Domain types for the investment thesis report.
 */
import type { SectionGenerationFailed, SourceUnavailable } from "./errors";
import type { SectionName } from "./sections";

export type Market = "US" | "HK" | "LSE" | "TSX" | "TSE" | "SSE" | "SZSE";

export interface Ticker {
  symbol: string;
  market: Market;
}

export interface SearchItem {
  title: string;
  url: string;
  snippet: string;
  publishedAt?: string;
}

export interface SearchResult {
  queries: string[];
  items: SearchItem[];
}

export type StatementType = "income" | "balance" | "cashflow";

export interface StatementPeriod {
  period: string; // YYYY-MM-DD
  values: Record<string, number>;
}

export interface PricePoint {
  date: string; // YYYY-MM-DD
  close: number;
  volume: number | null;
}

export interface CompanyProfile {
  companyName: string;
  sector?: string;
  industry?: string;
  summary?: string;
  currency?: string;
  website?: string;
}

export interface FinancialSnapshot {
  ticker: string;
  profile: CompanyProfile;
  keyStats: Record<string, number | null>;
  statements: Partial<Record<StatementType, StatementPeriod[]>>;
  marketData: PricePoint[];
}

/**
 * Canonical adapter output. `degraded` carries partial data plus a notice,
 * `unavailable` carries only the reason.
 */
export type NormalizedResult<T> =
  | { status: "ok"; data: T }
  | { status: "degraded"; data: T; notice: string }
  | { status: "unavailable"; notice: string; error: SourceUnavailable };

export interface Source {
  id: number;
  title: string;
  url: string;
}

export interface SectionPrompt {
  sectionName: SectionName;
  system: string;
  renderedText: string;
  sources: Source[];
}

export type SectionResult =
  | {
      sectionName: SectionName;
      status: "generated";
      bodyText: string;
      citations: Source[];
    }
  | {
      sectionName: SectionName;
      status: "failed";
      bodyText: string;
      citations: Source[];
      failure: SectionGenerationFailed;
    };

export interface ChartData {
  currency?: string;
  prices: PricePoint[];
  annual: Array<{ period: string; revenue?: number; netIncome?: number }>;
}

export interface Report {
  ticker: string;
  companyName: string;
  asOfDate: string;
  sections: SectionResult[];
  notices: string[];
  sources: Source[];
  chartData: ChartData;
}

export interface RenderedDocument {
  pdfPath: string;
  markdownPath: string;
  pdfBytes: Uint8Array;
  markdown: string;
}
