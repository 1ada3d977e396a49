/**
 * Financial data adapter: company profile, key statistics, annual statements
 * and weekly price history for one ticker.
 */
import type { Logger } from "pino";
import type { ResponseCache } from "../../cache/response_cache";
import { getLogger } from "../../util/logger";
import { errorMessage } from "../../util/result";
import { SourceUnavailable } from "../domain/errors";
import type {
  CompanyProfile,
  FinancialSnapshot,
  NormalizedResult,
  PricePoint,
  StatementPeriod,
  StatementType,
} from "../domain/types";
import type { FetchOptions, FinancialAdapter, FinancialParams } from "./contracts";
import { isTransient, RetryExhaustedError, sleep, withRetry, type Sleep } from "./retry";
import {
  chartSchema,
  financialSnapshotSchema,
  fundamentalsSchema,
  quoteSummarySchema,
  type FundamentalsRow,
  type QuoteSummary,
} from "./schemas";

export const FINANCIAL_SOURCE = "financial";
const SOURCE_LABEL = "Financial data";
const DEFAULT_HISTORY_DAYS = 365;
const STATEMENT_YEARS = 5;
const DAY_MS = 24 * 60 * 60 * 1000;

export type FundamentalsModule = "financials" | "balance-sheet" | "cash-flow";

/**
 * The calls the adapter needs from a market data provider. Payloads are
 * validated by the adapter, so implementations may return them untyped.
 */
export interface MarketDataClient {
  quoteSummary(symbol: string): Promise<unknown>;
  chart(symbol: string, options: { period1: Date; interval: "1wk" }): Promise<unknown>;
  fundamentals(
    symbol: string,
    options: { period1: Date; module: FundamentalsModule }
  ): Promise<unknown>;
}

const STATEMENT_MODULES: Record<StatementType, FundamentalsModule> = {
  income: "financials",
  balance: "balance-sheet",
  cashflow: "cash-flow",
};

const STATEMENT_LABELS: Record<StatementType, string> = {
  income: "income statement",
  balance: "balance sheet",
  cashflow: "cash-flow statement",
};

// label → [module, field]
const KEY_STAT_FIELDS: Array<[string, "summaryDetail" | "defaultKeyStatistics" | "financialData", string]> = [
  ["Market Cap", "summaryDetail", "marketCap"],
  ["Trailing P/E", "summaryDetail", "trailingPE"],
  ["Forward P/E", "summaryDetail", "forwardPE"],
  ["Dividend Yield", "summaryDetail", "dividendYield"],
  ["Beta", "summaryDetail", "beta"],
  ["52 Week High", "summaryDetail", "fiftyTwoWeekHigh"],
  ["52 Week Low", "summaryDetail", "fiftyTwoWeekLow"],
  ["Enterprise Value", "defaultKeyStatistics", "enterpriseValue"],
  ["Price/Book", "defaultKeyStatistics", "priceToBook"],
  ["EV/EBITDA", "defaultKeyStatistics", "enterpriseToEbitda"],
  ["Trailing EPS", "defaultKeyStatistics", "trailingEps"],
  ["Current Price", "financialData", "currentPrice"],
  ["Target Mean Price", "financialData", "targetMeanPrice"],
  ["Total Revenue", "financialData", "totalRevenue"],
  ["Revenue Growth", "financialData", "revenueGrowth"],
  ["Gross Margin", "financialData", "grossMargins"],
  ["Operating Margin", "financialData", "operatingMargins"],
  ["Profit Margin", "financialData", "profitMargins"],
  ["Return on Equity", "financialData", "returnOnEquity"],
  ["Debt/Equity", "financialData", "debtToEquity"],
  ["Free Cash Flow", "financialData", "freeCashflow"],
];

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function finiteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function toProfile(symbol: string, summary: QuoteSummary): CompanyProfile {
  const price = summary.price;
  const profile = summary.summaryProfile;
  const companyName = price?.longName || price?.shortName || symbol;
  return {
    companyName,
    ...(profile?.sector ? { sector: profile.sector } : {}),
    ...(profile?.industry ? { industry: profile.industry } : {}),
    ...(profile?.longBusinessSummary ? { summary: profile.longBusinessSummary } : {}),
    ...(price?.currency ? { currency: price.currency } : {}),
    ...(profile?.website ? { website: profile.website } : {}),
  };
}

export function toKeyStats(summary: QuoteSummary): Record<string, number | null> {
  const stats: Record<string, number | null> = {};
  for (const [label, module, field] of KEY_STAT_FIELDS) {
    stats[label] = finiteNumber(summary[module]?.[field]);
  }
  return stats;
}

/** One period per row, newest first; non-numeric fields are dropped. */
export function toStatement(rows: FundamentalsRow[]): StatementPeriod[] {
  return rows
    .map((row) => {
      const values: Record<string, number> = {};
      for (const [field, value] of Object.entries(row)) {
        if (field === "date") continue;
        const n = finiteNumber(value);
        if (n !== null) values[field] = n;
      }
      return { period: isoDate(row.date), values };
    })
    .filter((p) => Object.keys(p.values).length > 0)
    .sort((a, b) => (a.period < b.period ? 1 : a.period > b.period ? -1 : 0));
}

export function toPricePoints(quotes: Array<{ date: Date; close?: number | null; volume?: number | null }>): PricePoint[] {
  const points: PricePoint[] = [];
  for (const q of quotes) {
    if (q.close == null) continue;
    points.push({ date: isoDate(q.date), close: q.close, volume: q.volume ?? null });
  }
  return points;
}

export interface YahooFinancialAdapterOptions {
  client: MarketDataClient;
  cache: ResponseCache;
  now?: () => Date;
  retryDelayMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

// Yahoo reports unknown or delisted symbols as plain errors with these messages
const PERMANENT_MARKET_ERROR = /not found|no data|delisted/i;

export function isTransientMarketError(error: unknown): boolean {
  if (error instanceof Error && PERMANENT_MARKET_ERROR.test(error.message)) return false;
  return isTransient(error);
}

type PartOutcome<T> = { ok: true; value: T } | { ok: false; error: string };

export function createFinancialAdapter(
  options: YahooFinancialAdapterOptions
): FinancialAdapter {
  const { client, cache } = options;
  const now = options.now ?? (() => new Date());
  const retryDelayMs = options.retryDelayMs ?? 500;
  const wait = options.sleep ?? sleep;
  const log = options.logger ?? getLogger("financial-adapter");

  async function part<T>(
    label: string,
    call: () => Promise<unknown>,
    parse: (raw: unknown) => T,
    signal?: AbortSignal
  ): Promise<PartOutcome<T>> {
    try {
      const raw = await withRetry(call, {
        attempts: 2,
        baseDelayMs: retryDelayMs,
        sleep: wait,
        signal,
        shouldRetry: isTransientMarketError,
        onRetry: (error) =>
          log.warn({ part: label, error: errorMessage(error) }, "Financial call failed; retrying"),
      });
      return { ok: true, value: parse(raw) };
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      log.warn({ part: label, error: errorMessage(cause) }, "Financial data part unavailable");
      return { ok: false, error: errorMessage(cause) };
    }
  }

  return {
    source: FINANCIAL_SOURCE,
    async fetch(
      ticker: string,
      params: Partial<FinancialParams> = {},
      fetchOptions: FetchOptions = {}
    ): Promise<NormalizedResult<FinancialSnapshot>> {
      const historyDays = params.historyDays ?? DEFAULT_HISTORY_DAYS;
      const key = cache.key(ticker, FINANCIAL_SOURCE, { historyDays });

      const cached = financialSnapshotSchema.safeParse(await cache.get(key));
      if (cached.success) {
        log.debug({ ticker, fingerprint: key.fingerprint }, "Financial cache hit");
        return { status: "ok", data: cached.data };
      }

      const signal = fetchOptions.signal;
      const today = now();
      const chartStart = new Date(today.getTime() - historyDays * DAY_MS);
      const statementStart = new Date(today.getTime() - STATEMENT_YEARS * 365 * DAY_MS);

      const statementTypes: StatementType[] = ["income", "balance", "cashflow"];
      const statementsPending = Promise.all(
        statementTypes.map((type) =>
          part(
            STATEMENT_LABELS[type],
            () =>
              client.fundamentals(ticker, {
                period1: statementStart,
                module: STATEMENT_MODULES[type],
              }),
            (raw) => toStatement(fundamentalsSchema.parse(raw)),
            signal
          )
        )
      );
      const [summary, chart, statements] = await Promise.all([
        part(
          "quote summary",
          () => client.quoteSummary(ticker),
          (raw) => quoteSummarySchema.parse(raw),
          signal
        ),
        part(
          "price history",
          () => client.chart(ticker, { period1: chartStart, interval: "1wk" }),
          (raw) => chartSchema.parse(raw),
          signal
        ),
        statementsPending,
      ]);

      if (!summary.ok) {
        const error = new SourceUnavailable(SOURCE_LABEL, summary.error);
        return { status: "unavailable", notice: error.message, error };
      }

      const missing: string[] = [];
      const snapshot: FinancialSnapshot = {
        ticker,
        profile: toProfile(ticker, summary.value),
        keyStats: toKeyStats(summary.value),
        statements: {},
        marketData: [],
      };
      if (chart.ok) {
        snapshot.marketData = toPricePoints(chart.value.quotes);
        const currency = chart.value.meta?.currency;
        if (!snapshot.profile.currency && currency) snapshot.profile.currency = currency;
      } else {
        missing.push("price history");
      }
      statementTypes.forEach((type, index) => {
        const outcome = statements[index];
        if (outcome?.ok) {
          snapshot.statements[type] = outcome.value;
        } else {
          missing.push(STATEMENT_LABELS[type]);
        }
      });

      if (missing.length > 0) {
        return {
          status: "degraded",
          data: snapshot,
          notice: `${SOURCE_LABEL} partially unavailable: missing ${missing.join(", ")}`,
        };
      }

      await cache.put(key, snapshot);
      log.info(
        { ticker, prices: snapshot.marketData.length },
        "Financial data fetched"
      );
      return { status: "ok", data: snapshot };
    },
  };
}
