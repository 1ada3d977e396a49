import yahooFinance from "yahoo-finance2";
import type { FundamentalsModule, MarketDataClient } from "./financial_adapter";

const QUOTE_SUMMARY_MODULES = [
  "price",
  "summaryProfile",
  "summaryDetail",
  "defaultKeyStatistics",
  "financialData",
] as const;

// Payloads are checked by the adapter's own schemas
const MODULE_OPTIONS = { validateResult: false } as const;

/**
 * MarketDataClient over yahoo-finance2.
 */
export function createYahooFinanceClient(): MarketDataClient {
  yahooFinance.suppressNotices(["yahooSurvey"]);
  return {
    quoteSummary(symbol) {
      return yahooFinance.quoteSummary(
        symbol,
        { modules: [...QUOTE_SUMMARY_MODULES] },
        MODULE_OPTIONS
      );
    },
    chart(symbol, { period1, interval }) {
      return yahooFinance.chart(symbol, { period1, interval }, MODULE_OPTIONS);
    },
    fundamentals(symbol, { period1, module }: { period1: Date; module: FundamentalsModule }) {
      return yahooFinance.fundamentalsTimeSeries(
        symbol,
        { period1, type: "annual", module },
        MODULE_OPTIONS
      );
    },
  };
}
