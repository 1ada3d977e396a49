import { InputError } from "../reporting/domain/errors";
import type { Market, Ticker } from "../reporting/domain/types";

interface ExchangePattern {
  market: Market;
  pattern: RegExp;
  example: string;
}

// Suffixed listings are matched first; a bare symbol (optionally with a share
// class such as BRK.B or BRK-B) is a US listing.
const EXCHANGE_PATTERNS: ExchangePattern[] = [
  { market: "HK", pattern: /^\d{4,5}\.HK$/, example: "0700.HK" },
  { market: "LSE", pattern: /^[A-Z0-9]{1,5}\.L$/, example: "VOD.L" },
  { market: "TSX", pattern: /^[A-Z]{1,5}(?:\.[A-Z])?\.TO$/, example: "SHOP.TO" },
  { market: "TSE", pattern: /^\d{4}\.T$/, example: "7203.T" },
  { market: "SSE", pattern: /^\d{6}\.SS$/, example: "600519.SS" },
  { market: "SZSE", pattern: /^\d{6}\.SZ$/, example: "000001.SZ" },
  { market: "US", pattern: /^[A-Z]{1,5}(?:-[A-Z]|\.[A-C])?$/, example: "AAPL" },
];

export function normalizeTicker(raw: string): string {
  return String(raw ?? "")
    .trim()
    .toUpperCase();
}

export function matchMarket(symbol: string): Market | undefined {
  return EXCHANGE_PATTERNS.find((p) => p.pattern.test(symbol))?.market;
}

/**
 * Validates a user-supplied ticker. Throws InputError before any provider is called.
 */
export function parseTicker(raw: string): Ticker {
  const symbol = normalizeTicker(raw);
  if (!symbol) {
    throw new InputError("Ticker is required");
  }
  const market = matchMarket(symbol);
  if (!market) {
    const examples = EXCHANGE_PATTERNS.map((p) => p.example).join(", ");
    throw new InputError(
      `Unrecognised ticker "${symbol}". Expected a US symbol or an exchange suffix, e.g. ${examples}`,
      { ticker: symbol }
    );
  }
  return { symbol, market };
}
