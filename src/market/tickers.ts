/**
 * Preset tickers offered by the CLI `tickers` command and the web front end.
 */
export interface PresetTicker {
  symbol: string;
  name: string;
}

export const PRESET_TICKERS: PresetTicker[] = [
  { symbol: "AAPL", name: "Apple Inc." },
  { symbol: "MSFT", name: "Microsoft Corporation" },
  { symbol: "NVDA", name: "NVIDIA Corporation" },
  { symbol: "AMZN", name: "Amazon.com, Inc." },
  { symbol: "GOOGL", name: "Alphabet Inc." },
  { symbol: "META", name: "Meta Platforms, Inc." },
  { symbol: "TSLA", name: "Tesla, Inc." },
  { symbol: "JPM", name: "JPMorgan Chase & Co." },
  { symbol: "0700.HK", name: "Tencent Holdings Ltd." },
  { symbol: "9988.HK", name: "Alibaba Group Holding Ltd." },
  { symbol: "1299.HK", name: "AIA Group Ltd." },
];
