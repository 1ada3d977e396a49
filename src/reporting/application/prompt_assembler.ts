/**
 * Builds the prompt for one report section from the fetched data.
 */
import { formatNumber } from "../domain/format";
import type { SectionName } from "../domain/sections";
import type {
  FinancialSnapshot,
  NormalizedResult,
  PricePoint,
  SearchResult,
  SectionPrompt,
  Source,
  StatementPeriod,
  StatementType,
} from "../domain/types";
import {
  buildSystemPrompt,
  INPUT_LABELS,
  SECTION_TEMPLATES,
  type PromptInput,
} from "../prompts/templates";

export interface PromptContext {
  ticker: string;
  companyName: string;
  asOfDate: string;
  /** Numbered list shared by every section; see buildSources. */
  sources: Source[];
  notices: string[];
}

const MAX_STATEMENT_PERIODS = 4;
const MAX_STATEMENT_FIELDS = 8;
const RECENT_CLOSES = 12;

const STATEMENT_FIELDS: Record<StatementType, string[]> = {
  income: ["totalRevenue", "grossProfit", "operatingIncome", "EBITDA", "netIncome", "dilutedEPS"],
  balance: [
    "totalAssets",
    "totalLiabilitiesNetMinorityInterest",
    "stockholdersEquity",
    "cashAndCashEquivalents",
    "totalDebt",
  ],
  cashflow: [
    "operatingCashFlow",
    "capitalExpenditure",
    "freeCashFlow",
    "repurchaseOfCapitalStock",
    "cashDividendsPaid",
  ],
};

export function unavailableLine(label: string): string {
  return `[Data unavailable: ${label}]`;
}

export function financialSourceUrl(ticker: string): string {
  return `https://finance.yahoo.com/quote/${encodeURIComponent(ticker)}`;
}

/**
 * Search items numbered in order, followed by one financial data source when
 * there is financial data to cite.
 */
export function buildSources(
  ticker: string,
  companyName: string,
  search: NormalizedResult<SearchResult>,
  financial: NormalizedResult<FinancialSnapshot>
): Source[] {
  const items = search.status === "unavailable" ? [] : search.data.items;
  const sources: Source[] = items.map((item, index) => ({
    id: index + 1,
    title: item.title || item.url,
    url: item.url,
  }));
  if (financial.status !== "unavailable") {
    sources.push({
      id: sources.length + 1,
      title: `${companyName} (${ticker}) market data and financial statements - Yahoo Finance`,
      url: financialSourceUrl(ticker),
    });
  }
  return sources;
}

function formatStatement(type: StatementType, periods: StatementPeriod[]): string {
  const shown = periods.slice(0, MAX_STATEMENT_PERIODS);
  if (shown.length === 0) return "";
  const present = new Set(shown.flatMap((p) => Object.keys(p.values)));
  const preferred = STATEMENT_FIELDS[type].filter((f) => present.has(f));
  const fields = (preferred.length > 0 ? preferred : [...present]).slice(0, MAX_STATEMENT_FIELDS);
  const header = `| Field | ${shown.map((p) => p.period).join(" | ")} |`;
  const divider = `| --- | ${shown.map(() => "---").join(" | ")} |`;
  const rows = fields.map(
    (field) => `| ${field} | ${shown.map((p) => formatNumber(p.values[field])).join(" | ")} |`
  );
  return [header, divider, ...rows].join("\n");
}

export function summarisePrices(points: PricePoint[], currency?: string): string {
  const first = points[0];
  const last = points[points.length - 1];
  if (!first || !last) return "";
  const closes = points.map((p) => p.close);
  const change = first.close !== 0 ? ((last.close - first.close) / first.close) * 100 : 0;
  const unit = currency ? ` ${currency}` : "";
  const recent = points
    .slice(-RECENT_CLOSES)
    .map((p) => `${p.date}: ${formatNumber(p.close)}`)
    .join(", ");
  return [
    `- Period: ${first.date} to ${last.date} (${points.length} weekly closes)`,
    `- First close: ${formatNumber(first.close)}${unit}; last close: ${formatNumber(last.close)}${unit}`,
    `- Change over period: ${change.toFixed(1)}%`,
    `- High: ${formatNumber(Math.max(...closes))}${unit}; low: ${formatNumber(Math.min(...closes))}${unit}`,
    `- Recent closes: ${recent}`,
  ].join("\n");
}

function financialSourceId(context: PromptContext): number | undefined {
  const url = financialSourceUrl(context.ticker);
  return context.sources.find((s) => s.url === url)?.id;
}

function renderInput(
  input: PromptInput,
  search: NormalizedResult<SearchResult>,
  financial: NormalizedResult<FinancialSnapshot>,
  context: PromptContext
): string {
  const label = INPUT_LABELS[input];
  const title = label.charAt(0).toUpperCase() + label.slice(1);

  if (input === "news") {
    if (search.status === "unavailable" || search.data.items.length === 0) {
      return `### ${title}\n${unavailableLine(label)}`;
    }
    const blocks = search.data.items.map((item, index) => {
      const published = item.publishedAt ? `\nPublished: ${item.publishedAt}` : "";
      return `Source [${index + 1}]: ${item.title}\nURL: ${item.url}${published}\n${item.snippet}`;
    });
    return `### ${title}\n${blocks.join("\n\n")}`;
  }

  if (financial.status === "unavailable") {
    return `### ${title}\n${unavailableLine(label)}`;
  }
  const snapshot = financial.data;
  const sourceId = financialSourceId(context);
  const cite = sourceId ? ` (cite as [${sourceId}])` : "";
  let body = "";

  switch (input) {
    case "profile": {
      const p = snapshot.profile;
      body = [
        `- Name: ${p.companyName}`,
        p.sector ? `- Sector: ${p.sector}` : "",
        p.industry ? `- Industry: ${p.industry}` : "",
        p.website ? `- Website: ${p.website}` : "",
        p.summary ? `- Business summary: ${p.summary}` : "",
      ]
        .filter(Boolean)
        .join("\n");
      break;
    }
    case "keyStats": {
      const known = Object.entries(snapshot.keyStats).filter(([, v]) => v !== null);
      body = known.map(([k, v]) => `- ${k}: ${formatNumber(v)}`).join("\n");
      break;
    }
    case "income":
    case "balance":
    case "cashflow":
      body = formatStatement(input, snapshot.statements[input] ?? []);
      break;
    case "prices":
      body = summarisePrices(snapshot.marketData, snapshot.profile.currency);
      break;
  }

  return body
    ? `### ${title}${cite}\n${body}`
    : `### ${title}\n${unavailableLine(label)}`;
}

/**
 * Pure: the same inputs always produce the same prompt. Every required input
 * appears, either as data or as an explicit unavailable line.
 */
export function buildSectionPrompt(
  sectionName: SectionName,
  search: NormalizedResult<SearchResult>,
  financial: NormalizedResult<FinancialSnapshot>,
  context: PromptContext
): SectionPrompt {
  const template = SECTION_TEMPLATES[sectionName];
  const header = [
    `Company: ${context.companyName} (${context.ticker})`,
    `As of: ${context.asOfDate}`,
    `Section: ${sectionName}`,
    "",
    `Task: ${template.focus}`,
  ];
  const notices =
    context.notices.length > 0
      ? ["", "Data notices:", ...context.notices.map((n) => `- ${n}`)]
      : [];
  const inputs = template.inputs.map((input) =>
    renderInput(input, search, financial, context)
  );

  return {
    sectionName,
    system: buildSystemPrompt(context.asOfDate),
    renderedText: [...header, ...notices, "", "## Inputs", "", inputs.join("\n\n")].join("\n"),
    sources: context.sources,
  };
}
