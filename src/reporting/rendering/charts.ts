/**
 * Chart specs resolved from `{{chart:<key>}}` placeholders. Keys are section
 * slugs; the section decides which chart it carries.
 */
import { SECTION_CHARTS, sectionBySlug } from "../domain/sections";
import type { ChartData, FinancialSnapshot } from "../domain/types";

export interface LineChartSpec {
  kind: "line";
  title: string;
  unit?: string;
  points: Array<{ label: string; value: number }>;
}

export interface BarChartSpec {
  kind: "bar";
  title: string;
  unit?: string;
  categories: string[];
  series: Array<{ name: string; values: Array<number | null> }>;
}

export type ChartSpec = LineChartSpec | BarChartSpec;

const MAX_ANNUAL_PERIODS = 5;

/**
 * Chart inputs from a financial snapshot: weekly closes and annual revenue /
 * net income, oldest first.
 */
export function buildChartData(snapshot: FinancialSnapshot | undefined): ChartData {
  if (!snapshot) return { prices: [], annual: [] };
  const income = snapshot.statements.income ?? [];
  const annual = [...income]
    .sort((a, b) => (a.period < b.period ? -1 : a.period > b.period ? 1 : 0))
    .slice(-MAX_ANNUAL_PERIODS)
    .map((p) => ({
      period: p.period.slice(0, 4),
      ...(p.values.totalRevenue !== undefined ? { revenue: p.values.totalRevenue } : {}),
      ...(p.values.netIncome !== undefined ? { netIncome: p.values.netIncome } : {}),
    }));
  return {
    ...(snapshot.profile.currency ? { currency: snapshot.profile.currency } : {}),
    prices: snapshot.marketData,
    annual,
  };
}

/** Returns undefined when the key is unknown or the data cannot fill the chart. */
export function buildChart(key: string, data: ChartData): ChartSpec | undefined {
  const section = sectionBySlug(key);
  const kind = section ? SECTION_CHARTS[section] : undefined;

  if (kind === "price-history") {
    if (data.prices.length < 2) return undefined;
    return {
      kind: "line",
      title: "Share price, weekly close",
      unit: data.currency,
      points: data.prices.map((p) => ({ label: p.date, value: p.close })),
    };
  }

  if (kind === "revenue-earnings") {
    const periods = data.annual.filter(
      (p) => p.revenue !== undefined || p.netIncome !== undefined
    );
    if (periods.length === 0) return undefined;
    return {
      kind: "bar",
      title: "Annual revenue and net income",
      unit: data.currency,
      categories: periods.map((p) => p.period),
      series: [
        { name: "Revenue", values: periods.map((p) => p.revenue ?? null) },
        { name: "Net income", values: periods.map((p) => p.netIncome ?? null) },
      ],
    };
  }

  return undefined;
}

/**
 * Axis bounds and tick step rounded to 1, 2 or 5 times a power of ten.
 */
export function niceScale(
  min: number,
  max: number,
  ticks = 5
): { min: number; max: number; step: number } {
  if (!Number.isFinite(min) || !Number.isFinite(max)) return { min: 0, max: 1, step: 0.2 };
  if (min === max) {
    const pad = min === 0 ? 1 : Math.abs(min) * 0.1;
    return niceScale(min - pad, max + pad, ticks);
  }
  const raw = (max - min) / Math.max(1, ticks);
  const magnitude = Math.pow(10, Math.floor(Math.log10(raw)));
  const residual = raw / magnitude;
  const factor = residual > 5 ? 10 : residual > 2 ? 5 : residual > 1 ? 2 : 1;
  const step = factor * magnitude;
  return {
    min: Math.floor(min / step) * step,
    max: Math.ceil(max / step) * step,
    step,
  };
}
