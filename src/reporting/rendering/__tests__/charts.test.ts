import type { FinancialSnapshot } from "../../domain/types";
import { buildChart, buildChartData, niceScale } from "../charts";

const SNAPSHOT: FinancialSnapshot = {
  ticker: "AAPL",
  profile: { companyName: "Apple Inc.", currency: "USD" },
  keyStats: {},
  statements: {
    income: [
      { period: "2023-09-30", values: { totalRevenue: 383, netIncome: 97 } },
      { period: "2022-09-30", values: { totalRevenue: 394 } },
    ],
  },
  marketData: [
    { date: "2024-01-05", close: 180, volume: null },
    { date: "2024-01-12", close: 185, volume: null },
  ],
};

describe("buildChartData", () => {
  test("orders annual figures oldest first by fiscal year", () => {
    expect(buildChartData(SNAPSHOT)).toEqual({
      currency: "USD",
      prices: SNAPSHOT.marketData,
      annual: [
        { period: "2022", revenue: 394 },
        { period: "2023", revenue: 383, netIncome: 97 },
      ],
    });
  });

  test("is empty without a snapshot", () => {
    expect(buildChartData(undefined)).toEqual({ prices: [], annual: [] });
  });
});

describe("buildChart", () => {
  const data = buildChartData(SNAPSHOT);

  test("price history for valuation and summary sections", () => {
    const chart = buildChart("valuation-assessment", data);
    expect(chart?.kind).toBe("line");
    expect(chart?.kind === "line" && chart.points).toEqual([
      { label: "2024-01-05", value: 180 },
      { label: "2024-01-12", value: 185 },
    ]);
    expect(buildChart("executive-summary", data)?.kind).toBe("line");
  });

  test("revenue and earnings bars for financial performance", () => {
    expect(buildChart("financial-performance", data)).toEqual({
      kind: "bar",
      title: "Annual revenue and net income",
      unit: "USD",
      categories: ["2022", "2023"],
      series: [
        { name: "Revenue", values: [394, 383] },
        { name: "Net income", values: [null, 97] },
      ],
    });
  });

  test("returns undefined for unknown keys or missing data", () => {
    expect(buildChart("risk-factors", data)).toBeUndefined();
    expect(buildChart("no-such-section", data)).toBeUndefined();
    expect(buildChart("valuation-assessment", { prices: [], annual: [] })).toBeUndefined();
    expect(buildChart("financial-performance", { prices: [], annual: [] })).toBeUndefined();
  });
});

describe("niceScale", () => {
  test("rounds bounds to whole steps", () => {
    expect(niceScale(0, 394)).toEqual({ min: 0, max: 400, step: 100 });
    expect(niceScale(172, 199)).toEqual({ min: 170, max: 200, step: 10 });
  });

  test("widens a flat range", () => {
    const scale = niceScale(5, 5);
    expect(scale.min).toBeLessThan(5);
    expect(scale.max).toBeGreaterThan(5);
  });
});
