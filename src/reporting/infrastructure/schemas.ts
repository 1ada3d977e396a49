/**
 * zod schemas for provider payloads and for cached, normalised data.
 */
import { z } from "zod";

// ---- Tavily ---------------------------------------------------------------

export const tavilyResultSchema = z.object({
  title: z.string().default(""),
  url: z.string(),
  content: z.string().default(""),
  published_date: z.string().nullish(),
  score: z.number().optional(),
});

export const tavilyResponseSchema = z.object({
  query: z.string().optional(),
  results: z.array(tavilyResultSchema).default([]),
});

export type TavilyResponse = z.infer<typeof tavilyResponseSchema>;

// ---- Yahoo Finance ----------------------------------------------------------

const numeric = z.number().finite();

// Dates arrive as Date after the library's own validation; accept the raw forms too
const dateLike = z.union([
  z.date(),
  z.string().transform((value, ctx) => {
    const parsed = new Date(value);
    if (Number.isNaN(parsed.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date ${value}` });
      return z.NEVER;
    }
    return parsed;
  }),
  z.number().transform((value) => new Date(value < 1e12 ? value * 1000 : value)),
]);

export const quoteSummarySchema = z.object({
  price: z
    .object({
      longName: z.string().nullish(),
      shortName: z.string().nullish(),
      currency: z.string().nullish(),
      regularMarketPrice: numeric.nullish(),
      marketCap: numeric.nullish(),
    })
    .passthrough()
    .optional(),
  summaryProfile: z
    .object({
      sector: z.string().nullish(),
      industry: z.string().nullish(),
      longBusinessSummary: z.string().nullish(),
      website: z.string().nullish(),
    })
    .passthrough()
    .optional(),
  summaryDetail: z.record(z.unknown()).optional(),
  defaultKeyStatistics: z.record(z.unknown()).optional(),
  financialData: z.record(z.unknown()).optional(),
});

export type QuoteSummary = z.infer<typeof quoteSummarySchema>;

export const chartSchema = z.object({
  meta: z.object({ currency: z.string().nullish() }).passthrough().optional(),
  quotes: z.array(
    z
      .object({
        date: dateLike,
        close: numeric.nullish(),
        volume: numeric.nullish(),
      })
      .passthrough()
  ),
});

export type ChartPayload = z.infer<typeof chartSchema>;

export const fundamentalsRowSchema = z
  .object({
    date: dateLike,
  })
  .catchall(z.unknown());

export const fundamentalsSchema = z.array(fundamentalsRowSchema);

export type FundamentalsRow = z.infer<typeof fundamentalsRowSchema>;

// ---- Cached, normalised data -------------------------------------------------

export const searchResultSchema = z.object({
  queries: z.array(z.string()),
  items: z.array(
    z.object({
      title: z.string(),
      url: z.string(),
      snippet: z.string(),
      publishedAt: z.string().optional(),
    })
  ),
});

const statementPeriodSchema = z.object({
  period: z.string(),
  values: z.record(z.number()),
});

export const financialSnapshotSchema = z.object({
  ticker: z.string(),
  profile: z.object({
    companyName: z.string(),
    sector: z.string().optional(),
    industry: z.string().optional(),
    summary: z.string().optional(),
    currency: z.string().optional(),
    website: z.string().optional(),
  }),
  keyStats: z.record(z.number().nullable()),
  statements: z.object({
    income: z.array(statementPeriodSchema).optional(),
    balance: z.array(statementPeriodSchema).optional(),
    cashflow: z.array(statementPeriodSchema).optional(),
  }),
  marketData: z.array(
    z.object({
      date: z.string(),
      close: z.number(),
      volume: z.number().nullable(),
    })
  ),
});
