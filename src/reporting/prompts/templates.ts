import type { SectionName } from "../domain/sections";

export type PromptInput =
  | "profile"
  | "keyStats"
  | "income"
  | "balance"
  | "cashflow"
  | "prices"
  | "news";

export const INPUT_LABELS: Record<PromptInput, string> = {
  profile: "company profile",
  keyStats: "key statistics",
  income: "income statement",
  balance: "balance sheet",
  cashflow: "cash-flow statement",
  prices: "price history",
  news: "web search results",
};

export interface SectionTemplate {
  focus: string;
  inputs: PromptInput[];
}

export const SECTION_TEMPLATES: Record<SectionName, SectionTemplate> = {
  "Executive Summary": {
    focus:
      "Summarise the investment thesis in three to four paragraphs: what the company does, how it has performed, how the shares are priced, and the overall stance an investor should take.",
    inputs: ["profile", "keyStats", "income", "prices", "news"],
  },
  "Company Overview": {
    focus:
      "Describe the business model, main products and segments, revenue sources and geographic footprint.",
    inputs: ["profile", "news"],
  },
  "Industry & Competitive Landscape": {
    focus:
      "Explain the industry structure, the main competitors and the company's competitive position. A short markdown table comparing competitors is welcome.",
    inputs: ["profile", "news"],
  },
  "Financial Performance": {
    focus:
      "Analyse revenue, profitability, balance-sheet strength and cash generation across the reported years, naming the trends behind the numbers.",
    inputs: ["income", "balance", "cashflow", "keyStats"],
  },
  "Growth Catalysts": {
    focus:
      "Identify the concrete drivers of future growth: products, markets, strategy and management initiatives.",
    inputs: ["news", "income"],
  },
  "Valuation Assessment": {
    focus:
      "Assess the valuation from the multiples and price history provided, relative to growth and profitability. State whether the shares look cheap, fair or expensive and why.",
    inputs: ["keyStats", "prices", "income"],
  },
  "Risk Factors": {
    focus:
      "List and explain the material risks: competitive, regulatory, financial, operational and macroeconomic. Use bullet points with a short explanation each.",
    inputs: ["news", "balance"],
  },
  "Investment Conclusion": {
    focus:
      "Conclude with a clear recommendation (buy, hold or sell), the key reasons for it, and what would change the view.",
    inputs: ["keyStats", "prices", "news"],
  },
};

export function buildSystemPrompt(asOfDate: string): string {
  return [
    "You are a senior equity research analyst writing one section of a professional investment report.",
    `Today's date is ${asOfDate}.`,
    "",
    "Rules:",
    "- Write in a formal, objective tone. Synthesise the inputs; do not just restate them.",
    "- Keep the section under 500 words.",
    "- Follow every factual claim or number with its numbered citation, e.g. [1] or [2][3]. Cite only the source numbers provided.",
    "- Use only the data given. When an input is marked as unavailable, say so briefly and do not invent figures.",
    "- Output markdown paragraphs, bullet lists or simple tables. Do not repeat the section title as a heading.",
  ].join("\n");
}
