export const SECTION_NAMES = [
  "Executive Summary",
  "Company Overview",
  "Industry & Competitive Landscape",
  "Financial Performance",
  "Growth Catalysts",
  "Valuation Assessment",
  "Risk Factors",
  "Investment Conclusion",
] as const;

export type SectionName = (typeof SECTION_NAMES)[number];

export type ChartKind = "price-history" | "revenue-earnings";

/** Sections that carry a chart, keyed by section name. */
export const SECTION_CHARTS: Partial<Record<SectionName, ChartKind>> = {
  "Executive Summary": "price-history",
  "Financial Performance": "revenue-earnings",
  "Valuation Assessment": "price-history",
};

export function sectionSlug(name: SectionName): string {
  return name
    .toLowerCase()
    .replace(/&/g, "and")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function sectionBySlug(slug: string): SectionName | undefined {
  return SECTION_NAMES.find((name) => sectionSlug(name) === slug);
}
