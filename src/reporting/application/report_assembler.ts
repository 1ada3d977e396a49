/**
 * Orders section results into a report and serialises it as Markdown.
 */
import type { Result } from "../../util/result";
import { SectionGenerationFailed } from "../domain/errors";
import {
  SECTION_CHARTS,
  SECTION_NAMES,
  sectionSlug,
  type SectionName,
} from "../domain/sections";
import type { ChartData, Report, SectionResult, Source } from "../domain/types";
import type { LlmCallMeta } from "../infrastructure/contracts";

export interface ReportMeta {
  ticker: string;
  companyName: string;
  asOfDate: string;
  notices: string[];
  sources: Source[];
  chartData: ChartData;
}

const CITATION_PATTERN = /\[(\d+)\]/g;

/** Sources cited in `text`, in order of first appearance; unknown numbers are dropped. */
export function extractCitations(text: string, sources: Source[]): Source[] {
  const byId = new Map(sources.map((s) => [s.id, s]));
  const seen = new Set<number>();
  const cited: Source[] = [];
  for (const match of text.matchAll(CITATION_PATTERN)) {
    const id = Number(match[1]);
    const source = byId.get(id);
    if (!source || seen.has(id)) continue;
    seen.add(id);
    cited.push(source);
  }
  return cited;
}

export function toSectionResult(
  sectionName: SectionName,
  outcome: Result<string, LlmCallMeta>,
  sources: Source[]
): SectionResult {
  if (outcome.ok) {
    return {
      sectionName,
      status: "generated",
      bodyText: outcome.data,
      citations: extractCitations(outcome.data, sources),
    };
  }
  return failedSection(sectionName, outcome.error, outcome.meta?.attempts ?? 0);
}

export function failedSection(
  sectionName: SectionName,
  reason: string,
  attempts: number
): SectionResult {
  return {
    sectionName,
    status: "failed",
    bodyText: "",
    citations: [],
    failure: new SectionGenerationFailed(sectionName, reason, attempts),
  };
}

/**
 * Places results in canonical order regardless of completion order. A section
 * without a result is reported as failed.
 */
export function assembleReport(meta: ReportMeta, results: SectionResult[]): Report {
  const byName = new Map(results.map((r) => [r.sectionName, r]));
  const sections = SECTION_NAMES.map(
    (name) => byName.get(name) ?? failedSection(name, "no result was produced", 0)
  );
  return {
    ticker: meta.ticker,
    companyName: meta.companyName,
    asOfDate: meta.asOfDate,
    sections,
    notices: meta.notices,
    sources: meta.sources,
    chartData: meta.chartData,
  };
}

export function chartPlaceholder(sectionName: SectionName): string {
  return `{{chart:${sectionSlug(sectionName)}}}`;
}

// Section bodies sit under a level-2 heading; keep their own headings below it
function demoteHeadings(body: string): string {
  return body.replace(/^#{1,2}(?=\s)/gm, "###");
}

function formatSource(source: Source): string {
  return `[${source.id}] ${source.title} - ${source.url}`;
}

/** Every cited source across sections, ordered by number. */
export function citedSources(report: Report): Source[] {
  const unique = new Map<number, Source>();
  for (const section of report.sections) {
    for (const source of section.citations) unique.set(source.id, source);
  }
  return [...unique.values()].sort((a, b) => a.id - b.id);
}

export function toMarkdown(report: Report): string {
  const lines: string[] = [
    `# ${report.companyName} (${report.ticker}) Investment Report`,
    "",
    `**As of:** ${report.asOfDate}`,
    "",
  ];

  if (report.notices.length > 0) {
    lines.push("## Data Notices", "");
    for (const notice of report.notices) lines.push(`- ${notice}`);
    lines.push("");
  }

  const references = citedSources(report);
  lines.push("## Table of Contents", "");
  report.sections.forEach((section, index) => {
    lines.push(`${index + 1}. ${section.sectionName}`);
  });
  if (references.length > 0) lines.push(`${report.sections.length + 1}. References`);
  lines.push("");

  report.sections.forEach((section, index) => {
    lines.push(`## ${index + 1}. ${section.sectionName}`, "");
    if (section.status === "failed") {
      lines.push(`> Section generation failed: ${section.failure.reason}`, "");
    } else {
      lines.push(demoteHeadings(section.bodyText.trim()), "");
    }
    if (SECTION_CHARTS[section.sectionName]) {
      lines.push(chartPlaceholder(section.sectionName), "");
    }
    if (section.citations.length > 0) {
      lines.push("**Sources:**", "");
      for (const source of section.citations) lines.push(`- ${formatSource(source)}`);
      lines.push("");
    }
  });

  if (references.length > 0) {
    lines.push(`## ${report.sections.length + 1}. References`, "");
    for (const source of references) lines.push(`- ${formatSource(source)}`);
    lines.push("");
  }

  return lines.join("\n");
}
