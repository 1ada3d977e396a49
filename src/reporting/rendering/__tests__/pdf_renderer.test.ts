import { PDFDocument } from "pdf-lib";
import { assembleReport, toMarkdown, toSectionResult } from "../../application/report_assembler";
import { RenderFailure } from "../../domain/errors";
import { SECTION_NAMES } from "../../domain/sections";
import type { Report } from "../../domain/types";
import { createPdfRenderer } from "../pdf_renderer";

function sampleReport(overrides: Partial<Report> = {}): Report {
  const sources = [{ id: 1, title: "Record quarter", url: "https://news.example/a" }];
  const sections = SECTION_NAMES.map((name) =>
    name === "Risk Factors"
      ? toSectionResult(name, { ok: false, error: "timeout", meta: { attempts: 3 } }, sources)
      : toSectionResult(
          name,
          {
            ok: true,
            data: `${name} body with a citation [1] and “smart quotes” – plus 腾讯.\n\n- point one\n- point two\n\n| Metric | Value |\n| --- | --- |\n| P/E | 30 |`,
          },
          sources
        )
  );
  return {
    ...assembleReport(
      {
        ticker: "AAPL",
        companyName: "Apple Inc.",
        asOfDate: "2024-06-01",
        notices: ["Web search partially unavailable: 1 of 5 queries failed"],
        sources,
        chartData: {
          currency: "USD",
          prices: [
            { date: "2024-01-05", close: 180, volume: null },
            { date: "2024-01-12", close: 185, volume: null },
            { date: "2024-01-19", close: 176, volume: null },
          ],
          annual: [
            { period: "2022", revenue: 394e9, netIncome: 99e9 },
            { period: "2023", revenue: 383e9, netIncome: -1e9 },
          ],
        },
      },
      sections
    ),
    ...overrides,
  };
}

function reportWithBody(body: string): Report {
  const sections = SECTION_NAMES.map((name, index) =>
    toSectionResult(name, { ok: true, data: index === 0 ? body : "Short body." }, [])
  );
  return assembleReport(
    {
      ticker: "AAPL",
      companyName: "Apple Inc.",
      asOfDate: "2024-06-01",
      notices: [],
      sources: [],
      chartData: { prices: [], annual: [] },
    },
    sections
  );
}

async function pageCount(report: Report): Promise<number> {
  const bytes = await createPdfRenderer({ now: () => new Date("2024-06-01T00:00:00Z") }).render(
    report,
    toMarkdown(report)
  );
  return (await PDFDocument.load(bytes)).getPageCount();
}

const LONG_TEXT = "word ".repeat(3000).trim();

describe("createPdfRenderer", () => {
  test("renders a cover and body pages", async () => {
    const report = sampleReport();
    const bytes = await createPdfRenderer({ now: () => new Date("2024-06-01T00:00:00Z") }).render(
      report,
      toMarkdown(report)
    );

    expect(Buffer.from(bytes.subarray(0, 5)).toString("latin1")).toBe("%PDF-");
    const loaded = await PDFDocument.load(bytes);
    expect(loaded.getPageCount()).toBeGreaterThan(1);
    expect(loaded.getTitle()).toBe("Apple Inc. (AAPL) Investment Report");
  });

  test("draws a caption when a chart cannot be built", async () => {
    const report = sampleReport({ chartData: { prices: [], annual: [] } });
    const bytes = await createPdfRenderer().render(report, toMarkdown(report));
    expect(bytes.length).toBeGreaterThan(0);
  });

  test("wraps unexpected errors in RenderFailure", async () => {
    const report = sampleReport();
    const broken = {
      ...report,
      sections: [{ ...report.sections[0], sectionName: undefined }],
    } as unknown as Report;

    await expect(createPdfRenderer().render(broken, "# Title")).rejects.toBeInstanceOf(
      RenderFailure
    );
  });

  test("continues a paragraph longer than a page onto following pages", async () => {
    const baseline = await pageCount(reportWithBody("Short body."));
    const long = await pageCount(reportWithBody(LONG_TEXT));
    expect(long - baseline).toBeGreaterThanOrEqual(3);
  });

  test("continues bullets, quotes and table cells longer than a page", async () => {
    const baseline = await pageCount(reportWithBody("Short body."));
    for (const body of [
      `- ${LONG_TEXT}`,
      `> ${LONG_TEXT}`,
      `| Metric | Notes |\n| --- | --- |\n| Outlook | ${LONG_TEXT} |`,
    ]) {
      expect((await pageCount(reportWithBody(body))) - baseline).toBeGreaterThanOrEqual(3);
    }
  });
});
