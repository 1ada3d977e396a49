/**
 * A4 PDF rendering of a report with pdf-lib: a cover page, the Markdown body
 * and vector charts in place of chart placeholders.
 */
import {
  PDFDocument,
  StandardFonts,
  rgb,
  type Color,
  type PDFFont,
  type PDFPage,
} from "pdf-lib";
import { getLogger } from "../../util/logger";
import { errorMessage } from "../../util/result";
import { RenderFailure } from "../domain/errors";
import { formatNumber } from "../domain/format";
import type { Report } from "../domain/types";
import type { DocumentRenderer } from "../infrastructure/contracts";
import {
  buildChart,
  niceScale,
  type BarChartSpec,
  type ChartSpec,
  type LineChartSpec,
} from "./charts";
import { markdownRows, toWinAnsi, type Row } from "./markdown_rows";

const PAGE_WIDTH = 595.28;
const PAGE_HEIGHT = 841.89;
const MARGIN = 48;
const HEADER_HEIGHT = 40;
const TOP = PAGE_HEIGHT - HEADER_HEIGHT - 28;
const BOTTOM = 56;
const CONTENT_WIDTH = PAGE_WIDTH - MARGIN * 2;
const BODY_SIZE = 10.5;
const BODY_LINE = 14.5;
const CHART_HEIGHT = 210;

const THEME = {
  paper: hex("#F6F8FB"),
  navy: hex("#0B1F33"),
  sky: hex("#2F6FA3"),
  ink: hex("#102A43"),
  text: hex("#1F2933"),
  muted: hex("#52606D"),
  line: hex("#C7D1DC"),
  card: hex("#DFE6EE"),
  risk: hex("#7F1D1D"),
  riskBg: hex("#FCE8E8"),
  positive: hex("#0F5132"),
};

const SERIES_COLORS = [THEME.navy, THEME.sky];

interface FontSet {
  regular: PDFFont;
  bold: PDFFont;
  italic: PDFFont;
}

interface Cursor {
  page: PDFPage;
  y: number;
}

interface RenderContext {
  pdf: PDFDocument;
  font: FontSet;
  report: Report;
}

export interface PdfRendererOptions {
  now?: () => Date;
}

export function createPdfRenderer(options: PdfRendererOptions = {}): DocumentRenderer {
  const now = options.now ?? (() => new Date());
  const log = getLogger("pdf-renderer");

  return {
    async render(report: Report, markdown: string): Promise<Uint8Array> {
      try {
        const pdf = await PDFDocument.create();
        const font: FontSet = {
          regular: await pdf.embedFont(StandardFonts.Helvetica),
          bold: await pdf.embedFont(StandardFonts.HelveticaBold),
          italic: await pdf.embedFont(StandardFonts.HelveticaOblique),
        };
        const ctx: RenderContext = { pdf, font, report };

        pdf.setTitle(`${report.companyName} (${report.ticker}) Investment Report`);
        pdf.setSubject(`Investment thesis for ${report.ticker} as of ${report.asOfDate}`);
        pdf.setAuthor("equity-report");
        pdf.setCreationDate(now());

        renderCover(ctx);
        renderBody(ctx, markdownRows(markdown));
        renderFooters(ctx);

        const bytes = await pdf.save();
        log.debug({ ticker: report.ticker, pages: pdf.getPageCount(), bytes: bytes.length }, "PDF rendered");
        return bytes;
      } catch (error) {
        if (error instanceof RenderFailure) throw error;
        throw new RenderFailure(`PDF rendering failed: ${errorMessage(error)}`, {
          ticker: report.ticker,
        });
      }
    },
  };
}

// ---- pages -------------------------------------------------------------------

function renderCover({ pdf, font, report }: RenderContext): void {
  const page = pdf.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
  const bandHeight = 280;
  page.drawRectangle({
    x: 0,
    y: PAGE_HEIGHT - bandHeight,
    width: PAGE_WIDTH,
    height: bandHeight,
    color: THEME.navy,
  });
  page.drawRectangle({
    x: 0,
    y: PAGE_HEIGHT - bandHeight - 5,
    width: PAGE_WIDTH,
    height: 5,
    color: THEME.sky,
  });

  page.drawText("EQUITY RESEARCH", {
    x: MARGIN,
    y: PAGE_HEIGHT - 70,
    size: 10,
    font: font.bold,
    color: hex("#BFDBFE"),
  });
  page.drawText("Investment Thesis Report", {
    x: MARGIN,
    y: PAGE_HEIGHT - 110,
    size: 26,
    font: font.bold,
    color: THEME.paper,
  });

  let y = PAGE_HEIGHT - 150;
  for (const line of wrap(toWinAnsi(report.companyName), CONTENT_WIDTH, font.regular, 20)) {
    page.drawText(line, { x: MARGIN, y, size: 20, font: font.regular, color: THEME.paper });
    y -= 24;
  }
  page.drawText(toWinAnsi(`${report.ticker}  |  As of ${report.asOfDate}`), {
    x: MARGIN,
    y: y - 6,
    size: 12,
    font: font.regular,
    color: hex("#BFDBFE"),
  });

  y = PAGE_HEIGHT - bandHeight - 50;
  page.drawText("Report contents", { x: MARGIN, y, size: 14, font: font.bold, color: THEME.ink });
  y -= 24;
  report.sections.forEach((section, index) => {
    page.drawText(`${index + 1}. ${toWinAnsi(section.sectionName)}`, {
      x: MARGIN,
      y,
      size: 11,
      font: font.regular,
      color: THEME.text,
    });
    const failed = section.status === "failed";
    const label = failed ? "Generation failed" : "Complete";
    page.drawText(label, {
      x: PAGE_WIDTH - MARGIN - font.bold.widthOfTextAtSize(label, 9),
      y,
      size: 9,
      font: font.bold,
      color: failed ? THEME.risk : THEME.positive,
    });
    y -= 20;
  });

  if (report.notices.length > 0) {
    y -= 12;
    const lines = report.notices.flatMap((notice) =>
      wrap(`- ${toWinAnsi(notice)}`, CONTENT_WIDTH - 20, font.regular, 9.5)
    );
    const boxHeight = 30 + lines.length * 13;
    page.drawRectangle({
      x: MARGIN,
      y: y - boxHeight,
      width: CONTENT_WIDTH,
      height: boxHeight,
      color: THEME.riskBg,
      borderColor: THEME.line,
      borderWidth: 0.8,
    });
    page.drawText("Data notices", {
      x: MARGIN + 10,
      y: y - 18,
      size: 10,
      font: font.bold,
      color: THEME.risk,
    });
    lines.forEach((line, index) => {
      page.drawText(line, {
        x: MARGIN + 10,
        y: y - 34 - index * 13,
        size: 9.5,
        font: font.regular,
        color: THEME.text,
      });
    });
  }

  const disclaimer =
    "Generated automatically from public web sources, market data and language-model output. Not investment advice.";
  wrap(disclaimer, CONTENT_WIDTH, font.italic, 8.5).forEach((line, index) => {
    page.drawText(line, {
      x: MARGIN,
      y: 70 - index * 11,
      size: 8.5,
      font: font.italic,
      color: THEME.muted,
    });
  });
}

function bodyPage({ pdf, font, report }: RenderContext): PDFPage {
  const page = pdf.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
  page.drawRectangle({
    x: 0,
    y: PAGE_HEIGHT - HEADER_HEIGHT,
    width: PAGE_WIDTH,
    height: HEADER_HEIGHT,
    color: THEME.navy,
  });
  page.drawText(toWinAnsi(`${report.companyName} (${report.ticker})`), {
    x: MARGIN,
    y: PAGE_HEIGHT - 25,
    size: 10,
    font: font.bold,
    color: THEME.paper,
  });
  const label = "Investment Thesis Report";
  page.drawText(label, {
    x: PAGE_WIDTH - MARGIN - font.regular.widthOfTextAtSize(label, 9),
    y: PAGE_HEIGHT - 25,
    size: 9,
    font: font.regular,
    color: hex("#BFDBFE"),
  });
  return page;
}

function renderFooters({ pdf, font, report }: RenderContext): void {
  const pages = pdf.getPages();
  const total = pages.length;
  pages.forEach((page, index) => {
    page.drawLine({
      start: { x: MARGIN, y: 38 },
      end: { x: PAGE_WIDTH - MARGIN, y: 38 },
      thickness: 0.8,
      color: THEME.line,
    });
    page.drawText(toWinAnsi(`${report.ticker} • ${report.asOfDate}`), {
      x: MARGIN,
      y: 24,
      size: 8.5,
      font: font.regular,
      color: THEME.muted,
    });
    const pageLabel = `Page ${index + 1}/${total}`;
    page.drawText(pageLabel, {
      x: PAGE_WIDTH - MARGIN - font.regular.widthOfTextAtSize(pageLabel, 9),
      y: 24,
      size: 9,
      font: font.regular,
      color: THEME.muted,
    });
  });
}

// ---- body --------------------------------------------------------------------

function renderBody(ctx: RenderContext, rows: Row[]): void {
  const { font } = ctx;
  const cursor: Cursor = { page: bodyPage(ctx), y: TOP };

  const ensure = (space: number): boolean => {
    if (cursor.y - space >= BOTTOM) return false;
    cursor.page = bodyPage(ctx);
    cursor.y = TOP;
    return true;
  };

  for (const row of rows) {
    switch (row.kind) {
      case "blank":
        cursor.y -= BODY_LINE - 6;
        break;

      case "heading": {
        const size = row.level === 1 ? 18 : row.level === 2 ? 14 : 12;
        const lines = wrap(row.text, CONTENT_WIDTH, font.bold, size);
        // Keep a heading together with at least a few lines of what follows
        ensure(Math.min(lines.length * (size + 4) + BODY_LINE * 3, TOP - BOTTOM));
        cursor.y -= row.level <= 2 ? 6 : 2;
        for (const text of lines) {
          ensure(size + 4);
          cursor.page.drawText(text, { x: MARGIN, y: cursor.y, size, font: font.bold, color: THEME.ink });
          cursor.y -= size + 4;
        }
        if (row.level <= 2) {
          cursor.page.drawLine({
            start: { x: MARGIN, y: cursor.y + 1 },
            end: { x: PAGE_WIDTH - MARGIN, y: cursor.y + 1 },
            thickness: 0.6,
            color: THEME.line,
          });
          cursor.y -= 4;
        }
        break;
      }

      case "bullet": {
        const indent = 16;
        const lines = wrap(row.text, CONTENT_WIDTH - indent, font.regular, BODY_SIZE);
        ensure(Math.min(lines.length, 3) * BODY_LINE);
        cursor.page.drawText(row.marker, {
          x: MARGIN + 2,
          y: cursor.y,
          size: BODY_SIZE,
          font: font.bold,
          color: THEME.text,
        });
        for (const text of lines) {
          ensure(BODY_LINE);
          cursor.page.drawText(text, {
            x: MARGIN + indent,
            y: cursor.y,
            size: BODY_SIZE,
            font: font.regular,
            color: THEME.text,
          });
          cursor.y -= BODY_LINE;
        }
        break;
      }

      case "quote": {
        const lines = wrap(row.text, CONTENT_WIDTH - 16, font.italic, BODY_SIZE);
        ensure(Math.min(lines.length, 3) * BODY_LINE + 8);
        // One band per line; a long quote continues on the next page
        lines.forEach((text, index) => {
          if (ensure(BODY_LINE + 4)) cursor.y -= 4;
          const first = index === 0 ? 4 : 0;
          const last = index === lines.length - 1 ? 4 : 0;
          const band = { x: MARGIN, y: cursor.y - 6 - last, height: BODY_LINE + first + last };
          cursor.page.drawRectangle({ ...band, width: CONTENT_WIDTH, color: THEME.riskBg });
          cursor.page.drawRectangle({ ...band, width: 3, color: THEME.risk });
          cursor.page.drawText(text, {
            x: MARGIN + 12,
            y: cursor.y - 2,
            size: BODY_SIZE,
            font: font.italic,
            color: THEME.risk,
          });
          cursor.y -= BODY_LINE;
        });
        cursor.y -= 8;
        break;
      }

      case "table":
        drawTable(ctx, cursor, ensure, row.head, row.rows);
        break;

      case "chart": {
        const spec = buildChart(row.key, ctx.report.chartData);
        if (spec) {
          ensure(CHART_HEIGHT + 12);
          drawChart(cursor.page, font, spec, {
            x: MARGIN,
            y: cursor.y - CHART_HEIGHT,
            width: CONTENT_WIDTH,
            height: CHART_HEIGHT,
          });
          cursor.y -= CHART_HEIGHT + 12;
        } else {
          ensure(32);
          drawChartUnavailable(cursor.page, font, cursor.y);
          cursor.y -= 32;
        }
        break;
      }

      case "text": {
        const lines = wrap(row.text, CONTENT_WIDTH, font.regular, BODY_SIZE);
        ensure(Math.min(lines.length, 3) * BODY_LINE);
        for (const text of lines) {
          ensure(BODY_LINE);
          cursor.page.drawText(text, {
            x: MARGIN,
            y: cursor.y,
            size: BODY_SIZE,
            font: font.regular,
            color: THEME.text,
          });
          cursor.y -= BODY_LINE;
        }
        break;
      }
    }
  }
}

function drawTable(
  { font }: RenderContext,
  cursor: Cursor,
  ensure: (space: number) => boolean,
  head: string[],
  rows: string[][]
): void {
  const cols = Math.max(1, head.length, ...rows.map((cells) => cells.length));
  const col = CONTENT_WIDTH / cols;
  const pad = 4;
  const size = 8.8;
  const lineHeight = size + 2.5;
  const layout = (cells: string[], face: PDFFont): string[][] =>
    Array.from({ length: cols }, (_, i) => wrap(cells[i] ?? "", col - pad * 2, face, size));
  const depth = (cellLines: string[][]) => Math.max(1, ...cellLines.map((lines) => lines.length));
  const heightOf = (cellLines: string[][]) => depth(cellLines) * lineHeight + pad * 2;

  const draw = (cellLines: string[][], isHead: boolean) => {
    const face = isHead ? font.bold : font.regular;
    const rowHeight = heightOf(cellLines);
    cellLines.forEach((lines, index) => {
      const x = MARGIN + col * index;
      cursor.page.drawRectangle({
        x,
        y: cursor.y - rowHeight,
        width: col,
        height: rowHeight,
        color: isHead ? THEME.card : THEME.paper,
        borderColor: THEME.line,
        borderWidth: 0.8,
      });
      lines.forEach((text, lineIndex) => {
        cursor.page.drawText(text, {
          x: x + pad,
          y: cursor.y - pad - size - lineIndex * lineHeight,
          size,
          font: face,
          color: THEME.text,
        });
      });
    });
    cursor.y -= rowHeight;
  };

  const headLines = layout(head, font.bold);
  const headHeight = heightOf(headLines);
  // A row taller than a page body (under a repeated header) is cut into slices
  const sliceLines = Math.max(
    1,
    Math.floor((TOP - BOTTOM - headHeight - pad * 2 - 2) / lineHeight)
  );

  cursor.y += BODY_LINE - 6;
  ensure(headHeight + 2);
  draw(headLines, true);
  for (const cells of rows) {
    const cellLines = layout(cells, font.regular);
    for (let start = 0; start < depth(cellLines); start += sliceLines) {
      const slice = cellLines.map((lines) => lines.slice(start, start + sliceLines));
      if (ensure(heightOf(slice) + 2)) draw(headLines, true);
      draw(slice, false);
    }
  }
  cursor.y -= BODY_LINE;
}

// ---- charts ------------------------------------------------------------------

interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

function drawChartUnavailable(page: PDFPage, font: FontSet, y: number): void {
  page.drawRectangle({
    x: MARGIN,
    y: y - 20,
    width: CONTENT_WIDTH,
    height: 26,
    borderColor: THEME.line,
    borderWidth: 0.8,
    color: THEME.paper,
  });
  const label = "Chart unavailable";
  page.drawText(label, {
    x: MARGIN + (CONTENT_WIDTH - font.italic.widthOfTextAtSize(label, 9.5)) / 2,
    y: y - 11,
    size: 9.5,
    font: font.italic,
    color: THEME.muted,
  });
}

function drawChart(page: PDFPage, font: FontSet, spec: ChartSpec, box: Box): void {
  page.drawRectangle({ ...box, color: THEME.paper, borderColor: THEME.line, borderWidth: 0.8 });
  const title = spec.unit ? `${spec.title} (${spec.unit})` : spec.title;
  page.drawText(toWinAnsi(title), {
    x: box.x + 10,
    y: box.y + box.height - 18,
    size: 10,
    font: font.bold,
    color: THEME.ink,
  });

  const plot: Box = {
    x: box.x + 52,
    y: box.y + 26,
    width: box.width - 66,
    height: box.height - 58,
  };
  const values =
    spec.kind === "line"
      ? spec.points.map((p) => p.value)
      : spec.series.flatMap((s) => s.values.filter((v): v is number => v !== null));
  const low = spec.kind === "bar" ? Math.min(0, ...values) : Math.min(...values);
  const high = spec.kind === "bar" ? Math.max(0, ...values) : Math.max(...values);
  const scale = niceScale(low, high);
  const toY = (value: number) =>
    plot.y + ((value - scale.min) / (scale.max - scale.min)) * plot.height;

  for (let tick = scale.min; tick <= scale.max + scale.step / 2; tick += scale.step) {
    const y = toY(tick);
    page.drawLine({
      start: { x: plot.x, y },
      end: { x: plot.x + plot.width, y },
      thickness: 0.4,
      color: THEME.line,
    });
    const label = formatNumber(Math.round(tick * 100) / 100);
    page.drawText(label, {
      x: plot.x - 6 - font.regular.widthOfTextAtSize(label, 7.5),
      y: y - 2.5,
      size: 7.5,
      font: font.regular,
      color: THEME.muted,
    });
  }

  if (spec.kind === "line") {
    drawLineSeries(page, font, spec, plot, toY);
  } else {
    drawBarSeries(page, font, spec, plot, toY);
  }
}

function drawLineSeries(
  page: PDFPage,
  font: FontSet,
  spec: LineChartSpec,
  plot: Box,
  toY: (value: number) => number
): void {
  const count = spec.points.length;
  const toX = (index: number) => plot.x + (count <= 1 ? 0 : (index / (count - 1)) * plot.width);
  spec.points.forEach((point, index) => {
    const previous = spec.points[index - 1];
    if (!previous) return;
    page.drawLine({
      start: { x: toX(index - 1), y: toY(previous.value) },
      end: { x: toX(index), y: toY(point.value) },
      thickness: 1.4,
      color: THEME.sky,
    });
  });

  const labelled = [...new Set([0, Math.floor((count - 1) / 2), count - 1])];
  for (const index of labelled) {
    const point = spec.points[index];
    if (!point) continue;
    const width = font.regular.widthOfTextAtSize(point.label, 7.5);
    const x = Math.min(Math.max(toX(index) - width / 2, plot.x), plot.x + plot.width - width);
    page.drawText(point.label, { x, y: plot.y - 14, size: 7.5, font: font.regular, color: THEME.muted });
  }
}

function drawBarSeries(
  page: PDFPage,
  font: FontSet,
  spec: BarChartSpec,
  plot: Box,
  toY: (value: number) => number
): void {
  const groups = spec.categories.length;
  const groupWidth = plot.width / Math.max(1, groups);
  const barWidth = (groupWidth * 0.7) / Math.max(1, spec.series.length);
  const zero = toY(0);

  spec.categories.forEach((category, groupIndex) => {
    const groupX = plot.x + groupIndex * groupWidth + groupWidth * 0.15;
    spec.series.forEach((series, seriesIndex) => {
      const value = series.values[groupIndex];
      if (value == null) return;
      const top = toY(value);
      page.drawRectangle({
        x: groupX + seriesIndex * barWidth,
        y: Math.min(zero, top),
        width: barWidth - 2,
        height: Math.abs(top - zero),
        color: SERIES_COLORS[seriesIndex % SERIES_COLORS.length] ?? THEME.navy,
      });
    });
    const width = font.regular.widthOfTextAtSize(category, 8);
    page.drawText(toWinAnsi(category), {
      x: plot.x + groupIndex * groupWidth + (groupWidth - width) / 2,
      y: plot.y - 14,
      size: 8,
      font: font.regular,
      color: THEME.muted,
    });
  });

  page.drawLine({
    start: { x: plot.x, y: zero },
    end: { x: plot.x + plot.width, y: zero },
    thickness: 0.8,
    color: THEME.muted,
  });

  let legendX = plot.x + plot.width;
  [...spec.series].reverse().forEach((series, reversedIndex) => {
    const seriesIndex = spec.series.length - 1 - reversedIndex;
    const width = font.regular.widthOfTextAtSize(series.name, 8);
    legendX -= width + 18;
    page.drawRectangle({
      x: legendX,
      y: plot.y + plot.height + 12,
      width: 8,
      height: 8,
      color: SERIES_COLORS[seriesIndex % SERIES_COLORS.length] ?? THEME.navy,
    });
    page.drawText(series.name, {
      x: legendX + 11,
      y: plot.y + plot.height + 13,
      size: 8,
      font: font.regular,
      color: THEME.text,
    });
  });
}

// ---- text helpers ------------------------------------------------------------

export function wrap(input: string, width: number, font: PDFFont, size: number): string[] {
  const out: string[] = [];
  for (const row of input.replace(/\r/g, "").split("\n")) {
    const line = row.trimEnd();
    if (!line.trim()) {
      out.push("");
      continue;
    }
    let current = "";
    for (const word of line.split(/\s+/)) {
      const next = current ? `${current} ${word}` : word;
      if (font.widthOfTextAtSize(next, size) <= width) {
        current = next;
        continue;
      }
      if (current) out.push(current);
      if (font.widthOfTextAtSize(word, size) <= width) {
        current = word;
        continue;
      }
      const pieces = splitWord(word, width, font, size);
      out.push(...pieces.slice(0, -1));
      current = pieces[pieces.length - 1] ?? "";
    }
    if (current) out.push(current);
  }
  return out;
}

function splitWord(word: string, width: number, font: PDFFont, size: number): string[] {
  const out: string[] = [];
  let current = "";
  for (const char of word) {
    const next = `${current}${char}`;
    if (font.widthOfTextAtSize(next, size) <= width) {
      current = next;
      continue;
    }
    if (current) out.push(current);
    current = char;
  }
  if (current) out.push(current);
  return out;
}

function hex(input: string): Color {
  const raw = input.replace("#", "");
  const r = Number.parseInt(raw.slice(0, 2), 16) / 255;
  const g = Number.parseInt(raw.slice(2, 4), 16) / 255;
  const b = Number.parseInt(raw.slice(4, 6), 16) / 255;
  return rgb(r, g, b);
}
