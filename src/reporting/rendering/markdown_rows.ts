/**
 * Line-level Markdown parsing for the PDF renderer. Covers the subset the
 * report uses: headings, paragraphs, bullets, numbered items, quotes, tables
 * and chart placeholders.
 */

export type Row =
  | { kind: "blank" }
  | { kind: "heading"; text: string; level: number }
  | { kind: "text"; text: string }
  | { kind: "bullet"; text: string; marker: string }
  | { kind: "quote"; text: string }
  | { kind: "table"; head: string[]; rows: string[][] }
  | { kind: "chart"; key: string };

const CHART_PLACEHOLDER = /^\{\{chart:([a-z0-9-]+)\}\}$/;

// Characters outside WinAnsi that have a close ASCII stand-in
const REPLACEMENTS: Array<[RegExp, string]> = [
  [/[\u2018\u2019\u201a\u2032]/g, "'"],
  [/[\u201c\u201d\u201e\u2033]/g, '"'],
  [/[\u2010-\u2015\u2212]/g, "-"],
  [/\u2026/g, "..."],
  [/[\u2000-\u200a\u202f\u205f]/g, " "],
  [/[\u200b-\u200d\ufeff]/g, ""],
  [/\t/g, "    "],
  [/\u2192/g, "->"],
  [/\u2190/g, "<-"],
  [/\u2264/g, "<="],
  [/\u2265/g, ">="],
];

const WIN_ANSI_EXTRAS = new Set(["\u2022", "\u20ac", "\u2122"]);

/**
 * Reduces text to characters the standard PDF fonts can encode.
 */
export function toWinAnsi(input: string): string {
  let text = input;
  for (const [pattern, replacement] of REPLACEMENTS) {
    text = text.replace(pattern, replacement);
  }
  let out = "";
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    const printable = (code >= 0x20 && code <= 0x7e) || (code >= 0xa0 && code <= 0xff);
    out += printable || char === "\n" || WIN_ANSI_EXTRAS.has(char) ? char : "?";
  }
  return out;
}

export function cleanInline(input: string): string {
  return input
    .replace(/!\[[^\]]*\]\([^)]+\)/g, "")
    .replace(/\[([^\]]+)\]\((https?:[^)]+)\)/g, "$1 ($2)")
    .replace(/`{1,3}([^`]+)`{1,3}/g, "$1")
    .replace(/\*\*(.*?)\*\*/g, "$1")
    .replace(/__(.*?)__/g, "$1")
    .replace(/(^|[\s(])\*([^*\n]+)\*(?=[\s).,:;!?]|$)/g, "$1$2")
    .replace(/<[^>]+>/g, "");
}

function isTableDivider(line: string): boolean {
  return /^\|(?:\s*:?-{3,}:?\s*\|)+\s*$/.test(line);
}

function tableCells(line: string): string[] {
  return line
    .split("|")
    .slice(1, -1)
    .map((cell) => cleanInline(cell.trim()));
}

function markdownTable(
  lines: string[],
  start: number
): { head: string[]; rows: string[][]; next: number } | undefined {
  const headLine = lines[start]?.trim();
  const dividerLine = lines[start + 1]?.trim();
  if (!headLine?.startsWith("|")) return undefined;
  if (!dividerLine || !isTableDivider(dividerLine)) return undefined;

  const head = tableCells(headLine);
  if (head.length === 0) return undefined;

  const rows: string[][] = [];
  let next = start + 2;
  while (next < lines.length) {
    const row = lines[next]?.trim() ?? "";
    if (!row.startsWith("|")) break;
    if (!isTableDivider(row)) rows.push(tableCells(row));
    next++;
  }
  return { head, rows, next };
}

export function markdownRows(input: string): Row[] {
  const out: Row[] = [];
  let code = false;
  const lines = toWinAnsi(input.replace(/\r/g, "")).split("\n");

  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? "").trimEnd();
    const trimmed = line.trim();

    if (/^```/.test(trimmed)) {
      code = !code;
      continue;
    }
    if (code) {
      out.push(trimmed ? { kind: "text", text: line } : { kind: "blank" });
      continue;
    }
    if (!trimmed || /^-{3,}$/.test(trimmed)) {
      out.push({ kind: "blank" });
      continue;
    }

    const chart = CHART_PLACEHOLDER.exec(trimmed);
    if (chart?.[1]) {
      out.push({ kind: "chart", key: chart[1] });
      continue;
    }

    const table = markdownTable(lines, i);
    if (table) {
      out.push({ kind: "table", head: table.head, rows: table.rows });
      i = table.next - 1;
      continue;
    }

    const heading = /^(#{1,6})\s+(.+)$/.exec(trimmed);
    if (heading?.[1] && heading[2]) {
      out.push({ kind: "heading", text: cleanInline(heading[2]), level: heading[1].length });
      continue;
    }

    const quote = /^>\s?(.*)$/.exec(trimmed);
    if (quote) {
      out.push({ kind: "quote", text: cleanInline(quote[1] ?? "") });
      continue;
    }

    const bullet = /^\s*[-*+]\s+(.+)$/.exec(line);
    if (bullet?.[1]) {
      out.push({ kind: "bullet", marker: "\u2022", text: cleanInline(bullet[1]) });
      continue;
    }

    const ordered = /^\s*(\d+)[.)]\s+(.+)$/.exec(line);
    if (ordered?.[1] && ordered[2]) {
      out.push({ kind: "bullet", marker: `${ordered[1]}.`, text: cleanInline(ordered[2]) });
      continue;
    }

    out.push({ kind: "text", text: cleanInline(trimmed) });
  }

  return out;
}
