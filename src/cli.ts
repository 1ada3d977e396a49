#!/usr/bin/env node
// Load envs from .env
import "dotenv/config";
import { createServices, type AppServices } from "./bootstrap";
import { parseTicker } from "./market/ticker";
import { PRESET_TICKERS } from "./market/tickers";
import {
  generateInvestmentReport,
  type GenerateInvestmentReportInput,
  type GenerateInvestmentReportOutput,
  type ReportPipelineDependencies,
} from "./reporting/application/generate_investment_report";
import { loadAppConfig, type AppConfig } from "./reporting/config";
import { InputError, ReportError } from "./reporting/domain/errors";
import { getLogger } from "./util/logger";
import { errorMessage } from "./util/result";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = [
  "Usage: equity-report <command>",
  "",
  "Commands:",
  "  run <TICKER>          Generate the investment report for TICKER",
  "  cache clear <TICKER>  Drop cached provider responses for TICKER",
  "  cache clear --all     Drop every cached provider response",
  "  cache stats           Count cached responses per source and ticker",
  "  tickers               List preset tickers",
].join("\n");

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDependencies {
  loadConfig(): AppConfig;
  createServices(config: AppConfig): Pick<AppServices, "cache" | "tracer" | "pipeline">;
  generate(
    input: GenerateInvestmentReportInput,
    deps: ReportPipelineDependencies
  ): Promise<GenerateInvestmentReportOutput>;
}

const consoleIo: CliIo = {
  // eslint-disable-next-line no-console
  out: (line) => console.log(line),
  // eslint-disable-next-line no-console
  err: (line) => console.error(line),
};

const defaultDependencies: CliDependencies = {
  loadConfig: loadAppConfig,
  createServices,
  generate: generateInvestmentReport,
};

function usageError(io: CliIo, message: string): number {
  io.err(message);
  io.err(USAGE);
  return EXIT_USAGE;
}

/**
 * Runs one CLI command and resolves to the process exit code.
 */
export async function runCli(
  argv: string[],
  io: CliIo = consoleIo,
  deps: CliDependencies = defaultDependencies
): Promise<number> {
  const [command, ...rest] = argv;

  if (command === "tickers" && rest.length === 0) {
    const width = Math.max(...PRESET_TICKERS.map((t) => t.symbol.length));
    for (const t of PRESET_TICKERS) io.out(`${t.symbol.padEnd(width)}  ${t.name}`);
    return EXIT_OK;
  }
  if (command === "run") {
    if (rest.length !== 1) return usageError(io, "run expects exactly one ticker");
    return runReport(rest[0], io, deps);
  }
  if (command === "cache" && rest[0] === "clear") {
    if (rest.length !== 2) {
      return usageError(io, "cache clear expects exactly one ticker or --all");
    }
    return rest[1] === "--all" ? clearAllCache(io, deps) : clearCache(rest[1], io, deps);
  }
  if (command === "cache" && rest[0] === "stats" && rest.length === 1) {
    return showCacheStats(io, deps);
  }
  if (command === "--help" || command === "-h" || command === "help") {
    io.out(USAGE);
    return EXIT_OK;
  }
  return usageError(io, command ? `Unknown command: ${argv.join(" ")}` : "Missing command");
}

async function runReport(ticker: string, io: CliIo, deps: CliDependencies): Promise<number> {
  try {
    const services = deps.createServices(deps.loadConfig());
    try {
      const output = await deps.generate(
        {
          ticker,
          onProgress: (event) => io.err(`[${event.stage}] ${event.message}`),
        },
        services.pipeline
      );
      const failed = output.report.sections.filter((s) => s.status === "failed").length;
      io.out(`PDF: ${output.document.pdfPath}`);
      io.out(`Markdown: ${output.document.markdownPath}`);
      if (failed > 0) io.err(`${failed} section(s) could not be generated`);
      return EXIT_OK;
    } finally {
      await services.tracer.flush();
    }
  } catch (error) {
    return reportFailure(error, io);
  }
}

async function clearCache(ticker: string, io: CliIo, deps: CliDependencies): Promise<number> {
  try {
    const symbol = parseTicker(ticker).symbol;
    const services = deps.createServices(deps.loadConfig());
    const removed = await services.cache.clear(symbol);
    io.out(`Removed ${removed} cached response(s) for ${symbol}`);
    return EXIT_OK;
  } catch (error) {
    return reportFailure(error, io);
  }
}

async function clearAllCache(io: CliIo, deps: CliDependencies): Promise<number> {
  try {
    const services = deps.createServices(deps.loadConfig());
    const removed = await services.cache.clearAll();
    io.out(`Removed ${removed} cached response(s)`);
    return EXIT_OK;
  } catch (error) {
    return reportFailure(error, io);
  }
}

function countLines(counts: Record<string, number>): string[] {
  const entries = Object.entries(counts).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const width = Math.max(0, ...entries.map(([name]) => name.length));
  return entries.map(([name, n]) => `  ${name.padEnd(width)}  ${n}`);
}

async function showCacheStats(io: CliIo, deps: CliDependencies): Promise<number> {
  try {
    const services = deps.createServices(deps.loadConfig());
    const stats = await services.cache.stats();
    io.out(`Cached responses: ${stats.total}`);
    if (stats.total === 0) return EXIT_OK;
    io.out("By source:");
    countLines(stats.bySource).forEach((line) => io.out(line));
    io.out("By ticker:");
    countLines(stats.byTicker).forEach((line) => io.out(line));
    return EXIT_OK;
  } catch (error) {
    return reportFailure(error, io);
  }
}

function reportFailure(error: unknown, io: CliIo): number {
  if (error instanceof InputError) return usageError(io, `Error: ${error.message}`);
  io.err(`Error: ${errorMessage(error)}`);
  if (!(error instanceof ReportError)) {
    getLogger("cli").error({ error: errorMessage(error) }, "Unexpected failure");
  }
  return EXIT_FAILURE;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      // eslint-disable-next-line no-console
      console.error(err);
      process.exit(EXIT_FAILURE);
    });
}
