/**
 * End-to-end report run: fetch data, build prompts, generate sections, assemble,
 * render and write the artifacts.
 */
import { randomUUID } from "crypto";
import type { Logger } from "pino";
import { parseTicker } from "../../market/ticker";
import { PRESET_TICKERS } from "../../market/tickers";
import { mapConcurrent } from "../../util/concurrency";
import { withRunContext } from "../../util/logger";
import { errorMessage } from "../../util/result";
import {
  PipelineTimeoutError,
  RenderFailure,
  ReportError,
} from "../domain/errors";
import { SECTION_NAMES } from "../domain/sections";
import type {
  FinancialSnapshot,
  NormalizedResult,
  RenderedDocument,
  Report,
  SearchResult,
  SectionResult,
} from "../domain/types";
import type {
  ArtifactWriter,
  DocumentRenderer,
  FinancialAdapter,
  LlmClient,
  SearchAdapter,
} from "../infrastructure/contracts";
import { artifactTarget } from "../rendering/artifact_writer";
import { buildChartData } from "../rendering/charts";
import { buildSectionPrompt, buildSources } from "./prompt_assembler";
import { assembleReport, toMarkdown, toSectionResult } from "./report_assembler";

export const DEFAULT_SECTION_CONCURRENCY = 3;
export const DEFAULT_PIPELINE_TIMEOUT_MS = 900_000;

export type ProgressStage =
  | "start"
  | "fetch-data"
  | "build-prompts"
  | "generate-sections"
  | "assemble-report"
  | "render-document"
  | "done"
  | "failed";

export interface ProgressEvent {
  stage: ProgressStage;
  message: string;
  data?: Record<string, unknown>;
}

export type ProgressListener = (event: ProgressEvent) => void;

export interface ReportPipelineDependencies {
  search: SearchAdapter;
  financial: FinancialAdapter;
  llm: LlmClient;
  renderer: DocumentRenderer;
  writer: ArtifactWriter;
  outputDir: string;
  sectionConcurrency?: number;
  pipelineTimeoutMs?: number;
  now?: () => Date;
}

export interface GenerateInvestmentReportInput {
  ticker: string;
  runId?: string;
  onProgress?: ProgressListener;
}

export interface GenerateInvestmentReportOutput {
  runId: string;
  report: Report;
  document: RenderedDocument;
}

function noticeOf<T>(result: NormalizedResult<T>): string | undefined {
  return result.status === "ok" ? undefined : result.notice;
}

function companyNameOf(
  symbol: string,
  financial: NormalizedResult<FinancialSnapshot>
): string {
  if (financial.status !== "unavailable" && financial.data.profile.companyName) {
    return financial.data.profile.companyName;
  }
  return presetName(symbol) ?? symbol;
}

function presetName(symbol: string): string | undefined {
  return PRESET_TICKERS.find((t) => t.symbol === symbol)?.name;
}

/**
 * Runs the whole pipeline for one ticker.
 *
 * Source and section failures end up in the report as notices and failed
 * sections. Invalid input, render failures and the global timeout reject.
 * After a timeout nothing is written.
 */
export async function generateInvestmentReport(
  input: GenerateInvestmentReportInput,
  deps: ReportPipelineDependencies
): Promise<GenerateInvestmentReportOutput> {
  const runId = input.runId ?? randomUUID();
  let log: Logger = withRunContext("report-pipeline", {
    runId,
    ticker: input.ticker,
  });
  const emit: ProgressListener = (event) => {
    try {
      input.onProgress?.(event);
    } catch (error) {
      log.warn({ error: errorMessage(error) }, "Progress listener threw");
    }
  };

  emit({ stage: "start", message: `Starting report for ${input.ticker}`, data: { runId } });

  const timeoutMs = deps.pipelineTimeoutMs ?? DEFAULT_PIPELINE_TIMEOUT_MS;
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new PipelineTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    const ticker = parseTicker(input.ticker);
    log = withRunContext("report-pipeline", { runId, ticker: ticker.symbol });
    const output = await Promise.race([
      runStages(ticker.symbol, runId, deps, controller.signal, emit, log),
      timeout,
    ]);
    emit({
      stage: "done",
      message: `Report written to ${output.document.pdfPath}`,
      data: {
        runId,
        pdfPath: output.document.pdfPath,
        markdownPath: output.document.markdownPath,
      },
    });
    return output;
  } catch (error) {
    const code = error instanceof ReportError ? error.code : "UNEXPECTED";
    log.error({ code, error: errorMessage(error) }, "Report run failed");
    emit({
      stage: "failed",
      message: errorMessage(error),
      data: { runId, code },
    });
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

async function runStages(
  symbol: string,
  runId: string,
  deps: ReportPipelineDependencies,
  signal: AbortSignal,
  emit: ProgressListener,
  log: Logger
): Promise<GenerateInvestmentReportOutput> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const asOfDate = startedAt.toISOString().slice(0, 10);

  // 1. Data
  emit({ stage: "fetch-data", message: "Fetching web search and financial data" });
  const hint = presetName(symbol);
  const [search, financial]: [
    NormalizedResult<SearchResult>,
    NormalizedResult<FinancialSnapshot>,
  ] = await Promise.all([
    deps.search.fetch(symbol, hint ? { companyName: hint } : {}, { signal }),
    deps.financial.fetch(symbol, {}, { signal }),
  ]);
  const notices = [noticeOf(search), noticeOf(financial)].filter(
    (n): n is string => n !== undefined
  );
  log.info(
    { search: search.status, financial: financial.status, notices: notices.length },
    "Data fetched"
  );
  emit({
    stage: "fetch-data",
    message: "Data fetched",
    data: { search: search.status, financial: financial.status, notices },
  });

  // 2. Prompts
  const companyName = companyNameOf(symbol, financial);
  const sources = buildSources(symbol, companyName, search, financial);
  const context = { ticker: symbol, companyName, asOfDate, sources, notices };
  const prompts = SECTION_NAMES.map((name) =>
    buildSectionPrompt(name, search, financial, context)
  );
  emit({
    stage: "build-prompts",
    message: `Built ${prompts.length} section prompts`,
    data: { sources: sources.length },
  });

  // 3. Sections; each one fails on its own
  let completed = 0;
  const results = await mapConcurrent<(typeof prompts)[number], SectionResult>(
    prompts,
    deps.sectionConcurrency ?? DEFAULT_SECTION_CONCURRENCY,
    async (prompt) => {
      const outcome = await deps.llm.generate(prompt, { signal });
      const result = toSectionResult(prompt.sectionName, outcome, sources);
      completed += 1;
      if (result.status === "failed") {
        log.warn(
          { section: prompt.sectionName, reason: result.failure.reason },
          "Section generation failed"
        );
      }
      emit({
        stage: "generate-sections",
        message: `${prompt.sectionName}: ${result.status}`,
        data: {
          section: prompt.sectionName,
          status: result.status,
          completed,
          total: prompts.length,
        },
      });
      return result;
    }
  );

  // 4. Assemble
  const report = assembleReport(
    {
      ticker: symbol,
      companyName,
      asOfDate,
      notices,
      sources,
      chartData: buildChartData(
        financial.status === "unavailable" ? undefined : financial.data
      ),
    },
    results
  );
  const markdown = toMarkdown(report);
  const failed = report.sections.filter((s) => s.status === "failed").length;
  emit({
    stage: "assemble-report",
    message: `Assembled ${report.sections.length} sections`,
    data: { failed },
  });

  // 5. Render and write
  emit({ stage: "render-document", message: "Rendering PDF" });
  let pdfBytes: Uint8Array;
  try {
    pdfBytes = await deps.renderer.render(report, markdown);
  } catch (error) {
    if (error instanceof RenderFailure) throw error;
    throw new RenderFailure(`Document rendering failed: ${errorMessage(error)}`, {
      ticker: symbol,
    });
  }
  if (signal.aborted) {
    throw new PipelineTimeoutError(deps.pipelineTimeoutMs ?? DEFAULT_PIPELINE_TIMEOUT_MS);
  }

  const target = artifactTarget(deps.outputDir, symbol, startedAt);
  try {
    await deps.writer.write(target, { pdfBytes, markdown }, { signal });
  } catch (error) {
    if (signal.aborted) {
      throw new PipelineTimeoutError(deps.pipelineTimeoutMs ?? DEFAULT_PIPELINE_TIMEOUT_MS);
    }
    throw error;
  }
  log.info({ pdfPath: target.pdfPath, failed }, "Report written");

  return {
    runId,
    report,
    document: {
      pdfPath: target.pdfPath,
      markdownPath: target.markdownPath,
      pdfBytes,
      markdown,
    },
  };
}
