import { EventEmitter } from "events";
import { randomUUID } from "crypto";
import type { Logger } from "pino";
import { parseTicker } from "../market/ticker";
import type {
  GenerateInvestmentReportInput,
  GenerateInvestmentReportOutput,
  ProgressEvent,
} from "../reporting/application/generate_investment_report";
import { getLogger } from "../util/logger";
import { errorMessage } from "../util/result";

export type RunStatus = "running" | "done" | "failed";

export interface RunSnapshot {
  runId: string;
  ticker: string;
  status: RunStatus;
  startedAt: string;
  pdfPath?: string;
  markdownPath?: string;
  error?: string;
}

interface RunRecord extends RunSnapshot {
  events: ProgressEvent[];
  emitter: EventEmitter;
}

export type RunReport = (
  input: GenerateInvestmentReportInput
) => Promise<GenerateInvestmentReportOutput>;

export interface RunRegistryOptions {
  runReport: RunReport;
  /** Finished runs beyond this count are forgotten, oldest first. */
  maxRuns?: number;
  now?: () => Date;
  logger?: Logger;
}

const EVENT = "progress";

/**
 * In-process registry of report runs started from the web front end. Each run
 * keeps its progress history so late subscribers get a full replay.
 */
export class RunRegistry {
  private readonly runs = new Map<string, RunRecord>();
  private readonly runReport: RunReport;
  private readonly maxRuns: number;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(options: RunRegistryOptions) {
    this.runReport = options.runReport;
    this.maxRuns = options.maxRuns ?? 50;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? getLogger("run-registry");
  }

  /** Validates the ticker and starts a run in the background. */
  start(rawTicker: string): RunSnapshot {
    const { symbol } = parseTicker(rawTicker);
    const record: RunRecord = {
      runId: randomUUID(),
      ticker: symbol,
      status: "running",
      startedAt: this.now().toISOString(),
      events: [],
      emitter: new EventEmitter(),
    };
    this.runs.set(record.runId, record);
    this.evict();

    void this.runReport({
      ticker: symbol,
      runId: record.runId,
      onProgress: (event) => this.record(record, event),
    })
      .then((output) => {
        record.status = "done";
        record.pdfPath = output.document.pdfPath;
        record.markdownPath = output.document.markdownPath;
        this.log.info({ runId: record.runId, pdfPath: record.pdfPath }, "Run finished");
      })
      .catch((error: unknown) => {
        record.status = "failed";
        record.error = errorMessage(error);
        // Failures raised outside the pipeline have no failed event yet
        if (!record.events.some((e) => e.stage === "failed")) {
          this.record(record, { stage: "failed", message: record.error });
        }
        this.log.warn({ runId: record.runId, error: record.error }, "Run failed");
      })
      .finally(() => record.emitter.emit(EVENT, undefined));

    return snapshotOf(record);
  }

  get(runId: string): RunSnapshot | undefined {
    const record = this.runs.get(runId);
    return record ? snapshotOf(record) : undefined;
  }

  /**
   * Replays past events, then forwards new ones. `onEnd` fires once the run has
   * settled. Returns an unsubscribe function.
   */
  subscribe(
    runId: string,
    onEvent: (event: ProgressEvent) => void,
    onEnd: () => void
  ): (() => void) | undefined {
    const record = this.runs.get(runId);
    if (!record) return undefined;
    record.events.forEach(onEvent);
    if (record.status !== "running") {
      onEnd();
      return () => undefined;
    }
    const listener = (event: ProgressEvent | undefined) => {
      if (event) {
        onEvent(event);
        return;
      }
      record.emitter.off(EVENT, listener);
      onEnd();
    };
    record.emitter.on(EVENT, listener);
    return () => record.emitter.off(EVENT, listener);
  }

  private record(record: RunRecord, event: ProgressEvent): void {
    record.events.push(event);
    record.emitter.emit(EVENT, event);
  }

  private evict(): void {
    if (this.runs.size <= this.maxRuns) return;
    for (const [runId, record] of this.runs) {
      if (this.runs.size <= this.maxRuns) break;
      if (record.status !== "running") this.runs.delete(runId);
    }
  }
}

function snapshotOf(record: RunRecord): RunSnapshot {
  const { events: _events, emitter: _emitter, ...snapshot } = record;
  return { ...snapshot };
}
