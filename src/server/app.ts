import express, {
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { z } from "zod";
import { PRESET_TICKERS } from "../market/tickers";
import type { ProgressEvent } from "../reporting/application/generate_investment_report";
import { InputError } from "../reporting/domain/errors";
import { getLogger } from "../util/logger";
import { errorMessage } from "../util/result";
import type { RunRegistry } from "./run_registry";

const log = getLogger("server");

const startRunSchema = z.object({ ticker: z.string().min(1) });

export interface AppOptions {
  registry: RunRegistry;
  /** Directory holding index.html; omitted in tests. */
  publicDir?: string;
}

function writeEvent(res: Response, event: ProgressEvent): void {
  res.write(`event: ${event.stage}\ndata: ${JSON.stringify(event)}\n\n`);
}

export function createApp(options: AppOptions): express.Express {
  const { registry } = options;
  const app = express();
  app.use(express.json());
  if (options.publicDir) app.use(express.static(options.publicDir));

  app.get("/api/tickers", (_req, res) => {
    res.json({ tickers: PRESET_TICKERS });
  });

  app.post("/api/reports", (req, res) => {
    const body = startRunSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: "Body must be {\"ticker\": string}" });
      return;
    }
    try {
      const run = registry.start(body.data.ticker);
      log.info({ runId: run.runId, ticker: run.ticker }, "Run started");
      res.status(202).json({ runId: run.runId, ticker: run.ticker });
    } catch (error) {
      if (error instanceof InputError) {
        res.status(400).json({ error: error.message });
        return;
      }
      throw error;
    }
  });

  app.get("/api/reports/:id", (req, res) => {
    const run = registry.get(req.params.id);
    if (!run) {
      res.status(404).json({ error: "Unknown run" });
      return;
    }
    res.json(run);
  });

  app.get("/api/reports/:id/events", (req, res) => {
    if (!registry.get(req.params.id)) {
      res.status(404).json({ error: "Unknown run" });
      return;
    }
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    const unsubscribe = registry.subscribe(
      req.params.id,
      (event) => writeEvent(res, event),
      () => res.end()
    );
    req.on("close", () => unsubscribe?.());
  });

  app.get("/api/reports/:id/pdf", (req, res, next) => {
    const run = registry.get(req.params.id);
    if (!run) {
      res.status(404).json({ error: "Unknown run" });
      return;
    }
    if (run.status !== "done" || !run.pdfPath) {
      res.status(409).json({ error: `Report is ${run.status}`, status: run.status });
      return;
    }
    res.download(run.pdfPath, (error) => {
      if (error) next(error);
    });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    log.error({ error: errorMessage(err) }, "Request failed");
    if (res.headersSent) return;
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
