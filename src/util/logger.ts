import pino, { Logger, LoggerOptions } from "pino";
import { getStage, isLocal, isProduction, isTest } from "./env";

/**
 * Centralized structured logger for the CLI, the web front end and tests.
 * - Local/dev: pretty-printed logs for readability
 * - prod: JSON logs for log shipping
 * - test: silent unless LOG_LEVEL is set
 */
function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (isTest()) return "silent";
  return isProduction() ? "info" : "debug";
}

const baseOptions: LoggerOptions = {
  level: resolveLevel(),
  base: {
    service: "equity-report",
    stage: getStage(),
  },
  redact: {
    // Remove sensitive fields from logs
    paths: [
      "*.password",
      "*.secret",
      "*.token",
      "*.apiKey",
      "*.api_key",
      "headers.authorization",
    ],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

// Pretty transport runs in a worker thread; keep it out of test runs
const transport =
  isLocal() && !isProduction() && !isTest()
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: false,
          ignore: "pid,hostname",
          messageKey: "message",
        },
      }
    : undefined;

const rootLogger: Logger = pino({ ...baseOptions, transport });

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

/**
 * Returns a child logger bound to a single pipeline run.
 */
export function withRunContext(
  moduleName: string | undefined,
  run: { runId: string; ticker: string }
): Logger {
  return getLogger(moduleName).child({
    runId: run.runId,
    ticker: run.ticker,
  });
}

export default rootLogger;
