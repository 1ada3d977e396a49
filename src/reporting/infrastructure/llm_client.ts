import type { Logger } from "pino";
import type { AiClient } from "../../ai/client";
import { getLogger } from "../../util/logger";
import { errorMessage, type Result } from "../../util/result";
import type { SectionPrompt } from "../domain/types";
import type { LlmCallMeta, LlmClient, LlmGenerateOptions } from "./contracts";
import { RetryExhaustedError, runWithTimeout, sleep, withRetry, type Sleep } from "./retry";

export interface LlmClientOptions {
  ai: AiClient;
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

export class EmptyCompletionError extends Error {
  constructor() {
    super("Model returned an empty response");
    this.name = "EmptyCompletionError";
  }
}

/**
 * Section text generation with a per-attempt timeout and exponential backoff.
 * Exhausted attempts come back as `{ ok: false }`, never as a rejection.
 */
export function createLlmClient(options: LlmClientOptions): LlmClient {
  const log = options.logger ?? getLogger("llm-client");
  const baseDelayMs = options.baseDelayMs ?? 1000;

  return {
    async generate(
      prompt: SectionPrompt,
      generateOptions: LlmGenerateOptions = {}
    ): Promise<Result<string, LlmCallMeta>> {
      const { signal } = generateOptions;
      let attempts = 0;
      try {
        const text = await withRetry(
          async (attempt) => {
            attempts = attempt;
            const output = await runWithTimeout(
              (attemptSignal) =>
                options.ai.generateText({
                  system: prompt.system,
                  prompt: prompt.renderedText,
                  abortSignal: attemptSignal,
                  traceName: `section:${prompt.sectionName}`,
                }),
              options.timeoutMs,
              signal
            );
            const trimmed = output.trim();
            if (!trimmed) throw new EmptyCompletionError();
            return trimmed;
          },
          {
            attempts: options.maxAttempts,
            baseDelayMs,
            sleep: options.sleep ?? sleep,
            signal,
            onRetry: (error, attempt, delayMs) =>
              log.warn(
                { section: prompt.sectionName, attempt, delayMs, error: errorMessage(error) },
                "Section generation attempt failed; retrying"
              ),
          }
        );
        return { ok: true, data: text, meta: { attempts } };
      } catch (error) {
        const cause = error instanceof RetryExhaustedError ? error.lastError : error;
        log.error(
          { section: prompt.sectionName, attempts, error: errorMessage(cause) },
          "Section generation failed"
        );
        return { ok: false, error: errorMessage(cause), meta: { attempts } };
      }
    },
  };
}
