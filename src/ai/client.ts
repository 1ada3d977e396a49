import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";
import { generateText, type LanguageModel } from "ai";
import { ConfigurationError } from "../reporting/domain/errors";
import type { AiConfig } from "./config";
import { noopTracer, type Tracer } from "./telemetry/langfuse";

export interface GenerateTextParams {
  system: string;
  prompt: string;
  abortSignal?: AbortSignal;
  traceName?: string;
}

export interface AiClient {
  readonly model: string;
  generateText(params: GenerateTextParams): Promise<string>;
}

function resolveModel(cfg: AiConfig): LanguageModel {
  if (cfg.provider === "google") {
    return createGoogleGenerativeAI({ apiKey: cfg.apiKey })(cfg.model);
  }
  if (cfg.provider === "openai") {
    return createOpenAI({ apiKey: cfg.apiKey })(cfg.model);
  }
  throw new ConfigurationError(`Unsupported AI provider: ${String(cfg.provider)}`);
}

/**
 * Thin wrapper over the AI SDK. SDK-level retries are off; callers own the
 * retry policy. Each call is recorded through `tracer`.
 */
export function createAiClient(cfg: AiConfig, tracer: Tracer = noopTracer): AiClient {
  const model = resolveModel(cfg);
  return {
    model: cfg.model,
    async generateText({ system, prompt, abortSignal, traceName }) {
      return tracer.generation(
        traceName ?? "generate-text",
        async () => {
          const { text } = await generateText({
            model,
            system,
            prompt,
            maxRetries: 0,
            abortSignal,
          });
          return text;
        },
        { model: cfg.model, input: prompt }
      );
    },
  };
}
