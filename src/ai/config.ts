import { ConfigurationError } from "../reporting/domain/errors";
import { getNumber, getString } from "../util/env";
import type { LangfuseKeys } from "./telemetry/langfuse";

export type AiProvider = "google" | "openai";

export interface AiConfig {
  provider: AiProvider;
  model: string;
  apiKey: string | undefined;
  timeoutMs: number;
  maxAttempts: number;
  /** Set only when both Langfuse keys are present. */
  langfuse?: LangfuseKeys;
}

const DEFAULT_MODELS: Record<AiProvider, string> = {
  google: "gemini-2.5-flash",
  openai: "gpt-4o-mini",
};

export function parseProvider(raw: string): AiProvider {
  const value = raw.trim().toLowerCase();
  if (value === "google" || value === "openai") return value;
  throw new ConfigurationError(
    `Unsupported LLM_PROVIDER "${raw}"; expected google or openai`,
    { provider: raw }
  );
}

/**
 * Reads LLM settings. A missing key is left undefined so the caller can
 * report every missing variable at once.
 */
export function loadAiConfig(): AiConfig {
  const provider = parseProvider(getString("LLM_PROVIDER", "google"));
  const model = getString("LLM_MODEL", DEFAULT_MODELS[provider]);
  const apiKey = getString("LLM_API_KEY");
  const timeoutMs = getNumber("LLM_TIMEOUT_MS", 60_000);
  const maxAttempts = getNumber("LLM_MAX_ATTEMPTS", 3);
  const publicKey = getString("LANGFUSE_PUBLIC_KEY");
  const secretKey = getString("LANGFUSE_SECRET_KEY");
  const langfuse =
    publicKey && secretKey
      ? { publicKey, secretKey, baseUrl: getString("LANGFUSE_HOST") }
      : undefined;
  return { provider, model, apiKey, timeoutMs, maxAttempts, langfuse };
}
