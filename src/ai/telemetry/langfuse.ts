import { Langfuse } from "langfuse";
import { getLogger } from "../../util/logger";
import { errorMessage } from "../../util/result";

const log = getLogger("langfuse");

export interface LangfuseKeys {
  publicKey: string;
  secretKey: string;
  baseUrl?: string;
}

export interface GenerationInfo {
  model?: string;
  input?: unknown;
  metadata?: Record<string, unknown>;
}

export interface Tracer {
  /** Runs `fn` and records it as one generation; the result or error passes through. */
  generation<T>(name: string, fn: () => Promise<T>, info?: GenerationInfo): Promise<T>;
  flush(): Promise<void>;
}

export const noopTracer: Tracer = {
  generation: (_name, fn) => fn(),
  flush: async () => undefined,
};

/**
 * Records LLM generations in Langfuse. Without keys every call just runs `fn`.
 */
export function createLangfuseTracer(keys: LangfuseKeys | undefined): Tracer {
  if (!keys) return noopTracer;
  const client = new Langfuse({
    publicKey: keys.publicKey,
    secretKey: keys.secretKey,
    baseUrl: keys.baseUrl,
  });

  return {
    async generation(name, fn, info = {}) {
      const trace = client.trace({ name, metadata: info.metadata });
      const generation = trace.generation({ name, model: info.model, input: info.input });
      try {
        const result = await fn();
        generation.end({ output: result });
        trace.update({ output: "success" });
        return result;
      } catch (err) {
        const message = errorMessage(err);
        generation.end({ level: "ERROR", statusMessage: message });
        trace.update({ output: `error: ${message}` });
        throw err;
      }
    },
    async flush() {
      try {
        await client.flushAsync();
      } catch (err) {
        log.warn({ error: errorMessage(err) }, "Langfuse flush failed");
      }
    },
  };
}
