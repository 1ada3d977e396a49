import { errorMessage } from "../../util/result";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  factor?: number;
  sleep?: Sleep;
  signal?: AbortSignal;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(errorMessage(lastError));
    this.name = "RetryExhaustedError";
  }
}

/** Delay before retry number `attempt` (1-based): base, base*factor, ... */
export function backoffDelay(attempt: number, baseDelayMs: number, factor = 2): number {
  return baseDelayMs * Math.pow(factor, Math.max(0, attempt - 1));
}

/**
 * Runs `fn` up to `attempts` times with exponential backoff. Rejects with
 * RetryExhaustedError carrying the last error.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      const retryable =
        attempt < attempts &&
        !options.signal?.aborted &&
        (options.shouldRetry?.(error, attempt) ?? true);
      if (!retryable) {
        throw new RetryExhaustedError(attempt, error);
      }
      const delayMs = backoffDelay(attempt, options.baseDelayMs, options.factor);
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs);
    }
  }
  throw new RetryExhaustedError(attempts, lastError);
}

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Runs `fn` with an AbortSignal that fires after `timeoutMs` or when `parent`
 * aborts, whichever comes first.
 */
export async function runWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) controller.abort(parent.reason);
  parent?.addEventListener("abort", onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpStatusError";
  }
}

// Network errors, rate limiting and 5xx are worth one more try
export function isTransient(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.status === 429 || error.status >= 500;
  }
  if (error instanceof SyntaxError) return false;
  if (error instanceof Error && error.name === "AbortError") return false;
  return true;
}
