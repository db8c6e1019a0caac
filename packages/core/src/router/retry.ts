/**
 * Retry for model calls, plus the abort-aware `sleep` and `AbortError` the
 * pipeline and the source adapters share.
 *
 * Whether a failure is worth another attempt is read from the AI SDK's
 * `APICallError` (status 408/409/429/5xx and connection failures), not from
 * message text. The SDK's own retry is switched off by the caller so the two
 * layers do not multiply.
 */

import { APICallError } from 'ai';

export interface ModelRetryConfig {
  /** Retries after the first attempt (default: 3). */
  maxRetries?: number;
  /** Delay before the first retry, doubled each time (default: 1000). */
  initialDelayMs?: number;
  /** Delay cap (default: 30000). */
  maxDelayMs?: number;
  /** Per-attempt limit; a slow article counts as a failed attempt (default: 120000). */
  timeoutMs?: number;
  abortSignal?: AbortSignal;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

export const MODEL_RETRY_DEFAULTS: Required<Omit<ModelRetryConfig, 'abortSignal' | 'onRetry'>> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  timeoutMs: 120000,
};

export class ModelTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Model call timed out after ${timeoutMs}ms`);
    this.name = 'ModelTimeoutError';
  }
}

export class AbortError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AbortError';
  }
}

/** True for cancellations from our own `AbortError` or from `fetch`/`AbortController`. */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function isRetryableModelError(error: unknown): boolean {
  if (error instanceof ModelTimeoutError) return true;
  return APICallError.isInstance(error) && error.isRetryable;
}

/** `Retry-After` of a rate-limited call, in milliseconds. */
export function retryAfterMs(error: unknown): number | undefined {
  if (!APICallError.isInstance(error)) return undefined;
  const header = error.responseHeaders?.['retry-after'];
  const seconds = header === undefined ? NaN : Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * Run `fn` until it succeeds, a failure is not retryable, or the retries run
 * out. Each attempt gets its own signal, aborted on timeout or when the
 * caller's signal fires.
 */
export async function retryModelCall<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  config: ModelRetryConfig = {},
): Promise<{ result: T; attempts: number }> {
  const { maxRetries, initialDelayMs, maxDelayMs, timeoutMs } = { ...MODEL_RETRY_DEFAULTS, ...config };
  const { abortSignal, onRetry } = config;

  for (let attempt = 0; ; attempt++) {
    if (abortSignal?.aborted) throw new AbortError('Model call aborted');
    try {
      const result = await attemptWithTimeout(fn, timeoutMs, abortSignal);
      return { result, attempts: attempt + 1 };
    } catch (err) {
      if (isAbortError(err) || !isRetryableModelError(err) || attempt >= maxRetries) throw err;
      const error = err instanceof Error ? err : new Error(String(err));
      const backoff = Math.min(initialDelayMs * 2 ** attempt, maxDelayMs);
      const delay = Math.max(backoff, retryAfterMs(err) ?? 0);
      onRetry?.(attempt + 1, error, delay);
      await sleep(delay, abortSignal);
    }
  }
}

async function attemptWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  outer?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  outer?.addEventListener('abort', onAbort, { once: true });

  let timedOut = false;
  const timer = timeoutMs > 0 && Number.isFinite(timeoutMs)
    ? setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs)
    : undefined;

  try {
    return await fn(controller.signal);
  } catch (err) {
    if (outer?.aborted) throw new AbortError('Model call aborted');
    if (timedOut) throw new ModelTimeoutError(timeoutMs);
    throw err;
  } finally {
    clearTimeout(timer);
    outer?.removeEventListener('abort', onAbort);
  }
}

/** Sleep for the given milliseconds, rejecting with `AbortError` on abort. */
export function sleep(ms: number, abortSignal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (abortSignal?.aborted) {
      reject(new AbortError('Aborted'));
      return;
    }

    const timer = setTimeout(() => {
      abortSignal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError('Aborted while waiting'));
    };
    abortSignal?.addEventListener('abort', onAbort, { once: true });
  });
}
