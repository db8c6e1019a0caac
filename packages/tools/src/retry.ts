/**
 * HTTP fetch retry for source adapters, collectors and the publisher.
 *
 * Retries 429 and 5xx responses and network failures with exponential
 * backoff, honours `Retry-After`, and stops at once on abort.
 */

export interface FetchRetryConfig {
  /** Retries after the first attempt (default: 2). */
  maxRetries?: number;
  /** Delay before the first retry (default: 1000). */
  initialDelayMs?: number;
  /** Backoff multiplier (default: 2). */
  backoffMultiplier?: number;
  /** Delay cap (default: 15000). */
  maxDelayMs?: number;
}

const DEFAULT_CONFIG: Required<FetchRetryConfig> = {
  maxRetries: 2,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 15000,
};

const NETWORK_ERROR_MARKERS = ['fetch failed', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'timeout'];

/** A non-2xx response that was not retried, or still failed after the last retry. */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly url: string,
    public readonly body = '',
  ) {
    super(`HTTP ${status} ${statusText}${status === 429 ? ' (rate limited)' : ''} for ${url}`);
    this.name = 'HttpError';
  }
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

function isNetworkError(error: Error): boolean {
  return NETWORK_ERROR_MARKERS.some(marker => error.message.includes(marker));
}

/**
 * Fetch with retry on rate limits, server errors and network failures.
 * Returns the first 2xx response; throws `HttpError` for anything else.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit = {},
  config: FetchRetryConfig = {},
): Promise<Response> {
  const { maxRetries, initialDelayMs, backoffMultiplier, maxDelayMs } = { ...DEFAULT_CONFIG, ...config };
  const signal = init.signal ?? undefined;

  const backoff = (attempt: number): number => {
    const base = initialDelayMs * Math.pow(backoffMultiplier, attempt);
    return Math.min(base + base * 0.1 * Math.random(), maxDelayMs);
  };

  for (let attempt = 0; ; attempt++) {
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') throw err;
      const error = err instanceof Error ? err : new Error(String(err));
      if (!isNetworkError(error) || attempt >= maxRetries) throw error;
      await sleep(backoff(attempt), signal);
      continue;
    }

    if (response.ok) return response;

    if (!isRetryableStatus(response.status) || attempt >= maxRetries) {
      const body = await response.text().catch(() => '');
      throw new HttpError(response.status, response.statusText, url, body.slice(0, 500));
    }

    let delay = backoff(attempt);
    const retryAfter = parseInt(response.headers.get('Retry-After') ?? '', 10);
    if (!Number.isNaN(retryAfter)) {
      delay = Math.max(delay, retryAfter * 1000);
    }
    await sleep(delay, signal);
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DOMException('Aborted', 'AbortError'));
      return;
    }

    const timer = setTimeout(resolve, ms);

    if (signal) {
      const onAbort = () => {
        clearTimeout(timer);
        reject(new DOMException('Aborted', 'AbortError'));
      };
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}
