import type { z } from 'zod';
import { fetchWithRetry, type FetchRetryConfig } from './retry.js';

export const USER_AGENT = 'erratum/0.1';

export class ResponseShapeError extends Error {
  constructor(message: string, public readonly url: string) {
    super(message);
    this.name = 'ResponseShapeError';
  }
}

export interface GetJsonOptions {
  params?: Record<string, string | number | undefined>;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  retry?: FetchRetryConfig;
}

export function withParams(url: string, params: GetJsonOptions['params'] = {}): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) search.set(key, String(value));
  }
  const query = search.toString();
  return query ? `${url}?${query}` : url;
}

/** GET a JSON document and validate it against `schema`. */
export async function getJson<T extends z.ZodTypeAny>(
  url: string,
  schema: T,
  options: GetJsonOptions = {},
): Promise<z.infer<T>> {
  const target = withParams(url, options.params);
  const response = await fetchWithRetry(
    target,
    {
      headers: { Accept: 'application/json', 'User-Agent': USER_AGENT, ...options.headers },
      signal: options.signal,
    },
    options.retry,
  );
  return parseJson(response, schema, target);
}

export async function parseJson<T extends z.ZodTypeAny>(
  response: Response,
  schema: T,
  url: string,
): Promise<z.infer<T>> {
  const parsed = schema.safeParse(await response.json());
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ResponseShapeError(`Unexpected response from ${url}: ${issues}`, url);
  }
  return parsed.data;
}
