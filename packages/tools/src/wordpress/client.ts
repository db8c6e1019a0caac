import { z } from 'zod';
import { fetchWithRetry, HttpError, type FetchRetryConfig } from '../retry.js';
import { parseJson, USER_AGENT } from '../http.js';

export interface WordPressCredentials {
  siteUrl: string;
  username: string;
  /** Application password from the user's profile page. */
  appPassword: string;
}

const WordPressErrorBodySchema = z.object({
  code: z.string(),
  message: z.string(),
  data: z.object({ term_id: z.number().optional() }).passthrough().nullable().optional(),
});

/** A WordPress REST error, with the `code` from the response body when there was one. */
export class WordPressError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code?: string,
    public readonly termId?: number,
  ) {
    super(message);
    this.name = 'WordPressError';
  }

  static fromHttpError(error: HttpError): WordPressError {
    let body: unknown;
    try {
      body = JSON.parse(error.body);
    } catch {
      return new WordPressError(`WordPress request failed: ${error.message}`, error.status);
    }
    const parsed = WordPressErrorBodySchema.safeParse(body);
    if (!parsed.success) {
      return new WordPressError(`WordPress request failed: ${error.message}`, error.status);
    }
    const { code, message, data } = parsed.data;
    return new WordPressError(`WordPress ${error.status} ${code}: ${message}`, error.status, code, data?.term_id);
  }
}

export interface WordPressRequest<T extends z.ZodTypeAny> {
  method: 'GET' | 'POST';
  path: string;
  schema: T;
  params?: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
  retry?: FetchRetryConfig;
}

/** Minimal authenticated client for `/wp-json/wp/v2`. */
export class WordPressClient {
  readonly apiBase: string;
  private readonly authorization: string;

  constructor(credentials: WordPressCredentials) {
    this.apiBase = `${credentials.siteUrl.replace(/\/+$/, '')}/wp-json/wp/v2`;
    const token = Buffer.from(`${credentials.username}:${credentials.appPassword}`).toString('base64');
    this.authorization = `Basic ${token}`;
  }

  async request<T extends z.ZodTypeAny>(req: WordPressRequest<T>): Promise<z.infer<T>> {
    const query = req.params ? `?${new URLSearchParams(req.params).toString()}` : '';
    const url = `${this.apiBase}${req.path}${query}`;
    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: this.authorization,
      'User-Agent': USER_AGENT,
    };
    if (req.body !== undefined) headers['Content-Type'] = 'application/json';

    let response: Response;
    try {
      response = await fetchWithRetry(
        url,
        {
          method: req.method,
          headers,
          body: req.body === undefined ? undefined : JSON.stringify(req.body),
          signal: req.signal,
        },
        req.retry,
      );
    } catch (err) {
      if (err instanceof HttpError) throw WordPressError.fromHttpError(err);
      throw err;
    }
    return parseJson(response, req.schema, url);
  }
}
