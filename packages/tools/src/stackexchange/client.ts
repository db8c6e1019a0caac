import { z } from 'zod';
import { getJson } from '../http.js';
import { decodeEntities } from '../html.js';

export const STACKEXCHANGE_API = 'https://api.stackexchange.com/2.3';

const QuestionSchema = z.object({
  question_id: z.number(),
  title: z.string(),
  link: z.string(),
  score: z.number().default(0),
  view_count: z.number().default(0),
  answer_count: z.number().default(0),
  creation_date: z.number(),
  tags: z.array(z.string()).default([]),
  body: z.string().optional(),
});

const AnswerSchema = z.object({
  answer_id: z.number(),
  score: z.number().default(0),
  is_accepted: z.boolean().default(false),
  body: z.string().default(''),
});

function wrapper<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    items: z.array(item),
    has_more: z.boolean().default(false),
    quota_remaining: z.number().optional(),
    // seconds to wait before the next request
    backoff: z.number().optional(),
  });
}

const QuestionPageSchema = wrapper(QuestionSchema);
const AnswerPageSchema = wrapper(AnswerSchema);

export type Question = z.infer<typeof QuestionSchema>;
export type Answer = z.infer<typeof AnswerSchema>;

export interface Page<T> {
  items: T[];
  backoffSeconds: number;
}

export interface QuestionQuery {
  /** Free-text query (`/search/advanced`). */
  q?: string;
  /** Title query (`/search`). */
  intitle?: string;
  tagged?: string[];
  sort: 'votes' | 'activity' | 'relevance' | 'creation';
  pagesize: number;
  minScore?: number;
  fromDate?: Date;
  toDate?: Date;
  accepted?: boolean;
  withBody?: boolean;
}

export interface StackExchangeRequest {
  apiKey?: string;
  signal?: AbortSignal;
}

const toEpoch = (date: Date | undefined) => (date ? Math.floor(date.getTime() / 1000) : undefined);

/**
 * Search Stack Overflow questions. A `q` query uses `/search/advanced`,
 * an `intitle` query the plain `/search` endpoint. Titles come back decoded.
 */
export async function searchQuestions(
  query: QuestionQuery,
  request: StackExchangeRequest = {},
): Promise<Page<Question>> {
  const advanced = query.q !== undefined;
  const page = await getJson(`${STACKEXCHANGE_API}/${advanced ? 'search/advanced' : 'search'}`, QuestionPageSchema, {
    params: {
      site: 'stackoverflow',
      order: 'desc',
      sort: query.sort,
      pagesize: query.pagesize,
      q: query.q,
      intitle: query.intitle,
      tagged: query.tagged?.join(';'),
      min_score: query.minScore,
      fromdate: toEpoch(query.fromDate),
      todate: toEpoch(query.toDate),
      accepted: query.accepted === undefined ? undefined : String(query.accepted),
      filter: query.withBody ? 'withbody' : 'default',
      key: request.apiKey,
    },
    signal: request.signal,
  });

  return {
    items: page.items.map(item => ({ ...item, title: decodeEntities(item.title) })),
    backoffSeconds: page.backoff ?? 0,
  };
}

/** Answers to one question, highest voted first, with bodies. */
export async function fetchAnswers(
  questionId: number,
  request: StackExchangeRequest = {},
): Promise<Page<Answer>> {
  const page = await getJson(`${STACKEXCHANGE_API}/questions/${questionId}/answers`, AnswerPageSchema, {
    params: {
      site: 'stackoverflow',
      order: 'desc',
      sort: 'votes',
      filter: 'withbody',
      key: request.apiKey,
    },
    signal: request.signal,
  });
  return { items: page.items, backoffSeconds: page.backoff ?? 0 };
}

const ERROR_TEXT_PATTERNS = [
  /ERROR[_\s]+[A-Z_]+[_\s]+\w+/i,
  /0x[0-9A-F]{8}/i,
  /Exception[:\s]+[\w.]+/i,
  /Failed[:\s]+.+/i,
  /Cannot[:\s]+.+/i,
  /Unable to[:\s]+.+/i,
];

const MAX_TITLE_AS_TEXT = 100;

/**
 * The error text a question title is about: the first recognizable error
 * pattern, otherwise the whole title when it is shorter than 100 characters.
 */
export function extractErrorText(title: string): string | null {
  for (const pattern of ERROR_TEXT_PATTERNS) {
    const match = pattern.exec(title);
    if (match) return match[0].trim();
  }
  const trimmed = title.trim();
  return trimmed && trimmed.length < MAX_TITLE_AS_TEXT ? trimmed : null;
}
