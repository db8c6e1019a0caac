import { sleep } from '@erratum/core';
import type { CollectedSolutions, SolutionCollector, SolutionFragment, SourceCitation, SourceContext } from '@erratum/core';
import { extractSnippet, extractSteps } from '../html.js';
import { fetchAnswers, searchQuestions, type Answer, type Question } from './client.js';

export interface StackExchangeCollectorOptions {
  apiKey?: string;
  /** Accepted questions to read (default 10). */
  maxQuestions?: number;
  /** Top answers considered per question (default 3). */
  answersPerQuestion?: number;
  /** Pause between answer requests (default 100). */
  requestDelayMs?: number;
}

const COMMUNITY_RELIABILITY = 0.8;
const MAX_ANSWER_RELIABILITY = 0.9;
const MIN_UNACCEPTED_SCORE = 5;

/** 0.5 plus 0.05 per vote, capped at 0.9. */
export function answerReliability(score: number): number {
  return Math.max(0, Math.min(MAX_ANSWER_RELIABILITY, 0.5 + score * 0.05));
}

export function isUsableAnswer(answer: Answer): boolean {
  return answer.is_accepted || answer.score > MIN_UNACCEPTED_SCORE;
}

export function answerToSolution(answer: Answer, question: Question): SolutionFragment {
  return {
    description: `Stack Overflow解決策 (スコア: ${answer.score})`,
    steps: extractSteps(answer.body),
    reliability: answerReliability(answer.score),
    sourceUrl: question.link,
    sourceTitle: question.title,
  };
}

export function questionToCitation(question: Question): SourceCitation {
  return {
    title: question.title,
    url: question.link,
    type: 'community',
    reliability: COMMUNITY_RELIABILITY,
    snippet: extractSnippet(question.body ?? ''),
  };
}

/** Accepted questions matching the error text and their best answers. */
export class StackExchangeCollector implements SolutionCollector {
  readonly name = 'stackexchange';

  constructor(private readonly options: StackExchangeCollectorOptions = {}) {}

  async collect(errorText: string, ctx: SourceContext): Promise<CollectedSolutions> {
    const request = { apiKey: this.options.apiKey, signal: ctx.abortSignal };
    const delayMs = this.options.requestDelayMs ?? 100;
    const answersPerQuestion = this.options.answersPerQuestion ?? 3;

    const questions = await searchQuestions(
      {
        q: errorText,
        sort: 'votes',
        pagesize: this.options.maxQuestions ?? 10,
        accepted: true,
        withBody: true,
      },
      request,
    );

    const solutions: SolutionFragment[] = [];
    const citations: SourceCitation[] = [];
    let backoffSeconds = questions.backoffSeconds;

    for (const question of questions.items) {
      await sleep(Math.max(delayMs, backoffSeconds * 1000), ctx.abortSignal);
      const answers = await fetchAnswers(question.question_id, request);
      backoffSeconds = answers.backoffSeconds;

      for (const answer of answers.items.slice(0, answersPerQuestion)) {
        if (isUsableAnswer(answer)) solutions.push(answerToSolution(answer, question));
      }
      citations.push(questionToCitation(question));
    }

    return { solutions, citations };
  }
}
