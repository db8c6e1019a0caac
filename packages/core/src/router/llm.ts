import { generateText, type LanguageModel, type ModelMessage } from 'ai';
import { retryModelCall, type ModelRetryConfig } from './retry.js';

export interface LLMCallOptions {
  /** Resolved AI SDK LanguageModel instance. */
  model: LanguageModel;
  system: string;
  messages: ModelMessage[];
  maxOutputTokens?: number;
  temperature?: number;
  /** Merged over `MODEL_RETRY_DEFAULTS`. */
  retry?: Omit<ModelRetryConfig, 'abortSignal'>;
  abortSignal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  usage: { inputTokens: number; outputTokens: number };
  /** Number of attempts made (1 = no retries needed). */
  attempts: number;
}

/**
 * Single-shot text generation with retry on rate limits, overload and
 * timeouts. Auth errors and aborts are thrown immediately.
 */
export async function callLLM(options: LLMCallOptions): Promise<LLMResponse> {
  const { result, attempts } = await retryModelCall(async signal => {
    const response = await generateText({
      model: options.model,
      system: options.system,
      messages: options.messages,
      maxOutputTokens: options.maxOutputTokens,
      temperature: options.temperature,
      maxRetries: 0,
      abortSignal: signal,
    });
    return {
      content: response.text,
      usage: {
        inputTokens: response.usage.inputTokens ?? 0,
        outputTokens: response.usage.outputTokens ?? 0,
      },
    };
  }, { ...options.retry, abortSignal: options.abortSignal });

  return { ...result, attempts };
}

/**
 * Call the model and, when `isValid` rejects the reply, ask once more with
 * the rejected reply and a correction appended to the conversation.
 */
export async function callLLMWithJsonRetry(
  options: LLMCallOptions,
  isValid: (content: string) => boolean,
): Promise<LLMResponse> {
  const response = await callLLM(options);
  if (isValid(response.content)) return response;

  const retryMessages: ModelMessage[] = [
    ...options.messages,
    { role: 'assistant', content: response.content },
    {
      role: 'user',
      content: 'Your previous response was not valid JSON. Respond with only the JSON object, no other text or markdown formatting.',
    },
  ];

  const second = await callLLM({
    ...options,
    messages: retryMessages,
    retry: { ...options.retry, maxRetries: 0 },
  });

  return {
    ...second,
    usage: {
      inputTokens: response.usage.inputTokens + second.usage.inputTokens,
      outputTokens: response.usage.outputTokens + second.usage.outputTokens,
    },
    attempts: response.attempts + second.attempts,
  };
}

/**
 * Extract the first JSON object from a model reply, tolerating a fenced
 * ```json block or surrounding prose. Returns undefined when none parses.
 */
export function extractJsonObject(content: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(content);
  const candidate = fenced?.[1] ?? content;
  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;
  try {
    return JSON.parse(candidate.slice(start, end + 1));
  } catch {
    return undefined;
  }
}
