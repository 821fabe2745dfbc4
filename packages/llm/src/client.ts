/**
 * OpenAI-compatible HTTP client for chat completions and embeddings
 */

import { z } from 'zod';
import pino from 'pino';
import type { ChatRequest, LlmClient, LlmClientConfig } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const ChatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
  usage: z.object({ total_tokens: z.number().optional() }).optional(),
});

const EmbeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        embedding: z.array(z.number()),
      })
    )
    .min(1),
});

type ErrorType = 'rate_limit' | 'server_error' | 'auth' | 'api_error' | 'timeout' | 'network';

class LlmRequestError extends Error {
  readonly errorType: ErrorType;
  readonly statusCode?: number;
  readonly retryable: boolean;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    errorType: ErrorType,
    retryable: boolean,
    statusCode?: number,
    retryAfterMs?: number
  ) {
    super(message);
    this.name = 'LlmRequestError';
    this.errorType = errorType;
    this.retryable = retryable;
    this.statusCode = statusCode;
    this.retryAfterMs = retryAfterMs;
  }
}

function backoffMs(attempt: number): number {
  return Math.min(1000 * Math.pow(2, attempt), 10000);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create LLM client
 */
export function createLlmClient(config: LlmClientConfig): LlmClient {
  const {
    apiKey,
    baseUrl = 'https://api.openai.com/v1',
    model = 'gpt-4-turbo-preview',
    embeddingModel = 'text-embedding-ada-002',
    timeout = 120000,
    maxRetries = 3,
    fetchFn = fetch,
  } = config;

  /**
   * One HTTP attempt; classifies failures so the caller can decide on retry
   */
  async function attemptOnce(url: string, body: unknown): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    let response: Response;
    try {
      response = await fetchFn(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error: unknown) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new LlmRequestError('LLM API request timeout', 'timeout', true);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new LlmRequestError(`LLM API network error: ${message}`, 'network', true);
    } finally {
      clearTimeout(timeoutId);
    }

    if (response.status === 429) {
      await response.text().catch(() => '');
      const retryAfter = response.headers.get('Retry-After');
      const retryAfterMs = retryAfter ? Number.parseInt(retryAfter, 10) * 1000 : undefined;
      throw new LlmRequestError(
        'LLM API rate limited',
        'rate_limit',
        true,
        429,
        Number.isFinite(retryAfterMs) ? retryAfterMs : undefined
      );
    }

    if (response.status >= 500) {
      await response.text().catch(() => '');
      throw new LlmRequestError(
        `LLM API error: ${response.status} ${response.statusText}`,
        'server_error',
        true,
        response.status
      );
    }

    if (response.status === 401 || response.status === 403) {
      await response.text().catch(() => '');
      throw new LlmRequestError(
        `LLM API authentication error: ${response.status} ${response.statusText}`,
        'auth',
        false,
        response.status
      );
    }

    if (!response.ok) {
      await response.text().catch(() => '');
      throw new LlmRequestError(
        `LLM API error: ${response.status} ${response.statusText}`,
        'api_error',
        false,
        response.status
      );
    }

    return response.json();
  }

  /**
   * POST with retry on rate limits, 5xx, timeouts and network errors
   */
  async function request(path: string, body: unknown): Promise<unknown> {
    const url = `${baseUrl}${path}`;
    const startTime = Date.now();

    logger.debug({ event: 'llm.request.start', path, timeoutMs: timeout }, 'Starting LLM API request');

    for (let attempt = 0; ; attempt++) {
      try {
        const data = await attemptOnce(url, body);
        logger.debug(
          { event: 'llm.request.success', path, durationMs: Date.now() - startTime, attempt: attempt + 1 },
          'LLM API request succeeded'
        );
        return data;
      } catch (error: unknown) {
        if (!(error instanceof LlmRequestError) || !error.retryable || attempt >= maxRetries) {
          logger.error(
            {
              event: 'llm.request.fail',
              path,
              durationMs: Date.now() - startTime,
              errorType: error instanceof LlmRequestError ? error.errorType : 'unknown',
              statusCode: error instanceof LlmRequestError ? error.statusCode : undefined,
              attempt: attempt + 1,
              error: error instanceof Error ? error.message : String(error),
            },
            'LLM API request failed'
          );
          throw error;
        }

        const waitMs = error.retryAfterMs ?? backoffMs(attempt);
        logger.info(
          { event: 'llm.request.retry', path, attempt: attempt + 1, reason: error.errorType, waitMs },
          `LLM request failed (${error.errorType}), retrying in ${waitMs}ms`
        );
        await sleep(waitMs);
      }
    }
  }

  return {
    model,
    embeddingModel,

    async complete(chat: ChatRequest): Promise<string> {
      const raw = await request('/chat/completions', {
        model,
        messages: [
          { role: 'system', content: chat.system },
          { role: 'user', content: chat.user },
        ],
        temperature: chat.temperature ?? 0.1,
        max_tokens: chat.maxTokens ?? 2000,
      });

      const parsed = ChatResponseSchema.parse(raw);
      const tokens = parsed.usage?.total_tokens;
      if (tokens !== undefined) {
        logger.debug({ event: 'llm.completion.usage', tokens }, 'Completion token usage');
      }
      return parsed.choices[0]?.message.content ?? '';
    },

    async embed(input: string): Promise<number[]> {
      const raw = await request('/embeddings', { model: embeddingModel, input });
      const parsed = EmbeddingResponseSchema.parse(raw);
      return parsed.data[0]?.embedding ?? [];
    },
  };
}
