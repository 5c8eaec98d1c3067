/**
 * LLM client for completions and embeddings
 */

import { z } from 'zod';
import { pino } from 'pino';
import type { CallOptions } from '@rioplatense/core';
import type { LlmClient, LlmClientConfig } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
  usage: z.object({ total_tokens: z.number() }).optional(),
});

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number(),
      embedding: z.array(z.number()),
    })
  ),
});

class LlmRequestError extends Error {
  constructor(message: string, readonly retryable: boolean) {
    super(message);
    this.name = 'LlmRequestError';
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Delay in ms from a Retry-After header given in seconds. Anything else
 * (an HTTP date, garbage) yields null.
 */
export function parseRetryAfter(header: string | null): number | null {
  if (header === null || !/^\s*\d+\s*$/.test(header)) {
    return null;
  }
  const seconds = Number.parseInt(header, 10);
  return Number.isFinite(seconds) ? seconds * 1000 : null;
}

/**
 * Create LLM client
 */
export function createLlmClient(config: LlmClientConfig): LlmClient {
  const {
    provider,
    apiKey,
    baseUrl = 'https://api.openai.com/v1',
    model = 'gpt-4o',
    embeddingModel = 'text-embedding-3-small',
    temperature = 0.7,
    maxTokens = 1000,
    systemPrompt,
    timeout = 120000, // Default 120s
    maxRetries = 3,
    retryDelayMs = 1000,
  } = config;

  if (provider !== 'OPENAI') {
    throw new Error(`Unsupported LLM provider: ${provider}`);
  }

  function backoff(attempt: number): number {
    return Math.min(retryDelayMs * Math.pow(2, attempt), 10000);
  }

  /**
   * Make HTTP request with retry logic and structured logging
   */
  async function request(path: string, body: unknown, options: CallOptions = {}): Promise<unknown> {
    const url = `${baseUrl}${path}`;
    const startTime = Date.now();
    let lastError: Error | null = null;
    let lastStatusCode: number | undefined;

    logger.debug({
      event: 'llm.request.start',
      timeoutMs: timeout,
      path,
    }, 'Starting LLM API request');

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (options.signal?.aborted) {
        throw new Error('LLM API request aborted by caller');
      }

      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);
      const forwardAbort = () => controller.abort();
      options.signal?.addEventListener('abort', forwardAbort, { once: true });

      try {
        const response = await fetch(url, {
          method: 'POST',
          headers: {
            'Authorization': `Bearer ${apiKey}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(body),
          signal: controller.signal,
        });
        lastStatusCode = response.status;

        if (response.status === 429 && attempt < maxRetries) {
          const waitMs = parseRetryAfter(response.headers.get('Retry-After')) ?? backoff(attempt);

          logger.info({
            event: 'llm.request.retry',
            attempt: attempt + 1,
            reason: 'rate_limit',
            waitMs,
            statusCode: 429,
          }, `Rate limited, retrying in ${waitMs}ms`);

          await sleep(waitMs);
          continue;
        }

        if (response.status >= 500 && response.status < 600 && attempt < maxRetries) {
          const waitMs = backoff(attempt);

          logger.info({
            event: 'llm.request.retry',
            attempt: attempt + 1,
            reason: 'server_error',
            waitMs,
            statusCode: response.status,
          }, `Server error, retrying in ${waitMs}ms`);

          await sleep(waitMs);
          continue;
        }

        if (response.status === 401 || response.status === 403) {
          await response.text().catch(() => ''); // Consume response
          throw new LlmRequestError(`LLM API authentication error: ${response.status} ${response.statusText}`, false);
        }

        if (!response.ok) {
          await response.text().catch(() => ''); // Consume response
          throw new LlmRequestError(`LLM API error: ${response.status} ${response.statusText}`, false);
        }

        const data: unknown = await response.json();

        logger.debug({
          event: 'llm.request.success',
          durationMs: Date.now() - startTime,
          attempt: attempt + 1,
        }, 'LLM API request succeeded');

        return data;
      } catch (error: unknown) {
        const err = error instanceof Error ? error : new Error(String(error));

        if (options.signal?.aborted) {
          throw new Error('LLM API request aborted by caller', { cause: err });
        }

        if (err instanceof LlmRequestError && !err.retryable) {
          lastError = err;
          break;
        }

        lastError = err.name === 'AbortError' ? new Error('LLM API request timeout') : err;

        if (attempt < maxRetries) {
          logger.info({
            event: 'llm.request.retry',
            attempt: attempt + 1,
            reason: err.name === 'AbortError' ? 'timeout' : 'network',
            error: lastError.message,
          }, 'Request failed, retrying');
          await sleep(backoff(attempt));
        }
      } finally {
        clearTimeout(timeoutId);
        options.signal?.removeEventListener('abort', forwardAbort);
      }
    }

    const failure = lastError || new Error(`LLM API request failed after retries (status ${lastStatusCode})`);

    logger.error({
      event: 'llm.request.fail',
      durationMs: Date.now() - startTime,
      statusCode: lastStatusCode,
      path,
      error: failure.message,
    }, 'LLM API request failed');

    throw failure;
  }

  return {
    async complete(prompt: string, options?: CallOptions): Promise<string> {
      const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
      if (systemPrompt) {
        messages.push({ role: 'system', content: systemPrompt });
      }
      messages.push({ role: 'user', content: prompt });

      const raw = await request('/chat/completions', {
        model,
        messages,
        temperature,
        max_tokens: maxTokens,
      }, options);

      const parsed = ChatCompletionSchema.safeParse(raw);
      if (!parsed.success) {
        throw new Error(`Invalid chat completion response: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
      }

      return parsed.data.choices[0].message.content ?? '';
    },

    async embed(texts: readonly string[], options?: CallOptions): Promise<number[][]> {
      if (texts.length === 0) return [];

      const raw = await request('/embeddings', {
        model: embeddingModel,
        input: texts,
      }, options);

      const parsed = EmbeddingResponseSchema.safeParse(raw);
      if (!parsed.success) {
        throw new Error(`Invalid embeddings response: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
      }
      if (parsed.data.data.length !== texts.length) {
        throw new Error(`Embeddings response has ${parsed.data.data.length} vectors for ${texts.length} inputs`);
      }

      // The API does not guarantee input order
      return [...parsed.data.data]
        .sort((a, b) => a.index - b.index)
        .map(item => item.embedding);
    },
  };
}
