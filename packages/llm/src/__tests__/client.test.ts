/**
 * Unit tests for client.ts
 * Tests: completion parsing, retry on 5xx, no retry on auth errors, embeddings order
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLlmClient, parseRetryAfter } from '../client.js';

const mockFetch = vi.fn();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function completion(content: string): Response {
  return jsonResponse({ choices: [{ message: { content } }], usage: { total_tokens: 12 } });
}

describe('createLlmClient', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends the system prompt and returns the completion text', async () => {
    mockFetch.mockResolvedValueOnce(completion('Necesito guita'));
    const client = createLlmClient({
      provider: 'OPENAI',
      apiKey: 'test-key',
      baseUrl: 'http://llm.test/v1',
      model: 'test-model',
      systemPrompt: 'You translate into Rioplatense Spanish.',
    });

    const output = await client.complete('I need money');

    expect(output).toBe('Necesito guita');
    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('http://llm.test/v1/chat/completions');
    expect(init.headers.Authorization).toBe('Bearer test-key');
    const body = JSON.parse(init.body);
    expect(body.model).toBe('test-model');
    expect(body.messages).toEqual([
      { role: 'system', content: 'You translate into Rioplatense Spanish.' },
      { role: 'user', content: 'I need money' },
    ]);
  });

  it('retries server errors and succeeds', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ error: 'overloaded' }, 503))
      .mockResolvedValueOnce(completion('Dale'));
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-key', retryDelayMs: 1 });

    await expect(client.complete('ok')).resolves.toBe('Dale');
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('falls back to backoff when Retry-After is not a number of seconds', async () => {
    vi.useFakeTimers();
    try {
      mockFetch
        .mockResolvedValueOnce(new Response('slow down', {
          status: 429,
          headers: { 'Retry-After': 'Wed, 21 Oct 2015 07:28:00 GMT' },
        }))
        .mockResolvedValueOnce(completion('Dale'));
      const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-key', retryDelayMs: 50 });

      const pending = client.complete('ok');
      await vi.advanceTimersByTimeAsync(49);
      expect(mockFetch).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      await expect(pending).resolves.toBe('Dale');
      expect(mockFetch).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });

  it('does not retry authentication errors', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ error: 'bad key' }, 401));
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-key', retryDelayMs: 1 });

    await expect(client.complete('hola')).rejects.toThrow('LLM API authentication error: 401');
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('gives up after the configured number of retries', async () => {
    mockFetch.mockRejectedValue(new TypeError('fetch failed'));
    const client = createLlmClient({
      provider: 'OPENAI',
      apiKey: 'test-key',
      maxRetries: 2,
      retryDelayMs: 1,
    });

    await expect(client.complete('hola')).rejects.toThrow('fetch failed');
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it('rejects malformed completion payloads', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ choices: [] }));
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-key' });

    await expect(client.complete('hola')).rejects.toThrow('Invalid chat completion response');
  });

  it('stops without calling the backend when the caller already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-key' });

    await expect(client.complete('hola', { signal: controller.signal })).rejects.toThrow(
      'LLM API request aborted by caller'
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('returns embeddings in input order', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] },
        ],
      })
    );
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-key', embeddingModel: 'embed-test' });

    const vectors = await client.embed(['money', 'guita']);

    expect(vectors).toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(JSON.parse(mockFetch.mock.calls[0][1].body)).toEqual({
      model: 'embed-test',
      input: ['money', 'guita'],
    });
  });

  it('skips the request for an empty embedding batch', async () => {
    const client = createLlmClient({ provider: 'OPENAI', apiKey: 'test-key' });

    await expect(client.embed([])).resolves.toEqual([]);
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

describe('parseRetryAfter', () => {
  it('reads whole seconds', () => {
    expect(parseRetryAfter('2')).toBe(2000);
    expect(parseRetryAfter(' 0 ')).toBe(0);
  });

  it('ignores dates, garbage and a missing header', () => {
    expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:00 GMT')).toBeNull();
    expect(parseRetryAfter('soon')).toBeNull();
    expect(parseRetryAfter(null)).toBeNull();
  });
});
