/**
 * Types for the OpenAI-compatible LLM client
 */

import type { CallOptions, Embedder, GenerativeBackend } from '@rioplatense/core';

export interface LlmClientConfig {
  provider: 'OPENAI';
  apiKey: string;
  baseUrl?: string;
  model?: string;
  embeddingModel?: string;
  temperature?: number;
  maxTokens?: number;
  /** Sent as the system message with every completion */
  systemPrompt?: string;
  timeout?: number;
  maxRetries?: number;
  /** Base delay for exponential backoff between retries */
  retryDelayMs?: number;
}

export interface LlmClient extends GenerativeBackend, Embedder {
  complete(prompt: string, options?: CallOptions): Promise<string>;
  embed(texts: readonly string[], options?: CallOptions): Promise<number[][]>;
}
