/**
 * HTTP surface for the translator
 *
 * GET /health and POST /translate. Request-time failures map to a generic
 * message; the cause is logged, never returned.
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { z } from 'zod';
import { TranslationError, errorMessage, type CallOptions, type TranslationRequest, type TranslationResult } from '@rioplatense/core';
import { TRANSLATION_FAILED_MESSAGE } from '@rioplatense/translator';

export interface Translator {
  translate(request: TranslationRequest, options?: CallOptions): Promise<TranslationResult>;
}

export interface ServerOptions {
  translator: Translator;
  logger?: FastifyBaseLogger | boolean;
  /** Browser origins allowed by CORS */
  allowedOrigins?: readonly string[];
}

const TranslateBodySchema = z.object({
  text: z.string().max(10_000, 'text must be at most 10000 characters'),
  sessionContext: z.unknown().optional(),
});

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger ?? false });
  const allowedOrigins = options.allowedOrigins ?? [];

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Server-to-server calls carry no origin
      if (!origin || allowedOrigins.includes(origin)) {
        cb(null, true);
        return;
      }
      fastify.log.warn({ event: 'cors.rejected', origin }, 'CORS request rejected');
      cb(new Error('Not allowed by CORS'), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });

  fastify.get('/health', async () => {
    return { status: 'ok' };
  });

  fastify.post('/translate', async (request, reply) => {
    const parsed = TranslateBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: 'Invalid request',
        message: parsed.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
      });
    }

    // Abandon in-flight model calls when the client disconnects
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) controller.abort();
    };
    reply.raw.on('close', onClose);

    try {
      const result = await options.translator.translate(
        { text: parsed.data.text, sessionContext: parsed.data.sessionContext },
        { signal: controller.signal }
      );
      return {
        kind: result.kind,
        output: result.output,
        ...(result.kind === 'empty' ? {} : { detectedLanguage: result.detectedLanguage }),
      };
    } catch (error) {
      request.log.error({
        event: 'translate.request.failed',
        error: errorMessage(error),
        stage: error instanceof TranslationError ? error.stage : undefined,
      }, 'Translation request failed');
      return reply.code(error instanceof TranslationError ? 502 : 500).send({ error: TRANSLATION_FAILED_MESSAGE });
    } finally {
      reply.raw.off('close', onClose);
    }
  });

  return fastify;
}
