/**
 * Translation orchestrator
 *
 * One request runs Received -> PolicyFiltered -> LanguageChecked, then
 * either ShortCircuited (unsupported language) or
 * Retrieving -> Formatting -> Generating, ending Completed or Failed.
 * Holds no per-request state outside the call.
 */

import { randomUUID } from 'crypto';
import { pino } from 'pino';
import {
  TranslationError,
  errorMessage,
  languageStatus,
  type CallOptions,
  type DetectedLanguage,
  type GenerativeBackend,
  type TranslationRequest,
  type TranslationResult,
  type TranslationStage,
  type VectorIndex,
} from '@rioplatense/core';
import type { ContentPolicyFilter } from './content-policy.js';
import type { LanguageDetector } from './language-detector.js';
import { renderTemplate } from './prompts.js';
import { RetrievalFormatter } from './retrieval-formatter.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export type TranslationState =
  | 'Received'
  | 'PolicyFiltered'
  | 'LanguageChecked'
  | 'ShortCircuited'
  | 'Retrieving'
  | 'Formatting'
  | 'Generating'
  | 'Completed'
  | 'Failed';

/** Shown to end users for any request-time failure */
export const TRANSLATION_FAILED_MESSAGE = 'Translation failed. Please try again.';

export function unsupportedLanguageMessage(detected: DetectedLanguage, supported: ReadonlySet<string>): string {
  const languages = [...supported].sort().join(', ');
  return `Sorry, I can only translate text written in: ${languages}. Detected language: ${detected}.`;
}

export interface TranslationOrchestratorOptions {
  policy: Pick<ContentPolicyFilter, 'apply'>;
  detector: LanguageDetector;
  index: Pick<VectorIndex, 'query'>;
  backend: GenerativeBackend;
  /** Needs {text} and {reference_phrases} */
  translationTemplate: string;
  supportedLanguages: ReadonlySet<string>;
  retrievalK: number;
  formatter?: RetrievalFormatter;
}

export class TranslationOrchestrator {
  private readonly formatter: RetrievalFormatter;

  constructor(private readonly options: TranslationOrchestratorOptions) {
    this.formatter = options.formatter ?? new RetrievalFormatter();
  }

  /**
   * @throws TranslationError when retrieval or generation fails
   */
  async translate(request: TranslationRequest, callOptions: CallOptions = {}): Promise<TranslationResult> {
    const requestId = randomUUID();
    const enter = (state: TranslationState, extra: Record<string, unknown> = {}) => {
      logger.debug({ event: 'translate.state', requestId, state, ...extra }, `translate: ${state}`);
    };

    enter('Received', { chars: request.text.length });

    if (!request.text.trim()) {
      enter('Completed', { result: 'empty' });
      return { kind: 'empty', output: '' };
    }

    const text = this.options.policy.apply(request.text);
    enter('PolicyFiltered', { rewritten: text !== request.text });

    const detectedLanguage = await this.options.detector.detect(text, callOptions);
    const status = languageStatus(detectedLanguage, this.options.supportedLanguages);
    enter('LanguageChecked', { detectedLanguage, status });

    if (status === 'unsupported') {
      enter('ShortCircuited', { detectedLanguage });
      enter('Completed', { result: 'unsupported-language' });
      return {
        kind: 'unsupported-language',
        output: unsupportedLanguageMessage(detectedLanguage, this.options.supportedLanguages),
        detectedLanguage,
      };
    }

    enter('Retrieving', { k: this.options.retrievalK });
    const results = await this.runStage(requestId, 'retrieval', () =>
      this.options.index.query(text, this.options.retrievalK, callOptions)
    );

    enter('Formatting', { references: results.length });
    const referencePhrases = this.formatter.format(results);

    enter('Generating');
    const prompt = renderTemplate(this.options.translationTemplate, {
      text,
      reference_phrases: referencePhrases,
    });
    const output = await this.runStage(requestId, 'generation', async () => {
      const completion = (await this.options.backend.complete(prompt, callOptions)).trim();
      if (!completion) {
        throw new Error('Generative backend returned an empty completion');
      }
      return completion;
    });

    enter('Completed', { result: 'translated' });
    logger.info({
      event: 'translate.completed',
      requestId,
      detectedLanguage,
      references: results.length,
    }, 'Translation completed');

    return { kind: 'translated', output, detectedLanguage, referenceCount: results.length };
  }

  private async runStage<T>(requestId: string, stage: TranslationStage, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      const failure = new TranslationError(stage, `Translation ${stage} failed: ${errorMessage(error)}`, { cause: error });
      logger.error({
        event: 'translate.state',
        requestId,
        state: 'Failed' satisfies TranslationState,
        stage,
        error: failure.message,
      }, `Translation failed during ${stage}`);
      throw failure;
    }
  }
}
