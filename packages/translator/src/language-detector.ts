/**
 * Hybrid language detection
 *
 * Short inputs go to the model classifier (statistical classifiers are
 * unreliable on a word or two); longer ones to the statistical classifier.
 * Every failure degrades to "unknown".
 */

import { francAll } from 'franc-min';
import { iso6393 } from 'iso-639-3';
import { pino } from 'pino';
import {
  DetectionError,
  UNKNOWN_LANGUAGE,
  errorMessage,
  type CallOptions,
  type DetectedLanguage,
  type GenerativeBackend,
} from '@rioplatense/core';
import { renderTemplate } from './prompts.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface LanguageClassifier {
  classify(text: string, options?: CallOptions): Promise<DetectedLanguage>;
}

export interface LanguageDetector {
  detect(text: string, options?: CallOptions): Promise<DetectedLanguage>;
}

const ISO_639_1_BY_3: ReadonlyMap<string, string> = new Map(
  iso6393.flatMap(language => (language.iso6391 ? [[language.iso6393, language.iso6391] as const] : []))
);

/**
 * Lowercase two-letter code, or "unknown" for anything unparseable.
 * Three-letter codes are mapped to their two-letter form.
 */
export function normalizeLanguageCode(raw: string | null | undefined): DetectedLanguage {
  const code = (raw ?? '').trim().toLowerCase().replace(/^["'`]+|["'`.]+$/g, '');
  if (/^[a-z]{2}$/.test(code)) {
    return code;
  }
  if (/^[a-z]{3}$/.test(code)) {
    return ISO_639_1_BY_3.get(code) ?? UNKNOWN_LANGUAGE;
  }
  return UNKNOWN_LANGUAGE;
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export interface StatisticalClassifierOptions {
  /** Texts shorter than this many characters are not placed */
  minLength?: number;
  /** Required score gap between the best and the runner-up candidate */
  minMargin?: number;
}

export const DEFAULT_STATISTICAL_MIN_LENGTH = 40;
export const DEFAULT_STATISTICAL_MIN_MARGIN = 0.05;

/**
 * Trigram classifier. Local and synchronous; returns "unknown" for text it
 * cannot place with confidence, so short or ambiguous input is never
 * reported as a third language.
 */
export class StatisticalClassifier implements LanguageClassifier {
  private readonly minLength: number;
  private readonly minMargin: number;

  constructor(options: StatisticalClassifierOptions = {}) {
    this.minLength = options.minLength ?? DEFAULT_STATISTICAL_MIN_LENGTH;
    this.minMargin = options.minMargin ?? DEFAULT_STATISTICAL_MIN_MARGIN;
  }

  async classify(text: string): Promise<DetectedLanguage> {
    const candidates = francAll(text, { minLength: this.minLength });
    const [best, runnerUp] = candidates;
    if (!best || best[0] === 'und') {
      return UNKNOWN_LANGUAGE;
    }
    const margin = runnerUp ? best[1] - runnerUp[1] : 1;
    if (margin < this.minMargin) {
      logger.debug({ event: 'detect.ambiguous', best: best[0], runnerUp: runnerUp?.[0], margin }, 'Ambiguous statistical guess');
      return UNKNOWN_LANGUAGE;
    }
    return normalizeLanguageCode(best[0]);
  }
}

/**
 * Asks the generative backend for an ISO 639-1 code
 */
export class ModelClassifier implements LanguageClassifier {
  constructor(
    private readonly backend: GenerativeBackend,
    private readonly template: string
  ) {}

  async classify(text: string, options?: CallOptions): Promise<DetectedLanguage> {
    const output = await this.backend.complete(renderTemplate(this.template, { text }), options);
    return normalizeLanguageCode(output);
  }
}

export interface HybridLanguageDetectorOptions {
  statistical: LanguageClassifier;
  model: LanguageClassifier;
  /** Inputs with at most this many words use the model classifier */
  shortInputWordThreshold: number;
}

export class HybridLanguageDetector implements LanguageDetector {
  constructor(private readonly options: HybridLanguageDetectorOptions) {}

  async detect(text: string, options?: CallOptions): Promise<DetectedLanguage> {
    const words = countWords(text);
    const strategy = words <= this.options.shortInputWordThreshold ? 'model' : 'statistical';
    const classifier = strategy === 'model' ? this.options.model : this.options.statistical;

    try {
      const language = await classifier.classify(text, options);
      logger.debug({ event: 'detect.result', strategy, words, language }, 'Language detected');
      return language;
    } catch (error) {
      // Cancellation is the caller's decision, not a detector fault
      if (options?.signal?.aborted) throw error;

      logger.warn({
        event: 'detect.failed',
        strategy,
        words,
        err: new DetectionError(`${strategy} classifier failed: ${errorMessage(error)}`, { cause: error }),
      }, 'Language detection failed, treating as unknown');
      return UNKNOWN_LANGUAGE;
    }
  }
}
