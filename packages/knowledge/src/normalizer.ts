/**
 * Text normalization for scraped articles
 *
 * Strips boilerplate, truncates at structural split points, drops
 * category-count listings and collapses whitespace. Pure and deterministic
 * for a given NormalizerConfig.
 */

import { ConfigError } from '@rioplatense/core';
import { DEFAULT_BOILERPLATE_PATTERNS, DEFAULT_SPLIT_POINTS } from './boilerplate.js';

/**
 * Returned instead of a short string, so "cleaned to nothing" differs from
 * "never had content" (empty string).
 */
export const NO_USABLE_CONTENT = 'No usable content found.';

export interface NormalizerConfig {
  readonly patterns: readonly RegExp[];
  readonly splitPoints: readonly string[];
  /** A line longer than this (trimmed) ends a category listing */
  readonly categoryExitLength: number;
  readonly minContentLength: number;
}

export interface NormalizerOptions {
  /** Replaces the default pattern table */
  patterns?: readonly string[];
  /** Appended to the pattern table */
  extraPatterns?: readonly string[];
  splitPoints?: readonly string[];
  categoryExitLength?: number;
  minContentLength?: number;
}

const CATEGORY_COUNT_LINE = /^\s*\(\d+\)\s*$/;
const URL_PATTERN = /https?:\/\/\S+/g;

function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source, 'gis');
  } catch (error) {
    throw new ConfigError(`Invalid boilerplate pattern: ${source}`, { cause: error });
  }
}

/**
 * Build an immutable normalizer configuration
 *
 * @throws ConfigError if a pattern does not compile
 */
export function createNormalizerConfig(options: NormalizerOptions = {}): NormalizerConfig {
  const sources = [
    ...(options.patterns ?? DEFAULT_BOILERPLATE_PATTERNS),
    ...(options.extraPatterns ?? []),
  ];

  return Object.freeze({
    patterns: Object.freeze(sources.map(compilePattern)),
    splitPoints: Object.freeze([...(options.splitPoints ?? DEFAULT_SPLIT_POINTS)]),
    categoryExitLength: options.categoryExitLength ?? 30,
    minContentLength: options.minContentLength ?? 10,
  });
}

export const DEFAULT_NORMALIZER_CONFIG: NormalizerConfig = createNormalizerConfig();

export class TextNormalizer {
  constructor(private readonly config: NormalizerConfig = DEFAULT_NORMALIZER_CONFIG) {}

  /**
   * Clean raw scraped text.
   *
   * Empty input returns ''. Anything shorter than the minimum length after
   * cleaning returns NO_USABLE_CONTENT.
   */
  normalize(raw: string | null | undefined, minContentLength = this.config.minContentLength): string {
    if (!raw) {
      return '';
    }

    let text = raw.replace(/\r\n?/g, '\n');

    for (const pattern of this.config.patterns) {
      text = text.replace(pattern, '');
    }

    text = this.truncateAtSplitPoint(text);
    text = text.replace(URL_PATTERN, '');
    text = this.dropCategoryListings(text);

    text = text
      .replace(/\n{3,}/g, '\n\n')
      .replace(/[ \t]{2,}/g, ' ')
      .trim();

    if (text.length < minContentLength) {
      return NO_USABLE_CONTENT;
    }

    return text;
  }

  private truncateAtSplitPoint(text: string): string {
    let cut = -1;
    for (const point of this.config.splitPoints) {
      const index = text.indexOf(point);
      if (index !== -1 && (cut === -1 || index < cut)) {
        cut = index;
      }
    }
    return cut === -1 ? text : text.slice(0, cut);
  }

  /**
   * A "(12)" line starts a listing; the listing ends at the first line long
   * enough to be prose, which is kept.
   */
  private dropCategoryListings(text: string): string {
    const kept: string[] = [];
    let skipping = false;

    for (const line of text.split('\n')) {
      if (CATEGORY_COUNT_LINE.test(line)) {
        skipping = true;
        continue;
      }
      if (skipping) {
        if (line.trim().length <= this.config.categoryExitLength) continue;
        skipping = false;
      }
      kept.push(line);
    }

    return kept.join('\n');
  }
}

const defaultNormalizer = new TextNormalizer();

export function normalizeText(raw: string | null | undefined, minContentLength?: number): string {
  return defaultNormalizer.normalize(raw, minContentLength);
}
