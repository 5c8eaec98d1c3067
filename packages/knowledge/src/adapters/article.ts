/**
 * Scraped article adapter
 *
 * Input is one JSON record per line: {url, title, text}. Malformed lines and
 * articles without usable content are skipped and logged; a batch where
 * nothing survives is a DataLoadingError.
 */

import { z } from 'zod';
import { pino } from 'pino';
import { DataLoadingError, errorMessage, type Document } from '@rioplatense/core';
import { NO_USABLE_CONTENT, TextNormalizer } from '../normalizer.js';
import { chunkText } from '../chunking.js';
import { createDocument } from '../document.js';
import type { AdaptResult, SourceAdapter } from '../types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const ArticleRecordSchema = z.object({
  url: z.string().nullish(),
  title: z.string().nullish(),
  text: z.string({ required_error: 'missing "text" key' }),
});

export type ArticleRecord = z.infer<typeof ArticleRecordSchema>;

export interface ArticleAdapterOptions {
  /** Name used in errors, logs and the `source` metadata tag */
  sourceName: string;
  normalizer?: TextNormalizer;
  minContentLength?: number;
  /** 0 keeps one document per article */
  chunkSize?: number;
  chunkOverlap?: number;
  region?: string;
}

type ParsedLine =
  | { ok: true; record: ArticleRecord }
  | { ok: false; reason: string };

function parseLine(line: string): ParsedLine {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error) {
    return { ok: false, reason: `invalid JSON: ${errorMessage(error)}` };
  }

  const parsed = ArticleRecordSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.issues.map(issue => issue.message).join('; ') };
  }
  return { ok: true, record: parsed.data };
}

export class ArticleAdapter implements SourceAdapter<readonly string[]> {
  private readonly normalizer: TextNormalizer;
  private readonly minContentLength: number;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly region: string;

  constructor(private readonly options: ArticleAdapterOptions) {
    this.normalizer = options.normalizer ?? new TextNormalizer();
    this.minContentLength = options.minContentLength ?? 100;
    this.chunkSize = options.chunkSize ?? 0;
    this.chunkOverlap = options.chunkOverlap ?? 0;
    this.region = options.region ?? 'Argentina';
  }

  adapt(lines: readonly string[]): Document[] {
    return this.adaptWithReport(lines).documents;
  }

  /**
   * @throws DataLoadingError when no line yields a document
   */
  adaptWithReport(lines: readonly string[]): AdaptResult {
    const { sourceName } = this.options;
    const documents: Document[] = [];
    let processed = 0;
    let skipped = 0;

    lines.forEach((line, index) => {
      if (!line.trim()) return;

      const parsed = parseLine(line);
      if (!parsed.ok) {
        logger.warn({
          event: 'ingest.record.skipped',
          source: sourceName,
          line: index + 1,
          reason: parsed.reason,
        }, `Skipping malformed record: ${line.substring(0, 50)}`);
        skipped++;
        return;
      }

      const { record } = parsed;
      const cleaned = this.normalizer.normalize(record.text, this.minContentLength);
      if (cleaned === NO_USABLE_CONTENT || cleaned === '') {
        logger.debug({
          event: 'ingest.record.skipped',
          source: sourceName,
          line: index + 1,
          url: record.url,
          reason: 'no usable content',
        }, 'Skipping article with minimal content');
        skipped++;
        return;
      }

      documents.push(...this.recordToDocuments(record, cleaned));
      processed++;
    });

    if (processed === 0) {
      throw new DataLoadingError(
        sourceName,
        `Failed to load any valid documents from ${sourceName}. ` +
          `All ${skipped} entries were skipped.`
      );
    }

    logger.info({
      event: 'ingest.adapter.article',
      source: sourceName,
      articles: processed,
      documents: documents.length,
      skipped,
    }, `Loaded ${processed} articles from ${sourceName}, skipped ${skipped}`);

    return { documents, skipped };
  }

  private recordToDocuments(record: ArticleRecord, cleaned: string): Document[] {
    const title = record.title?.trim() || 'Untitled';
    const url = record.url?.trim() || '';
    const chunks = chunkText(cleaned, { chunkSize: this.chunkSize, chunkOverlap: this.chunkOverlap });

    return chunks.map((chunk, index) => {
      const content = [
        `Title: ${title}`,
        `Source: ${this.options.sourceName}`,
        `URL: ${url}`,
        `Content: ${chunk}`,
      ].join('\n');

      const metadata: Record<string, string> = {
        title,
        url,
        source: this.options.sourceName,
        data_type: 'article',
        region: this.region,
      };
      if (chunks.length > 1) {
        metadata.chunk = String(index);
        metadata.chunk_count = String(chunks.length);
      }

      return createDocument(content, metadata);
    });
  }
}
