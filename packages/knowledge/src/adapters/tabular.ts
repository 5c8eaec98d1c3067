/**
 * Phrase table adapter
 *
 * One row per regional expression. Content is a labeled, fixed-order
 * rendering of the row so embeddings capture its structure.
 */

import { pino } from 'pino';
import { SchemaError, type Document } from '@rioplatense/core';
import { createDocument } from '../document.js';
import type { AdaptResult, SourceAdapter, Table } from '../types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const PHRASE_COLUMNS = {
  term: 'Original Phrase/Word',
  equivalent: 'Argentinian Equivalent',
  explanation: 'Explanation (Context/Usage)',
  region: 'Region Specificity',
  formality: 'Level of Formality',
  register: 'Register',
  connotation: 'Connotation',
  exampleSpanish: 'Example Sentence (Spanish)',
  exampleEnglish: 'Example Sentence (English)',
} as const;

export const REQUIRED_PHRASE_COLUMNS: readonly string[] = [
  PHRASE_COLUMNS.term,
  PHRASE_COLUMNS.equivalent,
  PHRASE_COLUMNS.explanation,
  PHRASE_COLUMNS.region,
  PHRASE_COLUMNS.formality,
];

type PhraseField = keyof typeof PHRASE_COLUMNS;

/**
 * Content order, label and metadata key per field
 */
const FIELD_LAYOUT: ReadonlyArray<{ field: PhraseField; label: string; metadataKey: string }> = [
  { field: 'term', label: 'Original', metadataKey: 'original' },
  { field: 'equivalent', label: 'Argentinian', metadataKey: 'argentinian' },
  { field: 'explanation', label: 'Context/Explanation', metadataKey: 'context' },
  { field: 'region', label: 'Region', metadataKey: 'region' },
  { field: 'formality', label: 'Formality', metadataKey: 'formality' },
  { field: 'register', label: 'Register', metadataKey: 'register' },
  { field: 'connotation', label: 'Connotation', metadataKey: 'connotation' },
  { field: 'exampleSpanish', label: 'Example (Spanish)', metadataKey: 'example_spanish' },
  { field: 'exampleEnglish', label: 'Example (English)', metadataKey: 'example_english' },
];

export interface TabularAdapterOptions {
  /** Name used in errors and logs */
  sourceName?: string;
  /** Value of the `source` metadata tag */
  sourceTag?: string;
}

export class TabularAdapter implements SourceAdapter<Table> {
  private readonly sourceName: string;
  private readonly sourceTag: string;

  constructor(options: TabularAdapterOptions = {}) {
    this.sourceName = options.sourceName ?? 'phrase table';
    this.sourceTag = options.sourceTag ?? 'phrases';
  }

  adapt(table: Table): Document[] {
    return this.adaptWithReport(table).documents;
  }

  /**
   * @throws SchemaError naming the missing required columns, before any
   * document is produced
   */
  adaptWithReport(table: Table): AdaptResult {
    const missing = REQUIRED_PHRASE_COLUMNS.filter(column => !table.columns.includes(column));
    if (missing.length > 0) {
      throw new SchemaError(this.sourceName, missing);
    }

    const documents: Document[] = [];
    let skipped = 0;

    table.rows.forEach((row, index) => {
      const term = (row[PHRASE_COLUMNS.term] ?? '').trim();
      const equivalent = (row[PHRASE_COLUMNS.equivalent] ?? '').trim();
      if (!term || !equivalent) {
        logger.warn({
          event: 'ingest.row.skipped',
          source: this.sourceName,
          row: index + 2, // 1-based plus header line
          reason: 'missing term or regional equivalent',
        }, 'Skipping phrase row');
        skipped++;
        return;
      }
      documents.push(this.rowToDocument(row));
    });

    logger.info({
      event: 'ingest.adapter.tabular',
      source: this.sourceName,
      documents: documents.length,
      skipped,
    }, `Created ${documents.length} phrase documents`);

    return { documents, skipped };
  }

  private rowToDocument(row: Readonly<Record<string, string>>): Document {
    const lines: string[] = [];
    const metadata: Record<string, string> = {};

    for (const { field, label, metadataKey } of FIELD_LAYOUT) {
      const value = (row[PHRASE_COLUMNS[field]] ?? '').trim();
      if (!value) continue;
      lines.push(`${label}: ${value}`);
      metadata[metadataKey] = value;
    }

    metadata.source = this.sourceTag;
    metadata.data_type = 'phrase';

    return createDocument(lines.join('\n'), metadata);
  }
}
