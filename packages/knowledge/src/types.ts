/**
 * Types for knowledge source ingestion
 */

import type { Document } from '@rioplatense/core';

export interface AdaptResult {
  documents: Document[];
  /** Raw records dropped (malformed, missing fields, no usable content) */
  skipped: number;
}

/**
 * Converts one raw source format into uniform documents
 */
export interface SourceAdapter<TRaw> {
  adapt(raw: TRaw): Document[];
  adaptWithReport(raw: TRaw): AdaptResult;
}

/**
 * A named source that can be read and adapted in one step
 */
export interface DocumentSource {
  readonly name: string;
  load(): Promise<AdaptResult>;
}

/**
 * In-memory table: header row plus rows keyed by column name
 */
export interface Table {
  columns: readonly string[];
  rows: ReadonlyArray<Readonly<Record<string, string>>>;
}

export type SourceRole = 'mandatory' | 'optional';

/**
 * loaded: read and adapted. failed: optional source that could not be
 * read or yielded nothing. disabled: switched off by configuration.
 */
export type SourceStatus = 'loaded' | 'failed' | 'disabled';

export interface SourceReport {
  name: string;
  role: SourceRole;
  status: SourceStatus;
  /** Documents the adapter produced */
  produced: number;
  /** Documents that made it into the index after the cap */
  kept: number;
  skipped: number;
  /** Documents dropped by the debug cap (never the same as status failed) */
  droppedByCap: number;
  error?: string;
}

export interface IngestReport {
  sources: SourceReport[];
  totalDocuments: number;
  maxDocuments?: number;
}
