/**
 * Ingestion pipeline
 *
 * Loads the mandatory source and any enabled optional sources, applies the
 * optional document cap and hands the combined list to an index builder.
 * Optional sources degrade to a logged failure; the mandatory one aborts.
 */

import { pino } from 'pino';
import {
  DataLoadingError,
  IndexBuildError,
  errorMessage,
  isAppError,
  type Document,
  type VectorIndex,
} from '@rioplatense/core';
import type { AdaptResult, DocumentSource, IngestReport, SourceReport, SourceRole } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface OptionalSource {
  source: DocumentSource;
  enabled: boolean;
}

export interface IngestionPipelineOptions<TIndex extends VectorIndex = VectorIndex> {
  mandatory: DocumentSource;
  optional?: readonly OptionalSource[];
  /** Debug/test cap on total documents. Never truncates the mandatory source. */
  maxDocuments?: number;
  buildIndex: (documents: readonly Document[]) => Promise<TIndex>;
}

export interface CollectedDocuments {
  documents: Document[];
  report: IngestReport;
}

interface Loaded {
  report: SourceReport;
  documents: Document[];
}

/**
 * Share `budget` round-robin across the given lists, preserving order
 * within each list. Returns the kept count per list.
 */
export function fairShare(sizes: readonly number[], budget: number): number[] {
  const kept = sizes.map(() => 0);
  let remaining = Math.max(0, budget);

  while (remaining > 0) {
    let progressed = false;
    for (let i = 0; i < sizes.length && remaining > 0; i++) {
      if (kept[i] < sizes[i]) {
        kept[i]++;
        remaining--;
        progressed = true;
      }
    }
    if (!progressed) break;
  }

  return kept;
}

function logSourceLoaded(name: string, role: SourceRole, result: AdaptResult): void {
  logger.info({
    event: 'ingest.source.loaded',
    source: name,
    role,
    documents: result.documents.length,
    skipped: result.skipped,
  }, `Loaded ${result.documents.length} documents from ${name}`);
}

export class IngestionPipeline<TIndex extends VectorIndex = VectorIndex> {
  constructor(private readonly options: IngestionPipelineOptions<TIndex>) {}

  /**
   * Load and cap documents without building an index
   *
   * @throws SchemaError | DataLoadingError from the mandatory source
   */
  async collect(): Promise<CollectedDocuments> {
    const mandatory = await this.loadMandatory();
    const optional: Loaded[] = [];
    for (const entry of this.options.optional ?? []) {
      optional.push(await this.loadOptional(entry));
    }

    this.applyCap(mandatory, optional);

    const all = [mandatory, ...optional];
    const documents = all.flatMap(entry => entry.documents);
    const report: IngestReport = {
      sources: all.map(entry => entry.report),
      totalDocuments: documents.length,
      ...(this.options.maxDocuments !== undefined ? { maxDocuments: this.options.maxDocuments } : {}),
    };

    logger.info({
      event: 'ingest.collected',
      totalDocuments: documents.length,
      sources: report.sources.map(({ name, status, kept }) => ({ name, status, kept })),
    }, `Collected ${documents.length} documents`);

    return { documents, report };
  }

  async buildWithReport(): Promise<{ index: TIndex; report: IngestReport }> {
    const { documents, report } = await this.collect();

    if (documents.length === 0) {
      throw new IndexBuildError('Refusing to build an index from zero documents');
    }

    let index: TIndex;
    try {
      index = await this.options.buildIndex(documents);
    } catch (error) {
      if (error instanceof IndexBuildError) throw error;
      throw new IndexBuildError(`Index build failed: ${errorMessage(error)}`, { cause: error });
    }

    logger.info({ event: 'ingest.index.built', documents: documents.length }, 'Vector index built');
    return { index, report };
  }

  async build(): Promise<TIndex> {
    const { index } = await this.buildWithReport();
    return index;
  }

  private async loadMandatory(): Promise<Loaded> {
    const { mandatory } = this.options;
    let result: AdaptResult;
    try {
      result = await mandatory.load();
    } catch (error) {
      if (isAppError(error)) throw error;
      throw new DataLoadingError(mandatory.name, `Failed to load ${mandatory.name}: ${errorMessage(error)}`, { cause: error });
    }

    if (result.documents.length === 0) {
      throw new DataLoadingError(mandatory.name, `${mandatory.name} produced no documents`);
    }
    logSourceLoaded(mandatory.name, 'mandatory', result);

    return {
      documents: result.documents,
      report: {
        name: mandatory.name,
        role: 'mandatory',
        status: 'loaded',
        produced: result.documents.length,
        kept: result.documents.length,
        skipped: result.skipped,
        droppedByCap: 0,
      },
    };
  }

  private async loadOptional({ source, enabled }: OptionalSource): Promise<Loaded> {
    const base = { name: source.name, role: 'optional' as const, produced: 0, kept: 0, skipped: 0, droppedByCap: 0 };

    if (!enabled) {
      logger.info({ event: 'ingest.source.disabled', source: source.name }, `${source.name} disabled`);
      return { documents: [], report: { ...base, status: 'disabled' } };
    }

    try {
      const result = await source.load();
      if (result.documents.length === 0) {
        throw new DataLoadingError(source.name, `${source.name} produced no documents`);
      }
      logSourceLoaded(source.name, 'optional', result);
      return {
        documents: result.documents,
        report: {
          ...base,
          status: 'loaded',
          produced: result.documents.length,
          kept: result.documents.length,
          skipped: result.skipped,
        },
      };
    } catch (error) {
      const message = errorMessage(error);
      logger.warn({
        event: 'ingest.source.failed',
        source: source.name,
        error: message,
      }, `Optional source ${source.name} failed, continuing without it`);
      return { documents: [], report: { ...base, status: 'failed', error: message } };
    }
  }

  private applyCap(mandatory: Loaded, optional: Loaded[]): void {
    const { maxDocuments } = this.options;
    if (maxDocuments === undefined) return;

    const total = mandatory.documents.length + optional.reduce((sum, entry) => sum + entry.documents.length, 0);
    if (total <= maxDocuments) return;

    if (mandatory.documents.length > maxDocuments) {
      logger.warn({
        event: 'ingest.cap.mandatory_exceeds',
        maxDocuments,
        mandatory: mandatory.documents.length,
      }, 'Cap is below the mandatory source yield; keeping all mandatory documents');
    }

    const budget = maxDocuments - mandatory.documents.length;
    const shares = fairShare(optional.map(entry => entry.documents.length), budget);

    optional.forEach((entry, i) => {
      const keep = shares[i];
      const dropped = entry.documents.length - keep;
      entry.documents = entry.documents.slice(0, keep);
      entry.report.kept = keep;
      entry.report.droppedByCap = dropped;
    });

    logger.info({
      event: 'ingest.cap.applied',
      maxDocuments,
      before: total,
      after: mandatory.documents.length + optional.reduce((sum, entry) => sum + entry.documents.length, 0),
    }, `Document cap applied (max ${maxDocuments})`);
  }
}
