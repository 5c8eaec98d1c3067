/**
 * In-memory vector index
 *
 * Documents are embedded on insert and searched by cosine similarity.
 * Inserts run one at a time; queries read a stable array and may run
 * concurrently with each other.
 */

import { z } from 'zod';
import { pino } from 'pino';
import {
  IndexBuildError,
  errorMessage,
  type CallOptions,
  type Document,
  type Embedder,
  type RetrievalResult,
  type VectorIndex,
} from '@rioplatense/core';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface IndexedDocument {
  document: Document;
  vector: number[];
}

const SnapshotSchema = z.object({
  version: z.literal(2),
  /** Embedding model the vectors came from; null when the builder did not say */
  embeddingModel: z.string().nullable(),
  dimensions: z.number().int().min(0),
  entries: z.array(z.object({
    content: z.string().min(1),
    metadata: z.record(z.string()),
    vector: z.array(z.number()),
  })),
});

export type IndexSnapshot = z.infer<typeof SnapshotSchema>;

export interface MemoryVectorIndexOptions {
  /** Texts per embedding request */
  batchSize?: number;
  /** Recorded in snapshots; a snapshot from another model is refused */
  embeddingModel?: string;
}

/**
 * Returns 0 for empty, mismatched or zero-norm vectors
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0 || !isFinite(denominator)) {
    return 0;
  }
  return dot / denominator;
}

export class MemoryVectorIndex implements VectorIndex {
  private entries: readonly IndexedDocument[] = [];
  private writes: Promise<void> = Promise.resolve();
  private readonly batchSize: number;
  private readonly embeddingModel: string | null;
  /** Vector length, fixed by the first inserted batch; 0 while empty */
  private dimensions = 0;

  constructor(private readonly embedder: Embedder, options: MemoryVectorIndexOptions = {}) {
    this.batchSize = Math.max(1, options.batchSize ?? 64);
    this.embeddingModel = options.embeddingModel ?? null;
  }

  size(): number {
    return this.entries.length;
  }

  /**
   * Embed and append documents. Concurrent calls are applied in call order.
   */
  insert(documents: readonly Document[]): Promise<void> {
    const run = this.writes.then(() => this.embedAndAppend(documents));
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.writes = run.catch(error => {
      logger.warn({ event: 'index.insert.failed', error: errorMessage(error) }, 'Index insert failed');
    });
    return run;
  }

  async query(text: string, k: number, options?: CallOptions): Promise<RetrievalResult> {
    if (k <= 0 || this.entries.length === 0) {
      return [];
    }

    const [vector] = await this.embedder.embed([text], options);
    if (!vector) {
      throw new Error('Embedder returned no vector for query');
    }
    if (vector.length !== this.dimensions) {
      throw new Error(`Query vector has ${vector.length} dimensions, index has ${this.dimensions}`);
    }

    return this.entries
      .map(entry => ({ document: entry.document, score: cosineSimilarity(vector, entry.vector) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  toSnapshot(): IndexSnapshot {
    return {
      version: 2,
      embeddingModel: this.embeddingModel,
      dimensions: this.dimensions,
      entries: this.entries.map(({ document, vector }) => ({
        content: document.content,
        metadata: { ...document.metadata },
        vector: [...vector],
      })),
    };
  }

  /**
   * Rebuild an index from a snapshot without re-embedding
   *
   * @throws IndexBuildError if the snapshot does not validate, or was built
   * with a different embedding model than `options.embeddingModel`
   */
  static fromSnapshot(
    embedder: Embedder,
    snapshot: unknown,
    options: MemoryVectorIndexOptions = {}
  ): MemoryVectorIndex {
    const parsed = SnapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new IndexBuildError(`Invalid index snapshot: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    }

    const { embeddingModel, dimensions, entries } = parsed.data;
    if (options.embeddingModel !== undefined && embeddingModel !== options.embeddingModel) {
      throw new IndexBuildError(
        `Index snapshot was built with embedding model ${embeddingModel ?? '(unrecorded)'}, expected ${options.embeddingModel}`
      );
    }
    const mismatched = entries.findIndex(entry => entry.vector.length !== dimensions);
    if (mismatched !== -1) {
      throw new IndexBuildError(`Index snapshot entry ${mismatched} does not have ${dimensions} dimensions`);
    }

    const index = new MemoryVectorIndex(embedder, options);
    index.dimensions = dimensions;
    index.entries = entries.map(entry => ({
      document: Object.freeze({ content: entry.content, metadata: Object.freeze({ ...entry.metadata }) }),
      vector: entry.vector,
    }));
    return index;
  }

  private async embedAndAppend(documents: readonly Document[]): Promise<void> {
    const added: IndexedDocument[] = [];
    let dimensions = this.dimensions;

    for (let start = 0; start < documents.length; start += this.batchSize) {
      const batch = documents.slice(start, start + this.batchSize);
      const vectors = await this.embedder.embed(batch.map(doc => doc.content));
      if (vectors.length !== batch.length) {
        throw new IndexBuildError(`Embedder returned ${vectors.length} vectors for ${batch.length} documents`);
      }
      for (const [i, document] of batch.entries()) {
        const vector = vectors[i];
        if (dimensions === 0) {
          dimensions = vector.length;
        }
        if (vector.length === 0 || vector.length !== dimensions) {
          throw new IndexBuildError(`Embedder returned a ${vector.length}-dimension vector, expected ${dimensions}`);
        }
        added.push({ document, vector });
      }

      logger.debug({
        event: 'index.insert.batch',
        embedded: start + batch.length,
        total: documents.length,
      }, 'Embedded batch');
    }

    // Readers keep their snapshot of the previous array
    this.dimensions = dimensions;
    this.entries = [...this.entries, ...added];
  }
}

/**
 * Build a populated index. Zero documents is a caller error.
 *
 * @throws IndexBuildError
 */
export async function buildVectorIndex(
  documents: readonly Document[],
  embedder: Embedder,
  options: MemoryVectorIndexOptions = {}
): Promise<MemoryVectorIndex> {
  if (documents.length === 0) {
    throw new IndexBuildError('Cannot build a vector index from zero documents');
  }

  const index = new MemoryVectorIndex(embedder, options);
  try {
    await index.insert(documents);
  } catch (error) {
    if (error instanceof IndexBuildError) throw error;
    throw new IndexBuildError(`Embedding failed: ${errorMessage(error)}`, { cause: error });
  }

  logger.info({ event: 'index.built', documents: index.size() }, `Indexed ${index.size()} documents`);
  return index;
}
