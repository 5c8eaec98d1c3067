/**
 * Unit tests for memory-index.ts and snapshot.ts
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { IndexBuildError, type Document, type Embedder } from '@rioplatense/core';
import { MemoryVectorIndex, buildVectorIndex, cosineSimilarity } from '../memory-index.js';
import { loadIndexSnapshot, saveIndexSnapshot } from '../snapshot.js';

const VOCABULARY = ['money', 'guita', 'bus', 'colectivo', 'friend', 'che'];

/**
 * Bag-of-words over a fixed vocabulary. Texts containing "slow" take longer.
 */
class VocabularyEmbedder implements Embedder {
  calls: string[][] = [];

  async embed(texts: readonly string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    if (texts.some(text => text.includes('slow'))) {
      await new Promise(resolve => setTimeout(resolve, 20));
    }
    return texts.map(text => {
      const words = text.toLowerCase().split(/\W+/);
      return VOCABULARY.map(term => words.filter(word => word === term).length);
    });
  }
}

function doc(content: string): Document {
  return { content, metadata: { source: 'test' } };
}

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
  });

  it('is 0 for zero-norm or mismatched vectors', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([1], [1, 1])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
  });
});

describe('MemoryVectorIndex', () => {
  it('returns the closest documents in descending score order, at most k', async () => {
    const index = await buildVectorIndex(
      [doc('money guita'), doc('bus colectivo'), doc('friend che')],
      new VocabularyEmbedder()
    );

    const results = await index.query('I need money', 2);

    expect(results).toHaveLength(2);
    expect(results[0].document.content).toBe('money guita');
    expect(results[0].score).toBeGreaterThan(results[1].score);
  });

  it('returns nothing for k <= 0 or an empty index', async () => {
    const embedder = new VocabularyEmbedder();
    const empty = new MemoryVectorIndex(embedder);
    expect(await empty.query('money', 3)).toEqual([]);

    const index = await buildVectorIndex([doc('money')], embedder);
    expect(await index.query('money', 0)).toEqual([]);
  });

  it('embeds in batches', async () => {
    const embedder = new VocabularyEmbedder();
    const index = new MemoryVectorIndex(embedder, { batchSize: 2 });

    await index.insert([doc('money'), doc('bus'), doc('che')]);

    expect(embedder.calls).toEqual([['money', 'bus'], ['che']]);
    expect(index.size()).toBe(3);
  });

  it('applies concurrent inserts in call order', async () => {
    const index = new MemoryVectorIndex(new VocabularyEmbedder());

    await Promise.all([
      index.insert([doc('slow money')]),
      index.insert([doc('fast bus')]),
    ]);

    expect(index.toSnapshot().entries.map(entry => entry.content)).toEqual(['slow money', 'fast bus']);
  });

  it('keeps accepting inserts after a failed one', async () => {
    let fail = true;
    const embedder: Embedder = {
      async embed(texts) {
        if (fail) {
          fail = false;
          throw new Error('embedding service down');
        }
        return texts.map(() => [1]);
      },
    };
    const index = new MemoryVectorIndex(embedder);

    await expect(index.insert([doc('a')])).rejects.toThrow('embedding service down');
    await index.insert([doc('b')]);

    expect(index.size()).toBe(1);
  });

  it('rejects vectors whose length changes between documents', async () => {
    const embedder: Embedder = { embed: async texts => texts.map(text => (text === 'b' ? [1, 0] : [1])) };
    const index = new MemoryVectorIndex(embedder);

    await expect(index.insert([doc('a'), doc('b')])).rejects.toThrow('Embedder returned a 2-dimension vector, expected 1');
    expect(index.size()).toBe(0);
  });

  it('rejects a query vector of a different length than the indexed ones', async () => {
    const index = await buildVectorIndex([doc('money')], { embed: async texts => texts.map(() => [1, 0, 0]) });
    const restored = MemoryVectorIndex.fromSnapshot(
      { embed: async texts => texts.map(() => [1, 0, 0, 0]) },
      index.toSnapshot()
    );

    await expect(restored.query('money', 1)).rejects.toThrow('Query vector has 4 dimensions, index has 3');
  });

  it('rejects a vector count that does not match the batch', async () => {
    const embedder: Embedder = { embed: async () => [[1]] };
    const index = new MemoryVectorIndex(embedder);

    await expect(index.insert([doc('a'), doc('b')])).rejects.toBeInstanceOf(IndexBuildError);
  });
});

describe('buildVectorIndex', () => {
  it('refuses zero documents', async () => {
    await expect(buildVectorIndex([], new VocabularyEmbedder())).rejects.toBeInstanceOf(IndexBuildError);
  });

  it('wraps embedder failures in IndexBuildError', async () => {
    const embedder: Embedder = {
      embed: async () => {
        throw new Error('quota exceeded');
      },
    };

    await expect(buildVectorIndex([doc('a')], embedder)).rejects.toThrow('Embedding failed: quota exceeded');
  });
});

describe('index snapshots', () => {
  it('restores an index without re-embedding documents', async () => {
    const embedder = new VocabularyEmbedder();
    const index = await buildVectorIndex([doc('money guita'), doc('bus colectivo')], embedder);
    const path = join(mkdtempSync(join(tmpdir(), 'index-')), 'nested', 'index.json');

    await saveIndexSnapshot(index, path);
    embedder.calls = [];
    const restored = await loadIndexSnapshot(path, embedder);

    expect(restored?.size()).toBe(2);
    expect(embedder.calls).toEqual([]);
    const results = await restored?.query('colectivo', 1);
    expect(results?.[0].document.content).toBe('bus colectivo');
    expect(results?.[0].document.metadata).toEqual({ source: 'test' });
  });

  it('returns null when no snapshot exists', async () => {
    const path = join(mkdtempSync(join(tmpdir(), 'index-')), 'missing.json');
    expect(await loadIndexSnapshot(path, new VocabularyEmbedder())).toBeNull();
  });

  it('records the embedding model and vector length', async () => {
    const index = await buildVectorIndex([doc('money guita')], new VocabularyEmbedder(), {
      embeddingModel: 'test-embedding',
    });

    const snapshot = index.toSnapshot();

    expect(snapshot.version).toBe(2);
    expect(snapshot.embeddingModel).toBe('test-embedding');
    expect(snapshot.dimensions).toBe(VOCABULARY.length);
  });

  it('refuses a snapshot built with another embedding model', async () => {
    const embedder = new VocabularyEmbedder();
    const index = await buildVectorIndex([doc('money guita')], embedder, { embeddingModel: 'old-embedding' });
    const path = join(mkdtempSync(join(tmpdir(), 'index-')), 'index.json');
    await saveIndexSnapshot(index, path);

    await expect(loadIndexSnapshot(path, embedder, { embeddingModel: 'new-embedding' }))
      .rejects.toThrow('Index snapshot was built with embedding model old-embedding, expected new-embedding');
  });

  it('rejects entries that do not match the recorded vector length', () => {
    const snapshot = {
      version: 2,
      embeddingModel: null,
      dimensions: 3,
      entries: [{ content: 'money', metadata: {}, vector: [1, 0] }],
    };
    expect(() => MemoryVectorIndex.fromSnapshot(new VocabularyEmbedder(), snapshot))
      .toThrow('Index snapshot entry 0 does not have 3 dimensions');
  });

  it('rejects a malformed snapshot', () => {
    expect(() => MemoryVectorIndex.fromSnapshot(new VocabularyEmbedder(), { version: 1, entries: [] }))
      .toThrow(IndexBuildError);
  });
});
