/**
 * Pipeline wiring from validated settings
 */

import type { Settings } from '@rioplatense/config';
import type { Embedder } from '@rioplatense/core';
import { buildVectorIndex, type MemoryVectorIndex } from '@rioplatense/vector';
import { ArticleAdapter } from './adapters/article.js';
import { TabularAdapter } from './adapters/tabular.js';
import { IngestionPipeline } from './pipeline.js';
import { articleJsonlSource, phraseCsvSource } from './sources.js';

export function createIngestionPipeline(settings: Settings, embedder: Embedder): IngestionPipeline<MemoryVectorIndex> {
  const phrases = phraseCsvSource(settings.phrasesCsvPath, new TabularAdapter({ sourceName: 'phrases' }));
  const articles = articleJsonlSource(
    settings.articlesDataPath,
    new ArticleAdapter({
      sourceName: 'articles',
      minContentLength: settings.minContentLength,
      chunkSize: settings.chunkSize,
      chunkOverlap: settings.chunkOverlap,
    })
  );

  return new IngestionPipeline({
    mandatory: phrases,
    optional: [{ source: articles, enabled: settings.useArticleData }],
    maxDocuments: settings.maxDocuments,
    buildIndex: documents => buildVectorIndex(documents, embedder, { embeddingModel: settings.embeddingModel }),
  });
}
