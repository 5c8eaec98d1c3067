/**
 * Knowledge source ingestion
 *
 * Normalizes and adapts raw sources into documents, then hands them to an
 * index builder.
 */

export * from './types.js';
export * from './normalizer.js';
export * from './boilerplate.js';
export * from './chunking.js';
export * from './document.js';
export * from './adapters/tabular.js';
export * from './adapters/article.js';
export * from './sources.js';
export * from './pipeline.js';
export * from './factory.js';
