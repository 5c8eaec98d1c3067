export * from './memory-index.js';
export * from './snapshot.js';
