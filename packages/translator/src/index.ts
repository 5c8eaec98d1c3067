export * from './content-policy.js';
export * from './language-detector.js';
export * from './retrieval-formatter.js';
export * from './prompts.js';
export * from './orchestrator.js';
