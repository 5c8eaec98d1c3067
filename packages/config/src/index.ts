export * from './env.js';
export * from './settings.js';
