/**
 * Environment diagnostics script
 *
 * Usage: npm run env:diag
 *
 * Prints environment loading diagnostics and validated settings without
 * starting the server or touching any backend.
 */

import { initEnv, getEnvDiagnostics, loadSettings } from '@rioplatense/config';
import { errorMessage } from '@rioplatense/core';

const { repoRoot, envFilePath, envLocalFilePath, loaded, localLoaded, keysLoaded } = initEnv();

console.log('🔍 Environment Diagnostics');
console.log(`   Repo root: ${repoRoot}`);
console.log(`   .env file: ${envFilePath}`);
console.log(`   .env exists: ${loaded ? '✅' : '❌'}`);
console.log(`   .env.local file: ${envLocalFilePath}`);
console.log(`   .env.local exists: ${localLoaded ? '✅' : '❌'}`);
console.log(`   Keys loaded from .env: ${keysLoaded.length}`);

const diagnostics = getEnvDiagnostics([
  'OPENAI_API_KEY',
  'PHRASES_CSV_PATH',
  'ARTICLES_DATA_PATH',
  'USE_ARTICLE_DATA',
  'SUPPORTED_LANGUAGES',
  'SHORT_INPUT_WORD_THRESHOLD',
]);

console.log('\n📋 Environment Variables Status:');
for (const key of diagnostics.requiredKeys) {
  const status = key.present ? '✅' : '⚪';
  const masked = key.maskedValue ? ` (${key.maskedValue})` : '';
  const source = key.source ? ` [from ${key.source}]` : '';
  console.log(`   ${status} ${key.key}${masked}${source}`);
}

let settingsValid = true;
try {
  const settings = loadSettings(process.env, { baseDir: repoRoot });
  console.log('\n⚙️  Settings:');
  console.log(`   Phrases: ${settings.phrasesCsvPath}`);
  console.log(`   Articles: ${settings.useArticleData ? settings.articlesDataPath : 'disabled'}`);
  console.log(`   Supported languages: ${[...settings.supportedLanguages].join(', ')}`);
  console.log(`   Short input threshold: ${settings.shortInputWordThreshold} words`);
  console.log(`   Retrieval k: ${settings.retrievalK}`);
} catch (error) {
  settingsValid = false;
  console.log(`\n❌ ${errorMessage(error)}`);
}

if (diagnostics.warnings.length > 0) {
  console.log('\n⚠️  Warnings:');
  for (const warning of diagnostics.warnings) {
    console.log(`   - ${warning}`);
  }
}

console.log(JSON.stringify({
  event: 'env.diagnostics',
  envFileExists: loaded,
  envLocalFileExists: localLoaded,
  keysLoadedCount: keysLoaded.length,
  OPENAI_API_KEY_PRESENT: diagnostics.requiredKeys.some(k => k.key === 'OPENAI_API_KEY' && k.present),
  settingsValid,
  warnings: diagnostics.warnings,
}));
