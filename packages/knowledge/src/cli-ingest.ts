/**
 * CLI script to build the vector index and save a snapshot
 *
 * Usage: npm run ingest [-- --max-documents 50] [--no-articles] [--out data/index.json]
 */

import { resolve } from 'path';
import { initEnv, loadSettings, requireEnv } from '@rioplatense/config';
import { errorMessage } from '@rioplatense/core';
import { createLlmClient } from '@rioplatense/llm';
import { saveIndexSnapshot } from '@rioplatense/vector';
import { createIngestionPipeline } from './factory.js';

const { repoRoot } = initEnv();

async function main() {
  const args = process.argv.slice(2);
  const base = loadSettings(process.env, { baseDir: repoRoot });

  let maxDocuments = base.maxDocuments;
  let useArticleData = base.useArticleData;
  let outPath = base.indexSnapshotPath;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--max-documents' && args[i + 1]) {
      maxDocuments = Number.parseInt(args[i + 1], 10);
      i++;
    } else if (args[i] === '--no-articles') {
      useArticleData = false;
    } else if (args[i] === '--out' && args[i + 1]) {
      outPath = resolve(args[i + 1]);
      i++;
    }
  }

  if (maxDocuments !== undefined && (!Number.isInteger(maxDocuments) || maxDocuments <= 0)) {
    throw new Error('--max-documents must be a positive integer');
  }

  const settings = { ...base, maxDocuments, useArticleData };
  const llm = createLlmClient({
    provider: 'OPENAI',
    apiKey: requireEnv('OPENAI_API_KEY'),
    baseUrl: settings.openaiBaseUrl,
    embeddingModel: settings.embeddingModel,
  });

  console.log(`🌱 Building index from: ${settings.phrasesCsvPath}`);
  console.log(`   Articles: ${useArticleData ? settings.articlesDataPath : 'disabled'}`);
  if (maxDocuments !== undefined) {
    console.log(`   Max documents: ${maxDocuments}`);
  }

  const startTime = Date.now();
  console.log(`\n📥 Starting ingestion...`);

  const { index, report } = await createIngestionPipeline(settings, llm).buildWithReport();
  await saveIndexSnapshot(index, outPath);

  const duration = Date.now() - startTime;

  console.log(`\n✅ Ingestion complete!`);
  for (const source of report.sources) {
    const dropped = source.droppedByCap > 0 ? `, ${source.droppedByCap} dropped by cap` : '';
    console.log(`   ${source.name} (${source.role}): ${source.status}, ${source.kept} kept, ${source.skipped} skipped${dropped}`);
    if (source.error) {
      console.log(`     ⚠️  ${source.error}`);
    }
  }
  console.log(`   Total documents: ${report.totalDocuments}`);
  console.log(`   Snapshot: ${outPath}`);
  console.log(`   Duration: ${duration}ms`);

  console.log(JSON.stringify({
    event: 'knowledge.ingest.success',
    totalDocuments: report.totalDocuments,
    sources: report.sources,
    snapshot: outPath,
    durationMs: duration,
  }));
}

main().catch((error: unknown) => {
  console.error(`\n❌ Ingestion failed: ${errorMessage(error)}`);
  console.log(JSON.stringify({
    event: 'knowledge.ingest.failed',
    error: errorMessage(error),
  }));
  process.exit(1);
});
