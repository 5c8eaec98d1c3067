/**
 * Service wiring from settings
 *
 * Everything here runs once at startup. A missing or broken index aborts
 * startup rather than serving against an empty one.
 */

import { pino } from 'pino';
import { ConfigError, type Embedder, type GenerativeBackend, type VectorIndex } from '@rioplatense/core';
import type { Settings } from '@rioplatense/config';
import { createIngestionPipeline } from '@rioplatense/knowledge';
import { createLlmClient } from '@rioplatense/llm';
import {
  ContentPolicyFilter,
  HybridLanguageDetector,
  ModelClassifier,
  StatisticalClassifier,
  TranslationOrchestrator,
  loadPrompts,
} from '@rioplatense/translator';
import { loadIndexSnapshot } from '@rioplatense/vector';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface Backends {
  translation: GenerativeBackend;
  detection: GenerativeBackend;
  embedder: Embedder;
}

export function createBackends(settings: Settings, systemPrompt: string): Backends {
  if (!settings.openaiApiKey) {
    throw new ConfigError('OPENAI_API_KEY is required to serve translations');
  }

  const shared = {
    provider: 'OPENAI' as const,
    apiKey: settings.openaiApiKey,
    baseUrl: settings.openaiBaseUrl,
    embeddingModel: settings.embeddingModel,
  };
  const translation = createLlmClient({
    ...shared,
    model: settings.translatorModel,
    temperature: settings.translatorTemperature,
    systemPrompt,
  });
  const detection = createLlmClient({ ...shared, model: settings.detectionModel, temperature: 0, maxTokens: 5 });

  return { translation, detection, embedder: translation };
}

/**
 * Load the saved index snapshot, or run ingestion when there is none
 */
export async function loadOrBuildIndex(settings: Settings, embedder: Embedder): Promise<VectorIndex> {
  const snapshot = await loadIndexSnapshot(settings.indexSnapshotPath, embedder, {
    embeddingModel: settings.embeddingModel,
  });
  if (snapshot) {
    return snapshot;
  }

  logger.info({
    event: 'index.snapshot.missing',
    path: settings.indexSnapshotPath,
  }, 'No index snapshot found, building from sources');
  return createIngestionPipeline(settings, embedder).build();
}

export async function createTranslator(
  settings: Settings,
  backends?: Backends
): Promise<TranslationOrchestrator> {
  const prompts = loadPrompts(settings.promptsDir);
  const policy = ContentPolicyFilter.fromFile();
  const { translation, detection, embedder } = backends ?? createBackends(settings, prompts.system);

  const index = await loadOrBuildIndex(settings, embedder);

  const detector = new HybridLanguageDetector({
    statistical: new StatisticalClassifier(),
    model: new ModelClassifier(detection, prompts.languageDetection),
    shortInputWordThreshold: settings.shortInputWordThreshold,
  });

  logger.info({
    event: 'translator.ready',
    documents: index.size(),
    policyVersion: policy.version,
    supportedLanguages: [...settings.supportedLanguages],
  }, 'Translator ready');

  return new TranslationOrchestrator({
    policy,
    detector,
    index,
    backend: translation,
    translationTemplate: prompts.translation,
    supportedLanguages: settings.supportedLanguages,
    retrievalK: settings.retrievalK,
  });
}
