/**
 * Typed application settings
 *
 * Validated once at startup from process.env (after initEnv). The returned
 * object is frozen and shared read-only by every request.
 */

import { isAbsolute, resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from '@rioplatense/core';

const booleanFlag = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const languageList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((code) => code.trim().toLowerCase())
      .filter((code) => code.length > 0)
  )
  .pipe(z.array(z.string().regex(/^[a-z]{2}$/, 'expected two-letter language codes')).min(1));

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  TRANSLATOR_MODEL_NAME: z.string().default('gpt-4o'),
  TRANSLATOR_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  LANGUAGE_DETECTION_MODEL_NAME: z.string().optional(),
  EMBEDDING_MODEL_NAME: z.string().default('text-embedding-3-small'),
  PHRASES_CSV_PATH: z.string().default('data/phrases.csv'),
  ARTICLES_DATA_PATH: z.string().default('data/articles.jsonl'),
  USE_ARTICLE_DATA: booleanFlag.default('true'),
  SHORT_INPUT_WORD_THRESHOLD: z.coerce.number().int().min(0).default(2),
  SUPPORTED_LANGUAGES: languageList.default('en,es'),
  RETRIEVAL_K: z.coerce.number().int().min(1).default(3),
  MIN_CONTENT_LENGTH: z.coerce.number().int().min(0).default(100),
  CHUNK_SIZE: z.coerce.number().int().min(0).default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
  MAX_DOCUMENTS: z.coerce.number().int().min(1).optional(),
  INDEX_SNAPSHOT_PATH: z.string().default('data/index.json'),
  PROMPTS_DIR: z.string().default('prompts'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  CORS_ORIGINS: z
    .string()
    .transform((value) => value.split(',').map((origin) => origin.trim()).filter((origin) => origin.length > 0))
    .default(''),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface Settings {
  readonly openaiApiKey?: string;
  readonly openaiBaseUrl: string;
  readonly translatorModel: string;
  readonly translatorTemperature: number;
  readonly detectionModel: string;
  readonly embeddingModel: string;
  readonly phrasesCsvPath: string;
  readonly articlesDataPath: string;
  readonly useArticleData: boolean;
  readonly shortInputWordThreshold: number;
  readonly supportedLanguages: ReadonlySet<string>;
  readonly retrievalK: number;
  readonly minContentLength: number;
  readonly chunkSize: number;
  readonly chunkOverlap: number;
  readonly maxDocuments?: number;
  readonly indexSnapshotPath: string;
  readonly promptsDir: string;
  readonly host: string;
  readonly port: number;
  /** Allowed browser origins for the API; empty means no cross-origin access */
  readonly corsOrigins: readonly string[];
  readonly logLevel: string;
}

export interface LoadSettingsOptions {
  /** Base directory for relative paths, usually the repository root */
  baseDir?: string;
}

/**
 * Treat blank values as unset so defaults apply
 */
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim().length > 0) {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

/**
 * Validate and freeze settings from an environment map
 *
 * @throws ConfigError listing every invalid key
 */
export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadSettingsOptions = {}
): Settings {
  const parsed = EnvSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  - ${problems.join('\n  - ')}`, {
      cause: parsed.error,
    });
  }

  const values = parsed.data;
  if (values.CHUNK_SIZE > 0 && values.CHUNK_OVERLAP >= values.CHUNK_SIZE) {
    throw new ConfigError(
      `Invalid configuration:\n  - CHUNK_OVERLAP: must be smaller than CHUNK_SIZE (${values.CHUNK_SIZE})`
    );
  }

  const baseDir = options.baseDir ?? process.cwd();
  const resolvePath = (path: string) => (isAbsolute(path) ? path : resolve(baseDir, path));

  return Object.freeze({
    openaiApiKey: values.OPENAI_API_KEY,
    openaiBaseUrl: values.OPENAI_BASE_URL,
    translatorModel: values.TRANSLATOR_MODEL_NAME,
    translatorTemperature: values.TRANSLATOR_TEMPERATURE,
    detectionModel: values.LANGUAGE_DETECTION_MODEL_NAME ?? values.TRANSLATOR_MODEL_NAME,
    embeddingModel: values.EMBEDDING_MODEL_NAME,
    phrasesCsvPath: resolvePath(values.PHRASES_CSV_PATH),
    articlesDataPath: resolvePath(values.ARTICLES_DATA_PATH),
    useArticleData: values.USE_ARTICLE_DATA,
    shortInputWordThreshold: values.SHORT_INPUT_WORD_THRESHOLD,
    supportedLanguages: new Set(values.SUPPORTED_LANGUAGES),
    retrievalK: values.RETRIEVAL_K,
    minContentLength: values.MIN_CONTENT_LENGTH,
    chunkSize: values.CHUNK_SIZE,
    chunkOverlap: values.CHUNK_OVERLAP,
    maxDocuments: values.MAX_DOCUMENTS,
    indexSnapshotPath: resolvePath(values.INDEX_SNAPSHOT_PATH),
    promptsDir: resolvePath(values.PROMPTS_DIR),
    host: values.HOST,
    port: values.PORT,
    corsOrigins: values.CORS_ORIGINS,
    logLevel: values.LOG_LEVEL,
  });
}
