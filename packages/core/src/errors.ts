/**
 * Error taxonomy
 *
 * Ingestion-time errors abort the build. Request-time errors are scoped
 * to a single request.
 */

export type ErrorCode =
  | 'CONFIG'
  | 'SCHEMA'
  | 'DATA_LOADING'
  | 'INDEX_BUILD'
  | 'DETECTION'
  | 'TRANSLATION'
  | 'POLICY'
  | 'PROMPT';

export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Settings failed validation
 */
export class ConfigError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
  }
}

/**
 * Required structure missing from a mandatory source
 */
export class SchemaError extends AppError {
  readonly missingColumns: readonly string[];

  constructor(source: string, missingColumns: readonly string[]) {
    super('SCHEMA', `${source} is missing required columns: ${missingColumns.join(', ')}`);
    this.missingColumns = [...missingColumns];
  }
}

/**
 * A source could not be read or yielded zero usable records
 */
export class DataLoadingError extends AppError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('DATA_LOADING', message, options);
    this.source = source;
  }
}

export class IndexBuildError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INDEX_BUILD', message, options);
  }
}

/**
 * Internal detector fault. Recovered by degrading to "unknown".
 */
export class DetectionError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DETECTION', message, options);
  }
}

export type TranslationStage = 'retrieval' | 'generation';

export class TranslationError extends AppError {
  readonly stage: TranslationStage;

  constructor(stage: TranslationStage, message: string, options?: { cause?: unknown }) {
    super('TRANSLATION', message, options);
    this.stage = stage;
  }
}

/**
 * Malformed policy table, raised at startup only
 */
export class PolicyError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('POLICY', message, options);
  }
}

export class PromptError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PROMPT', message, options);
  }
}

export function isAppError(value: unknown): value is AppError {
  return value instanceof AppError;
}

/**
 * Message of an unknown thrown value, for logging
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
