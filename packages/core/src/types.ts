/**
 * Shared data model for ingestion and translation
 */

/**
 * Metadata values are always strings: retrieval backends may not support
 * typed metadata.
 */
export type DocumentMetadata = Readonly<Record<string, string>>;

/**
 * A normalized unit indexed for retrieval. Immutable once created.
 */
export interface Document {
  readonly content: string;
  readonly metadata: DocumentMetadata;
}

export interface ScoredDocument {
  document: Document;
  score: number;
}

/**
 * Ordered by descending similarity, length <= requested k.
 */
export type RetrievalResult = readonly ScoredDocument[];

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Retrieval backend boundary. Writers are serialized; readers may run
 * concurrently.
 */
export interface VectorIndex {
  insert(documents: readonly Document[]): Promise<void>;
  query(text: string, k: number, options?: CallOptions): Promise<RetrievalResult>;
  size(): number;
}

/**
 * Generative backend boundary: prompt in, text out.
 */
export interface GenerativeBackend {
  complete(prompt: string, options?: CallOptions): Promise<string>;
}

export interface Embedder {
  embed(texts: readonly string[], options?: CallOptions): Promise<number[][]>;
}

export const UNKNOWN_LANGUAGE = 'unknown';

/**
 * Lowercase ISO 639-1 code, or the "unknown" sentinel.
 */
export type DetectedLanguage = string;

export type LanguageStatus = 'supported' | 'unsupported' | 'unknown';

/**
 * Classify a detection result against the supported set. Exactly one
 * status per detection.
 */
export function languageStatus(
  detected: DetectedLanguage,
  supported: ReadonlySet<string>
): LanguageStatus {
  if (detected === UNKNOWN_LANGUAGE) return 'unknown';
  return supported.has(detected) ? 'supported' : 'unsupported';
}

export interface TranslationRequest {
  text: string;
  /** Opaque caller context (chat session etc.), never interpreted here */
  sessionContext?: unknown;
}

export type TranslationResult =
  | { kind: 'empty'; output: '' }
  | { kind: 'unsupported-language'; output: string; detectedLanguage: DetectedLanguage }
  | {
      kind: 'translated';
      output: string;
      detectedLanguage: DetectedLanguage;
      referenceCount: number;
    };
