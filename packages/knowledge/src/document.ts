import type { Document } from '@rioplatense/core';

/**
 * Create a frozen document; metadata values are stringified
 */
export function createDocument(content: string, metadata: Record<string, string>): Document {
  return Object.freeze({
    content,
    metadata: Object.freeze({ ...metadata }),
  });
}
