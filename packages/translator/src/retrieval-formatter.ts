import type { RetrievalResult } from '@rioplatense/core';

export const NO_REFERENCE_FOUND = 'No specific Argentinian expressions found as reference.';
export const REFERENCE_SEPARATOR = '\n---\n';

/**
 * Build the reference block for the translation prompt. Never empty; keeps
 * retrieval order.
 */
export function formatRetrievalResult(results: RetrievalResult): string {
  if (results.length === 0) {
    return NO_REFERENCE_FOUND;
  }
  return results.map(({ document }) => document.content.trim()).join(REFERENCE_SEPARATOR);
}

export class RetrievalFormatter {
  format(results: RetrievalResult): string {
    return formatRetrievalResult(results);
  }
}
