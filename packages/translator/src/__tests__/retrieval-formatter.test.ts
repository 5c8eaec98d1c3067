import { describe, it, expect } from 'vitest';
import { NO_REFERENCE_FOUND, RetrievalFormatter } from '../retrieval-formatter.js';

const formatter = new RetrievalFormatter();

describe('RetrievalFormatter', () => {
  it('returns the sentinel for no results', () => {
    expect(formatter.format([])).toBe(NO_REFERENCE_FOUND);
  });

  it('joins contents in retrieval order with a visible separator', () => {
    const output = formatter.format([
      { document: { content: ' Original: money\nArgentinian: guita\n', metadata: {} }, score: 0.9 },
      { document: { content: 'Original: bus\nArgentinian: bondi', metadata: {} }, score: 0.4 },
    ]);

    expect(output).toBe('Original: money\nArgentinian: guita\n---\nOriginal: bus\nArgentinian: bondi');
  });
});
