/**
 * Unit tests for adapters/article.ts and chunking.ts
 */

import { describe, it, expect } from 'vitest';
import { DataLoadingError } from '@rioplatense/core';
import { ArticleAdapter } from '../adapters/article.js';
import { chunkText } from '../chunking.js';

const ARTICLE_TEXT =
  'Lunfardo is the slang that grew up in the ports of Buenos Aires and Montevideo. ' +
  'Many of its words came from Italian immigrants and are still heard every day.';

function line(record: Record<string, unknown>): string {
  return JSON.stringify(record);
}

describe('ArticleAdapter', () => {
  it('builds one document per usable article and skips the rest', () => {
    const adapter = new ArticleAdapter({ sourceName: 'articles' });
    const lines = [
      line({ url: 'https://example.com/lunfardo', title: 'Lunfardo basics', text: ARTICLE_TEXT }),
      '{"url": "https://example.com/broken"',
      line({ url: 'https://example.com/no-text', title: 'No text' }),
      line({ url: 'https://example.com/short', title: 'Short', text: 'Too short to keep.' }),
      '',
    ];

    const result = adapter.adaptWithReport(lines);

    expect(result.skipped).toBe(3);
    expect(result.documents).toHaveLength(1);
    expect(result.documents[0].content).toBe(
      'Title: Lunfardo basics\n' +
        'Source: articles\n' +
        'URL: https://example.com/lunfardo\n' +
        `Content: ${ARTICLE_TEXT}`
    );
    expect(result.documents[0].metadata).toEqual({
      title: 'Lunfardo basics',
      url: 'https://example.com/lunfardo',
      source: 'articles',
      data_type: 'article',
      region: 'Argentina',
    });
  });

  it('defaults a missing title', () => {
    const [document] = new ArticleAdapter({ sourceName: 'articles' }).adapt([line({ text: ARTICLE_TEXT })]);
    expect(document.metadata.title).toBe('Untitled');
    expect(document.metadata.url).toBe('');
  });

  it('keeps records whose url and title are null', () => {
    const result = new ArticleAdapter({ sourceName: 'articles' }).adaptWithReport([
      line({ url: null, title: null, text: ARTICLE_TEXT }),
      line({ url: 'https://example.com/lunfardo', title: 'Lunfardo basics', text: ARTICLE_TEXT }),
    ]);

    expect(result.skipped).toBe(0);
    expect(result.documents).toHaveLength(2);
    expect(result.documents[0].metadata.title).toBe('Untitled');
    expect(result.documents[0].metadata.url).toBe('');
  });

  it('fails when every record is skipped', () => {
    const adapter = new ArticleAdapter({ sourceName: 'articles' });
    expect(() => adapter.adapt(['not json', line({ title: 'x' })])).toThrow(DataLoadingError);
  });

  it('fails on an empty batch', () => {
    expect(() => new ArticleAdapter({ sourceName: 'articles' }).adapt([])).toThrow(DataLoadingError);
  });

  it('splits long articles into tagged chunks', () => {
    const adapter = new ArticleAdapter({ sourceName: 'articles', chunkSize: 80, chunkOverlap: 10 });

    const documents = adapter.adapt([line({ title: 'Lunfardo basics', text: ARTICLE_TEXT })]);

    expect(documents.length).toBeGreaterThan(1);
    documents.forEach((document, i) => {
      expect(document.metadata.chunk).toBe(String(i));
      expect(document.metadata.chunk_count).toBe(String(documents.length));
      expect(document.content.startsWith('Title: Lunfardo basics\n')).toBe(true);
    });
  });
});

describe('chunkText', () => {
  it('returns short text unchanged', () => {
    expect(chunkText('hola che', { chunkSize: 100, chunkOverlap: 10 })).toEqual(['hola che']);
    expect(chunkText('hola che', { chunkSize: 0, chunkOverlap: 0 })).toEqual(['hola che']);
  });

  it('breaks on whitespace with overlap', () => {
    expect(chunkText('aaaa bbbb cccc dddd eeee', { chunkSize: 10, chunkOverlap: 5 })).toEqual([
      'aaaa bbbb',
      'bbbb cccc',
      'cccc dddd',
      'dddd eeee',
    ]);
  });

  it('hard-splits text without whitespace', () => {
    expect(chunkText('x'.repeat(25), { chunkSize: 10, chunkOverlap: 0 })).toEqual([
      'x'.repeat(10),
      'x'.repeat(10),
      'x'.repeat(5),
    ]);
  });
});
