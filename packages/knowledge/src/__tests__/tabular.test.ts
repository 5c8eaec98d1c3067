/**
 * Unit tests for adapters/tabular.ts and CSV parsing in sources.ts
 */

import { describe, it, expect } from 'vitest';
import { SchemaError } from '@rioplatense/core';
import { PHRASE_COLUMNS, REQUIRED_PHRASE_COLUMNS, TabularAdapter } from '../adapters/tabular.js';
import { parseCsvTable } from '../sources.js';
import type { Table } from '../types.js';

function phraseRow(term: string, equivalent: string): Record<string, string> {
  return {
    [PHRASE_COLUMNS.term]: term,
    [PHRASE_COLUMNS.equivalent]: equivalent,
    [PHRASE_COLUMNS.explanation]: 'Informal word for money',
    [PHRASE_COLUMNS.region]: 'Argentina',
    [PHRASE_COLUMNS.formality]: 'Informal',
  };
}

describe('TabularAdapter', () => {
  it('fails fast naming every missing required column', () => {
    const table: Table = {
      columns: [PHRASE_COLUMNS.term, PHRASE_COLUMNS.equivalent, PHRASE_COLUMNS.explanation],
      rows: [phraseRow('money', 'guita')],
    };

    let caught: unknown;
    try {
      new TabularAdapter().adapt(table);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaError);
    expect(caught instanceof SchemaError && caught.missingColumns).toEqual([
      'Region Specificity',
      'Level of Formality',
    ]);
  });

  it('renders each row as labeled content with string metadata', () => {
    const table: Table = { columns: REQUIRED_PHRASE_COLUMNS, rows: [phraseRow('money', ' guita ')] };

    const [document] = new TabularAdapter().adapt(table);

    expect(document.content).toBe(
      'Original: money\n' +
        'Argentinian: guita\n' +
        'Context/Explanation: Informal word for money\n' +
        'Region: Argentina\n' +
        'Formality: Informal'
    );
    expect(document.metadata).toEqual({
      original: 'money',
      argentinian: 'guita',
      context: 'Informal word for money',
      region: 'Argentina',
      formality: 'Informal',
      source: 'phrases',
      data_type: 'phrase',
    });
  });

  it('includes optional columns in fixed order when present', () => {
    const row = {
      ...phraseRow('bus', 'bondi'),
      [PHRASE_COLUMNS.exampleSpanish]: 'Me tomo el bondi.',
      [PHRASE_COLUMNS.register]: 'Colloquial',
    };
    const table: Table = { columns: Object.keys(row), rows: [row] };

    const [document] = new TabularAdapter({ sourceTag: 'slang' }).adapt(table);

    expect(document.content.split('\n').slice(5)).toEqual([
      'Register: Colloquial',
      'Example (Spanish): Me tomo el bondi.',
    ]);
    expect(document.metadata.source).toBe('slang');
  });

  it('skips rows without a term or equivalent', () => {
    const table: Table = {
      columns: REQUIRED_PHRASE_COLUMNS,
      rows: [phraseRow('money', 'guita'), phraseRow('friend', '  ')],
    };

    const result = new TabularAdapter().adaptWithReport(table);

    expect(result.documents).toHaveLength(1);
    expect(result.skipped).toBe(1);
  });
});

describe('parseCsvTable', () => {
  it('reads a header row and pads short rows', () => {
    const table = parseCsvTable('\uFEFFa, b\n1,"2,3"\n4\n');

    expect(table.columns).toEqual(['a', 'b']);
    expect(table.rows).toEqual([
      { a: '1', b: '2,3' },
      { a: '4', b: '' },
    ]);
  });
});
