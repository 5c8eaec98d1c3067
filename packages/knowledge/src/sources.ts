/**
 * File-backed document sources
 *
 * Reading and parsing live here; adapters only see parsed records.
 */

import { existsSync, readFileSync } from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { DataLoadingError, errorMessage } from '@rioplatense/core';
import type { TabularAdapter } from './adapters/tabular.js';
import type { ArticleAdapter } from './adapters/article.js';
import type { DocumentSource, Table } from './types.js';

const CsvRowsSchema = z.array(z.array(z.string()));

function readSourceFile(name: string, path: string): string {
  if (!existsSync(path)) {
    throw new DataLoadingError(name, `${name} not found at ${path}`);
  }
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new DataLoadingError(name, `Could not read ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Parse CSV text into a Table. Header cells are trimmed; short rows are
 * padded with empty strings.
 */
export function parseCsvTable(text: string, name = 'csv'): Table {
  let records: z.infer<typeof CsvRowsSchema>;
  try {
    records = CsvRowsSchema.parse(parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    }));
  } catch (error) {
    throw new DataLoadingError(name, `Malformed CSV in ${name}: ${errorMessage(error)}`, { cause: error });
  }

  const [header = [], ...body] = records;
  const columns = header.map(cell => cell.trim());
  const rows = body.map(cells => {
    const row: Record<string, string> = {};
    columns.forEach((column, i) => {
      row[column] = cells[i] ?? '';
    });
    return row;
  });

  return { columns, rows };
}

export function phraseCsvSource(path: string, adapter: TabularAdapter, name = 'phrases'): DocumentSource {
  return {
    name,
    async load() {
      const table = parseCsvTable(readSourceFile(name, path), name);
      return adapter.adaptWithReport(table);
    },
  };
}

export function articleJsonlSource(path: string, adapter: ArticleAdapter, name = 'articles'): DocumentSource {
  return {
    name,
    async load() {
      const lines = readSourceFile(name, path).split(/\r?\n/);
      return adapter.adaptWithReport(lines);
    },
  };
}
