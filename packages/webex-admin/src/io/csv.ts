import { readFileSync, writeFileSync } from 'fs';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { isObject } from '../api/json';

export type CsvRow = Record<string, string>;

/**
 * Rows keyed by header name. Header names are trimmed and lower-cased; when
 * `columns` is given, only those columns are kept.
 */
export function readCsv(filename: string, columns: string[] = []): CsvRow[] {
  const records: unknown = parse(readFileSync(filename, 'utf-8'), {
    bom: true,
    columns: (header: string[]) => header.map(name => name.trim().toLowerCase()),
    skip_empty_lines: true,
    trim: true,
  });

  const wanted = new Set(columns.map(column => column.trim().toLowerCase()));
  const rows: CsvRow[] = [];
  for (const record of Array.isArray(records) ? records : []) {
    if (!isObject(record)) continue;
    const row: CsvRow = {};
    for (const [key, value] of Object.entries(record)) {
      if (wanted.size > 0 && !wanted.has(key)) continue;
      row[key] = typeof value === 'string' ? value : String(value ?? '');
    }
    rows.push(row);
  }
  return rows;
}

/** Writes rows with a header taken from the first row; returns the file name used. */
export function writeCsv(rows: object[], filename: string): string {
  const target = filename.endsWith('.csv') ? filename : `${filename}.csv`;
  const columns = rows.length > 0 ? Object.keys(rows[0]) : [];
  writeFileSync(target, stringify(rows, { header: true, columns, cast: { boolean: value => String(value) } }));
  return target;
}
