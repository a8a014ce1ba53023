/**
 * Permissive comma-separated row parsing shared by every table loader.
 *
 * The tables are not strict CSV: quotes are not escapes, and the last column
 * of a row keeps any commas that follow it (a split with a maximum count).
 * Rows with too few columns are dropped without complaint.
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { ResourceNotFoundError } from '../errors.js';

export interface ParseRowsOptions {
  /** Columns per row; extra commas fold into the last column */
  fields: number;
  /** 1-based line to start from; 2 skips a header */
  fromLine?: number;
  /** Remove every double quote character from the fields */
  stripQuotes?: boolean;
  /** Lowercase the whole content before splitting */
  lowercase?: boolean;
}

export function parseRows(content: string, options: ParseRowsOptions): string[][] {
  const { fields, fromLine = 1, stripQuotes = false, lowercase = false } = options;
  const source = lowercase ? content.toLowerCase() : content;

  const records: string[][] = parse(source, {
    delimiter: ',',
    quote: false,
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
    from_line: fromLine
  });

  const rows: string[][] = [];
  for (const record of records) {
    if (record.length < fields) {
      continue;
    }

    const row = record.slice(0, fields - 1);
    row.push(record.slice(fields - 1).join(','));
    rows.push(stripQuotes ? row.map((field) => field.replaceAll('"', '')) : row);
  }

  return rows;
}

/**
 * Read a UTF-8 table, failing with ResourceNotFoundError when the file is absent
 */
export function readTable(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new ResourceNotFoundError(filePath);
  }
  return fs.readFileSync(filePath, 'utf-8');
}
