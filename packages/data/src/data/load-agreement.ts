/**
 * Orthographic agreement (AO1990) tables
 * Rows are `old,new_list` where new_list joins accepted spellings with ", "
 */

import { dp } from '../debug.js';
import type { AgreementTable } from '../types.js';
import { parseRows, readTable } from './tabular.js';

export function parseAgreementTable(content: string): AgreementTable {
  const table: AgreementTable = new Map();

  for (const [oldWord, newWords] of parseRows(content, { fields: 2, stripQuotes: true })) {
    table.set(oldWord, newWords.split(', '));
  }

  return table;
}

export function loadAgreementTable(filePath: string): AgreementTable {
  const start = performance.now();
  const table = parseAgreementTable(readTable(filePath));
  dp(`Loaded ${table.size} agreement entries from ${filePath} in ${(performance.now() - start).toFixed(1)}ms`);
  return table;
}
