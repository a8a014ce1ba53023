/**
 * Archaic spellings (`old,new,notes`); the notes column is ignored
 */

import { dp } from '../debug.js';
import type { ArchaismTable } from '../types.js';
import { parseRows, readTable } from './tabular.js';

export function parseArchaisms(content: string): ArchaismTable {
  const table: ArchaismTable = new Map();

  for (const [oldWord, newWord] of parseRows(content, { fields: 3, fromLine: 2, stripQuotes: true })) {
    table.set(oldWord.trim().toLowerCase(), newWord.trim().toLowerCase());
  }

  return table;
}

export function loadArchaisms(filePath: string): ArchaismTable {
  const table = parseArchaisms(readTable(filePath));
  dp(`Loaded ${table.size} archaisms from ${filePath}`);
  return table;
}
