/**
 * Heterophonic homographs: spellings whose pronunciation depends on the POS
 */

import { dp } from '../debug.js';
import type { HomographTable } from '../types.js';
import { parseRows, readTable } from './tabular.js';

export function parseHomographs(content: string): HomographTable {
  const table: HomographTable = new Map();

  for (const [rawWord, rawPos, ipa] of parseRows(content, { fields: 3, fromLine: 2, stripQuotes: true })) {
    const word = rawWord.trim().toLowerCase();
    const pos = rawPos.trim().toUpperCase();

    let byPos = table.get(word);
    if (!byPos) {
      byPos = new Map();
      table.set(word, byPos);
    }
    byPos.set(pos, ipa.trim());
  }

  return table;
}

export function loadHomographs(filePath: string): HomographTable {
  const table = parseHomographs(readTable(filePath));
  dp(`Loaded ${table.size} homographs from ${filePath}`);
  return table;
}
