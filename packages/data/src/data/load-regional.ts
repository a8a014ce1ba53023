/**
 * Regional phoneme and syllable table
 *
 * Columns: _, word, pos, _, phonemes, syllables, region (header on line 1).
 * The whole row is lowercased before splitting, so words and region codes
 * come out folded; the POS is uppercased again afterwards.
 */

import { dp } from '../debug.js';
import type { IpaTable, RegionalTables, SyllableTable } from '../types.js';
import { parseRows, readTable } from './tabular.js';

/** Separator used inside the source phoneme column */
export const SOURCE_SYLLABLE_SEPARATOR = '|';
/** Separator written into loaded phoneme strings */
export const SYLLABLE_MARK = '·';

export function splitSyllables(raw: string): string[] {
  return raw.trim().split(/[ |]/);
}

export function parseRegionalTable(content: string): RegionalTables {
  const ipa: IpaTable = new Map();
  const syllables: SyllableTable = new Map();
  const regions = new Set<string>();

  const rows = parseRows(content, { fields: 7, fromLine: 2, lowercase: true });

  for (const [, rawWord, rawPos, , rawPhonemes, rawSyllables, rawRegion] of rows) {
    const phonemes = rawPhonemes.replaceAll(SOURCE_SYLLABLE_SEPARATOR, SYLLABLE_MARK).trim();
    const word = rawWord.trim();
    const pos = rawPos.trim().toUpperCase();
    const region = rawRegion.trim();
    regions.add(region);

    let regionSyllables = syllables.get(region);
    if (!regionSyllables) {
      regionSyllables = new Map();
      syllables.set(region, regionSyllables);
    }

    let regionIpa = ipa.get(region);
    if (!regionIpa) {
      regionIpa = new Map();
      ipa.set(region, regionIpa);
    }

    let wordIpa = regionIpa.get(word);
    if (!wordIpa) {
      wordIpa = new Map();
      regionIpa.set(word, wordIpa);
    }

    regionSyllables.set(word, splitSyllables(rawSyllables));
    wordIpa.set(pos, phonemes);
  }

  return { ipa, syllables, regions };
}

export function loadRegionalTable(filePath: string): RegionalTables {
  const start = performance.now();
  const tables = parseRegionalTable(readTable(filePath));

  let words = 0;
  for (const regionSyllables of tables.syllables.values()) {
    words += regionSyllables.size;
  }

  dp(
    `Loaded ${words} words across ${tables.regions.size} regions from ${filePath}`,
    `in ${(performance.now() - start).toFixed(1)}ms`
  );
  return tables;
}
