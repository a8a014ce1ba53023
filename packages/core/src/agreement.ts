/**
 * Tables derived from the AO1990 agreement tables
 */

export type ReadonlyAgreementTable = ReadonlyMap<string, readonly string[]>;

/** Clusters whose `p` fell silent and was dropped by the agreement */
export const SILENT_P_CLUSTERS = ['mpc', 'mpç', 'mpt'] as const;

/** Trema marking a pronounced `u` in gue/gui/que/qui, dropped in Brazil */
export const TREMA = 'ü';

/**
 * Union of the family tables; later tables win on a shared spelling
 */
export function mergeAgreementTables(...tables: ReadonlyAgreementTable[]): ReadonlyAgreementTable {
  const merged = new Map<string, readonly string[]>();
  for (const table of tables) {
    for (const [oldWord, newWords] of table) {
      merged.set(oldWord, newWords);
    }
  }
  return merged;
}

/**
 * New spelling -> old spelling. A new spelling listed under several old
 * spellings maps to the last one in table order.
 */
export function reverseAgreementTable(table: ReadonlyAgreementTable): ReadonlyMap<string, string> {
  const reverse = new Map<string, string>();
  for (const [oldWord, newWords] of table) {
    for (const newWord of newWords) {
      reverse.set(newWord, oldWord);
    }
  }
  return reverse;
}

/**
 * Old spellings that lose one of the silent-p clusters in some new spelling
 */
export function findSilentPWords(table: ReadonlyAgreementTable): Set<string> {
  const words = new Set<string>();
  for (const cluster of SILENT_P_CLUSTERS) {
    for (const [oldWord, newWords] of table) {
      if (!oldWord.includes(cluster)) continue;
      if (newWords.some((newWord) => !newWord.includes(cluster))) {
        words.add(oldWord);
      }
    }
  }
  return words;
}

/**
 * New spellings of every entry whose old spelling carries the trema.
 * Note: these are the current spellings, unlike findSilentPWords.
 */
export function findVoicedUWords(table: ReadonlyAgreementTable): Set<string> {
  const words = new Set<string>();
  for (const [oldWord, newWords] of table) {
    if (!oldWord.includes(TREMA)) continue;
    for (const newWord of newWords) {
      words.add(newWord);
    }
  }
  return words;
}
