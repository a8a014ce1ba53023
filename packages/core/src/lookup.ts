/**
 * Phoneme resolution
 *
 * A fixed chain, identical for every query:
 *   1. archaism   - rewrite a historical spelling to its current form
 *   2. homograph  - POS-specific override, wins over the regional table
 *   3. regional   - the base IPA table of the requested region
 */

import { dp } from '@lusolex/data';

export interface PhonemeQuery {
  word: string;
  pos: string;
  region: string;
}

export interface PhonemeSources {
  archaisms: ReadonlyMap<string, string>;
  homographs: ReadonlyMap<string, ReadonlyMap<string, string>>;
  /** Called only when the chain reaches the regional table */
  ipa: () => ReadonlyMap<string, ReadonlyMap<string, ReadonlyMap<string, string>>>;
}

type ResolutionStep =
  | { kind: 'rewrite'; name: string; apply: (query: PhonemeQuery, sources: PhonemeSources) => PhonemeQuery }
  | { kind: 'resolve'; name: string; apply: (query: PhonemeQuery, sources: PhonemeSources) => string | undefined };

export const PHONEME_RESOLUTION: readonly ResolutionStep[] = [
  {
    kind: 'rewrite',
    name: 'archaism',
    apply: (query, sources) => {
      const modern = sources.archaisms.get(query.word);
      return modern === undefined ? query : { ...query, word: modern };
    }
  },
  {
    kind: 'resolve',
    name: 'homograph',
    apply: (query, sources) => sources.homographs.get(query.word)?.get(query.pos)
  },
  {
    kind: 'resolve',
    name: 'regional',
    apply: (query, sources) => sources.ipa().get(query.region)?.get(query.word)?.get(query.pos)
  }
];

export function normalizeWord(word: string): string {
  return word.trim().toLowerCase();
}

export function normalizePos(pos: string): string {
  return pos.trim().toUpperCase();
}

export function resolvePhonemes(query: PhonemeQuery, sources: PhonemeSources): string | undefined {
  let current: PhonemeQuery = {
    word: normalizeWord(query.word),
    pos: normalizePos(query.pos),
    region: query.region
  };

  for (const step of PHONEME_RESOLUTION) {
    if (step.kind === 'rewrite') {
      current = step.apply(current, sources);
      continue;
    }

    const phonemes = step.apply(current, sources);
    if (phonemes !== undefined) {
      dp(`phonemes(${query.word}/${current.pos}/${current.region}) resolved by ${step.name}`);
      return phonemes;
    }
  }

  return undefined;
}
