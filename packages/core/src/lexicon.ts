/**
 * Lexicon store for the Portuguese dialect tables.
 *
 * The agreement, homograph and archaism tables are small and load in the
 * constructor. The regional table is large; it loads on first use of `ipa`,
 * `syllables` or `regions` (or an explicit `load()`), all three from the same
 * pass, and is then held for the lifetime of the instance.
 */

import { LRUCache } from 'lru-cache';
import {
  dp,
  getDataDir,
  getDataPath,
  getDictionaryPath,
  loadAgreementTable,
  loadArchaisms,
  loadHomographs,
  loadRegionalTable,
  type RegionalTables
} from '@lusolex/data';
import {
  findSilentPWords,
  findVoicedUWords,
  mergeAgreementTables,
  reverseAgreementTable,
  type ReadonlyAgreementTable
} from './agreement.js';
import { CacheRegistry } from './cache.js';
import { DEFAULT_REGION, langToRegion } from './dialects.js';
import { UnsupportedDialectError } from './errors.js';
import { normalizePos, normalizeWord, resolvePhonemes, type PhonemeSources } from './lookup.js';
import { normalizeSentence, revertSentence } from './spelling.js';

export type ReadonlyIpaTable = ReadonlyMap<string, ReadonlyMap<string, ReadonlyMap<string, string>>>;
export type ReadonlySyllableTable = ReadonlyMap<string, ReadonlyMap<string, readonly string[]>>;

export interface LexiconOptions {
  /** Main regional dataset; defaults to LUSOLEX_DICTIONARY_PATH, then the data directory */
  dictionaryPath?: string;
  /** Directory of the bundled tables; defaults to LUSOLEX_DATA_DIR, then packages/data/data */
  dataDir?: string;
  /** Region whose words seed `possiblePostags` */
  baseRegion?: string;
  /** Number of flattened IPA maps kept by getIpaMap; anything but a positive finite number means 32 */
  ipaMapCacheSize?: number;
}

export interface LookupResult {
  syllables: readonly string[];
  phonemes: string | undefined;
}

export const DEFAULT_POS = 'NOUN';
const DEFAULT_IPA_MAP_CACHE_SIZE = 32;

export class Lexicon {
  readonly dictionaryPath: string;
  readonly aoPtPath: string;
  readonly aoBrPath: string;
  readonly homographsPath: string;
  readonly archaismsPath: string;
  readonly baseRegion: string;

  readonly aoPt: ReadonlyAgreementTable;
  readonly aoBr: ReadonlyAgreementTable;
  readonly homographs: ReadonlyMap<string, ReadonlyMap<string, string>>;
  readonly archaicWords: ReadonlyMap<string, string>;

  private readonly caches = new CacheRegistry();
  private readonly regional: () => RegionalTables;
  private readonly combinedAgreement: () => ReadonlyAgreementTable;
  private readonly postags: () => ReadonlyMap<string, readonly string[]>;
  private readonly silentP: () => ReadonlySet<string>;
  private readonly voicedU: () => ReadonlySet<string>;
  private readonly reversePt: () => ReadonlyMap<string, string>;
  private readonly reverseBr: () => ReadonlyMap<string, string>;

  private readonly ipaMapCache: LRUCache<string, ReadonlyMap<string, string>>;
  private ipaMapHits = 0;
  private ipaMapMisses = 0;

  constructor(options: LexiconOptions = {}) {
    const dataDir = getDataDir(options.dataDir);

    this.dictionaryPath = getDictionaryPath(options.dictionaryPath, options.dataDir);
    this.aoPtPath = getDataPath('agreementPt', dataDir);
    this.aoBrPath = getDataPath('agreementBr', dataDir);
    this.homographsPath = getDataPath('homographs', dataDir);
    this.archaismsPath = getDataPath('archaisms', dataDir);
    this.baseRegion = options.baseRegion ?? DEFAULT_REGION;

    this.aoPt = loadAgreementTable(this.aoPtPath);
    this.aoBr = loadAgreementTable(this.aoBrPath);
    this.homographs = loadHomographs(this.homographsPath);
    this.archaicWords = loadArchaisms(this.archaismsPath);

    this.regional = this.caches.define('regional', () => loadRegionalTable(this.dictionaryPath));
    this.combinedAgreement = this.caches.define('ao1990', () => mergeAgreementTables(this.aoPt, this.aoBr));
    this.postags = this.caches.define('postags', () => this.collectPostags());
    this.silentP = this.caches.define('silent-p', () => findSilentPWords(this.ao1990));
    this.voicedU = this.caches.define('voiced-u', () => findVoicedUWords(this.aoBr));
    this.reversePt = this.caches.define('reverse-pt', () => reverseAgreementTable(this.aoPt));
    this.reverseBr = this.caches.define('reverse-br', () => reverseAgreementTable(this.aoBr));

    const capacity = options.ipaMapCacheSize ?? DEFAULT_IPA_MAP_CACHE_SIZE;
    this.ipaMapCache = new LRUCache<string, ReadonlyMap<string, string>>({
      max: Number.isFinite(capacity) && capacity >= 1 ? Math.floor(capacity) : DEFAULT_IPA_MAP_CACHE_SIZE
    });
  }

  /**
   * Force the regional table to load now rather than on first lookup
   */
  load(): void {
    this.regional();
  }

  isLoaded(): boolean {
    return this.caches.isInitialized('regional');
  }

  /** region -> word -> POS -> phonemes */
  get ipa(): ReadonlyIpaTable {
    return this.regional().ipa;
  }

  /** region -> word -> syllables */
  get syllables(): ReadonlySyllableTable {
    return this.regional().syllables;
  }

  /** Region codes present in the dataset (e.g. 'lbx', 'rjx') */
  get regions(): ReadonlySet<string> {
    return this.regional().regions;
  }

  langToRegion(lang: string): string {
    return langToRegion(lang);
  }

  /** Old -> new spellings of both families; Brazilian entries win on a clash */
  get ao1990(): ReadonlyAgreementTable {
    return this.combinedAgreement();
  }

  /** word -> POS tags available for it */
  get possiblePostags(): ReadonlyMap<string, readonly string[]> {
    return this.postags();
  }

  /** Pre-agreement spellings with a silent p before c, ç or t */
  get silentPWords(): ReadonlySet<string> {
    return this.silentP();
  }

  /** Current spellings of Brazilian words that used to carry the trema */
  get voicedUWords(): ReadonlySet<string> {
    return this.voicedU();
  }

  /**
   * Phoneme transcription for a word, or undefined when nothing matches.
   * An unknown region is not an error here; it just resolves to nothing.
   */
  getPhonemes(word: string, pos: string = DEFAULT_POS, region: string = DEFAULT_REGION): string | undefined {
    const sources: PhonemeSources = {
      archaisms: this.archaicWords,
      homographs: this.homographs,
      ipa: () => this.ipa
    };
    return resolvePhonemes({ word, pos, region }, sources);
  }

  /**
   * Syllables of a word; an empty list when the region has no such word
   */
  getSyllables(word: string, region: string = DEFAULT_REGION): readonly string[] {
    const regionSyllables = this.syllables.get(region);
    if (!regionSyllables) {
      throw new UnsupportedDialectError(region);
    }
    return regionSyllables.get(normalizeWord(word)) ?? [];
  }

  get(word: string, pos: string = DEFAULT_POS, region: string = DEFAULT_REGION): LookupResult {
    return {
      syllables: this.getSyllables(word, region),
      phonemes: this.getPhonemes(word, pos, region)
    };
  }

  /**
   * Sorted words of a region
   */
  getWordlist(region: string = DEFAULT_REGION): string[] {
    const regionSyllables = this.syllables.get(region);
    if (!regionSyllables) {
      throw new UnsupportedDialectError(region);
    }
    return [...regionSyllables.keys()].sort();
  }

  /**
   * Flat word -> phonemes map for one POS; homographs override the regional table
   */
  getIpaMap(pos: string = DEFAULT_POS, region: string = DEFAULT_REGION): ReadonlyMap<string, string> {
    const regionIpa = this.ipa.get(region);
    if (!regionIpa) {
      throw new UnsupportedDialectError(region);
    }

    const tag = normalizePos(pos);
    const cacheKey = `${region}|${tag}`;

    const cached = this.ipaMapCache.get(cacheKey);
    if (cached) {
      this.ipaMapHits++;
      return cached;
    }
    this.ipaMapMisses++;

    const flat = new Map<string, string>();
    for (const [word, byPos] of regionIpa) {
      const phonemes = byPos.get(tag);
      if (phonemes !== undefined) {
        flat.set(word, phonemes);
      }
    }
    for (const [word, byPos] of this.homographs) {
      const phonemes = byPos.get(tag);
      if (phonemes !== undefined) {
        flat.set(word, phonemes);
      }
    }

    dp(`Built IPA map for ${region}/${tag}: ${flat.size} words`);
    this.ipaMapCache.set(cacheKey, flat);
    return flat;
  }

  getIpaMapCacheStats(): { hits: number; misses: number; size: number } {
    return { hits: this.ipaMapHits, misses: this.ipaMapMisses, size: this.ipaMapCache.size };
  }

  /**
   * Rewrite pre-agreement spellings to their canonical AO1990 form
   */
  normalizeAo1990(sentence: string): string {
    return normalizeSentence(sentence, this.ao1990);
  }

  /**
   * Rewrite AO1990 spellings back to the pre-agreement European spelling
   */
  reverseAo1990Pt(sentence: string): string {
    return revertSentence(sentence, this.reversePt());
  }

  /**
   * Rewrite AO1990 spellings back to the pre-agreement Brazilian spelling
   */
  reverseAo1990Br(sentence: string): string {
    return revertSentence(sentence, this.reverseBr());
  }

  private collectPostags(): ReadonlyMap<string, readonly string[]> {
    const postags = new Map<string, readonly string[]>();

    const baseIpa = this.ipa.get(this.baseRegion);
    if (baseIpa) {
      for (const [word, byPos] of baseIpa) {
        postags.set(word, [...byPos.keys()]);
      }
    } else {
      dp(`Base region ${this.baseRegion} not in dataset; POS inventory uses homographs only`);
    }

    // A homograph replaces the regional entry for its word outright
    for (const [word, byPos] of this.homographs) {
      postags.set(word, [...byPos.keys()]);
    }

    return postags;
  }
}
