// @lusolex/core - Lexicon store, phoneme and syllable lookup, AO1990 spelling

export {
  Lexicon,
  DEFAULT_POS,
  type LexiconOptions,
  type LookupResult,
  type ReadonlyIpaTable,
  type ReadonlySyllableTable
} from './lexicon.js';

export {
  DIALECT_REGIONS,
  DEFAULT_REGION,
  isDialect,
  langToRegion,
  supportedDialects,
  type Dialect
} from './dialects.js';

export { UnsupportedDialectError } from './errors.js';

export {
  resolvePhonemes,
  normalizeWord,
  normalizePos,
  PHONEME_RESOLUTION,
  type PhonemeQuery,
  type PhonemeSources
} from './lookup.js';

export {
  mergeAgreementTables,
  reverseAgreementTable,
  findSilentPWords,
  findVoicedUWords,
  SILENT_P_CLUSTERS,
  TREMA,
  type ReadonlyAgreementTable
} from './agreement.js';

export { tokenize, normalizeSentence, revertSentence } from './spelling.js';

// Loader-level errors and switches, re-exported for callers of the lexicon
export { ResourceNotFoundError, setDebug, debugFromEnv } from '@lusolex/data';
