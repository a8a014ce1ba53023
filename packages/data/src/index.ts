// @lusolex/data - Table parsing, dataset loaders and bundled data locations

export { DEBUG, setDebug, dp, debugFromEnv } from './debug.js';
export { ResourceNotFoundError } from './errors.js';
export type * from './types.js';

export { parseRows, readTable, type ParseRowsOptions } from './data/tabular.js';
export { parseAgreementTable, loadAgreementTable } from './data/load-agreement.js';
export { parseHomographs, loadHomographs } from './data/load-homographs.js';
export { parseArchaisms, loadArchaisms } from './data/load-archaisms.js';
export {
  parseRegionalTable,
  loadRegionalTable,
  splitSyllables,
  SOURCE_SYLLABLE_SEPARATOR,
  SYLLABLE_MARK
} from './data/load-regional.js';
export {
  DATA_SOURCES,
  getDataDir,
  getDataPath,
  getDictionaryPath,
  dataFileExists,
  type DataSource
} from './data/paths.js';
