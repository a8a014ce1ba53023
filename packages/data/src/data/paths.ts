/**
 * Data file locations
 * The bundled tables ship in packages/data/data; LUSOLEX_DATA_DIR points elsewhere
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';

export const DATA_SOURCES = {
  regional: {
    filename: 'regional_dict.csv'
  },
  agreementPt: {
    filename: 'acordo_ortografico_pt_PT.csv'
  },
  agreementBr: {
    filename: 'acordo_ortografico_pt_BR.csv'
  },
  homographs: {
    filename: 'heterophonic_homographs.csv'
  },
  archaisms: {
    filename: 'archaisms.csv'
  }
};

export type DataSource = keyof typeof DATA_SOURCES;

/**
 * Get the data directory path
 * Uses import.meta.url to find the package root, regardless of working directory
 */
export function getDataDir(customPath?: string): string {
  if (customPath) return customPath;
  if (process.env.LUSOLEX_DATA_DIR) return process.env.LUSOLEX_DATA_DIR;

  const __filename = fileURLToPath(import.meta.url);
  const __dirname = dirname(__filename);

  // packages/data/src/data/paths.ts -> packages/data/data
  return path.join(__dirname, '../../data');
}

/**
 * Get the full path for a data file
 */
export function getDataPath(source: DataSource, dataDir?: string): string {
  return path.join(getDataDir(dataDir), DATA_SOURCES[source].filename);
}

/**
 * Main dataset path: explicit override, then an explicit data directory,
 * then LUSOLEX_DICTIONARY_PATH, then LUSOLEX_DATA_DIR or the bundled tables
 */
export function getDictionaryPath(override?: string, dataDir?: string): string {
  if (override) return override;
  if (dataDir) return getDataPath('regional', dataDir);
  if (process.env.LUSOLEX_DICTIONARY_PATH) return process.env.LUSOLEX_DICTIONARY_PATH;
  return getDataPath('regional');
}

export function dataFileExists(source: DataSource, dataDir?: string): boolean {
  return fs.existsSync(getDataPath(source, dataDir));
}
