// Dialect identifiers and the dataset regions they map to

import { UnsupportedDialectError } from './errors.js';

export const DIALECT_REGIONS = {
  'pt-PT': 'lbx', // Lisbon
  'pt-BR': 'rjx', // Rio de Janeiro
  'pt-AO': 'lda', // Luanda
  'pt-MZ': 'mpx', // Maputo
  'pt-TL': 'dli'  // Dili
} as const;

export type Dialect = keyof typeof DIALECT_REGIONS;

export const DEFAULT_REGION = DIALECT_REGIONS['pt-PT'];

export function isDialect(lang: string): lang is Dialect {
  return Object.hasOwn(DIALECT_REGIONS, lang);
}

/**
 * Map an ISO dialect code (e.g. "pt-BR") to its dataset region code (e.g. "rjx")
 */
export function langToRegion(lang: string): string {
  if (!isDialect(lang)) {
    throw new UnsupportedDialectError(lang);
  }
  return DIALECT_REGIONS[lang];
}

export function supportedDialects(): Dialect[] {
  return Object.keys(DIALECT_REGIONS).filter(isDialect);
}
