/**
 * CLI output against the core fixture tables
 */

import { describe, test, expect } from 'vitest';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { Lexicon, UnsupportedDialectError } from '@lusolex/core';
import { describeLexicon, runCli, toCliOptions } from '../src/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const FIXTURE_DIR = join(__dirname, '../../core/tests/fixtures');

const lexicon = new Lexicon({
  dataDir: FIXTURE_DIR,
  dictionaryPath: join(FIXTURE_DIR, 'regional_dict.csv')
});

describe('runCli', () => {
  test('looks up each word on its own line', () => {
    expect(runCli('Casa abrir xyz', {}, lexicon)).toBe(
      'Casa\tka-za\tˈka·zɐ\nabrir\ta-brir\t-\nxyz\t-\t-'
    );
  });

  test('uses the POS option', () => {
    expect(runCli('colher', { pos: 'VERB' }, lexicon)).toBe('colher\tco-lher\t/ku.ˈʎeɾ/');
  });

  test('a region code overrides the dialect', () => {
    expect(runCli('casa', { dialect: 'pt-PT', region: 'rjx' }, lexicon)).toBe('casa\tca-sa\tˈka·za');
  });

  test('prints JSON lookups', () => {
    expect(runCli('gato', { json: true }, lexicon)).toBe('[{"word":"gato","syllables":["ga","to"],"phonemes":"ˈga·tu"}]');
  });

  test('prints the word list of a dialect', () => {
    expect(runCli('', { words: true, dialect: 'pt-BR' }, lexicon)).toBe('casa\nótimo');
  });

  test('normalizes and reverses spelling', () => {
    expect(runCli('acção  pharmácia', { normalize: true }, lexicon)).toBe('ação farmácia');
    expect(runCli('farmácia', { reverse: 'pt' }, lexicon)).toBe('pharmácia');
    expect(runCli('frequência', { reverse: 'br' }, lexicon)).toBe('freqüência');
  });

  test('summarizes the dataset', () => {
    const summary = [
      'Regions available: lbx, rjx',
      'Silent P words count: 2',
      'Voiced U words count: 3',
      'Homographs: 3',
      'Archaisms: 2'
    ].join('\n');

    expect(runCli('', { info: true }, lexicon)).toBe(summary);
    expect(describeLexicon(lexicon)).toBe(summary);
  });

  test('rejects an unknown dialect', () => {
    expect(() => runCli('casa', { dialect: 'pt-XX' }, lexicon)).toThrow(UnsupportedDialectError);
  });
});

describe('toCliOptions', () => {
  test('keeps recognized values', () => {
    expect(toCliOptions({ dialect: 'pt-BR', reverse: 'br', json: true })).toEqual({
      dialect: 'pt-BR',
      region: undefined,
      pos: undefined,
      normalize: false,
      reverse: 'br',
      words: false,
      info: false,
      json: true
    });
  });

  test('drops an unknown reverse family', () => {
    expect(toCliOptions({ reverse: 'es' }).reverse).toBeUndefined();
  });
});
