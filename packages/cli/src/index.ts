#!/usr/bin/env node

/**
 * Command line interface for lusolex
 */

import { pathToFileURL } from 'url';
import { Command, Option, type OptionValues } from 'commander';
import { config } from 'dotenv';
import { Lexicon, debugFromEnv, langToRegion, setDebug, tokenize } from '@lusolex/core';

export interface CliOptions {
  dialect?: string;
  /** Raw dataset region; takes precedence over dialect */
  region?: string;
  pos?: string;
  normalize?: boolean;
  reverse?: 'pt' | 'br';
  words?: boolean;
  info?: boolean;
  json?: boolean;
}

/**
 * Summary of the loaded dataset
 */
export function describeLexicon(lexicon: Lexicon): string {
  return [
    `Regions available: ${[...lexicon.regions].sort().join(', ')}`,
    `Silent P words count: ${lexicon.silentPWords.size}`,
    `Voiced U words count: ${lexicon.voicedUWords.size}`,
    `Homographs: ${lexicon.homographs.size}`,
    `Archaisms: ${lexicon.archaicWords.size}`
  ].join('\n');
}

/**
 * Programmatic interface for CLI operations
 * Returns the output string that would be printed to stdout
 */
export function runCli(input: string, options: CliOptions = {}, lexicon: Lexicon = new Lexicon()): string {
  if (options.info) {
    return describeLexicon(lexicon);
  }

  const region = options.region ?? langToRegion(options.dialect ?? 'pt-PT');

  if (options.words) {
    return lexicon.getWordlist(region).join('\n');
  }
  if (options.normalize) {
    return lexicon.normalizeAo1990(input);
  }
  if (options.reverse === 'pt') {
    return lexicon.reverseAo1990Pt(input);
  }
  if (options.reverse === 'br') {
    return lexicon.reverseAo1990Br(input);
  }

  const pos = options.pos ?? 'NOUN';
  const results = tokenize(input).map((word) => ({ word, ...lexicon.get(word, pos, region) }));

  if (options.json) {
    return JSON.stringify(
      results.map(({ word, syllables, phonemes }) => ({ word, syllables, phonemes: phonemes ?? null }))
    );
  }

  return results
    .map(({ word, syllables, phonemes }) => `${word}\t${syllables.length > 0 ? syllables.join('-') : '-'}\t${phonemes ?? '-'}`)
    .join('\n');
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Narrow commander's option bag to CliOptions
 */
export function toCliOptions(opts: OptionValues): CliOptions {
  const family: unknown = opts.reverse;
  const reverse = family === 'pt' || family === 'br' ? family : undefined;
  return {
    dialect: optionalString(opts.dialect),
    region: optionalString(opts.region),
    pos: optionalString(opts.pos),
    normalize: opts.normalize === true,
    reverse,
    words: opts.words === true,
    info: opts.info === true,
    json: opts.json === true
  };
}

async function main(): Promise<void> {
  // Parse environment variables
  config();

  const program = new Command();

  program
    .name('lusolex')
    .description('Phonemes, syllables and AO1990 spelling for Portuguese dialects')
    .usage('[options] [input...]')
    .version('0.1.0')
    .option('-d, --dialect <code>', 'dialect code (pt-PT, pt-BR, pt-AO, pt-MZ, pt-TL)', 'pt-PT')
    .option('-r, --region <code>', 'dataset region code, overrides --dialect')
    .option('-p, --pos <tag>', 'part of speech of the looked-up words', 'NOUN')
    .option('-n, --normalize', 'rewrite the input in AO1990 spelling')
    .addOption(new Option('--reverse <family>', 'rewrite AO1990 input in pre-agreement spelling').choices(['pt', 'br']))
    .option('-w, --words', 'print every word of the region')
    .option('--info', 'print a summary of the dataset')
    .option('-j, --json', 'print lookups as JSON')
    .option('--dictionary <path>', 'regional dataset to load instead of the bundled one')
    .option('--debug', 'print debug logging')
    .helpOption('-h, --help', 'print this help text');

  program.parse(process.argv);
  const opts = program.opts();

  setDebug(opts.debug === true || debugFromEnv());

  try {
    const lexicon = new Lexicon({ dictionaryPath: optionalString(opts.dictionary) });
    const output = runCli(program.args.join(' '), toCliOptions(opts), lexicon);
    process.stdout.write(output);
    process.stdout.write('\n');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`ERROR: ${message}`);
    process.exitCode = 2;
  }
}

// Run main if this is the entry point
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error) => {
    console.error(`FATAL: ${error}`);
    process.exit(2);
  });
}
