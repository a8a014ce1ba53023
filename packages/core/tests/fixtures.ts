// Shared fixture locations for lexicon tests
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { Lexicon, type LexiconOptions } from '../src/lexicon.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const FIXTURE_DIR = join(__dirname, 'fixtures');

export function fixtureLexicon(options: LexiconOptions = {}): Lexicon {
  return new Lexicon({
    dataDir: FIXTURE_DIR,
    dictionaryPath: join(FIXTURE_DIR, 'regional_dict.csv'),
    ...options
  });
}
