// lusolex/debug - Debug logging shared by the loaders and the lexicon

export let DEBUG = false;

export function setDebug(value: boolean) {
  DEBUG = value;
}

/**
 * Reads LUSOLEX_DEBUG; accepts 1/true/yes/on in any case.
 */
export function debugFromEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  const raw = env.LUSOLEX_DEBUG;
  if (!raw) return false;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

export function dp(...args: unknown[]) {
  if (DEBUG) {
    console.log('[DEBUG]', ...args);
  }
}
