// Compute-once values owned by a lexicon instance

interface Cache<T> {
  value: { data: T } | null;
  init: () => T;
}

export class CacheRegistry {
  private caches = new Map<string, Cache<unknown>>();

  define<T>(name: string, initFn: () => T): () => T {
    const cache: Cache<T> = {
      value: null,
      init: initFn
    };

    this.caches.set(name, cache);

    return () => {
      if (!cache.value) {
        cache.value = { data: cache.init() };
      }
      return cache.value.data;
    };
  }

  isInitialized(name: string): boolean {
    return this.caches.get(name)?.value != null;
  }
}
