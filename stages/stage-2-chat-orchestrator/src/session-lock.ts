/**
 * Keyed async mutex: serializes work on the same key, different keys run concurrently.
 */

export interface KeyedMutex {
  runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

export function createKeyedMutex(): KeyedMutex {
  const tails = new Map<string, Promise<void>>();

  return {
    async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();
      const current = previous.then(fn);
      // the tail never rejects; the holder's own caller receives its rejection
      const tail = current.then(
        () => undefined,
        () => undefined
      );
      tails.set(key, tail);

      try {
        return await current;
      } finally {
        if (tails.get(key) === tail) {
          tails.delete(key);
        }
      }
    },
  };
}
