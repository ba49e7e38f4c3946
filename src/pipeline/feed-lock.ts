/**
 * Serializes async tasks per key: a task starts only after every earlier
 * task for the same key has settled. Tasks under different keys run
 * independently.
 */
export type KeyedLock<K> = {
  readonly run: <T>(key: K, task: () => Promise<T>) => Promise<T>;
  readonly isLocked: (key: K) => boolean;
};

export function createKeyedLock<K>(): KeyedLock<K> {
  const tails = new Map<K, Promise<void>>();

  return {
    run: <T>(key: K, task: () => Promise<T>): Promise<T> => {
      const previous = tails.get(key) ?? Promise.resolve();
      const result = previous.then(task);

      const release = (): void => {
        if (tails.get(key) === tail) tails.delete(key);
      };
      const tail: Promise<void> = result.then(release, release);
      tails.set(key, tail);

      return result;
    },

    isLocked: (key: K): boolean => tails.has(key),
  };
}
