/**
 * Output port for the reference-data cache
 * Entries expire lazily: staleness is only evaluated when a key is read
 */
export interface CacheRepository<M> {
  isValid(key: keyof M): boolean;

  get<K extends keyof M>(key: K): M[K] | undefined;

  set<K extends keyof M>(key: K, value: M[K]): void;
}
