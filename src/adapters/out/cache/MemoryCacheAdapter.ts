import type { CacheRepository } from "../../../application/ports/out/CacheRepository.ts";

export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000; // 5 minutes

interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

type CacheEntries<M> = { [K in keyof M]?: CacheEntry<M[K]> };

export interface MemoryCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

export class MemoryCacheAdapter<M> implements CacheRepository<M> {
  private storage: CacheEntries<M> = {};
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: MemoryCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  isValid(key: keyof M): boolean {
    const entry = this.storage[key];
    return entry !== undefined && this.now() - entry.storedAt < this.ttlMs;
  }

  get<K extends keyof M>(key: K): M[K] | undefined {
    const entry = this.storage[key];

    if (!entry || this.now() - entry.storedAt >= this.ttlMs) {
      return undefined;
    }

    return entry.value;
  }

  set<K extends keyof M>(key: K, value: M[K]): void {
    this.storage[key] = {
      value,
      storedAt: this.now(),
    };
  }
}
