import { ResultAsync } from "neverthrow";
import { MemoryCacheAdapter } from "../adapters/out/cache/MemoryCacheAdapter.ts";
import { CurrentsHttpTransport } from "../adapters/out/currents/CurrentsHttpTransport.ts";
import { ConfigResolver, type AppConfig } from "../config/env.ts";
import { debug, warn } from "../config/logger.ts";
import type { ReferenceData } from "../domain/models/news.ts";
import type { CacheRepository } from "./ports/out/CacheRepository.ts";
import type { NewsApiPort } from "./ports/out/NewsApiPort.ts";

export interface AccessLayerDependencies {
  cache?: CacheRepository<ReferenceData>;
  transport?: NewsApiPort;
}

/**
 * Owns the reference cache and the HTTP transport shared by all operations
 */
export class AccessLayer {
  readonly cache: CacheRepository<ReferenceData>;
  readonly transport: NewsApiPort;

  constructor(
    readonly config: AppConfig,
    readonly resolver: ConfigResolver,
    dependencies: AccessLayerDependencies = {},
  ) {
    this.cache = dependencies.cache ?? new MemoryCacheAdapter<ReferenceData>();
    this.transport = dependencies.transport ??
      new CurrentsHttpTransport(config, resolver);
  }

  /**
   * Release the transport. A failed release is logged and otherwise ignored.
   */
  async close(): Promise<void> {
    await ResultAsync.fromPromise(
      this.transport.close(),
      (e) => e instanceof Error ? e.message : String(e),
    ).match(
      () => debug("Access layer closed"),
      (message) => warn(`Failed to release HTTP transport: ${message}`),
    );
  }
}

/**
 * Run `fn` with the layer and close it on every exit path
 */
export async function withAccessLayer<T>(
  layer: AccessLayer,
  fn: (layer: AccessLayer) => Promise<T>,
): Promise<T> {
  try {
    return await fn(layer);
  } finally {
    await layer.close();
  }
}
