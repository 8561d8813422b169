import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { AppConfig } from "../../../config/env.ts";
import { DEFAULT_CACHE_TTL_MS } from "../../out/cache/MemoryCacheAdapter.ts";

const DATA_DIR = new URL("../../../../data/", import.meta.url);

export interface DescriptiveResource {
  readonly name: string;
  readonly uri: string;
  readonly description: string;
  read(): string;
}

function readDataFile(fileName: string): unknown {
  return JSON.parse(readFileSync(fileURLToPath(new URL(fileName, DATA_DIR)), "utf-8"));
}

function serialize(payload: unknown): string {
  return JSON.stringify(payload, null, 2);
}

/**
 * Provider description plus the effective configuration of this process
 */
export function buildApiConfigPayload(config: AppConfig): Record<string, unknown> {
  const base = readDataFile("news-api.json");
  const info = typeof base === "object" && base !== null ? base : {};

  return {
    ...info,
    endpoints: {
      search: `${config.baseUrl}/search`,
      latest_news: `${config.baseUrl}/latest-news`,
      languages: `${config.baseUrl}/available/languages`,
      regions: `${config.baseUrl}/available/regions`,
      categories: `${config.baseUrl}/available/category`,
    },
    configuration: {
      timeout: config.timeoutSeconds,
      default_language: config.defaultLanguage,
      max_results: config.maxResults,
      cache_ttl: DEFAULT_CACHE_TTL_MS / 1000,
    },
  };
}

export function createDescriptiveResources(config: AppConfig): DescriptiveResource[] {
  return [
    {
      name: "news-api-config",
      uri: "config://news-api",
      description: "Currents API configuration and setup information",
      read: () => serialize(buildApiConfigPayload(config)),
    },
    {
      name: "supported-languages",
      uri: "data://supported-languages",
      description: "Supported languages with ISO codes",
      read: () => serialize(readDataFile("supported-languages.json")),
    },
    {
      name: "news-categories",
      uri: "data://news-categories",
      description: "News categories with descriptions and usage examples",
      read: () => serialize(readDataFile("news-categories.json")),
    },
  ];
}
