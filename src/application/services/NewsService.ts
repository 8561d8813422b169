import { err, ok, type Result } from "neverthrow";
import { isValid, parse, parseISO } from "date-fns";
import { API_KEY_ENV } from "../../config/env.ts";
import { debug, warn } from "../../config/logger.ts";
import { describeNewsApiError, type NewsApiError } from "../../domain/models/errors.ts";
import { SEARCH_FILTER_KEYS, type NewsEndpoint, type QueryParams, type ReferenceData, type ReferenceKey, type SearchFilterEcho, type SearchFilters } from "../../domain/models/news.ts";
import { categoriesSchema, envelopeSchema, languagesSchema, newsEnvelopeSchema, regionsSchema, type ReferenceSchema } from "../../domain/models/provider.ts";
import { createErrorResult, type ApiStatusResult, type CacheStatus, type CategoriesResult, type DataSource, type ErrorResult, type LanguagesResult, type LatestNewsResult, type RegionsResult, type SearchNewsResult, type StatusConfiguration } from "../../domain/models/results.ts";
import { normalizeArticles } from "../../domain/services/articleNormalizer.ts";
import { AccessLayer } from "../AccessLayer.ts";
import type { NewsUseCase } from "../ports/in/NewsUseCase.ts";

// Tried after ISO 8601, which parseISO covers in extended and basic form
const FALLBACK_DATE_FORMATS = [
  "yyyy-MM-dd HH:mm:ss xx",
  "yyyy-MM-dd HH:mm:ss XXX",
  "yyyy-MM-dd HH:mm xx",
  "yyyy/MM/dd",
  "yyyy/MM/dd HH:mm:ss",
  "MM/dd/yyyy",
  "MM/dd/yyyy HH:mm:ss",
] as const;

type ReferenceLookup<T> =
  | { status: "success"; source: DataSource; data: T }
  | ErrorResult;

const SETUP_TROUBLESHOOTING = [
  `Set ${API_KEY_ENV} environment variable`,
  "Get free API key from https://currentsapi.services",
  "Ensure API key has proper permissions",
];

const CONNECTIVITY_TROUBLESHOOTING = [
  "Check internet connection",
  "Verify API key is correct",
  "Check if API service is operational",
  "Ensure no firewall blocking the connection",
];

/**
 * Whether `value` reads as a calendar date or date-time
 */
export function isRecognizedDate(value: string): boolean {
  const trimmed = value.trim();
  if (isValid(parseISO(trimmed))) {
    return true;
  }
  const reference = new Date();
  return FALLBACK_DATE_FORMATS.some((format) => isValid(parse(trimmed, format, reference)));
}

/**
 * Validate the optional date filters before anything is sent
 */
export function validateSearchDates(filters: SearchFilters): Result<void, NewsApiError> {
  for (const field of ["start_date", "end_date"] as const) {
    const value = filters[field];
    if (value && !isRecognizedDate(value)) {
      return err({ type: "validation", field });
    }
  }
  return ok(undefined);
}

/**
 * Keep only the non-empty filters
 */
export function buildSearchParams(filters: SearchFilters): QueryParams {
  const params: Record<string, string> = {};
  for (const key of SEARCH_FILTER_KEYS) {
    const value = filters[key];
    if (value) params[key] = value;
  }
  return params;
}

function echoFilters(filters: SearchFilters): SearchFilterEcho {
  return {
    keywords: filters.keywords ?? null,
    language: filters.language ?? null,
    country: filters.country ?? null,
    category: filters.category ?? null,
    start_date: filters.start_date ?? null,
    end_date: filters.end_date ?? null,
  };
}

export function maskApiKey(apiKey: string): string {
  return apiKey.length > 8 ? `${apiKey.slice(0, 8)}...` : "***";
}

/**
 * Implementation of the NewsUseCase port on top of the access layer
 */
export class NewsService implements NewsUseCase {
  constructor(
    private readonly layer: AccessLayer,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async searchNews(filters: SearchFilters): Promise<SearchNewsResult> {
    const dates = validateSearchDates(filters);
    if (dates.isErr()) {
      return this.failure("search_news", dates.error);
    }

    return await this.layer.transport.request("search", buildSearchParams(filters)).match(
      (payload): SearchNewsResult => {
        const parsed = newsEnvelopeSchema.safeParse(payload);
        if (!parsed.success || parsed.data.status !== "ok") {
          return createErrorResult("No results found or API error occurred");
        }

        const articles = normalizeArticles(parsed.data.news, this.layer.config.maxResults);
        return {
          status: "success",
          total_results: articles.length,
          articles,
          search_params: echoFilters(filters),
        };
      },
      (error) => this.failure("search_news", error),
    );
  }

  async getLatestNews(language?: string): Promise<LatestNewsResult> {
    const lang = language || this.layer.config.defaultLanguage;

    return await this.layer.transport.request("latest-news", { language: lang }).match(
      (payload): LatestNewsResult => {
        const parsed = newsEnvelopeSchema.safeParse(payload);
        if (!parsed.success || parsed.data.status !== "ok") {
          return createErrorResult("Failed to retrieve latest news");
        }

        const articles = normalizeArticles(parsed.data.news, this.layer.config.maxResults);
        return {
          status: "success",
          language: lang,
          total_results: articles.length,
          articles,
          retrieved_at: this.clock().toISOString(),
        };
      },
      (error) => this.failure("get_latest_news", error),
    );
  }

  async getAvailableLanguages(): Promise<LanguagesResult> {
    const lookup = await this.lookupReference(
      "languages",
      "available/languages",
      languagesSchema,
    );
    if (lookup.status === "error") return lookup;

    return {
      status: "success",
      source: lookup.source,
      languages: lookup.data,
      total_languages: Object.keys(lookup.data).length,
    };
  }

  async getAvailableRegions(): Promise<RegionsResult> {
    const lookup = await this.lookupReference("regions", "available/regions", regionsSchema);
    if (lookup.status === "error") return lookup;

    return {
      status: "success",
      source: lookup.source,
      regions: lookup.data,
      total_regions: Object.keys(lookup.data).length,
    };
  }

  async getAvailableCategories(): Promise<CategoriesResult> {
    const lookup = await this.lookupReference(
      "categories",
      "available/category",
      categoriesSchema,
    );
    if (lookup.status === "error") return lookup;

    return {
      status: "success",
      source: lookup.source,
      categories: lookup.data,
      total_categories: lookup.data.length,
    };
  }

  async checkApiStatus(): Promise<ApiStatusResult> {
    const { config } = this.layer;
    const apiKey = this.layer.resolver.credential();
    const configuration: StatusConfiguration = {
      api_key_set: apiKey !== undefined,
      ...(apiKey ? { api_key_masked: maskApiKey(apiKey) } : {}),
      base_url: config.baseUrl,
      timeout: config.timeoutSeconds,
      default_language: config.defaultLanguage,
      max_results: config.maxResults,
    };

    if (!apiKey) {
      return {
        status: "error",
        message: `${API_KEY_ENV} environment variable not set`,
        error_type: "configuration",
        configuration,
        troubleshooting: SETUP_TROUBLESHOOTING,
      };
    }

    return await this.layer.transport
      .request("latest-news", { language: config.defaultLanguage })
      .match(
        (payload): ApiStatusResult => {
          const parsed = newsEnvelopeSchema.safeParse(payload);
          if (!parsed.success || parsed.data.status !== "ok") {
            return { status: "error", message: "API test failed", configuration };
          }

          return {
            status: "success",
            message: "API connection successful",
            configuration,
            test_result: {
              endpoint_tested: "latest-news",
              response_received: true,
              articles_count: parsed.data.news.length,
            },
            cache_status: this.cacheStatus(),
          };
        },
        (error): ApiStatusResult => {
          warn(`[NEWS_SERVICE] check_api_status failed: ${error.type}`);
          return {
            status: "error",
            message: `API status check failed: ${describeNewsApiError(error)}`,
            error_type: error.type,
            troubleshooting: CONNECTIVITY_TROUBLESHOOTING,
          };
        },
      );
  }

  private async lookupReference<K extends ReferenceKey>(
    key: K,
    endpoint: NewsEndpoint,
    schema: ReferenceSchema<K>,
  ): Promise<ReferenceLookup<ReferenceData[K]>> {
    const cached = this.layer.cache.get(key);
    if (cached !== undefined) {
      debug(`[NEWS_SERVICE] ${key} served from cache`);
      return { status: "success", source: "cache", data: cached };
    }

    return await this.layer.transport.request(endpoint).match(
      (payload): ReferenceLookup<ReferenceData[K]> => {
        const envelope = envelopeSchema.safeParse(payload);
        const data = envelope.success ? schema.safeParse(envelope.data[key]) : undefined;
        if (!envelope.success || envelope.data.status !== "ok" || !data?.success) {
          return createErrorResult(`Failed to retrieve supported ${key}`);
        }

        this.layer.cache.set(key, data.data);
        return { status: "success", source: "api", data: data.data };
      },
      (error) => this.failure(`get_available_${key}`, error),
    );
  }

  private cacheStatus(): CacheStatus {
    const { cache } = this.layer;
    return {
      languages_cached: cache.isValid("languages"),
      regions_cached: cache.isValid("regions"),
      categories_cached: cache.isValid("categories"),
    };
  }

  private failure(operation: string, error: NewsApiError): ErrorResult {
    warn(`[NEWS_SERVICE] ${operation} failed: ${error.type}`);
    return createErrorResult(describeNewsApiError(error), error.type);
  }
}
