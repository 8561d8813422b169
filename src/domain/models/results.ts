import type { NewsApiErrorType } from "./errors.ts";
import type { NormalizedArticle, SearchFilterEcho } from "./news.ts";

export interface ErrorResult {
  readonly status: "error";
  readonly message: string;
  readonly error_type?: NewsApiErrorType;
}

export interface SearchNewsSuccess {
  readonly status: "success";
  readonly total_results: number;
  readonly articles: ReadonlyArray<NormalizedArticle>;
  readonly search_params: SearchFilterEcho;
}

export interface LatestNewsSuccess {
  readonly status: "success";
  readonly language: string;
  readonly total_results: number;
  readonly articles: ReadonlyArray<NormalizedArticle>;
  readonly retrieved_at: string;
}

export type DataSource = "cache" | "api";

export interface LanguagesSuccess {
  readonly status: "success";
  readonly source: DataSource;
  readonly languages: Readonly<Record<string, string>>;
  readonly total_languages: number;
}

export interface RegionsSuccess {
  readonly status: "success";
  readonly source: DataSource;
  readonly regions: Readonly<Record<string, string>>;
  readonly total_regions: number;
}

export interface CategoriesSuccess {
  readonly status: "success";
  readonly source: DataSource;
  readonly categories: ReadonlyArray<string>;
  readonly total_categories: number;
}

export interface StatusConfiguration {
  readonly api_key_set: boolean;
  readonly api_key_masked?: string;
  readonly base_url: string;
  readonly timeout: number;
  readonly default_language: string;
  readonly max_results: number;
}

export interface CacheStatus {
  readonly languages_cached: boolean;
  readonly regions_cached: boolean;
  readonly categories_cached: boolean;
}

export interface ApiStatusSuccess {
  readonly status: "success";
  readonly message: string;
  readonly configuration: StatusConfiguration;
  readonly test_result: {
    readonly endpoint_tested: "latest-news";
    readonly response_received: true;
    readonly articles_count: number;
  };
  readonly cache_status: CacheStatus;
}

export interface ApiStatusError extends ErrorResult {
  readonly configuration?: StatusConfiguration;
  readonly troubleshooting?: ReadonlyArray<string>;
}

export type SearchNewsResult = SearchNewsSuccess | ErrorResult;
export type LatestNewsResult = LatestNewsSuccess | ErrorResult;
export type LanguagesResult = LanguagesSuccess | ErrorResult;
export type RegionsResult = RegionsSuccess | ErrorResult;
export type CategoriesResult = CategoriesSuccess | ErrorResult;
export type ApiStatusResult = ApiStatusSuccess | ApiStatusError;

export type OperationResult =
  | SearchNewsResult
  | LatestNewsResult
  | LanguagesResult
  | RegionsResult
  | CategoriesResult
  | ApiStatusResult;

export function createErrorResult(message: string, errorType?: NewsApiErrorType): ErrorResult {
  return errorType
    ? { status: "error", message, error_type: errorType }
    : { status: "error", message };
}
