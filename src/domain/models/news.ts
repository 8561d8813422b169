/**
 * Relative endpoints of the Currents API
 */
export type NewsEndpoint =
  | "search"
  | "latest-news"
  | "available/languages"
  | "available/regions"
  | "available/category";

export type QueryParams = Readonly<Record<string, string>>;

/**
 * Optional filters accepted by the search operation
 */
export interface SearchFilters {
  readonly keywords?: string;
  readonly language?: string;
  readonly country?: string;
  readonly category?: string;
  readonly start_date?: string;
  readonly end_date?: string;
}

export const SEARCH_FILTER_KEYS = [
  "keywords",
  "language",
  "country",
  "category",
  "start_date",
  "end_date",
] as const satisfies ReadonlyArray<keyof SearchFilters>;

export type SearchFilterEcho = { readonly [K in keyof SearchFilters]-?: string | null };

/**
 * Article shape returned to callers regardless of what the provider sent
 */
export interface NormalizedArticle {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly url: string;
  readonly author: string;
  readonly image: string | null;
  readonly language: string;
  readonly category: ReadonlyArray<string>;
  readonly published: string;
  readonly source: "Currents API";
}

/**
 * Reference datasets eligible for caching, by cache key
 */
export interface ReferenceData {
  languages: Readonly<Record<string, string>>;
  regions: Readonly<Record<string, string>>;
  categories: ReadonlyArray<string>;
}

export type ReferenceKey = keyof ReferenceData;
