import type { SearchFilters } from "../../../domain/models/news.ts";
import type { ApiStatusResult, CategoriesResult, LanguagesResult, LatestNewsResult, RegionsResult, SearchNewsResult } from "../../../domain/models/results.ts";

/**
 * Input port for news operations
 * Every method resolves to a tagged result and never rejects
 */
export interface NewsUseCase {
  searchNews(filters: SearchFilters): Promise<SearchNewsResult>;

  getLatestNews(language?: string): Promise<LatestNewsResult>;

  getAvailableLanguages(): Promise<LanguagesResult>;

  getAvailableRegions(): Promise<RegionsResult>;

  getAvailableCategories(): Promise<CategoriesResult>;

  checkApiStatus(): Promise<ApiStatusResult>;
}
