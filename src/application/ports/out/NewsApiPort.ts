import { ResultAsync } from "neverthrow";
import type { NewsApiError } from "../../../domain/models/errors.ts";
import type { NewsEndpoint, QueryParams } from "../../../domain/models/news.ts";

/**
 * Output port for the news provider
 * Defines the authenticated GET the application needs from the remote API
 */
export interface NewsApiPort {
  request(endpoint: NewsEndpoint, params?: QueryParams): ResultAsync<unknown, NewsApiError>;

  close(): Promise<void>;
}
