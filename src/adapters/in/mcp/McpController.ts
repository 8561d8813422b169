import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { NewsUseCase } from "../../../application/ports/in/NewsUseCase.ts";
import { error, info } from "../../../config/logger.ts";
import type { OperationResult } from "../../../domain/models/results.ts";
import type { DescriptiveResource } from "./resources.ts";

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

const searchNewsShape = {
  keywords: z.string().optional().describe("Search keywords to filter articles"),
  language: z.string().optional().describe("Language code (e.g., 'en', 'fr', 'de')"),
  country: z.string().optional().describe("Country code (e.g., 'US', 'GB', 'FR')"),
  category: z.string().optional().describe(
    "News category (e.g., 'technology', 'business', 'sports')",
  ),
  start_date: z.string().optional().describe(
    "Start date in ISO 8601 format (YYYY-MM-DDTHH:MM:SS+00:00)",
  ),
  end_date: z.string().optional().describe(
    "End date in ISO 8601 format (YYYY-MM-DDTHH:MM:SS+00:00)",
  ),
};

const latestNewsShape = {
  language: z.string().optional().describe("Language code (default: configured language)"),
};

/**
 * Controller exposing the news operations as MCP tools and resources
 */
export class McpController {
  constructor(private readonly newsUseCase: NewsUseCase) {}

  registerTools(server: McpServer): void {
    server.tool(
      "search_news",
      "Search for news articles with keyword, language, country, category and date filters",
      searchNewsShape,
      async (params) => {
        info(`MCP search_news request: ${JSON.stringify(params)}`);
        return toToolResponse(await this.newsUseCase.searchNews(params));
      },
    );

    server.tool(
      "get_latest_news",
      "Get the latest news articles in a specific language",
      latestNewsShape,
      async (params) => toToolResponse(await this.newsUseCase.getLatestNews(params.language)),
    );

    server.tool(
      "get_available_languages",
      "Get the list of supported language codes and names",
      async () => toToolResponse(await this.newsUseCase.getAvailableLanguages()),
    );

    server.tool(
      "get_available_regions",
      "Get the list of supported country/region codes and names",
      async () => toToolResponse(await this.newsUseCase.getAvailableRegions()),
    );

    server.tool(
      "get_available_categories",
      "Get the list of supported news categories",
      async () => toToolResponse(await this.newsUseCase.getAvailableCategories()),
    );

    server.tool(
      "check_api_status",
      "Check Currents API connectivity and configuration status",
      async () => toToolResponse(await this.newsUseCase.checkApiStatus()),
    );
  }

  registerResources(server: McpServer, resources: ReadonlyArray<DescriptiveResource>): void {
    for (const resource of resources) {
      server.resource(
        resource.name,
        resource.uri,
        { description: resource.description, mimeType: "application/json" },
        (uri) => ({
          contents: [{
            uri: uri.href,
            mimeType: "application/json",
            text: resource.read(),
          }],
        }),
      );
    }
  }
}

export function toToolResponse(result: OperationResult): ToolResponse {
  const text = JSON.stringify(result, null, 2);

  if (result.status === "error") {
    error(`Tool error: ${result.message}`);
    return { content: [{ type: "text", text }], isError: true };
  }

  return { content: [{ type: "text", text }] };
}
