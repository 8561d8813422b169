import { API_BASE_URL, type AppConfig } from "../../src/config/env.ts";

export const testConfig: AppConfig = {
  baseUrl: API_BASE_URL,
  timeoutSeconds: 15,
  defaultLanguage: "en",
  maxResults: 20,
  logLevel: "info",
  port: 8088,
};

export function rawArticle(index: number): Record<string, unknown> {
  return {
    id: `article-${index}`,
    title: `  Headline ${index}  `,
    description: `Summary ${index}\n`,
    url: `https://news.example.com/${index}`,
    author: `Reporter ${index}`,
    image: "None",
    language: "en",
    category: ["technology"],
    published: "2025-05-01 10:00:00 +0000",
  };
}

export function newsPayload(count: number): { status: string; news: unknown[] } {
  return {
    status: "ok",
    news: Array.from({ length: count }, (_, i) => rawArticle(i + 1)),
  };
}
