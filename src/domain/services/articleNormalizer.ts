import type { NormalizedArticle } from "../models/news.ts";

const IMAGE_SENTINEL = "None";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(raw: Record<string, unknown>, key: string, fallback = ""): string {
  const value = raw[key];
  return typeof value === "string" ? value : fallback;
}

function categoryField(value: unknown): string[] {
  if (typeof value === "string") {
    return value ? [value] : [];
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === "string");
  }
  return [];
}

/**
 * Map a raw provider article to the stable output shape.
 * Any input is accepted; missing or mistyped fields fall back to defaults.
 */
export function normalizeArticle(raw: unknown): NormalizedArticle {
  const article = isRecord(raw) ? raw : {};
  const image = article.image;

  return {
    id: stringField(article, "id"),
    title: stringField(article, "title").trim(),
    description: stringField(article, "description").trim(),
    url: stringField(article, "url"),
    author: stringField(article, "author", "Unknown"),
    image: typeof image === "string" && image !== IMAGE_SENTINEL ? image : null,
    language: stringField(article, "language"),
    category: categoryField(article.category),
    published: stringField(article, "published"),
    source: "Currents API",
  };
}

/**
 * Normalize at most `limit` articles
 */
export function normalizeArticles(
  rawArticles: ReadonlyArray<unknown>,
  limit: number,
): NormalizedArticle[] {
  return rawArticles.slice(0, limit).map(normalizeArticle);
}
