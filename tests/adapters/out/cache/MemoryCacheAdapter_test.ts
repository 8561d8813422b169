import { beforeEach, describe, expect, it } from "vitest";
import {
  DEFAULT_CACHE_TTL_MS,
  MemoryCacheAdapter,
} from "../../../../src/adapters/out/cache/MemoryCacheAdapter.ts";
import type { ReferenceData } from "../../../../src/domain/models/news.ts";

describe("MemoryCacheAdapter", () => {
  let now: number;
  let cache: MemoryCacheAdapter<ReferenceData>;

  beforeEach(() => {
    now = 1_000_000;
    cache = new MemoryCacheAdapter<ReferenceData>({ now: () => now });
  });

  it("uses a five minute TTL by default", () => {
    expect(DEFAULT_CACHE_TTL_MS).toBe(300_000);
  });

  it("reports missing keys as invalid", () => {
    expect(cache.isValid("languages")).toBe(false);
    expect(cache.get("languages")).toBeUndefined();
  });

  it("serves a value until just before the TTL elapses", () => {
    cache.set("languages", { English: "en" });

    now += DEFAULT_CACHE_TTL_MS - 1;

    expect(cache.isValid("languages")).toBe(true);
    expect(cache.get("languages")).toEqual({ English: "en" });
  });

  it("expires a value exactly at the TTL", () => {
    cache.set("categories", ["technology"]);

    now += DEFAULT_CACHE_TTL_MS;

    expect(cache.isValid("categories")).toBe(false);
    expect(cache.get("categories")).toBeUndefined();
  });

  it("replaces the previous entry and restarts its clock", () => {
    cache.set("regions", { France: "FR" });
    now += 200_000;
    cache.set("regions", { Japan: "JP" });
    now += 200_000;

    expect(cache.get("regions")).toEqual({ Japan: "JP" });
  });

  it("tracks keys independently", () => {
    cache.set("languages", { English: "en" });
    now += 100_000;
    cache.set("regions", { Germany: "DE" });
    now += 250_000;

    expect(cache.isValid("languages")).toBe(false);
    expect(cache.isValid("regions")).toBe(true);
  });

  it("honours a custom TTL", () => {
    const shortLived = new MemoryCacheAdapter<ReferenceData>({ ttlMs: 10, now: () => now });
    shortLived.set("categories", []);

    now += 9;
    expect(shortLived.get("categories")).toEqual([]);

    now += 1;
    expect(shortLived.get("categories")).toBeUndefined();
  });
});
