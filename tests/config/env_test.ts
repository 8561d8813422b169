import { describe, expect, it } from "vitest";
import { API_BASE_URL, ConfigResolver, loadConfig } from "../../src/config/env.ts";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const result = loadConfig({});

    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()).toEqual({
      baseUrl: API_BASE_URL,
      timeoutSeconds: 15,
      defaultLanguage: "en",
      maxResults: 20,
      logLevel: "info",
      port: 8088,
    });
  });

  it("reads tuning values from the environment", () => {
    const config = loadConfig({
      API_TIMEOUT: "30",
      DEFAULT_LANGUAGE: "fr",
      MAX_RESULTS: "5",
      LOG_LEVEL: "DEBUG",
      PORT: "9000",
    })._unsafeUnwrap();

    expect(config.timeoutSeconds).toBe(30);
    expect(config.defaultLanguage).toBe("fr");
    expect(config.maxResults).toBe(5);
    expect(config.logLevel).toBe("debug");
    expect(config.port).toBe(9000);
  });

  it("treats empty values as unset", () => {
    const config = loadConfig({ API_TIMEOUT: "", MAX_RESULTS: "" })._unsafeUnwrap();

    expect(config.timeoutSeconds).toBe(15);
    expect(config.maxResults).toBe(20);
  });

  it("rejects malformed numbers", () => {
    const result = loadConfig({ API_TIMEOUT: "soon", MAX_RESULTS: "-1" });

    expect(result.isErr()).toBe(true);
    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe("invalid_config");
    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toMatch(/^API_TIMEOUT: /);
    expect(error.issues[1]).toMatch(/^MAX_RESULTS: /);
  });
});

describe("ConfigResolver", () => {
  it("returns the configured credential", () => {
    expect(new ConfigResolver({ CURRENTS_API_KEY: "test-key" }).credential()).toBe("test-key");
  });

  it("treats a missing or empty credential as absent", () => {
    expect(new ConfigResolver({}).credential()).toBeUndefined();
    expect(new ConfigResolver({ CURRENTS_API_KEY: "" }).credential()).toBeUndefined();
  });

  it("reads the environment on every call", () => {
    const env: Record<string, string | undefined> = {};
    const resolver = new ConfigResolver(env);

    expect(resolver.credential()).toBeUndefined();
    env.CURRENTS_API_KEY = "test-key";
    expect(resolver.credential()).toBe("test-key");
  });
});
