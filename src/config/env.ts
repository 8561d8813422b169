import { err, ok, type Result } from "neverthrow";
import { z } from "zod";

export const API_BASE_URL = "https://api.currentsapi.services/v1";
export const API_KEY_ENV = "CURRENTS_API_KEY";

export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Tuning values resolved once at startup
 */
export interface AppConfig {
  readonly baseUrl: string;
  readonly timeoutSeconds: number;
  readonly defaultLanguage: string;
  readonly maxResults: number;
  readonly logLevel: LogLevel;
  readonly port: number;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export type ConfigError = {
  type: "invalid_config";
  message: string;
  issues: string[];
};

const emptyToUndefined = (value: unknown) => value === "" ? undefined : value;

const envSchema = z.object({
  API_TIMEOUT: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(15)),
  DEFAULT_LANGUAGE: z.preprocess(emptyToUndefined, z.string().min(2).default("en")),
  MAX_RESULTS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(20)),
  LOG_LEVEL: z.preprocess(
    (value) => typeof value === "string" && value !== "" ? value.toLowerCase() : undefined,
    z.enum(["debug", "info", "warn", "error"]).default("info"),
  ),
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(65535).default(8088)),
});

/**
 * Load tuning values from environment variables
 * @returns Validated configuration or the list of offending variables
 */
export function loadConfig(env: EnvSource = process.env): Result<AppConfig, ConfigError> {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    return err({
      type: "invalid_config",
      message: "Invalid environment configuration",
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }

  return ok({
    baseUrl: API_BASE_URL,
    timeoutSeconds: parsed.data.API_TIMEOUT,
    defaultLanguage: parsed.data.DEFAULT_LANGUAGE,
    maxResults: parsed.data.MAX_RESULTS,
    logLevel: parsed.data.LOG_LEVEL,
    port: parsed.data.PORT,
  });
}

/**
 * Reads the API credential from the environment on every call
 */
export class ConfigResolver {
  constructor(private readonly env: EnvSource = process.env) {}

  credential(): string | undefined {
    const value = this.env[API_KEY_ENV];
    return value ? value : undefined;
  }
}
