import axios, { isAxiosError, type AxiosAdapter, type AxiosInstance, type AxiosResponse } from "axios";
import { Agent } from "node:https";
import { err, errAsync, ok, ResultAsync, type Result } from "neverthrow";
import type { NewsApiPort } from "../../../application/ports/out/NewsApiPort.ts";
import { ConfigResolver, type AppConfig } from "../../../config/env.ts";
import { debug } from "../../../config/logger.ts";
import { errorFromStatus, type NewsApiError } from "../../../domain/models/errors.ts";
import type { NewsEndpoint, QueryParams } from "../../../domain/models/news.ts";

export const USER_AGENT = "CurrentsNewsMCP/1.0";

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

export interface TransportOptions {
  /** Replaces the network layer; used by tests */
  adapter?: AxiosAdapter;
}

/**
 * Authenticated GET client for the Currents API.
 * The axios instance and its keep-alive agent are created on first use and
 * reused until close().
 */
export class CurrentsHttpTransport implements NewsApiPort {
  private client?: AxiosInstance;
  private agent?: Agent;

  constructor(
    private readonly config: Pick<AppConfig, "baseUrl" | "timeoutSeconds">,
    private readonly resolver: ConfigResolver,
    private readonly options: TransportOptions = {},
  ) {}

  request(endpoint: NewsEndpoint, params: QueryParams = {}): ResultAsync<unknown, NewsApiError> {
    const apiKey = this.resolver.credential();
    if (!apiKey) {
      return errAsync<unknown, NewsApiError>({ type: "configuration" });
    }

    debug(`GET ${endpoint} ${JSON.stringify(params)}`);

    return ResultAsync.fromPromise(
      this.getClient().get<unknown>(endpoint, {
        params,
        headers: { Authorization: `Bearer ${apiKey}` },
      }),
      (e) => this.classifyTransportError(e),
    ).andThen((response) => this.checkStatus(response));
  }

  close(): Promise<void> {
    if (this.agent) {
      this.agent.destroy();
      debug("HTTP transport closed");
    }
    this.agent = undefined;
    this.client = undefined;
    return Promise.resolve();
  }

  private getClient(): AxiosInstance {
    if (!this.client) {
      this.agent = new Agent({ keepAlive: true });
      this.client = axios.create({
        baseURL: this.config.baseUrl,
        timeout: this.config.timeoutSeconds * 1000,
        headers: {
          "Accept": "application/json",
          "User-Agent": USER_AGENT,
        },
        httpsAgent: this.agent,
        adapter: this.options.adapter,
        // Status codes are classified in checkStatus
        validateStatus: () => true,
        transitional: { clarifyTimeoutError: true },
      });
    }
    return this.client;
  }

  private checkStatus(response: AxiosResponse<unknown>): Result<unknown, NewsApiError> {
    if (response.status >= 200 && response.status < 300) {
      return ok(response.data);
    }
    return err(errorFromStatus(response.status));
  }

  private classifyTransportError(e: unknown): NewsApiError {
    if (isAxiosError(e) && e.code !== undefined && TIMEOUT_CODES.has(e.code)) {
      return { type: "timeout", timeoutSeconds: this.config.timeoutSeconds };
    }
    return {
      type: "network",
      cause: e instanceof Error ? e.message : String(e),
    };
  }
}
