import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from "axios";

export type StubReply =
  | { status: number; data?: unknown }
  | { error: Error };

export interface StubAdapter {
  adapter: AxiosAdapter;
  calls: InternalAxiosRequestConfig[];
  reply(endpoint: string, response: StubReply): void;
}

/**
 * In-process axios adapter answering by request path
 */
export function createStubAdapter(fallback: StubReply = { status: 404, data: {} }): StubAdapter {
  const calls: InternalAxiosRequestConfig[] = [];
  const replies = new Map<string, StubReply>();

  const adapter: AxiosAdapter = (config) => {
    calls.push(config);
    const reply = replies.get(config.url ?? "") ?? fallback;

    if ("error" in reply) {
      return Promise.reject(reply.error);
    }

    return Promise.resolve({
      data: reply.data,
      status: reply.status,
      statusText: "",
      headers: {},
      config,
    });
  };

  return {
    adapter,
    calls,
    reply: (endpoint, response) => {
      replies.set(endpoint, response);
    },
  };
}

export function timeoutReply(): StubReply {
  return { error: new AxiosError("timeout of 15000ms exceeded", AxiosError.ETIMEDOUT) };
}

export function connectionRefusedReply(): StubReply {
  return {
    error: new AxiosError("connect ECONNREFUSED 10.0.0.1:443", "ECONNREFUSED"),
  };
}
