import { describe, expect, it } from "vitest";
import { okAsync, ResultAsync } from "neverthrow";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { NewsApiPort } from "../../src/application/ports/out/NewsApiPort.ts";
import { AppDI } from "../../src/config/AppDI.ts";
import { ConfigResolver } from "../../src/config/env.ts";
import type { NewsApiError } from "../../src/domain/models/errors.ts";
import { testConfig } from "../helpers/fixtures.ts";

class IdleTransport implements NewsApiPort {
  public closeCalls = 0;

  request(): ResultAsync<unknown, NewsApiError> {
    return okAsync({ status: "ok", news: [] });
  }

  close(): Promise<void> {
    this.closeCalls++;
    return Promise.resolve();
  }
}

describe("AppDI", () => {
  it("refuses services before initialization", () => {
    const di = new AppDI();

    expect(di.isInitialized()).toBe(false);
    expect(di.getNewsService()._unsafeUnwrapErr().type).toBe("not_initialized");
  });

  it("refuses a second initialization", () => {
    const di = new AppDI();
    const resolver = new ConfigResolver({ CURRENTS_API_KEY: "test-key" });

    expect(di.initialize(testConfig, resolver).isOk()).toBe(true);
    expect(di.initialize(testConfig, resolver)._unsafeUnwrapErr().type).toBe(
      "already_initialized",
    );
  });

  it("initializes without a credential", () => {
    const di = new AppDI();

    expect(di.initialize(testConfig, new ConfigResolver({})).isOk()).toBe(true);
    expect(di.getNewsService().isOk()).toBe(true);
  });

  it("reuses the same service instance", () => {
    const di = new AppDI();
    di.initialize(testConfig, new ConfigResolver({}));

    expect(di.getNewsService()._unsafeUnwrap()).toBe(di.getNewsService()._unsafeUnwrap());
  });

  it("serves MCP until the client disconnects, then releases the access layer", async () => {
    const transport = new IdleTransport();
    const di = new AppDI();
    di.initialize(testConfig, new ConfigResolver({}), { transport });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    const running = di.runMcpServer(serverTransport);
    const client = new Client({ name: "test-client", version: "1.0.0" });
    await client.connect(clientTransport);
    const { tools } = await client.listTools();
    expect(tools).toHaveLength(6);
    expect(transport.closeCalls).toBe(0);

    await client.close();

    expect((await running).isOk()).toBe(true);
    expect(transport.closeCalls).toBe(1);
  });

  it("releases the access layer when the transport fails to start", async () => {
    const transport = new IdleTransport();
    const di = new AppDI();
    di.initialize(testConfig, new ConfigResolver({}), { transport });
    const broken: Transport = {
      start: () => Promise.reject(new Error("stdin unavailable")),
      send: () => Promise.resolve(),
      close: () => Promise.resolve(),
    };

    const result = await di.runMcpServer(broken);

    expect(result._unsafeUnwrapErr()).toEqual(new Error("stdin unavailable"));
    expect(transport.closeCalls).toBe(1);
  });

  it("refuses to serve before initialization", async () => {
    const result = await new AppDI().runMcpServer(InMemoryTransport.createLinkedPair()[1]);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "not_initialized",
      message: "DI container not initialized. Call initialize() first.",
    });
  });

  it("closes the access layer once on repeated shutdown", async () => {
    const transport = new IdleTransport();
    const di = new AppDI();
    di.initialize(testConfig, new ConfigResolver({}), { transport });

    await di.shutdown();
    await di.shutdown();

    expect(transport.closeCalls).toBe(1);
    expect(di.getNewsService()._unsafeUnwrapErr().type).toBe("shut_down");
  });

  it("shuts down cleanly when never initialized", async () => {
    await expect(new AppDI().shutdown()).resolves.toBeUndefined();
  });
});
