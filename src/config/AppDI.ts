import { Hono } from "hono";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { err, ok, ResultAsync, type Result } from "neverthrow";
import { AccessLayer, withAccessLayer, type AccessLayerDependencies } from "../application/AccessLayer.ts";
import type { NewsUseCase } from "../application/ports/in/NewsUseCase.ts";
import { NewsService } from "../application/services/NewsService.ts";
import { McpController } from "../adapters/in/mcp/McpController.ts";
import { createDescriptiveResources } from "../adapters/in/mcp/resources.ts";
import { NewsController } from "../adapters/in/http/NewsController.ts";
import { ConfigResolver, type AppConfig } from "./env.ts";
import { debug, error, info, warn } from "./logger.ts";

export const SERVER_NAME = "CurrentsNewsMCP";
export const SERVER_VERSION = "0.1.0";

export type DIError =
  | { type: "already_initialized"; message: string }
  | { type: "not_initialized"; message: string }
  | { type: "shut_down"; message: string };

/**
 * Dependency Injection container for the application
 */
export class AppDI {
  private layer?: AccessLayer;
  private newsService?: NewsService;
  private mcpController?: McpController;
  private httpController?: NewsController;
  private shutdownPromise?: Promise<void>;

  /**
   * Initialize the container with the startup configuration
   */
  initialize(
    config: AppConfig,
    resolver: ConfigResolver,
    dependencies: AccessLayerDependencies = {},
  ): Result<this, DIError> {
    if (this.layer) {
      return err({
        type: "already_initialized",
        message: "AppDI already initialized",
      });
    }

    if (!resolver.credential()) {
      warn("CURRENTS_API_KEY environment variable not set");
      warn("Get your free API key from https://currentsapi.services");
    }

    this.layer = new AccessLayer(config, resolver, dependencies);
    return ok(this);
  }

  isInitialized(): boolean {
    return this.layer !== undefined;
  }

  getAccessLayer(): Result<AccessLayer, DIError> {
    if (this.shutdownPromise) {
      return err({ type: "shut_down", message: "AppDI has been shut down" });
    }
    if (!this.layer) {
      return err({
        type: "not_initialized",
        message: "DI container not initialized. Call initialize() first.",
      });
    }
    return ok(this.layer);
  }

  getNewsService(): Result<NewsUseCase, DIError> {
    return this.getAccessLayer().map((layer) => {
      if (!this.newsService) {
        this.newsService = new NewsService(layer);
      }
      return this.newsService;
    });
  }

  getMcpController(): Result<McpController, DIError> {
    return this.getNewsService().map((service) => {
      if (!this.mcpController) {
        this.mcpController = new McpController(service);
      }
      return this.mcpController;
    });
  }

  getHttpRouter(): Result<Hono, DIError> {
    return this.getNewsService().map((service) => {
      if (!this.httpController) {
        this.httpController = new NewsController(service);
      }
      return this.httpController.createRouter();
    });
  }

  createMcpServer(): Result<McpServer, DIError> {
    const layerResult = this.getAccessLayer();
    const controllerResult = this.getMcpController();
    if (layerResult.isErr()) return err(layerResult.error);
    if (controllerResult.isErr()) return err(controllerResult.error);

    const server = new McpServer({
      name: SERVER_NAME,
      version: SERVER_VERSION,
    });

    const controller = controllerResult.value;
    controller.registerTools(server);
    controller.registerResources(server, createDescriptiveResources(layerResult.value.config));

    info("MCP server configured with news tools and resources");
    return ok(server);
  }

  /**
   * Serve MCP over `transport` until it closes, then release the access layer.
   * The layer is released on every exit path, including a failed connect.
   */
  async runMcpServer(
    transport: Transport = new StdioServerTransport(),
  ): Promise<Result<void, DIError | Error>> {
    const layerResult = this.getAccessLayer();
    if (layerResult.isErr()) {
      return err(layerResult.error);
    }

    info("Starting MCP server with stdio transport...");
    return await withAccessLayer(layerResult.value, async (): Promise<Result<void, DIError | Error>> => {
      const serverResult = this.createMcpServer();
      if (serverResult.isErr()) {
        return err(serverResult.error);
      }

      const server = serverResult.value;
      const closed = new Promise<void>((resolve) => {
        server.server.onclose = () => resolve();
      });

      const connected = await this.connect(server, transport);
      if (connected.isErr()) {
        return err(connected.error);
      }

      await closed;
      info("MCP transport closed");
      return ok(undefined);
    });
  }

  private async connect(server: McpServer, transport: Transport): Promise<Result<void, Error>> {
    return await ResultAsync.fromPromise(
      server.connect(transport),
      (transportError) =>
        transportError instanceof Error ? transportError : new Error(String(transportError)),
    ).match(
      (): Result<void, Error> => {
        info("MCP server connected via stdio transport");
        return ok(undefined);
      },
      (connectError): Result<void, Error> => {
        error(`Failed to start MCP server: ${connectError.message}`);
        return err(connectError);
      },
    );
  }

  /**
   * Release the access layer. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      debug("Shutting down application container");
      this.shutdownPromise = this.layer ? this.layer.close() : Promise.resolve();
    }
    return this.shutdownPromise;
  }
}

// Singleton instance of the DI container
export const appDI = new AppDI();
