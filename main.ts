import "dotenv/config";
import { serve } from "@hono/node-server";
import { ConfigResolver, loadConfig } from "./src/config/env.ts";
import { appDI } from "./src/config/AppDI.ts";
import { createApp } from "./src/adapters/in/http/app.ts";
import { error, info, setLogLevel } from "./src/config/logger.ts";

/**
 * Main entry point for the HTTP server
 */
function main(): void {
  const config = loadConfig().match(
    (value) => value,
    (configError) => {
      error(`${configError.message}: ${configError.issues.join("; ")}`);
      process.exit(1);
    },
  );
  setLogLevel(config.logLevel);

  appDI.initialize(config, new ConfigResolver()).match(
    (di) => di,
    (diError) => {
      error(`Failed to initialize DI container: ${diError.message}`);
      process.exit(1);
    },
  );

  const router = appDI.getHttpRouter().match(
    (value) => value,
    (diError) => {
      error(`Failed to get news router: ${diError.message}`);
      process.exit(1);
    },
  );

  const server = serve({ fetch: createApp(router).fetch, port: config.port }, (address) => {
    info(`Server running on http://localhost:${address.port}`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    info(`Received ${signal}, shutting down`);
    server.close();
    appDI.shutdown().finally(() => process.exit(0));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main();
