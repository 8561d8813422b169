/**
 * Currents News MCP command line interface
 *
 * Launches the MCP server over standard I/O for MCP clients such as
 * Claude Desktop.
 */

import "dotenv/config";
import { err, ok, type Result } from "neverthrow";
import { ConfigResolver, loadConfig } from "./src/config/env.ts";
import { appDI, type DIError } from "./src/config/AppDI.ts";
import { error, info, setLogLevel } from "./src/config/logger.ts";

type CliError =
  | { type: "setup"; message: string }
  | { type: "server"; message: string }
  | { type: "di"; error: DIError };

function setupDependencyInjection(): Result<void, CliError> {
  const configResult = loadConfig();
  if (configResult.isErr()) {
    return err({
      type: "setup",
      message: `${configResult.error.message}: ${configResult.error.issues.join("; ")}`,
    });
  }
  setLogLevel(configResult.value.logLevel);

  return appDI.initialize(configResult.value, new ConfigResolver())
    .map(() => undefined)
    .mapErr((diError): CliError => ({ type: "di", error: diError }));
}

function getErrorMessage(cliError: CliError): string {
  switch (cliError.type) {
    case "setup":
    case "server":
      return cliError.message;
    case "di":
      return `DI error: ${cliError.error.type} - ${cliError.error.message}`;
  }
}

async function runServer(): Promise<Result<void, CliError>> {
  const setupResult = setupDependencyInjection();
  if (setupResult.isErr()) {
    return err(setupResult.error);
  }

  info("Starting Currents News MCP server...");
  const serverResult = await appDI.runMcpServer();
  if (serverResult.isErr()) {
    const serverError = serverResult.error;
    return err(
      serverError instanceof Error
        ? { type: "server", message: `Server error: ${serverError.message}` }
        : { type: "di", error: serverError },
    );
  }
  return ok(undefined);
}

function registerShutdown(): void {
  const handler = (signal: NodeJS.Signals) => {
    info(`Received ${signal}, shutting down Currents News MCP server...`);
    appDI.shutdown().finally(() => process.exit(0));
  };

  process.once("SIGINT", handler);
  process.once("SIGTERM", handler);
}

registerShutdown();

runServer().then((result) => {
  result.match(
    () => info("Currents News MCP server stopped"),
    (cliError) => {
      error(`Fatal error: ${getErrorMessage(cliError)}`);
      process.exit(1);
    },
  );
}).catch((e: unknown) => {
  error(`Fatal error: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
});
