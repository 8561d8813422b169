import { Hono } from "hono";
import { logger } from "hono/logger";
import { secureHeaders } from "hono/secure-headers";
import { SERVER_NAME, SERVER_VERSION } from "../../../config/AppDI.ts";
import { error, info } from "../../../config/logger.ts";
import { createErrorResult } from "../../../domain/models/results.ts";

/**
 * Build the HTTP application around the news router
 */
export function createApp(newsRouter: Hono): Hono {
  const app = new Hono();
  app.use(logger((message) => info(message)));
  app.use(secureHeaders());

  app.get("/", (c) => {
    return c.json({
      name: SERVER_NAME,
      status: "running",
      version: SERVER_VERSION,
    });
  });

  app.route("/news", newsRouter);

  app.notFound((c) => {
    return c.json(createErrorResult("Not Found"), 404);
  });

  app.onError((err, c) => {
    error(`Error: ${err.message}`);
    return c.json(createErrorResult("Internal Server Error"), 500);
  });

  return app;
}
