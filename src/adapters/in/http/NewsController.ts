import { Hono, type Context } from "hono";
import type { NewsUseCase } from "../../../application/ports/in/NewsUseCase.ts";
import { getErrorStatusCode, type ErrorStatusCode } from "../../../domain/models/errors.ts";
import type { SearchFilters } from "../../../domain/models/news.ts";
import type { OperationResult } from "../../../domain/models/results.ts";

/**
 * Controller for the HTTP news endpoints
 */
export class NewsController {
  constructor(private readonly newsUseCase: NewsUseCase) {}

  createRouter(): Hono {
    const router = new Hono();

    router.get("/search", async (c) => {
      const filters: SearchFilters = {
        keywords: c.req.query("keywords"),
        language: c.req.query("language"),
        country: c.req.query("country"),
        category: c.req.query("category"),
        start_date: c.req.query("start_date"),
        end_date: c.req.query("end_date"),
      };
      return this.respond(c, await this.newsUseCase.searchNews(filters));
    });

    router.get("/latest", async (c) => {
      return this.respond(c, await this.newsUseCase.getLatestNews(c.req.query("language")));
    });

    router.get("/languages", async (c) => {
      return this.respond(c, await this.newsUseCase.getAvailableLanguages());
    });

    router.get("/regions", async (c) => {
      return this.respond(c, await this.newsUseCase.getAvailableRegions());
    });

    router.get("/categories", async (c) => {
      return this.respond(c, await this.newsUseCase.getAvailableCategories());
    });

    router.get("/status", async (c) => {
      return this.respond(c, await this.newsUseCase.checkApiStatus());
    });

    return router;
  }

  private respond(c: Context, result: OperationResult): Response {
    return c.json(result, statusFor(result));
  }
}

export function statusFor(result: OperationResult): 200 | ErrorStatusCode {
  if (result.status === "success") {
    return 200;
  }
  // Provider answered but the envelope was not "ok"
  return result.error_type ? getErrorStatusCode(result.error_type) : 502;
}
