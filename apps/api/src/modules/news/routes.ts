import type { FastifyInstance } from "fastify";

import { parseRequestInput } from "../../lib/validation.js";
import { newsResponseSchema, refreshQuerySchema } from "./schemas.js";
import { serializeArticle, trimToGrid } from "./serialize.js";

type NewsRouteOptions = {
  gridColumns: number;
  timeZone: string;
};

export async function registerNewsRoutes(
  app: FastifyInstance,
  options: NewsRouteOptions
) {
  app.get("/api/news", async (request, reply) => {
    const query = parseRequestInput(refreshQuerySchema, request.query);

    if (query.refresh) {
      const ticket = app.newsCache.requestRefresh(true);
      request.log.info({ cache: "news", ticket }, "Forced refresh requested");
    }

    const read = await app.newsCache.getSnapshot();

    if (read.status === "unavailable") {
      reply.code(503).send({
        error: "DataUnavailable",
        message: `News are not available yet: ${read.reason}`
      });
      return;
    }

    const { data, generatedAt } = read.snapshot;
    const articles = trimToGrid(data.articles, options.gridColumns);

    return newsResponseSchema.parse({
      generated_at: generatedAt.toISOString(),
      refreshing: read.refreshing,
      degraded_topics: data.partialFailure?.failedTopics ?? [],
      articles: articles.map((article) =>
        serializeArticle(article, app.catalog, options.timeZone)
      )
    });
  });
}
