import type { FastifyInstance } from "fastify";

import { parseRequestInput } from "../../lib/validation.js";
import { refreshQuerySchema } from "../news/schemas.js";
import { quotesResponseSchema } from "./schemas.js";

export async function registerQuoteRoutes(app: FastifyInstance) {
  app.get("/api/quotes", async (request, reply) => {
    const query = parseRequestInput(refreshQuerySchema, request.query);
    const cache = app.quotesCache;

    if (!cache) {
      reply.code(404).send({
        error: "NotFound",
        message: "Quotes are disabled"
      });
      return;
    }

    if (query.refresh) {
      cache.requestRefresh(true);
    }

    const read = await cache.getSnapshot();

    if (read.status === "unavailable") {
      reply.code(503).send({
        error: "DataUnavailable",
        message: `Quotes are not available yet: ${read.reason}`
      });
      return;
    }

    return quotesResponseSchema.parse({
      generated_at: read.snapshot.generatedAt.toISOString(),
      refreshing: read.refreshing,
      quotes: read.snapshot.data.map((quote) => ({
        key: quote.key,
        label: quote.label,
        value: quote.value,
        unit: quote.unit,
        change: quote.change,
        source: quote.source
      }))
    });
  });
}
