import Fastify, {
  type FastifyError,
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest
} from "fastify";
import cors from "@fastify/cors";
import { Registry } from "prom-client";
import { aggregatorMetrics } from "@agro-news/aggregator";

import type { ApiContext } from "./context.js";
import cachesPlugin from "./plugins/caches.js";
import { registerNewsRoutes } from "./modules/news/routes.js";
import { registerQuoteRoutes } from "./modules/quotes/routes.js";
import { registerTopicRoutes } from "./modules/topics/routes.js";
import { metrics } from "./metrics/registry.js";

declare module "fastify" {
  interface FastifyRequest {
    metricsStopTimer?: ReturnType<typeof metrics.httpRequestDuration.startTimer>;
  }
}

export async function buildServer(context: ApiContext) {
  const { config, logger } = context;

  const server = Fastify({
    logger: false,
    loggerInstance: logger
  }) as unknown as FastifyInstance;

  await server.register(cors, {
    origin: true,
    methods: ["GET", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
    credentials: false
  });
  await server.register(cachesPlugin, {
    catalog: context.catalog,
    newsCache: context.newsCache,
    quotesCache: context.quotesCache
  });

  server.addHook("onRequest", (request, _reply, done) => {
    const route = request.routeOptions.url ?? request.url;
    request.metricsStopTimer = metrics.httpRequestDuration.startTimer({
      method: request.method,
      route,
      status_code: "pending"
    });
    done();
  });

  server.addHook(
    "onResponse",
    (request: FastifyRequest, reply: FastifyReply, done) => {
      const statusCode = reply.statusCode.toString();
      const route = request.routeOptions.url ?? request.url;

      metrics.httpRequestCounter.inc({
        method: request.method,
        route,
        status_code: statusCode
      });

      if (request.metricsStopTimer) {
        request.metricsStopTimer({
          method: request.method,
          route,
          status_code: statusCode
        });
      }

      done();
    }
  );

  server.setErrorHandler(
    (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      const statusCode = error.statusCode ?? 500;
      if (statusCode < 500) {
        reply.code(statusCode).send({ error: "BadRequest", message: error.message });
        return;
      }

      request.log.error({ error }, "Request failed");
      reply.code(500).send({
        error: "InternalServerError",
        message: "Unexpected error"
      });
    }
  );

  server.get("/health", async () => ({
    status: "ok",
    service: "api",
    timestamp: new Date().toISOString(),
    caches: {
      news: server.newsCache.state(),
      quotes: server.quotesCache?.state() ?? "disabled"
    }
  }));

  if (config.monitoring.enabled) {
    const registry = Registry.merge([metrics.registry, aggregatorMetrics.registry]);

    server.get("/metrics", async (_, reply) => {
      reply.header("Content-Type", registry.contentType);
      return registry.metrics();
    });
  }

  await registerNewsRoutes(server, {
    gridColumns: config.news.gridColumns,
    timeZone: config.news.timeZone
  });
  await registerQuoteRoutes(server);
  await registerTopicRoutes(server);

  return server;
}
