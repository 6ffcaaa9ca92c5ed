import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";
import type { Catalog } from "@agro-news/config";
import type {
  AggregationOutcome,
  Quote,
  RefreshCoordinator
} from "@agro-news/aggregator";

declare module "fastify" {
  interface FastifyInstance {
    catalog: Catalog;
    newsCache: RefreshCoordinator<AggregationOutcome>;
    quotesCache: RefreshCoordinator<Quote[]> | null;
  }
}

export type CachesPluginOptions = {
  catalog: Catalog;
  newsCache: RefreshCoordinator<AggregationOutcome>;
  quotesCache: RefreshCoordinator<Quote[]> | null;
};

async function cachesPlugin(fastify: FastifyInstance, options: CachesPluginOptions) {
  fastify.decorate("catalog", options.catalog);
  fastify.decorate("newsCache", options.newsCache);
  fastify.decorate("quotesCache", options.quotesCache);

  fastify.addHook("onClose", async () => {
    await Promise.all([
      options.newsCache.waitForIdle(),
      options.quotesCache?.waitForIdle()
    ]);
  });
}

export default fp(cachesPlugin, {
  name: "caches"
});
