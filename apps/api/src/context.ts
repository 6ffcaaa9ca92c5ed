import { loadCatalog, loadConfig, type AppConfig, type Catalog } from "@agro-news/config";
import { createLogger, type Logger } from "@agro-news/logger";
import {
  RefreshCoordinator,
  createSourceFetcher,
  fetchQuotes,
  runAggregation,
  type AggregationOutcome,
  type Quote
} from "@agro-news/aggregator";

const MINUTE_MS = 60_000;

export type ApiContext = {
  config: AppConfig;
  catalog: Catalog;
  logger: Logger;
  newsCache: RefreshCoordinator<AggregationOutcome>;
  quotesCache: RefreshCoordinator<Quote[]> | null;
};

export function createApiContext(
  options: { config?: AppConfig; fetchImpl?: typeof fetch } = {}
): ApiContext {
  const config = options.config ?? loadConfig();
  const catalog = loadCatalog(config.catalogPath);
  const logger = createLogger({ name: "api", bindings: { service: "api" } });

  const fetcher = createSourceFetcher({
    timeoutMs: config.fetch.timeoutMs,
    retries: config.fetch.retries,
    userAgent: config.fetch.userAgent,
    fetchImpl: options.fetchImpl
  });

  const aggregatorLogger = logger.child({ component: "aggregator" });

  const newsCache = new RefreshCoordinator<AggregationOutcome>({
    name: "news",
    ttlMs: config.news.cacheTtlMinutes * MINUTE_MS,
    retryAfterFailureMs: config.news.retryAfterFailureMs,
    logger: aggregatorLogger,
    load: (now) =>
      runAggregation({ config, catalog, logger: aggregatorLogger, fetcher }, now)
  });

  const quotesCache = config.quotes.enabled
    ? new RefreshCoordinator<Quote[]>({
        name: "quotes",
        ttlMs: config.quotes.cacheTtlMinutes * MINUTE_MS,
        retryAfterFailureMs: config.news.retryAfterFailureMs,
        logger: aggregatorLogger,
        load: () => fetchQuotes({ fetcher, logger: aggregatorLogger }, catalog.quotes)
      })
    : null;

  logger.info(
    {
      topics: catalog.topics.length,
      feeds: catalog.feeds.length,
      quotesEnabled: config.quotes.enabled
    },
    "API context created"
  );

  return { config, catalog, logger, newsCache, quotesCache };
}
