import { startRefreshTicker } from "@agro-news/aggregator";

import { createApiContext } from "./context.js";
import { buildServer } from "./server.js";

async function main() {
  const context = createApiContext();
  const { config, logger } = context;
  const server = await buildServer(context);

  const tickers = [
    startRefreshTicker(context.newsCache, config.news.cacheTtlMinutes * 60_000)
  ];
  if (context.quotesCache) {
    tickers.push(
      startRefreshTicker(context.quotesCache, config.quotes.cacheTtlMinutes * 60_000)
    );
  }

  const shutdown = async (signal?: string) => {
    logger.info({ signal }, "Shutting down API server");
    for (const ticker of tickers) {
      ticker.stop();
    }
    await server.close();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });

  process.on("unhandledRejection", (reason) => {
    logger.error({ reason }, "Unhandled rejection");
  });

  try {
    await server.listen({
      port: config.server.port,
      host: config.server.host
    });
    logger.info(
      { port: config.server.port, host: config.server.host },
      "API server started"
    );
  } catch (error) {
    logger.error(error, "Failed to start API server");
    process.exit(1);
  }
}

void main();
