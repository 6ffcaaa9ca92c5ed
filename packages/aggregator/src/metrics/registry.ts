import { Counter, Gauge, Histogram, Registry } from "prom-client";

const registry = new Registry();

const aggregationDuration = new Histogram({
  name: "agro_news_aggregation_duration_seconds",
  help: "Duration of full aggregation runs in seconds",
  registers: [registry],
  labelNames: ["status"],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120]
});

const sourceRuns = new Counter({
  name: "agro_news_source_runs_total",
  help: "Per-source aggregation outcomes",
  registers: [registry],
  labelNames: ["source_id", "status"]
});

const articlesCollected = new Counter({
  name: "agro_news_articles_collected_total",
  help: "Articles accepted from a source before merging",
  registers: [registry],
  labelNames: ["source_id"]
});

const articlesSkipped = new Counter({
  name: "agro_news_articles_skipped_total",
  help: "Article pages skipped because they could not be fetched or extracted",
  registers: [registry],
  labelNames: ["source_id", "reason"]
});

const snapshotArticles = new Gauge({
  name: "agro_news_snapshot_articles",
  help: "Number of articles in the last published news snapshot",
  registers: [registry]
});

const refreshRuns = new Counter({
  name: "agro_news_refresh_runs_total",
  help: "Cache refresh runs grouped by cache and outcome",
  registers: [registry],
  labelNames: ["cache", "status"]
});

export const aggregatorMetrics = {
  registry,
  aggregationDuration,
  sourceRuns,
  articlesCollected,
  articlesSkipped,
  snapshotArticles,
  refreshRuns
};
