import PQueue from "p-queue";

import { dedupe } from "../dedupe/deduplicate.js";
import { AggregationFailure, formatErrorMessage } from "../errors.js";
import { memoizeFetcher } from "../fetch/source-fetcher.js";
import { aggregatorMetrics } from "../metrics/registry.js";
import type { AggregationOutcome, AggregatorContext, Article } from "../types.js";
import { filterByWindow, sortByPublishedDesc } from "../window-filter.js";
import { collectFeed } from "./collect-feed.js";
import type { CollectedDetails } from "./collect-details.js";
import { collectTopic } from "./collect-topic.js";
import { selectArticles } from "./select-articles.js";

type SourceTask = {
  id: string;
  collect: (context: AggregatorContext) => Promise<CollectedDetails>;
};

type SourceOutcome = {
  id: string;
  articles: Article[];
  failed: boolean;
};

/**
 * One full scrape: every topic (then every secondary feed) concurrently, merged
 * in declaration order, deduplicated, window-filtered, sorted newest first and
 * capped at `maxArticles` with every topic represented where possible.
 *
 * A failing source contributes nothing. Throws `AggregationFailure` only when
 * every source failed.
 */
export async function runAggregation(
  context: AggregatorContext,
  now: Date = new Date()
): Promise<AggregationOutcome> {
  const { catalog, config, logger } = context;
  const runContext: AggregatorContext = {
    ...context,
    fetcher: memoizeFetcher(context.fetcher)
  };
  const stopTimer = aggregatorMetrics.aggregationDuration.startTimer();

  const tasks: SourceTask[] = [
    ...catalog.topics.map((topic) => ({
      id: topic.id,
      collect: (ctx: AggregatorContext) => collectTopic(ctx, topic, now)
    })),
    ...catalog.feeds.map((feed) => ({
      id: feed.id,
      collect: (ctx: AggregatorContext) => collectFeed(ctx, feed, now)
    }))
  ];

  logger.info({ sources: tasks.length, now: now.toISOString() }, "Aggregation started");

  const queue = new PQueue({ concurrency: config.fetch.topicConcurrency });
  const outcomes = await Promise.all(
    tasks.map((task) =>
      queue.add(() => settleSource(runContext, task), { throwOnTimeout: true })
    )
  );

  const failedTopics = outcomes
    .filter((outcome) => outcome.failed)
    .map((outcome) => outcome.id);

  if (failedTopics.length === outcomes.length) {
    stopTimer({ status: "failure" });
    logger.error({ failedTopics }, "Aggregation failed for every source");
    throw new AggregationFailure(failedTopics);
  }

  const merged = outcomes.flatMap((outcome) => outcome.articles);
  const articles = selectArticles(
    sortByPublishedDesc(filterByWindow(dedupe(merged), now, config.news.retentionDays)),
    config.news.maxArticles
  );

  stopTimer({ status: failedTopics.length > 0 ? "partial" : "success" });
  aggregatorMetrics.snapshotArticles.set(articles.length);
  logger.info(
    {
      collected: merged.length,
      published: articles.length,
      failedTopics
    },
    "Aggregation finished"
  );

  return {
    articles,
    generatedAt: now,
    partialFailure:
      failedTopics.length > 0
        ? { failedTopics, succeededArticles: articles.length }
        : null
  };
}

async function settleSource(
  context: AggregatorContext,
  task: SourceTask
): Promise<SourceOutcome> {
  try {
    const collected = await task.collect(context);

    if (collected.allFetchesFailed) {
      context.logger.error(
        { sourceId: task.id },
        "Every article page of the source failed to load"
      );
      aggregatorMetrics.sourceRuns.inc({ source_id: task.id, status: "failure" });
      return { id: task.id, articles: [], failed: true };
    }

    aggregatorMetrics.sourceRuns.inc({ source_id: task.id, status: "success" });
    aggregatorMetrics.articlesCollected.inc(
      { source_id: task.id },
      collected.articles.length
    );
    return { id: task.id, articles: collected.articles, failed: false };
  } catch (error) {
    context.logger.error(
      { sourceId: task.id, error },
      `Source aggregation failed: ${formatErrorMessage(error)}`
    );
    aggregatorMetrics.sourceRuns.inc({ source_id: task.id, status: "failure" });
    return { id: task.id, articles: [], failed: true };
  }
}
