import PQueue from "p-queue";

import { FetchError, type ExtractResult } from "../errors.js";
import { aggregatorMetrics } from "../metrics/registry.js";
import type { AggregatorContext, Article, ArticleStub, RawDocument } from "../types.js";

type DetailResult =
  | { kind: "article"; article: Article }
  | { kind: "skipped" }
  | { kind: "fetch-failed" };

export type CollectedDetails = {
  articles: Article[];
  allFetchesFailed: boolean;
};

type CollectDetailsOptions = {
  sourceId: string;
  stubs: readonly ArticleStub[];
  toArticle: (doc: RawDocument, stub: ArticleStub) => ExtractResult<Article>;
  accept: (article: Article) => boolean;
  /** Defaults to `maxArticlesPerSource`. */
  limit?: number;
};

/**
 * Dereferences stubs in page order, `detailConcurrency` pages at a time, until
 * `limit` articles are accepted. Batching keeps the result
 * independent of response timing.
 */
export async function collectDetails(
  context: AggregatorContext,
  options: CollectDetailsOptions
): Promise<CollectedDetails> {
  const { detailConcurrency } = context.config.fetch;
  const limit = options.limit ?? context.config.news.maxArticlesPerSource;
  const queue = new PQueue({ concurrency: detailConcurrency });

  const articles: Article[] = [];
  let attempted = 0;
  let fetchFailures = 0;

  for (
    let offset = 0;
    offset < options.stubs.length && articles.length < limit;
    offset += detailConcurrency
  ) {
    const batch = options.stubs.slice(offset, offset + detailConcurrency);
    const results = await Promise.all(
      batch.map((stub) =>
        queue.add(() => loadDetail(context, options, stub), {
          throwOnTimeout: true
        })
      )
    );

    attempted += batch.length;

    for (const result of results) {
      if (result.kind === "fetch-failed") {
        fetchFailures++;
        continue;
      }
      if (
        result.kind === "article" &&
        articles.length < limit &&
        options.accept(result.article)
      ) {
        articles.push(result.article);
      }
    }
  }

  return {
    articles,
    allFetchesFailed: attempted > 0 && fetchFailures === attempted
  };
}

async function loadDetail(
  context: AggregatorContext,
  options: CollectDetailsOptions,
  stub: ArticleStub
): Promise<DetailResult> {
  const logger = context.logger;

  let doc: RawDocument;
  try {
    doc = await context.fetcher.fetchDocument(stub.url);
  } catch (error) {
    if (!(error instanceof FetchError)) {
      throw error;
    }
    logger.warn(
      { sourceId: options.sourceId, url: stub.url, kind: error.kind, error: error.message },
      "Article page fetch failed, skipping"
    );
    aggregatorMetrics.articlesSkipped.inc({
      source_id: options.sourceId,
      reason: error.kind
    });
    return { kind: "fetch-failed" };
  }

  const result = options.toArticle(doc, stub);
  if (!result.ok) {
    logger.warn(
      {
        sourceId: options.sourceId,
        url: stub.url,
        kind: result.error.kind,
        field: result.error.field,
        error: result.error.message
      },
      "Article page could not be extracted, skipping"
    );
    aggregatorMetrics.articlesSkipped.inc({
      source_id: options.sourceId,
      reason: result.error.kind
    });
    return { kind: "skipped" };
  }

  return { kind: "article", article: result.value };
}
