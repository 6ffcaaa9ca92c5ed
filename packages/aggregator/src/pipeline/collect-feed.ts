import PQueue from "p-queue";
import { collectRelevanceTerms, type Feed } from "@agro-news/config";

import { extracted, FetchError } from "../errors.js";
import { extractArticlePage } from "../extract/article-page.js";
import { extractFeedItems, type FeedEntry } from "../extract/feed-items.js";
import { extractAnchorListing } from "../extract/listing.js";
import { classifyTopic, matchesKeywords } from "../extract/text.js";
import type { AggregatorContext, Article, ArticleStub } from "../types.js";
import { isWithinWindow } from "../window-filter.js";
import { collectDetails, type CollectedDetails } from "./collect-details.js";

type RssFeed = Extract<Feed, { kind: "rss" }>;
type AnchorFeed = Extract<Feed, { kind: "anchors" }>;

/**
 * Secondary sources are not scoped to one topic: each article is classified
 * into the catalog after extraction. Throws when no listing URL of the feed
 * could be loaded.
 */
export function collectFeed(
  context: AggregatorContext,
  feed: Feed,
  now: Date
): Promise<CollectedDetails> {
  switch (feed.kind) {
    case "rss":
      return collectRssFeed(context, feed, now);
    case "anchors":
      return collectAnchorFeed(context, feed, now);
  }
}

async function collectRssFeed(
  context: AggregatorContext,
  feed: RssFeed,
  now: Date
): Promise<CollectedDetails> {
  const { news } = context.config;
  const relevanceTerms = collectRelevanceTerms(context.catalog);

  let entries: FeedEntry[];
  let feedsFailed = false;
  try {
    entries = await loadFromEachUrl(context, feed.id, feed.urls, async (url) => {
      const doc = await context.fetcher.fetchDocument(url);
      const result = await extractFeedItems(doc, {
        timeZone: news.timeZone,
        maxItems: news.maxListingCandidates
      });
      if (!result.ok) {
        throw result.error;
      }
      return result.value;
    });
  } catch (error) {
    if (feed.fallbackUrls.length === 0) {
      throw error;
    }
    entries = [];
    feedsFailed = true;
  }

  const selected: Array<FeedEntry & { publishedAt: Date }> = [];
  for (const entry of entries) {
    if (selected.length >= news.maxArticlesPerSource) {
      break;
    }
    const publishedAt = entry.publishedAt;
    if (!publishedAt || !isWithinWindow(publishedAt, now, news.retentionDays)) {
      continue;
    }
    if (
      feed.requireRelevance &&
      !matchesKeywords(`${entry.title} ${entry.summary}`, relevanceTerms)
    ) {
      continue;
    }
    selected.push({ ...entry, publishedAt });
  }

  const queue = new PQueue({ concurrency: context.config.fetch.detailConcurrency });
  const articles = await Promise.all(
    selected.map((entry) =>
      queue.add(
        async (): Promise<Article> => ({
          title: entry.title,
          url: entry.url,
          summary: entry.summary,
          imageUrl: entry.imageUrl ?? (await lookupImage(context, feed, entry)),
          publishedAt: entry.publishedAt,
          source: feed.name,
          topicId: classifyTopic(
            `${entry.title} ${entry.summary}`,
            context.catalog,
            feed.defaultTopic
          )
        }),
        { throwOnTimeout: true }
      )
    )
  );

  const missing = news.maxArticlesPerSource - articles.length;
  if (missing <= 0 || feed.fallbackUrls.length === 0) {
    return { articles, allFetchesFailed: false };
  }

  context.logger.info(
    { sourceId: feed.id, fromFeeds: articles.length, missing },
    "Feeds yielded too few articles, scraping listing pages"
  );

  let stubs: ArticleStub[];
  try {
    stubs = await loadAnchorStubs(context, feed, feed.fallbackUrls);
  } catch (error) {
    if (feedsFailed) {
      throw error;
    }
    return { articles, allFetchesFailed: false };
  }

  const known = new Set(articles.map((article) => article.url));
  const fallback = await collectPageArticles(context, feed, now, {
    stubs: stubs.filter((stub) => !known.has(stub.url)),
    limit: missing
  });

  return {
    articles: [...articles, ...fallback.articles],
    allFetchesFailed: feedsFailed && fallback.allFetchesFailed
  };
}

async function collectAnchorFeed(
  context: AggregatorContext,
  feed: AnchorFeed,
  now: Date
): Promise<CollectedDetails> {
  const stubs = await loadAnchorStubs(context, feed, feed.urls);
  return collectPageArticles(context, feed, now, { stubs });
}

function loadAnchorStubs(
  context: AggregatorContext,
  feed: Feed,
  urls: readonly string[]
): Promise<ArticleStub[]> {
  return loadFromEachUrl(context, feed.id, urls, async (url) => {
    const doc = await context.fetcher.fetchDocument(url);
    const listing = extractAnchorListing(doc, {
      includePaths: feed.includePaths,
      excludeTerms: feed.excludeTerms,
      maxCandidates: context.config.news.maxListingCandidates
    });
    if (!listing.ok) {
      throw listing.error;
    }
    return listing.value;
  });
}

/** Detail pages of harvested links, classified into the catalog. */
function collectPageArticles(
  context: AggregatorContext,
  feed: Feed,
  now: Date,
  options: { stubs: ArticleStub[]; limit?: number }
): Promise<CollectedDetails> {
  const { news } = context.config;
  const relevanceTerms = collectRelevanceTerms(context.catalog);

  return collectDetails(context, {
    sourceId: feed.id,
    stubs: options.stubs,
    limit: options.limit,
    toArticle: (doc, stub) => {
      const result = extractArticlePage(doc, stub, {
        topicId: feed.defaultTopic,
        source: feed.name,
        timeZone: news.timeZone
      });
      if (!result.ok) {
        return result;
      }
      return extracted({
        ...result.value,
        topicId: classifyTopic(
          `${result.value.title} ${result.value.summary}`,
          context.catalog,
          feed.defaultTopic
        )
      });
    },
    accept: (article) =>
      isWithinWindow(article.publishedAt, now, news.retentionDays) &&
      (!feed.requireRelevance ||
        matchesKeywords(`${article.title} ${article.summary}`, relevanceTerms))
  });
}

/**
 * Runs `load` for every URL, concatenating results and dropping repeated
 * article URLs. Fails only when every URL failed.
 */
async function loadFromEachUrl<T extends { url: string }>(
  context: AggregatorContext,
  sourceId: string,
  urls: readonly string[],
  load: (url: string) => Promise<T[]>
): Promise<T[]> {
  const seen = new Set<string>();
  const items: T[] = [];
  let lastError: unknown = null;
  let loaded = 0;

  for (const url of urls) {
    try {
      for (const item of await load(url)) {
        if (seen.has(item.url)) continue;
        seen.add(item.url);
        items.push(item);
      }
      loaded++;
    } catch (error) {
      lastError = error;
      context.logger.warn(
        { sourceId, url, error: error instanceof Error ? error.message : error },
        "Feed listing could not be loaded"
      );
    }
  }

  if (loaded === 0) {
    throw lastError;
  }

  return items;
}

async function lookupImage(
  context: AggregatorContext,
  feed: Feed,
  entry: FeedEntry & { publishedAt: Date }
) {
  const stub: ArticleStub = {
    url: entry.url,
    title: entry.title,
    teaser: entry.summary || null,
    listedAt: entry.publishedAt
  };

  try {
    const doc = await context.fetcher.fetchDocument(entry.url);
    const result = extractArticlePage(doc, stub, {
      topicId: feed.defaultTopic,
      source: feed.name,
      timeZone: context.config.news.timeZone
    });
    return result.ok ? result.value.imageUrl : "";
  } catch (error) {
    if (!(error instanceof FetchError)) {
      throw error;
    }
    context.logger.debug(
      { sourceId: feed.id, url: entry.url, kind: error.kind },
      "Image lookup failed, keeping article without image"
    );
    return "";
  }
}
