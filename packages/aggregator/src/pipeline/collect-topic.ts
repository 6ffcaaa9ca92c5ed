import type { Topic } from "@agro-news/config";

import { extractArticlePage } from "../extract/article-page.js";
import { extractDatedListing } from "../extract/listing.js";
import { matchesKeywords } from "../extract/text.js";
import type { AggregatorContext } from "../types.js";
import { isWithinWindow } from "../window-filter.js";
import { collectDetails, type CollectedDetails } from "./collect-details.js";

/**
 * Listing → detail pages → keyword filter for one topic. Throws when the
 * listing cannot be fetched or parsed.
 */
export async function collectTopic(
  context: AggregatorContext,
  topic: Topic,
  now: Date
): Promise<CollectedDetails> {
  const { news } = context.config;

  const listingDoc = await context.fetcher.fetchDocument(topic.sourceRef);
  const listing = extractDatedListing(listingDoc, {
    timeZone: news.timeZone,
    maxCandidates: news.maxListingCandidates
  });

  if (!listing.ok) {
    throw listing.error;
  }

  const stubs = listing.value.filter(
    (stub) => !stub.listedAt || isWithinWindow(stub.listedAt, now, news.retentionDays)
  );

  context.logger.debug(
    { sourceId: topic.id, listed: listing.value.length, candidates: stubs.length },
    "Topic listing parsed"
  );

  return collectDetails(context, {
    sourceId: topic.id,
    stubs,
    toArticle: (doc, stub) =>
      extractArticlePage(doc, stub, {
        topicId: topic.id,
        source: topic.source,
        timeZone: news.timeZone
      }),
    accept: (article) =>
      isWithinWindow(article.publishedAt, now, news.retentionDays) &&
      matchesKeywords(`${article.title} ${article.summary}`, topic.keywords)
  });
}
