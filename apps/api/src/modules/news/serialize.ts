import { formatInTimeZone } from "date-fns-tz";
import { findTopic, type Catalog } from "@agro-news/config";
import type { Article } from "@agro-news/aggregator";

import type { NewsArticleResponse } from "./schemas.js";

const FALLBACK_COLOR = "#6B7280";

export function serializeArticle(
  article: Article,
  catalog: Catalog,
  timeZone: string
): NewsArticleResponse {
  const topic = findTopic(catalog, article.topicId);

  return {
    title: article.title,
    url: article.url,
    summary: article.summary,
    image_url: article.imageUrl,
    published_at: article.publishedAt.toISOString(),
    published_label: formatInTimeZone(article.publishedAt, timeZone, "dd/MM/yyyy HH:mm"),
    source: article.source,
    topic_id: article.topicId,
    topic_label: topic?.label ?? article.topicId,
    color: topic?.color ?? FALLBACK_COLOR
  };
}

/**
 * Cuts the list to whole grid rows. Lists shorter than one row are served as
 * they are.
 */
export function trimToGrid<T>(items: readonly T[], columns: number): T[] {
  if (columns <= 1 || items.length < columns) {
    return [...items];
  }
  return items.slice(0, Math.floor(items.length / columns) * columns);
}
