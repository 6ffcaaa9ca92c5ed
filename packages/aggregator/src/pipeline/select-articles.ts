import type { Article } from "../types.js";

/**
 * Caps a newest-first list at `limit`, first taking the newest article of each
 * topic, then filling with the rest. The result keeps the input order.
 */
export function selectArticles<T extends Pick<Article, "topicId">>(
  articles: readonly T[],
  limit: number
): T[] {
  if (articles.length <= limit) {
    return [...articles];
  }

  const picked = new Set<number>();
  const coveredTopics = new Set<string>();

  articles.forEach((article, index) => {
    if (picked.size < limit && !coveredTopics.has(article.topicId)) {
      coveredTopics.add(article.topicId);
      picked.add(index);
    }
  });

  for (let index = 0; index < articles.length && picked.size < limit; index++) {
    picked.add(index);
  }

  return articles.filter((_, index) => picked.has(index));
}
