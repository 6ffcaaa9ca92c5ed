import type { Article } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export function windowStart(now: Date, retentionDays: number) {
  return new Date(now.getTime() - retentionDays * DAY_MS);
}

export function isWithinWindow(publishedAt: Date, now: Date, retentionDays: number) {
  return publishedAt.getTime() >= windowStart(now, retentionDays).getTime();
}

/** Keeps articles published at or after `now - retentionDays`. */
export function filterByWindow<T extends Pick<Article, "publishedAt">>(
  articles: readonly T[],
  now: Date,
  retentionDays: number
): T[] {
  const cutoff = windowStart(now, retentionDays).getTime();
  return articles.filter((article) => article.publishedAt.getTime() >= cutoff);
}

export function sortByPublishedDesc<T extends Pick<Article, "publishedAt">>(
  articles: readonly T[]
): T[] {
  return [...articles].sort(
    (a, b) => b.publishedAt.getTime() - a.publishedAt.getTime()
  );
}
