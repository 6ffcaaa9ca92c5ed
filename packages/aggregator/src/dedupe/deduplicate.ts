import type { Article } from "../types.js";
import { articleIdentity } from "./canonical-url.js";

function completeness(article: Article) {
  return (article.summary ? 1 : 0) + (article.imageUrl ? 1 : 0);
}

/**
 * Collapses articles sharing a canonical identity. The first record wins and
 * keeps its position, unless a later one carries strictly more of
 * `summary`/`imageUrl`, in which case it takes the incumbent's slot.
 */
export function dedupe(articles: readonly Article[]): Article[] {
  const byIdentity = new Map<string, Article>();

  for (const article of articles) {
    const identity = articleIdentity(article);
    const incumbent = byIdentity.get(identity);

    if (!incumbent || completeness(article) > completeness(incumbent)) {
      byIdentity.set(identity, article);
    }
  }

  return [...byIdentity.values()];
}
