import type { Catalog } from "@agro-news/config";

export function normaliseWhitespace(value: string) {
  return value.replace(/\s+/g, " ").trim();
}

export function matchesKeywords(text: string, keywords: readonly string[]) {
  if (keywords.length === 0) {
    return true;
  }
  const haystack = text.toLowerCase();
  return keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
}

/**
 * Picks the first topic (declaration order) whose aliases appear in the text,
 * falling back to `defaultTopicId`. The default topic's own aliases are never
 * consulted, so it only ever wins by fallback.
 */
export function classifyTopic(
  text: string,
  catalog: Catalog,
  defaultTopicId: string
) {
  const haystack = text.toLowerCase();
  const match = catalog.topics.find(
    (topic) =>
      topic.id !== defaultTopicId &&
      topic.aliases.some((alias) => haystack.includes(alias))
  );
  return match?.id ?? defaultTopicId;
}
