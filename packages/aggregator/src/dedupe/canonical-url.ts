import type { Article } from "../types.js";
import { normaliseWhitespace } from "../extract/text.js";

/**
 * Lowercases scheme and host, drops the default port, query string, fragment
 * and trailing slash. Returns null for values that are not absolute URLs.
 */
export function canonicalizeUrl(value: string): string | null {
  let url: URL;
  try {
    url = new URL(value.trim());
  } catch {
    return null;
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return null;
  }

  const pathname = url.pathname.replace(/\/+$/, "");
  // URL already lowercases scheme and host and omits default ports
  return `${url.protocol}//${url.host}${pathname}`;
}

export function normaliseTitle(title: string) {
  return normaliseWhitespace(
    title
      .normalize("NFD")
      .replace(/[\u0300-\u036f]/g, "")
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s]/gu, " ")
  );
}

export function articleIdentity(article: Pick<Article, "url" | "title" | "source">) {
  const canonical = article.url ? canonicalizeUrl(article.url) : null;
  if (canonical) {
    return `url:${canonical}`;
  }
  return `title:${normaliseTitle(article.title)}|${article.source.toLowerCase()}`;
}
