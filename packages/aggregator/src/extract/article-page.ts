import {
  ExtractError,
  extracted,
  extractFailure,
  type ExtractResult
} from "../errors.js";
import type { Article, ArticleStub, RawDocument } from "../types.js";
import { parseIsoInstant, parseLocalDateTime } from "./dates.js";
import {
  firstMatching,
  getMetaContent,
  parseDocument,
  resolveUrl,
  textOf,
  type HTMLElement
} from "./html.js";

const BODY_SELECTORS = [
  ".materia",
  ".conteudo",
  ".news-body",
  ".content",
  "article",
  "main"
] as const;

const DATE_BLOCK_SELECTORS = [".datas", ".meta"] as const;

const IMAGE_ATTRIBUTES = ["src", "data-src", "data-original", "data-lazy-src"] as const;

const BOILERPLATE_MARKERS = ["Logotipo Notícias Agrícolas"];

const MIN_PARAGRAPH_LENGTH = 25;
const PREFERRED_SUMMARY_LENGTH = 50;
const SUMMARY_SCAN_LIMIT = 5;

type ArticlePageOptions = {
  topicId: string;
  source: string;
  timeZone: string;
};

/**
 * Builds an article from its detail page. Image and summary degrade to "" when
 * absent; a missing title or publication time rejects the page.
 */
export function extractArticlePage(
  doc: RawDocument,
  stub: ArticleStub,
  options: ArticlePageOptions
): ExtractResult<Article> {
  const root = parseDocument(doc.htmlBody);
  const body = root.querySelector("body");

  if (!body) {
    return extractFailure(
      new ExtractError("Unparseable", doc.url, "Document has no <body>")
    );
  }

  const container = firstMatching(body, BODY_SELECTORS) ?? body;

  const title =
    textOf(root.querySelector("h1")) ||
    textOf(root.querySelector("h2")) ||
    textOf(root.querySelector("title")) ||
    stub.title;

  if (!title) {
    return extractFailure(
      new ExtractError("MissingRequiredField", doc.url, "Article has no title", "title")
    );
  }

  const publishedAt = extractPublishedAt(root, options.timeZone) ?? stub.listedAt;
  if (!publishedAt) {
    return extractFailure(
      new ExtractError(
        "MissingRequiredField",
        doc.url,
        "Article has no parsable publication time",
        "publishedAt"
      )
    );
  }

  return extracted({
    title,
    url: stub.url,
    summary: extractSummary(root, container) || stub.teaser || "",
    imageUrl: extractImage(root, container, doc.url) ?? "",
    publishedAt,
    source: options.source,
    topicId: options.topicId
  });
}

export function extractImage(root: HTMLElement, container: HTMLElement, baseUrl: string) {
  const metaImage =
    getMetaContent(root, "meta[property='og:image:secure_url']", "content") ??
    getMetaContent(root, "meta[property='og:image']", "content") ??
    getMetaContent(root, "meta[name='twitter:image']", "content");

  if (metaImage) {
    return resolveUrl(metaImage, baseUrl);
  }

  for (const image of container.querySelectorAll("img")) {
    for (const attribute of IMAGE_ATTRIBUTES) {
      const value = image.getAttribute(attribute);
      if (value) {
        return resolveUrl(value, baseUrl);
      }
    }
  }

  return null;
}

function extractSummary(root: HTMLElement, container: HTMLElement) {
  const paragraphs = container
    .querySelectorAll("p")
    .map((paragraph) => textOf(paragraph))
    .filter(
      (text) =>
        text.length > MIN_PARAGRAPH_LENGTH &&
        !BOILERPLATE_MARKERS.some((marker) => text.includes(marker))
    );

  const preferred = paragraphs
    .slice(0, SUMMARY_SCAN_LIMIT)
    .find((text) => text.length > PREFERRED_SUMMARY_LENGTH);

  return (
    preferred ??
    paragraphs[0] ??
    getMetaContent(root, "meta[property='og:description']", "content") ??
    getMetaContent(root, "meta[name='description']", "content") ??
    ""
  );
}

function extractPublishedAt(root: HTMLElement, timeZone: string) {
  const metaPublished = getMetaContent(
    root,
    "meta[property='article:published_time']",
    "content"
  );
  if (metaPublished) {
    const parsed = parseIsoInstant(metaPublished, timeZone);
    if (parsed) return parsed;
  }

  const timeNode = root.querySelector("time[datetime]");
  const datetime = timeNode?.getAttribute("datetime");
  if (datetime) {
    const parsed = parseIsoInstant(datetime, timeZone);
    if (parsed) return parsed;
  }

  const dateBlock = firstMatching(root, DATE_BLOCK_SELECTORS);
  if (dateBlock) {
    return parseLocalDateTime(textOf(dateBlock), timeZone);
  }

  return null;
}
