import {
  ExtractError,
  extracted,
  extractFailure,
  type ExtractResult
} from "../errors.js";
import type { ArticleStub, RawDocument } from "../types.js";
import { isDateHeading, parseLocalDateTime } from "./dates.js";
import { parseDocument, resolveUrl, textOf, type HTMLElement } from "./html.js";

type DatedListingOptions = {
  timeZone: string;
  maxCandidates: number;
};

/**
 * Listing pages that group entries under `dd/mm/yyyy` headings:
 *
 *   #content > h3 "18/10/2026" + ul > li.horizontal > a[href] (h2 title, .hora time)
 */
export function extractDatedListing(
  doc: RawDocument,
  options: DatedListingOptions
): ExtractResult<ArticleStub[]> {
  const root = parseDocument(doc.htmlBody);
  const container = root.querySelector("#content");

  if (!container) {
    return extractFailure(
      new ExtractError("Unparseable", doc.url, "Listing container #content not found")
    );
  }

  const stubs: ArticleStub[] = [];

  for (const heading of container.querySelectorAll("h3")) {
    const headingText = textOf(heading);
    if (!isDateHeading(headingText)) {
      continue;
    }

    const list = nextSiblingTagged(heading, "UL");
    if (!list) {
      continue;
    }

    for (const item of list.querySelectorAll("li.horizontal")) {
      const anchor = item.querySelector("a[href]");
      const titleNode = item.querySelector("h2");
      const href = anchor?.getAttribute("href");
      const url = href ? resolveUrl(href, doc.url) : null;

      if (!url || !titleNode) {
        continue;
      }

      const time = textOf(item.querySelector(".hora"));
      const teaser = textOf(item.querySelector("p"));

      stubs.push({
        url,
        title: textOf(titleNode),
        teaser: teaser || null,
        listedAt: parseLocalDateTime(`${headingText} ${time}`, options.timeZone)
      });

      if (stubs.length >= options.maxCandidates) {
        return extracted(stubs);
      }
    }
  }

  return extracted(stubs);
}

type AnchorListingOptions = {
  includePaths: readonly string[];
  excludeTerms: readonly string[];
  maxCandidates: number;
};

/** Same-host article links harvested from a homepage or section page. */
export function extractAnchorListing(
  doc: RawDocument,
  options: AnchorListingOptions
): ExtractResult<ArticleStub[]> {
  const root = parseDocument(doc.htmlBody);
  const body = root.querySelector("body");

  if (!body) {
    return extractFailure(
      new ExtractError("Unparseable", doc.url, "Document has no <body>")
    );
  }

  const host = new URL(doc.url).hostname;
  const seen = new Set<string>();
  const stubs: ArticleStub[] = [];

  for (const anchor of body.querySelectorAll("a[href]")) {
    const href = anchor.getAttribute("href");
    const url = href ? resolveUrl(href, doc.url) : null;
    if (!url || seen.has(url)) {
      continue;
    }

    const parsed = new URL(url);
    if (parsed.hostname !== host) {
      continue;
    }
    if (
      options.includePaths.length > 0 &&
      !options.includePaths.some((path) => parsed.pathname.includes(path))
    ) {
      continue;
    }

    const title = textOf(anchor);
    const lowered = `${url} ${title}`.toLowerCase();
    if (options.excludeTerms.some((term) => lowered.includes(term))) {
      continue;
    }

    seen.add(url);
    stubs.push({
      url,
      title: title || slugTitle(parsed.pathname),
      teaser: null,
      listedAt: null
    });

    if (stubs.length >= options.maxCandidates) {
      break;
    }
  }

  return extracted(stubs);
}

function nextSiblingTagged(node: HTMLElement, tagName: string) {
  let sibling = node.nextElementSibling;
  while (sibling) {
    if (sibling.tagName === tagName) {
      return sibling;
    }
    sibling = sibling.nextElementSibling;
  }
  return null;
}

function slugTitle(pathname: string) {
  const slug = pathname.split("/").filter(Boolean).pop() ?? "";
  return slug.replace(/[-_]+/g, " ").trim();
}
