import Parser from "rss-parser";

import {
  ExtractError,
  extracted,
  extractFailure,
  type ExtractResult
} from "../errors.js";
import type { RawDocument } from "../types.js";
import { parseFeedDate } from "./dates.js";
import { resolveUrl } from "./html.js";
import { normaliseWhitespace } from "./text.js";

type MediaContent = { $?: { url?: string } };

type FeedItemExtras = {
  mediaContent?: MediaContent | MediaContent[];
};

const parser: Parser<Record<string, unknown>, FeedItemExtras> = new Parser({
  customFields: {
    item: [["media:content", "mediaContent"]]
  }
});

export type FeedEntry = {
  url: string;
  title: string;
  summary: string;
  imageUrl: string | null;
  publishedAt: Date | null;
};

export async function extractFeedItems(
  doc: RawDocument,
  options: { timeZone: string; maxItems: number }
): Promise<ExtractResult<FeedEntry[]>> {
  let feed: Awaited<ReturnType<typeof parser.parseString>>;
  try {
    feed = await parser.parseString(doc.htmlBody);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return extractFailure(
      new ExtractError("Unparseable", doc.url, `Feed could not be parsed: ${reason}`)
    );
  }

  const entries: FeedEntry[] = [];

  for (const item of feed.items ?? []) {
    const link = item.link?.trim();
    const url = link ? resolveUrl(link, doc.url) : null;
    const title = normaliseWhitespace(item.title ?? "");
    if (!url || !isHttpUrl(url) || !title) {
      continue;
    }

    entries.push({
      url,
      title,
      summary: normaliseWhitespace(item.contentSnippet ?? item.content ?? ""),
      imageUrl: imageFor(item, doc.url),
      publishedAt: parseFeedDate(item.isoDate ?? item.pubDate, options.timeZone)
    });

    if (entries.length >= options.maxItems) {
      break;
    }
  }

  return extracted(entries);
}

function isHttpUrl(url: string) {
  return url.startsWith("https://") || url.startsWith("http://");
}

function imageFor(item: Parser.Item & FeedItemExtras, baseUrl: string) {
  const media = Array.isArray(item.mediaContent) ? item.mediaContent[0] : item.mediaContent;
  const raw = item.enclosure?.url ?? media?.$?.url;
  const url = raw ? resolveUrl(raw.trim(), baseUrl) : null;
  return url && isHttpUrl(url) ? url : null;
}
