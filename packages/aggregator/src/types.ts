import type { AppConfig, Catalog } from "@agro-news/config";
import type { Logger } from "@agro-news/logger";

import type { SourceFetcher } from "./fetch/source-fetcher.js";

export type RawDocument = {
  url: string;
  fetchedAt: Date;
  htmlBody: string;
  contentType: string | null;
};

export type Article = {
  title: string;
  url: string;
  summary: string;
  imageUrl: string;
  publishedAt: Date;
  source: string;
  topicId: string;
};

/** A listing entry before its detail page has been dereferenced. */
export type ArticleStub = {
  url: string;
  title: string;
  teaser: string | null;
  listedAt: Date | null;
};

export type PartialFailure = {
  failedTopics: string[];
  succeededArticles: number;
};

export type AggregationOutcome = {
  articles: Article[];
  generatedAt: Date;
  partialFailure: PartialFailure | null;
};

export type AggregatorContext = {
  config: Pick<AppConfig, "news" | "fetch">;
  catalog: Catalog;
  logger: Logger;
  fetcher: SourceFetcher;
};

/** One ticker entry; `value` and `change` keep the page's own formatting. */
export type Quote = {
  key: string;
  label: string;
  value: string;
  change: string;
  unit: string;
  source: string;
};
