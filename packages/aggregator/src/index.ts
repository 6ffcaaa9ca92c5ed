export * from "./types.js";
export * from "./errors.js";
export * from "./fetch/source-fetcher.js";
export * from "./extract/dates.js";
export * from "./extract/text.js";
export * from "./extract/listing.js";
export * from "./extract/article-page.js";
export * from "./extract/feed-items.js";
export * from "./dedupe/canonical-url.js";
export * from "./dedupe/deduplicate.js";
export * from "./window-filter.js";
export * from "./pipeline/run-aggregation.js";
export * from "./cache/refresh-coordinator.js";
export * from "./cache/scheduler.js";
export * from "./quotes/fetch-quotes.js";
export { aggregatorMetrics } from "./metrics/registry.js";
