import { config as loadDotenv } from "dotenv";
import type { ZodIssue } from "zod";

import { configSchema, type AppConfig } from "./schema.js";

let cachedConfig: AppConfig | null = null;

function coerceBoolean(value: string | undefined) {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (["false", "0", "no", "off"].includes(normalized)) {
    return false;
  }
  if (["true", "1", "yes", "on"].includes(normalized)) {
    return true;
  }
  return undefined;
}

/**
 * Reads the environment (and `.env`, when present) into a validated config.
 * Only the `process.env` variant is cached; an explicit `env` is always parsed.
 */
export function loadConfig(options: { env?: NodeJS.ProcessEnv } = {}): AppConfig {
  if (!options.env && cachedConfig) {
    return cachedConfig;
  }

  if (!options.env) {
    loadDotenv();
  }

  const env = options.env ?? process.env;

  const result = configSchema.safeParse({
    nodeEnv: env.NODE_ENV,
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT
    },
    catalogPath: env.CATALOG_PATH,
    news: {
      timeZone: env.DISPLAY_TIMEZONE,
      retentionDays: env.NEWS_RETENTION_DAYS,
      cacheTtlMinutes: env.NEWS_CACHE_TTL_MINUTES,
      maxArticles: env.NEWS_MAX_ARTICLES,
      maxArticlesPerSource: env.NEWS_MAX_ARTICLES_PER_SOURCE,
      maxListingCandidates: env.NEWS_MAX_LISTING_CANDIDATES,
      gridColumns: env.NEWS_GRID_COLUMNS,
      retryAfterFailureMs: env.REFRESH_RETRY_AFTER_FAILURE_MS
    },
    quotes: {
      enabled: coerceBoolean(env.QUOTES_ENABLED),
      cacheTtlMinutes: env.QUOTES_CACHE_TTL_MINUTES
    },
    fetch: {
      timeoutMs: env.FETCH_TIMEOUT_MS,
      retries: env.FETCH_RETRIES,
      topicConcurrency: env.FETCH_TOPIC_CONCURRENCY,
      detailConcurrency: env.FETCH_DETAIL_CONCURRENCY,
      userAgent: env.FETCH_USER_AGENT
    },
    monitoring: {
      enabled: coerceBoolean(env.MONITORING_ENABLED)
    }
  });

  if (!result.success) {
    const formattedErrors = result.error.issues
      .map((issue: ZodIssue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid configuration: ${formattedErrors}`);
  }

  if (!options.env) {
    cachedConfig = result.data;
  }
  return result.data;
}
