import { z } from "zod";

const serverSchema = z.object({
  host: z.string().default("0.0.0.0"),
  port: z.coerce.number().int().min(0).max(65535).default(3000)
});

const newsSchema = z.object({
  timeZone: z
    .string()
    .refine(isKnownTimeZone, "Unknown IANA time zone")
    .default("America/Sao_Paulo"),
  retentionDays: z.coerce.number().int().positive().default(7),
  cacheTtlMinutes: z.coerce.number().positive().default(15),
  maxArticles: z.coerce.number().int().positive().default(15),
  maxArticlesPerSource: z.coerce.number().int().positive().default(3),
  maxListingCandidates: z.coerce.number().int().positive().default(30),
  gridColumns: z.coerce.number().int().positive().default(3),
  retryAfterFailureMs: z.coerce.number().int().min(0).default(60_000)
});

const quotesSchema = z.object({
  enabled: z.coerce.boolean().default(true),
  cacheTtlMinutes: z.coerce.number().positive().default(15)
});

const fetchSchema = z.object({
  timeoutMs: z.coerce.number().int().positive().default(15_000),
  retries: z.coerce.number().int().min(0).max(5).default(1),
  topicConcurrency: z.coerce.number().int().positive().default(6),
  detailConcurrency: z.coerce.number().int().positive().default(4),
  userAgent: z
    .string()
    .default(
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0 Safari/537.36"
    )
});

const monitoringSchema = z.object({
  enabled: z.coerce.boolean().default(true)
});

export const configSchema = z.object({
  nodeEnv: z
    .enum(["development", "test", "production"])
    .default("development"),
  server: serverSchema,
  catalogPath: z.string().min(1).optional(),
  news: newsSchema,
  quotes: quotesSchema,
  fetch: fetchSchema,
  monitoring: monitoringSchema
});

export type AppConfig = z.infer<typeof configSchema>;

function isKnownTimeZone(value: string) {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}
