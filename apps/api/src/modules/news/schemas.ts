import { z } from "zod";

export const refreshQuerySchema = z.object({
  refresh: z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => value === "true" || value === "1")
});

export type RefreshQuery = z.infer<typeof refreshQuerySchema>;

export const newsArticleResponseSchema = z.object({
  title: z.string(),
  url: z.string().url(),
  summary: z.string(),
  image_url: z.string(),
  published_at: z.string().datetime(),
  published_label: z.string(),
  source: z.string(),
  topic_id: z.string(),
  topic_label: z.string(),
  color: z.string()
});

export type NewsArticleResponse = z.infer<typeof newsArticleResponseSchema>;

export const newsResponseSchema = z.object({
  generated_at: z.string().datetime(),
  refreshing: z.boolean(),
  degraded_topics: z.array(z.string()),
  articles: z.array(newsArticleResponseSchema)
});

export type NewsResponse = z.infer<typeof newsResponseSchema>;
