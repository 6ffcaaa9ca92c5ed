import { z } from "zod";

export const quoteResponseSchema = z.object({
  key: z.string(),
  label: z.string(),
  value: z.string(),
  unit: z.string(),
  change: z.string(),
  source: z.string()
});

export const quotesResponseSchema = z.object({
  generated_at: z.string().datetime(),
  refreshing: z.boolean(),
  quotes: z.array(quoteResponseSchema)
});

export type QuotesResponse = z.infer<typeof quotesResponseSchema>;
