import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const lowercaseTerms = z
  .array(z.string().trim().min(1))
  .default([])
  .transform((terms) => [...new Set(terms.map((term) => term.toLowerCase()))]);

const topicSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  sourceRef: z.string().url(),
  source: z.string().min(1).default("Notícias Agrícolas"),
  keywords: lowercaseTerms,
  aliases: lowercaseTerms,
  color: z.string().regex(/^#[0-9a-fA-F]{6}$/, "Color must be a #RRGGBB hex value")
});

const feedBaseSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  urls: z.array(z.string().url()).min(1),
  defaultTopic: z.string().min(1),
  requireRelevance: z.boolean().default(true)
});

const anchorFilterFields = {
  includePaths: z.array(z.string().min(1)).default([]),
  excludeTerms: lowercaseTerms
};

const feedSchema = z.discriminatedUnion("kind", [
  feedBaseSchema.extend({
    kind: z.literal("rss"),
    /** HTML listing pages scraped for anchors when the feeds yield too little. */
    fallbackUrls: z.array(z.string().url()).default([]),
    ...anchorFilterFields
  }),
  feedBaseSchema.extend({
    kind: z.literal("anchors"),
    ...anchorFilterFields
  })
]);

const quotePageSchema = z.object({
  pageUrl: z.string().url(),
  heading: z.string().min(1)
});

const quoteIndicatorSchema = z.object({
  key: z.string().min(1),
  label: z.string().min(1),
  unit: z.string(),
  source: z.string().min(1),
  pages: z.array(quotePageSchema).min(1),
  tableHints: lowercaseTerms
});

const quotesCatalogSchema = z.object({
  pageUrl: z.string().url(),
  dollar: z.object({
    key: z.string().min(1),
    label: z.string().min(1),
    unit: z.string(),
    source: z.string().min(1)
  }),
  indicators: z.array(quoteIndicatorSchema).default([])
});

export const catalogSchema = z
  .object({
    topics: z.array(topicSchema).min(1),
    feeds: z.array(feedSchema).default([]),
    quotes: quotesCatalogSchema
  })
  .superRefine((catalog, ctx) => {
    const ids = new Set<string>();
    for (const [index, source] of [...catalog.topics, ...catalog.feeds].entries()) {
      if (ids.has(source.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate source id "${source.id}"`,
          path: [index < catalog.topics.length ? "topics" : "feeds"]
        });
      }
      ids.add(source.id);
    }

    const topicIds = new Set(catalog.topics.map((topic) => topic.id));
    catalog.feeds.forEach((feed, index) => {
      if (!topicIds.has(feed.defaultTopic)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown default topic "${feed.defaultTopic}"`,
          path: ["feeds", index, "defaultTopic"]
        });
      }
    });
  });

export type Catalog = z.infer<typeof catalogSchema>;
export type Topic = Catalog["topics"][number];
export type Feed = Catalog["feeds"][number];
export type QuotesCatalog = Catalog["quotes"];
export type QuoteIndicator = QuotesCatalog["indicators"][number];

export const defaultCatalogPath = fileURLToPath(
  new URL("../../../config/catalog.json", import.meta.url)
);

export function parseCatalog(input: unknown): Catalog {
  const result = catalogSchema.safeParse(input);
  if (!result.success) {
    const formattedErrors = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid catalog: ${formattedErrors}`);
  }
  return result.data;
}

export function loadCatalog(path: string = defaultCatalogPath): Catalog {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return parseCatalog(raw);
}

export function findTopic(catalog: Catalog, topicId: string) {
  return catalog.topics.find((topic) => topic.id === topicId) ?? null;
}

/** Every term that marks a text as on-topic for the dashboard as a whole. */
export function collectRelevanceTerms(catalog: Catalog): string[] {
  const terms = new Set<string>();
  for (const topic of catalog.topics) {
    terms.add(topic.id.toLowerCase());
    terms.add(topic.label.toLowerCase());
    for (const keyword of topic.keywords) terms.add(keyword);
    for (const alias of topic.aliases) terms.add(alias);
  }
  return [...terms];
}
