import { describe, expect, it, vi } from "vitest";
import { loadConfig, parseCatalog } from "@agro-news/config";
import { createLogger } from "@agro-news/logger";

import { AggregationFailure, FetchError } from "../errors.js";
import type { AggregatorContext, RawDocument } from "../types.js";
import { runAggregation } from "./run-aggregation.js";

const now = new Date("2026-10-19T12:00:00.000Z");
const host = "https://news.example.com";
const logger = createLogger({ name: "aggregation-test", level: "silent" });

type TopicFixture = { id: string; keywords: string[]; listing: string };

function catalogWith(topics: TopicFixture[]) {
  return parseCatalog({
    topics: topics.map((topic) => ({
      id: topic.id,
      label: topic.id.toUpperCase(),
      sourceRef: `${host}${topic.listing}`,
      keywords: topic.keywords,
      color: "#336699"
    })),
    quotes: {
      pageUrl: `${host}/cotacoes/`,
      dollar: { key: "dolar", label: "Dólar", unit: "R$", source: "Example" }
    }
  });
}

function fakeFetcher(pages: Record<string, string>) {
  return {
    fetchDocument: vi.fn(async (url: string): Promise<RawDocument> => {
      const htmlBody = pages[url];
      if (htmlBody === undefined) {
        throw new FetchError("Timeout", url, "Timed out after 15000ms");
      }
      return { url, fetchedAt: now, htmlBody, contentType: "text/html" };
    })
  };
}

function contextFor(
  topics: TopicFixture[],
  fetcher: ReturnType<typeof fakeFetcher>,
  env: NodeJS.ProcessEnv = {}
): AggregatorContext {
  return {
    config: loadConfig({ env }),
    catalog: catalogWith(topics),
    logger,
    fetcher
  };
}

function listingPage(entries: Array<[path: string, title: string]>) {
  const items = entries
    .map(
      ([path, title]) =>
        `<li class="horizontal"><a href="${path}"><span class="hora">08:00</span><h2>${title}</h2></a></li>`
    )
    .join("");
  return `<html><body><div id="content"><h3>18/10/2026</h3><ul>${items}</ul></div></body></html>`;
}

function articlePage(title: string, publishedAt: string, summary = "") {
  return `
    <html>
      <head><meta property="article:published_time" content="${publishedAt}"></head>
      <body>
        <h1>${title}</h1>
        <div class="materia">${summary ? `<p>${summary}</p>` : ""}</div>
      </body>
    </html>
  `;
}

const soja = { id: "soja", keywords: ["soja"], listing: "/noticias/soja/" };
const milho = { id: "milho", keywords: ["milho"], listing: "/noticias/milho/" };
const cafe = { id: "cafe", keywords: ["café"], listing: "/noticias/cafe/" };

describe("runAggregation", () => {
  it("keeps the articles of healthy topics when one topic times out", async () => {
    const fetcher = fakeFetcher({
      [`${host}/noticias/milho/`]: listingPage([
        ["/noticias/milho/1.html", "Milho sobe no porto"],
        ["/noticias/milho/2.html", "Colheita de milho avança"],
        ["/noticias/milho/3.html", "Milho safrinha"]
      ]),
      [`${host}/noticias/milho/1.html`]: articlePage(
        "Milho sobe no porto",
        "2026-10-18T10:00:00-03:00",
        "Preços do milho sobem no porto de Paranaguá nesta semana."
      ),
      [`${host}/noticias/milho/2.html`]: articlePage(
        "Colheita de milho avança",
        "2026-10-18T08:00:00-03:00"
      ),
      [`${host}/noticias/milho/3.html`]: articlePage(
        "Milho safrinha",
        "2026-10-17T15:00:00-03:00"
      ),
      [`${host}/noticias/cafe/`]: listingPage([
        ["/noticias/cafe/1.html", "Café arábica em alta"],
        ["/noticias/cafe/2.html", "Exportação de café"]
      ]),
      [`${host}/noticias/cafe/1.html`]: articlePage(
        "Café arábica em alta",
        "2026-10-18T09:00:00-03:00"
      ),
      [`${host}/noticias/cafe/2.html`]: articlePage(
        "Exportação de café",
        "2026-10-16T07:00:00-03:00"
      )
    });

    const outcome = await runAggregation(contextFor([soja, milho, cafe], fetcher), now);

    expect(
      outcome.articles.map((article) => [
        article.url,
        article.topicId,
        article.publishedAt.toISOString()
      ])
    ).toEqual([
      [`${host}/noticias/milho/1.html`, "milho", "2026-10-18T13:00:00.000Z"],
      [`${host}/noticias/cafe/1.html`, "cafe", "2026-10-18T12:00:00.000Z"],
      [`${host}/noticias/milho/2.html`, "milho", "2026-10-18T11:00:00.000Z"],
      [`${host}/noticias/milho/3.html`, "milho", "2026-10-17T18:00:00.000Z"],
      [`${host}/noticias/cafe/2.html`, "cafe", "2026-10-16T10:00:00.000Z"]
    ]);
    expect(outcome.articles[0]).toEqual({
      title: "Milho sobe no porto",
      url: `${host}/noticias/milho/1.html`,
      summary: "Preços do milho sobem no porto de Paranaguá nesta semana.",
      imageUrl: "",
      publishedAt: new Date("2026-10-18T13:00:00.000Z"),
      source: "Notícias Agrícolas",
      topicId: "milho"
    });
    expect(outcome.generatedAt).toEqual(now);
    expect(outcome.partialFailure).toEqual({
      failedTopics: ["soja"],
      succeededArticles: 5
    });
  });

  it("throws AggregationFailure when every topic fails", async () => {
    const fetcher = fakeFetcher({});

    const error = await runAggregation(
      contextFor([soja, milho, cafe], fetcher),
      now
    ).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(AggregationFailure);
    expect(error).toMatchObject({
      failedTopics: ["soja", "milho", "cafe"],
      message: "All sources failed: soja, milho, cafe"
    });
  });

  it("treats a topic whose every article page fails as failed", async () => {
    const fetcher = fakeFetcher({
      [`${host}/noticias/soja/`]: listingPage([["/noticias/soja/1.html", "Soja"]]),
      [`${host}/noticias/milho/`]: listingPage([["/noticias/milho/1.html", "Milho"]]),
      [`${host}/noticias/milho/1.html`]: articlePage("Milho", "2026-10-18T10:00:00-03:00")
    });

    const outcome = await runAggregation(contextFor([soja, milho], fetcher), now);

    expect(outcome.articles.map((article) => article.topicId)).toEqual(["milho"]);
    expect(outcome.partialFailure).toEqual({
      failedTopics: ["soja"],
      succeededArticles: 1
    });
  });

  it("keeps the more complete copy of an article listed under two topics", async () => {
    const fetcher = fakeFetcher({
      [`${host}/noticias/milho/`]: listingPage([
        ["/noticias/mercado/1.html?utm_source=milho", "Milho e café no mercado"]
      ]),
      [`${host}/noticias/cafe/`]: listingPage([
        ["/noticias/mercado/1.html", "Milho e café no mercado"]
      ]),
      [`${host}/noticias/mercado/1.html?utm_source=milho`]: articlePage(
        "Milho e café no mercado",
        "2026-10-18T10:00:00-03:00"
      ),
      [`${host}/noticias/mercado/1.html`]: articlePage(
        "Milho e café no mercado",
        "2026-10-18T10:00:00-03:00",
        "Grãos e café seguem firmes nas principais praças do país."
      )
    });

    const outcome = await runAggregation(contextFor([milho, cafe], fetcher), now);

    expect(outcome.articles).toHaveLength(1);
    expect(outcome.articles[0]).toMatchObject({
      url: `${host}/noticias/mercado/1.html`,
      topicId: "cafe",
      summary: "Grãos e café seguem firmes nas principais praças do país."
    });
    expect(outcome.partialFailure).toBeNull();
  });

  it("downloads a listing shared by two topics once per run", async () => {
    const shared = "/noticias/graos/";
    const fetcher = fakeFetcher({
      [`${host}${shared}`]: listingPage([["/noticias/graos/1.html", "Soja e milho em alta"]]),
      [`${host}/noticias/graos/1.html`]: articlePage(
        "Soja e milho em alta",
        "2026-10-18T10:00:00-03:00"
      )
    });

    const outcome = await runAggregation(
      contextFor(
        [
          { ...soja, listing: shared },
          { ...milho, listing: shared }
        ],
        fetcher
      ),
      now
    );

    expect(outcome.articles.map((article) => article.topicId)).toEqual(["soja"]);
    expect(fetcher.fetchDocument).toHaveBeenCalledTimes(2);
  });

  it("stops dereferencing pages once the per-source cap is reached", async () => {
    const fetcher = fakeFetcher({
      [`${host}/noticias/milho/`]: listingPage([
        ["/noticias/milho/1.html", "Chuva no Sul"],
        ["/noticias/milho/2.html", "Milho 2"],
        ["/noticias/milho/3.html", "Milho 3"],
        ["/noticias/milho/4.html", "Milho 4"],
        ["/noticias/milho/5.html", "Milho 5"]
      ]),
      [`${host}/noticias/milho/1.html`]: articlePage("Chuva no Sul", "2026-10-18T11:00:00-03:00"),
      [`${host}/noticias/milho/2.html`]: articlePage("Milho 2", "2026-10-18T10:00:00-03:00"),
      [`${host}/noticias/milho/3.html`]: articlePage("Milho 3", "2026-10-18T09:00:00-03:00"),
      [`${host}/noticias/milho/4.html`]: articlePage("Milho 4", "2026-10-18T08:00:00-03:00"),
      [`${host}/noticias/milho/5.html`]: articlePage("Milho 5", "2026-10-18T07:00:00-03:00")
    });

    const outcome = await runAggregation(
      contextFor([milho], fetcher, { NEWS_MAX_ARTICLES_PER_SOURCE: "2" }),
      now
    );

    expect(outcome.articles.map((article) => article.title)).toEqual([
      "Milho 2",
      "Milho 3"
    ]);
    expect(fetcher.fetchDocument).not.toHaveBeenCalledWith(
      `${host}/noticias/milho/5.html`
    );
  });

  it("skips listing entries already older than the retention window", async () => {
    const fetcher = fakeFetcher({
      [`${host}/noticias/milho/`]: `
        <html><body><div id="content">
          <h3>18/10/2026</h3>
          <ul><li class="horizontal"><a href="/noticias/milho/novo.html"><h2>Milho novo</h2></a></li></ul>
          <h3>01/10/2026</h3>
          <ul><li class="horizontal"><a href="/noticias/milho/antigo.html"><h2>Milho antigo</h2></a></li></ul>
        </div></body></html>
      `,
      [`${host}/noticias/milho/novo.html`]: articlePage(
        "Milho novo",
        "2026-10-18T10:00:00-03:00"
      )
    });

    const outcome = await runAggregation(contextFor([milho], fetcher), now);

    expect(outcome.articles.map((article) => article.title)).toEqual(["Milho novo"]);
    expect(fetcher.fetchDocument).not.toHaveBeenCalledWith(
      `${host}/noticias/milho/antigo.html`
    );
  });

  it("caps the snapshot while keeping every topic represented", async () => {
    const fetcher = fakeFetcher({
      [`${host}/noticias/milho/`]: listingPage([
        ["/noticias/milho/1.html", "Milho 1"],
        ["/noticias/milho/2.html", "Milho 2"],
        ["/noticias/milho/3.html", "Milho 3"]
      ]),
      [`${host}/noticias/milho/1.html`]: articlePage("Milho 1", "2026-10-18T11:00:00-03:00"),
      [`${host}/noticias/milho/2.html`]: articlePage("Milho 2", "2026-10-18T10:00:00-03:00"),
      [`${host}/noticias/milho/3.html`]: articlePage("Milho 3", "2026-10-18T09:00:00-03:00"),
      [`${host}/noticias/cafe/`]: listingPage([["/noticias/cafe/1.html", "Café 1"]]),
      [`${host}/noticias/cafe/1.html`]: articlePage("Café 1", "2026-10-18T08:00:00-03:00")
    });

    const outcome = await runAggregation(
      contextFor([milho, cafe], fetcher, { NEWS_MAX_ARTICLES: "2" }),
      now
    );

    expect(outcome.articles.map((article) => article.title)).toEqual([
      "Milho 1",
      "Café 1"
    ]);
  });
});
