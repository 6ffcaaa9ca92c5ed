import { describe, expect, it } from "vitest";

import type { RawDocument } from "../types.js";
import { extractAnchorListing, extractDatedListing } from "./listing.js";

function documentOf(url: string, htmlBody: string): RawDocument {
  return {
    url,
    fetchedAt: new Date("2026-10-19T12:00:00.000Z"),
    htmlBody,
    contentType: "text/html"
  };
}

const listingHtml = `
  <html>
    <body>
      <div id="content">
        <h3>Destaques</h3>
        <h3>18/10/2026</h3>
        <ul>
          <li class="horizontal">
            <a href="/noticias/soja/1-safra.html"><span class="hora">09:30</span><h2>Safra de soja avança</h2></a>
          </li>
          <li class="horizontal">
            <a href="https://www.noticiasagricolas.com.br/noticias/soja/2-exporta.html"><h2>Exportações crescem</h2></a>
          </li>
          <li class="horizontal"><span>sem link</span></li>
        </ul>
        <h3>17/10/2026</h3>
        <ul>
          <li class="horizontal">
            <a href="/noticias/soja/3-chuva.html"><span class="hora">18:05</span><h2>Chuvas no Paraná</h2><p>Produtores comemoram</p></a>
          </li>
        </ul>
      </div>
    </body>
  </html>
`;

const listingUrl = "https://www.noticiasagricolas.com.br/noticias/soja/";

describe("extractDatedListing", () => {
  it("collects entries under date headings in page order", () => {
    const result = extractDatedListing(documentOf(listingUrl, listingHtml), {
      timeZone: "America/Sao_Paulo",
      maxCandidates: 30
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(
      result.value.map((stub) => ({
        ...stub,
        listedAt: stub.listedAt?.toISOString() ?? null
      }))
    ).toEqual([
      {
        url: "https://www.noticiasagricolas.com.br/noticias/soja/1-safra.html",
        title: "Safra de soja avança",
        teaser: null,
        listedAt: "2026-10-18T12:30:00.000Z"
      },
      {
        url: "https://www.noticiasagricolas.com.br/noticias/soja/2-exporta.html",
        title: "Exportações crescem",
        teaser: null,
        listedAt: "2026-10-18T03:00:00.000Z"
      },
      {
        url: "https://www.noticiasagricolas.com.br/noticias/soja/3-chuva.html",
        title: "Chuvas no Paraná",
        teaser: "Produtores comemoram",
        listedAt: "2026-10-17T21:05:00.000Z"
      }
    ]);
  });

  it("stops at the candidate limit", () => {
    const result = extractDatedListing(documentOf(listingUrl, listingHtml), {
      timeZone: "America/Sao_Paulo",
      maxCandidates: 2
    });

    expect(result.ok && result.value.map((stub) => stub.title)).toEqual([
      "Safra de soja avança",
      "Exportações crescem"
    ]);
  });

  it("reports pages without the listing container as unparseable", () => {
    const result = extractDatedListing(
      documentOf(listingUrl, "<html><body><p>Manutenção</p></body></html>"),
      { timeZone: "America/Sao_Paulo", maxCandidates: 30 }
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("Unparseable");
    expect(result.error.url).toBe(listingUrl);
  });
});

describe("extractAnchorListing", () => {
  it("keeps unique same-host article links that pass the path filters", () => {
    const html = `
      <html>
        <body>
          <a href="/noticias/soja-recorde_123.html">Soja bate recorde</a>
          <a href="/noticias/soja-recorde_123.html">Soja bate recorde</a>
          <a href="/noticias/previsao-do-tempo_9.html">Previsão</a>
          <a href="https://outro.example.com/noticias/x.html">Outro</a>
          <a href="/cotacoes/milho">Milho</a>
          <a href="/noticias/adubacao-de-cobertura_55.html"></a>
        </body>
      </html>
    `;

    const result = extractAnchorListing(
      documentOf("https://www.agrolink.com.br/", html),
      {
        includePaths: ["/noticia"],
        excludeTerms: ["previsao", "cotacao"],
        maxCandidates: 10
      }
    );

    expect(result).toEqual({
      ok: true,
      value: [
        {
          url: "https://www.agrolink.com.br/noticias/soja-recorde_123.html",
          title: "Soja bate recorde",
          teaser: null,
          listedAt: null
        },
        {
          url: "https://www.agrolink.com.br/noticias/adubacao-de-cobertura_55.html",
          title: "adubacao de cobertura 55.html",
          teaser: null,
          listedAt: null
        }
      ]
    });
  });
});
