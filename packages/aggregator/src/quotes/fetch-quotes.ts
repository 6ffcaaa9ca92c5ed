import type { QuoteIndicator, QuotesCatalog } from "@agro-news/config";
import type { Logger } from "@agro-news/logger";

import { FetchError } from "../errors.js";
import { parseDocument, textOf, type HTMLElement } from "../extract/html.js";
import { memoizeFetcher, type SourceFetcher } from "../fetch/source-fetcher.js";
import type { Quote } from "../types.js";

export type QuotesContext = {
  fetcher: SourceFetcher;
  logger: Logger;
};

const MAX_TABLES_AFTER_HEADING = 4;
const CURRENCY_VALUE = /R\$\s*(\d{1,3}(?:\.\d{3})*,\d{2}|\d{1,3}[.,]\d{2})/;
const BARE_VALUE = /(\d{1,3}(?:\.\d{3})*,\d{2}|\d{1,3}[.,]\d{2})/;
const PERCENT_CHANGE = /([+-]?\d{1,3}(?:[.,]\d{2})%)/;

/**
 * Scrapes the ticker: the dollar rate from the quotes page header, then one
 * entry per indicator. An indicator whose pages yield nothing is kept with an
 * empty value. Throws when the main quotes page cannot be fetched.
 */
export async function fetchQuotes(
  context: QuotesContext,
  catalog: QuotesCatalog
): Promise<Quote[]> {
  const fetcher = memoizeFetcher(context.fetcher);
  const mainDoc = await fetcher.fetchDocument(catalog.pageUrl);
  const mainPage = parseDocument(mainDoc.htmlBody);

  const quotes: Quote[] = [
    {
      ...catalog.dollar,
      value: textOf(mainPage.querySelector(".box-dolar .valor")),
      change: textOf(mainPage.querySelector(".box-dolar .porcentagem"))
    }
  ];

  for (const indicator of catalog.indicators) {
    quotes.push(await readIndicator({ ...context, fetcher }, indicator));
  }

  context.logger.debug(
    {
      quotes: quotes.length,
      missing: quotes.filter((quote) => !quote.value).map((quote) => quote.key)
    },
    "Quotes scraped"
  );

  return quotes;
}

async function readIndicator(
  context: QuotesContext,
  indicator: QuoteIndicator
): Promise<Quote> {
  const { key, label, unit, source } = indicator;
  let reading = { value: "", change: "" };

  for (const page of indicator.pages) {
    try {
      const doc = await context.fetcher.fetchDocument(page.pageUrl);
      reading = readUnderHeading(
        parseDocument(doc.htmlBody),
        page.heading,
        indicator.tableHints
      );
    } catch (error) {
      if (!(error instanceof FetchError)) {
        throw error;
      }
      context.logger.warn(
        { quote: key, url: page.pageUrl, kind: error.kind },
        "Quote page could not be loaded"
      );
      continue;
    }

    if (reading.value) {
      break;
    }
  }

  return { key, label, value: reading.value, change: reading.change, unit, source };
}

/**
 * Finds the first h2/h3 containing `heading` and reads the price table that
 * follows it in document order.
 */
export function readUnderHeading(
  root: HTMLElement,
  heading: string,
  tableHints: readonly string[]
) {
  const needle = heading.toLowerCase();
  const nodes = root.querySelectorAll("h2, h3, table");
  const start = nodes.findIndex(
    (node) => node.tagName !== "TABLE" && textOf(node).toLowerCase().includes(needle)
  );

  if (start === -1) {
    return { value: "", change: "" };
  }

  const tables = nodes
    .slice(start + 1)
    .filter((node) => node.tagName === "TABLE")
    .slice(0, MAX_TABLES_AFTER_HEADING)
    .map(tableText);

  const hinted = tables.find((text) => {
    const lowered = text.toLowerCase();
    return tableHints.some((hint) => lowered.includes(hint));
  });
  const text = hinted ?? tables[0];

  if (text === undefined) {
    return { value: "", change: "" };
  }

  return {
    value: (CURRENCY_VALUE.exec(text) ?? BARE_VALUE.exec(text))?.[1] ?? "",
    change: PERCENT_CHANGE.exec(text)?.[1] ?? ""
  };
}

function tableText(table: HTMLElement) {
  const cells = table.querySelectorAll("th, td").map((cell) => textOf(cell));
  return cells.length > 0 ? cells.join(" ") : textOf(table);
}
