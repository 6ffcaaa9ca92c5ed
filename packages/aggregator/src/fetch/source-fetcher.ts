import { FetchError } from "../errors.js";
import type { RawDocument } from "../types.js";

export type SourceFetcher = {
  fetchDocument(url: string): Promise<RawDocument>;
};

export type SourceFetcherOptions = {
  timeoutMs: number;
  retries: number;
  userAgent: string;
  fetchImpl?: typeof fetch;
  now?: () => Date;
};

const ACCEPT_HEADER =
  "text/html,application/xhtml+xml,application/rss+xml,application/xml;q=0.9,*/*;q=0.8";

export function createSourceFetcher(options: SourceFetcherOptions): SourceFetcher {
  const fetchImpl = options.fetchImpl ?? fetch;
  const now = options.now ?? (() => new Date());

  async function attempt(url: string): Promise<RawDocument> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetchImpl(url, {
          signal: controller.signal,
          headers: {
            "user-agent": options.userAgent,
            accept: ACCEPT_HEADER,
            "accept-language": "pt-BR,pt;q=0.9,en;q=0.8"
          },
          redirect: "follow"
        });
      } catch (error) {
        throw toFetchError(error, url, controller.signal, options.timeoutMs);
      }

      if (!response.ok) {
        throw new FetchError(
          "BadStatus",
          url,
          `HTTP ${response.status} ${response.statusText}`.trim(),
          { status: response.status }
        );
      }

      const contentType = response.headers.get("content-type");

      let body: ArrayBuffer;
      try {
        body = await response.arrayBuffer();
      } catch (error) {
        throw toFetchError(error, url, controller.signal, options.timeoutMs);
      }

      return {
        url,
        fetchedAt: now(),
        htmlBody: decodeBody(body, contentType, url),
        contentType
      };
    } finally {
      clearTimeout(timeout);
    }
  }

  return {
    async fetchDocument(url: string) {
      let lastError: FetchError | null = null;

      for (let attemptIndex = 0; attemptIndex <= options.retries; attemptIndex++) {
        try {
          return await attempt(url);
        } catch (error) {
          if (!(error instanceof FetchError)) {
            throw error;
          }
          lastError = error;
          if (!error.retryable) {
            break;
          }
        }
      }

      throw lastError ?? new FetchError("Unreachable", url, "No attempt was made");
    }
  };
}

/**
 * Shares one request per URL between callers for as long as the wrapper lives.
 * Meant to be created per aggregation run, so listings used by several topics
 * are downloaded once.
 */
export function memoizeFetcher(fetcher: SourceFetcher): SourceFetcher {
  const inFlight = new Map<string, Promise<RawDocument>>();

  return {
    fetchDocument(url: string) {
      const existing = inFlight.get(url);
      if (existing) {
        return existing;
      }
      const request = fetcher.fetchDocument(url);
      inFlight.set(url, request);
      return request;
    }
  };
}

const CHARSET_PATTERN = /charset=["']?([^;"'\s]+)/i;

function createDecoder(contentType: string | null) {
  const charset = contentType?.match(CHARSET_PATTERN)?.[1] ?? "utf-8";
  try {
    return new TextDecoder(charset, { fatal: true });
  } catch {
    // Unknown labels fall back to UTF-8.
    return new TextDecoder("utf-8", { fatal: true });
  }
}

function decodeBody(body: ArrayBuffer, contentType: string | null, url: string) {
  const decoder = createDecoder(contentType);
  try {
    return decoder.decode(body);
  } catch (error) {
    throw new FetchError(
      "Unreachable",
      url,
      `Body is not valid ${decoder.encoding}`,
      { cause: error }
    );
  }
}

function toFetchError(
  error: unknown,
  url: string,
  signal: AbortSignal,
  timeoutMs: number
) {
  if (signal.aborted) {
    return new FetchError("Timeout", url, `Timed out after ${timeoutMs}ms`, {
      cause: error
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new FetchError("Unreachable", url, message, { cause: error });
}
