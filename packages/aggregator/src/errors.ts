export type FetchErrorKind = "Unreachable" | "BadStatus" | "Timeout";

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status: number | null;

  constructor(
    kind: FetchErrorKind,
    url: string,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.kind = kind;
    this.url = url;
    this.status = options.status ?? null;
  }

  /** Network failures, timeouts and 5xx are worth another attempt; 4xx never is. */
  get retryable(): boolean {
    if (this.kind !== "BadStatus") {
      return true;
    }
    return this.status !== null && this.status >= 500;
  }
}

export type ExtractErrorKind = "Unparseable" | "MissingRequiredField";

export class ExtractError extends Error {
  readonly kind: ExtractErrorKind;
  readonly url: string;
  readonly field: string | null;

  constructor(
    kind: ExtractErrorKind,
    url: string,
    message: string,
    field: string | null = null
  ) {
    super(message);
    this.name = "ExtractError";
    this.kind = kind;
    this.url = url;
    this.field = field;
  }
}

export class AggregationFailure extends Error {
  readonly failedTopics: string[];

  constructor(failedTopics: string[]) {
    super(`All sources failed: ${failedTopics.join(", ")}`);
    this.name = "AggregationFailure";
    this.failedTopics = failedTopics;
  }
}

export type ExtractResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ExtractError };

export function extracted<T>(value: T): ExtractResult<T> {
  return { ok: true, value };
}

export function extractFailure<T>(error: ExtractError): ExtractResult<T> {
  return { ok: false, error };
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof FetchError || error instanceof ExtractError) {
    return `${error.kind}: ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return "Unknown error occurred";
}
