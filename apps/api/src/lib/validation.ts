import type { ZodType, ZodTypeDef } from "zod";

export class BadRequestError extends Error {
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

/**
 * Parses client input. Failures become a 400; schema failures anywhere else
 * stay plain `ZodError`s and surface as 500s.
 */
export function parseRequestInput<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new BadRequestError(
      result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join(", ")
    );
  }
  return result.data;
}
