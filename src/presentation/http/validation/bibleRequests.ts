import { z } from "zod";
import { ValidationError } from "../../../shared/errors/DomainError";

const queryValue = z.string().optional();

export const chapterParamSchema = z.coerce
  .number({ invalid_type_error: "chapter must be a number" })
  .int("chapter must be a whole number")
  .positive("chapter must be positive");

export const referenceQuerySchema = z.object({
  translation: queryValue,
  verse_numbers: queryValue,
});

const LIMIT_RANGE = "Limit must be between 1 and 100";

export const searchQuerySchema = z.object({
  q: z
    .string({
      required_error: "Search query 'q' is required",
      invalid_type_error: "Search query 'q' is required",
    })
    .trim()
    .min(3, "Search query must be at least 3 characters"),
  books: queryValue,
  limit: z.coerce
    .number({ invalid_type_error: "limit must be a number" })
    .int("limit must be a whole number")
    .min(1, LIMIT_RANGE)
    .max(100, LIMIT_RANGE)
    .default(25),
});

export const rootQuerySchema = z.object({
  random: queryValue,
  translation: queryValue,
});

/**
 * Parse request input, raising ValidationError with the first issue
 */
export function parseRequest<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  field?: string,
): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new ValidationError(
      issue?.message ?? "invalid request",
      field ?? issue?.path.join("."),
    );
  }
  return result.data;
}
