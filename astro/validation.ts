import type { z } from "zod";
import { InvalidInputError } from "./errors.js";

/**
 * Parse with a zod schema and turn issues into an InvalidInputError.
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  subject: string
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError(
      subject,
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
      )
    );
  }
  return result.data;
}
