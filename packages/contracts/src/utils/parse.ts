import type { z } from "zod";
import { GenerationError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

/**
 * Parse `input` against `schema`, reporting zod issues as a
 * `CONFIG_INVALID` error rather than a thrown ZodError.
 */
export function parseWith<S extends z.ZodType>(
  schema: S,
  input: unknown,
  label: string,
): Result<z.output<S>, GenerationError> {
  const parsed = schema.safeParse(input);
  if (parsed.success) return Ok(parsed.data);

  const issues = parsed.error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));
  const first = issues[0];
  const summary = first
    ? `${first.path || "(root)"}: ${first.message}`
    : "unknown issue";

  return Err(
    GenerationError.configInvalid(`Invalid ${label}: ${summary}`, { issues }),
  );
}
