import type { z } from "zod";

/** Validates environment variables against a zod schema; `source` defaults to process.env. */
export function parseEnv<T extends z.ZodTypeAny>(
  schema: T,
  source: NodeJS.ProcessEnv = process.env,
): z.output<T> {
  return schema.parse(source);
}
