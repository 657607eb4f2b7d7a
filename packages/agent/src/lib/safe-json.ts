import { jsonrepair } from "jsonrepair";
import type { ZodType, ZodTypeDef } from "zod";

/**
 * Parse JSON with optional repair (for LLM output) and Zod validation.
 *
 * @throws {SyntaxError} If the text is not JSON even after repair
 * @throws {ZodError} If schema validation fails
 */
export function safeJsonParse<T>(
  raw: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  opts?: { repair?: boolean },
): T {
  const text = opts?.repair ? jsonrepair(raw) : raw;
  const parsed: unknown = JSON.parse(text);
  return schema.parse(parsed);
}

/**
 * Pulls the outermost `{ ... }` block out of an LLM reply (models often wrap JSON in prose
 * or code fences). Returns null when there is no object-looking block.
 */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  return text.slice(start, end + 1);
}
