import type { z } from "zod";

export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`);
}

/** One-line form of formatZodErrors, for exception messages. */
export function summarizeZodError(error: z.ZodError): string {
  return formatZodErrors(error).join("; ");
}
