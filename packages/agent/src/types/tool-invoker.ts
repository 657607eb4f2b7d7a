import { z } from "zod";

export const ServiceNameSchema = z.enum(["postgres", "weather", "competitor", "social"]);
export type ServiceName = z.infer<typeof ServiceNameSchema>;

/** Response envelope returned by every tool server for `POST /tool`. */
export const ToolEnvelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z.string().nullish(),
});

export type ToolEnvelope = z.infer<typeof ToolEnvelopeSchema>;

/**
 * Call-and-parse facade over the named external services. Implementations throw
 * ConfigurationError for an unknown service and ToolInvocationError for any failed call.
 */
export interface ToolInvoker {
  invoke(service: string, operation: string, parameters: Record<string, unknown>): Promise<unknown>;
  close(): Promise<void>;
}
