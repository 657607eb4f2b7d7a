/** Invalid configuration or input: raised to the caller immediately, never retried. */
export class ConfigurationError extends Error {
  override name = "ConfigurationError";
}

/** A tool server call failed: transport error, malformed envelope, or `success: false`. */
export class ToolInvocationError extends Error {
  override name = "ToolInvocationError";
  readonly service: string;
  readonly operation: string;

  constructor(service: string, operation: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.service = service;
    this.operation = operation;
  }
}

/** Graph wired inconsistently (detected by compile()). */
export class GraphDefinitionError extends Error {
  override name = "GraphDefinitionError";
}

/** A router picked an undeclared target, or a run exceeded its step limit. */
export class GraphRoutingError extends Error {
  override name = "GraphRoutingError";
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
