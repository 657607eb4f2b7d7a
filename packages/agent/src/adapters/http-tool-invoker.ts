import { Agent } from "node:http";
import got, { RequestError } from "got";
import { ConfigurationError, ToolInvocationError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { ToolServices } from "../types/config.js";
import { ServiceNameSchema, ToolEnvelopeSchema, type ToolInvoker } from "../types/tool-invoker.js";

const log = logger.createChild("toolInvoker");

function networkErrorContext(err: unknown): Record<string, unknown> {
  if (!(err instanceof RequestError)) return { err };
  const body = err.response?.body;
  return {
    err,
    endpoint: err.options?.url?.toString(),
    statusCode: err.response?.statusCode,
    responseBody: typeof body === "string" ? body.slice(0, 200) : undefined,
    code: err.code,
  };
}

/** Calls `POST {baseUrl}/tool` on the service's tool server and unwraps the envelope. */
export class HttpToolInvoker implements ToolInvoker {
  private readonly services: ToolServices;
  private readonly timeoutMs: number;
  private readonly agent = new Agent({ keepAlive: true });

  constructor(services: ToolServices, timeoutMs: number) {
    this.services = services;
    this.timeoutMs = timeoutMs;
  }

  async invoke(service: string, operation: string, parameters: Record<string, unknown>): Promise<unknown> {
    const name = ServiceNameSchema.safeParse(service);
    if (!name.success) {
      throw new ConfigurationError(`Unknown tool service "${service}"`);
    }
    const url = `${this.services[name.data].replace(/\/+$/, "")}/tool`;

    const t0 = performance.now();
    let body: unknown;
    try {
      body = await got
        .post(url, {
          json: { tool_name: operation, parameters },
          timeout: { request: this.timeoutMs },
          retry: { limit: 0 },
          agent: { http: this.agent },
        })
        .json<unknown>();
    } catch (err) {
      log.warn({ action: "invoke", service, operation, latencyMs: Math.round(performance.now() - t0), ...networkErrorContext(err) }, "Tool call transport failed");
      throw new ToolInvocationError(service, operation, `Tool call failed: ${errorMessage(err)}`, { cause: err });
    }

    const envelope = ToolEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new ToolInvocationError(service, operation, "Tool call failed: malformed response envelope");
    }
    if (!envelope.data.success) {
      log.warn({ action: "invoke", service, operation, error: envelope.data.error }, "Tool call reported failure");
      throw new ToolInvocationError(service, operation, `Tool call failed: ${envelope.data.error ?? "unknown error"}`);
    }

    log.debug({ action: "invoke", service, operation, latencyMs: Math.round(performance.now() - t0) }, "Tool call ok");
    return envelope.data.data ?? null;
  }

  async close(): Promise<void> {
    this.agent.destroy();
  }
}
