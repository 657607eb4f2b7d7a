import express from "express";
import rateLimit from "express-rate-limit";
import { z } from "zod";
import type { CycleScheduler } from "./application/cycle-scheduler.js";
import type { FeatureFlagStore } from "./application/feature-flags.js";
import type { PricingRunner } from "./application/pricing-runner.js";
import { errorMessage } from "./lib/errors.js";
import { logger } from "./lib/logger.js";
import { FeatureFlagsSchema } from "./types/config.js";
import type { EventSink, EventType } from "./types/events.js";

const log = logger.createChild("api");

const TriggerPayloadSchema = z.object({
  skuId: z.coerce.number().int().positive(),
  storeId: z.coerce.number().int().positive(),
});

const FeatureFlagsPatchSchema = FeatureFlagsSchema.partial().strict();

export interface AppDeps {
  scheduler: Pick<CycleScheduler, "start" | "stop" | "getStatus">;
  runner: Pick<PricingRunner, "analyzeTarget" | "describeGraphs">;
  flags: FeatureFlagStore;
  events: EventSink;
}

export function createApp(deps: AppDeps): express.Express {
  const { scheduler, runner, flags, events } = deps;
  const app = express();
  app.use(express.json({ limit: "100kb" }));

  // Rate limit POST endpoints: 10 req/min per IP
  const postLimiter = rateLimit({ windowMs: 60_000, max: 10, standardHeaders: false, legacyHeaders: false }) as unknown as express.RequestHandler;

  async function recordEvent(type: EventType, data: Record<string, unknown>): Promise<void> {
    try {
      await events.append({ type, timestamp: new Date().toISOString(), data });
    } catch (err) {
      log.warn({ action: type, err: errorMessage(err) }, "Event log append failed");
    }
  }

  app.get("/health", (_req, res) => {
    const status = scheduler.getStatus();
    res.json({
      status: "healthy",
      service: "pricing-agent",
      agentRunning: status.running,
      lastRun: status.lastRun,
      cyclesCompleted: status.cyclesCompleted,
      uptime: process.uptime(),
    });
  });

  app.get("/status", (_req, res) => {
    res.json({ ...scheduler.getStatus(), featureFlags: flags.snapshot() });
  });

  app.post("/agent/start", postLimiter, async (_req, res) => {
    try {
      const result = await scheduler.start();
      res.json({ ...result, status: scheduler.getStatus() });
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  app.post("/agent/stop", postLimiter, async (_req, res) => {
    try {
      const result = await scheduler.stop();
      res.json({ ...result, status: scheduler.getStatus() });
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  app.post("/trigger", postLimiter, async (req, res) => {
    const parsed = TriggerPayloadSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid trigger payload", details: parsed.error.issues });
      return;
    }

    try {
      const result = await runner.analyzeTarget(parsed.data);
      await recordEvent("manual_trigger", { ...result });
      res.json({ success: true, result });
    } catch (err) {
      log.error({ action: "trigger", ...parsed.data, err: errorMessage(err) }, "Manual trigger failed");
      res.status(500).json({ success: false, error: errorMessage(err) });
    }
  });

  app.get("/feature-flags", (_req, res) => {
    res.json({ featureFlags: flags.snapshot() });
  });

  app.post("/feature-flags", postLimiter, async (req, res) => {
    const parsed = FeatureFlagsPatchSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid feature flags payload", details: parsed.error.issues });
      return;
    }

    const featureFlags = flags.update(parsed.data);
    log.info({ action: "featureFlags", featureFlags }, "Feature flags updated");
    await recordEvent("feature_flags_updated", { featureFlags });
    res.json({ featureFlags });
  });

  app.get("/graph", (_req, res) => {
    res.json(runner.describeGraphs());
  });

  return app;
}
