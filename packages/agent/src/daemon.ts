import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { isMainModule } from "@pricing/kit";
import { AnthropicLlmClient } from "./adapters/anthropic-llm-client.js";
import { DryRunLlmClient } from "./adapters/dry-run-llm-client.js";
import { DryRunToolInvoker } from "./adapters/dry-run-tool-invoker.js";
import { EventLog } from "./adapters/event-log.js";
import { HttpToolInvoker } from "./adapters/http-tool-invoker.js";
import { CycleScheduler } from "./application/cycle-scheduler.js";
import { FeatureFlagStore } from "./application/feature-flags.js";
import { PricingRunner } from "./application/pricing-runner.js";
import { RuntimeTracker } from "./application/runtime-tracker.js";
import { createApp } from "./create-app.js";
import { buildTargets } from "./domain/targets.js";
import { ConfigurationError } from "./lib/errors.js";
import { loadConfig } from "./lib/load-config.js";
import { loadEnv } from "./lib/load-env.js";
import { logger } from "./lib/logger.js";
import { DecisionLedger, stageSettings } from "./stages/index.js";
import type { LlmClient } from "./types/llm-client.js";
import type { ToolInvoker } from "./types/tool-invoker.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const MIN_CYCLE_INTERVAL_MS = 1_000;

async function main(): Promise<void> {
  const env = loadEnv();
  const config = loadConfig(env);
  logger.setLogConfig(config.logLevels);

  const targets = buildTargets(config.targets);
  const isDryRun = config.dryRun;

  let llm: LlmClient;
  if (isDryRun) {
    llm = new DryRunLlmClient();
  } else if (env.ANTHROPIC_API_KEY) {
    llm = new AnthropicLlmClient(env.ANTHROPIC_API_KEY, config.llm);
  } else {
    throw new ConfigurationError("ANTHROPIC_API_KEY is required unless dryRun is enabled");
  }
  const tools: ToolInvoker = isDryRun ? new DryRunToolInvoker() : new HttpToolInvoker(config.toolServices, config.toolTimeoutMs);

  logger.info(
    {
      dryRun: isDryRun,
      model: config.llm.model,
      toolServices: config.toolServices,
      monitoringIntervalMinutes: config.agent.monitoringIntervalMinutes,
      minMarginPercent: config.agent.minMarginPercent,
      maxDiscountPercent: config.agent.maxDiscountPercent,
      autoRetractThreshold: config.agent.autoRetractThreshold,
      requireManualApproval: config.agent.requireManualApproval,
      autoStart: config.autoStart,
      targets: targets.length,
      featureFlags: config.featureFlags,
    },
    "Agent configuration loaded",
  );

  const eventLog = new EventLog(join(__dirname, "../data/events.ndjson"));
  const tracker = new RuntimeTracker();
  const flags = new FeatureFlagStore(config.featureFlags);
  const runner = new PricingRunner({
    settings: stageSettings(config),
    tools,
    llm,
    ledger: new DecisionLedger(tools, config.llm),
    tracker,
    flags,
  });
  const scheduler = new CycleScheduler({
    targets,
    work: runner,
    tracker,
    events: eventLog,
    settings: config.scheduler,
    cycleIntervalMs: Math.max(MIN_CYCLE_INTERVAL_MS, config.agent.monitoringIntervalMinutes * 60_000),
    autoStart: config.autoStart,
  });

  const app = createApp({ scheduler, runner, flags, events: eventLog });
  const server = app.listen(config.port, () => {
    logger.info({ port: config.port }, "Pricing agent listening");
  });

  await eventLog.append({
    type: "daemon_started",
    timestamp: new Date().toISOString(),
    data: { dryRun: isDryRun, targets: targets.length, autoStart: config.autoStart },
  });

  scheduler.launch();
  if (config.autoStart) {
    logger.info("Agent loop will start processing immediately");
  } else {
    logger.info("Agent loop is paused; POST /agent/start to begin");
  }

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down...");
    server.close();
    scheduler.requestShutdown();
    await scheduler.awaitStopped();

    await eventLog.append({
      type: "daemon_stopped",
      timestamp: new Date().toISOString(),
      data: { cyclesCompleted: scheduler.getStatus().cyclesCompleted },
    });

    await tools.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error(err, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}

if (isMainModule(import.meta.url)) {
  main().catch((err) => {
    logger.error(err, "Fatal error");
    process.exit(1);
  });
}
