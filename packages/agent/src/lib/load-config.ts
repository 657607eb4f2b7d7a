import { existsSync, readFileSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { summarizeZodError } from "@pricing/kit";
import { AgentConfigSchema, type AgentConfig } from "../types/config.js";
import { parseIdList } from "../domain/targets.js";
import { ConfigurationError } from "./errors.js";
import type { Env } from "./load-env.js";

const here = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_CONFIG_PATH = join(here, "../../agent-config.json");

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: RawConfig, key: string): RawConfig {
  const existing = raw[key];
  const copy: RawConfig = isRecord(existing) ? { ...existing } : {};
  raw[key] = copy;
  return copy;
}

/** Layers environment overrides on top of the file contents (env wins). */
export function applyEnvOverrides(fileConfig: RawConfig, env: Env): RawConfig {
  const raw: RawConfig = { ...fileConfig };

  if (env.PORT !== undefined) raw.port = env.PORT;
  if (env.AGENT_DRY_RUN !== undefined) raw.dryRun = env.AGENT_DRY_RUN;
  if (env.AGENT_AUTO_START !== undefined) raw.autoStart = env.AGENT_AUTO_START;

  if (env.SKUS_CONSIDERED !== undefined || env.STORES_CONSIDERED !== undefined) {
    const targets = section(raw, "targets");
    if (env.SKUS_CONSIDERED !== undefined) targets.skus = parseIdList(env.SKUS_CONSIDERED);
    if (env.STORES_CONSIDERED !== undefined) targets.stores = parseIdList(env.STORES_CONSIDERED);
  }

  const agent = section(raw, "agent");
  if (env.AGENT_REQUIRE_MANUAL_APPROVAL !== undefined) agent.requireManualApproval = env.AGENT_REQUIRE_MANUAL_APPROVAL;
  if (env.OPTIMIZATION_OBJECTIVE !== undefined) agent.optimizationObjective = env.OPTIMIZATION_OBJECTIVE;
  if (env.OPTIMIZATION_MAX_ITERATIONS !== undefined) agent.optimizationMaxIterations = env.OPTIMIZATION_MAX_ITERATIONS;

  const flags = section(raw, "featureFlags");
  if (env.ENABLE_DECISION_LEARNING !== undefined) flags.enableDecisionLearning = env.ENABLE_DECISION_LEARNING;
  if (env.ENABLE_OPTIMIZATION_LOOP !== undefined) flags.enableOptimizationLoop = env.ENABLE_OPTIMIZATION_LOOP;
  if (env.ENABLE_MULTI_CRITIC !== undefined) flags.enableMultiCritic = env.ENABLE_MULTI_CRITIC;
  if (env.ENABLE_APPROVAL_LEARNING !== undefined) flags.enableApprovalLearning = env.ENABLE_APPROVAL_LEARNING;

  return raw;
}

export function parseAgentConfig(raw: unknown): AgentConfig {
  const result = AgentConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid agent config: ${summarizeZodError(result.error)}`);
  }
  return result.data;
}

/**
 * Read agent-config.json (optional; every field has a default), apply env overrides,
 * and validate. Throws ConfigurationError on unreadable JSON or invalid values.
 */
export function loadConfig(env: Env, configPath: string = env.AGENT_CONFIG_PATH ?? DEFAULT_CONFIG_PATH): AgentConfig {
  let fileConfig: RawConfig = {};
  if (existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, "utf-8"));
    } catch (err) {
      throw new ConfigurationError(`Cannot read config ${configPath}`, { cause: err });
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Config ${configPath} must contain a JSON object`);
    }
    fileConfig = parsed;
  }
  return parseAgentConfig(applyEnvOverrides(fileConfig, env));
}
