import { z } from "zod";
import { parseEnv } from "@pricing/kit";
import dotenv from "dotenv";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const here = dirname(fileURLToPath(import.meta.url));

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no", "on", "off"])
  .transform((v) => v === "true" || v === "1" || v === "yes" || v === "on");

export const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  PORT: z.coerce.number().int().positive().optional(),
  AGENT_CONFIG_PATH: z.string().min(1).optional(),
  AGENT_DRY_RUN: flag.optional(),
  AGENT_AUTO_START: flag.optional(),
  AGENT_REQUIRE_MANUAL_APPROVAL: flag.optional(),
  SKUS_CONSIDERED: z.string().optional(),
  STORES_CONSIDERED: z.string().optional(),
  OPTIMIZATION_OBJECTIVE: z.string().min(1).optional(),
  OPTIMIZATION_MAX_ITERATIONS: z.coerce.number().int().optional(),
  ENABLE_DECISION_LEARNING: flag.optional(),
  ENABLE_OPTIMIZATION_LOOP: flag.optional(),
  ENABLE_MULTI_CRITIC: flag.optional(),
  ENABLE_APPROVAL_LEARNING: flag.optional(),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Load the package-root .env (if any) into process.env and return the parsed variables.
 * Variables already set in the environment win over the file.
 */
export function loadEnv(envPath: string = join(here, "../../.env")): Env {
  dotenv.config({ path: envPath });
  return parseEnv(EnvSchema);
}
