import pino from "pino";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

/** Per-module log level overrides, set at startup via logger.setLogConfig() */
let logLevelOverrides: Record<string, string> = {};

function getBaseLevel(): string {
  return process.env.LOG_LEVEL ?? "info";
}

function createPinoLogger(): pino.Logger {
  if (process.env.VITEST) {
    return pino({ level: "silent" });
  }

  const here = dirname(fileURLToPath(import.meta.url));
  const logDir = process.env.LOG_DIR || join(here, "../../logs");

  return pino(
    { level: getBaseLevel(), base: { service: "pricing-agent" } },
    pino.transport({
      targets: [
        { target: "pino/file", level: getBaseLevel(), options: { destination: 1 } },
        {
          target: "pino-roll",
          level: getBaseLevel(),
          options: {
            file: join(logDir, "agent"),
            frequency: "daily",
            dateFormat: "yyyy-MM-dd",
            extension: ".ndjson",
            mkdir: true,
          },
        },
      ],
    }),
  );
}

const pinoInstance = createPinoLogger();

// Children are created at import time, before the config is read; setLogConfig re-levels them.
const children = new Map<string, pino.Logger[]>();

function levelFor(module: string): string {
  return logLevelOverrides[module] ?? pinoInstance.level;
}

export const logger = Object.assign(pinoInstance, {
  setLogConfig(overrides: Record<string, string>): void {
    logLevelOverrides = overrides;
    for (const [module, loggers] of children) {
      for (const child of loggers) child.level = levelFor(module);
    }
  },

  /** Child logger bound to `{ module }`, honouring a per-module level from config. */
  createChild(module: string): pino.Logger {
    const child = pinoInstance.child({ module });
    child.level = levelFor(module);
    children.set(module, [...(children.get(module) ?? []), child]);
    return child;
  },
});
