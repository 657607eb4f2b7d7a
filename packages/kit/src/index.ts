export { backoffDelay } from "./backoff-delay.js";
export { finiteOr } from "./finite-or.js";
export { isMainModule } from "./is-main.js";
export { clamp, roundTo } from "./numeric.js";
export { parseEnv } from "./parse-env.js";
export { formatZodErrors, summarizeZodError } from "./zod-helpers.js";
