import { pino, type Logger } from "pino";

import { config } from "./config.js";

export type { Logger };

const baseLogger = pino({
  timestamp: pino.stdTimeFunctions.isoTime,
  base: null, // drop pid and hostname
  level: config.logLevel,
});

/** Child logger tagged with the component that emits it. */
export function createLogger(component: string): Logger {
  return baseLogger.child({ component });
}
