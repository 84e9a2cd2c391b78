import { parsePositiveInt } from "./core/validation.js";

export const DEFAULT_CAPACITY = 8;

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Config {
  /** Initial and minimum store capacity for heaps built without a capacity hint. */
  defaultCapacity: number;
  logLevel: LogLevel;
}

const LEVEL_NAMES: ReadonlySet<string> = new Set(LOG_LEVELS);

function isLogLevel(v: string): v is LogLevel {
  return LEVEL_NAMES.has(v);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const level = (env.LOG_LEVEL ?? "").trim().toLowerCase();
  return {
    defaultCapacity: parsePositiveInt(env.HEAP_DEFAULT_CAPACITY) ?? DEFAULT_CAPACITY,
    logLevel: isLogLevel(level) ? level : "info",
  };
}

export const config: Readonly<Config> = Object.freeze(loadConfig());
