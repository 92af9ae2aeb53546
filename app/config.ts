import type { LogLevel } from "./logger";

export type DemoConfig = {
  /** Delay before the registry contents are shown after each menu action. */
  displayDelayMs: number;
  logLevel: LogLevel;
};

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const isLevel = (s: string): s is LogLevel => LEVELS.some(l => l === s);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DemoConfig {
  const displayDelayMs = Number(env.REGISTRY_DISPLAY_DELAY_MS || 1000);
  if (!Number.isFinite(displayDelayMs) || displayDelayMs < 0) {
    throw new Error(`REGISTRY_DISPLAY_DELAY_MS must be a non-negative number, got "${env.REGISTRY_DISPLAY_DELAY_MS}"`);
  }
  const level = (env.LOG_LEVEL || "info").toLowerCase();
  if (!isLevel(level)) {
    throw new Error(`LOG_LEVEL must be one of ${LEVELS.join(", ")}, got "${env.LOG_LEVEL}"`);
  }
  return { displayDelayMs, logLevel: level };
}
