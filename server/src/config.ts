import { ConfigError } from "../../src/core/errors";
import { LogLevel, parseLogLevel } from "../../src/core/Logger";

export interface ServerConfig {
  port: number;
  /** Level JSON path; null = the bundled station level. */
  levelPath: string | null;
  logLevel: LogLevel;
  /** Simulation ticks per second. */
  tickRate: number;
  /** Include explored search cells in broadcasts. */
  debugExplored: boolean;
}

export const SERVER_DEFAULTS = {
  port: 1340,
  tickRate: 20,
};

function readInteger(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(name, `expected an integer in [${min}, ${max}], got "${raw}"`);
  }
  return value;
}

/** Server settings from the environment: PORT, LEVEL, LOG_LEVEL, TICK_RATE, DEBUG_EXPLORED. */
export function readServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: readInteger(env, "PORT", SERVER_DEFAULTS.port, 1, 65535),
    levelPath: env.LEVEL || null,
    logLevel: parseLogLevel(env.LOG_LEVEL, LogLevel.INFO),
    tickRate: readInteger(env, "TICK_RATE", SERVER_DEFAULTS.tickRate, 1, 240),
    debugExplored: env.DEBUG_EXPLORED === "1" || env.DEBUG_EXPLORED === "true",
  };
}
