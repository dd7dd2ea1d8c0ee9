import { ConfigError } from "../core/errors";

export interface NavigationConfig {
  /** Default agent speed, world units per second. */
  moveSpeed: number;
  /** Default agent turn rate, radians per second. */
  rotationSpeed: number;
  /** Default distance at which a waypoint counts as reached. */
  arrivalThreshold: number;
  /** Seconds spent in stuck before searching again. */
  retryCooldown: number;
  /** Length of the rolling window used for stuck detection, seconds. */
  progressWindow: number;
  /** Displacement below which a window counts as no progress. */
  minProgress: number;
  /** Accumulated no-progress time that triggers a re-plan. */
  stuckTimeout: number;
  /** Node expansion budget per search. */
  maxExplored: number;
}

export const NAV_DEFAULTS: Readonly<NavigationConfig> = Object.freeze({
  moveSpeed: 2,
  rotationSpeed: 5,
  arrivalThreshold: 0.4,
  retryCooldown: 0.5,
  progressWindow: 0.5,
  minProgress: 0.05,
  stuckTimeout: 1.5,
  maxExplored: 4096,
});

function requirePositive(config: NavigationConfig, field: keyof NavigationConfig): void {
  const value = config[field];
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(field, `must be a positive number, got ${value}`);
  }
}

/** Merge overrides onto NAV_DEFAULTS and validate the result. */
export function resolveNavigationConfig(overrides: Partial<NavigationConfig> = {}): NavigationConfig {
  const config: NavigationConfig = { ...NAV_DEFAULTS, ...overrides };

  requirePositive(config, "moveSpeed");
  requirePositive(config, "rotationSpeed");
  requirePositive(config, "arrivalThreshold");
  requirePositive(config, "progressWindow");
  requirePositive(config, "stuckTimeout");

  if (!Number.isFinite(config.retryCooldown) || config.retryCooldown < 0) {
    throw new ConfigError("retryCooldown", `must be zero or more, got ${config.retryCooldown}`);
  }
  if (!Number.isFinite(config.minProgress) || config.minProgress < 0) {
    throw new ConfigError("minProgress", `must be zero or more, got ${config.minProgress}`);
  }
  if (!Number.isInteger(config.maxExplored) || config.maxExplored < 1) {
    throw new ConfigError("maxExplored", `must be a positive integer, got ${config.maxExplored}`);
  }
  return config;
}
