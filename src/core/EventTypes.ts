import type { Entity } from "../ecs/types";
import type { GridCell } from "../grid/GridMap";

/**
 * All events emitted by the simulation and their data types
 *
 * Naming convention: "domain:action"
 */

export interface PathFound {
  entity: Entity;
  path: readonly GridCell[];
  cost: number;
  explored: number;
}

export type PathFailureReason = "no-path" | "budget-exhausted" | "out-of-bounds";

export interface PathFailed {
  entity: Entity;
  reason: PathFailureReason;
  attempts: number;
}

export interface WaypointReached {
  entity: Entity;
  cell: GridCell;
  index: number;
}

export interface Arrived {
  entity: Entity;
  cell: GridCell;
}

export interface StuckDetected {
  entity: Entity;
  stuckTime: number;
}

export interface EntityDespawned {
  entity: Entity;
}

export interface EventMap {
  "nav:path-found": PathFound;
  "nav:path-failed": PathFailed;
  "nav:waypoint-reached": WaypointReached;
  "nav:arrived": Arrived;
  "nav:stuck-detected": StuckDetected;
  "entity:despawned": EntityDespawned;
}

export type EventName = keyof EventMap;
