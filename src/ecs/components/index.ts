// Re-export all components from a single entry point

import type { World } from "../World";

export * from "./core";
export * from "./movement";
export * from "./pathfinding";
export * from "./patrol";
export * from "./collision";

// Import constants for ComponentTypeMap
import {
  TRANSFORM,
  LABEL,
  type Transform,
  type Label,
} from "./core";
import {
  MOVEMENT_INTENT,
  type MovementIntent,
} from "./movement";
import {
  PATHFINDER,
  type Pathfinder,
} from "./pathfinding";
import {
  PATROL_ROUTE,
  type PatrolRoute,
} from "./patrol";
import {
  OBSTACLE,
  type Obstacle,
} from "./collision";

// Component type map for generic lookups
export interface ComponentTypeMap {
  [TRANSFORM]: Transform;
  [LABEL]: Label;
  [MOVEMENT_INTENT]: MovementIntent;
  [PATHFINDER]: Pathfinder;
  [PATROL_ROUTE]: PatrolRoute;
  [OBSTACLE]: Obstacle;
}

/** World over the navigation component set. */
export type NavWorld = World<ComponentTypeMap>;
