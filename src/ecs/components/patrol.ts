// Patrol route - a bot that cycles through waypoints

import { componentRegistry, type ComponentRegistration } from "../ComponentRegistry";
import type { WorldPoint } from "../../grid/GridMap";

export const PATROL_ROUTE = "PatrolRoute";

export interface PatrolRoute {
  waypoints: WorldPoint[];
  currentIndex: number;
  loop: boolean;            // Wrap to the first waypoint after the last
  elapsed: number;          // Seconds since the route started
  duration: number | null;  // Route stops after this long; null = forever
  finished: boolean;
  enabled?: boolean;
}

/** Self-update: only the route's own clock, it never touches navigation. */
export const patrolRouteRegistration: ComponentRegistration<PatrolRoute> = {
  key: PATROL_ROUTE,
  update(route, _entity, dt) {
    if (route.finished) return;
    route.elapsed += dt;
    if (route.duration !== null && route.elapsed >= route.duration) {
      route.finished = true;
    }
  },
};

componentRegistry.register(patrolRouteRegistration);
