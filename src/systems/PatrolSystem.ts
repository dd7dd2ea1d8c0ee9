import type { System } from "../ecs/Scheduler";
import { entityKey, type Entity } from "../ecs/types";
import {
  PATHFINDER,
  PATROL_ROUTE,
  type ComponentTypeMap,
  type NavWorld,
} from "../ecs/components";
import { logger } from "../core/Logger";
import type { WorldPoint } from "../grid/GridMap";
import { setNavigationTarget } from "./PathfindingSystem";

interface Dispatch {
  entity: Entity;
  waypoint: WorldPoint | null;
  nextIndex: number;
  finished: boolean;
}

/**
 * PatrolSystem - feeds PatrolRoute waypoints to an idle Pathfinder
 *
 * Runs in the intent phase, before pathfinding, so a freshly dispatched
 * waypoint is planned in the same tick.
 */
export function createPatrolSystem(): System<ComponentTypeMap> {
  return (world: NavWorld) => {
    const dispatches: Dispatch[] = [];

    world.forEach([PATROL_ROUTE, PATHFINDER], (entity, route, pf) => {
      if (!world.isActive(entity, PATROL_ROUTE, PATHFINDER)) return;
      if (route.finished || pf.state !== "idle" || route.waypoints.length === 0) return;

      let index = route.currentIndex;
      if (index >= route.waypoints.length) {
        if (!route.loop) {
          dispatches.push({ entity, waypoint: null, nextIndex: index, finished: true });
          return;
        }
        index = 0;
      }
      dispatches.push({ entity, waypoint: route.waypoints[index], nextIndex: index + 1, finished: false });
    });

    for (const { entity, waypoint, nextIndex, finished } of dispatches) {
      world.mutateComponent(entity, PATROL_ROUTE, (route) => {
        route.currentIndex = nextIndex;
        if (finished) route.finished = true;
      });

      if (!waypoint) {
        logger.info("PATROL", `Entity ${entityKey(entity)}: route complete`);
        continue;
      }
      logger.debug(
        "PATROL",
        `Entity ${entityKey(entity)}: heading to waypoint ${nextIndex - 1} at (${waypoint.x.toFixed(2)}, ${waypoint.z.toFixed(2)})`
      );
      setNavigationTarget(world, entity, { kind: "world", position: { ...waypoint } });
    }
  };
}
