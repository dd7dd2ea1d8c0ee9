import type { System } from "../ecs/Scheduler";
import type { Entity } from "../ecs/types";
import {
  LABEL,
  PATHFINDER,
  TRANSFORM,
  type ComponentTypeMap,
  type NavState,
  type NavTarget,
  type NavWorld,
} from "../ecs/components";
import type { GridCell } from "../grid/GridMap";

/** Read-only navigation snapshot of one entity, for minimaps and debug views. */
export interface NavigationDebugRow {
  entity: Entity;
  name: string | null;
  position: { x: number; z: number };
  yaw: number;
  state: NavState;
  target: NavTarget | null;
  path: readonly GridCell[];
  currentIndex: number;
  explored: readonly GridCell[];
}

/** Snapshot every entity carrying a Transform and a Pathfinder, ascending by slot. */
export function buildNavigationDebugView(world: NavWorld): NavigationDebugRow[] {
  return world.query(TRANSFORM, PATHFINDER).map(([entity, transform, pf]) => ({
    entity,
    name: world.getComponent(entity, LABEL)?.name ?? null,
    position: { x: transform.position.x, z: transform.position.z },
    yaw: transform.yaw,
    state: pf.state,
    target: pf.target,
    path: pf.path,
    currentIndex: pf.currentIndex,
    explored: pf.explored,
  }));
}

/**
 * DebugOverlaySystem - hands the navigation snapshot to an external consumer
 * every `every` ticks (render phase).
 */
export function createDebugOverlaySystem(
  publish: (rows: NavigationDebugRow[]) => void,
  every: number = 1
): System<ComponentTypeMap> {
  if (!Number.isInteger(every) || every < 1) {
    throw new RangeError(`Overlay interval must be a positive integer, got ${every}`);
  }
  let counter = 0;

  return (world: NavWorld) => {
    counter++;
    if (counter < every) return;
    counter = 0;
    publish(buildNavigationDebugView(world));
  };
}
