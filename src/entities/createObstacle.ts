import { OBSTACLE, TRANSFORM, type NavWorld } from "../ecs/components";
import type { Entity } from "../ecs/types";
import type { WorldPoint } from "../grid/GridMap";

/** Creates a dynamic circular blocker the grid map knows nothing about. */
export function createObstacle(world: NavWorld, position: WorldPoint, radius: number): Entity {
  if (!(radius > 0)) {
    throw new RangeError(`Obstacle radius must be positive, got ${radius}`);
  }
  const entity = world.spawn();
  world.addComponent(entity, TRANSFORM, {
    position: { x: position.x, y: 0, z: position.z },
    yaw: 0,
    scale: { x: radius * 2, y: 1, z: radius * 2 },
  });
  world.addComponent(entity, OBSTACLE, { radius });
  return entity;
}
