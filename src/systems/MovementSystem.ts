import * as THREE from "three";
import type { System } from "../ecs/Scheduler";
import { entityKey, sameEntity, type Entity } from "../ecs/types";
import {
  MOVEMENT_INTENT,
  OBSTACLE,
  TRANSFORM,
  type ComponentTypeMap,
  type NavWorld,
} from "../ecs/components";
import { logger } from "../core/Logger";
import { SpatialHash } from "../core/SpatialHash";
import type { GridMap } from "../grid/GridMap";

export interface MovementOptions {
  /** Radius of a moving body, used against obstacle radii. */
  bodyRadius?: number;
  /** Bucket size of the obstacle spatial hash. */
  hashCellSize?: number;
}

const MOVEMENT_DEFAULTS = {
  bodyRadius: 0.3,
  hashCellSize: 2,
};

interface PlacedObstacle {
  entity: Entity;
  x: number;
  z: number;
  radius: number;
}

interface PendingMove {
  entity: Entity;
  position: { x: number; z: number } | null; // null = step rejected
  yaw: number | null;
}

/**
 * MovementSystem - applies MovementIntent to Transform
 *
 * A step is rejected whole when it would end in a blocked or off-map cell, or
 * push the body deeper into an enabled Obstacle. Yaw always applies. The
 * intent is reset afterwards: steering systems must write it every tick.
 */
export function createMovementSystem(grid: GridMap, options: MovementOptions = {}): System<ComponentTypeMap> {
  const bodyRadius = options.bodyRadius ?? MOVEMENT_DEFAULTS.bodyRadius;
  const obstacles = new SpatialHash<PlacedObstacle>(options.hashCellSize ?? MOVEMENT_DEFAULTS.hashCellSize);

  function blockedByObstacle(entity: Entity, from: THREE.Vector2, to: THREE.Vector2, reach: number): boolean {
    for (const obstacle of obstacles.queryRadius(to.x, to.y, reach)) {
      if (sameEntity(obstacle.entity, entity)) continue;
      const centre = new THREE.Vector2(obstacle.x, obstacle.z);
      const limit = bodyRadius + obstacle.radius;
      const after = to.distanceTo(centre);
      // Moving out of an overlap is always allowed
      if (after < limit && after < from.distanceTo(centre)) return true;
    }
    return false;
  }

  return (world: NavWorld, dt: number) => {
    obstacles.clear();
    let largestRadius = 0;
    world.forEach([TRANSFORM, OBSTACLE], (entity, transform, obstacle) => {
      if (!world.isActive(entity, TRANSFORM, OBSTACLE)) return;
      const { x, z } = transform.position;
      obstacles.insert(x, z, { entity, x, z, radius: obstacle.radius });
      largestRadius = Math.max(largestRadius, obstacle.radius);
    });
    const reach = bodyRadius + largestRadius;

    const moves: PendingMove[] = [];
    world.forEach([TRANSFORM, MOVEMENT_INTENT], (entity, transform, intent) => {
      if (!world.isActive(entity, TRANSFORM, MOVEMENT_INTENT)) return;

      const { velocity } = intent;
      if (velocity.x === 0 && velocity.z === 0) {
        moves.push({ entity, position: null, yaw: intent.yaw });
        return;
      }

      const from = new THREE.Vector2(transform.position.x, transform.position.z);
      const to = new THREE.Vector2(from.x + velocity.x * dt, from.y + velocity.z * dt);
      const cell = grid.worldToCell({ x: to.x, z: to.y });

      let position: PendingMove["position"] = { x: to.x, z: to.y };
      if (!grid.isWalkable(cell.x, cell.y)) {
        logger.debug("MOVE", `Entity ${entityKey(entity)}: step into ${grid.cellState(cell.x, cell.y)} cell (${cell.x}, ${cell.y}) rejected`);
        position = null;
      } else if (obstacles.size > 0 && blockedByObstacle(entity, from, to, reach)) {
        logger.debug("MOVE", `Entity ${entityKey(entity)}: step blocked by obstacle`);
        position = null;
      }
      moves.push({ entity, position, yaw: intent.yaw });
    });

    for (const { entity, position, yaw } of moves) {
      world.mutateComponent(entity, TRANSFORM, (transform) => {
        if (yaw !== null) transform.yaw = yaw;
        if (position) {
          transform.position.x = position.x;
          transform.position.z = position.z;
        }
      });
      world.mutateComponent(entity, MOVEMENT_INTENT, (intent) => {
        intent.velocity = { x: 0, z: 0 };
        intent.yaw = null;
      });
    }
  };
}
