import {
  LABEL,
  MOVEMENT_INTENT,
  PATHFINDER,
  PATROL_ROUTE,
  TRANSFORM,
  emptyIntent,
  type NavWorld,
} from "../ecs/components";
import type { Entity } from "../ecs/types";
import { NAV_DEFAULTS } from "../config/navigation";
import type { WorldPoint } from "../grid/GridMap";

// Agent component defaults
const AGENT_DEFAULTS = {
  height: 0.6,
  moveSpeed: NAV_DEFAULTS.moveSpeed,
  rotationSpeed: NAV_DEFAULTS.rotationSpeed,
  arrivalThreshold: NAV_DEFAULTS.arrivalThreshold,
  patrol: {
    loop: true,
  },
};

export interface NavAgentOptions {
  name?: string;
  height?: number;
  yaw?: number;
  moveSpeed?: number;
  rotationSpeed?: number;
  arrivalThreshold?: number;
  /** Waypoints to cycle through; omit for an agent driven by explicit targets. */
  patrol?: WorldPoint[];
  loop?: boolean;
  /** Seconds after which the patrol stops. */
  patrolDuration?: number;
}

/**
 * Creates a navigating entity: Transform, Pathfinder, MovementIntent and,
 * when waypoints are given, a PatrolRoute.
 */
export function createNavAgent(world: NavWorld, position: WorldPoint, options: NavAgentOptions = {}): Entity {
  const entity = world.spawn();

  world.addComponent(entity, TRANSFORM, {
    position: { x: position.x, y: options.height ?? AGENT_DEFAULTS.height, z: position.z },
    yaw: options.yaw ?? 0,
    scale: { x: 1, y: 1, z: 1 },
  });

  world.addComponent(entity, PATHFINDER, {
    target: null,
    path: [],
    currentIndex: 0,
    state: "idle",
    moveSpeed: options.moveSpeed ?? AGENT_DEFAULTS.moveSpeed,
    rotationSpeed: options.rotationSpeed ?? AGENT_DEFAULTS.rotationSpeed,
    arrivalThreshold: options.arrivalThreshold ?? AGENT_DEFAULTS.arrivalThreshold,
    stuckTimer: 0,
    progressAnchor: null,
    progressElapsed: 0,
    retryCooldown: 0,
    failedAttempts: 0,
    explored: [],
    avoidCells: [],
  });

  world.addComponent(entity, MOVEMENT_INTENT, emptyIntent());

  if (options.name) {
    world.addComponent(entity, LABEL, { name: options.name });
  }

  if (options.patrol && options.patrol.length > 0) {
    world.addComponent(entity, PATROL_ROUTE, {
      waypoints: options.patrol.map((p) => ({ x: p.x, z: p.z })),
      currentIndex: 0,
      loop: options.loop ?? AGENT_DEFAULTS.patrol.loop,
      elapsed: 0,
      duration: options.patrolDuration ?? null,
      finished: false,
    });
  }

  return entity;
}
