import { World } from "./ecs/World";
import { Scheduler } from "./ecs/Scheduler";
import { componentRegistry, type ComponentRegistry } from "./ecs/ComponentRegistry";
import { entityKey, type Entity } from "./ecs/types";
import {
  PATROL_ROUTE,
  patrolRouteRegistration,
  type ComponentTypeMap,
  type NavTarget,
  type NavWorld,
} from "./ecs/components";
import { createNavAgent, createObstacle } from "./entities";
import { resolveNavigationConfig, type NavigationConfig } from "./config/navigation";
import { logger } from "./core/Logger";
import type { BotSpawn, Level } from "./grid/LevelLoader";

import { clearNavigationTarget, createPathfindingSystem, setNavigationTarget } from "./systems/PathfindingSystem";
import { createMovementSystem, type MovementOptions } from "./systems/MovementSystem";
import { createPatrolSystem } from "./systems/PatrolSystem";
import { createDebugOverlaySystem, type NavigationDebugRow } from "./systems/DebugOverlaySystem";

/** External requests, applied at the start of the next tick. */
export type SimulationCommand =
  | { type: "set-target"; entity: Entity; target: NavTarget }
  | { type: "clear-target"; entity: Entity }
  | { type: "spawn-bot"; bot: BotSpawn; onSpawned?: (entity: Entity) => void }
  | { type: "despawn"; entity: Entity };

export interface SimulationOptions {
  config?: Partial<NavigationConfig>;
  /** Self-update registry; defaults to the process-wide one. */
  registry?: ComponentRegistry;
  movement?: MovementOptions;
  overlay?: {
    publish: (rows: NavigationDebugRow[]) => void;
    every?: number;
  };
}

export interface Simulation {
  readonly world: NavWorld;
  readonly scheduler: Scheduler<ComponentTypeMap>;
  readonly level: Level;
  readonly config: NavigationConfig;
  enqueue(command: SimulationCommand): void;
  spawnBot(bot: BotSpawn): Entity;
  tick(dt: number): void;
}

/**
 * Builds a world for a level with every navigation system scheduled:
 *
 *   input        commands
 *   intent       patrol
 *   pathfinding  pathfinding
 *   physics      movement
 *   render       debug-overlay (when requested)
 *
 * Level bots and obstacles are spawned immediately.
 */
export function createSimulation(level: Level, options: SimulationOptions = {}): Simulation {
  const config = resolveNavigationConfig(options.config);
  const registry = options.registry ?? componentRegistry;
  if (!registry.has(PATROL_ROUTE)) {
    registry.register(patrolRouteRegistration);
  }

  const world: NavWorld = new World<ComponentTypeMap>({ registry });
  const scheduler = new Scheduler(world);
  const queue: SimulationCommand[] = [];

  const spawnBot = (bot: BotSpawn): Entity =>
    createNavAgent(world, bot.spawn, {
      name: bot.name,
      moveSpeed: bot.moveSpeed ?? config.moveSpeed,
      rotationSpeed: bot.rotationSpeed ?? config.rotationSpeed,
      arrivalThreshold: config.arrivalThreshold,
      patrol: bot.patrol,
    });

  function apply(command: SimulationCommand): void {
    switch (command.type) {
      case "set-target":
        if (!setNavigationTarget(world, command.entity, command.target)) {
          logger.warn("NAV", `Ignoring target for ${entityKey(command.entity)}: no live Pathfinder`);
        }
        break;
      case "clear-target":
        clearNavigationTarget(world, command.entity);
        break;
      case "spawn-bot": {
        const entity = spawnBot(command.bot);
        command.onSpawned?.(entity);
        break;
      }
      case "despawn":
        world.despawn(command.entity);
        break;
    }
  }

  scheduler
    .addSystem("input", "commands", () => {
      // Commands queued while draining wait for the next tick
      const pending = queue.splice(0, queue.length);
      for (const command of pending) apply(command);
    })
    .addSystem("intent", "patrol", createPatrolSystem())
    .addSystem("pathfinding", "pathfinding", createPathfindingSystem(level.grid, config))
    .addSystem("physics", "movement", createMovementSystem(level.grid, options.movement));

  if (options.overlay) {
    scheduler.addSystem("render", "debug-overlay", createDebugOverlaySystem(options.overlay.publish, options.overlay.every));
  }

  for (const bot of level.bots) spawnBot(bot);
  for (const obstacle of level.obstacles) createObstacle(world, obstacle.position, obstacle.radius);
  logger.info("NAV", `Simulation ready: ${level.bots.length} bots, ${level.obstacles.length} obstacles`);

  return {
    world,
    scheduler,
    level,
    config,
    enqueue: (command) => {
      queue.push(command);
    },
    spawnBot,
    tick: (dt) => scheduler.tick(dt),
  };
}
