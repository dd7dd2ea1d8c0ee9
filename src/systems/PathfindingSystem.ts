import * as THREE from "three";
import type { System } from "../ecs/Scheduler";
import { entityKey, type Entity } from "../ecs/types";
import {
  MOVEMENT_INTENT,
  PATHFINDER,
  TRANSFORM,
  emptyIntent,
  type ComponentTypeMap,
  type MovementIntent,
  type NavTarget,
  type NavWorld,
  type Pathfinder,
  type Transform,
} from "../ecs/components";
import { emitEvent } from "../core/EventBus";
import { ConfigError } from "../core/errors";
import type { PathFailureReason } from "../core/EventTypes";
import { logger } from "../core/Logger";
import { PathSearch } from "../core/PathSearch";
import { resolveNavigationConfig, type NavigationConfig } from "../config/navigation";
import { cellKey, sameCell, type GridCell, type GridMap } from "../grid/GridMap";

/** Rotate `current` toward `desired` by at most `maxStep` radians. Result in [-π, π). */
export function turnTowards(current: number, desired: number, maxStep: number): number {
  const diff = wrapAngle(desired - current);
  return wrapAngle(current + THREE.MathUtils.clamp(diff, -maxStep, maxStep));
}

export function wrapAngle(angle: number): number {
  return THREE.MathUtils.euclideanModulo(angle + Math.PI, Math.PI * 2) - Math.PI;
}

/** Point `target` at a new goal; the next tick plans a fresh route. */
export function setNavigationTarget(world: NavWorld, entity: Entity, target: NavTarget): boolean {
  const updated = world.mutateComponent(entity, PATHFINDER, (pf) => {
    pf.target = target;
    pf.state = "recalculating";
    pf.path = [];
    pf.currentIndex = 0;
    pf.failedAttempts = 0;
    pf.retryCooldown = 0;
    pf.avoidCells = [];
    resetProgress(pf);
    return true;
  });
  return updated ?? false;
}

/** Drop the current goal and stop. */
export function clearNavigationTarget(world: NavWorld, entity: Entity): boolean {
  const updated = world.mutateComponent(entity, PATHFINDER, (pf) => {
    pf.target = null;
    pf.state = "idle";
    pf.path = [];
    pf.currentIndex = 0;
    pf.retryCooldown = 0;
    pf.avoidCells = [];
    resetProgress(pf);
    return true;
  });
  return updated ?? false;
}

function resetProgress(pf: Pathfinder): void {
  pf.stuckTimer = 0;
  pf.progressAnchor = null;
  pf.progressElapsed = 0;
}

/** Everything the apply phase writes back for one entity. */
interface NavigationDecision {
  entity: Entity;
  next: Pathfinder;
  intent: MovementIntent;
  // Deferred until every write has landed, so handlers see a consistent world
  events: Array<() => void>;
}

/**
 * PathfindingSystem - drives each Pathfinder through its state machine
 *
 * idle           nothing to do
 * recalculating  A* from the current cell to the target cell
 *                  found  → navigating (same tick)
 *                  failed → stuck, with a retry cooldown
 * navigating     steer toward path[currentIndex]; advance on arrival,
 *                idle at the end; re-plan when progress stalls
 * stuck          wait out the cooldown, then recalculating (same tick)
 *
 * The system never touches Transform. It writes a MovementIntent that the
 * movement integrator applies in the physics phase.
 *
 * Two passes per tick: decisions are computed while Transform and
 * Pathfinder are shared-borrowed, then written back one entity at a time.
 */
export function createPathfindingSystem(
  grid: GridMap,
  config: NavigationConfig = resolveNavigationConfig()
): System<ComponentTypeMap> {
  // A waypoint must only count as reached from inside its own cell
  if (config.arrivalThreshold >= grid.cellSize / 2) {
    throw new ConfigError(
      "arrivalThreshold",
      `must be below half the cell size (${grid.cellSize / 2}), got ${config.arrivalThreshold}`
    );
  }
  const search = new PathSearch(grid);

  const goalCell = (target: NavTarget): GridCell =>
    target.kind === "cell" ? target.cell : grid.worldToCell(target.position);

  function fail(
    decision: NavigationDecision,
    reason: PathFailureReason,
    from: GridCell,
    to: GridCell
  ): void {
    const { entity, next } = decision;
    next.state = "stuck";
    next.path = [];
    next.currentIndex = 0;
    next.retryCooldown = config.retryCooldown;
    next.failedAttempts++;
    resetProgress(next);

    const attempts = next.failedAttempts;
    logger.warn(
      "NAV",
      `Entity ${entityKey(entity)}: ${reason} from (${from.x}, ${from.y}) to (${to.x}, ${to.y}), attempt ${attempts}`
    );
    decision.events.push(() => emitEvent("nav:path-failed", { entity, reason, attempts }));
  }

  function recalculate(decision: NavigationDecision, transform: Readonly<Transform>, dt: number): void {
    const { entity, next } = decision;
    if (!next.target) {
      next.state = "idle";
      return;
    }

    const start = grid.worldToCell({ x: transform.position.x, z: transform.position.z });
    const goal = goalCell(next.target);

    // Off-map input never reaches the search
    if (grid.cellState(start.x, start.y) === "out-of-bounds" || grid.cellState(goal.x, goal.y) === "out-of-bounds") {
      next.explored = [];
      fail(decision, "out-of-bounds", start, goal);
      return;
    }

    const avoid = new Set(next.avoidCells.map(cellKey));
    let result = search.findPath(start, goal, { maxExplored: config.maxExplored, avoid });
    if (result.status === "no-path" && avoid.size > 0) {
      logger.debug(
        "NAV",
        `Entity ${entityKey(entity)}: no detour around ${avoid.size} stalled cell(s), taking the direct route`
      );
      next.avoidCells = [];
      result = search.findPath(start, goal, { maxExplored: config.maxExplored });
    }
    next.explored = result.explored;

    if (result.status !== "found") {
      fail(decision, result.status, start, goal);
      return;
    }

    next.path = result.path;
    next.currentIndex = 0;
    next.failedAttempts = 0;
    next.state = "navigating";
    resetProgress(next);

    const { path, cost } = result;
    const explored = result.explored.length;
    logger.debug("NAV", `Entity ${entityKey(entity)}: ${path.length}-cell path, cost ${cost.toFixed(3)}`);
    decision.events.push(() => emitEvent("nav:path-found", { entity, path, cost, explored }));

    navigate(decision, transform, dt);
  }

  function navigate(decision: NavigationDecision, transform: Readonly<Transform>, dt: number): void {
    const { entity, next, intent } = decision;
    const position = new THREE.Vector2(transform.position.x, transform.position.z);

    // Advance past every waypoint already within reach
    while (next.currentIndex < next.path.length) {
      const cell = next.path[next.currentIndex];
      const waypoint = grid.cellToWorld(cell.x, cell.y);
      if (position.distanceTo(new THREE.Vector2(waypoint.x, waypoint.z)) > next.arrivalThreshold) break;

      const index = next.currentIndex;
      decision.events.push(() => emitEvent("nav:waypoint-reached", { entity, cell, index }));
      next.currentIndex++;
    }

    if (next.currentIndex >= next.path.length) {
      const cell = next.path[next.path.length - 1];
      next.state = "idle";
      next.target = null;
      next.avoidCells = [];
      resetProgress(next);
      if (cell) {
        decision.events.push(() => emitEvent("nav:arrived", { entity, cell }));
      }
      return;
    }

    // Rolling progress window
    if (!next.progressAnchor) {
      next.progressAnchor = { x: position.x, z: position.y };
      next.progressElapsed = 0;
    }
    next.progressElapsed += dt;
    if (next.progressElapsed >= config.progressWindow) {
      const moved = position.distanceTo(new THREE.Vector2(next.progressAnchor.x, next.progressAnchor.z));
      next.stuckTimer = moved < config.minProgress ? next.stuckTimer + next.progressElapsed : 0;
      next.progressAnchor = { x: position.x, z: position.y };
      next.progressElapsed = 0;
    }

    if (next.stuckTimer >= config.stuckTimeout) {
      const stuckTime = next.stuckTimer;
      // The next waypoint outside the current cell is where the body got held back
      const here = grid.worldToCell({ x: position.x, z: position.y });
      const stalled = next.path.slice(next.currentIndex).find((cell) => !sameCell(cell, here));
      if (stalled && !next.avoidCells.some((cell) => sameCell(cell, stalled))) {
        next.avoidCells = [...next.avoidCells, { x: stalled.x, y: stalled.y }];
      }
      logger.warn(
        "NAV",
        `Entity ${entityKey(entity)}: no progress for ${stuckTime.toFixed(2)}s` +
          (stalled ? ` before (${stalled.x}, ${stalled.y})` : "") +
          ", re-planning"
      );
      next.state = "recalculating";
      next.path = [];
      next.currentIndex = 0;
      resetProgress(next);
      decision.events.push(() => emitEvent("nav:stuck-detected", { entity, stuckTime }));
      return;
    }

    const cell = next.path[next.currentIndex];
    const waypoint = grid.cellToWorld(cell.x, cell.y);
    const toWaypoint = new THREE.Vector2(waypoint.x - position.x, waypoint.z - position.y);
    const distance = toWaypoint.length();

    // Never overshoot the waypoint within one tick
    const speed = Math.min(next.moveSpeed, distance / dt);
    toWaypoint.normalize().multiplyScalar(speed);
    intent.velocity = { x: toWaypoint.x, z: toWaypoint.y };
    intent.yaw = turnTowards(
      transform.yaw,
      Math.atan2(waypoint.x - position.x, waypoint.z - position.y),
      next.rotationSpeed * dt
    );
  }

  function decide(entity: Entity, transform: Readonly<Transform>, pf: Readonly<Pathfinder>, dt: number): NavigationDecision {
    const decision: NavigationDecision = {
      entity,
      next: { ...pf, progressAnchor: pf.progressAnchor ? { ...pf.progressAnchor } : null },
      intent: emptyIntent(),
      events: [],
    };
    const { next } = decision;

    switch (next.state) {
      case "idle":
        break;
      case "recalculating":
        recalculate(decision, transform, dt);
        break;
      case "navigating":
        navigate(decision, transform, dt);
        break;
      case "stuck":
        next.retryCooldown -= dt;
        if (next.retryCooldown <= 0) {
          next.retryCooldown = 0;
          next.state = "recalculating";
          recalculate(decision, transform, dt);
        }
        break;
    }
    return decision;
  }

  return (world: NavWorld, dt: number) => {
    // Phase 1: collect (shared borrows on Transform and Pathfinder)
    const decisions: NavigationDecision[] = [];
    world.forEach([TRANSFORM, PATHFINDER], (entity, transform, pf) => {
      if (!world.isActive(entity, TRANSFORM, PATHFINDER)) return;
      decisions.push(decide(entity, transform, pf, dt));
    });

    // Phase 2: apply (one exclusive borrow at a time)
    for (const { entity, next, intent } of decisions) {
      world.mutateComponent(entity, PATHFINDER, (pf) => {
        Object.assign(pf, next);
      });
      if (world.hasComponent(entity, MOVEMENT_INTENT)) {
        world.mutateComponent(entity, MOVEMENT_INTENT, (current) => {
          current.velocity = intent.velocity;
          current.yaw = intent.yaw;
        });
      } else {
        world.addComponent(entity, MOVEMENT_INTENT, intent);
      }
    }

    for (const decision of decisions) {
      for (const emit of decision.events) emit();
    }
  };
}
