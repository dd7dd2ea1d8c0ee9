import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { World } from "../ecs/World";
import { ComponentRegistry } from "../ecs/ComponentRegistry";
import {
  MOVEMENT_INTENT,
  PATHFINDER,
  TRANSFORM,
  type ComponentTypeMap,
  type NavState,
} from "../ecs/components";
import { createNavAgent, createObstacle } from "../entities";
import { clearAllEvents, onEvent } from "../core/EventBus";
import { ConfigError } from "../core/errors";
import { GridMap } from "../grid/GridMap";
import { resolveNavigationConfig, type NavigationConfig } from "../config/navigation";
import { createMovementSystem } from "./MovementSystem";
import {
  clearNavigationTarget,
  createPathfindingSystem,
  setNavigationTarget,
  turnTowards,
} from "./PathfindingSystem";

function setup(rows: string[], config: Partial<NavigationConfig> = {}) {
  const grid = GridMap.fromRows(rows);
  const world = new World<ComponentTypeMap>({ registry: new ComponentRegistry() });
  const pathfinding = createPathfindingSystem(grid, resolveNavigationConfig(config));
  const movement = createMovementSystem(grid);
  const step = (dt: number, times = 1) => {
    for (let i = 0; i < times; i++) {
      pathfinding(world, dt);
      movement(world, dt);
    }
  };
  return { grid, world, step };
}

const CORRIDOR = ["....."];

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  clearAllEvents();
  vi.restoreAllMocks();
});

describe("PathfindingSystem", () => {
  it("goes straight to idle when the target is the current cell", () => {
    const { world, step } = setup(["...", "...", "..."]);
    const agent = createNavAgent(world, { x: 1.5, z: 1.5 });
    const arrived = vi.fn();
    onEvent("nav:arrived", arrived);

    setNavigationTarget(world, agent, { kind: "cell", cell: { x: 1, y: 1 } });
    step(0.1);

    const pf = world.getComponent(agent, PATHFINDER);
    expect(pf?.state).toBe("idle");
    expect(pf?.target).toBeNull();
    expect(pf?.path).toEqual([{ x: 1, y: 1 }]);
    expect(arrived).toHaveBeenCalledWith({ entity: agent, cell: { x: 1, y: 1 } });
    expect(world.getComponent(agent, TRANSFORM)?.position).toEqual({ x: 1.5, y: 0.6, z: 1.5 });
  });

  it("follows the path to the goal and faces the direction of travel", () => {
    const { world, step } = setup(CORRIDOR);
    const agent = createNavAgent(world, { x: 0.5, z: 0.5 });
    const reached: number[] = [];
    onEvent("nav:waypoint-reached", ({ index }) => reached.push(index));
    const arrived = vi.fn();
    onEvent("nav:arrived", arrived);

    setNavigationTarget(world, agent, { kind: "cell", cell: { x: 4, y: 0 } });
    for (let i = 0; i < 100 && world.getComponent(agent, PATHFINDER)?.state !== "idle"; i++) {
      step(0.1);
    }

    const transform = world.getComponent(agent, TRANSFORM);
    expect(world.getComponent(agent, PATHFINDER)?.state).toBe("idle");
    expect(reached).toEqual([0, 1, 2, 3, 4]);
    expect(arrived).toHaveBeenCalledTimes(1);
    expect(arrived).toHaveBeenCalledWith({ entity: agent, cell: { x: 4, y: 0 } });
    expect(transform?.position.z).toBe(0.5);
    expect(Math.abs((transform?.position.x ?? 0) - 4.5)).toBeLessThanOrEqual(0.4 + 1e-9);
    expect(transform?.yaw).toBeCloseTo(Math.PI / 2, 9);
  });

  it("emits a movement intent capped by move speed and turn rate", () => {
    const { grid, world } = setup(CORRIDOR);
    const pathfinding = createPathfindingSystem(grid);
    const agent = createNavAgent(world, { x: 0.5, z: 0.5 }, { moveSpeed: 2, rotationSpeed: 5 });

    setNavigationTarget(world, agent, { kind: "cell", cell: { x: 4, y: 0 } });
    pathfinding(world, 0.1);

    const intent = world.getComponent(agent, MOVEMENT_INTENT);
    expect(intent?.velocity.x).toBeCloseTo(2, 9);
    expect(intent?.velocity.z).toBe(0);
    expect(intent?.yaw).toBeCloseTo(0.5, 9);
    // Transform is left to the movement integrator
    expect(world.getComponent(agent, TRANSFORM)?.position.x).toBe(0.5);
  });

  it("enters stuck on an unreachable goal and retries after the cooldown", () => {
    const { world, step } = setup(["...", "..#", "..."], { retryCooldown: 0.5 });
    const agent = createNavAgent(world, { x: 0.5, z: 0.5 });
    const failures: Array<{ reason: string; attempts: number }> = [];
    onEvent("nav:path-failed", ({ reason, attempts }) => failures.push({ reason, attempts }));

    setNavigationTarget(world, agent, { kind: "cell", cell: { x: 2, y: 1 } });
    step(0.25);

    expect(world.getComponent(agent, PATHFINDER)?.state).toBe("stuck");
    expect(console.warn).toHaveBeenCalledWith("[NAV] Entity 0v1: no-path from (0, 0) to (2, 1), attempt 1");

    step(0.25, 6);

    // Retries on ticks 3, 5 and 7
    expect(failures).toEqual([
      { reason: "no-path", attempts: 1 },
      { reason: "no-path", attempts: 2 },
      { reason: "no-path", attempts: 3 },
      { reason: "no-path", attempts: 4 },
    ]);
    expect(world.getComponent(agent, PATHFINDER)?.state).toBe("stuck");
    expect(world.getComponent(agent, TRANSFORM)?.position).toEqual({ x: 0.5, y: 0.6, z: 0.5 });
  });

  it("treats an off-map target as stuck without searching", () => {
    const { world, step } = setup(CORRIDOR);
    const agent = createNavAgent(world, { x: 0.5, z: 0.5 });
    const failed = vi.fn();
    onEvent("nav:path-failed", failed);

    setNavigationTarget(world, agent, { kind: "world", position: { x: 50, z: 0.5 } });
    step(0.1);

    const pf = world.getComponent(agent, PATHFINDER);
    expect(pf?.state).toBe("stuck");
    expect(pf?.explored).toEqual([]);
    expect(failed).toHaveBeenCalledWith({ entity: agent, reason: "out-of-bounds", attempts: 1 });
  });

  it("reports an exhausted search budget as its own failure", () => {
    const { world, step } = setup(CORRIDOR, { maxExplored: 1 });
    const agent = createNavAgent(world, { x: 0.5, z: 0.5 });
    const failed = vi.fn();
    onEvent("nav:path-failed", failed);

    setNavigationTarget(world, agent, { kind: "cell", cell: { x: 4, y: 0 } });
    step(0.1);

    expect(world.getComponent(agent, PATHFINDER)?.state).toBe("stuck");
    expect(failed).toHaveBeenCalledWith({ entity: agent, reason: "budget-exhausted", attempts: 1 });
  });

  it("re-plans when a dynamic obstacle stops all progress", () => {
    const { world, step } = setup(CORRIDOR);
    const agent = createNavAgent(world, { x: 0.5, z: 0.5 });
    createObstacle(world, { x: 2.5, z: 0.5 }, 0.4);

    const seen: Array<{ stuckTime: number; state: NavState | undefined }> = [];
    onEvent("nav:stuck-detected", ({ entity, stuckTime }) => {
      seen.push({ stuckTime, state: world.getComponent(entity, PATHFINDER)?.state });
    });
    const arrived = vi.fn();
    onEvent("nav:arrived", arrived);

    setNavigationTarget(world, agent, { kind: "cell", cell: { x: 4, y: 0 } });
    for (let i = 0; i < 60 && seen.length === 0; i++) step(0.1);

    expect(seen).toHaveLength(1);
    expect(seen[0].state).toBe("recalculating");
    expect(seen[0].stuckTime).toBeGreaterThanOrEqual(1.5);
    expect(arrived).not.toHaveBeenCalled();
    // Held back by body radius 0.3 plus obstacle radius 0.4
    expect(world.getComponent(agent, TRANSFORM)?.position.x).toBeLessThanOrEqual(1.8);

    step(0.1);
    expect(world.getComponent(agent, PATHFINDER)?.state).toBe("navigating");
  });

  it("routes around the cell where a dynamic obstacle stalled it", () => {
    const { world, step } = setup(["......", "......"]);
    const agent = createNavAgent(world, { x: 0.5, z: 0.5 });
    createObstacle(world, { x: 2.5, z: 0.5 }, 0.4);

    const avoided: Array<{ x: number; y: number }> = [];
    onEvent("nav:stuck-detected", ({ entity }) => {
      avoided.push(...(world.getComponent(entity, PATHFINDER)?.avoidCells ?? []));
    });
    const arrived = vi.fn();
    onEvent("nav:arrived", arrived);

    setNavigationTarget(world, agent, { kind: "cell", cell: { x: 5, y: 0 } });
    for (let i = 0; i < 300 && arrived.mock.calls.length === 0; i++) step(0.1);

    expect(avoided).toEqual([{ x: 2, y: 0 }]);
    expect(arrived).toHaveBeenCalledTimes(1);
    expect(arrived).toHaveBeenCalledWith({ entity: agent, cell: { x: 5, y: 0 } });
    expect(world.getComponent(agent, TRANSFORM)?.position.x).toBeGreaterThan(5);
    expect(world.getComponent(agent, PATHFINDER)?.avoidCells).toEqual([]);
  });

  it("freezes a disabled entity until it is enabled again", () => {
    const { world, step } = setup(CORRIDOR);
    const agent = createNavAgent(world, { x: 0.5, z: 0.5 });
    setNavigationTarget(world, agent, { kind: "cell", cell: { x: 4, y: 0 } });
    step(0.1, 3);

    world.setEntityEnabled(agent, false);
    const transform = world.getComponent(agent, TRANSFORM);
    const frozen = { x: transform?.position.x, z: transform?.position.z, yaw: transform?.yaw };
    step(0.1, 10);

    const after = world.getComponent(agent, TRANSFORM);
    expect({ x: after?.position.x, z: after?.position.z, yaw: after?.yaw }).toEqual(frozen);
    expect(world.getComponent(agent, PATHFINDER)?.state).toBe("navigating");

    world.setEntityEnabled(agent, true);
    step(0.1);
    expect(world.getComponent(agent, TRANSFORM)?.position.x).toBeGreaterThan(frozen.x ?? Infinity);
  });

  it("freezes an entity whose Pathfinder is disabled", () => {
    const { world, step } = setup(CORRIDOR);
    const agent = createNavAgent(world, { x: 0.5, z: 0.5 });
    setNavigationTarget(world, agent, { kind: "cell", cell: { x: 4, y: 0 } });
    step(0.1, 2);

    world.mutateComponent(agent, PATHFINDER, (pf) => {
      pf.enabled = false;
    });
    const before = world.getComponent(agent, TRANSFORM);
    const frozen = { x: before?.position.x, yaw: before?.yaw };
    step(0.1, 5);

    const after = world.getComponent(agent, TRANSFORM);
    expect({ x: after?.position.x, yaw: after?.yaw }).toEqual(frozen);
  });

  it("freezes an entity whose Transform is disabled", () => {
    const { world, step } = setup(CORRIDOR);
    const agent = createNavAgent(world, { x: 0.5, z: 0.5 });
    setNavigationTarget(world, agent, { kind: "cell", cell: { x: 4, y: 0 } });
    step(0.1, 3);

    world.mutateComponent(agent, TRANSFORM, (transform) => {
      transform.enabled = false;
    });
    const before = world.getComponent(agent, TRANSFORM);
    const frozen = { x: before?.position.x, z: before?.position.z, yaw: before?.yaw };
    const pf = world.getComponent(agent, PATHFINDER);
    const plan = { state: pf?.state, currentIndex: pf?.currentIndex, progressElapsed: pf?.progressElapsed };
    step(0.1, 10);

    const after = world.getComponent(agent, TRANSFORM);
    expect({ x: after?.position.x, z: after?.position.z, yaw: after?.yaw }).toEqual(frozen);
    const pfAfter = world.getComponent(agent, PATHFINDER);
    expect({ state: pfAfter?.state, currentIndex: pfAfter?.currentIndex, progressElapsed: pfAfter?.progressElapsed }).toEqual(plan);
    expect(plan.state).toBe("navigating");

    world.mutateComponent(agent, TRANSFORM, (transform) => {
      transform.enabled = true;
    });
    step(0.1);
    expect(world.getComponent(agent, TRANSFORM)?.position.x).toBeGreaterThan(frozen.x ?? Infinity);
  });

  it("adds a MovementIntent to entities created without one", () => {
    const { grid, world } = setup(CORRIDOR);
    const pathfinding = createPathfindingSystem(grid);
    const e = world.spawn();
    world.addComponent(e, TRANSFORM, { position: { x: 0.5, y: 0, z: 0.5 }, yaw: 0, scale: { x: 1, y: 1, z: 1 } });
    world.addComponent(e, PATHFINDER, {
      target: { kind: "cell", cell: { x: 2, y: 0 } },
      path: [],
      currentIndex: 0,
      state: "recalculating",
      moveSpeed: 1,
      rotationSpeed: 1,
      arrivalThreshold: 0.1,
      stuckTimer: 0,
      progressAnchor: null,
      progressElapsed: 0,
      retryCooldown: 0,
      failedAttempts: 0,
      explored: [],
      avoidCells: [],
    });

    pathfinding(world, 0.1);

    expect(world.getComponent(e, MOVEMENT_INTENT)?.velocity.x).toBeCloseTo(1, 9);
  });
});

describe("createPathfindingSystem", () => {
  it("rejects an arrival threshold that reaches into neighbouring cells", () => {
    const grid = GridMap.fromRows(["...."], 0.5);

    expect(() => createPathfindingSystem(grid, resolveNavigationConfig())).toThrow(ConfigError);
    expect(() => createPathfindingSystem(grid, resolveNavigationConfig())).toThrow(
      'Invalid config "arrivalThreshold": must be below half the cell size (0.25), got 0.4'
    );
    expect(() => createPathfindingSystem(grid, resolveNavigationConfig({ arrivalThreshold: 0.2 }))).not.toThrow();
  });
});

describe("navigation targets", () => {
  it("cancels the current route when retargeted", () => {
    const { world, step } = setup(CORRIDOR);
    const agent = createNavAgent(world, { x: 0.5, z: 0.5 });
    setNavigationTarget(world, agent, { kind: "cell", cell: { x: 4, y: 0 } });
    step(0.1);
    expect(world.getComponent(agent, PATHFINDER)?.state).toBe("navigating");

    expect(setNavigationTarget(world, agent, { kind: "cell", cell: { x: 0, y: 0 } })).toBe(true);
    const pf = world.getComponent(agent, PATHFINDER);
    expect(pf?.state).toBe("recalculating");
    expect(pf?.path).toEqual([]);
  });

  it("returns to idle when the target is cleared", () => {
    const { world, step } = setup(CORRIDOR);
    const agent = createNavAgent(world, { x: 0.5, z: 0.5 });
    setNavigationTarget(world, agent, { kind: "cell", cell: { x: 4, y: 0 } });
    step(0.1);

    expect(clearNavigationTarget(world, agent)).toBe(true);
    step(0.1);

    const pf = world.getComponent(agent, PATHFINDER);
    expect(pf?.state).toBe("idle");
    expect(pf?.target).toBeNull();
    expect(world.getComponent(agent, MOVEMENT_INTENT)?.velocity).toEqual({ x: 0, z: 0 });
  });

  it("refuses entities without a Pathfinder or with stale handles", () => {
    const { world } = setup(CORRIDOR);
    const plain = world.spawn();
    const agent = createNavAgent(world, { x: 0.5, z: 0.5 });
    world.despawn(agent);

    expect(setNavigationTarget(world, plain, { kind: "cell", cell: { x: 1, y: 0 } })).toBe(false);
    expect(setNavigationTarget(world, agent, { kind: "cell", cell: { x: 1, y: 0 } })).toBe(false);
    expect(clearNavigationTarget(world, agent)).toBe(false);
  });
});

describe("turnTowards", () => {
  it("limits the turn to the maximum step", () => {
    expect(turnTowards(0, Math.PI / 2, 0.5)).toBeCloseTo(0.5, 12);
    expect(turnTowards(0, 0.2, 1)).toBeCloseTo(0.2, 12);
  });

  it("turns the short way across ±π", () => {
    expect(turnTowards(3, -3, 1)).toBeCloseTo(-3, 9);
  });
});
