import { describe, it, expect } from "vitest";
import { World } from "../ecs/World";
import { ComponentRegistry } from "../ecs/ComponentRegistry";
import { MOVEMENT_INTENT, TRANSFORM, type ComponentTypeMap, type MovementIntent } from "../ecs/components";
import { createObstacle } from "../entities";
import { GridMap } from "../grid/GridMap";
import { createMovementSystem } from "./MovementSystem";

function setup(rows: string[]) {
  const grid = GridMap.fromRows(rows);
  const world = new World<ComponentTypeMap>({ registry: new ComponentRegistry() });
  const movement = createMovementSystem(grid);
  const mover = (x: number, z: number, intent: MovementIntent) => {
    const e = world.spawn();
    world.addComponent(e, TRANSFORM, { position: { x, y: 0, z }, yaw: 0, scale: { x: 1, y: 1, z: 1 } });
    world.addComponent(e, MOVEMENT_INTENT, intent);
    return e;
  };
  return { world, movement, mover };
}

describe("MovementSystem", () => {
  it("moves by velocity times dt, applies yaw and resets the intent", () => {
    const { world, movement, mover } = setup(["...", "...", "..."]);
    const e = mover(0.5, 0.5, { velocity: { x: 1, z: 0.5 }, yaw: 0.3 });

    movement(world, 0.5);

    expect(world.getComponent(e, TRANSFORM)?.position).toEqual({ x: 1, y: 0, z: 0.75 });
    expect(world.getComponent(e, TRANSFORM)?.yaw).toBe(0.3);
    expect(world.getComponent(e, MOVEMENT_INTENT)).toEqual({ velocity: { x: 0, z: 0 }, yaw: null });
  });

  it("rejects a step that ends in a blocked cell but still turns", () => {
    const { world, movement, mover } = setup([".#"]);
    const e = mover(0.5, 0.5, { velocity: { x: 2, z: 0 }, yaw: 1 });

    movement(world, 0.5);

    const transform = world.getComponent(e, TRANSFORM);
    expect(transform?.position).toEqual({ x: 0.5, y: 0, z: 0.5 });
    expect(transform?.yaw).toBe(1);
  });

  it("rejects a step off the map", () => {
    const { world, movement, mover } = setup([".."]);
    const e = mover(0.5, 0.5, { velocity: { x: -2, z: 0 }, yaw: null });

    movement(world, 0.5);

    expect(world.getComponent(e, TRANSFORM)?.position.x).toBe(0.5);
  });

  it("stops bodies from pushing into an obstacle but lets them back out", () => {
    const { world, movement, mover } = setup(["...."]);
    createObstacle(world, { x: 2, z: 0.5 }, 0.5);
    const approaching = mover(0.9, 0.5, { velocity: { x: 1, z: 0 }, yaw: null });
    const overlapping = mover(1.5, 0.5, { velocity: { x: -0.4, z: 0 }, yaw: null });

    movement(world, 0.5);

    expect(world.getComponent(approaching, TRANSFORM)?.position.x).toBe(0.9);
    expect(world.getComponent(overlapping, TRANSFORM)?.position.x).toBeCloseTo(1.3, 12);
  });

  it("ignores disabled obstacles", () => {
    const { world, movement, mover } = setup(["...."]);
    const obstacle = createObstacle(world, { x: 2, z: 0.5 }, 0.5);
    world.setEntityEnabled(obstacle, false);
    const e = mover(0.9, 0.5, { velocity: { x: 1, z: 0 }, yaw: null });

    movement(world, 0.5);

    expect(world.getComponent(e, TRANSFORM)?.position.x).toBeCloseTo(1.4, 12);
  });

  it("leaves disabled entities and intents untouched", () => {
    const { world, movement, mover } = setup(["...."]);
    const off = mover(0.5, 0.5, { velocity: { x: 1, z: 0 }, yaw: 1 });
    world.setEntityEnabled(off, false);
    const intentOff = mover(0.5, 0.5, { velocity: { x: 1, z: 0 }, yaw: 1, enabled: false });

    movement(world, 0.5);

    expect(world.getComponent(off, TRANSFORM)?.position.x).toBe(0.5);
    expect(world.getComponent(off, MOVEMENT_INTENT)?.velocity).toEqual({ x: 1, z: 0 });
    expect(world.getComponent(intentOff, TRANSFORM)?.yaw).toBe(0);
  });
});
