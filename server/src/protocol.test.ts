import { describe, it, expect } from "vitest";
import { loadLevel } from "../../src/grid/LevelLoader";
import type { NavigationDebugRow } from "../../src/systems/DebugOverlaySystem";
import { parseEntityPayload, parseEntityRef, parsePoint, parseTargetRequest, toAgentStates, toLevelInfo } from "./protocol";

const entity = { index: 3, generation: 2 };

describe("protocol parsing", () => {
  it("accepts well-formed entity refs only", () => {
    expect(parseEntityRef({ index: 3, generation: 2 })).toEqual(entity);
    expect(parseEntityRef({ index: -1, generation: 1 })).toBeNull();
    expect(parseEntityRef({ index: 0, generation: 0 })).toBeNull();
    expect(parseEntityRef({ index: 1.5, generation: 1 })).toBeNull();
    expect(parseEntityRef("0v1")).toBeNull();
  });

  it("reads the entity field of a payload", () => {
    expect(parseEntityPayload({ entity: { index: 3, generation: 2 } })).toEqual(entity);
    expect(parseEntityPayload({ entity: "3v2" })).toBeNull();
    expect(parseEntityPayload(undefined)).toBeNull();
  });

  it("reads points with finite coordinates", () => {
    expect(parsePoint({ x: 1.5, z: -2 })).toEqual({ x: 1.5, z: -2 });
    expect(parsePoint({ x: 1, z: Number.NaN })).toBeNull();
    expect(parsePoint([1, 2])).toBeNull();
  });

  it("builds cell and world targets", () => {
    expect(parseTargetRequest({ entity, cell: { x: 4, y: 1 } })).toEqual({
      entity,
      target: { kind: "cell", cell: { x: 4, y: 1 } },
    });
    expect(parseTargetRequest({ entity, position: { x: 2.5, z: 0.5 } })).toEqual({
      entity,
      target: { kind: "world", position: { x: 2.5, z: 0.5 } },
    });
  });

  it("rejects malformed target requests", () => {
    expect(parseTargetRequest({ entity, cell: { x: 0.5, y: 1 } })).toBeNull();
    expect(parseTargetRequest({ entity })).toBeNull();
    expect(parseTargetRequest({ cell: { x: 1, y: 1 } })).toBeNull();
    expect(parseTargetRequest(null)).toBeNull();
  });
});

describe("protocol snapshots", () => {
  const row: NavigationDebugRow = {
    entity,
    name: "scout",
    position: { x: 1.5, z: 0.5 },
    yaw: 0.5,
    state: "navigating",
    target: { kind: "cell", cell: { x: 2, y: 0 } },
    path: [{ x: 1, y: 0 }, { x: 2, y: 0 }],
    currentIndex: 1,
    explored: [{ x: 1, y: 0 }],
  };

  it("leaves explored cells out unless asked", () => {
    expect(toAgentStates([row], false)).toEqual([
      {
        entity,
        name: "scout",
        position: { x: 1.5, z: 0.5 },
        yaw: 0.5,
        state: "navigating",
        path: [{ x: 1, y: 0 }, { x: 2, y: 0 }],
        currentIndex: 1,
      },
    ]);
    expect(toAgentStates([row], true)[0].explored).toEqual([{ x: 1, y: 0 }]);
  });

  it("describes the level grid", () => {
    const level = loadLevel({ name: "tiny", rows: ["0.1", "..#"], cellSize: 2 });

    expect(toLevelInfo(level)).toEqual({
      name: "tiny",
      width: 3,
      height: 2,
      cellSize: 2,
      origin: { x: 0, z: 0 },
      rows: ["..#", "..#"],
    });
  });
});
