import type { Entity } from "../../src/ecs/types";
import type { NavTarget } from "../../src/ecs/components";
import type { NavigationDebugRow } from "../../src/systems/DebugOverlaySystem";
import type { Level } from "../../src/grid/LevelLoader";
import type { AgentState, LevelInfo } from "./types";

// Socket payloads arrive untyped at run time; everything is checked here

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function parseEntityRef(value: unknown): Entity | null {
  if (!isRecord(value)) return null;
  const { index, generation } = value;
  if (!Number.isInteger(index) || !Number.isInteger(generation)) return null;
  if (!isFiniteNumber(index) || !isFiniteNumber(generation) || index < 0 || generation < 1) return null;
  return { index, generation };
}

/** The `entity` field of a `{ entity }` payload, or null when malformed. */
export function parseEntityPayload(value: unknown): Entity | null {
  return isRecord(value) ? parseEntityRef(value.entity) : null;
}

export function parsePoint(value: unknown): { x: number; z: number } | null {
  if (!isRecord(value) || !isFiniteNumber(value.x) || !isFiniteNumber(value.z)) return null;
  return { x: value.x, z: value.z };
}

/** A `nav:set-target` payload, or null when malformed. */
export function parseTargetRequest(value: unknown): { entity: Entity; target: NavTarget } | null {
  if (!isRecord(value)) return null;
  const entity = parseEntityRef(value.entity);
  if (!entity) return null;

  if (isRecord(value.cell)) {
    const { x, y } = value.cell;
    if (!isFiniteNumber(x) || !isFiniteNumber(y) || !Number.isInteger(x) || !Number.isInteger(y)) return null;
    return { entity, target: { kind: "cell", cell: { x, y } } };
  }
  const position = parsePoint(value.position);
  if (!position) return null;
  return { entity, target: { kind: "world", position } };
}

export function toAgentStates(rows: readonly NavigationDebugRow[], includeExplored: boolean): AgentState[] {
  return rows.map((row) => {
    const state: AgentState = {
      entity: { index: row.entity.index, generation: row.entity.generation },
      name: row.name,
      position: { x: row.position.x, z: row.position.z },
      yaw: row.yaw,
      state: row.state,
      path: row.path.map((cell) => ({ x: cell.x, y: cell.y })),
      currentIndex: row.currentIndex,
    };
    if (includeExplored) {
      state.explored = row.explored.map((cell) => ({ x: cell.x, y: cell.y }));
    }
    return state;
  });
}

export function toLevelInfo(level: Level): LevelInfo {
  const { grid } = level;
  return {
    name: level.name,
    width: grid.width,
    height: grid.height,
    cellSize: grid.cellSize,
    origin: { x: grid.origin.x, z: grid.origin.z },
    rows: grid.toRows(),
  };
}
