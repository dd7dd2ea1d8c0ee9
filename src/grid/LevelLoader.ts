import { readFileSync } from "fs";
import { LevelFormatError } from "../core/errors";
import { logger } from "../core/Logger";
import { GridMap, type WorldPoint } from "./GridMap";

/**
 * Level description consumed at load time.
 *
 * rows: one string per grid row. '#' or '1'-'9' is a wall (the digit is the
 * wall style, which only the renderer cares about); '.', '0' or ' ' is floor.
 */
export interface LevelDescription {
  name?: string;
  cellSize?: number;
  origin?: WorldPoint;
  rows: string[];
  bots?: BotSpawn[];
  obstacles?: ObstacleSpawn[];
}

export interface BotSpawn {
  name?: string;
  spawn: WorldPoint;
  patrol?: WorldPoint[];
  moveSpeed?: number;
  rotationSpeed?: number;
}

export interface ObstacleSpawn {
  position: WorldPoint;
  radius: number;
}

export interface Level {
  name: string;
  grid: GridMap;
  bots: BotSpawn[];
  obstacles: ObstacleSpawn[];
}

const WALL_CHARS = new Set(["#", "1", "2", "3", "4", "5", "6", "7", "8", "9"]);
const FLOOR_CHARS = new Set([".", "0", " "]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new LevelFormatError(`"${field}" must be a finite number`);
  }
  return value;
}

function readPoint(value: unknown, field: string): WorldPoint {
  if (!isRecord(value)) throw new LevelFormatError(`"${field}" must be an object with x and z`);
  return { x: readNumber(value.x, `${field}.x`), z: readNumber(value.z, `${field}.z`) };
}

function readBot(value: unknown, index: number): BotSpawn {
  const field = `bots[${index}]`;
  if (!isRecord(value)) throw new LevelFormatError(`"${field}" must be an object`);

  const bot: BotSpawn = { spawn: readPoint(value.spawn, `${field}.spawn`) };
  if (value.name !== undefined) {
    if (typeof value.name !== "string") throw new LevelFormatError(`"${field}.name" must be a string`);
    bot.name = value.name;
  }
  if (value.patrol !== undefined) {
    if (!Array.isArray(value.patrol)) throw new LevelFormatError(`"${field}.patrol" must be an array`);
    bot.patrol = value.patrol.map((p: unknown, i: number) => readPoint(p, `${field}.patrol[${i}]`));
  }
  if (value.moveSpeed !== undefined) bot.moveSpeed = readNumber(value.moveSpeed, `${field}.moveSpeed`);
  if (value.rotationSpeed !== undefined) {
    bot.rotationSpeed = readNumber(value.rotationSpeed, `${field}.rotationSpeed`);
  }
  return bot;
}

function readObstacle(value: unknown, index: number): ObstacleSpawn {
  const field = `obstacles[${index}]`;
  if (!isRecord(value)) throw new LevelFormatError(`"${field}" must be an object`);
  const radius = readNumber(value.radius, `${field}.radius`);
  if (radius <= 0) throw new LevelFormatError(`"${field}.radius" must be positive`);
  return { position: readPoint(value.position, `${field}.position`), radius };
}

/** Validate an untrusted value (e.g. parsed JSON) as a level description. */
export function parseLevelDescription(value: unknown): LevelDescription {
  if (!isRecord(value)) throw new LevelFormatError("Level must be a JSON object");

  const { rows } = value;
  if (!Array.isArray(rows) || rows.length === 0) {
    throw new LevelFormatError(`"rows" must be a non-empty array of strings`);
  }
  const rowStrings = rows.map((row: unknown, i: number) => {
    if (typeof row !== "string") throw new LevelFormatError(`"rows[${i}]" must be a string`);
    return row;
  });

  const description: LevelDescription = { rows: rowStrings };
  if (value.name !== undefined) {
    if (typeof value.name !== "string") throw new LevelFormatError(`"name" must be a string`);
    description.name = value.name;
  }
  if (value.cellSize !== undefined) description.cellSize = readNumber(value.cellSize, "cellSize");
  if (value.origin !== undefined) description.origin = readPoint(value.origin, "origin");
  if (value.bots !== undefined) {
    if (!Array.isArray(value.bots)) throw new LevelFormatError(`"bots" must be an array`);
    description.bots = value.bots.map((bot: unknown, i: number) => readBot(bot, i));
  }
  if (value.obstacles !== undefined) {
    if (!Array.isArray(value.obstacles)) throw new LevelFormatError(`"obstacles" must be an array`);
    description.obstacles = value.obstacles.map((o: unknown, i: number) => readObstacle(o, i));
  }
  return description;
}

/** Build the immutable grid (and spawn lists) for a level description. */
export function loadLevel(description: LevelDescription): Level {
  const { rows } = description;
  const width = rows[0]?.length ?? 0;
  if (width === 0) throw new LevelFormatError("Level rows must not be empty");

  const blocked: boolean[] = [];
  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new LevelFormatError(`Row ${y} has length ${row.length}, expected ${width}`);
    }
    for (let x = 0; x < row.length; x++) {
      const ch = row[x];
      if (WALL_CHARS.has(ch)) blocked.push(true);
      else if (FLOOR_CHARS.has(ch)) blocked.push(false);
      else throw new LevelFormatError(`Unknown cell '${ch}' at (${x}, ${y})`);
    }
  });

  const cellSize = description.cellSize ?? 1;
  if (cellSize <= 0) throw new LevelFormatError(`"cellSize" must be positive`);

  const grid = new GridMap({
    width,
    height: rows.length,
    cellSize,
    origin: description.origin,
    blocked,
  });
  const name = description.name ?? "untitled";
  logger.info("LEVEL", `Loaded "${name}" (${grid.width}x${grid.height}, ${grid.walkableCount()} walkable cells)`);

  return {
    name,
    grid,
    bots: description.bots ?? [],
    obstacles: description.obstacles ?? [],
  };
}

/** Read, validate and load a level JSON file. */
export function readLevelFile(path: string): Level {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new LevelFormatError(`Cannot read level "${path}": ${reason}`);
  }
  return loadLevel(parseLevelDescription(raw));
}
