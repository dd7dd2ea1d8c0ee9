import { describe, it, expect } from "vitest";
import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { loadLevel, parseLevelDescription, readLevelFile } from "./LevelLoader";
import { LevelFormatError } from "../core/errors";

describe("loadLevel", () => {
  it("treats '#' and digits 1-9 as walls and '.', '0', ' ' as floor", () => {
    const level = loadLevel({ rows: ["1#.", "0 9"] });

    expect(level.grid.toRows()).toEqual(["##.", "..#"]);
    expect(level.name).toBe("untitled");
    expect(level.bots).toEqual([]);
  });

  it("carries cell size and origin into the grid", () => {
    const level = loadLevel({ name: "hall", cellSize: 2, origin: { x: 4, z: 0 }, rows: ["..", ".."] });

    expect(level.name).toBe("hall");
    expect(level.grid.cellToWorld(1, 0)).toEqual({ x: 7, z: 1 });
  });

  it("rejects ragged rows and unknown characters", () => {
    expect(() => loadLevel({ rows: ["...", ".."] })).toThrow("Row 1 has length 2, expected 3");
    expect(() => loadLevel({ rows: [".x."] })).toThrow("Unknown cell 'x' at (1, 0)");
    expect(() => loadLevel({ rows: [""] })).toThrow(LevelFormatError);
    expect(() => loadLevel({ rows: ["."], cellSize: 0 })).toThrow(LevelFormatError);
  });
});

describe("parseLevelDescription", () => {
  it("accepts a full description", () => {
    const description = parseLevelDescription({
      name: "yard",
      rows: ["..", ".."],
      bots: [{ name: "a", spawn: { x: 0.5, z: 0.5 }, patrol: [{ x: 1.5, z: 1.5 }], moveSpeed: 3 }],
      obstacles: [{ position: { x: 1, z: 1 }, radius: 0.25 }],
    });

    expect(description.bots).toEqual([{ name: "a", spawn: { x: 0.5, z: 0.5 }, patrol: [{ x: 1.5, z: 1.5 }], moveSpeed: 3 }]);
    expect(description.obstacles).toEqual([{ position: { x: 1, z: 1 }, radius: 0.25 }]);
  });

  it("names the offending field", () => {
    expect(() => parseLevelDescription([])).toThrow("Level must be a JSON object");
    expect(() => parseLevelDescription({ rows: [] })).toThrow(`"rows" must be a non-empty array of strings`);
    expect(() => parseLevelDescription({ rows: [".", 3] })).toThrow(`"rows[1]" must be a string`);
    expect(() => parseLevelDescription({ rows: ["."], bots: [{ spawn: { x: 1 } }] })).toThrow(
      `"bots[0].spawn.z" must be a finite number`
    );
    expect(() => parseLevelDescription({ rows: ["."], obstacles: [{ position: { x: 0, z: 0 }, radius: -1 }] })).toThrow(
      `"obstacles[0].radius" must be positive`
    );
  });
});

describe("readLevelFile", () => {
  it("reads and loads a level from disk", () => {
    const dir = mkdtempSync(join(tmpdir(), "gridnav-"));
    const path = join(dir, "level.json");
    writeFileSync(path, JSON.stringify({ name: "disk", rows: ["#.", ".#"] }));

    const level = readLevelFile(path);

    expect(level.name).toBe("disk");
    expect(level.grid.walkableCount()).toBe(2);
  });

  it("wraps unreadable files in a LevelFormatError", () => {
    const dir = mkdtempSync(join(tmpdir(), "gridnav-"));
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");

    expect(() => readLevelFile(path)).toThrow(LevelFormatError);
    expect(() => readLevelFile(join(dir, "missing.json"))).toThrow(`Cannot read level "${join(dir, "missing.json")}"`);
  });
});
