/**
 * Static grid representation of a level.
 *
 * Grid system:
 * - Cells are identified by integer coordinates (x, y), row-major
 * - World space is the XZ plane: cell (x, y) spans
 *   [origin.x + x * cellSize, origin.x + (x + 1) * cellSize) on X and the
 *   same on Z with y
 * - Cell centres are the waypoints entities walk to
 */

export interface GridCell {
  x: number;
  y: number;
}

/** A point on the ground plane. */
export interface WorldPoint {
  x: number;
  z: number;
}

export type CellState = "walkable" | "blocked" | "out-of-bounds";

export interface GridMapOptions {
  width: number;
  height: number;
  cellSize?: number;
  origin?: WorldPoint;
  /** Row-major, length width * height. true = blocked. */
  blocked: readonly boolean[];
}

export class GridMap {
  readonly width: number;
  readonly height: number;
  readonly cellSize: number;
  readonly origin: Readonly<WorldPoint>;

  private readonly blocked: Uint8Array;

  constructor(options: GridMapOptions) {
    const { width, height } = options;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`Grid dimensions must be positive integers, got ${width}x${height}`);
    }
    if (options.blocked.length !== width * height) {
      throw new RangeError(`Expected ${width * height} cells, got ${options.blocked.length}`);
    }
    const cellSize = options.cellSize ?? 1;
    if (!(cellSize > 0) || !Number.isFinite(cellSize)) {
      throw new RangeError(`Cell size must be a positive number, got ${cellSize}`);
    }

    this.width = width;
    this.height = height;
    this.cellSize = cellSize;
    this.origin = Object.freeze({ ...(options.origin ?? { x: 0, z: 0 }) });
    this.blocked = Uint8Array.from(options.blocked, (b) => (b ? 1 : 0));
    Object.freeze(this);
  }

  /** Build from rows of text: '#' is blocked, anything else walkable. */
  static fromRows(rows: readonly string[], cellSize = 1, origin?: WorldPoint): GridMap {
    const height = rows.length;
    const width = height > 0 ? rows[0].length : 0;
    const blocked: boolean[] = [];
    for (const row of rows) {
      if (row.length !== width) {
        throw new RangeError(`Ragged grid: expected rows of ${width}, got ${row.length}`);
      }
      for (const ch of row) blocked.push(ch === "#");
    }
    return new GridMap({ width, height, cellSize, origin, blocked });
  }

  inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  cellState(x: number, y: number): CellState {
    if (!this.inBounds(x, y)) return "out-of-bounds";
    return this.blocked[y * this.width + x] === 1 ? "blocked" : "walkable";
  }

  isWalkable(x: number, y: number): boolean {
    return this.cellState(x, y) === "walkable";
  }

  /** Cell containing a world position. The result may lie outside the map. */
  worldToCell(position: WorldPoint): GridCell {
    return {
      x: Math.floor((position.x - this.origin.x) / this.cellSize),
      y: Math.floor((position.z - this.origin.z) / this.cellSize),
    };
  }

  /** World position of a cell's centre. */
  cellToWorld(x: number, y: number): WorldPoint {
    return {
      x: this.origin.x + (x + 0.5) * this.cellSize,
      z: this.origin.z + (y + 0.5) * this.cellSize,
    };
  }

  walkableCount(): number {
    let count = 0;
    for (const b of this.blocked) if (b === 0) count++;
    return count;
  }

  /** One string per row, '#' blocked and '.' walkable. */
  toRows(): string[] {
    const rows: string[] = [];
    for (let y = 0; y < this.height; y++) {
      let row = "";
      for (let x = 0; x < this.width; x++) {
        row += this.blocked[y * this.width + x] === 1 ? "#" : ".";
      }
      rows.push(row);
    }
    return rows;
  }
}

export function cellKey(cell: GridCell): string {
  return `${cell.x},${cell.y}`;
}

export function sameCell(a: GridCell, b: GridCell): boolean {
  return a.x === b.x && a.y === b.y;
}
