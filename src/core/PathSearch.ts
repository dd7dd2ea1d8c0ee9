/**
 * A* search over a GridMap.
 *
 * - 8 neighbours: orthogonal steps cost 1, diagonal steps cost √2
 * - A diagonal step is only allowed when both orthogonal cells it passes are
 *   walkable (no corner cutting)
 * - Octile distance heuristic, admissible and consistent for these costs
 * - Ties in f are broken by lower h, then by insertion order, so identical
 *   inputs always produce the identical path
 */

import { BinaryHeap } from "./BinaryHeap";
import { cellKey, sameCell, type GridCell, type GridMap } from "../grid/GridMap";

export const DIAGONAL_COST = Math.SQRT2;

interface Node {
  x: number;
  y: number;
  g: number; // Cost from start
  h: number; // Heuristic to goal
  f: number; // Total (g + h)
  seq: number; // Insertion order, last tie-breaker
  parent: Node | null;
}

export interface SearchOptions {
  /** Stop after expanding this many nodes. */
  maxExplored?: number;
  /** Cell keys (`cellKey`) treated as blocked for this search. Never applies to start or goal. */
  avoid?: ReadonlySet<string>;
}

export type SearchResult =
  | { status: "found"; path: GridCell[]; cost: number; explored: GridCell[] }
  | { status: "no-path"; explored: GridCell[] }
  | { status: "budget-exhausted"; explored: GridCell[] };

// Cardinal first, then diagonals; order feeds the insertion sequence
const NEIGHBOR_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1],
  [1, 1],
  [1, -1],
  [-1, 1],
  [-1, -1],
];

function compareNodes(a: Node, b: Node): number {
  return a.f - b.f || a.h - b.h || a.seq - b.seq;
}

/** Octile distance between two cells. */
export function octileDistance(a: GridCell, b: GridCell): number {
  const dx = Math.abs(a.x - b.x);
  const dy = Math.abs(a.y - b.y);
  return (DIAGONAL_COST - 1) * Math.min(dx, dy) + Math.max(dx, dy);
}

/** Summed step cost of a path of adjacent cells. */
export function pathCost(path: readonly GridCell[]): number {
  let cost = 0;
  for (let i = 1; i < path.length; i++) {
    const diagonal = path[i].x !== path[i - 1].x && path[i].y !== path[i - 1].y;
    cost += diagonal ? DIAGONAL_COST : 1;
  }
  return cost;
}

export class PathSearch {
  private readonly grid: GridMap;

  constructor(grid: GridMap) {
    this.grid = grid;
  }

  /**
   * Find the cheapest path from start to goal, both inclusive.
   *
   * Usage:
   *   const search = new PathSearch(grid);
   *   const result = search.findPath(grid.worldToCell(pos), goal, { maxExplored: 2048 });
   *   if (result.status === "found") follow(result.path);
   */
  findPath(start: GridCell, goal: GridCell, options: SearchOptions = {}): SearchResult {
    const maxExplored = options.maxExplored ?? Infinity;
    const explored: GridCell[] = [];

    // Can't path from or into a wall; let the caller handle it
    if (!this.grid.isWalkable(start.x, start.y) || !this.grid.isWalkable(goal.x, goal.y)) {
      return { status: "no-path", explored };
    }

    if (sameCell(start, goal)) {
      return { status: "found", path: [{ x: start.x, y: start.y }], cost: 0, explored };
    }

    const { avoid } = options;
    const passable = (x: number, y: number): boolean => {
      if (!this.grid.isWalkable(x, y)) return false;
      if (!avoid || avoid.size === 0) return true;
      const cell = { x, y };
      return !avoid.has(cellKey(cell)) || sameCell(cell, start) || sameCell(cell, goal);
    };

    const width = this.grid.width;
    const bestG = new Map<number, number>();
    const closed = new Set<number>();
    const open = new BinaryHeap<Node>(compareNodes);
    let seq = 0;

    const startH = octileDistance(start, goal);
    open.push({ x: start.x, y: start.y, g: 0, h: startH, f: startH, seq: seq++, parent: null });
    bestG.set(start.y * width + start.x, 0);

    while (open.size > 0) {
      const current = open.pop();
      if (!current) break;
      const currentId = current.y * width + current.x;

      // Stale heap entry superseded by a cheaper one
      if (closed.has(currentId)) continue;

      if (sameCell(current, goal)) {
        return { status: "found", path: this.reconstructPath(current), cost: current.g, explored };
      }

      if (explored.length >= maxExplored) {
        return { status: "budget-exhausted", explored };
      }

      closed.add(currentId);
      explored.push({ x: current.x, y: current.y });

      for (const [dx, dy] of NEIGHBOR_OFFSETS) {
        const nx = current.x + dx;
        const ny = current.y + dy;
        if (!passable(nx, ny)) continue;

        const diagonal = dx !== 0 && dy !== 0;
        if (diagonal && (!passable(current.x + dx, current.y) || !passable(current.x, current.y + dy))) {
          continue;
        }

        const neighborId = ny * width + nx;
        if (closed.has(neighborId)) continue;

        const g = current.g + (diagonal ? DIAGONAL_COST : 1);
        const known = bestG.get(neighborId);
        if (known !== undefined && g >= known) continue;

        bestG.set(neighborId, g);
        const h = octileDistance({ x: nx, y: ny }, goal);
        open.push({ x: nx, y: ny, g, h, f: g + h, seq: seq++, parent: current });
      }
    }

    return { status: "no-path", explored };
  }

  /** Walk parent links from the goal back to the start. */
  private reconstructPath(goalNode: Node): GridCell[] {
    const path: GridCell[] = [];
    let current: Node | null = goalNode;
    while (current !== null) {
      path.push({ x: current.x, y: current.y });
      current = current.parent;
    }
    return path.reverse();
  }
}
