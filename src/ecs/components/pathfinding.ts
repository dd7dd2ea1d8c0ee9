// Pathfinding component - attach to any entity that navigates the grid

import type { GridCell, WorldPoint } from "../../grid/GridMap";

export const PATHFINDER = "Pathfinder";

/** Navigation goal: an exact cell, or a world point resolved to its cell. */
export type NavTarget =
  | { kind: "cell"; cell: GridCell }
  | { kind: "world"; position: WorldPoint };

/**
 * idle → recalculating → navigating → idle, with stuck as the failure state
 * that falls back into recalculating after a cooldown.
 */
export type NavState = "idle" | "navigating" | "recalculating" | "stuck";

export interface Pathfinder {
  target: NavTarget | null;
  path: GridCell[];         // Start → goal inclusive, empty when no route
  currentIndex: number;     // Next waypoint in path
  state: NavState;
  moveSpeed: number;        // Units per second
  rotationSpeed: number;    // Radians per second
  arrivalThreshold: number; // Distance at which a waypoint counts as reached
  stuckTimer: number;       // Accumulated time without progress
  progressAnchor: { x: number; z: number } | null; // Position at start of the progress window
  progressElapsed: number;  // Time spent in the current progress window
  retryCooldown: number;    // Remaining wait before retrying from stuck
  failedAttempts: number;   // Consecutive failed searches for the current target
  explored: GridCell[];     // Cells expanded by the last search
  avoidCells: GridCell[];   // Cells where progress stalled; re-plans route around them until the target changes
  enabled?: boolean;
}
