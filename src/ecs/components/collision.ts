// Collision components

export const OBSTACLE = "Obstacle";

/**
 * Dynamic circular blocker on the XZ plane. Not baked into the grid map, so
 * pathfinding plans through it and the movement integrator refuses to step
 * into it; agents that keep bumping into one are caught by stuck detection.
 */
export interface Obstacle {
  radius: number;
  enabled?: boolean;
}
