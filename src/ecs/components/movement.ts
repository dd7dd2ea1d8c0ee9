// Movement intent - one-shot per tick

export const MOVEMENT_INTENT = "MovementIntent";

/**
 * Desired motion for the current tick. Written by steering systems, applied
 * and reset by the movement integrator.
 */
export interface MovementIntent {
  velocity: { x: number; z: number }; // World units per second on the XZ plane
  yaw: number | null;                 // Desired heading, null = keep current
  enabled?: boolean;
}

export function emptyIntent(): MovementIntent {
  return { velocity: { x: 0, z: 0 }, yaw: null };
}
