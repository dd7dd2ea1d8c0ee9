// Core/common components

export const TRANSFORM = "Transform";
export const LABEL = "Label";

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

/**
 * Position and heading of an entity. Yaw is radians about the vertical axis,
 * 0 facing +Z, measured as atan2(dx, dz).
 */
export interface Transform {
  position: Vec3;
  yaw: number;
  scale: Vec3;
  enabled?: boolean;
}

export interface Label {
  name: string;
}
