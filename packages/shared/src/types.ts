/**
 * Shared value types for skeletal mesh and animation data
 */

/** A 2D coordinate (u, v) */
export type Vec2 = [number, number];

/** A 3D vector (x, y, z) */
export type Vec3 = [number, number, number];

/** A quaternion stored as (x, y, z, w), the on-disk component order */
export type Quat = [number, number, number, number];

/** An 8-bit RGBA color */
export type Color = [number, number, number, number];

/** A rotation paired with a translation */
export interface Transform {
  rotation: Quat;
  location: Vec3;
}
