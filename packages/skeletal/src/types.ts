/**
 * Host-facing input types for the skeletal pipeline
 */

import type { Quat, Vec3 } from "@actorx/shared";

/**
 * A bone as the host authored it.
 *
 * `rotation` and `location` are the bind pose relative to the parent bone
 * (armature space for the root). `parentIndex` is -1 for the root.
 */
export interface SkeletonBone {
  name: string;
  parentIndex: number;
  rotation: Quat;
  location: Vec3;
  /** Bone groups the bone belongs to, used by the "groups" bone filter */
  groups?: readonly string[];
  /**
   * Bind data a previous import stored on the bone. When present the
   * importer uses it instead of deriving it from the bind pose.
   */
  storedBindPose?: StoredBindPose;
}

export interface StoredBindPose {
  origRotation: Quat;
  origLocation: Vec3;
  postRotation: Quat;
}

export type BoneFilter =
  | { mode: "all" }
  | { mode: "groups"; groups: readonly string[] };
