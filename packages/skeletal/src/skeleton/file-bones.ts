/**
 * Skeleton <-> file bone records
 *
 * Files store a child's bind rotation conjugated and the root's as-is.
 */

import { PreconditionError, type Quat } from "@actorx/shared";
import type { Bone } from "@actorx/format";
import type { SkeletonBone } from "../types.js";
import { Skeleton } from "./skeleton.js";

function conjugate(q: Readonly<Quat>): Quat {
  return [-q[0], -q[1], -q[2], q[3]];
}

/**
 * File records for the bones at `indices` (ascending skeleton indices whose
 * parents are also selected). Parent indices are renumbered into the
 * selection and children counts are recomputed.
 */
export function toFileBones(skeleton: Skeleton, indices: readonly number[]): Bone[] {
  const position = new Map<number, number>();
  indices.forEach((index, i) => position.set(index, i));

  const records = indices.map((index): Bone => {
    const bone = skeleton.bones[index];
    const parent = skeleton.parentOf(index);
    let parentIndex = -1;
    if (parent !== null) {
      const mapped = position.get(parent);
      if (mapped === undefined) {
        throw new PreconditionError(
          "invalid-skeleton",
          `bone ${bone.name} is selected without its parent ${skeleton.bones[parent].name}`,
        );
      }
      parentIndex = mapped;
    }
    return {
      name: bone.name,
      flags: 0,
      childrenCount: 0,
      parentIndex,
      rotation: parentIndex === -1 ? [...bone.rotation] : conjugate(bone.rotation),
      location: [...bone.location],
      length: 0,
      size: [0, 0, 0],
    };
  });

  for (const record of records) {
    if (record.parentIndex !== -1) records[record.parentIndex].childrenCount++;
  }
  return records;
}

/**
 * A skeleton from file bone records, undoing the child rotation convention.
 */
export function skeletonFromFileBones(bones: readonly Bone[]): Skeleton {
  return new Skeleton(
    bones.map(
      (bone, index): SkeletonBone => {
        const isRoot = bone.parentIndex === -1 || bone.parentIndex === index;
        return {
          name: bone.name,
          parentIndex: isRoot ? -1 : bone.parentIndex,
          rotation: isRoot ? [...bone.rotation] : conjugate(bone.rotation),
          location: [...bone.location],
        };
      },
    ),
  );
}
