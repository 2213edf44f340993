/**
 * Bone hierarchy queries
 */

import { PreconditionError } from "@actorx/shared";
import type { BoneFilter, SkeletonBone } from "../types.js";

/** Letters, digits, spaces, hyphens and underscores */
const BONE_NAME_PATTERN = /^[A-Za-z0-9 _-]+$/;

/**
 * An ordered bone list with parent/child lookups.
 *
 * A bone is a root when its parent index is -1 or its own index.
 * Queries tolerate malformed input; call `validate()` to reject it.
 */
export class Skeleton {
  readonly bones: readonly SkeletonBone[];
  private readonly children: number[][];
  private readonly nameIndex = new Map<string, number>();

  constructor(bones: readonly SkeletonBone[]) {
    this.bones = bones;
    this.children = bones.map(() => []);
    bones.forEach((bone, index) => {
      if (!this.nameIndex.has(bone.name)) this.nameIndex.set(bone.name, index);
      if (!this.isRoot(index) && this.inRange(bone.parentIndex)) {
        this.children[bone.parentIndex].push(index);
      }
    });
  }

  get size(): number {
    return this.bones.length;
  }

  get names(): string[] {
    return this.bones.map((bone) => bone.name);
  }

  isRoot(index: number): boolean {
    const parent = this.bones[index].parentIndex;
    return parent === -1 || parent === index;
  }

  /**
   * Parent of `index`, or null for a root
   */
  parentOf(index: number): number | null {
    return this.isRoot(index) ? null : this.bones[index].parentIndex;
  }

  /**
   * Throws `invalid-skeleton` unless every parent index points at a bone
   * and no bone is its own ancestor. Exactly one root is required unless
   * `singleRoot` is false, which import targets use for rigs with loose
   * control bones.
   */
  validate(options: { singleRoot?: boolean } = {}): void {
    if (this.bones.length === 0) {
      throw new PreconditionError("invalid-skeleton", "skeleton has no bones");
    }

    const roots = this.bones.flatMap((_, i) => (this.isRoot(i) ? [i] : []));
    const singleRoot = options.singleRoot ?? true;
    if (singleRoot ? roots.length !== 1 : roots.length === 0) {
      throw new PreconditionError(
        "invalid-skeleton",
        singleRoot
          ? `expected exactly one root bone, found ${roots.length}`
          : "skeleton has no root bone",
      );
    }

    this.bones.forEach((bone, i) => {
      if (!this.isRoot(i) && !this.inRange(bone.parentIndex)) {
        throw new PreconditionError(
          "invalid-skeleton",
          `bone ${i} (${bone.name}) has parent index ${bone.parentIndex}`,
        );
      }
    });

    // Every walk must reach the root within size steps
    for (let i = 0; i < this.bones.length; i++) {
      let current = i;
      let steps = 0;
      while (!this.isRoot(current)) {
        current = this.bones[current].parentIndex;
        if (++steps > this.bones.length) {
          throw new PreconditionError(
            "invalid-skeleton",
            `bone ${i} (${this.bones[i].name}) is part of a parent cycle`,
          );
        }
      }
    }
  }

  get rootIndex(): number {
    const index = this.bones.findIndex((_, i) => this.isRoot(i));
    if (index === -1) {
      throw new PreconditionError("invalid-skeleton", "skeleton has no root bone");
    }
    return index;
  }

  childrenOf(index: number): readonly number[] {
    return this.children[index];
  }

  childCount(index: number): number {
    return this.children[index].length;
  }

  /**
   * Ancestors of `index`, nearest first. Stops at the first repeated bone.
   */
  ancestorsOf(index: number): number[] {
    const ancestors: number[] = [];
    const seen = new Set<number>([index]);
    let current = index;
    while (!this.isRoot(current)) {
      const parent = this.bones[current].parentIndex;
      if (!this.inRange(parent) || seen.has(parent)) break;
      ancestors.push(parent);
      seen.add(parent);
      current = parent;
    }
    return ancestors;
  }

  depthOf(index: number): number {
    return this.ancestorsOf(index).length;
  }

  /**
   * Index of the first bone called `name`, or -1
   */
  indexOf(name: string): number {
    return this.nameIndex.get(name) ?? -1;
  }

  private inRange(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.bones.length;
  }
}

/**
 * Indices of the bones a filter keeps, in skeleton order.
 *
 * The "groups" filter keeps bones in any listed group together with all of
 * their ancestors, so the result is always a connected hierarchy.
 */
export function selectBones(skeleton: Skeleton, filter: BoneFilter): number[] {
  if (filter.mode === "all") {
    return skeleton.bones.map((_, i) => i);
  }

  const groups = new Set(filter.groups);
  const keep = new Set<number>();
  skeleton.bones.forEach((bone, i) => {
    if (bone.groups?.some((group) => groups.has(group))) {
      keep.add(i);
      for (const ancestor of skeleton.ancestorsOf(i)) keep.add(ancestor);
    }
  });
  return [...keep].sort((a, b) => a - b);
}

/**
 * Throws `bone-name` for the first name with characters engines may reject.
 */
export function checkBoneNames(names: readonly string[]): void {
  for (const name of names) {
    if (!BONE_NAME_PATTERN.test(name)) {
      throw new PreconditionError(
        "bone-name",
        `bone name "${name}" may only contain letters, numbers, spaces, hyphens and underscores`,
      );
    }
  }
}
