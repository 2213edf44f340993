/**
 * Conversion between file-space bone samples and parent-relative local samples
 *
 * Quaternions cross the API as [x, y, z, w] tuples; the algebra runs on
 * THREE.Quaternion. `a.premultiply(b)` computes `b · a`.
 */

import * as THREE from "three";
import type { Quat, Transform, Vec3 } from "@actorx/shared";
import type { AnimKey } from "@actorx/format";
import type { StoredBindPose } from "../types.js";

/**
 * Per-bone state for one import run.
 *
 * Bones live in a flat arena; `parent` is an arena index, or null when the
 * bone converts as a root.
 */
export interface ImportBone extends StoredBindPose {
  sourceIndex: number;
  targetIndex: number;
  parent: number | null;
}

function quat(q: Readonly<Quat>): THREE.Quaternion {
  return new THREE.Quaternion(q[0], q[1], q[2], q[3]);
}

function vec(v: Readonly<Vec3>): THREE.Vector3 {
  return new THREE.Vector3(v[0], v[1], v[2]);
}

function toQuat(q: THREE.Quaternion): Quat {
  return [q.x, q.y, q.z, q.w];
}

function toVec3(v: THREE.Vector3): Vec3 {
  return [v.x, v.y, v.z];
}

/**
 * Armature-space rotation and translation of a 4x4 bind matrix
 * (column-major, as THREE.Matrix4 stores it). Scale is discarded.
 */
export function transformFromMatrix(elements: ArrayLike<number>): Transform {
  const matrix = new THREE.Matrix4().fromArray(Array.from(elements));
  const position = new THREE.Vector3();
  const rotation = new THREE.Quaternion();
  matrix.decompose(position, rotation, new THREE.Vector3());
  return { rotation: toQuat(rotation), location: toVec3(position) };
}

/**
 * Bind data from armature-space bind transforms.
 *
 * A child gets its parent-relative translation and the conjugate of its
 * parent-relative rotation; a root keeps its armature transform. The
 * correction term is always the conjugate of the bind rotation.
 */
export function bindPoseFromArmature(
  bone: Transform,
  parent: Transform | null,
): StoredBindPose {
  let origRotation: THREE.Quaternion;
  let origLocation: THREE.Vector3;

  if (parent !== null) {
    const parentInverse = quat(parent.rotation).conjugate();
    origLocation = vec(bone.location)
      .sub(vec(parent.location))
      .applyQuaternion(parentInverse);
    origRotation = quat(bone.rotation).premultiply(parentInverse).conjugate();
  } else {
    origLocation = vec(bone.location);
    origRotation = quat(bone.rotation);
  }

  return {
    origRotation: toQuat(origRotation),
    origLocation: toVec3(origLocation),
    postRotation: toQuat(origRotation.clone().conjugate()),
  };
}

/**
 * Armature-space transforms of parent-relative bind poses, in input order.
 */
export function armatureTransforms(
  bones: readonly { parentIndex: number; rotation: Quat; location: Vec3 }[],
): Transform[] {
  const resolved = new Map<number, { q: THREE.Quaternion; t: THREE.Vector3 }>();

  const resolve = (index: number, depth: number): { q: THREE.Quaternion; t: THREE.Vector3 } => {
    const cached = resolved.get(index);
    if (cached) return cached;

    const bone = bones[index];
    const q = quat(bone.rotation);
    const t = vec(bone.location);
    const parent = bone.parentIndex;
    if (parent !== -1 && parent !== index && parent >= 0 && parent < bones.length && depth < bones.length) {
      const p = resolve(parent, depth + 1);
      q.premultiply(p.q);
      t.applyQuaternion(p.q).add(p.t);
    }
    const entry = { q, t };
    resolved.set(index, entry);
    return entry;
  };

  return bones.map((_, i) => {
    const { q, t } = resolve(i, 0);
    return { rotation: toQuat(q), location: toVec3(t) };
  });
}

/**
 * Local sample for one bone from its file-space key.
 *
 * Root and child keys follow mirrored conventions: the root's key rotation
 * enters conjugated, a child's as stored.
 */
export function worldToLocal(
  bone: ImportBone,
  rotation: Readonly<Quat>,
  location: Readonly<Vec3>,
): Transform {
  const post = quat(bone.postRotation);
  const base = post.clone().premultiply(quat(bone.origRotation));

  const key = quat(rotation);
  const delta = post.clone().premultiply(bone.parent === null ? key.conjugate() : key);
  const local = base.premultiply(delta.conjugate());

  const offset = vec(location)
    .sub(vec(bone.origLocation))
    .applyQuaternion(post.clone().conjugate());

  return { rotation: toQuat(local), location: toVec3(offset) };
}

/**
 * Inverse of `worldToLocal`: the file-space key for a local sample.
 */
export function localToWorld(
  bone: ImportBone,
  rotation: Readonly<Quat>,
  location: Readonly<Vec3>,
): Transform {
  const orig = quat(bone.origRotation);
  const post = quat(bone.postRotation);
  const postInverse = post.clone().conjugate();
  const local = quat(rotation);

  let key: THREE.Quaternion;
  if (bone.parent === null) {
    // post · local · conj(post) · conj(orig)
    key = orig.clone().conjugate().premultiply(postInverse).premultiply(local).premultiply(post);
  } else {
    // orig · post · conj(local) · conj(post)
    key = postInverse.clone().premultiply(local.clone().conjugate()).premultiply(post).premultiply(orig);
  }

  const keyLocation = vec(location).applyQuaternion(post).add(vec(bone.origLocation));
  return { rotation: toQuat(key), location: toVec3(keyLocation) };
}

/**
 * Local samples for a whole sequence, indexed `[frame][arena index]`.
 *
 * Each key is converted on its own; no state carries across frames.
 */
export function convertSequence(
  bones: readonly ImportBone[],
  keys: readonly (readonly AnimKey[])[],
): Transform[][] {
  return keys.map((row) =>
    bones.map((bone) => {
      const key = row[bone.sourceIndex];
      return worldToLocal(bone, key.rotation, key.location);
    }),
  );
}
