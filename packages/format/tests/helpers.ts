/**
 * Shared fixtures for codec tests
 */

import { expect } from "vitest";
import { FormatError, type FormatErrorKind } from "@actorx/shared";
import {
  createMaterial,
  createPskDocument,
  type Bone,
  type PskDocument,
} from "../src/index.js";

export function bone(
  name: string,
  parentIndex: number,
  childrenCount: number,
): Bone {
  return {
    name,
    flags: 0,
    childrenCount,
    parentIndex,
    rotation: [0, 0, 0.5, 0.5],
    location: [1, 2, 3],
    length: 1,
    size: [1, 1, 1],
  };
}

/**
 * A single textured triangle on a two-bone skeleton
 */
export function createTriangleMesh(): PskDocument {
  const doc = createPskDocument();
  doc.points = [
    [0, 0, 0],
    [1, 0, 0],
    [0, 1, 0],
  ];
  doc.wedges = [
    { pointIndex: 0, u: 0, v: 0, materialIndex: 0 },
    { pointIndex: 1, u: 1, v: 0, materialIndex: 0 },
    { pointIndex: 2, u: 0, v: 1, materialIndex: 0 },
  ];
  doc.faces = [
    {
      wedgeIndices: [0, 1, 2],
      materialIndex: 0,
      auxMaterialIndex: 0,
      smoothingGroups: 1,
    },
  ];
  doc.materials = [createMaterial("Skin")];
  doc.bones = [bone("Root", -1, 1), bone("Spine", 0, 0)];
  doc.weights = [
    { weight: 1, pointIndex: 0, boneIndex: 0 },
    { weight: 0.5, pointIndex: 1, boneIndex: 0 },
    { weight: 0.5, pointIndex: 1, boneIndex: 1 },
    { weight: 1, pointIndex: 2, boneIndex: 1 },
  ];
  return doc;
}

export function expectFormatError(
  fn: () => unknown,
  kind: FormatErrorKind,
): FormatError {
  try {
    fn();
  } catch (error) {
    if (!(error instanceof FormatError)) throw error;
    expect(error.kind).toBe(kind);
    return error;
  }
  throw new Error(`expected a FormatError of kind ${kind}`);
}
