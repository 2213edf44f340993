/**
 * Cross-record index checks for mesh documents
 */

import { FormatError } from "@actorx/shared";
import { PSK_CHUNK } from "../records.js";
import type { PskDocument } from "../types.js";

function checkIndex(
  value: number,
  count: number,
  what: string,
  owner: string,
  chunkId: string,
): void {
  if (!Number.isInteger(value) || value < 0 || value >= count) {
    throw new FormatError(
      "index-range",
      `${owner} references ${what} ${value}, but there are ${count}`,
      chunkId,
    );
  }
}

/**
 * Throw `index-range` for the first record that points outside its target list.
 */
export function validatePskIndices(doc: PskDocument): void {
  const pointCount = doc.points.length;
  const wedgeCount = doc.wedges.length;
  const boneCount = doc.bones.length;

  doc.wedges.forEach((wedge, i) =>
    checkIndex(wedge.pointIndex, pointCount, "point", `wedge ${i}`, PSK_CHUNK.WEDGES),
  );

  doc.faces.forEach((face, i) => {
    for (const wedgeIndex of face.wedgeIndices) {
      checkIndex(wedgeIndex, wedgeCount, "wedge", `face ${i}`, PSK_CHUNK.FACES);
    }
  });

  doc.bones.forEach((bone, i) => {
    if (bone.parentIndex !== -1) {
      checkIndex(bone.parentIndex, boneCount, "parent bone", `bone ${i}`, PSK_CHUNK.BONES);
    }
  });

  doc.weights.forEach((weight, i) => {
    checkIndex(weight.pointIndex, pointCount, "point", `weight ${i}`, PSK_CHUNK.WEIGHTS);
    checkIndex(weight.boneIndex, boneCount, "bone", `weight ${i}`, PSK_CHUNK.WEIGHTS);
  });

  doc.morphData.forEach((data, i) =>
    checkIndex(data.pointIndex, pointCount, "point", `morph delta ${i}`, PSK_CHUNK.MORPH_DATA),
  );
}
