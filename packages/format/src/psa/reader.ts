/**
 * Skeletal animation (.psa) decoding
 */

import { FormatError, Logger } from "@actorx/shared";
import { readChunks, readRecords } from "../binary/chunk.js";
import { RequiredChunks } from "../binary/order.js";
import {
  ANIM_KEY_LAYOUT,
  BONE_LAYOUT,
  PSA_CHUNK,
  SCALE_KEY_LAYOUT,
  SEQUENCE_INFO_LAYOUT,
  type SequenceInfo,
} from "../records.js";
import {
  createPsaDocument,
  type AnimKey,
  type PsaDocument,
  type PsaSequence,
} from "../types.js";

const TAG = "PsaReader";

export const PSA_REQUIRED_CHUNKS: readonly (readonly string[])[] = [
  [PSA_CHUNK.HEADER],
  [PSA_CHUNK.BONES],
  [PSA_CHUNK.SEQUENCES],
  [PSA_CHUNK.KEYS],
];

/**
 * Cut one sequence's `[frame][bone]` key matrix out of the flat key list.
 */
function sliceSequenceKeys(
  info: SequenceInfo,
  keys: AnimKey[],
  boneCount: number,
): AnimKey[][] {
  if (info.boneCount !== boneCount) {
    throw new FormatError(
      "index-range",
      `sequence "${info.name}" animates ${info.boneCount} bones, the file has ${boneCount}`,
      PSA_CHUNK.SEQUENCES,
    );
  }
  const start = info.frameStartIndex * boneCount;
  const end = start + info.frameCount * boneCount;
  if (info.frameStartIndex < 0 || info.frameCount < 0 || end > keys.length) {
    throw new FormatError(
      "index-range",
      `sequence "${info.name}" needs keys ${start}..${end}, the file has ${keys.length}`,
      PSA_CHUNK.KEYS,
    );
  }

  const matrix: AnimKey[][] = [];
  for (let frame = 0; frame < info.frameCount; frame++) {
    const rowStart = start + frame * boneCount;
    matrix.push(keys.slice(rowStart, rowStart + boneCount));
  }
  return matrix;
}

/**
 * Decode an animation document.
 */
export function readPsa(bytes: Uint8Array): PsaDocument {
  const startTime = performance.now();
  const chunks = readChunks(bytes);
  const required = new RequiredChunks("psa", PSA_REQUIRED_CHUNKS);
  const doc = createPsaDocument();
  let infos: SequenceInfo[] = [];
  let keys: AnimKey[] = [];

  for (const chunk of chunks) {
    if (required.visit(chunk.id)) {
      switch (chunk.id) {
        case PSA_CHUNK.BONES:
          doc.bones = readRecords(chunk, BONE_LAYOUT);
          break;
        case PSA_CHUNK.SEQUENCES:
          infos = readRecords(chunk, SEQUENCE_INFO_LAYOUT);
          break;
        case PSA_CHUNK.KEYS:
          keys = readRecords(chunk, ANIM_KEY_LAYOUT);
          break;
      }
      continue;
    }

    if (chunk.id === PSA_CHUNK.SCALE_KEYS) {
      required.visitOptional(chunk.id);
      doc.scaleKeys = readRecords(chunk, SCALE_KEY_LAYOUT);
    } else {
      Logger.debug(TAG, `Skipping unknown chunk ${chunk.id}`);
    }
  }

  required.finish();

  doc.sequences = infos.map(
    (info): PsaSequence => ({
      name: info.name,
      group: info.group,
      rootInclude: info.rootInclude,
      keyCompressionStyle: info.keyCompressionStyle,
      keyQuotum: info.keyQuotum,
      keyReduction: info.keyReduction,
      trackTime: info.trackTime,
      fps: info.fps,
      startBone: info.startBone,
      frameCount: info.frameCount,
      keys: sliceSequenceKeys(info, keys, doc.bones.length),
    }),
  );

  Logger.system(
    TAG,
    `Read ${doc.bones.length} bones, ${doc.sequences.length} sequences, ${keys.length} keys ` +
      `in ${(performance.now() - startTime).toFixed(1)}ms`,
  );

  return doc;
}
