/**
 * Skeletal animation (.psa) encoding
 */

import { FormatError, Logger } from "@actorx/shared";
import { writeChunk, writeMarkerChunk } from "../binary/chunk.js";
import {
  ANIM_KEY_LAYOUT,
  BONE_LAYOUT,
  PSA_CHUNK,
  SCALE_KEY_LAYOUT,
  SEQUENCE_INFO_LAYOUT,
  type SequenceInfo,
} from "../records.js";
import type { AnimKey, PsaDocument } from "../types.js";

const TAG = "PsaWriter";

/**
 * Encode an animation document.
 *
 * Sequence keys are laid out back to back; each ANIMINFO record gets the
 * running frame total as its start index.
 */
export function writePsa(doc: PsaDocument): Buffer {
  const boneCount = doc.bones.length;
  const infos: SequenceInfo[] = [];
  const keys: AnimKey[] = [];
  let frameStartIndex = 0;

  for (const sequence of doc.sequences) {
    if (sequence.keys.length !== sequence.frameCount) {
      throw new FormatError(
        "index-range",
        `sequence "${sequence.name}" declares ${sequence.frameCount} frames but has ${sequence.keys.length}`,
        PSA_CHUNK.KEYS,
      );
    }
    sequence.keys.forEach((row, frame) => {
      if (row.length !== boneCount) {
        throw new FormatError(
          "index-range",
          `sequence "${sequence.name}" frame ${frame} has ${row.length} keys for ${boneCount} bones`,
          PSA_CHUNK.KEYS,
        );
      }
      keys.push(...row);
    });

    infos.push({
      name: sequence.name,
      group: sequence.group,
      boneCount,
      rootInclude: sequence.rootInclude,
      keyCompressionStyle: sequence.keyCompressionStyle,
      keyQuotum: sequence.keyQuotum,
      keyReduction: sequence.keyReduction,
      trackTime: sequence.trackTime,
      fps: sequence.fps,
      startBone: sequence.startBone,
      frameStartIndex,
      frameCount: sequence.frameCount,
    });
    frameStartIndex += sequence.frameCount;
  }

  const parts: Buffer[] = [
    writeMarkerChunk(PSA_CHUNK.HEADER),
    writeChunk(PSA_CHUNK.BONES, BONE_LAYOUT, doc.bones),
    writeChunk(PSA_CHUNK.SEQUENCES, SEQUENCE_INFO_LAYOUT, infos),
    writeChunk(PSA_CHUNK.KEYS, ANIM_KEY_LAYOUT, keys),
  ];
  if (doc.scaleKeys.length > 0) {
    parts.push(writeChunk(PSA_CHUNK.SCALE_KEYS, SCALE_KEY_LAYOUT, doc.scaleKeys));
  }

  const output = Buffer.concat(parts);
  Logger.system(
    TAG,
    `Wrote ${boneCount} bones, ${infos.length} sequences, ${keys.length} keys, ${output.length} bytes`,
  );
  return output;
}
