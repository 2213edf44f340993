/**
 * Skeletal mesh (.psk) encoding
 */

import { FormatError, Logger } from "@actorx/shared";
import { writeChunk, writeMarkerChunk } from "../binary/chunk.js";
import {
  BONE_LAYOUT,
  COLOR_LAYOUT,
  MATERIAL_LAYOUT,
  MAX_EXTRA_UV_CHANNELS,
  MORPH_DATA_LAYOUT,
  MORPH_INFO_LAYOUT,
  POINT_LAYOUT,
  PSK_CHUNK,
  VEC2_LAYOUT,
  WEIGHT_LAYOUT,
  faceLayout,
  indexWidthForWedgeCount,
  wedgeLayout,
} from "../records.js";
import type { PskDocument } from "../types.js";
import { validatePskIndices } from "./validate.js";

const TAG = "PskWriter";

/**
 * Encode a mesh document.
 *
 * Wedge and face records switch to 32-bit indices above 65536 wedges.
 * Optional chunks are written only when they hold data.
 */
export function writePsk(doc: PskDocument): Buffer {
  validatePskIndices(doc);

  if (doc.extraUvs.length > MAX_EXTRA_UV_CHANNELS) {
    throw new FormatError(
      "field-overflow",
      `at most ${MAX_EXTRA_UV_CHANNELS} extra UV channels, found ${doc.extraUvs.length}`,
    );
  }

  const width = indexWidthForWedgeCount(doc.wedges.length);
  const parts: Buffer[] = [
    writeMarkerChunk(PSK_CHUNK.HEADER),
    writeChunk(PSK_CHUNK.POINTS, POINT_LAYOUT, doc.points),
    writeChunk(PSK_CHUNK.WEDGES, wedgeLayout(width), doc.wedges),
    writeChunk(
      width === 32 ? PSK_CHUNK.FACES32 : PSK_CHUNK.FACES,
      faceLayout(width),
      doc.faces,
    ),
    writeChunk(PSK_CHUNK.MATERIALS, MATERIAL_LAYOUT, doc.materials),
    writeChunk(PSK_CHUNK.BONES, BONE_LAYOUT, doc.bones),
    writeChunk(PSK_CHUNK.WEIGHTS, WEIGHT_LAYOUT, doc.weights),
  ];

  // An empty channel is left out; later channels keep their numbers
  doc.extraUvs.forEach((uvs, channel) => {
    if (uvs.length > 0) {
      parts.push(writeChunk(`${PSK_CHUNK.EXTRA_UVS}${channel}`, VEC2_LAYOUT, uvs));
    }
  });
  if (doc.vertexColors.length > 0) {
    parts.push(writeChunk(PSK_CHUNK.VERTEX_COLORS, COLOR_LAYOUT, doc.vertexColors));
  }
  if (doc.vertexNormals.length > 0) {
    parts.push(writeChunk(PSK_CHUNK.VERTEX_NORMALS, POINT_LAYOUT, doc.vertexNormals));
  }
  if (doc.morphInfos.length > 0) {
    parts.push(writeChunk(PSK_CHUNK.MORPH_INFO, MORPH_INFO_LAYOUT, doc.morphInfos));
  }
  if (doc.morphData.length > 0) {
    parts.push(writeChunk(PSK_CHUNK.MORPH_DATA, MORPH_DATA_LAYOUT, doc.morphData));
  }

  const output = Buffer.concat(parts);
  Logger.system(
    TAG,
    `Wrote ${doc.points.length} points, ${doc.wedges.length} wedges (${width}-bit), ` +
      `${doc.faces.length} faces, ${doc.bones.length} bones, ${output.length} bytes`,
  );
  return output;
}
