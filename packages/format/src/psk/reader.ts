/**
 * Skeletal mesh (.psk) decoding
 */

import { FormatError, Logger, type Vec2 } from "@actorx/shared";
import { readChunks, readRecords, type Chunk } from "../binary/chunk.js";
import { RequiredChunks } from "../binary/order.js";
import {
  BONE_LAYOUT,
  COLOR_LAYOUT,
  FACE16_LAYOUT,
  FACE32_LAYOUT,
  MATERIAL_LAYOUT,
  MAX_EXTRA_UV_CHANNELS,
  MORPH_DATA_LAYOUT,
  MORPH_INFO_LAYOUT,
  POINT_LAYOUT,
  PSK_CHUNK,
  VEC2_LAYOUT,
  WEIGHT_LAYOUT,
  indexWidthForWedgeCount,
  wedgeLayout,
} from "../records.js";
import { createPskDocument, type Face, type PskDocument } from "../types.js";
import { validatePskIndices } from "./validate.js";

const TAG = "PskReader";

export const PSK_REQUIRED_CHUNKS: readonly (readonly string[])[] = [
  [PSK_CHUNK.HEADER],
  [PSK_CHUNK.POINTS],
  [PSK_CHUNK.WEDGES],
  [PSK_CHUNK.FACES, PSK_CHUNK.FACES32],
  [PSK_CHUNK.MATERIALS],
  [PSK_CHUNK.BONES],
  [PSK_CHUNK.WEIGHTS],
];

const EXTRA_UV_PATTERN = new RegExp(`^${PSK_CHUNK.EXTRA_UVS}(\\d)$`);

/**
 * Face width follows the declared record size: the 32-bit layout when it
 * matches, the 16-bit layout otherwise, anything else is malformed.
 */
function readFaces(chunk: Chunk): Face[] {
  if (chunk.recordSize === FACE32_LAYOUT.size) {
    return readRecords(chunk, FACE32_LAYOUT);
  }
  if (chunk.recordSize === FACE16_LAYOUT.size) {
    return readRecords(chunk, FACE16_LAYOUT);
  }
  throw new FormatError(
    "record-size",
    `face records are ${FACE16_LAYOUT.size} or ${FACE32_LAYOUT.size} bytes, found ${chunk.recordSize}`,
    chunk.id,
  );
}

function setExtraUvChannel(
  doc: PskDocument,
  channel: number,
  uvs: Vec2[],
): void {
  while (doc.extraUvs.length <= channel) doc.extraUvs.push([]);
  doc.extraUvs[channel] = uvs;
}

/**
 * Decode a mesh document.
 *
 * Required chunks must appear in format order, and known optional chunks
 * after all of them. Unknown chunks are skipped.
 */
export function readPsk(bytes: Uint8Array): PskDocument {
  const startTime = performance.now();
  const chunks = readChunks(bytes);
  const required = new RequiredChunks("psk", PSK_REQUIRED_CHUNKS);
  const doc = createPskDocument();
  let skipped = 0;

  for (const chunk of chunks) {
    if (required.visit(chunk.id)) {
      switch (chunk.id) {
        case PSK_CHUNK.HEADER:
          break;
        case PSK_CHUNK.POINTS:
          doc.points = readRecords(chunk, POINT_LAYOUT);
          break;
        case PSK_CHUNK.WEDGES:
          // Both wedge widths are 16 bytes; the count decides which one applies.
          doc.wedges = readRecords(
            chunk,
            wedgeLayout(indexWidthForWedgeCount(chunk.recordCount)),
          );
          break;
        case PSK_CHUNK.FACES:
        case PSK_CHUNK.FACES32:
          doc.faces = readFaces(chunk);
          break;
        case PSK_CHUNK.MATERIALS:
          doc.materials = readRecords(chunk, MATERIAL_LAYOUT);
          break;
        case PSK_CHUNK.BONES:
          doc.bones = readRecords(chunk, BONE_LAYOUT);
          break;
        case PSK_CHUNK.WEIGHTS:
          doc.weights = readRecords(chunk, WEIGHT_LAYOUT);
          break;
      }
      continue;
    }

    const extraUv = EXTRA_UV_PATTERN.exec(chunk.id);
    if (extraUv) {
      const channel = Number(extraUv[1]);
      if (channel < MAX_EXTRA_UV_CHANNELS) {
        required.visitOptional(chunk.id);
        setExtraUvChannel(doc, channel, readRecords(chunk, VEC2_LAYOUT));
        continue;
      }
    }

    switch (chunk.id) {
      case PSK_CHUNK.VERTEX_COLORS:
        required.visitOptional(chunk.id);
        doc.vertexColors = readRecords(chunk, COLOR_LAYOUT);
        break;
      case PSK_CHUNK.VERTEX_NORMALS:
        required.visitOptional(chunk.id);
        doc.vertexNormals = readRecords(chunk, POINT_LAYOUT);
        break;
      case PSK_CHUNK.MORPH_INFO:
        required.visitOptional(chunk.id);
        doc.morphInfos = readRecords(chunk, MORPH_INFO_LAYOUT);
        break;
      case PSK_CHUNK.MORPH_DATA:
        required.visitOptional(chunk.id);
        doc.morphData = readRecords(chunk, MORPH_DATA_LAYOUT);
        break;
      default:
        skipped++;
        Logger.debug(TAG, `Skipping unknown chunk ${chunk.id}`);
    }
  }

  required.finish();
  validatePskIndices(doc);

  Logger.system(
    TAG,
    `Read ${doc.points.length} points, ${doc.wedges.length} wedges, ${doc.faces.length} faces, ` +
      `${doc.bones.length} bones in ${(performance.now() - startTime).toFixed(1)}ms` +
      (skipped > 0 ? ` (${skipped} unknown chunks skipped)` : ""),
  );

  return doc;
}
