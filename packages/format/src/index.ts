/**
 * Skeletal mesh and animation file codec
 *
 * Reads and writes the chunked `.psk` (mesh) and `.psa` (animation)
 * formats, including both 16-bit and 32-bit wedge/face records.
 *
 * @example
 * ```typescript
 * import { readPsk, writePsk } from '@actorx/format';
 *
 * const mesh = readPsk(bytes);
 * mesh.materials[0].name = 'Body';
 * const output = writePsk(mesh);
 * ```
 *
 * @module @actorx/format
 */

export type {
  IndexWidth,
  Wedge,
  Face,
  Material,
  Bone,
  Weight,
  MorphInfo,
  MorphData,
  PskDocument,
  AnimKey,
  ScaleKey,
  PsaSequence,
  PsaDocument,
} from "./types.js";
export {
  createPskDocument,
  createPsaDocument,
  createMaterial,
} from "./types.js";

export {
  readChunks,
  readRecords,
  writeChunk,
  writeMarkerChunk,
  RecordReader,
  RecordWriter,
  CHUNK_HEADER_SIZE,
  CHUNK_ID_SIZE,
  CHUNK_TYPE_FLAG,
} from "./binary/chunk.js";
export type { Chunk, RecordLayout } from "./binary/chunk.js";
export { RequiredChunks } from "./binary/order.js";
export {
  NAME_FIELD_SIZE,
  decodeText,
  encodeText,
} from "./binary/text.js";

export {
  PSK_CHUNK,
  PSA_CHUNK,
  WEDGE_16_LIMIT,
  MAX_EXTRA_UV_CHANNELS,
  indexWidthForWedgeCount,
  WEDGE16_LAYOUT,
  WEDGE32_LAYOUT,
  FACE16_LAYOUT,
  FACE32_LAYOUT,
  BONE_LAYOUT,
  MATERIAL_LAYOUT,
} from "./records.js";

export { readPsk, PSK_REQUIRED_CHUNKS } from "./psk/reader.js";
export { writePsk } from "./psk/writer.js";
export { validatePskIndices } from "./psk/validate.js";
export { readPsa, PSA_REQUIRED_CHUNKS } from "./psa/reader.js";
export { writePsa } from "./psa/writer.js";

export {
  readPskFile,
  writePskFile,
  readPsaFile,
  writePsaFile,
} from "./io.js";
