/**
 * Chunk framing
 *
 * Both formats are a flat run of chunks:
 *
 *   char  id[20]        NUL-padded tag
 *   int32 type_flag
 *   int32 record_size
 *   int32 record_count
 *   byte  records[record_size * record_count]
 *
 * Everything is little-endian. Reads are single-pass and never seek backward.
 */

import { FormatError, type Vec2, type Vec3, type Quat } from "@actorx/shared";
import { NAME_FIELD_SIZE, decodeText, encodeText } from "./text.js";

export const CHUNK_ID_SIZE = 20;
export const CHUNK_HEADER_SIZE = CHUNK_ID_SIZE + 12;

/** Flag value written into every chunk header */
export const CHUNK_TYPE_FLAG = 1999801;

export interface Chunk {
  id: string;
  typeFlag: number;
  recordSize: number;
  recordCount: number;
  /** Exactly recordSize * recordCount bytes */
  data: Buffer;
}

/**
 * Fixed-size record codec for one chunk kind
 */
export interface RecordLayout<T> {
  size: number;
  read(reader: RecordReader): T;
  write(writer: RecordWriter, record: T): void;
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes)
    ? bytes
    : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Walk every chunk in `bytes`.
 *
 * Fails with `truncated` when a header is cut short and with
 * `payload-overflow` when a declared payload runs past the end.
 */
export function readChunks(bytes: Uint8Array): Chunk[] {
  const buffer = toBuffer(bytes);
  const chunks: Chunk[] = [];
  let offset = 0;

  while (offset < buffer.length) {
    const remaining = buffer.length - offset;
    if (remaining < CHUNK_HEADER_SIZE) {
      throw new FormatError(
        "truncated",
        `chunk header at offset ${offset} needs ${CHUNK_HEADER_SIZE} bytes, ${remaining} left`,
      );
    }

    const id = decodeText(buffer.subarray(offset, offset + CHUNK_ID_SIZE));
    const typeFlag = buffer.readInt32LE(offset + CHUNK_ID_SIZE);
    const recordSize = buffer.readInt32LE(offset + CHUNK_ID_SIZE + 4);
    const recordCount = buffer.readInt32LE(offset + CHUNK_ID_SIZE + 8);
    offset += CHUNK_HEADER_SIZE;

    if (recordSize < 0) {
      throw new FormatError(
        "record-size",
        `negative record size ${recordSize}`,
        id,
      );
    }
    if (recordCount < 0) {
      throw new FormatError(
        "payload-overflow",
        `negative record count ${recordCount}`,
        id,
      );
    }

    const payloadSize = recordSize * recordCount;
    const available = buffer.length - offset;
    if (payloadSize > available) {
      throw new FormatError(
        "payload-overflow",
        `${recordCount} records of ${recordSize} bytes need ${payloadSize} bytes, ${available} left`,
        id,
      );
    }

    chunks.push({
      id,
      typeFlag,
      recordSize,
      recordCount,
      data: buffer.subarray(offset, offset + payloadSize),
    });
    offset += payloadSize;
  }

  return chunks;
}

/**
 * Decode every record of a chunk with `layout`, checking the declared size.
 */
export function readRecords<T>(chunk: Chunk, layout: RecordLayout<T>): T[] {
  if (chunk.recordSize !== layout.size) {
    throw new FormatError(
      "record-size",
      `expected ${layout.size}-byte records, found ${chunk.recordSize}`,
      chunk.id,
    );
  }
  const reader = new RecordReader(chunk.data, chunk.id);
  const records: T[] = [];
  for (let i = 0; i < chunk.recordCount; i++) {
    reader.seek(i * layout.size);
    records.push(layout.read(reader));
  }
  return records;
}

/**
 * Encode a chunk header followed by its records.
 */
export function writeChunk<T>(
  id: string,
  layout: RecordLayout<T>,
  records: readonly T[],
): Buffer {
  const header = Buffer.alloc(CHUNK_HEADER_SIZE);
  header.set(encodeText(id, CHUNK_ID_SIZE, id), 0);
  header.writeInt32LE(CHUNK_TYPE_FLAG, CHUNK_ID_SIZE);
  header.writeInt32LE(layout.size, CHUNK_ID_SIZE + 4);
  header.writeInt32LE(records.length, CHUNK_ID_SIZE + 8);

  const writer = new RecordWriter(layout.size * records.length, id);
  for (let i = 0; i < records.length; i++) {
    writer.seek(i * layout.size);
    layout.write(writer, records[i]);
  }
  return Buffer.concat([header, writer.buffer]);
}

/**
 * Encode a header-only chunk (record size and count zero).
 */
export function writeMarkerChunk(id: string): Buffer {
  return writeChunk<never>(id, EMPTY_LAYOUT, []);
}

export const EMPTY_LAYOUT: RecordLayout<never> = {
  size: 0,
  read() {
    throw new Error("empty layout has no records");
  },
  write() {},
};

/**
 * Sequential little-endian field reader over one chunk's payload
 */
export class RecordReader {
  private offset = 0;

  constructor(
    private readonly buffer: Buffer,
    readonly chunkId: string,
  ) {}

  seek(offset: number): void {
    this.offset = offset;
  }

  u8(): number {
    const value = this.buffer.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  u16(): number {
    const value = this.buffer.readUInt16LE(this.offset);
    this.offset += 2;
    return value;
  }

  u32(): number {
    const value = this.buffer.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  i32(): number {
    const value = this.buffer.readInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  f32(): number {
    const value = this.buffer.readFloatLE(this.offset);
    this.offset += 4;
    return value;
  }

  vec2(): Vec2 {
    return [this.f32(), this.f32()];
  }

  vec3(): Vec3 {
    return [this.f32(), this.f32(), this.f32()];
  }

  quat(): Quat {
    return [this.f32(), this.f32(), this.f32(), this.f32()];
  }

  name(width: number = NAME_FIELD_SIZE): string {
    const text = decodeText(
      this.buffer.subarray(this.offset, this.offset + width),
    );
    this.offset += width;
    return text;
  }
}

/**
 * Sequential little-endian field writer into a zero-filled buffer
 */
export class RecordWriter {
  readonly buffer: Buffer;
  private offset = 0;

  constructor(
    size: number,
    readonly chunkId: string,
  ) {
    this.buffer = Buffer.alloc(size);
  }

  seek(offset: number): void {
    this.offset = offset;
  }

  skip(bytes: number): void {
    this.offset += bytes;
  }

  u8(value: number): void {
    this.checkUnsigned(value, 0xff);
    this.offset = this.buffer.writeUInt8(value, this.offset);
  }

  u16(value: number): void {
    this.checkUnsigned(value, 0xffff);
    this.offset = this.buffer.writeUInt16LE(value, this.offset);
  }

  u32(value: number): void {
    this.checkUnsigned(value, 0xffffffff);
    this.offset = this.buffer.writeUInt32LE(value, this.offset);
  }

  i32(value: number): void {
    if (!Number.isInteger(value) || value < -0x80000000 || value > 0x7fffffff) {
      throw new FormatError(
        "field-overflow",
        `${value} does not fit in a signed 32-bit field`,
        this.chunkId,
      );
    }
    this.offset = this.buffer.writeInt32LE(value, this.offset);
  }

  f32(value: number): void {
    this.offset = this.buffer.writeFloatLE(value, this.offset);
  }

  vec2(value: Readonly<Vec2>): void {
    this.f32(value[0]);
    this.f32(value[1]);
  }

  vec3(value: Readonly<Vec3>): void {
    this.f32(value[0]);
    this.f32(value[1]);
    this.f32(value[2]);
  }

  quat(value: Readonly<Quat>): void {
    this.f32(value[0]);
    this.f32(value[1]);
    this.f32(value[2]);
    this.f32(value[3]);
  }

  name(text: string, width: number = NAME_FIELD_SIZE): void {
    this.buffer.set(encodeText(text, width, this.chunkId), this.offset);
    this.offset += width;
  }

  private checkUnsigned(value: number, max: number): void {
    if (!Number.isInteger(value) || value < 0 || value > max) {
      throw new FormatError(
        "field-overflow",
        `${value} does not fit in an unsigned field (max ${max})`,
        this.chunkId,
      );
    }
  }
}
