/**
 * Fixed-width text fields
 *
 * Names are stored as Windows-1252 bytes, NUL-padded to the field width.
 * The five bytes the code page leaves undefined decode to the C1 control
 * of the same value, so every byte has exactly one code point and back.
 */

import { FormatError } from "@actorx/shared";

/** Code points for bytes 0x80-0x9F; the rest of the page is Latin-1 */
const CP1252_HIGH: readonly number[] = [
  0x20ac, 0x0081, 0x201a, 0x0192, 0x201e, 0x2026, 0x2020, 0x2021,
  0x02c6, 0x2030, 0x0160, 0x2039, 0x0152, 0x008d, 0x017d, 0x008f,
  0x0090, 0x2018, 0x2019, 0x201c, 0x201d, 0x2022, 0x2013, 0x2014,
  0x02dc, 0x2122, 0x0161, 0x203a, 0x0153, 0x009d, 0x017e, 0x0178,
];

const CP1252_REVERSE = new Map<number, number>(
  CP1252_HIGH.map((codePoint, i) => [codePoint, 0x80 + i]),
);

/** Width of every name field in both file formats */
export const NAME_FIELD_SIZE = 64;

export function decodeByte(byte: number): number {
  return byte >= 0x80 && byte < 0xa0 ? CP1252_HIGH[byte - 0x80] : byte;
}

export function encodeCodePoint(codePoint: number): number | undefined {
  if (codePoint === 0) return undefined;
  if (codePoint < 0x80) return codePoint;
  if (codePoint >= 0xa0 && codePoint <= 0xff) return codePoint;
  return CP1252_REVERSE.get(codePoint);
}

/**
 * Decode a NUL-terminated field. Bytes after the first NUL are ignored.
 */
export function decodeText(bytes: Uint8Array): string {
  let text = "";
  for (const byte of bytes) {
    if (byte === 0) break;
    text += String.fromCharCode(decodeByte(byte));
  }
  return text;
}

/**
 * Encode text into a NUL-padded field of `width` bytes.
 */
export function encodeText(
  text: string,
  width: number,
  chunkId?: string,
): Uint8Array {
  const field = new Uint8Array(width);
  let length = 0;
  for (const char of text) {
    const codePoint = char.codePointAt(0) ?? 0;
    const byte = encodeCodePoint(codePoint);
    if (byte === undefined) {
      throw new FormatError(
        "text-encoding",
        `"${text}" contains U+${codePoint.toString(16).toUpperCase().padStart(4, "0")}, which has no Windows-1252 byte`,
        chunkId,
      );
    }
    if (length >= width) {
      throw new FormatError(
        "field-overflow",
        `"${text}" does not fit in ${width} bytes`,
        chunkId,
      );
    }
    field[length++] = byte;
  }
  return field;
}
