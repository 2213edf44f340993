/**
 * File helpers: one bulk read or write per call.
 *
 * Documents are encoded in full before the file is opened, so a failed
 * encode leaves the destination untouched.
 */

import { readFile, writeFile } from "fs/promises";
import { readPsk } from "./psk/reader.js";
import { writePsk } from "./psk/writer.js";
import { readPsa } from "./psa/reader.js";
import { writePsa } from "./psa/writer.js";
import type { PsaDocument, PskDocument } from "./types.js";

export async function readPskFile(filePath: string): Promise<PskDocument> {
  return readPsk(await readFile(filePath));
}

export async function writePskFile(
  filePath: string,
  doc: PskDocument,
): Promise<void> {
  const bytes = writePsk(doc);
  await writeFile(filePath, bytes);
}

export async function readPsaFile(filePath: string): Promise<PsaDocument> {
  return readPsa(await readFile(filePath));
}

export async function writePsaFile(
  filePath: string,
  doc: PsaDocument,
): Promise<void> {
  const bytes = writePsa(doc);
  await writeFile(filePath, bytes);
}
