/**
 * Error taxonomy
 *
 * Errors are fatal to the call that raises them and are never retried.
 * Warnings are plain data returned beside successful results.
 */

/**
 * Reasons a byte stream cannot be decoded, or a document cannot be encoded
 */
export type FormatErrorKind =
  | "truncated" // Fewer bytes than a chunk header needs
  | "payload-overflow" // record_size * record_count runs past the end of the data
  | "record-size" // Declared record size does not match the chunk's layout
  | "missing-chunk" // A required chunk is absent or out of order
  | "index-range" // A record references a point/wedge/bone that does not exist
  | "text-encoding" // A name holds a character outside the code page
  | "field-overflow"; // A value does not fit its fixed-width field

export class FormatError extends Error {
  readonly kind: FormatErrorKind;
  readonly chunkId?: string;

  constructor(kind: FormatErrorKind, message: string, chunkId?: string) {
    super(chunkId ? `${chunkId}: ${message}` : message);
    this.name = "FormatError";
    this.kind = kind;
    this.chunkId = chunkId;
  }
}

/**
 * Reasons an operation refuses to start
 */
export type PreconditionReason =
  | "no-target-skeleton"
  | "no-sequences"
  | "empty-material-slot"
  | "invalid-skeleton"
  | "duplicate-sequence"
  | "bone-name"
  | "invalid-range";

export class PreconditionError extends Error {
  readonly reason: PreconditionReason;

  constructor(reason: PreconditionReason, message: string) {
    super(message);
    this.name = "PreconditionError";
    this.reason = reason;
  }
}

/**
 * Non-fatal note about bone mapping
 */
export interface MappingWarning {
  kind: "collision" | "unmapped";
  message: string;
}

/**
 * Non-fatal note about an import run
 */
export interface ImportWarning {
  kind: "summary";
  message: string;
}

export type Warning = MappingWarning | ImportWarning;

export function isFormatError(error: unknown): error is FormatError {
  return error instanceof FormatError;
}

export function isPreconditionError(
  error: unknown,
): error is PreconditionError {
  return error instanceof PreconditionError;
}
