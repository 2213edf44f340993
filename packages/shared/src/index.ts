/**
 * Shared types, errors and logging for the ActorX interchange packages
 *
 * @module @actorx/shared
 */

export type { Vec2, Vec3, Quat, Color, Transform } from "./types.js";

export {
  FormatError,
  PreconditionError,
  isFormatError,
  isPreconditionError,
} from "./errors.js";
export type {
  FormatErrorKind,
  PreconditionReason,
  MappingWarning,
  ImportWarning,
  Warning,
} from "./errors.js";

export { Logger, LOG_LEVEL_ENV } from "./utils/Logger.js";
export type { LogLevel, LogSink } from "./utils/Logger.js";
