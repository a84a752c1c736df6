// Error classes
export {
  DocppError,
  ValidationError,
  ConfigError,
  UnknownClassError,
  UnknownKindError,
  RenderError,
  InputIOError,
} from "./errors.js";
export type { SourceLocation } from "./errors.js";

// Result type and utilities
export {
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  all,
  tryCatch,
  tryCatchAsync,
} from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger, Logger, isLogLevel, LOG_LEVEL_NAMES } from "./logger.js";
export type { LogLevel } from "./logger.js";
