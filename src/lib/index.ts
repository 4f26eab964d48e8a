// Error classes
export {
  WikismithError,
  ValidationError,
  ParseError,
  ConfigError,
  GenerationError,
  TemplateNotFoundError,
  TemplateLoadError,
  TemplateCycleError,
  RecursionLimitError,
} from "./errors.js";

// Result type and utilities
export {
  ok,
  err,
  unwrap,
  tryCatch,
  tryCatchAsync,
} from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger, Logger } from "./logger.js";
export type { LogLevel } from "./logger.js";
