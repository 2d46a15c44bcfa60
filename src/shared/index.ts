// Logging
export { Logger, logger, type ILogger, type LoggerOptions } from "./logger.js";

// Errors
export {
  RulesetBotError,
  ReadError,
  DecodeError,
  NotFoundInSourceError,
  NotFoundInTargetError,
  AuthError,
  UpstreamApiError,
  UnhandledActorTypeError,
  ContextError,
  hasCause,
  findCause,
  errorMessage,
  type EntityKind,
} from "./errors.js";

// Retry utilities
export {
  withRetry,
  isPermanentError,
  isTransientError,
  DEFAULT_PERMANENT_ERROR_PATTERNS,
  DEFAULT_TRANSIENT_ERROR_PATTERNS,
  AbortError,
  type RetryOptions,
} from "./retry-utils.js";

// Command execution
export {
  ShellCommandExecutor,
  CommandError,
  defaultExecutor,
  type ExecOptions,
  type ICommandExecutor,
} from "./command-executor.js";

// Shell utilities
export { escapeShellArg } from "./shell-utils.js";

// Sanitization
export { sanitizeCredentials } from "./sanitize-utils.js";
