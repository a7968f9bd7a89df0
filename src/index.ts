export { ConfigResolver, getConfigResolver, DEFAULT_TIMEOUT, DIRECTORY_MODE, ENV, OKTETO_FOLDER_NAME } from './utils/okteto-home.js';
export type { ConfigEnvironment } from './utils/environment.js';
export { createNodeEnvironment } from './utils/environment.js';
export type { Duration } from './utils/duration.js';
export { parseDuration, formatDuration, SECOND, MINUTE, HOUR, MAX_DURATION } from './utils/duration.js';
export {
  OktetoError,
  ConfigurationError,
  ConfigErrorCode,
  OverridePathMissingError,
  DirectoryCreateError,
  NoHomeDirectoryError,
  InvalidDurationError,
  InvalidArgumentError,
  getErrorMessage
} from './utils/errors.js';
export { logger, LogLevel } from './utils/logger.js';
