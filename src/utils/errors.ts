export class OktetoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OktetoError';
  }
}

/**
 * Configuration error codes for categorizing resolution failures
 */
export enum ConfigErrorCode {
  OVERRIDE_PATH_MISSING = 'OVERRIDE_PATH_MISSING',
  DIRECTORY_CREATE_FAILED = 'DIRECTORY_CREATE_FAILED',
  NO_HOME_DIRECTORY = 'NO_HOME_DIRECTORY'
}

export class ConfigurationError extends OktetoError {
  constructor(
    message: string,
    public code: ConfigErrorCode
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * An override variable points to a path that does not exist
 */
export class OverridePathMissingError extends ConfigurationError {
  constructor(
    public variable: string,
    public path: string,
    message = `${variable} doesn't exist: ${path}`
  ) {
    super(message, ConfigErrorCode.OVERRIDE_PATH_MISSING);
    this.name = 'OverridePathMissingError';
  }
}

export class DirectoryCreateError extends ConfigurationError {
  constructor(
    public path: string,
    public originalError?: Error
  ) {
    super(
      `failed to create ${path}: ${originalError ? originalError.message : 'unknown error'}`,
      ConfigErrorCode.DIRECTORY_CREATE_FAILED
    );
    this.name = 'DirectoryCreateError';
  }
}

export class NoHomeDirectoryError extends ConfigurationError {
  constructor(public variables: string[]) {
    super(
      `couldn't determine your home directory: ${variables.join(', ')} are empty. Use $OKTETO_HOME to set your home directory`,
      ConfigErrorCode.NO_HOME_DIRECTORY
    );
    this.name = 'NoHomeDirectoryError';
  }
}

export class InvalidDurationError extends OktetoError {
  constructor(public input: string) {
    super(`'${input}' is not a valid duration`);
    this.name = 'InvalidDurationError';
  }
}

export class InvalidArgumentError extends OktetoError {
  constructor(
    public argument: string,
    reason: string
  ) {
    super(`Invalid ${argument}: ${reason}`);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Extracts error message from unknown error type
 * @param error - The caught error (unknown type)
 * @returns Error message as string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
