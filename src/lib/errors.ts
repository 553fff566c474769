/**
 * Structured Error Classes for devdrop
 *
 * Every failure a command can report is one of these. The CLI prints
 * `Error: <message>` for any of them and exits non-zero.
 */

export const ErrorCodes = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',

  CONFIG_PARSE_FAILED: 'CONFIG_PARSE_FAILED',
  CONFIG_WRITE_FAILED: 'CONFIG_WRITE_FAILED',

  NOT_LOGGED_IN: 'NOT_LOGGED_IN',
  NO_ENVIRONMENTS: 'NO_ENVIRONMENTS',
  NO_CURRENT_ENVIRONMENT: 'NO_CURRENT_ENVIRONMENT',
  ENVIRONMENT_NOT_FOUND: 'ENVIRONMENT_NOT_FOUND',
  NO_CONTAINER_TO_COMMIT: 'NO_CONTAINER_TO_COMMIT',

  DOCKER_CONNECTION_FAILED: 'DOCKER_CONNECTION_FAILED',
  DOCKER_OPERATION_FAILED: 'DOCKER_OPERATION_FAILED',
  IMAGE_NOT_FOUND: 'IMAGE_NOT_FOUND',
  REGISTRY_REQUEST_FAILED: 'REGISTRY_REQUEST_FAILED',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all devdrop errors
 */
export class DevDropError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;
  public override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message);
    this.name = 'DevDropError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      cause: this.cause ? { message: this.cause.message } : undefined,
    };
  }

  getUserMessage(): string {
    return `${this.message} (${this.code})`;
  }
}

export class ValidationError extends DevDropError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.VALIDATION_FAILED, details);
    this.name = 'ValidationError';
  }
}

export class ConfigParseError extends DevDropError {
  constructor(path: string, cause?: Error) {
    super(
      `failed to parse config file ${path}: ${cause?.message ?? 'invalid content'}. Fix or delete the file and try again`,
      ErrorCodes.CONFIG_PARSE_FAILED,
      { path },
      cause,
    );
    this.name = 'ConfigParseError';
  }
}

export class ConfigWriteError extends DevDropError {
  constructor(path: string, cause?: Error) {
    super(
      `failed to write config file ${path}: ${cause?.message ?? 'unknown error'}`,
      ErrorCodes.CONFIG_WRITE_FAILED,
      { path },
      cause,
    );
    this.name = 'ConfigWriteError';
  }
}

export class NotLoggedInError extends DevDropError {
  constructor(message = "you must run 'devdrop login' first to authenticate with Docker Hub") {
    super(message, ErrorCodes.NOT_LOGGED_IN);
    this.name = 'NotLoggedInError';
  }
}

export class NoEnvironmentsError extends DevDropError {
  constructor() {
    super("no environments configured. Run 'devdrop init' to create one", ErrorCodes.NO_ENVIRONMENTS);
    this.name = 'NoEnvironmentsError';
  }
}

export class NoCurrentEnvironmentError extends DevDropError {
  constructor() {
    super(
      "no current environment set. Run 'devdrop switch' to select one",
      ErrorCodes.NO_CURRENT_ENVIRONMENT,
    );
    this.name = 'NoCurrentEnvironmentError';
  }
}

export class EnvironmentNotFoundError extends DevDropError {
  constructor(public readonly environment: string) {
    super(
      `environment '${environment}' not found. Run 'devdrop ls' to see available environments`,
      ErrorCodes.ENVIRONMENT_NOT_FOUND,
      { environment },
    );
    this.name = 'EnvironmentNotFoundError';
  }
}

export class NoContainerToCommitError extends DevDropError {
  constructor(public readonly environment: string) {
    super(
      `no container to commit for environment '${environment}'. Run 'devdrop init' or 'devdrop run' first`,
      ErrorCodes.NO_CONTAINER_TO_COMMIT,
      { environment },
    );
    this.name = 'NoContainerToCommitError';
  }
}

export class ConnectionError extends DevDropError {
  constructor(cause?: Error) {
    super(
      `failed to connect to Docker: ${cause?.message ?? 'daemon unreachable'}`,
      ErrorCodes.DOCKER_CONNECTION_FAILED,
      {},
      cause,
    );
    this.name = 'ConnectionError';
  }
}

export class EngineOperationError extends DevDropError {
  constructor(
    public readonly operation: string,
    message: string,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, ErrorCodes.DOCKER_OPERATION_FAILED, { ...details, operation }, cause);
    this.name = 'EngineOperationError';
  }
}

export class ImageNotFoundError extends DevDropError {
  constructor(
    public readonly image: string,
    message = `image ${image} not found`,
    cause?: Error,
  ) {
    super(message, ErrorCodes.IMAGE_NOT_FOUND, { image }, cause);
    this.name = 'ImageNotFoundError';
  }
}

export class RegistryRequestError extends DevDropError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCodes.REGISTRY_REQUEST_FAILED, details, cause);
    this.name = 'RegistryRequestError';
  }
}

export function isDevDropError(error: unknown): error is DevDropError {
  return error instanceof DevDropError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap anything thrown into a DevDropError, keeping typed errors as they are
 */
export function toDevDropError(error: unknown): DevDropError {
  if (isDevDropError(error)) {
    return error;
  }
  return new DevDropError(
    errorMessage(error),
    ErrorCodes.INTERNAL_ERROR,
    {},
    error instanceof Error ? error : undefined,
  );
}

const NOT_FOUND_MARKERS = ['not found', '404', 'does not exist', 'pull access denied'];

/**
 * Best-effort check for "image is missing" on engine errors.
 *
 * A 404 status from the engine API is authoritative. Without one, the engine's
 * message text is matched against known phrases.
 */
export function isImageNotFoundFailure(error: unknown): boolean {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    if (error.statusCode === 404) {
      return true;
    }
  }
  const text = errorMessage(error).toLowerCase();
  return NOT_FOUND_MARKERS.some((marker) => text.includes(marker));
}
