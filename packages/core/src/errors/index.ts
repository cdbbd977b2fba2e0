/**
 * Custom Error Classes
 */

/**
 * Base error class for all sftp-writer errors
 */
export class SftpWriterError extends Error {
  public readonly code: string;
  public readonly userFacing: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options: {
      userFacing?: boolean;
      details?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SftpWriterError';
    this.code = code;
    this.userFacing = options.userFacing ?? false;
    this.details = options.details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * An error the operator can fix by changing the configuration.
 * Its message is shown as-is.
 */
export class UserError extends SftpWriterError {
  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, code, { userFacing: true, details, cause });
    this.name = 'UserError';
  }
}

export class ConfigurationError extends UserError {
  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super(
      issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
      'CONFIGURATION_ERROR',
      { issues },
      cause
    );
    this.name = 'ConfigurationError';
  }
}

export class InvalidCredentialError extends UserError {
  constructor(attempted: string[], cause?: unknown) {
    super(
      'Failed to parse private key',
      'INVALID_CREDENTIAL',
      { attempted },
      cause
    );
    this.name = 'InvalidCredentialError';
  }
}

export class AuthenticationFailedError extends UserError {
  constructor(host: string, port: number, cause?: unknown) {
    super(
      'Connection failed: recheck your authentication and host URL parameters',
      'AUTHENTICATION_FAILED',
      { host, port },
      cause
    );
    this.name = 'AuthenticationFailedError';
  }
}

export class ProtocolOrHostError extends UserError {
  constructor(host: string, port: number, cause?: unknown) {
    super(
      'Connection failed: recheck your host URL and port parameters',
      'PROTOCOL_OR_HOST_ERROR',
      { host, port },
      cause
    );
    this.name = 'ProtocolOrHostError';
  }
}

export class HostUnreachableError extends UserError {
  constructor(host: string, port: number, cause?: unknown) {
    super(
      'Connection failed: recheck your host URL and port parameters',
      'HOST_UNREACHABLE',
      { host, port },
      cause
    );
    this.name = 'HostUnreachableError';
  }
}

export class RemotePathNotFoundError extends UserError {
  constructor(remotePath: string, destination: string, cause?: unknown) {
    super(
      `Destination path: '${remotePath}' in SFTP Server not found, recheck the remote destination path`,
      'REMOTE_PATH_NOT_FOUND',
      { remotePath, destination },
      cause
    );
    this.name = 'RemotePathNotFoundError';
  }
}

export class RemotePermissionDeniedError extends UserError {
  constructor(remotePath: string, destination: string, cause?: unknown) {
    super(
      `Permission Error: you do not have permissions to write to '${remotePath}', choose a different directory on the SFTP server`,
      'REMOTE_PERMISSION_DENIED',
      { remotePath, destination },
      cause
    );
    this.name = 'RemotePermissionDeniedError';
  }
}

export const EXIT_CODES = {
  SUCCESS: 0,
  USER_ERROR: 1,
  APPLICATION_ERROR: 2,
} as const;

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];

export function isUserError(error: unknown): error is UserError {
  return error instanceof SftpWriterError && error.userFacing;
}

/**
 * Process exit code for an error that ended the run
 */
export function exitCodeFor(error: unknown): ExitCode {
  return isUserError(error) ? EXIT_CODES.USER_ERROR : EXIT_CODES.APPLICATION_ERROR;
}
