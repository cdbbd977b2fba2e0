/**
 * Retrying Uploader
 * 
 * Sends one local file to one remote path. Transient failures are retried
 * with exponential backoff; each attempt re-sends the whole file.
 */

import {
  RemotePathNotFoundError,
  RemotePermissionDeniedError,
} from '@sftp-writer/core';
import { createLogger, errorCode, retry, type Logger, type RetryOptions } from '@sftp-writer/utils';

export const MAX_RETRIES = 5;

/**
 * SFTP status codes (draft-ietf-secsh-filexfer-02)
 */
export const SFTP_STATUS = {
  NO_SUCH_FILE: 2,
  PERMISSION_DENIED: 3,
  FAILURE: 4,
  NO_CONNECTION: 6,
  CONNECTION_LOST: 7,
} as const;

/**
 * Messages ssh2 rejects pending requests with when the connection goes away;
 * these errors carry no code
 */
const CONNECTION_LOSS_MESSAGES: ReadonlySet<string> = new Set([
  'No response from server',
  'Not connected',
]);

const NOT_FOUND_CODES: ReadonlySet<string | number> = new Set([SFTP_STATUS.NO_SUCH_FILE, 'ENOENT']);

const PERMISSION_CODES: ReadonlySet<string | number> = new Set([SFTP_STATUS.PERMISSION_DENIED, 'EACCES', 'EPERM']);

const TRANSIENT_CODES: ReadonlySet<string | number> = new Set([
  SFTP_STATUS.FAILURE,
  SFTP_STATUS.NO_CONNECTION,
  SFTP_STATUS.CONNECTION_LOST,
  'EIO',
  'ECONNRESET',
  'ECONNABORTED',
  'EPIPE',
  'ETIMEDOUT',
]);

export function isConnectionLossError(error: unknown): boolean {
  return error instanceof Error && errorCode(error) === undefined && CONNECTION_LOSS_MESSAGES.has(error.message);
}

export function isNotFoundError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && NOT_FOUND_CODES.has(code);
}

export function isPermissionError(error: unknown): boolean {
  const code = errorCode(error);
  return code !== undefined && PERMISSION_CODES.has(code);
}

/**
 * Connection, I/O and not-found errors may clear up on their own
 */
export function isRetryableUploadError(error: unknown): boolean {
  const code = errorCode(error);
  if (code === undefined) return isConnectionLossError(error);
  return TRANSIENT_CODES.has(code) || NOT_FOUND_CODES.has(code);
}

export interface UploadSession {
  put(localPath: string, remotePath: string): Promise<void>;
}

export interface UploaderOptions {
  /** Configured remote directory, named in error messages */
  remotePath: string;
  retry?: Partial<Omit<RetryOptions, 'retryIf' | 'onRetry'>>;
  logger?: Logger;
}

export class RetryingUploader {
  private readonly logger: Logger;

  constructor(private readonly options: UploaderOptions) {
    this.logger = options.logger ?? createLogger({ component: 'uploader' });
  }

  async upload(session: UploadSession, localPath: string, destination: string): Promise<void> {
    try {
      await retry(
        () => session.put(localPath, destination),
        {
          maxAttempts: MAX_RETRIES,
          ...this.options.retry,
          retryIf: isRetryableUploadError,
          onRetry: (error, attempt, delay) => {
            this.logger.warn(
              { err: error, attempt, delay, source: localPath, destination },
              'Upload attempt failed, retrying'
            );
          },
        }
      );
    } catch (error) {
      throw this.classify(error, destination);
    }
  }

  private classify(error: unknown, destination: string): unknown {
    if (isNotFoundError(error)) {
      return new RemotePathNotFoundError(this.options.remotePath, destination, error);
    }
    if (isPermissionError(error)) {
      return new RemotePermissionDeniedError(this.options.remotePath, destination, error);
    }
    return error;
  }
}

/**
 * Upload one file with the default retry policy
 */
export function uploadFile(
  session: UploadSession,
  localPath: string,
  destination: string,
  options: UploaderOptions
): Promise<void> {
  return new RetryingUploader(options).upload(session, localPath, destination);
}
