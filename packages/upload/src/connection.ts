/**
 * Connection Manager
 * 
 * Opens the SSH transport, authenticates and opens the SFTP channel.
 * Failures are classified into three terminal errors:
 * - authentication rejected      -> AuthenticationFailedError
 * - name resolution / network    -> HostUnreachableError
 * - handshake / protocol / other -> ProtocolOrHostError
 */

import { Client, type ConnectConfig } from 'ssh2';
import {
  AuthenticationFailedError,
  HostUnreachableError,
  ProtocolOrHostError,
  type KeyCredential,
  type UserError,
} from '@sftp-writer/core';
import { createLogger, errorCode, isObject, isString, type Logger } from '@sftp-writer/utils';
import { SFTP_STATUS } from './uploader.js';

/**
 * The part of an ssh2 SFTP channel the writer uses
 */
export interface SftpChannel {
  fastPut(localPath: string, remotePath: string, callback: (err?: Error | null) => void): void;
  once(event: 'close', listener: () => void): unknown;
  end(): void;
}

/**
 * The part of an ssh2 Client the writer uses
 */
export interface SshTransport {
  once(event: 'ready', listener: () => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  removeListener(event: 'ready', listener: () => void): unknown;
  removeListener(event: 'error', listener: (err: Error) => void): unknown;
  removeListener(event: 'close', listener: () => void): unknown;
  connect(config: ConnectConfig): unknown;
  sftp(callback: (err: Error | undefined, sftp: SftpChannel) => void): unknown;
  end(): unknown;
}

export type TransportFactory = () => SshTransport;

export const createSsh2Transport: TransportFactory = () => new Client();

export interface ConnectOptions {
  host: string;
  port: number;
  username: string;
  password?: string;
  credential?: KeyCredential | null;
  readyTimeout?: number;
}

const UNREACHABLE_CODES = new Set([
  'ENOTFOUND',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
]);

const UNREACHABLE_LEVELS = new Set(['client-socket', 'client-dns', 'client-timeout']);

function errorLevel(error: unknown): string | undefined {
  if (!isObject(error)) return undefined;
  const level = error['level'];
  return isString(level) ? level : undefined;
}

/**
 * Map a handshake failure to the error shown to the operator
 */
export function classifyConnectionError(error: unknown, host: string, port: number): UserError {
  const level = errorLevel(error);
  const code = errorCode(error);

  if (level === 'client-authentication') {
    return new AuthenticationFailedError(host, port, error);
  }
  if ((isString(code) && UNREACHABLE_CODES.has(code)) || (level && UNREACHABLE_LEVELS.has(level))) {
    return new HostUnreachableError(host, port, error);
  }
  return new ProtocolOrHostError(host, port, error);
}

/**
 * Build the ssh2 connect configuration.
 * The password is always passed through, and doubles as the key passphrase.
 */
export function buildConnectConfig(options: ConnectOptions): ConnectConfig {
  const config: ConnectConfig = {
    host: options.host,
    port: options.port,
    username: options.username,
  };

  if (options.password !== undefined) {
    config.password = options.password;
  }
  if (options.readyTimeout !== undefined) {
    config.readyTimeout = options.readyTimeout;
  }
  if (options.credential) {
    config.privateKey = options.credential.privateKey;
    const passphrase = options.credential.passphrase ?? options.password;
    if (passphrase !== undefined) {
      config.passphrase = passphrase;
    }
  }

  return config;
}

/**
 * Raised for transfers on a connection the server has dropped.
 * Carries the SFTP NO_CONNECTION status so the uploader treats it as transient.
 */
export class ConnectionLostError extends Error {
  readonly code = SFTP_STATUS.NO_CONNECTION;

  constructor(message = 'SFTP connection lost') {
    super(message);
    this.name = 'ConnectionLostError';
  }
}

/**
 * Exclusive handle on one transport and its SFTP channel.
 * The channel is always ended before the transport.
 */
export class SftpSession {
  private closed = false;
  private lost = false;
  private readonly pending = new Set<(err: Error) => void>();

  constructor(
    private readonly transport: SshTransport,
    private readonly channel: SftpChannel,
    private readonly logger: Logger
  ) {
    // ssh2 drops requests written to a closed channel without calling back
    transport.once('close', () => this.markLost('transport'));
    channel.once('close', () => this.markLost('channel'));
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** True once the server side has gone away */
  get isLost(): boolean {
    return this.lost;
  }

  put(localPath: string, remotePath: string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error('SFTP session is closed'));
    }
    if (this.lost) {
      return Promise.reject(new ConnectionLostError());
    }
    return new Promise((resolve, reject) => {
      this.pending.add(reject);
      this.channel.fastPut(localPath, remotePath, (err) => {
        this.pending.delete(reject);
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  private markLost(source: 'transport' | 'channel'): void {
    if (this.closed || this.lost) return;
    this.lost = true;
    this.logger.warn({ source, pending: this.pending.size }, 'SFTP connection lost');

    const error = new ConnectionLostError();
    for (const reject of this.pending) {
      reject(error);
    }
    this.pending.clear();
  }

  close(): void {
    if (this.closed) {
      this.logger.debug('SFTP session already closed');
      return;
    }
    this.closed = true;
    try {
      this.channel.end();
    } finally {
      this.transport.end();
      this.logger.info('Connection closed');
    }
  }
}

export class ConnectionManager {
  private readonly createTransport: TransportFactory;
  private readonly logger: Logger;

  constructor(options: { transportFactory?: TransportFactory; logger?: Logger } = {}) {
    this.createTransport = options.transportFactory ?? createSsh2Transport;
    this.logger = options.logger ?? createLogger({ component: 'connection' });
  }

  /**
   * Connect and open the SFTP channel. The caller owns the returned session.
   */
  async connect(options: ConnectOptions): Promise<SftpSession> {
    const { host, port } = options;
    const transport = this.createTransport();

    this.logger.info({ host, port, username: options.username, auth: options.credential ? 'key' : 'password' }, 'Connecting to SFTP server');

    try {
      await this.handshake(transport, buildConnectConfig(options));
    } catch (error) {
      transport.end();
      const classified = classifyConnectionError(error, host, port);
      this.logger.error({ err: error, host, port, code: classified.code }, 'Connection failed');
      throw classified;
    }

    // Errors after the handshake surface through the pending SFTP call
    transport.on('error', (err) => {
      this.logger.error({ err }, 'SSH transport error');
    });

    let channel: SftpChannel;
    try {
      channel = await this.openChannel(transport);
    } catch (error) {
      transport.end();
      this.logger.error({ err: error, host, port }, 'Failed to open SFTP channel');
      throw new ProtocolOrHostError(host, port, error);
    }

    this.logger.info({ host, port }, 'Connected');
    return new SftpSession(transport, channel, this.logger);
  }

  private handshake(transport: SshTransport, config: ConnectConfig): Promise<void> {
    return new Promise((resolve, reject) => {
      const onReady = (): void => {
        transport.removeListener('error', onError);
        transport.removeListener('close', onClose);
        resolve();
      };
      const onError = (err: Error): void => {
        transport.removeListener('ready', onReady);
        transport.removeListener('close', onClose);
        reject(err);
      };
      // A server that closes after its banner produces neither ready nor error
      const onClose = (): void => {
        transport.removeListener('ready', onReady);
        transport.removeListener('error', onError);
        reject(new Error('Connection closed by server during handshake'));
      };
      transport.once('ready', onReady);
      transport.once('error', onError);
      transport.once('close', onClose);
      transport.connect(config);
    });
  }

  private openChannel(transport: SshTransport): Promise<SftpChannel> {
    return new Promise((resolve, reject) => {
      const onClose = (): void => {
        reject(new Error('Connection closed while opening the SFTP channel'));
      };
      transport.once('close', onClose);
      transport.sftp((err, sftp) => {
        transport.removeListener('close', onClose);
        if (err) {
          reject(err);
        } else {
          resolve(sftp);
        }
      });
    });
  }
}
