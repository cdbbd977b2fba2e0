import { EventEmitter } from 'node:events';
import type { ConnectConfig } from 'ssh2';
import {
  AuthenticationFailedError,
  HostUnreachableError,
  ProtocolOrHostError,
} from '@sftp-writer/core';
import { createLogger } from '@sftp-writer/utils';
import {
  ConnectionLostError,
  ConnectionManager,
  SftpSession,
  buildConnectConfig,
  classifyConnectionError,
  type SftpChannel,
  type SshTransport,
} from '../src/connection.js';
import { SFTP_STATUS } from '../src/uploader.js';

class FakeChannel extends EventEmitter implements SftpChannel {
  puts: Array<[string, string]> = [];
  putError: Error | null = null;
  /** Never answer transfers, like ssh2 on a channel that has gone away */
  unresponsive = false;

  constructor(private readonly events: string[] = []) {
    super();
  }

  fastPut(localPath: string, remotePath: string, callback: (err?: Error | null) => void): void {
    this.puts.push([localPath, remotePath]);
    if (this.unresponsive) return;
    setImmediate(() => callback(this.putError));
  }

  end(): void {
    this.events.push('channel.end');
  }
}

interface FakeBehavior {
  handshakeError?: Error;
  sftpError?: Error;
  closeBeforeReady?: boolean;
}

class FakeTransport extends EventEmitter implements SshTransport {
  config?: ConnectConfig;
  readonly events: string[] = [];
  readonly channel = new FakeChannel(this.events);

  constructor(private readonly behavior: FakeBehavior = {}) {
    super();
  }

  connect(config: ConnectConfig): this {
    this.config = config;
    setImmediate(() => {
      if (this.behavior.handshakeError) {
        this.emit('error', this.behavior.handshakeError);
      } else if (this.behavior.closeBeforeReady) {
        this.emit('close');
      } else {
        this.emit('ready');
      }
    });
    return this;
  }

  sftp(callback: (err: Error | undefined, sftp: SftpChannel) => void): this {
    setImmediate(() => callback(this.behavior.sftpError, this.channel));
    return this;
  }

  end(): this {
    this.events.push('transport.end');
    return this;
  }
}

function sshError(message: string, extra: Record<string, unknown>): Error {
  return Object.assign(new Error(message), extra);
}

const authFailure = sshError('All configured authentication methods failed', { level: 'client-authentication' });
const protocolFailure = sshError('Handshake failed: no matching key exchange algorithm', { level: 'handshake' });
const dnsFailure = sshError('getaddrinfo ENOTFOUND sftp.invalid', { level: 'client-socket', code: 'ENOTFOUND' });

describe('ConnectionManager', () => {
  const logger = createLogger({ component: 'connection-test' });
  const options = {
    host: 'sftp.example.com',
    port: 22,
    username: 'uploader',
    password: 'test-secret',
  };

  function managerFor(transport: FakeTransport): ConnectionManager {
    return new ConnectionManager({ transportFactory: () => transport, logger });
  }

  test('opens a session over the SFTP channel', async () => {
    const transport = new FakeTransport();
    const session = await managerFor(transport).connect(options);

    await session.put('/tmp/report.csv', '/upload/report.csv');

    expect(transport.config).toEqual({
      host: 'sftp.example.com',
      port: 22,
      username: 'uploader',
      password: 'test-secret',
    });
    expect(transport.channel.puts).toEqual([['/tmp/report.csv', '/upload/report.csv']]);
    expect(session.isClosed).toBe(false);
  });

  test('maps an authentication rejection to AuthenticationFailedError', async () => {
    const transport = new FakeTransport({ handshakeError: authFailure });

    await expect(managerFor(transport).connect(options)).rejects.toBeInstanceOf(AuthenticationFailedError);
    expect(transport.events).toEqual(['transport.end']);
  });

  test('maps a protocol failure to ProtocolOrHostError', async () => {
    const transport = new FakeTransport({ handshakeError: protocolFailure });
    await expect(managerFor(transport).connect(options)).rejects.toBeInstanceOf(ProtocolOrHostError);
  });

  test('maps a DNS failure to HostUnreachableError', async () => {
    const transport = new FakeTransport({ handshakeError: dnsFailure });
    await expect(managerFor(transport).connect(options)).rejects.toBeInstanceOf(HostUnreachableError);
  });

  test('fails when the server hangs up before the handshake completes', async () => {
    const transport = new FakeTransport({ closeBeforeReady: true });

    await expect(managerFor(transport).connect(options)).rejects.toBeInstanceOf(ProtocolOrHostError);
    expect(transport.events).toEqual(['transport.end']);
    expect(transport.listenerCount('ready')).toBe(0);
    expect(transport.listenerCount('error')).toBe(0);
  });

  test('detaches handshake listeners once connected', async () => {
    const transport = new FakeTransport();
    await managerFor(transport).connect(options);

    expect(transport.listenerCount('ready')).toBe(0);
    // the session's connection-loss listener
    expect(transport.listenerCount('close')).toBe(1);
  });

  test('closes the transport when the SFTP channel cannot be opened', async () => {
    const transport = new FakeTransport({ sftpError: new Error('Unable to start subsystem: sftp') });

    await expect(managerFor(transport).connect(options)).rejects.toBeInstanceOf(ProtocolOrHostError);
    expect(transport.events).toEqual(['transport.end']);
  });
});

describe('classifyConnectionError', () => {
  test('produces three distinct error kinds', () => {
    const kinds = [authFailure, protocolFailure, dnsFailure]
      .map(error => classifyConnectionError(error, 'sftp.example.com', 22))
      .map(error => error.constructor);

    expect(kinds).toEqual([AuthenticationFailedError, ProtocolOrHostError, HostUnreachableError]);
  });

  test('treats refused connections and timeouts as unreachable', () => {
    const refused = sshError('connect ECONNREFUSED', { code: 'ECONNREFUSED' });
    const timeout = sshError('Timed out while waiting for handshake', { level: 'client-timeout' });

    expect(classifyConnectionError(refused, 'h', 22)).toBeInstanceOf(HostUnreachableError);
    expect(classifyConnectionError(timeout, 'h', 22)).toBeInstanceOf(HostUnreachableError);
  });

  test('treats DNS lookup failures as unreachable', () => {
    const lookup = sshError('getaddrinfo EAI_FAIL sftp.invalid', { level: 'client-dns', code: 'EAI_FAIL' });
    expect(classifyConnectionError(lookup, 'sftp.invalid', 22)).toBeInstanceOf(HostUnreachableError);
  });

  test('keeps the original error as cause', () => {
    expect(classifyConnectionError(authFailure, 'h', 22).cause).toBe(authFailure);
  });
});

describe('buildConnectConfig', () => {
  test('passes the password alongside the key and as its passphrase', () => {
    const config = buildConnectConfig({
      host: 'h',
      port: 2222,
      username: 'u',
      password: 'test-secret',
      credential: { kind: 'key', algorithm: 'ed25519', privateKey: 'KEY' },
    });

    expect(config).toEqual({
      host: 'h',
      port: 2222,
      username: 'u',
      password: 'test-secret',
      privateKey: 'KEY',
      passphrase: 'test-secret',
    });
  });

  test('prefers the passphrase stored on the credential', () => {
    const config = buildConnectConfig({
      host: 'h',
      port: 22,
      username: 'u',
      credential: { kind: 'key', algorithm: 'rsa', privateKey: 'KEY', passphrase: 'key-passphrase' },
    });

    expect(config.passphrase).toBe('key-passphrase');
    expect(config.password).toBeUndefined();
  });
});

describe('SftpSession', () => {
  const logger = createLogger({ component: 'session-test' });

  test('ends the channel before the transport, once', () => {
    const transport = new FakeTransport();
    const session = new SftpSession(transport, transport.channel, logger);

    session.close();
    session.close();

    expect(transport.events).toEqual(['channel.end', 'transport.end']);
    expect(session.isClosed).toBe(true);
  });

  test('rejects uploads after close', async () => {
    const transport = new FakeTransport();
    const session = new SftpSession(transport, transport.channel, logger);
    session.close();

    await expect(session.put('/tmp/a', '/upload/a')).rejects.toThrow('SFTP session is closed');
  });

  test('surfaces transfer errors', async () => {
    const transport = new FakeTransport();
    const failure = Object.assign(new Error('Permission denied'), { code: 3 });
    transport.channel.putError = failure;
    const session = new SftpSession(transport, transport.channel, logger);

    await expect(session.put('/tmp/a', '/upload/a')).rejects.toBe(failure);
  });

  test('rejects uploads once the server drops the connection', async () => {
    const transport = new FakeTransport();
    const session = new SftpSession(transport, transport.channel, logger);

    transport.emit('close');

    const failure = session.put('/tmp/a', '/upload/a');
    await expect(failure).rejects.toBeInstanceOf(ConnectionLostError);
    await expect(failure).rejects.toHaveProperty('code', SFTP_STATUS.NO_CONNECTION);
    expect(transport.channel.puts).toEqual([]);
    expect(session.isLost).toBe(true);
    expect(session.isClosed).toBe(false);
  });

  test('fails an in-flight upload when the channel closes', async () => {
    const transport = new FakeTransport();
    transport.channel.unresponsive = true;
    const session = new SftpSession(transport, transport.channel, logger);

    const upload = session.put('/tmp/a', '/upload/a');
    transport.channel.emit('close');

    await expect(upload).rejects.toBeInstanceOf(ConnectionLostError);
  });

  test('still releases a lost connection on close', () => {
    const transport = new FakeTransport();
    const session = new SftpSession(transport, transport.channel, logger);

    transport.emit('close');
    session.close();

    expect(transport.events).toEqual(['channel.end', 'transport.end']);
  });
});
