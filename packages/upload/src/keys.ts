/**
 * Private Key Parser
 * 
 * Turns configured key text into a key credential. Algorithms are tried
 * in a fixed order, RSA -> DSA -> ECDSA -> Ed25519; the first that decodes wins.
 */

import { utils } from 'ssh2';
import { InvalidCredentialError, type KeyAlgorithm, type KeyCredential } from '@sftp-writer/core';
import { createLogger, isNonEmptyString, isObject, isString, type Logger } from '@sftp-writer/utils';

export interface KeyParser {
  algorithm: KeyAlgorithm;
  label: string;
  /** Throws when the key text is not a valid key of this algorithm */
  parse: (keyText: string, passphrase?: string) => void;
}

/**
 * Map an SSH key type (`ssh-rsa`, `ecdsa-sha2-nistp256`, ...) to its algorithm family
 */
export function algorithmForKeyType(keyType: string): KeyAlgorithm | undefined {
  if (keyType === 'ssh-rsa') return 'rsa';
  if (keyType === 'ssh-dss') return 'dsa';
  if (keyType.startsWith('ecdsa-sha2-')) return 'ecdsa';
  if (keyType === 'ssh-ed25519') return 'ed25519';
  return undefined;
}

/**
 * SSH type of a parseKey result; OpenSSH-format keys come back as a one-element array
 */
function keyTypeOf(parsed: unknown): string | undefined {
  const key: unknown = Array.isArray(parsed) ? parsed[0] : parsed;
  const type = isObject(key) ? key['type'] : undefined;
  return isString(type) ? type : undefined;
}

function ssh2Parser(algorithm: KeyAlgorithm, label: string): KeyParser {
  return {
    algorithm,
    label,
    parse(keyText, passphrase) {
      const parsed = utils.parseKey(keyText, passphrase);
      if (parsed instanceof Error) {
        throw parsed;
      }
      const keyType = keyTypeOf(parsed);
      if (!keyType || algorithmForKeyType(keyType) !== algorithm) {
        throw new Error(`Not a ${label} key (found ${keyType ?? 'unknown'})`);
      }
    },
  };
}

export const DEFAULT_KEY_PARSERS: readonly KeyParser[] = [
  ssh2Parser('rsa', 'RSA'),
  ssh2Parser('dsa', 'DSA'),
  ssh2Parser('ecdsa', 'ECDSA'),
  ssh2Parser('ed25519', 'Ed25519'),
];

export interface ParsePrivateKeyOptions {
  passphrase?: string;
  parsers?: readonly KeyParser[];
  logger?: Logger;
}

/**
 * Parse configured key text.
 *
 * Returns null when no key is configured; throws InvalidCredentialError when
 * no algorithm accepts it.
 */
export function parsePrivateKey(
  keyText: string | undefined | null,
  options: ParsePrivateKeyOptions = {}
): KeyCredential | null {
  if (!isNonEmptyString(keyText)) {
    return null;
  }

  const parsers = options.parsers ?? DEFAULT_KEY_PARSERS;
  const log = options.logger ?? createLogger({ component: 'key-parser' });
  const attempted: string[] = [];
  let lastError: unknown;

  for (const [index, parser] of parsers.entries()) {
    attempted.push(parser.label);
    try {
      parser.parse(keyText, options.passphrase);
      log.debug({ algorithm: parser.algorithm }, 'Private key parsed');
      return {
        kind: 'key',
        algorithm: parser.algorithm,
        privateKey: keyText,
        passphrase: options.passphrase,
      };
    } catch (error) {
      lastError = error;
      const next = parsers[index + 1];
      log.warn(
        { err: error, algorithm: parser.algorithm },
        next
          ? `${parser.label} private key invalid, trying ${next.label}`
          : `${parser.label} private key invalid`
      );
    }
  }

  log.error({ err: lastError, attempted }, 'Private key is invalid');
  throw new InvalidCredentialError(attempted, lastError);
}
