/**
 * Credential Types
 */

export const KEY_ALGORITHMS = ['rsa', 'dsa', 'ecdsa', 'ed25519'] as const;

export type KeyAlgorithm = typeof KEY_ALGORITHMS[number];

export interface PasswordCredential {
  kind: 'password';
  password: string;
}

export interface KeyCredential {
  kind: 'key';
  algorithm: KeyAlgorithm;
  /** Key material exactly as configured */
  privateKey: string;
  passphrase?: string;
}

export type Credential = PasswordCredential | KeyCredential;
