/**
 * Path Utilities
 *
 * Remote paths are always POSIX, whatever the local platform.
 */

import { posix } from 'node:path';

/**
 * Ensure a remote directory ends with exactly one separator
 */
export function ensureTrailingSlash(dir: string): string {
  return `${dir.replace(/\/+$/, '')}/`;
}

/**
 * Split a filename into stem and extension.
 * The extension keeps its leading dot; dotfiles such as `.env` have none.
 */
export function splitExtension(filename: string): { stem: string; extension: string } {
  const name = posix.basename(filename);
  const extension = posix.extname(name);
  return {
    stem: name.slice(0, name.length - extension.length),
    extension,
  };
}
