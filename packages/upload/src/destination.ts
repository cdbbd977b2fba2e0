/**
 * Destination Resolver
 * 
 * Builds the remote path for an upload:
 *   <remotePath>/<stem>[_<timestamp>]<extension>
 */

import {
  DEFAULT_TIMESTAMP_FORMAT,
  ensureTrailingSlash,
  formatTimestamp,
  splitExtension,
} from '@sftp-writer/utils';

export interface DestinationOptions {
  remotePath: string;
  appendDate: boolean;
  dateFormat?: string;
}

export function resolveDestination(
  name: string,
  options: DestinationOptions,
  now: Date = new Date()
): string {
  const { stem, extension } = splitExtension(name);
  const suffix = options.appendDate
    ? `_${formatTimestamp(now, options.dateFormat ?? DEFAULT_TIMESTAMP_FORMAT)}`
    : '';

  return `${ensureTrailingSlash(options.remotePath)}${stem}${suffix}${extension}`;
}
