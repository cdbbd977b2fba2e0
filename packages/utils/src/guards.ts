/**
 * Type Guards
 */

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isNonEmptyString(value: unknown): value is string {
  return isString(value) && value.trim().length > 0;
}

/**
 * Read the `code` of an errno- or SFTP-style error, if it has one
 */
export function errorCode(error: unknown): string | number | undefined {
  if (!isObject(error)) return undefined;
  const code = error['code'];
  return isString(code) || isNumber(code) ? code : undefined;
}
