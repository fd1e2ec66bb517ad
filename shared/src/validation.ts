/**
 * Input Validation Utilities
 * Shared validation helpers for all plugins
 */

function toInt(value: string | number | undefined, defaultValue: number): number {
  if (typeof value === 'string') {
    return value.trim() === '' ? NaN : parseInt(value, 10);
  }
  return value ?? defaultValue;
}

/**
 * Validates a port number
 */
export function validatePort(value: string | number | undefined, defaultPort: number): number {
  const port = toInt(value, defaultPort);
  if (isNaN(port) || port < 1 || port > 65535) {
    return defaultPort;
  }
  return port;
}

/**
 * Validates a positive integer
 */
export function validatePositiveInt(
  value: string | number | undefined,
  defaultValue: number
): number {
  const num = toInt(value, defaultValue);
  if (isNaN(num) || num < 1) {
    return defaultValue;
  }
  return num;
}

/**
 * Validates a string against an allowed list
 */
export function validateEnum<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  defaultValue: T
): T;
export function validateEnum<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  defaultValue?: T
): T | undefined;
export function validateEnum<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  defaultValue?: T
): T | undefined {
  if (!value) {
    return defaultValue;
  }
  return allowed.find((candidate) => candidate === value) ?? defaultValue;
}
