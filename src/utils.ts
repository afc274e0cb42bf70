/**
 * Utility functions for redis-handoff
 */

import { InvalidArgumentError } from './errors';

/**
 * Convert a string or Buffer to a Buffer
 */
export function toBuffer(value: string | Buffer): Buffer {
  if (Buffer.isBuffer(value)) {
    return value;
  }
  return Buffer.from(value);
}

/**
 * Validate key size
 */
export function validateKey(key: string | Buffer): Buffer {
  const keyBuffer = toBuffer(key);
  if (keyBuffer.length === 0) {
    throw new InvalidArgumentError('Key cannot be empty');
  }
  if (keyBuffer.length > 512 * 1024 * 1024) {
    throw new InvalidArgumentError('Key cannot be larger than 512MB');
  }
  return keyBuffer;
}

/**
 * Validate value size
 */
export function validateValue(value: string | Buffer): Buffer {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError('Value cannot be null or undefined');
  }

  const valueBuffer = toBuffer(value);
  if (valueBuffer.length > 512 * 1024 * 1024) {
    throw new InvalidArgumentError('Value cannot be larger than 512MB');
  }
  return valueBuffer;
}

/**
 * Validate a COUNT hint for scan commands
 */
export function validateCount(count: number): number {
  if (!Number.isInteger(count) || count <= 0) {
    throw new InvalidArgumentError(`Count must be a positive integer, got ${count}`);
  }
  return count;
}

/**
 * Normalize one channel (or pattern) or a list of them into a non-empty list of Buffers
 */
export function toChannelList(channels: string | Buffer | ReadonlyArray<string | Buffer>): Buffer[] {
  const list = typeof channels === 'string' || Buffer.isBuffer(channels) ? [channels] : [...channels];
  if (list.length === 0) {
    throw new InvalidArgumentError('At least one channel is required');
  }
  return list.map(validateKey);
}

/**
 * Copy a Buffer so later mutation by the caller cannot leak into a captured argument
 */
export function freezeArg(value: string | Buffer): string | Buffer {
  return Buffer.isBuffer(value) ? Buffer.from(value) : value;
}
