/**
 * Commands and the command factories used by cursor iteration
 */

import { freezeArg, validateCount, validateKey } from './utils';

export type CommandArg = string | Buffer | number | bigint;

export interface Command {
  readonly name: string;
  readonly args: readonly CommandArg[];
}

/**
 * Builds the command for one page of a cursor iteration. Called again for
 * every page, so it must not depend on anything but the cursor.
 */
export type CommandFactory = (cursor: bigint) => Command;

export interface ScanOptions {
  /** Glob-style pattern passed as MATCH */
  match?: string | Buffer;
  /** Page size hint passed as COUNT */
  count?: number;
}

export interface KeyspaceScanOptions extends ScanOptions {
  /** Only return keys of this type (SCAN ... TYPE) */
  type?: string;
}

export function cmd(name: string, ...args: CommandArg[]): Command {
  return Object.freeze({ name, args: Object.freeze(args) });
}

function scanTail(options: ScanOptions): CommandArg[] {
  const tail: CommandArg[] = [];
  if (options.match !== undefined) {
    tail.push('MATCH', freezeArg(options.match));
  }
  if (options.count !== undefined) {
    tail.push('COUNT', validateCount(options.count));
  }
  return tail;
}

/**
 * SCAN over the keyspace
 */
export function scanFactory(options: KeyspaceScanOptions = {}): CommandFactory {
  const tail = scanTail(options);
  if (options.type !== undefined) {
    tail.push('TYPE', options.type);
  }
  return (cursor) => cmd('SCAN', cursor, ...tail);
}

/**
 * HSCAN over the fields of a hash
 */
export function hscanFactory(key: string | Buffer, options: ScanOptions = {}): CommandFactory {
  return keyedScan('HSCAN', key, options);
}

/**
 * SSCAN over the members of a set
 */
export function sscanFactory(key: string | Buffer, options: ScanOptions = {}): CommandFactory {
  return keyedScan('SSCAN', key, options);
}

/**
 * ZSCAN over the members of a sorted set
 */
export function zscanFactory(key: string | Buffer, options: ScanOptions = {}): CommandFactory {
  return keyedScan('ZSCAN', key, options);
}

function keyedScan(name: string, key: string | Buffer, options: ScanOptions): CommandFactory {
  validateKey(key);
  const keyArg = freezeArg(key);
  const tail = scanTail(options);
  return (cursor) => cmd(name, keyArg, cursor, ...tail);
}
