/**
 * Reply values and decoders
 */

import { ProtocolError } from './errors';

/**
 * A decoded reply: nil, integer, simple string, bulk string or a nested array.
 */
export type RedisValue = null | number | string | Buffer | RedisValue[];

export type Decoder<T> = (value: RedisValue) => T;

/**
 * One page of a cursor iteration. A cursor of 0 means there are no further pages.
 */
export interface Page<T> {
  cursor: bigint;
  items: T[];
}

export function describe(value: RedisValue): string {
  if (value === null) {
    return 'nil';
  }
  if (Buffer.isBuffer(value)) {
    return `bulk(${value.length})`;
  }
  if (Array.isArray(value)) {
    return `array(${value.length})`;
  }
  return `${typeof value} ${JSON.stringify(value)}`;
}

function isText(value: RedisValue): value is string | Buffer {
  return typeof value === 'string' || Buffer.isBuffer(value);
}

export const asBuffer: Decoder<Buffer> = (value) => {
  if (!isText(value)) {
    throw new ProtocolError(`Expected a bulk string, got ${describe(value)}`);
  }
  return Buffer.isBuffer(value) ? value : Buffer.from(value);
};

export const asString: Decoder<string> = (value) => {
  if (typeof value === 'number') {
    return String(value);
  }
  return asBuffer(value).toString('utf8');
};

export const asInteger: Decoder<number> = (value) => {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  if (isText(value)) {
    const text = value.toString();
    if (/^-?\d+$/.test(text)) {
      return Number(text);
    }
  }
  throw new ProtocolError(`Expected an integer, got ${describe(value)}`);
};

export const asBoolean: Decoder<boolean> = (value) => asInteger(value) !== 0;

/**
 * Scores are sent as bulk strings, with "inf" and "-inf" for the infinities.
 */
export const asScore: Decoder<number> = (value) => {
  if (typeof value === 'number') {
    return value;
  }
  const text = asString(value).toLowerCase();
  if (text === 'inf' || text === '+inf') {
    return Infinity;
  }
  if (text === '-inf') {
    return -Infinity;
  }
  const score = Number(text);
  if (text.trim() === '' || Number.isNaN(score)) {
    throw new ProtocolError(`Expected a score, got ${describe(value)}`);
  }
  return score;
};

/**
 * Accepts the simple-string OK reply
 */
export const asOk: Decoder<void> = (value) => {
  if (!isText(value) || value.toString() !== 'OK') {
    throw new ProtocolError(`Expected OK, got ${describe(value)}`);
  }
};

export function asNullable<T>(decode: Decoder<T>): Decoder<T | null> {
  return (value) => (value === null ? null : decode(value));
}

export function asArray<T>(decode: Decoder<T>): Decoder<T[]> {
  return (value) => {
    if (!Array.isArray(value)) {
      throw new ProtocolError(`Expected an array, got ${describe(value)}`);
    }
    return value.map(decode);
  };
}

/**
 * Decodes a flat [a1, b1, a2, b2, ...] array into pairs
 */
export function asPairs<A, B>(decodeFirst: Decoder<A>, decodeSecond: Decoder<B>): Decoder<Array<[A, B]>> {
  return (value) => {
    if (!Array.isArray(value)) {
      throw new ProtocolError(`Expected an array, got ${describe(value)}`);
    }
    if (value.length % 2 !== 0) {
      throw new ProtocolError(`Expected an even number of elements, got ${value.length}`);
    }
    const pairs: Array<[A, B]> = [];
    for (let i = 0; i < value.length; i += 2) {
      pairs.push([decodeFirst(value[i]), decodeSecond(value[i + 1])]);
    }
    return pairs;
  };
}

export const asCursor: Decoder<bigint> = (value) => {
  const text = typeof value === 'number' ? String(value) : isText(value) ? value.toString() : '';
  if (!/^\d+$/.test(text)) {
    throw new ProtocolError(`Expected a cursor, got ${describe(value)}`);
  }
  return BigInt(text);
};

function splitPage(value: RedisValue): [bigint, RedisValue] {
  if (!Array.isArray(value) || value.length !== 2) {
    throw new ProtocolError(`Expected a scan page of [cursor, items], got ${describe(value)}`);
  }
  return [asCursor(value[0]), value[1]];
}

/**
 * Page decoder for families whose items are single values (SCAN, SSCAN)
 */
export function pageOf<T>(decodeItem: Decoder<T>): Decoder<Page<T>> {
  const decodeItems = asArray(decodeItem);
  return (value) => {
    const [cursor, items] = splitPage(value);
    return { cursor, items: decodeItems(items) };
  };
}

/**
 * Page decoder for families whose items come as flattened pairs (HSCAN, ZSCAN)
 */
export function pairPageOf<A, B>(decodeFirst: Decoder<A>, decodeSecond: Decoder<B>): Decoder<Page<[A, B]>> {
  const decodeItems = asPairs(decodeFirst, decodeSecond);
  return (value) => {
    const [cursor, items] = splitPage(value);
    return { cursor, items: decodeItems(items) };
  };
}
