/**
 * redis-handoff client
 */

import {
  cmd,
  Command,
  CommandArg,
  CommandFactory,
  hscanFactory,
  KeyspaceScanOptions,
  scanFactory,
  ScanOptions,
  sscanFactory,
  zscanFactory
} from './command';
import { ConnectionLike, ConnectionOptions, IoRedisConnection } from './connection';
import { CommandError } from './errors';
import { MessageHandler, psubscribe, SubscribeOptions, subscribe, SubscriptionOutcome, SubscriptionResult } from './pubsub';
import { ScanStream } from './scanner';
import { ConnectionSlot } from './slot';
import { toChannelList, validateKey, validateValue } from './utils';
import {
  asArray,
  asBoolean,
  asBuffer,
  asInteger,
  asNullable,
  asOk,
  asPairs,
  asScore,
  Decoder,
  Page,
  pageOf,
  pairPageOf,
  RedisValue
} from './value';

export type Channels = string | Buffer | ReadonlyArray<string | Buffer>;

const UNSUBSCRIBE_ON_ERROR: SubscribeOptions = Object.freeze({ unsubscribeOnHandlerError: true });

export interface SetOptions {
  /** Expire the key after this many seconds (SET ... EX) */
  expireSeconds?: number;
}

/**
 * Owns one connection and lends it to one operation at a time. Calls made
 * while a scan or subscription has the connection fail with
 * ConnectionBusyError; once an operation loses the connection every later
 * call fails with ConnectionLostError.
 */
export class HandoffClient<C extends ConnectionLike = IoRedisConnection> {
  private readonly slot: ConnectionSlot<C>;

  constructor(connection: C) {
    this.slot = new ConnectionSlot(connection);
  }

  /**
   * Connect to a server and wrap the connection in a client
   */
  static async connect(options: ConnectionOptions): Promise<HandoffClient<IoRedisConnection>> {
    const connection = await IoRedisConnection.connect(options);
    return new HandoffClient(connection);
  }

  /**
   * Whether the connection is idle in the client
   */
  isIdle(): boolean {
    return this.slot.isHeld;
  }

  /**
   * Hand the connection back to the caller. The client cannot be used afterwards.
   */
  release(): C {
    const connection = this.slot.take();
    this.slot.invalidate();
    return connection;
  }

  /**
   * Send an arbitrary command and decode its reply
   */
  async command<T>(command: Command, decode: Decoder<T>): Promise<T> {
    const connection = this.slot.take();
    let reply: RedisValue;
    try {
      reply = await connection.issue(command);
    } catch (error) {
      if (error instanceof CommandError) {
        this.slot.put(connection);
      } else {
        this.slot.invalidate();
      }
      throw error;
    }
    this.slot.put(connection);
    return decode(reply);
  }

  async get(key: string | Buffer): Promise<Buffer | null> {
    return this.command(cmd('GET', validateKey(key)), asNullable(asBuffer));
  }

  async set(key: string | Buffer, value: string | Buffer, options: SetOptions = {}): Promise<void> {
    const args: CommandArg[] = [validateKey(key), validateValue(value)];
    if (options.expireSeconds !== undefined) {
      args.push('EX', options.expireSeconds);
    }
    return this.command(cmd('SET', ...args), asOk);
  }

  async del(...keys: Array<string | Buffer>): Promise<number> {
    return this.command(cmd('DEL', ...keys.map(validateKey)), asInteger);
  }

  async exists(...keys: Array<string | Buffer>): Promise<number> {
    return this.command(cmd('EXISTS', ...keys.map(validateKey)), asInteger);
  }

  async expire(key: string | Buffer, seconds: number): Promise<boolean> {
    return this.command(cmd('EXPIRE', validateKey(key), seconds), asBoolean);
  }

  async ttl(key: string | Buffer): Promise<number> {
    return this.command(cmd('TTL', validateKey(key)), asInteger);
  }

  async incrBy(key: string | Buffer, delta: number = 1): Promise<number> {
    return this.command(cmd('INCRBY', validateKey(key), delta), asInteger);
  }

  async keys(pattern: string | Buffer): Promise<Buffer[]> {
    return this.command(cmd('KEYS', pattern), asArray(asBuffer));
  }

  async hget(key: string | Buffer, field: string | Buffer): Promise<Buffer | null> {
    return this.command(cmd('HGET', validateKey(key), field), asNullable(asBuffer));
  }

  async hset(key: string | Buffer, field: string | Buffer, value: string | Buffer): Promise<number> {
    return this.command(cmd('HSET', validateKey(key), field, validateValue(value)), asInteger);
  }

  async hdel(key: string | Buffer, ...fields: Array<string | Buffer>): Promise<number> {
    return this.command(cmd('HDEL', validateKey(key), ...fields), asInteger);
  }

  async hgetall(key: string | Buffer): Promise<Map<string, Buffer>> {
    const pairs = await this.command(cmd('HGETALL', validateKey(key)), asPairs(asBuffer, asBuffer));
    return new Map(pairs.map(([field, value]) => [field.toString(), value]));
  }

  async sadd(key: string | Buffer, ...members: Array<string | Buffer>): Promise<number> {
    return this.command(cmd('SADD', validateKey(key), ...members), asInteger);
  }

  async srem(key: string | Buffer, ...members: Array<string | Buffer>): Promise<number> {
    return this.command(cmd('SREM', validateKey(key), ...members), asInteger);
  }

  async smembers(key: string | Buffer): Promise<Buffer[]> {
    return this.command(cmd('SMEMBERS', validateKey(key)), asArray(asBuffer));
  }

  async sismember(key: string | Buffer, member: string | Buffer): Promise<boolean> {
    return this.command(cmd('SISMEMBER', validateKey(key), member), asBoolean);
  }

  async zadd(key: string | Buffer, score: number, member: string | Buffer): Promise<number> {
    return this.command(cmd('ZADD', validateKey(key), score, member), asInteger);
  }

  async zrem(key: string | Buffer, ...members: Array<string | Buffer>): Promise<number> {
    return this.command(cmd('ZREM', validateKey(key), ...members), asInteger);
  }

  async zscore(key: string | Buffer, member: string | Buffer): Promise<number | null> {
    return this.command(cmd('ZSCORE', validateKey(key), member), asNullable(asScore));
  }

  async zrange(key: string | Buffer, start: number, stop: number): Promise<Buffer[]> {
    return this.command(cmd('ZRANGE', validateKey(key), start, stop), asArray(asBuffer));
  }

  async lpush(key: string | Buffer, ...values: Array<string | Buffer>): Promise<number> {
    return this.command(cmd('LPUSH', validateKey(key), ...values.map(validateValue)), asInteger);
  }

  async rpush(key: string | Buffer, ...values: Array<string | Buffer>): Promise<number> {
    return this.command(cmd('RPUSH', validateKey(key), ...values.map(validateValue)), asInteger);
  }

  async lrange(key: string | Buffer, start: number, stop: number): Promise<Buffer[]> {
    return this.command(cmd('LRANGE', validateKey(key), start, stop), asArray(asBuffer));
  }

  async publish(channel: string | Buffer, message: string | Buffer): Promise<number> {
    return this.command(cmd('PUBLISH', validateKey(channel), validateValue(message)), asInteger);
  }

  /**
   * Iterate over the keyspace
   */
  async* scan(options: KeyspaceScanOptions = {}): AsyncGenerator<Buffer, void, undefined> {
    yield* this.stream(scanFactory(options), pageOf(asBuffer));
  }

  /**
   * Iterate over the fields of a hash as [field, value] pairs
   */
  async* hscan(key: string | Buffer, options: ScanOptions = {}): AsyncGenerator<[Buffer, Buffer], void, undefined> {
    yield* this.stream(hscanFactory(key, options), pairPageOf(asBuffer, asBuffer));
  }

  /**
   * Iterate over the members of a set
   */
  async* sscan(key: string | Buffer, options: ScanOptions = {}): AsyncGenerator<Buffer, void, undefined> {
    yield* this.stream(sscanFactory(key, options), pageOf(asBuffer));
  }

  /**
   * Iterate over the members of a sorted set as [member, score] pairs
   */
  async* zscan(key: string | Buffer, options: ScanOptions = {}): AsyncGenerator<[Buffer, number], void, undefined> {
    yield* this.stream(zscanFactory(key, options), pairPageOf(asBuffer, asScore));
  }

  async scanAll(options: KeyspaceScanOptions = {}): Promise<Buffer[]> {
    return this.collectAll(scanFactory(options), pageOf(asBuffer));
  }

  async hscanAll(key: string | Buffer, options: ScanOptions = {}): Promise<Array<[Buffer, Buffer]>> {
    return this.collectAll(hscanFactory(key, options), pairPageOf(asBuffer, asBuffer));
  }

  async sscanAll(key: string | Buffer, options: ScanOptions = {}): Promise<Buffer[]> {
    return this.collectAll(sscanFactory(key, options), pageOf(asBuffer));
  }

  async zscanAll(key: string | Buffer, options: ScanOptions = {}): Promise<Array<[Buffer, number]>> {
    return this.collectAll(zscanFactory(key, options), pairPageOf(asBuffer, asScore));
  }

  /**
   * Subscribe to channels until the handler breaks. The connection is always
   * unsubscribed before it goes back to the client, also when the handler fails.
   */
  async subscribe<U>(channels: Channels, handler: MessageHandler<U>): Promise<SubscriptionResult<U>> {
    const list = toChannelList(channels);
    return this.withSubscription((connection) => subscribe(connection, list, handler, UNSUBSCRIBE_ON_ERROR));
  }

  /**
   * Subscribe to patterns until the handler breaks
   */
  async psubscribe<U>(patterns: Channels, handler: MessageHandler<U>): Promise<SubscriptionResult<U>> {
    const list = toChannelList(patterns);
    return this.withSubscription((connection) => psubscribe(connection, list, handler, UNSUBSCRIBE_ON_ERROR));
  }

  /**
   * Close the underlying connection
   */
  async close(this: HandoffClient<IoRedisConnection>): Promise<void> {
    await this.release().quit();
  }

  private async* stream<T>(factory: CommandFactory, decodePage: Decoder<Page<T>>): AsyncGenerator<T, void, undefined> {
    const stream = new ScanStream(this.slot.take(), factory, decodePage);
    let returned = false;
    try {
      for await (const step of stream) {
        if (step.connection !== undefined) {
          this.slot.put(step.connection);
          returned = true;
        }
        if (step.kind === 'item') {
          yield step.item;
        }
      }
    } finally {
      if (!returned) {
        this.slot.invalidate();
      }
    }
  }

  private async collectAll<T>(factory: CommandFactory, decodePage: Decoder<Page<T>>): Promise<T[]> {
    const stream = new ScanStream(this.slot.take(), factory, decodePage);
    try {
      const { connection, items } = await stream.all();
      this.slot.put(connection);
      return items;
    } catch (error) {
      this.slot.invalidate();
      throw error;
    }
  }

  private async withSubscription<U>(run: (connection: C) => Promise<SubscriptionOutcome<C, U>>): Promise<SubscriptionResult<U>> {
    const connection = this.slot.take();
    let outcome: SubscriptionOutcome<C, U>;
    try {
      outcome = await run(connection);
    } catch (error) {
      this.slot.invalidate();
      throw error;
    }
    this.slot.put(outcome.connection);
    return outcome.result;
  }
}
