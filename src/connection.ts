/**
 * Connection handles for redis-handoff
 */

import Redis from 'ioredis';
import { Command, CommandArg } from './command';
import { CommandError, ConnectionBusyError, ConnectionError, HandoffError, ProtocolError, TimeoutError } from './errors';
import { RedisValue } from './value';

/**
 * What the scan and subscription state machines need from a connection.
 * Whoever holds the reference owns the handle; only one operation may be
 * outstanding on it at a time.
 */
export interface ConnectionLike {
  /** Send one command and resolve with its single reply */
  issue(command: Command): Promise<RedisValue>;
  /** Resolve with the next frame the server pushes without a request */
  awaitPush(): Promise<RedisValue>;
}

export interface ConnectionOptions {
  host: string;
  port: number;
  db?: number;
  connectTimeout?: number;
  requestTimeout?: number;
}

interface PushWaiter {
  resolve: (frame: RedisValue) => void;
  reject: (error: Error) => void;
}

const MESSAGE = Buffer.from('message');
const PMESSAGE = Buffer.from('pmessage');

const SUBSCRIBE_COMMANDS = new Set(['subscribe', 'psubscribe']);
const UNSUBSCRIBE_COMMANDS = new Set(['unsubscribe', 'punsubscribe']);

function encodeArg(arg: CommandArg): string | Buffer | number {
  return typeof arg === 'bigint' ? arg.toString() : arg;
}

/**
 * Normalize an ioredis reply into a RedisValue
 */
export function toRedisValue(reply: unknown): RedisValue {
  if (reply === null || reply === undefined) {
    return null;
  }
  if (typeof reply === 'number' || typeof reply === 'string' || Buffer.isBuffer(reply)) {
    return reply;
  }
  if (Array.isArray(reply)) {
    return reply.map(toRedisValue);
  }
  throw new ProtocolError(`Unexpected reply of type ${typeof reply}`);
}

function translateError(error: unknown, command: Command): Error {
  if (error instanceof HandoffError) {
    return error;
  }
  if (error instanceof Error) {
    if (error.name === 'ReplyError') {
      return new CommandError(command, error.message);
    }
    if (error.message === 'Command timed out') {
      return new TimeoutError(`${command.name} timed out`);
    }
    return new ConnectionError(`${command.name} failed: ${error.message}`, { cause: error });
  }
  return new ConnectionError(`${command.name} failed: ${String(error)}`);
}

/**
 * A direct connection backed by an ioredis client
 */
export class IoRedisConnection implements ConnectionLike {
  private readonly client: Redis;
  private readonly pushes: RedisValue[] = [];
  private waiter: PushWaiter | null = null;
  private subscribed = false;

  constructor(client: Redis) {
    this.client = client;

    client.on('messageBuffer', (channel: Buffer, message: Buffer) => {
      this.deliver([MESSAGE, channel, message]);
    });
    client.on('pmessageBuffer', (pattern: Buffer, channel: Buffer, message: Buffer) => {
      this.deliver([PMESSAGE, pattern, channel, message]);
    });
    client.on('error', (error: Error) => {
      console.warn(`Redis connection error: ${error.message}`);
    });
    client.on('end', () => {
      this.fail(new ConnectionError('Connection closed while awaiting a push message'));
    });
  }

  /**
   * Open a connection to the server
   */
  static async connect(options: ConnectionOptions): Promise<IoRedisConnection> {
    const resolved = {
      db: 0,
      connectTimeout: 5000,
      requestTimeout: 10000,
      ...options
    };

    const client = new Redis({
      host: resolved.host,
      port: resolved.port,
      db: resolved.db,
      connectTimeout: resolved.connectTimeout,
      commandTimeout: resolved.requestTimeout,
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 0,
      retryStrategy: () => null
    });
    const connection = new IoRedisConnection(client);

    try {
      await client.connect();
    } catch (error) {
      client.disconnect();
      if (error instanceof Error) {
        if (/ETIMEDOUT|timeout/i.test(error.message)) {
          throw new TimeoutError(`Connection timeout after ${resolved.connectTimeout}ms`);
        }
        throw new ConnectionError(`Failed to connect: ${error.message}`, { cause: error });
      }
      throw error;
    }

    return connection;
  }

  async issue(command: Command): Promise<RedisValue> {
    // ioredis tracks subscriber mode by lowercase command name
    const name = command.name.toLowerCase();
    if (SUBSCRIBE_COMMANDS.has(name)) {
      this.subscribed = true;
    }

    let reply: unknown;
    try {
      reply = await this.client.callBuffer(name, command.args.map(encodeArg));
    } catch (error) {
      throw translateError(error, command);
    }

    if (UNSUBSCRIBE_COMMANDS.has(name) && reply === 0) {
      // Nothing is subscribed any more; frames still queued belong to the finished subscription
      this.subscribed = false;
      this.pushes.length = 0;
    }
    return toRedisValue(reply);
  }

  awaitPush(): Promise<RedisValue> {
    if (this.waiter) {
      return Promise.reject(new ConnectionBusyError('A push message is already being awaited'));
    }
    const frame = this.pushes.shift();
    if (frame !== undefined) {
      return Promise.resolve(frame);
    }
    if (this.client.status === 'end') {
      return Promise.reject(new ConnectionError('Connection closed while awaiting a push message'));
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  /**
   * Check if the underlying client is ready for commands
   */
  isConnected(): boolean {
    return this.client.status === 'ready';
  }

  /**
   * Close the connection after pending replies arrive
   */
  async quit(): Promise<void> {
    await this.client.quit();
  }

  /**
   * Close the connection immediately
   */
  disconnect(): void {
    this.client.disconnect();
  }

  private deliver(frame: RedisValue): void {
    if (!this.subscribed) {
      return;
    }
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve(frame);
    } else {
      this.pushes.push(frame);
    }
  }

  private fail(error: Error): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.reject(error);
    }
  }
}
