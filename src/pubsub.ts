/**
 * Push-message subscriptions
 */

import { cmd, Command } from './command';
import { ConnectionLike } from './connection';
import { HandoffError } from './errors';
import { toChannelList } from './utils';
import { Decoder, RedisValue } from './value';

/**
 * A message delivered to a subscription
 */
export class Message {
  readonly payload: RedisValue;
  readonly channel: RedisValue;
  readonly pattern: RedisValue | undefined;

  constructor(payload: RedisValue, channel: RedisValue, pattern?: RedisValue) {
    this.payload = payload;
    this.channel = channel;
    this.pattern = pattern;
  }

  getChannel<T>(decode: Decoder<T>): T {
    return decode(this.channel);
  }

  /**
   * The channel as UTF-8 text, or "?" if the channel is not a string
   */
  get channelName(): string {
    if (Buffer.isBuffer(this.channel) || typeof this.channel === 'string') {
      return this.channel.toString();
    }
    return '?';
  }

  getPayload<T>(decode: Decoder<T>): T {
    return decode(this.payload);
  }

  get payloadBytes(): Buffer {
    if (Buffer.isBuffer(this.payload)) {
      return this.payload;
    }
    if (typeof this.payload === 'string') {
      return Buffer.from(this.payload);
    }
    return Buffer.alloc(0);
  }

  get fromPattern(): boolean {
    return this.pattern !== undefined;
  }

  /**
   * Decode the matching pattern; decodes nil when the message did not come
   * from a pattern subscription
   */
  getPattern<T>(decode: Decoder<T>): T {
    return decode(this.pattern === undefined ? null : this.pattern);
  }
}

export type ControlFlow<U> = { readonly kind: 'continue' } | { readonly kind: 'break'; readonly value: U };

export const CONTINUE: ControlFlow<never> = Object.freeze({ kind: 'continue' });

export function breakWith<U>(value: U): ControlFlow<U> {
  return { kind: 'break', value };
}

export type MessageHandler<U> = (message: Message) => ControlFlow<U> | Promise<ControlFlow<U>>;

export type SubscriptionResult<U> = { ok: true; value: U } | { ok: false; error: unknown };

export interface SubscriptionOutcome<C, U> {
  connection: C;
  result: SubscriptionResult<U>;
}

export interface SubscribeOptions {
  /**
   * Unsubscribe before handing the connection back when the handler fails.
   * Defaults to true; with false the connection is returned still subscribed.
   */
  unsubscribeOnHandlerError?: boolean;
}

export type SubscriptionState = 'subscribing' | 'receiving' | 'processing' | 'unsubscribing' | 'done';

function tagOf(value: RedisValue): string | undefined {
  if (Buffer.isBuffer(value) || typeof value === 'string') {
    return value.toString();
  }
  return undefined;
}

/**
 * Turn a pushed frame into a Message. Anything other than a well-formed
 * message or pmessage frame yields undefined.
 */
export function decodePushFrame(frame: RedisValue): Message | undefined {
  if (!Array.isArray(frame) || frame.length === 0) {
    return undefined;
  }
  const tag = tagOf(frame[0]);
  if (tag === 'message' && frame.length === 3) {
    return new Message(frame[2], frame[1]);
  }
  if (tag === 'pmessage' && frame.length === 4) {
    return new Message(frame[3], frame[2], frame[1]);
  }
  return undefined;
}

/**
 * Drives one subscription from the subscribe command to the final
 * unsubscribe. The connection never leaves the loop until it is done.
 */
export class Subscription<C extends ConnectionLike, U> {
  private readonly connection: C;
  private readonly subscribeCommand: Command;
  private readonly handler: MessageHandler<U>;
  private readonly unsubscribeOnHandlerError: boolean;
  private current: SubscriptionState = 'subscribing';
  private started = false;

  constructor(connection: C, subscribeCommand: Command, handler: MessageHandler<U>, options: SubscribeOptions = {}) {
    this.connection = connection;
    this.subscribeCommand = subscribeCommand;
    this.handler = handler;
    this.unsubscribeOnHandlerError = options.unsubscribeOnHandlerError ?? true;
  }

  get state(): SubscriptionState {
    return this.current;
  }

  async run(): Promise<SubscriptionOutcome<C, U>> {
    if (this.started) {
      throw new HandoffError('Subscription has already been started');
    }
    this.started = true;

    try {
      return await this.loop();
    } catch (error) {
      if (error instanceof HandoffError) {
        throw error;
      }
      if (error instanceof Error) {
        throw new HandoffError(`Subscription failed: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }

  private async loop(): Promise<SubscriptionOutcome<C, U>> {
    const connection = this.connection;
    const handler = this.handler;

    await connection.issue(this.subscribeCommand);

    for (;;) {
      this.current = 'receiving';
      const message = decodePushFrame(await connection.awaitPush());
      if (!message) {
        continue;
      }

      this.current = 'processing';
      let decision: ControlFlow<U>;
      try {
        decision = await handler(message);
      } catch (error) {
        if (this.unsubscribeOnHandlerError) {
          await this.unsubscribe();
        }
        this.current = 'done';
        return { connection, result: { ok: false, error } };
      }

      if (decision.kind === 'break') {
        await this.unsubscribe();
        this.current = 'done';
        return { connection, result: { ok: true, value: decision.value } };
      }
    }
  }

  /**
   * Issue both unsubscribe-from-all forms. The form matching the subscribe
   * command goes first so the subscription count reaches zero on it, and the
   * other form then completes outside subscriber mode.
   */
  private async unsubscribe(): Promise<void> {
    this.current = 'unsubscribing';
    const patterns = this.subscribeCommand.name.toUpperCase() === 'PSUBSCRIBE';
    const order = patterns ? ['PUNSUBSCRIBE', 'UNSUBSCRIBE'] : ['UNSUBSCRIBE', 'PUNSUBSCRIBE'];
    for (const name of order) {
      await this.connection.issue(cmd(name));
    }
  }
}

/**
 * SUBSCRIBE to one or more channels and hand every message to `handler`
 * until it breaks
 */
export async function subscribe<C extends ConnectionLike, U>(
  connection: C,
  channels: string | Buffer | ReadonlyArray<string | Buffer>,
  handler: MessageHandler<U>,
  options?: SubscribeOptions
): Promise<SubscriptionOutcome<C, U>> {
  const command = cmd('SUBSCRIBE', ...toChannelList(channels));
  return new Subscription(connection, command, handler, options).run();
}

/**
 * PSUBSCRIBE to one or more patterns and hand every message to `handler`
 * until it breaks
 */
export async function psubscribe<C extends ConnectionLike, U>(
  connection: C,
  patterns: string | Buffer | ReadonlyArray<string | Buffer>,
  handler: MessageHandler<U>,
  options?: SubscribeOptions
): Promise<SubscriptionOutcome<C, U>> {
  const command = cmd('PSUBSCRIBE', ...toChannelList(patterns));
  return new Subscription(connection, command, handler, options).run();
}
