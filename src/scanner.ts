/**
 * Cursor iteration over paginated scan commands
 */

import { CommandFactory } from './command';
import { ConnectionLike } from './connection';
import { HandoffError, StreamConsumedError } from './errors';
import { ConnectionSlot } from './slot';
import { Decoder, Page } from './value';

/**
 * One step of a scan stream. The connection rides along with the last item,
 * or with a trailing `end` step when it could not be attached to an item.
 */
export type ScanStep<C, T> =
  | { kind: 'item'; item: T; connection?: C }
  | { kind: 'end'; connection: C };

export interface ScanResult<C, T> {
  connection: C;
  items: T[];
}

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * A page request in flight. It records its outcome as soon as it settles so
 * a pull can tell whether the page is ready without waiting for it.
 */
class PendingPage<C, T> {
  private outcome: Settled<{ connection: C; page: Page<T> }> | undefined;
  private readonly done: Promise<void>;

  constructor(request: Promise<{ connection: C; page: Page<T> }>) {
    this.done = request.then(
      (value) => {
        this.outcome = { ok: true, value };
      },
      (error: unknown) => {
        this.outcome = { ok: false, error };
      }
    );
  }

  get settled(): boolean {
    return this.outcome !== undefined;
  }

  async result(): Promise<{ connection: C; page: Page<T> }> {
    await this.done;
    const outcome = this.outcome;
    if (outcome === undefined) {
      throw new HandoffError('Page request settled without an outcome');
    }
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }
}

/**
 * FIFO of decoded items. Pages are kept as they arrive and read through an index.
 */
class ItemQueue<T> {
  private readonly pages: T[][] = [];
  private index = 0;

  get isEmpty(): boolean {
    return this.pages.length === 0;
  }

  append(items: T[]): void {
    if (items.length > 0) {
      this.pages.push(items);
    }
  }

  take(): T {
    const page = this.pages[0];
    if (page === undefined) {
      throw new HandoffError('Item queue is empty');
    }
    const item = page[this.index];
    this.index += 1;
    if (this.index === page.length) {
      this.pages.shift();
      this.index = 0;
    }
    return item;
  }
}

/**
 * Lazily walks a cursor-paginated command to the end, borrowing the
 * connection for the whole walk. The first request goes out on the first
 * pull; the next page is requested as soon as the previous one arrives.
 *
 * The connection is in exactly one place at a time: inside the request in
 * flight, in this stream's holding slot between pages, or back with the
 * consumer once the last item has been handed over.
 */
export class ScanStream<C extends ConnectionLike, T> implements AsyncIterable<ScanStep<C, T>> {
  private readonly slot: ConnectionSlot<C>;
  private readonly factory: CommandFactory;
  private readonly decodePage: Decoder<Page<T>>;
  private position = 0n;
  private consumed = false;

  constructor(connection: C, factory: CommandFactory, decodePage: Decoder<Page<T>>) {
    this.slot = new ConnectionSlot(connection);
    this.factory = factory;
    this.decodePage = decodePage;
  }

  /**
   * The cursor of the most recently received page
   */
  get cursor(): bigint {
    return this.position;
  }

  /**
   * Whether the stream currently holds the connection between pages
   */
  get holdsConnection(): boolean {
    return this.slot.isHeld;
  }

  async* [Symbol.asyncIterator](): AsyncGenerator<ScanStep<C, T>, void, undefined> {
    if (this.consumed) {
      throw new StreamConsumedError();
    }
    this.consumed = true;

    const queue = new ItemQueue<T>();
    let pending: PendingPage<C, T> | undefined;

    try {
      pending = this.request(0n);
      for (;;) {
        if (pending && (queue.isEmpty || pending.settled)) {
          const { connection, page } = await pending.result();
          this.position = page.cursor;
          queue.append(page.items);
          this.slot.put(connection);
          pending = page.cursor !== 0n ? this.request(page.cursor) : undefined;
          continue;
        }

        if (!queue.isEmpty) {
          const item = queue.take();
          const connection = queue.isEmpty && !pending ? this.slot.tryTake() : undefined;
          yield { kind: 'item', item, connection };
          continue;
        }

        const connection = this.slot.tryTake();
        if (connection !== undefined) {
          yield { kind: 'end', connection };
        }
        return;
      }
    } catch (error) {
      if (error instanceof HandoffError) {
        throw error;
      }
      if (error instanceof Error) {
        throw new HandoffError(`Scan failed: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }

  /**
   * Drain the stream and resolve with every item and the connection
   */
  all(): Promise<ScanResult<C, T>> {
    return collect(this);
  }

  private request(cursor: bigint): PendingPage<C, T> {
    const connection = this.slot.take();
    const command = this.factory(cursor);
    return new PendingPage(
      connection.issue(command).then((reply) => ({ connection, page: this.decodePage(reply) }))
    );
  }
}

/**
 * Collect every item of a scan stream in emission order, together with the
 * connection the stream hands back at the end.
 */
export async function collect<C, T>(stream: AsyncIterable<ScanStep<C, T>>): Promise<ScanResult<C, T>> {
  const items: T[] = [];
  for await (const step of stream) {
    if (step.kind === 'item') {
      items.push(step.item);
    }
    if (step.connection !== undefined) {
      return { connection: step.connection, items };
    }
  }
  throw new HandoffError('Scan stream ended without returning the connection');
}
