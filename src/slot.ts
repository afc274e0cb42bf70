/**
 * Single-owner holder for a connection handle
 */

import { ConnectionBusyError, ConnectionLostError } from './errors';

export type SlotState = 'held' | 'borrowed' | 'lost';

/**
 * Holds at most one connection. Taking it leaves the slot borrowed until the
 * connection is put back; a borrowed connection that is never returned is
 * marked lost with {@link ConnectionSlot.invalidate}.
 */
export class ConnectionSlot<C extends object> {
  private connection: C | undefined;
  private current: SlotState;

  constructor(connection?: C) {
    this.connection = connection;
    this.current = connection === undefined ? 'borrowed' : 'held';
  }

  get state(): SlotState {
    return this.current;
  }

  get isHeld(): boolean {
    return this.current === 'held';
  }

  take(): C {
    const connection = this.tryTake();
    if (connection === undefined) {
      throw this.current === 'lost' ? new ConnectionLostError() : new ConnectionBusyError();
    }
    return connection;
  }

  tryTake(): C | undefined {
    const connection = this.connection;
    if (connection === undefined) {
      return undefined;
    }
    this.connection = undefined;
    this.current = 'borrowed';
    return connection;
  }

  put(connection: C): void {
    if (this.connection !== undefined) {
      throw new ConnectionBusyError('Slot already holds a connection');
    }
    this.connection = connection;
    this.current = 'held';
  }

  invalidate(): void {
    this.connection = undefined;
    this.current = 'lost';
  }
}
