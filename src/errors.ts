/**
 * Error types for redis-handoff
 */

import { Command } from './command';

export class HandoffError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HandoffError';
  }
}

export class ConnectionError extends HandoffError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export class TimeoutError extends HandoffError {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * The server answered with an error reply. The connection itself is still usable.
 */
export class CommandError extends HandoffError {
  readonly command: Command;

  constructor(command: Command, message: string) {
    super(`${command.name} failed: ${message}`);
    this.name = 'CommandError';
    this.command = command;
  }
}

export class ProtocolError extends HandoffError {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export class InvalidArgumentError extends HandoffError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class ConnectionBusyError extends HandoffError {
  constructor(message: string = 'Connection is held by another operation') {
    super(message);
    this.name = 'ConnectionBusyError';
  }
}

export class ConnectionLostError extends HandoffError {
  constructor(message: string = 'Connection was lost by a failed or abandoned operation') {
    super(message);
    this.name = 'ConnectionLostError';
  }
}

export class StreamConsumedError extends HandoffError {
  constructor(message: string = 'Scan stream has already been consumed') {
    super(message);
    this.name = 'StreamConsumedError';
  }
}
