/**
 * redis-handoff
 */

export { HandoffClient, Channels, SetOptions } from './client';
export { ConnectionLike, ConnectionOptions, IoRedisConnection, toRedisValue } from './connection';
export {
  cmd,
  Command,
  CommandArg,
  CommandFactory,
  ScanOptions,
  KeyspaceScanOptions,
  scanFactory,
  hscanFactory,
  sscanFactory,
  zscanFactory
} from './command';
export { ScanStream, ScanStep, ScanResult, collect } from './scanner';
export {
  Message,
  ControlFlow,
  CONTINUE,
  breakWith,
  MessageHandler,
  SubscribeOptions,
  Subscription,
  SubscriptionOutcome,
  SubscriptionResult,
  SubscriptionState,
  decodePushFrame,
  subscribe,
  psubscribe
} from './pubsub';
export { ConnectionSlot, SlotState } from './slot';
export {
  RedisValue,
  Decoder,
  Page,
  asArray,
  asBoolean,
  asBuffer,
  asCursor,
  asInteger,
  asNullable,
  asOk,
  asPairs,
  asScore,
  asString,
  pageOf,
  pairPageOf
} from './value';
export {
  HandoffError,
  ConnectionError,
  TimeoutError,
  CommandError,
  ProtocolError,
  InvalidArgumentError,
  ConnectionBusyError,
  ConnectionLostError,
  StreamConsumedError
} from './errors';
