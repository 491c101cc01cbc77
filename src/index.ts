/**
 * ws-resilience: reconnecting WebSocket client with pluggable backends and
 * reconnect strategies.
 *
 * ## Example
 * ```ts
 * import {
 *   Client,
 *   WsBackend,
 *   ExponentialReconnectStrategy,
 *   createConnectionRequest,
 *   describeStatus,
 * } from 'ws-resilience';
 *
 * const client = new Client({
 *   request: createConnectionRequest('ws://127.0.0.1:8080/feed', { timeout: 3000 }),
 *   backend: new WsBackend(),
 *   autoPingInterval: 15_000,
 *   reconnectStrategy: new ExponentialReconnectStrategy({ maxRetryCount: 10 }),
 *   delegate: {
 *     onStatusChange: (status) => console.log(describeStatus(status)),
 *     onEvent: (event) => {
 *       if (event.type === 'text') console.log('received', event.text);
 *     },
 *   },
 * });
 *
 * await client.connect();
 * await client.sendText('hello');
 * ```
 *
 * @packageDocumentation
 */

export { Client } from './Client.ts';

export { CloseCode, toCloseCode, isAbnormalCloseCode, closeCodeName } from './closeCodes.ts';
export type { CloseCodeName } from './closeCodes.ts';

export {
  ConnectionStatus,
  statusEquals,
  isConnected,
  isConnecting,
  isClosed,
  isNormalClosed,
  isAbnormalClosed,
  describeStatus,
} from './status.ts';
export type { ClosureState } from './status.ts';

export {
  isConnectedEvent,
  isAbnormalClosedEvent,
  isReconnectSuggestedEvent,
  describeEvent,
  describeEventDetail,
  createConnectionRequest,
} from './wire.ts';
export type {
  Frame,
  PingFrame,
  TextFrame,
  DataFrame,
  WebSocketEvent,
  ConnectedEvent,
  DisconnectedEvent,
  TextEvent,
  DataEvent,
  PongEvent,
  ErrorEvent,
  ReconnectSuggestedEvent,
  ConnectionRequest,
  ConnectionRequestInit,
} from './wire.ts';

export * from './reconnect/index.ts';

export { AsyncTimer } from './timer/AsyncTimer.ts';
export type { AsyncTimerOptions, TimerHandler, TimerCancelHandler } from './timer/AsyncTimer.ts';

export { NetworkPathMonitor } from './network/NetworkPathMonitor.ts';
export type { NetworkPathMonitorOptions } from './network/NetworkPathMonitor.ts';
export { alwaysSatisfiedSource, ManualNetworkPathSource, describeNetworkPath } from './network/NetworkPath.ts';
export type { NetworkPath, NetworkPathListener, NetworkPathSource, NetworkWatcher } from './network/NetworkPath.ts';

export * from './transports/index.ts';

export {
  ErrorCode,
  ConfigurationError,
  ConnectionError,
  NotConnectedError,
  DestroyedError,
  hasErrorCode,
  getErrorCode,
} from './errors.ts';
export type { ErrorCodeType } from './errors.ts';

export { SerialQueue, EventChannel, delay } from './helpers.ts';

export type { ClientDelegate, ClientOptions, ClientLog, LogLevel } from './types.ts';
