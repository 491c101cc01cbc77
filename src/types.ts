/**
 * Core type definitions for the client.
 */

import type { Client } from './Client.ts';
import type { NetworkPath, NetworkPathSource } from './network/NetworkPath.ts';
import type { ReconnectReason, ReconnectStrategy } from './reconnect/ReconnectStrategy.ts';
import type { ConnectionStatus } from './status.ts';
import type { Backend } from './transports/Backend.ts';
import type { ConnectionRequest, WebSocketEvent } from './wire.ts';

export type LogLevel = 'verbose' | 'debug' | 'info' | 'warning' | 'error';

/**
 * Log record produced by the client and handed to {@link ClientDelegate.onLog}.
 */
export interface ClientLog {
  level: LogLevel;
  message: string;
}

/**
 * Consumer callbacks. Every method is optional; implement only what you need.
 *
 * Callbacks run inside the client's serial context: they should return
 * quickly, and calling back into the client from them only queues work.
 */
export interface ClientDelegate {
  onStatusChange?(status: ConnectionStatus, client: Client): void;
  onEvent?(event: WebSocketEvent, client: Client): void;
  onLog?(log: ClientLog, client: Client): void;
  /** A reconnect attempt scheduled `delay` ms earlier is about to run. */
  onWillReconnect?(reason: ReconnectReason, delay: number, client: Client): void;
  /** A reconnect attempt was issued; `attemptCount` includes it. */
  onDidReconnect?(reason: ReconnectReason, attemptCount: number, client: Client): void;
  onAutoPing?(client: Client): void;
  onNetworkPathChange?(path: NetworkPath, client: Client): void;
}

/**
 * Client configuration options.
 */
export interface ClientOptions {
  /** Where and how to connect. */
  request: ConnectionRequest;
  /** Transport performing the actual WebSocket I/O. Owned by the client. */
  backend: Backend;
  /** Ping period in milliseconds while connected. 0 disables auto-ping. Default: 0 */
  autoPingInterval?: number;
  /** Default: exponential backoff, see `defaultReconnectStrategy()` */
  reconnectStrategy?: ReconnectStrategy;
  /** Debounce window in milliseconds for network path updates. Default: 0 */
  networkDebounceInterval?: number;
  /** Reachability feed. Default: a source that always reports a satisfied path. */
  networkPathSource?: NetworkPathSource;
  delegate?: ClientDelegate;
}
