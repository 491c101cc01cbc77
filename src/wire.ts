/**
 * Values exchanged with a backend: outgoing frames, incoming events and the
 * request used to open a connection.
 *
 * The controller never looks inside a frame; encoding is the backend's job.
 */

import { closeCodeName, isAbnormalCloseCode } from './closeCodes.ts';
import type { CloseCode } from './closeCodes.ts';

// Controller -> Backend
export interface PingFrame {
  type: 'ping';
}

export interface TextFrame {
  type: 'text';
  text: string;
}

export interface DataFrame {
  type: 'data';
  data: Uint8Array;
}

export type Frame = PingFrame | TextFrame | DataFrame;

// Backend -> Controller
export interface ConnectedEvent {
  type: 'connected';
  headers: Record<string, string>;
}

export interface DisconnectedEvent {
  type: 'disconnected';
  reason?: string;
  closeCode: CloseCode;
}

export interface TextEvent {
  type: 'text';
  text: string;
}

export interface DataEvent {
  type: 'data';
  data: Uint8Array;
}

export interface PongEvent {
  type: 'pong';
}

export interface ErrorEvent {
  type: 'error';
  error: Error;
}

/**
 * The backend asks for the connection to be re-established, for instance
 * because a better route became available. Carries no status change.
 */
export interface ReconnectSuggestedEvent {
  type: 'reconnectSuggested';
  reason?: string;
}

export type WebSocketEvent =
  | ConnectedEvent
  | DisconnectedEvent
  | TextEvent
  | DataEvent
  | PongEvent
  | ErrorEvent
  | ReconnectSuggestedEvent;

/**
 * Whether an event implies the socket is (still) open.
 */
export function isConnectedEvent(event: WebSocketEvent): boolean {
  switch (event.type) {
    case 'connected':
    case 'text':
    case 'data':
    case 'pong':
      return true;
    default:
      return false;
  }
}

/**
 * Whether an event denotes a failure: any `error`, or a `disconnected` with an
 * abnormal close code.
 */
export function isAbnormalClosedEvent(event: WebSocketEvent): boolean {
  switch (event.type) {
    case 'error':
      return true;
    case 'disconnected':
      return isAbnormalCloseCode(event.closeCode);
    default:
      return false;
  }
}

export function isReconnectSuggestedEvent(event: WebSocketEvent): event is ReconnectSuggestedEvent {
  return event.type === 'reconnectSuggested';
}

export function describeEvent(event: WebSocketEvent): string {
  return event.type;
}

export function describeEventDetail(event: WebSocketEvent): string {
  switch (event.type) {
    case 'connected':
      return `connected with headers: ${JSON.stringify(event.headers)}`;
    case 'disconnected':
      return `disconnected with close code: ${closeCodeName(event.closeCode)}(${event.closeCode}), reason: ${event.reason ?? ''}`;
    case 'text':
      return `text: ${event.text}`;
    case 'data':
      return `data of ${event.data.byteLength} bytes`;
    case 'pong':
      return 'pong';
    case 'error':
      return `error occurred for ${event.error.message}`;
    case 'reconnectSuggested':
      return event.reason ? `reconnect suggested for ${event.reason}` : 'reconnect suggested';
  }
}

/**
 * Everything a backend needs to open a connection.
 */
export interface ConnectionRequest {
  /** `ws://` or `wss://` URL. */
  url: string;
  /** Extra HTTP headers sent with the upgrade request. */
  headers?: Record<string, string>;
  /** Handshake timeout in milliseconds. Must be positive when set. */
  timeout?: number;
  /** Sub-protocols offered in `Sec-WebSocket-Protocol`. */
  protocols?: string[];
}

export interface ConnectionRequestInit {
  headers?: Record<string, string>;
  /** Default: 5000 */
  timeout?: number;
  protocols?: string[];
}

export function createConnectionRequest(url: string, init: ConnectionRequestInit = {}): ConnectionRequest {
  return {
    url,
    headers: { ...init.headers },
    timeout: init.timeout ?? 5000,
    ...(init.protocols ? { protocols: [...init.protocols] } : {}),
  };
}
