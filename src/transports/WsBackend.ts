/**
 * Backend using the `ws` package.
 *
 * Owns at most one socket at a time and translates its callbacks into
 * {@link WebSocketEvent}s. Reconnect decisions belong to the client.
 */

import type { IncomingHttpHeaders, IncomingMessage } from 'http';
import { WebSocket } from 'ws';
import type { ClientOptions, RawData } from 'ws';
import createDebug from 'debug';
import { toCloseCode } from '../closeCodes.ts';
import type { CloseCode } from '../closeCodes.ts';
import { DestroyedError, NotConnectedError } from '../errors.ts';
import { EventChannel } from '../helpers.ts';
import type { ConnectionRequest, Frame, WebSocketEvent } from '../wire.ts';
import type { Backend } from './Backend.ts';

const debug = createDebug('ws-resilience:ws-backend');

export interface WsBackendOptions {
  /**
   * Extra `ws` client options (e.g. `perMessageDeflate`, `maxPayload`).
   * `headers` and `handshakeTimeout` come from the connection request.
   */
  socketOptions?: Omit<ClientOptions, 'headers' | 'handshakeTimeout'>;
}

/**
 * Close codes `ws` accepts in `close()`; anything else has to be a terminate.
 */
function isSendableCloseCode(code: number): boolean {
  return (
    (code >= 1000 && code <= 1014 && code !== 1004 && code !== 1005 && code !== 1006) ||
    (code >= 3000 && code <= 4999)
  );
}

function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flat[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

function rawDataToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export class WsBackend implements Backend {
  private readonly _socketOptions: WsBackendOptions['socketOptions'];
  private readonly _channel = new EventChannel<WebSocketEvent>();
  private _ws: WebSocket | null = null;
  private _destroyed = false;

  constructor(options: WsBackendOptions = {}) {
    this._socketOptions = options.socketOptions;
  }

  get events(): AsyncIterable<WebSocketEvent> {
    return this._channel;
  }

  /**
   * `ws` ready state of the current socket, or null without one.
   */
  get readyState(): number | null {
    return this._ws ? this._ws.readyState : null;
  }

  async connect(request: ConnectionRequest): Promise<void> {
    if (this._destroyed) throw new DestroyedError('WsBackend');
    this._release();

    debug('Connecting to %s', request.url);
    const ws = new WebSocket(request.url, request.protocols ?? [], {
      ...this._socketOptions,
      headers: request.headers,
      handshakeTimeout: request.timeout,
    });
    this._ws = ws;

    let responseHeaders: Record<string, string> = {};
    let errored = false;

    ws.on('upgrade', (res: IncomingMessage) => {
      responseHeaders = flattenHeaders(res.headers);
    });

    ws.on('open', () => {
      debug('Connected to %s', request.url);
      this._emit({ type: 'connected', headers: responseHeaders });
    });

    ws.on('message', (data: RawData, isBinary: boolean) => {
      const buffer = rawDataToBuffer(data);
      if (isBinary) {
        this._emit({ type: 'data', data: new Uint8Array(buffer) });
      } else {
        this._emit({ type: 'text', text: buffer.toString('utf-8') });
      }
    });

    ws.on('pong', () => {
      this._emit({ type: 'pong' });
    });

    ws.on('error', (err: Error) => {
      debug('WebSocket error on %s: %o', request.url, err);
      errored = true;
      this._emit({ type: 'error', error: err });
    });

    ws.on('close', (code: number, reason: Buffer) => {
      if (this._ws === ws) this._ws = null;
      debug('Disconnected from %s (code: %d)', request.url, code);
      // `ws` always follows an error with a close; the error already reported the failure.
      if (errored) return;
      const reasonText = reason.toString();
      this._emit({
        type: 'disconnected',
        closeCode: toCloseCode(code),
        ...(reasonText ? { reason: reasonText } : {}),
      });
    });
  }

  async disconnect(closeCode: CloseCode, reason?: string): Promise<void> {
    const ws = this._ws;
    if (!ws) return;

    if (ws.readyState === WebSocket.CONNECTING || !isSendableCloseCode(closeCode)) {
      // No close handshake possible: drop the socket and report the requested code.
      this._release();
      this._emit({ type: 'disconnected', closeCode, ...(reason ? { reason } : {}) });
      return;
    }

    if (ws.readyState !== WebSocket.OPEN) return;

    try {
      ws.close(closeCode, reason);
    } catch (err) {
      // Oversized reason or similar; fall back to a hard close.
      debug('close(%d) rejected: %o', closeCode, err);
      this._release();
      this._emit({ type: 'disconnected', closeCode, ...(reason ? { reason } : {}) });
    }
  }

  async write(frame: Frame): Promise<void> {
    const ws = this._ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      throw new NotConnectedError(`Cannot send ${frame.type} frame, WebSocket is not open`);
    }

    await new Promise<void>((resolve, reject) => {
      const callback = (err?: Error) => {
        if (err) reject(err);
        else resolve();
      };
      switch (frame.type) {
        case 'ping':
          ws.ping(undefined, undefined, callback);
          break;
        case 'text':
          ws.send(frame.text, callback);
          break;
        case 'data':
          ws.send(frame.data, { binary: true }, callback);
          break;
      }
    });
  }

  destroy(): void {
    if (this._destroyed) return;
    this._destroyed = true;
    this._release();
    this._channel.close();
    debug('Backend destroyed');
  }

  private _emit(event: WebSocketEvent): void {
    this._channel.push(event);
  }

  /**
   * Detach and terminate the current socket without reporting anything.
   */
  private _release(): void {
    const ws = this._ws;
    if (!ws) return;
    this._ws = null;
    ws.removeAllListeners();
    // Terminating a connecting socket still emits an error on the next tick.
    ws.on('error', (err: Error) => debug('Discarded socket error: %o', err));
    if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
      ws.terminate();
    }
  }
}
