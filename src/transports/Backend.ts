/**
 * Transport contract consumed by the client.
 *
 * A backend performs the handshake, framing and I/O of a single WebSocket
 * and reports what happens on an ordered event stream. It never reconnects
 * on its own.
 */

import type { CloseCode } from '../closeCodes.ts';
import type { ConnectionRequest, Frame, WebSocketEvent } from '../wire.ts';

export interface Backend {
  /**
   * Start opening a connection. Resolves once the attempt is under way; the
   * outcome arrives as a `connected`, `error` or `disconnected` event. A
   * previous socket, if any, is discarded first.
   */
  connect(request: ConnectionRequest): Promise<void>;

  /**
   * Close the current socket with the given code. No-op without a socket.
   */
  disconnect(closeCode: CloseCode, reason?: string): Promise<void>;

  /**
   * Send a frame. Rejects when the socket is not open or the write fails.
   */
  write(frame: Frame): Promise<void>;

  /**
   * Ordered event stream. Ends after `destroy()`. A backend that learns of a
   * better route may push `reconnectSuggested` while connected.
   */
  readonly events: AsyncIterable<WebSocketEvent>;

  /**
   * Tear down the socket and end the event stream.
   */
  destroy(): void;
}
