/**
 * Test utilities: an in-process backend and a recording delegate.
 */

import type { Client } from '../src/Client.ts';
import type { CloseCode } from '../src/closeCodes.ts';
import { EventChannel } from '../src/helpers.ts';
import type { NetworkPath } from '../src/network/NetworkPath.ts';
import type { ReconnectReason } from '../src/reconnect/ReconnectStrategy.ts';
import type { ConnectionStatus } from '../src/status.ts';
import type { Backend } from '../src/transports/Backend.ts';
import type { ClientDelegate, ClientLog } from '../src/types.ts';
import type { ConnectionRequest, Frame, WebSocketEvent } from '../src/wire.ts';

export type BackendCall =
  | { type: 'connect'; request: ConnectionRequest }
  | { type: 'disconnect'; closeCode: CloseCode; reason: string | undefined }
  | { type: 'write'; frame: Frame };

/**
 * Backend that records calls and emits whatever the test tells it to.
 */
export class MockBackend implements Backend {
  readonly calls: BackendCall[] = [];
  connectError: Error | null = null;
  writeError: Error | null = null;
  destroyed = false;

  private readonly _channel = new EventChannel<WebSocketEvent>();

  get events(): AsyncIterable<WebSocketEvent> {
    return this._channel;
  }

  async connect(request: ConnectionRequest): Promise<void> {
    this.calls.push({ type: 'connect', request });
    if (this.connectError) throw this.connectError;
  }

  async disconnect(closeCode: CloseCode, reason?: string): Promise<void> {
    this.calls.push({ type: 'disconnect', closeCode, reason });
  }

  async write(frame: Frame): Promise<void> {
    this.calls.push({ type: 'write', frame });
    if (this.writeError) throw this.writeError;
  }

  destroy(): void {
    this.destroyed = true;
    this._channel.close();
  }

  emit(event: WebSocketEvent): void {
    this._channel.push(event);
  }

  count(type: BackendCall['type']): number {
    return this.calls.filter((call) => call.type === type).length;
  }

  writtenFrames(): Frame[] {
    const frames: Frame[] = [];
    for (const call of this.calls) {
      if (call.type === 'write') frames.push(call.frame);
    }
    return frames;
  }
}

/**
 * Delegate keeping every notification it receives.
 */
export class RecordingDelegate implements ClientDelegate {
  readonly statuses: ConnectionStatus[] = [];
  readonly events: WebSocketEvent[] = [];
  readonly logs: ClientLog[] = [];
  readonly willReconnect: { reason: ReconnectReason; delay: number }[] = [];
  readonly didReconnect: { reason: ReconnectReason; attemptCount: number }[] = [];
  readonly paths: NetworkPath[] = [];
  autoPings = 0;

  onStatusChange(status: ConnectionStatus, _client: Client): void {
    this.statuses.push(status);
  }

  onEvent(event: WebSocketEvent, _client: Client): void {
    this.events.push(event);
  }

  onLog(log: ClientLog, _client: Client): void {
    this.logs.push(log);
  }

  onWillReconnect(reason: ReconnectReason, delay: number, _client: Client): void {
    this.willReconnect.push({ reason, delay });
  }

  onDidReconnect(reason: ReconnectReason, attemptCount: number, _client: Client): void {
    this.didReconnect.push({ reason, attemptCount });
  }

  onAutoPing(_client: Client): void {
    this.autoPings++;
  }

  onNetworkPathChange(path: NetworkPath, _client: Client): void {
    this.paths.push(path);
  }

  hasLog(level: ClientLog['level'], message: string): boolean {
    return this.logs.some((log) => log.level === level && log.message === message);
  }
}

/**
 * Promise-based delay.
 *
 * @param ms - Delay in milliseconds
 * @returns Promise that resolves after the delay
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait until a condition becomes true, with polling and timeout.
 *
 * More reliable than fixed delays for tests that check state conditions.
 *
 * @param condition - Function that returns true when condition is met
 * @param timeout - Maximum time to wait in milliseconds (default: 2000)
 * @param pollInterval - How often to check condition in milliseconds (default: 5)
 * @returns Promise that resolves when condition is true, rejects on timeout
 */
export async function waitUntil(
  condition: () => boolean,
  timeout = 2000,
  pollInterval = 5
): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await delay(pollInterval);
  }
}

/**
 * Let queued client work (serial tasks, event loop) run to completion.
 */
export function settle(): Promise<void> {
  return delay(10);
}
