/**
 * Client class - resilient connection controller.
 *
 * Owns the connection status, the reconnect attempt count, the auto-ping and
 * reconnect timers and the network watcher subscription. All transport I/O is
 * delegated to a {@link Backend}.
 */

import createDebug from 'debug';
import { CloseCode, isAbnormalCloseCode } from './closeCodes.ts';
import { ConnectionError, toError } from './errors.ts';
import { SerialQueue } from './helpers.ts';
import { describeNetworkPath } from './network/NetworkPath.ts';
import type { NetworkPath } from './network/NetworkPath.ts';
import { NetworkPathMonitor } from './network/NetworkPathMonitor.ts';
import { describeReconnectReasonDetail } from './reconnect/ReconnectStrategy.ts';
import type { ReconnectReason, ReconnectStrategy } from './reconnect/ReconnectStrategy.ts';
import { defaultReconnectStrategy } from './reconnect/strategies.ts';
import { ConnectionStatus, describeStatus, statusEquals } from './status.ts';
import { AsyncTimer } from './timer/AsyncTimer.ts';
import type { Backend } from './transports/Backend.ts';
import type { ClientDelegate, ClientOptions, LogLevel } from './types.ts';
import { assertClientOptions } from './validation.ts';
import { describeEventDetail } from './wire.ts';
import type { ConnectionRequest, Frame, WebSocketEvent } from './wire.ts';

const debug = createDebug('ws-resilience:client');

/**
 * Connection controller.
 *
 * Status starts as `closed(normal)`. `connect()` moves to `connecting`; the
 * backend's events drive `connected` and `closed`. After an abnormal closure
 * the reconnect strategy decides whether and when to try again, and a network
 * recovery can trigger an attempt as well. `disconnect()` is the intentional
 * exit and cancels anything pending.
 *
 * @example
 * ```ts
 * const client = new Client({
 *   request: createConnectionRequest('wss://example.com/feed', { headers: { 'x-token': 'test-token' } }),
 *   backend: new WsBackend(),
 *   autoPingInterval: 10_000,
 *   delegate: {
 *     onStatusChange: (status) => console.log('status', describeStatus(status)),
 *     onEvent: (event) => console.log('event', event.type),
 *   },
 * });
 * await client.connect();
 * ```
 */
export class Client {
  readonly request: ConnectionRequest;
  readonly autoPingInterval: number;
  readonly backend: Backend;
  readonly reconnectStrategy: ReconnectStrategy;
  readonly networkDebounceInterval: number;

  private _networkMonitor: NetworkPathMonitor;
  private _delegate: ClientDelegate | null;
  private _serial = new SerialQueue();

  private _status: ConnectionStatus = ConnectionStatus.normalClosed;
  private _reconnectCount = 0;
  private _autoPingTimer: AsyncTimer | null = null;
  private _reconnectTimer: AsyncTimer | null = null;
  private _unsubscribeNetwork: (() => void) | null = null;
  // Set while we close a live socket on purpose to reconnect it.
  private _closingForReconnect = false;
  private _destroyed = false;

  constructor(options: ClientOptions) {
    assertClientOptions(options);
    this.request = options.request;
    this.backend = options.backend;
    this.autoPingInterval = options.autoPingInterval ?? 0;
    this.reconnectStrategy = options.reconnectStrategy ?? defaultReconnectStrategy();
    this.networkDebounceInterval = options.networkDebounceInterval ?? 0;
    this._delegate = options.delegate ?? null;
    this._networkMonitor = new NetworkPathMonitor({
      debounceInterval: this.networkDebounceInterval,
      ...(options.networkPathSource ? { source: options.networkPathSource } : {}),
    });

    this._startWatchingNetworkPath();
    this._consumeEvents().catch((err: unknown) => {
      debug('event loop failed: %o', err);
    });
  }

  get status(): ConnectionStatus {
    return this._status;
  }

  /**
   * Attempts issued since the last successful connection or explicit disconnect.
   */
  get reconnectCount(): number {
    return this._reconnectCount;
  }

  get isAutoPingActive(): boolean {
    return this._autoPingTimer?.isActive ?? false;
  }

  get isReconnectScheduled(): boolean {
    return this._reconnectTimer?.isActive ?? false;
  }

  get networkPath(): NetworkPath {
    return this._networkMonitor.currentPath;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  setDelegate(delegate: ClientDelegate | null): void {
    this._delegate = delegate;
  }

  /**
   * Start connecting.
   *
   * @returns `true` if an attempt was started (not that it succeeded),
   *          `false` when already connecting/connected or destroyed
   */
  connect(): Promise<boolean> {
    return this._serial.run(() => this._connect());
  }

  /**
   * Close the connection on purpose. Auto-ping stops and any pending
   * reconnect is cancelled before this returns its promise.
   */
  disconnect(closeCode: CloseCode = CloseCode.normalClosure, reason?: string): Promise<void> {
    this._disableAutoPing();
    this._destroyReconnectTimer(true);
    return this._serial.run(() => this._disconnect(closeCode, reason));
  }

  /**
   * Send a frame while connected.
   *
   * @returns `false` without sending when not connected
   * @throws When the backend fails to write
   */
  send(frame: Frame): Promise<boolean> {
    return this._serial.run(async () => {
      if (this._status.type !== 'connected') {
        this._log('warning', `websocket send ${frame.type} frame ignored, connection is not connected`);
        return false;
      }
      await this.backend.write(frame);
      return true;
    });
  }

  sendText(text: string): Promise<boolean> {
    return this.send({ type: 'text', text });
  }

  sendData(data: Uint8Array): Promise<boolean> {
    return this.send({ type: 'data', data });
  }

  ping(): Promise<boolean> {
    return this.send({ type: 'ping' });
  }

  /**
   * Release timers, stop watching the network and tear down the backend.
   * The client cannot be used afterwards.
   */
  destroy(): void {
    if (this._destroyed) return;
    this._destroyed = true;
    this._disableAutoPing();
    this._destroyReconnectTimer(true);
    this._stopWatchingNetworkPath();
    this.backend.destroy();
    debug('Client destroyed');
  }

  // ---------------------------------------------------------------------------
  // Lifecycle (callers hold the serial queue)
  // ---------------------------------------------------------------------------

  private async _connect(): Promise<boolean> {
    if (this._destroyed) {
      this._log('warning', 'websocket connect ignored, client is destroyed');
      return false;
    }
    if (this._status.type !== 'closed') {
      this._log('warning', `websocket connect ignored for current status is ${describeStatus(this._status)}`);
      return false;
    }
    this._log('debug', `websocket start connecting ${this.request.url}`);
    this._setStatus(ConnectionStatus.connecting);
    try {
      await this.backend.connect(this.request);
    } catch (err) {
      this._log('error', `websocket backend failed to connect: ${toError(err).message}`);
      // Handled after the current task so a reconnect attempt is counted first.
      const event: WebSocketEvent = {
        type: 'error',
        error: new ConnectionError(`Failed to connect to ${this.request.url}`, { cause: err }),
      };
      this._serial.run(() => this._handleEvent(event)).catch((handleErr: unknown) => {
        this._log('error', `failed to handle connect failure: ${toError(handleErr).message}`);
      });
    }
    return true;
  }

  private async _disconnect(closeCode: CloseCode, reason?: string): Promise<void> {
    this._disableAutoPing();
    this._destroyReconnectTimer(true);
    try {
      await this.backend.disconnect(closeCode, reason);
    } catch (err) {
      this._log('error', `websocket backend failed to disconnect: ${toError(err).message}`);
    }
    // An intentional close ends any abnormal state left by an earlier failure.
    if (this._status.type === 'closed' && !this._destroyed) {
      this._setStatus(ConnectionStatus.normalClosed);
    }
  }

  private _setStatus(status: ConnectionStatus): void {
    if (statusEquals(status, this._status)) return;
    this._status = status;

    switch (status.type) {
      case 'connected':
        this._enableAutoPing();
        // The attempt succeeded.
        this._destroyReconnectTimer(true);
        break;
      case 'closed':
        this._disableAutoPing();
        // Abnormal closures keep the count so backoff keeps growing.
        this._destroyReconnectTimer(status.closureState === 'normal');
        break;
      case 'connecting':
        break;
    }

    this._log('info', `websocket status changed to ${describeStatus(status)}`);
    this._notify((delegate) => delegate.onStatusChange?.(status, this));
  }

  // ---------------------------------------------------------------------------
  // Backend events
  // ---------------------------------------------------------------------------

  private async _consumeEvents(): Promise<void> {
    for await (const event of this.backend.events) {
      if (this._destroyed) break;
      try {
        await this._serial.run(() => this._handleEvent(event));
      } catch (err) {
        this._log('error', `failed to handle ${event.type} event: ${toError(err).message}`);
      }
    }
    debug('event stream ended');
  }

  private async _handleEvent(event: WebSocketEvent): Promise<void> {
    if (this._destroyed) return;
    this._log('verbose', `websocket received ${describeEventDetail(event)}`);

    let closingForReconnect = false;
    switch (event.type) {
      case 'connected':
        this._closingForReconnect = false;
        this._setStatus(ConnectionStatus.connected);
        break;
      case 'disconnected':
        closingForReconnect = this._closingForReconnect;
        this._closingForReconnect = false;
        this._setStatus(ConnectionStatus.closed(isAbnormalCloseCode(event.closeCode) ? 'abnormal' : 'normal'));
        break;
      case 'error':
        this._setStatus(ConnectionStatus.abnormalClosed);
        break;
      default:
        break;
    }

    this._notify((delegate) => delegate.onEvent?.(event, this));

    const shouldReconnect = await this.reconnectStrategy.shouldReconnectWhenReceivingEvent({ client: this, event });
    if (this._destroyed) return;
    if (shouldReconnect) {
      await this._reconnect({ type: 'suggestedByEvent', event });
    } else if (!closingForReconnect) {
      // Nothing left to retry.
      this._destroyReconnectTimer(true);
    }
  }

  // ---------------------------------------------------------------------------
  // Reconnect
  // ---------------------------------------------------------------------------

  private async _reconnect(reason: ReconnectReason, immediate = false): Promise<void> {
    if (this._status.type === 'connecting') {
      this._log('debug', `skip reconnect for current status is ${describeStatus(this._status)}`);
      return;
    }

    const method = await this.reconnectStrategy.reconnectMethod({
      client: this,
      reason,
      reconnectCount: this._reconnectCount,
      networkPath: this._networkMonitor.currentPath,
    });
    if (this._destroyed) return;

    if (method.type === 'none') {
      this._log('debug', `skip reconnect for ${method.reason}`);
      return;
    }
    if (!(method.interval > 0)) {
      this._log('debug', 'skip reconnect for no valid reconnect delay');
      return;
    }

    if (this._status.type === 'connected') {
      this._log('debug', `current status is ${describeStatus(this._status)}, should disconnect before reconnect`);
      this._closingForReconnect = true;
      await this._disconnect(CloseCode.normalClosure);
      this._setStatus(ConnectionStatus.normalClosed);
    }

    await this._scheduleReconnect(immediate ? 0 : method.interval, reason);
  }

  private async _scheduleReconnect(interval: number, reason: ReconnectReason): Promise<void> {
    this._log(
      'debug',
      `schedule reconnect attempt ${this._reconnectCount + 1} after ${interval}ms, reason: ${describeReconnectReasonDetail(reason)}`
    );
    this._destroyReconnectTimer(false);

    if (interval <= 0) {
      await this._executeReconnect(reason, interval);
      return;
    }

    const timer = new AsyncTimer({
      interval,
      name: 'reconnect',
      handler: (signal) =>
        this._serial.run(async () => {
          if (signal.aborted || this._destroyed) return;
          await this._executeReconnect(reason, interval);
        }),
    });
    this._reconnectTimer = timer;
    timer.start();
  }

  private async _executeReconnect(reason: ReconnectReason, interval: number): Promise<void> {
    this._notify((delegate) => delegate.onWillReconnect?.(reason, interval, this));
    const started = await this._connect();
    if (!started) return;
    this._reconnectCount += 1;
    this._log('info', `reconnect attempt ${this._reconnectCount} issued`);
    this._notify((delegate) => delegate.onDidReconnect?.(reason, this._reconnectCount, this));
  }

  private _destroyReconnectTimer(resetCount: boolean): void {
    const timer = this._reconnectTimer;
    if (timer) {
      this._reconnectTimer = null;
      timer.stop();
      debug('destroy reconnect timer');
    }
    if (resetCount) {
      this._reconnectCount = 0;
    }
  }

  // ---------------------------------------------------------------------------
  // Network path
  // ---------------------------------------------------------------------------

  private _startWatchingNetworkPath(): void {
    this._stopWatchingNetworkPath();
    this._unsubscribeNetwork = this._networkMonitor.onPathChange((path) => {
      this._serial.run(() => this._handleNetworkPath(path)).catch((err: unknown) => {
        this._log('error', `failed to handle network path change: ${toError(err).message}`);
      });
    });
    this._networkMonitor.fire();
  }

  private _stopWatchingNetworkPath(): void {
    this._unsubscribeNetwork?.();
    this._unsubscribeNetwork = null;
    if (this._networkMonitor.isActive) {
      this._networkMonitor.invalidate();
    }
  }

  private async _handleNetworkPath(path: NetworkPath): Promise<void> {
    if (this._destroyed) return;
    this._notify((delegate) => delegate.onNetworkPathChange?.(path, this));

    if (!path.isSatisfied) {
      this._log('debug', `network is not satisfied, path is ${describeNetworkPath(path)}`);
      return;
    }
    if (path.isFirstUpdate) {
      this._log('verbose', `network is satisfied, path is ${describeNetworkPath(path)}, ignore for first update`);
      return;
    }
    this._log('debug', `network is satisfied, path is ${describeNetworkPath(path)}`);
    await this._tryReconnectAfterNetworkRecovery(path);
  }

  private async _tryReconnectAfterNetworkRecovery(path: NetworkPath): Promise<void> {
    if (!(this._status.type === 'closed' && this._status.closureState === 'abnormal')) {
      this._log('verbose', `skip reconnect for current status is ${describeStatus(this._status)}`);
      return;
    }
    const immediate = await this.reconnectStrategy.shouldReconnectImmediatelyWhenNetworkRecovered({
      client: this,
      networkPath: path,
    });
    if (this._destroyed) return;
    this._log('debug', `network recovered, try reconnect immediately: ${immediate}`);
    await this._reconnect({ type: 'networkRecovery', path }, immediate);
  }

  // ---------------------------------------------------------------------------
  // Auto ping
  // ---------------------------------------------------------------------------

  private _enableAutoPing(): void {
    this._disableAutoPing();
    if (this.autoPingInterval <= 0) return;
    const timer = new AsyncTimer({
      interval: this.autoPingInterval,
      repeating: true,
      firesImmediately: true,
      name: 'auto-ping',
      handler: (signal) => this._serial.run(() => this._sendAutoPing(signal)),
    });
    this._autoPingTimer = timer;
    timer.start();
  }

  private _disableAutoPing(): void {
    const timer = this._autoPingTimer;
    if (!timer) return;
    this._autoPingTimer = null;
    timer.stop();
  }

  private async _sendAutoPing(signal: AbortSignal): Promise<void> {
    if (signal.aborted || this._status.type !== 'connected') return;
    try {
      await this.backend.write({ type: 'ping' });
    } catch (err) {
      this._log('warning', `auto ping failed: ${toError(err).message}`);
    }
    this._notify((delegate) => delegate.onAutoPing?.(this));
  }

  // ---------------------------------------------------------------------------
  // Delegate + logging
  // ---------------------------------------------------------------------------

  private _notify(call: (delegate: ClientDelegate) => void): void {
    const delegate = this._delegate;
    if (!delegate) return;
    try {
      call(delegate);
    } catch (err) {
      debug('delegate threw: %o', err);
    }
  }

  private _log(level: LogLevel, message: string): void {
    debug('[%s] %s', level, message);
    this._notify((delegate) => delegate.onLog?.({ level, message }, this));
  }
}
