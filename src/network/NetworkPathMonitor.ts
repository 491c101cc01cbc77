/**
 * Debounced network watcher over a pluggable path source.
 */

import createDebug from 'debug';
import { AsyncTimer } from '../timer/AsyncTimer.ts';
import { assertNetworkMonitorOptions } from '../validation.ts';
import { alwaysSatisfiedSource, describeNetworkPath } from './NetworkPath.ts';
import type { NetworkPath, NetworkPathListener, NetworkPathSource, NetworkWatcher } from './NetworkPath.ts';

const debug = createDebug('ws-resilience:network');

export interface NetworkPathMonitorOptions {
  /** Quiet period in ms before a raw update is reported. 0 reports every update at once. Default: 0 */
  debounceInterval?: number;
  /** Default: {@link alwaysSatisfiedSource} */
  source?: NetworkPathSource;
}

/**
 * Reports the settled value of a {@link NetworkPathSource}: each raw update
 * restarts the debounce window and only the last value in a burst is
 * delivered. The first report after `fire()` carries `isFirstUpdate: true`.
 */
export class NetworkPathMonitor implements NetworkWatcher {
  readonly debounceInterval: number;

  private readonly _source: NetworkPathSource;
  private readonly _listeners = new Set<NetworkPathListener>();
  private readonly _debounceTimer: AsyncTimer | null;

  private _active = false;
  private _stopSource: (() => void) | null = null;
  private _pending: boolean | null = null;
  private _firstUpdatePending = true;
  private _currentPath: NetworkPath;

  constructor(options: NetworkPathMonitorOptions = {}) {
    assertNetworkMonitorOptions(options);
    this.debounceInterval = options.debounceInterval ?? 0;
    this._source = options.source ?? alwaysSatisfiedSource;
    this._currentPath = { isSatisfied: this._source.isSatisfied, isFirstUpdate: true };
    this._debounceTimer =
      this.debounceInterval > 0
        ? new AsyncTimer({
            interval: this.debounceInterval,
            name: 'network-debounce',
            handler: () => this._flush(),
          })
        : null;
  }

  get isActive(): boolean {
    return this._active;
  }

  get currentPath(): NetworkPath {
    return this._currentPath;
  }

  fire(): void {
    if (this._active) return;
    this._active = true;
    this._firstUpdatePending = true;
    debug('start monitoring (debounce=%dms)', this.debounceInterval);
    this._stopSource = this._source.start((isSatisfied) => this._receive(isSatisfied));
  }

  invalidate(): void {
    if (!this._active) return;
    this._active = false;
    this._debounceTimer?.stop();
    this._pending = null;
    const stopSource = this._stopSource;
    this._stopSource = null;
    stopSource?.();
    debug('stop monitoring');
  }

  onPathChange(listener: NetworkPathListener): () => void {
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  private _receive(isSatisfied: boolean): void {
    if (!this._active) return;
    if (!this._debounceTimer) {
      this._report(isSatisfied);
      return;
    }
    this._pending = isSatisfied;
    this._debounceTimer.start();
  }

  private _flush(): void {
    const pending = this._pending;
    this._pending = null;
    if (pending === null || !this._active) return;
    this._report(pending);
  }

  private _report(isSatisfied: boolean): void {
    const path: NetworkPath = { isSatisfied, isFirstUpdate: this._firstUpdatePending };
    this._firstUpdatePending = false;
    this._currentPath = path;
    debug('path changed: %s', describeNetworkPath(path));
    for (const listener of [...this._listeners]) {
      try {
        listener(path);
      } catch (err) {
        debug('path listener threw: %o', err);
      }
    }
  }
}
