/**
 * Network path model and the watcher contract the client consumes.
 *
 * Detecting reachability is left to a {@link NetworkPathSource}; this library
 * only debounces and forwards what a source reports.
 */

export interface NetworkPath {
  /** Whether the path can currently carry traffic. */
  isSatisfied: boolean;
  /** True for the first path reported after the watcher started. */
  isFirstUpdate: boolean;
}

export function describeNetworkPath(path: NetworkPath): string {
  const state = path.isSatisfied ? 'satisfied' : 'unsatisfied';
  return path.isFirstUpdate ? `${state}, first update` : state;
}

export type NetworkPathListener = (path: NetworkPath) => void;

/**
 * Debounced path-change feed.
 */
export interface NetworkWatcher {
  readonly isActive: boolean;
  /** Last reported path, or the source's initial value before any report. */
  readonly currentPath: NetworkPath;
  /** Start monitoring. No-op when already active. */
  fire(): void;
  /** Stop monitoring. No-op when idle. */
  invalidate(): void;
  /**
   * Register a listener for every debounced update.
   *
   * @returns Function removing the listener
   */
  onPathChange(listener: NetworkPathListener): () => void;
}

/**
 * Raw reachability feed.
 */
export interface NetworkPathSource {
  /** Value assumed before the first update arrives. */
  readonly isSatisfied: boolean;
  /**
   * Begin delivering raw updates. A source should push its current value right
   * away.
   *
   * @returns Function that stops delivery
   */
  start(update: (isSatisfied: boolean) => void): () => void;
}

/**
 * Source for hosts without reachability information: reports one satisfied
 * path and nothing afterwards.
 */
export const alwaysSatisfiedSource: NetworkPathSource = {
  isSatisfied: true,
  start(update) {
    update(true);
    return () => {};
  },
};

/**
 * Source driven by the application, e.g. from its own connectivity checks or
 * platform events.
 */
export class ManualNetworkPathSource implements NetworkPathSource {
  private _isSatisfied: boolean;
  private _listeners = new Set<(isSatisfied: boolean) => void>();

  constructor(isSatisfied = true) {
    this._isSatisfied = isSatisfied;
  }

  get isSatisfied(): boolean {
    return this._isSatisfied;
  }

  /**
   * Number of watchers currently started on this source.
   */
  get listenerCount(): number {
    return this._listeners.size;
  }

  setSatisfied(isSatisfied: boolean): void {
    this._isSatisfied = isSatisfied;
    for (const listener of [...this._listeners]) {
      listener(isSatisfied);
    }
  }

  start(update: (isSatisfied: boolean) => void): () => void {
    this._listeners.add(update);
    update(this._isSatisfied);
    return () => {
      this._listeners.delete(update);
    };
  }
}
