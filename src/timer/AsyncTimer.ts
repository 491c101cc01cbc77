/**
 * Cancelable, restartable timer used for auto-ping and reconnect scheduling.
 */

import createDebug from 'debug';
import { assertTimerOptions } from '../validation.ts';

const debug = createDebug('ws-resilience:timer');

// Largest delay setTimeout honours; anything above is clamped to 1ms.
const MAX_TIMEOUT = 2_147_483_647;

/**
 * Timer callback. The signal is aborted as soon as the run is stopped, so a
 * handler that hands work to another queue can re-check it before acting.
 */
export type TimerHandler = (signal: AbortSignal) => void | Promise<void>;

export type TimerCancelHandler = () => void | Promise<void>;

export interface AsyncTimerOptions {
  /** Delay (one-shot) or period (repeating) in milliseconds. */
  interval: number;
  /** Fire every `interval` instead of once. Default: false */
  repeating?: boolean;
  /** Repeating timers only: fire right after `start()` instead of after the first interval. Default: false */
  firesImmediately?: boolean;
  handler: TimerHandler;
  /** Runs at most once per run, when a started run is stopped before completing. */
  cancelHandler?: TimerCancelHandler;
  /** Used in debug output. */
  name?: string;
}

interface TimerRun {
  controller: AbortController;
  timeoutId: ReturnType<typeof setTimeout> | null;
  done: boolean;
}

export class AsyncTimer {
  private _interval: number;
  private readonly _repeating: boolean;
  private readonly _firesImmediately: boolean;
  private readonly _handler: TimerHandler;
  private readonly _cancelHandler: TimerCancelHandler | undefined;
  private readonly _name: string;

  private _run: TimerRun | null = null;

  constructor(options: AsyncTimerOptions) {
    assertTimerOptions({ interval: options.interval });
    this._interval = options.interval;
    this._repeating = options.repeating ?? false;
    this._firesImmediately = options.firesImmediately ?? false;
    this._handler = options.handler;
    this._cancelHandler = options.cancelHandler;
    this._name = options.name ?? 'timer';
  }

  get interval(): number {
    return this._interval;
  }

  get repeating(): boolean {
    return this._repeating;
  }

  /**
   * True from `start()` until the run is stopped or, for a one-shot timer,
   * until its handler has settled.
   */
  get isActive(): boolean {
    return this._run !== null && !this._run.done;
  }

  /**
   * Cancel any current run, then schedule a new one.
   */
  start(): void {
    this.stop();
    const run: TimerRun = { controller: new AbortController(), timeoutId: null, done: false };
    this._run = run;
    const firstDelay = this._repeating && this._firesImmediately ? 0 : this._interval;
    debug('%s start (interval=%dms, repeating=%s)', this._name, this._interval, this._repeating);
    this._schedule(run, firstDelay);
  }

  /**
   * Cancel the current run. Safe to call when idle. Once this returns the
   * handler is not invoked again for that run.
   */
  stop(): void {
    const run = this._run;
    if (!run) return;
    this._run = null;
    if (run.timeoutId !== null) {
      clearTimeout(run.timeoutId);
      run.timeoutId = null;
    }
    run.controller.abort();
    if (run.done) return;
    run.done = true;
    debug('%s stopped', this._name);
    this._invokeCancelHandler();
  }

  restart(): void {
    this.stop();
    this.start();
  }

  /**
   * Change the interval and restart.
   */
  setInterval(interval: number): void {
    assertTimerOptions({ interval });
    this._interval = interval;
    this.restart();
  }

  private _schedule(run: TimerRun, ms: number): void {
    if (ms > MAX_TIMEOUT) {
      run.timeoutId = setTimeout(() => {
        run.timeoutId = null;
        if (run.controller.signal.aborted || this._run !== run) return;
        this._schedule(run, ms - MAX_TIMEOUT);
      }, MAX_TIMEOUT);
      return;
    }
    run.timeoutId = setTimeout(() => this._fire(run), ms);
  }

  private _fire(run: TimerRun): void {
    run.timeoutId = null;
    if (run.controller.signal.aborted || this._run !== run) return;

    let result: void | Promise<void>;
    try {
      result = this._handler(run.controller.signal);
    } catch (err) {
      debug('%s handler threw: %o', this._name, err);
      result = undefined;
    }

    Promise.resolve(result)
      .catch((err: unknown) => {
        debug('%s handler rejected: %o', this._name, err);
      })
      .finally(() => {
        if (run.controller.signal.aborted || this._run !== run) return;
        if (this._repeating) {
          this._schedule(run, this._interval);
        } else {
          run.done = true;
        }
      });
  }

  private _invokeCancelHandler(): void {
    const cancelHandler = this._cancelHandler;
    if (!cancelHandler) return;
    try {
      Promise.resolve(cancelHandler()).catch((err: unknown) => {
        debug('%s cancel handler rejected: %o', this._name, err);
      });
    } catch (err) {
      debug('%s cancel handler threw: %o', this._name, err);
    }
  }
}
