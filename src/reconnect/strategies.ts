/**
 * Built-in reconnect policies.
 *
 * All of them except {@link NoReconnectStrategy} pause while the network path
 * is unsatisfied and give up once `maxRetryCount` attempts were issued.
 */

import {
  assertExponentialStrategyOptions,
  assertFixedDelayStrategyOptions,
  assertLinearDelayStrategyOptions,
} from '../validation.ts';
import { BaseReconnectStrategy, ReconnectMethod } from './ReconnectStrategy.ts';
import type { ReconnectMethodContext } from './ReconnectStrategy.ts';

/** Effectively unbounded retry budget. */
export const UNLIMITED_RETRIES = Number.MAX_SAFE_INTEGER;

/** Ten minutes. */
export const DEFAULT_MAX_RETRY_INTERVAL = 10 * 60 * 1000;

/**
 * Shared gating: network must be satisfied and the retry budget not spent.
 */
function gate(context: ReconnectMethodContext, maxRetryCount: number): ReconnectMethod | null {
  if (!context.networkPath.isSatisfied) return ReconnectMethod.noneForUnsatisfiedNetwork;
  if (context.reconnectCount >= maxRetryCount) return ReconnectMethod.noneForMaxRetryCount;
  return null;
}

/**
 * Never reconnects.
 */
export class NoReconnectStrategy extends BaseReconnectStrategy {
  reconnectMethod(): ReconnectMethod {
    return ReconnectMethod.none('');
  }

  override shouldReconnectImmediatelyWhenNetworkRecovered(): boolean {
    return false;
  }

  override shouldReconnectWhenReceivingEvent(): boolean {
    return false;
  }
}

export interface ExponentialReconnectStrategyOptions {
  /** Default: 2 */
  base?: number;
  /** Multiplier in ms applied to `base ^ attempt`. Default: 500 */
  scale?: number;
  /** Default: {@link UNLIMITED_RETRIES} */
  maxRetryCount?: number;
  /** Cap in ms before jitter. Default: 600000 */
  maxInterval?: number;
  /** Fraction of the delay used as symmetric random jitter, 0 to 1. Default: 0.2 */
  jitter?: number;
  /** Uniform source in [0, 1). Default: `Math.random` */
  random?: () => number;
}

/**
 * Exponential backoff with symmetric jitter:
 * `min(base ^ attempt * scale, maxInterval) ± jitter`, floored at 0.
 */
export class ExponentialReconnectStrategy extends BaseReconnectStrategy {
  readonly base: number;
  readonly scale: number;
  readonly maxRetryCount: number;
  readonly maxInterval: number;
  readonly jitter: number;
  private readonly _random: () => number;

  constructor(options: ExponentialReconnectStrategyOptions = {}) {
    super();
    const { random, ...numeric } = options;
    assertExponentialStrategyOptions(numeric);
    this.base = options.base ?? 2;
    this.scale = options.scale ?? 500;
    this.maxRetryCount = options.maxRetryCount ?? UNLIMITED_RETRIES;
    this.maxInterval = options.maxInterval ?? DEFAULT_MAX_RETRY_INTERVAL;
    this.jitter = options.jitter ?? 0.2;
    this._random = random ?? Math.random;
  }

  /**
   * Delay before jitter for a given attempt count.
   */
  baseDelay(reconnectCount: number): number {
    return Math.min(Math.pow(this.base, reconnectCount) * this.scale, this.maxInterval);
  }

  reconnectMethod(context: ReconnectMethodContext): ReconnectMethod {
    const gated = gate(context, this.maxRetryCount);
    if (gated) return gated;

    const delay = this.baseDelay(context.reconnectCount);
    const jitterRange = delay * this.jitter;
    const randomJitter = (this._random() * 2 - 1) * jitterRange;
    return ReconnectMethod.delay(Math.max(0, delay + randomJitter));
  }
}

export interface FixedDelayReconnectStrategyOptions {
  /** Delay in ms. Default: 5000 */
  delay?: number;
  /** Default: {@link UNLIMITED_RETRIES} */
  maxRetryCount?: number;
}

/**
 * Same delay for every attempt.
 */
export class FixedDelayReconnectStrategy extends BaseReconnectStrategy {
  readonly delay: number;
  readonly maxRetryCount: number;

  constructor(options: FixedDelayReconnectStrategyOptions = {}) {
    super();
    assertFixedDelayStrategyOptions(options);
    this.delay = options.delay ?? 5000;
    this.maxRetryCount = options.maxRetryCount ?? UNLIMITED_RETRIES;
  }

  reconnectMethod(context: ReconnectMethodContext): ReconnectMethod {
    return gate(context, this.maxRetryCount) ?? ReconnectMethod.delay(this.delay);
  }
}

export interface LinearDelayReconnectStrategyOptions {
  /** Step in ms added per attempt. Default: 5000 */
  delay?: number;
  /** Default: {@link UNLIMITED_RETRIES} */
  maxRetryCount?: number;
  /** Default: 600000 */
  maxInterval?: number;
}

/**
 * `min(delay * attempt, maxInterval)`.
 *
 * The first attempt (count 0) yields a zero delay, which the client treats as
 * "do not reconnect"; pair it with a network-recovery trigger or start from a
 * failed attempt.
 */
export class LinearDelayReconnectStrategy extends BaseReconnectStrategy {
  readonly delay: number;
  readonly maxRetryCount: number;
  readonly maxInterval: number;

  constructor(options: LinearDelayReconnectStrategyOptions = {}) {
    super();
    assertLinearDelayStrategyOptions(options);
    this.delay = options.delay ?? 5000;
    this.maxRetryCount = options.maxRetryCount ?? UNLIMITED_RETRIES;
    this.maxInterval = options.maxInterval ?? DEFAULT_MAX_RETRY_INTERVAL;
  }

  reconnectMethod(context: ReconnectMethodContext): ReconnectMethod {
    return (
      gate(context, this.maxRetryCount) ??
      ReconnectMethod.delay(Math.min(this.delay * context.reconnectCount, this.maxInterval))
    );
  }
}

/**
 * Exponential backoff, base 2, scale 500 ms, unlimited retries, 10 minute cap,
 * 20% jitter.
 */
export function defaultReconnectStrategy(): ExponentialReconnectStrategy {
  return new ExponentialReconnectStrategy();
}
