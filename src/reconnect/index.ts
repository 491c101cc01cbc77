/**
 * Reconnect strategy exports.
 */

export type {
  ReconnectStrategy,
  ReconnectMethodContext,
  NetworkRecoveryContext,
  ReceivedEventContext,
} from './ReconnectStrategy.ts';
export {
  BaseReconnectStrategy,
  ReconnectMethod,
  describeReconnectReason,
  describeReconnectReasonDetail,
} from './ReconnectStrategy.ts';
export type { ReconnectReason } from './ReconnectStrategy.ts';

export type {
  ExponentialReconnectStrategyOptions,
  FixedDelayReconnectStrategyOptions,
  LinearDelayReconnectStrategyOptions,
} from './strategies.ts';
export {
  NoReconnectStrategy,
  ExponentialReconnectStrategy,
  FixedDelayReconnectStrategy,
  LinearDelayReconnectStrategy,
  defaultReconnectStrategy,
  UNLIMITED_RETRIES,
  DEFAULT_MAX_RETRY_INTERVAL,
} from './strategies.ts';
