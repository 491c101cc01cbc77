/**
 * Reconnect strategy contract.
 *
 * A strategy is a pure decision function: it owns no timers and performs no
 * I/O. The client asks it whether to retry after an event, how long to wait,
 * and whether a network recovery should skip the wait.
 */

import type { Client } from '../Client.ts';
import type { NetworkPath } from '../network/NetworkPath.ts';
import { describeNetworkPath } from '../network/NetworkPath.ts';
import type { WebSocketEvent } from '../wire.ts';
import { describeEventDetail, isAbnormalClosedEvent, isReconnectSuggestedEvent } from '../wire.ts';

/**
 * Why a reconnect is being considered. Reported to the delegate unchanged.
 */
export type ReconnectReason =
  | { type: 'suggestedByEvent'; event: WebSocketEvent }
  | { type: 'networkRecovery'; path: NetworkPath };

export function describeReconnectReason(reason: ReconnectReason): string {
  switch (reason.type) {
    case 'suggestedByEvent':
      return 'suggested reconnect event';
    case 'networkRecovery':
      return 'network recovery';
  }
}

export function describeReconnectReasonDetail(reason: ReconnectReason): string {
  switch (reason.type) {
    case 'suggestedByEvent':
      return `suggested reconnect event(${describeEventDetail(reason.event)})`;
    case 'networkRecovery':
      return `network recovery(${describeNetworkPath(reason.path)})`;
  }
}

/**
 * Strategy answer: give up (with a reason) or retry after `interval` ms.
 */
export type ReconnectMethod =
  | { type: 'none'; reason: string }
  | { type: 'delay'; interval: number };

export const ReconnectMethod = {
  none(reason: string): ReconnectMethod {
    return { type: 'none', reason };
  },
  delay(interval: number): ReconnectMethod {
    return { type: 'delay', interval };
  },
  noneForUnsatisfiedNetwork: { type: 'none', reason: 'Network not satisfied' },
  noneForMaxRetryCount: { type: 'none', reason: 'Max retry count reached' },
} as const;

export interface ReconnectMethodContext {
  client: Client;
  reason: ReconnectReason;
  /** Attempts already issued since the last successful connection. */
  reconnectCount: number;
  networkPath: NetworkPath;
}

export interface NetworkRecoveryContext {
  client: Client;
  networkPath: NetworkPath;
}

export interface ReceivedEventContext {
  client: Client;
  event: WebSocketEvent;
}

export interface ReconnectStrategy {
  reconnectMethod(context: ReconnectMethodContext): ReconnectMethod | Promise<ReconnectMethod>;

  /**
   * Whether a network recovery should reconnect at once instead of waiting
   * out the computed delay.
   */
  shouldReconnectImmediatelyWhenNetworkRecovered(context: NetworkRecoveryContext): boolean | Promise<boolean>;

  /**
   * Whether an event from the backend should start a reconnect evaluation.
   */
  shouldReconnectWhenReceivingEvent(context: ReceivedEventContext): boolean | Promise<boolean>;
}

/**
 * Default answers for the two predicates. Concrete policies extend this and
 * implement `reconnectMethod`.
 */
export abstract class BaseReconnectStrategy implements ReconnectStrategy {
  abstract reconnectMethod(context: ReconnectMethodContext): ReconnectMethod | Promise<ReconnectMethod>;

  shouldReconnectImmediatelyWhenNetworkRecovered({ networkPath }: NetworkRecoveryContext): boolean | Promise<boolean> {
    return networkPath.isSatisfied;
  }

  shouldReconnectWhenReceivingEvent({ event }: ReceivedEventContext): boolean | Promise<boolean> {
    return isAbnormalClosedEvent(event) || isReconnectSuggestedEvent(event);
  }
}
