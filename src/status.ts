/**
 * Connection status model.
 */

export type ClosureState = 'normal' | 'abnormal';

/**
 * Status of the managed connection.
 *
 * `closed` carries whether the closure was intentional (`normal`) or caused by
 * a failure (`abnormal`).
 */
export type ConnectionStatus =
  | { type: 'connecting' }
  | { type: 'connected' }
  | { type: 'closed'; closureState: ClosureState };

const normalClosed = Object.freeze({ type: 'closed', closureState: 'normal' } as const);
const abnormalClosed = Object.freeze({ type: 'closed', closureState: 'abnormal' } as const);

/**
 * Shared status values. Every status the client reports is one of these
 * frozen objects.
 */
export const ConnectionStatus = Object.freeze({
  connecting: Object.freeze({ type: 'connecting' } as const),
  connected: Object.freeze({ type: 'connected' } as const),
  normalClosed,
  abnormalClosed,
  closed(closureState: ClosureState): ConnectionStatus {
    return closureState === 'normal' ? normalClosed : abnormalClosed;
  },
} satisfies Record<string, ConnectionStatus | ((state: ClosureState) => ConnectionStatus)>);

export function statusEquals(a: ConnectionStatus, b: ConnectionStatus): boolean {
  if (a.type === 'closed' && b.type === 'closed') {
    return a.closureState === b.closureState;
  }
  return a.type === b.type;
}

export function isConnected(status: ConnectionStatus): boolean {
  return status.type === 'connected';
}

export function isConnecting(status: ConnectionStatus): boolean {
  return status.type === 'connecting';
}

export function isClosed(status: ConnectionStatus): boolean {
  return status.type === 'closed';
}

export function isNormalClosed(status: ConnectionStatus): boolean {
  return status.type === 'closed' && status.closureState === 'normal';
}

export function isAbnormalClosed(status: ConnectionStatus): boolean {
  return status.type === 'closed' && status.closureState === 'abnormal';
}

/**
 * Short label: `connecting`, `connected`, `normalClosed` or `abnormalClosed`.
 */
export function describeStatus(status: ConnectionStatus): string {
  switch (status.type) {
    case 'connecting':
      return 'connecting';
    case 'connected':
      return 'connected';
    case 'closed':
      return status.closureState === 'normal' ? 'normalClosed' : 'abnormalClosed';
  }
}
