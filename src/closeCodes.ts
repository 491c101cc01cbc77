/**
 * WebSocket close codes (RFC 6455, section 7.4.1).
 */

export const CloseCode = {
  /** Placeholder for a code we do not recognise, or "still open". */
  invalid: 0,
  normalClosure: 1000,
  goingAway: 1001,
  protocolError: 1002,
  unsupportedData: 1003,
  noStatusReceived: 1005,
  abnormalClosure: 1006,
  invalidFramePayloadData: 1007,
  policyViolation: 1008,
  messageTooBig: 1009,
  mandatoryExtensionMissing: 1010,
  internalServerError: 1011,
  tlsHandshakeFailure: 1015,
} as const;

export type CloseCodeName = keyof typeof CloseCode;
export type CloseCode = (typeof CloseCode)[CloseCodeName];

const KNOWN_CODES: ReadonlyMap<number, CloseCode> = new Map(
  Object.values(CloseCode).map((code): [number, CloseCode] => [code, code])
);

// Everything not listed here is treated as a failure.
const NORMAL_CODES: ReadonlySet<CloseCode> = new Set<CloseCode>([
  CloseCode.normalClosure,
  CloseCode.goingAway,
  CloseCode.mandatoryExtensionMissing,
]);

/**
 * Map a raw numeric code to a known close code. Unknown values map to `invalid`.
 */
export function toCloseCode(code: number): CloseCode {
  return KNOWN_CODES.get(code) ?? CloseCode.invalid;
}

/**
 * Whether a close code denotes a failure rather than an intentional closure.
 */
export function isAbnormalCloseCode(code: CloseCode): boolean {
  return !NORMAL_CODES.has(code);
}

/**
 * Name of a close code, e.g. `normalClosure` for 1000.
 */
export function closeCodeName(code: CloseCode): CloseCodeName {
  for (const [name, value] of Object.entries(CloseCode)) {
    if (value === code && isCloseCodeName(name)) return name;
  }
  return 'invalid';
}

function isCloseCodeName(name: string): name is CloseCodeName {
  return name in CloseCode;
}
