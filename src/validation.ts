/**
 * Option validation using TypeBox.
 *
 * Every public constructor validates the numeric knobs it receives and throws
 * a {@link ConfigurationError} before any state is created.
 */

import { Type } from 'typebox';
import type { TSchema } from 'typebox';
import { Compile } from 'typebox/compile';
import { ConfigurationError } from './errors.ts';

/**
 * TypeBox localized validation error (the fields we report).
 */
interface LocalizedValidationError {
  instancePath: string;
  message: string;
}

/**
 * Format validation errors for display.
 */
function formatErrors(errors: LocalizedValidationError[]): string {
  if (errors.length === 0) {
    return 'Unknown validation error';
  }
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message}`).join('; ');
}

/**
 * Compile a schema into an assertion that throws {@link ConfigurationError}.
 *
 * @param schema - TypeBox schema
 * @param label - Prefix naming the validated object in error messages
 */
export function compileAssertion(schema: TSchema, label: string): (value: unknown) => void {
  const compiled = Compile(schema);
  return (value: unknown): void => {
    if (!compiled.Check(value)) {
      throw new ConfigurationError(`${label} ${formatErrors(compiled.Errors(value))}`);
    }
  };
}

// Durations are milliseconds.
const Duration = Type.Number({ minimum: 0 });
const RetryCount = Type.Integer({ minimum: 0 });

export const ConnectionRequestSchema = Type.Object({
  url: Type.String({ minLength: 1 }),
  headers: Type.Optional(Type.Record(Type.String(), Type.String())),
  timeout: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  protocols: Type.Optional(Type.Array(Type.String())),
});

export const ClientOptionsSchema = Type.Object({
  request: ConnectionRequestSchema,
  autoPingInterval: Type.Optional(Duration),
  networkDebounceInterval: Type.Optional(Duration),
});

export const ExponentialStrategyOptionsSchema = Type.Object({
  base: Type.Optional(Type.Number({ minimum: 1 })),
  scale: Type.Optional(Duration),
  maxRetryCount: Type.Optional(RetryCount),
  maxInterval: Type.Optional(Duration),
  jitter: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
});

export const FixedDelayStrategyOptionsSchema = Type.Object({
  delay: Type.Optional(Duration),
  maxRetryCount: Type.Optional(RetryCount),
});

export const LinearDelayStrategyOptionsSchema = Type.Object({
  delay: Type.Optional(Duration),
  maxRetryCount: Type.Optional(RetryCount),
  maxInterval: Type.Optional(Duration),
});

export const TimerOptionsSchema = Type.Object({
  interval: Duration,
});

export const NetworkMonitorOptionsSchema = Type.Object({
  debounceInterval: Type.Optional(Duration),
});

export const assertClientOptions = compileAssertion(ClientOptionsSchema, 'client options');
export const assertExponentialStrategyOptions = compileAssertion(
  ExponentialStrategyOptionsSchema,
  'exponential reconnect strategy'
);
export const assertFixedDelayStrategyOptions = compileAssertion(
  FixedDelayStrategyOptionsSchema,
  'fixed delay reconnect strategy'
);
export const assertLinearDelayStrategyOptions = compileAssertion(
  LinearDelayStrategyOptionsSchema,
  'linear delay reconnect strategy'
);
export const assertTimerOptions = compileAssertion(TimerOptionsSchema, 'timer');
export const assertNetworkMonitorOptions = compileAssertion(NetworkMonitorOptionsSchema, 'network monitor');
