/**
 * Option validation and error helper tests.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  assertClientOptions,
  assertExponentialStrategyOptions,
  assertTimerOptions,
} from '../src/validation.ts';
import {
  ConfigurationError,
  ConnectionError,
  ErrorCode,
  NotConnectedError,
  getErrorCode,
  hasErrorCode,
} from '../src/index.ts';
import { toError } from '../src/errors.ts';

describe('Validation', () => {
  it('should accept well-formed client options', () => {
    assert.doesNotThrow(() =>
      assertClientOptions({
        request: { url: 'ws://127.0.0.1:9', headers: { 'x-token': 'test-token' }, timeout: 100, protocols: ['v1'] },
        autoPingInterval: 0,
        networkDebounceInterval: 250,
      })
    );
  });

  it('should name the offending field', () => {
    assert.throws(
      () => assertTimerOptions({ interval: -1 }),
      (err: unknown) =>
        err instanceof ConfigurationError && /^Invalid configuration! timer \/interval: /.test(err.message)
    );
  });

  it('should reject non-string headers', () => {
    assert.throws(
      () => assertClientOptions({ request: { url: 'ws://127.0.0.1:9', headers: { 'x-retry': 3 } } }),
      ConfigurationError
    );
  });

  it('should reject a missing request', () => {
    assert.throws(() => assertClientOptions({}), ConfigurationError);
  });

  it('should bound the jitter fraction', () => {
    assert.doesNotThrow(() => assertExponentialStrategyOptions({ jitter: 0 }));
    assert.doesNotThrow(() => assertExponentialStrategyOptions({ jitter: 1 }));
    assert.throws(() => assertExponentialStrategyOptions({ jitter: -0.1 }), ConfigurationError);
  });
});

describe('Errors', () => {
  it('should carry codes', () => {
    assert.strictEqual(new ConfigurationError('x').code, ErrorCode.INVALID_CONFIGURATION);
    assert.strictEqual(getErrorCode(new NotConnectedError()), 'NOT_CONNECTED');
    assert.strictEqual(getErrorCode(new Error('plain')), undefined);
    assert.strictEqual(hasErrorCode(new ConnectionError()), true);
  });

  it('should serialize to JSON with name and code', () => {
    const json = new ConnectionError('Failed to connect').toJSON();

    assert.strictEqual(json.name, 'ConnectionError');
    assert.strictEqual(json.code, 'CONNECTION_FAILED');
    assert.strictEqual(json.message, 'Failed to connect');
  });

  it('should coerce thrown values into errors', () => {
    const err = new Error('kept');

    assert.strictEqual(toError(err), err);
    assert.strictEqual(toError('text').message, 'text');
  });
});
