/**
 * Reconnect strategy tests.
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import {
  Client,
  CloseCode,
  ConfigurationError,
  ExponentialReconnectStrategy,
  FixedDelayReconnectStrategy,
  LinearDelayReconnectStrategy,
  NoReconnectStrategy,
  ReconnectMethod,
  UNLIMITED_RETRIES,
  createConnectionRequest,
  defaultReconnectStrategy,
  describeReconnectReason,
  describeReconnectReasonDetail,
} from '../src/index.ts';
import type { ReconnectMethodContext, ReconnectReason } from '../src/index.ts';
import { MockBackend } from './helpers.ts';

const abnormalClose: ReconnectReason = {
  type: 'suggestedByEvent',
  event: { type: 'disconnected', closeCode: CloseCode.abnormalClosure },
};

describe('Reconnect strategies', () => {
  let client: Client;

  before(() => {
    client = new Client({ request: createConnectionRequest('ws://127.0.0.1:9'), backend: new MockBackend() });
  });

  after(() => {
    client.destroy();
  });

  function context(reconnectCount: number, isSatisfied = true): ReconnectMethodContext {
    return {
      client,
      reason: abnormalClose,
      reconnectCount,
      networkPath: { isSatisfied, isFirstUpdate: false },
    };
  }

  describe('ExponentialReconnectStrategy', () => {
    it('should double the delay per attempt without jitter', () => {
      const strategy = new ExponentialReconnectStrategy({ jitter: 0 });

      const delays = [0, 1, 2, 3].map((count) => strategy.reconnectMethod(context(count)));

      assert.deepStrictEqual(delays, [
        ReconnectMethod.delay(500),
        ReconnectMethod.delay(1000),
        ReconnectMethod.delay(2000),
        ReconnectMethod.delay(4000),
      ]);
    });

    it('should clip at maxInterval', () => {
      const strategy = new ExponentialReconnectStrategy({ jitter: 0, maxInterval: 3000 });

      assert.deepStrictEqual(strategy.reconnectMethod(context(3)), ReconnectMethod.delay(3000));
      assert.deepStrictEqual(strategy.reconnectMethod(context(40)), ReconnectMethod.delay(3000));
    });

    it('should spread jitter symmetrically around the delay', () => {
      const low = new ExponentialReconnectStrategy({ jitter: 0.2, random: () => 0 });
      const mid = new ExponentialReconnectStrategy({ jitter: 0.2, random: () => 0.5 });
      const high = new ExponentialReconnectStrategy({ jitter: 0.2, random: () => 0.75 });

      assert.deepStrictEqual(low.reconnectMethod(context(1)), ReconnectMethod.delay(800));
      assert.deepStrictEqual(mid.reconnectMethod(context(1)), ReconnectMethod.delay(1000));
      assert.deepStrictEqual(high.reconnectMethod(context(1)), ReconnectMethod.delay(1100));
    });

    it('should keep jittered delays within bounds', () => {
      const strategy = new ExponentialReconnectStrategy({ jitter: 0.5 });

      for (let i = 0; i < 50; i++) {
        const method = strategy.reconnectMethod(context(2));
        assert.strictEqual(method.type, 'delay');
        if (method.type === 'delay') {
          assert.ok(method.interval >= 1000 && method.interval <= 3000, `${method.interval} out of range`);
        }
      }
    });

    it('should give up when the network is unsatisfied', () => {
      const strategy = new ExponentialReconnectStrategy();

      assert.deepStrictEqual(strategy.reconnectMethod(context(0, false)), {
        type: 'none',
        reason: 'Network not satisfied',
      });
    });

    it('should give up once the retry budget is spent', () => {
      const strategy = new ExponentialReconnectStrategy({ maxRetryCount: 3, jitter: 0 });

      assert.deepStrictEqual(strategy.reconnectMethod(context(2)), ReconnectMethod.delay(2000));
      assert.deepStrictEqual(strategy.reconnectMethod(context(3)), {
        type: 'none',
        reason: 'Max retry count reached',
      });
    });

    it('should use the documented defaults', () => {
      const strategy = defaultReconnectStrategy();

      assert.strictEqual(strategy.base, 2);
      assert.strictEqual(strategy.scale, 500);
      assert.strictEqual(strategy.maxRetryCount, UNLIMITED_RETRIES);
      assert.strictEqual(strategy.maxInterval, 600000);
      assert.strictEqual(strategy.jitter, 0.2);
    });

    it('should reject invalid options', () => {
      assert.throws(() => new ExponentialReconnectStrategy({ jitter: 1.5 }), ConfigurationError);
      assert.throws(() => new ExponentialReconnectStrategy({ base: 0.5 }), ConfigurationError);
      assert.throws(() => new ExponentialReconnectStrategy({ maxRetryCount: 1.5 }), ConfigurationError);
      assert.throws(() => new ExponentialReconnectStrategy({ scale: -1 }), ConfigurationError);
    });
  });

  describe('FixedDelayReconnectStrategy', () => {
    it('should return the same delay for every attempt', () => {
      const strategy = new FixedDelayReconnectStrategy({ delay: 250 });

      assert.deepStrictEqual(strategy.reconnectMethod(context(0)), ReconnectMethod.delay(250));
      assert.deepStrictEqual(strategy.reconnectMethod(context(7)), ReconnectMethod.delay(250));
    });

    it('should apply the same gating', () => {
      const strategy = new FixedDelayReconnectStrategy({ maxRetryCount: 1 });

      assert.strictEqual(strategy.reconnectMethod(context(0, false)).type, 'none');
      assert.strictEqual(strategy.reconnectMethod(context(1)).type, 'none');
    });
  });

  describe('LinearDelayReconnectStrategy', () => {
    it('should grow linearly and clip', () => {
      const strategy = new LinearDelayReconnectStrategy({ delay: 1000, maxInterval: 2500 });

      assert.deepStrictEqual(strategy.reconnectMethod(context(0)), ReconnectMethod.delay(0));
      assert.deepStrictEqual(strategy.reconnectMethod(context(1)), ReconnectMethod.delay(1000));
      assert.deepStrictEqual(strategy.reconnectMethod(context(2)), ReconnectMethod.delay(2000));
      assert.deepStrictEqual(strategy.reconnectMethod(context(3)), ReconnectMethod.delay(2500));
    });
  });

  describe('NoReconnectStrategy', () => {
    it('should never reconnect', () => {
      const strategy = new NoReconnectStrategy();

      assert.strictEqual(strategy.reconnectMethod().type, 'none');
      assert.strictEqual(strategy.shouldReconnectWhenReceivingEvent(), false);
      assert.strictEqual(strategy.shouldReconnectImmediatelyWhenNetworkRecovered(), false);
    });
  });

  describe('default predicates', () => {
    it('should reconnect only on abnormal closure and suggested reconnect events', () => {
      const strategy = new FixedDelayReconnectStrategy();

      assert.strictEqual(
        strategy.shouldReconnectWhenReceivingEvent({ client, event: { type: 'error', error: new Error('x') } }),
        true
      );
      assert.strictEqual(
        strategy.shouldReconnectWhenReceivingEvent({
          client,
          event: { type: 'disconnected', closeCode: CloseCode.goingAway },
        }),
        false
      );
      assert.strictEqual(
        strategy.shouldReconnectWhenReceivingEvent({ client, event: { type: 'text', text: 'hi' } }),
        false
      );
      assert.strictEqual(
        strategy.shouldReconnectWhenReceivingEvent({ client, event: { type: 'reconnectSuggested' } }),
        true
      );
    });

    it('should still gate a suggested reconnect on the network', () => {
      const strategy = new FixedDelayReconnectStrategy({ delay: 100 });
      const reason: ReconnectReason = { type: 'suggestedByEvent', event: { type: 'reconnectSuggested' } };

      const method = strategy.reconnectMethod({
        client,
        reason,
        reconnectCount: 0,
        networkPath: { isSatisfied: false, isFirstUpdate: false },
      });

      assert.deepStrictEqual(method, ReconnectMethod.noneForUnsatisfiedNetwork);
    });

    it('should reconnect immediately on a satisfied network', () => {
      const strategy = new ExponentialReconnectStrategy();

      assert.strictEqual(
        strategy.shouldReconnectImmediatelyWhenNetworkRecovered({
          client,
          networkPath: { isSatisfied: true, isFirstUpdate: false },
        }),
        true
      );
    });
  });

  describe('ReconnectReason', () => {
    it('should describe reasons', () => {
      const recovery: ReconnectReason = { type: 'networkRecovery', path: { isSatisfied: true, isFirstUpdate: false } };

      assert.strictEqual(describeReconnectReason(abnormalClose), 'suggested reconnect event');
      assert.strictEqual(describeReconnectReason(recovery), 'network recovery');
      assert.strictEqual(describeReconnectReasonDetail(recovery), 'network recovery(satisfied)');
      assert.strictEqual(
        describeReconnectReasonDetail(abnormalClose),
        'suggested reconnect event(disconnected with close code: abnormalClosure(1006), reason: )'
      );
    });
  });
});
