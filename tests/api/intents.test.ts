import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  buildBatchIntents,
  buildLimitIntent,
  buildMarketIntent,
  buildWebhookIntent,
  resolveMarket,
  takeProfitTargets,
  webhookIdempotencyKey,
} from '../../src/api/intents.js';
import { batchTradeSchema, limitOrderSchema, tradeSchema, webhookSchema } from '../../src/api/schemas.js';
import { defaultCoinConfig } from '../../src/config/risk.js';
import { T0 } from '../helpers/fakes.js';

const now = new Date(T0);
const alert = webhookSchema.parse({ secret: 'test-secret', action: 'Buy', coin: 'BTC', leverage: 5 });

describe('Intent builders', () => {
  describe('webhook idempotency key', () => {
    it('uses the explicit key when the alert carries one', () => {
      const body = webhookSchema.parse({ secret: 'test-secret', action: 'buy', coin: 'BTC', idempotency_key: 'alert-77' });
      assert.equal(webhookIdempotencyKey(body, now), 'alert-77');
    });

    it('maps identical alerts inside one minute to the same key', () => {
      const first = webhookIdempotencyKey(alert, now);
      assert.match(first, /^wh-[0-9a-f]{32}$/);
      assert.equal(webhookIdempotencyKey(alert, new Date('2026-03-02T12:00:59.999Z')), first);
      assert.notEqual(webhookIdempotencyKey(alert, new Date('2026-03-02T12:01:00.000Z')), first);
      assert.notEqual(webhookIdempotencyKey({ ...alert, leverage: 6 }, now), first);
    });
  });

  describe('take-profit targets', () => {
    it('adds a runner for whatever TP1 and TP2 leave open', () => {
      assert.deepEqual(takeProfitTargets({ tp1Pct: 50, tp1SizePct: 25, tp2Pct: 100, tp2SizePct: 50, runnerPct: 200 }), [
        { triggerPct: 50, closeFraction: 0.25 },
        { triggerPct: 100, closeFraction: 0.5 },
        { triggerPct: 200, closeFraction: 0.25 },
      ]);
    });

    it('skips the runner when nothing is left and ignores half-specified legs', () => {
      assert.deepEqual(takeProfitTargets({ tp1Pct: 10, tp1SizePct: 40, tp2Pct: 20, tp2SizePct: 60, runnerPct: 50 }), [
        { triggerPct: 10, closeFraction: 0.4 },
        { triggerPct: 20, closeFraction: 0.6 },
      ]);
      assert.deepEqual(takeProfitTargets({ tp1Pct: 10 }), []);
    });
  });

  describe('webhook intents', () => {
    it('fills missing values from the coin config', () => {
      const intent = buildWebhookIntent(
        webhookSchema.parse({ secret: 'test-secret', action: 'SELL', coin: 'ETH', take_profit_pct: 150 }),
        defaultCoinConfig('ETH'),
        now,
      );

      assert.equal(intent.side, 'short');
      assert.equal(intent.leverage, 3);
      assert.equal(intent.collateralUsd, 100);
      assert.equal(intent.stopLossPct, 15);
      assert.equal(intent.source, 'webhook');
      assert.equal(intent.closePosition, false);
      assert.deepEqual(intent.styleParams, { style: 'market', slippage: 0.01 });
      assert.deepEqual(intent.takeProfitLegs, [
        { triggerPct: 50, closeFraction: 0.25 },
        { triggerPct: 100, closeFraction: 0.5 },
        { triggerPct: 150, closeFraction: 0.25 },
      ]);
    });

    it('turns a close alert into a close intent without an action', () => {
      const intent = buildWebhookIntent(
        webhookSchema.parse({ secret: 'test-secret', coin: 'BTC', close_position: true }),
        defaultCoinConfig('BTC'),
        now,
      );
      assert.equal(intent.closePosition, true);
      assert.deepEqual(intent.takeProfitLegs, []);
      assert.equal(intent.stopLossPct, undefined);
    });
  });

  describe('manual intents', () => {
    it('lets request TP fields override the coin config one by one', () => {
      const intent = buildMarketIntent(
        tradeSchema.parse({ coin: 'BTC', action: 'buy', tp1_pct: 20, idempotency_key: 'manual-1' }),
        defaultCoinConfig('BTC'),
      );
      assert.equal(intent.idempotencyKey, 'manual-1');
      assert.deepEqual(intent.takeProfitLegs, [
        { triggerPct: 20, closeFraction: 0.25 },
        { triggerPct: 100, closeFraction: 0.5 },
      ]);
    });

    it('strips protective legs from a reduce-only limit', () => {
      const intent = buildLimitIntent(
        limitOrderSchema.parse({ coin: 'BTC', action: 'sell', limit_price: 60_000, reduce_only: true }),
        defaultCoinConfig('BTC'),
      );
      assert.deepEqual(intent.styleParams, { style: 'limit', limitPrice: 60_000, reduceOnly: true });
      assert.equal(intent.stopLossPct, undefined);
      assert.deepEqual(intent.takeProfitLegs, []);
    });

    it('takes a limit order\'s stop-loss and take-profits from the request only', () => {
      const bare = buildLimitIntent(
        limitOrderSchema.parse({ coin: 'BTC', action: 'buy', limit_price: 49_000 }),
        defaultCoinConfig('BTC'),
      );
      assert.equal(bare.stopLossPct, undefined);
      assert.deepEqual(bare.takeProfitLegs, []);

      const explicit = buildLimitIntent(
        limitOrderSchema.parse({ coin: 'BTC', action: 'buy', limit_price: 49_000, stop_loss_pct: 2, tp1_pct: 30, tp1_size_pct: 40 }),
        defaultCoinConfig('BTC'),
      );
      assert.equal(explicit.stopLossPct, 2);
      assert.deepEqual(explicit.takeProfitLegs, [{ triggerPct: 30, closeFraction: 0.4 }]);
    });

    it('resolves "dex:COIN" names', () => {
      assert.deepEqual(resolveMarket('xyz:TSLA'), { coin: 'TSLA', dex: 'xyz' });
      assert.deepEqual(resolveMarket('BTC'), { coin: 'BTC', dex: '' });
      assert.deepEqual(resolveMarket('TSLA', 'xyz'), { coin: 'TSLA', dex: 'xyz' });
    });

    it('builds one batch intent per enabled coin of the category', () => {
      const coins = [
        { ...defaultCoinConfig('SOL'), category: 'L1s' as const },
        { ...defaultCoinConfig('AVAX'), category: 'L1s' as const, enabled: false },
        { ...defaultCoinConfig('PEPE'), category: 'MEMES' as const },
        defaultCoinConfig('TSLA', 'xyz'),
      ];

      const l1s = buildBatchIntents(batchTradeSchema.parse({ category: 'L1s', action: 'buy', leverage: 2 }), coins);
      assert.deepEqual(
        l1s.map((i) => [i.coin, i.leverage, i.source]),
        [['SOL', 2, 'category_batch']],
      );

      const [tsla] = buildBatchIntents(batchTradeSchema.parse({ category: 'HIP-3', action: 'sell' }), coins);
      assert.equal(tsla?.dex, 'xyz');
      assert.match(tsla?.idempotencyKey ?? '', /^batch-.+-xyz:TSLA$/);
    });
  });
});
