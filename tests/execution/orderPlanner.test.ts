import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { OrderPlan } from '../../src/types/index.js';
import {
  plan,
  planClose,
  rebaseProtectiveLegs,
  roundPrice,
  roundSize,
  scalePrices,
  scaleWeights,
} from '../../src/execution/orderPlanner.js';
import { market, marketIntent, position } from '../helpers/fakes.js';

const btc = market('BTC', 50_000, 5);

function planned(result: ReturnType<typeof plan>): OrderPlan {
  assert.equal(result.ok, true);
  if (!result.ok) throw new Error(result.message);
  return result.plan;
}

function rejection(result: ReturnType<typeof plan>): string {
  assert.equal(result.ok, false);
  return result.ok ? '' : result.message;
}

describe('Order planner', () => {
  describe('rounding', () => {
    it('rounds prices to five significant figures', () => {
      assert.equal(roundPrice(12345.678), 12346);
      assert.equal(roundPrice(0.000123456), 0.00012346);
    });

    it('rounds sizes to the market decimals', () => {
      assert.equal(roundSize(0.123456, 4), 0.1235);
      assert.equal(roundSize(7.6, 0), 8);
    });
  });

  describe('market and limit', () => {
    it('builds entry plus stop-loss for a market intent', () => {
      const p = planned(plan(marketIntent({ leverage: 10, collateralUsd: 100, stopLossPct: 2 }), btc));

      assert.equal(p.totalSize, 0.02);
      assert.equal(p.legs.length, 2);
      const [entry, stop] = p.legs;
      assert.deepEqual(entry, {
        role: 'entry',
        orderType: 'market',
        price: 50_500,
        sizeFraction: 1,
        size: 0.02,
        reduceOnly: false,
      });
      assert.equal(stop?.role, 'stop_loss');
      assert.equal(stop?.triggerPrice, 49_000);
      assert.equal(stop?.size, 0.02);
      assert.equal(stop?.reduceOnly, true);
    });

    it('sizes take-profit legs against the original entry size', () => {
      const p = planned(
        plan(
          marketIntent({
            leverage: 10,
            collateralUsd: 100,
            takeProfitLegs: [
              { triggerPct: 50, closeFraction: 0.25 },
              { triggerPct: 100, closeFraction: 0.5 },
            ],
          }),
          btc,
        ),
      );
      const tps = p.legs.filter((l) => l.role === 'take_profit');
      assert.deepEqual(
        tps.map((l) => [l.triggerPrice, l.size]),
        [
          [75_000, 0.005],
          [100_000, 0.01],
        ],
      );
    });

    it('places a short stop above entry', () => {
      const p = planned(plan(marketIntent({ side: 'short', leverage: 10, collateralUsd: 100, stopLossPct: 2 }), btc));
      assert.equal(p.legs[1]?.triggerPrice, 51_000);
      assert.equal(p.legs[0]?.price, 49_500);
    });

    it('drops a short take-profit whose trigger would not be positive', () => {
      const p = planned(
        plan(
          marketIntent({
            side: 'short',
            leverage: 10,
            collateralUsd: 100,
            takeProfitLegs: [
              { triggerPct: 50, closeFraction: 0.25 },
              { triggerPct: 100, closeFraction: 0.5 },
            ],
          }),
          btc,
        ),
      );
      assert.deepEqual(
        p.legs.map((l) => [l.role, l.triggerPrice]),
        [
          ['entry', undefined],
          ['take_profit', 25_000],
        ],
      );
    });

    it('rejects take-profit fractions summing over one', () => {
      const message = rejection(
        plan(
          marketIntent({
            takeProfitLegs: [
              { triggerPct: 5, closeFraction: 0.6 },
              { triggerPct: 10, closeFraction: 0.5 },
            ],
          }),
          btc,
        ),
      );
      assert.equal(message, 'Take-profit fractions sum to 1.1000 (max 1)');
    });

    it('sizes a limit entry at the limit price', () => {
      const p = planned(
        plan(
          marketIntent({
            leverage: 4,
            collateralUsd: 250,
            orderStyle: 'limit',
            styleParams: { style: 'limit', limitPrice: 40_000, reduceOnly: false },
          }),
          btc,
        ),
      );
      assert.equal(p.referencePrice, 40_000);
      assert.equal(p.totalSize, 0.025);
      assert.equal(p.legs[0]?.orderType, 'limit');
      assert.equal(p.legs[0]?.price, 40_000);
    });

    it('rejects a size that rounds to zero', () => {
      const message = rejection(plan(marketIntent({ leverage: 1, collateralUsd: 0.1 }), market('BTC', 50_000, 2)));
      assert.equal(message, 'Position size rounds to zero at 2 decimals');
    });
  });

  describe('twap', () => {
    const twap = (durationMinutes: number, extra: { slices?: number; randomize?: boolean } = {}) =>
      marketIntent({
        leverage: 10,
        collateralUsd: 100,
        orderStyle: 'twap',
        styleParams: { style: 'twap', durationMinutes, slices: extra.slices, randomize: extra.randomize ?? false },
      });

    it('splits into one slice per minute by default', () => {
      const p = planned(plan(twap(30, { randomize: true }), btc));
      assert.deepEqual(p.schedule, { slices: 30, sliceSize: 0.00067, intervalMs: 60_000, jitterMs: 12_000 });
      assert.equal(p.legs.length, 30);
      assert.ok(p.legs.every((l) => l.role === 'entry' && l.orderType === 'market' && l.size === 0.00067));
    });

    it('honours an explicit slice count', () => {
      const p = planned(plan(twap(60, { slices: 4 }), btc));
      assert.deepEqual(p.schedule, { slices: 4, sliceSize: 0.005, intervalMs: 900_000, jitterMs: 0 });
    });

    it('rejects short durations, bad slice counts and protective legs', () => {
      assert.equal(rejection(plan(twap(4), btc)), 'TWAP duration must be at least 5 minutes');
      assert.equal(rejection(plan(twap(30, { slices: 51 }), btc)), 'Slice count must be between 2 and 50');
      assert.equal(
        rejection(plan({ ...twap(30), stopLossPct: 5 }, btc)),
        'Stop-loss and take-profit legs are not supported on TWAP orders',
      );
    });
  });

  describe('scale', () => {
    const scale = (priceFrom: number, priceTo: number, orderCount: number, skew: number) =>
      marketIntent({
        leverage: 3,
        collateralUsd: 100,
        orderStyle: 'scale',
        styleParams: { style: 'scale', priceFrom, priceTo, orderCount, skew, reduceOnly: false },
      });

    it('spreads equal limit orders across the range when skew is 1', () => {
      const p = planned(plan(scale(100, 90, 3, 1), market('SOL', 95, 4)));
      assert.equal(p.totalSize, 3.1579);
      assert.deepEqual(
        p.legs.map((l) => [l.price, l.size]),
        [
          [100, 1.0526],
          [95, 1.0526],
          [90, 1.0526],
        ],
      );
    });

    it('leans size toward the first price as skew grows', () => {
      const weights = scaleWeights(3, 2);
      assert.equal(weights.length, 3);
      assert.ok(Math.abs((weights[0] ?? 0) - 0.5) < 1e-12);
      assert.ok(Math.abs((weights[1] ?? 0) - 1 / 3) < 1e-12);
      assert.ok(Math.abs((weights[2] ?? 0) - 1 / 6) < 1e-12);
      assert.deepEqual(scalePrices(10, 20, 5), [10, 12.5, 15, 17.5, 20]);
    });

    it('rejects a degenerate range and out-of-range parameters', () => {
      assert.equal(rejection(plan(scale(100, 100, 3, 1), btc)), 'price_from and price_to must differ');
      assert.equal(rejection(plan(scale(100, 90, 1, 1), btc)), 'Number of orders must be between 2 and 50');
      assert.equal(rejection(plan(scale(100, 90, 3, 20), btc)), 'Skew must be between 0.1 and 10');
    });
  });

  describe('helpers', () => {
    it('rebases protective triggers on the actual fill', () => {
      const p = planned(plan(marketIntent({ leverage: 10, collateralUsd: 100, stopLossPct: 2 }), btc));
      const rebased = rebaseProtectiveLegs(p.legs, 'long', 51_000);
      assert.equal(rebased[0], p.legs[0]);
      assert.equal(rebased[1]?.triggerPrice, 49_980);
    });

    it('plans a reduce-only market close opposite the position', () => {
      const close = planClose(position('BTC', 'long', 0.5, 48_000), btc, 'close-1');
      assert.equal(close.side, 'short');
      assert.equal(close.totalSize, 0.5);
      assert.deepEqual(close.legs, [
        { role: 'entry', orderType: 'market', price: 49_500, sizeFraction: 1, size: 0.5, reduceOnly: true },
      ]);
    });
  });
});
