import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { setImmediate as tick } from 'node:timers/promises';
import { runPositionSync } from '../../src/app.js';
import { friendlyError } from '../../src/execution/tradeService.js';
import { createHarness } from '../helpers/harness.js';
import { marketIntent, StalledClock } from '../helpers/fakes.js';
import type { TradeIntent } from '../../src/types/index.js';

function slowTwap(overrides: Partial<TradeIntent> = {}): TradeIntent {
  return marketIntent({
    idempotencyKey: 'twap',
    collateralUsd: 100,
    orderStyle: 'twap',
    styleParams: { style: 'twap', durationMinutes: 600, slices: 10, randomize: false },
    ...overrides,
  });
}

describe('Trade service', () => {
  it('serialises intents for the same coin so the second sees the first', async () => {
    const h = createHarness();
    await h.settings.updateRiskLimits({ maxDailyTrades: 1 });

    const [first, second] = await Promise.all([
      h.service.submitIntent(marketIntent({ idempotencyKey: 'a', collateralUsd: 100 })),
      h.service.submitIntent(marketIntent({ idempotencyKey: 'b', collateralUsd: 100 })),
    ]);

    assert.equal(first.success, true);
    assert.equal(second.success, false);
    assert.equal(second.reason, 'DailyTradeLimitExceeded');
    assert.equal(second.error, 'Max daily trades reached (1/1)');
  });

  it('drops a same-key intent queued behind the first', async () => {
    const h = createHarness();
    const intent = marketIntent({ idempotencyKey: 'same', collateralUsd: 100 });

    const [first, second] = await Promise.all([h.service.submitIntent(intent), h.service.submitIntent(intent)]);

    assert.equal(first.success, true);
    assert.equal(second.reason, 'DuplicateIntent');
    assert.equal((await h.reconciler.loadRiskState()).dailyTradeCount, 1);
  });

  it('counts only the entry when a position is later closed', async () => {
    const h = createHarness();
    await h.service.submitIntent(marketIntent({ coin: 'ETH', leverage: 2, collateralUsd: 100 }));

    const closed = await h.service.closePosition('ETH', '');

    assert.equal(closed.success, true);
    assert.equal(closed.trade?.closeReason, 'manual');
    const stats = await h.service.getDailyStats();
    assert.equal(stats.dailyTradeCount, 1);
    assert.equal(stats.trades, 1);
  });

  it('closes a coin at once while a TWAP on it is waiting between slices', async () => {
    const clock = new StalledClock();
    const h = createHarness({}, clock);
    await h.service.submitIntent(marketIntent({ idempotencyKey: 'open', collateralUsd: 100 }));

    const twap = h.service.submitIntent(slowTwap());
    await tick();
    assert.equal(h.coordinator.isActive('twap'), true);
    assert.deepEqual(clock.sleeps, [3_600_000]);

    const closed = await h.service.closePosition('BTC', '');

    assert.equal(closed.success, true);
    const outcome = await twap;
    assert.equal(outcome.execution?.cancelled, true);
    assert.equal(outcome.execution?.submittedLegs.length, 1);
    assert.deepEqual((await h.gateway.getAccountState()).positions, []);
  });

  it('closes a coin while TWAPs on four other coins are waiting', async () => {
    const h = createHarness({}, new StalledClock());
    h.market.set('AVAX', 20, { szDecimals: 2 });
    await h.service.submitIntent(marketIntent({ idempotencyKey: 'open', collateralUsd: 100 }));

    const twaps = [
      { coin: 'ETH', dex: '' },
      { coin: 'SOL', dex: '' },
      { coin: 'TSLA', dex: 'xyz' },
      { coin: 'AVAX', dex: '' },
    ].map(({ coin, dex }) => h.service.submitIntent(slowTwap({ idempotencyKey: `twap-${coin}`, coin, dex })));
    await tick();
    assert.equal(h.coordinator.isActive('twap-AVAX'), true);
    // Waiting sequences hold no slot
    assert.equal(h.coordinator.inFlightCount, 0);

    const closed = await h.service.closePosition('BTC', '');
    assert.equal(closed.success, true);
    assert.deepEqual(
      (await h.gateway.getAccountState()).positions.map((p) => p.coin).sort(),
      ['AVAX', 'ETH', 'SOL', 'TSLA'],
    );

    for (const coin of ['ETH', 'SOL', 'TSLA', 'AVAX']) h.service.cancelTwap(`twap-${coin}`);
    await Promise.all(twaps);
    assert.equal(h.coordinator.inFlightCount, 0);
  });

  it('leaves a market with an execution in progress to that execution', async () => {
    const h = createHarness({}, new StalledClock());
    const twap = h.service.submitIntent(slowTwap());
    await tick();
    assert.equal((await h.gateway.getAccountState()).positions.length, 1);

    const report = await runPositionSync(h, async () => {});
    assert.deepEqual(report.adopted, []);
    assert.deepEqual(await h.repos.trades.listOpen(), []);

    h.service.cancelTwap('twap');
    await twap;
    const open = await h.repos.trades.listOpen();
    assert.equal(open.length, 1);
    assert.equal(open[0]?.source, 'manual');

    // Nothing queued since: the next cycle looks at BTC again
    const next = await runPositionSync(h, async () => {});
    assert.deepEqual(next.adopted, []);
    assert.deepEqual(next.closed, []);
  });

  it('rewrites venue errors for users', () => {
    assert.equal(friendlyError('Insufficient margin to place order'), 'Insufficient balance to execute this trade');
    assert.equal(friendlyError('HTTP 429'), 'Too many requests. Please wait a moment and try again.');
    assert.equal(friendlyError('Order 7 not found'), 'Order 7 not found');
  });
});
