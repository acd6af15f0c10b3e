import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { handleCommand, type BotContext } from '../../src/monitoring/telegramBot.js';
import { createHarness } from '../helpers/harness.js';

function botContext(h: ReturnType<typeof createHarness>): BotContext {
  return {
    gateway: h.gateway,
    loadRiskState: (now) => h.reconciler.loadRiskState(now),
    getRiskConfig: () => h.settings.getRiskConfig(),
    getDailyStats: (now) => h.service.getDailyStats(now),
    pause: (minutes, now) => h.reconciler.pause(minutes, now),
    resume: () => h.reconciler.resume(),
    clock: h.clock,
    mode: { paperTrading: true, testnet: true },
  };
}

describe('Telegram commands', () => {
  it('reports status', async () => {
    const h = createHarness();
    assert.equal(
      await handleCommand('/status', botContext(h)),
      [
        '🤖 <b>Signal Bridge Status</b>',
        'Mode: PAPER | testnet',
        'Bot: 🟢 enabled',
        'Equity: $10000.00 | Withdrawable: $10000.00',
        'Open positions: 0',
        'Circuit breaker: 🟢 inactive',
      ].join('\n'),
    );
  });

  it('pauses for the default hour, rejects a bad argument and resumes', async () => {
    const h = createHarness();
    const ctx = botContext(h);

    assert.equal(await handleCommand('/pause', ctx), '🔴 <b>Trading paused</b> until 2026-03-02T13:00Z');
    assert.equal(await handleCommand('/pause soon', ctx), '⚠️ Usage: /pause [minutes]');
    assert.equal(await handleCommand('/pause 0', ctx), '⚠️ Usage: /pause [minutes]');

    assert.equal(await handleCommand('/resume', ctx), '🟢 <b>Trading resumed</b>');
    assert.equal((await h.reconciler.loadRiskState()).tradingPausedUntil, null);
  });

  it('lists open positions', async () => {
    const h = createHarness();
    const ctx = botContext(h);
    assert.equal(await handleCommand('/positions', ctx), '📭 No open positions');

    await h.handlers.trade({ coin: 'ETH', action: 'buy', leverage: 2, collateral_usd: 100 });

    assert.equal(
      await handleCommand('/positions', ctx),
      '📂 <b>Open Positions (1)</b>\n' +
        'LONG ETH | Size: 0.1 | Lev: 2x\n' +
        '  Entry: 2001.0000 | Mark: 2000.0000 | uPnL: -$0.10',
    );
  });

  it('ignores plain messages and unknown commands', async () => {
    const ctx = botContext(createHarness());
    assert.equal(await handleCommand('hello', ctx), null);
    assert.equal(await handleCommand('/moon', ctx), null);
  });
});
