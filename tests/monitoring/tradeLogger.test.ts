import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { TradeRecord } from '../../src/types/index.js';
import { CSV_HEADER, tradesToCsv, tradeToCsvRow } from '../../src/monitoring/tradeLogger.js';

function trade(overrides: Partial<TradeRecord> = {}): TradeRecord {
  return {
    id: 't1',
    openedAt: new Date('2026-03-02T12:00:00.000Z'),
    coin: 'TSLA',
    dex: 'xyz',
    side: 'long',
    size: 0.8,
    entryPrice: 250,
    leverage: 2,
    collateralUsd: 100,
    takeProfitPrices: [],
    status: 'open',
    partialPnl: 0,
    source: 'manual',
    ...overrides,
  };
}

describe('Trade CSV export', () => {
  it('formats a closed trade', () => {
    const row = tradeToCsvRow(
      trade({
        status: 'closed',
        exitPrice: 260,
        realizedPnl: 8,
        pnlPct: 8,
        closeReason: 'take_profit',
        closedAt: new Date('2026-03-02T15:30:00.000Z'),
      }),
    );
    assert.equal(
      row,
      't1,2026-03-02T12:00:00.000Z,xyz:TSLA,long,250.0000,260.0000,0.8,2,100.00,8.0000,8.0000,closed,take_profit,manual,2026-03-02T15:30:00.000Z',
    );
  });

  it('leaves exit fields empty while a trade is open', () => {
    assert.equal(tradeToCsvRow(trade()), 't1,2026-03-02T12:00:00.000Z,xyz:TSLA,long,250.0000,,0.8,2,100.00,,,open,,manual,');
  });

  it('quotes fields containing commas or quotes', () => {
    const row = tradeToCsvRow(trade({ id: 'a,"b"', dex: '' }));
    assert.ok(row.startsWith('"a,""b""",2026-03-02T12:00:00.000Z,TSLA,'));
  });

  it('writes the header even with no trades', () => {
    assert.equal(tradesToCsv([]), `${CSV_HEADER}\n`);
    assert.equal(tradesToCsv([trade()]).split('\n').length, 3);
  });
});
