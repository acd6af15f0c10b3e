// ============================================================
// Trade Logger - CSV export
// ============================================================
// Renders trade history for GET /api/trades/export.
// ============================================================

import type { TradeRecord } from '../types/index.js';
import { assetName } from '../execution/exchangeGateway.js';

export const CSV_HEADER = [
  'id', 'openedAt', 'coin', 'side', 'entryPrice', 'exitPrice', 'size', 'leverage',
  'collateralUsd', 'pnlUsd', 'pnlPct', 'status', 'closeReason', 'source', 'closedAt',
].join(',');

/** Quote a field only when it needs it. */
function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function tradeToCsvRow(trade: TradeRecord): string {
  return [
    trade.id,
    trade.openedAt.toISOString(),
    assetName(trade.coin, trade.dex),
    trade.side,
    trade.entryPrice.toFixed(4),
    trade.exitPrice?.toFixed(4) ?? '',
    String(trade.size),
    String(trade.leverage),
    trade.collateralUsd.toFixed(2),
    trade.realizedPnl?.toFixed(4) ?? '',
    trade.pnlPct?.toFixed(4) ?? '',
    trade.status,
    trade.closeReason ?? '',
    trade.source,
    trade.closedAt?.toISOString() ?? '',
  ]
    .map(csvField)
    .join(',');
}

/**
 * Header plus one row per trade, in the order given.
 *
 * @param trades - Trade records, typically newest first
 */
export function tradesToCsv(trades: TradeRecord[]): string {
  return [CSV_HEADER, ...trades.map(tradeToCsvRow)].join('\n') + '\n';
}
