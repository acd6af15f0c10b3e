// ============================================================
// State Reconciler
// ============================================================
// Sole writer of trade records and the risk-state counters.
//   - reconcile(): after an execution, diff the before/after
//     snapshots for the coin and open / resize / close records
//   - syncWithSnapshot(): periodic job; heals records toward
//     the venue and closes records whose position vanished
//   - loadRiskState(): lazy UTC-midnight rollover
//   - resume(): manual clear of the circuit breaker
//
// Daily P&L counts every realised piece (partial closes too);
// the loss streak only moves when a position fully closes.
// ============================================================

import { v4 as uuidv4 } from 'uuid';
import type {
  AccountSnapshot,
  CloseReason,
  ExecutionResult,
  Position,
  RiskLimits,
  RiskState,
  Side,
  TradeRecord,
} from '../types/index.js';
import type { Repositories } from '../database/repositories.js';
import { emptyRiskState } from '../database/repositories.js';
import { errorMessage } from '../errors.js';
import { createModuleLogger } from '../monitoring/logger.js';
import { systemClock, utcDay, type Clock } from './clock.js';
import { positionKey } from './exchangeGateway.js';

const log = createModuleLogger('StateReconciler');

/** Sizes closer than this are treated as unchanged */
const SIZE_EPSILON = 1e-9;

// --------------- Interfaces ---------------

export interface ReconcilerOptions {
  /** Current risk limits (threshold and cooldown for the breaker) */
  limits: () => Promise<RiskLimits>;
  clock?: Clock;
  /** Fresh price for a market whose position vanished */
  resolvePrice?: (coin: string, dex: string) => Promise<number>;
}

/** Known cause of an exit, e.g. a simulated trigger fill. */
export interface ExitHint {
  reason: CloseReason;
  price: number;
}

export interface ReconcileOutcome {
  opened: TradeRecord | null;
  updated: TradeRecord | null;
  closed: TradeRecord | null;
  riskState: RiskState;
  breakerTripped: boolean;
}

export interface SyncReport {
  adopted: TradeRecord[];
  resized: TradeRecord[];
  closed: TradeRecord[];
  riskState: RiskState;
  breakerTripped: boolean;
}

// --------------- Pure Helpers ---------------

export function realizedPnl(side: Side, entryPrice: number, exitPrice: number, size: number): number {
  const dir = side === 'long' ? 1 : -1;
  return (exitPrice - entryPrice) * size * dir;
}

/**
 * Best guess at why a position closed without our own close order,
 * judged from where the price stood against the protective levels.
 */
export function inferCloseReason(
  trade: Pick<TradeRecord, 'side' | 'stopLossPrice' | 'takeProfitPrices'>,
  price: number,
  liquidationPrice: number | null,
): CloseReason {
  const long = trade.side === 'long';
  const atOrBelow = (level: number) => (long ? price <= level : price >= level);
  const atOrAbove = (level: number) => (long ? price >= level : price <= level);

  if (liquidationPrice !== null && atOrBelow(liquidationPrice)) return 'liquidation';
  if (trade.stopLossPrice !== undefined && atOrBelow(trade.stopLossPrice)) return 'stop_loss';
  if (trade.takeProfitPrices.some((tp) => atOrAbove(tp))) return 'take_profit';
  return 'manual';
}

/** Reset the daily counters and the pause when the UTC day has changed. */
export function rollover(state: RiskState, now: Date): RiskState {
  const today = utcDay(now);
  if (state.tradingDay === today) return state;
  return { ...emptyRiskState(today), consecutiveLosses: state.consecutiveLosses };
}

function entryAccepted(result: ExecutionResult): boolean {
  return result.legs.some((o) => o.leg.role === 'entry' && !o.leg.reduceOnly && o.status === 'submitted');
}

// --------------- Reconciler ---------------

export class StateReconciler {
  private readonly clock: Clock;
  /** Last position seen per market, for exits detected after the fact */
  private readonly lastPositions = new Map<string, Position>();

  constructor(
    private readonly repos: Pick<Repositories, 'trades' | 'riskState' | 'activity'>,
    private readonly options: ReconcilerOptions,
  ) {
    this.clock = options.clock ?? systemClock;
  }

  // --------------- Risk State ---------------

  /** Current risk state, rolled over to today's UTC day if needed. */
  async loadRiskState(now: Date = this.clock.now()): Promise<RiskState> {
    const state = await this.repos.riskState.load();
    if (state.tradingDay === utcDay(now)) return state;

    log.info(`New trading day ${utcDay(now)}: daily counters reset (was ${state.tradingDay})`);
    return this.repos.riskState.update((s) => rollover(s, now));
  }

  /** Manually clear the circuit breaker and the loss streak. */
  async resume(): Promise<RiskState> {
    const state = await this.repos.riskState.update((s) => ({
      ...s,
      tradingPausedUntil: null,
      consecutiveLosses: 0,
    }));
    log.info('Trading resumed manually');
    await this.audit('info', 'Trading resumed manually');
    return state;
  }

  /** Pause new entries for the given number of minutes (manual /pause). */
  async pause(minutes: number, now: Date = this.clock.now()): Promise<RiskState> {
    const until = new Date(now.getTime() + minutes * 60_000);
    const state = await this.repos.riskState.update((s) => ({ ...s, tradingPausedUntil: until }));
    await this.audit('warning', `Trading paused manually until ${until.toISOString()}`);
    return state;
  }

  private async recordEntry(now: Date): Promise<RiskState> {
    return this.repos.riskState.update((s) => {
      const current = rollover(s, now);
      return { ...current, dailyTradeCount: current.dailyTradeCount + 1 };
    });
  }

  /**
   * Fold a realised P&L piece into the counters.
   * @param finalPnl - Whole-trade P&L when the position fully closed, else undefined
   */
  private async recordRealized(
    piecePnl: number,
    finalPnl: number | undefined,
    now: Date,
  ): Promise<{ state: RiskState; tripped: boolean }> {
    const limits = await this.options.limits();
    let tripped = false;

    const state = await this.repos.riskState.update((s) => {
      // The store may re-run the mutator after a lost compare-and-set
      tripped = false;
      const current = rollover(s, now);
      const next: RiskState = { ...current, dailyRealizedPnl: current.dailyRealizedPnl + piecePnl };
      if (finalPnl === undefined) return next;

      if (finalPnl < 0) {
        next.consecutiveLosses = current.consecutiveLosses + 1;
        if (next.consecutiveLosses >= limits.consecutiveLossPauseThreshold) {
          next.tradingPausedUntil = new Date(now.getTime() + limits.pauseDurationMinutes * 60_000);
          next.consecutiveLosses = 0;
          tripped = true;
        }
      } else {
        next.consecutiveLosses = 0;
      }
      return next;
    });

    if (tripped) {
      const message = `Circuit breaker tripped after ${limits.consecutiveLossPauseThreshold} consecutive losses, paused for ${limits.pauseDurationMinutes} minutes`;
      log.warn(message);
      await this.audit('warning', message, { pausedUntil: state.tradingPausedUntil?.toISOString() });
    }
    return { state, tripped };
  }

  // --------------- Trade Records ---------------

  private buildRecord(
    pos: Position,
    now: Date,
    result: ExecutionResult | null,
  ): TradeRecord {
    const submitted = result?.submittedLegs ?? [];
    const entryAck = submitted.find((o) => o.leg.role === 'entry')?.ack;
    const takeProfitPrices = submitted
      .filter((o) => o.leg.role === 'take_profit')
      .map((o) => o.leg.triggerPrice)
      .filter((p): p is number => p !== undefined);

    return {
      id: uuidv4(),
      openedAt: now,
      coin: pos.coin,
      dex: pos.dex,
      side: pos.side,
      size: Math.abs(pos.size),
      entryPrice: pos.entryPrice > 0 ? pos.entryPrice : (result?.entryFill?.avgPrice ?? pos.markPrice),
      leverage: pos.leverage,
      collateralUsd: result?.collateralUsd ?? pos.marginUsed,
      stopLossPrice: submitted.find((o) => o.leg.role === 'stop_loss')?.leg.triggerPrice,
      takeProfitPrices,
      orderId: entryAck?.orderId,
      status: 'open',
      partialPnl: 0,
      source: result?.source ?? 'reconciled',
      indicator: result?.indicator,
      notes: result ? undefined : 'Adopted from exchange snapshot',
    };
  }

  private async openTrade(pos: Position, now: Date, result: ExecutionResult | null): Promise<TradeRecord> {
    const trade = this.buildRecord(pos, now, result);
    await this.repos.trades.insert(trade);
    log.info(
      `Trade opened: ${trade.side.toUpperCase()} ${trade.size} ${positionKey(trade.coin, trade.dex)} @ ${trade.entryPrice} (${trade.source})`,
    );
    return trade;
  }

  private async closeTrade(
    trade: TradeRecord,
    exitPrice: number,
    reason: CloseReason,
    now: Date,
  ): Promise<{ trade: TradeRecord; state: RiskState; tripped: boolean }> {
    const piece = realizedPnl(trade.side, trade.entryPrice, exitPrice, trade.size);
    const total = piece + trade.partialPnl;
    const closed: TradeRecord = {
      ...trade,
      exitPrice,
      status: reason === 'liquidation' ? 'liquidated' : 'closed',
      closeReason: reason,
      realizedPnl: total,
      pnlPct: trade.collateralUsd > 0 ? (total / trade.collateralUsd) * 100 : 0,
      closedAt: now,
    };
    await this.repos.trades.update(closed);
    log.info(
      `Trade closed [${reason}]: ${closed.side.toUpperCase()} ${positionKey(closed.coin, closed.dex)} | entry=${closed.entryPrice} exit=${exitPrice} | PnL=${total >= 0 ? '+' : ''}${total.toFixed(2)} USD`,
    );
    await this.audit(total < 0 ? 'warning' : 'info', `Closed ${positionKey(closed.coin, closed.dex)} (${reason})`, {
      tradeId: closed.id,
      pnl: total,
    });

    const { state, tripped } = await this.recordRealized(piece, total, now);
    return { trade: closed, state, tripped };
  }

  /** Shrink a record to the new size, banking the P&L of the closed part. */
  private async reduceTrade(
    trade: TradeRecord,
    newSize: number,
    exitPrice: number,
    now: Date,
  ): Promise<{ trade: TradeRecord; state: RiskState }> {
    const closedSize = trade.size - newSize;
    const piece = realizedPnl(trade.side, trade.entryPrice, exitPrice, closedSize);
    const updated: TradeRecord = { ...trade, size: newSize, partialPnl: trade.partialPnl + piece };
    await this.repos.trades.update(updated);
    log.info(
      `Partial close: ${positionKey(trade.coin, trade.dex)} ${trade.size} -> ${newSize} @ ${exitPrice} | PnL=${piece.toFixed(2)} USD`,
    );
    const { state } = await this.recordRealized(piece, undefined, now);
    return { trade: updated, state };
  }

  private async growTrade(trade: TradeRecord, pos: Position): Promise<TradeRecord> {
    const updated: TradeRecord = {
      ...trade,
      size: Math.abs(pos.size),
      entryPrice: pos.entryPrice > 0 ? pos.entryPrice : trade.entryPrice,
      leverage: pos.leverage,
    };
    await this.repos.trades.update(updated);
    log.info(`Position increased: ${positionKey(trade.coin, trade.dex)} ${trade.size} -> ${updated.size}`);
    return updated;
  }

  private async exitPriceFor(key: string, trade: TradeRecord, hint?: ExitHint): Promise<number> {
    if (hint) return hint.price;
    if (this.options.resolvePrice) {
      try {
        return await this.options.resolvePrice(trade.coin, trade.dex);
      } catch (err) {
        log.warn(`Could not price ${key} for exit, using last mark: ${errorMessage(err)}`);
      }
    }
    return this.lastPositions.get(key)?.markPrice ?? trade.entryPrice;
  }

  // --------------- Reconcile ---------------

  /**
   * Apply an execution's effect on positions to the records and counters.
   *
   * @param before - Snapshot taken before the execution
   * @param after - Snapshot taken after it
   */
  async reconcile(
    result: ExecutionResult,
    before: AccountSnapshot,
    after: AccountSnapshot,
    now: Date = this.clock.now(),
  ): Promise<ReconcileOutcome> {
    const key = positionKey(result.coin, result.dex);
    const outcome: ReconcileOutcome = {
      opened: null,
      updated: null,
      closed: null,
      riskState: await this.loadRiskState(now),
      breakerTripped: false,
    };
    if (result.duplicate) return outcome;

    if (entryAccepted(result)) {
      outcome.riskState = await this.recordEntry(now);
    }

    const prev = before.positions.find((p) => positionKey(p.coin, p.dex) === key);
    const next = after.positions.find((p) => positionKey(p.coin, p.dex) === key);
    if (prev) this.lastPositions.set(key, prev);

    let record = await this.repos.trades.findOpen(result.coin, result.dex);
    if (prev && !record) {
      log.warn(`Position ${key} had no open trade record, adopting it from the snapshot`);
      record = await this.openTrade(prev, now, null);
    }

    const fillPrice = result.entryFill?.avgPrice;

    if (record && (!next || next.side !== record.side)) {
      const exitPrice = fillPrice ?? (await this.exitPriceFor(key, record));
      const reason = result.closeReason ?? inferCloseReason(record, exitPrice, prev?.liquidationPrice ?? null);
      const closed = await this.closeTrade(record, exitPrice, reason, now);
      outcome.closed = closed.trade;
      outcome.riskState = closed.state;
      outcome.breakerTripped = closed.tripped;
      record = null;
    }

    if (next && !record) {
      outcome.opened = await this.openTrade(next, now, result);
    } else if (next && record) {
      const newSize = Math.abs(next.size);
      if (newSize > record.size + SIZE_EPSILON) {
        outcome.updated = await this.growTrade(record, next);
      } else if (newSize < record.size - SIZE_EPSILON) {
        const reduced = await this.reduceTrade(record, newSize, fillPrice ?? next.markPrice, now);
        outcome.updated = reduced.trade;
        outcome.riskState = reduced.state;
      }
    }

    if (next) this.lastPositions.set(key, next);
    else this.lastPositions.delete(key);
    return outcome;
  }

  // --------------- Periodic Sync ---------------

  /**
   * Bring records in line with a fresh snapshot.
   *
   * @param hints - Known exit causes keyed by market (e.g. simulated trigger fills)
   * @param isBusy - Markets an execution is working on; skipped this round
   */
  async syncWithSnapshot(
    snapshot: AccountSnapshot,
    now: Date = this.clock.now(),
    hints: Map<string, ExitHint> = new Map(),
    isBusy: (key: string) => boolean = () => false,
  ): Promise<SyncReport> {
    const report: SyncReport = {
      adopted: [],
      resized: [],
      closed: [],
      riskState: await this.loadRiskState(now),
      breakerTripped: false,
    };

    const live = new Map(snapshot.positions.map((p) => [positionKey(p.coin, p.dex), p]));
    const open = await this.repos.trades.listOpen();
    const recorded = new Set<string>();

    for (const trade of open) {
      const key = positionKey(trade.coin, trade.dex);
      if (isBusy(key)) {
        log.debug(`Sync: ${key} has an execution in progress, skipping`);
        continue;
      }
      if (recorded.has(key)) {
        // Two open records for one market: keep the newest (listed first)
        log.warn(`Duplicate open record ${trade.id} for ${key}, closing it`);
        await this.repos.trades.update({ ...trade, status: 'closed', closedAt: now, notes: 'Duplicate open record' });
        continue;
      }
      recorded.add(key);

      const pos = live.get(key);
      const hint = hints.get(key);

      if (!pos || pos.side !== trade.side) {
        const exitPrice = await this.exitPriceFor(key, trade, hint);
        const last = this.lastPositions.get(key);
        const reason = hint?.reason ?? inferCloseReason(trade, exitPrice, last?.liquidationPrice ?? null);
        log.warn(`Position ${key} no longer on the exchange, closing record as ${reason}`);
        const closed = await this.closeTrade(trade, exitPrice, reason, now);
        report.closed.push(closed.trade);
        report.riskState = closed.state;
        if (closed.tripped) report.breakerTripped = true;
        if (pos) report.adopted.push(await this.openTrade(pos, now, null));
        continue;
      }

      const size = Math.abs(pos.size);
      if (size < trade.size - SIZE_EPSILON) {
        const reduced = await this.reduceTrade(trade, size, hint?.price ?? pos.markPrice, now);
        report.resized.push(reduced.trade);
        report.riskState = reduced.state;
      } else if (size > trade.size + SIZE_EPSILON) {
        report.resized.push(await this.growTrade(trade, pos));
      }
    }

    for (const [key, pos] of live) {
      if (recorded.has(key) || isBusy(key)) continue;
      log.warn(`Position ${key} has no trade record, adopting it`);
      report.adopted.push(await this.openTrade(pos, now, null));
    }

    this.lastPositions.clear();
    for (const [key, pos] of live) this.lastPositions.set(key, pos);

    if (report.adopted.length > 0 || report.closed.length > 0) {
      await this.audit('info', `Sync: ${report.adopted.length} adopted, ${report.closed.length} closed, ${report.resized.length} resized`);
    }
    return report;
  }

  private async audit(level: 'info' | 'warning' | 'error', message: string, details?: Record<string, unknown>): Promise<void> {
    try {
      await this.repos.activity.record({ level, category: 'reconcile', message, details, at: this.clock.now() });
    } catch (err) {
      log.warn(`Activity log write failed: ${errorMessage(err)}`);
    }
  }
}
