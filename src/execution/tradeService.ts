// ============================================================
// Trade Service
// ============================================================
// Orchestrates: Risk Check → Plan → Execute → Reconcile → Alert.
// One entry point per operation exposed to the API, Telegram
// and the webhook:
//   submitIntent / submitBatch
//   closePosition / closeAll
//   cancelTwap / cancelOrder / modifyOrder
//
// Intents for the same coin run one at a time (per-coin lock
// around snapshot → evaluate → execute → reconcile). Intents
// for different coins may interleave.
// ============================================================

import { v4 as uuidv4 } from 'uuid';
import type {
  AccountSnapshot,
  CloseReason,
  ExecutionResult,
  IntentSource,
  MarketInfo,
  OrderAck,
  RejectReason,
  TradeIntent,
  TradeOutcome,
  TradeRecord,
} from '../types/index.js';
import type { ActivityLog, TradeRepository } from '../database/repositories.js';
import type { SettingsService } from '../config/settingsService.js';
import { errorMessage, toGatewayError } from '../errors.js';
import { createModuleLogger } from '../monitoring/logger.js';
import { systemClock, utcDay, type Clock } from './clock.js';
import type { ExchangeGateway } from './exchangeGateway.js';
import { positionKey } from './exchangeGateway.js';
import type { BatchItemResult, ExecutionCoordinator } from './executionCoordinator.js';
import { plan, planClose } from './orderPlanner.js';
import { evaluate } from './riskEngine.js';
import type { StateReconciler } from './stateReconciler.js';

const log = createModuleLogger('TradeService');

// --------------- Interfaces ---------------

export type Notify = (message: string) => Promise<void>;

export interface TradeServiceDeps {
  gateway: ExchangeGateway;
  coordinator: ExecutionCoordinator;
  reconciler: StateReconciler;
  settings: SettingsService;
  trades: TradeRepository;
  activity: ActivityLog;
  notify?: Notify;
  clock?: Clock;
}

export interface CloseAllItem {
  coin: string;
  dex: string;
  success: boolean;
  error?: string;
  pnl?: number;
}

export interface CloseAllResult {
  success: boolean;
  closed: number;
  failed: number;
  totalPnl: number;
  results: CloseAllItem[];
}

export interface DailyStats {
  tradingDay: string;
  trades: number;
  wins: number;
  losses: number;
  winRate: number;
  realizedPnl: number;
  dailyTradeCount: number;
  consecutiveLosses: number;
  tradingPausedUntil: Date | null;
}

/** User-facing text for a gateway failure. */
export function friendlyError(message: string): string {
  const lower = message.toLowerCase();
  if (lower.includes('insufficient')) return 'Insufficient balance to execute this trade';
  if (lower.includes('rate limit') || lower.includes('429')) return 'Too many requests. Please wait a moment and try again.';
  if (lower.includes('timeout') || lower.includes('timed out')) return 'Request timed out. Please try again.';
  return message;
}

function fail(reason: RejectReason, error: string, execution?: ExecutionResult): TradeOutcome {
  return { success: false, reason, error, execution };
}

function signed(n: number): string {
  return `${n >= 0 ? '+' : ''}${n.toFixed(2)}`;
}

// --------------- Service ---------------

export class TradeService {
  private readonly gateway: ExchangeGateway;
  private readonly coordinator: ExecutionCoordinator;
  private readonly reconciler: StateReconciler;
  private readonly settings: SettingsService;
  private readonly trades: TradeRepository;
  private readonly activity: ActivityLog;
  private readonly notify: Notify;
  private readonly clock: Clock;
  /** Tail of the queue of work per coin */
  private readonly coinLocks = new Map<string, Promise<void>>();
  /** Bumped whenever work is queued on a coin */
  private lockSeq = 0;
  private readonly lastQueued = new Map<string, number>();

  constructor(deps: TradeServiceDeps) {
    this.gateway = deps.gateway;
    this.coordinator = deps.coordinator;
    this.reconciler = deps.reconciler;
    this.settings = deps.settings;
    this.trades = deps.trades;
    this.activity = deps.activity;
    this.notify = deps.notify ?? (async () => {});
    this.clock = deps.clock ?? systemClock;
  }

  // --------------- Locking ---------------

  private async withCoinLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    this.lockSeq += 1;
    this.lastQueued.set(key, this.lockSeq);
    const previous = this.coinLocks.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.coinLocks.set(key, tail);
    try {
      return await run;
    } finally {
      if (this.coinLocks.get(key) === tail) this.coinLocks.delete(key);
    }
  }

  /**
   * Predicate for the periodic sync: true for a market that has work
   * queued or running now, or had any since this call. Such a market
   * is left to that work's own reconcile.
   */
  busyMarkets(): (key: string) => boolean {
    const mark = this.lockSeq;
    return (key) => this.coinLocks.has(key) || (this.lastQueued.get(key) ?? 0) > mark;
  }

  private async alert(message: string): Promise<void> {
    try {
      await this.notify(message);
    } catch (err) {
      log.warn(`Alert failed: ${errorMessage(err)}`);
    }
  }

  private async audit(
    level: 'info' | 'warning' | 'error',
    category: 'risk' | 'trade',
    message: string,
    details?: Record<string, unknown>,
  ): Promise<void> {
    try {
      await this.activity.record({ level, category, message, details, at: this.clock.now() });
    } catch (err) {
      log.warn(`Activity log write failed: ${errorMessage(err)}`);
    }
  }

  // --------------- Open ---------------

  /**
   * Run an intent through the full risk → plan → execute → reconcile pipeline.
   * Close intents are routed to closePosition with reason 'signal'.
   */
  async submitIntent(intent: TradeIntent): Promise<TradeOutcome> {
    if (intent.closePosition) {
      const reason: CloseReason = intent.source === 'webhook' ? 'signal' : 'manual';
      return this.closePosition(intent.coin, intent.dex, reason, intent.idempotencyKey, intent.source);
    }
    if (this.coordinator.hasRecentKey(intent.idempotencyKey)) {
      log.warn(`Duplicate intent ${intent.idempotencyKey} for ${intent.coin} ignored`);
      return fail('DuplicateIntent', 'Duplicate intent: already processed');
    }

    return this.withCoinLock(positionKey(intent.coin, intent.dex), () => this.runIntent(intent));
  }

  private async runIntent(intent: TradeIntent): Promise<TradeOutcome> {
    // A same-key duplicate may have been queued behind the lock
    if (this.coordinator.hasRecentKey(intent.idempotencyKey)) {
      return fail('DuplicateIntent', 'Duplicate intent: already processed');
    }
    const now = this.clock.now();
    const label = `${intent.side.toUpperCase()} ${intent.coin}`;

    let before: AccountSnapshot;
    let market: MarketInfo;
    try {
      [before, market] = await Promise.all([
        this.gateway.getAccountState(),
        this.gateway.getMarket(intent.coin, intent.dex),
      ]);
    } catch (err) {
      const message = friendlyError(toGatewayError(err).message);
      log.error(`${label}: could not load account/market state: ${message}`);
      return fail('ExecutionFailed', message);
    }

    const [riskConfig, coinConfig, riskState] = await Promise.all([
      this.settings.getRiskConfig(),
      this.settings.getCoinConfig(intent.coin, intent.dex),
      this.reconciler.loadRiskState(now),
    ]);

    const decision = evaluate(intent, riskConfig.limits, riskState, before, {
      now,
      botEnabled: riskConfig.botEnabled,
      coinConfig,
      market,
    });
    if (!decision.accepted) {
      log.info(`${label} blocked: ${decision.reason} (${decision.message})`);
      await this.audit('warning', 'risk', `Trade blocked: ${decision.message}`, {
        coin: intent.coin,
        reason: decision.reason,
        source: intent.source,
      });
      await this.alert(`⛔ <b>Trade blocked</b>: ${label}\n${decision.message}`);
      return fail(decision.reason, decision.message);
    }

    const planned = plan(intent, market);
    if (!planned.ok) return fail('InvalidPlan', planned.message);

    const result = await this.coordinator.execute(planned.plan, {
      source: intent.source,
      collateralUsd: intent.collateralUsd,
      indicator: intent.indicator,
    });
    if (result.duplicate) return fail('DuplicateIntent', 'Duplicate intent: already processed', result);

    const trade = await this.reconcileAfter(result, before);
    const entries = result.legs.filter((o) => o.leg.role === 'entry');
    const accepted = entries.filter((o) => o.status === 'submitted');

    if (accepted.length === 0) {
      const firstError = entries.find((o) => o.error)?.error?.message ?? 'No entry order was accepted';
      const message = friendlyError(firstError);
      await this.audit('error', 'trade', `${label} failed: ${message}`, { intentKey: result.intentKey });
      await this.alert(`❌ <b>Order failed</b>: ${label}\n${message}`);
      return fail('ExecutionFailed', message, result);
    }

    const failedProtective = result.failedLegs.filter((o) => o.leg.role !== 'entry');
    const skippedProtective = result.legs.filter((o) => o.leg.role !== 'entry' && o.status === 'skipped');
    await this.audit('info', 'trade', `${label} executed (${result.style})`, {
      intentKey: result.intentKey,
      submitted: result.submittedLegs.length,
      failed: result.failedLegs.length,
    });
    await this.alert(
      `📈 <b>Order executed</b>: ${label}\n` +
        `Style: ${result.style} | Leverage: ${intent.leverage}x | Collateral: $${intent.collateralUsd.toFixed(2)}\n` +
        (result.entryFill ? `Fill: ${result.entryFill.size} @ ${result.entryFill.avgPrice.toFixed(4)}\n` : 'Entry resting\n') +
        (failedProtective.length > 0 ? `⚠️ ${failedProtective.length} protective order(s) failed\n` : '') +
        (skippedProtective.length > 0 ? `⚠️ ${skippedProtective.length} protective order(s) not placed` : ''),
    );

    return { success: true, execution: result, trade: trade ?? undefined };
  }

  /** Reconcile against a fresh snapshot; reconciliation problems never fail the request. */
  private async reconcileAfter(result: ExecutionResult, before: AccountSnapshot): Promise<TradeRecord | null> {
    try {
      const after = await this.gateway.getAccountState();
      const outcome = await this.reconciler.reconcile(result, before, after, this.clock.now());
      if (outcome.breakerTripped) {
        await this.alert(
          `🚨 <b>Circuit breaker</b>: trading paused until ${outcome.riskState.tradingPausedUntil?.toISOString() ?? '?'}`,
        );
      }
      if (outcome.closed) {
        const pnl = outcome.closed.realizedPnl ?? 0;
        await this.alert(
          `${pnl >= 0 ? '✅' : '❌'} <b>Trade closed (${outcome.closed.closeReason ?? 'manual'})</b>: ${outcome.closed.coin}\n` +
            `PnL: <b>${signed(pnl)} USD</b>`,
        );
      }
      return outcome.closed ?? outcome.opened ?? outcome.updated;
    } catch (err) {
      log.error(`Reconciliation after ${result.intentKey} failed: ${errorMessage(err)}`);
      return null;
    }
  }

  // --------------- Close ---------------

  /**
   * Flatten one position with a reduce-only market order.
   * Only the circuit breaker can block a close. A TWAP or scale
   * sequence still adding to the market is cancelled first, so the
   * close waits at most for the slice in flight.
   */
  async closePosition(
    coin: string,
    dex: string,
    reason: CloseReason = 'manual',
    intentKey: string = `close-${uuidv4()}`,
    source: IntentSource = 'manual',
  ): Promise<TradeOutcome> {
    if (this.coordinator.hasRecentKey(intentKey)) {
      return fail('DuplicateIntent', 'Duplicate intent: already processed');
    }
    const stopped = this.coordinator.cancelMarket(coin, dex);
    if (stopped.length > 0) log.warn(`Close ${positionKey(coin, dex)}: cancelled running ${stopped.join(', ')}`);
    return this.withCoinLock(positionKey(coin, dex), () => this.runClose(coin, dex, reason, intentKey, source));
  }

  private async runClose(
    coin: string,
    dex: string,
    reason: CloseReason,
    intentKey: string,
    source: IntentSource,
  ): Promise<TradeOutcome> {
    const now = this.clock.now();
    const key = positionKey(coin, dex);

    let before: AccountSnapshot;
    try {
      before = await this.gateway.getAccountState();
    } catch (err) {
      return fail('ExecutionFailed', friendlyError(toGatewayError(err).message));
    }

    const [riskConfig, riskState] = await Promise.all([
      this.settings.getRiskConfig(),
      this.reconciler.loadRiskState(now),
    ]);
    const closeIntent: TradeIntent = {
      coin,
      dex,
      side: 'long',
      leverage: 1,
      collateralUsd: 0,
      takeProfitLegs: [],
      orderStyle: 'market',
      styleParams: { style: 'market', slippage: 0 },
      source,
      idempotencyKey: intentKey,
      closePosition: true,
    };
    const decision = evaluate(closeIntent, riskConfig.limits, riskState, before, {
      now,
      botEnabled: riskConfig.botEnabled,
    });
    if (!decision.accepted) return fail(decision.reason, decision.message);

    const position = before.positions.find((p) => positionKey(p.coin, p.dex) === key);
    if (!position) return fail('NoPosition', `No open position for ${key}`);

    let market: MarketInfo;
    try {
      market = await this.gateway.getMarket(coin, dex);
    } catch (err) {
      return fail('ExecutionFailed', friendlyError(toGatewayError(err).message));
    }

    const result = await this.coordinator.execute(planClose(position, market, intentKey), {
      closeReason: reason,
      source,
    });
    if (result.duplicate) return fail('DuplicateIntent', 'Duplicate intent: already processed', result);

    if (result.submittedLegs.length === 0) {
      const message = friendlyError(result.failedLegs[0]?.error?.message ?? 'Close order was not accepted');
      await this.audit('error', 'trade', `Close ${key} failed: ${message}`);
      return fail('ExecutionFailed', message, result);
    }

    const trade = await this.reconcileAfter(result, before);
    return { success: true, execution: result, trade: trade ?? undefined };
  }

  /** Close every open position, one at a time, reporting each. */
  async closeAll(reason: CloseReason = 'manual'): Promise<CloseAllResult> {
    let snapshot: AccountSnapshot;
    try {
      snapshot = await this.gateway.getAccountState();
    } catch (err) {
      const message = friendlyError(toGatewayError(err).message);
      return { success: false, closed: 0, failed: 0, totalPnl: 0, results: [{ coin: '*', dex: '', success: false, error: message }] };
    }

    const batch = await this.coordinator.runBatch(snapshot.positions, (p) => this.closePosition(p.coin, p.dex, reason));
    const results: CloseAllItem[] = batch.map((item) => {
      const { coin, dex } = item.item;
      if (!item.success) return { coin, dex, success: false, error: item.error };
      const outcome = item.value;
      return outcome.success
        ? { coin, dex, success: true, pnl: outcome.trade?.realizedPnl }
        : { coin, dex, success: false, error: outcome.error };
    });

    const closed = results.filter((r) => r.success).length;
    const totalPnl = results.reduce((sum, r) => sum + (r.pnl ?? 0), 0);
    log.info(`Close all: ${closed}/${results.length} closed | PnL=${signed(totalPnl)} USD`);
    if (results.length > 0) {
      await this.alert(`🧹 <b>Close all</b>: ${closed}/${results.length} closed | PnL: ${signed(totalPnl)} USD`);
    }
    return { success: closed === results.length, closed, failed: results.length - closed, totalPnl, results };
  }

  // --------------- Batch ---------------

  /** Submit independent intents (e.g. one per coin of a category) with spacing between them. */
  async submitBatch(intents: TradeIntent[]): Promise<BatchItemResult<TradeIntent, TradeOutcome>[]> {
    return this.coordinator.runBatch(intents, (intent) => this.submitIntent(intent));
  }

  // --------------- Order Management ---------------

  cancelTwap(intentKey: string): boolean {
    return this.coordinator.cancel(intentKey);
  }

  async cancelOrder(coin: string, dex: string, orderId: string): Promise<{ success: boolean; error?: string }> {
    try {
      await this.coordinator.cancelOrder(coin, dex, orderId);
      return { success: true };
    } catch (err) {
      return { success: false, error: friendlyError(toGatewayError(err).message) };
    }
  }

  async modifyOrder(
    coin: string,
    dex: string,
    orderId: string,
    newPrice: number,
    newSize?: number,
  ): Promise<{ success: boolean; ack?: OrderAck; error?: string }> {
    try {
      const ack = await this.coordinator.modifyOrder(coin, dex, orderId, newPrice, newSize);
      return { success: true, ack };
    } catch (err) {
      return { success: false, error: friendlyError(toGatewayError(err).message) };
    }
  }

  // --------------- Reporting ---------------

  async getDailyStats(now: Date = this.clock.now()): Promise<DailyStats> {
    const day = utcDay(now);
    const since = new Date(`${day}T00:00:00.000Z`);
    const [closed, riskState] = await Promise.all([
      this.trades.list({ closedSince: since }),
      this.reconciler.loadRiskState(now),
    ]);
    const finished = closed.filter((t) => t.status !== 'open');
    const wins = finished.filter((t) => (t.realizedPnl ?? 0) > 0).length;
    const losses = finished.filter((t) => (t.realizedPnl ?? 0) < 0).length;
    return {
      tradingDay: day,
      trades: finished.length,
      wins,
      losses,
      winRate: finished.length > 0 ? (wins / finished.length) * 100 : 0,
      realizedPnl: riskState.dailyRealizedPnl,
      dailyTradeCount: riskState.dailyTradeCount,
      consecutiveLosses: riskState.consecutiveLosses,
      tradingPausedUntil: riskState.tradingPausedUntil,
    };
  }
}
