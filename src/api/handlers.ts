// ============================================================
// API Handlers
// ============================================================
// Framework-free request handlers: each takes the parsed body
// or query and resolves to { status, body }. server.ts binds
// them to express routes.
// ============================================================

import { createHash, timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import type { ActivityEntry, CoinCategory, RejectReason, TradeOutcome, TradeRecord } from '../types/index.js';
import type { ActivityLog, TradeRepository } from '../database/repositories.js';
import type { SettingsService } from '../config/settingsService.js';
import { describeIssues, errorMessage } from '../errors.js';
import { systemClock, type Clock } from '../execution/clock.js';
import type { StateReconciler } from '../execution/stateReconciler.js';
import type { TradeService } from '../execution/tradeService.js';
import { createModuleLogger } from '../monitoring/logger.js';
import { tradesToCsv } from '../monitoring/tradeLogger.js';
import {
  buildBatchIntents,
  buildLimitIntent,
  buildMarketIntent,
  buildScaleIntent,
  buildTwapIntent,
  buildWebhookIntent,
  resolveMarket,
} from './intents.js';
import {
  batchTradeSchema,
  botToggleSchema,
  cancelOrderSchema,
  closeSchema,
  limitOrderSchema,
  modifyOrderSchema,
  pauseSchema,
  scaleOrderSchema,
  tradeSchema,
  tradesQuerySchema,
  twapCancelSchema,
  twapOrderSchema,
  webhookSchema,
} from './schemas.js';

const log = createModuleLogger('API');

// --------------- Interfaces ---------------

export interface ApiResponse {
  status: number;
  body: unknown;
  /** Set for non-JSON bodies (CSV export) */
  contentType?: string;
  filename?: string;
}

export interface ApiDeps {
  service: TradeService;
  settings: SettingsService;
  reconciler: StateReconciler;
  trades: TradeRepository;
  activity: ActivityLog;
  webhookSecret: string;
  mode: { paperTrading: boolean; testnet: boolean };
  clock?: Clock;
}

const secretOnly = z.object({ secret: z.string() }).passthrough();
const categoryQuery = z.object({ category: z.enum(['L1s', 'APPS', 'MEMES', 'HIP-3']).optional() });

// --------------- Response Helpers ---------------

function ok(body: Record<string, unknown>, status = 200): ApiResponse {
  return { status, body: { success: true, ...body } };
}

function failure(status: number, error: string, reason?: RejectReason): ApiResponse {
  return { status, body: { success: false, error, ...(reason ? { reason } : {}) } };
}

function invalid(error: z.ZodError): ApiResponse {
  return failure(400, describeIssues(error), 'InvalidRequest');
}

/** HTTP status for a failed outcome. */
export function statusForReason(reason: RejectReason | undefined): number {
  switch (reason) {
    case 'DuplicateIntent':
      return 409;
    case 'NoPosition':
      return 404;
    case 'ExecutionFailed':
    case undefined:
      return 500;
    default:
      return 400;
  }
}

function tradeSummary(trade: TradeRecord): Record<string, unknown> {
  return {
    id: trade.id,
    coin: trade.coin,
    dex: trade.dex,
    side: trade.side,
    size: trade.size,
    entryPrice: trade.entryPrice,
    exitPrice: trade.exitPrice,
    status: trade.status,
    closeReason: trade.closeReason,
    realizedPnl: trade.realizedPnl,
    stopLossPrice: trade.stopLossPrice,
    takeProfitPrices: trade.takeProfitPrices,
  };
}

/** JSON body for a TradeOutcome. */
export function outcomeResponse(outcome: TradeOutcome): ApiResponse {
  const execution = outcome.execution;
  const details = execution
    ? {
        intentKey: execution.intentKey,
        coin: execution.coin,
        side: execution.side,
        style: execution.style,
        fill: execution.entryFill,
        submittedLegs: execution.submittedLegs.length,
        failedLegs: execution.failedLegs.map((o) => ({ role: o.leg.role, error: o.error?.message ?? o.skipReason })),
        skippedLegs: execution.legs
          .filter((o) => o.status === 'skipped')
          .map((o) => ({ role: o.leg.role, reason: o.skipReason ?? 'skipped' })),
      }
    : {};
  const trade = outcome.trade ? { trade: tradeSummary(outcome.trade) } : {};

  if (outcome.success) return ok({ ...details, ...trade });
  return {
    status: statusForReason(outcome.reason),
    body: { success: false, reason: outcome.reason, error: outcome.error, ...details },
  };
}

function sameSecret(given: string, expected: string): boolean {
  if (!expected) return false;
  const a = createHash('sha256').update(given).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}

// --------------- Handlers ---------------

export class ApiHandlers {
  private readonly clock: Clock;

  constructor(private readonly deps: ApiDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  private async audit(entry: Omit<ActivityEntry, 'at'>): Promise<void> {
    try {
      await this.deps.activity.record({ ...entry, at: this.clock.now() });
    } catch (err) {
      log.warn(`Activity log write failed: ${errorMessage(err)}`);
    }
  }

  // --------------- Webhook ---------------

  async webhook(body: unknown): Promise<ApiResponse> {
    const withSecret = secretOnly.safeParse(body);
    if (!withSecret.success || !sameSecret(withSecret.data.secret, this.deps.webhookSecret)) {
      log.warn('Invalid webhook secret!');
      await this.audit({ level: 'warning', category: 'webhook', message: 'Invalid webhook secret received' });
      return failure(401, 'Invalid secret');
    }

    const parsed = webhookSchema.safeParse(body);
    if (!parsed.success) {
      await this.audit({ level: 'warning', category: 'webhook', message: `Rejected webhook: ${describeIssues(parsed.error)}` });
      return invalid(parsed.error);
    }

    const { coin, dex } = resolveMarket(parsed.data.coin, parsed.data.dex);
    const config = await this.deps.settings.getCoinConfig(coin, dex);
    const intent = buildWebhookIntent(parsed.data, config, this.clock.now());
    log.info(
      `Webhook: ${intent.closePosition ? 'CLOSE' : intent.side.toUpperCase()} ${coin}` +
        `${intent.indicator ? ` [${intent.indicator}]` : ''} key=${intent.idempotencyKey}`,
    );

    const outcome = await this.deps.service.submitIntent(intent);
    if (!outcome.success && outcome.reason !== 'DuplicateIntent') {
      await this.audit({
        level: 'warning',
        category: 'webhook',
        message: `Webhook ${coin} not executed: ${outcome.error ?? outcome.reason ?? 'unknown error'}`,
        details: { reason: outcome.reason, indicator: intent.indicator },
      });
    }
    return outcomeResponse(outcome);
  }

  // --------------- Manual Orders ---------------

  async trade(body: unknown): Promise<ApiResponse> {
    const parsed = tradeSchema.safeParse(body);
    if (!parsed.success) return invalid(parsed.error);
    const { coin, dex } = resolveMarket(parsed.data.coin, parsed.data.dex);
    const config = await this.deps.settings.getCoinConfig(coin, dex);
    return outcomeResponse(await this.deps.service.submitIntent(buildMarketIntent(parsed.data, config)));
  }

  async limitOrder(body: unknown): Promise<ApiResponse> {
    const parsed = limitOrderSchema.safeParse(body);
    if (!parsed.success) return invalid(parsed.error);
    const { coin, dex } = resolveMarket(parsed.data.coin, parsed.data.dex);
    const config = await this.deps.settings.getCoinConfig(coin, dex);
    return outcomeResponse(await this.deps.service.submitIntent(buildLimitIntent(parsed.data, config)));
  }

  /**
   * Starts the TWAP and answers right away with its id; the slices
   * run in the background and report through logs and alerts.
   */
  async twapOrder(body: unknown): Promise<ApiResponse> {
    const parsed = twapOrderSchema.safeParse(body);
    if (!parsed.success) return invalid(parsed.error);
    const { coin, dex } = resolveMarket(parsed.data.coin, parsed.data.dex);
    const config = await this.deps.settings.getCoinConfig(coin, dex);
    const intent = buildTwapIntent(parsed.data, config);

    void this.deps.service.submitIntent(intent).then(
      (outcome) => {
        if (outcome.success) log.info(`TWAP ${intent.idempotencyKey} finished`);
        else log.warn(`TWAP ${intent.idempotencyKey} ended: ${outcome.reason} (${outcome.error ?? ''})`);
      },
      (err: unknown) => log.error(`TWAP ${intent.idempotencyKey} crashed: ${errorMessage(err)}`),
    );

    return ok({ twap_id: intent.idempotencyKey, coin, durationMinutes: parsed.data.hours * 60 + parsed.data.minutes }, 202);
  }

  twapCancel(body: unknown): ApiResponse {
    const parsed = twapCancelSchema.safeParse(body);
    if (!parsed.success) return invalid(parsed.error);
    if (!this.deps.service.cancelTwap(parsed.data.twap_id)) {
      return failure(404, `No running TWAP with id ${parsed.data.twap_id}`);
    }
    return ok({ twap_id: parsed.data.twap_id, cancelled: true });
  }

  async scaleOrder(body: unknown): Promise<ApiResponse> {
    const parsed = scaleOrderSchema.safeParse(body);
    if (!parsed.success) return invalid(parsed.error);
    const { coin, dex } = resolveMarket(parsed.data.coin, parsed.data.dex);
    const config = await this.deps.settings.getCoinConfig(coin, dex);
    return outcomeResponse(await this.deps.service.submitIntent(buildScaleIntent(parsed.data, config)));
  }

  async batchTrade(body: unknown): Promise<ApiResponse> {
    const parsed = batchTradeSchema.safeParse(body);
    if (!parsed.success) return invalid(parsed.error);

    const coins = await this.deps.settings.listCoins(parsed.data.category);
    const intents = buildBatchIntents(parsed.data, coins);
    if (intents.length === 0) return failure(400, `No enabled coins in category ${parsed.data.category}`);

    const batch = await this.deps.service.submitBatch(intents);
    const results = batch.map((item) => {
      const { coin, dex } = item.item;
      if (!item.success) return { coin, dex, success: false, error: item.error };
      const outcome = item.value;
      return {
        coin,
        dex,
        success: outcome.success,
        reason: outcome.reason,
        error: outcome.error,
        fill: outcome.execution?.entryFill ?? null,
      };
    });
    const executed = results.filter((r) => r.success).length;
    log.info(`Batch ${parsed.data.category}: ${executed}/${results.length} executed`);
    return ok({ category: parsed.data.category, executed, failed: results.length - executed, results });
  }

  // --------------- Positions & Orders ---------------

  async close(body: unknown): Promise<ApiResponse> {
    const parsed = closeSchema.safeParse(body);
    if (!parsed.success) return invalid(parsed.error);
    const { coin, dex } = resolveMarket(parsed.data.coin, parsed.data.dex);
    return outcomeResponse(await this.deps.service.closePosition(coin, dex, 'manual'));
  }

  async closeAll(): Promise<ApiResponse> {
    const result = await this.deps.service.closeAll('manual');
    await this.audit({
      level: result.failed > 0 ? 'warning' : 'info',
      category: 'trade',
      message: `Closed all positions (${result.closed}/${result.closed + result.failed}) with P&L: $${result.totalPnl.toFixed(2)}`,
    });
    return { status: 200, body: result };
  }

  async cancelOrder(body: unknown): Promise<ApiResponse> {
    const parsed = cancelOrderSchema.safeParse(body);
    if (!parsed.success) return invalid(parsed.error);
    const { coin, dex } = resolveMarket(parsed.data.coin, parsed.data.dex);
    const result = await this.deps.service.cancelOrder(coin, dex, parsed.data.oid);
    return result.success ? ok({ oid: parsed.data.oid }) : failure(500, result.error ?? 'Cancel failed', 'ExecutionFailed');
  }

  async modifyOrder(body: unknown): Promise<ApiResponse> {
    const parsed = modifyOrderSchema.safeParse(body);
    if (!parsed.success) return invalid(parsed.error);
    const { coin, dex } = resolveMarket(parsed.data.coin, parsed.data.dex);
    const result = await this.deps.service.modifyOrder(coin, dex, parsed.data.oid, parsed.data.new_price, parsed.data.new_size);
    return result.success ? ok({ ack: result.ack }) : failure(500, result.error ?? 'Modify failed', 'ExecutionFailed');
  }

  // --------------- Settings & Risk ---------------

  async botToggle(body: unknown): Promise<ApiResponse> {
    const parsed = botToggleSchema.safeParse(body ?? {});
    if (!parsed.success) return invalid(parsed.error);
    const config = await this.deps.settings.setBotEnabled(parsed.data.enabled);
    await this.audit({ level: 'info', category: 'settings', message: `Bot ${config.botEnabled ? 'enabled' : 'disabled'}` });
    return ok({ enabled: config.botEnabled });
  }

  async getRiskSettings(): Promise<ApiResponse> {
    const config = await this.deps.settings.getRiskConfig();
    return ok({ limits: config.limits, botEnabled: config.botEnabled });
  }

  async updateRiskSettings(body: unknown): Promise<ApiResponse> {
    const result = await this.deps.settings.updateRiskLimits(body);
    if (!result.success) return failure(400, result.error, 'InvalidRequest');
    await this.audit({ level: 'info', category: 'settings', message: 'Risk limits updated', details: { ...result.value } });
    return ok({ limits: result.value });
  }

  async riskState(): Promise<ApiResponse> {
    const now = this.clock.now();
    const [state, limits] = await Promise.all([this.deps.reconciler.loadRiskState(now), this.deps.settings.getRiskLimits()]);
    const paused = state.tradingPausedUntil !== null && state.tradingPausedUntil.getTime() > now.getTime();
    return ok({ state, limits, paused });
  }

  async riskResume(): Promise<ApiResponse> {
    const state = await this.deps.reconciler.resume();
    await this.audit({ level: 'info', category: 'risk', message: 'Trading resumed manually' });
    return ok({ state });
  }

  async riskPause(body: unknown): Promise<ApiResponse> {
    const parsed = pauseSchema.safeParse(body);
    if (!parsed.success) return invalid(parsed.error);
    const state = await this.deps.reconciler.pause(parsed.data.minutes, this.clock.now());
    await this.audit({ level: 'warning', category: 'risk', message: `Trading paused for ${parsed.data.minutes} minute(s)` });
    return ok({ state });
  }

  async listCoins(query: unknown): Promise<ApiResponse> {
    const parsed = categoryQuery.safeParse(query);
    if (!parsed.success) return invalid(parsed.error);
    const category: CoinCategory | undefined = parsed.data.category;
    return ok({ coins: await this.deps.settings.listCoins(category) });
  }

  async upsertCoin(body: unknown): Promise<ApiResponse> {
    const result = await this.deps.settings.upsertCoinConfig(body);
    if (!result.success) return failure(400, result.error, 'InvalidRequest');
    return ok({ coin: result.value });
  }

  // --------------- History & Reporting ---------------

  async listTrades(query: unknown): Promise<ApiResponse> {
    const parsed = tradesQuerySchema.safeParse(query);
    if (!parsed.success) return invalid(parsed.error);
    const trades = await this.deps.trades.list(parsed.data);

    const closed = trades.filter((t) => t.status !== 'open');
    const pnls = closed.map((t) => t.realizedPnl ?? 0);
    const wins = pnls.filter((p) => p > 0);
    const losses = pnls.filter((p) => p < 0);
    const stats = {
      totalTrades: closed.length,
      winRate: closed.length > 0 ? (wins.length / closed.length) * 100 : 0,
      totalPnl: pnls.reduce((a, b) => a + b, 0),
      avgWin: wins.length > 0 ? wins.reduce((a, b) => a + b, 0) / wins.length : 0,
      avgLoss: losses.length > 0 ? losses.reduce((a, b) => a + b, 0) / losses.length : 0,
      bestTrade: pnls.length > 0 ? Math.max(...pnls) : 0,
    };
    return ok({ trades, stats });
  }

  async exportTrades(): Promise<ApiResponse> {
    const trades = await this.deps.trades.list({ limit: 100_000 });
    return { status: 200, body: tradesToCsv(trades), contentType: 'text/csv', filename: 'trades.csv' };
  }

  async dailyStats(): Promise<ApiResponse> {
    return ok({ stats: await this.deps.service.getDailyStats(this.clock.now()) });
  }

  async recentActivity(): Promise<ApiResponse> {
    return ok({ activity: await this.deps.activity.recent(100) });
  }

  health(): ApiResponse {
    return {
      status: 200,
      body: {
        status: 'healthy',
        mode: this.deps.mode.paperTrading ? 'paper' : 'live',
        network: this.deps.mode.testnet ? 'testnet' : 'mainnet',
        time: this.clock.now().toISOString(),
      },
    };
  }
}
