// ============================================================
// Intent Builders
// ============================================================
// Turn validated request bodies into TradeIntents.
// Missing leverage, collateral, stop-loss and take-profit
// values are filled from the coin's configuration.
// ============================================================

import { createHash } from 'node:crypto';
import { v4 as uuidv4 } from 'uuid';
import type { CoinConfig, IntentSource, Side, StyleParams, TakeProfitTarget, TradeIntent } from '../types/index.js';
import { EXECUTION_CONFIG } from '../config/execution.js';
import { splitAssetName } from '../execution/exchangeGateway.js';
import type {
  BatchTradeBody,
  LimitOrderBody,
  ScaleOrderBody,
  TradeBody,
  TwapOrderBody,
  WebhookBody,
} from './schemas.js';

/** Identical alerts inside one bucket share an idempotency key. */
export const WEBHOOK_KEY_BUCKET_MS = 60_000;

// --------------- Helpers ---------------

/** Accepts either (coin, dex) or a single "dex:COIN" name. */
export function resolveMarket(coin: string, dex?: string): { coin: string; dex: string } {
  if (dex) return { coin, dex };
  return splitAssetName(coin);
}

function sideOf(action: 'buy' | 'sell'): Side {
  return action === 'buy' ? 'long' : 'short';
}

export interface TakeProfitInput {
  tp1Pct?: number;
  tp1SizePct?: number;
  tp2Pct?: number;
  tp2SizePct?: number;
  /** Target for whatever TP1/TP2 leave open */
  runnerPct?: number;
}

/**
 * Take-profit targets from TP1/TP2 (distance %, size % of the entry)
 * plus an optional runner closing the remainder.
 */
export function takeProfitTargets(input: TakeProfitInput): TakeProfitTarget[] {
  const targets: TakeProfitTarget[] = [];
  if (input.tp1Pct !== undefined && input.tp1SizePct !== undefined) {
    targets.push({ triggerPct: input.tp1Pct, closeFraction: input.tp1SizePct / 100 });
  }
  if (input.tp2Pct !== undefined && input.tp2SizePct !== undefined) {
    targets.push({ triggerPct: input.tp2Pct, closeFraction: input.tp2SizePct / 100 });
  }

  const used = targets.reduce((sum, t) => sum + t.closeFraction, 0);
  const remainder = Math.round((1 - used) * 1e6) / 1e6;
  if (input.runnerPct !== undefined && remainder > 0) {
    targets.push({ triggerPct: input.runnerPct, closeFraction: remainder });
  }
  return targets;
}

function coinTakeProfits(config: CoinConfig, runnerPct?: number): TakeProfitTarget[] {
  return takeProfitTargets({
    tp1Pct: config.tp1Pct,
    tp1SizePct: config.tp1SizePct,
    tp2Pct: config.tp2Pct,
    tp2SizePct: config.tp2SizePct,
    runnerPct,
  });
}

interface EntryFields {
  coin: string;
  dex: string;
  side: Side;
  leverage: number;
  collateralUsd: number;
  styleParams: StyleParams;
  source: IntentSource;
  idempotencyKey: string;
  stopLossPct?: number;
  takeProfitLegs?: TakeProfitTarget[];
  indicator?: string;
}

function entryIntent(fields: EntryFields): TradeIntent {
  return {
    coin: fields.coin,
    dex: fields.dex,
    side: fields.side,
    leverage: fields.leverage,
    collateralUsd: fields.collateralUsd,
    stopLossPct: fields.stopLossPct,
    takeProfitLegs: fields.takeProfitLegs ?? [],
    orderStyle: fields.styleParams.style,
    styleParams: fields.styleParams,
    source: fields.source,
    idempotencyKey: fields.idempotencyKey,
    closePosition: false,
    indicator: fields.indicator,
  };
}

// --------------- Webhook ---------------

/**
 * Explicit key if the alert carries one; otherwise a hash of the
 * alert's fields and the current time bucket, so a re-delivered
 * alert maps to the same key.
 */
export function webhookIdempotencyKey(body: WebhookBody, now: Date): string {
  if (body.idempotency_key) return body.idempotency_key;
  const bucket = Math.floor(now.getTime() / WEBHOOK_KEY_BUCKET_MS);
  const canonical = JSON.stringify([
    body.action ?? null,
    body.coin,
    body.dex ?? '',
    body.leverage ?? null,
    body.collateral_usd ?? null,
    body.stop_loss_pct ?? null,
    body.take_profit_pct ?? null,
    body.indicator ?? null,
    body.close_position,
    bucket,
  ]);
  return `wh-${createHash('sha256').update(canonical).digest('hex').slice(0, 32)}`;
}

/** Webhook alerts always take their TP1/TP2 legs from the coin config. */
export function buildWebhookIntent(body: WebhookBody, config: CoinConfig, now: Date): TradeIntent {
  const { coin, dex } = resolveMarket(body.coin, body.dex);
  const key = webhookIdempotencyKey(body, now);

  if (body.close_position) {
    return {
      ...entryIntent({
        coin,
        dex,
        side: body.action === 'sell' ? 'short' : 'long',
        leverage: 1,
        collateralUsd: 0,
        styleParams: { style: 'market', slippage: EXECUTION_CONFIG.marketSlippage },
        source: 'webhook',
        idempotencyKey: key,
        indicator: body.indicator,
      }),
      closePosition: true,
    };
  }

  return entryIntent({
    coin,
    dex,
    side: sideOf(body.action ?? 'buy'),
    leverage: body.leverage ?? config.defaultLeverage,
    collateralUsd: body.collateral_usd ?? config.defaultCollateralUsd,
    styleParams: { style: 'market', slippage: EXECUTION_CONFIG.marketSlippage },
    source: 'webhook',
    idempotencyKey: key,
    stopLossPct: body.stop_loss_pct ?? config.defaultStopLossPct,
    takeProfitLegs: coinTakeProfits(config, body.take_profit_pct),
    indicator: body.indicator,
  });
}

// --------------- Manual Orders ---------------

function manualKey(explicit?: string): string {
  return explicit ?? uuidv4();
}

/** Request values win over the coin's TP1/TP2 defaults, field by field. */
function manualTakeProfits(body: TradeBody, config: CoinConfig): TakeProfitTarget[] {
  return takeProfitTargets({
    tp1Pct: body.tp1_pct ?? config.tp1Pct,
    tp1SizePct: body.tp1_size_pct ?? config.tp1SizePct,
    tp2Pct: body.tp2_pct ?? config.tp2Pct,
    tp2SizePct: body.tp2_size_pct ?? config.tp2SizePct,
    runnerPct: body.take_profit_pct,
  });
}

export function buildMarketIntent(body: TradeBody, config: CoinConfig): TradeIntent {
  const { coin, dex } = resolveMarket(body.coin, body.dex);
  return entryIntent({
    coin,
    dex,
    side: sideOf(body.action),
    leverage: body.leverage ?? config.defaultLeverage,
    collateralUsd: body.collateral_usd ?? config.defaultCollateralUsd,
    styleParams: { style: 'market', slippage: body.slippage ?? EXECUTION_CONFIG.marketSlippage },
    source: 'manual',
    idempotencyKey: manualKey(body.idempotency_key),
    stopLossPct: body.stop_loss_pct ?? config.defaultStopLossPct,
    takeProfitLegs: manualTakeProfits(body, config),
  });
}

/**
 * Protective legs of a limit come only from the request: they are
 * placed once the entry fills, which for a resting order is never in
 * this call. Reduce-only limits carry none.
 */
export function buildLimitIntent(body: LimitOrderBody, config: CoinConfig): TradeIntent {
  const { coin, dex } = resolveMarket(body.coin, body.dex);
  return entryIntent({
    coin,
    dex,
    side: sideOf(body.action),
    leverage: body.leverage ?? config.defaultLeverage,
    collateralUsd: body.collateral_usd ?? config.defaultCollateralUsd,
    styleParams: { style: 'limit', limitPrice: body.limit_price, reduceOnly: body.reduce_only },
    source: 'manual',
    idempotencyKey: manualKey(body.idempotency_key),
    stopLossPct: body.reduce_only ? undefined : body.stop_loss_pct,
    takeProfitLegs: body.reduce_only
      ? []
      : takeProfitTargets({
          tp1Pct: body.tp1_pct,
          tp1SizePct: body.tp1_size_pct,
          tp2Pct: body.tp2_pct,
          tp2SizePct: body.tp2_size_pct,
          runnerPct: body.take_profit_pct,
        }),
  });
}

export function buildTwapIntent(body: TwapOrderBody, config: CoinConfig): TradeIntent {
  const { coin, dex } = resolveMarket(body.coin, body.dex);
  return entryIntent({
    coin,
    dex,
    side: sideOf(body.action),
    leverage: body.leverage ?? config.defaultLeverage,
    collateralUsd: body.collateral_usd ?? config.defaultCollateralUsd,
    styleParams: {
      style: 'twap',
      durationMinutes: body.hours * 60 + body.minutes,
      slices: body.slices,
      randomize: body.randomize,
    },
    source: 'manual',
    idempotencyKey: manualKey(body.idempotency_key),
  });
}

export function buildScaleIntent(body: ScaleOrderBody, config: CoinConfig): TradeIntent {
  const { coin, dex } = resolveMarket(body.coin, body.dex);
  return entryIntent({
    coin,
    dex,
    side: sideOf(body.action),
    leverage: body.leverage ?? config.defaultLeverage,
    collateralUsd: body.collateral_usd ?? config.defaultCollateralUsd,
    styleParams: {
      style: 'scale',
      priceFrom: body.price_from,
      priceTo: body.price_to,
      orderCount: body.num_orders,
      skew: body.skew,
      reduceOnly: body.reduce_only,
    },
    source: 'manual',
    idempotencyKey: manualKey(body.idempotency_key),
  });
}

/** One market intent per enabled coin of the category. */
export function buildBatchIntents(body: BatchTradeBody, coins: CoinConfig[]): TradeIntent[] {
  const batchId = uuidv4();
  return coins
    .filter((c) => c.enabled && c.category === body.category)
    .map((config) =>
      entryIntent({
        coin: config.coin,
        dex: config.dex,
        side: sideOf(body.action),
        leverage: body.leverage ?? config.defaultLeverage,
        collateralUsd: body.collateral_usd ?? config.defaultCollateralUsd,
        styleParams: { style: 'market', slippage: EXECUTION_CONFIG.marketSlippage },
        source: 'category_batch',
        idempotencyKey: `batch-${batchId}-${config.dex ? `${config.dex}:` : ''}${config.coin}`,
        stopLossPct: body.stop_loss_pct ?? config.defaultStopLossPct,
        takeProfitLegs: coinTakeProfits(config),
      }),
    );
}
