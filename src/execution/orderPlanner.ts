// ============================================================
// Order Planner
// ============================================================
// Turns an accepted intent into concrete order legs:
//   - market / limit: one entry leg + optional SL + TP ladder
//   - twap: N equal market slices with pacing schedule
//   - scale: N limit orders between two prices, skew-weighted
// Entry legs always come first and are the only legs that
// may increase exposure. SL covers the full entry size; TP
// fractions are relative to the original entry size.
// ============================================================

import type {
  MarketInfo,
  OrderLeg,
  OrderPlan,
  Position,
  Side,
  TradeIntent,
  TwapSchedule,
} from '../types/index.js';
import { EXECUTION_CONFIG, PLANNER_LIMITS } from '../config/execution.js';
import { createModuleLogger } from '../monitoring/logger.js';

const log = createModuleLogger('OrderPlanner');

/** Tolerance for summing take-profit fractions */
const FRACTION_EPSILON = 1e-9;

export type PlanResult =
  | { ok: true; plan: OrderPlan }
  | { ok: false; reason: 'InvalidPlan'; message: string };

// --------------- Rounding ---------------

/** Round to the venue's price precision (significant figures). */
export function roundPrice(price: number): number {
  return Number(price.toPrecision(PLANNER_LIMITS.priceSigFigs));
}

export function roundSize(size: number, szDecimals: number): number {
  const factor = 10 ** szDecimals;
  return Math.round(size * factor) / factor;
}

// --------------- Price Helpers ---------------

/**
 * Trigger price for a protective leg.
 * Stops sit below entry for longs and above for shorts; take-profits the reverse.
 */
export function protectiveTriggerPrice(
  entryPrice: number,
  side: Side,
  role: 'stop_loss' | 'take_profit',
  offsetPct: number,
): number {
  const below = (side === 'long') === (role === 'stop_loss');
  const factor = below ? 1 - offsetPct / 100 : 1 + offsetPct / 100;
  return roundPrice(entryPrice * factor);
}

/** Worst acceptable fill for a market order given slippage. */
export function marketWorstPrice(midPrice: number, side: Side, slippage: number): number {
  return roundPrice(side === 'long' ? midPrice * (1 + slippage) : midPrice * (1 - slippage));
}

// --------------- Plan Builders ---------------

function buildProtectiveLegs(intent: TradeIntent, entryPrice: number, totalSize: number, szDecimals: number): OrderLeg[] {
  const legs: OrderLeg[] = [];

  if (intent.stopLossPct !== undefined && intent.stopLossPct > 0) {
    legs.push({
      role: 'stop_loss',
      orderType: 'trigger',
      triggerPrice: protectiveTriggerPrice(entryPrice, intent.side, 'stop_loss', intent.stopLossPct),
      offsetPct: intent.stopLossPct,
      sizeFraction: 1,
      size: totalSize,
      reduceOnly: true,
    });
  }

  for (const tp of intent.takeProfitLegs) {
    const triggerPrice = protectiveTriggerPrice(entryPrice, intent.side, 'take_profit', tp.triggerPct);
    // A short cannot take profit 100% or more below entry
    if (!(triggerPrice > 0)) {
      log.warn(`Skipping ${tp.triggerPct}% take-profit for ${intent.side} ${intent.coin}: trigger would be ${triggerPrice}`);
      continue;
    }
    legs.push({
      role: 'take_profit',
      orderType: 'trigger',
      triggerPrice,
      offsetPct: tp.triggerPct,
      sizeFraction: tp.closeFraction,
      size: roundSize(totalSize * tp.closeFraction, szDecimals),
      reduceOnly: true,
    });
  }

  return legs;
}

function defaultSliceCount(durationMinutes: number): number {
  return Math.min(
    PLANNER_LIMITS.maxSlices,
    Math.max(PLANNER_LIMITS.minSlices, Math.round(durationMinutes)),
  );
}

/**
 * Size weights for a scale ladder: ((N - i) / N)^(skew - 1).
 * skew = 1 gives equal sizes; skew > 1 leans toward the first (priceFrom) order.
 */
export function scaleWeights(orderCount: number, skew: number): number[] {
  const raw = Array.from({ length: orderCount }, (_, i) => ((orderCount - i) / orderCount) ** (skew - 1));
  const total = raw.reduce((a, b) => a + b, 0);
  return raw.map((w) => w / total);
}

/** Evenly spaced prices from priceFrom to priceTo, both inclusive. */
export function scalePrices(priceFrom: number, priceTo: number, orderCount: number): number[] {
  return Array.from({ length: orderCount }, (_, i) =>
    roundPrice(priceFrom + ((priceTo - priceFrom) * i) / (orderCount - 1)),
  );
}

// --------------- Public API ---------------

/**
 * Build the order plan for an intent.
 *
 * @param intent - Risk-approved intent
 * @param market - Current venue data for the coin (mid price, size precision)
 */
export function plan(intent: TradeIntent, market: MarketInfo): PlanResult {
  const invalid = (message: string): PlanResult => {
    log.info(`Plan rejected for ${intent.coin}: ${message}`);
    return { ok: false, reason: 'InvalidPlan', message };
  };

  if (!(intent.collateralUsd > 0)) return invalid('Collateral must be positive');
  if (!(intent.leverage >= 1)) return invalid('Leverage must be at least 1x');

  for (const tp of intent.takeProfitLegs) {
    if (!(tp.closeFraction > 0 && tp.closeFraction <= 1)) {
      return invalid(`Take-profit fraction ${tp.closeFraction} must be in (0, 1]`);
    }
    if (!(tp.triggerPct > 0)) return invalid('Take-profit distance must be positive');
  }
  const tpTotal = intent.takeProfitLegs.reduce((sum, tp) => sum + tp.closeFraction, 0);
  if (tpTotal > 1 + FRACTION_EPSILON) {
    return invalid(`Take-profit fractions sum to ${tpTotal.toFixed(4)} (max 1)`);
  }

  const notional = intent.collateralUsd * intent.leverage;
  const { szDecimals } = market;
  const params = intent.styleParams;
  const base = {
    intentKey: intent.idempotencyKey,
    coin: intent.coin,
    dex: intent.dex,
    side: intent.side,
    leverage: intent.leverage,
    style: params.style,
    szDecimals,
  };

  switch (params.style) {
    case 'market':
    case 'limit': {
      const referencePrice = params.style === 'limit' ? params.limitPrice : market.midPrice;
      if (!(referencePrice > 0)) return invalid('Entry price must be positive');

      const totalSize = roundSize(notional / referencePrice, szDecimals);
      if (totalSize <= 0) return invalid(`Position size rounds to zero at ${szDecimals} decimals`);

      const entry: OrderLeg =
        params.style === 'limit'
          ? {
              role: 'entry',
              orderType: 'limit',
              price: roundPrice(params.limitPrice),
              sizeFraction: 1,
              size: totalSize,
              reduceOnly: params.reduceOnly,
            }
          : {
              role: 'entry',
              orderType: 'market',
              price: marketWorstPrice(market.midPrice, intent.side, params.slippage),
              sizeFraction: 1,
              size: totalSize,
              reduceOnly: false,
            };

      const protective = buildProtectiveLegs(intent, referencePrice, totalSize, szDecimals);
      if (protective.some((leg) => leg.size <= 0)) {
        return invalid('A take-profit leg rounds to zero size');
      }

      return {
        ok: true,
        plan: { ...base, referencePrice, totalSize, legs: [entry, ...protective] },
      };
    }

    case 'twap': {
      if (intent.stopLossPct !== undefined || intent.takeProfitLegs.length > 0) {
        return invalid('Stop-loss and take-profit legs are not supported on TWAP orders');
      }
      if (params.durationMinutes < PLANNER_LIMITS.minTwapMinutes) {
        return invalid(`TWAP duration must be at least ${PLANNER_LIMITS.minTwapMinutes} minutes`);
      }
      const slices = params.slices ?? defaultSliceCount(params.durationMinutes);
      if (!Number.isInteger(slices) || slices < PLANNER_LIMITS.minSlices || slices > PLANNER_LIMITS.maxSlices) {
        return invalid(`Slice count must be between ${PLANNER_LIMITS.minSlices} and ${PLANNER_LIMITS.maxSlices}`);
      }
      if (!(market.midPrice > 0)) return invalid(`No price available for ${intent.coin}`);

      const totalSize = roundSize(notional / market.midPrice, szDecimals);
      const sliceSize = roundSize(totalSize / slices, szDecimals);
      if (sliceSize <= 0) return invalid(`TWAP slice size rounds to zero at ${szDecimals} decimals`);

      const intervalMs = Math.round((params.durationMinutes * 60_000) / slices);
      const schedule: TwapSchedule = {
        slices,
        sliceSize,
        intervalMs,
        jitterMs: params.randomize ? Math.round(intervalMs * PLANNER_LIMITS.twapJitterFraction) : 0,
      };

      const price = marketWorstPrice(market.midPrice, intent.side, EXECUTION_CONFIG.marketSlippage);
      const legs: OrderLeg[] = Array.from({ length: slices }, () => ({
        role: 'entry',
        orderType: 'market',
        price,
        sizeFraction: 1 / slices,
        size: sliceSize,
        reduceOnly: false,
      }));

      return {
        ok: true,
        plan: { ...base, referencePrice: market.midPrice, totalSize, legs, schedule },
      };
    }

    case 'scale': {
      if (intent.stopLossPct !== undefined || intent.takeProfitLegs.length > 0) {
        return invalid('Stop-loss and take-profit legs are not supported on scale orders');
      }
      const { priceFrom, priceTo, orderCount, skew } = params;
      if (!(priceFrom > 0 && priceTo > 0)) return invalid('Scale prices must be positive');
      if (priceFrom === priceTo) return invalid('price_from and price_to must differ');
      if (!Number.isInteger(orderCount) || orderCount < PLANNER_LIMITS.minSlices || orderCount > PLANNER_LIMITS.maxSlices) {
        return invalid(`Number of orders must be between ${PLANNER_LIMITS.minSlices} and ${PLANNER_LIMITS.maxSlices}`);
      }
      if (skew < PLANNER_LIMITS.minSkew || skew > PLANNER_LIMITS.maxSkew) {
        return invalid(`Skew must be between ${PLANNER_LIMITS.minSkew} and ${PLANNER_LIMITS.maxSkew}`);
      }

      const referencePrice = (priceFrom + priceTo) / 2;
      const totalSize = roundSize(notional / referencePrice, szDecimals);
      const prices = scalePrices(priceFrom, priceTo, orderCount);
      const weights = scaleWeights(orderCount, skew);

      const legs: OrderLeg[] = prices.map((price, i) => {
        const fraction = weights[i] ?? 0;
        return {
          role: 'entry',
          orderType: 'limit',
          price,
          sizeFraction: fraction,
          size: roundSize(totalSize * fraction, szDecimals),
          reduceOnly: params.reduceOnly,
        };
      });
      if (legs.some((leg) => leg.size <= 0)) {
        return invalid(`A scale order rounds to zero size at ${szDecimals} decimals`);
      }

      return { ok: true, plan: { ...base, referencePrice, totalSize, legs } };
    }
  }
}

/**
 * Recompute protective trigger prices from the actual entry fill,
 * so a slipped market fill keeps the configured distances.
 */
export function rebaseProtectiveLegs(legs: OrderLeg[], side: Side, fillPrice: number): OrderLeg[] {
  return legs.map((leg) => {
    if (leg.role === 'entry' || leg.offsetPct === undefined) return leg;
    return { ...leg, triggerPrice: protectiveTriggerPrice(fillPrice, side, leg.role, leg.offsetPct) };
  });
}

/**
 * Reduce-only market order flattening an open position.
 * The plan's side is the trade direction of the closing order.
 */
export function planClose(position: Position, market: MarketInfo, intentKey: string): OrderPlan {
  const side: Side = position.side === 'long' ? 'short' : 'long';
  const size = Math.abs(position.size);
  return {
    intentKey,
    coin: position.coin,
    dex: position.dex,
    side,
    leverage: position.leverage,
    style: 'market',
    referencePrice: market.midPrice,
    totalSize: size,
    szDecimals: market.szDecimals,
    legs: [
      {
        role: 'entry',
        orderType: 'market',
        price: marketWorstPrice(market.midPrice, side, EXECUTION_CONFIG.marketSlippage),
        sizeFraction: 1,
        size,
        reduceOnly: true,
      },
    ],
  };
}
