// ============================================================
// Risk Engine
// ============================================================
// Gatekeeper for every trade intent. Pure function over its
// inputs: state transitions happen in the State Reconciler.
//
// Check order (first failure wins):
//   1. Circuit breaker pause
//   2. Daily trade count
//   3. Daily realised loss
//   4. Leverage cap (min of global, coin, exchange)
//   5. Open position count (new coin positions only)
//   6. Position value cap
//   7. Total exposure vs equity
//   8. Bot / coin enable switch
// Close intents only face check 1.
// ============================================================

import type {
  AccountSnapshot,
  CoinConfig,
  MarketInfo,
  RiskLimits,
  RiskRejectReason,
  RiskState,
  TradeIntent,
} from '../types/index.js';
import { createModuleLogger } from '../monitoring/logger.js';

const log = createModuleLogger('RiskEngine');

// --------------- Interfaces ---------------

export interface EvaluationContext {
  now: Date;
  botEnabled: boolean;
  coinConfig?: CoinConfig;
  market?: MarketInfo;
}

export type RiskDecision =
  | { accepted: true }
  | { accepted: false; reason: RiskRejectReason; message: string };

// --------------- Cap Helpers ---------------

/** Tightest leverage cap across global limits, coin override and venue max. */
export function effectiveMaxLeverage(
  limits: RiskLimits,
  coinConfig?: CoinConfig,
  market?: MarketInfo,
): number {
  const caps = [limits.maxLeverage];
  if (coinConfig?.maxLeverage !== undefined) caps.push(coinConfig.maxLeverage);
  if (coinConfig?.exchangeMaxLeverage !== undefined) caps.push(coinConfig.exchangeMaxLeverage);
  if (market) caps.push(market.maxLeverage);
  return Math.min(...caps);
}

export function effectiveMaxPositionValue(limits: RiskLimits, coinConfig?: CoinConfig): number {
  if (coinConfig?.maxPositionValueUsd === undefined) return limits.maxPositionValueUsd;
  return Math.min(limits.maxPositionValueUsd, coinConfig.maxPositionValueUsd);
}

export function totalExposureUsd(snapshot: AccountSnapshot): number {
  return snapshot.positions.reduce((sum, p) => sum + Math.abs(p.notionalUsd), 0);
}

function hasOpenPosition(snapshot: AccountSnapshot, coin: string, dex: string): boolean {
  return snapshot.positions.some((p) => p.coin === coin && p.dex === dex);
}

// --------------- Evaluation ---------------

/**
 * Decide whether an intent may proceed to planning.
 *
 * @param intent   - Inbound trade intent
 * @param limits   - Global risk limits
 * @param riskState - Persisted counters, already rolled over for the current UTC day
 * @param snapshot - Fresh account state from the gateway
 * @param ctx      - Clock, enable switch and per-coin configuration
 */
export function evaluate(
  intent: TradeIntent,
  limits: RiskLimits,
  riskState: RiskState,
  snapshot: AccountSnapshot,
  ctx: EvaluationContext,
): RiskDecision {
  const reject = (reason: RiskRejectReason, message: string): RiskDecision => {
    log.debug(`Rejected ${intent.coin} (${intent.idempotencyKey}): ${reason}`);
    return { accepted: false, reason, message };
  };

  // 1. Circuit breaker
  const pausedUntil = riskState.tradingPausedUntil;
  if (pausedUntil && pausedUntil.getTime() > ctx.now.getTime()) {
    const minutes = Math.ceil((pausedUntil.getTime() - ctx.now.getTime()) / 60_000);
    return reject(
      'CircuitBreakerActive',
      `Trading paused for ${minutes} more minute(s) after consecutive losses`,
    );
  }

  // Closing always allowed so users can de-risk
  if (intent.closePosition) return { accepted: true };

  // 2. Daily trade count
  if (riskState.dailyTradeCount >= limits.maxDailyTrades) {
    return reject(
      'DailyTradeLimitExceeded',
      `Max daily trades reached (${riskState.dailyTradeCount}/${limits.maxDailyTrades})`,
    );
  }

  // 3. Daily loss
  if (riskState.dailyRealizedPnl <= -limits.maxDailyLossUsd) {
    return reject(
      'DailyLossLimitExceeded',
      `Daily loss limit $${limits.maxDailyLossUsd.toFixed(2)} reached (${riskState.dailyRealizedPnl.toFixed(2)})`,
    );
  }

  // 4. Leverage
  const maxLeverage = effectiveMaxLeverage(limits, ctx.coinConfig, ctx.market);
  if (intent.leverage > maxLeverage) {
    return reject(
      'LeverageExceeded',
      `Leverage ${intent.leverage}x exceeds maximum ${maxLeverage}x for ${intent.coin}`,
    );
  }

  // 5. Open positions (HIP-3 and native count together)
  if (!hasOpenPosition(snapshot, intent.coin, intent.dex)) {
    const openCount = snapshot.positions.length;
    if (openCount + 1 > limits.maxOpenPositions) {
      return reject(
        'TooManyOpenPositions',
        `Max open positions (${limits.maxOpenPositions}) reached`,
      );
    }
  }

  // 6. Position value
  const notional = intent.collateralUsd * intent.leverage;
  const maxValue = effectiveMaxPositionValue(limits, ctx.coinConfig);
  if (notional > maxValue) {
    return reject(
      'PositionTooLarge',
      `Position value $${notional.toFixed(2)} exceeds limit $${maxValue.toFixed(2)}`,
    );
  }

  // 7. Total exposure
  const exposureAfter = totalExposureUsd(snapshot) + notional;
  const exposureCap = (snapshot.equity * limits.maxTotalExposurePct) / 100;
  if (exposureAfter > exposureCap) {
    return reject(
      'ExposureLimitExceeded',
      `Total exposure $${exposureAfter.toFixed(2)} would exceed ${limits.maxTotalExposurePct}% of equity ($${exposureCap.toFixed(2)})`,
    );
  }

  // 8. Enable switches
  if (!ctx.botEnabled) {
    return reject('TradingDisabled', 'Bot is disabled');
  }
  if (ctx.coinConfig && !ctx.coinConfig.enabled) {
    return reject('TradingDisabled', `Trading disabled for ${intent.coin}`);
  }

  log.info(
    `Risk OK: ${intent.coin} ${intent.side} | notional=$${notional.toFixed(2)} | lev=${intent.leverage}x | exposure=$${exposureAfter.toFixed(2)}/${exposureCap.toFixed(2)}`,
  );
  return { accepted: true };
}
