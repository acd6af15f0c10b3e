// ============================================================
// Risk Management Configuration
// ============================================================

import type { CoinConfig, RiskLimits } from '../types/index.js';

export const DEFAULT_RISK_LIMITS: Readonly<RiskLimits> = {
  /** Collateral x leverage cap per position */
  maxPositionValueUsd: 1000,
  /** Open notional across all positions, percent of equity */
  maxTotalExposurePct: 75,
  maxLeverage: 10,
  maxDailyLossUsd: 500,
  maxDailyTrades: 20,
  maxOpenPositions: 5,
  /** Losing closes in a row before new entries are paused */
  consecutiveLossPauseThreshold: 3,
  pauseDurationMinutes: 60,
};

/** Defaults for a coin that has never been configured. */
export function defaultCoinConfig(coin: string, dex = ''): CoinConfig {
  return {
    coin,
    dex,
    category: dex ? 'HIP-3' : 'L1s',
    enabled: true,
    defaultLeverage: 3,
    defaultCollateralUsd: 100,
    defaultStopLossPct: 15,
    tp1Pct: 50,
    tp1SizePct: 25,
    tp2Pct: 100,
    tp2SizePct: 50,
  };
}

/** Read overrides for the global limits from the environment. */
export function riskLimitsFromEnv(env: NodeJS.ProcessEnv): RiskLimits {
  const num = (key: string, fallback: number): number => {
    const raw = env[key];
    if (raw === undefined || raw === '') return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
  };

  return {
    maxPositionValueUsd: num('RISK_MAX_POSITION_VALUE_USD', DEFAULT_RISK_LIMITS.maxPositionValueUsd),
    maxTotalExposurePct: num('RISK_MAX_TOTAL_EXPOSURE_PCT', DEFAULT_RISK_LIMITS.maxTotalExposurePct),
    maxLeverage: num('RISK_MAX_LEVERAGE', DEFAULT_RISK_LIMITS.maxLeverage),
    maxDailyLossUsd: num('RISK_MAX_DAILY_LOSS_USD', DEFAULT_RISK_LIMITS.maxDailyLossUsd),
    maxDailyTrades: num('RISK_MAX_DAILY_TRADES', DEFAULT_RISK_LIMITS.maxDailyTrades),
    maxOpenPositions: num('RISK_MAX_OPEN_POSITIONS', DEFAULT_RISK_LIMITS.maxOpenPositions),
    consecutiveLossPauseThreshold: num(
      'RISK_PAUSE_AFTER_LOSSES',
      DEFAULT_RISK_LIMITS.consecutiveLossPauseThreshold,
    ),
    pauseDurationMinutes: num('RISK_PAUSE_MINUTES', DEFAULT_RISK_LIMITS.pauseDurationMinutes),
  };
}
