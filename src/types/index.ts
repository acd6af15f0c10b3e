// ============================================================
// Signal Bridge - Shared TypeScript Types
// ============================================================

// --------------- Intents ---------------

export type Side = 'long' | 'short';
export type OrderStyle = 'market' | 'limit' | 'twap' | 'scale';
export type IntentSource = 'webhook' | 'manual' | 'category_batch';

export interface TakeProfitTarget {
  /** Distance from entry in percent (5 = 5%) */
  triggerPct: number;
  /** Fraction of the ORIGINAL entry size to close, in (0, 1] */
  closeFraction: number;
}

export type StyleParams =
  | { style: 'market'; slippage: number }
  | { style: 'limit'; limitPrice: number; reduceOnly: boolean }
  | { style: 'twap'; durationMinutes: number; slices?: number; randomize: boolean }
  | {
      style: 'scale';
      priceFrom: number;
      priceTo: number;
      orderCount: number;
      skew: number;
      reduceOnly: boolean;
    };

export interface TradeIntent {
  coin: string;
  /** '' for natively listed perps, builder dex name for HIP-3 markets */
  dex: string;
  side: Side;
  leverage: number;
  collateralUsd: number;
  stopLossPct?: number;
  takeProfitLegs: TakeProfitTarget[];
  orderStyle: OrderStyle;
  styleParams: StyleParams;
  source: IntentSource;
  idempotencyKey: string;
  closePosition: boolean;
  indicator?: string;
}

// --------------- Risk Configuration ---------------

export interface RiskLimits {
  maxPositionValueUsd: number;
  /** Percent of account equity (75 = 75%) */
  maxTotalExposurePct: number;
  maxLeverage: number;
  maxDailyLossUsd: number;
  maxDailyTrades: number;
  maxOpenPositions: number;
  consecutiveLossPauseThreshold: number;
  pauseDurationMinutes: number;
}

export type CoinCategory = 'L1s' | 'APPS' | 'MEMES' | 'HIP-3';

export interface CoinConfig {
  coin: string;
  dex: string;
  category: CoinCategory;
  enabled: boolean;
  /** Narrows RiskLimits.maxLeverage, never widens it */
  maxLeverage?: number;
  /** Narrows RiskLimits.maxPositionValueUsd, never widens it */
  maxPositionValueUsd?: number;
  defaultLeverage: number;
  defaultCollateralUsd: number;
  defaultStopLossPct?: number;
  tp1Pct?: number;
  tp1SizePct?: number;
  tp2Pct?: number;
  tp2SizePct?: number;
  exchangeMaxLeverage?: number;
  szDecimals?: number;
}

export interface RiskConfig {
  limits: RiskLimits;
  botEnabled: boolean;
}

// --------------- Risk State ---------------

export interface RiskState {
  /** UTC day (YYYY-MM-DD) the daily counters belong to */
  tradingDay: string;
  dailyTradeCount: number;
  dailyRealizedPnl: number;
  consecutiveLosses: number;
  tradingPausedUntil: Date | null;
}

// --------------- Exchange Snapshots ---------------

export interface Position {
  coin: string;
  dex: string;
  side: Side;
  /** Signed: positive long, negative short. Never zero while open. */
  size: number;
  entryPrice: number;
  markPrice: number;
  leverage: number;
  marginUsed: number;
  liquidationPrice: number | null;
  unrealizedPnl: number;
  notionalUsd: number;
}

export interface AccountSnapshot {
  address: string;
  equity: number;
  withdrawable: number;
  totalMarginUsed: number;
  positions: Position[];
  takenAt: Date;
}

export interface MarketInfo {
  coin: string;
  dex: string;
  midPrice: number;
  maxLeverage: number;
  szDecimals: number;
}

// --------------- Order Plans ---------------

export type LegRole = 'entry' | 'stop_loss' | 'take_profit';
export type LegOrderType = 'market' | 'limit' | 'trigger';

export interface OrderLeg {
  role: LegRole;
  orderType: LegOrderType;
  /** Limit price, or the worst acceptable price for market legs */
  price?: number;
  triggerPrice?: number;
  /** Distance from entry in percent, kept so triggers can be rebased on fill */
  offsetPct?: number;
  sizeFraction: number;
  /** Absolute size in coin units, rounded to the market's size decimals */
  size: number;
  reduceOnly: boolean;
}

export interface TwapSchedule {
  slices: number;
  sliceSize: number;
  intervalMs: number;
  jitterMs: number;
}

export interface OrderPlan {
  intentKey: string;
  coin: string;
  dex: string;
  side: Side;
  leverage: number;
  style: OrderStyle;
  referencePrice: number;
  totalSize: number;
  szDecimals: number;
  legs: OrderLeg[];
  schedule?: TwapSchedule;
}

// --------------- Gateway Requests & Acks ---------------

export interface OrderRequest {
  coin: string;
  dex: string;
  isBuy: boolean;
  size: number;
  price: number;
  orderType: LegOrderType;
  triggerPrice?: number;
  tpsl?: 'sl' | 'tp';
  reduceOnly: boolean;
}

export type OrderAck =
  | { status: 'filled'; orderId: string; filledSize: number; avgPrice: number }
  | { status: 'resting'; orderId: string };

// --------------- Execution Results ---------------

export type GatewayErrorKind =
  | 'RateLimited'
  | 'Timeout'
  | 'InsufficientMargin'
  | 'InvalidPrice'
  | 'Unknown';

export type LegStatus = 'submitted' | 'failed' | 'skipped';

export interface LegOutcome {
  leg: OrderLeg;
  status: LegStatus;
  attempts: number;
  ack?: OrderAck;
  error?: { kind: GatewayErrorKind; message: string };
  skipReason?: string;
}

export type CloseReason = 'manual' | 'signal' | 'stop_loss' | 'take_profit' | 'liquidation';

export interface ExecutionResult {
  intentKey: string;
  coin: string;
  dex: string;
  side: Side;
  style: OrderStyle;
  legs: LegOutcome[];
  submittedLegs: LegOutcome[];
  failedLegs: LegOutcome[];
  /** Aggregate fill of entry legs, null when nothing filled */
  entryFill: { size: number; avgPrice: number } | null;
  duplicate: boolean;
  cancelled: boolean;
  /** Set for close executions so the reconciler records the right reason */
  closeReason?: CloseReason;
  source?: IntentSource;
  collateralUsd?: number;
  indicator?: string;
}

// --------------- Trade History ---------------

export type TradeStatus = 'open' | 'closed' | 'liquidated';

export interface TradeRecord {
  id: string;
  openedAt: Date;
  coin: string;
  dex: string;
  side: Side;
  /** Absolute remaining size */
  size: number;
  entryPrice: number;
  exitPrice?: number;
  leverage: number;
  collateralUsd: number;
  stopLossPrice?: number;
  takeProfitPrices: number[];
  orderId?: string;
  status: TradeStatus;
  closeReason?: CloseReason;
  realizedPnl?: number;
  pnlPct?: number;
  /** P&L already realised by partial closes */
  partialPnl: number;
  source: IntentSource | 'reconciled';
  indicator?: string;
  closedAt?: Date;
  notes?: string;
}

export interface ActivityEntry {
  level: 'info' | 'warning' | 'error';
  category: 'risk' | 'trade' | 'webhook' | 'reconcile' | 'settings';
  message: string;
  details?: Record<string, unknown>;
  at: Date;
}

// --------------- Outcomes ---------------

export type RiskRejectReason =
  | 'CircuitBreakerActive'
  | 'DailyTradeLimitExceeded'
  | 'DailyLossLimitExceeded'
  | 'LeverageExceeded'
  | 'TooManyOpenPositions'
  | 'PositionTooLarge'
  | 'ExposureLimitExceeded'
  | 'TradingDisabled';

export type RejectReason =
  | RiskRejectReason
  | 'InvalidPlan'
  | 'DuplicateIntent'
  | 'InvalidRequest'
  | 'NoPosition'
  | 'ExecutionFailed';

export interface TradeOutcome {
  success: boolean;
  reason?: RejectReason;
  error?: string;
  execution?: ExecutionResult;
  trade?: TradeRecord;
}
