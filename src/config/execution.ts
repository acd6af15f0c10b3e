// ============================================================
// Execution Configuration
// ============================================================

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  /** linear: base x attempt, exponential: base x 2^(attempt - 1) */
  backoff: 'linear' | 'exponential';
}

export interface ExecutionConfig {
  retry: RetryPolicy;
  /** Any single gateway call slower than this counts as a Timeout */
  callTimeoutMs: number;
  /** Window in which a repeated idempotency key is refused */
  dedupWindowMs: number;
  dedupMaxKeys: number;
  /** Minimum gap between items of a batch (one per coin) */
  batchDelayMs: number;
  /** Gap between the limit orders of a scale ladder */
  scaleOrderDelayMs: number;
  /** Plans allowed to execute at the same time */
  maxInFlight: number;
  /** Worst-price allowance for market orders (0.01 = 1%) */
  marketSlippage: number;
}

export const EXECUTION_CONFIG: Readonly<ExecutionConfig> = {
  retry: { maxRetries: 3, baseDelayMs: 1_000, backoff: 'linear' },
  callTimeoutMs: 10_000,
  dedupWindowMs: 10 * 60_000,
  dedupMaxKeys: 5_000,
  batchDelayMs: 200,
  scaleOrderDelayMs: 150,
  maxInFlight: 4,
  marketSlippage: 0.01,
};

export const PLANNER_LIMITS = {
  minSlices: 2,
  maxSlices: 50,
  minTwapMinutes: 5,
  minSkew: 0.1,
  maxSkew: 10,
  /** Fraction of a TWAP interval used as the random jitter bound */
  twapJitterFraction: 0.2,
  /** Venue price precision: significant figures */
  priceSigFigs: 5,
} as const;
