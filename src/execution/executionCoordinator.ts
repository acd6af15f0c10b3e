// ============================================================
// Execution Coordinator
// ============================================================
// Submits planned legs to the exchange gateway:
//   - entry legs first; protective legs only after a fill
//   - at most one entry submission per idempotency key
//   - retry with backoff on RateLimited / Timeout, fail fast otherwise
//   - TWAP / scale pacing, cancellable between slices
//   - bounded number of entry plans in flight; closes are never
//     held back and paced plans give their slot up while waiting
// ============================================================

import { LRUCache } from 'lru-cache';
import type {
  CloseReason,
  ExecutionResult,
  IntentSource,
  LegOutcome,
  OrderLeg,
  OrderPlan,
  OrderRequest,
} from '../types/index.js';
import { EXECUTION_CONFIG, type ExecutionConfig } from '../config/execution.js';
import { errorMessage, toGatewayError } from '../errors.js';
import { createModuleLogger } from '../monitoring/logger.js';
import { systemClock, type Clock } from './clock.js';
import { positionKey, type ExchangeGateway } from './exchangeGateway.js';
import { rebaseProtectiveLegs, roundSize } from './orderPlanner.js';

const log = createModuleLogger('ExecutionCoordinator');

// --------------- Interfaces ---------------

export interface CoordinatorOptions {
  config?: Partial<ExecutionConfig>;
  clock?: Clock;
  /** Uniform [0, 1) source for TWAP jitter */
  random?: () => number;
}

/** Context carried through to the reconciler */
export interface ExecutionMeta {
  source?: IntentSource;
  collateralUsd?: number;
  indicator?: string;
  closeReason?: CloseReason;
}

export type BatchItemResult<T, R> =
  | { item: T; success: true; value: R }
  | { item: T; success: false; error: string };

// --------------- Helpers ---------------

export function toOrderRequest(plan: OrderPlan, leg: OrderLeg): OrderRequest {
  // Entries trade in the plan's direction; protective legs trade against it
  const isBuy = leg.role === 'entry' ? plan.side === 'long' : plan.side === 'short';
  const request: OrderRequest = {
    coin: plan.coin,
    dex: plan.dex,
    isBuy,
    size: leg.size,
    price: leg.price ?? leg.triggerPrice ?? plan.referencePrice,
    orderType: leg.orderType,
    reduceOnly: leg.reduceOnly,
  };
  if (leg.orderType === 'trigger') {
    request.triggerPrice = leg.triggerPrice;
    request.tpsl = leg.role === 'stop_loss' ? 'sl' : 'tp';
  }
  return request;
}

function aggregateFills(outcomes: LegOutcome[]): { size: number; avgPrice: number } | null {
  let size = 0;
  let cost = 0;
  for (const o of outcomes) {
    if (o.ack?.status !== 'filled') continue;
    size += o.ack.filledSize;
    cost += o.ack.filledSize * o.ack.avgPrice;
  }
  return size > 0 ? { size, avgPrice: cost / size } : null;
}

// --------------- Coordinator ---------------

export class ExecutionCoordinator {
  private readonly config: ExecutionConfig;
  private readonly clock: Clock;
  private readonly random: () => number;
  /** idempotency key -> reservation time (ms) */
  private readonly seenKeys: LRUCache<string, number>;
  /** running intent key -> market key */
  private readonly active = new Map<string, string>();
  private readonly cancelRequested = new Set<string>();
  /** Ends the pacing wait of a running sequence early */
  private readonly wakers = new Map<string, () => void>();
  private inFlight = 0;
  private readonly slotWaiters: Array<() => void> = [];

  constructor(
    private readonly gateway: ExchangeGateway,
    options: CoordinatorOptions = {},
  ) {
    this.config = {
      ...EXECUTION_CONFIG,
      ...options.config,
      retry: { ...EXECUTION_CONFIG.retry, ...options.config?.retry },
    };
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.seenKeys = new LRUCache<string, number>({ max: this.config.dedupMaxKeys });
  }

  // --------------- Idempotency ---------------

  /** True if the key was reserved within the dedup window. */
  hasRecentKey(key: string): boolean {
    const reservedAt = this.seenKeys.get(key);
    if (reservedAt === undefined) return false;
    if (this.clock.now().getTime() - reservedAt >= this.config.dedupWindowMs) {
      this.seenKeys.delete(key);
      return false;
    }
    return true;
  }

  /** Synchronous check-and-set so concurrent duplicates cannot both pass. */
  private reserveKey(key: string): boolean {
    if (this.hasRecentKey(key)) return false;
    this.seenKeys.set(key, this.clock.now().getTime());
    return true;
  }

  // --------------- Concurrency ---------------

  private async acquireSlot(): Promise<void> {
    if (this.inFlight < this.config.maxInFlight) {
      this.inFlight += 1;
      return;
    }
    // The releasing plan hands its slot straight to the next waiter
    await new Promise<void>((resolve) => this.slotWaiters.push(resolve));
  }

  private releaseSlot(): void {
    const next = this.slotWaiters.shift();
    if (next) next();
    else this.inFlight -= 1;
  }

  get inFlightCount(): number {
    return this.inFlight;
  }

  // --------------- Cancellation ---------------

  /**
   * Stop a running TWAP / scale sequence. Slices already sent are not
   * interrupted; unsent ones are skipped.
   */
  cancel(intentKey: string): boolean {
    if (!this.active.has(intentKey)) return false;
    this.cancelRequested.add(intentKey);
    this.wakers.get(intentKey)?.();
    log.info(`Cancel requested for ${intentKey}`);
    return true;
  }

  /** Cancel every running sequence on one market; returns the cancelled keys. */
  cancelMarket(coin: string, dex: string): string[] {
    const market = positionKey(coin, dex);
    const keys = [...this.active].filter(([, m]) => m === market).map(([key]) => key);
    for (const key of keys) this.cancel(key);
    return keys;
  }

  isActive(intentKey: string): boolean {
    return this.active.has(intentKey);
  }

  // --------------- Retry ---------------

  backoffDelay(attempt: number): number {
    const { baseDelayMs, backoff } = this.config.retry;
    return backoff === 'exponential' ? baseDelayMs * 2 ** (attempt - 1) : baseDelayMs * attempt;
  }

  /**
   * Run a gateway call under the timeout and retry policy.
   * Resolves to the value or to the classified error once retries run out.
   */
  private async withRetry<T>(
    label: string,
    call: () => Promise<T>,
  ): Promise<{ ok: true; value: T; attempts: number } | { ok: false; error: ReturnType<typeof toGatewayError>; attempts: number }> {
    let attempts = 0;
    for (;;) {
      attempts += 1;
      try {
        const value = await this.clock.withTimeout(call(), this.config.callTimeoutMs, label);
        return { ok: true, value, attempts };
      } catch (err) {
        const error = toGatewayError(err);
        if (error.isTransient && attempts <= this.config.retry.maxRetries) {
          const delay = this.backoffDelay(attempts);
          log.warn(`${label}: ${error.kind} (attempt ${attempts}), retrying in ${delay}ms`);
          await this.clock.sleep(delay);
          continue;
        }
        log.error(`${label} failed after ${attempts} attempt(s): ${error.kind} ${error.message}`);
        return { ok: false, error, attempts };
      }
    }
  }

  private async submitLeg(plan: OrderPlan, leg: OrderLeg): Promise<LegOutcome> {
    const request = toOrderRequest(plan, leg);
    const label = `${leg.role} ${request.isBuy ? 'BUY' : 'SELL'} ${leg.size} ${plan.coin}`;
    const result = await this.withRetry(label, () => this.gateway.placeOrder(request));

    if (result.ok) {
      log.info(`${label} accepted: ${result.value.status} (${result.value.orderId})`);
      return { leg, status: 'submitted', attempts: result.attempts, ack: result.value };
    }
    return {
      leg,
      status: 'failed',
      attempts: result.attempts,
      error: { kind: result.error.kind, message: result.error.message },
    };
  }

  private entryPacingMs(plan: OrderPlan): number {
    if (plan.schedule) {
      const { intervalMs, jitterMs } = plan.schedule;
      const jitter = jitterMs > 0 ? Math.round((this.random() * 2 - 1) * jitterMs) : 0;
      return Math.max(0, intervalMs + jitter);
    }
    return plan.style === 'scale' ? this.config.scaleOrderDelayMs : 0;
  }

  /** Wait between entry legs without holding a slot; a cancel cuts the wait short. */
  private async pace(key: string, ms: number, holdsSlot: boolean): Promise<void> {
    const woken = new Promise<void>((resolve) => this.wakers.set(key, resolve));
    if (holdsSlot) this.releaseSlot();
    try {
      await Promise.race([this.clock.sleep(ms), woken]);
    } finally {
      this.wakers.delete(key);
      if (holdsSlot) await this.acquireSlot();
    }
  }

  // --------------- Execution ---------------

  /**
   * Execute an order plan.
   *
   * @param plan - Output of the order planner
   * @param meta - Intent context forwarded on the result for reconciliation
   */
  async execute(plan: OrderPlan, meta: ExecutionMeta = {}): Promise<ExecutionResult> {
    const key = plan.intentKey;
    const result: ExecutionResult = {
      intentKey: key,
      coin: plan.coin,
      dex: plan.dex,
      side: plan.side,
      style: plan.style,
      legs: [],
      submittedLegs: [],
      failedLegs: [],
      entryFill: null,
      duplicate: false,
      cancelled: false,
      ...meta,
    };

    if (!this.reserveKey(key)) {
      log.warn(`Duplicate intent ${key}, not submitting`);
      return { ...result, duplicate: true };
    }

    const entries = plan.legs.filter((l) => l.role === 'entry');
    const protective = plan.legs.filter((l) => l.role !== 'entry');
    const opensExposure = entries.some((l) => !l.reduceOnly);

    // Closes skip the in-flight bound
    if (opensExposure) await this.acquireSlot();
    this.active.set(key, positionKey(plan.coin, plan.dex));
    try {
      const entryOutcomes: LegOutcome[] = [];
      let leverageFailure: LegOutcome['error'] | undefined;

      if (opensExposure) {
        const lev = await this.withRetry(`set leverage ${plan.coin}`, () =>
          this.gateway.updateLeverage(plan.coin, plan.dex, plan.leverage),
        );
        if (!lev.ok) leverageFailure = { kind: lev.error.kind, message: `Failed to set leverage: ${lev.error.message}` };
      }

      for (const [i, leg] of entries.entries()) {
        if (leverageFailure) {
          entryOutcomes.push({ leg, status: 'failed', attempts: 0, error: leverageFailure });
          continue;
        }
        if (i > 0 && !this.cancelRequested.has(key)) {
          const pause = this.entryPacingMs(plan);
          if (pause > 0) await this.pace(key, pause, opensExposure);
        }
        if (this.cancelRequested.has(key)) {
          result.cancelled = true;
          entryOutcomes.push({ leg, status: 'skipped', attempts: 0, skipReason: 'cancelled' });
          continue;
        }
        entryOutcomes.push(await this.submitLeg(plan, leg));
      }

      result.entryFill = aggregateFills(entryOutcomes);
      const protectiveOutcomes: LegOutcome[] = [];

      if (result.entryFill === null) {
        // Never leave a trigger behind for a position that does not exist
        for (const leg of protective) {
          protectiveOutcomes.push({ leg, status: 'skipped', attempts: 0, skipReason: 'entry not filled' });
        }
      } else {
        const filledFraction = Math.min(1, result.entryFill.size / plan.totalSize);
        const rebased = rebaseProtectiveLegs(protective, plan.side, result.entryFill.avgPrice);
        for (const leg of rebased) {
          const sized = filledFraction < 1 ? { ...leg, size: roundSize(leg.size * filledFraction, plan.szDecimals) } : leg;
          protectiveOutcomes.push(await this.submitLeg(plan, sized));
        }
      }

      result.legs = [...entryOutcomes, ...protectiveOutcomes];
      result.submittedLegs = result.legs.filter((o) => o.status === 'submitted');
      result.failedLegs = result.legs.filter((o) => o.status === 'failed');

      log.info(
        `Executed ${key} (${plan.style} ${plan.side} ${plan.coin}): ${result.submittedLegs.length} submitted, ${result.failedLegs.length} failed${result.cancelled ? ', cancelled' : ''}`,
      );
      return result;
    } finally {
      this.active.delete(key);
      this.cancelRequested.delete(key);
      if (opensExposure) this.releaseSlot();
    }
  }

  /**
   * Run independent items one after another with a minimum gap between them.
   * A failing item is reported and does not stop the rest.
   */
  async runBatch<T, R>(
    items: readonly T[],
    run: (item: T, index: number) => Promise<R>,
  ): Promise<BatchItemResult<T, R>[]> {
    const results: BatchItemResult<T, R>[] = [];
    for (const [i, item] of items.entries()) {
      if (i > 0) await this.clock.sleep(this.config.batchDelayMs);
      try {
        results.push({ item, success: true, value: await run(item, i) });
      } catch (err) {
        const message = errorMessage(err);
        log.warn(`Batch item ${i + 1}/${items.length} failed: ${message}`);
        results.push({ item, success: false, error: message });
      }
    }
    return results;
  }

  /** Gateway passthroughs with the same timeout and retry policy. */
  async cancelOrder(coin: string, dex: string, orderId: string): Promise<void> {
    const result = await this.withRetry(`cancel ${orderId}`, () => this.gateway.cancelOrder(coin, dex, orderId));
    if (!result.ok) throw result.error;
  }

  async modifyOrder(coin: string, dex: string, orderId: string, newPrice: number, newSize?: number) {
    const result = await this.withRetry(`modify ${orderId}`, () =>
      this.gateway.modifyOrder(coin, dex, orderId, newPrice, newSize),
    );
    if (!result.ok) throw result.error;
    return result.value;
  }
}
