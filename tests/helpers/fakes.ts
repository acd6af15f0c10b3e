// ============================================================
// Test doubles: manual clock, scripted gateway, stub market data
// ============================================================

import type {
  AccountSnapshot,
  MarketInfo,
  OrderAck,
  OrderRequest,
  Position,
  Side,
  TradeIntent,
} from '../../src/types/index.js';
import { GatewayError } from '../../src/errors.js';
import type { Clock } from '../../src/execution/clock.js';
import { positionKey, type ExchangeGateway } from '../../src/execution/exchangeGateway.js';
import type { MarketDataSource } from '../../src/execution/paperGateway.js';

export const T0 = '2026-03-02T12:00:00.000Z';

/** Time only moves when a test (or a sleep) moves it. */
export class FakeClock implements Clock {
  private t: number;
  readonly sleeps: number[] = [];

  constructor(start: string = T0) {
    this.t = Date.parse(start);
  }

  now(): Date {
    return new Date(this.t);
  }

  advance(ms: number): void {
    this.t += ms;
  }

  set(iso: string): void {
    this.t = Date.parse(iso);
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.t += ms;
  }

  withTimeout<T>(task: Promise<T>): Promise<T> {
    return task;
  }
}

/** A clock whose sleeps never end, like a TWAP pause hours long. */
export class StalledClock extends FakeClock {
  override sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    return new Promise<void>(() => {});
  }
}

export class StubMarketData implements MarketDataSource {
  private readonly markets = new Map<string, MarketInfo>();

  set(coin: string, midPrice: number, opts: { dex?: string; szDecimals?: number; maxLeverage?: number } = {}): this {
    const dex = opts.dex ?? '';
    this.markets.set(positionKey(coin, dex), {
      coin,
      dex,
      midPrice,
      szDecimals: opts.szDecimals ?? 4,
      maxLeverage: opts.maxLeverage ?? 50,
    });
    return this;
  }

  async getMarket(coin: string, dex: string): Promise<MarketInfo> {
    const market = this.markets.get(positionKey(coin, dex));
    if (!market) throw new GatewayError('Unknown', `Unknown market ${positionKey(coin, dex)}`);
    return market;
  }
}

type Scripted = OrderAck | GatewayError;

/**
 * Gateway with scripted order responses. Without a script entry,
 * market orders fill in full at the request price and everything
 * else rests.
 */
export class ScriptedGateway implements ExchangeGateway {
  readonly placed: OrderRequest[] = [];
  readonly leverageCalls: Array<{ coin: string; dex: string; leverage: number }> = [];
  readonly cancelled: string[] = [];
  readonly orderScript: Scripted[] = [];
  readonly leverageScript: GatewayError[] = [];
  readonly cancelScript: GatewayError[] = [];
  /** Runs before each order is answered (e.g. to request a cancel mid-TWAP) */
  beforeOrder?: (request: OrderRequest, index: number) => void;
  /** While set, every order waits for it before being answered */
  gate?: Promise<void>;
  /** Orders waiting at the gate now, and the most seen at once */
  pending = 0;
  peakPending = 0;
  private nextId = 1;

  constructor(
    public snapshot: AccountSnapshot = snapshotOf([]),
    readonly market: StubMarketData = new StubMarketData().set('BTC', 50_000, { szDecimals: 5 }),
  ) {}

  async getAccountState(): Promise<AccountSnapshot> {
    return this.snapshot;
  }

  getMarket(coin: string, dex: string): Promise<MarketInfo> {
    return this.market.getMarket(coin, dex);
  }

  async updateLeverage(coin: string, dex: string, leverage: number): Promise<void> {
    this.leverageCalls.push({ coin, dex, leverage });
    const next = this.leverageScript.shift();
    if (next) throw next;
  }

  async placeOrder(request: OrderRequest): Promise<OrderAck> {
    this.placed.push(request);
    this.beforeOrder?.(request, this.placed.length - 1);
    if (this.gate) {
      this.pending += 1;
      this.peakPending = Math.max(this.peakPending, this.pending);
      try {
        await this.gate;
      } finally {
        this.pending -= 1;
      }
    }
    const next = this.orderScript.shift();
    if (next instanceof GatewayError) throw next;
    if (next) return next;

    const orderId = `oid-${this.nextId++}`;
    if (request.orderType === 'market') {
      return { status: 'filled', orderId, filledSize: request.size, avgPrice: request.price };
    }
    return { status: 'resting', orderId };
  }

  async cancelOrder(_coin: string, _dex: string, orderId: string): Promise<void> {
    const next = this.cancelScript.shift();
    if (next) throw next;
    this.cancelled.push(orderId);
  }

  async modifyOrder(_coin: string, _dex: string, orderId: string): Promise<OrderAck> {
    return { status: 'resting', orderId };
  }
}

// --------------- Builders ---------------

export function snapshotOf(positions: Position[], equity = 10_000): AccountSnapshot {
  return {
    address: 'test-wallet',
    equity,
    withdrawable: equity,
    totalMarginUsed: 0,
    positions,
    takenAt: new Date(T0),
  };
}

export function position(coin: string, side: Side, size: number, entryPrice: number, opts: Partial<Position> = {}): Position {
  const signed = side === 'long' ? Math.abs(size) : -Math.abs(size);
  return {
    coin,
    dex: '',
    side,
    size: signed,
    entryPrice,
    markPrice: entryPrice,
    leverage: 5,
    marginUsed: (Math.abs(size) * entryPrice) / 5,
    liquidationPrice: null,
    unrealizedPnl: 0,
    notionalUsd: Math.abs(size) * entryPrice,
    ...opts,
  };
}

export function marketIntent(overrides: Partial<TradeIntent> = {}): TradeIntent {
  return {
    coin: 'BTC',
    dex: '',
    side: 'long',
    leverage: 5,
    collateralUsd: 200,
    takeProfitLegs: [],
    orderStyle: 'market',
    styleParams: { style: 'market', slippage: 0.01 },
    source: 'manual',
    idempotencyKey: 'key-1',
    closePosition: false,
    ...overrides,
  };
}

export function market(coin: string, midPrice: number, szDecimals = 4, maxLeverage = 50): MarketInfo {
  return { coin, dex: '', midPrice, szDecimals, maxLeverage };
}
