// ============================================================
// Paper Gateway
// ============================================================
// Simulates execution against live mid prices. No real orders
// are ever placed.
//
// Order lifecycle:
//   market          → filled immediately at mid ± slippage
//   limit           → filled if marketable, else RESTING
//   trigger (SL/TP) → RESTING until a price check crosses it
//
// Resting orders are evaluated by checkRestingOrders(), called
// from the periodic sync job. Reduce-only orders are cancelled
// once their position is gone.
// ============================================================

import { v4 as uuidv4 } from 'uuid';
import type {
  AccountSnapshot,
  MarketInfo,
  OrderAck,
  OrderRequest,
  Side,
} from '../types/index.js';
import { GatewayError } from '../errors.js';
import { createModuleLogger } from '../monitoring/logger.js';
import { assetName, positionKey, type ExchangeGateway } from './exchangeGateway.js';

const log = createModuleLogger('PaperGateway');

/** Adverse slippage applied to simulated market fills */
const SLIPPAGE = 0.0005; // 0.05%

// --------------- Interfaces ---------------

/** Anything that can quote a market: the info client in production, a stub in tests. */
export interface MarketDataSource {
  getMarket(coin: string, dex: string): Promise<MarketInfo>;
}

interface PaperPosition {
  coin: string;
  dex: string;
  /** Signed size, positive long */
  size: number;
  entryPrice: number;
  leverage: number;
}

export interface RestingOrder {
  orderId: string;
  request: OrderRequest;
  placedAt: Date;
}

export interface PaperFill {
  orderId: string;
  coin: string;
  dex: string;
  isBuy: boolean;
  size: number;
  price: number;
  realizedPnl: number;
  kind: 'limit' | 'stop_loss' | 'take_profit';
}

// --------------- PnL Helpers ---------------

function pnlFor(side: Side, entryPrice: number, exitPrice: number, size: number): number {
  const dir = side === 'long' ? 1 : -1;
  return (exitPrice - entryPrice) * size * dir;
}

// --------------- Gateway ---------------

export class PaperGateway implements ExchangeGateway {
  private balance: number;
  private readonly positions = new Map<string, PaperPosition>();
  private readonly leverage = new Map<string, number>();
  private readonly resting = new Map<string, RestingOrder>();

  constructor(
    private readonly market: MarketDataSource,
    startingBalance: number,
    private readonly address = 'paper',
  ) {
    this.balance = startingBalance;
    log.info(`PaperGateway initialised with ${startingBalance.toFixed(2)} USD`);
  }

  // --------------- Reads ---------------

  async getAccountState(): Promise<AccountSnapshot> {
    let unrealized = 0;
    let marginUsed = 0;
    const positions: AccountSnapshot['positions'] = [];

    for (const pos of this.positions.values()) {
      const { midPrice } = await this.market.getMarket(pos.coin, pos.dex);
      const side: Side = pos.size > 0 ? 'long' : 'short';
      const absSize = Math.abs(pos.size);
      const upnl = pnlFor(side, pos.entryPrice, midPrice, absSize);
      const margin = (absSize * pos.entryPrice) / pos.leverage;
      unrealized += upnl;
      marginUsed += margin;

      // Isolated margin: liquidation when the loss eats the margin
      const liqMove = pos.entryPrice / pos.leverage;
      positions.push({
        coin: pos.coin,
        dex: pos.dex,
        side,
        size: pos.size,
        entryPrice: pos.entryPrice,
        markPrice: midPrice,
        leverage: pos.leverage,
        marginUsed: margin,
        liquidationPrice: side === 'long' ? pos.entryPrice - liqMove : pos.entryPrice + liqMove,
        unrealizedPnl: upnl,
        notionalUsd: absSize * midPrice,
      });
    }

    const equity = this.balance + unrealized;
    return {
      address: this.address,
      equity,
      withdrawable: Math.max(0, equity - marginUsed),
      totalMarginUsed: marginUsed,
      positions,
      takenAt: new Date(),
    };
  }

  getMarket(coin: string, dex: string): Promise<MarketInfo> {
    return this.market.getMarket(coin, dex);
  }

  get cashBalance(): number {
    return this.balance;
  }

  get restingOrders(): RestingOrder[] {
    return [...this.resting.values()];
  }

  // --------------- Writes ---------------

  async updateLeverage(coin: string, dex: string, leverage: number): Promise<void> {
    const { maxLeverage } = await this.market.getMarket(coin, dex);
    if (leverage > maxLeverage) {
      throw new GatewayError('Unknown', `Leverage ${leverage}x exceeds ${maxLeverage}x for ${assetName(coin, dex)}`);
    }
    this.leverage.set(positionKey(coin, dex), leverage);
  }

  async placeOrder(request: OrderRequest): Promise<OrderAck> {
    if (!(request.size > 0)) throw new GatewayError('Unknown', 'Order size must be positive');
    if (!(request.price > 0)) throw new GatewayError('InvalidPrice', 'Order price must be positive');

    const key = positionKey(request.coin, request.dex);
    const orderId = uuidv4();

    if (request.reduceOnly) {
      const pos = this.positions.get(key);
      const reduces = pos !== undefined && (pos.size > 0) !== request.isBuy;
      if (!reduces) throw new GatewayError('Unknown', 'Reduce only order would increase position');
    }

    if (request.orderType === 'trigger') {
      this.resting.set(orderId, { orderId, request, placedAt: new Date() });
      log.info(`Paper trigger RESTING: ${request.tpsl ?? 'sl'} ${key} @ ${request.triggerPrice ?? request.price}`);
      return { status: 'resting', orderId };
    }

    const { midPrice } = await this.market.getMarket(request.coin, request.dex);

    if (request.orderType === 'limit') {
      const marketable = request.isBuy ? request.price >= midPrice : request.price <= midPrice;
      if (!marketable) {
        this.resting.set(orderId, { orderId, request, placedAt: new Date() });
        log.info(`Paper limit RESTING: ${request.isBuy ? 'BUY' : 'SELL'} ${request.size} ${key} @ ${request.price}`);
        return { status: 'resting', orderId };
      }
      const filled = this.fill(request, midPrice);
      return { status: 'filled', orderId, filledSize: filled, avgPrice: midPrice };
    }

    const fillPrice = request.isBuy ? midPrice * (1 + SLIPPAGE) : midPrice * (1 - SLIPPAGE);
    const filled = this.fill(request, fillPrice);
    return { status: 'filled', orderId, filledSize: filled, avgPrice: fillPrice };
  }

  async cancelOrder(coin: string, dex: string, orderId: string): Promise<void> {
    const order = this.resting.get(orderId);
    if (!order || positionKey(order.request.coin, order.request.dex) !== positionKey(coin, dex)) {
      throw new GatewayError('Unknown', `Order ${orderId} not found`);
    }
    this.resting.delete(orderId);
    log.info(`Paper order cancelled: ${orderId}`);
  }

  async modifyOrder(
    coin: string,
    dex: string,
    orderId: string,
    newPrice: number,
    newSize?: number,
  ): Promise<OrderAck> {
    const order = this.resting.get(orderId);
    if (!order || positionKey(order.request.coin, order.request.dex) !== positionKey(coin, dex)) {
      throw new GatewayError('Unknown', `Order ${orderId} not found`);
    }
    if (!(newPrice > 0)) throw new GatewayError('InvalidPrice', 'Order price must be positive');

    const request: OrderRequest = { ...order.request, price: newPrice, size: newSize ?? order.request.size };
    if (request.orderType === 'trigger') request.triggerPrice = newPrice;
    this.resting.set(orderId, { ...order, request });
    return { status: 'resting', orderId };
  }

  // --------------- Simulation ---------------

  /**
   * Apply a fill to the position book and settle realised P&L into the balance.
   * Returns the size actually filled (reduce-only orders are clamped).
   */
  private fill(request: OrderRequest, price: number): number {
    const key = positionKey(request.coin, request.dex);
    const pos = this.positions.get(key);
    const signed = request.isBuy ? request.size : -request.size;

    if (!pos) {
      const leverage = this.leverage.get(key) ?? 1;
      const margin = (request.size * price) / leverage;
      if (margin > this.availableMargin()) {
        throw new GatewayError('InsufficientMargin', 'Insufficient margin to place order');
      }
      this.positions.set(key, { coin: request.coin, dex: request.dex, size: signed, entryPrice: price, leverage });
      log.info(`Paper FILLED: open ${request.isBuy ? 'LONG' : 'SHORT'} ${request.size} ${key} @ ${price.toFixed(4)}`);
      return request.size;
    }

    const sameSide = (pos.size > 0) === request.isBuy;
    if (sameSide) {
      const margin = (request.size * price) / pos.leverage;
      if (margin > this.availableMargin()) {
        throw new GatewayError('InsufficientMargin', 'Insufficient margin to place order');
      }
      const newSize = Math.abs(pos.size) + request.size;
      pos.entryPrice = (Math.abs(pos.size) * pos.entryPrice + request.size * price) / newSize;
      pos.size += signed;
      log.info(`Paper FILLED: add ${request.size} ${key} @ ${price.toFixed(4)}`);
      return request.size;
    }

    // Opposite side: reduce, and flip only if not reduce-only
    const closing = Math.min(Math.abs(pos.size), request.size);
    const side: Side = pos.size > 0 ? 'long' : 'short';
    const realized = pnlFor(side, pos.entryPrice, price, closing);
    this.balance += realized;

    const remainder = request.reduceOnly ? 0 : request.size - closing;
    const left = Math.abs(pos.size) - closing;
    if (left > 1e-12) {
      pos.size = side === 'long' ? left : -left;
    } else if (remainder > 0) {
      pos.size = request.isBuy ? remainder : -remainder;
      pos.entryPrice = price;
      // Triggers guarding the old side would now add to the new one
      this.dropReduceOnly(key);
    } else {
      this.positions.delete(key);
      this.dropReduceOnly(key);
    }

    log.info(
      `Paper FILLED: reduce ${closing} ${key} @ ${price.toFixed(4)} | PnL=${realized >= 0 ? '+' : ''}${realized.toFixed(2)} USD`,
    );
    return closing + remainder;
  }

  private availableMargin(): number {
    let used = 0;
    for (const pos of this.positions.values()) used += (Math.abs(pos.size) * pos.entryPrice) / pos.leverage;
    return this.balance - used;
  }

  private dropReduceOnly(key: string): void {
    for (const [id, order] of this.resting) {
      if (order.request.reduceOnly && positionKey(order.request.coin, order.request.dex) === key) {
        this.resting.delete(id);
      }
    }
  }

  /**
   * Evaluate resting orders against current mids.
   * Fills limits that became marketable and fires crossed triggers.
   */
  async checkRestingOrders(): Promise<PaperFill[]> {
    const fills: PaperFill[] = [];
    const mids = new Map<string, number>();

    for (const order of [...this.resting.values()]) {
      // Earlier fills in this pass may have dropped it
      if (!this.resting.has(order.orderId)) continue;
      const { request } = order;
      const key = positionKey(request.coin, request.dex);

      let mid = mids.get(key);
      if (mid === undefined) {
        mid = (await this.market.getMarket(request.coin, request.dex)).midPrice;
        mids.set(key, mid);
      }

      let kind: PaperFill['kind'];
      if (request.orderType === 'trigger') {
        const trigger = request.triggerPrice ?? request.price;
        // A sell trigger below market is a long's stop; above it, a long's take-profit
        const crossed =
          request.tpsl === 'tp'
            ? request.isBuy ? mid <= trigger : mid >= trigger
            : request.isBuy ? mid >= trigger : mid <= trigger;
        if (!crossed) continue;
        kind = request.tpsl === 'tp' ? 'take_profit' : 'stop_loss';
      } else {
        const marketable = request.isBuy ? mid <= request.price : mid >= request.price;
        if (!marketable) continue;
        kind = 'limit';
      }

      this.resting.delete(order.orderId);
      const pos = this.positions.get(key);
      if (request.reduceOnly && !pos) continue;

      const price = request.orderType === 'trigger' ? (request.triggerPrice ?? request.price) : request.price;
      const before = this.balance;
      try {
        const size = this.fill(request, price);
        fills.push({
          orderId: order.orderId,
          coin: request.coin,
          dex: request.dex,
          isBuy: request.isBuy,
          size,
          price,
          realizedPnl: this.balance - before,
          kind,
        });
      } catch (err) {
        if (!(err instanceof GatewayError)) throw err;
        log.warn(`Resting order ${order.orderId} could not fill: ${err.message}`);
      }
    }

    return fills;
  }
}
