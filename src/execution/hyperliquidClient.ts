// ============================================================
// Hyperliquid API Client
// ============================================================
// Read-only info endpoint (account state, meta, mids) plus a
// live gateway that posts signed exchange actions.
//   - Raw payloads are validated with zod and normalised here
//   - HIP-3 markets are addressed as "dex:COIN"
//   - Signing is delegated to an injected ActionSigner
// Set USE_TESTNET=true to route to testnet.
// ============================================================

import axios, { type AxiosInstance } from 'axios';
import { LRUCache } from 'lru-cache';
import { z } from 'zod';
import type {
  AccountSnapshot,
  GatewayErrorKind,
  MarketInfo,
  OrderAck,
  OrderRequest,
  Position,
} from '../types/index.js';
import { EXECUTION_CONFIG } from '../config/execution.js';
import { GatewayError, errorMessage } from '../errors.js';
import { createModuleLogger } from '../monitoring/logger.js';
import { assetName, splitAssetName, type ExchangeGateway } from './exchangeGateway.js';
import { marketWorstPrice } from './orderPlanner.js';

const log = createModuleLogger('HyperliquidClient');

export const MAINNET_URL = 'https://api.hyperliquid.xyz';
export const TESTNET_URL = 'https://api.hyperliquid-testnet.xyz';

/** Meta (leverage caps, size decimals) changes rarely */
const META_TTL_MS = 5 * 60_000;

// --------------- Payload Schemas ---------------

const numeric = z.union([z.string(), z.number()]).transform((v) => Number(v));

const marginSummarySchema = z.object({
  accountValue: numeric,
  totalMarginUsed: numeric,
  totalNtlPos: numeric.optional(),
});

const assetPositionSchema = z.object({
  position: z.object({
    coin: z.string(),
    szi: numeric,
    entryPx: numeric.nullish(),
    positionValue: numeric,
    unrealizedPnl: numeric,
    liquidationPx: numeric.nullish(),
    marginUsed: numeric,
    leverage: z.object({ value: numeric }).optional(),
  }),
});

const clearinghouseStateSchema = z.object({
  marginSummary: marginSummarySchema,
  withdrawable: numeric,
  assetPositions: z.array(assetPositionSchema),
});

const metaSchema = z.object({
  universe: z.array(
    z.object({
      name: z.string(),
      szDecimals: z.number().int().nonnegative(),
      maxLeverage: z.number().positive(),
      isDelisted: z.boolean().optional(),
    }),
  ),
});

const midsSchema = z.record(z.string(), numeric);

const perpDexsSchema = z.array(z.object({ name: z.string() }).nullable());

const orderStatusSchema = z.union([
  z.object({ filled: z.object({ totalSz: numeric, avgPx: numeric, oid: z.union([z.number(), z.string()]) }) }),
  z.object({ resting: z.object({ oid: z.union([z.number(), z.string()]) }) }),
  z.object({ error: z.string() }),
  z.literal('success'),
]);

const exchangeResponseSchema = z.union([
  z.object({
    status: z.literal('ok'),
    response: z
      .object({
        type: z.string(),
        data: z.object({ statuses: z.array(orderStatusSchema) }).optional(),
      })
      .optional(),
  }),
  z.object({ status: z.literal('err'), response: z.string() }),
]);

const openOrdersSchema = z.array(
  z.object({
    coin: z.string(),
    side: z.enum(['A', 'B']),
    limitPx: numeric,
    sz: numeric,
    oid: z.union([z.number(), z.string()]),
  }),
);

// --------------- Normalisers ---------------

/** Map a venue error message onto a GatewayErrorKind. */
export function classifyErrorMessage(message: string): GatewayErrorKind {
  const lower = message.toLowerCase();
  if (lower.includes('rate limit') || lower.includes('too many requests') || lower.includes('429')) return 'RateLimited';
  if (lower.includes('timeout') || lower.includes('timed out')) return 'Timeout';
  if (lower.includes('insufficient') || lower.includes('margin')) return 'InsufficientMargin';
  if (lower.includes('price')) return 'InvalidPrice';
  return 'Unknown';
}

/** Classify anything thrown by an HTTP call. */
export function classifyHttpError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  if (axios.isAxiosError(err)) {
    if (err.response?.status === 429) return new GatewayError('RateLimited', 'Too many requests (429)');
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
      return new GatewayError('Timeout', `Request timed out: ${err.message}`);
    }
    const body: unknown = err.response?.data;
    const detail = typeof body === 'string' && body ? body : err.message;
    return new GatewayError(classifyErrorMessage(detail), detail);
  }
  const message = errorMessage(err);
  return new GatewayError(classifyErrorMessage(message), message);
}

function invalidPayload(what: string, error: z.ZodError): GatewayError {
  return new GatewayError('Unknown', `Malformed ${what} payload: ${error.issues[0]?.message ?? 'invalid'}`);
}

/**
 * Normalise a clearinghouseState payload.
 * Zero-size entries are dropped; side comes from the sign of szi.
 */
export function parseClearinghouseState(
  raw: unknown,
): { equity: number; withdrawable: number; totalMarginUsed: number; positions: Position[] } {
  const parsed = clearinghouseStateSchema.safeParse(raw);
  if (!parsed.success) throw invalidPayload('clearinghouseState', parsed.error);
  const state = parsed.data;

  const positions: Position[] = [];
  for (const { position: p } of state.assetPositions) {
    if (!Number.isFinite(p.szi) || p.szi === 0) continue;
    const { coin, dex } = splitAssetName(p.coin);
    const absSize = Math.abs(p.szi);
    positions.push({
      coin,
      dex,
      side: p.szi > 0 ? 'long' : 'short',
      size: p.szi,
      entryPrice: p.entryPx ?? 0,
      markPrice: p.positionValue / absSize,
      leverage: p.leverage?.value ?? 1,
      marginUsed: p.marginUsed,
      liquidationPrice: p.liquidationPx ?? null,
      unrealizedPnl: p.unrealizedPnl,
      notionalUsd: Math.abs(p.positionValue),
    });
  }

  return {
    equity: state.marginSummary.accountValue,
    withdrawable: state.withdrawable,
    totalMarginUsed: state.marginSummary.totalMarginUsed,
    positions,
  };
}

export interface AssetMeta {
  index: number;
  szDecimals: number;
  maxLeverage: number;
}

/** Universe array -> asset name lookup, keeping the array index for order wires. */
export function parseMeta(raw: unknown): Map<string, AssetMeta> {
  const parsed = metaSchema.safeParse(raw);
  if (!parsed.success) throw invalidPayload('meta', parsed.error);
  const out = new Map<string, AssetMeta>();
  parsed.data.universe.forEach((asset, index) => {
    if (asset.isDelisted) return;
    out.set(asset.name, { index, szDecimals: asset.szDecimals, maxLeverage: asset.maxLeverage });
  });
  return out;
}

/**
 * Interpret an exchange response carrying a single order status.
 * Venue-level errors become GatewayErrors.
 */
export function parseOrderResponse(raw: unknown): OrderAck {
  const parsed = exchangeResponseSchema.safeParse(raw);
  if (!parsed.success) throw invalidPayload('order response', parsed.error);
  const body = parsed.data;

  if (body.status === 'err') {
    throw new GatewayError(classifyErrorMessage(body.response), body.response);
  }
  const status = body.response?.data?.statuses[0];
  if (status === undefined || status === 'success') {
    throw new GatewayError('Unknown', 'Order response carried no status');
  }
  if ('error' in status) throw new GatewayError(classifyErrorMessage(status.error), status.error);
  if ('filled' in status) {
    return {
      status: 'filled',
      orderId: String(status.filled.oid),
      filledSize: status.filled.totalSz,
      avgPrice: status.filled.avgPx,
    };
  }
  return { status: 'resting', orderId: String(status.resting.oid) };
}

/** Accept an ok response with no per-order error (leverage, cancel). */
export function assertActionOk(raw: unknown, what: string): void {
  const parsed = exchangeResponseSchema.safeParse(raw);
  if (!parsed.success) throw invalidPayload(what, parsed.error);
  if (parsed.data.status === 'err') {
    throw new GatewayError(classifyErrorMessage(parsed.data.response), parsed.data.response);
  }
  for (const status of parsed.data.response?.data?.statuses ?? []) {
    if (typeof status === 'object' && 'error' in status) {
      throw new GatewayError(classifyErrorMessage(status.error), status.error);
    }
  }
}

/** Venue number formatting: no exponent, no trailing zeros. */
export function floatToWire(x: number): string {
  const fixed = x.toFixed(8);
  return fixed.includes('.') ? fixed.replace(/0+$/, '').replace(/\.$/, '') : fixed;
}

// --------------- Info Client ---------------

function dexParam(dex: string): { dex?: string } {
  return dex ? { dex } : {};
}

export interface InfoClientOptions {
  testnet?: boolean;
  http?: AxiosInstance;
  timeoutMs?: number;
}

/**
 * Thin wrapper around the public /info endpoint.
 * Used by both the live and paper gateways for prices and metadata.
 */
export class HyperliquidInfoClient {
  readonly http: AxiosInstance;
  private readonly metaCache = new LRUCache<string, { meta: Map<string, AssetMeta>; fetchedAt: number }>({ max: 32 });
  private dexIndexes: Map<string, number> | null = null;

  constructor(options: InfoClientOptions = {}) {
    const testnet = options.testnet ?? true;
    this.http =
      options.http ??
      axios.create({
        baseURL: testnet ? TESTNET_URL : MAINNET_URL,
        timeout: options.timeoutMs ?? EXECUTION_CONFIG.callTimeoutMs,
        headers: { 'Content-Type': 'application/json' },
      });
    log.info(`Info client initialised (${testnet ? 'TESTNET' : 'MAINNET'})`);
  }

  private async post(body: Record<string, unknown>): Promise<unknown> {
    try {
      const response = await this.http.post<unknown>('/info', body);
      return response.data;
    } catch (err) {
      throw classifyHttpError(err);
    }
  }

  async clearinghouseState(user: string, dex = '') {
    const raw = await this.post({ type: 'clearinghouseState', user, ...dexParam(dex) });
    return parseClearinghouseState(raw);
  }

  async meta(dex = ''): Promise<Map<string, AssetMeta>> {
    const cached = this.metaCache.get(dex);
    if (cached && Date.now() - cached.fetchedAt < META_TTL_MS) return cached.meta;

    const meta = parseMeta(await this.post({ type: 'meta', ...dexParam(dex) }));
    this.metaCache.set(dex, { meta, fetchedAt: Date.now() });
    return meta;
  }

  async allMids(dex = ''): Promise<Map<string, number>> {
    const parsed = midsSchema.safeParse(await this.post({ type: 'allMids', ...dexParam(dex) }));
    if (!parsed.success) throw invalidPayload('allMids', parsed.error);
    return new Map(Object.entries(parsed.data));
  }

  async openOrders(user: string, dex = '') {
    const parsed = openOrdersSchema.safeParse(await this.post({ type: 'openOrders', user, ...dexParam(dex) }));
    if (!parsed.success) throw invalidPayload('openOrders', parsed.error);
    return parsed.data;
  }

  /** Index of each builder-deployed dex; asset ids for HIP-3 markets depend on it. */
  async perpDexIndex(dex: string): Promise<number> {
    if (!this.dexIndexes) {
      const parsed = perpDexsSchema.safeParse(await this.post({ type: 'perpDexs' }));
      if (!parsed.success) throw invalidPayload('perpDexs', parsed.error);
      const indexes = new Map<string, number>();
      parsed.data.forEach((entry, i) => {
        if (entry) indexes.set(entry.name, i);
      });
      this.dexIndexes = indexes;
    }
    const idx = this.dexIndexes.get(dex);
    if (idx === undefined) throw new GatewayError('Unknown', `Unknown dex '${dex}'`);
    return idx;
  }

  /** Current mid and trading metadata for a market. */
  async getMarket(coin: string, dex: string): Promise<MarketInfo> {
    const name = assetName(coin, dex);
    const [meta, mids] = await Promise.all([this.meta(dex), this.allMids(dex)]);
    const asset = meta.get(name);
    if (!asset) throw new GatewayError('Unknown', `Unknown market ${name}`);
    const mid = mids.get(name);
    if (mid === undefined || !(mid > 0)) throw new GatewayError('InvalidPrice', `No mid price for ${name}`);
    return { coin, dex, midPrice: mid, maxLeverage: asset.maxLeverage, szDecimals: asset.szDecimals };
  }

  /** Venue asset id: universe index for native perps, offset by dex for HIP-3. */
  async assetId(coin: string, dex: string): Promise<number> {
    const asset = (await this.meta(dex)).get(assetName(coin, dex));
    if (!asset) throw new GatewayError('Unknown', `Unknown market ${assetName(coin, dex)}`);
    if (!dex) return asset.index;
    return 100_000 + (await this.perpDexIndex(dex)) * 10_000 + asset.index;
  }
}

// --------------- Live Gateway ---------------

export interface SignedAction {
  action: Record<string, unknown>;
  nonce: number;
  signature: { r: string; s: string; v: number };
  vaultAddress?: string;
}

/**
 * Produces the signature for an exchange action. Key custody and the
 * signing scheme live outside this service.
 */
export interface ActionSigner {
  sign(action: Record<string, unknown>, nonce: number): Promise<SignedAction>;
}

export interface LiveGatewayOptions {
  info: HyperliquidInfoClient;
  signer: ActionSigner;
  /** Account whose state is read (the main wallet, not the agent) */
  address: string;
  /** Builder dexes whose margin accounts are folded into the snapshot */
  dexes?: string[];
  marketSlippage?: number;
}

export class HyperliquidGateway implements ExchangeGateway {
  private readonly info: HyperliquidInfoClient;
  private readonly signer: ActionSigner;
  private readonly address: string;
  private readonly dexes: string[];
  private readonly slippage: number;

  constructor(options: LiveGatewayOptions) {
    this.info = options.info;
    this.signer = options.signer;
    this.address = options.address;
    this.dexes = options.dexes ?? [];
    this.slippage = options.marketSlippage ?? EXECUTION_CONFIG.marketSlippage;
  }

  private async exchange(action: Record<string, unknown>): Promise<unknown> {
    const signed = await this.signer.sign(action, Date.now());
    try {
      const response = await this.info.http.post<unknown>('/exchange', signed);
      return response.data;
    } catch (err) {
      throw classifyHttpError(err);
    }
  }

  async getAccountState(): Promise<AccountSnapshot> {
    const states = await Promise.all(
      ['', ...this.dexes].map((dex) => this.info.clearinghouseState(this.address, dex)),
    );
    return {
      address: this.address,
      equity: states.reduce((sum, s) => sum + s.equity, 0),
      withdrawable: states.reduce((sum, s) => sum + s.withdrawable, 0),
      totalMarginUsed: states.reduce((sum, s) => sum + s.totalMarginUsed, 0),
      positions: states.flatMap((s) => s.positions),
      takenAt: new Date(),
    };
  }

  getMarket(coin: string, dex: string): Promise<MarketInfo> {
    return this.info.getMarket(coin, dex);
  }

  async updateLeverage(coin: string, dex: string, leverage: number): Promise<void> {
    const asset = await this.info.assetId(coin, dex);
    assertActionOk(
      await this.exchange({ type: 'updateLeverage', asset, isCross: false, leverage }),
      'updateLeverage',
    );
    log.info(`Leverage set: ${assetName(coin, dex)} ${leverage}x (isolated)`);
  }

  private async orderWire(request: OrderRequest): Promise<Record<string, unknown>> {
    const asset = await this.info.assetId(request.coin, request.dex);
    let price = request.price;
    let orderType: Record<string, unknown> = { limit: { tif: 'Gtc' } };

    if (request.orderType === 'market') {
      // Re-price from a fresh mid: TWAP slices are sent long after planning
      const market = await this.info.getMarket(request.coin, request.dex);
      price = marketWorstPrice(market.midPrice, request.isBuy ? 'long' : 'short', this.slippage);
      orderType = { limit: { tif: 'Ioc' } };
    } else if (request.orderType === 'trigger') {
      orderType = {
        trigger: {
          isMarket: true,
          triggerPx: floatToWire(request.triggerPrice ?? request.price),
          tpsl: request.tpsl ?? 'sl',
        },
      };
    }

    return {
      a: asset,
      b: request.isBuy,
      p: floatToWire(price),
      s: floatToWire(request.size),
      r: request.reduceOnly,
      t: orderType,
    };
  }

  async placeOrder(request: OrderRequest): Promise<OrderAck> {
    const wire = await this.orderWire(request);
    return parseOrderResponse(await this.exchange({ type: 'order', orders: [wire], grouping: 'na' }));
  }

  async cancelOrder(coin: string, dex: string, orderId: string): Promise<void> {
    const asset = await this.info.assetId(coin, dex);
    assertActionOk(await this.exchange({ type: 'cancel', cancels: [{ a: asset, o: Number(orderId) }] }), 'cancel');
    log.info(`Order cancelled: ${assetName(coin, dex)} #${orderId}`);
  }

  async modifyOrder(
    coin: string,
    dex: string,
    orderId: string,
    newPrice: number,
    newSize?: number,
  ): Promise<OrderAck> {
    const open = await this.info.openOrders(this.address, dex);
    const existing = open.find((o) => String(o.oid) === orderId);
    if (!existing) throw new GatewayError('Unknown', `Order ${orderId} not found`);

    const wire = await this.orderWire({
      coin,
      dex,
      isBuy: existing.side === 'B',
      size: newSize ?? existing.sz,
      price: newPrice,
      orderType: 'limit',
      reduceOnly: false,
    });
    const raw = await this.exchange({ type: 'modify', oid: Number(orderId), order: wire });
    assertActionOk(raw, 'modify');
    return { status: 'resting', orderId };
  }
}
