// ============================================================
// Exchange Gateway - capability contract consumed by the core
// ============================================================

import type { AccountSnapshot, MarketInfo, OrderAck, OrderRequest } from '../types/index.js';

/**
 * Venue operations the pipeline depends on. Implementations validate and
 * normalise raw venue payloads; every failure surfaces as a GatewayError.
 */
export interface ExchangeGateway {
  getAccountState(): Promise<AccountSnapshot>;
  getMarket(coin: string, dex: string): Promise<MarketInfo>;
  updateLeverage(coin: string, dex: string, leverage: number): Promise<void>;
  placeOrder(request: OrderRequest): Promise<OrderAck>;
  cancelOrder(coin: string, dex: string, orderId: string): Promise<void>;
  modifyOrder(
    coin: string,
    dex: string,
    orderId: string,
    newPrice: number,
    newSize?: number,
  ): Promise<OrderAck>;
}

/** Full asset name as the venue knows it: HIP-3 markets are prefixed with their dex. */
export function assetName(coin: string, dex: string): string {
  return dex ? `${dex}:${coin}` : coin;
}

/** Split a venue coin name into (coin, dex): "xyz:TSLA" -> ("TSLA", "xyz"). */
export function splitAssetName(name: string): { coin: string; dex: string } {
  const idx = name.indexOf(':');
  return idx === -1 ? { coin: name, dex: '' } : { coin: name.slice(idx + 1), dex: name.slice(0, idx) };
}

export function positionKey(coin: string, dex: string): string {
  return assetName(coin, dex);
}
