import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { OrderRequest } from '../../src/types/index.js';
import { GatewayError } from '../../src/errors.js';
import { PaperGateway } from '../../src/execution/paperGateway.js';
import { StubMarketData } from '../helpers/fakes.js';

function setup(balance = 10_000) {
  const market = new StubMarketData().set('ETH', 2_000).set('BTC', 50_000, { szDecimals: 5 });
  const gateway = new PaperGateway(market, balance);
  return { market, gateway };
}

function order(overrides: Partial<OrderRequest>): OrderRequest {
  return { coin: 'ETH', dex: '', isBuy: true, size: 1, price: 2_000, orderType: 'limit', reduceOnly: false, ...overrides };
}

const gatewayError = (kind: GatewayError['kind'], message: string) => (err: unknown) =>
  err instanceof GatewayError && err.kind === kind && err.message === message;

describe('Paper gateway', () => {
  it('fills market orders at mid plus adverse slippage', async () => {
    const { gateway } = setup();
    await gateway.updateLeverage('BTC', '', 10);

    const ack = await gateway.placeOrder(order({ coin: 'BTC', size: 0.02, price: 50_500, orderType: 'market' }));

    assert.equal(ack.status, 'filled');
    if (ack.status !== 'filled') return;
    assert.equal(ack.filledSize, 0.02);
    assert.ok(Math.abs(ack.avgPrice - 50_025) < 1e-6);
  });

  it('reports positions with margin and isolated liquidation price', async () => {
    const { market, gateway } = setup();
    await gateway.updateLeverage('ETH', '', 5);
    await gateway.placeOrder(order({}));
    market.set('ETH', 2_100);

    const state = await gateway.getAccountState();

    assert.equal(state.equity, 10_100);
    assert.equal(state.totalMarginUsed, 400);
    assert.equal(state.withdrawable, 9_700);
    assert.deepEqual(state.positions[0], {
      coin: 'ETH',
      dex: '',
      side: 'long',
      size: 1,
      entryPrice: 2_000,
      markPrice: 2_100,
      leverage: 5,
      marginUsed: 400,
      liquidationPrice: 1_600,
      unrealizedPnl: 100,
      notionalUsd: 2_100,
    });
  });

  it('fires a crossed stop and drops the sibling take-profit', async () => {
    const { market, gateway } = setup();
    await gateway.updateLeverage('ETH', '', 5);
    await gateway.placeOrder(order({}));
    const stop = await gateway.placeOrder(
      order({ isBuy: false, orderType: 'trigger', price: 1_900, triggerPrice: 1_900, tpsl: 'sl', reduceOnly: true }),
    );
    await gateway.placeOrder(
      order({ isBuy: false, orderType: 'trigger', price: 2_200, triggerPrice: 2_200, tpsl: 'tp', reduceOnly: true }),
    );
    assert.equal(gateway.restingOrders.length, 2);

    market.set('ETH', 1_890);
    const fills = await gateway.checkRestingOrders();

    assert.deepEqual(fills, [
      {
        orderId: stop.orderId,
        coin: 'ETH',
        dex: '',
        isBuy: false,
        size: 1,
        price: 1_900,
        realizedPnl: -100,
        kind: 'stop_loss',
      },
    ]);
    assert.equal(gateway.restingOrders.length, 0);
    assert.equal(gateway.cashBalance, 9_900);
    assert.deepEqual((await gateway.getAccountState()).positions, []);
  });

  it('drops the old side\'s triggers when an order flips the position', async () => {
    const { gateway } = setup();
    await gateway.updateLeverage('ETH', '', 5);
    await gateway.placeOrder(order({}));
    await gateway.placeOrder(
      order({ isBuy: false, orderType: 'trigger', price: 1_900, triggerPrice: 1_900, tpsl: 'sl', reduceOnly: true }),
    );

    await gateway.placeOrder(order({ isBuy: false, size: 3, price: 1_980, orderType: 'market' }));

    const [pos] = (await gateway.getAccountState()).positions;
    assert.equal(pos?.side, 'short');
    assert.equal(pos?.size, -2);
    assert.ok(Math.abs((pos?.entryPrice ?? 0) - 1_999) < 1e-6);
    assert.deepEqual(gateway.restingOrders, []);
  });

  it('rests a limit away from the market and fills it once the price comes through', async () => {
    const { market, gateway } = setup();
    const ack = await gateway.placeOrder(order({ size: 0.5, price: 1_950 }));
    assert.equal(ack.status, 'resting');

    assert.deepEqual(await gateway.checkRestingOrders(), []);

    market.set('ETH', 1_940);
    const fills = await gateway.checkRestingOrders();
    assert.equal(fills.length, 1);
    assert.equal(fills[0]?.kind, 'limit');
    assert.equal(fills[0]?.price, 1_950);
    assert.equal(fills[0]?.size, 0.5);
  });

  it('rejects reduce-only orders without a position to reduce', async () => {
    const { gateway } = setup();
    await assert.rejects(
      gateway.placeOrder(order({ isBuy: false, orderType: 'market', reduceOnly: true })),
      gatewayError('Unknown', 'Reduce only order would increase position'),
    );
  });

  it('rejects an entry the balance cannot margin', async () => {
    const { gateway } = setup(1_000);
    await assert.rejects(
      gateway.placeOrder(order({ coin: 'BTC', size: 1, price: 51_000, orderType: 'market' })),
      gatewayError('InsufficientMargin', 'Insufficient margin to place order'),
    );
  });

  it('refuses leverage over the market maximum', async () => {
    const { gateway } = setup();
    await assert.rejects(gateway.updateLeverage('ETH', '', 60), gatewayError('Unknown', 'Leverage 60x exceeds 50x for ETH'));
  });

  it('modifies and cancels resting orders', async () => {
    const { gateway } = setup();
    const ack = await gateway.placeOrder(order({ price: 1_900 }));

    await gateway.modifyOrder('ETH', '', ack.orderId, 1_850, 2);
    assert.equal(gateway.restingOrders[0]?.request.price, 1_850);
    assert.equal(gateway.restingOrders[0]?.request.size, 2);

    await gateway.cancelOrder('ETH', '', ack.orderId);
    assert.equal(gateway.restingOrders.length, 0);
    await assert.rejects(
      gateway.cancelOrder('ETH', '', ack.orderId),
      gatewayError('Unknown', `Order ${ack.orderId} not found`),
    );
  });
});
