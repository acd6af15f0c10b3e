// ============================================================
// Service Wiring
// ============================================================
// Builds the gateway, coordinator, reconciler and services
// from the app config. index.ts owns process lifecycle.
// ============================================================

import type { AppConfig } from './config/env.js';
import { SettingsService } from './config/settingsService.js';
import type { Repositories } from './database/repositories.js';
import { errorMessage } from './errors.js';
import { ApiHandlers } from './api/handlers.js';
import { systemClock, type Clock } from './execution/clock.js';
import { ExecutionCoordinator } from './execution/executionCoordinator.js';
import type { ExchangeGateway } from './execution/exchangeGateway.js';
import { positionKey } from './execution/exchangeGateway.js';
import { HyperliquidGateway, HyperliquidInfoClient, type ActionSigner } from './execution/hyperliquidClient.js';
import { PaperGateway } from './execution/paperGateway.js';
import { StateReconciler, type ExitHint, type SyncReport } from './execution/stateReconciler.js';
import { TradeService, type Notify } from './execution/tradeService.js';
import { createModuleLogger } from './monitoring/logger.js';

const log = createModuleLogger('App');

export interface AppServices {
  gateway: ExchangeGateway;
  /** Set in paper mode: resting orders need a periodic check */
  paper: PaperGateway | null;
  coordinator: ExecutionCoordinator;
  reconciler: StateReconciler;
  settings: SettingsService;
  service: TradeService;
  handlers: ApiHandlers;
  repos: Repositories;
  clock: Clock;
}

export interface ServiceOverrides {
  /** Replaces the venue gateway entirely (tests) */
  gateway?: ExchangeGateway;
  /** Required for live trading */
  signer?: ActionSigner;
  notify?: Notify;
  clock?: Clock;
  random?: () => number;
}

function buildGateway(config: AppConfig, overrides: ServiceOverrides): { gateway: ExchangeGateway; paper: PaperGateway | null } {
  if (overrides.gateway) {
    return { gateway: overrides.gateway, paper: overrides.gateway instanceof PaperGateway ? overrides.gateway : null };
  }

  const info = new HyperliquidInfoClient({ testnet: config.useTestnet });
  if (config.paperTrading) {
    const paper = new PaperGateway(info, config.paperBalance);
    return { gateway: paper, paper };
  }

  if (!overrides.signer) {
    throw new Error('Live trading needs a request signer; set PAPER_TRADING=true or provide one');
  }
  if (!config.mainWallet) throw new Error('HL_MAIN_WALLET is required for live trading');
  const gateway = new HyperliquidGateway({
    info,
    signer: overrides.signer,
    address: config.mainWallet,
    dexes: config.dexes,
  });
  return { gateway, paper: null };
}

export function createServices(config: AppConfig, repos: Repositories, overrides: ServiceOverrides = {}): AppServices {
  const clock = overrides.clock ?? systemClock;
  const { gateway, paper } = buildGateway(config, overrides);

  const settings = new SettingsService(repos.settings, repos.coins, {
    limits: config.riskLimits,
    botEnabled: config.botEnabled,
  });
  const coordinator = new ExecutionCoordinator(gateway, { clock, random: overrides.random });
  const reconciler = new StateReconciler(repos, {
    limits: () => settings.getRiskLimits(),
    clock,
    resolvePrice: async (coin, dex) => (await gateway.getMarket(coin, dex)).midPrice,
  });
  const service = new TradeService({
    gateway,
    coordinator,
    reconciler,
    settings,
    trades: repos.trades,
    activity: repos.activity,
    notify: overrides.notify,
    clock,
  });
  const handlers = new ApiHandlers({
    service,
    settings,
    reconciler,
    trades: repos.trades,
    activity: repos.activity,
    webhookSecret: config.webhookSecret,
    mode: { paperTrading: paper !== null, testnet: config.useTestnet },
    clock,
  });

  return { gateway, paper, coordinator, reconciler, settings, service, handlers, repos, clock };
}

// --------------- Periodic Jobs ---------------

/**
 * One sync cycle: fire due paper triggers, then heal trade records
 * toward a fresh snapshot.
 */
export async function runPositionSync(services: AppServices, notify: Notify): Promise<SyncReport> {
  const hints = new Map<string, ExitHint>();
  if (services.paper) {
    const fills = await services.paper.checkRestingOrders();
    for (const fill of fills) {
      if (fill.kind === 'limit') continue;
      hints.set(positionKey(fill.coin, fill.dex), { reason: fill.kind, price: fill.price });
    }
  }

  const isBusy = services.service.busyMarkets();
  const snapshot = await services.gateway.getAccountState();
  const report = await services.reconciler.syncWithSnapshot(snapshot, services.clock.now(), hints, isBusy);

  for (const trade of report.closed) {
    const pnl = trade.realizedPnl ?? 0;
    await notify(
      `${pnl >= 0 ? '✅' : '❌'} <b>Trade closed (${trade.closeReason ?? 'manual'})</b>: ${trade.coin}\n` +
        `PnL: <b>${pnl >= 0 ? '+' : ''}${pnl.toFixed(2)} USD</b>`,
    );
  }
  if (report.breakerTripped) {
    await notify(
      `🚨 <b>Circuit breaker</b>: trading paused until ${report.riskState.tradingPausedUntil?.toISOString() ?? '?'}`,
    );
  }
  return report;
}

/** Wraps a job so a failure is logged and the next tick still runs. */
export function guarded(name: string, job: () => Promise<unknown>): () => Promise<void> {
  return async () => {
    try {
      await job();
    } catch (err) {
      log.error(`${name} failed: ${errorMessage(err)}`);
    }
  };
}
