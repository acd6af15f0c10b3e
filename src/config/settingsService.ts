// ============================================================
// Settings Service
// ============================================================
// Risk limits, bot switch and per-coin configuration.
// Reads fall back to environment defaults until the first save.
// ============================================================

import { z } from 'zod';
import type { CoinCategory, CoinConfig, RiskConfig, RiskLimits } from '../types/index.js';
import type { CoinConfigStore, SettingsStore } from '../database/repositories.js';
import { describeIssues } from '../errors.js';
import { createModuleLogger } from '../monitoring/logger.js';
import { defaultCoinConfig } from './risk.js';

const log = createModuleLogger('Settings');

export const riskLimitsUpdateSchema = z
  .object({
    maxPositionValueUsd: z.number().positive(),
    maxTotalExposurePct: z.number().positive().max(1000),
    maxLeverage: z.number().int().min(1).max(100),
    maxDailyLossUsd: z.number().positive(),
    maxDailyTrades: z.number().int().min(1),
    maxOpenPositions: z.number().int().min(1),
    consecutiveLossPauseThreshold: z.number().int().min(1),
    pauseDurationMinutes: z.number().int().min(1),
  })
  .partial()
  .strict();

export type RiskLimitsUpdate = z.infer<typeof riskLimitsUpdateSchema>;

export const coinConfigSchema = z
  .object({
    coin: z.string().min(1),
    dex: z.string().default(''),
    category: z.enum(['L1s', 'APPS', 'MEMES', 'HIP-3']),
    enabled: z.boolean(),
    maxLeverage: z.number().int().min(1).optional(),
    maxPositionValueUsd: z.number().positive().optional(),
    defaultLeverage: z.number().int().min(1),
    defaultCollateralUsd: z.number().positive(),
    defaultStopLossPct: z.number().positive().optional(),
    tp1Pct: z.number().positive().optional(),
    tp1SizePct: z.number().gt(0).max(100).optional(),
    tp2Pct: z.number().positive().optional(),
    tp2SizePct: z.number().gt(0).max(100).optional(),
    exchangeMaxLeverage: z.number().int().min(1).optional(),
    szDecimals: z.number().int().min(0).optional(),
  })
  .strict()
  .refine((c) => (c.tp1SizePct ?? 0) + (c.tp2SizePct ?? 0) <= 100, {
    message: 'tp1SizePct + tp2SizePct must not exceed 100',
    path: ['tp2SizePct'],
  });

export type UpdateResult<T> = { success: true; value: T } | { success: false; error: string };

export class SettingsService {
  constructor(
    private readonly store: SettingsStore,
    private readonly coins: CoinConfigStore,
    private readonly defaults: RiskConfig,
  ) {}

  async getRiskConfig(): Promise<RiskConfig> {
    return (await this.store.getRiskConfig()) ?? { ...this.defaults, limits: { ...this.defaults.limits } };
  }

  async getRiskLimits(): Promise<RiskLimits> {
    return (await this.getRiskConfig()).limits;
  }

  /** Validate and merge a partial update into the stored limits. */
  async updateRiskLimits(update: unknown): Promise<UpdateResult<RiskLimits>> {
    const parsed = riskLimitsUpdateSchema.safeParse(update);
    if (!parsed.success) return { success: false, error: describeIssues(parsed.error) };

    const current = await this.getRiskConfig();
    const limits: RiskLimits = { ...current.limits, ...parsed.data };
    await this.store.saveRiskConfig({ ...current, limits });
    log.info(`Risk limits updated: ${Object.keys(parsed.data).join(', ') || 'no changes'}`);
    return { success: true, value: limits };
  }

  async setBotEnabled(enabled: boolean): Promise<RiskConfig> {
    const current = await this.getRiskConfig();
    const next = { ...current, botEnabled: enabled };
    await this.store.saveRiskConfig(next);
    log.info(`Bot ${enabled ? 'ENABLED' : 'DISABLED'}`);
    return next;
  }

  /** Stored config for a coin, or the built-in defaults. */
  async getCoinConfig(coin: string, dex = ''): Promise<CoinConfig> {
    return (await this.coins.get(coin, dex)) ?? defaultCoinConfig(coin, dex);
  }

  async upsertCoinConfig(input: unknown): Promise<UpdateResult<CoinConfig>> {
    const parsed = coinConfigSchema.safeParse(input);
    if (!parsed.success) return { success: false, error: describeIssues(parsed.error) };
    const config: CoinConfig = parsed.data;
    await this.coins.upsert(config);
    log.info(`Coin config saved: ${config.dex ? `${config.dex}:` : ''}${config.coin} (${config.category})`);
    return { success: true, value: config };
  }

  listCoins(category?: CoinCategory): Promise<CoinConfig[]> {
    return this.coins.list(category);
  }
}
