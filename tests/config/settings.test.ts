import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { loadAppConfig } from '../../src/config/env.js';
import { DEFAULT_RISK_LIMITS, defaultCoinConfig } from '../../src/config/risk.js';
import { SettingsService } from '../../src/config/settingsService.js';
import { createMemoryRepositories } from '../../src/database/memoryStore.js';

function service() {
  const repos = createMemoryRepositories();
  return new SettingsService(repos.settings, repos.coins, { limits: { ...DEFAULT_RISK_LIMITS }, botEnabled: true });
}

describe('Settings', () => {
  describe('risk limits', () => {
    it('serves the defaults until something is saved', async () => {
      assert.deepEqual(await service().getRiskConfig(), { limits: DEFAULT_RISK_LIMITS, botEnabled: true });
    });

    it('merges a partial update and keeps it', async () => {
      const settings = service();
      const result = await settings.updateRiskLimits({ maxLeverage: 5, maxDailyTrades: 8 });

      assert.deepEqual(result, { success: true, value: { ...DEFAULT_RISK_LIMITS, maxLeverage: 5, maxDailyTrades: 8 } });
      assert.equal((await settings.getRiskLimits()).maxLeverage, 5);
    });

    it('rejects out-of-range values and unknown fields', async () => {
      const settings = service();
      assert.deepEqual(await settings.updateRiskLimits({ maxLeverage: 200 }), {
        success: false,
        error: 'maxLeverage: Number must be less than or equal to 100',
      });
      assert.deepEqual(await settings.updateRiskLimits({ maxLeverag: 5 }), {
        success: false,
        error: "body: Unrecognized key(s) in object: 'maxLeverag'",
      });
      assert.equal((await settings.getRiskLimits()).maxLeverage, DEFAULT_RISK_LIMITS.maxLeverage);
    });

    it('switches the bot off without touching the limits', async () => {
      const settings = service();
      await settings.updateRiskLimits({ maxOpenPositions: 2 });
      const config = await settings.setBotEnabled(false);

      assert.equal(config.botEnabled, false);
      assert.equal(config.limits.maxOpenPositions, 2);
    });
  });

  describe('coin config', () => {
    it('falls back to built-in defaults for an unknown coin', async () => {
      assert.deepEqual(await service().getCoinConfig('TSLA', 'xyz'), defaultCoinConfig('TSLA', 'xyz'));
      assert.equal(defaultCoinConfig('TSLA', 'xyz').category, 'HIP-3');
    });

    it('stores a validated coin config and lists it by category', async () => {
      const settings = service();
      const result = await settings.upsertCoinConfig({
        coin: 'PEPE',
        category: 'MEMES',
        enabled: true,
        defaultLeverage: 3,
        defaultCollateralUsd: 50,
        maxLeverage: 5,
      });

      assert.equal(result.success, true);
      assert.equal((await settings.getCoinConfig('PEPE')).maxLeverage, 5);
      assert.deepEqual(
        (await settings.listCoins('MEMES')).map((c) => c.coin),
        ['PEPE'],
      );
      assert.deepEqual(await settings.listCoins('L1s'), []);
    });

    it('rejects a config with an unknown category', async () => {
      const result = await service().upsertCoinConfig({
        coin: 'PEPE',
        category: 'FROGS',
        enabled: true,
        defaultLeverage: 3,
        defaultCollateralUsd: 50,
      });
      assert.equal(result.success, false);
    });

    it('rejects take-profit sizes that close more than the position', async () => {
      const settings = service();
      const result = await settings.upsertCoinConfig({
        coin: 'SOL',
        category: 'L1s',
        enabled: true,
        defaultLeverage: 3,
        defaultCollateralUsd: 50,
        tp1Pct: 50,
        tp1SizePct: 60,
        tp2Pct: 100,
        tp2SizePct: 50,
      });

      assert.deepEqual(result, { success: false, error: 'tp2SizePct: tp1SizePct + tp2SizePct must not exceed 100' });
      assert.deepEqual(await settings.getCoinConfig('SOL'), defaultCoinConfig('SOL'));
    });
  });

  describe('environment', () => {
    it('defaults to testnet paper trading and parses overrides', () => {
      const config = loadAppConfig({
        HL_DEXES: ' XYZ, abc ,',
        RISK_MAX_LEVERAGE: '7',
        RISK_MAX_DAILY_TRADES: 'lots',
        WEBHOOK_SECRET: 'test-secret',
      });

      assert.equal(config.port, 5000);
      assert.equal(config.useTestnet, true);
      assert.equal(config.paperTrading, true);
      assert.equal(config.paperBalance, 10_000);
      assert.deepEqual(config.dexes, ['xyz', 'abc']);
      assert.equal(config.riskLimits.maxLeverage, 7);
      assert.equal(config.riskLimits.maxDailyTrades, DEFAULT_RISK_LIMITS.maxDailyTrades);
      assert.equal(config.webhookSecret, 'test-secret');
      assert.equal(config.supabaseUrl, undefined);
    });

    it('goes live only when both switches are off', () => {
      const config = loadAppConfig({ USE_TESTNET: 'FALSE', PAPER_TRADING: 'false' });
      assert.equal(config.useTestnet, false);
      assert.equal(config.paperTrading, false);
    });
  });
});
