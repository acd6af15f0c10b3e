// ============================================================
// Signal Bridge - Main Entry Point
// Webhook → Risk Engine → Order Planner → Execution → Reconcile
// ============================================================

import 'dotenv/config';
import { createServer } from 'node:http';
import cron from 'node-cron';
import { createModuleLogger } from './monitoring/logger.js';
import { initTelegramBot, sendAlert, stopTelegramBot } from './monitoring/telegramBot.js';
import { loadAppConfig } from './config/env.js';
import { createRepositories } from './database/supabase.js';
import { createServices, guarded, runPositionSync } from './app.js';
import { createApp } from './api/server.js';
import { errorMessage } from './errors.js';

const log = createModuleLogger('Main');

// --------------- Startup ---------------

async function main(): Promise<void> {
  const config = loadAppConfig();

  log.info('==============================================');
  log.info(' Signal Bridge starting...');
  log.info('==============================================');
  log.info(`Mode: ${config.paperTrading ? 'PAPER' : 'LIVE'} | Network: ${config.useTestnet ? 'testnet' : 'mainnet'}`);

  if (!config.webhookSecret) log.warn('WEBHOOK_SECRET not set, every webhook will be rejected');
  if (!config.apiToken) log.warn('API_TOKEN not set, /api is locked');

  const repos = createRepositories(config);
  const services = createServices(config, repos, { notify: sendAlert });

  initTelegramBot(config.telegramToken, config.telegramChatId, {
    gateway: services.gateway,
    loadRiskState: (now) => services.reconciler.loadRiskState(now),
    getRiskConfig: () => services.settings.getRiskConfig(),
    getDailyStats: (now) => services.service.getDailyStats(now),
    pause: (minutes, now) => services.reconciler.pause(minutes, now),
    resume: () => services.reconciler.resume(),
    clock: services.clock,
    mode: { paperTrading: config.paperTrading, testnet: config.useTestnet },
  });

  // Align records with the venue before taking signals
  await guarded('Initial sync', () => runPositionSync(services, sendAlert))();

  // --------------- Scheduled Jobs ---------------

  // Position sync + paper trigger evaluation every minute
  cron.schedule('* * * * *', guarded('Position sync', () => runPositionSync(services, sendAlert)));

  // UTC day boundary: roll the daily counters over
  cron.schedule(
    '0 0 * * *',
    guarded('Daily rollover', async () => {
      const state = await services.reconciler.loadRiskState(services.clock.now());
      log.info(`Daily risk counters reset for ${state.tradingDay}`);
    }),
    { timezone: 'UTC' },
  );

  // --------------- HTTP ---------------

  const app = createApp(services.handlers, config.apiToken);
  const server = createServer(app);

  server.listen(config.port, '0.0.0.0', () => {
    log.info(`Listening on http://0.0.0.0:${config.port}`);
  });

  await sendAlert(
    `🚀 <b>Signal Bridge started</b>\nMode: ${config.paperTrading ? 'PAPER' : 'LIVE'} | ${config.useTestnet ? 'testnet' : 'mainnet'}`,
  );

  // --------------- Shutdown ---------------

  const shutdown = async (signal: string): Promise<void> => {
    log.info(`Received ${signal}, shutting down gracefully...`);
    cron.getTasks().forEach((task) => task.stop());
    await stopTelegramBot().catch((err: unknown) => log.warn(`Telegram stop failed: ${errorMessage(err)}`));
    await sendAlert(`⛔ Signal Bridge stopping (${signal})`);

    server.close(() => {
      log.info('Server closed.');
      process.exit(0);
    });
    setTimeout(() => process.exit(1), 5000).unref();
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('uncaughtException', (err) => {
    log.error(`Uncaught exception: ${err.message}`, { stack: err.stack });
  });

  process.on('unhandledRejection', (reason) => {
    log.error(`Unhandled rejection: ${String(reason)}`);
  });
}

main().catch((err: unknown) => {
  log.error(`Fatal startup error: ${errorMessage(err)}`);
  process.exit(1);
});
