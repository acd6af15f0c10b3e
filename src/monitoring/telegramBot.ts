// ============================================================
// Telegram Bot - Trade Alerts & Status Commands
// /status /risk /positions /pause /resume /help
// ============================================================

import TelegramBot from 'node-telegram-bot-api';
import type { RiskConfig, RiskState } from '../types/index.js';
import type { Clock } from '../execution/clock.js';
import type { ExchangeGateway } from '../execution/exchangeGateway.js';
import { assetName } from '../execution/exchangeGateway.js';
import type { DailyStats } from '../execution/tradeService.js';
import { errorMessage } from '../errors.js';
import { createModuleLogger } from './logger.js';

const log = createModuleLogger('TelegramBot');

let bot: TelegramBot | null = null;
let chatId: string | null = null;

/** What the command handlers read from and act on. */
export interface BotContext {
  gateway: Pick<ExchangeGateway, 'getAccountState'>;
  loadRiskState(now: Date): Promise<RiskState>;
  getRiskConfig(): Promise<RiskConfig>;
  getDailyStats(now: Date): Promise<DailyStats>;
  pause(minutes: number, now: Date): Promise<RiskState>;
  resume(): Promise<RiskState>;
  clock: Clock;
  mode: { paperTrading: boolean; testnet: boolean };
}

const DEFAULT_PAUSE_MINUTES = 60;

// --------------- Initialization ---------------

/**
 * Start the bot when a token is configured. Commands are only
 * answered in the configured chat.
 */
export function initTelegramBot(token: string | undefined, targetChatId: string | undefined, ctx: BotContext): void {
  chatId = targetChatId ?? null;

  if (!token) {
    log.info('TELEGRAM_BOT_TOKEN not set, Telegram alerts disabled');
    return;
  }

  try {
    bot = new TelegramBot(token, { polling: true });
    registerCommands(ctx);
    log.info('Telegram bot initialized');
  } catch (err) {
    log.warn(`Telegram bot init failed: ${errorMessage(err)}`);
    bot = null;
  }
}

export async function stopTelegramBot(): Promise<void> {
  if (!bot) return;
  await bot.stopPolling();
  bot = null;
}

// --------------- Commands ---------------

function registerCommands(ctx: BotContext): void {
  if (!bot) return;

  bot.on('message', (msg) => {
    const replyTo = String(msg.chat.id);
    if (chatId && replyTo !== chatId) return;

    handleCommand(msg.text ?? '', ctx)
      .then((reply) => (reply ? sendToChat(replyTo, reply) : undefined))
      .catch((err: unknown) => log.warn(`Command failed: ${errorMessage(err)}`));
  });
}

function signedUsd(n: number): string {
  return `${n >= 0 ? '+' : '-'}$${Math.abs(n).toFixed(2)}`;
}

function pauseLine(state: RiskState, now: Date): string {
  if (!state.tradingPausedUntil || state.tradingPausedUntil.getTime() <= now.getTime()) {
    return 'Circuit breaker: 🟢 inactive';
  }
  return `Circuit breaker: 🔴 paused until ${state.tradingPausedUntil.toISOString().slice(0, 16)}Z`;
}

/**
 * Reply text for a chat message, or null when it is not a command.
 *
 * @param text - Raw message text, e.g. "/pause 30"
 */
export async function handleCommand(text: string, ctx: BotContext): Promise<string | null> {
  const [command, arg] = text.trim().split(/\s+/);
  const now = ctx.clock.now();

  switch (command) {
    case '/status': {
      const [snapshot, config, state] = await Promise.all([
        ctx.gateway.getAccountState(),
        ctx.getRiskConfig(),
        ctx.loadRiskState(now),
      ]);
      return [
        '🤖 <b>Signal Bridge Status</b>',
        `Mode: ${ctx.mode.paperTrading ? 'PAPER' : 'LIVE'} | ${ctx.mode.testnet ? 'testnet' : 'mainnet'}`,
        `Bot: ${config.botEnabled ? '🟢 enabled' : '🔴 disabled'}`,
        `Equity: $${snapshot.equity.toFixed(2)} | Withdrawable: $${snapshot.withdrawable.toFixed(2)}`,
        `Open positions: ${snapshot.positions.length}`,
        pauseLine(state, now),
      ].join('\n');
    }

    case '/risk': {
      const [config, state, stats] = await Promise.all([
        ctx.getRiskConfig(),
        ctx.loadRiskState(now),
        ctx.getDailyStats(now),
      ]);
      const { limits } = config;
      return [
        '🛡️ <b>Risk State</b>',
        '────────────',
        `Trades today: ${state.dailyTradeCount}/${limits.maxDailyTrades}`,
        `Daily PnL: ${signedUsd(state.dailyRealizedPnl)} (limit -$${limits.maxDailyLossUsd.toFixed(2)})`,
        `Consecutive losses: ${state.consecutiveLosses}/${limits.consecutiveLossPauseThreshold}`,
        `Win rate today: ${stats.winRate.toFixed(1)}% (${stats.wins}W/${stats.losses}L)`,
        `Max leverage: ${limits.maxLeverage}x | Max positions: ${limits.maxOpenPositions}`,
        pauseLine(state, now),
      ].join('\n');
    }

    case '/positions': {
      const snapshot = await ctx.gateway.getAccountState();
      if (snapshot.positions.length === 0) return '📭 No open positions';
      const lines = [`📂 <b>Open Positions (${snapshot.positions.length})</b>`];
      for (const p of snapshot.positions) {
        lines.push(
          `${p.side.toUpperCase()} ${assetName(p.coin, p.dex)} | Size: ${Math.abs(p.size)} | Lev: ${p.leverage}x\n` +
            `  Entry: ${p.entryPrice.toFixed(4)} | Mark: ${p.markPrice.toFixed(4)} | uPnL: ${signedUsd(p.unrealizedPnl)}`,
        );
      }
      return lines.join('\n');
    }

    case '/pause': {
      const minutes = arg === undefined ? DEFAULT_PAUSE_MINUTES : Number(arg);
      if (!Number.isInteger(minutes) || minutes < 1) return '⚠️ Usage: /pause [minutes]';
      const state = await ctx.pause(minutes, now);
      log.warn(`Trading paused for ${minutes} minute(s) via Telegram`);
      return `🔴 <b>Trading paused</b> until ${state.tradingPausedUntil?.toISOString().slice(0, 16) ?? '?'}Z`;
    }

    case '/resume': {
      await ctx.resume();
      log.info('Trading resumed via Telegram');
      return '🟢 <b>Trading resumed</b>';
    }

    case '/help':
      return [
        '🤖 <b>Signal Bridge Commands</b>',
        '/status    Mode, equity, positions, breaker',
        '/risk      Daily counters against limits',
        '/positions Open positions with unrealized PnL',
        '/pause [m] Pause new entries (default 60 min)',
        '/resume    Clear the pause',
        '/help      This message',
      ].join('\n');

    default:
      return null;
  }
}

// --------------- Core Messaging ---------------

async function sendToChat(targetChatId: string, message: string): Promise<void> {
  if (!bot) {
    log.debug(`[Telegram disabled] ${message}`);
    return;
  }
  await bot.sendMessage(targetChatId, message, { parse_mode: 'HTML' });
}

/**
 * Send an alert to the configured chat.
 * Falls back to logging if Telegram is not configured.
 */
export async function sendAlert(message: string): Promise<void> {
  if (!bot || !chatId) {
    log.info(`[ALERT] ${message}`);
    return;
  }
  try {
    await bot.sendMessage(chatId, message, { parse_mode: 'HTML' });
  } catch (err) {
    log.warn(`Failed to send Telegram alert: ${errorMessage(err)}`);
  }
}
