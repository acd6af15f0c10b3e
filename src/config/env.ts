// ============================================================
// Application Configuration (environment)
// ============================================================

import type { RiskLimits } from '../types/index.js';
import { riskLimitsFromEnv } from './risk.js';

export interface AppConfig {
  port: number;
  webhookSecret: string;
  apiToken: string;
  useTestnet: boolean;
  paperTrading: boolean;
  paperBalance: number;
  mainWallet: string;
  /** HIP-3 builder dexes whose positions are tracked alongside native perps */
  dexes: string[];
  botEnabled: boolean;
  riskLimits: RiskLimits;
  supabaseUrl?: string;
  supabaseKey?: string;
  telegramToken?: string;
  telegramChatId?: string;
}

/**
 * Build the typed application config from environment variables.
 * Testnet and paper trading are the defaults; both must be switched off explicitly.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: Number(env['PORT'] ?? '5000'),
    webhookSecret: env['WEBHOOK_SECRET'] ?? '',
    apiToken: env['API_TOKEN'] ?? '',
    useTestnet: (env['USE_TESTNET'] ?? 'true').toLowerCase() === 'true',
    paperTrading: (env['PAPER_TRADING'] ?? 'true').toLowerCase() === 'true',
    paperBalance: parseFloat(env['PAPER_BALANCE'] ?? '10000'),
    mainWallet: env['HL_MAIN_WALLET'] ?? '',
    dexes: (env['HL_DEXES'] ?? '')
      .split(',')
      .map((d) => d.trim().toLowerCase())
      .filter((d) => d.length > 0),
    botEnabled: (env['BOT_ENABLED'] ?? 'true').toLowerCase() === 'true',
    riskLimits: riskLimitsFromEnv(env),
    supabaseUrl: env['SUPABASE_URL'] || undefined,
    supabaseKey: env['SUPABASE_ANON_KEY'] || undefined,
    telegramToken: env['TELEGRAM_BOT_TOKEN'] || undefined,
    telegramChatId: env['TELEGRAM_CHAT_ID'] || undefined,
  };
}
