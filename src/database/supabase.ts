// ============================================================
// Supabase Client & Repositories
// ============================================================
// Tables: trades, risk_state, settings, coin_configs,
// activity_log (see sql/schema.sql).
// Falls back to the in-memory store when not configured.
// ============================================================

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type {
  ActivityEntry,
  CoinCategory,
  CoinConfig,
  RiskConfig,
  RiskState,
  TradeRecord,
} from '../types/index.js';
import { PersistenceError } from '../errors.js';
import { utcDay } from '../execution/clock.js';
import { createModuleLogger } from '../monitoring/logger.js';
import { createMemoryRepositories } from './memoryStore.js';
import {
  emptyRiskState,
  type ActivityLog,
  type CoinConfigStore,
  type Repositories,
  type RiskStateStore,
  type SettingsStore,
  type TradeQuery,
  type TradeRepository,
} from './repositories.js';

const log = createModuleLogger('Supabase');

/** risk_state is a single row */
const RISK_STATE_ID = 1;
/** Compare-and-set attempts before giving up on a contended risk_state write */
const CAS_ATTEMPTS = 5;

let supabaseInstance: SupabaseClient | null = null;

export interface SupabaseSettings {
  supabaseUrl?: string;
  supabaseKey?: string;
}

/**
 * Initialize and return the Supabase client (singleton).
 * Returns null if the URL or key is not configured.
 */
export function getSupabaseClient(settings: SupabaseSettings): SupabaseClient | null {
  if (supabaseInstance) return supabaseInstance;

  const url = settings.supabaseUrl;
  const key = settings.supabaseKey;

  if (!url || !key) {
    return null;
  }

  supabaseInstance = createClient(url, key, {
    auth: { persistSession: false },
  });

  return supabaseInstance;
}

// --------------- Row Schemas ---------------

const num = z.union([z.number(), z.string()]).transform((v) => Number(v));
const optNum = num.nullish().transform((v) => (v === null || v === undefined ? undefined : v));
const optStr = z.string().nullish().transform((v) => v ?? undefined);
const date = z.string().transform((v) => new Date(v));

const tradeRowSchema = z.object({
  id: z.string(),
  opened_at: date,
  coin: z.string(),
  dex: z.string().nullish().transform((v) => v ?? ''),
  side: z.enum(['long', 'short']),
  size: num,
  entry_price: num,
  exit_price: optNum,
  leverage: num,
  collateral_usd: num,
  stop_loss_price: optNum,
  take_profit_prices: z.array(num).nullish().transform((v) => v ?? []),
  order_id: optStr,
  status: z.enum(['open', 'closed', 'liquidated']),
  close_reason: z.enum(['manual', 'signal', 'stop_loss', 'take_profit', 'liquidation']).nullish().transform((v) => v ?? undefined),
  realized_pnl: optNum,
  pnl_pct: optNum,
  partial_pnl: num.nullish().transform((v) => v ?? 0),
  source: z.enum(['webhook', 'manual', 'category_batch', 'reconciled']),
  indicator: optStr,
  closed_at: z.string().nullish().transform((v) => (v ? new Date(v) : undefined)),
  notes: optStr,
});

const riskStateRowSchema = z.object({
  trading_day: z.string(),
  daily_trade_count: num,
  daily_realized_pnl: num,
  consecutive_losses: num,
  trading_paused_until: z.string().nullish().transform((v) => (v ? new Date(v) : null)),
  version: num,
});

const riskConfigSchema = z.object({
  limits: z.object({
    maxPositionValueUsd: z.number(),
    maxTotalExposurePct: z.number(),
    maxLeverage: z.number(),
    maxDailyLossUsd: z.number(),
    maxDailyTrades: z.number(),
    maxOpenPositions: z.number(),
    consecutiveLossPauseThreshold: z.number(),
    pauseDurationMinutes: z.number(),
  }),
  botEnabled: z.boolean(),
});

const coinRowSchema = z.object({
  coin: z.string(),
  dex: z.string().nullish().transform((v) => v ?? ''),
  category: z.enum(['L1s', 'APPS', 'MEMES', 'HIP-3']),
  enabled: z.boolean(),
  max_leverage: optNum,
  max_position_value_usd: optNum,
  default_leverage: num,
  default_collateral_usd: num,
  default_stop_loss_pct: optNum,
  tp1_pct: optNum,
  tp1_size_pct: optNum,
  tp2_pct: optNum,
  tp2_size_pct: optNum,
  exchange_max_leverage: optNum,
  sz_decimals: optNum,
});

const activityRowSchema = z.object({
  level: z.enum(['info', 'warning', 'error']),
  category: z.enum(['risk', 'trade', 'webhook', 'reconcile', 'settings']),
  message: z.string(),
  details: z.record(z.string(), z.unknown()).nullish().transform((v) => v ?? undefined),
  created_at: date,
});

function parseRows<S extends z.ZodTypeAny>(schema: S, rows: unknown, table: string): z.output<S>[] {
  const parsed = z.array(schema).safeParse(rows ?? []);
  if (!parsed.success) {
    throw new PersistenceError(`read ${table}`, parsed.error.issues[0]?.message ?? 'malformed row');
  }
  return parsed.data;
}

// --------------- Row Mappers ---------------

type TradeRow = z.output<typeof tradeRowSchema>;

function rowToTrade(row: TradeRow): TradeRecord {
  return {
    id: row.id,
    openedAt: row.opened_at,
    coin: row.coin,
    dex: row.dex,
    side: row.side,
    size: row.size,
    entryPrice: row.entry_price,
    exitPrice: row.exit_price,
    leverage: row.leverage,
    collateralUsd: row.collateral_usd,
    stopLossPrice: row.stop_loss_price,
    takeProfitPrices: row.take_profit_prices,
    orderId: row.order_id,
    status: row.status,
    closeReason: row.close_reason,
    realizedPnl: row.realized_pnl,
    pnlPct: row.pnl_pct,
    partialPnl: row.partial_pnl,
    source: row.source,
    indicator: row.indicator,
    closedAt: row.closed_at,
    notes: row.notes,
  };
}

function tradeToRow(trade: TradeRecord): Record<string, unknown> {
  return {
    id: trade.id,
    opened_at: trade.openedAt.toISOString(),
    coin: trade.coin,
    dex: trade.dex,
    side: trade.side,
    size: trade.size,
    entry_price: trade.entryPrice,
    exit_price: trade.exitPrice ?? null,
    leverage: trade.leverage,
    collateral_usd: trade.collateralUsd,
    stop_loss_price: trade.stopLossPrice ?? null,
    take_profit_prices: trade.takeProfitPrices,
    order_id: trade.orderId ?? null,
    status: trade.status,
    close_reason: trade.closeReason ?? null,
    realized_pnl: trade.realizedPnl ?? null,
    pnl_pct: trade.pnlPct ?? null,
    partial_pnl: trade.partialPnl,
    source: trade.source,
    indicator: trade.indicator ?? null,
    closed_at: trade.closedAt?.toISOString() ?? null,
    notes: trade.notes ?? null,
  };
}

function rowToCoin(row: z.output<typeof coinRowSchema>): CoinConfig {
  return {
    coin: row.coin,
    dex: row.dex,
    category: row.category,
    enabled: row.enabled,
    maxLeverage: row.max_leverage,
    maxPositionValueUsd: row.max_position_value_usd,
    defaultLeverage: row.default_leverage,
    defaultCollateralUsd: row.default_collateral_usd,
    defaultStopLossPct: row.default_stop_loss_pct,
    tp1Pct: row.tp1_pct,
    tp1SizePct: row.tp1_size_pct,
    tp2Pct: row.tp2_pct,
    tp2SizePct: row.tp2_size_pct,
    exchangeMaxLeverage: row.exchange_max_leverage,
    szDecimals: row.sz_decimals,
  };
}

function coinToRow(c: CoinConfig): Record<string, unknown> {
  return {
    coin: c.coin,
    dex: c.dex,
    category: c.category,
    enabled: c.enabled,
    max_leverage: c.maxLeverage ?? null,
    max_position_value_usd: c.maxPositionValueUsd ?? null,
    default_leverage: c.defaultLeverage,
    default_collateral_usd: c.defaultCollateralUsd,
    default_stop_loss_pct: c.defaultStopLossPct ?? null,
    tp1_pct: c.tp1Pct ?? null,
    tp1_size_pct: c.tp1SizePct ?? null,
    tp2_pct: c.tp2Pct ?? null,
    tp2_size_pct: c.tp2SizePct ?? null,
    exchange_max_leverage: c.exchangeMaxLeverage ?? null,
    sz_decimals: c.szDecimals ?? null,
  };
}

// --------------- Repositories ---------------

export class SupabaseTradeRepository implements TradeRepository {
  constructor(private readonly client: SupabaseClient) {}

  async insert(trade: TradeRecord): Promise<void> {
    const { error } = await this.client.from('trades').insert(tradeToRow(trade));
    if (error) throw new PersistenceError('insert trade', error.message);
  }

  async update(trade: TradeRecord): Promise<void> {
    const { error } = await this.client.from('trades').update(tradeToRow(trade)).eq('id', trade.id);
    if (error) throw new PersistenceError('update trade', error.message);
  }

  async findOpen(coin: string, dex: string): Promise<TradeRecord | null> {
    const { data, error } = await this.client
      .from('trades')
      .select('*')
      .eq('coin', coin)
      .eq('dex', dex)
      .eq('status', 'open')
      .order('opened_at', { ascending: false })
      .limit(1);
    if (error) throw new PersistenceError('find open trade', error.message);
    const first = parseRows(tradeRowSchema, data, 'trades')[0];
    return first ? rowToTrade(first) : null;
  }

  listOpen(): Promise<TradeRecord[]> {
    return this.list({ status: 'open' });
  }

  async list(query: TradeQuery = {}): Promise<TradeRecord[]> {
    let q = this.client.from('trades').select('*').order('opened_at', { ascending: false });
    if (query.status) q = q.eq('status', query.status);
    if (query.coin) q = q.eq('coin', query.coin);
    if (query.closedSince) q = q.gte('closed_at', query.closedSince.toISOString());
    if (query.limit !== undefined) q = q.limit(query.limit);

    const { data, error } = await q;
    if (error) throw new PersistenceError('list trades', error.message);
    return parseRows(tradeRowSchema, data, 'trades').map(rowToTrade);
  }
}

/**
 * risk_state singleton with optimistic concurrency: every write is
 * conditional on the version it read, and bumps it.
 */
export class SupabaseRiskStateStore implements RiskStateStore {
  constructor(private readonly client: SupabaseClient) {}

  private async read(): Promise<{ state: RiskState; version: number } | null> {
    const { data, error } = await this.client.from('risk_state').select('*').eq('id', RISK_STATE_ID).limit(1);
    if (error) throw new PersistenceError('read risk_state', error.message);
    const row = parseRows(riskStateRowSchema, data, 'risk_state')[0];
    if (!row) return null;
    return {
      version: row.version,
      state: {
        tradingDay: row.trading_day,
        dailyTradeCount: row.daily_trade_count,
        dailyRealizedPnl: row.daily_realized_pnl,
        consecutiveLosses: row.consecutive_losses,
        tradingPausedUntil: row.trading_paused_until,
      },
    };
  }

  private toRow(state: RiskState, version: number): Record<string, unknown> {
    return {
      id: RISK_STATE_ID,
      trading_day: state.tradingDay,
      daily_trade_count: state.dailyTradeCount,
      daily_realized_pnl: state.dailyRealizedPnl,
      consecutive_losses: state.consecutiveLosses,
      trading_paused_until: state.tradingPausedUntil?.toISOString() ?? null,
      version,
    };
  }

  async load(): Promise<RiskState> {
    const current = await this.read();
    return current ? current.state : emptyRiskState(utcDay(new Date()));
  }

  async update(mutate: (state: RiskState) => RiskState): Promise<RiskState> {
    for (let attempt = 1; attempt <= CAS_ATTEMPTS; attempt++) {
      const current = await this.read();

      if (!current) {
        const next = mutate(emptyRiskState(utcDay(new Date())));
        const { error } = await this.client.from('risk_state').insert(this.toRow(next, 1));
        if (!error) return next;
        // Lost the race to create the row; retry as an update
        log.debug(`risk_state insert conflict: ${error.message}`);
        continue;
      }

      const next = mutate({ ...current.state });
      const { data, error } = await this.client
        .from('risk_state')
        .update(this.toRow(next, current.version + 1))
        .eq('id', RISK_STATE_ID)
        .eq('version', current.version)
        .select('id');
      if (error) throw new PersistenceError('update risk_state', error.message);
      if (Array.isArray(data) && data.length > 0) return next;

      log.debug(`risk_state version ${current.version} changed underneath, retrying (${attempt}/${CAS_ATTEMPTS})`);
    }
    throw new PersistenceError('update risk_state', `contended after ${CAS_ATTEMPTS} attempts`);
  }
}

export class SupabaseSettingsStore implements SettingsStore {
  constructor(private readonly client: SupabaseClient) {}

  async getRiskConfig(): Promise<RiskConfig | null> {
    const { data, error } = await this.client.from('settings').select('value').eq('key', 'risk').limit(1);
    if (error) throw new PersistenceError('read settings', error.message);
    const row = parseRows(z.object({ value: riskConfigSchema }), data, 'settings')[0];
    return row ? row.value : null;
  }

  async saveRiskConfig(config: RiskConfig): Promise<void> {
    const { error } = await this.client
      .from('settings')
      .upsert({ key: 'risk', value: config, updated_at: new Date().toISOString() }, { onConflict: 'key' });
    if (error) throw new PersistenceError('save settings', error.message);
  }
}

export class SupabaseCoinConfigStore implements CoinConfigStore {
  constructor(private readonly client: SupabaseClient) {}

  async get(coin: string, dex: string): Promise<CoinConfig | null> {
    const { data, error } = await this.client.from('coin_configs').select('*').eq('coin', coin).eq('dex', dex).limit(1);
    if (error) throw new PersistenceError('read coin_configs', error.message);
    const row = parseRows(coinRowSchema, data, 'coin_configs')[0];
    return row ? rowToCoin(row) : null;
  }

  async upsert(config: CoinConfig): Promise<void> {
    const { error } = await this.client.from('coin_configs').upsert(coinToRow(config), { onConflict: 'coin,dex' });
    if (error) throw new PersistenceError('upsert coin_configs', error.message);
  }

  async list(category?: CoinCategory): Promise<CoinConfig[]> {
    let q = this.client.from('coin_configs').select('*').order('coin', { ascending: true });
    if (category) q = q.eq('category', category);
    const { data, error } = await q;
    if (error) throw new PersistenceError('list coin_configs', error.message);
    return parseRows(coinRowSchema, data, 'coin_configs').map(rowToCoin);
  }
}

export class SupabaseActivityLog implements ActivityLog {
  constructor(private readonly client: SupabaseClient) {}

  async record(entry: ActivityEntry): Promise<void> {
    const { error } = await this.client.from('activity_log').insert({
      level: entry.level,
      category: entry.category,
      message: entry.message,
      details: entry.details ?? null,
      created_at: entry.at.toISOString(),
    });
    if (error) throw new PersistenceError('insert activity_log', error.message);
  }

  async recent(limit: number): Promise<ActivityEntry[]> {
    const { data, error } = await this.client
      .from('activity_log')
      .select('*')
      .order('created_at', { ascending: false })
      .limit(limit);
    if (error) throw new PersistenceError('read activity_log', error.message);
    return parseRows(activityRowSchema, data, 'activity_log').map((row) => ({
      level: row.level,
      category: row.category,
      message: row.message,
      details: row.details,
      at: row.created_at,
    }));
  }
}

// --------------- Factory ---------------

/** Supabase-backed repositories, or in-memory ones when Supabase is not configured. */
export function createRepositories(settings: SupabaseSettings): Repositories {
  const client = getSupabaseClient(settings);
  if (!client) {
    log.warn('SUPABASE_URL / SUPABASE_ANON_KEY not set, using in-memory storage');
    return createMemoryRepositories();
  }
  log.info('Using Supabase storage');
  return {
    trades: new SupabaseTradeRepository(client),
    riskState: new SupabaseRiskStateStore(client),
    settings: new SupabaseSettingsStore(client),
    coins: new SupabaseCoinConfigStore(client),
    activity: new SupabaseActivityLog(client),
  };
}
