// ============================================================
// In-Memory Store
// ============================================================
// Used when Supabase is not configured, and by tests.
// State is lost on restart.
// ============================================================

import type {
  ActivityEntry,
  CoinCategory,
  CoinConfig,
  RiskConfig,
  RiskState,
  TradeRecord,
} from '../types/index.js';
import { utcDay } from '../execution/clock.js';
import { positionKey } from '../execution/exchangeGateway.js';
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

/** Keep at most this many activity entries */
const ACTIVITY_CAP = 1_000;

export class InMemoryTradeRepository implements TradeRepository {
  private readonly trades = new Map<string, TradeRecord>();

  async insert(trade: TradeRecord): Promise<void> {
    this.trades.set(trade.id, { ...trade });
  }

  async update(trade: TradeRecord): Promise<void> {
    this.trades.set(trade.id, { ...trade });
  }

  async findOpen(coin: string, dex: string): Promise<TradeRecord | null> {
    const key = positionKey(coin, dex);
    const open = [...this.trades.values()].filter(
      (t) => t.status === 'open' && positionKey(t.coin, t.dex) === key,
    );
    open.sort((a, b) => b.openedAt.getTime() - a.openedAt.getTime());
    const found = open[0];
    return found ? { ...found } : null;
  }

  async listOpen(): Promise<TradeRecord[]> {
    return this.list({ status: 'open' });
  }

  async list(query: TradeQuery = {}): Promise<TradeRecord[]> {
    const rows = [...this.trades.values()]
      .filter((t) => query.status === undefined || t.status === query.status)
      .filter((t) => query.coin === undefined || t.coin === query.coin)
      .filter((t) => {
        if (query.closedSince === undefined) return true;
        return t.closedAt !== undefined && t.closedAt.getTime() >= query.closedSince.getTime();
      })
      .sort((a, b) => b.openedAt.getTime() - a.openedAt.getTime())
      .map((t) => ({ ...t }));
    return query.limit === undefined ? rows : rows.slice(0, query.limit);
  }
}

export class InMemoryRiskStateStore implements RiskStateStore {
  private state: RiskState;

  constructor(initial?: RiskState) {
    this.state = initial ?? emptyRiskState(utcDay(new Date()));
  }

  async load(): Promise<RiskState> {
    return { ...this.state };
  }

  // Read and write happen in the same tick, so updates never interleave
  async update(mutate: (state: RiskState) => RiskState): Promise<RiskState> {
    this.state = mutate({ ...this.state });
    return { ...this.state };
  }
}

export class InMemorySettingsStore implements SettingsStore {
  private config: RiskConfig | null = null;

  async getRiskConfig(): Promise<RiskConfig | null> {
    return this.config ? { ...this.config, limits: { ...this.config.limits } } : null;
  }

  async saveRiskConfig(config: RiskConfig): Promise<void> {
    this.config = { ...config, limits: { ...config.limits } };
  }
}

export class InMemoryCoinConfigStore implements CoinConfigStore {
  private readonly coins = new Map<string, CoinConfig>();

  async get(coin: string, dex: string): Promise<CoinConfig | null> {
    const found = this.coins.get(positionKey(coin, dex));
    return found ? { ...found } : null;
  }

  async upsert(config: CoinConfig): Promise<void> {
    this.coins.set(positionKey(config.coin, config.dex), { ...config });
  }

  async list(category?: CoinCategory): Promise<CoinConfig[]> {
    return [...this.coins.values()]
      .filter((c) => category === undefined || c.category === category)
      .sort((a, b) => a.coin.localeCompare(b.coin))
      .map((c) => ({ ...c }));
  }
}

export class InMemoryActivityLog implements ActivityLog {
  private readonly entries: ActivityEntry[] = [];

  async record(entry: ActivityEntry): Promise<void> {
    this.entries.push(entry);
    if (this.entries.length > ACTIVITY_CAP) this.entries.shift();
  }

  async recent(limit: number): Promise<ActivityEntry[]> {
    return this.entries.slice(-limit).reverse();
  }
}

export function createMemoryRepositories(initialRisk?: RiskState): Repositories {
  return {
    trades: new InMemoryTradeRepository(),
    riskState: new InMemoryRiskStateStore(initialRisk),
    settings: new InMemorySettingsStore(),
    coins: new InMemoryCoinConfigStore(),
    activity: new InMemoryActivityLog(),
  };
}
