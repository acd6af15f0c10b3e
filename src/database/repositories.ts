// ============================================================
// Repository Interfaces
// ============================================================
// Storage seams used by the reconciler, settings and API.
// Backed by Supabase when configured, otherwise in memory.
// ============================================================

import type {
  ActivityEntry,
  CoinCategory,
  CoinConfig,
  RiskConfig,
  RiskState,
  TradeRecord,
  TradeStatus,
} from '../types/index.js';

export interface TradeQuery {
  status?: TradeStatus;
  coin?: string;
  limit?: number;
  /** Only trades closed at or after this time */
  closedSince?: Date;
}

export interface TradeRepository {
  insert(trade: TradeRecord): Promise<void>;
  update(trade: TradeRecord): Promise<void>;
  findOpen(coin: string, dex: string): Promise<TradeRecord | null>;
  listOpen(): Promise<TradeRecord[]>;
  /** Newest first */
  list(query?: TradeQuery): Promise<TradeRecord[]>;
}

/**
 * Singleton risk state. update() applies the mutator atomically:
 * no other update interleaves between its read and its write.
 */
export interface RiskStateStore {
  load(): Promise<RiskState>;
  update(mutate: (state: RiskState) => RiskState): Promise<RiskState>;
}

export interface SettingsStore {
  getRiskConfig(): Promise<RiskConfig | null>;
  saveRiskConfig(config: RiskConfig): Promise<void>;
}

export interface CoinConfigStore {
  get(coin: string, dex: string): Promise<CoinConfig | null>;
  upsert(config: CoinConfig): Promise<void>;
  list(category?: CoinCategory): Promise<CoinConfig[]>;
}

export interface ActivityLog {
  record(entry: ActivityEntry): Promise<void>;
  recent(limit: number): Promise<ActivityEntry[]>;
}

export interface Repositories {
  trades: TradeRepository;
  riskState: RiskStateStore;
  settings: SettingsStore;
  coins: CoinConfigStore;
  activity: ActivityLog;
}

export function emptyRiskState(tradingDay: string): RiskState {
  return {
    tradingDay,
    dailyTradeCount: 0,
    dailyRealizedPnl: 0,
    consecutiveLosses: 0,
    tradingPausedUntil: null,
  };
}
