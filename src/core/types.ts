export type Chain = string;

export interface AssetSnapshot {
  readonly id: string;
  readonly chain: Chain;
  readonly symbol?: string;
  readonly liquidityUsd: number | null;
  readonly holders: number | null;
  readonly topHolderPercent: number | null;
  readonly poolAgeSeconds: number | null;
  readonly safetyProviderScore: number | null;
  readonly priceUsd?: number | null;
  readonly discoveredAt?: number;
}

export type RuleName =
  | "min_liquidity"
  | "min_holders"
  | "max_top_holder_percent"
  | "min_pool_age"
  | "max_pool_age"
  | "min_safety_provider_score";

export interface RuleOutcome {
  rule: RuleName;
  passed: boolean;
  observed: number | null;
  threshold: number;
  score: number;
}

export interface SafetyVerdict {
  accepted: boolean;
  score: number;
  rules: RuleOutcome[];
}

export type PositionStatus = "pending" | "open" | "closing" | "closed";

export type CloseReason =
  | "take_profit"
  | "stop_loss"
  | "trailing_stop"
  | "time_stop"
  | "stale_price"
  | "manual"
  | "error"
  | "entry_failed";

export interface Position {
  assetId: string;
  chain: Chain;
  entrySize: number;
  entryPrice: number | null;
  entryAt: number | null;
  highWater: number | null;
  lastPrice: number | null;
  lastPriceAt: number | null;
  status: PositionStatus;
  closeReason: CloseReason | null;
  closePrice: number | null;
  closedAt: number | null;
  realizedPnlPercent: number | null;
  exitFailed: boolean;
}

/** Durable form of a position, keyed by asset id in the store. */
export interface PositionRecord {
  assetId: string;
  chain: Chain;
  entryPrice: number;
  entrySize: number;
  entryAt: number;
  highWater: number;
  status: PositionStatus;
}

export interface PriceTick {
  assetId: string;
  price: number;
  timestamp: number;
}

export interface Fill {
  price: number;
  amountTokens: number;
  signature: string;
}

export interface TradeRecord {
  assetId: string;
  side: "buy" | "sell";
  price: number;
  size: number;
  signature: string;
  timestamp: number;
  reason?: CloseReason;
}

export interface SessionStats {
  startedAt: number;
  opened: number;
  closed: number;
  wins: number;
  losses: number;
  cumulativePnlPercent: number;
  entryFailures: number;
  exitFailures: number;
}

export interface DiscoveryFeed {
  stream(signal: AbortSignal): AsyncIterable<AssetSnapshot>;
}

export interface PriceFeed {
  stream(signal: AbortSignal): AsyncIterable<PriceTick>;
  watch(assetId: string): void;
  unwatch(assetId: string): void;
}

export interface ExecutionPort {
  open(assetId: string, size: number, signal: AbortSignal): Promise<Fill>;
  close(assetId: string, signal: AbortSignal): Promise<Fill>;
}

export type AlertKind =
  | "session_started"
  | "session_stopped"
  | "position_opened"
  | "position_closed"
  | "entry_failed"
  | "exit_failed"
  | "feed_disconnected";

export type AlertPayload = Record<string, string | number | boolean | null>;

export interface AlertSink {
  notify(kind: AlertKind, payload: AlertPayload): void;
}

export interface DailySpendRecord {
  day: string;
  byChain: Record<Chain, number>;
}

export interface PositionStore {
  loadPositions(): PositionRecord[];
  savePositions(records: PositionRecord[]): void;
  upsertPosition(record: PositionRecord): void;
  removePosition(assetId: string): void;
  loadDailySpend(): DailySpendRecord | null;
  saveDailySpend(record: DailySpendRecord): void;
  appendTrade(trade: TradeRecord): void;
  saveSession(summary: Record<string, unknown>): void;
}

export type Clock = () => number;
