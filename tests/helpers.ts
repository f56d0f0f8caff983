import { type BotConfig, parseConfig } from "../src/config/config.js";
import { AsyncChannel } from "../src/core/channel.js";
import type { LogFields, LogLevel, Logger } from "../src/core/logger.js";
import type {
  AlertKind,
  AlertPayload,
  AlertSink,
  AssetSnapshot,
  DailySpendRecord,
  DiscoveryFeed,
  ExecutionPort,
  Fill,
  PositionRecord,
  PositionStore,
  PriceFeed,
  PriceTick,
  TradeRecord
} from "../src/core/types.js";

export interface LogEntry {
  level: LogLevel;
  event: string;
  fields: LogFields;
}

export class RecordingLogger implements Logger {
  readonly entries: LogEntry[];
  private readonly bindings: LogFields;

  constructor(entries: LogEntry[] = [], bindings: LogFields = {}) {
    this.entries = entries;
    this.bindings = bindings;
  }

  debug(event: string, fields?: LogFields): void {
    this.record("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.record("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.record("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.record("error", event, fields);
  }

  child(bindings: LogFields): Logger {
    return new RecordingLogger(this.entries, { ...this.bindings, ...bindings });
  }

  events(level?: LogLevel): string[] {
    return this.entries.filter((entry) => !level || entry.level === level).map((entry) => entry.event);
  }

  private record(level: LogLevel, event: string, fields: LogFields = {}): void {
    this.entries.push({ level, event, fields: { ...this.bindings, ...fields } });
  }
}

export class RecordingAlerts implements AlertSink {
  readonly sent: Array<{ kind: AlertKind; payload: AlertPayload }> = [];

  notify(kind: AlertKind, payload: AlertPayload): void {
    this.sent.push({ kind, payload });
  }

  kinds(): AlertKind[] {
    return this.sent.map((alert) => alert.kind);
  }
}

export class MemoryStore implements PositionStore {
  positions = new Map<string, PositionRecord>();
  dailySpend: DailySpendRecord | null = null;
  readonly trades: TradeRecord[] = [];
  readonly sessions: Array<Record<string, unknown>> = [];

  loadPositions(): PositionRecord[] {
    return [...this.positions.values()];
  }

  savePositions(records: PositionRecord[]): void {
    this.positions = new Map(records.map((record) => [record.assetId, record]));
  }

  upsertPosition(record: PositionRecord): void {
    this.positions.set(record.assetId, record);
  }

  removePosition(assetId: string): void {
    this.positions.delete(assetId);
  }

  loadDailySpend(): DailySpendRecord | null {
    return this.dailySpend;
  }

  saveDailySpend(record: DailySpendRecord): void {
    this.dailySpend = record;
  }

  appendTrade(trade: TradeRecord): void {
    this.trades.push(trade);
  }

  saveSession(summary: Record<string, unknown>): void {
    this.sessions.push(summary);
  }
}

/**
 * One scripted response: a fill price, a fill after a delay, a rejection, or
 * a call that never settles until aborted.
 */
export type ScriptStep = number | { price: number; delayMs: number } | "reject" | "hang";

const fillFor = (side: string, assetId: string, price: number): Fill => ({
  price,
  amountTokens: 1,
  signature: `${side}-${assetId}-${price}`
});

const play = (step: ScriptStep | undefined, side: string, assetId: string, signal: AbortSignal): Promise<Fill> => {
  if (step === undefined) {
    return Promise.reject(new Error(`no scripted ${side} for ${assetId}`));
  }
  if (step === "reject") {
    return Promise.reject(new Error(`${side} rejected`));
  }
  if (step === "hang") {
    return new Promise<Fill>((_, reject) => {
      signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
    });
  }
  if (typeof step === "number") {
    return Promise.resolve(fillFor(side, assetId, step));
  }
  const { price, delayMs } = step;
  return new Promise<Fill>((resolve) => {
    setTimeout(() => resolve(fillFor(side, assetId, price)), delayMs);
  });
};

/** Execution port driven by per-side scripts; the last step repeats once the script runs out. */
export class ScriptedExecutor implements ExecutionPort {
  readonly opens: string[] = [];
  readonly closes: string[] = [];
  private readonly openScript: ScriptStep[];
  private readonly closeScript: ScriptStep[];

  constructor(openScript: ScriptStep[] = [1], closeScript: ScriptStep[] = [1]) {
    this.openScript = [...openScript];
    this.closeScript = [...closeScript];
  }

  open(assetId: string, _size: number, signal: AbortSignal): Promise<Fill> {
    this.opens.push(assetId);
    return play(next(this.openScript), "open", assetId, signal);
  }

  close(assetId: string, signal: AbortSignal): Promise<Fill> {
    this.closes.push(assetId);
    return play(next(this.closeScript), "close", assetId, signal);
  }
}

const next = (script: ScriptStep[]): ScriptStep | undefined => (script.length > 1 ? script.shift() : script[0]);

/** Feed whose items are pushed by the test; `disconnect` fails the current stream. */
export class ManualFeed<T> {
  streams = 0;
  private channel = new AsyncChannel<T>();

  async *stream(signal: AbortSignal): AsyncGenerator<T> {
    this.streams += 1;
    this.channel = new AsyncChannel<T>();
    yield* this.channel.iterate(signal);
  }

  push(item: T): void {
    this.channel.push(item);
  }

  disconnect(error: unknown): void {
    this.channel.fail(error);
  }
}

export class ManualDiscoveryFeed extends ManualFeed<AssetSnapshot> implements DiscoveryFeed {}

export class ManualPriceFeed extends ManualFeed<PriceTick> implements PriceFeed {
  readonly watched = new Set<string>();

  watch(assetId: string): void {
    this.watched.add(assetId);
  }

  unwatch(assetId: string): void {
    this.watched.delete(assetId);
  }
}

export const testConfig = (overrides: Record<string, unknown> = {}): BotConfig =>
  parseConfig({
    investment: { amount: 1 },
    safety: { max_daily_spend: 10 },
    ...overrides
  });

export const goodSnapshot = (id: string, overrides: Partial<AssetSnapshot> = {}): AssetSnapshot => ({
  id,
  chain: "solana",
  liquidityUsd: 20_000,
  holders: 200,
  topHolderPercent: 15,
  poolAgeSeconds: 60,
  safetyProviderScore: 90,
  ...overrides
});

export const tick = (assetId: string, price: number, timestamp: number): PriceTick => ({ assetId, price, timestamp });

/** Lets queued promise callbacks and immediate timers run. */
export const flush = async (rounds = 5): Promise<void> => {
  for (let i = 0; i < rounds; i += 1) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
};

export const waitFor = async (condition: () => boolean, timeoutMs = 2_000): Promise<void> => {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error("condition not met in time");
    }
    await new Promise<void>((resolve) => setTimeout(resolve, 5));
  }
};
