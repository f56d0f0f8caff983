import fs from "node:fs";
import path from "node:path";
import type { DailySpendRecord, PositionRecord, PositionStore, TradeRecord } from "../core/types.js";

interface StorageShape {
  positions: Record<string, PositionRecord>;
  dailySpend: DailySpendRecord | null;
  trades: TradeRecord[];
  lastUpdated: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isTradeRecord = (value: unknown): value is TradeRecord =>
  isRecord(value) &&
  typeof value.assetId === "string" &&
  (value.side === "buy" || value.side === "sell") &&
  typeof value.price === "number" &&
  typeof value.size === "number" &&
  typeof value.signature === "string" &&
  typeof value.timestamp === "number";

const isPositionRecord = (value: unknown): value is PositionRecord =>
  isRecord(value) &&
  typeof value.assetId === "string" &&
  typeof value.chain === "string" &&
  typeof value.entryPrice === "number" &&
  typeof value.entrySize === "number" &&
  typeof value.entryAt === "number" &&
  typeof value.highWater === "number" &&
  typeof value.status === "string";

/** State file at `<dir>/state.json`; session summaries under `<dir>/sessions`. */
export class JsonFileStorage implements PositionStore {
  private readonly storagePath: string;
  private readonly sessionsDir: string;
  private readonly sessionPrefix: string;

  constructor(storageDir: string, sessionPrefix = "session") {
    this.storagePath = path.join(storageDir, "state.json");
    this.sessionsDir = path.join(storageDir, "sessions");
    this.sessionPrefix = sessionPrefix;
    if (!fs.existsSync(storageDir)) {
      fs.mkdirSync(storageDir, { recursive: true });
    }
    if (!fs.existsSync(this.storagePath)) {
      this.write({ positions: {}, dailySpend: null, trades: [], lastUpdated: Date.now() });
    }
  }

  loadPositions(): PositionRecord[] {
    return Object.values(this.read().positions);
  }

  savePositions(records: PositionRecord[]): void {
    const state = this.read();
    state.positions = Object.fromEntries(records.map((record) => [record.assetId, record]));
    this.write(state);
  }

  upsertPosition(record: PositionRecord): void {
    const state = this.read();
    state.positions[record.assetId] = record;
    this.write(state);
  }

  removePosition(assetId: string): void {
    const state = this.read();
    if (!(assetId in state.positions)) {
      return;
    }
    delete state.positions[assetId];
    this.write(state);
  }

  loadDailySpend(): DailySpendRecord | null {
    return this.read().dailySpend;
  }

  saveDailySpend(record: DailySpendRecord): void {
    const state = this.read();
    state.dailySpend = record;
    this.write(state);
  }

  appendTrade(trade: TradeRecord): void {
    const state = this.read();
    state.trades.push(trade);
    this.write(state);
  }

  trades(): TradeRecord[] {
    return this.read().trades;
  }

  saveSession(summary: Record<string, unknown>): void {
    fs.mkdirSync(this.sessionsDir, { recursive: true });
    const stamp = new Date().toISOString().replace(/[:.]/g, "-");
    const file = path.join(this.sessionsDir, `${this.sessionPrefix}_${stamp}.json`);
    fs.writeFileSync(file, JSON.stringify(summary, null, 2));
  }

  private read(): StorageShape {
    const raw = fs.readFileSync(this.storagePath, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    const source = isRecord(parsed) ? parsed : {};
    const positions: Record<string, PositionRecord> = {};
    if (isRecord(source.positions)) {
      for (const [assetId, value] of Object.entries(source.positions)) {
        if (isPositionRecord(value)) {
          positions[assetId] = value;
        }
      }
    }
    const dailySpend = isRecord(source.dailySpend) && typeof source.dailySpend.day === "string" && isRecord(source.dailySpend.byChain)
      ? readDailySpend(source.dailySpend.day, source.dailySpend.byChain)
      : null;
    return {
      positions,
      dailySpend,
      trades: Array.isArray(source.trades) ? source.trades.filter(isTradeRecord) : [],
      lastUpdated: typeof source.lastUpdated === "number" ? source.lastUpdated : Date.now()
    };
  }

  private write(state: StorageShape): void {
    const next = { ...state, lastUpdated: Date.now() };
    const tmp = `${this.storagePath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(next, null, 2));
    fs.renameSync(tmp, this.storagePath);
  }
}

const readDailySpend = (day: string, byChain: Record<string, unknown>): DailySpendRecord => {
  const spent: Record<string, number> = {};
  for (const [chain, value] of Object.entries(byChain)) {
    if (typeof value === "number" && Number.isFinite(value)) {
      spent[chain] = value;
    }
  }
  return { day, byChain: spent };
};
