import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { PositionRecord } from "../src/core/types.js";
import { JsonFileStorage } from "../src/storage/jsonFileStorage.js";

const record = (assetId: string, overrides: Partial<PositionRecord> = {}): PositionRecord => ({
  assetId,
  chain: "solana",
  entryPrice: 0.002,
  entrySize: 0.1,
  entryAt: 1_700_000_000_000,
  highWater: 0.003,
  status: "open",
  ...overrides
});

describe("JsonFileStorage", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "launch-trader-store-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("starts empty", () => {
    const storage = new JsonFileStorage(dir);

    expect(storage.loadPositions()).toEqual([]);
    expect(storage.loadDailySpend()).toBeNull();
    expect(storage.trades()).toEqual([]);
  });

  it("keeps positions keyed by asset id across instances", () => {
    const first = new JsonFileStorage(dir);
    first.upsertPosition(record("mint-a"));
    first.upsertPosition(record("mint-b"));
    first.upsertPosition(record("mint-a", { highWater: 0.004 }));
    first.removePosition("mint-b");
    first.removePosition("mint-missing");

    const second = new JsonFileStorage(dir);
    expect(second.loadPositions()).toEqual([record("mint-a", { highWater: 0.004 })]);
  });

  it("replaces the whole position set on save", () => {
    const storage = new JsonFileStorage(dir);
    storage.upsertPosition(record("mint-a"));

    storage.savePositions([record("mint-c", { status: "closing" })]);

    expect(storage.loadPositions()).toEqual([record("mint-c", { status: "closing" })]);
  });

  it("round-trips daily spend and trades", () => {
    const storage = new JsonFileStorage(dir);
    storage.saveDailySpend({ day: "2026-01-10", byChain: { solana: 0.3 } });
    storage.appendTrade({ assetId: "mint-a", side: "buy", price: 0.002, size: 0.1, signature: "sig-1", timestamp: 1 });

    const reopened = new JsonFileStorage(dir);
    expect(reopened.loadDailySpend()).toEqual({ day: "2026-01-10", byChain: { solana: 0.3 } });
    expect(reopened.trades()).toEqual([
      { assetId: "mint-a", side: "buy", price: 0.002, size: 0.1, signature: "sig-1", timestamp: 1 }
    ]);
  });

  it("drops malformed entries when reading", () => {
    fs.writeFileSync(
      path.join(dir, "state.json"),
      JSON.stringify({
        positions: { good: record("good"), bad: { assetId: "bad", entryPrice: "1" } },
        dailySpend: { day: "2026-01-10", byChain: { solana: 1, base: "x" } },
        trades: []
      })
    );

    const storage = new JsonFileStorage(dir);
    expect(storage.loadPositions()).toEqual([record("good")]);
    expect(storage.loadDailySpend()).toEqual({ day: "2026-01-10", byChain: { solana: 1 } });
  });

  it("writes session summaries under sessions/ with the mode as prefix", () => {
    const storage = new JsonFileStorage(dir, "paper");
    storage.saveSession({ mode: "paper", unsettled: [] });

    const files = fs.readdirSync(path.join(dir, "sessions"));
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^paper_.*\.json$/);
    expect(JSON.parse(fs.readFileSync(path.join(dir, "sessions", files[0]), "utf-8"))).toEqual({
      mode: "paper",
      unsettled: []
    });
  });
});
