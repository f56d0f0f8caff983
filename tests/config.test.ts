import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { dailyLimitFor, loadConfig, parseConfig } from "../src/config/config.js";
import { ValidationError } from "../src/core/errors.js";

const minimal = { investment: { amount: 0.5 }, safety: { max_daily_spend: 2 } };

const issuesOf = (raw: unknown): string[] => {
  try {
    parseConfig(raw);
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.issues;
    }
    throw error;
  }
  return [];
};

describe("parseConfig", () => {
  it("fills in the documented defaults", () => {
    const config = parseConfig(minimal);

    expect(config.mode).toBe("paper");
    expect(config.chain).toBe("solana");
    expect(config.strategy).toMatchObject({ take_profit: 300, stop_loss: 20, trailing_stop: true, trailing_distance: 20 });
    expect(config.safety).toMatchObject({
      max_open_positions: 1,
      safety_threshold: 60,
      min_liquidity_usd: 5_000,
      min_holders: 50,
      max_top_holder_percent: 60,
      max_pool_age_seconds: 300
    });
    expect(config.execution).toMatchObject({ exit_retries: 3, resume_mode: "resume" });
    expect(config.session.data_dir).toBe("data");
  });

  it("lists every invalid value at once", () => {
    const issues = issuesOf({
      investment: { amount: -1 },
      strategy: { stop_loss: 120 },
      safety: { max_daily_spend: 2, safety_threshold: 150 }
    });

    expect(issues).toHaveLength(3);
    expect(issues.map((issue) => issue.split(":")[0])).toEqual([
      "investment.amount",
      "strategy.stop_loss",
      "safety.safety_threshold"
    ]);
  });

  it("requires the investment amount and the daily spend limit", () => {
    expect(issuesOf({}).map((issue) => issue.split(":")[0])).toEqual(["investment", "safety"]);
  });

  it("cross-checks related settings", () => {
    expect(
      issuesOf({ ...minimal, safety: { max_daily_spend: 2, min_pool_age_seconds: 600, max_pool_age_seconds: 300 } })
    ).toEqual(["safety.min_pool_age_seconds: must not exceed safety.max_pool_age_seconds"]);
    expect(issuesOf({ ...minimal, mode: "live" })).toEqual(["wallet.secret_key: live mode requires a wallet secret key"]);
    expect(issuesOf({ ...minimal, telegram: { enabled: true } })).toEqual([
      "telegram: telegram.enabled requires bot_token and chat_id"
    ]);
  });

  it("rejects daily spend limits that leave no room for a single entry", () => {
    expect(issuesOf({ ...minimal, safety: { max_daily_spend: { base: 3 } } })).toEqual([
      "safety.max_daily_spend: must set a limit for chain solana"
    ]);
    expect(issuesOf({ ...minimal, safety: { max_daily_spend: { solana: 0 } } })).toEqual([
      "investment.amount: must not exceed the daily spend limit of solana (0)"
    ]);
    expect(issuesOf({ investment: { amount: 3 }, safety: { max_daily_spend: 2 } })).toEqual([
      "investment.amount: must not exceed the daily spend limit of solana (2)"
    ]);
    expect(issuesOf({ investment: { amount: 2 }, safety: { max_daily_spend: 2 } })).toEqual([]);
  });

  it("rejects unknown rule weights", () => {
    expect(issuesOf({ ...minimal, safety: { max_daily_spend: 2, rule_weights: { min_volume: 2 } } })).toHaveLength(1);
  });

  it("accepts a daily spend limit per chain", () => {
    const config = parseConfig({ ...minimal, safety: { max_daily_spend: { solana: 3 } } });

    expect(dailyLimitFor(config.safety, "solana")).toBe(3);
    expect(dailyLimitFor(config.safety, "base")).toBe(0);
    expect(dailyLimitFor(parseConfig(minimal).safety, "base")).toBe(2);
  });
});

describe("loadConfig", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) {
      fs.rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  const writeConfig = (contents: string): string => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "launch-trader-config-"));
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, contents);
    return file;
  };

  it("reads and validates a JSON file", () => {
    const config = loadConfig(writeConfig(JSON.stringify({ ...minimal, mode: "paper" })));
    expect(config.investment.amount).toBe(0.5);
  });

  it("reports a missing file or broken JSON as a validation error", () => {
    expect(() => loadConfig(path.join(os.tmpdir(), "launch-trader-missing", "config.json"))).toThrow(ValidationError);
    expect(() => loadConfig(writeConfig("{ not json"))).toThrow(/is not valid JSON/);
  });

  it("accepts the shipped example", () => {
    const config = loadConfig(path.resolve("config", "config.example.json"));
    expect(config.mode).toBe("paper");
    expect(config.wallet.secret_key).toBeNull();
  });
});
