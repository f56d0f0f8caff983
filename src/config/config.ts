import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ValidationError } from "../core/errors.js";

const percent = z.number().gt(0).lt(100);
const optionalThreshold = (fallback: number | null) => z.number().nonnegative().nullable().default(fallback);

const ruleWeightsSchema = z
  .object({
    min_liquidity: z.number().nonnegative(),
    min_holders: z.number().nonnegative(),
    max_top_holder_percent: z.number().nonnegative(),
    min_pool_age: z.number().nonnegative(),
    max_pool_age: z.number().nonnegative(),
    min_safety_provider_score: z.number().nonnegative()
  })
  .partial()
  .strict()
  .default({});

export const configSchema = z
  .object({
    mode: z.enum(["paper", "live"]).default("paper"),
    chain: z.string().min(1).default("solana"),
    investment: z.object({
      amount: z.number().positive()
    }),
    strategy: z
      .object({
        take_profit: z.number().positive().default(300),
        stop_loss: percent.default(20),
        trailing_stop: z.boolean().default(true),
        trailing_distance: percent.default(20),
        max_hold_minutes: z.number().nonnegative().default(0),
        max_price_staleness_seconds: z.number().nonnegative().default(120),
        staleness_check_ms: z.number().int().positive().default(5_000)
      })
      .default({}),
    safety: z.object({
      max_open_positions: z.number().int().positive().default(1),
      safety_threshold: z.number().min(0).max(100).default(60),
      min_liquidity_usd: optionalThreshold(5_000),
      min_holders: optionalThreshold(50),
      max_top_holder_percent: z.number().min(0).max(100).nullable().default(60),
      min_pool_age_seconds: optionalThreshold(0),
      max_pool_age_seconds: optionalThreshold(300),
      min_safety_provider_score: z.number().min(0).max(100).nullable().default(50),
      rule_weights: ruleWeightsSchema,
      max_daily_spend: z.union([z.number().positive(), z.record(z.string(), z.number().nonnegative())])
    }),
    execution: z
      .object({
        entry_timeout_ms: z.number().int().positive().default(15_000),
        exit_timeout_ms: z.number().int().positive().default(15_000),
        exit_retries: z.number().int().nonnegative().default(3),
        exit_retry_backoff_ms: z.number().int().nonnegative().default(1_000),
        slippage_bps: z.number().int().min(1).max(5_000).default(500),
        paper_slippage_percent: z.number().min(0).lt(100).default(1),
        resume_mode: z.enum(["resume", "force_close"]).default("resume")
      })
      .default({}),
    session: z
      .object({
        shutdown_timeout_ms: z.number().int().positive().default(30_000),
        reconnect_base_ms: z.number().int().positive().default(1_000),
        reconnect_max_ms: z.number().int().positive().default(30_000),
        price_poll_ms: z.number().int().positive().default(5_000),
        data_dir: z.string().min(1).default("data")
      })
      .default({}),
    rpc: z
      .object({
        rpc_url: z.string().url().default("https://api.mainnet-beta.solana.com"),
        ws_url: z.string().url().default("wss://api.mainnet-beta.solana.com")
      })
      .default({}),
    wallet: z
      .object({
        secret_key: z.string().min(1).nullable().default(null)
      })
      .default({}),
    telegram: z
      .object({
        enabled: z.boolean().default(false),
        bot_token: z.string().default(""),
        chat_id: z.string().default("")
      })
      .default({}),
    logging: z
      .object({
        level: z.enum(["debug", "info", "warn", "error"]).default("info"),
        file: z.string().min(1).nullable().default(null)
      })
      .default({})
  })
  .superRefine((config, ctx) => {
    const { min_pool_age_seconds: minAge, max_pool_age_seconds: maxAge } = config.safety;
    if (minAge !== null && maxAge !== null && minAge > maxAge) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["safety", "min_pool_age_seconds"],
        message: "must not exceed safety.max_pool_age_seconds"
      });
    }
    if (config.session.reconnect_base_ms > config.session.reconnect_max_ms) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["session", "reconnect_base_ms"],
        message: "must not exceed session.reconnect_max_ms"
      });
    }
    const dailyLimit = config.safety.max_daily_spend;
    if (typeof dailyLimit !== "number" && dailyLimit[config.chain] === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["safety", "max_daily_spend"],
        message: `must set a limit for chain ${config.chain}`
      });
    } else {
      const limit = typeof dailyLimit === "number" ? dailyLimit : dailyLimit[config.chain];
      if (config.investment.amount > limit) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["investment", "amount"],
          message: `must not exceed the daily spend limit of ${config.chain} (${limit})`
        });
      }
    }
    if (config.mode === "live" && !config.wallet.secret_key) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["wallet", "secret_key"],
        message: "live mode requires a wallet secret key"
      });
    }
    if (config.telegram.enabled && (!config.telegram.bot_token || !config.telegram.chat_id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["telegram"],
        message: "telegram.enabled requires bot_token and chat_id"
      });
    }
  });

export type BotConfig = z.infer<typeof configSchema>;
export type StrategyConfig = BotConfig["strategy"];
export type SafetyConfig = BotConfig["safety"];
export type Mode = BotConfig["mode"];

const formatIssue = (issue: z.ZodIssue): string => {
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${where}: ${issue.message}`;
};

export const parseConfig = (raw: unknown): BotConfig => {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(result.error.issues.map(formatIssue));
  }
  return result.data;
};

const defaultConfigPath = path.resolve("config", "config.json");

export const loadConfig = (configPath = defaultConfigPath): BotConfig => {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new ValidationError([`config file not found at ${resolved}`]);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (error) {
    throw new ValidationError([`config file ${resolved} is not valid JSON: ${String(error)}`]);
  }
  return parseConfig(raw);
};

/** Daily spend limit for one chain; a chain missing from a per-chain map gets 0. */
export const dailyLimitFor = (safety: SafetyConfig, chain: string): number => {
  const limit = safety.max_daily_spend;
  if (typeof limit === "number") {
    return limit;
  }
  return limit[chain] ?? 0;
};
