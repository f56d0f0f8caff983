import path from "node:path";
import { type BotConfig, dailyLimitFor } from "../config/config.js";
import { EventLogger, type Logger } from "../core/logger.js";
import { LogAlertSink, TelegramNotifier } from "../core/telegramNotifier.js";
import type { AlertSink, ExecutionPort } from "../core/types.js";
import { RaydiumListener, WSOL_MINT } from "../listeners/raydiumListener.js";
import { DexScreenerClient } from "../rpc/dexScreenerClient.js";
import { HeliusRpcClient } from "../rpc/heliusClient.js";
import { RugCheckClient } from "../rpc/rugCheckClient.js";
import { JsonFileStorage } from "../storage/jsonFileStorage.js";
import { JupiterExecutor, PaperExecutor } from "../trading/executors.js";
import { ExitEngine } from "../trading/exitEngine.js";
import { AssetFilter } from "../trading/filters.js";
import { PositionManager } from "../trading/positionManager.js";
import { PriceOracle } from "../trading/priceOracle.js";
import { PriceWatcher } from "../trading/priceWatcher.js";
import { RiskLedger } from "../trading/riskLedger.js";
import { SessionCoordinator } from "./sessionCoordinator.js";

/** Wires the Solana adapters to the trading core from one validated config. */
export class LaunchTrader {
  private readonly config: BotConfig;
  private readonly logger: Logger;
  private readonly coordinator: SessionCoordinator;

  constructor(config: BotConfig, logger?: Logger) {
    this.config = config;
    this.logger =
      logger ?? new EventLogger({ level: config.logging.level, filePath: config.logging.file, bindings: { mode: config.mode } });

    const client = new HeliusRpcClient(config.rpc.rpc_url, config.rpc.ws_url);
    const storage = new JsonFileStorage(path.resolve(config.session.data_dir), config.mode);
    const oracle = new PriceOracle(new DexScreenerClient(config.chain, WSOL_MINT), client, new RugCheckClient(), this.logger);
    const priceWatcher = new PriceWatcher(oracle, this.logger.child({ component: "price" }), config.session.price_poll_ms);
    const listener = new RaydiumListener(client, oracle, this.logger.child({ component: "discovery" }), config.chain);

    const ledger = new RiskLedger(
      {
        maxConcurrentPositions: config.safety.max_open_positions,
        dailyLimit: (chain) => dailyLimitFor(config.safety, chain)
      },
      Date.now,
      storage.loadDailySpend()
    );

    const manager = new PositionManager({
      filter: new AssetFilter(config.safety),
      ledger,
      executor: this.createExecutor(oracle),
      exitEngine: new ExitEngine(config.strategy),
      priceFeed: priceWatcher,
      store: storage,
      logger: this.logger.child({ component: "positions" }),
      timings: {
        entryTimeoutMs: config.execution.entry_timeout_ms,
        exitTimeoutMs: config.execution.exit_timeout_ms,
        exitRetries: config.execution.exit_retries,
        exitRetryBackoffMs: config.execution.exit_retry_backoff_ms
      },
      entrySize: config.investment.amount,
      maxPriceStalenessMs: config.strategy.max_price_staleness_seconds * 1000,
      stalenessCheckMs: config.strategy.staleness_check_ms
    });

    this.coordinator = new SessionCoordinator({
      mode: config.mode,
      manager,
      ledger,
      discoveryFeed: listener,
      priceFeed: priceWatcher,
      alerts: this.createAlertSink(),
      store: storage,
      logger: this.logger,
      resumeMode: config.execution.resume_mode,
      shutdownTimeoutMs: config.session.shutdown_timeout_ms,
      reconnectBaseMs: config.session.reconnect_base_ms,
      reconnectMaxMs: config.session.reconnect_max_ms
    });
  }

  run(signal: AbortSignal): Promise<number> {
    return this.coordinator.run(signal);
  }

  private createExecutor(oracle: PriceOracle): ExecutionPort {
    const { mode, execution, wallet, rpc } = this.config;
    if (mode === "paper") {
      return new PaperExecutor(oracle, execution.paper_slippage_percent);
    }
    if (!wallet.secret_key) {
      throw new Error("Live mode requires a wallet secret key");
    }
    const executor = new JupiterExecutor(rpc.rpc_url, wallet.secret_key, execution.slippage_bps, this.logger.child({ component: "executor" }));
    this.logger.info("live_wallet_loaded", { publicKey: executor.publicKey });
    return executor;
  }

  private createAlertSink(): AlertSink {
    const { telegram } = this.config;
    const alertLogger = this.logger.child({ component: "alerts" });
    if (telegram.enabled) {
      return new TelegramNotifier(telegram.bot_token, telegram.chat_id, alertLogger);
    }
    return new LogAlertSink(alertLogger);
  }
}
