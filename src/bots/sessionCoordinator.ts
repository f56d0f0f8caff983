import type { Mode } from "../config/config.js";
import { backoffDelay, sleep } from "../core/async.js";
import { FeedDisconnected, errorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import { SessionStatsTracker } from "../core/sessionStats.js";
import type {
  AlertSink,
  AssetSnapshot,
  Clock,
  DiscoveryFeed,
  Fill,
  Position,
  PositionStore,
  PriceFeed,
  PriceTick,
  SessionStats
} from "../core/types.js";
import type { PositionManager, ResumeMode } from "../trading/positionManager.js";
import type { RiskLedger } from "../trading/riskLedger.js";

export interface SessionCoordinatorOptions {
  mode: Mode;
  manager: PositionManager;
  ledger: RiskLedger;
  discoveryFeed: DiscoveryFeed;
  priceFeed: PriceFeed;
  alerts: AlertSink;
  store: PositionStore;
  logger: Logger;
  clock?: Clock;
  resumeMode: ResumeMode;
  shutdownTimeoutMs: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  dayCheckMs?: number;
}

export const EXIT_CLEAN = 0;
export const EXIT_UNSETTLED = 1;

const waitForAbort = (signal: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });

/**
 * Top-level loop. Drives the discovery and price feeds as two independent
 * consumers, keeps session statistics, forwards alerts and owns shutdown.
 */
export class SessionCoordinator {
  private readonly options: SessionCoordinatorOptions;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly stats: SessionStatsTracker;

  constructor(options: SessionCoordinatorOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: "session" });
    this.clock = options.clock ?? Date.now;
    this.stats = new SessionStatsTracker(this.clock());
  }

  statistics(): SessionStats {
    return this.stats.snapshot();
  }

  /** Runs until `signal` aborts, then shuts down. Resolves to the process exit code. */
  async run(signal: AbortSignal): Promise<number> {
    const { manager, store, alerts, discoveryFeed, priceFeed, ledger, mode, resumeMode } = this.options;

    const onOpened = (position: Position, fill: Fill): void => this.handleOpened(position, fill);
    const onClosed = (position: Position): void => this.handleClosed(position);
    const onExitFailed = (position: Position, error: unknown): void => this.handleExitFailed(position, error);
    manager.on("opened", onOpened);
    manager.on("closed", onClosed);
    manager.on("exitFailed", onExitFailed);

    const resumed = manager.resume(store.loadPositions(), resumeMode);
    manager.startWatchdog();
    const dayTimer = setInterval(() => this.rollDay(), this.options.dayCheckMs ?? 60_000);

    this.logger.info("session_started", { mode, resumed, risk: ledger.snapshot() });
    alerts.notify("session_started", { mode, resumed });

    const feeds = new AbortController();
    const loops = Promise.all([
      this.consume("discovery", (feedSignal) => discoveryFeed.stream(feedSignal), (snapshot: AssetSnapshot) => {
        manager.onAssetDiscovered(snapshot);
      }, feeds.signal),
      this.consume("price", (feedSignal) => priceFeed.stream(feedSignal), (tick: PriceTick) => {
        manager.onPriceTick(tick);
      }, feeds.signal)
    ]);

    await waitForAbort(signal);
    this.logger.info("shutdown_requested", { active: manager.activeCount });

    manager.stopAccepting();
    feeds.abort();
    await loops;
    clearInterval(dayTimer);
    manager.stop();

    const exitCode = await this.shutdown();
    manager.off("opened", onOpened);
    manager.off("closed", onClosed);
    manager.off("exitFailed", onExitFailed);
    return exitCode;
  }

  private async shutdown(): Promise<number> {
    const { manager, store, alerts, mode, shutdownTimeoutMs } = this.options;
    const result = await manager.settle(shutdownTimeoutMs);
    const persisted = manager.persistOpenPositions();
    const stats = this.stats.snapshot();
    const unsettled = result.unsettled.map((position) => position.assetId);

    store.saveSession({
      mode,
      startedAt: new Date(stats.startedAt).toISOString(),
      endedAt: new Date(this.clock()).toISOString(),
      stats,
      winRate: this.stats.winRate(),
      persisted: persisted.map((record) => record.assetId),
      unsettled
    });

    if (!result.settled) {
      this.logger.error("shutdown_unsettled", { unsettled });
    }
    this.logger.info("session_stopped", { stats, persisted: persisted.length, unsettled: unsettled.length });
    alerts.notify("session_stopped", {
      opened: stats.opened,
      closed: stats.closed,
      wins: stats.wins,
      losses: stats.losses,
      pnlPercent: Number(stats.cumulativePnlPercent.toFixed(2)),
      persisted: persisted.length,
      unsettled: unsettled.length
    });
    return result.settled ? EXIT_CLEAN : EXIT_UNSETTLED;
  }

  /**
   * Consumes one feed until `signal` aborts. A failed or ended stream is
   * reopened with exponential backoff; events are never buffered for retry.
   */
  private async consume<T>(
    feed: string,
    open: (signal: AbortSignal) => AsyncIterable<T>,
    handle: (item: T) => void,
    signal: AbortSignal
  ): Promise<void> {
    const { alerts, reconnectBaseMs, reconnectMaxMs } = this.options;
    let attempt = 0;
    while (!signal.aborted) {
      let failure: FeedDisconnected;
      try {
        for await (const item of open(signal)) {
          attempt = 0;
          try {
            handle(item);
          } catch (error) {
            this.logger.error("feed_handler_failed", { feed, error: errorMessage(error) });
          }
        }
        failure = new FeedDisconnected(feed);
      } catch (error) {
        failure = error instanceof FeedDisconnected ? error : new FeedDisconnected(feed, { cause: error });
      }
      if (signal.aborted) {
        return;
      }

      const retryInMs = backoffDelay(attempt, reconnectBaseMs, reconnectMaxMs);
      attempt += 1;
      const cause = failure.cause === undefined ? null : errorMessage(failure.cause);
      this.logger.warn("feed_disconnected", { feed, attempt, retryInMs, cause });
      alerts.notify("feed_disconnected", { feed, attempt, retryInMs, cause });
      await sleep(retryInMs, signal);
    }
  }

  private rollDay(): void {
    const { ledger, store } = this.options;
    if (ledger.rolloverDay(this.clock())) {
      store.saveDailySpend(ledger.dailySpendRecord());
      this.logger.info("day_rolled", { risk: ledger.snapshot() });
    }
  }

  private handleOpened(position: Position, fill: Fill): void {
    this.stats.recordOpened();
    this.options.alerts.notify("position_opened", {
      assetId: position.assetId,
      chain: position.chain,
      size: position.entrySize,
      entryPrice: fill.price,
      signature: fill.signature
    });
  }

  private handleClosed(position: Position): void {
    this.stats.recordClosed(position);
    if (position.closeReason === "entry_failed") {
      this.options.alerts.notify("entry_failed", { assetId: position.assetId, chain: position.chain });
      return;
    }
    this.options.alerts.notify("position_closed", {
      assetId: position.assetId,
      chain: position.chain,
      reason: position.closeReason,
      entryPrice: position.entryPrice,
      closePrice: position.closePrice,
      pnlPercent: position.realizedPnlPercent === null ? null : Number(position.realizedPnlPercent.toFixed(2))
    });
  }

  private handleExitFailed(position: Position, error: unknown): void {
    this.stats.recordExitFailure();
    this.options.alerts.notify("exit_failed", {
      assetId: position.assetId,
      chain: position.chain,
      reason: position.closeReason,
      error: errorMessage(error),
      action: "manual intervention required"
    });
  }
}
