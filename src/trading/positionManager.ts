import { EventEmitter } from "node:events";
import { sleep } from "../core/async.js";
import { CapacityDenied, errorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type {
  AssetSnapshot,
  Clock,
  ExecutionPort,
  Fill,
  Position,
  PositionRecord,
  PositionStore,
  PriceFeed,
  PriceTick,
  RuleName
} from "../core/types.js";
import type { ExitEngine } from "./exitEngine.js";
import { type AssetFilter, failedRules } from "./filters.js";
import { type ExecutionTimings, type PositionMachineDeps, PositionStateMachine } from "./positionMachine.js";
import type { RiskLedger } from "./riskLedger.js";

export type SkipReason =
  | "shutting_down"
  | "duplicate"
  | "filter_rejected"
  | "at_capacity"
  | "daily_limit_exceeded";

export type DiscoveryOutcome =
  | { action: "entered"; score: number }
  | { action: "skipped"; reason: SkipReason; score?: number; failedRules?: RuleName[] };

export type ResumeMode = "resume" | "force_close";

export interface SettleResult {
  settled: boolean;
  unsettled: Position[];
}

export interface PositionManagerOptions {
  filter: AssetFilter;
  ledger: RiskLedger;
  executor: ExecutionPort;
  exitEngine: ExitEngine;
  priceFeed: Pick<PriceFeed, "watch" | "unwatch">;
  store: PositionStore;
  logger: Logger;
  clock?: Clock;
  timings: ExecutionTimings;
  entrySize: number;
  maxPriceStalenessMs: number;
  stalenessCheckMs: number;
}

/**
 * Supervises one state machine per asset. Emits `opened` (position, fill),
 * `closed` (position) for every terminal transition including failed
 * entries, and `exitFailed` (position, error) when an exit needs an operator.
 */
export class PositionManager extends EventEmitter {
  private readonly options: PositionManagerOptions;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly machines = new Map<string, PositionStateMachine>();
  private readonly machineDeps: PositionMachineDeps;
  private accepting = true;
  private watchdog?: NodeJS.Timeout;

  constructor(options: PositionManagerOptions) {
    super();
    this.options = options;
    this.logger = options.logger;
    this.clock = options.clock ?? Date.now;
    this.machineDeps = {
      executor: options.executor,
      ledger: options.ledger,
      exitEngine: options.exitEngine,
      logger: options.logger,
      clock: this.clock,
      timings: options.timings,
      hooks: {
        opened: (position, fill) => this.guard("opened", () => this.handleOpened(position, fill)),
        closed: (position, fill) => this.guard("closed", () => this.handleClosed(position, fill)),
        exitFailed: (position, error) => this.guard("exitFailed", () => this.handleExitFailed(position, error))
      }
    };
  }

  /**
   * Gates a discovered asset and, when it passes, reserves capacity and
   * starts the entry. Returns without waiting for the entry to fill.
   */
  onAssetDiscovered(snapshot: AssetSnapshot): DiscoveryOutcome {
    const log = this.logger.child({ assetId: snapshot.id, chain: snapshot.chain });
    if (!this.accepting) {
      return this.skip(log, { action: "skipped", reason: "shutting_down" });
    }
    if (this.machines.has(snapshot.id)) {
      return this.skip(log, { action: "skipped", reason: "duplicate" });
    }

    const verdict = this.options.filter.evaluate(snapshot);
    log.debug("asset_scored", { score: verdict.score, rules: verdict.rules });
    if (!verdict.accepted) {
      return this.skip(log, {
        action: "skipped",
        reason: "filter_rejected",
        score: verdict.score,
        failedRules: failedRules(verdict)
      });
    }

    const { ledger, store, priceFeed, entrySize } = this.options;
    const reservation = ledger.tryReserve(snapshot.chain, entrySize);
    if (!reservation.ok) {
      const denied = new CapacityDenied(reservation.reason, snapshot.chain);
      return this.skip(log, { action: "skipped", reason: reservation.reason, score: verdict.score }, denied);
    }

    const machine = new PositionStateMachine(snapshot.id, snapshot.chain, entrySize, this.machineDeps);
    this.machines.set(snapshot.id, machine);
    priceFeed.watch(snapshot.id);
    this.guard("dailySpend", () => store.saveDailySpend(ledger.dailySpendRecord()));
    log.info("asset_accepted", { score: verdict.score, size: entrySize });
    void machine.enter();
    return { action: "entered", score: verdict.score };
  }

  /** Routes a tick to its position. Ticks for unknown assets are dropped. */
  onPriceTick(tick: PriceTick): void {
    this.machines.get(tick.assetId)?.onTick(tick);
  }

  /**
   * Re-admits persisted positions after a restart. Positions beyond the
   * concurrency cap are closed at once instead of being admitted.
   */
  resume(records: PositionRecord[], mode: ResumeMode): number {
    let resumed = 0;
    for (const record of records) {
      if (this.machines.has(record.assetId)) {
        continue;
      }
      const admitted = this.options.ledger.restore(record.chain, record.entrySize);
      const machine = PositionStateMachine.resume(record, this.machineDeps, admitted);
      this.machines.set(record.assetId, machine);
      this.options.priceFeed.watch(record.assetId);
      resumed += 1;
      if (!admitted) {
        this.logger.warn("resume_over_capacity", { assetId: record.assetId, chain: record.chain });
      }
      if (mode === "force_close" || !admitted) {
        void machine.requestClose("manual");
      }
    }
    if (resumed > 0) {
      this.logger.info("positions_resumed", { count: resumed, mode });
    }
    return resumed;
  }

  startWatchdog(): void {
    const { maxPriceStalenessMs, stalenessCheckMs } = this.options;
    if (maxPriceStalenessMs <= 0 || this.watchdog) {
      return;
    }
    this.watchdog = setInterval(() => this.checkStaleness(this.clock()), stalenessCheckMs);
  }

  /** Closes every open position whose price has gone quiet. Returns their ids. */
  checkStaleness(now: number): string[] {
    const stale: string[] = [];
    for (const machine of this.machines.values()) {
      if (machine.isStale(now, this.options.maxPriceStalenessMs)) {
        stale.push(machine.assetId);
        this.logger.warn("price_stale", { assetId: machine.assetId });
        void machine.requestClose("stale_price");
      }
    }
    return stale;
  }

  stopAccepting(): void {
    this.accepting = false;
  }

  stop(): void {
    if (this.watchdog) {
      clearInterval(this.watchdog);
      this.watchdog = undefined;
    }
  }

  /**
   * Waits up to `timeoutMs` for in-flight entries and exits. Positions still
   * pending or closing afterwards are reported as unsettled.
   */
  async settle(timeoutMs: number): Promise<SettleResult> {
    const inFlight = [...this.machines.values()].filter((machine) => machine.busy);
    if (inFlight.length > 0) {
      const deadline = new AbortController();
      await Promise.race([
        Promise.all(inFlight.map((machine) => machine.settled())),
        sleep(timeoutMs, deadline.signal)
      ]);
      deadline.abort();
    }
    const unsettled = [...this.machines.values()]
      .filter((machine) => machine.status === "pending" || machine.status === "closing")
      .map((machine) => machine.snapshot());
    return { settled: unsettled.length === 0, unsettled };
  }

  /** Writes every entered, not yet closed position to the store. */
  persistOpenPositions(): PositionRecord[] {
    const records: PositionRecord[] = [];
    for (const machine of this.machines.values()) {
      const record = machine.toRecord();
      if (record && record.status !== "closed") {
        records.push(record);
      }
    }
    this.options.store.savePositions(records);
    return records;
  }

  positions(): Position[] {
    return [...this.machines.values()].map((machine) => machine.snapshot());
  }

  get activeCount(): number {
    return this.machines.size;
  }

  private handleOpened(position: Position, fill: Fill): void {
    const record = this.machines.get(position.assetId)?.toRecord();
    if (record) {
      this.options.store.upsertPosition(record);
    }
    this.options.store.appendTrade({
      assetId: position.assetId,
      side: "buy",
      price: fill.price,
      size: position.entrySize,
      signature: fill.signature,
      timestamp: position.entryAt ?? this.clock()
    });
    this.emit("opened", position, fill);
  }

  private handleClosed(position: Position, fill: Fill | null): void {
    this.machines.delete(position.assetId);
    this.options.priceFeed.unwatch(position.assetId);
    if (fill) {
      this.options.store.removePosition(position.assetId);
      this.options.store.appendTrade({
        assetId: position.assetId,
        side: "sell",
        price: fill.price,
        size: position.entrySize,
        signature: fill.signature,
        timestamp: position.closedAt ?? this.clock(),
        reason: position.closeReason ?? undefined
      });
    }
    this.emit("closed", position);
  }

  private handleExitFailed(position: Position, error: unknown): void {
    const record = this.machines.get(position.assetId)?.toRecord();
    if (record) {
      this.options.store.upsertPosition(record);
    }
    this.emit("exitFailed", position, error);
  }

  private skip(log: Logger, outcome: DiscoveryOutcome, cause?: CapacityDenied): DiscoveryOutcome {
    log.info("asset_skipped", cause ? { ...outcome, code: cause.code, error: cause.message } : { ...outcome });
    return outcome;
  }

  private guard(hook: string, run: () => void): void {
    try {
      run();
    } catch (error) {
      this.logger.error("position_hook_failed", { hook, error: errorMessage(error) });
    }
  }
}
