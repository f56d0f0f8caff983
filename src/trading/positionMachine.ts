import { sleep, withTimeout } from "../core/async.js";
import { InvalidTransitionError, errorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type {
  Chain,
  Clock,
  CloseReason,
  ExecutionPort,
  Fill,
  Position,
  PositionRecord,
  PositionStatus,
  PriceTick
} from "../core/types.js";
import type { ExitEngine } from "./exitEngine.js";
import type { RiskLedger } from "./riskLedger.js";

export interface ExecutionTimings {
  entryTimeoutMs: number;
  exitTimeoutMs: number;
  exitRetries: number;
  exitRetryBackoffMs: number;
}

export interface PositionHooks {
  opened(position: Position, fill: Fill): void;
  closed(position: Position, fill: Fill | null): void;
  exitFailed(position: Position, error: unknown): void;
}

export interface PositionMachineDeps {
  executor: ExecutionPort;
  ledger: RiskLedger;
  exitEngine: ExitEngine;
  logger: Logger;
  clock: Clock;
  timings: ExecutionTimings;
  hooks: PositionHooks;
}

const TRANSITIONS: Record<PositionStatus, readonly PositionStatus[]> = {
  pending: ["open", "closed"],
  open: ["closing"],
  closing: ["closed"],
  closed: []
};

/**
 * Lifecycle of one position: pending -> open -> closing -> closed, or
 * pending -> closed when the entry fails. Transitions run one at a time;
 * ticks that arrive while one is in flight are dropped.
 */
export class PositionStateMachine {
  private readonly position: Position;
  private readonly deps: PositionMachineDeps;
  private readonly logger: Logger;
  private inFlight: Promise<void> | null = null;
  private lastTickTimestamp: number | null = null;
  private readonly holdsSlot: boolean;

  constructor(assetId: string, chain: Chain, size: number, deps: PositionMachineDeps, holdsSlot = true) {
    this.deps = deps;
    this.holdsSlot = holdsSlot;
    this.logger = deps.logger.child({ assetId, chain });
    this.position = {
      assetId,
      chain,
      entrySize: size,
      entryPrice: null,
      entryAt: null,
      highWater: null,
      lastPrice: null,
      lastPriceAt: null,
      status: "pending",
      closeReason: null,
      closePrice: null,
      closedAt: null,
      realizedPnlPercent: null,
      exitFailed: false
    };
  }

  /**
   * Rebuilds an entered position from its persisted record, in the open state.
   * `holdsSlot` is false for a position the ledger had no room for; closing it
   * then releases nothing.
   */
  static resume(record: PositionRecord, deps: PositionMachineDeps, holdsSlot = true): PositionStateMachine {
    const machine = new PositionStateMachine(record.assetId, record.chain, record.entrySize, deps, holdsSlot);
    const position = machine.position;
    position.entryPrice = record.entryPrice;
    position.entryAt = record.entryAt;
    position.highWater = record.highWater;
    position.lastPriceAt = deps.clock();
    position.status = "open";
    machine.logger.info("position_resumed", { entryPrice: record.entryPrice, persistedStatus: record.status });
    return machine;
  }

  get assetId(): string {
    return this.position.assetId;
  }

  get status(): PositionStatus {
    return this.position.status;
  }

  get busy(): boolean {
    return this.inFlight !== null;
  }

  snapshot(): Position {
    return { ...this.position };
  }

  /** Persisted form; `null` until the entry has filled. */
  toRecord(): PositionRecord | null {
    const { assetId, chain, entryPrice, entrySize, entryAt, highWater, status } = this.position;
    if (entryPrice === null || entryAt === null || highWater === null) {
      return null;
    }
    return { assetId, chain, entryPrice, entrySize, entryAt, highWater, status };
  }

  enter(): Promise<void> {
    if (this.position.status !== "pending" || this.inFlight) {
      throw new InvalidTransitionError(this.assetId, this.position.status, "open");
    }
    return this.track(this.runEntry());
  }

  /** Feeds one price observation. Returns true when it triggered a close. */
  onTick(tick: PriceTick): boolean {
    const position = this.position;
    if (position.status !== "open" || tick.assetId !== position.assetId) {
      return false;
    }
    if (!Number.isFinite(tick.price) || tick.price <= 0) {
      this.logger.warn("tick_ignored", { reason: "invalid_price", price: tick.price });
      return false;
    }
    if (this.lastTickTimestamp !== null && tick.timestamp < this.lastTickTimestamp) {
      return false;
    }
    if (position.entryPrice === null || position.entryAt === null) {
      return false;
    }

    const now = this.deps.clock();
    this.lastTickTimestamp = tick.timestamp;
    position.lastPrice = tick.price;
    position.lastPriceAt = now;
    position.highWater = Math.max(position.highWater ?? tick.price, tick.price);

    const decision = this.deps.exitEngine.evaluate({
      entryPrice: position.entryPrice,
      highWater: position.highWater,
      price: tick.price,
      entryAt: position.entryAt,
      now
    });
    if (!decision.shouldExit) {
      return false;
    }

    this.logger.info("exit_triggered", {
      reason: decision.reason,
      price: tick.price,
      entryPrice: position.entryPrice,
      highWater: position.highWater
    });
    this.beginClose(decision.reason);
    return true;
  }

  /** Closes an open position outside the exit rules (manual, stale price, restart policy). */
  requestClose(reason: CloseReason): Promise<void> {
    if (this.position.status !== "open") {
      return this.settled();
    }
    this.logger.info("close_requested", { reason });
    this.beginClose(reason);
    return this.settled();
  }

  /** True when the last observed price is older than `maxAgeMs`. */
  isStale(now: number, maxAgeMs: number): boolean {
    const { status, lastPriceAt, entryAt } = this.position;
    if (status !== "open" || maxAgeMs <= 0) {
      return false;
    }
    const reference = lastPriceAt ?? entryAt;
    return reference !== null && now - reference > maxAgeMs;
  }

  /** Resolves once no entry or exit is in flight. Never rejects. */
  async settled(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  private beginClose(reason: CloseReason): void {
    this.transition("closing");
    this.position.closeReason = reason;
    void this.track(this.runExit(reason));
  }

  private track(work: Promise<void>): Promise<void> {
    const tracked = work.finally(() => {
      if (this.inFlight === tracked) {
        this.inFlight = null;
      }
    });
    this.inFlight = tracked;
    return tracked;
  }

  private async runEntry(): Promise<void> {
    const { executor, timings, clock, hooks } = this.deps;
    const position = this.position;
    this.logger.info("entry_started", { size: position.entrySize });
    let fill: Fill;
    try {
      fill = await withTimeout(
        (signal) => executor.open(position.assetId, position.entrySize, signal),
        timings.entryTimeoutMs,
        `open ${position.assetId}`
      );
      if (!Number.isFinite(fill.price) || fill.price <= 0) {
        throw new Error(`entry fill has unusable price ${fill.price}`);
      }
    } catch (error) {
      position.closeReason = "entry_failed";
      position.closedAt = clock();
      this.transition("closed");
      this.releaseSlot();
      this.logger.warn("entry_failed", { error: errorMessage(error) });
      hooks.closed(this.snapshot(), null);
      return;
    }

    const now = clock();
    position.entryPrice = fill.price;
    position.entryAt = now;
    position.highWater = fill.price;
    position.lastPrice = fill.price;
    position.lastPriceAt = now;
    this.transition("open");
    this.logger.info("position_opened", { entryPrice: fill.price, signature: fill.signature });
    hooks.opened(this.snapshot(), fill);
  }

  private releaseSlot(): void {
    if (this.holdsSlot) {
      this.deps.ledger.release(this.position.chain, this.position.entrySize);
    }
  }

  private async runExit(reason: CloseReason): Promise<void> {
    const { executor, timings, hooks } = this.deps;
    const position = this.position;
    const attempts = timings.exitRetries + 1;
    let fill: Fill | null = null;
    let lastError: unknown = null;

    for (let attempt = 0; attempt < attempts && fill === null; attempt += 1) {
      if (attempt > 0) {
        await sleep(timings.exitRetryBackoffMs * 2 ** (attempt - 1));
      }
      try {
        fill = await withTimeout(
          (signal) => executor.close(position.assetId, signal),
          timings.exitTimeoutMs,
          `close ${position.assetId}`
        );
      } catch (error) {
        lastError = error;
        this.logger.warn("exit_attempt_failed", {
          reason,
          attempt: attempt + 1,
          attempts,
          error: errorMessage(error)
        });
      }
    }

    if (fill) {
      this.finishClose(fill, reason);
      this.releaseSlot();
      hooks.closed(this.snapshot(), fill);
      return;
    }

    // Still holding the asset: stay in closing and hand it to an operator.
    position.exitFailed = true;
    this.logger.error("exit_failed", { reason, attempts, error: errorMessage(lastError) });
    hooks.exitFailed(this.snapshot(), lastError);
  }

  private finishClose(fill: Fill, reason: CloseReason): void {
    const position = this.position;
    const entryPrice = position.entryPrice ?? fill.price;
    position.closePrice = fill.price;
    position.closedAt = this.deps.clock();
    position.closeReason = reason;
    position.realizedPnlPercent = ((fill.price - entryPrice) / entryPrice) * 100;
    this.transition("closed");
    this.logger.info("position_closed", {
      reason,
      entryPrice,
      closePrice: fill.price,
      realizedPnlPercent: position.realizedPnlPercent,
      signature: fill.signature
    });
  }

  private transition(to: PositionStatus): void {
    const from = this.position.status;
    if (!TRANSITIONS[from].includes(to)) {
      const error = new InvalidTransitionError(this.assetId, from, to);
      this.logger.error("invalid_transition", { from, to });
      throw error;
    }
    this.position.status = to;
  }
}
