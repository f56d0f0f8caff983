import type { Chain, Clock, DailySpendRecord } from "../core/types.js";

export type ReserveResult = { ok: true } | { ok: false; reason: "at_capacity" | "daily_limit_exceeded" };

export interface RiskLimits {
  maxConcurrentPositions: number;
  dailyLimit: (chain: Chain) => number;
}

export interface RiskLedgerSnapshot {
  day: string;
  openPositions: number;
  maxConcurrentPositions: number;
  dailySpend: Record<Chain, number>;
  exposure: Record<Chain, number>;
}

export const utcDay = (timestamp: number): string => new Date(timestamp).toISOString().slice(0, 10);

// Float sums of trade sizes drift; compare with a small tolerance.
const EPSILON = 1e-9;

/**
 * Single owner of the process-wide risk budget. Every method runs to
 * completion without awaiting, so `tryReserve` is an atomic check-and-reserve
 * on a single-threaded host.
 */
export class RiskLedger {
  private readonly limits: RiskLimits;
  private readonly clock: Clock;
  private day: string;
  private openPositions = 0;
  private readonly dailySpend = new Map<Chain, number>();
  private readonly exposure = new Map<Chain, number>();

  constructor(limits: RiskLimits, clock: Clock = Date.now, persisted?: DailySpendRecord | null) {
    this.limits = limits;
    this.clock = clock;
    this.day = utcDay(clock());
    if (persisted && persisted.day === this.day) {
      for (const [chain, spent] of Object.entries(persisted.byChain)) {
        this.dailySpend.set(chain, spent);
      }
    }
  }

  tryReserve(chain: Chain, amount: number): ReserveResult {
    this.rolloverDay();
    if (this.openPositions >= this.limits.maxConcurrentPositions) {
      return { ok: false, reason: "at_capacity" };
    }
    const spent = this.dailySpend.get(chain) ?? 0;
    if (spent + amount > this.limits.dailyLimit(chain) + EPSILON) {
      return { ok: false, reason: "daily_limit_exceeded" };
    }
    this.dailySpend.set(chain, spent + amount);
    this.exposure.set(chain, (this.exposure.get(chain) ?? 0) + amount);
    this.openPositions += 1;
    return { ok: true };
  }

  /** Frees the position slot. Daily spend stays committed. */
  release(chain: Chain, amount: number): void {
    this.openPositions = Math.max(0, this.openPositions - 1);
    this.exposure.set(chain, Math.max(0, (this.exposure.get(chain) ?? 0) - amount));
  }

  /**
   * Re-admits a position resumed from persisted state. Daily spend is not
   * charged again; the concurrency cap still holds. Returns whether a slot
   * was taken.
   */
  restore(chain: Chain, amount: number): boolean {
    if (this.openPositions >= this.limits.maxConcurrentPositions) {
      return false;
    }
    this.openPositions += 1;
    this.exposure.set(chain, (this.exposure.get(chain) ?? 0) + amount);
    return true;
  }

  /** Resets daily spend when the UTC day changed. Returns whether it rolled. */
  rolloverDay(now: number = this.clock()): boolean {
    const today = utcDay(now);
    if (today === this.day) {
      return false;
    }
    this.day = today;
    this.dailySpend.clear();
    return true;
  }

  dailySpendRecord(): DailySpendRecord {
    return { day: this.day, byChain: Object.fromEntries(this.dailySpend) };
  }

  snapshot(): RiskLedgerSnapshot {
    return {
      day: this.day,
      openPositions: this.openPositions,
      maxConcurrentPositions: this.limits.maxConcurrentPositions,
      dailySpend: Object.fromEntries(this.dailySpend),
      exposure: Object.fromEntries(this.exposure)
    };
  }
}
