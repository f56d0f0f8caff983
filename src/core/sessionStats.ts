import type { Position, SessionStats } from "./types.js";

/** Run statistics, fed by position lifecycle events. */
export class SessionStatsTracker {
  private readonly stats: SessionStats;

  constructor(startedAt: number) {
    this.stats = {
      startedAt,
      opened: 0,
      closed: 0,
      wins: 0,
      losses: 0,
      cumulativePnlPercent: 0,
      entryFailures: 0,
      exitFailures: 0
    };
  }

  recordOpened(): void {
    this.stats.opened += 1;
  }

  recordClosed(position: Position): void {
    if (position.closeReason === "entry_failed") {
      this.stats.entryFailures += 1;
      return;
    }
    const pnl = position.realizedPnlPercent ?? 0;
    this.stats.closed += 1;
    this.stats.cumulativePnlPercent += pnl;
    if (pnl > 0) {
      this.stats.wins += 1;
    } else {
      this.stats.losses += 1;
    }
  }

  recordExitFailure(): void {
    this.stats.exitFailures += 1;
  }

  snapshot(): SessionStats {
    return { ...this.stats };
  }

  winRate(): number | null {
    const decided = this.stats.wins + this.stats.losses;
    return decided === 0 ? null : (this.stats.wins / decided) * 100;
  }
}
