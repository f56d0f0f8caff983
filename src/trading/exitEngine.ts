import type { StrategyConfig } from "../config/config.js";
import type { CloseReason } from "../core/types.js";

export interface ExitInput {
  entryPrice: number;
  highWater: number;
  price: number;
  entryAt: number;
  now: number;
}

export type ExitDecision = { shouldExit: false } | { shouldExit: true; reason: CloseReason };

const HOLD: ExitDecision = { shouldExit: false };

/**
 * Exit rules in fixed priority: stop-loss, then take-profit (trailing
 * disabled) or the trailing stop (armed only after the take-profit level
 * was reached), then the optional time stop.
 */
export class ExitEngine {
  private readonly strategy: StrategyConfig;

  constructor(strategy: StrategyConfig) {
    this.strategy = strategy;
  }

  get trailingEnabled(): boolean {
    return this.strategy.trailing_stop;
  }

  stopLossPrice(entryPrice: number): number {
    return entryPrice * (1 - this.strategy.stop_loss / 100);
  }

  takeProfitPrice(entryPrice: number): number {
    return entryPrice * (1 + this.strategy.take_profit / 100);
  }

  isTrailingArmed(entryPrice: number, highWater: number): boolean {
    return this.trailingEnabled && highWater >= this.takeProfitPrice(entryPrice);
  }

  evaluate(input: ExitInput): ExitDecision {
    const { entryPrice, highWater, price } = input;

    if (price <= this.stopLossPrice(entryPrice)) {
      return { shouldExit: true, reason: "stop_loss" };
    }

    if (!this.trailingEnabled) {
      if (price >= this.takeProfitPrice(entryPrice)) {
        return { shouldExit: true, reason: "take_profit" };
      }
    } else if (this.isTrailingArmed(entryPrice, highWater)) {
      const trailPrice = highWater * (1 - this.strategy.trailing_distance / 100);
      if (price <= trailPrice) {
        return { shouldExit: true, reason: "trailing_stop" };
      }
    }

    if (this.strategy.max_hold_minutes > 0) {
      const heldMinutes = (input.now - input.entryAt) / 60_000;
      if (heldMinutes >= this.strategy.max_hold_minutes) {
        return { shouldExit: true, reason: "time_stop" };
      }
    }

    return HOLD;
  }
}
