import { AsyncChannel } from "../core/channel.js";
import { FeedDisconnected, errorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { Clock, PriceFeed, PriceTick } from "../core/types.js";
import type { PriceOracle } from "./priceOracle.js";

type MarketSource = Pick<PriceOracle, "getMarkets">;

/**
 * Price feed that polls market data for every watched asset on a fixed
 * interval. Consecutive poll failures past `maxFailures` end the stream with
 * `FeedDisconnected`.
 */
export class PriceWatcher implements PriceFeed {
  private readonly source: MarketSource;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly maxFailures: number;
  private readonly clock: Clock;
  private readonly watched = new Set<string>();

  constructor(source: MarketSource, logger: Logger, intervalMs = 5_000, maxFailures = 3, clock: Clock = Date.now) {
    this.source = source;
    this.logger = logger;
    this.intervalMs = intervalMs;
    this.maxFailures = maxFailures;
    this.clock = clock;
  }

  watch(assetId: string): void {
    this.watched.add(assetId);
  }

  unwatch(assetId: string): void {
    this.watched.delete(assetId);
  }

  async *stream(signal: AbortSignal): AsyncGenerator<PriceTick> {
    const channel = new AsyncChannel<PriceTick>();
    let failures = 0;
    let polling = false;

    const poll = async (): Promise<void> => {
      if (polling || this.watched.size === 0) {
        return;
      }
      polling = true;
      try {
        const markets = await this.source.getMarkets([...this.watched], signal);
        failures = 0;
        const timestamp = this.clock();
        for (const [assetId, market] of markets) {
          if (market.priceNative !== null && this.watched.has(assetId)) {
            channel.push({ assetId, price: market.priceNative, timestamp });
          }
        }
      } catch (error) {
        if (signal.aborted) {
          return;
        }
        failures += 1;
        this.logger.warn("price_poll_failed", { failures, error: errorMessage(error) });
        if (failures >= this.maxFailures) {
          channel.fail(new FeedDisconnected("price", { cause: error }));
        }
      } finally {
        polling = false;
      }
    };

    const timer = setInterval(() => void poll(), this.intervalMs);
    try {
      yield* channel.iterate(signal);
    } finally {
      clearInterval(timer);
    }
  }
}
