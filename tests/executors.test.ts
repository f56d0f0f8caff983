import { describe, expect, it } from "vitest";
import { ExecutionRejected } from "../src/core/errors.js";
import { PaperExecutor } from "../src/trading/executors.js";
import type { PriceQuoteSource } from "../src/trading/priceOracle.js";

class FixedQuotes implements PriceQuoteSource {
  readonly prices = new Map<string, number | null>();

  async getPrice(assetId: string): Promise<number | null> {
    return this.prices.get(assetId) ?? null;
  }
}

const signal = (): AbortSignal => new AbortController().signal;

describe("PaperExecutor", () => {
  it("buys above and sells below the quote by the simulated slippage", async () => {
    const quotes = new FixedQuotes();
    quotes.prices.set("mint-a", 2);
    const executor = new PaperExecutor(quotes, 1, () => 7);

    const buy = await executor.open("mint-a", 1.01, signal());
    quotes.prices.set("mint-a", 4);
    const sell = await executor.close("mint-a", signal());

    expect(buy).toEqual({ price: 2.02, amountTokens: 0.5, signature: "paper-buy-mint-a-7" });
    expect(sell).toEqual({ price: 3.96, amountTokens: 0.5, signature: "paper-sell-mint-a-7" });
  });

  it("rejects when there is no usable quote", async () => {
    const quotes = new FixedQuotes();
    quotes.prices.set("mint-zero", 0);
    const executor = new PaperExecutor(quotes, 1);

    await expect(executor.open("mint-missing", 1, signal())).rejects.toThrow(ExecutionRejected);
    await expect(executor.open("mint-zero", 1, signal())).rejects.toThrow("No market price for mint-zero");
  });

  it("does not fill once the signal is aborted", async () => {
    const quotes = new FixedQuotes();
    quotes.prices.set("mint-a", 2);
    const controller = new AbortController();
    controller.abort();

    await expect(new PaperExecutor(quotes).open("mint-a", 1, controller.signal)).rejects.toThrow();
  });
});
