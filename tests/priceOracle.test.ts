import { afterEach, describe, expect, it, vi } from "vitest";
import { WSOL_MINT } from "../src/listeners/raydiumListener.js";
import { DexScreenerClient } from "../src/rpc/dexScreenerClient.js";
import { HeliusRpcClient } from "../src/rpc/heliusClient.js";
import { RugCheckClient } from "../src/rpc/rugCheckClient.js";
import { PriceOracle } from "../src/trading/priceOracle.js";
import { RecordingLogger } from "./helpers.js";

const NOW = 1_800_000_000_000;
const RPC_URL = "http://rpc.test";

const json = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

const pairs = {
  pairs: [
    {
      chainId: "solana",
      pairAddress: "pair-usdc",
      baseToken: { address: "mint-a", symbol: "AAA" },
      quoteToken: { address: "usdc-mint", symbol: "USDC" },
      priceNative: "0.02",
      priceUsd: "0.02",
      liquidity: { usd: 50_000 },
      pairCreatedAt: NOW - 600_000
    },
    {
      chainId: "solana",
      pairAddress: "pair-sol",
      baseToken: { address: "mint-a", symbol: "AAA" },
      quoteToken: { address: WSOL_MINT, symbol: "SOL" },
      priceNative: "0.0001",
      priceUsd: "0.019",
      liquidity: { usd: 8_000 },
      pairCreatedAt: NOW - 90_000
    }
  ]
};

interface Routes {
  rpc: Record<string, unknown>;
  rugCheck: { status: number; body: unknown };
}

const installFetch = (routes: Routes) => {
  const calls: string[] = [];
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = String(input);
    if (url.startsWith("https://api.dexscreener.com/latest/dex/tokens/")) {
      calls.push("dexscreener");
      return json(pairs);
    }
    if (url.startsWith("https://api.rugcheck.xyz/v1/tokens/")) {
      calls.push("rugcheck");
      return json(routes.rugCheck.body, routes.rugCheck.status);
    }
    if (url === RPC_URL && typeof init?.body === "string") {
      const { method } = JSON.parse(init.body) as { method: string };
      calls.push(method);
      return json(routes.rpc[method] ?? { error: { message: `unexpected ${method}` } });
    }
    throw new Error(`unexpected request to ${url}`);
  });
  vi.stubGlobal("fetch", fetchMock);
  return calls;
};

const oracle = (logger = new RecordingLogger(), clock = { now: NOW }): PriceOracle =>
  new PriceOracle(
    new DexScreenerClient("solana", WSOL_MINT),
    new HeliusRpcClient(RPC_URL, "ws://rpc.test"),
    new RugCheckClient(),
    logger,
    2_000,
    () => clock.now
  );

describe("PriceOracle", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("builds a snapshot from market, holder and safety data", async () => {
    installFetch({
      rpc: {
        getTokenAccounts: { result: { total: 321 } },
        getTokenLargestAccounts: { result: { value: [{ amount: "250" }, { amount: "100" }] } },
        getTokenSupply: { result: { value: { amount: "1000" } } }
      },
      rugCheck: { status: 200, body: { score: 1200, score_normalised: 30 } }
    });

    const snapshot = await oracle().buildSnapshot("mint-a", "solana");

    expect(snapshot).toEqual({
      id: "mint-a",
      chain: "solana",
      symbol: "AAA",
      liquidityUsd: 8_000,
      holders: 321,
      topHolderPercent: 25,
      poolAgeSeconds: 90,
      safetyProviderScore: 70,
      priceUsd: 0.019,
      discoveredAt: NOW
    });
  });

  it("leaves the fields of a failing source empty", async () => {
    installFetch({
      rpc: { getTokenAccounts: { error: { message: "rate limited" } } },
      rugCheck: { status: 503, body: {} }
    });
    const logger = new RecordingLogger();

    const snapshot = await oracle(logger).buildSnapshot("mint-a", "solana");

    expect(snapshot).toMatchObject({ liquidityUsd: 8_000, holders: null, topHolderPercent: null, safetyProviderScore: null });
    expect(logger.entries.filter((entry) => entry.event === "snapshot_source_failed").map((entry) => entry.fields.source)).toEqual([
      "holders"
    ]);
  });

  it("serves repeated price lookups from its cache", async () => {
    const calls = installFetch({ rpc: {}, rugCheck: { status: 200, body: {} } });
    const prices = oracle();

    expect(await prices.getPrice("mint-a")).toBe(0.0001);
    expect(await prices.getPrice("mint-a")).toBe(0.0001);
    expect(await prices.getPrice("mint-missing")).toBeNull();
    expect(calls).toEqual(["dexscreener", "dexscreener"]);
  });

  it("drops cache entries once they expire", async () => {
    const calls = installFetch({ rpc: {}, rugCheck: { status: 200, body: {} } });
    const clock = { now: NOW };
    const prices = oracle(new RecordingLogger(), clock);

    await prices.getPrice("mint-a");
    expect(prices.cachedCount).toBe(1);

    clock.now += 1_999;
    await prices.getMarkets([]);
    expect(prices.cachedCount).toBe(1);

    clock.now += 1;
    await prices.getMarkets([]);
    expect(prices.cachedCount).toBe(0);
    expect(calls).toEqual(["dexscreener"]);
  });
});
