import { errorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { AssetSnapshot, Chain, Clock } from "../core/types.js";
import type { HeliusRpcClient } from "../rpc/heliusClient.js";
import type { DexScreenerClient, TokenMarket } from "../rpc/dexScreenerClient.js";
import type { RugCheckClient } from "../rpc/rugCheckClient.js";

export interface PriceQuoteSource {
  /** Latest price in the quote token, or null when no market is known. */
  getPrice(assetId: string, signal?: AbortSignal): Promise<number | null>;
}

interface CacheEntry {
  market: TokenMarket;
  expiresAt: number;
}

interface HolderStats {
  holders: number | null;
  topHolderPercent: number | null;
}

interface TokenAccountsPage {
  total?: number;
}

interface LargestAccounts {
  value: { amount: string }[];
}

interface TokenSupply {
  value: { amount: string };
}

const settledValue = <T>(result: PromiseSettledResult<T>, fallback: T): T =>
  result.status === "fulfilled" ? result.value : fallback;

/**
 * Market data for discovered and held tokens. Prices come from DexScreener
 * (cached for `ttlMs`), holder data from Helius and the external safety score
 * from RugCheck. A source that fails leaves its fields null.
 */
export class PriceOracle implements PriceQuoteSource {
  private readonly dex: DexScreenerClient;
  private readonly rpc: HeliusRpcClient;
  private readonly rugCheck: RugCheckClient;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly ttlMs: number;
  private readonly cache = new Map<string, CacheEntry>();

  constructor(
    dex: DexScreenerClient,
    rpc: HeliusRpcClient,
    rugCheck: RugCheckClient,
    logger: Logger,
    ttlMs = 2_000,
    clock: Clock = Date.now
  ) {
    this.dex = dex;
    this.rpc = rpc;
    this.rugCheck = rugCheck;
    this.logger = logger;
    this.ttlMs = ttlMs;
    this.clock = clock;
  }

  async getPrice(assetId: string, signal?: AbortSignal): Promise<number | null> {
    const markets = await this.getMarkets([assetId], signal);
    return markets.get(assetId)?.priceNative ?? null;
  }

  async getMarkets(assetIds: string[], signal?: AbortSignal): Promise<Map<string, TokenMarket>> {
    const now = this.clock();
    this.pruneCache(now);
    const result = new Map<string, TokenMarket>();
    const missing: string[] = [];
    for (const assetId of assetIds) {
      const cached = this.cache.get(assetId);
      if (cached) {
        result.set(assetId, cached.market);
      } else {
        missing.push(assetId);
      }
    }
    if (missing.length > 0) {
      const fetched = await this.dex.getMarkets(missing, signal);
      for (const [assetId, market] of fetched) {
        this.cache.set(assetId, { market, expiresAt: now + this.ttlMs });
        result.set(assetId, market);
      }
    }
    return result;
  }

  get cachedCount(): number {
    return this.cache.size;
  }

  async buildSnapshot(mint: string, chain: Chain, signal?: AbortSignal): Promise<AssetSnapshot> {
    const [market, holders, safety] = await Promise.allSettled([
      this.dex.getMarket(mint, signal),
      this.getHolderStats(mint, signal),
      this.rugCheck.getSafetyScore(mint, signal)
    ]);
    for (const [source, result] of [["market", market], ["holders", holders], ["safety", safety]] as const) {
      if (result.status === "rejected") {
        this.logger.debug("snapshot_source_failed", { assetId: mint, source, error: errorMessage(result.reason) });
      }
    }

    const now = this.clock();
    const tokenMarket = settledValue(market, null);
    const holderStats = settledValue<HolderStats>(holders, { holders: null, topHolderPercent: null });
    return {
      id: mint,
      chain,
      symbol: tokenMarket?.symbol,
      liquidityUsd: tokenMarket?.liquidityUsd ?? null,
      holders: holderStats.holders,
      topHolderPercent: holderStats.topHolderPercent,
      poolAgeSeconds: tokenMarket?.pairCreatedAt ? Math.max(0, (now - tokenMarket.pairCreatedAt) / 1000) : null,
      safetyProviderScore: settledValue(safety, null),
      priceUsd: tokenMarket?.priceUsd ?? null,
      discoveredAt: now
    };
  }

  private async getHolderStats(mint: string, signal?: AbortSignal): Promise<HolderStats> {
    const [accounts, largest, supply] = await Promise.all([
      this.rpc.request<TokenAccountsPage>("getTokenAccounts", { mint, limit: 1000, page: 1 }, signal),
      this.rpc.request<LargestAccounts>("getTokenLargestAccounts", [mint], signal),
      this.rpc.request<TokenSupply>("getTokenSupply", [mint], signal)
    ]);
    const totalSupply = Number(supply.value.amount);
    const topAmount = largest.value.length > 0 ? Number(largest.value[0].amount) : null;
    return {
      holders: typeof accounts.total === "number" ? accounts.total : null,
      topHolderPercent: topAmount !== null && totalSupply > 0 ? (topAmount / totalSupply) * 100 : null
    };
  }

  private pruneCache(now: number): void {
    for (const [assetId, entry] of this.cache) {
      if (entry.expiresAt <= now) {
        this.cache.delete(assetId);
      }
    }
  }
}
