const DEXSCREENER_API = "https://api.dexscreener.com";

// The tokens endpoint accepts up to 30 comma-separated addresses.
export const MAX_TOKENS_PER_REQUEST = 30;

export interface DexPair {
  chainId: string;
  pairAddress: string;
  baseToken: { address: string; symbol: string };
  quoteToken: { address: string; symbol: string };
  priceNative?: string;
  priceUsd?: string;
  liquidity?: { usd?: number };
  pairCreatedAt?: number;
}

export interface TokenMarket {
  address: string;
  symbol: string;
  /** Price in the pool's quote token (SOL for SOL pairs). */
  priceNative: number | null;
  priceUsd: number | null;
  liquidityUsd: number | null;
  pairCreatedAt: number | null;
}

const toNumber = (value: string | number | undefined): number | null => {
  if (value === undefined) {
    return null;
  }
  const parsed = typeof value === "number" ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : null;
};

/** Market data per token from its deepest pool on `chainId`, optionally against one quote token. */
export class DexScreenerClient {
  private readonly chainId: string;
  private readonly quoteAddress: string | null;
  private readonly baseUrl: string;

  constructor(chainId = "solana", quoteAddress: string | null = null, baseUrl = DEXSCREENER_API) {
    this.chainId = chainId;
    this.quoteAddress = quoteAddress;
    this.baseUrl = baseUrl;
  }

  async getMarkets(addresses: string[], signal?: AbortSignal): Promise<Map<string, TokenMarket>> {
    const markets = new Map<string, TokenMarket>();
    for (let i = 0; i < addresses.length; i += MAX_TOKENS_PER_REQUEST) {
      const batch = addresses.slice(i, i + MAX_TOKENS_PER_REQUEST);
      const response = await fetch(`${this.baseUrl}/latest/dex/tokens/${batch.join(",")}`, { signal });
      if (!response.ok) {
        throw new Error(`DexScreener tokens request failed with HTTP ${response.status}`);
      }
      const body = (await response.json()) as { pairs?: DexPair[] | null };
      for (const pair of body.pairs ?? []) {
        this.mergePair(markets, pair);
      }
    }
    return markets;
  }

  async getMarket(address: string, signal?: AbortSignal): Promise<TokenMarket | null> {
    const markets = await this.getMarkets([address], signal);
    return markets.get(address) ?? null;
  }

  private mergePair(markets: Map<string, TokenMarket>, pair: DexPair): void {
    if (pair.chainId !== this.chainId || (this.quoteAddress && pair.quoteToken.address !== this.quoteAddress)) {
      return;
    }
    const address = pair.baseToken.address;
    const liquidityUsd = toNumber(pair.liquidity?.usd);
    const current = markets.get(address);
    if (current && (current.liquidityUsd ?? 0) >= (liquidityUsd ?? 0)) {
      return;
    }
    markets.set(address, {
      address,
      symbol: pair.baseToken.symbol,
      priceNative: toNumber(pair.priceNative),
      priceUsd: toNumber(pair.priceUsd),
      liquidityUsd,
      pairCreatedAt: pair.pairCreatedAt ?? null
    });
  }
}
