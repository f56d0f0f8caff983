import { Connection, Keypair, PublicKey, VersionedTransaction } from "@solana/web3.js";
import {
  TOKEN_2022_PROGRAM_ID,
  TOKEN_PROGRAM_ID,
  getAccount,
  getAssociatedTokenAddress,
  getMint
} from "@solana/spl-token";
import bs58 from "bs58";
import { ExecutionRejected, errorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { Clock, ExecutionPort, Fill } from "../core/types.js";
import { WSOL_MINT } from "../listeners/raydiumListener.js";
import type { PriceQuoteSource } from "./priceOracle.js";

const LAMPORTS_PER_SOL = 1_000_000_000;
const JUPITER_QUOTE_URL = "https://quote-api.jup.ag/v6/quote";
const JUPITER_SWAP_URL = "https://quote-api.jup.ag/v6/swap";

/**
 * Simulated fills against the live quote, moved against the trader by
 * `slippagePercent`. Holdings are tracked so a close returns what was opened.
 */
export class PaperExecutor implements ExecutionPort {
  private readonly quotes: PriceQuoteSource;
  private readonly slippagePercent: number;
  private readonly clock: Clock;
  private readonly holdings = new Map<string, number>();

  constructor(quotes: PriceQuoteSource, slippagePercent = 1, clock: Clock = Date.now) {
    this.quotes = quotes;
    this.slippagePercent = slippagePercent;
    this.clock = clock;
  }

  async open(assetId: string, size: number, signal: AbortSignal): Promise<Fill> {
    const quote = await this.quote(assetId, signal);
    const price = quote * (1 + this.slippagePercent / 100);
    const amountTokens = size / price;
    this.holdings.set(assetId, (this.holdings.get(assetId) ?? 0) + amountTokens);
    return { price, amountTokens, signature: `paper-buy-${assetId}-${this.clock()}` };
  }

  async close(assetId: string, signal: AbortSignal): Promise<Fill> {
    const quote = await this.quote(assetId, signal);
    const price = quote * (1 - this.slippagePercent / 100);
    const amountTokens = this.holdings.get(assetId) ?? 0;
    this.holdings.delete(assetId);
    return { price, amountTokens, signature: `paper-sell-${assetId}-${this.clock()}` };
  }

  private async quote(assetId: string, signal: AbortSignal): Promise<number> {
    signal.throwIfAborted();
    const price = await this.quotes.getPrice(assetId, signal);
    signal.throwIfAborted();
    if (price === null || !Number.isFinite(price) || price <= 0) {
      throw new ExecutionRejected(`No market price for ${assetId}`);
    }
    return price;
  }
}

interface JupiterQuote {
  inAmount?: string;
  outAmount?: string;
  [key: string]: unknown;
}

interface TokenBalance {
  raw: bigint;
  decimals: number;
}

/**
 * Live swaps between SOL and the token through the Jupiter aggregator.
 * Entry size is in SOL; fill prices are SOL per token.
 */
export class JupiterExecutor implements ExecutionPort {
  private readonly connection: Connection;
  private readonly signer: Keypair;
  private readonly slippageBps: number;
  private readonly logger: Logger;

  constructor(rpcUrl: string, secretKey: string, slippageBps: number, logger: Logger) {
    const decoded = bs58.decode(secretKey);
    this.signer = decoded.length === 32 ? Keypair.fromSeed(decoded) : Keypair.fromSecretKey(decoded);
    this.connection = new Connection(rpcUrl, "confirmed");
    this.slippageBps = slippageBps;
    this.logger = logger;
  }

  get publicKey(): string {
    return this.signer.publicKey.toBase58();
  }

  async open(assetId: string, size: number, signal: AbortSignal): Promise<Fill> {
    try {
      const lamports = Math.round(size * LAMPORTS_PER_SOL);
      const before = await this.getTokenBalance(assetId);
      signal.throwIfAborted();
      const quote = await this.quote(WSOL_MINT, assetId, lamports, signal);
      const signature = await this.swap(quote, signal);
      const after = await this.getTokenBalance(assetId);
      const receivedRaw = after.raw - before.raw > 0n ? after.raw - before.raw : BigInt(quote.outAmount ?? "0");
      const amountTokens = Number(receivedRaw) / 10 ** after.decimals;
      if (amountTokens <= 0) {
        throw new ExecutionRejected(`Swap for ${assetId} returned no tokens`);
      }
      this.logger.info("swap_confirmed", { side: "buy", assetId, signature, amountTokens });
      return { price: size / amountTokens, amountTokens, signature };
    } catch (error) {
      throw this.reject("buy", assetId, error);
    }
  }

  async close(assetId: string, signal: AbortSignal): Promise<Fill> {
    try {
      const balance = await this.getTokenBalance(assetId);
      if (balance.raw === 0n) {
        throw new ExecutionRejected(`No ${assetId} balance to sell`);
      }
      signal.throwIfAborted();
      const quote = await this.quote(assetId, WSOL_MINT, balance.raw, signal);
      const signature = await this.swap(quote, signal);
      const amountTokens = Number(balance.raw) / 10 ** balance.decimals;
      const receivedSol = Number(quote.outAmount ?? "0") / LAMPORTS_PER_SOL;
      this.logger.info("swap_confirmed", { side: "sell", assetId, signature, amountTokens });
      return { price: receivedSol / amountTokens, amountTokens, signature };
    } catch (error) {
      throw this.reject("sell", assetId, error);
    }
  }

  private reject(side: "buy" | "sell", assetId: string, error: unknown): unknown {
    if (error instanceof ExecutionRejected || (error instanceof Error && error.name === "AbortError")) {
      return error;
    }
    return new ExecutionRejected(`Jupiter ${side} for ${assetId} failed: ${errorMessage(error)}`, { cause: error });
  }

  private async quote(inputMint: string, outputMint: string, amount: number | bigint, signal: AbortSignal): Promise<JupiterQuote> {
    const query = new URLSearchParams({
      inputMint,
      outputMint,
      amount: String(amount),
      slippageBps: String(this.slippageBps)
    });
    const response = await fetch(`${JUPITER_QUOTE_URL}?${query.toString()}`, { signal });
    if (!response.ok) {
      throw new ExecutionRejected(`Jupiter quote failed: ${response.status} ${await response.text()}`);
    }
    return (await response.json()) as JupiterQuote;
  }

  private async swap(quote: JupiterQuote, signal: AbortSignal): Promise<string> {
    const response = await fetch(JUPITER_SWAP_URL, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        quoteResponse: quote,
        userPublicKey: this.publicKey,
        wrapAndUnwrapSol: true,
        dynamicComputeUnitLimit: true
      }),
      signal
    });
    if (!response.ok) {
      throw new ExecutionRejected(`Jupiter swap build failed: ${response.status} ${await response.text()}`);
    }
    const body = (await response.json()) as { swapTransaction?: string };
    if (!body.swapTransaction) {
      throw new ExecutionRejected("Jupiter returned no swap transaction");
    }

    const transaction = VersionedTransaction.deserialize(Buffer.from(body.swapTransaction, "base64"));
    transaction.sign([this.signer]);
    signal.throwIfAborted();
    const signature = await this.connection.sendRawTransaction(transaction.serialize(), {
      skipPreflight: false,
      preflightCommitment: "confirmed",
      maxRetries: 3
    });
    const confirmation = await this.connection.confirmTransaction(signature, "confirmed");
    if (confirmation.value.err) {
      throw new ExecutionRejected(`Transaction ${signature} failed: ${JSON.stringify(confirmation.value.err)}`);
    }
    return signature;
  }

  private async getTokenBalance(mint: string): Promise<TokenBalance> {
    const mintKey = new PublicKey(mint);
    const mintAccount = await this.connection.getAccountInfo(mintKey);
    const programId = mintAccount?.owner.equals(TOKEN_2022_PROGRAM_ID) ? TOKEN_2022_PROGRAM_ID : TOKEN_PROGRAM_ID;
    const mintInfo = await getMint(this.connection, mintKey, "confirmed", programId);
    const ata = await getAssociatedTokenAddress(mintKey, this.signer.publicKey, false, programId);
    try {
      const account = await getAccount(this.connection, ata, "confirmed", programId);
      return { raw: account.amount, decimals: mintInfo.decimals };
    } catch (error) {
      if (error instanceof Error && error.name === "TokenAccountNotFoundError") {
        return { raw: 0n, decimals: mintInfo.decimals };
      }
      throw error;
    }
  }
}
