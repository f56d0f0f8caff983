import type WebSocket from "ws";
import { AsyncChannel } from "../core/channel.js";
import { FeedDisconnected, errorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { AssetSnapshot, Chain, DiscoveryFeed } from "../core/types.js";
import type { HeliusRpcClient } from "../rpc/heliusClient.js";
import type { PriceOracle } from "../trading/priceOracle.js";

export const RAYDIUM_AMM_PROGRAM_ID = "675kPX9MHTjS2zt1qfr1NYHuzeLXfQM9H24wFSUt1Mp8";
export const WSOL_MINT = "So11111111111111111111111111111111111111112";

// Account positions of the coin and pc mints in Raydium's initialize2 instruction.
const COIN_MINT_INDEX = 8;
const PC_MINT_INDEX = 9;

interface LogsNotification {
  method?: string;
  params?: {
    result?: {
      value?: {
        signature?: string;
        err?: unknown;
        logs?: string[];
      };
    };
  };
}

interface ParsedInstruction {
  programId?: string;
  accounts?: string[];
}

interface ParsedTransaction {
  transaction?: { message?: { instructions?: ParsedInstruction[] } };
}

type SnapshotSource = Pick<PriceOracle, "buildSnapshot">;

/** Keeps the newest half of `seen` once it grows past `max`. */
export const trimSeen = (seen: Set<string>, max: number): Set<string> =>
  seen.size > max ? new Set([...seen].slice(-Math.floor(max / 2))) : seen;

/** Extracts the non-SOL mint of a pool created by a Raydium initialize2 instruction. */
export const newPoolMint = (transaction: ParsedTransaction): string | null => {
  const instructions = transaction.transaction?.message?.instructions ?? [];
  const init = instructions.find((ix) => ix.programId === RAYDIUM_AMM_PROGRAM_ID && (ix.accounts?.length ?? 0) > PC_MINT_INDEX);
  const accounts = init?.accounts;
  if (!accounts) {
    return null;
  }
  const coinMint = accounts[COIN_MINT_INDEX];
  const pcMint = accounts[PC_MINT_INDEX];
  if (coinMint === WSOL_MINT) {
    return pcMint;
  }
  if (pcMint === WSOL_MINT) {
    return coinMint;
  }
  return null;
};

/**
 * Discovery feed over Raydium pool creations. Subscribes to program logs,
 * resolves each initialize2 transaction to its token mint and enriches it
 * into an `AssetSnapshot`. The socket closing ends the stream with
 * `FeedDisconnected`.
 */
export class RaydiumListener implements DiscoveryFeed {
  private readonly client: HeliusRpcClient;
  private readonly snapshots: SnapshotSource;
  private readonly logger: Logger;
  private readonly chain: Chain;
  private readonly maxSeen: number;
  private seen = new Set<string>();

  constructor(
    client: HeliusRpcClient,
    snapshots: SnapshotSource,
    logger: Logger,
    chain: Chain = "solana",
    maxSeen = 10_000
  ) {
    this.client = client;
    this.snapshots = snapshots;
    this.logger = logger;
    this.chain = chain;
    this.maxSeen = maxSeen;
  }

  async *stream(signal: AbortSignal): AsyncGenerator<AssetSnapshot> {
    const channel = new AsyncChannel<AssetSnapshot>();
    const socket = this.client.connectWebSocket();

    socket.on("open", () => {
      const payload = {
        jsonrpc: "2.0",
        id: 1,
        method: "logsSubscribe",
        params: [{ mentions: [RAYDIUM_AMM_PROGRAM_ID] }, { commitment: "confirmed" }]
      };
      socket.send(JSON.stringify(payload));
      this.logger.info("discovery_subscribed", { program: RAYDIUM_AMM_PROGRAM_ID });
    });
    socket.on("message", (data: WebSocket.RawData) => {
      void this.handleMessage(data.toString(), channel, signal);
    });
    socket.on("error", (error: Error) => channel.fail(new FeedDisconnected("discovery", { cause: error })));
    socket.on("close", () => channel.fail(new FeedDisconnected("discovery")));

    try {
      yield* channel.iterate(signal);
    } finally {
      socket.removeAllListeners();
      socket.on("error", () => undefined);
      socket.close();
    }
  }

  private async handleMessage(raw: string, channel: AsyncChannel<AssetSnapshot>, signal: AbortSignal): Promise<void> {
    try {
      const message = JSON.parse(raw) as LogsNotification;
      if (message.method !== "logsNotification") {
        return;
      }
      const value = message.params?.result?.value;
      const signature = value?.signature;
      if (!signature || value.err || !value.logs?.some((line) => line.includes("initialize2"))) {
        return;
      }
      if (this.seen.has(signature)) {
        return;
      }
      this.remember(signature);

      const transaction = await this.client.request<ParsedTransaction>(
        "getTransaction",
        [signature, { encoding: "jsonParsed", commitment: "confirmed", maxSupportedTransactionVersion: 0 }],
        signal
      );
      const mint = newPoolMint(transaction);
      if (!mint || this.seen.has(mint)) {
        return;
      }
      this.remember(mint);
      const snapshot = await this.snapshots.buildSnapshot(mint, this.chain, signal);
      this.logger.debug("asset_discovered", { assetId: mint, signature });
      channel.push(snapshot);
    } catch (error) {
      if (!signal.aborted) {
        this.logger.warn("discovery_message_failed", { error: errorMessage(error) });
      }
    }
  }

  private remember(key: string): void {
    this.seen.add(key);
    this.seen = trimSeen(this.seen, this.maxSeen);
  }
}
