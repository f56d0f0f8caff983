import WebSocket from "ws";

interface RpcEnvelope<T> {
  result?: T;
  error?: { code?: number; message?: string };
}

export class HeliusRpcClient {
  private readonly rpcUrl: string;
  private readonly wsUrl: string;
  private nextId = 1;

  constructor(rpcUrl: string, wsUrl: string) {
    this.rpcUrl = rpcUrl;
    this.wsUrl = wsUrl;
  }

  async request<T>(method: string, params: unknown = [], signal?: AbortSignal): Promise<T> {
    const payload = {
      jsonrpc: "2.0",
      id: this.nextId++,
      method,
      params
    };
    const response = await fetch(this.rpcUrl, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(payload),
      signal
    });
    if (!response.ok) {
      throw new Error(`RPC ${method} failed with HTTP ${response.status}`);
    }
    const body = (await response.json()) as RpcEnvelope<T>;
    if (body.error) {
      throw new Error(body.error.message || `RPC ${method} returned an error`);
    }
    if (body.result === undefined) {
      throw new Error(`RPC ${method} returned no result`);
    }
    return body.result;
  }

  connectWebSocket(): WebSocket {
    return new WebSocket(this.wsUrl);
  }
}
