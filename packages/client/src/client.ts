/**
 * @sockrpc/client - RPC Client
 * Calls named functions on a remote server over one TCP connection
 */

import type { Logger } from "@sockrpc/core";
import { CallQueue } from "./call-queue.js";
import { resolveClientOptions } from "./config.js";
import { Connection } from "./connection.js";
import { ConnectionError } from "./errors.js";
import { receiveFrame, sendFrame } from "./framing.js";
import { interpretResponse, marshalRequest, unmarshalResponse } from "./marshal.js";
import { executeWithTimeout, TimeoutExceededError } from "./timeout.js";
import type {
  CallState,
  ConnectionState,
  RpcClientOptions,
  RpcResult,
  RpcValue,
} from "./types.js";

// ============================================================================
// RPC CLIENT
// ============================================================================

/**
 * RPC client bound to one server endpoint.
 *
 * @example
 * ```typescript
 * const client = new RpcClient({ host: "127.0.0.1", port: 9000 });
 * await client.connect();
 * const sum = await client.call("add", 10, 5); // 15
 * client.disconnect();
 * ```
 */
export class RpcClient {
  private readonly connection: Connection;
  private readonly queue: CallQueue;
  private readonly timeout: number | undefined;
  private readonly maxFrameSize: number | undefined;
  private readonly logger: Logger;
  private _callState: CallState = "idle";

  constructor(options: RpcClientOptions) {
    const resolved = resolveClientOptions(options);

    this.logger = resolved.logger.child({ component: "rpc-client" });
    this.timeout = resolved.timeout;
    this.maxFrameSize = resolved.maxFrameSize;
    this.connection = new Connection({
      host: resolved.host,
      port: resolved.port,
      connectTimeout: resolved.connectTimeout,
      logger: this.logger,
    });
    this.queue = new CallQueue({
      maxConcurrent: 1,
      maxQueue: resolved.maxQueuedCalls,
      onRejected: () => {
        this.logger.debug("Call rejected, queue full", { queued: this.queue.queued });
      },
    });
  }

  get host(): string {
    return this.connection.host;
  }

  get port(): number {
    return this.connection.port;
  }

  get state(): ConnectionState {
    return this.connection.state;
  }

  get isConnected(): boolean {
    return this.connection.isConnected;
  }

  /** Stage of the call in flight, or "idle" */
  get callState(): CallState {
    return this._callState;
  }

  /** Calls waiting behind the one in flight */
  get pendingCalls(): number {
    return this.queue.queued;
  }

  /**
   * Connect to the server. Does nothing when already connected.
   */
  async connect(): Promise<void> {
    await this.connection.connect();
  }

  /**
   * Disconnect from the server. Idempotent and never throws.
   */
  disconnect(): void {
    this.connection.disconnect();
  }

  /**
   * Call a remote function.
   *
   * Resolves with the result, or `undefined` when the server sent none.
   * Concurrent calls run one after another in call order.
   */
  async call(name: string, ...args: RpcValue[]): Promise<RpcResult> {
    return this.queue.execute(() => this.invoke(name, args));
  }

  /**
   * Connect, run `fn`, then disconnect, whether `fn` succeeds or throws.
   */
  async use<T>(fn: (client: this) => Promise<T>): Promise<T> {
    await this.connect();
    try {
      return await fn(this);
    } finally {
      this.disconnect();
    }
  }

  private async invoke(name: string, args: readonly unknown[]): Promise<RpcResult> {
    if (!this.connection.isConnected) {
      throw new ConnectionError("Not connected");
    }

    const payload = marshalRequest(name, args);
    this.logger.trace("Call", { function: name, bytes: payload.length });

    try {
      const body = await this.exchange(payload);

      this._callState = "decoding";
      const result = interpretResponse(unmarshalResponse(body));
      this.logger.trace("Call succeeded", { function: name });
      return result;
    } finally {
      this._callState = "idle";
    }
  }

  /** Send one request frame and wait for the reply frame */
  private async exchange(payload: Buffer): Promise<Uint8Array> {
    const roundTrip = async (): Promise<Uint8Array> => {
      this._callState = "sending";
      await sendFrame(this.connection, payload);
      this._callState = "awaiting";
      return receiveFrame(this.connection, { maxFrameSize: this.maxFrameSize });
    };

    const timeout = this.timeout;
    if (timeout === undefined) {
      return roundTrip();
    }

    return executeWithTimeout(roundTrip, timeout, () => {
      const phase = this._callState === "sending" ? "send" : "recv";
      this.logger.debug("Call timed out", { phase, timeout });
      this.connection.disconnect();
      throw ConnectionError.fromSocketError(phase, new TimeoutExceededError(timeout));
    });
  }
}

// ============================================================================
// FACTORIES
// ============================================================================

/**
 * Create an RPC client. The client starts disconnected.
 */
export function createRpcClient(options: RpcClientOptions): RpcClient {
  return new RpcClient(options);
}

/**
 * Run `fn` with a freshly connected client, disconnecting afterwards.
 *
 * @example
 * ```typescript
 * const greeting = await withClient({ host: "127.0.0.1", port: 9000 }, (client) =>
 *   client.call("greet", "World")
 * );
 * ```
 */
export async function withClient<T>(
  options: RpcClientOptions,
  fn: (client: RpcClient) => Promise<T>
): Promise<T> {
  return createRpcClient(options).use(fn);
}
