/**
 * @sockrpc/client - Connection
 * Owns one TCP socket to a fixed endpoint
 */

import { createConnection, type Socket } from "node:net";
import { errorMessage, type Logger } from "@sockrpc/core";
import { ByteReader } from "./byte-reader.js";
import { ConnectionError } from "./errors.js";
import type { ConnectionPhase, ConnectionState } from "./types.js";

// ============================================================================
// CONNECTION
// ============================================================================

export interface ConnectionOptions {
  host: string;
  port: number;
  /** Deadline for establishing the connection, in ms */
  connectTimeout?: number | undefined;
  logger: Logger;
}

/**
 * A single stream socket with an explicit connected/disconnected state.
 *
 * Any send or receive fault disconnects first and then throws a
 * {@link ConnectionError}, so the connection is never left open but broken.
 * It never reconnects on its own.
 */
export class Connection {
  readonly host: string;
  readonly port: number;
  private readonly connectTimeout: number | undefined;
  private readonly log: Logger;
  private socket: Socket | null = null;
  private reader: ByteReader | null = null;
  /** Socket of the connect attempt in flight */
  private pending: Socket | null = null;
  private connecting: Promise<void> | null = null;

  constructor(options: ConnectionOptions) {
    this.host = options.host;
    this.port = options.port;
    this.connectTimeout = options.connectTimeout;
    this.log = options.logger.child({ endpoint: `${options.host}:${options.port}` });
  }

  get state(): ConnectionState {
    return this.socket ? "connected" : "disconnected";
  }

  get isConnected(): boolean {
    return this.socket !== null;
  }

  /**
   * Open the socket. Does nothing when already connected; concurrent
   * callers share one attempt.
   */
  async connect(): Promise<void> {
    if (this.socket) return;
    if (!this.connecting) {
      this.connecting = this.open().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  /**
   * Close the socket. Idempotent and never throws. A connect attempt in
   * flight is abandoned and rejects with a connect-phase error.
   */
  disconnect(): void {
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.destroy(new Error("Connection closed before connect completed"));
    }

    const socket = this.socket;
    const reader = this.reader;
    if (!socket) return;

    this.socket = null;
    this.reader = null;

    try {
      socket.end();
      socket.destroy();
    } catch (error) {
      this.log.debug("Socket shutdown failed", { error: errorMessage(error) });
    } finally {
      reader?.fail(new Error("Connection closed"));
      this.log.debug("Disconnected");
    }
  }

  /**
   * Write all of `data`. Resolves once the transport has taken every byte.
   */
  async send(data: Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      throw new ConnectionError("Not connected");
    }

    try {
      await new Promise<void>((resolve, reject) => {
        socket.write(data, (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    } catch (error) {
      throw this.fault("send", error);
    }
  }

  /**
   * Read exactly `size` bytes. A peer close before then is a fault.
   */
  async receive(size: number): Promise<Buffer> {
    const reader = this.reader;
    if (!reader) {
      throw new ConnectionError("Not connected");
    }

    try {
      return await reader.read(size);
    } catch (error) {
      throw this.fault("recv", error);
    }
  }

  private open(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const socket = createConnection({ host: this.host, port: this.port });
      let timer: ReturnType<typeof setTimeout> | undefined;
      this.pending = socket;

      const settle = (): void => {
        if (timer !== undefined) clearTimeout(timer);
        if (this.pending === socket) this.pending = null;
        socket.off("connect", onConnect);
        socket.off("error", onError);
      };

      const onConnect = (): void => {
        settle();
        socket.setNoDelay(true);
        this.attach(socket);
        this.log.debug("Connected");
        resolve();
      };

      const onError = (error: Error): void => {
        settle();
        socket.destroy();
        this.log.debug("Connect failed", { error: error.message });
        reject(ConnectionError.fromSocketError("connect", error));
      };

      socket.once("connect", onConnect);
      socket.once("error", onError);

      const timeout = this.connectTimeout;
      if (timeout !== undefined) {
        timer = setTimeout(() => {
          onError(new Error(`timed out after ${timeout}ms`));
        }, timeout);
      }
    });
  }

  private attach(socket: Socket): void {
    const reader = new ByteReader();

    socket.on("data", (chunk: Buffer) => {
      reader.push(chunk);
    });
    socket.on("end", () => {
      reader.fail(new Error("Connection closed by peer"));
    });
    socket.on("error", (error: Error) => {
      reader.fail(error);
    });
    socket.on("close", () => {
      reader.fail(new Error("Connection closed"));
    });

    this.socket = socket;
    this.reader = reader;
  }

  /** Disconnect and describe the fault */
  private fault(phase: ConnectionPhase, error: unknown): ConnectionError {
    this.log.debug("Socket fault", { phase, error: errorMessage(error) });
    this.disconnect();
    return ConnectionError.fromSocketError(phase, error);
  }
}
