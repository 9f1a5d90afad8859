/**
 * @sockrpc/client - Call Queue
 * Runs calls one at a time over a shared connection
 */

import { RpcError } from "./errors.js";

// ============================================================================
// CALL QUEUE
// ============================================================================

export interface CallQueueOptions {
  /** Maximum calls running at once (default: 1) */
  maxConcurrent?: number | undefined;
  /** Maximum calls waiting to run (default: unbounded) */
  maxQueue?: number | undefined;
  /** Optional callback when a call is rejected */
  onRejected?: (() => void) | undefined;
}

interface QueuedCall {
  run: () => void;
  cancel: (error: Error) => void;
}

/**
 * Error thrown when the queue is full
 */
export class CallQueueFullError extends RpcError {
  constructor(maxQueue: number) {
    super(`Call queue full (${maxQueue} waiting)`, "CALL_QUEUE_FULL", {
      retryable: true,
      details: { maxQueue },
    });
    this.name = "CallQueueFullError";
  }
}

/**
 * FIFO admission for calls.
 *
 * A call starts once fewer than `maxConcurrent` are running; otherwise it
 * waits in arrival order. With the default of one, request/response pairs
 * on the wire can never interleave.
 */
export class CallQueue {
  private _running = 0;
  private readonly waiting: QueuedCall[] = [];
  private readonly maxConcurrent: number;
  private readonly maxQueue: number;
  private readonly onRejected: (() => void) | undefined;

  constructor(options: CallQueueOptions = {}) {
    this.maxConcurrent = options.maxConcurrent ?? 1;
    this.maxQueue = options.maxQueue ?? Number.POSITIVE_INFINITY;
    this.onRejected = options.onRejected;
  }

  /**
   * Get current running count
   */
  get running(): number {
    return this._running;
  }

  /**
   * Get current queue size
   */
  get queued(): number {
    return this.waiting.length;
  }

  /**
   * Check if the queue is full
   */
  get isFull(): boolean {
    return this._running >= this.maxConcurrent && this.waiting.length >= this.maxQueue;
  }

  /**
   * Run a function once the queue admits it
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this._running < this.maxConcurrent) {
      return this.run(fn);
    }

    if (this.waiting.length < this.maxQueue) {
      return this.enqueue(fn);
    }

    this.onRejected?.();
    throw new CallQueueFullError(this.maxQueue);
  }

  /**
   * Reject every waiting call. Running calls are not affected.
   */
  clear(error: Error = new RpcError("Call queue cleared")): void {
    while (this.waiting.length > 0) {
      this.waiting.shift()?.cancel(error);
    }
  }

  private async run<T>(fn: () => Promise<T>): Promise<T> {
    this._running++;
    try {
      return await fn();
    } finally {
      this._running--;
      this.next();
    }
  }

  private enqueue<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.waiting.push({
        run: () => {
          this.run(fn).then(resolve, reject);
        },
        cancel: reject,
      });
    });
  }

  private next(): void {
    if (this._running >= this.maxConcurrent) return;
    this.waiting.shift()?.run();
  }
}
