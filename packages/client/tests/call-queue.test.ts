/**
 * @sockrpc/client - Call queue and timeout tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { CallQueue, CallQueueFullError } from "../src/call-queue.js";
import { executeWithTimeout, TimeoutExceededError } from "../src/timeout.js";

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("CallQueue", () => {
  it("should run one call at a time in arrival order", async () => {
    const queue = new CallQueue();
    const order: string[] = [];
    const gate = deferred<void>();

    const first = queue.execute(async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
      return 1;
    });
    const second = queue.execute(async () => {
      order.push("second");
      return 2;
    });
    const third = queue.execute(async () => {
      order.push("third");
      return 3;
    });

    expect(queue.running).toBe(1);
    expect(queue.queued).toBe(2);

    gate.resolve();
    expect(await Promise.all([first, second, third])).toEqual([1, 2, 3]);
    expect(order).toEqual(["first:start", "first:end", "second", "third"]);
    expect(queue.running).toBe(0);
  });

  it("should reject when the queue is full", async () => {
    const onRejected = vi.fn();
    const queue = new CallQueue({ maxQueue: 1, onRejected });
    const gate = deferred<void>();

    const running = queue.execute(() => gate.promise);
    const waiting = queue.execute(async () => "queued");

    expect(queue.isFull).toBe(true);
    await expect(queue.execute(async () => "rejected")).rejects.toBeInstanceOf(CallQueueFullError);
    expect(onRejected).toHaveBeenCalledTimes(1);

    gate.resolve();
    await running;
    expect(await waiting).toBe("queued");
  });

  it("should carry the CALL_QUEUE_FULL code", async () => {
    const queue = new CallQueue({ maxQueue: 0 });
    const gate = deferred<void>();
    const running = queue.execute(() => gate.promise);

    await expect(queue.execute(async () => undefined)).rejects.toMatchObject({
      code: "CALL_QUEUE_FULL",
      message: "Call queue full (0 waiting)",
    });

    gate.resolve();
    await running;
  });

  it("should keep going after a failed call", async () => {
    const queue = new CallQueue();

    const failing = queue.execute(async () => {
      throw new Error("boom");
    });
    const next = queue.execute(async () => "after");

    await expect(failing).rejects.toThrow("boom");
    expect(await next).toBe("after");
  });

  it("should reject waiting calls on clear", async () => {
    const queue = new CallQueue();
    const gate = deferred<void>();

    const running = queue.execute(() => gate.promise);
    const waiting = queue.execute(async () => "never");

    queue.clear(new Error("shutting down"));
    await expect(waiting).rejects.toThrow("shutting down");

    gate.resolve();
    await running;
    expect(queue.queued).toBe(0);
  });
});

describe("executeWithTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should resolve when the work finishes in time", async () => {
    await expect(executeWithTimeout(async () => "done", 1000)).resolves.toBe("done");
  });

  it("should reject with TimeoutExceededError after the deadline", async () => {
    vi.useFakeTimers();
    const result = executeWithTimeout(() => new Promise<never>(() => undefined), 50);
    const assertion = expect(result).rejects.toThrow("Operation timed out after 50ms");

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  it("should reject with the error onTimeout throws", async () => {
    vi.useFakeTimers();
    const onTimeout = vi.fn(() => {
      throw new Error("cut off");
    });
    const result = executeWithTimeout(() => new Promise<never>(() => undefined), 20, onTimeout);
    const assertion = expect(result).rejects.toThrow("cut off");

    await vi.advanceTimersByTimeAsync(20);
    await assertion;
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });

  it("should expose the exceeded timeout", () => {
    const error = new TimeoutExceededError(250);
    expect(error.timeout).toBe(250);
    expect(error.name).toBe("TimeoutExceededError");
  });
});
