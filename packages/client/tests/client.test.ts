/**
 * @sockrpc/client - Client tests
 */

import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from "vitest";
import { createLogger, MemoryTransport } from "@sockrpc/core";
import { RpcClient, createRpcClient, withClient } from "../src/client.js";
import { CallQueueFullError } from "../src/call-queue.js";
import {
  ConnectionError,
  ExecutionError,
  FunctionNotFoundError,
  MarshalingError,
  ProtocolError,
  RpcError,
} from "../src/errors.js";
import { encodeFrame } from "../src/framing.js";
import type { RpcClientOptions } from "../src/types.js";
import { createReferenceServer, type ReferenceServer } from "../src/testing/index.js";
import { frame, silentLogger, startRawServer, unusedPort, type RawServer } from "./support/raw-server.js";

async function caught(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected a rejection");
}

describe("RpcClient", () => {
  let server: ReferenceServer;
  let port: number;
  const clients: RpcClient[] = [];

  function client(options: Partial<RpcClientOptions> = {}): RpcClient {
    const created = createRpcClient({
      host: "127.0.0.1",
      port,
      logger: silentLogger(),
      ...options,
    });
    clients.push(created);
    return created;
  }

  beforeAll(async () => {
    server = createReferenceServer({ logger: silentLogger() });
    ({ port } = await server.listen());
  });

  afterEach(() => {
    for (const c of clients.splice(0)) c.disconnect();
  });

  afterAll(async () => {
    await server.close();
  });

  describe("basic calls", () => {
    it("should add two integers", async () => {
      const rpc = client();
      await rpc.connect();
      expect(await rpc.call("add", 10, 5)).toBe(15);
    });

    it("should round-trip strings, booleans and nested data", async () => {
      const rpc = client();
      await rpc.connect();

      expect(await rpc.call("greet", "World")).toBe("Hello, World!");
      expect(await rpc.call("is_positive", -2.5)).toBe(false);
      expect(await rpc.call("echo", "hello")).toBe("hello");
      expect(await rpc.call("echo", { nested: [1, "two", null, true] })).toEqual({
        nested: [1, "two", null, true],
      });
      expect(await rpc.call("sum_array", [1, 2, 3, 4, 5, -1])).toBe(14);
      expect(await rpc.call("process_person", { name: "Alice", age: 30, is_student: false })).toBe(
        "Processed person: Alice, age 30, is not a student."
      );
      expect(await rpc.call("get_greetings", ["Bob", "Charlie"])).toEqual([
        "Hello, Bob!",
        "Hello, Charlie!",
      ]);
    });

    it("should return null for a function with no return value", async () => {
      const rpc = client();
      await rpc.connect();
      expect(await rpc.call("no_return")).toBeNull();
    });

    it("should truncate integer division", async () => {
      const rpc = client();
      await rpc.connect();
      expect(await rpc.call("divide", -7, 2)).toBe(-3);
    });
  });

  describe("server errors", () => {
    it("should raise FunctionNotFoundError for an unknown function", async () => {
      const rpc = client();
      await rpc.connect();

      const error = await caught(rpc.call("nonexistent_function", 1, 2, 3));
      expect(error).toBeInstanceOf(FunctionNotFoundError);
      expect(error).toHaveProperty("message", "Function not found");
    });

    it("should raise ExecutionError when the function fails", async () => {
      const rpc = client();
      await rpc.connect();

      await expect(rpc.call("divide", 10, 0)).rejects.toThrow(
        new ExecutionError("Execution error: Division by zero")
      );
      await expect(rpc.call("add", "1", 2)).rejects.toThrow(
        "Execution error: add requires two integer arguments"
      );
      await expect(rpc.call("sum_array", [1, "x"])).rejects.toThrow(
        "Execution error: All array elements must be integers"
      );
    });

    it("should stay connected after a server error", async () => {
      const rpc = client();
      await rpc.connect();

      await expect(rpc.call("echo")).rejects.toBeInstanceOf(ExecutionError);
      expect(rpc.isConnected).toBe(true);
      expect(await rpc.call("echo", 7)).toBe(7);
    });
  });

  describe("connection lifecycle", () => {
    it("should refuse calls before connect without opening a socket", async () => {
      await vi.waitFor(() => expect(server.connections).toBe(0));
      const rpc = client();

      const error = await caught(rpc.call("add", 1, 2));
      expect(error).toBeInstanceOf(ConnectionError);
      expect(error).toHaveProperty("message", "Not connected");
      expect(rpc.state).toBe("disconnected");
      expect(server.connections).toBe(0);
    });

    it("should make disconnect idempotent", async () => {
      const rpc = client();
      await rpc.connect();

      rpc.disconnect();
      expect(() => rpc.disconnect()).not.toThrow();
      expect(rpc.state).toBe("disconnected");
    });

    it("should treat connect on a connected client as a no-op", async () => {
      const rpc = client();
      await rpc.connect();
      await rpc.connect();

      expect(rpc.isConnected).toBe(true);
      expect(await rpc.call("add", 1, 1)).toBe(2);
    });

    it("should reconnect after disconnect", async () => {
      const rpc = client();
      await rpc.connect();
      rpc.disconnect();

      await rpc.connect();
      expect(await rpc.call("add", 2, 3)).toBe(5);
    });

    it("should report connect failures with the connect phase", async () => {
      const rpc = client({ port: await unusedPort() });

      const error = await caught(rpc.connect());
      expect(error).toBeInstanceOf(ConnectionError);
      expect(error).toHaveProperty("phase", "connect");
      expect(error).toHaveProperty("message", expect.stringMatching(/^Socket error during connect: /));
      expect(rpc.state).toBe("disconnected");
    });

    it("should abandon a connect in flight on disconnect", async () => {
      await vi.waitFor(() => expect(server.connections).toBe(0));
      const rpc = client();

      const pending = rpc.connect();
      rpc.disconnect();

      const error = await caught(pending);
      expect(error).toBeInstanceOf(ConnectionError);
      expect(error).toMatchObject({
        phase: "connect",
        message: "Socket error during connect: Connection closed before connect completed",
      });
      expect(rpc.state).toBe("disconnected");
      await vi.waitFor(() => expect(server.connections).toBe(0));

      await rpc.connect();
      expect(await rpc.call("add", 1, 1)).toBe(2);
    });

    it("should close the server-side socket on disconnect", async () => {
      await vi.waitFor(() => expect(server.connections).toBe(0));
      const rpc = client();
      await rpc.connect();
      await vi.waitFor(() => expect(server.connections).toBe(1));

      rpc.disconnect();
      await vi.waitFor(() => expect(server.connections).toBe(0));
    });

    it("should log connect and disconnect at debug", async () => {
      const transport = new MemoryTransport();
      const rpc = client({ logger: createLogger({ level: "DEBUG", transports: [transport] }) });

      await rpc.connect();
      rpc.disconnect();

      expect(transport.messages).toEqual(["Connected", "Disconnected"]);
      expect(transport.entries[0]?.context).toMatchObject({
        component: "rpc-client",
        endpoint: `127.0.0.1:${port}`,
      });
    });
  });

  describe("scoped use", () => {
    it("should disconnect after use resolves", async () => {
      const rpc = client();
      const result = await rpc.use((c) => c.call("add", 4, 4));

      expect(result).toBe(8);
      expect(rpc.isConnected).toBe(false);
    });

    it("should disconnect after use throws", async () => {
      const rpc = client();

      await expect(
        rpc.use(async (c) => {
          await c.call("add", 1, 1);
          throw new Error("caller failed");
        })
      ).rejects.toThrow("caller failed");
      expect(rpc.isConnected).toBe(false);
    });

    it("should run withClient against a fresh client", async () => {
      const greeting = await withClient(
        { host: "127.0.0.1", port, logger: silentLogger() },
        (c) => c.call("greet", "Ada")
      );
      expect(greeting).toBe("Hello, Ada!");
    });
  });

  describe("marshaling", () => {
    it("should fail before any I/O and keep the connection usable", async () => {
      const rpc = client();
      await rpc.connect();

      await expect(rpc.call("echo", Number.NaN)).rejects.toBeInstanceOf(MarshalingError);
      expect(rpc.isConnected).toBe(true);
      expect(await rpc.call("echo", 1)).toBe(1);
    });
  });

  describe("concurrency", () => {
    it("should serialize concurrent calls in call order", async () => {
      const rpc = client();
      await rpc.connect();

      const results = await Promise.all([
        rpc.call("add", 1, 2),
        rpc.call("greet", "Eve"),
        rpc.call("echo", [3]),
      ]);
      expect(results).toEqual([3, "Hello, Eve!", [3]]);
      expect(rpc.callState).toBe("idle");
    });

    it("should reject calls beyond maxQueuedCalls", async () => {
      const rpc = client({ maxQueuedCalls: 0 });
      await rpc.connect();

      const first = rpc.call("add", 1, 2);
      await expect(rpc.call("add", 3, 4)).rejects.toBeInstanceOf(CallQueueFullError);
      expect(await first).toBe(3);
    });
  });
});

describe("RpcClient against raw servers", () => {
  let raw: RawServer | null = null;
  const clients: RpcClient[] = [];

  function client(port: number, options: Partial<RpcClientOptions> = {}): RpcClient {
    const created = new RpcClient({ host: "127.0.0.1", port, logger: silentLogger(), ...options });
    clients.push(created);
    return created;
  }

  afterEach(async () => {
    for (const c of clients.splice(0)) c.disconnect();
    await raw?.close();
    raw = null;
  });

  it("should send the request envelope as one frame", async () => {
    raw = await startRawServer((socket) => {
      socket.write(frame({ status: "success", result: 15 }));
    });
    const rpc = client(raw.port);
    await rpc.connect();

    expect(await rpc.call("add", 10, 5)).toBe(15);
    expect(raw.requests).toEqual(['{"function":"add","args":[10,5]}']);
  });

  it("should return undefined when the result is absent", async () => {
    raw = await startRawServer((socket) => {
      socket.write(frame({ status: "success" }));
    });
    const rpc = client(raw.port);
    await rpc.connect();

    expect(await rpc.call("no_return")).toBeUndefined();
  });

  it("should accept a response delivered one byte at a time", async () => {
    raw = await startRawServer((socket) => {
      const bytes = frame({ status: "success", result: "slow" });
      let offset = 0;
      const drip = (): void => {
        if (offset >= bytes.length) return;
        socket.write(bytes.subarray(offset, offset + 1));
        offset += 1;
        setImmediate(drip);
      };
      drip();
    });
    const rpc = client(raw.port);
    await rpc.connect();

    expect(await rpc.call("echo", "slow")).toBe("slow");
  });

  it("should treat a missing status as an error", async () => {
    raw = await startRawServer((socket) => {
      socket.write(frame({ result: 1 }));
    });
    const rpc = client(raw.port);
    await rpc.connect();

    const error = await caught(rpc.call("echo", 1));
    expect(error).toBeInstanceOf(RpcError);
    expect(error).toMatchObject({ code: "RPC_ERROR", message: "Unknown error" });
  });

  it("should raise ProtocolError for invalid JSON and stay connected", async () => {
    raw = await startRawServer((socket) => {
      socket.write(frame(Buffer.from("{oops", "utf8")));
    });
    const rpc = client(raw.port);
    await rpc.connect();

    await expect(rpc.call("echo", 1)).rejects.toBeInstanceOf(ProtocolError);
    expect(rpc.isConnected).toBe(true);
  });

  it("should raise ProtocolError for invalid UTF-8", async () => {
    raw = await startRawServer((socket) => {
      socket.write(frame(Buffer.from([0x22, 0xc3, 0x28, 0x22])));
    });
    const rpc = client(raw.port);
    await rpc.connect();

    await expect(rpc.call("echo", 1)).rejects.toThrow(/^Response is not valid UTF-8: /);
  });

  it("should disconnect when the peer closes mid-frame", async () => {
    raw = await startRawServer((socket) => {
      socket.end(Buffer.from([0, 0, 0, 10, 0x7b, 0x7d]));
    });
    const rpc = client(raw.port);
    await rpc.connect();

    const error = await caught(rpc.call("echo", 1));
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toHaveProperty("phase", "recv");
    expect(rpc.state).toBe("disconnected");

    await expect(rpc.call("echo", 1)).rejects.toThrow("Not connected");
  });

  it("should disconnect when a send fails after the peer ended", async () => {
    let peerClosed = false;
    raw = await startRawServer((socket) => {
      socket.once("close", () => {
        peerClosed = true;
      });
      socket.end(frame({ status: "success", result: 1 }));
    });
    const rpc = client(raw.port);
    await rpc.connect();

    expect(await rpc.call("echo", 1)).toBe(1);
    await vi.waitFor(() => expect(peerClosed).toBe(true));

    const error = await caught(rpc.call("echo", 2));
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toHaveProperty("phase", "send");
    expect(error).toHaveProperty("message", expect.stringMatching(/^Socket error during send: /));
    expect(rpc.state).toBe("disconnected");
  });

  it("should reject an oversized frame and disconnect", async () => {
    raw = await startRawServer((socket) => {
      socket.write(encodeFrame(Buffer.alloc(64, 0x20)));
    });
    const rpc = client(raw.port, { maxFrameSize: 16 });
    await rpc.connect();

    await expect(rpc.call("echo", 1)).rejects.toThrow(
      new ProtocolError("Declared frame length 64 exceeds the limit of 16 bytes")
    );
    expect(rpc.isConnected).toBe(false);
  });

  it("should time out a call and disconnect", async () => {
    raw = await startRawServer(() => undefined);
    const rpc = client(raw.port, { timeout: 50 });
    await rpc.connect();

    const error = await caught(rpc.call("echo", 1));
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({
      phase: "recv",
      message: "Socket error during recv: Operation timed out after 50ms",
    });
    expect(rpc.state).toBe("disconnected");
    expect(rpc.callState).toBe("idle");
  });

  it("should reconnect with fresh state after a fault", async () => {
    let replies = 0;
    raw = await startRawServer((socket) => {
      replies += 1;
      if (replies === 1) {
        socket.destroy();
      } else {
        socket.write(frame({ status: "success", result: "fresh" }));
      }
    });
    const rpc = client(raw.port);
    await rpc.connect();

    await expect(rpc.call("echo", 1)).rejects.toBeInstanceOf(ConnectionError);
    expect(rpc.isConnected).toBe(false);

    await rpc.connect();
    expect(await rpc.call("echo", 2)).toBe("fresh");
  });
});
