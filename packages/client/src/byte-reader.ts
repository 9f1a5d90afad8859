/**
 * @sockrpc/client - Byte Reader
 * Turns a stream of chunks into exact-length reads.
 *
 * Sockets hand over data in whatever pieces the network produced. Framing
 * needs "exactly N bytes", so chunks are buffered here until a pending read
 * can be satisfied in full. Once the stream fails or closes, reads that the
 * buffer can no longer satisfy reject with that failure.
 */

interface PendingRead {
  size: number;
  resolve: (data: Buffer) => void;
  reject: (error: Error) => void;
}

const EMPTY = Buffer.alloc(0);

export class ByteReader {
  private chunks: Buffer[] = [];
  private length = 0;
  private pending: PendingRead | null = null;
  private failure: Error | null = null;

  /** Bytes received but not yet read */
  get buffered(): number {
    return this.length;
  }

  /** Whether the stream has ended */
  get closed(): boolean {
    return this.failure !== null;
  }

  /** Append a chunk from the stream. Ignored after the stream has ended. */
  push(chunk: Uint8Array): void {
    if (this.failure || chunk.length === 0) return;
    this.chunks.push(Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength));
    this.length += chunk.length;

    const pending = this.pending;
    if (pending && this.length >= pending.size) {
      this.pending = null;
      pending.resolve(this.take(pending.size));
    }
  }

  /** End the stream. The first failure wins. */
  fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;

    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.reject(error);
    }
  }

  /**
   * Resolve with exactly `size` bytes.
   * Only one read may be outstanding at a time.
   */
  read(size: number): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new Error("A read is already pending"));
    }
    if (this.length >= size) {
      return Promise.resolve(this.take(size));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise<Buffer>((resolve, reject) => {
      this.pending = { size, resolve, reject };
    });
  }

  private take(size: number): Buffer {
    if (size === 0) return EMPTY;

    const first = this.chunks[0];
    const data =
      this.chunks.length === 1 && first ? first : Buffer.concat(this.chunks, this.length);
    const rest = data.subarray(size);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.length = rest.length;
    return data.subarray(0, size);
  }
}
