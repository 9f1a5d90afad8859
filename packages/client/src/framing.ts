/**
 * @sockrpc/client - Framing
 *
 * One frame on the wire:
 *
 * ```
 * [4 bytes: big-endian unsigned length N][N bytes: body]
 * ```
 *
 * The receiver trusts the declared length unless a `maxFrameSize` is set.
 * Without one, a peer can make the client buffer up to 4 GiB for a single
 * frame; that matches the protocol, which defines no limit.
 */

import { MAX_FRAME_LENGTH } from "@sockrpc/types";
import { MarshalingError, ProtocolError } from "./errors.js";

/** Size of the length prefix */
export const FRAME_HEADER_SIZE = 4;

/** Something frames can be written to */
export interface FrameSink {
  send(data: Uint8Array): Promise<void>;
}

/** Something frames can be read from, byte-exact */
export interface FrameSource {
  receive(size: number): Promise<Uint8Array>;
  disconnect(): void;
}

export interface ReceiveFrameOptions {
  /** Reject declared lengths above this many bytes */
  maxFrameSize?: number | undefined;
}

/**
 * Prefix a payload with its length
 */
export function encodeFrame(payload: Uint8Array): Buffer {
  if (payload.length > MAX_FRAME_LENGTH) {
    throw new MarshalingError(
      `Payload of ${payload.length} bytes exceeds the frame limit of ${MAX_FRAME_LENGTH} bytes`
    );
  }

  const frame = Buffer.allocUnsafe(FRAME_HEADER_SIZE + payload.length);
  frame.writeUInt32BE(payload.length, 0);
  frame.set(payload, FRAME_HEADER_SIZE);
  return frame;
}

/**
 * Read the body length from a frame header
 */
export function decodeFrameLength(header: Uint8Array): number {
  if (header.length < FRAME_HEADER_SIZE) {
    throw new ProtocolError(`Frame header needs ${FRAME_HEADER_SIZE} bytes, got ${header.length}`);
  }
  return new DataView(header.buffer, header.byteOffset, FRAME_HEADER_SIZE).getUint32(0, false);
}

/**
 * Send one frame as a single write
 */
export async function sendFrame(sink: FrameSink, payload: Uint8Array): Promise<void> {
  await sink.send(encodeFrame(payload));
}

/**
 * Receive one complete frame body.
 *
 * A declared length over `maxFrameSize` disconnects the source, since the
 * unread body would leave the stream out of step, and throws
 * {@link ProtocolError}.
 */
export async function receiveFrame(
  source: FrameSource,
  options: ReceiveFrameOptions = {}
): Promise<Uint8Array> {
  const length = decodeFrameLength(await source.receive(FRAME_HEADER_SIZE));

  const limit = options.maxFrameSize;
  if (limit !== undefined && length > limit) {
    source.disconnect();
    throw new ProtocolError(`Declared frame length ${length} exceeds the limit of ${limit} bytes`, {
      details: { length, limit },
    });
  }

  return source.receive(length);
}
