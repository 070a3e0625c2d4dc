// Length-prefixed frames.
//
// Every PDU travels as a 4-byte big-endian length prefix followed by the
// rest of the message. The prefix counts itself, so it is always
// 4 + body length.

/** Size of the length prefix. */
export const LENGTH_PREFIX_SIZE = 4;

/** Largest value a u32 prefix can carry. */
export const MAX_PREFIX_VALUE = 0xffff_ffff;

/** Raised when bytes do not form a well-formed frame. */
export class FrameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FrameError";
  }
}

/** Prefix `body` with its total framed length. */
export function encodeFrame(body: Uint8Array): Uint8Array {
  const total = LENGTH_PREFIX_SIZE + body.length;
  if (total > MAX_PREFIX_VALUE) {
    throw new FrameError(`Frame too large for u32 length prefix: ${total} bytes`);
  }
  const frame = new Uint8Array(total);
  new DataView(frame.buffer).setUint32(0, total, false);
  frame.set(body, LENGTH_PREFIX_SIZE);
  return frame;
}

/**
 * Read the length prefix at the start of `bytes`.
 *
 * Returns null when fewer than 4 bytes are available. Throws when the
 * prefix is smaller than the prefix itself.
 */
export function readFrameLength(bytes: Uint8Array): number | null {
  if (bytes.length < LENGTH_PREFIX_SIZE) return null;
  const length = new DataView(bytes.buffer, bytes.byteOffset, LENGTH_PREFIX_SIZE).getUint32(0, false);
  if (length < LENGTH_PREFIX_SIZE) {
    throw new FrameError(`Invalid length prefix ${length}: smaller than the prefix itself`);
  }
  return length;
}

/** Strip the length prefix from a complete frame, checking that it matches. */
export function decodeFrame(frame: Uint8Array): Uint8Array {
  const length = readFrameLength(frame);
  if (length === null) {
    throw new FrameError(`Truncated length prefix: ${frame.length} bytes`);
  }
  if (length !== frame.length) {
    throw new FrameError(`Length prefix ${length} does not match frame size ${frame.length}`);
  }
  return frame.subarray(LENGTH_PREFIX_SIZE);
}
