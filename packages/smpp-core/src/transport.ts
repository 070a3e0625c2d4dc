/**
 * Frame transport abstraction.
 *
 * This module defines the FrameTransport interface that the session reads
 * and writes through, and the Dialer used to open one.
 *
 * Implementations:
 * - LengthPrefixedFramed (smpp-tcp) for byte streams (TCP sockets)
 * - MemoryTransport (this package) for in-process peers
 */

/** Outcome of one read. */
export type RecvResult =
  | { kind: "frame"; frame: Uint8Array }
  /** Nothing arrived within the timeout. */
  | { kind: "timeout" }
  /** The peer closed the stream cleanly between frames. */
  | { kind: "eof" };

/**
 * Interface for transports that carry complete length-prefixed frames.
 */
export interface FrameTransport {
  /**
   * Write one complete frame, length prefix included, in a single write.
   */
  send(frame: Uint8Array): Promise<void>;

  /**
   * Receive one complete frame with timeout.
   *
   * Rejects with a framing SessionError if the stream carried a malformed
   * prefix or closed in the middle of a frame. Once that has happened the
   * transport does not try to resynchronize.
   */
  recvTimeout(timeoutMs: number): Promise<RecvResult>;

  /**
   * Close the transport. Pending reads complete with eof.
   */
  close(): void;
}

/** Opens a transport to `host:port`. */
export type Dialer = (host: string, port: number) => Promise<FrameTransport>;
