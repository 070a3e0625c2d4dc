// Length-prefixed framing for TCP streams.
//
// Every PDU is preceded by a 4-byte big-endian length that counts the
// prefix itself. A stream that breaks that rule is not resynchronized:
// the first framing fault is reported to every later read.

import type { Duplex } from "node:stream";
import { FrameError, readFrameLength } from "@smpplink/smpp-wire";
import { type FrameTransport, type RecvResult, SessionError } from "@smpplink/smpp-core";

export interface FramedOptions {
  /** Largest frame accepted from the peer, prefix included. Default: 65536 */
  maxFrameSize?: number;
}

/**
 * A length-prefixed byte stream.
 *
 * Assembles complete frames from a Duplex (a net.Socket in production)
 * and writes each outgoing frame in one write.
 *
 * Implements the FrameTransport interface for use with Session.
 */
export class LengthPrefixedFramed implements FrameTransport {
  private stream: Duplex;
  private buf: Buffer = Buffer.alloc(0);
  private pendingFrames: Uint8Array[] = [];
  private waiting: {
    resolve: (result: RecvResult) => void;
    reject: (error: Error) => void;
    timer: ReturnType<typeof setTimeout>;
  } | null = null;
  private ended = false;
  private error: SessionError | null = null;
  private readonly maxFrameSize: number;

  constructor(stream: Duplex, options: FramedOptions = {}) {
    this.stream = stream;
    this.maxFrameSize = options.maxFrameSize ?? 65536;

    stream.on("data", (chunk: Buffer) => {
      if (this.error) return;
      this.buf = Buffer.concat([this.buf, chunk]);
      this.processBuffer();
    });

    stream.on("error", (err: Error) => {
      this.fail(SessionError.io(err.message));
    });

    stream.on("end", () => this.handleEnd());
    stream.on("close", () => this.handleEnd());
  }

  private processBuffer(): void {
    while (!this.error) {
      let length: number | null;
      try {
        length = readFrameLength(this.buf);
      } catch (e) {
        if (e instanceof FrameError) {
          this.fail(SessionError.framing(e.message));
          return;
        }
        throw e;
      }
      if (length === null) break;
      if (length > this.maxFrameSize) {
        this.fail(
          SessionError.framing(`Frame of ${length} bytes exceeds the ${this.maxFrameSize} byte limit`),
        );
        return;
      }
      if (this.buf.length < length) break;

      const frame = new Uint8Array(this.buf.subarray(0, length));
      this.buf = this.buf.subarray(length);

      const waiting = this.takeWaiting();
      if (waiting) {
        waiting.resolve({ kind: "frame", frame });
      } else {
        this.pendingFrames.push(frame);
      }
    }
  }

  private handleEnd(): void {
    if (this.ended) return;
    this.ended = true;

    if (!this.error && this.buf.length > 0) {
      if (this.buf.length < 4) {
        this.fail(
          SessionError.framing(`Connection closed inside a length prefix (${this.buf.length} of 4 bytes)`),
        );
      } else {
        this.fail(
          SessionError.framing(
            `Connection closed mid-frame (${this.buf.length} of ${this.buf.readUInt32BE(0)} bytes)`,
          ),
        );
      }
      return;
    }

    this.takeWaiting()?.resolve({ kind: "eof" });
  }

  private fail(error: SessionError): void {
    if (this.error) return;
    this.error = error;
    this.buf = Buffer.alloc(0);
    this.takeWaiting()?.reject(error);
  }

  private takeWaiting() {
    const waiting = this.waiting;
    if (waiting) {
      clearTimeout(waiting.timer);
      this.waiting = null;
    }
    return waiting;
  }

  /**
   * Send one complete frame.
   *
   * The frame's length prefix must match its size.
   */
  send(frame: Uint8Array): Promise<void> {
    if (this.error) {
      return Promise.reject(this.error);
    }
    if (this.ended) {
      return Promise.reject(SessionError.closed());
    }

    let length: number | null;
    try {
      length = readFrameLength(frame);
    } catch (e) {
      if (e instanceof FrameError) return Promise.reject(SessionError.framing(e.message));
      return Promise.reject(e);
    }
    if (length !== frame.length) {
      return Promise.reject(
        SessionError.framing(`Length prefix ${length} does not match frame size ${frame.length}`),
      );
    }

    return new Promise<void>((resolve, reject) => {
      this.stream.write(frame, (err) => {
        if (err) reject(SessionError.io(err.message));
        else resolve();
      });
    });
  }

  /**
   * Receive one frame with a timeout.
   *
   * Frames that arrived before a fault are still handed out first.
   */
  recvTimeout(timeoutMs: number): Promise<RecvResult> {
    const frame = this.pendingFrames.shift();
    if (frame) {
      return Promise.resolve({ kind: "frame", frame });
    }
    if (this.error) {
      return Promise.reject(this.error);
    }
    if (this.ended) {
      return Promise.resolve({ kind: "eof" });
    }
    if (this.waiting) {
      return Promise.reject(SessionError.usage("concurrent reads on one transport"));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiting = null;
        resolve({ kind: "timeout" });
      }, timeoutMs);
      this.waiting = { resolve, reject, timer };
    });
  }

  /** Close the connection. */
  close(): void {
    if (!this.ended) {
      this.ended = true;
      this.takeWaiting()?.resolve({ kind: "eof" });
    }
    this.stream.destroy();
  }
}
