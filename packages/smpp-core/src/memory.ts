// In-process frame transport.
//
// Two linked endpoints: frames sent on one are received on the other.
// Used to drive a session against a peer living in the same process.

import { FrameError, readFrameLength } from "@smpplink/smpp-wire";
import { SessionError } from "./errors.ts";
import type { FrameTransport, RecvResult } from "./transport.ts";

export class MemoryTransport implements FrameTransport {
  private peer: MemoryTransport | null = null;
  private queue: Uint8Array[] = [];
  private waiting: {
    resolve: (result: RecvResult) => void;
    reject: (error: Error) => void;
    timer: ReturnType<typeof setTimeout>;
  } | null = null;
  private closed = false;
  private error: Error | null = null;

  /** Every frame written through this endpoint, in order. */
  readonly sent: Uint8Array[] = [];

  /** Link two endpoints. */
  static pair(): [MemoryTransport, MemoryTransport] {
    const a = new MemoryTransport();
    const b = new MemoryTransport();
    a.peer = b;
    b.peer = a;
    return [a, b];
  }

  isClosed(): boolean {
    return this.closed;
  }

  send(frame: Uint8Array): Promise<void> {
    if (this.closed || !this.peer) {
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
    this.sent.push(frame);
    this.peer.deliver(new Uint8Array(frame));
    return Promise.resolve();
  }

  recvTimeout(timeoutMs: number): Promise<RecvResult> {
    if (this.error) {
      return Promise.reject(this.error);
    }
    const frame = this.queue.shift();
    if (frame) {
      return Promise.resolve({ kind: "frame", frame });
    }
    if (this.closed) {
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

  close(): void {
    if (this.closed) return;
    this.markClosed();
    this.peer?.markClosed();
  }

  /**
   * Make the next read fail with `error`, as a byte stream does after a
   * framing fault. The endpoint stays failed.
   */
  failWith(error: Error): void {
    this.error = error;
    const waiting = this.takeWaiting();
    waiting?.reject(error);
  }

  private deliver(frame: Uint8Array): void {
    if (this.closed) return;
    const waiting = this.takeWaiting();
    if (waiting) waiting.resolve({ kind: "frame", frame });
    else this.queue.push(frame);
  }

  private markClosed(): void {
    this.closed = true;
    this.takeWaiting()?.resolve({ kind: "eof" });
  }

  private takeWaiting() {
    const waiting = this.waiting;
    if (waiting) {
      clearTimeout(waiting.timer);
      this.waiting = null;
    }
    return waiting;
  }
}
