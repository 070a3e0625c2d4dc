// TCP transport for SMPP sessions.

import net from "node:net";
import { type Dialer, Session, SessionError, type SessionOptions } from "@smpplink/smpp-core";
import { type FramedOptions, LengthPrefixedFramed } from "./framing.ts";

/** Options for opening TCP connections. */
export interface TcpOptions extends FramedOptions {
  /** Give up on a connect attempt after this many milliseconds. Default: 10000 */
  connectTimeout?: number;
  /** Disable Nagle's algorithm. Default: true */
  noDelay?: boolean;
}

/** Session options with the TCP dialer filled in. */
export interface TcpSessionOptions extends Omit<SessionOptions, "dialer">, TcpOptions {}

/**
 * A Dialer that opens a TCP connection and frames it.
 *
 * Connect failures, including timeouts, reject with a
 * "connection_refused" SessionError and are not retried.
 */
export function tcpDialer(options: TcpOptions = {}): Dialer {
  const connectTimeout = options.connectTimeout ?? 10000;
  const noDelay = options.noDelay ?? true;

  return (host, port) =>
    new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });

      const cleanup = () => {
        clearTimeout(timer);
        socket.off("connect", onConnect);
        socket.off("error", onError);
      };
      const onConnect = () => {
        cleanup();
        socket.setNoDelay(noDelay);
        resolve(new LengthPrefixedFramed(socket, { maxFrameSize: options.maxFrameSize }));
      };
      const onError = (err: Error) => {
        cleanup();
        socket.destroy();
        reject(SessionError.connectionRefused(host, port, err.message));
      };
      const timer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(SessionError.connectionRefused(host, port, `no answer within ${connectTimeout}ms`));
      }, connectTimeout);

      socket.once("connect", onConnect);
      socket.once("error", onError);
    });
}

/**
 * Create a session that connects over TCP.
 *
 * @example
 * ```typescript
 * const session = createTcpSession("127.0.0.1", 2775, { requestTimeout: 5000 });
 * await session.connect();
 * await session.bind("transmitter", bindBody);
 * ```
 */
export function createTcpSession(
  host: string,
  port: number,
  options: TcpSessionOptions = {},
): Session {
  const { connectTimeout, noDelay, maxFrameSize, ...sessionOptions } = options;
  return new Session(host, port, {
    ...sessionOptions,
    dialer: tcpDialer({ connectTimeout, noDelay, maxFrameSize }),
  });
}
