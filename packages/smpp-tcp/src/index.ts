// @smpplink/smpp-tcp - TCP transport for SMPP sessions (Node.js only)
//
// Provides TCP-specific I/O: socket framing and the dialer.

export { LengthPrefixedFramed, type FramedOptions } from "./framing.ts";
export { createTcpSession, tcpDialer, type TcpOptions, type TcpSessionOptions } from "./transport.ts";

// Re-export the session and its protocol types from core
export {
  Session,
  SessionError,
  type SessionErrorKind,
  type SessionOptions,
  type SessionState,
  type BindVariant,
  type ListenResult,
  type PushHandler,
  type ReceiverPolicy,
} from "@smpplink/smpp-core";
