// @smpplink/smpp-core - SMPP session engine
// Bind state machine, request/response correlation and the receiver dispatch loop.

export { SessionError, type SessionErrorKind } from "./errors.ts";

export { createLogger, isEnabled, type Logger, type LoggerOptions } from "./logging.ts";

export type { Dialer, FrameTransport, RecvResult } from "./transport.ts";

export { MemoryTransport } from "./memory.ts";

export {
  COMMAND_STATES,
  STATE_SETTERS,
  isPermitted,
  isReceiverVariant,
  stateAfter,
  type BindVariant,
  type SessionState,
} from "./states.ts";

export { History, type Exchange, type HistoryRecord } from "./history.ts";

export { SequenceAllocator } from "./sequence.ts";

export {
  Session,
  type ListenResult,
  type PushHandler,
  type ReceiverPolicy,
  type RequestOptions,
  type SessionOptions,
} from "./session.ts";
