// Session error type.

import { type CommandName, describeStatus, StatusCode } from "@smpplink/smpp-wire";
import type { SessionState } from "./states.ts";

export type SessionErrorKind =
  /** Initial connect failed. Not retried. */
  | "connection_refused"
  /** Command not permitted in the current bind state. The session stays usable. */
  | "invalid_state"
  /** Malformed length prefix or truncated frame. The connection can no longer be trusted. */
  | "framing"
  /** The stream itself failed (reset, write error). */
  | "io"
  /** Peer answered with a non-zero command_status. The session stays usable. */
  | "protocol"
  /** Nothing arrived in time. */
  | "timeout"
  /** Precondition violated by the caller. */
  | "usage"
  /** The connection closed while the call was waiting. */
  | "closed";

/** Error during session handling. */
export class SessionError extends Error {
  constructor(
    public kind: SessionErrorKind,
    message: string,
    public command?: CommandName,
    public status?: number,
  ) {
    super(message);
    this.name = "SessionError";
  }

  static connectionRefused(host: string, port: number, reason: string): SessionError {
    return new SessionError("connection_refused", `Connection to ${host}:${port} refused: ${reason}`);
  }

  static invalidState(command: CommandName, state: SessionState): SessionError {
    return new SessionError(
      "invalid_state",
      `Command ${command} failed in state ${state}: ${describeStatus(StatusCode.ESME_RINVBNDSTS)}`,
      command,
      StatusCode.ESME_RINVBNDSTS,
    );
  }

  static framing(message: string): SessionError {
    return new SessionError("framing", message);
  }

  static io(message: string): SessionError {
    return new SessionError("io", message);
  }

  static protocol(command: CommandName, status: number): SessionError {
    return new SessionError(
      "protocol",
      `(${status}) ${command}: ${describeStatus(status)}`,
      command,
      status,
    );
  }

  static timeout(what: string, timeoutMs: number): SessionError {
    return new SessionError("timeout", `timeout after ${timeoutMs}ms waiting for ${what}`);
  }

  static usage(message: string): SessionError {
    return new SessionError("usage", message);
  }

  static closed(): SessionError {
    return new SessionError("closed", "connection closed");
  }
}
