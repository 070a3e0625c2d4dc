// Session state machine and message pump.
//
// One session owns one connection. All reads go through a single message
// pump, which hands responses to the request waiting on their sequence
// number and queues everything else for receive() or listen().
//
// Generic over FrameTransport to support different transports:
// - LengthPrefixedFramed for TCP sockets (smpp-tcp)
// - MemoryTransport for in-process peers

import {
  type AcknowledgedCommandName,
  type CommandName,
  DecodeError,
  genericNack,
  headerCodec,
  isError,
  isResponse,
  MAX_SEQUENCE,
  type Pdu,
  type PduCodec,
  pdu,
  responseCommand,
} from "@smpplink/smpp-wire";
import { SessionError } from "./errors.ts";
import { History } from "./history.ts";
import { createLogger, type Logger } from "./logging.ts";
import { SequenceAllocator } from "./sequence.ts";
import {
  type BindVariant,
  isPermitted,
  isReceiverVariant,
  type SessionState,
  stateAfter,
} from "./states.ts";
import type { Dialer, FrameTransport } from "./transport.ts";

/** Called for every message the peer pushes to us (deliver_sm, data_sm). */
export type PushHandler = (message: Pdu) => void | Promise<void>;

/**
 * When a receiver-class bind makes the session receiver capable.
 *
 * - optimistic: as soon as the bind request is sent, so a listener started
 *   alongside the bind sees the flag immediately.
 * - confirmed: only once the peer accepted the bind.
 */
export type ReceiverPolicy = "optimistic" | "confirmed";

/** Configuration for a session. */
export interface SessionOptions {
  /** Opens the underlying transport on connect(). */
  dialer: Dialer;
  /** PDU codec. Default: headerCodec (opaque bodies). */
  codec?: PduCodec;
  /** Timeout for request/response calls in milliseconds. Default: 10000 */
  requestTimeout?: number;
  /** How long one read waits before the pump and listen() loop again. Default: 100 */
  pollInterval?: number;
  /** Default: "optimistic" */
  receiverPolicy?: ReceiverPolicy;
  /** Maximum number of history records kept. Default: Infinity */
  historyLimit?: number;
  /** Namespace for the default logger. Default: "smpp:session" */
  namespace?: string;
  /** Replaces the default console logger; `namespace` is then unused. */
  logger?: Logger;
  /** Include frame hex dumps in debug logs. Default: false */
  logBytes?: boolean;
  /** Initial push handler. Default: logs the message. */
  pushHandler?: PushHandler;
}

export interface RequestOptions {
  /** Sequence number to use instead of the next allocated one. */
  sequence?: number;
  /** Overrides the session's requestTimeout for this call. */
  timeoutMs?: number;
}

/** Why listen() returned. */
export type ListenResult =
  /** The peer sent unbind. It has not been answered. */
  | { reason: "unbind"; pdu: Pdu }
  /** The connection closed. */
  | { reason: "closed" }
  /** stopListening() was called. */
  | { reason: "stopped" };

interface PendingRequest {
  command: AcknowledgedCommandName;
  resolve: (response: Pdu) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout> | null;
  startedAt: number;
}

type Inbound =
  | { kind: "pdu"; pdu: Pdu }
  | { kind: "eof" }
  | { kind: "error"; error: Error }
  | { kind: "timeout" };

const BIND_COMMANDS = {
  transmitter: "bind_transmitter",
  receiver: "bind_receiver",
  transceiver: "bind_transceiver",
} as const satisfies Record<BindVariant, AcknowledgedCommandName>;

const EMPTY = new Uint8Array(0);

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * A client session with one SMPP peer.
 *
 * @example
 * ```typescript
 * const session = new Session("smsc.example.net", 2775, { dialer });
 * await session.connect();
 * await session.bind("transceiver", bindBody);
 * await session.sendMessage(submitBody);
 * session.setPushHandler((message) => console.log(message));
 * const result = await session.listen();
 * ```
 */
export class Session {
  readonly host: string;
  readonly port: number;
  /** Every PDU sent or received on this session. */
  readonly history: History;

  private readonly config: {
    dialer: Dialer;
    codec: PduCodec;
    requestTimeout: number;
    pollInterval: number;
    receiverPolicy: ReceiverPolicy;
    logBytes: boolean;
  };
  private readonly log: Logger;
  private readonly sequences = new SequenceAllocator();

  private io: FrameTransport | null = null;
  // Set while connect() waits for the dialer; disconnect() cancels it
  private dialing: { cancelled: boolean } | null = null;
  private _state: SessionState = "closed";
  private receiverCapable = false;
  private pushHandler: PushHandler;

  // Request tracking, keyed by sequence number
  private pending = new Map<number, PendingRequest>();

  // Messages nobody was waiting for
  private inbound: Pdu[] = [];
  private inboundWaiter: ((item: Inbound) => void) | null = null;
  private failure: Error | null = null;

  private pumpRunning = false;
  private pumpPromise: Promise<void> = Promise.resolve();
  private listening = false;
  private stopRequested = false;

  constructor(host: string, port: number, options: SessionOptions) {
    this.host = host;
    this.port = port;
    this.config = {
      dialer: options.dialer,
      codec: options.codec ?? headerCodec,
      requestTimeout: options.requestTimeout ?? 10000,
      pollInterval: options.pollInterval ?? 100,
      receiverPolicy: options.receiverPolicy ?? "optimistic",
      logBytes: options.logBytes ?? false,
    };
    this.log = options.logger ?? createLogger(options.namespace ?? "smpp:session");
    this.history = new History(options.historyLimit);
    this.pushHandler = options.pushHandler ?? ((message) => this.logPush(message));
  }

  /** Current bind state. */
  get state(): SessionState {
    return this._state;
  }

  /** Whether listen() may run. */
  get isReceiverCapable(): boolean {
    return this.receiverCapable;
  }

  /** Number of requests waiting for a response. */
  get outstanding(): number {
    return this.pending.size;
  }

  /** Replace the handler for pushed messages. */
  setPushHandler(handler: PushHandler): void {
    this.pushHandler = handler;
  }

  // ==========================================================================
  // Connection lifecycle
  // ==========================================================================

  /** Open the connection: closed → open. */
  async connect(): Promise<void> {
    if (this.io || this.dialing) {
      throw SessionError.usage(`already connected to ${this.host}:${this.port}`);
    }
    this.log.info(`Connecting to ${this.host}:${this.port}...`);
    const dial = { cancelled: false };
    this.dialing = dial;
    let io: FrameTransport;
    try {
      io = await this.config.dialer(this.host, this.port);
    } finally {
      this.dialing = null;
    }
    if (dial.cancelled) {
      io.close();
      throw SessionError.closed();
    }
    this.io = io;
    this.inbound = [];
    this.failure = null;
    this.setState("open");
  }

  /**
   * Close the connection: any state → closed.
   *
   * Outstanding requests fail with a "closed" error; a running listen()
   * returns `{ reason: "closed" }`. A connect() still dialing rejects
   * with a "closed" error.
   */
  async disconnect(): Promise<void> {
    if (this.dialing) {
      this.dialing.cancelled = true;
    }
    const io = this.io;
    if (!io) return;
    this.log.info("Disconnecting...");
    this.teardown(io, SessionError.closed());
    await this.pumpPromise;
  }

  // ==========================================================================
  // Sending and receiving
  // ==========================================================================

  /**
   * Send one PDU.
   *
   * Fails with an "invalid_state" error, without writing anything, when
   * the command is not permitted in the current state.
   */
  async send(message: Pdu): Promise<void> {
    if (!isPermitted(message.command, this._state)) {
      throw SessionError.invalidState(message.command, this._state);
    }
    const io = this.io;
    if (!io) {
      throw SessionError.closed();
    }

    const frame = this.config.codec.encode(message);
    this.history.record(message, "outbound");
    this.trace("→", message, frame);
    await io.send(frame);
  }

  /**
   * Receive the next message that is not the answer to one of our requests.
   *
   * Returns null once the connection has closed. Throws a "protocol" error
   * for messages with a non-zero status, and a "timeout" error when nothing
   * arrived within `timeoutMs`.
   */
  async receive(timeoutMs: number = this.config.requestTimeout): Promise<Pdu | null> {
    const item = await this.nextInbound(timeoutMs);
    switch (item.kind) {
      case "timeout":
        throw SessionError.timeout("an incoming PDU", timeoutMs);
      case "eof":
        return null;
      case "error":
        throw item.error;
      case "pdu":
        if (isError(item.pdu)) {
          throw SessionError.protocol(item.pdu.command, item.pdu.status);
        }
        return item.pdu;
    }
  }

  /**
   * Send a request and wait for its response.
   *
   * The response is matched by sequence number: either `<command>_resp` or
   * generic_nack. A non-zero status rejects with a "protocol" error.
   */
  async request(
    command: AcknowledgedCommandName,
    body: Uint8Array = EMPTY,
    options: RequestOptions = {},
  ): Promise<Pdu> {
    if (!isPermitted(command, this._state)) {
      throw SessionError.invalidState(command, this._state);
    }
    const sequence = options.sequence ?? this.sequences.next();
    if (this.pending.has(sequence)) {
      throw SessionError.usage(`sequence ${sequence} already has a request outstanding`);
    }
    const timeoutMs = options.timeoutMs ?? this.config.requestTimeout;

    const response = new Promise<Pdu>((resolve, reject) => {
      this.pending.set(sequence, {
        command,
        resolve,
        reject,
        timer: null,
        startedAt: performance.now(),
      });
    });
    // The connection may close while the request is being written, settling
    // the response before it is returned. Callers still see the rejection.
    void response.catch(() => undefined);

    try {
      await this.send(pdu(command, sequence, body));
    } catch (e) {
      this.settle(sequence)?.reject(toError(e));
      return response;
    }

    const entry = this.pending.get(sequence);
    if (entry) {
      entry.timer = setTimeout(() => {
        this.pending.delete(sequence);
        entry.reject(SessionError.timeout(`${responseCommand(command)} #${sequence}`, timeoutMs));
      }, timeoutMs);
    }
    this.startMessagePump();
    return response;
  }

  /**
   * Bind as transmitter, receiver or transceiver.
   *
   * `body` is the encoded bind body (system_id, password, ...).
   */
  async bind(variant: BindVariant, body: Uint8Array = EMPTY): Promise<Pdu> {
    const receiver = isReceiverVariant(variant);
    const command = BIND_COMMANDS[variant];
    if (
      receiver &&
      this.config.receiverPolicy === "optimistic" &&
      isPermitted(command, this._state)
    ) {
      this.receiverCapable = true;
    }
    const response = await this.request(command, body);
    if (receiver) {
      this.receiverCapable = true;
    }
    return response;
  }

  /** Unbind: bound → open. */
  unbind(): Promise<Pdu> {
    return this.request("unbind");
  }

  /** Submit a short message. `body` is the encoded submit_sm body. */
  sendMessage(body: Uint8Array): Promise<Pdu> {
    return this.request("submit_sm", body);
  }

  /** Probe the link. */
  enquireLink(): Promise<Pdu> {
    return this.request("enquire_link");
  }

  // ==========================================================================
  // Dispatch loop
  // ==========================================================================

  /**
   * Serve messages pushed by the peer until it unbinds or the connection
   * closes.
   *
   * - deliver_sm / data_sm: answered with the matching `_resp`, then handed
   *   to the push handler
   * - enquire_link: answered with enquire_link_resp
   * - unbind: returned to the caller, unanswered
   * - anything else: logged and skipped
   *
   * Only valid once a receiver or transceiver bind has been attempted.
   */
  async listen(): Promise<ListenResult> {
    if (!this.receiverCapable) {
      throw SessionError.usage("listen() is only allowed on a receiver or transceiver session");
    }
    if (this.listening) {
      throw SessionError.usage("listen() is already running");
    }

    this.listening = true;
    this.stopRequested = false;
    try {
      while (!this.stopRequested) {
        const item = await this.nextInbound(this.config.pollInterval);
        if (item.kind === "timeout") {
          continue;
        }
        if (item.kind === "eof") {
          this.log.info("Connection closed, listener stopping");
          return { reason: "closed" };
        }
        if (item.kind === "error") {
          throw item.error;
        }
        const outcome = await this.dispatch(item.pdu);
        if (outcome) {
          return outcome;
        }
      }
      return { reason: "stopped" };
    } finally {
      this.listening = false;
    }
  }

  /** Ask a running listen() to return at its next poll. */
  stopListening(): void {
    this.stopRequested = true;
  }

  private async dispatch(message: Pdu): Promise<ListenResult | null> {
    if (isError(message)) {
      this.log.warn(`Ignoring unsolicited ${message.command} #${message.sequence} with status ${message.status}`);
      return null;
    }

    switch (message.command) {
      case "unbind":
        this.log.info("Unbind command received", { sequence: message.sequence });
        return { reason: "unbind", pdu: message };

      case "deliver_sm":
      case "data_sm":
        if (await this.reply(pdu(responseCommand(message.command), message.sequence))) {
          await this.deliverPush(message);
        }
        return null;

      case "enquire_link":
        if (await this.reply(pdu(responseCommand(message.command), message.sequence))) {
          this.log.info("Link enquiry answered", { sequence: message.sequence });
        }
        return null;

      default:
        this.log.warn(`Unhandled SMPP command '${message.command}'`, {
          sequence: message.sequence,
        });
        return null;
    }
  }

  /** Send a reply through the state check. Returns false if the state forbids it. */
  private async reply(message: Pdu): Promise<boolean> {
    try {
      await this.send(message);
      return true;
    } catch (e) {
      if (e instanceof SessionError && e.kind === "invalid_state") {
        this.log.error(e.message, { sequence: message.sequence });
        return false;
      }
      throw e;
    }
  }

  private async deliverPush(message: Pdu): Promise<void> {
    try {
      await this.pushHandler(message);
    } catch (e) {
      const error = toError(e);
      this.log.error(`Push handler failed: ${error.message}`, {
        command: message.command,
        sequence: message.sequence,
      });
    }
  }

  private logPush(message: Pdu): void {
    this.log.info("Message received handler (should be overridden)", {
      command: message.command,
      sequence: message.sequence,
    });
  }

  // ==========================================================================
  // Message pump
  // ==========================================================================

  private wantsReads(): boolean {
    return this.pending.size > 0 || this.inboundWaiter !== null || this.listening;
  }

  /**
   * Start the message pump if not already running.
   * It keeps reading while a request, receive() or listen() is waiting.
   */
  private startMessagePump(): void {
    const io = this.io;
    if (this.pumpRunning || !io) return;
    this.pumpRunning = true;
    this.pumpPromise = this.runMessagePump(io);
  }

  private async runMessagePump(io: FrameTransport): Promise<void> {
    try {
      while (this.io === io && this.wantsReads()) {
        const result = await io.recvTimeout(this.config.pollInterval);
        if (result.kind === "timeout") {
          continue;
        }
        if (result.kind === "eof") {
          this.handleEof(io);
          return;
        }
        await this.handleFrame(result.frame);
      }
    } catch (e) {
      this.handleFailure(io, toError(e));
    } finally {
      this.pumpRunning = false;
    }
  }

  private async handleFrame(frame: Uint8Array): Promise<void> {
    let message: Pdu;
    try {
      message = this.config.codec.decode(frame);
    } catch (e) {
      if (e instanceof DecodeError) {
        await this.nackUndecodable(e);
        return;
      }
      throw e;
    }

    this.history.record(message, "inbound");
    this.applyState(message);
    this.route(message, frame);
  }

  /** Answer a frame whose header was readable but whose PDU was not. */
  private async nackUndecodable(error: DecodeError): Promise<void> {
    if (error.sequence === null) {
      throw SessionError.framing(error.message);
    }
    this.log.warn(`Undecodable PDU #${error.sequence}: ${error.message}`);
    if (error.sequence > MAX_SEQUENCE || !isPermitted("generic_nack", this._state)) {
      return;
    }
    await this.send(genericNack(error.sequence, error.status));
  }

  private applyState(message: Pdu): void {
    if (!isPermitted(message.command, this._state)) {
      this.log.warn(`Received ${message.command} #${message.sequence} in state ${this._state}`);
      return;
    }
    if (isError(message)) {
      return;
    }
    const next = stateAfter(message.command);
    if (next === null) {
      return;
    }
    this.setState(next);
    if (next === "open") {
      this.receiverCapable = false;
    }
  }

  private route(message: Pdu, frame: Uint8Array): void {
    if (isResponse(message.command)) {
      const waiting = this.pending.get(message.sequence);
      if (waiting && this.answers(message.command, waiting.command)) {
        this.settle(message.sequence);
        const duration = performance.now() - waiting.startedAt;
        this.trace("←", message, frame, duration);
        if (isError(message)) {
          waiting.reject(SessionError.protocol(message.command, message.status));
        } else {
          waiting.resolve(message);
        }
        return;
      }
    }

    this.trace("←", message, frame);
    if (this.inboundWaiter) {
      this.inboundWaiter({ kind: "pdu", pdu: message });
    } else {
      this.inbound.push(message);
    }
  }

  private answers(response: CommandName, request: AcknowledgedCommandName): boolean {
    return response === "generic_nack" || response === responseCommand(request);
  }

  /** Remove a pending request and stop its timer. */
  private settle(sequence: number): PendingRequest | undefined {
    const entry = this.pending.get(sequence);
    if (entry) {
      if (entry.timer) clearTimeout(entry.timer);
      this.pending.delete(sequence);
    }
    return entry;
  }

  private nextInbound(timeoutMs: number): Promise<Inbound> {
    const queued = this.inbound.shift();
    if (queued) {
      return Promise.resolve({ kind: "pdu", pdu: queued });
    }
    if (!this.io) {
      const failure = this.failure;
      this.failure = null;
      return Promise.resolve(failure ? { kind: "error", error: failure } : { kind: "eof" });
    }
    if (this.inboundWaiter) {
      return Promise.reject(SessionError.usage("another receive() or listen() is already waiting"));
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.inboundWaiter = null;
        resolve({ kind: "timeout" });
      }, timeoutMs);
      this.inboundWaiter = (item) => {
        clearTimeout(timer);
        this.inboundWaiter = null;
        resolve(item);
      };
      this.startMessagePump();
    });
  }

  private handleEof(io: FrameTransport): void {
    if (this.io === io) {
      this.log.info("Connection closed by peer");
    }
    this.teardown(io, SessionError.closed());
    this.inboundWaiter?.({ kind: "eof" });
  }

  private handleFailure(io: FrameTransport, error: Error): void {
    this.log.error(`Connection failed: ${error.message}`);
    if (this.io === io) {
      this.failure = error;
    }
    this.teardown(io, error);
    if (this.inboundWaiter) {
      this.failure = null;
      this.inboundWaiter({ kind: "error", error });
    }
  }

  /** Close `io` if it is still ours, and fail every outstanding request. */
  private teardown(io: FrameTransport, error: Error): void {
    if (this.io !== io) return;
    this.io = null;
    io.close();
    this.receiverCapable = false;
    this.setState("closed");
    for (const sequence of [...this.pending.keys()]) {
      this.settle(sequence)?.reject(error);
    }
  }

  private setState(next: SessionState): void {
    if (next === this._state) return;
    this.log.debug(`State ${this._state} → ${next}`);
    this._state = next;
  }

  private trace(arrow: "→" | "←", message: Pdu, frame: Uint8Array, duration?: number): void {
    const data: Record<string, unknown> = {
      command: message.command,
      sequence: message.sequence,
      status: message.status,
      length: frame.length,
    };
    if (this.config.logBytes) {
      data.hex = Buffer.from(frame).toString("hex");
    }
    let line = `${arrow} ${message.command} #${message.sequence}`;
    if (duration !== undefined) {
      data.duration = `${duration.toFixed(2)}ms`;
      line += `: ${isError(message) ? "✗" : "✓"} ${duration.toFixed(2)}ms`;
    }
    this.log.debug(line, data);
  }
}
