// SMPP protocol data units.
//
// Only the header fields are modelled. The body is carried as opaque bytes;
// its layout is the business of whoever builds or reads a particular command.

import {
  type AcknowledgedCommandName,
  type CommandName,
  responseCommand,
} from "./commands.ts";
import { StatusCode } from "./status.ts";

/** Size of the fixed PDU header: length, command id, status, sequence. */
export const HEADER_SIZE = 16;

/** Largest sequence number the protocol allows. */
export const MAX_SEQUENCE = 0x7fffffff;

/** One protocol message. */
export interface Pdu {
  command: CommandName;
  /** Correlation number, assigned by the requester and echoed in the response. */
  sequence: number;
  /** command_status, 0 for success. */
  status: number;
  body: Uint8Array;
}

const EMPTY = new Uint8Array(0);

/** Build a PDU with status 0. */
export function pdu<C extends CommandName>(
  command: C,
  sequence: number,
  body: Uint8Array = EMPTY,
): Pdu & { command: C } {
  return { command, sequence, status: StatusCode.ESME_ROK, body };
}

/** Build the response to `request`, echoing its sequence number. */
export function responseTo(
  request: { command: AcknowledgedCommandName; sequence: number },
  status: number = StatusCode.ESME_ROK,
  body: Uint8Array = EMPTY,
): Pdu {
  return { command: responseCommand(request.command), sequence: request.sequence, status, body };
}

export function genericNack(sequence: number, status: number): Pdu {
  return { command: "generic_nack", sequence, status, body: EMPTY };
}

/** Total framed length of `p`, including the 4-byte length prefix. */
export function rawLength(p: Pdu): number {
  return HEADER_SIZE + p.body.length;
}

export function isError(p: Pdu): boolean {
  return p.status !== StatusCode.ESME_ROK;
}
