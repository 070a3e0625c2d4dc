// PDU header codec.
//
// Encodes the fixed 16-byte header (command_length, command_id,
// command_status, sequence_number) in network byte order and passes the
// body through untouched.

import { CommandId, commandName } from "./commands.ts";
import { decodeFrame, encodeFrame, FrameError } from "./frame.ts";
import { HEADER_SIZE, MAX_SEQUENCE, type Pdu } from "./pdu.ts";
import { StatusCode } from "./status.ts";

/** Turns PDUs into frames and back. */
export interface PduCodec {
  /** Encode a PDU into a complete frame, length prefix included. */
  encode(pdu: Pdu): Uint8Array;
  /** Decode a complete frame. Throws DecodeError when it is not a valid PDU. */
  decode(frame: Uint8Array): Pdu;
}

/**
 * A frame that could not be decoded into a PDU.
 *
 * `sequence` is set when the header was long enough to read it, so the
 * receiver can answer with a generic_nack for that sequence.
 */
export class DecodeError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly sequence: number | null = null,
  ) {
    super(message);
    this.name = "DecodeError";
  }
}

/** Header fields following the length prefix: id, status, sequence. */
const HEADER_TAIL = HEADER_SIZE - 4;

function encodePdu(pdu: Pdu): Uint8Array {
  if (!Number.isInteger(pdu.sequence) || pdu.sequence < 0 || pdu.sequence > MAX_SEQUENCE) {
    throw new RangeError(`Sequence number out of range: ${pdu.sequence}`);
  }
  const rest = new Uint8Array(HEADER_TAIL + pdu.body.length);
  const view = new DataView(rest.buffer);
  view.setUint32(0, CommandId[pdu.command], false);
  view.setUint32(4, pdu.status >>> 0, false);
  view.setUint32(8, pdu.sequence, false);
  rest.set(pdu.body, HEADER_TAIL);
  return encodeFrame(rest);
}

function decodePdu(frame: Uint8Array): Pdu {
  let rest: Uint8Array;
  try {
    rest = decodeFrame(frame);
  } catch (e) {
    if (e instanceof FrameError) throw new DecodeError(e.message, StatusCode.ESME_RINVCMDLEN);
    throw e;
  }
  if (rest.length < HEADER_TAIL) {
    throw new DecodeError(`PDU shorter than its header: ${frame.length} bytes`, StatusCode.ESME_RINVCMDLEN);
  }

  const view = new DataView(rest.buffer, rest.byteOffset, HEADER_TAIL);
  const id = view.getUint32(0, false);
  const status = view.getUint32(4, false);
  const sequence = view.getUint32(8, false);

  const command = commandName(id);
  if (command === null) {
    throw new DecodeError(
      `Unknown command id 0x${id.toString(16).padStart(8, "0")}`,
      StatusCode.ESME_RINVCMDID,
      sequence,
    );
  }

  return { command, sequence, status, body: rest.slice(HEADER_TAIL) };
}

/** Header-only codec: bodies are carried as opaque bytes. */
export const headerCodec: PduCodec = {
  encode: encodePdu,
  decode: decodePdu,
};
