// @smpplink/smpp-wire - SMPP wire types and codec
//
// Command table, PDU header codec, frame helpers and the command_status
// description table.

export {
  CommandId,
  COMMAND_NAMES,
  commandName,
  direction as commandDirection,
  isAcknowledged,
  isCommandName,
  isResponse,
  responseCommand,
  type AcknowledgedCommandName,
  type CommandName,
  type Direction,
  type RequestCommandName,
  type ResponseCommandName,
} from "./commands.ts";

export {
  HEADER_SIZE,
  MAX_SEQUENCE,
  genericNack,
  isError,
  pdu,
  rawLength,
  responseTo,
  type Pdu,
} from "./pdu.ts";

export {
  FrameError,
  LENGTH_PREFIX_SIZE,
  MAX_PREFIX_VALUE,
  decodeFrame,
  encodeFrame,
  readFrameLength,
} from "./frame.ts";

export { DecodeError, headerCodec, type PduCodec } from "./codec.ts";

export { StatusCode, describeStatus, statusName } from "./status.ts";
