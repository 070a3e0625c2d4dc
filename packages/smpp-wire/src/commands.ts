// SMPP command identifiers.
//
// The values match the command_id field of the SMPP v3.4 PDU header.
// Response ids are the request id with the high bit set.

/** Command ids, keyed by command name. */
export const CommandId = {
  generic_nack: 0x80000000,
  bind_receiver: 0x00000001,
  bind_receiver_resp: 0x80000001,
  bind_transmitter: 0x00000002,
  bind_transmitter_resp: 0x80000002,
  query_sm: 0x00000003,
  query_sm_resp: 0x80000003,
  submit_sm: 0x00000004,
  submit_sm_resp: 0x80000004,
  deliver_sm: 0x00000005,
  deliver_sm_resp: 0x80000005,
  unbind: 0x00000006,
  unbind_resp: 0x80000006,
  replace_sm: 0x00000007,
  replace_sm_resp: 0x80000007,
  cancel_sm: 0x00000008,
  cancel_sm_resp: 0x80000008,
  bind_transceiver: 0x00000009,
  bind_transceiver_resp: 0x80000009,
  outbind: 0x0000000b,
  enquire_link: 0x00000015,
  enquire_link_resp: 0x80000015,
  submit_sm_multi: 0x00000021,
  submit_sm_multi_resp: 0x80000021,
  data_sm: 0x00000103,
  data_sm_resp: 0x80000103,
} as const;

export type CommandName = keyof typeof CommandId;

/** Commands carrying the response bit, including generic_nack. */
export type ResponseCommandName = Extract<CommandName, `${string}_resp`> | "generic_nack";

/** Commands a peer answers or initiates. */
export type RequestCommandName = Exclude<CommandName, ResponseCommandName>;

/** Requests that have a dedicated `_resp` command (everything but outbind). */
export type AcknowledgedCommandName = Exclude<RequestCommandName, "outbind">;

export type Direction = "request" | "response";

const RESPONSE_BIT = 0x80000000;

const namesById = new Map<number, CommandName>();
for (const [name, id] of Object.entries(CommandId)) {
  if (isCommandName(name)) namesById.set(id, name);
}

export function isCommandName(name: string): name is CommandName {
  return Object.prototype.hasOwnProperty.call(CommandId, name);
}

/** Look up a command name by its wire id. Returns null for ids outside the table. */
export function commandName(id: number): CommandName | null {
  return namesById.get(id) ?? null;
}

export function direction(command: CommandName): Direction {
  return (CommandId[command] & RESPONSE_BIT) !== 0 ? "response" : "request";
}

export function isResponse(command: CommandName): command is ResponseCommandName {
  return direction(command) === "response";
}

export function isAcknowledged(command: CommandName): command is AcknowledgedCommandName {
  return !isResponse(command) && command !== "outbind";
}

/** The `_resp` command answering `command`. */
export function responseCommand<C extends AcknowledgedCommandName>(command: C): `${C}_resp` {
  return `${command}_resp`;
}

/** All command names, in table order. */
export const COMMAND_NAMES: readonly CommandName[] = Object.keys(CommandId).filter(isCommandName);
