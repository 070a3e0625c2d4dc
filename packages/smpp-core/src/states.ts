// Bind states and the command/state tables.

import type { CommandName } from "@smpplink/smpp-wire";

/** Session bind state. */
export type SessionState = "closed" | "open" | "bound_tx" | "bound_rx" | "bound_trx";

export type BindVariant = "transmitter" | "receiver" | "transceiver";

const BOUND = ["bound_tx", "bound_rx", "bound_trx"] as const;
const TX = ["bound_tx", "bound_trx"] as const;
const RX = ["bound_rx", "bound_trx"] as const;

/**
 * States in which each command may be sent or received.
 *
 * Every command the codec knows must appear here.
 */
export const COMMAND_STATES = {
  bind_transmitter: ["open"],
  bind_transmitter_resp: ["open"],
  bind_receiver: ["open"],
  bind_receiver_resp: ["open"],
  bind_transceiver: ["open"],
  bind_transceiver_resp: ["open"],
  outbind: ["open"],
  unbind: BOUND,
  unbind_resp: BOUND,
  submit_sm: TX,
  submit_sm_resp: TX,
  submit_sm_multi: TX,
  submit_sm_multi_resp: TX,
  data_sm: BOUND,
  data_sm_resp: BOUND,
  deliver_sm: RX,
  deliver_sm_resp: RX,
  query_sm: RX,
  query_sm_resp: RX,
  cancel_sm: RX,
  cancel_sm_resp: RX,
  replace_sm: ["bound_tx"],
  replace_sm_resp: ["bound_tx"],
  enquire_link: BOUND,
  enquire_link_resp: BOUND,
  generic_nack: BOUND,
} as const satisfies Record<CommandName, readonly SessionState[]>;

/** Responses that move the session into a new state when successful. */
export const STATE_SETTERS = {
  bind_transmitter_resp: "bound_tx",
  bind_receiver_resp: "bound_rx",
  bind_transceiver_resp: "bound_trx",
  unbind_resp: "open",
} as const satisfies Partial<Record<CommandName, SessionState>>;

export function isPermitted(command: CommandName, state: SessionState): boolean {
  const allowed: readonly SessionState[] = COMMAND_STATES[command];
  return allowed.includes(state);
}

/** The state `command` moves the session into, or null if it is not a state setter. */
export function stateAfter(command: CommandName): SessionState | null {
  switch (command) {
    case "bind_transmitter_resp":
    case "bind_receiver_resp":
    case "bind_transceiver_resp":
    case "unbind_resp":
      return STATE_SETTERS[command];
    default:
      return null;
  }
}

/** Whether binding as `variant` lets the peer push messages to us. */
export function isReceiverVariant(variant: BindVariant): boolean {
  return variant === "receiver" || variant === "transceiver";
}
