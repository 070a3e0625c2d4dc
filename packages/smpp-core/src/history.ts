// Per-session record of exchanged PDUs.
//
// Append-only and instance-owned. It is an audit trail: nothing in the
// session consults it to decide what to do next.

import { commandDirection, type Pdu } from "@smpplink/smpp-wire";

export interface HistoryRecord {
  sequence: number;
  kind: "request" | "response";
  /** outbound: we sent it; inbound: the peer did. */
  flow: "outbound" | "inbound";
  pdu: Pdu;
  /** Date.now() when the record was made. */
  at: number;
}

export interface Exchange {
  request?: Pdu;
  response?: Pdu;
}

export class History {
  private records: HistoryRecord[] = [];

  /** @param limit - keep at most this many records, dropping the oldest */
  constructor(private readonly limit: number = Infinity) {}

  record(pdu: Pdu, flow: HistoryRecord["flow"]): HistoryRecord {
    const entry: HistoryRecord = {
      sequence: pdu.sequence,
      kind: commandDirection(pdu.command),
      flow,
      pdu,
      at: Date.now(),
    };
    this.records.push(entry);
    if (this.records.length > this.limit) {
      this.records.splice(0, this.records.length - this.limit);
    }
    return entry;
  }

  entries(): readonly HistoryRecord[] {
    return this.records;
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * The most recent request and response recorded for `sequence`.
   *
   * Sequence numbers wrap, so older exchanges under the same number are
   * shadowed by newer ones.
   */
  forSequence(sequence: number): Exchange {
    const exchange: Exchange = {};
    for (let i = this.records.length - 1; i >= 0; i--) {
      const entry = this.records[i];
      if (entry.sequence !== sequence) continue;
      if (entry.kind === "request" && !exchange.request) exchange.request = entry.pdu;
      if (entry.kind === "response" && !exchange.response) exchange.response = entry.pdu;
      if (exchange.request && exchange.response) break;
    }
    return exchange;
  }
}
