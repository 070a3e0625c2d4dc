// command_status values and their descriptions.

import statusTable from "./status-codes.json";

/** Status codes the session engine itself produces or checks. */
export const StatusCode = {
  ESME_ROK: 0x00,
  ESME_RINVCMDLEN: 0x02,
  ESME_RINVCMDID: 0x03,
  ESME_RINVBNDSTS: 0x04,
  ESME_RALYBND: 0x05,
  ESME_RSYSERR: 0x08,
  ESME_RBINDFAIL: 0x0d,
  ESME_RTHROTTLED: 0x58,
  ESME_RUNKNOWNERR: 0xff,
} as const;

export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode];

interface StatusEntry {
  code: number;
  name: string;
  description: string;
}

const byCode = new Map<number, StatusEntry>(
  statusTable.map((entry: StatusEntry) => [entry.code, entry]),
);

/** Human-readable description of a command_status value. */
export function describeStatus(code: number): string {
  const entry = byCode.get(code);
  if (entry) return entry.description;
  if (code >= 0x400 && code <= 0x4ff) return "Reserved for SMSC vendor specific errors";
  return `Unknown status 0x${code.toString(16).padStart(8, "0")}`;
}

/** Symbolic name (ESME_R...) of a command_status value, or null if unknown. */
export function statusName(code: number): string | null {
  return byCode.get(code)?.name ?? null;
}
