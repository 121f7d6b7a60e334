// ---------------------------------------------------------------------------
// Aleph X-Server operations.
// https://developers.exlibrisgroup.com/aleph/apis/aleph-x-services/
// ---------------------------------------------------------------------------

export const XOperation = {
  PING: "ping",
  FIND: "find",
  PRESENT: "present",
} as const;
export type XOperation = (typeof XOperation)[keyof typeof XOperation];

/** Query parameter carrying the sticky session id. */
export const SESSION_PARAM = "session_id";
