/**
 * Fixed operational policy for POST exchanges.
 */
import type { TransportTimeouts } from "./transport/types.js";

/** Upload instalment size: bounded unacknowledged data per write cycle. */
export const CHUNK_SIZE = 1024 * 1024;

/** Per-request timeouts in ms (0 = no limit). */
export const REQUEST_TIMEOUTS: Readonly<TransportTimeouts> = {
  resolve: 0,
  connect: 20_000,
  send: 20_000,
  receive: 30 * 60_000,
};

/** Response header carrying the pre-compression body length. */
export const ORIGINAL_CONTENT_LENGTH_HEADER = "original-content-length";

export const DEFAULT_USER_AGENT = "evented-http/0.1";

/** Error code reported by transports for an expired timeout. */
export const TIMEOUT_ERROR_CODE = "ETIMEDOUT";
