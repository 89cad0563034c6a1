/**
 * Optional tracing of request/response payloads, injected at construction.
 */
import type { HttpRequest } from "./request.js";

export interface TraceObserver {
  sending?(request: HttpRequest, payload: Uint8Array): void;
  received?(request: HttpRequest): void;
}

/** console.debug tracer: raw payloads are summarized, JSON is printed. */
export const consoleTrace: TraceObserver = {
  sending(request, payload) {
    console.debug(`[http] POST target URL: ${request.url}`);
    if (request.binary) {
      console.debug(`[http] [sending ${payload.length} bytes of raw data]`);
    } else {
      console.debug(`[http] Sending: ${new TextDecoder().decode(payload)}`);
    }
  },
  received(request) {
    if (request.binary) {
      console.debug(`[http] [received ${request.in.size} bytes of raw data]`);
    } else {
      console.debug(`[http] Received: ${request.text()}`);
    }
  },
};
