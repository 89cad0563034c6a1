/**
 * Logical POST request: target, payload, outcome and response sink.
 * Owned by the caller; HttpIO only mutates the exchange fields.
 */
import type { RequestContext } from "./context.js";
import { ResponseBuffer } from "./response-buffer.js";

export type RequestStatus = "ready" | "inflight" | "success" | "failure";

/** "json" for structured API calls, "binary" for raw payloads */
export type RequestType = "json" | "binary";

export interface HttpRequestOptions {
  type?: RequestType;
  /** Outgoing payload; strings are sent as UTF-8 */
  body?: Uint8Array | string;
  /** Pre-sized destination for a raw response (disables response decompression) */
  destination?: Uint8Array;
}

export class HttpRequest {
  url: string;
  type: RequestType;
  out: Uint8Array;
  readonly in: ResponseBuffer;

  status: RequestStatus = "ready";
  /** HTTP status of the last response, 0 before headers or after cancellation */
  httpStatus = 0;
  /** Original (pre-compression) body length, -1 when not announced */
  contentLength = -1;
  /** Live exchange state, null when idle or cancelled */
  handle: RequestContext | null = null;

  constructor(url: string, options: HttpRequestOptions = {}) {
    this.url = url;
    this.type = options.type ?? "json";
    this.out =
      typeof options.body === "string"
        ? new TextEncoder().encode(options.body)
        : (options.body ?? new Uint8Array(0));
    this.in = new ResponseBuffer(options.destination);
  }

  get binary(): boolean {
    return this.type === "binary";
  }

  get terminal(): boolean {
    return this.status === "success" || this.status === "failure";
  }

  /** Reset exchange fields ahead of a fresh submission */
  reset(): void {
    this.status = "ready";
    this.httpStatus = 0;
    this.contentLength = -1;
    this.in.clear();
  }

  text(): string {
    return this.in.toString();
  }

  json(): unknown {
    return JSON.parse(this.text());
  }
}
