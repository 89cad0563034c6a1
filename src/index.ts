/**
 * evented-http: notification-driven POST exchanges with chunked upload,
 * in-place gzip decoding and race-safe cancellation.
 */

// Main API
export { HttpIO } from "./http-io.js";
export type { HttpIOOptions } from "./http-io.js";
export { HttpRequest } from "./request.js";
export type { HttpRequestOptions, RequestStatus, RequestType } from "./request.js";

// Waiter integration
export { WakeWaiter, WAIT_HTTP } from "./waiter.js";
export type { Waiter } from "./waiter.js";
export { SessionLock, WakeSignal } from "./session.js";
export type { Waker } from "./session.js";

// Tracing
export { consoleTrace } from "./trace.js";
export type { TraceObserver } from "./trace.js";

// Transport layer (advanced usage)
export { NodeTransport } from "./transport/node.js";
export type {
  NodeTransportOptions,
  OutgoingRequest,
  IncomingResponse,
  RequestFactory,
} from "./transport/node.js";
export type {
  Transport,
  TransportCallback,
  TransportEvent,
  TransportEventKind,
  TransportHandle,
  TransportTimeouts,
  ConnectionHandle,
  RequestHandle,
} from "./transport/types.js";

// Building blocks (advanced usage)
export { CallbackDispatcher } from "./dispatcher.js";
export type { DispatchHost } from "./dispatcher.js";
export { RequestContext } from "./context.js";
export { ChunkedUploader } from "./upload.js";
export { GzipInflater } from "./inflate.js";
export type { InflateStatus } from "./inflate.js";
export { ResponseBuffer, BufferLease } from "./response-buffer.js";
export { decodeResponseHead, applyResponseHead } from "./response-decoder.js";
export type { HeaderSource, ResponseHead } from "./response-decoder.js";

// Constants
export {
  CHUNK_SIZE,
  REQUEST_TIMEOUTS,
  ORIGINAL_CONTENT_LENGTH_HEADER,
  DEFAULT_USER_AGENT,
  TIMEOUT_ERROR_CODE,
} from "./constants.js";

// Protocol utilities
export { parseUrl } from "./utils/url.js";
export type { ParsedUrl } from "./utils/url.js";
