/**
 * Transport provider over node:http / node:https.
 *
 * Maps Node's stream events onto the discrete notifications the
 * dispatcher expects. Every notification is delivered on a later turn of
 * the event loop, never from inside the command that caused it.
 */
import type { EventEmitter } from "node:events";
import * as http from "node:http";
import * as https from "node:https";
import type { Socket } from "node:net";
import type { Readable } from "node:stream";
import { DEFAULT_USER_AGENT, TIMEOUT_ERROR_CODE } from "../constants.js";
import {
  validateHeaderName,
  validateHeaderValue,
  validateMethod,
  validatePath,
} from "../utils/headers.js";
import type {
  ConnectionHandle,
  RequestHandle,
  Transport,
  TransportCallback,
  TransportEvent,
  TransportHandle,
  TransportTimeouts,
} from "./types.js";

/** The part of http.ClientRequest the transport uses */
export interface OutgoingRequest extends EventEmitter {
  write(chunk: Uint8Array, callback: (error: Error | null | undefined) => void): boolean;
  end(): this;
  setTimeout(timeout: number): this;
  destroy(error?: Error): this;
}

/** The part of http.IncomingMessage the transport uses */
export interface IncomingResponse extends Readable {
  statusCode?: number | undefined;
  headers: http.IncomingHttpHeaders;
}

export type RequestFactory = (secure: boolean, options: http.RequestOptions) => OutgoingRequest;

export interface NodeTransportOptions {
  /** User-Agent sent with every request (default: DEFAULT_USER_AGENT) */
  userAgent?: string;
  /** Replaces http.request/https.request (tests, custom agents) */
  request?: RequestFactory;
}

const defaultRequestFactory: RequestFactory = (secure, options) =>
  secure ? https.request(options) : http.request(options);

// TLS handshake and certificate verification failures
const SECURE_FAILURE_RE =
  /^(ERR_TLS_|ERR_SSL_|CERT_|UNABLE_TO_|DEPTH_ZERO_SELF_SIGNED_CERT|SELF_SIGNED_CERT_IN_CHAIN|HOSTNAME_MISMATCH)/;

class NodeConnection implements ConnectionHandle {
  readonly kind = "connection";
  closed = false;

  constructor(
    readonly host: string,
    readonly port: number,
  ) {}
}

class NodeRequest implements RequestHandle {
  readonly kind = "request";
  timeouts: TransportTimeouts = { resolve: 0, connect: 0, send: 0, receive: 0 };
  notify: ((event: TransportEvent) => void) | null = null;
  outgoing: OutgoingRequest | null = null;
  response: IncomingResponse | null = null;
  receiving = false;
  headersDelivered = false;
  querying = false;
  ended = false;
  failed = false;
  closed = false;

  constructor(
    readonly connection: NodeConnection,
    readonly method: string,
    readonly path: string,
    readonly secure: boolean,
  ) {}
}

export class NodeTransport implements Transport {
  private readonly userAgent: string;
  private readonly requestFactory: RequestFactory;

  constructor(options: NodeTransportOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.requestFactory = options.request ?? defaultRequestFactory;
  }

  connect(host: string, port: number): ConnectionHandle {
    if (!host) throw new Error("connect: empty host");
    if (!Number.isInteger(port) || port <= 0 || port > 65535) {
      throw new Error(`connect: invalid port ${port}`);
    }
    return new NodeConnection(host, port);
  }

  openRequest(
    connection: ConnectionHandle,
    method: string,
    path: string,
    secure: boolean,
  ): RequestHandle {
    if (!(connection instanceof NodeConnection)) {
      throw new Error("openRequest: foreign connection handle");
    }
    if (connection.closed) throw new Error("openRequest: connection closed");
    validateMethod(method);
    validatePath(path);
    return new NodeRequest(connection, method.toUpperCase(), path, secure);
  }

  setTimeouts(request: RequestHandle, timeouts: TransportTimeouts): void {
    this.narrow(request).timeouts = { ...timeouts };
  }

  setCallback<C>(request: RequestHandle, callback: TransportCallback<C>, context: C): void {
    const h = this.narrow(request);
    h.notify = event => callback(h, context, event);
  }

  send(
    request: RequestHandle,
    headers: Record<string, string>,
    chunk: Uint8Array,
    totalLength: number,
  ): void {
    const h = this.narrow(request);
    if (h.outgoing) throw new Error("send: request already sent");

    const reqHeaders: Record<string, string> = { "user-agent": this.userAgent };
    for (const [key, value] of Object.entries(headers)) {
      validateHeaderName(key);
      validateHeaderValue(key, value);
      reqHeaders[key.toLowerCase()] = value;
    }
    reqHeaders["content-length"] = String(totalLength);

    const { connection, timeouts } = h;
    const outgoing = this.requestFactory(h.secure, {
      host: connection.host,
      port: connection.port,
      method: h.method,
      path: h.path,
      headers: reqHeaders,
      timeout: phaseTimeout(timeouts.resolve, timeouts.connect),
    });
    h.outgoing = outgoing;

    outgoing.on("timeout", () => {
      const err = Object.assign(new Error(`Request timeout (${connection.host}:${connection.port})`), {
        code: TIMEOUT_ERROR_CODE,
      });
      outgoing.destroy(err);
    });
    outgoing.on("socket", (socket: Socket) => {
      const uploading = () => outgoing.setTimeout(h.receiving ? timeouts.receive : timeouts.send);
      if (socket.connecting) socket.once("connect", uploading);
      else uploading();
    });
    outgoing.on("error", (err: Error) => this.fail(h, err));
    outgoing.on("response", (res: IncomingResponse) => this.onResponse(h, res));

    outgoing.write(chunk, err => {
      if (!err) this.notify(h, { kind: "send-complete" });
    });
  }

  write(request: RequestHandle, chunk: Uint8Array): void {
    const h = this.narrow(request);
    const outgoing = this.requireOutgoing(h, "write");
    if (h.receiving) throw new Error("write: request body already finished");
    outgoing.write(chunk, err => {
      if (!err) this.notify(h, { kind: "write-complete", length: chunk.length });
    });
  }

  receiveResponse(request: RequestHandle): void {
    const h = this.narrow(request);
    const outgoing = this.requireOutgoing(h, "receiveResponse");
    if (h.receiving) return;
    h.receiving = true;
    outgoing.setTimeout(h.timeouts.receive);
    outgoing.end();
    if (h.response) this.deliverHeaders(h);
  }

  queryDataAvailable(request: RequestHandle): void {
    const h = this.narrow(request);
    this.requireResponse(h, "queryDataAvailable");
    h.querying = true;
    setImmediate(() => this.pump(h));
  }

  read(request: RequestHandle, target: Uint8Array): number {
    const h = this.narrow(request);
    const res = this.requireResponse(h, "read");

    const size = Math.min(target.length, res.readableLength);
    let length = 0;
    if (size > 0) {
      const chunk: unknown = res.read(size);
      if (!(chunk instanceof Uint8Array)) {
        throw new Error(`read: ${size} bytes announced but not buffered`);
      }
      target.set(chunk);
      length = chunk.length;
    }
    this.defer(h, { kind: "read-complete", length });
    return length;
  }

  queryStatusCode(request: RequestHandle): number {
    const res = this.requireResponse(this.narrow(request), "queryStatusCode");
    if (res.statusCode === undefined) throw new Error("queryStatusCode: no status line");
    return res.statusCode;
  }

  queryHeader(request: RequestHandle, name: string): string | null {
    const res = this.requireResponse(this.narrow(request), "queryHeader");
    const value = res.headers[name.toLowerCase()];
    if (value === undefined) return null;
    return Array.isArray(value) ? value.join(", ") : value;
  }

  closeHandle(handle: TransportHandle): void {
    if (handle instanceof NodeConnection) {
      handle.closed = true;
      return;
    }
    const h = this.narrow(handle);
    if (h.closed) return;
    h.closed = true;
    h.outgoing?.destroy();
    h.response?.destroy();

    const notify = h.notify;
    h.notify = null;
    if (notify) {
      setImmediate(() => notify({ kind: "handle-closing" }));
    }
  }

  private onResponse(h: NodeRequest, res: IncomingResponse): void {
    if (h.closed) {
      res.destroy();
      return;
    }
    h.response = res;
    res.on("readable", () => this.pump(h));
    res.on("end", () => {
      h.ended = true;
      this.pump(h);
    });
    res.on("error", (err: Error) => this.fail(h, err));
    if (h.receiving) this.deliverHeaders(h);
  }

  private deliverHeaders(h: NodeRequest): void {
    if (h.headersDelivered) return;
    h.headersDelivered = true;
    this.defer(h, { kind: "headers-available" });
  }

  /** Answer a pending queryDataAvailable once data or end-of-body is known */
  private pump(h: NodeRequest): void {
    const res = h.response;
    if (!res || !h.querying || h.closed) return;

    if (res.readableLength > 0) {
      h.querying = false;
      this.notify(h, { kind: "data-available", size: res.readableLength });
    } else if (h.ended) {
      h.querying = false;
      this.notify(h, { kind: "data-available", size: 0 });
    } else {
      // at EOF this triggers 'end'; otherwise 'readable' follows new data
      res.read(0);
    }
  }

  private fail(h: NodeRequest, err: Error): void {
    if (h.closed || h.failed) return;
    h.failed = true;
    const code = errorCode(err);
    console.debug(`[transport] ${h.method} ${h.path} error ${code}: ${err.message}`);
    if (SECURE_FAILURE_RE.test(code)) {
      this.notify(h, { kind: "secure-failure" });
    } else {
      this.notify(h, { kind: "request-error", code });
    }
  }

  private notify(h: NodeRequest, event: TransportEvent): void {
    if (h.closed) return;
    h.notify?.(event);
  }

  private defer(h: NodeRequest, event: TransportEvent): void {
    setImmediate(() => this.notify(h, event));
  }

  private narrow(handle: TransportHandle): NodeRequest {
    if (!(handle instanceof NodeRequest)) {
      throw new Error(`Foreign ${handle.kind} handle passed to NodeTransport`);
    }
    return handle;
  }

  private requireOutgoing(h: NodeRequest, op: string): OutgoingRequest {
    if (h.closed) throw new Error(`${op}: handle closed`);
    if (!h.outgoing) throw new Error(`${op}: request not sent`);
    return h.outgoing;
  }

  private requireResponse(h: NodeRequest, op: string): IncomingResponse {
    if (h.closed) throw new Error(`${op}: handle closed`);
    if (!h.response) throw new Error(`${op}: no response`);
    return h.response;
  }
}

/** Socket timeout until connected; Node does not time name resolution separately */
function phaseTimeout(resolve: number, connect: number): number | undefined {
  if (connect === 0) return undefined;
  return resolve + connect;
}

function errorCode(err: Error): string {
  if ("code" in err && typeof err.code === "string") return err.code;
  return "EUNKNOWN";
}
