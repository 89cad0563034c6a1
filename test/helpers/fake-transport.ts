import type {
  ConnectionHandle,
  RequestHandle,
  Transport,
  TransportCallback,
  TransportEvent,
  TransportHandle,
  TransportTimeouts,
} from "../../src/transport/types.js";

export class FakeConnection implements ConnectionHandle {
  readonly kind = "connection";
  constructor(
    readonly host: string,
    readonly port: number,
  ) {}
}

export class FakeRequest implements RequestHandle {
  readonly kind = "request";
  timeouts: TransportTimeouts | null = null;
  headers: Record<string, string> = {};
  totalLength = -1;
  /** Body chunks handed over by send() and write(), in order */
  chunks: Uint8Array[] = [];
  receiving = false;
  closed = false;
  deliver: ((event: TransportEvent) => void) | null = null;

  constructor(
    readonly connection: FakeConnection,
    readonly method: string,
    readonly path: string,
    readonly secure: boolean,
  ) {}
}

export interface FakeResponse {
  status: number;
  headers: Record<string, string>;
}

/**
 * Scriptable in-process transport. Commands are recorded in `calls`;
 * events only reach the dispatcher through emit().
 */
export class FakeTransport implements Transport {
  readonly calls: string[] = [];
  readonly requests: FakeRequest[] = [];
  readonly closed: TransportHandle[] = [];
  /** Commands that throw when invoked */
  readonly failing = new Set<string>();
  response: FakeResponse = { status: 200, headers: {} };

  private body: Uint8Array = new Uint8Array(0);
  private bodyOffset = 0;

  get last(): FakeRequest {
    const request = this.requests[this.requests.length - 1];
    if (!request) throw new Error("no request opened");
    return request;
  }

  /** Bytes that read() hands out, in order */
  setBody(body: Uint8Array | string): void {
    this.body = typeof body === "string" ? new TextEncoder().encode(body) : body;
    this.bodyOffset = 0;
  }

  emit(event: TransportEvent, request: FakeRequest = this.last): void {
    request.deliver?.(event);
  }

  connect(host: string, port: number): ConnectionHandle {
    this.record("connect");
    return new FakeConnection(host, port);
  }

  openRequest(
    connection: ConnectionHandle,
    method: string,
    path: string,
    secure: boolean,
  ): RequestHandle {
    this.record("openRequest");
    const request = new FakeRequest(
      new FakeConnection(connection.host, connection.port),
      method,
      path,
      secure,
    );
    this.requests.push(request);
    return request;
  }

  setTimeouts(request: RequestHandle, timeouts: TransportTimeouts): void {
    this.record("setTimeouts");
    this.narrow(request).timeouts = timeouts;
  }

  setCallback<C>(request: RequestHandle, callback: TransportCallback<C>, context: C): void {
    this.record("setCallback");
    const fake = this.narrow(request);
    fake.deliver = event => callback(fake, context, event);
  }

  send(
    request: RequestHandle,
    headers: Record<string, string>,
    chunk: Uint8Array,
    totalLength: number,
  ): void {
    this.record("send");
    const fake = this.narrow(request);
    fake.headers = headers;
    fake.totalLength = totalLength;
    fake.chunks.push(chunk);
  }

  write(request: RequestHandle, chunk: Uint8Array): void {
    this.record("write");
    this.narrow(request).chunks.push(chunk);
  }

  receiveResponse(request: RequestHandle): void {
    this.record("receiveResponse");
    this.narrow(request).receiving = true;
  }

  queryDataAvailable(_request: RequestHandle): void {
    this.record("queryDataAvailable");
  }

  read(_request: RequestHandle, target: Uint8Array): number {
    this.record("read");
    const n = Math.min(target.length, this.body.length - this.bodyOffset);
    target.set(this.body.subarray(this.bodyOffset, this.bodyOffset + n));
    this.bodyOffset += n;
    return n;
  }

  queryStatusCode(_request: RequestHandle): number {
    this.record("queryStatusCode");
    return this.response.status;
  }

  queryHeader(_request: RequestHandle, name: string): string | null {
    this.record("queryHeader");
    const wanted = name.toLowerCase();
    for (const [key, value] of Object.entries(this.response.headers)) {
      if (key.toLowerCase() === wanted) return value;
    }
    return null;
  }

  closeHandle(handle: TransportHandle): void {
    this.record("closeHandle");
    this.closed.push(handle);
    if (handle instanceof FakeRequest) handle.closed = true;
  }

  private record(op: string): void {
    this.calls.push(op);
    if (this.failing.has(op)) throw new Error(`${op} failed`);
  }

  private narrow(handle: RequestHandle): FakeRequest {
    if (!(handle instanceof FakeRequest)) throw new Error("foreign handle");
    return handle;
  }
}
