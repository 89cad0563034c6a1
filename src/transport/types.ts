/**
 * Transport provider port.
 *
 * The provider owns TCP/TLS, DNS and HTTP framing and reports progress as
 * discrete events on a per-request callback. Commands throw on failure.
 * Events are never delivered from inside the command that caused them.
 */

export interface TransportTimeouts {
  /** Name resolution (ms, 0 = unlimited) */
  resolve: number;
  connect: number;
  send: number;
  receive: number;
}

export interface ConnectionHandle {
  readonly kind: "connection";
  readonly host: string;
  readonly port: number;
}

export interface RequestHandle {
  readonly kind: "request";
  readonly method: string;
  readonly path: string;
  readonly secure: boolean;
}

export type TransportHandle = ConnectionHandle | RequestHandle;

export type TransportEvent =
  | { kind: "data-available"; size: number }
  | { kind: "read-complete"; length: number }
  | { kind: "headers-available" }
  | { kind: "request-error"; code: string }
  | { kind: "secure-failure" }
  | { kind: "send-complete" }
  | { kind: "write-complete"; length: number }
  /** Request handle torn down; always the last event for that handle */
  | { kind: "handle-closing" };

export type TransportEventKind = TransportEvent["kind"];

export type TransportCallback<C> = (handle: RequestHandle, context: C, event: TransportEvent) => void;

export interface Transport {
  connect(host: string, port: number): ConnectionHandle;
  openRequest(
    connection: ConnectionHandle,
    method: string,
    path: string,
    secure: boolean,
  ): RequestHandle;
  setTimeouts(request: RequestHandle, timeouts: TransportTimeouts): void;
  /** Register the single callback for every lifecycle event of `request`. */
  setCallback<C>(request: RequestHandle, callback: TransportCallback<C>, context: C): void;
  /**
   * Send the request head plus the first body chunk.
   * `totalLength` frames the full body; the rest follows via write().
   */
  send(
    request: RequestHandle,
    headers: Record<string, string>,
    chunk: Uint8Array,
    totalLength: number,
  ): void;
  write(request: RequestHandle, chunk: Uint8Array): void;
  /** Body fully written: start waiting for the response head. */
  receiveResponse(request: RequestHandle): void;
  /** Ask for a data-available event (size 0 once the body has ended). */
  queryDataAvailable(request: RequestHandle): void;
  /** Copy up to target.length available bytes; read-complete follows. */
  read(request: RequestHandle, target: Uint8Array): number;
  queryStatusCode(request: RequestHandle): number;
  queryHeader(request: RequestHandle, name: string): string | null;
  closeHandle(handle: TransportHandle): void;
}
