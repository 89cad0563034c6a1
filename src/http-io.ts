/**
 * HTTP I/O session: submits POST requests through a Transport and drives
 * them to completion from transport notifications.
 *
 * The caller's side only calls post(), cancel() and polls request.status;
 * everything else happens in the CallbackDispatcher, serialized by the
 * session's lock. Register a Waiter via addEvents() to sleep until the
 * session has something worth looking at.
 */
import { CHUNK_SIZE, REQUEST_TIMEOUTS } from "./constants.js";
import { RequestContext } from "./context.js";
import { CallbackDispatcher, type DispatchHost } from "./dispatcher.js";
import type { HttpRequest } from "./request.js";
import { SessionLock, WakeSignal } from "./session.js";
import { consoleTrace, type TraceObserver } from "./trace.js";
import { NodeTransport } from "./transport/node.js";
import type { RequestHandle, Transport, TransportCallback } from "./transport/types.js";
import { ChunkedUploader } from "./upload.js";
import { parseUrl, type ParsedUrl } from "./utils/url.js";
import type { Waiter } from "./waiter.js";

export interface HttpIOOptions {
  /** Transport provider (default: NodeTransport over node:http/https) */
  transport?: Transport;
  /** Upload instalment size in bytes (default: CHUNK_SIZE) */
  chunkSize?: number;
  /** Payload tracer; `true` selects the console.debug tracer */
  trace?: TraceObserver | boolean;
}

export class HttpIO implements DispatchHost {
  readonly transport: Transport;
  readonly lock = new SessionLock();
  readonly wake = new WakeSignal();
  readonly trace: TraceObserver | null;

  private readonly chunkSize: number;
  private readonly dispatcher: CallbackDispatcher;
  private readonly contexts = new Set<RequestContext>();
  private readonly pending = new Set<Promise<void>>();
  private waiter: Waiter | null = null;
  /** Last connectivity state reported to the waiter */
  private connectivity: boolean | null = null;

  private readonly callback: TransportCallback<RequestContext> = (handle, context, event) => {
    this.track(this.dispatcher.dispatch(handle, context, event), handle, context);
  };

  constructor(options: HttpIOOptions = {}) {
    this.transport = options.transport ?? new NodeTransport();
    this.chunkSize = options.chunkSize ?? CHUNK_SIZE;
    this.trace = options.trace === true ? consoleTrace : options.trace || null;
    this.dispatcher = new CallbackDispatcher(this);
  }

  /** Contexts not yet freed by their handle teardown */
  get activeContexts(): number {
    return this.contexts.size;
  }

  /**
   * Submit `request` as a POST. `data` overrides the request's own payload
   * (pre-serialized raw sends). Failures surface as status "failure".
   */
  post(request: HttpRequest, data?: Uint8Array): void {
    if (request.status === "inflight") {
      throw new Error(`Request already in flight: ${request.url}`);
    }
    // handles of a finished exchange are still open until cancelled
    if (request.handle) this.cancel(request);
    request.reset();

    const payload = data ?? request.out;
    this.trace?.sending?.(request, payload);

    let target: ParsedUrl;
    try {
      target = parseUrl(request.url);
    } catch (err) {
      console.debug(`[http] invalid target URL ${JSON.stringify(request.url)}: ${errorMessage(err)}`);
      request.status = "failure";
      return;
    }

    const context = new RequestContext(request, ctx => this.contexts.delete(ctx));
    this.contexts.add(context);
    request.handle = context;

    try {
      context.connection = this.transport.connect(target.hostname, target.port);
      const handle = this.transport.openRequest(
        context.connection,
        "POST",
        target.path,
        target.protocol === "https",
      );
      context.handle = handle;

      this.transport.setTimeouts(handle, REQUEST_TIMEOUTS);
      this.transport.setCallback(handle, this.callback, context);

      const upload = new ChunkedUploader(payload, this.chunkSize);
      context.upload = upload;
      this.transport.send(handle, this.requestHeaders(request), upload.first(), upload.total);
    } catch (err) {
      console.debug(`[http] POST ${request.url} failed: ${errorMessage(err)}`);
      this.abandon(request, context);
      return;
    }

    request.status = "inflight";
  }

  /**
   * Cancel the exchange for `request`. Idempotent; a request that already
   * reached a terminal status keeps it, only its handles are released.
   */
  cancel(request: HttpRequest): void {
    const context = request.handle;
    if (!context) return;

    context.sever();
    request.handle = null;
    if (!request.terminal) {
      request.httpStatus = 0;
      request.status = "failure";
    }
    this.closeHandles(context);
  }

  /** Upload progress: bytes handed to the transport so far */
  postPosition(request: HttpRequest): number {
    return request.handle?.upload?.position ?? 0;
  }

  /** Register an external waiter for wakeups and connectivity reports */
  addEvents(waiter: Waiter, flags: number): void {
    this.waiter = waiter;
    this.connectivity = null;
    waiter.addWakeSource(this.wake, flags);
  }

  /** Resolve once every dispatch queued so far (and any it triggers) has finished */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }

  reachable(): void {
    if (this.waiter && this.connectivity !== true) {
      this.connectivity = true;
      this.waiter.notifyConnectivity(true);
    }
  }

  unreachable(): void {
    if (this.waiter) {
      this.connectivity = false;
      this.waiter.notifyConnectivity(false);
    }
  }

  private requestHeaders(request: HttpRequest): Record<string, string> {
    if (request.type === "json" || !request.in.isPresized) {
      return { "content-type": "application/json", "accept-encoding": "gzip" };
    }
    return { "content-type": "application/octet-stream" };
  }

  /** Submission failed part-way: sever, close what was opened */
  private abandon(request: HttpRequest, context: RequestContext): void {
    context.sever();
    request.handle = null;
    request.status = "failure";
    const hadRequestHandle = context.handle !== null;
    this.closeHandles(context);
    // without a request handle no handle-closing will ever arrive
    if (!hadRequestHandle) context.dispose();
  }

  private closeHandles(context: RequestContext): void {
    context.inflater?.destroy();
    const { connection, handle } = context;
    context.connection = null;
    context.handle = null;

    for (const h of [connection, handle]) {
      if (!h) continue;
      try {
        this.transport.closeHandle(h);
      } catch (err) {
        console.debug(`[http] closing ${h.kind} handle failed: ${errorMessage(err)}`);
      }
    }
  }

  private track(dispatch: Promise<void>, handle: RequestHandle, context: RequestContext): void {
    const settled = dispatch.catch((err: unknown) => {
      console.debug(`[http] dispatch of ${handle.method} ${handle.path} failed: ${errorMessage(err)}`);
      const request = context.request;
      if (request) {
        this.cancel(request);
        this.wake.signal();
      }
    });
    const tracked = settled.finally(() => {
      this.pending.delete(tracked);
    });
    this.pending.add(tracked);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
