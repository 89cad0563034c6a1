/**
 * Callback dispatcher: the single entry point for transport notifications.
 *
 * Notifications for any request on the session are serialized by the
 * SessionLock. A context severed by cancellation turns every later
 * notification into a no-op, including ones that were already queued on
 * the lock when cancel() ran, and ones that resume after an await.
 */
import { TIMEOUT_ERROR_CODE } from "./constants.js";
import type { RequestContext } from "./context.js";
import type { HttpRequest } from "./request.js";
import { applyResponseHead, decodeResponseHead } from "./response-decoder.js";
import type { SessionLock, WakeSignal } from "./session.js";
import type { TraceObserver } from "./trace.js";
import type { RequestHandle, Transport, TransportEvent } from "./transport/types.js";

/** Session services the dispatcher drives */
export interface DispatchHost {
  readonly transport: Transport;
  readonly lock: SessionLock;
  readonly wake: WakeSignal;
  readonly trace: TraceObserver | null;
  cancel(request: HttpRequest): void;
  /** Connectivity became provable (response head received) */
  reachable(): void;
  /** Transport failed for a reason other than a timeout */
  unreachable(): void;
}

export class CallbackDispatcher {
  constructor(private readonly host: DispatchHost) {}

  async dispatch(
    handle: RequestHandle,
    context: RequestContext,
    event: TransportEvent,
  ): Promise<void> {
    if (event.kind === "handle-closing" && !context.request) {
      context.dispose();
      return;
    }

    await this.host.lock.acquire();
    try {
      const request = context.request;
      // cancelled after this event was queued
      if (!request) return;
      await this.route(handle, context, request, event);
    } finally {
      this.host.lock.release();
    }
  }

  private async route(
    handle: RequestHandle,
    context: RequestContext,
    request: HttpRequest,
    event: TransportEvent,
  ): Promise<void> {
    switch (event.kind) {
      case "data-available":
        if (event.size === 0) {
          await this.complete(context, request);
        } else {
          await this.receive(handle, context, request, event.size);
        }
        return;

      case "read-complete":
        this.readComplete(handle, context, request, event.length);
        return;

      case "headers-available":
        this.headers(handle, context, request);
        return;

      case "request-error":
        console.debug(`[http] request error ${event.code} for ${request.url}`);
        if (event.code !== TIMEOUT_ERROR_CODE) {
          this.host.unreachable();
        }
        this.abort(request);
        return;

      case "secure-failure":
        console.debug(`[http] secure channel failure for ${request.url}`);
        this.abort(request);
        return;

      case "send-complete":
      case "write-complete":
        this.advanceUpload(handle, context, request);
        return;

      case "handle-closing":
        return;
    }
  }

  /** Body fully received */
  private async complete(context: RequestContext, request: HttpRequest): Promise<void> {
    const inflater = context.inflater;
    if (inflater) {
      const ok = await inflater.finish();
      if (context.request !== request) return;
      if (!ok) {
        console.debug(`[http] inflate failed for ${request.url}: ${inflater.error?.message}`);
        this.abort(request);
        return;
      }
    }

    request.status = request.httpStatus === 200 ? "success" : "failure";
    this.host.trace?.received?.(request);
    this.host.wake.signal();
  }

  private async receive(
    handle: RequestHandle,
    context: RequestContext,
    request: HttpRequest,
    size: number,
  ): Promise<void> {
    const { transport } = this.host;
    const inflater = context.inflater;

    if (inflater) {
      const scratch = new Uint8Array(size);
      let read: number;
      try {
        read = transport.read(handle, scratch);
      } catch (err) {
        this.logFailure("read", request, err);
        this.abort(request);
        return;
      }

      const status = await inflater.push(scratch.subarray(0, read));
      if (context.request !== request) return;
      if (status === "error") {
        console.debug(`[http] inflate failed for ${request.url}: ${inflater.error?.message}`);
        this.host.cancel(request);
      }
    } else {
      const target = request.in.reserve(size);
      try {
        if (target.length === 0) {
          throw new Error(`Response exceeds destination of ${request.in.capacity} bytes`);
        }
        transport.read(handle, target);
      } catch (err) {
        this.logFailure("read", request, err);
        this.host.cancel(request);
      }
    }

    this.host.wake.signal();
  }

  private readComplete(
    handle: RequestHandle,
    context: RequestContext,
    request: HttpRequest,
    length: number,
  ): void {
    if (!length) return;

    // with an inflater active, output already landed in the leased region
    if (!context.inflater) {
      request.in.commit(length);
    }

    try {
      this.host.transport.queryDataAvailable(handle);
    } catch (err) {
      this.logFailure("query", request, err);
      this.abort(request);
    }
  }

  private headers(handle: RequestHandle, context: RequestContext, request: HttpRequest): void {
    const { transport } = this.host;

    try {
      const head = decodeResponseHead(
        {
          statusCode: () => transport.queryStatusCode(handle),
          header: name => transport.queryHeader(handle, name),
        },
        request.in.isPresized,
      );
      applyResponseHead(context, request, head);
      transport.queryDataAvailable(handle);
    } catch (err) {
      this.logFailure("header", request, err);
      this.abort(request);
      return;
    }

    this.host.reachable();
  }

  private advanceUpload(handle: RequestHandle, context: RequestContext, request: HttpRequest): void {
    const { transport } = this.host;
    const chunk = context.upload?.next() ?? null;

    if (chunk) {
      try {
        transport.write(handle, chunk);
      } catch (err) {
        this.logFailure("write", request, err);
        this.host.cancel(request);
      }
      this.host.wake.signal();
      return;
    }

    try {
      transport.receiveResponse(handle);
    } catch (err) {
      this.logFailure("receive", request, err);
      this.abort(request);
    }
  }

  private abort(request: HttpRequest): void {
    this.host.cancel(request);
    this.host.wake.signal();
  }

  private logFailure(step: string, request: HttpRequest, err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    console.debug(`[http] ${step} failed for ${request.url}: ${message}`);
  }
}
