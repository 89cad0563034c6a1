/**
 * Per-exchange state bridging a logical HttpRequest to transport handles.
 *
 * Ownership: the context holds its request until sever() hands it off
 * (cancellation or abandonment). Dispatcher code must treat a severed
 * context as stale and ignore the event.
 */
import type { GzipInflater } from "./inflate.js";
import type { HttpRequest } from "./request.js";
import type { ConnectionHandle, RequestHandle } from "./transport/types.js";
import type { ChunkedUploader } from "./upload.js";

export class RequestContext {
  connection: ConnectionHandle | null = null;
  handle: RequestHandle | null = null;
  upload: ChunkedUploader | null = null;
  inflater: GzipInflater | null = null;

  private owner: HttpRequest | null;
  private _disposed = false;

  constructor(
    request: HttpRequest,
    private readonly onDispose?: (context: RequestContext) => void,
  ) {
    this.owner = request;
  }

  /** Owning request, or null once severed */
  get request(): HttpRequest | null {
    return this.owner;
  }

  get disposed(): boolean {
    return this._disposed;
  }

  /** Release ownership. Returns the previous owner (null if already severed). */
  sever(): HttpRequest | null {
    const owner = this.owner;
    this.owner = null;
    return owner;
  }

  /** Free exchange resources. Returns false if already disposed. */
  dispose(): boolean {
    if (this._disposed) return false;
    this._disposed = true;
    this.owner = null;
    this.inflater?.destroy();
    this.inflater = null;
    this.onDispose?.(this);
    return true;
  }
}
