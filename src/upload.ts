/**
 * Chunked upload cursor.
 * The body is handed to the transport in CHUNK_SIZE instalments so that
 * unacknowledged data stays bounded and progress advances smoothly.
 */
import { CHUNK_SIZE } from "./constants.js";

export class ChunkedUploader {
  private queued = 0;

  constructor(
    private readonly payload: Uint8Array,
    private readonly chunkSize: number = CHUNK_SIZE,
  ) {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(`Invalid chunk size: ${chunkSize}`);
    }
  }

  /** Full body length */
  get total(): number {
    return this.payload.length;
  }

  /** Bytes handed to the transport so far */
  get position(): number {
    return this.queued;
  }

  get done(): boolean {
    return this.queued >= this.payload.length;
  }

  /** First instalment, sent together with the request head. */
  first(): Uint8Array {
    this.queued = Math.min(this.payload.length, this.chunkSize);
    return this.payload.subarray(0, this.queued);
  }

  /** Next instalment, or null once the whole body is queued. */
  next(): Uint8Array | null {
    if (this.done) return null;
    const start = this.queued;
    const size = Math.min(this.payload.length - start, this.chunkSize);
    this.queued += size;
    return this.payload.subarray(start, start + size);
  }
}
