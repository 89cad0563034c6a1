/**
 * Streaming gzip inflater writing into a leased region of the response buffer.
 * Stateful across push() calls: the zlib window and any partially consumed
 * input carry over from one compressed chunk to the next.
 */
import { createGunzip, type Gunzip } from "node:zlib";
import { finished } from "node:stream/promises";
import { setImmediate as nextTurn } from "node:timers/promises";
import type { BufferLease } from "./response-buffer.js";

/**
 * - needs-input: declared output not yet produced, keep feeding
 * - complete: declared output fully produced (trailer checked by finish())
 * - error: corrupt stream or output beyond the declared size
 */
export type InflateStatus = "needs-input" | "complete" | "error";

export class GzipInflater {
  private readonly stream: Gunzip;
  private failure: Error | null = null;
  private ended = false;

  constructor(private readonly lease: BufferLease) {
    this.stream = createGunzip();
    this.stream.on("data", (chunk: Buffer) => {
      if (!this.lease.write(chunk)) {
        this.fail(
          new Error(`Inflated output exceeds declared size of ${this.lease.capacity} bytes`),
        );
      }
    });
    this.stream.on("error", (err: Error) => {
      this.failure ??= err;
    });
  }

  /** Bytes written into the lease so far */
  get produced(): number {
    return this.lease.written;
  }

  get declaredSize(): number {
    return this.lease.capacity;
  }

  get error(): Error | null {
    return this.failure;
  }

  /** Feed one compressed chunk. */
  async push(chunk: Uint8Array): Promise<InflateStatus> {
    if (this.failure || this.ended) return "error";
    if (chunk.length > 0) {
      try {
        await this.write(chunk);
        // 'data' may still be queued on the next tick after the write callback
        await nextTurn();
      } catch (err) {
        this.failure ??= err instanceof Error ? err : new Error(String(err));
      }
    }
    if (this.failure) return "error";
    return this.lease.remaining === 0 ? "complete" : "needs-input";
  }

  /**
   * Signal end of input and verify the stream.
   * True only if the gzip trailer checked out and the declared size was filled exactly.
   */
  async finish(): Promise<boolean> {
    if (this.failure) return false;
    if (!this.ended) {
      this.ended = true;
      this.stream.end();
      try {
        await finished(this.stream);
      } catch (err) {
        this.failure ??= err instanceof Error ? err : new Error(String(err));
      }
    }
    if (!this.failure && this.lease.remaining > 0) {
      this.failure = new Error(
        `Short stream: ${this.lease.written} of ${this.lease.capacity} bytes inflated`,
      );
    }
    return this.failure === null;
  }

  /** Revoke the lease and release zlib state. Idempotent. */
  destroy(): void {
    this.lease.revoke();
    this.ended = true;
    if (!this.stream.destroyed) {
      this.stream.destroy();
    }
  }

  private fail(err: Error): void {
    this.failure ??= err;
    this.stream.destroy(err);
  }

  private write(chunk: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      // zlib destroys itself on a data error and may never call back
      const onClose = () => reject(this.failure ?? new Error("Inflate stream closed"));
      this.stream.once("close", onClose);
      this.stream.write(chunk, err => {
        this.stream.off("close", onClose);
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
