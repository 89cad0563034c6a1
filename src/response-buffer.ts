/**
 * Append-only response sink with reserve/commit semantics.
 *
 * Two modes:
 *   growable: capacity doubles on demand (JSON and other API replies)
 *   pre-sized: caller-supplied destination (raw downloads); reserve() clips
 *     to the remaining capacity and never reallocates
 */

/**
 * Write cursor over a fixed region of a ResponseBuffer.
 * Handed to a decoder so output lands in place; revoked when the
 * exchange ends or the buffer is reset.
 */
export class BufferLease {
  private offset = 0;
  private _revoked = false;

  constructor(private readonly region: Uint8Array) {}

  get capacity(): number {
    return this.region.length;
  }

  get written(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.region.length - this.offset;
  }

  get revoked(): boolean {
    return this._revoked;
  }

  /** Append bytes at the cursor. Returns false on overflow or after revocation. */
  write(bytes: Uint8Array): boolean {
    if (this._revoked || bytes.length > this.remaining) return false;
    this.region.set(bytes, this.offset);
    this.offset += bytes.length;
    return true;
  }

  revoke(): void {
    this._revoked = true;
  }
}

export class ResponseBuffer {
  private data: Uint8Array;
  private length = 0;
  private reserved = 0;
  private activeLease: BufferLease | null = null;
  private readonly fixed: boolean;

  constructor(destination?: Uint8Array) {
    this.fixed = destination !== undefined;
    this.data = destination ?? new Uint8Array(0);
  }

  /** True when the caller supplied the destination up front */
  get isPresized(): boolean {
    return this.fixed;
  }

  /** Committed byte count */
  get size(): number {
    return this.length;
  }

  get capacity(): number {
    return this.data.length;
  }

  /**
   * Obtain a writable region of at most `size` bytes after the committed data.
   * Pre-sized buffers may return fewer bytes (down to zero) than requested.
   */
  reserve(size: number): Uint8Array {
    if (size < 0) throw new RangeError(`Invalid reserve size: ${size}`);
    if (this.fixed) {
      const end = Math.min(this.length + size, this.data.length);
      this.reserved = end - this.length;
      return this.data.subarray(this.length, end);
    }
    this.ensureCapacity(this.length + size);
    this.reserved = size;
    return this.data.subarray(this.length, this.length + size);
  }

  /** Append `actual` bytes of the last reservation. */
  commit(actual: number): void {
    const n = Math.max(0, Math.min(actual, this.reserved));
    this.length += n;
    this.reserved = 0;
  }

  /**
   * Resize the contents to exactly `size` bytes and lease the whole region.
   * Revokes any previous lease.
   */
  lease(size: number): BufferLease {
    if (size < 0) throw new RangeError(`Invalid lease size: ${size}`);
    if (this.fixed && size > this.data.length) {
      throw new RangeError(`Lease of ${size} bytes exceeds destination of ${this.data.length}`);
    }
    this.activeLease?.revoke();
    if (!this.fixed) {
      this.data = new Uint8Array(size);
    }
    this.length = size;
    this.reserved = 0;
    this.activeLease = new BufferLease(this.data.subarray(0, size));
    return this.activeLease;
  }

  /** Drop committed data (and any lease) ahead of a fresh exchange. */
  clear(): void {
    this.activeLease?.revoke();
    this.activeLease = null;
    this.length = 0;
    this.reserved = 0;
    if (!this.fixed) {
      this.data = new Uint8Array(0);
    }
  }

  /** View of the committed bytes (no copy). */
  bytes(): Uint8Array {
    return this.data.subarray(0, this.length);
  }

  toString(): string {
    return new TextDecoder().decode(this.bytes());
  }

  private ensureCapacity(required: number): void {
    if (required <= this.data.length) return;
    let next = Math.max(this.data.length * 2, 4096);
    while (next < required) next *= 2;
    const grown = new Uint8Array(next);
    grown.set(this.data.subarray(0, this.length));
    this.data = grown;
  }
}
