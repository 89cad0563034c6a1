/**
 * Session-scoped concurrency guard and wake signal.
 *
 * Transport notifications may interleave at every await inside the
 * dispatcher, so any code that reads or mutates a RequestContext runs
 * under the SessionLock. The WakeSignal lets an external loop learn that
 * dispatcher activity happened without busy-polling request status.
 */
import { EventEmitter } from "node:events";

/**
 * FIFO async mutex. Ownership passes directly from release() to the
 * oldest waiter, so no acquirer can barge ahead of a queued one.
 */
export class SessionLock {
  private held = false;
  private waiters: Array<() => void> = [];

  get locked(): boolean {
    return this.held;
  }

  /** Number of acquirers queued behind the current holder */
  get queued(): number {
    return this.waiters.length;
  }

  acquire(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.waiters.push(resolve);
    });
  }

  tryAcquire(): boolean {
    if (this.held) return false;
    this.held = true;
    return true;
  }

  release(): void {
    if (!this.held) {
      throw new Error("SessionLock released while not held");
    }
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.held = false;
    }
  }
}

export interface Waker {
  wake(flags: number): void;
}

/**
 * Level-triggered wake indicator. Stays set until consumed.
 */
export class WakeSignal {
  private set = false;
  private readonly emitter = new EventEmitter();

  get isSet(): boolean {
    return this.set;
  }

  signal(): void {
    this.set = true;
    this.emitter.emit("wake");
  }

  /** Read and clear the indicator */
  consume(): boolean {
    const was = this.set;
    this.set = false;
    return was;
  }

  /** Attach a waker; it is called with `flags` on every signal(). */
  register(waker: Waker, flags: number): () => void {
    const listener = () => waker.wake(flags);
    this.emitter.on("wake", listener);
    return () => {
      this.emitter.off("wake", listener);
    };
  }
}
