/**
 * External waiter contract plus a minimal promise-based implementation.
 * HttpIO never runs a loop of its own; it only exposes a WakeSignal and
 * reports connectivity to whoever registered.
 */
import type { WakeSignal } from "./session.js";

export interface Waiter {
  addWakeSource(signal: WakeSignal, flags: number): void;
  notifyConnectivity(reachable: boolean): void;
}

/** Interest flag for HTTP activity */
export const WAIT_HTTP = 1;

interface WakeSource {
  signal: WakeSignal;
  flags: number;
}

/**
 * Sleeps until any registered source is signalled or a timeout expires.
 */
export class WakeWaiter implements Waiter {
  private sources: WakeSource[] = [];
  private wakeup: (() => void) | null = null;
  private _reachable: boolean | null = null;

  /** Last connectivity report, null before the first one */
  get reachable(): boolean | null {
    return this._reachable;
  }

  addWakeSource(signal: WakeSignal, flags: number): void {
    this.sources.push({ signal, flags });
    signal.register({ wake: () => this.wakeup?.() }, flags);
  }

  notifyConnectivity(reachable: boolean): void {
    this._reachable = reachable;
  }

  /**
   * Resolve with the OR of the flags of every signalled source (consuming
   * them), or 0 if `timeoutMs` passes first.
   */
  async wait(timeoutMs: number): Promise<number> {
    const ready = this.collect();
    if (ready) return ready;

    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      await new Promise<void>(resolve => {
        this.wakeup = resolve;
        timer = setTimeout(resolve, timeoutMs);
      });
    } finally {
      clearTimeout(timer);
      this.wakeup = null;
    }
    return this.collect();
  }

  private collect(): number {
    let flags = 0;
    for (const source of this.sources) {
      if (source.signal.consume()) flags |= source.flags;
    }
    return flags;
  }
}
