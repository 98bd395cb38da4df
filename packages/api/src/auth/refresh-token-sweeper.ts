/**
 * Refresh Token Sweeper — periodically deletes expired refresh token records.
 *
 * Expired tokens already fail verification, so the records only keep the
 * revocation set from growing without bound.
 */

import type { RefreshTokenStore } from "../stores/types.js";

export interface RefreshTokenSweeperOptions {
  /** Sweep interval in milliseconds (default: 3600000 = 1h) */
  intervalMs?: number;
  /** Clock override (epoch ms) */
  now?: () => number;
  /** Called after each sweep that removed something */
  onSweep?: (deleted: number) => void;
  /** Called when a sweep fails; the timer keeps running */
  onError: (err: unknown) => void;
}

const DEFAULT_INTERVAL_MS = 3_600_000;

export class RefreshTokenSweeper {
  private store: RefreshTokenStore;
  private intervalMs: number;
  private now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private onSweep?: RefreshTokenSweeperOptions["onSweep"];
  private onError: RefreshTokenSweeperOptions["onError"];

  constructor(store: RefreshTokenStore, options: RefreshTokenSweeperOptions) {
    this.store = store;
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.onSweep = options.onSweep;
    this.onError = options.onError;
  }

  /** Start the sweep loop */
  start(): void {
    if (this.timer) return; // already running
    this.timer = setInterval(() => {
      void this.sweep();
    }, this.intervalMs);
    this.timer.unref();
  }

  /** Stop the sweep loop */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /** Delete expired records once; returns how many were removed */
  async sweep(): Promise<number> {
    try {
      const deleted = await this.store.deleteExpired(new Date(this.now()));
      if (deleted > 0) this.onSweep?.(deleted);
      return deleted;
    } catch (err) {
      this.onError(err);
      return 0;
    }
  }
}
