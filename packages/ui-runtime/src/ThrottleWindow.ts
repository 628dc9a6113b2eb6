import type { TaskHandle } from "./TaskBag";
import { TaskScope } from "./TaskScope";
import { type Clock, monotonicNow } from "./timing";

/**
 * Time-window bookkeeping shared by the throttles: when the last delivery
 * happened and the single delayed flush that may be outstanding.
 *
 * The flush callback is passed at schedule time but must read the throttle's
 * pending state when it fires, not capture it.
 */
export class ThrottleWindow {
  readonly intervalMs: number;
  private lastDeliveredAt = Number.NEGATIVE_INFINITY;
  private scheduled: TaskHandle | null = null;
  private readonly scope: TaskScope;
  private readonly ownsScope: boolean;
  private readonly now: Clock;

  constructor(opts: {
    intervalMs: number;
    scope?: TaskScope;
    now?: Clock;
    name: string;
  }) {
    this.intervalMs = Math.max(0, opts.intervalMs);
    this.now = opts.now ?? monotonicNow;
    this.ownsScope = opts.scope === undefined;
    this.scope = opts.scope ?? new TaskScope(`throttle:${opts.name}`);
  }

  /** Milliseconds left before the next delivery may go out; 0 when open. */
  remaining(): number {
    return Math.max(0, this.intervalMs - (this.now() - this.lastDeliveredAt));
  }

  isOpen(): boolean {
    return this.now() - this.lastDeliveredAt >= this.intervalMs;
  }

  markDelivered(): void {
    this.lastDeliveredAt = this.now();
  }

  get hasScheduledFlush(): boolean {
    return this.scheduled !== null && !this.scheduled.isCancelled;
  }

  /**
   * Schedule `flush` once the window reopens. A flush that is already
   * scheduled is kept; nothing new is started.
   */
  scheduleFlush(flush: () => void): void {
    if (this.hasScheduledFlush) return;
    const handle: TaskHandle | null = this.scope.runAfter(this.remaining(), () => {
      if (this.scheduled === handle) {
        this.scheduled = null;
      }
      flush();
    });
    this.scheduled = handle;
  }

  cancelFlush(): void {
    this.scheduled?.cancel();
    this.scheduled = null;
  }

  reset(): void {
    this.cancelFlush();
    this.lastDeliveredAt = Number.NEGATIVE_INFINITY;
  }

  dispose(): void {
    this.cancelFlush();
    if (this.ownsScope) {
      this.scope.destroy();
    }
  }
}
