import { makeAutoObservable, observable } from "mobx";
import { createLogger, type Logger } from "./log";
import {
  type ThrottleConfig,
  defaultThrottleConfig,
  mergeThrottleConfig,
} from "./ThrottleConfig";
import { ThrottleWindow } from "./ThrottleWindow";

let nextThrottleId = 0;

/**
 * "Latest value, rate limited" state for the view layer.
 *
 * Producers call `update()` as often as they like; `value` (a MobX
 * observable) changes at most once per `intervalMs`. Intermediate values are
 * dropped but the last one always arrives, at the latest `intervalMs` after
 * it was submitted.
 *
 * - Window open: the update is delivered synchronously
 * - Window closed: the update becomes the pending value and one flush is
 *   scheduled for when the window reopens. Later updates only replace the
 *   pending value; the flush reads it when it fires
 * - `forceUpdate()` skips the window for transitions that must show at once
 *   (an explicit jump, as opposed to a continuous drag)
 *
 * @example
 * ```typescript
 * const progress = new CoalescingThrottle(0, { intervalMs: 100 });
 * reaction(() => progress.value, (v) => renderProgress(v));
 * onScroll((fraction) => progress.update(fraction));
 * ```
 */
export class CoalescingThrottle<T> {
  value: T;
  /** Values that reached `value`. */
  deliveredCount = 0;
  /** Pending values that were replaced or dropped before delivery. */
  coalescedCount = 0;

  private pending: { value: T } | null = null;
  private readonly initial: T;
  private readonly config: ThrottleConfig<T>;
  private readonly window: ThrottleWindow;
  private readonly log: Logger;

  constructor(initial: T, config?: Partial<ThrottleConfig<T>>) {
    this.initial = initial;
    this.value = initial;
    this.config = mergeThrottleConfig<ThrottleConfig<T>>(
      defaultThrottleConfig,
      config,
    );
    const name = `CoalescingThrottle#${++nextThrottleId}`;
    this.log = createLogger(name, this.config.debug);
    this.window = new ThrottleWindow({ ...this.config, name });

    makeAutoObservable<
      CoalescingThrottle<T>,
      "pending" | "initial" | "config" | "window" | "log"
    >(
      this,
      {
        value: observable.ref,
        pending: false,
        initial: false,
        config: false,
        window: false,
        log: false,
      },
      { autoBind: true },
    );
  }

  get hasPendingValue(): boolean {
    return this.pending !== null;
  }

  update(next: T): void {
    const equals = this.config.equals ?? Object.is;
    if (this.config.removeDuplicates && equals(next, this.value)) {
      // The visible value is already the latest request
      this.dropPending();
      return;
    }

    if (this.window.isOpen()) {
      this.window.cancelFlush();
      this.dropPending();
      this.deliver(next);
      return;
    }

    if (this.pending) {
      this.coalescedCount++;
    }
    this.pending = { value: next };
    this.window.scheduleFlush(this.flushPending);
  }

  forceUpdate(next: T): void {
    this.window.cancelFlush();
    this.dropPending();
    this.deliver(next);
  }

  reset(): void {
    this.window.reset();
    this.pending = null;
    this.value = this.initial;
    this.deliveredCount = 0;
    this.coalescedCount = 0;
  }

  /** Stop the scheduled flush without delivering the pending value. */
  dispose(): void {
    this.window.dispose();
    this.pending = null;
  }

  private flushPending(): void {
    if (!this.pending) return;
    const { value } = this.pending;
    this.pending = null;
    this.deliver(value);
  }

  private dropPending(): void {
    if (this.pending) {
      this.pending = null;
      this.coalescedCount++;
    }
  }

  private deliver(next: T): void {
    this.value = next;
    this.deliveredCount++;
    this.window.markDelivered();
    this.log.debug("Delivered", { coalesced: this.coalescedCount });
  }
}
