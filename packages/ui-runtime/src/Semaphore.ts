import { createLogger, type Logger } from "./log";

interface Waiter {
  grant: (acquired: boolean) => void;
  settled: boolean;
}

export interface SemaphoreWaitOptions {
  /** Give up after this many milliseconds. */
  timeoutMs?: number;
  /** Give up when this signal aborts. */
  signal?: AbortSignal;
}

/**
 * Counting semaphore with a FIFO waiter queue.
 *
 * `signal()` hands its permit straight to the oldest waiter instead of
 * incrementing the counter, so a waiter that was woken can never lose its
 * permit to a `tryWait()` that runs before it resumes.
 *
 * A waiter that gives up (timeout or abort) is removed from the queue in the
 * same turn, so it never consumes a permit after reporting `false`.
 *
 * @example
 * ```typescript
 * const renders = new Semaphore(2);
 * await renders.withPermit(() => renderPage(5));
 * ```
 */
export class Semaphore {
  private permits: number;
  private waiters: Waiter[] = [];
  private readonly log: Logger;

  constructor(permits: number, opts: { name?: string; debug?: boolean } = {}) {
    if (!Number.isInteger(permits) || permits < 0) {
      throw new RangeError(
        `Semaphore permits must be a non-negative integer, got ${permits}`,
      );
    }
    this.permits = permits;
    this.log = createLogger(`Semaphore:${opts.name ?? "anonymous"}`, opts.debug);
  }

  get availablePermits(): number {
    return this.permits;
  }

  get waitingCount(): number {
    return this.waiters.length;
  }

  /** Suspend until a permit is available. */
  wait(): Promise<void>;
  /** Resolves `false` if no permit arrived within `timeoutMs`. */
  wait(timeoutMs: number): Promise<boolean>;
  /** Resolves `false` on timeout or when the signal aborts. */
  wait(options: SemaphoreWaitOptions): Promise<boolean>;
  wait(arg?: number | SemaphoreWaitOptions): Promise<void | boolean> {
    if (arg === undefined) {
      return this.acquire({}).then(() => undefined);
    }
    return this.acquire(typeof arg === "number" ? { timeoutMs: arg } : arg);
  }

  tryWait(): boolean {
    if (this.permits > 0) {
      this.permits--;
      return true;
    }
    return false;
  }

  signal(): void {
    while (this.waiters.length > 0) {
      const waiter = this.waiters.shift();
      if (!waiter || waiter.settled) continue;
      waiter.grant(true);
      this.log.debug(`Handed permit to waiter (${this.waiters.length} left)`);
      return;
    }
    this.permits++;
  }

  /**
   * Run `operation` while holding a permit. The permit is released whether
   * the operation resolves or throws.
   */
  async withPermit<T>(operation: () => Promise<T> | T): Promise<T> {
    await this.wait();
    try {
      return await operation();
    } finally {
      this.signal();
    }
  }

  private acquire({ timeoutMs, signal }: SemaphoreWaitOptions): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.resolve(false);
    }
    if (this.tryWait()) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | null = null;

      const giveUp = (reason: string) => {
        if (waiter.settled) return;
        this.waiters = this.waiters.filter((w) => w !== waiter);
        waiter.grant(false);
        this.log.debug(`Waiter gave up (${reason})`);
      };
      const onAbort = () => giveUp("aborted");

      const waiter: Waiter = {
        settled: false,
        grant: (acquired) => {
          waiter.settled = true;
          if (timer !== null) clearTimeout(timer);
          signal?.removeEventListener("abort", onAbort);
          resolve(acquired);
        },
      };

      this.waiters.push(waiter);
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => giveUp("timeout"), Math.max(0, timeoutMs));
      }
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
