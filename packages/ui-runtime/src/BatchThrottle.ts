import { makeAutoObservable, observable } from "mobx";
import {
  type BatchThrottleConfig,
  defaultBatchThrottleConfig,
  mergeThrottleConfig,
} from "./ThrottleConfig";
import { ThrottleWindow } from "./ThrottleWindow";

/**
 * Batching throttle for waveform capture: samples are buffered and appended
 * to `samples` in batches of `batchSize`, or whatever is buffered once the
 * interval elapsed. `samples` keeps only the last `maxSamples` entries and is
 * replaced (never mutated) on every flush.
 */
export class BatchThrottle<T = number> {
  samples: readonly T[] = [];

  private buffer: T[] = [];
  private readonly config: BatchThrottleConfig;
  private readonly window: ThrottleWindow;

  constructor(config?: Partial<BatchThrottleConfig>) {
    this.config = mergeThrottleConfig(defaultBatchThrottleConfig, config);
    this.window = new ThrottleWindow({ ...this.config, name: "BatchThrottle" });

    makeAutoObservable<BatchThrottle<T>, "buffer" | "config" | "window">(
      this,
      { samples: observable.ref, buffer: false, config: false, window: false },
      { autoBind: true },
    );
  }

  get bufferedCount(): number {
    return this.buffer.length;
  }

  append(sample: T): void {
    this.appendMany([sample]);
  }

  appendMany(items: readonly T[]): void {
    if (items.length === 0) return;
    this.buffer.push(...items);

    if (this.buffer.length >= this.config.batchSize || this.window.isOpen()) {
      this.window.cancelFlush();
      this.flush();
    } else {
      this.window.scheduleFlush(this.flush);
    }
  }

  flush(): void {
    if (this.buffer.length === 0) return;
    const merged = [...this.samples, ...this.buffer];
    this.samples =
      merged.length > this.config.maxSamples
        ? merged.slice(merged.length - this.config.maxSamples)
        : merged;
    this.buffer = [];
    this.window.markDelivered();
  }

  reset(): void {
    this.window.reset();
    this.buffer = [];
    this.samples = [];
  }

  dispose(): void {
    this.window.dispose();
    this.buffer = [];
  }
}
