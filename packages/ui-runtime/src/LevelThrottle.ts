import { makeAutoObservable } from "mobx";
import {
  type LevelThrottleConfig,
  defaultLevelThrottleConfig,
  mergeThrottleConfig,
} from "./ThrottleConfig";
import { ThrottleWindow } from "./ThrottleWindow";

/**
 * Throttle for audio level meters. Levels arrive every few milliseconds;
 * `displayLevel` only moves when the change is visible (`changeThreshold`)
 * and at most once per interval.
 */
export class LevelThrottle {
  displayLevel = 0;

  private pendingLevel: number | null = null;
  private readonly config: LevelThrottleConfig;
  private readonly window: ThrottleWindow;

  constructor(config?: Partial<LevelThrottleConfig>) {
    this.config = mergeThrottleConfig(defaultLevelThrottleConfig, config);
    this.window = new ThrottleWindow({ ...this.config, name: "LevelThrottle" });

    makeAutoObservable<LevelThrottle, "pendingLevel" | "config" | "window">(
      this,
      { pendingLevel: false, config: false, window: false },
      { autoBind: true },
    );
  }

  update(level: number): void {
    if (!Number.isFinite(level)) return;
    if (Math.abs(level - this.displayLevel) < this.config.changeThreshold) {
      return;
    }

    if (this.window.isOpen()) {
      this.window.cancelFlush();
      this.pendingLevel = null;
      this.apply(level);
    } else {
      this.pendingLevel = level;
      this.window.scheduleFlush(this.flushPending);
    }
  }

  reset(): void {
    this.window.reset();
    this.pendingLevel = null;
    this.displayLevel = 0;
  }

  dispose(): void {
    this.window.dispose();
    this.pendingLevel = null;
  }

  private flushPending(): void {
    if (this.pendingLevel === null) return;
    const level = this.pendingLevel;
    this.pendingLevel = null;
    this.apply(level);
  }

  private apply(level: number): void {
    this.displayLevel = level;
    this.window.markDelivered();
  }
}
