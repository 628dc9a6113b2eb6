import type { TaskScope } from "./TaskScope";
import type { Clock } from "./timing";

/**
 * Options shared by every throttle.
 */
export interface ThrottleBaseConfig {
  /**
   * Minimum time between two deliveries to the view layer, in milliseconds.
   */
  intervalMs: number;

  /**
   * Scope the delayed flush runs in. When the scope is destroyed the throttle
   * stops flushing. Without one the throttle owns a private scope that
   * `dispose()` destroys.
   */
  scope?: TaskScope;

  /**
   * Monotonic clock in milliseconds.
   *
   * @default performance.now
   */
  now?: Clock;

  /**
   * Log deliveries and coalesced updates to the console.
   *
   * @default false
   */
  debug?: boolean;
}

/**
 * Configuration for CoalescingThrottle.
 */
export interface ThrottleConfig<T> extends ThrottleBaseConfig {
  /**
   * Ignore updates equal to the delivered value.
   *
   * @default true
   */
  removeDuplicates: boolean;

  /**
   * Equality used by `removeDuplicates`.
   *
   * @default Object.is
   */
  equals?: (a: T, b: T) => boolean;
}

/**
 * Configuration for StreamingTextThrottle.
 */
export interface StreamingTextConfig extends ThrottleBaseConfig {
  /**
   * A chunk containing any of these characters is flushed right away, so
   * streamed answers appear sentence by sentence.
   *
   * @default "。，、！？；：.,!?;:\n"
   */
  boundaryChars: string;
}

/**
 * Configuration for LevelThrottle.
 */
export interface LevelThrottleConfig extends ThrottleBaseConfig {
  /**
   * Updates closer than this to the displayed level are ignored.
   *
   * @default 0.05
   */
  changeThreshold: number;
}

/**
 * Configuration for BatchThrottle.
 */
export interface BatchThrottleConfig extends ThrottleBaseConfig {
  /**
   * Flush as soon as this many items are buffered.
   *
   * @default 3
   */
  batchSize: number;

  /**
   * Keep only the most recent samples.
   *
   * @default 300
   */
  maxSamples: number;
}

export const defaultThrottleConfig: ThrottleConfig<unknown> = {
  intervalMs: 100,
  removeDuplicates: true,
};

export const defaultStreamingTextConfig: StreamingTextConfig = {
  intervalMs: 80,
  boundaryChars: "。，、！？；：.,!?;:\n",
};

export const defaultLevelThrottleConfig: LevelThrottleConfig = {
  intervalMs: 100,
  changeThreshold: 0.05,
};

export const defaultBatchThrottleConfig: BatchThrottleConfig = {
  intervalMs: 150,
  batchSize: 3,
  maxSamples: 300,
};

/**
 * Page turns settle faster than generic state.
 */
export const defaultPageThrottleConfig: ThrottleBaseConfig = {
  intervalMs: 120,
};

/**
 * Merge user configuration with defaults.
 *
 * @param defaults - One of the `default…Config` objects above
 * @param userConfig - Partial configuration to override defaults
 * @returns Complete configuration with defaults filled in
 */
export function mergeThrottleConfig<C extends ThrottleBaseConfig>(
  defaults: C,
  userConfig?: Partial<C>,
): C {
  return {
    ...defaults,
    ...userConfig,
  };
}
