export interface Logger {
  /** Only printed when the owning component was created with `debug: true`. */
  debug(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Console logger with a `[Tag]` prefix.
 *
 * @example
 * ```typescript
 * const log = createLogger("TaskScope:screen:reader", true);
 * log.debug("Destroyed", { cancelled: 3 });
 * // [TaskScope:screen:reader] Destroyed { cancelled: 3 }
 * ```
 */
export function createLogger(tag: string, debug = false): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message, data) {
      if (debug) {
        console.log(`${prefix} ${message}`, data ?? "");
      }
    },
    warn(message, data) {
      console.warn(`${prefix} ${message}`, data ?? "");
    },
    error(message, data) {
      console.error(`${prefix} ${message}`, data ?? "");
    },
  };
}
