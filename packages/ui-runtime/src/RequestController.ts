import { RequestError, isCancellation } from "./errors";
import { createLogger, type Logger } from "./log";

/**
 * Conventional id prefixes, so whole feature areas can be cancelled with
 * `cancelAll(prefix)`.
 */
export const RequestPrefix = {
  auth: "auth_",
  textbook: "textbook_",
  ai: "ai_",
  practice: "practice_",
  notes: "notes_",
  download: "download_",
} as const;

/**
 * Default request timeout (milliseconds)
 */
const DEFAULT_TIMEOUT_MS = 30_000;

export type RequestOperation<T> = (signal: AbortSignal) => Promise<T>;

export interface RequestOptions {
  /** @default 30000 */
  timeoutMs?: number;
  /**
   * Essential requests survive `cancelNonEssential()` (memory pressure).
   * @default false
   */
  essential?: boolean;
}

export interface RequestStats {
  total: number;
  failed: number;
  cancelled: number;
}

interface ActiveRequest {
  controller: AbortController;
  essential: boolean;
}

/**
 * Registry of in-flight network requests keyed by id.
 *
 * - Starting a request cancels an older one with the same id
 * - Each request races its operation against a timeout
 * - Requests can be cancelled one by one, by id prefix, or all at once
 *
 * The operation receives an AbortSignal that aborts on cancel and timeout.
 * The returned promise rejects right away in both cases even if the operation
 * ignores the signal.
 */
export class RequestController {
  static readonly shared = new RequestController();

  private active = new Map<string, ActiveRequest>();
  private counters: RequestStats = { total: 0, failed: 0, cancelled: 0 };
  private readonly log: Logger;

  constructor(opts: { debug?: boolean } = {}) {
    this.log = createLogger("RequestController", opts.debug);
  }

  request<T>(
    id: string,
    operation: RequestOperation<T>,
    opts: RequestOptions = {},
  ): Promise<T> {
    return this.start(id, operation, opts.timeoutMs ?? DEFAULT_TIMEOUT_MS, opts);
  }

  /** For long operations such as downloads. */
  requestNoTimeout<T>(
    id: string,
    operation: RequestOperation<T>,
    opts: Omit<RequestOptions, "timeoutMs"> = {},
  ): Promise<T> {
    return this.start(id, operation, null, opts);
  }

  cancel(id: string): void {
    const entry = this.active.get(id);
    if (!entry) return;
    this.active.delete(id);
    entry.controller.abort(new RequestError("cancelled", id));
  }

  /** Cancel every request, or only those whose id starts with `prefix`. */
  cancelAll(prefix?: string): void {
    const ids = [...this.active.keys()].filter(
      (id) => prefix === undefined || id.startsWith(prefix),
    );
    for (const id of ids) {
      this.cancel(id);
    }
    if (ids.length > 0) {
      this.log.debug(`Cancelled ${ids.length} requests`, { prefix });
    }
  }

  cancelNonEssential(): void {
    for (const [id, entry] of [...this.active]) {
      if (!entry.essential) this.cancel(id);
    }
  }

  isActive(id: string): boolean {
    return this.active.has(id);
  }

  get activeCount(): number {
    return this.active.size;
  }

  get activeRequestIds(): string[] {
    return [...this.active.keys()];
  }

  get stats(): RequestStats {
    return { ...this.counters };
  }

  resetStats(): void {
    this.counters = { total: 0, failed: 0, cancelled: 0 };
  }

  private async start<T>(
    id: string,
    operation: RequestOperation<T>,
    timeoutMs: number | null,
    opts: RequestOptions,
  ): Promise<T> {
    this.cancel(id);
    this.counters.total++;

    const controller = new AbortController();
    const entry: ActiveRequest = {
      controller,
      essential: opts.essential ?? false,
    };
    this.active.set(id, entry);

    const timer =
      timeoutMs === null
        ? null
        : setTimeout(() => {
            controller.abort(new RequestError("timeout", id));
          }, timeoutMs);
    const interrupted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => reject(controller.signal.reason),
        { once: true },
      );
    });

    try {
      return await Promise.race([operation(controller.signal), interrupted]);
    } catch (error) {
      throw this.classifyFailure(id, controller.signal, error);
    } finally {
      if (timer !== null) clearTimeout(timer);
      // A newer request may have taken over the id
      if (this.active.get(id) === entry) {
        this.active.delete(id);
      }
    }
  }

  private classifyFailure(
    id: string,
    signal: AbortSignal,
    error: unknown,
  ): unknown {
    const reason: unknown = signal.aborted ? signal.reason : error;
    if (reason instanceof RequestError && reason.kind === "timeout") {
      this.counters.failed++;
      this.log.warn(`Request ${id} timed out`);
      return reason;
    }
    if (isCancellation(reason)) {
      this.counters.cancelled++;
      return reason instanceof RequestError ? reason : new RequestError("cancelled", id);
    }
    this.counters.failed++;
    return error;
  }
}
