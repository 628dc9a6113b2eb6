import { makeAutoObservable, runInAction } from "mobx";
import { createLogger, type Logger } from "./log";
import type { TaskHandle } from "./TaskBag";
import { TaskScope } from "./TaskScope";
import { type Clock, monotonicNow } from "./timing";

export type PaginationAction = (signal: AbortSignal) => Promise<void> | void;

export interface PaginationControllerOptions {
  /**
   * Debounce delay for `loadMore` in milliseconds.
   * @default 300
   */
  debounceMs?: number;
  /** Scope the debounce timers and actions run in. */
  scope?: TaskScope;
  now?: Clock;
  debug?: boolean;
}

const DEFAULT_DEBOUNCE_MS = 300;

/**
 * Debounced, deduplicated "load more" dispatcher.
 *
 * - `loadMore` collapses a burst of triggers into one delayed action; the last
 *   call wins
 * - At most one action per request id runs at any time. The check happens
 *   when the trigger arrives and again when the debounce fires, since a
 *   same-id action may have started during the wait
 * - `loadImmediately` skips the debounce for explicit refreshes
 *
 * Each execution takes a token from a generation counter. A completion only
 * clears bookkeeping if the controller has not been reset since the action
 * started, so a stale action cannot overwrite newer state.
 */
export class PaginationController {
  isLoading = false;
  executingRequestId: string | null = null;
  lastRequestAt: number | null = null;

  private pending: TaskHandle | null = null;
  private inFlight = new Map<string, number>();
  private generation = 0;
  private nextToken = 0;
  private readonly debounceMs: number;
  private readonly scope: TaskScope;
  private readonly ownsScope: boolean;
  private readonly now: Clock;
  private readonly log: Logger;

  constructor(opts: PaginationControllerOptions = {}) {
    this.debounceMs = opts.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.ownsScope = opts.scope === undefined;
    this.scope = opts.scope ?? new TaskScope("pagination", { debug: opts.debug });
    this.now = opts.now ?? monotonicNow;
    this.log = createLogger("PaginationController", opts.debug);

    makeAutoObservable<
      PaginationController,
      | "pending"
      | "inFlight"
      | "generation"
      | "nextToken"
      | "debounceMs"
      | "scope"
      | "ownsScope"
      | "now"
      | "log"
    >(
      this,
      {
        pending: false,
        inFlight: false,
        generation: false,
        nextToken: false,
        debounceMs: false,
        scope: false,
        ownsScope: false,
        now: false,
        log: false,
      },
      { autoBind: true },
    );
  }

  /** Whether a debounced trigger is waiting to fire. */
  get hasPendingRequest(): boolean {
    return this.pending !== null && !this.pending.isCancelled;
  }

  isExecuting(requestId: string): boolean {
    return this.inFlight.has(requestId);
  }

  loadMore(
    requestId: string,
    action: PaginationAction,
    opts: { delayMs?: number } = {},
  ): TaskHandle | null {
    if (this.isExecuting(requestId)) {
      this.log.debug(`Skipping ${requestId}: already loading`);
      return null;
    }

    if (this.scope.isDestroyed) return null;

    this.pending?.cancel();
    const handle: TaskHandle | null = this.scope.runAfter(
      opts.delayMs ?? this.debounceMs,
      async (signal) => {
        runInAction(() => {
          if (this.pending === handle) this.pending = null;
        });
        if (this.isExecuting(requestId)) return;
        await this.execute(requestId, action, signal);
      },
    );
    this.pending = handle;
    return handle;
  }

  loadImmediately(requestId: string, action: PaginationAction): TaskHandle | null {
    if (this.isExecuting(requestId)) {
      this.log.debug(`Skipping ${requestId}: already loading`);
      return null;
    }
    if (this.scope.isDestroyed) return null;

    this.cancel();
    // Claim the id in this turn so a trigger arriving before the task starts
    // is already deduplicated
    const token = this.begin(requestId);
    const handle = this.scope.run(action);
    if (!handle) {
      this.end(token, requestId);
      return null;
    }
    void handle.outcome.then(() => this.end(token, requestId));
    return handle;
  }

  /** Drop the waiting trigger. An action that already started keeps running. */
  cancel(): void {
    this.pending?.cancel();
    this.pending = null;
  }

  reset(): void {
    this.cancel();
    this.generation++;
    this.inFlight.clear();
    this.isLoading = false;
    this.executingRequestId = null;
    this.lastRequestAt = null;
  }

  /** Cancel everything, running actions included. */
  dispose(): void {
    this.reset();
    if (this.ownsScope) {
      this.scope.destroy();
    }
  }

  private async execute(
    requestId: string,
    action: PaginationAction,
    signal: AbortSignal,
  ): Promise<void> {
    const token = this.begin(requestId);
    try {
      await action(signal);
    } finally {
      runInAction(() => this.end(token, requestId));
    }
  }

  private begin(requestId: string): { id: number; generation: number } {
    const token = { id: ++this.nextToken, generation: this.generation };
    this.inFlight.set(requestId, token.id);
    this.executingRequestId = requestId;
    this.isLoading = true;
    this.lastRequestAt = this.now();
    this.log.debug(`Loading ${requestId}`);
    return token;
  }

  private end(token: { id: number; generation: number }, requestId: string): void {
    if (token.generation !== this.generation) return;
    if (this.inFlight.get(requestId) === token.id) {
      this.inFlight.delete(requestId);
    }
    if (this.inFlight.size === 0) {
      this.isLoading = false;
      this.executingRequestId = null;
    } else if (this.executingRequestId === requestId) {
      this.executingRequestId = [...this.inFlight.keys()].at(-1) ?? null;
    }
  }
}
