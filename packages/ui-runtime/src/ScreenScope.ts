import { RequestError } from "./errors";
import { createLogger, type Logger } from "./log";
import {
  RequestController,
  type RequestOperation,
  type RequestOptions,
} from "./RequestController";
import type { TaskHandle, TaskOperation } from "./TaskBag";
import { TaskScope } from "./TaskScope";

export interface ScreenScopeOptions {
  /** Registry the screen's requests are tagged in. */
  requests?: RequestController;
  debug?: boolean;
}

/**
 * Task and request lifetime of a whole screen.
 *
 * Holds a main TaskScope, named scopes for regions of the screen (side panel,
 * table of contents) and the requests it started under its id prefix. `destroy()` tears down all
 * three; after it, every submission is ignored and `scope(name)` hands out
 * destroyed scopes.
 *
 * @example
 * ```typescript
 * const screen = new ScreenScope("reader");
 * const answer = await screen.request("ask", (signal) => ai.ask(question, signal));
 * screen.scope("ai").run(async (signal) => { ... });
 * // on unmount
 * screen.destroy();
 * ```
 */
export class ScreenScope {
  readonly screenId: string;
  private readonly mainScope: TaskScope;
  private readonly namedScopes = new Map<string, TaskScope>();
  private readonly requestPrefix: string;
  /** Ids of requests this screen started that may still be running. */
  private readonly ownRequests = new Set<string>();
  private readonly requests: RequestController;
  private readonly debug: boolean;
  private readonly log: Logger;
  private destroyed = false;

  constructor(screenId: string, opts: ScreenScopeOptions = {}) {
    this.screenId = screenId;
    this.debug = opts.debug ?? false;
    this.requests = opts.requests ?? RequestController.shared;
    this.requestPrefix = `screen_${screenId}_`;
    this.mainScope = new TaskScope(`screen:${screenId}`, { debug: this.debug });
    this.log = createLogger(`ScreenScope:${screenId}`, this.debug);
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  run(operation: TaskOperation): TaskHandle | null {
    return this.mainScope.run(operation);
  }

  runThrowing(operation: TaskOperation): TaskHandle | null {
    return this.mainScope.runThrowing(operation);
  }

  runAfter(delayMs: number, operation: TaskOperation): TaskHandle | null {
    return this.mainScope.runAfter(delayMs, operation);
  }

  /** Get or create the scope for a region of this screen. */
  scope(name: string): TaskScope {
    const existing = this.namedScopes.get(name);
    if (existing) return existing;

    const created = new TaskScope(`${this.screenId}/${name}`, {
      debug: this.debug,
    });
    if (this.destroyed) {
      created.destroy();
      return created;
    }
    this.namedScopes.set(name, created);
    return created;
  }

  destroyScope(name: string): void {
    this.namedScopes.get(name)?.destroy();
    this.namedScopes.delete(name);
  }

  /** Request id carrying this screen's prefix. */
  requestId(name: string): string {
    return `${this.requestPrefix}${name}`;
  }

  /**
   * Run a request tagged with this screen's prefix. After `destroy()` the
   * request is rejected as cancelled without running.
   */
  request<T>(
    name: string,
    operation: RequestOperation<T>,
    opts?: RequestOptions,
  ): Promise<T> {
    const id = this.requestId(name);
    if (this.destroyed) {
      return Promise.reject(new RequestError("cancelled", id));
    }
    const pending = this.requests.request(id, operation, opts);
    this.ownRequests.add(id);
    return pending.finally(() => {
      // A newer request may have taken over the id
      if (!this.requests.isActive(id)) {
        this.ownRequests.delete(id);
      }
    });
  }

  /**
   * Cancel the requests started through this screen. Another screen's
   * requests are never touched, even when its prefix starts with ours.
   */
  cancelAllRequests(): void {
    const ids = [...this.ownRequests];
    this.ownRequests.clear();
    for (const id of ids) {
      this.requests.cancel(id);
    }
    if (ids.length > 0) {
      this.log.debug(`Cancelled ${ids.length} requests`);
    }
  }

  /** Cancel all tasks and requests; the screen stays usable. */
  cancelAll(): void {
    this.mainScope.cancelAll();
    for (const scope of this.namedScopes.values()) {
      scope.cancelAll();
    }
    this.cancelAllRequests();
  }

  destroy(): void {
    if (this.destroyed) return;
    // Set first: nothing below may register a new scope or task
    this.destroyed = true;

    this.mainScope.destroy();
    for (const scope of this.namedScopes.values()) {
      scope.destroy();
    }
    this.namedScopes.clear();
    this.cancelAllRequests();

    this.log.debug("Destroyed");
  }
}
