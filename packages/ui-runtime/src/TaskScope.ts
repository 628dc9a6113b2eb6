import { createLogger, type Logger } from "./log";
import { TaskBag, type TaskHandle, type TaskOperation } from "./TaskBag";

export interface TaskScopeOptions {
  /** Log task submission after destroy and scope teardown. */
  debug?: boolean;
}

let nextScopeId = 0;

/**
 * A cancellable bag of tasks bound to the lifetime of a screen or a region of
 * a screen.
 *
 * LIFECYCLE:
 * - Active: `run`, `runThrowing`, `runAfter` and `cancelAll` keep the scope usable
 * - Destroyed: terminal. Every submission returns `null` and does nothing
 *
 * Child scopes form a strict tree owned by their parent. Cancelling or
 * destroying a parent reaches every descendant; a child never affects its
 * parent or siblings.
 *
 * @example
 * ```typescript
 * const scope = new TaskScope("reader");
 * const toc = scope.createChildScope("toc");
 * toc.run(async (signal) => {
 *   const outline = await loadOutline(signal);
 *   if (!signal.aborted) store.setOutline(outline);
 * });
 * // on unmount
 * scope.destroy();
 * ```
 */
export class TaskScope {
  readonly id: string;
  private readonly bag: TaskBag;
  private readonly children = new Map<string, TaskScope>();
  private readonly log: Logger;
  private readonly debug: boolean;
  private destroyed = false;

  constructor(id?: string, opts: TaskScopeOptions = {}) {
    this.id = id ?? `scope-${++nextScopeId}`;
    this.debug = opts.debug ?? false;
    this.log = createLogger(`TaskScope:${this.id}`, this.debug);
    this.bag = new TaskBag(this.log);
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /** Tasks owned directly by this scope, children excluded. */
  get activeTaskCount(): number {
    return this.bag.count;
  }

  run(operation: TaskOperation): TaskHandle | null {
    if (this.rejectWhenDestroyed()) return null;
    return this.bag.spawn("plain", operation);
  }

  /**
   * Like `run`, but a failure is only reported through the handle's
   * `outcome`; the scope does not log it.
   */
  runThrowing(operation: TaskOperation): TaskHandle | null {
    if (this.rejectWhenDestroyed()) return null;
    return this.bag.spawn("throwing", operation);
  }

  /**
   * Run `operation` after `delayMs`. If the task is cancelled during the
   * delay the operation never executes.
   */
  runAfter(delayMs: number, operation: TaskOperation): TaskHandle | null {
    if (this.rejectWhenDestroyed()) return null;
    return this.bag.spawn("plain", operation, delayMs);
  }

  /**
   * Create a child scope with id `<parent>/<name>`. An existing child with the
   * same name is destroyed and replaced. On a destroyed scope the returned
   * child is already destroyed and not registered.
   */
  createChildScope(name: string): TaskScope {
    const child = new TaskScope(`${this.id}/${name}`, { debug: this.debug });
    if (this.destroyed) {
      child.destroy();
      return child;
    }
    this.children.get(name)?.destroy();
    this.children.set(name, child);
    return child;
  }

  childScope(name: string): TaskScope | undefined {
    return this.children.get(name);
  }

  destroyChildScope(name: string): void {
    const child = this.children.get(name);
    if (!child) return;
    child.destroy();
    this.children.delete(name);
  }

  /** Cancel every task here and in all descendants. The scope stays usable. */
  cancelAll(): void {
    const cancelled = this.bag.cancelAll();
    if (cancelled > 0) {
      this.log.debug(`Cancelled ${cancelled} tasks`);
    }
    for (const child of this.children.values()) {
      child.cancelAll();
    }
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;

    const cancelled = this.bag.cancelAll();
    for (const child of this.children.values()) {
      child.destroy();
    }
    this.children.clear();

    this.log.debug(`Destroyed, cancelled ${cancelled} tasks`);
  }

  private rejectWhenDestroyed(): boolean {
    if (this.destroyed) {
      this.log.debug("Destroyed, ignoring new task");
      return true;
    }
    return false;
  }
}
