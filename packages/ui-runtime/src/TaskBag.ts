import { CancellationError, isCancellation } from "./errors";
import type { Logger } from "./log";
import { sleep } from "./timing";

export type TaskKind = "plain" | "throwing";

export type TaskOutcome =
  | { status: "completed" }
  | { status: "cancelled" }
  | { status: "failed"; error: unknown };

/**
 * Unit of work submitted to a TaskScope. The signal aborts when the task is
 * cancelled; long-running work should pass it on or check it after every await.
 */
export type TaskOperation = (signal: AbortSignal) => Promise<void> | void;

export interface TaskHandle {
  readonly id: number;
  readonly kind: TaskKind;
  readonly signal: AbortSignal;
  /** Settles once the task finished, failed or was cancelled. Never rejects. */
  readonly outcome: Promise<TaskOutcome>;
  readonly isCancelled: boolean;
  readonly isSettled: boolean;
  cancel(): void;
}

let nextTaskId = 0;

/**
 * Owns running tasks until they settle. Plain and throwing tasks live in
 * separate collections; a failure of a plain task is logged, a failure of a
 * throwing task is only reported through its outcome.
 *
 * All bookkeeping happens synchronously on the event loop, so a task removing
 * itself can never interleave with `cancelAll()` walking the collections.
 */
export class TaskBag {
  private tasks = new Map<number, TaskHandle>();
  private throwingTasks = new Map<number, TaskHandle>();

  constructor(private readonly log: Logger) {}

  get count(): number {
    return this.tasks.size + this.throwingTasks.size;
  }

  spawn(kind: TaskKind, operation: TaskOperation, delayMs?: number): TaskHandle {
    const id = ++nextTaskId;
    const controller = new AbortController();
    const collection = kind === "plain" ? this.tasks : this.throwingTasks;
    let settled = false;

    const outcome = this.execute(controller.signal, operation, delayMs).then(
      (result) => {
        settled = true;
        collection.delete(id);
        if (result.status === "failed" && kind === "plain") {
          this.log.error(`Task ${id} failed:`, result.error);
        }
        return result;
      },
    );

    const handle: TaskHandle = {
      id,
      kind,
      signal: controller.signal,
      outcome,
      get isCancelled() {
        return controller.signal.aborted;
      },
      get isSettled() {
        return settled;
      },
      cancel: () => {
        if (settled || controller.signal.aborted) return;
        controller.abort(new CancellationError(`Task ${id} cancelled`));
        collection.delete(id);
      },
    };

    collection.set(id, handle);
    return handle;
  }

  cancelAll(): number {
    const all = [...this.tasks.values(), ...this.throwingTasks.values()];
    for (const task of all) {
      task.cancel();
    }
    this.tasks.clear();
    this.throwingTasks.clear();
    return all.length;
  }

  private async execute(
    signal: AbortSignal,
    operation: TaskOperation,
    delayMs: number | undefined,
  ): Promise<TaskOutcome> {
    try {
      // Start on a later turn so the caller always holds the handle first
      if (delayMs !== undefined) {
        await sleep(delayMs, signal);
      } else {
        await Promise.resolve();
      }
      if (signal.aborted) return { status: "cancelled" };

      await operation(signal);
      return signal.aborted ? { status: "cancelled" } : { status: "completed" };
    } catch (error) {
      if (signal.aborted || isCancellation(error)) {
        return { status: "cancelled" };
      }
      return { status: "failed", error };
    }
  }
}
