import { runInAction } from "mobx";
import { isCancellation } from "./errors";
import { PaginationController } from "./PaginationController";
import { PaginationState } from "./PaginationState";
import type { TaskHandle } from "./TaskBag";
import type { TaskScope } from "./TaskScope";

export interface PageResult<T> {
  items: T[];
  /** Total item count when the server reports it. */
  total?: number;
}

/**
 * Fetches one page. `page` is 1-based.
 */
export type PageFetcher<T> = (
  page: number,
  pageSize: number,
  signal: AbortSignal,
) => Promise<PageResult<T>>;

export interface PaginationLoaderOptions {
  /** @default 20 */
  pageSize?: number;
  /** @default 300 */
  debounceMs?: number;
  scope?: TaskScope;
  debug?: boolean;
}

/**
 * Infinite list loading on top of PaginationController: scroll-triggered
 * `loadNextPage` is debounced and deduplicated per page, `refresh` reloads
 * the first page right away. Fetch failures are stored in `state.error`.
 *
 * @example
 * ```typescript
 * const feed = new PaginationLoader<Work>({ pageSize: 20 });
 * onReachEnd(() => feed.loadNextPage((page, size, signal) => api.works(page, size, signal)));
 * ```
 */
export class PaginationLoader<T> {
  readonly state: PaginationState<T>;
  readonly controller: PaginationController;
  /** Bumped on reset and refresh; results of fetches started earlier are dropped. */
  private epoch = 0;
  private nextPageTask: TaskHandle | null = null;

  constructor(opts: PaginationLoaderOptions = {}) {
    this.state = new PaginationState<T>(opts.pageSize ?? 20);
    this.controller = new PaginationController({
      debounceMs: opts.debounceMs,
      scope: opts.scope,
      debug: opts.debug,
    });
  }

  loadNextPage(fetcher: PageFetcher<T>): TaskHandle | null {
    if (!this.state.canLoadMore) return null;

    const page = this.state.currentPage;
    const handle = this.controller.loadMore(`page_${page}`, (signal) =>
      this.fetchInto(fetcher, page, signal, "append"),
    );
    if (handle) this.nextPageTask = handle;
    return handle;
  }

  /**
   * Reload the first page now. A next-page fetch still running is cancelled
   * and its result dropped.
   */
  refresh(fetcher: PageFetcher<T>): TaskHandle | null {
    if (this.controller.isExecuting("refresh")) return null;

    this.epoch++;
    this.nextPageTask?.cancel();
    this.nextPageTask = null;
    this.controller.reset();
    return this.controller.loadImmediately("refresh", (signal) =>
      this.fetchInto(fetcher, 1, signal, "replace"),
    );
  }

  cancel(): void {
    this.controller.cancel();
    runInAction(() => {
      this.state.isLoading = false;
    });
  }

  reset(): void {
    this.epoch++;
    this.nextPageTask?.cancel();
    this.nextPageTask = null;
    this.controller.reset();
    this.state.reset();
  }

  dispose(): void {
    this.controller.dispose();
  }

  private async fetchInto(
    fetcher: PageFetcher<T>,
    page: number,
    signal: AbortSignal,
    mode: "append" | "replace",
  ): Promise<void> {
    const epoch = this.epoch;
    const isStale = () => signal.aborted || epoch !== this.epoch;
    runInAction(() => {
      this.state.isLoading = true;
      this.state.error = null;
    });

    try {
      const result = await fetcher(page, this.state.pageSize, signal);
      if (isStale()) return;
      runInAction(() => {
        if (mode === "append") {
          this.state.appendPage(result.items, result.total);
        } else {
          this.state.replacePage(result.items, result.total);
        }
      });
    } catch (error) {
      if (!isCancellation(error) && !isStale()) {
        runInAction(() => {
          this.state.error = error;
        });
      }
    } finally {
      if (epoch === this.epoch) {
        runInAction(() => {
          this.state.isLoading = false;
        });
      }
    }
  }
}
