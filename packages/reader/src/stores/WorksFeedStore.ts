import {
  type PageFetcher,
  PaginationLoader,
  type TaskHandle,
  type TaskScope,
} from "@studyshelf/ui-runtime";
import { makeAutoObservable } from "mobx";

export type WorkKind = "art" | "recitation" | "poetry" | "calligraphy";

export interface Work {
  id: string;
  title: string;
  kind: WorkKind;
}

export type WorksQuery = (
  filter: WorkKind | null,
) => PageFetcher<Work>;

export interface WorksFeedOptions {
  pageSize?: number;
  debounceMs?: number;
  scope?: TaskScope;
  debug?: boolean;
}

/**
 * Student works gallery: an infinite feed that loads the next page when the
 * list scrolls to its end, filtered by kind.
 */
export class WorksFeedStore {
  kindFilter: WorkKind | null = null;

  private readonly loader: PaginationLoader<Work>;
  private readonly query: WorksQuery;

  constructor(query: WorksQuery, opts: WorksFeedOptions = {}) {
    this.query = query;
    this.loader = new PaginationLoader<Work>(opts);
    makeAutoObservable<WorksFeedStore, "loader" | "query">(
      this,
      { loader: false, query: false },
      { autoBind: true },
    );
  }

  get works(): readonly Work[] {
    return this.loader.state.items;
  }

  get isLoading(): boolean {
    return this.loader.state.isLoading;
  }

  get error(): unknown {
    return this.loader.state.error;
  }

  get hasMore(): boolean {
    return this.loader.state.hasMore;
  }

  get isEmpty(): boolean {
    return this.loader.state.isEmpty && !this.loader.controller.hasPendingRequest;
  }

  /** Called by the list when its last row becomes visible. */
  onReachEnd(): TaskHandle | null {
    return this.loader.loadNextPage(this.query(this.kindFilter));
  }

  refresh(): TaskHandle | null {
    return this.loader.refresh(this.query(this.kindFilter));
  }

  setKindFilter(kind: WorkKind | null): TaskHandle | null {
    if (kind === this.kindFilter) return null;
    this.kindFilter = kind;
    this.loader.reset();
    return this.refresh();
  }

  dispose(): void {
    this.loader.dispose();
  }
}
