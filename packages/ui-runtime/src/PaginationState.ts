import { makeAutoObservable, observable } from "mobx";

/**
 * Observable state of a paged list.
 *
 * `currentPage` is the next page to request (1-based). Items are appended in
 * arrival order and never deduplicated: callers must not fetch the same page
 * twice.
 */
export class PaginationState<T> {
  items: T[] = [];
  currentPage = 1;
  pageSize: number;
  totalCount = 0;
  hasMore = true;
  isLoading = false;
  error: unknown = null;

  constructor(pageSize = 20) {
    this.pageSize = pageSize;
    makeAutoObservable(this, { items: observable.shallow }, { autoBind: true });
  }

  get isEmpty(): boolean {
    return this.items.length === 0 && !this.isLoading;
  }

  get canLoadMore(): boolean {
    return this.hasMore && !this.isLoading;
  }

  appendPage(newItems: readonly T[], total?: number): void {
    this.items.push(...newItems);
    this.currentPage += 1;
    this.updateHasMore(newItems.length, total);
  }

  replacePage(newItems: readonly T[], total?: number): void {
    this.items = [...newItems];
    this.currentPage = 2;
    this.updateHasMore(newItems.length, total);
  }

  reset(): void {
    this.items = [];
    this.currentPage = 1;
    this.totalCount = 0;
    this.hasMore = true;
    this.isLoading = false;
    this.error = null;
  }

  private updateHasMore(pageLength: number, total: number | undefined): void {
    if (total !== undefined) {
      this.totalCount = total;
      this.hasMore = this.items.length < total;
    } else {
      this.hasMore = pageLength >= this.pageSize;
    }
  }
}
