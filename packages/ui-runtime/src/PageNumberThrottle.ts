import { makeAutoObservable } from "mobx";
import {
  type ThrottleBaseConfig,
  defaultPageThrottleConfig,
  mergeThrottleConfig,
} from "./ThrottleConfig";
import { ThrottleWindow } from "./ThrottleWindow";

/**
 * Page number for the reader while the user flips quickly: intermediate
 * pages are skipped so only the page the user stops on gets rendered.
 *
 * Uses 1-based page numbers.
 */
export class PageNumberThrottle {
  /** Page the view should render. */
  displayPage: number;
  /** True while a page turn is waiting for the window to reopen. */
  isRapidPaging = false;

  /** Most recently requested page. */
  private requestedPage: number;
  private readonly window: ThrottleWindow;

  constructor(initialPage = 1, config?: Partial<ThrottleBaseConfig>) {
    this.displayPage = initialPage;
    this.requestedPage = initialPage;
    this.window = new ThrottleWindow({
      ...mergeThrottleConfig(defaultPageThrottleConfig, config),
      name: "PageNumberThrottle",
    });

    makeAutoObservable<PageNumberThrottle, "requestedPage" | "window">(
      this,
      { requestedPage: false, window: false },
      { autoBind: true },
    );
  }

  updatePage(page: number): void {
    if (page === this.requestedPage) return;
    this.requestedPage = page;

    if (this.window.isOpen()) {
      this.window.cancelFlush();
      this.apply();
    } else {
      this.isRapidPaging = true;
      this.window.scheduleFlush(this.apply);
    }
  }

  /** Jump straight to `page` (table of contents, search result). */
  forceUpdate(page: number): void {
    this.window.cancelFlush();
    this.requestedPage = page;
    this.apply();
  }

  reset(page = 1): void {
    this.window.reset();
    this.requestedPage = page;
    this.displayPage = page;
    this.isRapidPaging = false;
  }

  dispose(): void {
    this.window.dispose();
  }

  private apply(): void {
    this.displayPage = this.requestedPage;
    this.isRapidPaging = false;
    this.window.markDelivered();
  }
}
