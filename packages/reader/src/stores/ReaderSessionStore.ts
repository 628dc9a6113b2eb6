import {
  type Clock,
  PageNumberThrottle,
  type RequestController,
  RequestPrefix,
  ScreenScope,
  Semaphore,
  StreamingTextThrottle,
  type TaskHandle,
  isCancellation,
} from "@studyshelf/ui-runtime";
import { type IReactionDisposer, makeAutoObservable, reaction, runInAction } from "mobx";

/**
 * Backend calls the reader screen depends on.
 */
export interface ReaderServices {
  renderPage(bookId: string, page: number, signal: AbortSignal): Promise<void>;
  /** Streams the answer in chunks; must stop when `signal` aborts. */
  askAi(
    question: string,
    context: { bookId: string; page: number },
    signal: AbortSignal,
  ): AsyncIterable<string>;
}

export interface ReaderSessionOptions {
  pageCount: number;
  /** @default 1 */
  initialPage?: number;
  /**
   * Pages rendered on each side of the visible one.
   * @default 1
   */
  lookaround?: number;
  /** @default 2 */
  maxConcurrentRenders?: number;
  /** @default 60000 */
  answerTimeoutMs?: number;
  requests?: RequestController;
  now?: Clock;
  debug?: boolean;
}

const ANSWER_REQUEST = `${RequestPrefix.ai}answer`;

/**
 * State of one open textbook: throttled page turns, bounded page rendering and
 * the streamed AI answer panel. Everything runs inside the session's
 * ScreenScope; `dispose()` stops all of it.
 */
export class ReaderSessionStore {
  readonly bookId: string;
  readonly pageCount: number;
  readonly screen: ScreenScope;
  readonly page: PageNumberThrottle;
  readonly answer: StreamingTextThrottle;

  renderedPages = new Set<number>();
  question: string | null = null;
  aiError: string | null = null;

  private readonly services: ReaderServices;
  private readonly renderGate: Semaphore;
  private readonly lookaround: number;
  private readonly answerTimeoutMs: number;
  private readonly disposeRenderReaction: IReactionDisposer;

  constructor(
    bookId: string,
    services: ReaderServices,
    opts: ReaderSessionOptions,
  ) {
    this.bookId = bookId;
    this.pageCount = opts.pageCount;
    this.services = services;
    this.lookaround = opts.lookaround ?? 1;
    this.answerTimeoutMs = opts.answerTimeoutMs ?? 60_000;
    this.screen = new ScreenScope(`reader:${bookId}`, {
      requests: opts.requests,
      debug: opts.debug,
    });
    this.renderGate = new Semaphore(opts.maxConcurrentRenders ?? 2, {
      name: "page-render",
      debug: opts.debug,
    });

    const viewScope = this.screen.scope("view");
    this.page = new PageNumberThrottle(opts.initialPage ?? 1, {
      scope: viewScope,
      now: opts.now,
      debug: opts.debug,
    });
    this.answer = new StreamingTextThrottle({
      scope: viewScope,
      now: opts.now,
      debug: opts.debug,
    });

    makeAutoObservable<
      ReaderSessionStore,
      | "services"
      | "renderGate"
      | "lookaround"
      | "answerTimeoutMs"
      | "disposeRenderReaction"
    >(
      this,
      {
        screen: false,
        page: false,
        answer: false,
        services: false,
        renderGate: false,
        lookaround: false,
        answerTimeoutMs: false,
        disposeRenderReaction: false,
      },
      { autoBind: true },
    );

    this.disposeRenderReaction = reaction(
      () => this.page.displayPage,
      (page) => this.renderAround(page),
      { fireImmediately: true },
    );
  }

  get isAnswering(): boolean {
    return this.answer.isStreaming;
  }

  /** Continuous navigation (swipe, slider drag). */
  turnTo(page: number): void {
    this.page.updatePage(this.clampPage(page));
  }

  /** Explicit navigation (table of contents, search hit). */
  jumpTo(page: number): void {
    this.page.forceUpdate(this.clampPage(page));
  }

  /**
   * Ask about the visible page. A new question replaces the one still
   * streaming.
   */
  ask(question: string): TaskHandle | null {
    if (this.screen.isDestroyed) return null;

    const aiScope = this.screen.scope("ai");
    aiScope.cancelAll();
    this.question = question;
    this.aiError = null;
    this.answer.startStream();

    const context = { bookId: this.bookId, page: this.page.displayPage };
    return aiScope.run(async (signal) => {
      try {
        await this.screen.request(
          ANSWER_REQUEST,
          async (requestSignal) => {
            const chunks = this.services.askAi(question, context, requestSignal);
            for await (const chunk of chunks) {
              if (signal.aborted || requestSignal.aborted) break;
              this.answer.append(chunk);
            }
          },
          { timeoutMs: this.answerTimeoutMs },
        );
      } catch (error) {
        if (!isCancellation(error) && !signal.aborted) {
          runInAction(() => {
            this.aiError = error instanceof Error ? error.message : String(error);
          });
        }
      } finally {
        // A replaced answer must not close the stream of its successor
        if (!signal.aborted) {
          this.answer.endStream();
        }
      }
    });
  }

  stopAnswer(): void {
    this.screen.scope("ai").cancelAll();
    this.screen.cancelAllRequests();
    this.answer.endStream();
  }

  dispose(): void {
    this.disposeRenderReaction();
    this.screen.destroy();
    this.page.dispose();
    this.answer.dispose();
  }

  private renderAround(center: number): void {
    const pagesScope = this.screen.scope("pages");
    // Renders for pages the user flipped past are no longer needed
    pagesScope.cancelAll();

    for (const page of this.windowPages(center)) {
      if (this.renderedPages.has(page)) continue;
      pagesScope.run(async (signal) => {
        const acquired = await this.renderGate.wait({ signal });
        if (!acquired) return;
        try {
          await this.services.renderPage(this.bookId, page, signal);
          if (!signal.aborted) {
            runInAction(() => {
              this.renderedPages.add(page);
            });
          }
        } finally {
          this.renderGate.signal();
        }
      });
    }
  }

  /** Visible page first, then neighbours by distance. */
  private windowPages(center: number): number[] {
    const pages = [center];
    for (let d = 1; d <= this.lookaround; d++) {
      if (center - d >= 1) pages.push(center - d);
      if (center + d <= this.pageCount) pages.push(center + d);
    }
    return pages;
  }

  private clampPage(page: number): number {
    return Math.min(Math.max(1, Math.round(page)), Math.max(1, this.pageCount));
  }
}
