import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PageNumberThrottle } from "./PageNumberThrottle";

const now = () => Date.now();

describe("PageNumberThrottle", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should show a single page turn immediately", () => {
    const pages = new PageNumberThrottle(1, { now });

    pages.updatePage(2);

    expect(pages.displayPage).toBe(2);
    expect(pages.isRapidPaging).toBe(false);
  });

  it("should settle on the last page of a rapid flip", async () => {
    const pages = new PageNumberThrottle(1, { now });
    pages.updatePage(2);
    await vi.advanceTimersByTimeAsync(10);

    pages.updatePage(3);
    pages.updatePage(4);
    pages.updatePage(5);

    expect(pages.displayPage).toBe(2);
    expect(pages.isRapidPaging).toBe(true);

    await vi.advanceTimersByTimeAsync(120);

    expect(pages.displayPage).toBe(5);
    expect(pages.isRapidPaging).toBe(false);
  });

  it("should not let a late flush shorten the next window", async () => {
    let clock = 0;
    const pages = new PageNumberThrottle(1, { now: () => clock });
    pages.updatePage(2);
    clock = 10;
    pages.updatePage(3);

    clock = 210;
    pages.updatePage(4);
    expect(pages.displayPage).toBe(4);

    clock = 215;
    pages.updatePage(5);
    await vi.advanceTimersByTimeAsync(90);
    expect(pages.displayPage).toBe(4);
    expect(pages.isRapidPaging).toBe(true);

    await vi.advanceTimersByTimeAsync(5);
    expect(pages.displayPage).toBe(5);
  });

  it("should jump straight to a page on forceUpdate", async () => {
    const pages = new PageNumberThrottle(1, { now });
    pages.updatePage(2);
    await vi.advanceTimersByTimeAsync(10);
    pages.updatePage(3);

    pages.forceUpdate(40);
    expect(pages.displayPage).toBe(40);
    expect(pages.isRapidPaging).toBe(false);

    await vi.advanceTimersByTimeAsync(200);
    expect(pages.displayPage).toBe(40);
  });

  it("should reset to the given page", async () => {
    const pages = new PageNumberThrottle(1, { now });
    pages.updatePage(2);
    await vi.advanceTimersByTimeAsync(10);
    pages.updatePage(3);

    pages.reset(7);
    await vi.advanceTimersByTimeAsync(200);

    expect(pages.displayPage).toBe(7);
    expect(pages.isRapidPaging).toBe(false);
  });
});
