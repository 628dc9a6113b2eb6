import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RequestController } from "./RequestController";
import { ScreenScope } from "./ScreenScope";
import type { TaskHandle } from "./TaskBag";
import { sleep } from "./timing";

function started(handle: TaskHandle | null): TaskHandle {
  expect(handle).not.toBeNull();
  if (!handle) throw new Error("scope rejected the task");
  return handle;
}

function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

describe("ScreenScope", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should prefix request ids with the screen id", () => {
    const screen = new ScreenScope("reader", { requests: new RequestController() });

    expect(screen.requestId("ask")).toBe("screen_reader_ask");
  });

  it("should hand out one scope per region name", () => {
    const screen = new ScreenScope("reader", { requests: new RequestController() });

    const toc = screen.scope("toc");

    expect(screen.scope("toc")).toBe(toc);
    expect(toc.id).toBe("reader/toc");
  });

  it("should cancel the tasks of every scope on destroy", async () => {
    const screen = new ScreenScope("reader", { requests: new RequestController() });
    const main = started(screen.run((signal) => sleep(10_000, signal)));
    const toc = started(screen.scope("toc").run((signal) => sleep(10_000, signal)));
    const delayed = started(screen.runAfter(500, () => {}));

    screen.destroy();

    const outcomes = await Promise.all([main.outcome, toc.outcome, delayed.outcome]);
    expect(outcomes.map((o) => o.status)).toEqual([
      "cancelled",
      "cancelled",
      "cancelled",
    ]);
  });

  it("should cancel only its own requests on destroy", async () => {
    const requests = new RequestController();
    const screen = new ScreenScope("reader", { requests });
    const mine = screen.request("ask", (signal) => untilAborted(signal));
    const mineAssertion = expect(mine).rejects.toMatchObject({
      kind: "cancelled",
      requestId: "screen_reader_ask",
    });
    const other = requests.request(
      "ai_global",
      () => new Promise<string>((resolve) => setTimeout(() => resolve("ok"), 10)),
    );

    screen.destroy();

    await mineAssertion;
    expect(requests.isActive("ai_global")).toBe(true);
    await vi.advanceTimersByTimeAsync(10);
    await expect(other).resolves.toBe("ok");
  });

  it("should leave a screen whose id extends its own untouched", async () => {
    const requests = new RequestController();
    const first = new ScreenScope("reader:b1", { requests });
    const second = new ScreenScope("reader:b1_x", { requests });
    const answer = second.request("ai_answer", (signal) => untilAborted(signal));
    const answerAssertion = expect(answer).rejects.toMatchObject({
      kind: "cancelled",
      requestId: "screen_reader:b1_x_ai_answer",
    });

    first.destroy();

    expect(requests.isActive("screen_reader:b1_x_ai_answer")).toBe(true);

    second.destroy();
    await answerAssertion;
    expect(requests.activeCount).toBe(0);
  });

  it("should cancel the latest request when a name was reused", async () => {
    const requests = new RequestController();
    const screen = new ScreenScope("reader", { requests });
    const older = screen.request("ask", (signal) => untilAborted(signal));
    const olderAssertion = expect(older).rejects.toMatchObject({ kind: "cancelled" });
    const newer = screen.request("ask", (signal) => untilAborted(signal));
    const newerAssertion = expect(newer).rejects.toMatchObject({ kind: "cancelled" });

    await olderAssertion;
    expect(requests.isActive("screen_reader_ask")).toBe(true);

    screen.cancelAllRequests();

    await newerAssertion;
    expect(requests.activeCount).toBe(0);
  });

  it("should reject requests after destroy without running them", async () => {
    const screen = new ScreenScope("reader", { requests: new RequestController() });
    const operation = vi.fn(async () => "answer");
    screen.destroy();

    await expect(screen.request("ask", operation)).rejects.toMatchObject({
      kind: "cancelled",
    });
    expect(operation).not.toHaveBeenCalled();
  });

  it("should ignore new work after destroy", () => {
    const screen = new ScreenScope("reader", { requests: new RequestController() });
    screen.destroy();

    expect(screen.run(() => {})).toBeNull();
    const late = screen.scope("ai");
    expect(late.isDestroyed).toBe(true);
    expect(late.run(() => {})).toBeNull();
  });

  it("should be idempotent on destroy", () => {
    const screen = new ScreenScope("reader", { requests: new RequestController() });
    screen.destroy();
    screen.destroy();

    expect(screen.isDestroyed).toBe(true);
  });

  it("should stay usable after cancelAll", async () => {
    const screen = new ScreenScope("reader", { requests: new RequestController() });
    const first = started(screen.scope("ai").run((signal) => sleep(1_000, signal)));

    screen.cancelAll();
    await expect(first.outcome).resolves.toEqual({ status: "cancelled" });

    await expect(screen.request("ask", async () => "answer")).resolves.toBe("answer");
    const next = started(screen.scope("ai").run(() => {}));
    await expect(next.outcome).resolves.toEqual({ status: "completed" });
  });

  it("should destroy a single region scope", () => {
    const screen = new ScreenScope("reader", { requests: new RequestController() });
    const toc = screen.scope("toc");

    screen.destroyScope("toc");

    expect(toc.isDestroyed).toBe(true);
    expect(screen.scope("toc")).not.toBe(toc);
  });
});
