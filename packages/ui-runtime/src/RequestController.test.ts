import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RequestError } from "./errors";
import { RequestController, RequestPrefix } from "./RequestController";

function never<T>(): Promise<T> {
  return new Promise<T>(() => {});
}

describe("RequestController", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("should resolve with the operation's result and unregister it", async () => {
    const requests = new RequestController();

    await expect(requests.request("textbook_list", async () => 42)).resolves.toBe(42);

    expect(requests.isActive("textbook_list")).toBe(false);
    expect(requests.stats).toEqual({ total: 1, failed: 0, cancelled: 0 });
  });

  it("should reject with a timeout error when the operation is too slow", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const requests = new RequestController();
    let sawAbort = false;

    const result = requests.request(
      "slow",
      (signal) => {
        signal.addEventListener("abort", () => {
          sawAbort = true;
        });
        return never<string>();
      },
      { timeoutMs: 100 },
    );
    const assertion = expect(result).rejects.toMatchObject({
      kind: "timeout",
      requestId: "slow",
    });

    await vi.advanceTimersByTimeAsync(100);
    await assertion;

    expect(sawAbort).toBe(true);
    expect(requests.isActive("slow")).toBe(false);
    expect(requests.stats).toEqual({ total: 1, failed: 1, cancelled: 0 });
  });

  it("should never time out a request started without timeout", async () => {
    const requests = new RequestController();
    const result = requests.requestNoTimeout(
      "download_book",
      () => new Promise<string>((resolve) => setTimeout(() => resolve("saved"), 120_000)),
    );

    await vi.advanceTimersByTimeAsync(120_000);

    await expect(result).resolves.toBe("saved");
  });

  it("should reject a cancelled request even if the operation ignores the signal", async () => {
    const requests = new RequestController();
    const result = requests.request("notes_sync", () => never<void>());
    const assertion = expect(result).rejects.toBeInstanceOf(RequestError);

    requests.cancel("notes_sync");

    await assertion;
    await expect(result).rejects.toMatchObject({ kind: "cancelled" });
    expect(requests.stats.cancelled).toBe(1);
  });

  it("should cancel an older request with the same id", async () => {
    const requests = new RequestController();
    const first = requests.request("ai_answer", () => never<string>());
    const firstAssertion = expect(first).rejects.toMatchObject({
      kind: "cancelled",
      requestId: "ai_answer",
    });

    const second = requests.request("ai_answer", async () => "second");

    await firstAssertion;
    await expect(second).resolves.toBe("second");
    expect(requests.isActive("ai_answer")).toBe(false);
    expect(requests.stats).toEqual({ total: 2, failed: 0, cancelled: 1 });
  });

  it("should keep the newer registration when the replaced request settles", async () => {
    const requests = new RequestController();
    const first = requests.request("ai_answer", () => never<string>());
    const firstAssertion = expect(first).rejects.toMatchObject({ kind: "cancelled" });
    const second = requests.request("ai_answer", () => never<string>());
    const secondAssertion = expect(second).rejects.toMatchObject({ kind: "cancelled" });

    await firstAssertion;

    expect(requests.isActive("ai_answer")).toBe(true);
    requests.cancel("ai_answer");
    await secondAssertion;
  });

  it("should cancel only the requests matching a prefix", async () => {
    const requests = new RequestController();
    const ai = requests.request(`${RequestPrefix.ai}answer`, () => never<void>());
    const aiAssertion = expect(ai).rejects.toMatchObject({ kind: "cancelled" });
    const practice = requests.request(`${RequestPrefix.practice}quiz`, async () => "quiz");

    requests.cancelAll(RequestPrefix.ai);

    await aiAssertion;
    await expect(practice).resolves.toBe("quiz");
  });

  it("should keep essential requests when cancelling non-essential ones", async () => {
    const requests = new RequestController();
    const auth = requests.request(
      "auth_refresh",
      () => new Promise<string>((resolve) => setTimeout(() => resolve("token"), 10)),
      { essential: true },
    );
    const thumbnails = requests.request("download_thumbs", () => never<void>());
    const thumbnailsAssertion = expect(thumbnails).rejects.toMatchObject({
      kind: "cancelled",
    });

    requests.cancelNonEssential();

    await thumbnailsAssertion;
    expect(requests.activeRequestIds).toEqual(["auth_refresh"]);
    await vi.advanceTimersByTimeAsync(10);
    await expect(auth).resolves.toBe("token");
  });

  it("should pass operation failures through unchanged", async () => {
    const requests = new RequestController();
    const failure = new Error("offline");

    await expect(
      requests.request("textbook_list", async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);

    expect(requests.stats).toEqual({ total: 1, failed: 1, cancelled: 0 });
  });

  it("should count every request until stats are reset", async () => {
    const requests = new RequestController();
    await requests.request("a", async () => 1);
    await requests.request("b", async () => 2);

    expect(requests.stats.total).toBe(2);
    requests.resetStats();
    expect(requests.stats).toEqual({ total: 0, failed: 0, cancelled: 0 });
  });
});
