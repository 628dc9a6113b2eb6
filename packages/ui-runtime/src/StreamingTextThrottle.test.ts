import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { StreamingTextThrottle } from "./StreamingTextThrottle";

const now = () => Date.now();

describe("StreamingTextThrottle", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should flush right away on a sentence boundary", () => {
    const answer = new StreamingTextThrottle({
      intervalMs: 500,
      boundaryChars: ".",
      now,
    });
    answer.startStream();

    answer.append("Hello");
    expect(answer.text).toBe("");
    expect(answer.bufferedLength).toBe(5);

    answer.append("world.");
    expect(answer.text).toBe("Helloworld.");
    expect(answer.bufferedLength).toBe(0);
  });

  it("should flush buffered text once the interval elapsed", async () => {
    const answer = new StreamingTextThrottle({ now });
    answer.startStream();

    answer.append("Photo");
    answer.append("synthesis");

    await vi.advanceTimersByTimeAsync(79);
    expect(answer.text).toBe("");

    await vi.advanceTimersByTimeAsync(1);
    expect(answer.text).toBe("Photosynthesis");
  });

  it("should treat full-width punctuation as a boundary", () => {
    const answer = new StreamingTextThrottle({ now });
    answer.startStream();

    answer.append("光合作用");
    answer.append("需要光。");

    expect(answer.text).toBe("光合作用需要光。");
  });

  it("should show the first chunk at once when no stream was started", () => {
    const answer = new StreamingTextThrottle({ now });

    answer.append("Hi");

    expect(answer.text).toBe("Hi");
  });

  it("should flush the tail and stop streaming on endStream", () => {
    const answer = new StreamingTextThrottle({ now });
    answer.startStream();
    answer.append("Done. More");

    expect(answer.text).toBe("Done. More");

    answer.append(" text");
    expect(answer.isStreaming).toBe(true);

    answer.endStream();

    expect(answer.text).toBe("Done. More text");
    expect(answer.isStreaming).toBe(false);
  });

  it("should clear the previous answer when a new stream starts", async () => {
    const answer = new StreamingTextThrottle({ now });
    answer.startStream();
    answer.append("First answer.");
    answer.append(" trailing");

    answer.startStream();
    await vi.advanceTimersByTimeAsync(200);

    expect(answer.text).toBe("");
    expect(answer.bufferedLength).toBe(0);
  });

  it("should be idempotent on reset", () => {
    const answer = new StreamingTextThrottle({ now });
    answer.startStream();
    answer.append("Partial");

    answer.reset();
    answer.reset();

    expect(answer.text).toBe("");
    expect(answer.isStreaming).toBe(false);
    expect(answer.bufferedLength).toBe(0);
  });
});
