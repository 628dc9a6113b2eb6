import { makeAutoObservable } from "mobx";
import { createLogger, type Logger } from "./log";
import {
  type StreamingTextConfig,
  defaultStreamingTextConfig,
  mergeThrottleConfig,
} from "./ThrottleConfig";
import { ThrottleWindow } from "./ThrottleWindow";

/**
 * Append-only throttle for streamed AI output.
 *
 * Chunks accumulate in a buffer that is moved into `text` when the interval
 * elapsed, or right away when the chunk carries a sentence boundary so the
 * answer reads sentence by sentence.
 *
 * @example
 * ```typescript
 * const answer = new StreamingTextThrottle();
 * answer.startStream();
 * for await (const chunk of stream) answer.append(chunk);
 * answer.endStream();
 * ```
 */
export class StreamingTextThrottle {
  text = "";
  isStreaming = false;

  private buffer = "";
  private readonly config: StreamingTextConfig;
  private readonly window: ThrottleWindow;
  private readonly log: Logger;

  constructor(config?: Partial<StreamingTextConfig>) {
    this.config = mergeThrottleConfig(defaultStreamingTextConfig, config);
    this.log = createLogger("StreamingTextThrottle", this.config.debug);
    this.window = new ThrottleWindow({
      ...this.config,
      name: "StreamingTextThrottle",
    });

    makeAutoObservable<StreamingTextThrottle, "buffer" | "config" | "window" | "log">(
      this,
      { buffer: false, config: false, window: false, log: false },
      { autoBind: true },
    );
  }

  /** Characters received but not yet visible. */
  get bufferedLength(): number {
    return this.buffer.length;
  }

  /**
   * Begin a new answer: clears the text and starts a fresh window, so the
   * first chunks are buffered instead of shown one by one.
   */
  startStream(): void {
    this.window.cancelFlush();
    this.buffer = "";
    this.text = "";
    this.isStreaming = true;
    this.window.markDelivered();
  }

  append(chunk: string): void {
    if (chunk.length === 0) return;
    this.buffer += chunk;

    if (this.window.isOpen() || this.hasBoundary(chunk)) {
      this.window.cancelFlush();
      this.flush();
    } else {
      this.window.scheduleFlush(this.flush);
    }
  }

  endStream(): void {
    this.window.cancelFlush();
    this.flush();
    this.isStreaming = false;
    this.log.debug(`Stream ended (${this.text.length} chars)`);
  }

  /** Move everything buffered into `text` now. */
  flush(): void {
    if (this.buffer.length === 0) return;
    this.text += this.buffer;
    this.buffer = "";
    this.window.markDelivered();
  }

  reset(): void {
    this.window.reset();
    this.buffer = "";
    this.text = "";
    this.isStreaming = false;
  }

  dispose(): void {
    this.window.dispose();
    this.buffer = "";
  }

  private hasBoundary(chunk: string): boolean {
    for (const ch of chunk) {
      if (this.config.boundaryChars.includes(ch)) return true;
    }
    return false;
  }
}
