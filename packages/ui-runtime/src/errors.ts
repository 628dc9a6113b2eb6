/**
 * Reason attached to an aborted task, flush or wait.
 * Cancellation is an early exit, never a failure.
 */
export class CancellationError extends Error {
  constructor(message = "Cancelled") {
    super(message);
    this.name = "CancellationError";
  }
}

export type RequestErrorKind = "timeout" | "cancelled" | "unknown";

const REQUEST_ERROR_MESSAGES: Record<RequestErrorKind, string> = {
  timeout: "Request timed out",
  cancelled: "Request was cancelled",
  unknown: "Unknown request error",
};

/**
 * Error raised by RequestController when a registered request does not
 * produce its own result.
 */
export class RequestError extends Error {
  readonly kind: RequestErrorKind;
  readonly requestId: string;

  constructor(kind: RequestErrorKind, requestId: string) {
    super(`${REQUEST_ERROR_MESSAGES[kind]} (${requestId})`);
    this.name = "RequestError";
    this.kind = kind;
    this.requestId = requestId;
  }
}

export function isCancellation(error: unknown): boolean {
  if (error instanceof CancellationError) return true;
  if (error instanceof RequestError) return error.kind === "cancelled";
  // fetch() and friends reject with a DOMException named AbortError
  return error instanceof Error && error.name === "AbortError";
}
