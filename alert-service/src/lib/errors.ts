export type FetchFailureReason = "http_error" | "network_error" | "timeout" | "malformed_response";

export class FetchFailure extends Error {
  readonly statusCode = 502;
  readonly reason: FetchFailureReason;
  readonly upstreamStatus: number | null;

  constructor(reason: FetchFailureReason, message: string, upstreamStatus: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FetchFailure";
    this.reason = reason;
    this.upstreamStatus = upstreamStatus;
    Object.setPrototypeOf(this, FetchFailure.prototype);
  }
}

export class StoreFailure extends Error {
  readonly statusCode = 503;
  readonly reason = "store_unavailable";

  constructor(readonly operation: string, options?: { cause?: unknown }) {
    super(`Store operation failed: ${operation}`, options);
    this.name = "StoreFailure";
    Object.setPrototypeOf(this, StoreFailure.prototype);
  }
}

export type ReportErrorReason = "no_cached_alerts" | "unknown_subscription";

export class ReportError extends Error {
  readonly statusCode: number;
  readonly reason: ReportErrorReason;

  constructor(reason: ReportErrorReason, message: string) {
    super(message);
    this.name = "ReportError";
    this.reason = reason;
    this.statusCode = reason === "unknown_subscription" ? 404 : 409;
    Object.setPrototypeOf(this, ReportError.prototype);
  }
}

export class DispatchError extends Error {
  readonly statusCode = 400;
  readonly reason = "mismatched_messages";

  constructor(message: string) {
    super(message);
    this.name = "DispatchError";
    Object.setPrototypeOf(this, DispatchError.prototype);
  }
}

/**
 * Runs a store operation, rethrowing anything that is not already one of our
 * own errors as a StoreFailure tagged with the operation name.
 */
export async function withStore<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  }
  catch (err) {
    if (err instanceof ReportError || err instanceof StoreFailure) throw err;
    throw new StoreFailure(operation, { cause: err });
  }
}
