import { DispatchError, FetchFailure, ReportError, StoreFailure } from "./errors.js";

export type NormalizedHttpError = {
  statusCode: number;
  body: Record<string, unknown>;
};

export class HttpError extends Error {
  constructor(readonly statusCode: number, readonly code: string, message?: string) {
    super(message ?? code);
    this.name = "HttpError";
    Object.setPrototypeOf(this, HttpError.prototype);
  }
}

export function httpError(statusCode: number, error: string, message?: string): HttpError {
  return new HttpError(statusCode, error, message);
}

function statusCodeFrom(err: unknown, fallbackStatusCode: number): number {
  const statusCode = typeof err === "object" && err && "statusCode" in err
    ? Number((err as { statusCode: unknown }).statusCode)
    : Number.NaN;
  return Number.isFinite(statusCode) && statusCode >= 100 ? statusCode : fallbackStatusCode;
}

function errorCodeFrom(err: unknown): string | null {
  if (err instanceof FetchFailure) return "telemetry_unavailable";
  if (err instanceof StoreFailure) return err.reason;
  if (err instanceof ReportError) return err.reason;
  if (err instanceof DispatchError) return err.reason;
  if (typeof err === "object" && err) {
    const code = (err as { code?: unknown }).code;
    if (typeof code === "string" && code.trim().length > 0) return code.trim().toLowerCase().replace(/[^a-z0-9]+/g, "_");
  }
  return null;
}

function messageFrom(err: unknown): string | undefined {
  if (err instanceof Error) return err.message;
  if (typeof err === "object" && err && "message" in err && typeof (err as { message?: unknown }).message === "string") {
    return (err as { message?: string }).message;
  }
  return undefined;
}

export function toHttpError(err: unknown, fallbackStatusCode = 500): NormalizedHttpError {
  const statusCode = statusCodeFrom(err, fallbackStatusCode);
  const error = errorCodeFrom(err) ?? "unexpected_error";
  const message = messageFrom(err);
  const body: Record<string, unknown> = { error };
  if (message && message !== error) body.message = message;
  return { statusCode, body };
}
