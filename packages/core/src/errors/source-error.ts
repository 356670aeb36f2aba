import type { ErrorCode, ErrorSource } from "../types/envelope";

const RETRYABLE_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  "UPSTREAM_429",
  "UPSTREAM_5XX",
  "TIMEOUT",
]);

export interface SourceErrorOptions {
  source: ErrorSource;
  status?: number;
  retryAfterMs?: number;
  cause?: unknown;
}

export class SourceError extends Error {
  readonly code: ErrorCode;
  readonly source: ErrorSource;
  readonly retryable: boolean;
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(code: ErrorCode, message: string, options: SourceErrorOptions) {
    super(message, { cause: options.cause });
    this.name = "SourceError";
    this.code = code;
    this.source = options.source;
    this.retryable = isRetryableCode(code);
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export function isRetryableCode(code: ErrorCode): boolean {
  return RETRYABLE_CODES.has(code);
}

export function isSourceError(value: unknown): value is SourceError {
  return value instanceof SourceError;
}

export function toSourceError(error: unknown, source: ErrorSource): SourceError {
  if (isSourceError(error)) return error;

  const message = error instanceof Error ? error.message : String(error);
  return new SourceError("INTERNAL", message || "Unknown failure", { source, cause: error });
}

export function classifyStatus(
  status: number,
  source: ErrorSource,
  message: string,
  retryAfterMs?: number
): SourceError {
  if (status === 429) {
    return new SourceError("UPSTREAM_429", message, { source, status, retryAfterMs });
  }
  if (status >= 500) {
    return new SourceError("UPSTREAM_5XX", message, { source, status });
  }
  if (status === 404) {
    return new SourceError("NOT_FOUND", message, { source, status });
  }
  return new SourceError("UPSTREAM_4XX", message, { source, status });
}
