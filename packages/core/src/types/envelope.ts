import type { SourceName } from "./media";

export type ErrorCode =
  | "INVALID_ARG"
  | "UPSTREAM_429"
  | "UPSTREAM_5XX"
  | "UPSTREAM_4XX"
  | "TIMEOUT"
  | "NORMALIZE_ERROR"
  | "NOT_FOUND"
  | "CANCELLED"
  | "INTERNAL";

export type ErrorSource = SourceName | "local";

export interface ErrorEnvelope {
  code: ErrorCode;
  message: string;
  source: ErrorSource;
}

export interface ErrorResponse {
  schemaVersion: string;
  error: ErrorEnvelope;
}

export type Payload = object & { error?: never };

export type SuccessResponse<T extends Payload> = { schemaVersion: string } & T;

export type ResponseEnvelope<T extends Payload> = SuccessResponse<T> | ErrorResponse;
