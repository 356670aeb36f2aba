import {
  type ErrorResponse,
  type ErrorSource,
  type Payload,
  SCHEMA_VERSION,
  type SuccessResponse,
  isSourceError,
} from "@animanga/core";

export function buildSuccess<T extends Payload>(payload: T): SuccessResponse<T> {
  return { schemaVersion: SCHEMA_VERSION, ...payload };
}

export function buildError(error: unknown, source: ErrorSource): ErrorResponse {
  if (isSourceError(error)) {
    return {
      schemaVersion: SCHEMA_VERSION,
      error: { code: error.code, message: error.message, source: error.source },
    };
  }

  console.error("Unexpected failure:", error);
  return {
    schemaVersion: SCHEMA_VERSION,
    error: { code: "INTERNAL", message: "Unexpected internal failure", source },
  };
}
