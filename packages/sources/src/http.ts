import { SourceError, USER_AGENT, classifyStatus, type SourceName } from "@animanga/core";
import type { FetchLike } from "./adapter";
import { parseRetryAfter } from "./retry";

export interface JsonRequest {
  method?: "GET" | "POST";
  body?: string;
  headers?: Record<string, string>;
}

export interface RequestOptions {
  source: SourceName;
  timeoutMs: number;
  fetch: FetchLike;
  signal?: AbortSignal;
}

export async function requestJson(
  url: string,
  request: JsonRequest,
  options: RequestOptions
): Promise<unknown> {
  const { source, timeoutMs } = options;
  const timeout = AbortSignal.timeout(timeoutMs);
  const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

  let res: Response;
  try {
    res = await options.fetch(url, {
      method: request.method ?? "GET",
      body: request.body,
      headers: { Accept: "application/json", "User-Agent": USER_AGENT, ...request.headers },
      signal,
    });
  } catch (error) {
    throw transportFailure(error, options, timeout);
  }

  if (!res.ok) {
    const retryAfterMs = res.status === 429 ? parseRetryAfter(res.headers.get("Retry-After")) : 0;
    throw classifyStatus(
      res.status,
      source,
      `${source} responded with HTTP ${res.status}`,
      retryAfterMs || undefined
    );
  }

  let text: string;
  try {
    text = await res.text();
  } catch (error) {
    throw transportFailure(error, options, timeout);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new SourceError("NORMALIZE_ERROR", `${source} returned a body that is not JSON`, {
      source,
      status: res.status,
      cause: error,
    });
  }
}

function transportFailure(error: unknown, options: RequestOptions, timeout: AbortSignal): SourceError {
  const { source, timeoutMs } = options;

  if (options.signal?.aborted) {
    return new SourceError("CANCELLED", `${source} request was cancelled`, { source, cause: error });
  }
  if (timeout.aborted) {
    return new SourceError("TIMEOUT", `${source} did not respond within ${timeoutMs}ms`, {
      source,
      cause: error,
    });
  }

  const reason = error instanceof Error ? error.message : String(error);
  return new SourceError("TIMEOUT", `${source} connection failed: ${reason}`, {
    source,
    cause: error,
  });
}
