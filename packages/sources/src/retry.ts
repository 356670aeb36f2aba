import { setTimeout as sleep } from "node:timers/promises";
import { SourceError, toSourceError, type ErrorSource } from "@animanga/core";

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  jitterMs: number;
  budgetMs: number;
}

export interface RetryClock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
  random(): number;
}

export interface RetryOptions {
  source: ErrorSource;
  config?: Partial<RetryConfig>;
  clock?: RetryClock;
  signal?: AbortSignal;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 700,
  jitterMs: 400,
  budgetMs: 30000,
};

export const systemClock: RetryClock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    await sleep(ms, undefined, { signal });
  },
  random: () => Math.random(),
};

export function getRetryDelay(
  attempt: number,
  config: Partial<RetryConfig> = {},
  random: () => number = Math.random
): number {
  const { baseDelayMs, jitterMs } = { ...DEFAULT_RETRY_CONFIG, ...config };
  const exponentialDelay = baseDelayMs * 2 ** attempt;
  return Math.max(0, exponentialDelay + random() * jitterMs);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const config = { ...DEFAULT_RETRY_CONFIG, ...options.config };
  const clock = options.clock ?? systemClock;
  const { source, signal } = options;
  const startedAt = clock.now();
  let lastFailure: SourceError | null = null;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastFailure = toSourceError(error, source);

      if (!lastFailure.retryable || attempt + 1 >= config.maxAttempts) {
        throw lastFailure;
      }

      const delay = Math.max(
        getRetryDelay(attempt, config, clock.random),
        lastFailure.retryAfterMs ?? 0
      );
      if (clock.now() - startedAt + delay > config.budgetMs) {
        throw lastFailure;
      }

      await clock.sleep(delay, signal).catch((reason: unknown) => {
        throw new SourceError("CANCELLED", "Request was cancelled while backing off", {
          source,
          cause: reason,
        });
      });
    }
  }

  throw lastFailure ?? new SourceError("INTERNAL", "No attempt was made", { source });
}

export function parseRetryAfter(header: string | null): number {
  if (!header) return 0;

  const seconds = Number.parseInt(header, 10);
  if (!Number.isNaN(seconds)) {
    return seconds * 1000;
  }

  const date = new Date(header);
  if (!Number.isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - Date.now());
  }

  return 0;
}
