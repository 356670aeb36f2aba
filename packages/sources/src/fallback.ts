import {
  type MediaKind,
  type SourceName,
  SourceError,
  otherSource,
  toSourceError,
} from "@animanga/core";
import type { CallOptions, SourceAdapter, SourceOperation } from "./adapter";
import type { SourceAdapters } from "./providers/index";
import { type RetryClock, type RetryConfig, withRetry } from "./retry";

export type Invoke<T> = (adapter: SourceAdapter, options: CallOptions) => Promise<T>;

export interface ResolveOptions {
  signal?: AbortSignal;
  allowFallback?: boolean;
}

export interface Resolved<T> {
  value: T;
  source: SourceName;
}

export interface FallbackSelectorOptions {
  retry?: Partial<RetryConfig>;
  clock?: RetryClock;
  logger?: Pick<Console, "warn">;
}

export class FallbackSelector {
  private readonly adapters: SourceAdapters;
  private readonly options: FallbackSelectorOptions;

  constructor(adapters: SourceAdapters, options: FallbackSelectorOptions = {}) {
    this.adapters = adapters;
    this.options = options;
  }

  async resolve<T>(
    operation: SourceOperation,
    kind: MediaKind,
    preferred: SourceName,
    invoke: Invoke<T>,
    options: ResolveOptions = {}
  ): Promise<Resolved<T>> {
    const primary = this.adapters[preferred];
    const secondary = this.adapters[otherSource(preferred)];
    const canFallback = (options.allowFallback ?? true) && secondary.supports(operation, kind);

    if (!primary.supports(operation, kind)) {
      if (!canFallback) {
        throw new SourceError("INVALID_ARG", `${preferred} does not support ${operation} for ${kind}`, {
          source: preferred,
        });
      }
      return this.run(secondary, invoke, options.signal);
    }

    try {
      return await this.run(primary, invoke, options.signal);
    } catch (error) {
      const failure = toSourceError(error, preferred);
      if (!failure.retryable || !canFallback) throw failure;

      (this.options.logger ?? console).warn(
        `[fallback] ${preferred} ${operation} failed with ${failure.code}; trying ${secondary.source}`
      );
      return this.run(secondary, invoke, options.signal, { maxAttempts: 1 });
    }
  }

  private async run<T>(
    adapter: SourceAdapter,
    invoke: Invoke<T>,
    signal: AbortSignal | undefined,
    override: Partial<RetryConfig> = {}
  ): Promise<Resolved<T>> {
    const value = await withRetry(() => invoke(adapter, { signal }), {
      source: adapter.source,
      config: { ...this.options.retry, ...override },
      clock: this.options.clock,
      signal,
    });
    return { value, source: adapter.source };
  }
}
