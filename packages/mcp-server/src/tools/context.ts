import {
  FallbackSelector,
  type FetchLike,
  type RetryClock,
  type SourceAdapters,
  createAdapters,
} from "@animanga/sources";
import type { ServerConfig } from "../config";

export interface ToolContext {
  config: ServerConfig;
  adapters: SourceAdapters;
  selector: FallbackSelector;
  clock?: RetryClock;
  now?: () => Date;
}

export interface ToolContextOverrides {
  adapters?: SourceAdapters;
  fetch?: FetchLike;
  clock?: RetryClock;
  logger?: Pick<Console, "warn">;
  now?: () => Date;
}

export function createToolContext(
  config: ServerConfig,
  overrides: ToolContextOverrides = {}
): ToolContext {
  const adapters =
    overrides.adapters ??
    createAdapters({
      endpoints: config.endpoints,
      timeoutMs: config.timeoutSec * 1000,
      recommendationsCap: config.recommendationsCap,
      fetch: overrides.fetch,
    });

  const selector = new FallbackSelector(adapters, {
    retry: config.retry,
    clock: overrides.clock,
    logger: overrides.logger,
  });

  return { config, adapters, selector, clock: overrides.clock, now: overrides.now };
}

export function clampLimit(limit: number, max: number): number {
  return Math.min(limit, max);
}
