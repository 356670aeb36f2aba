import {
  DEFAULT_MAX_PER_PAGE,
  DEFAULT_RECOMMENDATIONS_CAP,
  DEFAULT_TIMEOUT_SEC,
  PACKAGE_NAME,
  PACKAGE_VERSION,
  SOURCES,
  type SourceName,
} from "@animanga/core";
import { DEFAULT_RETRY_CONFIG, type RetryConfig } from "@animanga/sources";
import { z } from "zod";

export interface ServerConfig {
  name: string;
  version: string;
  maxPerPage: number;
  timeoutSec: number;
  recommendationsCap: number;
  endpoints: Record<SourceName, string>;
  retry: RetryConfig;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  ANIMANGA_MAX_PER_PAGE: positiveInt(DEFAULT_MAX_PER_PAGE),
  ANIMANGA_TIMEOUT_SEC: positiveInt(DEFAULT_TIMEOUT_SEC),
  ANIMANGA_RECOMMENDATIONS: positiveInt(DEFAULT_RECOMMENDATIONS_CAP),
  ANIMANGA_MAX_ATTEMPTS: positiveInt(DEFAULT_RETRY_CONFIG.maxAttempts),
  ANIMANGA_RETRY_BASE_MS: positiveInt(DEFAULT_RETRY_CONFIG.baseDelayMs),
  ANIMANGA_RETRY_JITTER_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY_CONFIG.jitterMs),
  ANIMANGA_RETRY_BUDGET_MS: positiveInt(DEFAULT_RETRY_CONFIG.budgetMs),
  ANILIST_URL: z.string().url().default(SOURCES.anilist.baseUrl),
  JIKAN_URL: z.string().url().default(SOURCES.jikan.baseUrl),
});

// Blank variables count as unset.
function presentValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]?.trim();
    if (value) values[key] = value;
  }
  return values;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(presentValues(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    name: PACKAGE_NAME,
    version: PACKAGE_VERSION,
    maxPerPage: vars.ANIMANGA_MAX_PER_PAGE,
    timeoutSec: vars.ANIMANGA_TIMEOUT_SEC,
    recommendationsCap: vars.ANIMANGA_RECOMMENDATIONS,
    endpoints: {
      anilist: vars.ANILIST_URL.replace(/\/+$/, ""),
      jikan: vars.JIKAN_URL.replace(/\/+$/, ""),
    },
    retry: {
      maxAttempts: vars.ANIMANGA_MAX_ATTEMPTS,
      baseDelayMs: vars.ANIMANGA_RETRY_BASE_MS,
      jitterMs: vars.ANIMANGA_RETRY_JITTER_MS,
      budgetMs: vars.ANIMANGA_RETRY_BUDGET_MS,
    },
  };
}
