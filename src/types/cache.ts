/**
 * Type definitions for the mirror cache and crawler
 */

/**
 * Manifest written next to a completed mirror (`.cache_version`)
 */
export interface CacheManifest {
  version: string;
  timestamp: string;
  base_url: string;
  file_count: number;
  completed: boolean;
}

/**
 * Minimal fetch signature used by the crawler, satisfied by the global fetch
 */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number) => Promise<void>;

export interface RetryOptions {
  maxRetries: number;
  timeout: number;
  userAgent: string;
  fetchImpl: FetchLike;
  sleep: SleepFn;
}
