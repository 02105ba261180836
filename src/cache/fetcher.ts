/**
 * Page fetcher with bounded retry and exponential backoff
 */

import { HttpStatusError, NetworkError, toError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { RetryOptions, SleepFn } from '../types/cache.js';

/**
 * Sleep utility
 */
export const sleep: SleepFn = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Delay before retry number `attempt + 1`: 1s, 2s, 4s, ...
 */
export function backoffDelay(attempt: number): number {
  return 1000 * Math.pow(2, attempt);
}

/**
 * Download a URL.
 *
 * - 404 fails at once with an `HttpStatusError` and is never retried
 * - 5xx is retried, then surfaced as `HttpStatusError`
 * - connection errors and timeouts are retried, then surfaced as `NetworkError`
 * - any other non-2xx status fails at once
 */
export async function downloadWithRetry(
  url: string,
  options: RetryOptions,
  logger?: Logger
): Promise<Buffer> {
  const { maxRetries, timeout, userAgent, fetchImpl } = options;

  for (let attempt = 0; attempt < maxRetries; attempt++) {
    const isLastAttempt = attempt === maxRetries - 1;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    let response: Response;
    let body: Buffer;
    try {
      response = await fetchImpl(url, {
        signal: controller.signal,
        redirect: 'follow',
        headers: {
          'User-Agent': userAgent,
        },
      });
      if (response.ok) {
        body = Buffer.from(await response.arrayBuffer());
      } else {
        // Release the connection before retrying or failing
        await response.body?.cancel();
        body = Buffer.alloc(0);
      }
    } catch (error) {
      const cause = toError(error);
      if (isLastAttempt) {
        logger?.error(`Network error after ${maxRetries} attempts: ${url}`, cause);
        throw new NetworkError(
          `Failed to fetch ${url} after ${maxRetries} attempts: ${cause.message}`,
          { url, attempts: maxRetries },
          cause
        );
      }
      const delay = backoffDelay(attempt);
      logger?.warn(`Network error, retrying in ${delay}ms`, { url, attempt: attempt + 1, error: cause.message });
      await options.sleep(delay);
      continue;
    } finally {
      clearTimeout(timeoutId);
    }

    if (response.ok) {
      return body;
    }

    const failure = new HttpStatusError(url, response.status, response.statusText);

    if (failure.isNotFound) {
      logger?.warn(`File not found (404): ${url}`);
      throw failure;
    }

    if (failure.isServerError && !isLastAttempt) {
      const delay = backoffDelay(attempt);
      logger?.warn(`Server error ${response.status}, retrying in ${delay}ms`, { url, attempt: attempt + 1 });
      await options.sleep(delay);
      continue;
    }

    if (failure.isServerError) {
      logger?.error(`Server error after ${maxRetries} attempts: ${url}`, failure);
    }
    throw failure;
  }

  // Only reachable with maxRetries < 1
  throw new NetworkError(`No download attempts made for ${url}`, { url, attempts: maxRetries });
}
