import { Logger } from '@nestjs/common';
import { DateWindow } from './dates';
import { ProviderError } from './errors';

export type FetchOutcome =
  | { readonly status: 'fulfilled'; readonly payload: unknown }
  | { readonly status: 'failed'; readonly error: ProviderError };

/**
 * Per-session store of provider payloads keyed by (provider, subject, window).
 *
 * Entries hold the in-flight promise rather than the resolved value, so
 * concurrent probes asking for the same key join the first fetch instead of
 * starting their own. Failures are stored as settled outcomes and are not
 * retried within the session.
 */
export class FetchCache {
  private readonly logger = new Logger(FetchCache.name);
  private readonly entries = new Map<string, Promise<FetchOutcome>>();
  private fetchCount = 0;

  static keyOf(providerId: string, subjectId: string, window: DateWindow): string {
    return JSON.stringify([providerId, subjectId, window.start, window.end]);
  }

  /**
   * Implements the cache-aside pattern with single-flight semantics.
   * @param fetchFn invoked at most once per key for the lifetime of this cache
   */
  getOrFetch(
    providerId: string,
    subjectId: string,
    window: DateWindow,
    fetchFn: () => Promise<unknown>,
  ): Promise<FetchOutcome> {
    const key = FetchCache.keyOf(providerId, subjectId, window);
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }

    this.fetchCount += 1;
    this.logger.debug(`Fetching ${providerId} for ${subjectId} (${window.start}..${window.end})`);
    const pending = this.settle(providerId, subjectId, fetchFn);
    this.entries.set(key, pending);
    return pending;
  }

  has(providerId: string, subjectId: string, window: DateWindow): boolean {
    return this.entries.has(FetchCache.keyOf(providerId, subjectId, window));
  }

  /** Number of distinct keys seen this session. */
  get size(): number {
    return this.entries.size;
  }

  /** Number of times a fetch function was actually invoked. */
  get invocations(): number {
    return this.fetchCount;
  }

  private async settle(
    providerId: string,
    subjectId: string,
    fetchFn: () => Promise<unknown>,
  ): Promise<FetchOutcome> {
    try {
      const payload = await fetchFn();
      return { status: 'fulfilled', payload };
    } catch (error) {
      return { status: 'failed', error: ProviderError.from(error, providerId, subjectId) };
    }
  }
}
