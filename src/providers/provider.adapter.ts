import { Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { DateWindow } from '../screening/dates';
import { describeError } from '../screening/errors';
import { ProviderClient } from '../screening/probes/probe.interface';

export const DEFAULT_MAX_RETRIES = 3;
const BASE_BACKOFF_MS = 100;

/**
 * Shared plumbing for providers reached over HTTP: the configured axios
 * instance, a logger named after the concrete adapter and a retry loop.
 */
export abstract class BaseProviderAdapter implements ProviderClient {
  protected readonly logger: Logger;

  constructor(
    readonly id: string,
    protected readonly http: AxiosInstance,
    protected readonly maxRetries: number = DEFAULT_MAX_RETRIES,
  ) {
    this.logger = new Logger(new.target.name);
  }

  abstract fetch(subjectId: string, window: DateWindow): Promise<unknown>;

  /**
   * Runs `request` up to `maxRetries + 1` times. The wait doubles after each
   * failed attempt, starting at 100ms; the last failure is rethrown as is.
   */
  protected async withRetry<T>(request: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt += 1) {
      try {
        return await request();
      } catch (error) {
        if (attempt >= this.maxRetries) {
          throw error;
        }
        const delayMs = BASE_BACKOFF_MS * 2 ** attempt;
        this.logger.warn(`${this.id} attempt ${attempt + 1} failed (${describeError(error)}), retrying in ${delayMs}ms`);
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
    }
  }
}
